/**
 * Library name
 */
export const APP_NAME = "spotwire";

/**
 * Spotify endpoints
 */
export const SPOTIFY_ACCOUNTS_BASE = "https://accounts.spotify.com";
export const SPOTIFY_API_BASE = "https://api.spotify.com/v1";
export const AUTHORIZE_PATH = "/authorize";
export const TOKEN_PATH = "/api/token";

/**
 * Authentication constants
 */
export const AUTH_TIMEOUT_MS = 5 * 60 * 1000; // 5 minutes to finish the browser step
export const DEFAULT_CALLBACK_PORT = 8888;
export const DEFAULT_REDIRECT_URI = `http://127.0.0.1:${DEFAULT_CALLBACK_PORT}/callback`;
export const STATE_BYTES = 16;

/**
 * PKCE constants (RFC 7636)
 */
export const PKCE_VERIFIER_BYTES = 64; // Random bytes for code verifier
export const PKCE_VERIFIER_MIN_LENGTH = 43;
export const PKCE_VERIFIER_LENGTH = 128; // Upper bound for the verifier string

/**
 * Token cache
 */
export const TOKEN_CACHE_VERSION = 1;
export const TOKEN_CACHE_FILE_MODE = 0o600;
export const CONFIG_DIR_MODE = 0o700;

/**
 * OAuth scopes the endpoint builders require
 */
export const SCOPES = {
	USER_READ_PRIVATE: "user-read-private",
	USER_READ_EMAIL: "user-read-email",
	USER_LIBRARY_READ: "user-library-read",
	USER_LIBRARY_MODIFY: "user-library-modify",
	USER_FOLLOW_READ: "user-follow-read",
	USER_READ_RECENTLY_PLAYED: "user-read-recently-played",
	PLAYLIST_READ_PRIVATE: "playlist-read-private",
	PLAYLIST_READ_COLLABORATIVE: "playlist-read-collaborative",
	USER_READ_PLAYBACK_STATE: "user-read-playback-state",
	USER_MODIFY_PLAYBACK_STATE: "user-modify-playback-state",
	USER_READ_CURRENTLY_PLAYING: "user-read-currently-playing",
} as const;

/**
 * Pagination defaults (Spotify API limits)
 */
export const API_LIMITS = {
	SAVED_TRACKS: 50, // Max 50 per request
	PLAYLISTS: 50, // Max 50 per request
	PLAYLIST_ITEMS: 100, // Max 100 per request
	FOLLOWED_ARTISTS: 50,
	RECENTLY_PLAYED: 50,
	SEARCH_RESULTS: 20, // Default search limit
	SAVE_TRACKS_BATCH: 50,
} as const;

/**
 * HTTP Status Codes
 */
export const HTTP_STATUS = {
	OK: 200,
	NO_CONTENT: 204,
	BAD_REQUEST: 400,
	UNAUTHORIZED: 401,
	FORBIDDEN: 403,
	NOT_FOUND: 404,
	RATE_LIMITED: 429,
} as const;

/**
 * Default market for Spotify API
 */
export const DEFAULT_MARKET = "US";
