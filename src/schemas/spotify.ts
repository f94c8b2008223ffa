/**
 * Zod schemas for Spotify accounts and Web API payloads
 * Provides runtime type safety for everything decoded off the wire
 */

import { z } from "zod";
import { DecodeError } from "../errors";
import { getLogger } from "../utils";

const logger = getLogger("Validation");

// ============================================================================
// Accounts service
// ============================================================================

/**
 * Successful `/api/token` response
 */
export const TokenResponseSchema = z.object({
	access_token: z.string().min(1),
	token_type: z.string().min(1),
	expires_in: z.number().positive(),
	scope: z.string().optional(),
	refresh_token: z.string().optional(),
});

/**
 * Failed `/api/token` response
 */
export const AuthErrorResponseSchema = z.object({
	error: z.string(),
	error_description: z.string().optional(),
});

/**
 * Token as persisted in the cache file
 */
export const CachedTokenSchema = z.object({
	version: z.number(),
	flow: z.string(),
	token: z.object({
		access_token: z.string(),
		token_type: z.string(),
		scopes: z.array(z.string()),
		refresh_token: z.string().nullable(),
		expires_at: z.number(),
	}),
});

// ============================================================================
// Web API errors
// ============================================================================

/**
 * Regular error envelope used by 400/429 responses
 */
export const ApiErrorEnvelopeSchema = z.object({
	error: z.object({
		status: z.number(),
		message: z.string(),
	}),
});

// ============================================================================
// Base Types
// ============================================================================

const ImageSchema = z.object({
	url: z.string(),
	height: z.number().nullable().optional().default(null),
	width: z.number().nullable().optional().default(null),
});

export const SimplifiedArtistSchema = z.object({
	id: z.string(),
	name: z.string(),
	uri: z.string(),
});

export const SpotifyArtistSchema = SimplifiedArtistSchema.extend({
	genres: z.array(z.string()).optional(),
	popularity: z.number().min(0).max(100).optional(),
	images: z.array(ImageSchema).optional(),
});

export const SimplifiedAlbumSchema = z.object({
	id: z.string(),
	name: z.string(),
	uri: z.string(),
	images: z.array(ImageSchema).default([]),
	release_date: z.string().optional(),
	artists: z.array(SimplifiedArtistSchema).default([]),
});

export const SpotifyTrackSchema = z.object({
	id: z.string(),
	name: z.string(),
	uri: z.string(),
	duration_ms: z.number().min(0),
	artists: z.array(SimplifiedArtistSchema),
	album: SimplifiedAlbumSchema.optional(),
	is_playable: z.boolean().optional(),
	popularity: z.number().min(0).max(100).optional(),
});

export const SpotifyPlaylistSchema = z.object({
	id: z.string(),
	name: z.string(),
	uri: z.string(),
	description: z.string().nullable(),
	public: z.boolean().nullable(),
	collaborative: z.boolean().optional().default(false),
	images: z.array(ImageSchema).nullable().default([]),
	owner: z.object({
		id: z.string(),
		display_name: z.string().nullable().optional(),
	}),
	tracks: z
		.object({
			href: z.string(),
			total: z.number(),
		})
		.optional(),
	snapshot_id: z.string().optional(),
});

export const SpotifyUserSchema = z.object({
	id: z.string(),
	display_name: z.string().nullable(),
	email: z.string().optional(),
	country: z.string().optional(),
	product: z.string().optional(),
	images: z.array(ImageSchema).optional(),
});

export const SpotifyDeviceSchema = z.object({
	id: z.string().nullable(),
	name: z.string(),
	type: z.string(),
	is_active: z.boolean(),
	volume_percent: z.number().min(0).max(100).nullable(),
});

export const DevicesSchema = z.object({
	devices: z.array(SpotifyDeviceSchema),
});

// ============================================================================
// Paginated Responses
// ============================================================================

export const PaginatedResponseSchema = <T extends z.ZodTypeAny>(itemSchema: T) =>
	z.object({
		href: z.string(),
		items: z.array(itemSchema),
		limit: z.number(),
		next: z.string().nullable(),
		offset: z.number(),
		previous: z.string().nullable(),
		total: z.number(),
	});

export const CursorPaginatedResponseSchema = <T extends z.ZodTypeAny>(
	itemSchema: T,
) =>
	z.object({
		href: z.string(),
		items: z.array(itemSchema),
		limit: z.number(),
		next: z.string().nullable(),
		cursors: z
			.object({
				before: z.string().nullable().optional(),
				after: z.string().nullable().optional(),
			})
			.nullable(),
		total: z.number().optional(),
	});

export const SavedTrackSchema = z.object({
	added_at: z.string(),
	track: SpotifyTrackSchema,
});

export const PlaylistItemSchema = z.object({
	added_at: z.string().nullable(),
	is_local: z.boolean().optional().default(false),
	track: SpotifyTrackSchema.nullable(),
});

export const PlayHistorySchema = z.object({
	played_at: z.string(),
	track: SpotifyTrackSchema,
});

export const PaginatedTracksSchema = PaginatedResponseSchema(SpotifyTrackSchema);
export const PaginatedSavedTracksSchema = PaginatedResponseSchema(SavedTrackSchema);
export const PaginatedPlaylistsSchema = PaginatedResponseSchema(SpotifyPlaylistSchema);
export const PaginatedPlaylistItemsSchema = PaginatedResponseSchema(PlaylistItemSchema);
export const RecentlyPlayedSchema = CursorPaginatedResponseSchema(PlayHistorySchema);

/**
 * `/me/following` wraps its cursor page in an `artists` key
 */
export const FollowedArtistsSchema = z.object({
	artists: CursorPaginatedResponseSchema(SpotifyArtistSchema),
});

export const SearchResultsSchema = z.object({
	tracks: PaginatedTracksSchema.optional(),
	artists: PaginatedResponseSchema(SpotifyArtistSchema).optional(),
	playlists: PaginatedResponseSchema(SpotifyPlaylistSchema.nullable()).optional(),
});

// ============================================================================
// Playback
// ============================================================================

export const PlaybackStateSchema = z.object({
	timestamp: z.number(),
	progress_ms: z.number().nullable(),
	is_playing: z.boolean(),
	item: SpotifyTrackSchema.nullable(),
	device: SpotifyDeviceSchema,
	repeat_state: z.enum(["off", "track", "context"]),
	shuffle_state: z.boolean(),
});

/**
 * Accepts an empty body (decoded as `null`) for write endpoints
 */
export const EmptyBodySchema = z.unknown().transform(() => undefined);

// ============================================================================
// Type exports (inferred from schemas)
// ============================================================================

export type TokenResponse = z.infer<typeof TokenResponseSchema>;
export type CachedToken = z.infer<typeof CachedTokenSchema>;
export type ValidatedSpotifyTrack = z.infer<typeof SpotifyTrackSchema>;
export type ValidatedSpotifyArtist = z.infer<typeof SpotifyArtistSchema>;
export type ValidatedSpotifyPlaylist = z.infer<typeof SpotifyPlaylistSchema>;
export type ValidatedSpotifyUser = z.infer<typeof SpotifyUserSchema>;
export type ValidatedSavedTrack = z.infer<typeof SavedTrackSchema>;
export type ValidatedPlaylistItem = z.infer<typeof PlaylistItemSchema>;
export type ValidatedPlayHistory = z.infer<typeof PlayHistorySchema>;
export type ValidatedDevices = z.infer<typeof DevicesSchema>;
export type ValidatedPlaybackState = z.infer<typeof PlaybackStateSchema>;
export type ValidatedSearchResults = z.infer<typeof SearchResultsSchema>;
export type PaginatedSavedTracks = z.infer<typeof PaginatedSavedTracksSchema>;
export type PaginatedPlaylists = z.infer<typeof PaginatedPlaylistsSchema>;
export type PaginatedPlaylistItems = z.infer<typeof PaginatedPlaylistItemsSchema>;
export type PaginatedTracks = z.infer<typeof PaginatedTracksSchema>;
export type RecentlyPlayed = z.infer<typeof RecentlyPlayedSchema>;
export type FollowedArtists = z.infer<typeof FollowedArtistsSchema>;

// ============================================================================
// Helper: Safe Parse with Error Logging
// ============================================================================

export function safeValidate<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
	context: string,
): T | null {
	const result = schema.safeParse(data);

	if (!result.success) {
		logger.warn(`Validation failed: ${context}`, result.error.issues);
		return null;
	}

	return result.data;
}

/**
 * Parse or throw a DecodeError listing the failing paths
 */
export function decodeOrThrow<T>(
	schema: z.ZodType<T, z.ZodTypeDef, unknown>,
	data: unknown,
	context: string,
): T {
	const result = schema.safeParse(data);

	if (!result.success) {
		const issues = result.error.issues.map(
			(issue) => `${issue.path.join(".") || "<root>"}: ${issue.message}`,
		);
		throw new DecodeError(`Invalid payload from ${context}`, issues, {
			cause: result.error,
		});
	}

	return result.data;
}
