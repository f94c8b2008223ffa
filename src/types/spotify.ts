/**
 * Spotify API Types
 */

/**
 * Static identity used to authenticate. Exactly one of `clientSecret`
 * or the PKCE pair is populated.
 */
export interface Credential {
	readonly clientId: string;
	readonly clientSecret?: string;
	readonly pkceVerifier?: string;
	readonly pkceChallenge?: string;
}

/**
 * PKCE challenge pair
 */
export interface PKCEChallenge {
	codeVerifier: string;
	codeChallenge: string;
}

/**
 * Per-attempt OAuth settings
 */
export interface OAuthConfig {
	readonly redirectUri: string;
	readonly scopes: ReadonlySet<string>;
	/** Anti-CSRF token, must be echoed on the redirect */
	readonly state: string;
}

/**
 * Access token held in a flow's token slot
 */
export interface Token {
	accessToken: string;
	tokenType: string;
	scopes: Set<string>;
	refreshToken?: string;
	/** Unix timestamp in milliseconds */
	expiresAt: number;
}

/**
 * Cache namespace of each flow variant
 */
export type FlowId = "auth-code" | "pkce" | "creds";

/**
 * Continuation links extracted from a decoded page
 */
export interface PageLinks {
	next: string | null;
	prev: string | null;
	total?: number;
}
