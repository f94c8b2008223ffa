import type { CachedToken, TokenResponse } from "../schemas/spotify";
import type { Token } from "../types/spotify";

/**
 * Token held by a flow before any exchange: already expired, no scopes
 */
export function createEmptyToken(): Token {
	return {
		accessToken: "",
		tokenType: "Bearer",
		scopes: new Set(),
		expiresAt: 0,
	};
}

/**
 * A token is usable only while `now < expiresAt`
 */
export function isTokenValid(token: Token, now: number = Date.now()): boolean {
	return now < token.expiresAt;
}

/**
 * Whether every required scope was granted
 */
export function hasScopes(
	token: Token,
	required: Iterable<string>,
): boolean {
	for (const scope of required) {
		if (!token.scopes.has(scope)) return false;
	}
	return true;
}

/**
 * Required scopes the token was not granted, in the order given
 */
export function missingScopes(token: Token, required: Iterable<string>): string[] {
	return [...required].filter((scope) => !token.scopes.has(scope));
}

function parseScopes(scope: string): Set<string> {
	return new Set(scope.split(" ").filter((s) => s.length > 0));
}

/**
 * Token from a successful code or client-credentials exchange. When the
 * provider omits `scope`, the requested scopes were granted.
 */
export function tokenFromResponse(
	response: TokenResponse,
	requestedScopes: Iterable<string>,
	now: number,
): Token {
	return {
		accessToken: response.access_token,
		tokenType: response.token_type,
		scopes:
			response.scope !== undefined
				? parseScopes(response.scope)
				: new Set(requestedScopes),
		refreshToken: response.refresh_token,
		expiresAt: now + response.expires_in * 1000,
	};
}

/**
 * Token from a refresh response. The previous refresh token and scopes
 * are kept when the provider does not send new ones.
 */
export function tokenFromRefresh(
	previous: Token,
	response: TokenResponse,
	now: number,
): Token {
	return {
		accessToken: response.access_token,
		tokenType: response.token_type,
		scopes:
			response.scope !== undefined
				? parseScopes(response.scope)
				: new Set(previous.scopes),
		refreshToken: response.refresh_token ?? previous.refreshToken,
		expiresAt: now + response.expires_in * 1000,
	};
}

/**
 * `Authorization` header value for a resource call
 */
export function toAuthorizationHeader(token: Token): string {
	return `${token.tokenType} ${token.accessToken}`;
}

export function toCachedToken(
	token: Token,
	flow: string,
	version: number,
): CachedToken {
	return {
		version,
		flow,
		token: {
			access_token: token.accessToken,
			token_type: token.tokenType,
			scopes: [...token.scopes],
			refresh_token: token.refreshToken ?? null,
			expires_at: token.expiresAt,
		},
	};
}

export function fromCachedToken(entry: CachedToken): Token {
	const { token } = entry;
	return {
		accessToken: token.access_token,
		tokenType: token.token_type,
		scopes: new Set(token.scopes),
		refreshToken: token.refresh_token ?? undefined,
		expiresAt: token.expires_at,
	};
}
