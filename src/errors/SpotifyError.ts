/**
 * Error taxonomy for the auth flows, the API client and the pager.
 * Every error carries a `kind` so callers can switch on it without
 * `instanceof` chains.
 */

export type SpotifyErrorKind =
	| "transport"
	| "decode"
	| "auth-provider"
	| "invalid-token"
	| "forbidden"
	| "not-found"
	| "no-active-device"
	| "request-failed"
	| "unknown-response"
	| "reauthentication-required"
	| "scopes-not-granted"
	| "missing-refresh-token"
	| "csrf-mismatch"
	| "authorization-denied"
	| "invalid-credential"
	| "cache-write"
	| "pager-busy"
	| "configuration"
	| "invalid-uri";

export abstract class SpotifyError extends Error {
	abstract readonly kind: SpotifyErrorKind;

	constructor(message: string, options?: { cause?: unknown }) {
		super(message, options);
		this.name = new.target.name;
	}
}

/** Network or connection failure before any HTTP status was received */
export class TransportError extends SpotifyError {
	readonly kind = "transport";
}

/** Malformed JSON or a body that does not match the expected shape */
export class DecodeError extends SpotifyError {
	readonly kind = "decode";

	constructor(
		message: string,
		public readonly issues: readonly string[] = [],
		options?: { cause?: unknown },
	) {
		super(message, options);
	}
}

/** `error` / `error_description` pair returned by the accounts service */
export class AuthProviderError extends SpotifyError {
	readonly kind = "auth-provider";

	constructor(
		public readonly code: string,
		public readonly description: string,
		public readonly status: number,
	) {
		super(`${code}: ${description} (HTTP ${status})`);
	}
}

/** 401 on a resource call. Not retried with another refresh. */
export class InvalidTokenError extends SpotifyError {
	readonly kind = "invalid-token";

	constructor(message = "Access token was rejected") {
		super(message);
	}
}

/** 403: the token lacks a scope or the account cannot use the endpoint */
export class ForbiddenError extends SpotifyError {
	readonly kind = "forbidden";

	constructor(message = "Missing scope or insufficient permissions") {
		super(message);
	}
}

/** 404 on an endpoint addressing a resource */
export class NotFoundError extends SpotifyError {
	readonly kind = "not-found";

	constructor(public readonly url: string) {
		super(`Resource not found: ${url}`);
	}
}

/** 404 on a player endpoint: no device is active */
export class NoActiveDeviceError extends SpotifyError {
	readonly kind = "no-active-device";

	constructor(message = "No active playback device") {
		super(message);
	}
}

/** 400 / 429 with the provider's `{ error: { status, message } }` envelope */
export class RequestFailedError extends SpotifyError {
	readonly kind = "request-failed";

	constructor(
		public readonly status: number,
		message: string,
		public readonly retryAfterSeconds?: number,
	) {
		super(`${status}: ${message}`);
	}

	get rateLimited(): boolean {
		return this.status === 429;
	}
}

/** Any other unexpected status */
export class UnknownResponseError extends SpotifyError {
	readonly kind = "unknown-response";

	constructor(
		public readonly status: number,
		public readonly body: string,
	) {
		super(`Unexpected response status ${status}`);
	}
}

/** The token can no longer be renewed; the interactive flow must restart */
export class ReAuthenticationRequiredError extends SpotifyError {
	readonly kind = "reauthentication-required";
}

/** The token was not granted scopes an endpoint needs; nothing was sent */
export class ScopesNotGrantedError extends SpotifyError {
	readonly kind = "scopes-not-granted";

	constructor(public readonly missing: readonly string[]) {
		super(`Scopes not granted: ${missing.join(", ")}`);
	}
}

export class MissingRefreshTokenError extends SpotifyError {
	readonly kind = "missing-refresh-token";

	constructor() {
		super("Missing refresh token");
	}
}

/** The `state` echoed on the redirect did not match the one we sent */
export class CsrfMismatchError extends SpotifyError {
	readonly kind = "csrf-mismatch";

	constructor() {
		super("State mismatch on authorization callback");
	}
}

/** The user declined consent, or the provider returned `?error=` */
export class AuthorizationDeniedError extends SpotifyError {
	readonly kind = "authorization-denied";

	constructor(public readonly reason: string) {
		super(`Authorization denied: ${reason}`);
	}
}

/** The credential does not carry what the chosen flow needs */
export class InvalidCredentialError extends SpotifyError {
	readonly kind = "invalid-credential";
}

export class CacheWriteError extends SpotifyError {
	readonly kind = "cache-write";
}

/** A pager was driven by two callers at once */
export class PagerBusyError extends SpotifyError {
	readonly kind = "pager-busy";

	constructor() {
		super("Pager already has a fetch in flight");
	}
}

/** Missing or invalid environment/configuration values */
export class ConfigurationError extends SpotifyError {
	readonly kind = "configuration";
}

/** A string that is not a Spotify URI of the expected kind */
export class InvalidUriError extends SpotifyError {
	readonly kind = "invalid-uri";

	constructor(
		public readonly uri: string,
		reason: string,
	) {
		super(`Invalid Spotify URI "${uri}": ${reason}`);
	}
}

export function isSpotifyError(error: unknown): error is SpotifyError {
	return error instanceof SpotifyError;
}
