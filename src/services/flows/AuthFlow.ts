import type { TokenEvents } from "../../events";
import type { FlowId, Token } from "../../types/spotify";
import type { TokenCache } from "../TokenCache";

/**
 * Capability set shared by every authentication strategy. Variants are
 * independent implementations; what they share lives in `FlowSupport`.
 */
export interface AuthFlow {
	/** Cache namespace for this variant */
	readonly id: FlowId;
	/** Whether obtaining a token needs a user consent step */
	readonly interactive: boolean;

	/**
	 * Consent page URL, or "" for variants without an interactive step
	 */
	authorizationUrl(showDialog?: boolean): string;

	/**
	 * Reject a redirect whose `state` differs from the one sent
	 * @throws CsrfMismatchError
	 */
	verifyState(state: string | null): void;

	/**
	 * Exchange a one-time authorization code (ignored by client
	 * credentials) and store the resulting token
	 */
	requestAccessToken(authCode: string): Promise<void>;

	/**
	 * Renew the token without user interaction
	 */
	refresh(): Promise<void>;

	/** Current token, verbatim */
	token(): Token;

	setToken(token: Token): void;

	/** Scopes requested by this flow */
	scopes(): ReadonlySet<string>;
}

/**
 * Explicit per-flow configuration
 */
export interface FlowConfig {
	/** Token cache; omitted or `null` disables caching */
	cache?: TokenCache | null;
	/** Receives token lifecycle events */
	events?: TokenEvents;
	/** Accounts service base URL */
	accountsBaseUrl?: string;
	/** Clock used for expiry arithmetic */
	now?: () => number;
}
