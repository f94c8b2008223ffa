import open from "open";
import { AUTH_TIMEOUT_MS, SCOPES } from "../config/constants";
import type { FlowId, Token } from "../types/spotify";
import { getLogger } from "../utils";
import { CallbackServer } from "./CallbackServer";
import type { AuthFlow } from "./flows/AuthFlow";
import { createEmptyToken } from "./Token";
import type { TokenCache } from "./TokenCache";

const logger = getLogger("AuthService");

/**
 * Scopes requested by the login script and the default API service setup
 */
export const DEFAULT_SCOPES: readonly string[] = [
	// Playback
	SCOPES.USER_MODIFY_PLAYBACK_STATE,
	SCOPES.USER_READ_PLAYBACK_STATE,
	SCOPES.USER_READ_CURRENTLY_PLAYING,
	// Library
	SCOPES.USER_LIBRARY_READ,
	SCOPES.USER_LIBRARY_MODIFY,
	// Playlists
	SCOPES.PLAYLIST_READ_PRIVATE,
	SCOPES.PLAYLIST_READ_COLLABORATIVE,
	// User
	SCOPES.USER_READ_PRIVATE,
	SCOPES.USER_READ_EMAIL,
	SCOPES.USER_READ_RECENTLY_PLAYED,
	// Follow
	SCOPES.USER_FOLLOW_READ,
];

export interface AuthServiceOptions {
	/** Must match the redirect URI the flow was set up with */
	redirectUri: string;
	cache?: TokenCache | null;
	/** Opens the consent page; defaults to the system browser */
	openBrowser?: (url: string) => Promise<unknown>;
	timeoutMs?: number;
}

export interface LoginOptions {
	/** Force the consent dialog even when the user already approved */
	showDialog?: boolean;
}

/**
 * Runs the interactive part of a flow: local redirect listener, browser,
 * code exchange.
 */
export class AuthService {
	private readonly redirectUri: string;
	private readonly cache: TokenCache | null;
	private readonly openBrowser: (url: string) => Promise<unknown>;
	private readonly timeoutMs: number;
	private port: number | null = null;

	constructor(options: AuthServiceOptions) {
		this.redirectUri = options.redirectUri;
		this.cache = options.cache ?? null;
		this.openBrowser = options.openBrowser ?? ((url) => open(url));
		this.timeoutMs = options.timeoutMs ?? AUTH_TIMEOUT_MS;
	}

	/**
	 * Obtain a token for `flow`. Non-interactive flows exchange directly.
	 */
	async login(flow: AuthFlow, options: LoginOptions = {}): Promise<Token> {
		if (!flow.interactive) {
			await flow.requestAccessToken("");
			return flow.token();
		}

		const server = new CallbackServer({
			redirectUri: this.redirectUri,
			verifyState: (state) => flow.verifyState(state),
		});
		this.port = await server.listen();

		const authUrl = flow.authorizationUrl(options.showDialog ?? false);
		logger.info("Waiting for authorization in the browser");

		try {
			await this.openBrowser(authUrl);
		} catch (error) {
			logger.warn("Could not open the browser; open this URL manually", {
				url: authUrl,
				error: error instanceof Error ? error.message : String(error),
			});
		}

		let code: string;
		try {
			code = await server.waitForCode(this.timeoutMs);
		} finally {
			this.port = null;
		}
		await flow.requestAccessToken(code);
		logger.info(`Logged in with ${flow.id}`);
		return flow.token();
	}

	/**
	 * Port of the redirect listener while a login is waiting
	 */
	callbackPort(): number | null {
		return this.port;
	}

	/**
	 * Forget the flow's token in memory and on disk
	 */
	logout(flow: AuthFlow): void {
		flow.setToken(createEmptyToken());
		this.clearCache(flow.id);
	}

	private clearCache(flowId: FlowId): void {
		this.cache?.clear(flowId);
		logger.debug(`Cleared cached token for ${flowId}`);
	}
}
