import { AUTHORIZE_PATH, SPOTIFY_ACCOUNTS_BASE } from "../../config/constants";
import { CsrfMismatchError } from "../../errors";
import type { TokenEvents } from "../../events";
import type { FlowId, OAuthConfig, Token } from "../../types/spotify";
import { getLogger } from "../../utils";
import type { TokenCache } from "../TokenCache";
import { TokenEndpoint } from "../TokenEndpoint";
import { TokenSlot } from "../TokenSlot";
import type { FlowConfig } from "./AuthFlow";

const logger = getLogger("AuthFlow");

/**
 * State and helpers every flow variant holds by composition: the token
 * slot, the cache, the token endpoint, the clock and the event sink.
 */
export class FlowSupport {
	readonly slot = new TokenSlot();
	readonly endpoint: TokenEndpoint;
	readonly now: () => number;
	private readonly accountsBaseUrl: string;
	private readonly cache: TokenCache | null;
	private readonly events?: TokenEvents;

	constructor(
		readonly flowId: FlowId,
		readonly oauth: OAuthConfig,
		config: FlowConfig,
	) {
		this.accountsBaseUrl = config.accountsBaseUrl ?? SPOTIFY_ACCOUNTS_BASE;
		this.endpoint = new TokenEndpoint(this.accountsBaseUrl);
		this.cache = config.cache ?? null;
		this.events = config.events;
		this.now = config.now ?? Date.now;
	}

	/**
	 * Load the cached token into the slot. Returns whether one was found.
	 */
	hydrate(): boolean {
		const cached = this.cache?.load(this.flowId) ?? null;
		if (!cached) {
			logger.debug(`No cached token for ${this.flowId}`);
			return false;
		}

		this.slot.replace(cached);
		logger.debug(`Loaded cached token for ${this.flowId}`);
		return true;
	}

	/**
	 * Persist a fresh token and notify listeners. A cache write failure is
	 * logged and reported as an event; the token is still usable.
	 */
	async publish(token: Token, event: "token:acquired" | "token:refreshed"): Promise<void> {
		if (this.cache) {
			try {
				this.cache.save(token, this.flowId);
			} catch (error) {
				logger.warn(`Token for ${this.flowId} was not cached`, {
					error: error instanceof Error ? error.message : String(error),
				});
				await this.events?.emit("token:cacheFailed", { flow: this.flowId, error });
			}
		}

		await this.events?.emit(event, { flow: this.flowId, token });
	}

	/**
	 * Consent page URL with the common parameters plus `extra`
	 */
	authorizeUrl(clientId: string, showDialog: boolean, extra: Record<string, string> = {}): string {
		const params = new URLSearchParams({
			response_type: "code",
			client_id: clientId,
			scope: [...this.oauth.scopes].join(" "),
			redirect_uri: this.oauth.redirectUri,
			state: this.oauth.state,
			show_dialog: String(showDialog),
			...extra,
		});

		return `${this.accountsBaseUrl}${AUTHORIZE_PATH}?${params.toString()}`;
	}

	verifyState(state: string | null): void {
		if (state !== this.oauth.state) {
			throw new CsrfMismatchError();
		}
	}
}
