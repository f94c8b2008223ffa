import { InvalidCredentialError, MissingRefreshTokenError } from "../../errors";
import type { Credential, OAuthConfig, Token } from "../../types/spotify";
import { getLogger } from "../../utils";
import { tokenFromRefresh, tokenFromResponse } from "../Token";
import type { AuthFlow, FlowConfig } from "./AuthFlow";
import { FlowSupport } from "./FlowSupport";

const logger = getLogger("PkceFlow");

/**
 * Authorization Code with PKCE, for public clients. No secret is ever
 * sent: the code exchange proves possession of the verifier instead.
 */
export class PkceFlow implements AuthFlow {
	readonly id = "pkce";
	readonly interactive = true;
	private readonly support: FlowSupport;

	private constructor(
		private readonly clientId: string,
		private readonly verifier: string,
		private readonly challenge: string,
		oauth: OAuthConfig,
		config: FlowConfig,
	) {
		this.support = new FlowSupport(this.id, oauth, config);
	}

	/**
	 * Build the flow and load any cached token
	 * @throws InvalidCredentialError when the credential has no PKCE pair
	 */
	static async setup(
		credential: Credential,
		oauth: OAuthConfig,
		config: FlowConfig = {},
	): Promise<PkceFlow> {
		const { clientId, pkceVerifier, pkceChallenge } = credential;
		if (!pkceVerifier || !pkceChallenge) {
			throw new InvalidCredentialError(
				"PKCE flow requires a code verifier and challenge",
			);
		}

		const flow = new PkceFlow(clientId, pkceVerifier, pkceChallenge, oauth, config);
		flow.support.hydrate();
		return flow;
	}

	authorizationUrl(showDialog = false): string {
		return this.support.authorizeUrl(this.clientId, showDialog, {
			code_challenge_method: "S256",
			code_challenge: this.challenge,
		});
	}

	verifyState(state: string | null): void {
		this.support.verifyState(state);
	}

	async requestAccessToken(authCode: string): Promise<void> {
		const { endpoint, oauth, now, slot } = this.support;

		const response = await endpoint.request({
			form: {
				client_id: this.clientId,
				grant_type: "authorization_code",
				code: authCode,
				redirect_uri: oauth.redirectUri,
				code_verifier: this.verifier,
			},
		});

		slot.replace(tokenFromResponse(response, oauth.scopes, now()));
		logger.info("Obtained access token");
		await this.support.publish(slot.read(), "token:acquired");
	}

	async refresh(): Promise<void> {
		const { endpoint, now, slot } = this.support;

		await slot.renew(
			async (current: Token) => {
				if (!current.refreshToken) {
					throw new MissingRefreshTokenError();
				}

				const response = await endpoint.request({
					form: {
						grant_type: "refresh_token",
						refresh_token: current.refreshToken,
						client_id: this.clientId,
					},
				});

				logger.debug("Access token refreshed");
				return tokenFromRefresh(current, response, now());
			},
			(stored) => this.support.publish(stored, "token:refreshed"),
		);
	}

	token(): Token {
		return this.support.slot.read();
	}

	setToken(token: Token): void {
		this.support.slot.replace(token);
	}

	scopes(): ReadonlySet<string> {
		return this.support.oauth.scopes;
	}
}
