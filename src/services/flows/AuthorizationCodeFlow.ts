import { InvalidCredentialError, MissingRefreshTokenError } from "../../errors";
import type { Credential, OAuthConfig, Token } from "../../types/spotify";
import { getLogger } from "../../utils";
import { basicAuthorization } from "../Credential";
import { tokenFromRefresh, tokenFromResponse } from "../Token";
import type { AuthFlow, FlowConfig } from "./AuthFlow";
import { FlowSupport } from "./FlowSupport";

const logger = getLogger("AuthorizationCodeFlow");

/**
 * Authorization Code flow for confidential clients. Every token request
 * authenticates with `Authorization: Basic base64(id:secret)`.
 */
export class AuthorizationCodeFlow implements AuthFlow {
	readonly id = "auth-code";
	readonly interactive = true;
	private readonly support: FlowSupport;

	private constructor(
		private readonly credential: Credential,
		oauth: OAuthConfig,
		config: FlowConfig,
	) {
		this.support = new FlowSupport(this.id, oauth, config);
	}

	/**
	 * Build the flow and load any cached token
	 * @throws InvalidCredentialError when the credential has no secret
	 */
	static async setup(
		credential: Credential,
		oauth: OAuthConfig,
		config: FlowConfig = {},
	): Promise<AuthorizationCodeFlow> {
		if (!credential.clientSecret) {
			throw new InvalidCredentialError(
				"Authorization Code flow requires a client secret",
			);
		}

		const flow = new AuthorizationCodeFlow(credential, oauth, config);
		flow.support.hydrate();
		return flow;
	}

	authorizationUrl(showDialog = false): string {
		return this.support.authorizeUrl(this.credential.clientId, showDialog);
	}

	verifyState(state: string | null): void {
		this.support.verifyState(state);
	}

	async requestAccessToken(authCode: string): Promise<void> {
		const { endpoint, oauth, now, slot } = this.support;

		const response = await endpoint.request({
			form: {
				grant_type: "authorization_code",
				code: authCode,
				redirect_uri: oauth.redirectUri,
			},
			authorization: basicAuthorization(this.credential),
		});

		slot.replace(tokenFromResponse(response, oauth.scopes, now()));
		logger.info("Obtained access token");
		await this.support.publish(slot.read(), "token:acquired");
	}

	async refresh(): Promise<void> {
		const { endpoint, now, slot } = this.support;

		const token = await slot.renew(
			async (current: Token) => {
				if (!current.refreshToken) {
					throw new MissingRefreshTokenError();
				}

				const response = await endpoint.request({
					form: {
						grant_type: "refresh_token",
						refresh_token: current.refreshToken,
						client_id: this.credential.clientId,
					},
					authorization: basicAuthorization(this.credential),
				});

				logger.debug("Access token refreshed");
				return tokenFromRefresh(current, response, now());
			},
			(stored) => this.support.publish(stored, "token:refreshed"),
		);

		logger.debug(`Token valid until ${new Date(token.expiresAt).toISOString()}`);
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
