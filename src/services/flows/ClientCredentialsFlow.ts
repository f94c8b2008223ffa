import { InvalidCredentialError } from "../../errors";
import type { Credential, OAuthConfig, Token } from "../../types/spotify";
import { getLogger } from "../../utils";
import { basicAuthorization } from "../Credential";
import { isTokenValid, tokenFromResponse } from "../Token";
import type { AuthFlow, FlowConfig } from "./AuthFlow";
import { FlowSupport } from "./FlowSupport";

const logger = getLogger("ClientCredentialsFlow");

/**
 * App-only access. There is no user step and no refresh token; renewing
 * means exchanging the client credentials again.
 */
export class ClientCredentialsFlow implements AuthFlow {
	readonly id = "creds";
	readonly interactive = false;
	private readonly support: FlowSupport;

	private constructor(
		private readonly credential: Credential,
		oauth: OAuthConfig,
		config: FlowConfig,
	) {
		this.support = new FlowSupport(this.id, oauth, config);
	}

	/**
	 * Build the flow. Without a usable cached token an exchange happens
	 * right away.
	 * @throws InvalidCredentialError when the credential has no secret
	 */
	static async setup(
		credential: Credential,
		oauth: OAuthConfig,
		config: FlowConfig = {},
	): Promise<ClientCredentialsFlow> {
		if (!credential.clientSecret) {
			throw new InvalidCredentialError(
				"Client Credentials flow requires a client secret",
			);
		}

		const flow = new ClientCredentialsFlow(credential, oauth, config);
		const { support } = flow;
		if (!support.hydrate() || !isTokenValid(support.slot.read(), support.now())) {
			await flow.requestAccessToken("");
		}
		return flow;
	}

	authorizationUrl(): string {
		return "";
	}

	verifyState(state: string | null): void {
		this.support.verifyState(state);
	}

	/**
	 * The code is ignored; performs a client-credentials exchange
	 */
	async requestAccessToken(_authCode: string): Promise<void> {
		await this.support.slot.renew(
			() => this.exchange(),
			(stored) => this.support.publish(stored, "token:acquired"),
		);
		logger.info("Obtained app access token");
	}

	async refresh(): Promise<void> {
		await this.support.slot.renew(
			() => this.exchange(),
			(stored) => this.support.publish(stored, "token:refreshed"),
		);
		logger.debug("App access token renewed");
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

	private async exchange(): Promise<Token> {
		const { endpoint, oauth, now } = this.support;
		const form: Record<string, string> = { grant_type: "client_credentials" };
		if (oauth.scopes.size > 0) {
			form.scope = [...oauth.scopes].join(" ");
		}

		const response = await endpoint.request({
			form,
			authorization: basicAuthorization(this.credential),
		});

		return tokenFromResponse(response, oauth.scopes, now());
	}
}
