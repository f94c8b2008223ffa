/**
 * Client for the accounts service `/api/token` endpoint, shared by every
 * flow variant. Each variant decides the form fields and whether a Basic
 * header is sent.
 */

import { SPOTIFY_ACCOUNTS_BASE, TOKEN_PATH } from "../config/constants";
import { AuthProviderError, DecodeError, TransportError } from "../errors";
import {
	AuthErrorResponseSchema,
	decodeOrThrow,
	type TokenResponse,
	TokenResponseSchema,
} from "../schemas/spotify";
import { getLogger } from "../utils";

const logger = getLogger("TokenEndpoint");

export interface TokenRequest {
	form: Record<string, string>;
	/** `Basic ...` header, omitted for PKCE */
	authorization?: string;
}

export class TokenEndpoint {
	private readonly url: string;

	constructor(accountsBaseUrl: string = SPOTIFY_ACCOUNTS_BASE) {
		this.url = `${accountsBaseUrl}${TOKEN_PATH}`;
	}

	/**
	 * POST the form and decode the token response
	 */
	async request({ form, authorization }: TokenRequest): Promise<TokenResponse> {
		const headers: Record<string, string> = {
			"Content-Type": "application/x-www-form-urlencoded",
		};
		if (authorization) {
			headers.Authorization = authorization;
		}

		let response: Response;
		try {
			response = await fetch(this.url, {
				method: "POST",
				headers,
				body: new URLSearchParams(form).toString(),
			});
		} catch (error) {
			throw new TransportError(`Token request failed: ${describe(error)}`, {
				cause: error,
			});
		}

		const text = await response.text();
		let body: unknown;
		try {
			body = text.length > 0 ? JSON.parse(text) : null;
		} catch (error) {
			throw new DecodeError(
				`Token endpoint returned non-JSON body (HTTP ${response.status})`,
				[],
				{ cause: error },
			);
		}

		const providerError = AuthErrorResponseSchema.safeParse(body);
		if (providerError.success) {
			const { error, error_description } = providerError.data;
			logger.warn(`Token request rejected: ${error}`, {
				grant: form.grant_type,
				status: response.status,
			});
			throw new AuthProviderError(
				error,
				error_description ?? error,
				response.status,
			);
		}

		if (!response.ok) {
			throw new AuthProviderError(
				`http_${response.status}`,
				response.statusText || "Token request failed",
				response.status,
			);
		}

		return decodeOrThrow(TokenResponseSchema, body, "token endpoint");
	}
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
