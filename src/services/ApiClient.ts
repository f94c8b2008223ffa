/**
 * Authenticated HTTP Call
 * Keeps the flow's token fresh, issues one request to the Web API and
 * classifies the response.
 */

import type { z } from "zod";
import { HTTP_STATUS, SPOTIFY_API_BASE } from "../config/constants";
import {
	AuthProviderError,
	DecodeError,
	ForbiddenError,
	InvalidTokenError,
	MissingRefreshTokenError,
	NoActiveDeviceError,
	NotFoundError,
	ReAuthenticationRequiredError,
	RequestFailedError,
	ScopesNotGrantedError,
	TransportError,
	UnknownResponseError,
} from "../errors";
import { ApiErrorEnvelopeSchema, decodeOrThrow } from "../schemas/spotify";
import type { Token } from "../types/spotify";
import { getLogger } from "../utils";
import type { AuthFlow } from "./flows/AuthFlow";
import { hasScopes, isTokenValid, missingScopes, toAuthorizationHeader } from "./Token";

const logger = getLogger("ApiClient");

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type QueryValue = string | number | boolean | undefined;

export interface ApiRequest {
	method?: HttpMethod;
	/** Path under the API base URL, or an absolute link taken from a page */
	path: string;
	query?: Record<string, QueryValue>;
	/** JSON body */
	body?: unknown;
	/**
	 * How a 404 is reported. Player endpoints answer 404 when no device
	 * is active.
	 */
	notFound?: "resource" | "device";
	/** Scopes the endpoint needs; checked before anything is sent */
	scopes?: readonly string[];
}

export type ApiResult<T> = { kind: "content"; data: T } | { kind: "no-content" };

export type ResponseSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface ApiClientOptions {
	apiBaseUrl?: string;
	/** Clock for the expiry check */
	now?: () => number;
}

export class ApiClient {
	private readonly apiBaseUrl: string;
	private readonly now: () => number;

	constructor(
		private readonly flow: AuthFlow,
		options: ApiClientOptions = {},
	) {
		this.apiBaseUrl = options.apiBaseUrl ?? SPOTIFY_API_BASE;
		this.now = options.now ?? Date.now;
	}

	getFlow(): AuthFlow {
		return this.flow;
	}

	/**
	 * Send a request and decode the body with `schema`
	 */
	async send<T>(request: ApiRequest, schema: ResponseSchema<T>): Promise<ApiResult<T>> {
		const token = await this.ensureFreshToken();
		const missing = missingScopes(token, request.scopes ?? []);
		if (missing.length > 0) {
			throw new ScopesNotGrantedError(missing);
		}

		const url = this.buildUrl(request);
		const method = request.method ?? "GET";

		const headers: Record<string, string> = {
			Authorization: toAuthorizationHeader(token),
		};
		if (request.body !== undefined) {
			headers["Content-Type"] = "application/json";
		}

		let response: Response;
		try {
			response = await fetch(url, {
				method,
				headers,
				body: request.body !== undefined ? JSON.stringify(request.body) : undefined,
			});
		} catch (error) {
			throw new TransportError(`${method} ${url} failed: ${describe(error)}`, {
				cause: error,
			});
		}

		logger.debug(`${method} ${url} -> ${response.status}`);
		return this.classify(response, url, request, schema);
	}

	/**
	 * Make sure the flow holds a token that is unexpired and covers the
	 * requested scopes, refreshing at most once. The renewed token must
	 * pass the same check.
	 */
	async ensureFreshToken(): Promise<Token> {
		const token = this.flow.token();
		const expired = !isTokenValid(token, this.now());
		const scopeGap = !hasScopes(token, this.flow.scopes());

		if (!expired && !scopeGap) {
			return token;
		}

		if (this.flow.interactive && scopeGap) {
			throw new ReAuthenticationRequiredError(
				"Token does not cover the requested scopes; user consent is required",
			);
		}

		logger.debug(`Token for ${this.flow.id} needs renewal`, { expired, scopeGap });
		try {
			await this.flow.refresh();
		} catch (error) {
			if (
				error instanceof MissingRefreshTokenError ||
				error instanceof AuthProviderError ||
				error instanceof DecodeError
			) {
				throw new ReAuthenticationRequiredError(
					`Token for ${this.flow.id} could not be renewed`,
					{ cause: error },
				);
			}
			throw error;
		}

		const renewed = this.flow.token();
		if (!isTokenValid(renewed, this.now())) {
			throw new ReAuthenticationRequiredError(
				`Renewed token for ${this.flow.id} is already expired`,
			);
		}
		const missing = missingScopes(renewed, this.flow.scopes());
		if (missing.length > 0) {
			throw new ScopesNotGrantedError(missing);
		}
		return renewed;
	}

	private buildUrl(request: ApiRequest): string {
		const base = /^https?:\/\//.test(request.path)
			? request.path
			: `${this.apiBaseUrl}${request.path}`;

		if (!request.query) {
			return base;
		}

		const url = new URL(base);
		for (const [key, value] of Object.entries(request.query)) {
			if (value !== undefined) {
				url.searchParams.set(key, String(value));
			}
		}
		return url.toString();
	}

	private async classify<T>(
		response: Response,
		url: string,
		request: ApiRequest,
		schema: ResponseSchema<T>,
	): Promise<ApiResult<T>> {
		const { status } = response;

		if (status === HTTP_STATUS.NO_CONTENT) {
			return { kind: "no-content" };
		}

		const text = await readBody(response);

		if (response.ok) {
			let body: unknown = null;
			if (text.length > 0) {
				try {
					body = JSON.parse(text);
				} catch (error) {
					throw new DecodeError(`Non-JSON response from ${url}`, [], {
						cause: error,
					});
				}
			}
			return { kind: "content", data: decodeOrThrow(schema, body, url) };
		}

		switch (status) {
			case HTTP_STATUS.UNAUTHORIZED:
				throw new InvalidTokenError();
			case HTTP_STATUS.FORBIDDEN:
				throw new ForbiddenError(errorMessage(text) ?? undefined);
			case HTTP_STATUS.NOT_FOUND:
				if (request.notFound === "device") {
					throw new NoActiveDeviceError();
				}
				throw new NotFoundError(url);
			case HTTP_STATUS.BAD_REQUEST:
			case HTTP_STATUS.RATE_LIMITED: {
				const message = errorMessage(text) ?? (response.statusText || "Request failed");
				const retryAfter =
					status === HTTP_STATUS.RATE_LIMITED
						? parseRetryAfter(response.headers.get("Retry-After"))
						: undefined;
				logger.warn(`Request to ${url} failed with ${status}`, { message, retryAfter });
				throw new RequestFailedError(status, message, retryAfter);
			}
			default:
				throw new UnknownResponseError(status, text);
		}
	}
}

async function readBody(response: Response): Promise<string> {
	try {
		return await response.text();
	} catch (error) {
		throw new TransportError(`Failed to read response body: ${describe(error)}`, {
			cause: error,
		});
	}
}

/**
 * Message from the `{ error: { status, message } }` envelope, if present
 */
function errorMessage(text: string): string | null {
	if (text.length === 0) return null;

	let body: unknown;
	try {
		body = JSON.parse(text);
	} catch {
		return null;
	}

	const envelope = ApiErrorEnvelopeSchema.safeParse(body);
	return envelope.success ? envelope.data.error.message : null;
}

function parseRetryAfter(header: string | null): number | undefined {
	if (header === null) return undefined;
	const seconds = Number.parseInt(header, 10);
	return Number.isFinite(seconds) && seconds >= 0 ? seconds : undefined;
}

function describe(error: unknown): string {
	return error instanceof Error ? error.message : String(error);
}
