import { existsSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { HttpResponse, http } from "msw";
import { setupServer } from "msw/node";
import { afterAll, afterEach, beforeAll, beforeEach, describe, expect, it } from "vitest";
import {
	AuthProviderError,
	CsrfMismatchError,
	InvalidCredentialError,
	MissingRefreshTokenError,
} from "../../src/errors";
import { createTokenEvents, type TokenEvent } from "../../src/events";
import {
	createOAuthConfig,
	createPkceCredential,
	createSecretCredential,
} from "../../src/services/Credential";
import { AuthorizationCodeFlow } from "../../src/services/flows/AuthorizationCodeFlow";
import { TokenCache } from "../../src/services/TokenCache";
import {
	ACCOUNTS_BASE,
	BASIC_AUTH,
	CLIENT_ID,
	CLIENT_SECRET,
	createTempDir,
	makeToken,
	REDIRECT_URI,
	readForm,
	TOKEN_URL,
	tokenBody,
} from "../helpers";

const NOW = 1_700_000_000_000;
const server = setupServer();

beforeAll(() => server.listen({ onUnhandledRequest: "error" }));
afterEach(() => server.resetHandlers());
afterAll(() => server.close());

describe("AuthorizationCodeFlow", () => {
	const credential = createSecretCredential(CLIENT_ID, CLIENT_SECRET);
	const oauth = createOAuthConfig(REDIRECT_URI, ["user-read-private", "user-library-read"]);
	let dir: string;
	let cleanup: () => void;
	let cache: TokenCache;

	beforeEach(() => {
		({ dir, cleanup } = createTempDir());
		cache = new TokenCache(dir);
	});

	afterEach(() => cleanup());

	function setup() {
		return AuthorizationCodeFlow.setup(credential, oauth, {
			cache,
			accountsBaseUrl: ACCOUNTS_BASE,
			now: () => NOW,
		});
	}

	it("requires a client secret", async () => {
		await expect(
			AuthorizationCodeFlow.setup(createPkceCredential(CLIENT_ID), oauth),
		).rejects.toThrow(InvalidCredentialError);
	});

	it("starts with an expired empty token on a cache miss", async () => {
		const flow = await setup();

		expect(flow.id).toBe("auth-code");
		expect(flow.interactive).toBe(true);
		expect(flow.token().expiresAt).toBe(0);
	});

	it("loads a cached token at setup", async () => {
		cache.save(makeToken({ accessToken: "cached" }), "auth-code");

		const flow = await setup();

		expect(flow.token().accessToken).toBe("cached");
	});

	it("builds the consent URL", async () => {
		const flow = await setup();
		const url = new URL(flow.authorizationUrl(true));

		expect(`${url.origin}${url.pathname}`).toBe(`${ACCOUNTS_BASE}/authorize`);
		expect(url.searchParams.get("response_type")).toBe("code");
		expect(url.searchParams.get("client_id")).toBe(CLIENT_ID);
		expect(url.searchParams.get("scope")).toBe("user-read-private user-library-read");
		expect(url.searchParams.get("redirect_uri")).toBe(REDIRECT_URI);
		expect(url.searchParams.get("state")).toBe(oauth.state);
		expect(url.searchParams.get("show_dialog")).toBe("true");
		expect(url.searchParams.has("code_challenge")).toBe(false);
	});

	it("rejects a redirect carrying another state", async () => {
		const flow = await setup();

		expect(() => flow.verifyState("forged")).toThrow(CsrfMismatchError);
		expect(() => flow.verifyState(null)).toThrow(CsrfMismatchError);
		expect(() => flow.verifyState(oauth.state)).not.toThrow();
	});

	it("exchanges a code with Basic authentication", async () => {
		let authorization: string | null = null;
		let form: Record<string, string> = {};
		server.use(
			http.post(TOKEN_URL, async ({ request }) => {
				authorization = request.headers.get("Authorization");
				form = await readForm(request);
				return HttpResponse.json(
					tokenBody({ refresh_token: "refresh-1", scope: "user-read-private user-library-read" }),
				);
			}),
		);

		const events = createTokenEvents();
		const acquired: TokenEvent[] = [];
		events.on("token:acquired", (event) => {
			acquired.push(event);
		});

		const flow = await AuthorizationCodeFlow.setup(credential, oauth, {
			cache,
			events,
			accountsBaseUrl: ACCOUNTS_BASE,
			now: () => NOW,
		});
		await flow.requestAccessToken("code-1");

		expect(authorization).toBe(BASIC_AUTH);
		expect(form).toEqual({
			grant_type: "authorization_code",
			code: "code-1",
			redirect_uri: REDIRECT_URI,
		});
		expect(flow.token()).toEqual({
			accessToken: "access-1",
			tokenType: "Bearer",
			scopes: new Set(["user-read-private", "user-library-read"]),
			refreshToken: "refresh-1",
			expiresAt: NOW + 3_600_000,
		});
		expect(cache.load("auth-code")).toEqual(flow.token());
		expect(acquired).toHaveLength(1);
		expect(acquired[0]?.flow).toBe("auth-code");
	});

	it("surfaces provider errors", async () => {
		server.use(
			http.post(TOKEN_URL, () =>
				HttpResponse.json(
					{ error: "invalid_grant", error_description: "Invalid authorization code" },
					{ status: 400 },
				),
			),
		);
		const flow = await setup();

		const error = await flow.requestAccessToken("bad").catch((e: unknown) => e);

		expect(error).toBeInstanceOf(AuthProviderError);
		expect(error).toMatchObject({
			code: "invalid_grant",
			description: "Invalid authorization code",
			status: 400,
		});
		expect(flow.token().expiresAt).toBe(0);
	});

	it("keeps the token usable when the cache cannot be written", async () => {
		server.use(http.post(TOKEN_URL, () => HttpResponse.json(tokenBody())));
		const events = createTokenEvents();
		const failures: unknown[] = [];
		events.on("token:cacheFailed", ({ error }) => {
			failures.push(error);
		});
		const blocker = join(dir, "blocker");
		writeFileSync(blocker, "");
		const brokenCache = new TokenCache(join(blocker, "tokens"));

		const flow = await AuthorizationCodeFlow.setup(credential, oauth, {
			cache: brokenCache,
			events,
			accountsBaseUrl: ACCOUNTS_BASE,
			now: () => NOW,
		});
		await flow.requestAccessToken("code-1");

		expect(flow.token().accessToken).toBe("access-1");
		expect(failures).toHaveLength(1);
	});

	describe("refresh", () => {
		it("keeps the refresh token when the provider does not rotate it", async () => {
			let form: Record<string, string> = {};
			let authorization: string | null = null;
			server.use(
				http.post(TOKEN_URL, async ({ request }) => {
					authorization = request.headers.get("Authorization");
					form = await readForm(request);
					return HttpResponse.json(tokenBody({ access_token: "access-2" }));
				}),
			);
			const flow = await setup();
			flow.setToken(makeToken({ refreshToken: "refresh-0", scopes: new Set(["a"]) }));

			await flow.refresh();

			expect(authorization).toBe(BASIC_AUTH);
			expect(form).toEqual({
				grant_type: "refresh_token",
				refresh_token: "refresh-0",
				client_id: CLIENT_ID,
			});
			expect(flow.token().accessToken).toBe("access-2");
			expect(flow.token().refreshToken).toBe("refresh-0");
			expect(flow.token().scopes).toEqual(new Set(["a"]));
			expect(flow.token().expiresAt).toBe(NOW + 3_600_000);
		});

		it("stores a rotated refresh token", async () => {
			server.use(
				http.post(TOKEN_URL, () =>
					HttpResponse.json(tokenBody({ access_token: "access-2", refresh_token: "refresh-1" })),
				),
			);
			const flow = await setup();
			flow.setToken(makeToken({ refreshToken: "refresh-0" }));

			await flow.refresh();

			expect(flow.token().refreshToken).toBe("refresh-1");
			expect(cache.load("auth-code")?.refreshToken).toBe("refresh-1");
		});

		it("fails without a refresh token and sends nothing", async () => {
			const flow = await setup();

			await expect(flow.refresh()).rejects.toThrow(MissingRefreshTokenError);
		});

		it("shares one request between concurrent callers", async () => {
			let requests = 0;
			server.use(
				http.post(TOKEN_URL, () => {
					requests += 1;
					return HttpResponse.json(tokenBody({ access_token: "access-2" }));
				}),
			);
			const flow = await setup();
			flow.setToken(makeToken({ refreshToken: "refresh-0", expiresAt: 0 }));

			await Promise.all([flow.refresh(), flow.refresh(), flow.refresh()]);

			expect(requests).toBe(1);
			expect(flow.token().accessToken).toBe("access-2");
		});

		it("emits token:refreshed once", async () => {
			server.use(http.post(TOKEN_URL, () => HttpResponse.json(tokenBody())));
			const events = createTokenEvents();
			let refreshed = 0;
			events.on("token:refreshed", () => {
				refreshed += 1;
			});
			const flow = await AuthorizationCodeFlow.setup(credential, oauth, {
				events,
				accountsBaseUrl: ACCOUNTS_BASE,
			});
			flow.setToken(makeToken());

			await Promise.all([flow.refresh(), flow.refresh()]);

			expect(refreshed).toBe(1);
			expect(existsSync(cache.pathFor("auth-code"))).toBe(false);
		});

		it("lets token:refreshed listeners read the stored token", async () => {
			server.use(
				http.post(TOKEN_URL, () => HttpResponse.json(tokenBody({ access_token: "access-new" }))),
			);
			const events = createTokenEvents();
			const flow = await AuthorizationCodeFlow.setup(credential, oauth, {
				events,
				cache,
				accountsBaseUrl: ACCOUNTS_BASE,
				now: () => NOW,
			});
			flow.setToken(makeToken());
			const seen: string[] = [];
			events.on("token:refreshed", () => {
				seen.push(flow.token().accessToken);
				seen.push(cache.load("auth-code")?.accessToken ?? "none");
			});

			await flow.refresh();

			expect(seen).toEqual(["access-new", "access-new"]);
		});

		it("keeps a code exchange that lands while a refresh is in flight", async () => {
			let release: () => void = () => {};
			const gate = new Promise<void>((resolve) => {
				release = resolve;
			});
			server.use(
				http.post(TOKEN_URL, async ({ request }) => {
					const form = await readForm(request);
					if (form.grant_type === "refresh_token") {
						await gate;
						return HttpResponse.json(tokenBody({ access_token: "access-refreshed" }));
					}
					return HttpResponse.json(
						tokenBody({
							access_token: "access-consented",
							refresh_token: "refresh-1",
							scope: "user-read-private user-library-read user-follow-read",
						}),
					);
				}),
			);
			const flow = await setup();
			flow.setToken(makeToken({ refreshToken: "refresh-0", expiresAt: 0 }));

			const refreshing = flow.refresh();
			await flow.requestAccessToken("code-1");
			release();
			await refreshing;

			expect(flow.token().accessToken).toBe("access-consented");
			expect(flow.token().scopes.has("user-follow-read")).toBe(true);
			expect(cache.load("auth-code")?.accessToken).toBe("access-consented");
		});
	});
});
