import { HttpResponse, http } from "msw";
import { setupServer } from "msw/node";
import { afterAll, afterEach, beforeAll, describe, expect, it } from "vitest";
import { InvalidCredentialError } from "../../src/errors";
import {
	computeCodeChallenge,
	createOAuthConfig,
	createPkceCredential,
	createSecretCredential,
	generatePKCE,
} from "../../src/services/Credential";
import { PkceFlow } from "../../src/services/flows/PkceFlow";
import {
	ACCOUNTS_BASE,
	CLIENT_ID,
	CLIENT_SECRET,
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

describe("PkceFlow", () => {
	const pkce = generatePKCE();
	const credential = createPkceCredential(CLIENT_ID, pkce);
	const oauth = createOAuthConfig(REDIRECT_URI, ["user-read-private"]);

	function setup() {
		return PkceFlow.setup(credential, oauth, {
			accountsBaseUrl: ACCOUNTS_BASE,
			now: () => NOW,
		});
	}

	it("requires the verifier pair", async () => {
		await expect(
			PkceFlow.setup(createSecretCredential(CLIENT_ID, CLIENT_SECRET), oauth),
		).rejects.toThrow(InvalidCredentialError);
	});

	it("logs in without ever sending a secret", async () => {
		const requests: { authorization: string | null; form: Record<string, string> }[] = [];
		server.use(
			http.post(TOKEN_URL, async ({ request }) => {
				requests.push({
					authorization: request.headers.get("Authorization"),
					form: await readForm(request),
				});
				return HttpResponse.json(
					tokenBody({ refresh_token: "refresh-1", scope: "user-read-private" }),
				);
			}),
		);

		const flow = await setup();
		expect(flow.id).toBe("pkce");

		const url = new URL(flow.authorizationUrl());
		expect(url.searchParams.get("code_challenge_method")).toBe("S256");
		expect(url.searchParams.get("code_challenge")).toBe(computeCodeChallenge(pkce.codeVerifier));
		expect(url.searchParams.get("show_dialog")).toBe("false");
		expect(url.searchParams.has("client_secret")).toBe(false);

		flow.verifyState(url.searchParams.get("state"));
		await flow.requestAccessToken("code-1");

		expect(requests).toEqual([
			{
				authorization: null,
				form: {
					client_id: CLIENT_ID,
					grant_type: "authorization_code",
					code: "code-1",
					redirect_uri: REDIRECT_URI,
					code_verifier: pkce.codeVerifier,
				},
			},
		]);
		expect(flow.token().accessToken).toBe("access-1");
		expect(flow.token().refreshToken).toBe("refresh-1");
		expect(flow.token().expiresAt).toBe(NOW + 3_600_000);
	});

	it("refreshes with the client id and no Authorization header", async () => {
		let authorization: string | null = "unset";
		let form: Record<string, string> = {};
		server.use(
			http.post(TOKEN_URL, async ({ request }) => {
				authorization = request.headers.get("Authorization");
				form = await readForm(request);
				return HttpResponse.json(tokenBody({ access_token: "access-2" }));
			}),
		);
		const flow = await setup();
		flow.setToken(makeToken({ refreshToken: "refresh-0" }));

		await flow.refresh();

		expect(authorization).toBeNull();
		expect(form).toEqual({
			grant_type: "refresh_token",
			refresh_token: "refresh-0",
			client_id: CLIENT_ID,
		});
		expect(flow.token().refreshToken).toBe("refresh-0");
	});
});
