import { describe, expect, it } from "vitest";
import { InvalidCredentialError } from "../src/errors";
import {
	basicAuthorization,
	computeCodeChallenge,
	createOAuthConfig,
	createPkceCredential,
	createSecretCredential,
	generatePKCE,
} from "../src/services/Credential";
import { BASIC_AUTH, CLIENT_ID, CLIENT_SECRET, REDIRECT_URI } from "./helpers";

describe("Credential", () => {
	describe("PKCE", () => {
		it("computes the S256 challenge of a verifier", () => {
			expect(
				computeCodeChallenge("dBjftJeZ4CVP-mB92K27uhbUJU1p1r_wW1gFWFOEjXk"),
			).toBe("E9Melhoa2OwvFrEMTJguCHaoeK1t8URWbuGJSstw-cM");
		});

		it("generates a url-safe verifier inside the allowed length", () => {
			const { codeVerifier, codeChallenge } = generatePKCE();

			expect(codeVerifier).toHaveLength(86);
			expect(codeVerifier).toMatch(/^[A-Za-z0-9_-]+$/);
			expect(codeChallenge).toBe(computeCodeChallenge(codeVerifier));
		});

		it("generates a different verifier every time", () => {
			expect(generatePKCE().codeVerifier).not.toBe(generatePKCE().codeVerifier);
		});

		it("builds a PKCE credential without a secret", () => {
			const credential = createPkceCredential(CLIENT_ID);

			expect(credential.clientSecret).toBeUndefined();
			expect(credential.pkceChallenge).toBe(
				computeCodeChallenge(credential.pkceVerifier ?? ""),
			);
		});

		it("rejects a verifier shorter than 43 characters", () => {
			expect(() =>
				createPkceCredential(CLIENT_ID, { codeVerifier: "short", codeChallenge: "x" }),
			).toThrow(InvalidCredentialError);
		});

		it("rejects a verifier longer than 128 characters", () => {
			expect(() =>
				createPkceCredential(CLIENT_ID, {
					codeVerifier: "a".repeat(129),
					codeChallenge: "x",
				}),
			).toThrow(InvalidCredentialError);
		});
	});

	describe("secret credential", () => {
		it("is frozen", () => {
			const credential = createSecretCredential(CLIENT_ID, CLIENT_SECRET);
			expect(Object.isFrozen(credential)).toBe(true);
		});

		it("requires both id and secret", () => {
			expect(() => createSecretCredential(CLIENT_ID, "")).toThrow(InvalidCredentialError);
			expect(() => createSecretCredential("", CLIENT_SECRET)).toThrow(InvalidCredentialError);
		});

		it("encodes the Basic authorization header", () => {
			const credential = createSecretCredential(CLIENT_ID, CLIENT_SECRET);
			expect(basicAuthorization(credential)).toBe(BASIC_AUTH);
		});

		it("cannot build a Basic header for a PKCE credential", () => {
			expect(() => basicAuthorization(createPkceCredential(CLIENT_ID))).toThrow(
				InvalidCredentialError,
			);
		});
	});

	describe("createOAuthConfig", () => {
		it("draws a fresh 32-character hex state per call", () => {
			const first = createOAuthConfig(REDIRECT_URI, ["user-read-private"]);
			const second = createOAuthConfig(REDIRECT_URI, ["user-read-private"]);

			expect(first.state).toMatch(/^[0-9a-f]{32}$/);
			expect(first.state).not.toBe(second.state);
			expect([...first.scopes]).toEqual(["user-read-private"]);
			expect(first.redirectUri).toBe(REDIRECT_URI);
		});
	});
});
