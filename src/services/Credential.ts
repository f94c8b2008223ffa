import { createHash, randomBytes } from "node:crypto";
import {
	PKCE_VERIFIER_BYTES,
	PKCE_VERIFIER_LENGTH,
	PKCE_VERIFIER_MIN_LENGTH,
	STATE_BYTES,
} from "../config/constants";
import { InvalidCredentialError } from "../errors";
import type { Credential, OAuthConfig, PKCEChallenge } from "../types/spotify";

function base64url(input: Buffer): string {
	return input
		.toString("base64")
		.replace(/\+/g, "-")
		.replace(/\//g, "_")
		.replace(/=/g, "");
}

/**
 * S256 code challenge for a verifier
 */
export function computeCodeChallenge(codeVerifier: string): string {
	return base64url(createHash("sha256").update(codeVerifier).digest());
}

/**
 * Generate PKCE code verifier and challenge
 */
export function generatePKCE(): PKCEChallenge {
	// 64 random bytes encode to 86 url-safe characters, inside the 43-128 range
	const codeVerifier = base64url(randomBytes(PKCE_VERIFIER_BYTES)).substring(
		0,
		PKCE_VERIFIER_LENGTH,
	);

	return { codeVerifier, codeChallenge: computeCodeChallenge(codeVerifier) };
}

/**
 * Credential for the Authorization Code and Client Credentials flows
 */
export function createSecretCredential(
	clientId: string,
	clientSecret: string,
): Credential {
	if (!clientId || !clientSecret) {
		throw new InvalidCredentialError("Client id and client secret are required");
	}
	return Object.freeze({ clientId, clientSecret });
}

/**
 * Credential for the PKCE flow; generates a fresh verifier/challenge pair
 * unless one is supplied.
 */
export function createPkceCredential(
	clientId: string,
	pkce: PKCEChallenge = generatePKCE(),
): Credential {
	if (!clientId) {
		throw new InvalidCredentialError("Client id is required");
	}

	const length = pkce.codeVerifier.length;
	if (length < PKCE_VERIFIER_MIN_LENGTH || length > PKCE_VERIFIER_LENGTH) {
		throw new InvalidCredentialError(
			`PKCE verifier must be ${PKCE_VERIFIER_MIN_LENGTH}-${PKCE_VERIFIER_LENGTH} characters, got ${length}`,
		);
	}

	return Object.freeze({
		clientId,
		pkceVerifier: pkce.codeVerifier,
		pkceChallenge: pkce.codeChallenge,
	});
}

/**
 * `Authorization: Basic` value for a secret credential
 */
export function basicAuthorization(credential: Credential): string {
	if (!credential.clientSecret) {
		throw new InvalidCredentialError("Client secret is required for Basic authorization");
	}
	const encoded = Buffer.from(
		`${credential.clientId}:${credential.clientSecret}`,
	).toString("base64");
	return `Basic ${encoded}`;
}

/**
 * Random anti-CSRF token for one authorization attempt
 */
export function generateState(): string {
	return randomBytes(STATE_BYTES).toString("hex");
}

/**
 * OAuth settings for one authorization attempt. A new `state` is drawn
 * on every call.
 */
export function createOAuthConfig(
	redirectUri: string,
	scopes: Iterable<string> = [],
): OAuthConfig {
	return Object.freeze({
		redirectUri,
		scopes: new Set(scopes),
		state: generateState(),
	});
}
