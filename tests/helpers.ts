import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import type { AuthFlow } from "../src/services/flows/AuthFlow";
import type { FlowId, Token } from "../src/types/spotify";

export const ACCOUNTS_BASE = "https://accounts.test";
export const TOKEN_URL = `${ACCOUNTS_BASE}/api/token`;
export const API_BASE = "https://api.test/v1";
export const REDIRECT_URI = "http://127.0.0.1:8888/callback";
export const CLIENT_ID = "test-client";
export const CLIENT_SECRET = "test-secret";

/** `Basic base64("test-client:test-secret")` */
export const BASIC_AUTH = `Basic ${Buffer.from(`${CLIENT_ID}:${CLIENT_SECRET}`).toString("base64")}`;

export function tokenBody(overrides: Record<string, unknown> = {}): Record<string, unknown> {
	return {
		access_token: "access-1",
		token_type: "Bearer",
		expires_in: 3600,
		...overrides,
	};
}

export function makeToken(overrides: Partial<Token> = {}): Token {
	return {
		accessToken: "access-0",
		tokenType: "Bearer",
		scopes: new Set(),
		refreshToken: "refresh-0",
		expiresAt: Date.now() + 3_600_000,
		...overrides,
	};
}

export async function readForm(request: Request): Promise<Record<string, string>> {
	return Object.fromEntries(new URLSearchParams(await request.text()));
}

export function createTempDir(): { dir: string; cleanup: () => void } {
	const dir = mkdtempSync(join(tmpdir(), "spotwire-"));
	return { dir, cleanup: () => rmSync(dir, { recursive: true, force: true }) };
}

/**
 * In-memory flow for exercising the request layer
 */
export class FakeFlow implements AuthFlow {
	refreshCalls = 0;
	onRefresh: (flow: FakeFlow) => Promise<void> = async (flow) => {
		flow.current = makeToken({
			accessToken: "access-refreshed",
			scopes: new Set(flow.requested),
		});
	};
	current: Token;

	constructor(
		readonly id: FlowId = "auth-code",
		readonly interactive = true,
		readonly requested: ReadonlySet<string> = new Set(),
		token: Token = makeToken(),
	) {
		this.current = token;
	}

	authorizationUrl(): string {
		return "";
	}

	verifyState(): void {}

	async requestAccessToken(): Promise<void> {}

	async refresh(): Promise<void> {
		this.refreshCalls += 1;
		await this.onRefresh(this);
	}

	token(): Token {
		return this.current;
	}

	setToken(token: Token): void {
		this.current = token;
	}

	scopes(): ReadonlySet<string> {
		return this.requested;
	}
}
