/**
 * Token Cache Service
 * Persists one token per flow identity under a configuration directory
 */

import {
	existsSync,
	mkdirSync,
	readFileSync,
	unlinkSync,
	writeFileSync,
} from "node:fs";
import { join } from "node:path";
import {
	CONFIG_DIR_MODE,
	TOKEN_CACHE_FILE_MODE,
	TOKEN_CACHE_VERSION,
} from "../config/constants";
import { CacheWriteError } from "../errors";
import { CachedTokenSchema, safeValidate } from "../schemas/spotify";
import type { FlowId, Token } from "../types/spotify";
import { getLogger } from "../utils";
import { fromCachedToken, toCachedToken } from "./Token";

const logger = getLogger("TokenCache");

/**
 * Filesystem-backed token cache. Reads are advisory: anything missing,
 * unreadable or from another cache version reads as "no cached token".
 */
export class TokenCache {
	constructor(private readonly dir: string) {}

	getDir(): string {
		return this.dir;
	}

	/**
	 * Cache file path for a flow
	 */
	pathFor(flowId: FlowId): string {
		return join(this.dir, `${flowId}.token.json`);
	}

	/**
	 * Load the cached token for a flow, or null
	 */
	load(flowId: FlowId): Token | null {
		const filePath = this.pathFor(flowId);

		if (!existsSync(filePath)) {
			return null;
		}

		let parsed: unknown;
		try {
			parsed = JSON.parse(readFileSync(filePath, "utf-8"));
		} catch (error) {
			logger.warn(`Ignoring unreadable token cache for ${flowId}`, {
				error: error instanceof Error ? error.message : String(error),
			});
			return null;
		}

		const entry = safeValidate(CachedTokenSchema, parsed, `token cache ${flowId}`);
		if (!entry) {
			return null;
		}

		if (entry.version !== TOKEN_CACHE_VERSION || entry.flow !== flowId) {
			logger.debug(`Ignoring token cache for ${flowId}`, {
				version: entry.version,
				flow: entry.flow,
			});
			return null;
		}

		return fromCachedToken(entry);
	}

	/**
	 * Persist a token for a flow
	 * @throws CacheWriteError when the directory or file cannot be written
	 */
	save(token: Token, flowId: FlowId): void {
		const data = JSON.stringify(
			toCachedToken(token, flowId, TOKEN_CACHE_VERSION),
			null,
			2,
		);

		try {
			if (!existsSync(this.dir)) {
				mkdirSync(this.dir, { recursive: true, mode: CONFIG_DIR_MODE });
			}
			writeFileSync(this.pathFor(flowId), data, { mode: TOKEN_CACHE_FILE_MODE });
		} catch (error) {
			throw new CacheWriteError(`Failed to write token cache for ${flowId}`, {
				cause: error,
			});
		}
	}

	/**
	 * Delete the cached token for a flow (logout)
	 */
	clear(flowId: FlowId): void {
		const filePath = this.pathFor(flowId);
		if (existsSync(filePath)) {
			unlinkSync(filePath);
		}
	}
}
