import type { Token } from "../types/spotify";
import { createEmptyToken } from "./Token";

/**
 * Owned cell holding a flow's current token.
 *
 * Reads and writes are synchronous, so they cannot interleave with other
 * tasks; nothing awaits while the value is being read or replaced. Network
 * work happens outside the cell and only its decoded result is written
 * back through `replace` or `renew`.
 *
 * `renew` collapses concurrent renewals into a single in-flight task:
 * callers that observe an expired token at the same time all await the
 * same exchange, and the cell is written once. A `replace` that lands
 * while a renewal is in flight wins: the renewal's result is dropped.
 */
export class TokenSlot {
	private value: Token;
	private inflight: Promise<Token> | null = null;
	/** Bumped on every write */
	private generation = 0;

	constructor(initial: Token = createEmptyToken()) {
		this.value = initial;
	}

	/**
	 * Snapshot of the current token
	 */
	read(): Token {
		return { ...this.value, scopes: new Set(this.value.scopes) };
	}

	replace(token: Token): void {
		this.value = { ...token, scopes: new Set(token.scopes) };
		this.generation += 1;
	}

	/**
	 * Whether a renewal is currently in flight
	 */
	isRenewing(): boolean {
		return this.inflight !== null;
	}

	/**
	 * Run `task` unless one is already running, then store its result and
	 * call `onStored` with it once. A failed task leaves the current token
	 * untouched. When the slot was replaced while `task` ran, the result is
	 * discarded, `onStored` is skipped and the newer token is returned.
	 */
	renew(
		task: (current: Token) => Promise<Token>,
		onStored?: (token: Token) => Promise<void>,
	): Promise<Token> {
		if (this.inflight) {
			return this.inflight;
		}

		const started = this.generation;
		const run = async (): Promise<Token> => {
			try {
				const next = await task(this.read());
				if (this.generation !== started) {
					return this.read();
				}

				this.replace(next);
				const stored = this.read();
				await onStored?.(stored);
				return stored;
			} finally {
				this.inflight = null;
			}
		};

		this.inflight = run();
		return this.inflight;
	}
}
