/**
 * Token lifecycle events
 * Emitted by the auth flows after every token that lands in the slot
 */

import type { FlowId, Token } from "../types/spotify";
import { createEventEmitter, type EventEmitter } from "./EventEmitter";

export interface TokenEvent {
	flow: FlowId;
	token: Token;
}

export interface TokenEventMap {
	/** First token from a code or client-credentials exchange */
	"token:acquired": TokenEvent;
	/** Token renewed by refresh or re-exchange */
	"token:refreshed": TokenEvent;
	/** Token obtained but could not be written to the cache */
	"token:cacheFailed": { flow: FlowId; error: unknown };
}

export type TokenEvents = EventEmitter<TokenEventMap>;

export function createTokenEvents(): TokenEvents {
	return createEventEmitter<TokenEventMap>();
}
