export {
	EventEmitter,
	createEventEmitter,
	type EventListener,
	type EventSubscription,
} from "./EventEmitter";

export {
	createTokenEvents,
	type TokenEvent,
	type TokenEventMap,
	type TokenEvents,
} from "./TokenEvents";
