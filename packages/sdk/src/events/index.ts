/**
 * Events module - Swap lifecycle notifications
 */

export type {
	SwapInitiated,
	SwapAccepted,
	SwapCancelled,
	SwapEvent,
	SwapEventType,
	EventSink,
} from "./types.js";

export {
	SWAP_INITIATED,
	SWAP_ACCEPTED,
	SWAP_CANCELLED,
	RecordingEventSink,
} from "./types.js";
