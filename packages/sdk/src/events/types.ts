/**
 * Swap lifecycle events
 *
 * Notifications the engine hands to an EventSink once a mutating call has
 * completed and the reentrancy guard is released.
 */

import { AccountId, Balance, SwapId } from "../core/types.js";

export const SWAP_INITIATED = "swap.initiated";
export type SwapInitiated = {
	type: typeof SWAP_INITIATED;
	swapId: SwapId;
	initiator: AccountId;
	counterparty: AccountId;
	initiatorAsset: Balance;
	counterpartyAsset: Balance;
};

export const SWAP_ACCEPTED = "swap.accepted";
export type SwapAccepted = {
	type: typeof SWAP_ACCEPTED;
	swapId: SwapId;
	initiator: AccountId;
	counterparty: AccountId;
};

export const SWAP_CANCELLED = "swap.cancelled";
export type SwapCancelled = {
	type: typeof SWAP_CANCELLED;
	swapId: SwapId;
	initiator: AccountId;
};

export type SwapEvent = SwapInitiated | SwapAccepted | SwapCancelled;

export type SwapEventType = SwapEvent["type"];

/**
 * Receiver of lifecycle events. Delivery is fire-and-forget: the engine
 * does not wait on, or inspect, what the sink does with an event.
 */
export interface EventSink {
	emit(event: SwapEvent): void;
}

/**
 * Sink that keeps every event in memory, in emission order.
 */
export class RecordingEventSink implements EventSink {
	readonly events: SwapEvent[] = [];

	emit(event: SwapEvent): void {
		this.events.push(event);
	}

	ofType<T extends SwapEventType>(
		type: T,
	): Extract<SwapEvent, { type: T }>[] {
		return this.events.filter(
			(event): event is Extract<SwapEvent, { type: T }> => event.type === type,
		);
	}

	clear(): void {
		this.events.length = 0;
	}
}
