import {
	type AccountId,
	SWAP_ACCEPTED,
	SWAP_CANCELLED,
	SWAP_INITIATED,
	type SwapId,
} from "@escrow-swap/sdk";

export const SWAP_INITIATED_ID = SWAP_INITIATED;
export type SwapInitiatedEvent = {
	eventId: string;
	swapId: SwapId;
	initiator: AccountId;
	counterparty: AccountId;
	initiatorAsset: string; // decimal, bigint does not survive JSON
	counterpartyAsset: string;
	initiatedAt: string; // ISO timestamp
};

export const SWAP_ACCEPTED_ID = SWAP_ACCEPTED;
export type SwapAcceptedEvent = {
	eventId: string;
	swapId: SwapId;
	initiator: AccountId;
	counterparty: AccountId;
	acceptedAt: string;
};

export const SWAP_CANCELLED_ID = SWAP_CANCELLED;
export type SwapCancelledEvent = {
	eventId: string;
	swapId: SwapId;
	initiator: AccountId;
	cancelledAt: string;
};
