import { Injectable, Logger } from "@nestjs/common";
import { OnEvent } from "@nestjs/event-emitter";
import { filter, Subject } from "rxjs";
import type { SwapId } from "@escrow-swap/sdk";
import {
	SWAP_ACCEPTED_ID,
	SWAP_CANCELLED_ID,
	SWAP_INITIATED_ID,
	type SwapAcceptedEvent,
	type SwapCancelledEvent,
	type SwapInitiatedEvent,
} from "./swap.event";

export type SwapSse =
	| { type: "swap_initiated"; swapId: SwapId; eventId: string }
	| { type: "swap_accepted"; swapId: SwapId; eventId: string }
	| { type: "swap_cancelled"; swapId: SwapId; eventId: string };

export type SseEvent<T> = {
	data: T;
};

@Injectable()
export class ServerSentEventsService {
	private readonly logger = new Logger(ServerSentEventsService.name);
	private readonly events$ = new Subject<SwapSse>();

	swapEvents(swapId?: SwapId) {
		if (swapId !== undefined) {
			return this.events$.pipe(filter((e) => e.swapId === swapId));
		}
		return this.events$.asObservable();
	}

	@OnEvent(SWAP_INITIATED_ID)
	onSwapInitiated(evt: SwapInitiatedEvent) {
		this.logger.log(
			`swap ${evt.swapId} initiated by ${evt.initiator} for ${evt.counterparty} (${evt.initiatorAsset} for ${evt.counterpartyAsset})`,
		);
		this.events$.next({
			type: "swap_initiated",
			swapId: evt.swapId,
			eventId: evt.eventId,
		});
	}

	@OnEvent(SWAP_ACCEPTED_ID)
	onSwapAccepted(evt: SwapAcceptedEvent) {
		this.logger.log(`swap ${evt.swapId} accepted by ${evt.counterparty}`);
		this.events$.next({
			type: "swap_accepted",
			swapId: evt.swapId,
			eventId: evt.eventId,
		});
	}

	@OnEvent(SWAP_CANCELLED_ID)
	onSwapCancelled(evt: SwapCancelledEvent) {
		this.logger.log(`swap ${evt.swapId} cancelled by ${evt.initiator}`);
		this.events$.next({
			type: "swap_cancelled",
			swapId: evt.swapId,
			eventId: evt.eventId,
		});
	}
}
