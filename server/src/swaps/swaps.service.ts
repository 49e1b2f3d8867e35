import { Inject, Injectable, Logger, NotFoundException } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { nanoid } from "nanoid";
import {
	type AccountId,
	type Ledger,
	SWAP_ACCEPTED,
	SWAP_CANCELLED,
	SWAP_INITIATED,
	SwapEngine,
	type SwapEvent,
	type SwapId,
	type SwapRegistry,
} from "@escrow-swap/sdk";
import { CallQueue } from "../common/call-queue";
import { formatBalance, parseBalance } from "../common/balance";
import { errorStack } from "../common/errors";
import {
	SWAP_ACCEPTED_ID,
	SWAP_CANCELLED_ID,
	SWAP_INITIATED_ID,
	type SwapAcceptedEvent,
	type SwapCancelledEvent,
	type SwapInitiatedEvent,
} from "../common/swap.event";
import { SWAP_LEDGER, SWAP_REGISTRY } from "./swaps.constants";
import type {
	InitiateSwapInDto,
	InitiateSwapOutDto,
} from "./dto/initiate-swap.dto";
import type { AcceptSwapInDto } from "./dto/accept-swap.dto";
import type { GetSwapDto } from "./dto/get-swap.dto";

@Injectable()
export class SwapsService {
	private readonly logger = new Logger(SwapsService.name);
	private readonly engine: SwapEngine;
	// one engine call at a time; the engine's guard only sees real reentrancy
	private readonly calls = new CallQueue();

	constructor(
		@Inject(SWAP_REGISTRY) registry: SwapRegistry,
		@Inject(SWAP_LEDGER) ledger: Ledger,
		configService: ConfigService,
		private readonly events: EventEmitter2,
	) {
		const escrowAccount = configService.get<string>(
			"ESCROW_ACCOUNT_ID",
			"escrow",
		);
		this.logger.log(`ESCROW_ACCOUNT_ID=${escrowAccount}`);
		this.engine = new SwapEngine({
			registry,
			ledger,
			escrowAccount,
			events: { emit: (event) => this.publish(event) },
			onEventError: (error, event) =>
				this.logger.error(
					`Failed to publish ${event.type} for swap ${event.swapId}`,
					errorStack(error),
				),
		});
	}

	async initiate(
		caller: AccountId,
		dto: InitiateSwapInDto,
	): Promise<InitiateSwapOutDto> {
		const swapId = await this.calls.run(() =>
			this.engine.initiateSwap(
				{ caller, value: parseBalance(dto.deposit) },
				dto.counterparty,
				parseBalance(dto.counterpartyAsset),
			),
		);
		this.logger.log(`swap ${swapId} created by ${caller}`);
		return { swapId };
	}

	async accept(
		caller: AccountId,
		swapId: SwapId,
		dto: AcceptSwapInDto,
	): Promise<void> {
		await this.calls.run(() =>
			this.engine.acceptSwap(
				{ caller, value: parseBalance(dto.deposit) },
				swapId,
			),
		);
		this.logger.log(`swap ${swapId} settled for ${caller}`);
	}

	async cancel(caller: AccountId, swapId: SwapId): Promise<void> {
		await this.calls.run(() => this.engine.cancelSwap({ caller }, swapId));
		this.logger.log(`swap ${swapId} refunded to ${caller}`);
	}

	async getOne(swapId: SwapId): Promise<GetSwapDto> {
		const swap = await this.calls.run(() => this.engine.getSwap(swapId));
		if (!swap) throw new NotFoundException("Swap not found");
		return {
			swapId,
			initiator: swap.initiator,
			counterparty: swap.counterparty,
			initiatorAsset: formatBalance(swap.initiatorAsset),
			counterpartyAsset: formatBalance(swap.counterpartyAsset),
		};
	}

	getEscrowAccount(): AccountId {
		return this.engine.getEscrowAccount();
	}

	private publish(event: SwapEvent) {
		const eventId = nanoid();
		const at = new Date().toISOString();
		switch (event.type) {
			case SWAP_INITIATED:
				this.events.emit(SWAP_INITIATED_ID, {
					eventId,
					swapId: event.swapId,
					initiator: event.initiator,
					counterparty: event.counterparty,
					initiatorAsset: formatBalance(event.initiatorAsset),
					counterpartyAsset: formatBalance(event.counterpartyAsset),
					initiatedAt: at,
				} satisfies SwapInitiatedEvent);
				break;
			case SWAP_ACCEPTED:
				this.events.emit(SWAP_ACCEPTED_ID, {
					eventId,
					swapId: event.swapId,
					initiator: event.initiator,
					counterparty: event.counterparty,
					acceptedAt: at,
				} satisfies SwapAcceptedEvent);
				break;
			case SWAP_CANCELLED:
				this.events.emit(SWAP_CANCELLED_ID, {
					eventId,
					swapId: event.swapId,
					initiator: event.initiator,
					cancelledAt: at,
				} satisfies SwapCancelledEvent);
				break;
		}
	}
}
