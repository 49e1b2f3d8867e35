import {
	Body,
	Controller,
	Get,
	HttpCode,
	HttpStatus,
	Param,
	ParseIntPipe,
	Post,
	Sse,
} from "@nestjs/common";
import {
	ApiBadRequestResponse,
	ApiBody,
	ApiConflictResponse,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiHeader,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiTags,
	ApiUnauthorizedResponse,
	ApiUnprocessableEntityResponse,
} from "@nestjs/swagger";
import { map, Observable } from "rxjs";
import type { AccountId } from "@escrow-swap/sdk";
import { Caller, CALLER_HEADER } from "../common/caller.decorator";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
	getSchemaPathForEmptyResponse,
} from "../common/dto/envelopes";
import {
	type SseEvent,
	type SwapSse,
	ServerSentEventsService,
} from "../common/server-sent-events.service";
import { SwapsService } from "./swaps.service";
import { InitiateSwapInDto, InitiateSwapOutDto } from "./dto/initiate-swap.dto";
import { AcceptSwapInDto } from "./dto/accept-swap.dto";
import { GetSwapDto } from "./dto/get-swap.dto";

type Empty = Record<string, never>;

@ApiTags("1 - Swaps")
@ApiExtraModels(ApiEnvelopeShellDto, InitiateSwapOutDto, GetSwapDto)
@Controller("api/v1/swaps")
export class SwapsController {
	constructor(
		private readonly swapsService: SwapsService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@Post("")
	@ApiHeader({ name: CALLER_HEADER, description: "Caller ledger account" })
	@ApiBody({ type: InitiateSwapInDto })
	@ApiCreatedResponse({
		description: "Deposit escrowed and swap created",
		schema: getSchemaPathForDto(InitiateSwapOutDto),
	})
	@ApiBadRequestResponse({ description: "Zero amount or self swap" })
	@ApiUnauthorizedResponse({ description: "Missing caller header" })
	@ApiUnprocessableEntityResponse({ description: "Deposit transfer failed" })
	@ApiConflictResponse({ description: "Engine busy with a reentrant call" })
	@ApiOperation({ summary: "Escrow a deposit and offer a swap" })
	async initiate(
		@Caller() caller: AccountId,
		@Body() dto: InitiateSwapInDto,
	): Promise<ApiEnvelope<InitiateSwapOutDto>> {
		const data = await this.swapsService.initiate(caller, dto);
		return envelope(data);
	}

	@Sse("events")
	@ApiOperation({ summary: "Stream of swap lifecycle events" })
	events(): Observable<SseEvent<SwapSse>> {
		return this.sseService.swapEvents().pipe(map((data) => ({ data })));
	}

	@Sse(":swapId/events")
	@ApiParam({ name: "swapId", description: "Swap id" })
	@ApiOperation({ summary: "Stream of lifecycle events of one swap" })
	swapEvents(
		@Param("swapId", ParseIntPipe) swapId: number,
	): Observable<SseEvent<SwapSse>> {
		return this.sseService.swapEvents(swapId).pipe(map((data) => ({ data })));
	}

	@Get(":swapId")
	@ApiParam({ name: "swapId", description: "Swap id" })
	@ApiOkResponse({
		description: "An active swap",
		schema: getSchemaPathForDto(GetSwapDto),
	})
	@ApiNotFoundResponse({ description: "No active swap with this id" })
	@ApiOperation({ summary: "Get an active swap" })
	async getOne(
		@Param("swapId", ParseIntPipe) swapId: number,
	): Promise<ApiEnvelope<GetSwapDto>> {
		const data = await this.swapsService.getOne(swapId);
		return envelope(data);
	}

	@Post(":swapId/accept")
	@HttpCode(HttpStatus.OK)
	@ApiHeader({ name: CALLER_HEADER, description: "Caller ledger account" })
	@ApiParam({ name: "swapId", description: "Swap id" })
	@ApiBody({ type: AcceptSwapInDto })
	@ApiOkResponse({
		description: "Both legs settled",
		schema: getSchemaPathForEmptyResponse(),
	})
	@ApiBadRequestResponse({ description: "Deposit does not match" })
	@ApiForbiddenResponse({ description: "Caller is not the counterparty" })
	@ApiNotFoundResponse({ description: "No active swap with this id" })
	@ApiUnprocessableEntityResponse({ description: "Settlement transfer failed" })
	@ApiOperation({ summary: "Accept a swap as its counterparty" })
	async accept(
		@Caller() caller: AccountId,
		@Param("swapId", ParseIntPipe) swapId: number,
		@Body() dto: AcceptSwapInDto,
	): Promise<ApiEnvelope<Empty>> {
		await this.swapsService.accept(caller, swapId, dto);
		return envelope({});
	}

	@Post(":swapId/cancel")
	@HttpCode(HttpStatus.OK)
	@ApiHeader({ name: CALLER_HEADER, description: "Caller ledger account" })
	@ApiParam({ name: "swapId", description: "Swap id" })
	@ApiOkResponse({
		description: "Deposit refunded",
		schema: getSchemaPathForEmptyResponse(),
	})
	@ApiForbiddenResponse({ description: "Caller is not the initiator" })
	@ApiNotFoundResponse({ description: "No active swap with this id" })
	@ApiUnprocessableEntityResponse({ description: "Refund transfer failed" })
	@ApiOperation({ summary: "Cancel a swap and refund the initiator" })
	async cancel(
		@Caller() caller: AccountId,
		@Param("swapId", ParseIntPipe) swapId: number,
	): Promise<ApiEnvelope<Empty>> {
		await this.swapsService.cancel(caller, swapId);
		return envelope({});
	}
}
