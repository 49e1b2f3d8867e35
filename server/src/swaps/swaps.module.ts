import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { DataSource } from "typeorm";

import { CallQueue } from "../common/call-queue";
import { ServerSentEventsService } from "../common/server-sent-events.service";
import { DB_QUEUE } from "../db/db.constants";
import { LedgerModule } from "../ledger/ledger.module";
import { LedgerService } from "../ledger/ledger.service";
import { SwapRecord } from "./swap-record.entity";
import { SwapRegistryState } from "./swap-registry-state.entity";
import { TypeOrmSwapRegistry } from "./typeorm-swap-registry";
import { SWAP_LEDGER, SWAP_REGISTRY } from "./swaps.constants";
import { SwapsService } from "./swaps.service";
import { SwapsController } from "./swaps.controller";

@Module({
	imports: [
		TypeOrmModule.forFeature([SwapRecord, SwapRegistryState]),
		LedgerModule,
	],
	providers: [
		{
			provide: SWAP_REGISTRY,
			inject: [DataSource, DB_QUEUE, LedgerService],
			useFactory: (
				dataSource: DataSource,
				dbQueue: CallQueue,
				ledger: LedgerService,
			) => new TypeOrmSwapRegistry(dataSource, dbQueue, ledger),
		},
		{
			provide: SWAP_LEDGER,
			useExisting: LedgerService,
		},
		SwapsService,
		ServerSentEventsService,
	],
	controllers: [SwapsController],
	exports: [SwapsService],
})
export class SwapsModule {}
