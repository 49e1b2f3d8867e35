import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";

import { Account } from "./account.entity";
import { LedgerService } from "./ledger.service";
import { LedgerController } from "./ledger.controller";

@Module({
	imports: [TypeOrmModule.forFeature([Account])],
	providers: [LedgerService],
	controllers: [LedgerController],
	exports: [LedgerService],
})
export class LedgerModule {}
