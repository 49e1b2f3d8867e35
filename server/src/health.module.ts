import { Module } from "@nestjs/common";
import { HealthController } from "./health.controller";
import { SwapsModule } from "./swaps/swaps.module";

@Module({
	imports: [SwapsModule],
	controllers: [HealthController],
})
export class HealthModule {}
