import { ConfigModule, ConfigService } from "@nestjs/config";
import {
	MiddlewareConsumer,
	Module,
	NestModule,
	RequestMethod,
} from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { EventEmitterModule } from "@nestjs/event-emitter";

import { DbModule } from "./db/db.module";
import { HealthModule } from "./health.module";
import { LedgerModule } from "./ledger/ledger.module";
import { SwapsModule } from "./swaps/swaps.module";
import { RequestLoggingMiddleware } from "./common/middlewares/request-logging.middleware";

@Module({
	imports: [
		EventEmitterModule.forRoot(),
		ConfigModule.forRoot({ isGlobal: true }),
		TypeOrmModule.forRootAsync({
			inject: [ConfigService],
			useFactory: (config: ConfigService) => ({
				type: "better-sqlite3",
				database:
					config.get<string>("NODE_ENV") === "test"
						? ":memory:"
						: config.get<string>("SQLITE_DB_PATH", "escrow-swap.sqlite"),
				synchronize: true,
				autoLoadEntities: true,
			}),
		}),
		DbModule,
		LedgerModule,
		SwapsModule,
		HealthModule,
	],
})
export class AppModule implements NestModule {
	configure(consumer: MiddlewareConsumer) {
		consumer
			.apply(RequestLoggingMiddleware)
			.exclude({ path: "api/v1/health", method: RequestMethod.ALL })
			.forRoutes({ path: "*", method: RequestMethod.ALL });
	}
}
