import { Global, Module } from "@nestjs/common";
import { CallQueue } from "../common/call-queue";
import { DB_QUEUE } from "./db.constants";

/**
 * The SQLite driver shares one connection between query runners, so every
 * database access in the process, reads included, goes through a single
 * queue. A read never lands inside another caller's open transaction.
 */
@Global()
@Module({
	providers: [
		{
			provide: DB_QUEUE,
			useFactory: () => new CallQueue(),
		},
	],
	exports: [DB_QUEUE],
})
export class DbModule {}
