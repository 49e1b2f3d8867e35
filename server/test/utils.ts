import request from "supertest";
import { Test, type TestingModule } from "@nestjs/testing";
import type { INestApplication } from "@nestjs/common";
import { AppModule } from "../src/app.module";
import { configureApp } from "../src/app.setup";

export const CALLER = "X-Account-Id";

export async function createTestApp(): Promise<INestApplication> {
	process.env.LEDGER_FAUCET_ENABLED = "true";
	process.env.ESCROW_ACCOUNT_ID = "escrow";
	const moduleFixture: TestingModule = await Test.createTestingModule({
		imports: [AppModule],
	}).compile();

	const app = configureApp(moduleFixture.createNestApplication({ logger: false }));
	await app.init();
	return app;
}

export async function credit(
	app: INestApplication,
	accountId: string,
	amount: string,
): Promise<void> {
	await request(app.getHttpServer())
		.post(`/api/v1/ledger/accounts/${accountId}/credit`)
		.send({ amount })
		.expect(200);
}

export async function balanceOf(
	app: INestApplication,
	accountId: string,
): Promise<string> {
	const res = await request(app.getHttpServer())
		.get(`/api/v1/ledger/accounts/${accountId}`)
		.expect(200);
	return res.body.data.balance;
}
