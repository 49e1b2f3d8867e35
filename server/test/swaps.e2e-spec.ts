import request from "supertest";
import type { INestApplication } from "@nestjs/common";
import { balanceOf, CALLER, createTestApp, credit } from "./utils";

describe("Swap lifecycle over HTTP", () => {
	let app: INestApplication;

	beforeAll(async () => {
		app = await createTestApp();
		await credit(app, "alice", "100");
		await credit(app, "bob", "50");
	});

	afterAll(async () => {
		await app.close();
	});

	it("should report health", async () => {
		const res = await request(app.getHttpServer())
			.get("/api/v1/health")
			.expect(200);
		expect(res.body.status).toBe("ok");
		expect(res.body.escrowAccount).toBe("escrow");
	});

	it("should require the caller header", async () => {
		const res = await request(app.getHttpServer())
			.post("/api/v1/swaps")
			.send({ counterparty: "bob", counterpartyAsset: "50", deposit: "100" })
			.expect(401);
		expect(res.body.message).toBe("Missing x-account-id header");
	});

	it("should reject malformed amounts before reaching the engine", async () => {
		const res = await request(app.getHttpServer())
			.post("/api/v1/swaps")
			.set(CALLER, "alice")
			.send({ counterparty: "bob", counterpartyAsset: "-5", deposit: "100" })
			.expect(400);
		expect(res.body.error).toBe("Bad Request");
		expect(Array.isArray(res.body.message)).toBe(true);
	});

	it("should reject a zero deposit", async () => {
		const res = await request(app.getHttpServer())
			.post("/api/v1/swaps")
			.set(CALLER, "alice")
			.send({ counterparty: "bob", counterpartyAsset: "50", deposit: "0" })
			.expect(400);
		expect(res.body.code).toBe("InvalidAmount");
	});

	it("should reject a swap with oneself", async () => {
		const res = await request(app.getHttpServer())
			.post("/api/v1/swaps")
			.set(CALLER, "alice")
			.send({ counterparty: "alice", counterpartyAsset: "50", deposit: "100" })
			.expect(400);
		expect(res.body.code).toBe("SelfSwapNotAllowed");
	});

	it("should report a failed deposit without consuming an id", async () => {
		const res = await request(app.getHttpServer())
			.post("/api/v1/swaps")
			.set(CALLER, "dave")
			.send({ counterparty: "bob", counterpartyAsset: "1", deposit: "10" })
			.expect(422);
		expect(res.body.code).toBe("DepositFailed");
	});

	it("should escrow, settle and delete a swap", async () => {
		const server = app.getHttpServer();

		const created = await request(server)
			.post("/api/v1/swaps")
			.set(CALLER, "alice")
			.send({ counterparty: "bob", counterpartyAsset: "50", deposit: "100" })
			.expect(201);
		expect(created.body).toEqual({ data: { swapId: 0 } });
		expect(await balanceOf(app, "alice")).toBe("0");
		expect(await balanceOf(app, "escrow")).toBe("100");

		const fetched = await request(server).get("/api/v1/swaps/0").expect(200);
		expect(fetched.body.data).toEqual({
			swapId: 0,
			initiator: "alice",
			counterparty: "bob",
			initiatorAsset: "100",
			counterpartyAsset: "50",
		});

		const stranger = await request(server)
			.post("/api/v1/swaps/0/accept")
			.set(CALLER, "carol")
			.send({ deposit: "50" })
			.expect(403);
		expect(stranger.body.code).toBe("Unauthorized");

		const short = await request(server)
			.post("/api/v1/swaps/0/accept")
			.set(CALLER, "bob")
			.send({ deposit: "49" })
			.expect(400);
		expect(short.body.code).toBe("InvalidAmount");

		const accepted = await request(server)
			.post("/api/v1/swaps/0/accept")
			.set(CALLER, "bob")
			.send({ deposit: "50" })
			.expect(200);
		expect(accepted.body).toEqual({ data: {} });

		expect(await balanceOf(app, "alice")).toBe("50");
		expect(await balanceOf(app, "bob")).toBe("100");
		expect(await balanceOf(app, "escrow")).toBe("0");

		await request(server).get("/api/v1/swaps/0").expect(404);
		const again = await request(server)
			.post("/api/v1/swaps/0/accept")
			.set(CALLER, "bob")
			.send({ deposit: "50" })
			.expect(404);
		expect(again.body.code).toBe("SwapNotFound");
	});

	it("should refund the initiator on cancel", async () => {
		const server = app.getHttpServer();

		const created = await request(server)
			.post("/api/v1/swaps")
			.set(CALLER, "alice")
			.send({ counterparty: "bob", counterpartyAsset: "10", deposit: "50" })
			.expect(201);
		expect(created.body.data.swapId).toBe(1);

		const notOwner = await request(server)
			.post("/api/v1/swaps/1/cancel")
			.set(CALLER, "bob")
			.expect(403);
		expect(notOwner.body.code).toBe("Unauthorized");

		await request(server)
			.post("/api/v1/swaps/1/cancel")
			.set(CALLER, "alice")
			.expect(200);
		expect(await balanceOf(app, "alice")).toBe("50");
		expect(await balanceOf(app, "escrow")).toBe("0");

		const twice = await request(server)
			.post("/api/v1/swaps/1/cancel")
			.set(CALLER, "alice")
			.expect(404);
		expect(twice.body.code).toBe("SwapNotFound");
	});

	it("should reject unknown fields in the body", async () => {
		await request(app.getHttpServer())
			.post("/api/v1/swaps/1/accept")
			.set(CALLER, "bob")
			.send({ deposit: "10", tip: "1" })
			.expect(400);
	});
});
