import { Test } from "@nestjs/testing";
import { NotFoundException } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { EventEmitter2 } from "@nestjs/event-emitter";
import {
	MemoryLedger,
	MemorySwapRegistry,
	SwapError,
} from "@escrow-swap/sdk";
import { SWAP_LEDGER, SWAP_REGISTRY } from "./swaps.constants";
import { SwapsService } from "./swaps.service";
import {
	SWAP_ACCEPTED_ID,
	SWAP_CANCELLED_ID,
	SWAP_INITIATED_ID,
} from "../common/swap.event";

describe("SwapsService", () => {
	let service: SwapsService;
	let ledger: MemoryLedger;
	let registry: MemorySwapRegistry;
	const mockEventEmitter = { emit: jest.fn() };
	const mockConfigService = {
		get: jest.fn((key: string, fallback?: string) =>
			key === "ESCROW_ACCOUNT_ID" ? "vault" : fallback,
		),
	};

	beforeEach(async () => {
		jest.clearAllMocks();
		ledger = new MemoryLedger({ alice: 100n, bob: 50n });
		registry = new MemorySwapRegistry();

		const moduleRef = await Test.createTestingModule({
			providers: [SwapsService],
		})
			.useMocker((token) => {
				if (token === SWAP_REGISTRY) return registry;
				if (token === SWAP_LEDGER) return ledger;
				if (token === ConfigService) return mockConfigService;
				if (token === EventEmitter2) return mockEventEmitter;
				return undefined;
			})
			.compile();

		service = moduleRef.get(SwapsService);
	});

	it("should use the configured escrow account", () => {
		expect(service.getEscrowAccount()).toBe("vault");
	});

	it("should escrow the deposit and emit swap.initiated", async () => {
		const out = await service.initiate("alice", {
			counterparty: "bob",
			counterpartyAsset: "50",
			deposit: "100",
		});

		expect(out).toEqual({ swapId: 0 });
		expect(await ledger.balanceOf("vault")).toBe(100n);
		expect(mockEventEmitter.emit).toHaveBeenCalledWith(
			SWAP_INITIATED_ID,
			expect.objectContaining({
				swapId: 0,
				initiator: "alice",
				counterparty: "bob",
				initiatorAsset: "100",
				counterpartyAsset: "50",
			}),
		);
	});

	it("should return the swap with amounts as decimal strings", async () => {
		await service.initiate("alice", {
			counterparty: "bob",
			counterpartyAsset: "50",
			deposit: "100",
		});

		await expect(service.getOne(0)).resolves.toEqual({
			swapId: 0,
			initiator: "alice",
			counterparty: "bob",
			initiatorAsset: "100",
			counterpartyAsset: "50",
		});
	});

	it("should throw NotFoundException for an unknown swap", async () => {
		await expect(service.getOne(42)).rejects.toBeInstanceOf(NotFoundException);
	});

	it("should settle both legs on accept", async () => {
		await service.initiate("alice", {
			counterparty: "bob",
			counterpartyAsset: "50",
			deposit: "100",
		});

		await service.accept("bob", 0, { deposit: "50" });

		expect(await ledger.balanceOf("alice")).toBe(50n);
		expect(await ledger.balanceOf("bob")).toBe(100n);
		expect(await ledger.balanceOf("vault")).toBe(0n);
		expect(registry.size()).toBe(0);
		expect(mockEventEmitter.emit).toHaveBeenLastCalledWith(
			SWAP_ACCEPTED_ID,
			expect.objectContaining({
				swapId: 0,
				initiator: "alice",
				counterparty: "bob",
			}),
		);
	});

	it("should refund the initiator on cancel", async () => {
		await service.initiate("alice", {
			counterparty: "bob",
			counterpartyAsset: "50",
			deposit: "100",
		});

		await service.cancel("alice", 0);

		expect(await ledger.balanceOf("alice")).toBe(100n);
		expect(await ledger.balanceOf("vault")).toBe(0n);
		expect(mockEventEmitter.emit).toHaveBeenLastCalledWith(
			SWAP_CANCELLED_ID,
			expect.objectContaining({ swapId: 0, initiator: "alice" }),
		);
	});

	it("should surface engine errors unchanged", async () => {
		const err = await service
			.initiate("alice", {
				counterparty: "alice",
				counterpartyAsset: "50",
				deposit: "100",
			})
			.catch((e) => e);

		expect(err).toBeInstanceOf(SwapError);
		expect(err.code).toBe("SelfSwapNotAllowed");
		expect(mockEventEmitter.emit).not.toHaveBeenCalled();
	});

	it("should keep a committed swap when publishing its event fails", async () => {
		mockEventEmitter.emit.mockImplementationOnce(() => {
			throw new Error("listener crashed");
		});

		const out = await service.initiate("alice", {
			counterparty: "bob",
			counterpartyAsset: "50",
			deposit: "100",
		});

		expect(out).toEqual({ swapId: 0 });
		expect(await ledger.balanceOf("vault")).toBe(100n);
		expect(await service.getOne(0)).toMatchObject({ initiator: "alice" });
	});

	it("should run concurrent calls one after another", async () => {
		await ledger.credit("carol", 10n);

		const [first, second] = await Promise.all([
			service.initiate("alice", {
				counterparty: "bob",
				counterpartyAsset: "1",
				deposit: "100",
			}),
			service.initiate("carol", {
				counterparty: "bob",
				counterpartyAsset: "1",
				deposit: "10",
			}),
		]);

		expect(first).toEqual({ swapId: 0 });
		expect(second).toEqual({ swapId: 1 });
		expect(await ledger.balanceOf("vault")).toBe(110n);
	});
});
