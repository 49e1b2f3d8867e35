import { BadRequestException, HttpStatus } from "@nestjs/common";
import { LedgerError, RegistryError, SwapError } from "@escrow-swap/sdk";
import { HttpExceptionFilter } from "./http-exception.filter";

describe("HttpExceptionFilter", () => {
	const filter = new HttpExceptionFilter();

	it.each([
		["InvalidAmount", HttpStatus.BAD_REQUEST],
		["SelfSwapNotAllowed", HttpStatus.BAD_REQUEST],
		["SwapNotFound", HttpStatus.NOT_FOUND],
		["Unauthorized", HttpStatus.FORBIDDEN],
		["DepositFailed", HttpStatus.UNPROCESSABLE_ENTITY],
		["AlreadyActive", HttpStatus.CONFLICT],
		["RollbackFailed", HttpStatus.INTERNAL_SERVER_ERROR],
	] as const)("should map %s to %i", (code, status) => {
		expect(filter.toBody(new SwapError("failed", code))).toEqual({
			statusCode: status,
			error: expect.any(String),
			message: "failed",
			code,
		});
	});

	it("should name the status in the body", () => {
		expect(filter.toBody(new SwapError("gone", "SwapNotFound")).error).toBe(
			"Not Found",
		);
	});

	it("should keep validation messages of HttpExceptions", () => {
		const body = filter.toBody(
			new BadRequestException(["deposit must be a number string"]),
		);

		expect(body).toEqual({
			statusCode: 400,
			error: "Bad Request",
			message: ["deposit must be a number string"],
		});
	});

	it("should map ledger input errors to 400", () => {
		expect(
			filter.toBody(new LedgerError("negative", "INVALID_AMOUNT")),
		).toEqual({
			statusCode: 400,
			error: "Bad Request",
			message: "negative",
			code: "INVALID_AMOUNT",
		});
	});

	it("should hide unexpected errors behind a 500", () => {
		jest.spyOn(filter["logger"], "error").mockImplementation(() => undefined);

		expect(
			filter.toBody(new RegistryError("disk gone", "BACKEND_FAILURE")),
		).toEqual({
			statusCode: 500,
			error: "Internal Server Error",
			message: "Internal server error",
		});
	});
});
