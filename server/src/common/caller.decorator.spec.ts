import { UnauthorizedException } from "@nestjs/common";
import { callerFromRequest } from "./caller.decorator";

describe("callerFromRequest", () => {
	it("should read the account from the header", () => {
		expect(callerFromRequest({ headers: { "x-account-id": "alice" } })).toBe(
			"alice",
		);
	});

	it("should take the first of repeated headers", () => {
		expect(
			callerFromRequest({ headers: { "x-account-id": ["alice", "bob"] } }),
		).toBe("alice");
	});

	it.each([undefined, "", "   "])(
		"should reject a missing or blank header (%p)",
		(value) => {
			expect(() =>
				callerFromRequest({ headers: { "x-account-id": value } }),
			).toThrow(UnauthorizedException);
		},
	);
});
