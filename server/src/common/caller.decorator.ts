import {
	ExecutionContext,
	UnauthorizedException,
	createParamDecorator,
} from "@nestjs/common";
import type { Request } from "express";
import { type AccountId, isValidAccountId } from "@escrow-swap/sdk";

export const CALLER_HEADER = "x-account-id";

export function callerFromRequest(request: Pick<Request, "headers">): AccountId {
	const raw = request.headers[CALLER_HEADER];
	const caller = Array.isArray(raw) ? raw[0] : raw;
	if (!isValidAccountId(caller)) {
		throw new UnauthorizedException(`Missing ${CALLER_HEADER} header`);
	}
	return caller;
}

/**
 * Ledger account of the caller. Identity is asserted by the ledger in
 * front of this service and forwarded in the `X-Account-Id` header.
 */
export const Caller = createParamDecorator(
	(_data: unknown, ctx: ExecutionContext): AccountId =>
		callerFromRequest(ctx.switchToHttp().getRequest<Request>()),
);
