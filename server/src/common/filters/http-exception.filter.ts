import {
	ArgumentsHost,
	Catch,
	ExceptionFilter,
	HttpException,
	HttpStatus,
	Logger,
} from "@nestjs/common";
import type { Response } from "express";
import {
	LedgerError,
	type SwapErrorCode,
	isSwapError,
} from "@escrow-swap/sdk";
import { errorStack } from "../errors";

export const SWAP_ERROR_STATUS: Record<SwapErrorCode, HttpStatus> = {
	InvalidAmount: HttpStatus.BAD_REQUEST,
	SelfSwapNotAllowed: HttpStatus.BAD_REQUEST,
	SwapNotFound: HttpStatus.NOT_FOUND,
	Unauthorized: HttpStatus.FORBIDDEN,
	DepositFailed: HttpStatus.UNPROCESSABLE_ENTITY,
	TransferFailed: HttpStatus.UNPROCESSABLE_ENTITY,
	RefundFailed: HttpStatus.UNPROCESSABLE_ENTITY,
	AlreadyActive: HttpStatus.CONFLICT,
	SwapIdOverflow: HttpStatus.INTERNAL_SERVER_ERROR,
	RollbackFailed: HttpStatus.INTERNAL_SERVER_ERROR,
};

export type ErrorBody = {
	statusCode: number;
	error: string;
	message: string | string[];
	code?: string;
};

@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
	private readonly logger = new Logger(HttpExceptionFilter.name);

	catch(exception: unknown, host: ArgumentsHost) {
		const response = host.switchToHttp().getResponse<Response>();
		const body = this.toBody(exception);
		response.status(body.statusCode).json(body);
	}

	toBody(exception: unknown): ErrorBody {
		if (exception instanceof HttpException) {
			return fromHttpException(exception);
		}

		if (isSwapError(exception)) {
			const statusCode = SWAP_ERROR_STATUS[exception.code];
			if (exception.isFatal()) {
				this.logger.error(
					`Fatal swap error ${exception.code}: ${exception.message}`,
					exception.stack,
				);
			}
			return {
				statusCode,
				error: statusName(statusCode),
				message: exception.message,
				code: exception.code,
			};
		}

		if (exception instanceof LedgerError && exception.code !== "BACKEND_FAILURE") {
			return {
				statusCode: HttpStatus.BAD_REQUEST,
				error: statusName(HttpStatus.BAD_REQUEST),
				message: exception.message,
				code: exception.code,
			};
		}

		this.logger.error(
			"Unhandled exception",
			errorStack(exception),
		);
		return {
			statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
			error: statusName(HttpStatus.INTERNAL_SERVER_ERROR),
			message: "Internal server error",
		};
	}
}

function fromHttpException(exception: HttpException): ErrorBody {
	const statusCode = exception.getStatus();
	const res = exception.getResponse();
	if (typeof res === "string") {
		return { statusCode, error: statusName(statusCode), message: res };
	}
	const message =
		"message" in res &&
		(typeof res.message === "string" || Array.isArray(res.message))
			? res.message
			: exception.message;
	const error =
		"error" in res && typeof res.error === "string"
			? res.error
			: statusName(statusCode);
	return { statusCode, error, message };
}

function statusName(status: HttpStatus): string {
	return (HttpStatus[status] ?? "ERROR")
		.split("_")
		.map((w) => w.charAt(0) + w.slice(1).toLowerCase())
		.join(" ");
}
