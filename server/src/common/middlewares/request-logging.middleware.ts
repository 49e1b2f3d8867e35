import { Injectable, Logger, NestMiddleware } from "@nestjs/common";
import type { NextFunction, Request, Response } from "express";

@Injectable()
export class RequestLoggingMiddleware implements NestMiddleware {
	private readonly logger = new Logger("HTTP");

	use(req: Request, res: Response, next: NextFunction) {
		const startedAt = Date.now();
		res.on("finish", () => {
			const caller = req.header("x-account-id") ?? "-";
			this.logger.log(
				`${req.method} ${req.originalUrl} ${res.statusCode} ${Date.now() - startedAt}ms caller=${caller}`,
			);
		});
		next();
	}
}
