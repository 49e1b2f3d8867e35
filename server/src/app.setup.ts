import { type INestApplication, ValidationPipe } from "@nestjs/common";
import { HttpExceptionFilter } from "./common/filters/http-exception.filter";

/**
 * Global pipes and filters, shared by `main.ts` and the e2e suites.
 */
export function configureApp(app: INestApplication): INestApplication {
	app.useGlobalPipes(
		new ValidationPipe({
			whitelist: true,
			forbidNonWhitelisted: true,
			transform: true,
		}),
	);
	app.useGlobalFilters(new HttpExceptionFilter());
	app.enableCors();
	return app;
}
