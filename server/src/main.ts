import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { NestFactory } from "@nestjs/core";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import * as dotenv from "dotenv";
import { AppModule } from "./app.module";
import { configureApp } from "./app.setup";
import { errorStack } from "./common/errors";

dotenv.config();

async function bootstrap() {
	const app = configureApp(await NestFactory.create(AppModule));

	const config = new DocumentBuilder()
		.setTitle("Escrow Swap API")
		.setDescription("Caller identity header: `X-Account-Id: <ledger account>`")
		.setVersion("0.1.0")
		.build();
	const doc = SwaggerModule.createDocument(app, config);
	SwaggerModule.setup("api/v1/docs", app, doc, {
		swaggerOptions: {
			tagsSorter: "alpha",
			operationsSorter: "alpha",
		},
	});

	const port = parseInt(process.env.PORT ?? "3000", 10);
	await app.listen(port, "0.0.0.0");
	Logger.log(`API listening on http://0.0.0.0:${port}`, "Bootstrap");
}

bootstrap().catch((err: unknown) => {
	Logger.error(
		"Failed to start",
		errorStack(err),
		"Bootstrap",
	);
	process.exit(1);
});
