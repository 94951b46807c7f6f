import "reflect-metadata";
import { Logger } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { NestFactory } from "@nestjs/core";
import { DocumentBuilder, SwaggerModule } from "@nestjs/swagger";
import { AppModule } from "./app.module";

async function bootstrap() {
	const app = await NestFactory.create(AppModule);
	app.enableCors();

	const config = new DocumentBuilder()
		.setTitle("Challenge Escrow API")
		.setDescription("Custom header auth: `Authorization: Bearer <jwt>`")
		.setVersion("0.1.0")
		.addBearerAuth(
			{ type: "http", scheme: "bearer", bearerFormat: "JWT", in: "header" },
			"bearer",
		)
		.build();
	const doc = SwaggerModule.createDocument(app, config);
	SwaggerModule.setup("api/v1/docs", app, doc, {
		swaggerOptions: {
			tagsSorter: "alpha",
			operationsSorter: "alpha",
			persistAuthorization: true,
		},
	});

	const port = app.get(ConfigService).get<number>("PORT", 3000);
	await app.listen(port, "0.0.0.0");
	new Logger("Bootstrap").log(`API listening on http://0.0.0.0:${port}`);
}

bootstrap().catch((error: unknown) => {
	new Logger("Bootstrap").error("Failed to start", error);
	process.exit(1);
});
