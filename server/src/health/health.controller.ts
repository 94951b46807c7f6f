import { Controller, Get } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { ApiOkResponse, ApiOperation, ApiTags } from "@nestjs/swagger";
import { DataSource } from "typeorm";

@ApiTags("0 - Health")
@Controller("api/v1/health")
export class HealthController {
	constructor(
		private readonly config: ConfigService,
		private readonly dataSource: DataSource,
	) {}

	@Get()
	@ApiOperation({ summary: "Liveness and database status" })
	@ApiOkResponse({
		description: "Service status",
		schema: {
			type: "object",
			properties: {
				status: { type: "string", enum: ["ok", "degraded"] },
				database: { type: "string", enum: ["up", "down"] },
				verifier: { type: "string", example: "schnorr" },
				environment: { type: "string", example: "production" },
				uptime: { type: "number", example: 12345 },
				timestamp: { type: "string", example: "2026-01-12T10:00:00.000Z" },
			},
		},
	})
	check() {
		const database = this.dataSource.isInitialized ? "up" : "down";
		return {
			status: database === "up" ? "ok" : "degraded",
			database,
			verifier: this.config.get<string>("ESCROW_VERIFIER", "schnorr"),
			environment: this.config.get<string>("NODE_ENV", "development"),
			uptime: process.uptime(),
			timestamp: new Date().toISOString(),
		};
	}
}
