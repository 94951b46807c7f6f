import { ConfigModule, ConfigService } from "@nestjs/config";
import {
	MiddlewareConsumer,
	Module,
	NestModule,
	RequestMethod,
	ValidationPipe,
} from "@nestjs/common";
import { APP_FILTER, APP_PIPE } from "@nestjs/core";
import { TypeOrmModule } from "@nestjs/typeorm";
import { EventEmitterModule } from "@nestjs/event-emitter";

import { AccountsModule } from "./accounts/accounts.module";
import { AuthModule } from "./auth/auth.module";
import { CommonModule } from "./common/common.module";
import { HttpExceptionFilter } from "./common/filters/http-exception.filter";
import { RequestLoggingMiddleware } from "./common/middlewares/request-logging.middleware";
import { validateEnv } from "./config/env.validation";
import { EscrowModule } from "./escrow/escrow.module";
import { HealthModule } from "./health/health.module";
import { UsersModule } from "./users/users.module";

@Module({
	imports: [
		EventEmitterModule.forRoot(),
		ConfigModule.forRoot({ isGlobal: true, validate: validateEnv }),
		TypeOrmModule.forRootAsync({
			inject: [ConfigService],
			useFactory: (config: ConfigService) => ({
				type: "better-sqlite3",
				database:
					config.get<string>("NODE_ENV") === "test"
						? ":memory:"
						: config.get<string>("SQLITE_DB_PATH", "escrow.sqlite"),
				synchronize: true,
				autoLoadEntities: true,
			}),
		}),
		CommonModule,
		UsersModule,
		AuthModule,
		AccountsModule,
		EscrowModule,
		HealthModule,
	],
	providers: [
		{ provide: APP_FILTER, useClass: HttpExceptionFilter },
		{
			provide: APP_PIPE,
			useValue: new ValidationPipe({
				whitelist: true,
				forbidNonWhitelisted: true,
				transform: true,
			}),
		},
	],
})
export class AppModule implements NestModule {
	configure(consumer: MiddlewareConsumer) {
		consumer
			.apply(RequestLoggingMiddleware)
			.exclude({ path: "api/v1/health", method: RequestMethod.ALL })
			.forRoutes({ path: "*", method: RequestMethod.ALL });
	}
}
