import { Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";
import { JwtModule } from "@nestjs/jwt";
import { UsersModule } from "../users/users.module";
import { AuthController } from "./auth.controller";
import { AuthGuard } from "./auth.guard";
import { AuthService } from "./auth.service";

@Module({
	imports: [
		UsersModule,
		JwtModule.registerAsync({
			inject: [ConfigService],
			useFactory: (config: ConfigService) => ({
				// validateEnv only lets JWT_SECRET be missing under NODE_ENV=test
				secret: config.get<string>("JWT_SECRET") ?? "test-secret",
				signOptions: {
					expiresIn: config.get<string>("JWT_EXPIRES_IN") ?? "1h",
				},
			}),
		}),
	],
	providers: [AuthService, AuthGuard],
	controllers: [AuthController],
	exports: [AuthService, AuthGuard],
})
export class AuthModule {}
