import { plainToInstance, Transform } from "class-transformer";
import {
	IsBoolean,
	IsIn,
	IsInt,
	IsOptional,
	IsString,
	Max,
	Min,
	MinLength,
	validateSync,
} from "class-validator";
import { VERIFIER_SCHEMES, type VerifierScheme } from "@challenge-escrow/sdk";

const NODE_ENVS = ["development", "production", "test"] as const;
export type NodeEnv = (typeof NODE_ENVS)[number];

export class EnvironmentVariables {
	@IsIn(NODE_ENVS)
	NODE_ENV: NodeEnv = "development";

	@Transform(({ value }) => (value === undefined ? value : Number(value)))
	@IsInt()
	@Min(1)
	@Max(65535)
	PORT = 3000;

	@IsString()
	SQLITE_DB_PATH = "escrow.sqlite";

	@IsOptional()
	@IsString()
	@MinLength(16)
	JWT_SECRET?: string;

	@IsString()
	JWT_EXPIRES_IN = "1h";

	@IsIn(VERIFIER_SCHEMES)
	ESCROW_VERIFIER: VerifierScheme = "schnorr";

	@Transform(({ value }) => value === true || value === "true")
	@IsBoolean()
	FAUCET_ENABLED = false;
}

export function validateEnv(config: Record<string, unknown>) {
	const env = plainToInstance(EnvironmentVariables, config);
	const errors = validateSync(env, { skipMissingProperties: false });
	if (errors.length > 0) {
		throw new Error(`Invalid environment: ${errors.toString()}`);
	}
	if (env.NODE_ENV !== "test" && !env.JWT_SECRET) {
		throw new Error("JWT_SECRET is required");
	}
	return env;
}
