import { validateEnv } from "./env.validation";

describe("validateEnv", () => {
	it("fills defaults for a test environment", () => {
		const env = validateEnv({ NODE_ENV: "test" });
		expect(env).toMatchObject({
			NODE_ENV: "test",
			PORT: 3000,
			SQLITE_DB_PATH: "escrow.sqlite",
			JWT_EXPIRES_IN: "1h",
			ESCROW_VERIFIER: "schnorr",
			FAUCET_ENABLED: false,
		});
	});

	it("coerces string values", () => {
		const env = validateEnv({
			NODE_ENV: "test",
			PORT: "8080",
			FAUCET_ENABLED: "true",
			ESCROW_VERIFIER: "ecdsa",
		});
		expect(env.PORT).toBe(8080);
		expect(env.FAUCET_ENABLED).toBe(true);
		expect(env.ESCROW_VERIFIER).toBe("ecdsa");
	});

	it("requires a JWT secret outside tests", () => {
		expect(() => validateEnv({ NODE_ENV: "production" })).toThrow(
			"JWT_SECRET is required",
		);
		expect(
			validateEnv({
				NODE_ENV: "production",
				JWT_SECRET: "test-secret-test-secret",
			}).JWT_SECRET,
		).toBe("test-secret-test-secret");
	});

	it("rejects an unknown verifier scheme", () => {
		expect(() =>
			validateEnv({ NODE_ENV: "test", ESCROW_VERIFIER: "rsa" }),
		).toThrow(/Invalid environment/);
	});

	it("rejects a JWT secret shorter than 16 characters", () => {
		expect(() =>
			validateEnv({ NODE_ENV: "development", JWT_SECRET: "short" }),
		).toThrow(/Invalid environment/);
	});
});
