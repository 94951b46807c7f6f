import request from "supertest";
import * as secp from "@noble/secp256k1";
import { schnorr } from "@noble/secp256k1";
import { bytesToHex, hexToBytes } from "@challenge-escrow/sdk";
import type { INestApplication } from "@nestjs/common";
import { Test, type TestingModule } from "@nestjs/testing";
import { AppModule } from "../src/app.module";

export const TEST_ORIGIN = "http://localhost:test";

export interface TestUser {
	secretKey: Uint8Array;
	publicKeyHex: string;
	jwt: string;
}

export async function createTestApp(): Promise<INestApplication> {
	const moduleFixture: TestingModule = await Test.createTestingModule({
		imports: [AppModule],
	}).compile();

	const app = moduleFixture.createNestApplication({ logger: false });
	await app.init();
	return app;
}

export function createTestKey() {
	const secretKey = secp.utils.randomPrivateKey();
	return {
		secretKey,
		publicKeyHex: bytesToHex(schnorr.getPublicKey(secretKey)),
	};
}

export async function signupAndGetJwt(
	app: INestApplication,
	secretKey: Uint8Array,
): Promise<string> {
	const publicKeyHex = bytesToHex(schnorr.getPublicKey(secretKey));

	const chalRes = await request(app.getHttpServer())
		.post("/api/v1/auth/signup/challenge")
		.set("Origin", TEST_ORIGIN)
		.send({ publicKey: publicKeyHex })
		.expect(201);

	const signature = await schnorr.sign(
		hexToBytes(chalRes.body.hashToSignHex),
		secretKey,
	);

	const verifyRes = await request(app.getHttpServer())
		.post("/api/v1/auth/signup/verify")
		.set("Origin", TEST_ORIGIN)
		.send({
			publicKey: publicKeyHex,
			signature: bytesToHex(signature),
			challengeId: chalRes.body.challengeId,
		})
		.expect(201);

	return verifyRes.body.accessToken;
}

/**
 * Sign up a fresh key and credit it with `funds` through the faucet.
 */
export async function createTestUser(
	app: INestApplication,
	funds = 0,
): Promise<TestUser> {
	const { secretKey, publicKeyHex } = createTestKey();
	const jwt = await signupAndGetJwt(app, secretKey);
	if (funds > 0) {
		await request(app.getHttpServer())
			.post("/api/v1/accounts/me/faucet")
			.set("Authorization", `Bearer ${jwt}`)
			.send({ amount: funds })
			.expect(201);
	}
	return { secretKey, publicKeyHex, jwt };
}
