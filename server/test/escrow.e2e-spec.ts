import request from "supertest";
import type { INestApplication } from "@nestjs/common";
import { schnorr } from "@noble/secp256k1";
import {
	bytesToHex,
	challengeDigest,
	createChallenge,
} from "@challenge-escrow/sdk";

import { createTestApp, createTestKey, createTestUser, type TestUser } from "./utils";

describe("Escrow E2E (challenge-response purchase)", () => {
	let app: INestApplication;
	let seller: TestUser;
	let buyer: TestUser;
	let itemKey: ReturnType<typeof createTestKey>;
	let itemId: string;

	const auth = (user: TestUser) => `Bearer ${user.jwt}`;

	const balanceOf = async (user: TestUser) => {
		const res = await request(app.getHttpServer())
			.get("/api/v1/accounts/me")
			.set("Authorization", auth(user))
			.expect(200);
		return res.body.data.balance;
	};

	const reserve = (user: TestUser, challenge: Uint8Array, amount = 100) =>
		request(app.getHttpServer())
			.post(`/api/v1/items/${itemId}/reservation`)
			.set("Authorization", auth(user))
			.send({
				challenge: bytesToHex(challenge),
				buyerPublicKey: itemKey.publicKeyHex,
				amount,
			});

	const respond = async (user: TestUser, challenge: Uint8Array, key: Uint8Array) =>
		request(app.getHttpServer())
			.post(`/api/v1/items/${itemId}/reservation/response`)
			.set("Authorization", auth(user))
			.send({
				signature: bytesToHex(await schnorr.sign(challengeDigest(challenge), key)),
			});

	beforeAll(async () => {
		app = await createTestApp();
	});

	afterAll(async () => {
		await app.close();
	});

	beforeEach(async () => {
		seller = await createTestUser(app);
		buyer = await createTestUser(app, 1_000);
		itemKey = createTestKey();

		const created = await request(app.getHttpServer())
			.post("/api/v1/items")
			.set("Authorization", auth(seller))
			.send({ name: "Concert ticket, row A seat 1" })
			.expect(201);
		itemId = created.body.data.externalId;
		expect(created.body.data.slot).toBe("no-slot");

		const listed = await request(app.getHttpServer())
			.post(`/api/v1/items/${itemId}/listing`)
			.set("Authorization", auth(seller))
			.send({ price: 100 })
			.expect(201);
		expect(listed.body.data.slot).toBe("available");
		expect(listed.body.data.price).toBe(100);
		expect(listed.body.data.allowedActions).toEqual(["purchase", "delist", "take"]);
	});

	it("reports a healthy service", async () => {
		const res = await request(app.getHttpServer())
			.get("/api/v1/health")
			.expect(200);
		expect(res.body).toMatchObject({
			status: "ok",
			database: "up",
			verifier: "schnorr",
			environment: "test",
		});
	});

	it("shows the listed item in the catalogue", async () => {
		const res = await request(app.getHttpServer())
			.get("/api/v1/items")
			.expect(200);

		const ids = res.body.data.map((item: { externalId: string }) => item.externalId);
		expect(ids).toContain(itemId);
	});

	it.each(["0", "-1"])("returns one listed item for limit=%s", async (limit) => {
		const second = await request(app.getHttpServer())
			.post("/api/v1/items")
			.set("Authorization", auth(seller))
			.send({ name: "Concert ticket, row A seat 2" })
			.expect(201);
		await request(app.getHttpServer())
			.post(`/api/v1/items/${second.body.data.externalId}/listing`)
			.set("Authorization", auth(seller))
			.send({ price: 100 })
			.expect(201);

		const res = await request(app.getHttpServer())
			.get("/api/v1/items")
			.query({ limit })
			.expect(200);

		expect(res.body.data).toHaveLength(1);
	});

	it("settles when the seller answers the challenge", async () => {
		const challenge = createChallenge();

		const reserved = await reserve(buyer, challenge).expect(201);
		expect(reserved.body.data).toMatchObject({
			itemId,
			challengeHex: bytesToHex(challenge),
			buyerPublicKeyHex: itemKey.publicKeyHex,
			buyerAddress: buyer.publicKeyHex,
			amount: 100,
		});
		expect(await balanceOf(buyer)).toBe(900);

		const res = await respond(seller, challenge, itemKey.secretKey);
		expect(res.status).toBe(200);
		expect(res.body.data).toEqual({
			outcome: "settled",
			itemId,
			owner: buyer.publicKeyHex,
			capability: { kind: "none" },
		});

		expect(await balanceOf(seller)).toBe(100);
		expect(await balanceOf(buyer)).toBe(900);

		const item = await request(app.getHttpServer())
			.get(`/api/v1/items/${itemId}`)
			.expect(200);
		expect(item.body.data.owner).toBe(buyer.publicKeyHex);
		expect(item.body.data.slot).toBe("no-slot");
		expect(item.body.data.price).toBeUndefined();
	});

	it("refunds the buyer when the answer does not verify", async () => {
		const challenge = createChallenge();
		await reserve(buyer, challenge).expect(201);

		const res = await respond(seller, challenge, createTestKey().secretKey);
		expect(res.status).toBe(200);
		expect(res.body.data).toEqual({
			outcome: "refunded",
			itemId,
			refund: { recipient: buyer.publicKeyHex, amount: 100 },
			capability: { kind: "none" },
		});

		expect(await balanceOf(buyer)).toBe(1_000);
		expect(await balanceOf(seller)).toBe(0);

		const item = await request(app.getHttpServer())
			.get(`/api/v1/items/${itemId}`)
			.expect(200);
		expect(item.body.data.slot).toBe("available");
		expect(item.body.data.owner).toBe(seller.publicKeyHex);
	});

	it("turns a second buyer away while the item is reserved", async () => {
		const other = await createTestUser(app, 1_000);
		await reserve(buyer, createChallenge()).expect(201);

		const res = await reserve(other, createChallenge()).expect(409);
		expect(res.body.error).toBe("ITEM_RESERVED");
		expect(await balanceOf(other)).toBe(1_000);
	});

	it("refuses a reused challenge", async () => {
		const challenge = createChallenge();
		await reserve(buyer, challenge).expect(201);
		await request(app.getHttpServer())
			.delete(`/api/v1/items/${itemId}/reservation`)
			.set("Authorization", auth(buyer))
			.expect(200);

		const res = await reserve(buyer, challenge).expect(409);
		expect(res.body.error).toBe("CHALLENGE_REUSED");
	});

	it("lets only the buyer withdraw", async () => {
		const other = await createTestUser(app);
		await reserve(buyer, createChallenge()).expect(201);

		const denied = await request(app.getHttpServer())
			.delete(`/api/v1/items/${itemId}/reservation`)
			.set("Authorization", auth(other))
			.expect(403);
		expect(denied.body.error).toBe("NOT_BUYER");

		const res = await request(app.getHttpServer())
			.delete(`/api/v1/items/${itemId}/reservation`)
			.set("Authorization", auth(buyer))
			.expect(200);
		expect(res.body.data).toEqual({
			itemId,
			refund: { recipient: buyer.publicKeyHex, amount: 100 },
			capability: { kind: "none" },
		});
		expect(await balanceOf(buyer)).toBe(1_000);
	});

	it("lets only the seller answer", async () => {
		const challenge = createChallenge();
		await reserve(buyer, challenge).expect(201);

		const res = await respond(buyer, challenge, itemKey.secretKey);
		expect(res.status).toBe(403);
		expect(res.body.error).toBe("NOT_SELLER");
	});

	it("answers 409 when nothing is reserved", async () => {
		const res = await respond(seller, createChallenge(), itemKey.secretKey);
		expect(res.status).toBe(409);
		expect(res.body.error).toBe("NOTHING_RESERVED");
	});

	it("rejects a payment that does not match the price", async () => {
		const res = await reserve(buyer, createChallenge(), 99).expect(400);
		expect(res.body.error).toBe("INVALID_PAYMENT");
		expect(await balanceOf(buyer)).toBe(1_000);
	});

	it("rejects a buyer who cannot pay", async () => {
		const poor = await createTestUser(app, 50);
		const res = await reserve(poor, createChallenge()).expect(402);
		expect(res.body.error).toBe("INSUFFICIENT_FUNDS");
	});

	it("validates the challenge encoding", async () => {
		await request(app.getHttpServer())
			.post(`/api/v1/items/${itemId}/reservation`)
			.set("Authorization", auth(buyer))
			.send({
				challenge: "not-hex",
				buyerPublicKey: itemKey.publicKeyHex,
				amount: 100,
			})
			.expect(400);
	});

	it("refunds a pending buyer when the seller delists", async () => {
		await reserve(buyer, createChallenge()).expect(201);

		const res = await request(app.getHttpServer())
			.delete(`/api/v1/items/${itemId}/listing`)
			.set("Authorization", auth(seller))
			.expect(200);
		expect(res.body.data.refund).toEqual({
			recipient: buyer.publicKeyHex,
			amount: 100,
		});
		expect(await balanceOf(buyer)).toBe(1_000);

		const item = await request(app.getHttpServer())
			.get(`/api/v1/items/${itemId}`)
			.expect(200);
		expect(item.body.data.slot).toBe("no-slot");
	});

	it("takes an item out of custody", async () => {
		await request(app.getHttpServer())
			.post(`/api/v1/items/${itemId}/take`)
			.set("Authorization", auth(seller))
			.expect(200);

		await request(app.getHttpServer())
			.get(`/api/v1/items/${itemId}`)
			.expect(200)
			.expect((res) => expect(res.body.data.status).toBe("taken"));
	});

	it("settles through a purchase right below the listed price", async () => {
		const right = await request(app.getHttpServer())
			.post(`/api/v1/items/${itemId}/rights`)
			.set("Authorization", auth(seller))
			.send({ holder: buyer.publicKeyHex, minPrice: 80 })
			.expect(201);
		const capabilityId = right.body.data.id;

		const challenge = createChallenge();
		await request(app.getHttpServer())
			.post(`/api/v1/items/${itemId}/reservation`)
			.set("Authorization", auth(buyer))
			.send({
				challenge: bytesToHex(challenge),
				buyerPublicKey: itemKey.publicKeyHex,
				amount: 80,
				capabilityId,
			})
			.expect(201);

		const res = await respond(seller, challenge, itemKey.secretKey);
		expect(res.body.data.capability).toEqual({ kind: "consumed", capabilityId });
		expect(await balanceOf(seller)).toBe(80);
	});

	it("records the item's challenge events", async () => {
		const challenge = createChallenge();
		await reserve(buyer, challenge).expect(201);
		await request(app.getHttpServer())
			.delete(`/api/v1/items/${itemId}/reservation`)
			.set("Authorization", auth(buyer))
			.expect(200);

		const res = await request(app.getHttpServer())
			.get(`/api/v1/items/${itemId}/events`)
			.expect(200);
		expect(res.body.data).toHaveLength(2);
		expect(res.body.data[0]).toMatchObject({
			type: "challenge-issued",
			itemId,
			buyerAddress: buyer.publicKeyHex,
			challengeHex: bytesToHex(challenge),
		});
		expect(res.body.data[1]).toMatchObject({
			type: "challenge-withdrawn",
			itemId,
			buyerAddress: buyer.publicKeyHex,
		});
	});
});
