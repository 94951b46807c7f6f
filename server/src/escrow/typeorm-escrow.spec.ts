import * as secp from "@noble/secp256k1";
import { schnorr } from "@noble/secp256k1";
import {
	challengeDigest,
	ChallengeEscrow,
	createChallenge,
	SchnorrVerifier,
} from "@challenge-escrow/sdk";
import { DataSource, type EntityManager } from "typeorm";
import { Account } from "../accounts/account.entity";
import { Funds } from "../accounts/funds.entity";
import { TypeOrmPaymentTransfer } from "../accounts/typeorm-payment-transfer";
import { EscrowEventRecord } from "./escrow-event.entity";
import { EscrowSlot } from "./escrow-slot.entity";
import { EventLogNotifier } from "./event-log-notifier";
import { Item } from "./item.entity";
import { PurchaseRight } from "./purchase-right.entity";
import { TypeOrmListingLedger, type OwnedItem } from "./typeorm-listing-ledger";
import { TypeOrmSlotStore } from "./typeorm-slot-store";

const SELLER = "seller-pk";
const BUYER = "buyer-pk";

const itemKey = secp.utils.randomPrivateKey();
const itemPublicKey = schnorr.getPublicKey(itemKey);

describe("ChallengeEscrow on TypeORM collaborators", () => {
	let dataSource: DataSource;
	let itemId: string;

	const inTransaction = <T>(
		work: (ctx: ReturnType<typeof context>) => Promise<T>,
	) => dataSource.transaction((manager) => work(context(manager)));

	function context(manager: EntityManager) {
		const payments = new TypeOrmPaymentTransfer(manager);
		const ledger = new TypeOrmListingLedger(manager, payments);
		const escrow = new ChallengeEscrow<OwnedItem>({
			ledger,
			payments,
			verifier: new SchnorrVerifier(),
			slots: new TypeOrmSlotStore(manager),
			notifier: new EventLogNotifier(manager),
		});
		return { payments, ledger, escrow };
	}

	const balanceOf = (address: string) =>
		inTransaction(({ payments }) => payments.balanceOf(address));

	const slotState = () =>
		inTransaction(({ escrow }) => escrow.getSlotState(itemId));

	const reserve = (challenge: Uint8Array, amount = 100, capabilityId?: string) =>
		inTransaction(async ({ escrow, payments }) =>
			escrow.purchase(itemId, {
				challenge,
				buyerPublicKey: itemPublicKey,
				payment: await payments.draw(BUYER, amount),
				...(capabilityId ? { capabilityId } : {}),
			}),
		);

	beforeEach(async () => {
		dataSource = new DataSource({
			type: "better-sqlite3",
			database: ":memory:",
			entities: [Account, Funds, Item, PurchaseRight, EscrowSlot, EscrowEventRecord],
			synchronize: true,
		});
		await dataSource.initialize();

		itemId = await inTransaction(async ({ ledger, payments, escrow }) => {
			const item = await ledger.place(SELLER, "Concert ticket");
			await payments.credit(BUYER, 1_000);
			await escrow.list(item.externalId, 100, SELLER);
			return item.externalId;
		});
	});

	afterEach(async () => {
		await dataSource.destroy();
	});

	it("settles a correct response and hands the item to the buyer", async () => {
		const challenge = createChallenge();
		await reserve(challenge);
		expect(await slotState()).toBe("reserved");
		expect(await balanceOf(BUYER)).toBe(900);

		const signature = await schnorr.sign(challengeDigest(challenge), itemKey);
		const result = await inTransaction(({ escrow }) =>
			escrow.submitResponse(itemId, signature, SELLER),
		);

		expect(result.outcome).toBe("settled");
		expect(await slotState()).toBe("no-slot");
		expect(await balanceOf(SELLER)).toBe(100);
		expect(await balanceOf(BUYER)).toBe(900);

		const item = await dataSource.getRepository(Item).findOneByOrFail({
			externalId: itemId,
		});
		expect(item.ownerPubkey).toBe(BUYER);
		expect(item.listedPrice).toBeNull();
	});

	it("refunds the buyer on a wrong response", async () => {
		const challenge = createChallenge();
		await reserve(challenge);

		const wrongKey = secp.utils.randomPrivateKey();
		const signature = await schnorr.sign(challengeDigest(challenge), wrongKey);
		const result = await inTransaction(({ escrow }) =>
			escrow.submitResponse(itemId, signature, SELLER),
		);

		expect(result.outcome).toBe("refunded");
		expect(await slotState()).toBe("available");
		expect(await balanceOf(BUYER)).toBe(1_000);
		expect(await balanceOf(SELLER)).toBe(0);
	});

	it("keeps spent challenges across transactions", async () => {
		const challenge = createChallenge();
		await reserve(challenge);
		await inTransaction(({ escrow }) => escrow.withdraw(itemId, BUYER));

		await expect(reserve(challenge)).rejects.toMatchObject({
			code: "CHALLENGE_REUSED",
		});
		expect(await balanceOf(BUYER)).toBe(1_000);
	});

	it("logs issued and withdrawn challenges in order", async () => {
		const challenge = createChallenge();
		await reserve(challenge);
		await inTransaction(({ escrow }) => escrow.withdraw(itemId, BUYER));

		const records = await dataSource
			.getRepository(EscrowEventRecord)
			.find({ order: { id: "ASC" } });
		expect(records.map((r) => r.type)).toEqual([
			"challenge-issued",
			"challenge-withdrawn",
		]);
		expect(records[0].challengeHex).toBe(Buffer.from(challenge).toString("hex"));
		expect(records[1].challengeHex).toBeNull();
	});

	it("rolls back every effect when the transaction fails", async () => {
		await expect(
			inTransaction(async ({ escrow, payments }) => {
				await escrow.purchase(itemId, {
					challenge: createChallenge(),
					buyerPublicKey: itemPublicKey,
					payment: await payments.draw(BUYER, 100),
				});
				throw new Error("boom");
			}),
		).rejects.toThrow("boom");

		expect(await slotState()).toBe("available");
		expect(await balanceOf(BUYER)).toBe(1_000);
		expect(await dataSource.getRepository(EscrowEventRecord).count()).toBe(0);
	});

	describe("purchase rights", () => {
		const rightStatus = async (externalId: string) =>
			(
				await dataSource
					.getRepository(PurchaseRight)
					.findOneByOrFail({ externalId })
			).status;

		it("settles below the listed price and consumes the right", async () => {
			const right = await inTransaction(({ ledger }) =>
				ledger.issueCapability(itemId, BUYER, 80, SELLER),
			);
			const challenge = createChallenge();
			await reserve(challenge, 80, right.id);
			expect(await rightStatus(right.id)).toBe("surrendered");

			const signature = await schnorr.sign(challengeDigest(challenge), itemKey);
			const result = await inTransaction(({ escrow }) =>
				escrow.submitResponse(itemId, signature, SELLER),
			);

			expect(result.capability).toEqual({
				kind: "consumed",
				capabilityId: right.id,
			});
			expect(await rightStatus(right.id)).toBe("consumed");
			expect(await balanceOf(SELLER)).toBe(80);
		});

		it("returns the right to the buyer on withdrawal", async () => {
			const right = await inTransaction(({ ledger }) =>
				ledger.issueCapability(itemId, BUYER, 80, SELLER),
			);
			await reserve(createChallenge(), 80, right.id);

			await inTransaction(({ escrow }) => escrow.withdraw(itemId, BUYER));

			expect(await rightStatus(right.id)).toBe("active");
			expect(await balanceOf(BUYER)).toBe(1_000);
		});

		it("revokes outstanding rights when the item is delisted", async () => {
			const right = await inTransaction(({ ledger }) =>
				ledger.issueCapability(itemId, BUYER, 80, SELLER),
			);

			await inTransaction(({ escrow }) => escrow.delist(itemId, SELLER));

			expect(await rightStatus(right.id)).toBe("revoked");
			expect(await slotState()).toBe("no-slot");
		});
	});
});
