import { PurchaseIntent } from "../modules/escrow/types.js";
import { MemorySlotStore } from "./memory-adapter.js";

const intent = (challenge: number[]): PurchaseIntent => ({
	challenge: Uint8Array.from(challenge),
	buyerPublicKey: new Uint8Array(32).fill(7),
	escrowedFunds: { id: "funds-1", depositor: "buyer", amount: 100 },
	buyerAddress: "buyer",
	reservedAt: 1_700_000_000_000,
});

describe("MemorySlotStore", () => {
	let slots: MemorySlotStore;

	beforeEach(async () => {
		slots = new MemorySlotStore();
		await slots.createSlot("item-1");
	});

	it("creates an empty slot once", async () => {
		expect((await slots.getSlot("item-1"))?.intent).toBeNull();
		await expect(slots.createSlot("item-1")).rejects.toMatchObject({
			code: "DUPLICATE_SLOT",
		});
		expect(slots.size()).toBe(1);
	});

	it("holds at most one intent", async () => {
		await slots.reserve("item-1", intent([1, 2]));
		await expect(slots.reserve("item-1", intent([3]))).rejects.toMatchObject({
			code: "ITEM_RESERVED",
		});
	});

	it("records reserved challenges as spent", async () => {
		await slots.reserve("item-1", intent([0xab, 0xcd]));
		await slots.takeIntent("item-1");
		await slots.reserve("item-1", intent([0xab, 0xcd]));

		expect((await slots.getSlot("item-1"))?.spentChallenges).toEqual(["abcd"]);
	});

	it("takes the intent and empties the slot", async () => {
		await slots.reserve("item-1", intent([1]));

		const taken = await slots.takeIntent("item-1");

		expect(taken.escrowedFunds.amount).toBe(100);
		await expect(slots.takeIntent("item-1")).rejects.toMatchObject({
			code: "NOTHING_RESERVED",
		});
	});

	it("fails on a missing slot", async () => {
		await expect(slots.reserve("item-2", intent([1]))).rejects.toMatchObject({
			code: "NO_SLOT",
		});
		await expect(slots.takeIntent("item-2")).rejects.toMatchObject({
			code: "NO_SLOT",
		});
		expect(await slots.getSlot("item-2")).toBeNull();
	});

	it("keeps stored intents out of the caller's reach", async () => {
		const pending = intent([1, 2, 3]);
		await slots.reserve("item-1", pending);
		pending.challenge[0] = 9;

		const slot = await slots.getSlot("item-1");
		expect(Array.from(slot?.intent?.challenge ?? [])).toEqual([1, 2, 3]);
	});

	it("removes slots idempotently", async () => {
		await slots.removeSlot("item-1");
		await slots.removeSlot("item-1");
		expect(slots.size()).toBe(0);
	});
});
