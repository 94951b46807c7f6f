/**
 * In-Memory Slot Store
 *
 * A simple in-memory slot store for testing and development.
 * Data is lost when the process exits.
 */

import { EscrowError } from "../contracts/types.js";
import { ItemId } from "../protocol/types.js";
import { PurchaseIntent } from "../modules/escrow/types.js";
import { bytesToHex } from "../utils/encoding.js";
import { SlotStore, StoredSlot } from "./types.js";

/**
 * In-memory slot store.
 *
 * Useful for:
 * - Unit testing
 * - Development and prototyping
 * - Hosts that already serialize and persist state around each call
 *
 * @example
 * ```typescript
 * const slots = new MemorySlotStore();
 *
 * await slots.createSlot("item-1");
 * await slots.reserve("item-1", intent);
 *
 * const pending = await slots.takeIntent("item-1");
 * ```
 */
export class MemorySlotStore implements SlotStore {
	private slots: Map<ItemId, StoredSlot> = new Map();

	async createSlot(itemId: ItemId): Promise<void> {
		if (this.slots.has(itemId)) {
			throw new EscrowError(
				`Slot for item ${itemId} already exists`,
				"DUPLICATE_SLOT",
				{ itemId },
			);
		}
		this.slots.set(itemId, {
			itemId,
			intent: null,
			spentChallenges: [],
			createdAt: Date.now(),
		});
	}

	async reserve(itemId: ItemId, intent: PurchaseIntent): Promise<void> {
		const slot = this.require(itemId);
		if (slot.intent) {
			throw new EscrowError(`Item ${itemId} is reserved`, "ITEM_RESERVED", {
				itemId,
			});
		}
		// Copy in so later mutation by the caller can't reach the stored intent
		slot.intent = cloneIntent(intent);
		const challengeHex = bytesToHex(intent.challenge);
		if (!slot.spentChallenges.includes(challengeHex)) {
			slot.spentChallenges.push(challengeHex);
		}
	}

	async takeIntent(itemId: ItemId): Promise<PurchaseIntent> {
		const slot = this.require(itemId);
		const intent = slot.intent;
		if (!intent) {
			throw new EscrowError(
				`Nothing is reserved on item ${itemId}`,
				"NOTHING_RESERVED",
				{ itemId },
			);
		}
		slot.intent = null;
		return intent;
	}

	async removeSlot(itemId: ItemId): Promise<void> {
		this.slots.delete(itemId);
	}

	async getSlot(itemId: ItemId): Promise<StoredSlot | null> {
		const slot = this.slots.get(itemId);
		if (!slot) return null;
		// Return a copy to prevent external mutations
		return {
			...slot,
			intent: slot.intent ? cloneIntent(slot.intent) : null,
			spentChallenges: [...slot.spentChallenges],
		};
	}

	/**
	 * Get the number of slots stored.
	 */
	size(): number {
		return this.slots.size;
	}

	private require(itemId: ItemId): StoredSlot {
		const slot = this.slots.get(itemId);
		if (!slot) {
			throw new EscrowError(`No slot for item ${itemId}`, "NO_SLOT", {
				itemId,
			});
		}
		return slot;
	}
}

function cloneIntent(intent: PurchaseIntent): PurchaseIntent {
	return {
		...intent,
		challenge: Uint8Array.from(intent.challenge),
		buyerPublicKey: Uint8Array.from(intent.buyerPublicKey),
		escrowedFunds: { ...intent.escrowedFunds },
		...(intent.exclusiveCapability
			? { exclusiveCapability: { ...intent.exclusiveCapability } }
			: {}),
	};
}
