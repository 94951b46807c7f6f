/**
 * Escrow Slot Store Types
 *
 * One slot per listed item, holding at most one pending purchase intent.
 * Developers bring their own persistence layer (SQLite, Postgres, a chain's
 * dynamic fields, …) by implementing `SlotStore`.
 */

import { ItemId } from "../protocol/types.js";
import { PurchaseIntent } from "../modules/escrow/types.js";

/**
 * Snapshot of a slot as stored.
 */
export interface StoredSlot {
	itemId: ItemId;
	/** The pending intent, or null when the item is available */
	intent: PurchaseIntent | null;
	/** Hex-encoded challenges already used on this slot */
	spentChallenges: string[];
	/** Unix timestamp ms */
	createdAt: number;
}

/**
 * Slot store interface.
 *
 * Mutations go through `createSlot`, `reserve`, `takeIntent` and
 * `removeSlot` only; each must be atomic on its own. Callers serialize
 * operations on the same item.
 *
 * @example
 * ```typescript
 * class RedisSlotStore implements SlotStore {
 *   async reserve(itemId: ItemId, intent: PurchaseIntent): Promise<void> {
 *     const ok = await this.redis.set(`slot:${itemId}:intent`, encode(intent), "NX");
 *     if (!ok) throw new EscrowError("Item is reserved", "ITEM_RESERVED");
 *   }
 *   // ... other methods
 * }
 * ```
 */
export interface SlotStore {
	/**
	 * Insert an empty slot.
	 *
	 * @throws EscrowError DUPLICATE_SLOT if one already exists
	 */
	createSlot(itemId: ItemId): Promise<void>;

	/**
	 * Store an intent in an empty slot and record its challenge as spent.
	 *
	 * @throws EscrowError NO_SLOT, ITEM_RESERVED
	 */
	reserve(itemId: ItemId, intent: PurchaseIntent): Promise<void>;

	/**
	 * Remove and return the pending intent, leaving the slot empty.
	 *
	 * @throws EscrowError NO_SLOT, NOTHING_RESERVED
	 */
	takeIntent(itemId: ItemId): Promise<PurchaseIntent>;

	/**
	 * Delete a slot. The pending intent, if any, must have been resolved.
	 *
	 * Should succeed even if the slot doesn't exist.
	 */
	removeSlot(itemId: ItemId): Promise<void>;

	/**
	 * Load a slot.
	 *
	 * @returns The slot if found, null otherwise
	 */
	getSlot(itemId: ItemId): Promise<StoredSlot | null>;
}
