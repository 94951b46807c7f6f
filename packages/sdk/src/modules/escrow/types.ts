/**
 * Challenge Escrow Types
 */

import type {
	Address,
	HeldFunds,
	ItemId,
	Payment,
	PurchaseCapability,
	TransferableItem,
	TransferReceipt,
} from "../../protocol/types.js";

/**
 * Slot states.
 *
 * - no-slot: item not listed under the protocol
 * - available: listed, slot empty, purchasable
 * - reserved: listed, one pending purchase intent
 */
export type SlotState = "no-slot" | "available" | "reserved";

/**
 * Lifecycle actions.
 */
export type SlotAction =
	| "list"
	| "purchase"
	| "settle"
	| "refund"
	| "withdraw"
	| "delist"
	| "take";

/**
 * The escrow record a purchase leaves in the item's slot.
 */
export interface PurchaseIntent {
	/** Buyer-chosen, single-use challenge */
	challenge: Uint8Array;
	/** Key the seller must answer the challenge under */
	buyerPublicKey: Uint8Array;
	/** The buyer's deposit */
	escrowedFunds: HeldFunds;
	/** Account entitled to refund and withdrawal */
	buyerAddress: Address;
	/** Purchase right surrendered by the buyer, if any */
	exclusiveCapability?: PurchaseCapability;
	/** Unix timestamp ms */
	reservedAt: number;
}

/**
 * What a buyer hands over to reserve an item.
 */
export interface PurchaseRequest {
	challenge: Uint8Array;
	buyerPublicKey: Uint8Array;
	/** The deposit; `payment.payer` is the buyer */
	payment: Payment;
	/** Exclusive purchase right to settle through, if the buyer holds one */
	capabilityId?: string;
}

/**
 * Read-only view of a pending reservation.
 */
export interface Reservation {
	itemId: ItemId;
	challenge: Uint8Array;
	buyerPublicKey: Uint8Array;
	buyerAddress: Address;
	amount: number;
	capabilityId?: string;
	reservedAt: number;
}

/**
 * What happened to the purchase right of a destroyed intent.
 *
 * Produced by an exhaustive match on every path that removes an intent.
 */
export type CapabilityDisposition =
	| { kind: "none" }
	| { kind: "consumed"; capabilityId: string }
	| { kind: "returned"; capabilityId: string; recipient: Address };

export interface Refund {
	recipient: Address;
	amount: number;
}

export interface SettledResult<TItem extends TransferableItem> {
	outcome: "settled";
	itemId: ItemId;
	item: TItem;
	receipt: TransferReceipt;
	capability: CapabilityDisposition;
}

export interface RefundedResult {
	outcome: "refunded";
	itemId: ItemId;
	refund: Refund;
	capability: CapabilityDisposition;
}

export type ResponseResult<TItem extends TransferableItem> =
	| SettledResult<TItem>
	| RefundedResult;

export interface WithdrawResult {
	itemId: ItemId;
	refund: Refund;
	capability: CapabilityDisposition;
}

export interface RemovalResult {
	itemId: ItemId;
	/** Set when a pending reservation was refunded before removal */
	refund?: Refund;
	capability: CapabilityDisposition;
}

export interface TakeResult<TItem extends TransferableItem>
	extends RemovalResult {
	item: TItem;
}

export const CHALLENGE_ISSUED = "challenge-issued";
export const CHALLENGE_WITHDRAWN = "challenge-withdrawn";

export interface ChallengeIssued {
	type: typeof CHALLENGE_ISSUED;
	itemId: ItemId;
	challenge: Uint8Array;
	buyerAddress: Address;
}

export interface ChallengeWithdrawn {
	type: typeof CHALLENGE_WITHDRAWN;
	itemId: ItemId;
	buyerAddress: Address;
}

/**
 * Append-only, non-authoritative lifecycle records.
 */
export type EscrowEvent = ChallengeIssued | ChallengeWithdrawn;
