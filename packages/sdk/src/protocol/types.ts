/**
 * Collaborator Types
 *
 * The escrow protocol sits on top of a listing ledger and a payment
 * primitive it does not own. These interfaces describe the boundary; bring
 * your own implementations (a database, a chain, or the in-memory
 * reference implementations in `memory/`).
 */

import { EscrowEvent } from "../modules/escrow/types.js";

/** Opaque key identifying a listed item. */
export type ItemId = string;

/** Account identifier (a public key, a wallet address, a user id). */
export type Address = string;

/**
 * Capability every escrowed item type must satisfy: a stable identifier and
 * an ownership field the ledger transfers on settlement.
 */
export interface TransferableItem {
	readonly id: ItemId;
	owner: Address;
}

/**
 * A spendable payment, detached from any account balance.
 *
 * A payment is single-use: escrowing or depositing it consumes it.
 */
export interface Payment {
	/** Unique payment identifier */
	id: string;
	/** The account the payment was drawn from */
	payer: Address;
	/** Amount in the smallest unit */
	amount: number;
}

/**
 * Funds moved out of the depositor's control and held by the protocol.
 */
export interface HeldFunds {
	id: string;
	depositor: Address;
	amount: number;
}

/**
 * Exclusive purchase right a seller issues to one buyer, letting that buyer
 * purchase the item for at least `minPrice` regardless of the listed price.
 */
export interface PurchaseCapability {
	id: string;
	itemId: ItemId;
	/** The buyer entitled to use this right */
	holder: Address;
	minPrice: number;
}

/**
 * Proof of an ownership transfer performed by the ledger.
 */
export interface TransferReceipt {
	itemId: ItemId;
	seller: Address;
	buyer: Address;
	amount: number;
	/** Unix timestamp ms */
	paidAt: number;
}

export interface PurchaseOutcome<TItem extends TransferableItem> {
	item: TItem;
	receipt: TransferReceipt;
}

/**
 * Listing ledger interface.
 *
 * Holds items, their listing price and the exclusive purchase rights issued
 * for them, and credits sellers when an item is bought. Implementations
 * report failures as `EscrowError`s and must be all-or-nothing per call.
 */
export interface ListingLedger<TItem extends TransferableItem> {
	/**
	 * List an item owned by `seller` for `price`.
	 */
	list(itemId: ItemId, price: number, seller: Address): Promise<void>;

	/**
	 * Remove a listing. Outstanding purchase rights for the item are revoked.
	 */
	delist(itemId: ItemId, seller: Address): Promise<void>;

	/**
	 * Remove an item from the ledger and hand it back to its seller,
	 * delisting it first if needed.
	 */
	take(itemId: ItemId, seller: Address): Promise<TItem>;

	/**
	 * Exchange a listed item for a payment of exactly its listed price.
	 */
	purchase(itemId: ItemId, payment: Payment): Promise<PurchaseOutcome<TItem>>;

	/**
	 * Exchange a listed item for a payment of at least the right's minimum
	 * price. The right is consumed.
	 */
	purchaseWithCapability(
		capability: PurchaseCapability,
		payment: Payment,
	): Promise<PurchaseOutcome<TItem>>;

	isListed(itemId: ItemId): Promise<boolean>;

	/**
	 * Get the listed price.
	 *
	 * @throws EscrowError NOT_LISTED
	 */
	priceOf(itemId: ItemId): Promise<number>;

	/**
	 * Get the current owner of an item held by the ledger.
	 *
	 * @throws EscrowError UNKNOWN_ITEM
	 */
	sellerOf(itemId: ItemId): Promise<Address>;

	/**
	 * Look up a purchase right that is currently in its holder's hands.
	 *
	 * @returns The right, or null if it does not exist or was surrendered
	 */
	capabilityOf(capabilityId: string): Promise<PurchaseCapability | null>;

	/**
	 * Take a purchase right out of its holder's hands so the protocol can
	 * keep it with a reservation.
	 */
	surrenderCapability(
		capabilityId: string,
		holder: Address,
	): Promise<PurchaseCapability>;

	/**
	 * Put a surrendered purchase right back into `recipient`'s hands.
	 */
	restoreCapability(
		capability: PurchaseCapability,
		recipient: Address,
	): Promise<void>;
}

/**
 * Payment transfer primitive.
 */
export interface PaymentTransfer {
	/**
	 * Move a payment under the protocol's custody.
	 *
	 * @throws EscrowError INVALID_PAYMENT if the payment was already spent
	 */
	escrow(payment: Payment): Promise<HeldFunds>;

	/**
	 * Pay held funds out in full to `recipient`.
	 */
	release(held: HeldFunds, recipient: Address): Promise<void>;

	/**
	 * Turn held funds back into a payment, for settlement through the ledger.
	 */
	forward(held: HeldFunds): Promise<Payment>;

	/**
	 * Credit a payment in full to `recipient`'s balance.
	 */
	deposit(payment: Payment, recipient: Address): Promise<void>;
}

/**
 * Observational side channel for lifecycle events.
 */
export interface EventNotifier {
	publish(event: EscrowEvent): void | Promise<void>;
}

/**
 * Per-key critical section.
 *
 * Every protocol operation on an item runs inside `runExclusive(itemId, …)`.
 */
export interface ExclusiveLock {
	runExclusive<T>(key: string, work: () => Promise<T>): Promise<T>;
}
