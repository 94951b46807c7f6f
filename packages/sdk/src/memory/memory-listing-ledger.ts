/**
 * In-Memory Listing Ledger
 *
 * Holds items in custody, their listings and the purchase rights issued for
 * them. Data is lost when the process exits.
 */

import { nanoid } from "nanoid";
import { EscrowError } from "../contracts/types.js";
import {
	Address,
	ItemId,
	ListingLedger,
	Payment,
	PaymentTransfer,
	PurchaseCapability,
	PurchaseOutcome,
	TransferableItem,
} from "../protocol/types.js";

interface Listing {
	price: number;
	seller: Address;
}

type CapabilityStatus = "held" | "surrendered";

interface CapabilityRecord {
	capability: PurchaseCapability;
	status: CapabilityStatus;
}

/**
 * In-memory listing ledger.
 *
 * Items must be placed in the ledger before they can be listed. A purchase
 * deposits the payment with the seller, hands the item to the buyer and
 * removes it from custody.
 *
 * @example
 * ```typescript
 * const ledger = new MemoryListingLedger<Ticket>(payments);
 * ledger.place({ id: "ticket-1", owner: seller, seat: "A1" });
 * await ledger.list("ticket-1", 100, seller);
 * ```
 */
export class MemoryListingLedger<TItem extends TransferableItem>
	implements ListingLedger<TItem>
{
	private items: Map<ItemId, TItem> = new Map();
	private listings: Map<ItemId, Listing> = new Map();
	private capabilities: Map<string, CapabilityRecord> = new Map();

	constructor(private readonly payments: PaymentTransfer) {}

	/**
	 * Put an item in the ledger's custody, owned by `item.owner`.
	 */
	place(item: TItem): void {
		if (this.items.has(item.id)) {
			throw new EscrowError(
				`Item ${item.id} is already in the ledger`,
				"ALREADY_LISTED",
				{ itemId: item.id },
			);
		}
		this.items.set(item.id, item);
	}

	get(itemId: ItemId): TItem | null {
		return this.items.get(itemId) ?? null;
	}

	/**
	 * Grant `holder` the right to buy a listed item for at least `minPrice`.
	 */
	issueCapability(
		itemId: ItemId,
		holder: Address,
		minPrice: number,
		issuer: Address,
	): PurchaseCapability {
		const item = this.requireItem(itemId);
		if (item.owner !== issuer) throw notSeller(itemId, issuer);
		this.requireListing(itemId);
		if (!Number.isSafeInteger(minPrice) || minPrice <= 0) {
			throw new EscrowError(
				`Minimum price must be a positive integer, got ${minPrice}`,
				"INVALID_PRICE",
				{ itemId, minPrice },
			);
		}

		const capability: PurchaseCapability = {
			id: nanoid(),
			itemId,
			holder,
			minPrice,
		};
		this.capabilities.set(capability.id, { capability, status: "held" });
		return { ...capability };
	}

	async list(itemId: ItemId, price: number, seller: Address): Promise<void> {
		const item = this.requireItem(itemId);
		if (item.owner !== seller) throw notSeller(itemId, seller);
		if (this.listings.has(itemId)) {
			throw new EscrowError(`Item ${itemId} is already listed`, "ALREADY_LISTED", {
				itemId,
			});
		}
		if (!Number.isSafeInteger(price) || price <= 0) {
			throw new EscrowError(
				`Price must be a positive integer, got ${price}`,
				"INVALID_PRICE",
				{ itemId, price },
			);
		}
		this.listings.set(itemId, { price, seller });
	}

	async delist(itemId: ItemId, seller: Address): Promise<void> {
		const item = this.requireItem(itemId);
		if (item.owner !== seller) throw notSeller(itemId, seller);
		this.requireListing(itemId);
		this.unlist(itemId);
	}

	async take(itemId: ItemId, seller: Address): Promise<TItem> {
		const item = this.requireItem(itemId);
		if (item.owner !== seller) throw notSeller(itemId, seller);
		this.unlist(itemId);
		this.items.delete(itemId);
		return item;
	}

	async purchase(
		itemId: ItemId,
		payment: Payment,
	): Promise<PurchaseOutcome<TItem>> {
		const listing = this.requireListing(itemId);
		if (payment.amount !== listing.price) {
			throw new EscrowError(
				`Payment of ${payment.amount} does not match price ${listing.price}`,
				"INVALID_PAYMENT",
				{ itemId, amount: payment.amount, price: listing.price },
			);
		}
		return this.transfer(itemId, listing, payment);
	}

	async purchaseWithCapability(
		capability: PurchaseCapability,
		payment: Payment,
	): Promise<PurchaseOutcome<TItem>> {
		const record = this.capabilities.get(capability.id);
		if (
			!record ||
			record.capability.itemId !== capability.itemId ||
			record.capability.holder !== payment.payer
		) {
			throw invalidCapability(capability.id);
		}
		const listing = this.requireListing(capability.itemId);
		if (payment.amount < record.capability.minPrice) {
			throw new EscrowError(
				`Payment of ${payment.amount} is below the minimum price ${record.capability.minPrice}`,
				"INVALID_PAYMENT",
				{ itemId: capability.itemId, amount: payment.amount },
			);
		}
		this.capabilities.delete(capability.id);
		return this.transfer(capability.itemId, listing, payment);
	}

	async isListed(itemId: ItemId): Promise<boolean> {
		return this.listings.has(itemId);
	}

	async priceOf(itemId: ItemId): Promise<number> {
		return this.requireListing(itemId).price;
	}

	async sellerOf(itemId: ItemId): Promise<Address> {
		return this.requireItem(itemId).owner;
	}

	async capabilityOf(capabilityId: string): Promise<PurchaseCapability | null> {
		const record = this.capabilities.get(capabilityId);
		if (!record || record.status !== "held") return null;
		return { ...record.capability };
	}

	async surrenderCapability(
		capabilityId: string,
		holder: Address,
	): Promise<PurchaseCapability> {
		const record = this.capabilities.get(capabilityId);
		if (!record || record.status !== "held" || record.capability.holder !== holder) {
			throw invalidCapability(capabilityId);
		}
		record.status = "surrendered";
		return { ...record.capability };
	}

	async restoreCapability(
		capability: PurchaseCapability,
		recipient: Address,
	): Promise<void> {
		const record = this.capabilities.get(capability.id);
		if (!record || record.status !== "surrendered") {
			throw invalidCapability(capability.id);
		}
		record.status = "held";
		record.capability = { ...record.capability, holder: recipient };
	}

	private async transfer(
		itemId: ItemId,
		listing: Listing,
		payment: Payment,
	): Promise<PurchaseOutcome<TItem>> {
		const item = this.requireItem(itemId);
		await this.payments.deposit(payment, listing.seller);

		this.unlist(itemId);
		this.items.delete(itemId);
		item.owner = payment.payer;

		return {
			item,
			receipt: {
				itemId,
				seller: listing.seller,
				buyer: payment.payer,
				amount: payment.amount,
				paidAt: Date.now(),
			},
		};
	}

	/**
	 * Drop the listing and revoke every purchase right issued for it.
	 */
	private unlist(itemId: ItemId): void {
		this.listings.delete(itemId);
		for (const [id, record] of this.capabilities) {
			if (record.capability.itemId === itemId) this.capabilities.delete(id);
		}
	}

	private requireItem(itemId: ItemId): TItem {
		const item = this.items.get(itemId);
		if (!item) {
			throw new EscrowError(`Unknown item ${itemId}`, "UNKNOWN_ITEM", { itemId });
		}
		return item;
	}

	private requireListing(itemId: ItemId): Listing {
		const listing = this.listings.get(itemId);
		if (!listing) {
			throw new EscrowError(`Item ${itemId} is not listed`, "NOT_LISTED", {
				itemId,
			});
		}
		return listing;
	}
}

function notSeller(itemId: ItemId, caller: Address): EscrowError {
	return new EscrowError(`${caller} does not own item ${itemId}`, "NOT_SELLER", {
		itemId,
		caller,
	});
}

function invalidCapability(capabilityId: string): EscrowError {
	return new EscrowError(
		`Purchase right ${capabilityId} is not valid`,
		"INVALID_CAPABILITY",
		{ capabilityId },
	);
}
