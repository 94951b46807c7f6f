/**
 * TypeORM Listing Ledger
 *
 * Implements the SDK's ListingLedger interface on the items and
 * purchase_rights tables. A sale credits the seller through the payment
 * transfer and leaves the item in custody under its new owner, who can list
 * it again.
 */

import { In, type EntityManager, type Repository } from "typeorm";
import {
	Address,
	EscrowError,
	ItemId,
	ListingLedger,
	Payment,
	PaymentTransfer,
	PurchaseCapability,
	PurchaseOutcome,
	TransferableItem,
} from "@challenge-escrow/sdk";
import { nanoid } from "nanoid";
import { Item } from "./item.entity";
import { PurchaseRight } from "./purchase-right.entity";

export interface OwnedItem extends TransferableItem {
	name: string;
}

export class TypeOrmListingLedger implements ListingLedger<OwnedItem> {
	private readonly items: Repository<Item>;
	private readonly rights: Repository<PurchaseRight>;

	constructor(
		manager: EntityManager,
		private readonly payments: PaymentTransfer,
	) {
		this.items = manager.getRepository(Item);
		this.rights = manager.getRepository(PurchaseRight);
	}

	/**
	 * Take a new item into custody.
	 */
	async place(owner: Address, name: string): Promise<Item> {
		return this.items.save(
			this.items.create({
				externalId: nanoid(16),
				name,
				ownerPubkey: owner,
				listedPrice: null,
				status: "held",
			}),
		);
	}

	async issueCapability(
		itemId: ItemId,
		holder: Address,
		minPrice: number,
		issuer: Address,
	): Promise<PurchaseCapability> {
		const item = await this.requireOwned(itemId, issuer);
		if (item.listedPrice === null) throw notListed(itemId);
		assertPrice(minPrice, itemId);

		const right = await this.rights.save(
			this.rights.create({
				externalId: nanoid(16),
				itemExternalId: itemId,
				holderPubkey: holder,
				minPrice,
				status: "active",
			}),
		);
		return toCapability(right);
	}

	async list(itemId: ItemId, price: number, seller: Address): Promise<void> {
		const item = await this.requireOwned(itemId, seller);
		if (item.listedPrice !== null) {
			throw new EscrowError(`Item ${itemId} is already listed`, "ALREADY_LISTED", {
				itemId,
			});
		}
		assertPrice(price, itemId);
		item.listedPrice = price;
		await this.items.save(item);
	}

	async delist(itemId: ItemId, seller: Address): Promise<void> {
		const item = await this.requireOwned(itemId, seller);
		if (item.listedPrice === null) throw notListed(itemId);
		await this.unlist(item);
	}

	async take(itemId: ItemId, seller: Address): Promise<OwnedItem> {
		const item = await this.requireOwned(itemId, seller);
		item.status = "taken";
		await this.unlist(item);
		return toOwned(item);
	}

	async purchase(
		itemId: ItemId,
		payment: Payment,
	): Promise<PurchaseOutcome<OwnedItem>> {
		const item = await this.requireListed(itemId);
		if (payment.amount !== item.listedPrice) {
			throw new EscrowError(
				`Payment of ${payment.amount} does not match price ${item.listedPrice}`,
				"INVALID_PAYMENT",
				{ itemId, amount: payment.amount, price: item.listedPrice },
			);
		}
		return this.transfer(item, payment);
	}

	async purchaseWithCapability(
		capability: PurchaseCapability,
		payment: Payment,
	): Promise<PurchaseOutcome<OwnedItem>> {
		const right = await this.rights.findOne({
			where: { externalId: capability.id, status: "surrendered" },
		});
		if (
			!right ||
			right.itemExternalId !== capability.itemId ||
			right.holderPubkey !== payment.payer
		) {
			throw invalidCapability(capability.id);
		}
		const item = await this.requireListed(capability.itemId);
		if (payment.amount < right.minPrice) {
			throw new EscrowError(
				`Payment of ${payment.amount} is below the minimum price ${right.minPrice}`,
				"INVALID_PAYMENT",
				{ itemId: capability.itemId, amount: payment.amount },
			);
		}
		right.status = "consumed";
		await this.rights.save(right);
		return this.transfer(item, payment);
	}

	async isListed(itemId: ItemId): Promise<boolean> {
		const item = await this.find(itemId);
		return item?.listedPrice != null;
	}

	async priceOf(itemId: ItemId): Promise<number> {
		const item = await this.requireListed(itemId);
		return item.listedPrice;
	}

	async sellerOf(itemId: ItemId): Promise<Address> {
		return (await this.require(itemId)).ownerPubkey;
	}

	async capabilityOf(capabilityId: string): Promise<PurchaseCapability | null> {
		const right = await this.rights.findOne({
			where: { externalId: capabilityId, status: "active" },
		});
		return right ? toCapability(right) : null;
	}

	async surrenderCapability(
		capabilityId: string,
		holder: Address,
	): Promise<PurchaseCapability> {
		const right = await this.rights.findOne({
			where: { externalId: capabilityId, status: "active" },
		});
		if (!right || right.holderPubkey !== holder) {
			throw invalidCapability(capabilityId);
		}
		right.status = "surrendered";
		await this.rights.save(right);
		return toCapability(right);
	}

	async restoreCapability(
		capability: PurchaseCapability,
		recipient: Address,
	): Promise<void> {
		const right = await this.rights.findOne({
			where: { externalId: capability.id, status: "surrendered" },
		});
		if (!right) throw invalidCapability(capability.id);
		right.status = "active";
		right.holderPubkey = recipient;
		await this.rights.save(right);
	}

	private async transfer(
		item: Item & { listedPrice: number },
		payment: Payment,
	): Promise<PurchaseOutcome<OwnedItem>> {
		const seller = item.ownerPubkey;
		await this.payments.deposit(payment, seller);
		item.ownerPubkey = payment.payer;
		await this.unlist(item);
		return {
			item: toOwned(item),
			receipt: {
				itemId: item.externalId,
				seller,
				buyer: payment.payer,
				amount: payment.amount,
				paidAt: Date.now(),
			},
		};
	}

	/**
	 * Drop the listing and revoke every outstanding purchase right for it.
	 */
	private async unlist(item: Item): Promise<void> {
		item.listedPrice = null;
		await this.items.save(item);
		await this.rights.update(
			{
				itemExternalId: item.externalId,
				status: In(["active", "surrendered"]),
			},
			{ status: "revoked" },
		);
	}

	private find(itemId: ItemId): Promise<Item | null> {
		return this.items.findOne({
			where: { externalId: itemId, status: "held" },
		});
	}

	private async require(itemId: ItemId): Promise<Item> {
		const item = await this.find(itemId);
		if (!item) {
			throw new EscrowError(`Unknown item ${itemId}`, "UNKNOWN_ITEM", { itemId });
		}
		return item;
	}

	private async requireOwned(itemId: ItemId, caller: Address): Promise<Item> {
		const item = await this.require(itemId);
		if (item.ownerPubkey !== caller) {
			throw new EscrowError(`${caller} does not own item ${itemId}`, "NOT_SELLER", {
				itemId,
				caller,
			});
		}
		return item;
	}

	private async requireListed(
		itemId: ItemId,
	): Promise<Item & { listedPrice: number }> {
		const item = await this.find(itemId);
		if (!hasListing(item)) throw notListed(itemId);
		return item;
	}
}

function toOwned(item: Item): OwnedItem {
	return { id: item.externalId, owner: item.ownerPubkey, name: item.name };
}

function hasListing(item: Item | null): item is Item & { listedPrice: number } {
	return item !== null && item.listedPrice !== null;
}

function toCapability(right: PurchaseRight): PurchaseCapability {
	return {
		id: right.externalId,
		itemId: right.itemExternalId,
		holder: right.holderPubkey,
		minPrice: right.minPrice,
	};
}

function assertPrice(price: number, itemId: ItemId): void {
	if (!Number.isSafeInteger(price) || price <= 0) {
		throw new EscrowError(
			`Price must be a positive integer, got ${price}`,
			"INVALID_PRICE",
			{ itemId, price },
		);
	}
}

function notListed(itemId: ItemId): EscrowError {
	return new EscrowError(`Item ${itemId} is not listed`, "NOT_LISTED", {
		itemId,
	});
}

function invalidCapability(capabilityId: string): EscrowError {
	return new EscrowError(
		`Purchase right ${capabilityId} is not valid`,
		"INVALID_CAPABILITY",
		{ capabilityId },
	);
}
