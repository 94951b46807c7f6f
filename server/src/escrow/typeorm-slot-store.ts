/**
 * TypeORM Slot Store
 *
 * Implements the SDK's SlotStore interface on the escrow_slots table. Each
 * call runs in the caller's transaction.
 */

import type { EntityManager, Repository } from "typeorm";
import {
	bytesToHex,
	EscrowError,
	hexToBytes,
	ItemId,
	PurchaseIntent,
	SlotStore,
	StoredSlot,
} from "@challenge-escrow/sdk";
import { EscrowSlot, SerializedIntent } from "./escrow-slot.entity";

export class TypeOrmSlotStore implements SlotStore {
	private readonly slots: Repository<EscrowSlot>;

	constructor(manager: EntityManager) {
		this.slots = manager.getRepository(EscrowSlot);
	}

	async createSlot(itemId: ItemId): Promise<void> {
		if (await this.slots.exists({ where: { itemExternalId: itemId } })) {
			throw new EscrowError(
				`Slot for item ${itemId} already exists`,
				"DUPLICATE_SLOT",
				{ itemId },
			);
		}
		await this.slots.save(
			this.slots.create({
				itemExternalId: itemId,
				intent: null,
				spentChallenges: [],
			}),
		);
	}

	async reserve(itemId: ItemId, intent: PurchaseIntent): Promise<void> {
		const slot = await this.require(itemId);
		if (slot.intent) {
			throw new EscrowError(`Item ${itemId} is reserved`, "ITEM_RESERVED", {
				itemId,
			});
		}
		slot.intent = serialize(intent);
		if (!slot.spentChallenges.includes(slot.intent.challengeHex)) {
			slot.spentChallenges = [...slot.spentChallenges, slot.intent.challengeHex];
		}
		await this.slots.save(slot);
	}

	async takeIntent(itemId: ItemId): Promise<PurchaseIntent> {
		const slot = await this.require(itemId);
		if (!slot.intent) {
			throw new EscrowError(
				`Nothing is reserved on item ${itemId}`,
				"NOTHING_RESERVED",
				{ itemId },
			);
		}
		const intent = deserialize(slot.intent);
		slot.intent = null;
		await this.slots.save(slot);
		return intent;
	}

	async removeSlot(itemId: ItemId): Promise<void> {
		await this.slots.delete({ itemExternalId: itemId });
	}

	async getSlot(itemId: ItemId): Promise<StoredSlot | null> {
		const slot = await this.slots.findOne({ where: { itemExternalId: itemId } });
		if (!slot) return null;
		return {
			itemId,
			intent: slot.intent ? deserialize(slot.intent) : null,
			spentChallenges: slot.spentChallenges,
			createdAt: slot.createdAt.getTime(),
		};
	}

	private async require(itemId: ItemId): Promise<EscrowSlot> {
		const slot = await this.slots.findOne({ where: { itemExternalId: itemId } });
		if (!slot) {
			throw new EscrowError(`No slot for item ${itemId}`, "NO_SLOT", {
				itemId,
			});
		}
		return slot;
	}
}

function serialize(intent: PurchaseIntent): SerializedIntent {
	return {
		challengeHex: bytesToHex(intent.challenge),
		buyerPublicKeyHex: bytesToHex(intent.buyerPublicKey),
		escrowedFunds: intent.escrowedFunds,
		buyerAddress: intent.buyerAddress,
		...(intent.exclusiveCapability
			? { exclusiveCapability: intent.exclusiveCapability }
			: {}),
		reservedAt: intent.reservedAt,
	};
}

function deserialize(stored: SerializedIntent): PurchaseIntent {
	return {
		challenge: hexToBytes(stored.challengeHex),
		buyerPublicKey: hexToBytes(stored.buyerPublicKeyHex),
		escrowedFunds: stored.escrowedFunds,
		buyerAddress: stored.buyerAddress,
		...(stored.exclusiveCapability
			? { exclusiveCapability: stored.exclusiveCapability }
			: {}),
		reservedAt: stored.reservedAt,
	};
}
