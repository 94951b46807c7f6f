/**
 * Challenge Escrow
 *
 * Reservation and settlement lifecycle for challenge-response purchases.
 * This is the main class developers interact with.
 */

import { EscrowError, EscrowErrorCode } from "../../contracts/index.js";
import {
	Address,
	EventNotifier,
	ExclusiveLock,
	HeldFunds,
	ItemId,
	ListingLedger,
	Payment,
	PaymentTransfer,
	PurchaseCapability,
	PurchaseOutcome,
	TransferableItem,
} from "../../protocol/index.js";
import { MemorySlotStore, SlotStore, StoredSlot } from "../../storage/index.js";
import { bytesToHex, KeyedMutex } from "../../utils/index.js";
import { Verifier } from "../../verification/index.js";
import { getAllowedActions, slotMachine } from "./slot-state-machine.js";
import {
	CHALLENGE_ISSUED,
	CHALLENGE_WITHDRAWN,
	CapabilityDisposition,
	EscrowEvent,
	PurchaseIntent,
	PurchaseRequest,
	Refund,
	RefundedResult,
	RemovalResult,
	Reservation,
	ResponseResult,
	SettledResult,
	SlotAction,
	SlotState,
	TakeResult,
	WithdrawResult,
} from "./types.js";

export interface ChallengeEscrowOptions<TItem extends TransferableItem> {
	ledger: ListingLedger<TItem>;
	payments: PaymentTransfer;
	verifier: Verifier;
	/** Defaults to an in-memory store */
	slots?: SlotStore;
	notifier?: EventNotifier;
	/**
	 * Called when the notifier fails. The transition has already taken
	 * effect and is not undone. Defaults to `console.error`.
	 */
	onPublishError?: (error: unknown, event: EscrowEvent) => void;
	/** Per-item critical section; defaults to an in-process KeyedMutex */
	lock?: ExclusiveLock;
}

type CapabilityFate = "consume" | "return";

interface Resolution {
	refund?: Refund;
	capability: CapabilityDisposition;
}

/**
 * Challenge Escrow
 *
 * A seller lists an item; a buyer reserves it by escrowing a payment and
 * issuing a challenge; the seller answers the challenge with a signature
 * under the buyer-chosen key. A valid answer settles the sale, anything else
 * refunds the buyer. The buyer may withdraw at any time while reserved, and
 * a seller removing the listing refunds a pending buyer first.
 *
 * Every operation runs inside the lock for its item.
 *
 * @example
 * ```typescript
 * const escrow = new ChallengeEscrow({
 *   ledger,
 *   payments,
 *   verifier: new SchnorrVerifier(),
 * });
 *
 * await escrow.list("item-1", 100, seller);
 *
 * const challenge = createChallenge();
 * await escrow.purchase("item-1", {
 *   challenge,
 *   buyerPublicKey: itemKey,
 *   payment: payments.draw(buyer, 100),
 * });
 *
 * const result = await escrow.submitResponse("item-1", signature, seller);
 * console.log(result.outcome); // "settled" or "refunded"
 * ```
 */
export class ChallengeEscrow<TItem extends TransferableItem> {
	private readonly ledger: ListingLedger<TItem>;
	private readonly payments: PaymentTransfer;
	private readonly verifier: Verifier;
	private readonly slots: SlotStore;
	private readonly notifier?: EventNotifier;
	private readonly onPublishError: (error: unknown, event: EscrowEvent) => void;
	private readonly lock: ExclusiveLock;

	constructor(options: ChallengeEscrowOptions<TItem>) {
		this.ledger = options.ledger;
		this.payments = options.payments;
		this.verifier = options.verifier;
		this.slots = options.slots ?? new MemorySlotStore();
		this.notifier = options.notifier;
		this.onPublishError =
			options.onPublishError ??
			((error, event) =>
				console.error(`Failed to publish ${event.type} for ${event.itemId}:`, error));
		this.lock = options.lock ?? new KeyedMutex();
	}

	// ==================== Queries ====================

	async getSlotState(itemId: ItemId): Promise<SlotState> {
		return stateOf(await this.slots.getSlot(itemId));
	}

	/**
	 * True iff the item is listed and its slot is empty.
	 */
	async isPurchasable(itemId: ItemId): Promise<boolean> {
		const slot = await this.slots.getSlot(itemId);
		if (!slot || slot.intent) return false;
		return this.ledger.isListed(itemId);
	}

	async getReservation(itemId: ItemId): Promise<Reservation | null> {
		const slot = await this.slots.getSlot(itemId);
		return slot?.intent ? toReservation(itemId, slot.intent) : null;
	}

	async getAllowedActions(itemId: ItemId): Promise<SlotAction[]> {
		return getAllowedActions(await this.getSlotState(itemId));
	}

	// ==================== Transitions ====================

	/**
	 * List an item and open its slot.
	 */
	async list(itemId: ItemId, price: number, seller: Address): Promise<void> {
		await this.lock.runExclusive(itemId, async () => {
			assertAmount(price, "INVALID_PRICE");
			const slot = await this.slots.getSlot(itemId);
			if (!slotMachine(stateOf(slot)).canPerform("list")) {
				throw rejection(itemId, stateOf(slot), "list");
			}
			await this.ledger.list(itemId, price, seller);
			await this.slots.createSlot(itemId);
		});
	}

	/**
	 * Reserve an item: escrow the buyer's payment, keep the purchase right if
	 * one is used, and publish the challenge.
	 *
	 * @throws EscrowError ITEM_RESERVED if another buyer holds the slot
	 */
	async purchase(itemId: ItemId, request: PurchaseRequest): Promise<Reservation> {
		return this.lock.runExclusive(itemId, async () => {
			const { payment, capabilityId } = request;
			if (request.challenge.length === 0 || request.buyerPublicKey.length === 0) {
				throw new EscrowError(
					"Challenge and buyer public key must be non-empty",
					"INVALID_CHALLENGE",
					{ itemId },
				);
			}
			assertAmount(payment.amount, "INVALID_PAYMENT");

			const slot = this.admit(itemId, await this.slots.getSlot(itemId), "purchase");
			if (!(await this.ledger.isListed(itemId))) {
				throw rejection(itemId, "no-slot", "purchase");
			}
			const challenge = Uint8Array.from(request.challenge);
			if (slot.spentChallenges.includes(bytesToHex(challenge))) {
				throw new EscrowError(
					`Challenge was already used on item ${itemId}`,
					"CHALLENGE_REUSED",
					{ itemId },
				);
			}

			let capability: PurchaseCapability | undefined;
			if (capabilityId !== undefined) {
				await this.checkCapability(itemId, capabilityId, payment);
				capability = await this.ledger.surrenderCapability(
					capabilityId,
					payment.payer,
				);
			} else {
				const price = await this.ledger.priceOf(itemId);
				if (payment.amount !== price) {
					throw new EscrowError(
						`Payment of ${payment.amount} does not match price ${price}`,
						"INVALID_PAYMENT",
						{ itemId, amount: payment.amount, price },
					);
				}
			}

			let escrowedFunds: HeldFunds;
			try {
				escrowedFunds = await this.payments.escrow(payment);
			} catch (err) {
				if (capability) {
					await this.ledger.restoreCapability(capability, payment.payer);
				}
				throw err;
			}

			const intent: PurchaseIntent = {
				challenge,
				buyerPublicKey: Uint8Array.from(request.buyerPublicKey),
				escrowedFunds,
				buyerAddress: payment.payer,
				...(capability ? { exclusiveCapability: capability } : {}),
				reservedAt: Date.now(),
			};
			await this.slots.reserve(itemId, intent);
			await this.publish({
				type: CHALLENGE_ISSUED,
				itemId,
				challenge: intent.challenge,
				buyerAddress: intent.buyerAddress,
			});
			return toReservation(itemId, intent);
		});
	}

	/**
	 * Answer the pending challenge.
	 *
	 * The reservation is claimed before the verifier runs, so a second call
	 * fails with NOTHING_RESERVED whatever the first call's outcome. A failed
	 * verification is a normal outcome: the buyer is refunded in full and the
	 * item stays listed.
	 */
	async submitResponse(
		itemId: ItemId,
		signature: Uint8Array,
		caller: Address,
	): Promise<ResponseResult<TItem>> {
		return this.lock.runExclusive(itemId, async () => {
			this.admit(itemId, await this.slots.getSlot(itemId), "settle");
			await this.assertSeller(itemId, caller);

			const intent = await this.slots.takeIntent(itemId);
			let verified: boolean;
			try {
				verified = await this.verifier.verify(
					intent.buyerPublicKey,
					signature,
					intent.challenge,
				);
			} catch (err) {
				await this.slots.reserve(itemId, intent);
				throw err;
			}

			if (!verified) {
				const { refund, capability } = await this.refund(intent);
				return {
					outcome: "refunded",
					itemId,
					refund,
					capability,
				} satisfies RefundedResult;
			}
			return this.settle(itemId, intent);
		});
	}

	/**
	 * Buyer's unconditional exit while reserved.
	 *
	 * @throws EscrowError NOT_BUYER if `caller` is not the recorded buyer
	 */
	async withdraw(itemId: ItemId, caller: Address): Promise<WithdrawResult> {
		return this.lock.runExclusive(itemId, async () => {
			const slot = this.admit(itemId, await this.slots.getSlot(itemId), "withdraw");
			if (slot.intent?.buyerAddress !== caller) {
				throw new EscrowError(
					`Only the buyer can withdraw from item ${itemId}`,
					"NOT_BUYER",
					{ itemId, caller },
				);
			}

			const intent = await this.slots.takeIntent(itemId);
			const { refund, capability } = await this.refund(intent);
			await this.publish({
				type: CHALLENGE_WITHDRAWN,
				itemId,
				buyerAddress: intent.buyerAddress,
			});
			return { itemId, refund, capability };
		});
	}

	/**
	 * Remove a listing, refunding a pending buyer first.
	 */
	async delist(itemId: ItemId, caller: Address): Promise<RemovalResult> {
		return this.lock.runExclusive(itemId, async () => {
			const resolved = await this.prepareRemoval(itemId, caller, "delist");
			await this.ledger.delist(itemId, caller);
			await this.slots.removeSlot(itemId);
			return { itemId, ...resolved };
		});
	}

	/**
	 * Take an item back from the ledger, refunding a pending buyer first.
	 */
	async take(itemId: ItemId, caller: Address): Promise<TakeResult<TItem>> {
		return this.lock.runExclusive(itemId, async () => {
			const resolved = await this.prepareRemoval(itemId, caller, "take");
			const item = await this.ledger.take(itemId, caller);
			await this.slots.removeSlot(itemId);
			return { itemId, item, ...resolved };
		});
	}

	// ==================== Internals ====================

	private async settle(
		itemId: ItemId,
		intent: PurchaseIntent,
	): Promise<SettledResult<TItem>> {
		const payment = await this.payments.forward(intent.escrowedFunds);
		let outcome: PurchaseOutcome<TItem>;
		try {
			outcome = intent.exclusiveCapability
				? await this.ledger.purchaseWithCapability(
						intent.exclusiveCapability,
						payment,
					)
				: await this.ledger.purchase(itemId, payment);
		} catch (err) {
			// Put the reservation back exactly as it was
			const escrowedFunds = await this.payments.escrow(payment);
			await this.slots.reserve(itemId, { ...intent, escrowedFunds });
			throw err;
		}

		const capability = await this.disposeCapability(intent, "consume");
		await this.slots.removeSlot(itemId);
		return {
			outcome: "settled",
			itemId,
			item: outcome.item,
			receipt: outcome.receipt,
			capability,
		};
	}

	private async refund(
		intent: PurchaseIntent,
	): Promise<{ refund: Refund; capability: CapabilityDisposition }> {
		await this.payments.release(intent.escrowedFunds, intent.buyerAddress);
		const capability = await this.disposeCapability(intent, "return");
		return {
			refund: {
				recipient: intent.buyerAddress,
				amount: intent.escrowedFunds.amount,
			},
			capability,
		};
	}

	private async disposeCapability(
		intent: PurchaseIntent,
		fate: CapabilityFate,
	): Promise<CapabilityDisposition> {
		const capability = intent.exclusiveCapability;
		if (!capability) return { kind: "none" };

		switch (fate) {
			case "consume":
				// The ledger consumed it during purchaseWithCapability
				return { kind: "consumed", capabilityId: capability.id };
			case "return":
				await this.ledger.restoreCapability(capability, intent.buyerAddress);
				return {
					kind: "returned",
					capabilityId: capability.id,
					recipient: intent.buyerAddress,
				};
			default: {
				const unhandled: never = fate;
				throw new Error(`Unhandled capability fate: ${String(unhandled)}`);
			}
		}
	}

	private async prepareRemoval(
		itemId: ItemId,
		caller: Address,
		action: "delist" | "take",
	): Promise<Resolution> {
		const slot = this.admit(itemId, await this.slots.getSlot(itemId), action);
		await this.assertSeller(itemId, caller);
		if (!(await this.ledger.isListed(itemId))) {
			throw new EscrowError(`Item ${itemId} is not listed`, "NOT_LISTED", {
				itemId,
			});
		}
		if (!slot.intent) return { capability: { kind: "none" } };

		const intent = await this.slots.takeIntent(itemId);
		return this.refund(intent);
	}

	private async checkCapability(
		itemId: ItemId,
		capabilityId: string,
		payment: Payment,
	): Promise<void> {
		const capability = await this.ledger.capabilityOf(capabilityId);
		if (
			!capability ||
			capability.itemId !== itemId ||
			capability.holder !== payment.payer
		) {
			throw new EscrowError(
				`Purchase right ${capabilityId} is not usable for item ${itemId}`,
				"INVALID_CAPABILITY",
				{ itemId, capabilityId },
			);
		}
		if (payment.amount < capability.minPrice) {
			throw new EscrowError(
				`Payment of ${payment.amount} is below the minimum price ${capability.minPrice}`,
				"INVALID_PAYMENT",
				{ itemId, amount: payment.amount, minPrice: capability.minPrice },
			);
		}
	}

	private async assertSeller(itemId: ItemId, caller: Address): Promise<void> {
		const seller = await this.ledger.sellerOf(itemId);
		if (seller !== caller) {
			throw new EscrowError(
				`Only the seller of item ${itemId} can do this`,
				"NOT_SELLER",
				{ itemId, caller },
			);
		}
	}

	/**
	 * Check an action against the slot state machine.
	 */
	private admit(
		itemId: ItemId,
		slot: StoredSlot | null,
		action: SlotAction,
	): StoredSlot {
		const state = stateOf(slot);
		if (!slot || !slotMachine(state).canPerform(action)) {
			throw rejection(itemId, state, action);
		}
		return slot;
	}

	private async publish(event: EscrowEvent): Promise<void> {
		try {
			await this.notifier?.publish(event);
		} catch (error) {
			this.onPublishError(error, event);
		}
	}
}

function stateOf(slot: StoredSlot | null): SlotState {
	if (!slot) return "no-slot";
	return slot.intent ? "reserved" : "available";
}

/**
 * Map a refused transition to the error a caller can act on.
 */
function rejection(
	itemId: ItemId,
	state: SlotState,
	action: SlotAction,
): EscrowError {
	const details = { itemId, state, action };
	switch (action) {
		case "list":
			return new EscrowError(
				`Slot for item ${itemId} already exists`,
				"DUPLICATE_SLOT",
				details,
			);
		case "purchase":
			return state === "reserved"
				? new EscrowError(`Item ${itemId} is reserved`, "ITEM_RESERVED", details)
				: new EscrowError(`Item ${itemId} is not listed`, "NOT_LISTED", details);
		case "settle":
		case "refund":
		case "withdraw":
			return new EscrowError(
				`Nothing is reserved on item ${itemId}`,
				"NOTHING_RESERVED",
				details,
			);
		case "delist":
		case "take":
			return new EscrowError(`No slot for item ${itemId}`, "NO_SLOT", details);
		default: {
			const unhandled: never = action;
			throw new Error(`Unhandled action: ${String(unhandled)}`);
		}
	}
}

function assertAmount(value: number, code: EscrowErrorCode): void {
	if (!Number.isSafeInteger(value) || value <= 0) {
		throw new EscrowError(
			`Amount must be a positive integer, got ${value}`,
			code,
			{ value },
		);
	}
}

function toReservation(itemId: ItemId, intent: PurchaseIntent): Reservation {
	return {
		itemId,
		challenge: intent.challenge,
		buyerPublicKey: intent.buyerPublicKey,
		buyerAddress: intent.buyerAddress,
		amount: intent.escrowedFunds.amount,
		...(intent.exclusiveCapability
			? { capabilityId: intent.exclusiveCapability.id }
			: {}),
		reservedAt: intent.reservedAt,
	};
}
