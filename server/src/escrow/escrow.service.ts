import { Inject, Injectable, Logger, NotFoundException } from "@nestjs/common";
import { EventEmitter2 } from "@nestjs/event-emitter";
import { InjectRepository } from "@nestjs/typeorm";
import {
	bytesToHex,
	CapabilityDisposition,
	ChallengeEscrow,
	CHALLENGE_ISSUED,
	hexToBytes,
	Refund,
	Reservation,
	Verifier,
} from "@challenge-escrow/sdk";
import { randomUUID } from "node:crypto";
import type { EntityManager, Repository } from "typeorm";
import { TypeOrmPaymentTransfer } from "../accounts/typeorm-payment-transfer";
import {
	CHALLENGE_ISSUED_ID,
	CHALLENGE_WITHDRAWN_ID,
	RESERVATION_RESOLVED_ID,
	type ChallengeIssuedEvent,
	type ChallengeWithdrawnEvent,
	type ReservationResolvedEvent,
} from "../common/escrow.event";
import { UnitOfWork } from "../common/unit-of-work";
import { EscrowEventRecord } from "./escrow-event.entity";
import { EventLogNotifier } from "./event-log-notifier";
import { Item } from "./item.entity";
import { GetItemDto, ReservationDto } from "./dto/item.dto";
import { PurchaseRightDto } from "./dto/purchase-right.dto";
import {
	EscrowEventDto,
	PurchaseInDto,
	RemovalOutDto,
	ResponseOutDto,
} from "./dto/reservation.dto";
import { TypeOrmListingLedger, type OwnedItem } from "./typeorm-listing-ledger";
import { TypeOrmSlotStore } from "./typeorm-slot-store";

export const ESCROW_VERIFIER = Symbol("ESCROW_VERIFIER");

type EscrowContext = {
	escrow: ChallengeEscrow<OwnedItem>;
	ledger: TypeOrmListingLedger;
	payments: TypeOrmPaymentTransfer;
};

@Injectable()
export class EscrowService {
	private readonly logger = new Logger(EscrowService.name);

	constructor(
		@InjectRepository(Item) private readonly items: Repository<Item>,
		@InjectRepository(EscrowEventRecord)
		private readonly eventRecords: Repository<EscrowEventRecord>,
		@Inject(ESCROW_VERIFIER) private readonly verifier: Verifier,
		private readonly uow: UnitOfWork,
		private readonly events: EventEmitter2,
	) {}

	async createItem(owner: string, name: string): Promise<GetItemDto> {
		const item = await this.withEscrow(({ ledger }) => ledger.place(owner, name));
		this.logger.log(`Item ${item.externalId} created by ${owner}`);
		return this.getItem(item.externalId);
	}

	async getItem(externalId: string): Promise<GetItemDto> {
		const item = await this.items.findOne({ where: { externalId } });
		if (!item) throw new NotFoundException("Item not found");

		// Slot reads queue behind writers
		const { slot, allowedActions, reservation } = await this.withEscrow(
			async ({ escrow }) => ({
				slot: await escrow.getSlotState(externalId),
				allowedActions: await escrow.getAllowedActions(externalId),
				reservation: await escrow.getReservation(externalId),
			}),
		);
		return {
			externalId: item.externalId,
			name: item.name,
			owner: item.ownerPubkey,
			status: item.status,
			price: item.listedPrice ?? undefined,
			slot,
			allowedActions,
			reservation: reservation ? toReservationDto(reservation) : undefined,
			createdAt: item.createdAt.getTime(),
		};
	}

	async listed(limit: number): Promise<GetItemDto[]> {
		const rows = await this.items
			.createQueryBuilder("i")
			.where("i.listedPrice IS NOT NULL")
			.andWhere("i.status = :status", { status: "held" })
			.orderBy("i.createdAt", "DESC")
			.addOrderBy("i.id", "DESC")
			.take(Math.max(1, Math.min(limit, 100)))
			.getMany();
		return Promise.all(rows.map((row) => this.getItem(row.externalId)));
	}

	async list(itemId: string, price: number, seller: string): Promise<GetItemDto> {
		await this.withEscrow(({ escrow }) => escrow.list(itemId, price, seller));
		this.logger.log(`Item ${itemId} listed for ${price}`);
		return this.getItem(itemId);
	}

	async issueRight(
		itemId: string,
		holder: string,
		minPrice: number,
		issuer: string,
	): Promise<PurchaseRightDto> {
		const right = await this.withEscrow(({ ledger }) =>
			ledger.issueCapability(itemId, holder, minPrice, issuer),
		);
		return {
			id: right.id,
			itemId: right.itemId,
			holder: right.holder,
			minPrice: right.minPrice,
		};
	}

	/**
	 * Draw the amount from the buyer's balance and reserve the item with it.
	 * Nothing is debited when the reservation is refused.
	 */
	async purchase(
		itemId: string,
		buyer: string,
		dto: PurchaseInDto,
	): Promise<ReservationDto> {
		const reservation = await this.withEscrow(async ({ escrow, payments }) => {
			const payment = await payments.draw(buyer, dto.amount);
			return escrow.purchase(itemId, {
				challenge: hexToBytes(dto.challenge),
				buyerPublicKey: hexToBytes(dto.buyerPublicKey),
				payment,
				...(dto.capabilityId ? { capabilityId: dto.capabilityId } : {}),
			});
		});
		this.logger.log(`Item ${itemId} reserved by ${buyer}`);
		return toReservationDto(reservation);
	}

	async respond(
		itemId: string,
		seller: string,
		signatureHex: string,
	): Promise<ResponseOutDto> {
		const result = await this.withEscrow(({ escrow }) =>
			escrow.submitResponse(itemId, hexToBytes(signatureHex), seller),
		);

		if (result.outcome === "settled") {
			this.logger.log(`Item ${itemId} sold to ${result.receipt.buyer}`);
			this.emitResolved(itemId, "settled", result.receipt.buyer, result.receipt.amount);
			return {
				outcome: "settled",
				itemId,
				owner: result.item.owner,
				capability: toDispositionDto(result.capability),
			};
		}

		this.logger.log(`Response for item ${itemId} rejected, buyer refunded`);
		this.emitResolved(itemId, "refunded", result.refund.recipient, result.refund.amount);
		return {
			outcome: "refunded",
			itemId,
			refund: result.refund,
			capability: toDispositionDto(result.capability),
		};
	}

	async withdraw(itemId: string, buyer: string): Promise<RemovalOutDto> {
		const result = await this.withEscrow(({ escrow }) =>
			escrow.withdraw(itemId, buyer),
		);
		this.logger.log(`Buyer withdrew from item ${itemId}`);
		return toRemovalDto(itemId, result.refund, result.capability);
	}

	async delist(itemId: string, seller: string): Promise<RemovalOutDto> {
		const result = await this.withEscrow(({ escrow }) =>
			escrow.delist(itemId, seller),
		);
		this.logger.log(`Item ${itemId} delisted`);
		if (result.refund) {
			this.emitResolved(itemId, "refunded", result.refund.recipient, result.refund.amount);
		}
		return toRemovalDto(itemId, result.refund, result.capability);
	}

	async take(itemId: string, seller: string): Promise<RemovalOutDto> {
		const result = await this.withEscrow(({ escrow }) =>
			escrow.take(itemId, seller),
		);
		this.logger.log(`Item ${itemId} taken back by ${seller}`);
		if (result.refund) {
			this.emitResolved(itemId, "refunded", result.refund.recipient, result.refund.amount);
		}
		return toRemovalDto(itemId, result.refund, result.capability);
	}

	async eventsFor(itemId: string): Promise<EscrowEventDto[]> {
		const rows = await this.eventRecords.find({
			where: { itemExternalId: itemId },
			order: { id: "ASC" },
		});
		return rows.map((row) => ({
			eventId: row.eventId,
			type: row.type,
			itemId: row.itemExternalId,
			buyerAddress: row.buyerAddress,
			challengeHex: row.challengeHex ?? undefined,
			createdAt: row.createdAt.getTime(),
		}));
	}

	/**
	 * Run protocol work in one transaction, then broadcast the events it
	 * logged. Nothing is broadcast for work that rolled back.
	 */
	private async withEscrow<T>(
		work: (ctx: EscrowContext) => Promise<T>,
	): Promise<T> {
		const { result, published } = await this.uow.run(
			async (manager: EntityManager) => {
				const notifier = new EventLogNotifier(manager);
				const ctx = this.context(manager, notifier);
				const result = await work(ctx);
				return { result, published: notifier.published() };
			},
		);
		for (const record of published) this.broadcast(record);
		return result;
	}

	private context(
		manager: EntityManager,
		notifier: EventLogNotifier,
	): EscrowContext {
		const payments = new TypeOrmPaymentTransfer(manager);
		const ledger = new TypeOrmListingLedger(manager, payments);
		const escrow = new ChallengeEscrow<OwnedItem>({
			ledger,
			payments,
			verifier: this.verifier,
			slots: new TypeOrmSlotStore(manager),
			notifier,
			onPublishError: (error, event) =>
				this.logger.error(
					`Failed to log ${event.type} for item ${event.itemId}`,
					error instanceof Error ? error.stack : String(error),
				),
		});
		return { escrow, ledger, payments };
	}

	private broadcast(record: EscrowEventRecord) {
		if (record.type === CHALLENGE_ISSUED) {
			this.events.emit(CHALLENGE_ISSUED_ID, {
				eventId: record.eventId,
				itemId: record.itemExternalId,
				buyerAddress: record.buyerAddress,
				challengeHex: record.challengeHex ?? "",
				issuedAt: record.createdAt.toISOString(),
			} satisfies ChallengeIssuedEvent);
			return;
		}
		this.events.emit(CHALLENGE_WITHDRAWN_ID, {
			eventId: record.eventId,
			itemId: record.itemExternalId,
			buyerAddress: record.buyerAddress,
			withdrawnAt: record.createdAt.toISOString(),
		} satisfies ChallengeWithdrawnEvent);
	}

	private emitResolved(
		itemId: string,
		outcome: ReservationResolvedEvent["outcome"],
		buyerAddress: string,
		amount: number,
	) {
		this.events.emit(RESERVATION_RESOLVED_ID, {
			eventId: randomUUID(),
			itemId,
			outcome,
			buyerAddress,
			amount,
			resolvedAt: new Date().toISOString(),
		} satisfies ReservationResolvedEvent);
	}
}

function toReservationDto(reservation: Reservation): ReservationDto {
	return {
		itemId: reservation.itemId,
		challengeHex: bytesToHex(reservation.challenge),
		buyerPublicKeyHex: bytesToHex(reservation.buyerPublicKey),
		buyerAddress: reservation.buyerAddress,
		amount: reservation.amount,
		capabilityId: reservation.capabilityId,
		reservedAt: reservation.reservedAt,
	};
}

function toDispositionDto(disposition: CapabilityDisposition) {
	switch (disposition.kind) {
		case "none":
			return { kind: disposition.kind };
		case "consumed":
			return { kind: disposition.kind, capabilityId: disposition.capabilityId };
		case "returned":
			return {
				kind: disposition.kind,
				capabilityId: disposition.capabilityId,
				recipient: disposition.recipient,
			};
	}
}

function toRemovalDto(
	itemId: string,
	refund: Refund | undefined,
	capability: CapabilityDisposition,
): RemovalOutDto {
	return {
		itemId,
		refund,
		capability: toDispositionDto(capability),
	};
}
