import { Column, CreateDateColumn, Entity, PrimaryColumn } from "typeorm";
import type { HeldFunds, PurchaseCapability } from "@challenge-escrow/sdk";

/**
 * A purchase intent with its byte fields hex-encoded.
 */
export type SerializedIntent = {
	challengeHex: string;
	buyerPublicKeyHex: string;
	escrowedFunds: HeldFunds;
	buyerAddress: string;
	exclusiveCapability?: PurchaseCapability;
	reservedAt: number;
};

@Entity("escrow_slots")
export class EscrowSlot {
	@PrimaryColumn({ type: "text" })
	itemExternalId!: string;

	@Column({ type: "simple-json", nullable: true })
	intent!: SerializedIntent | null;

	/** Hex-encoded challenges already used on this slot */
	@Column({ type: "simple-json" })
	spentChallenges!: string[];

	@CreateDateColumn()
	createdAt!: Date;
}
