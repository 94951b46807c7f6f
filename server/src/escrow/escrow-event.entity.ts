import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
} from "typeorm";
import type { EscrowEvent } from "@challenge-escrow/sdk";

@Entity("escrow_events")
export class EscrowEventRecord {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	eventId!: string;

	@Column({ type: "text" })
	type!: EscrowEvent["type"];

	@Index()
	@Column({ type: "text" })
	itemExternalId!: string;

	@Column({ type: "text" })
	buyerAddress!: string;

	@Column({ type: "text", nullable: true })
	challengeHex!: string | null;

	@CreateDateColumn()
	createdAt!: Date;
}
