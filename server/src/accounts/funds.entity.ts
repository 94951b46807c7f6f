import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryColumn,
	UpdateDateColumn,
} from "typeorm";

/**
 * - drawn: a spendable payment taken out of an account balance
 * - held: in escrow custody
 * - spent: paid out to an account
 */
export const FUNDS_STATUS = ["drawn", "held", "spent"] as const;
export type FundsStatus = (typeof FUNDS_STATUS)[number];

@Entity("funds")
export class Funds {
	@PrimaryColumn({ type: "text" })
	id!: string;

	/** Payer while drawn, depositor while held */
	@Index()
	@Column({ type: "text" })
	owner!: string;

	@Column({ type: "integer" })
	amount!: number;

	@Index()
	@Column({ type: "text" })
	status!: FundsStatus;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
