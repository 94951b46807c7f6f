import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	UpdateDateColumn,
} from "typeorm";

/**
 * - held: in the ledger's custody, listable
 * - taken: handed back to its owner, out of the ledger
 */
export const ITEM_STATUS = ["held", "taken"] as const;
export type ItemStatus = (typeof ITEM_STATUS)[number];

@Entity("items")
export class Item {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	externalId!: string;

	@Column({ type: "text" })
	name!: string;

	@Index()
	@Column({ type: "text" })
	ownerPubkey!: string;

	/** Set while listed */
	@Column({ type: "integer", nullable: true })
	listedPrice!: number | null;

	@Column({ type: "text", default: "held" })
	status!: ItemStatus;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
