import {
	Column,
	CreateDateColumn,
	Entity,
	Index,
	PrimaryGeneratedColumn,
	UpdateDateColumn,
} from "typeorm";

/**
 * - active: in its holder's hands
 * - surrendered: kept with a pending reservation
 * - consumed: used to buy the item
 * - revoked: the listing ended
 */
export const PURCHASE_RIGHT_STATUS = [
	"active",
	"surrendered",
	"consumed",
	"revoked",
] as const;
export type PurchaseRightStatus = (typeof PURCHASE_RIGHT_STATUS)[number];

@Entity("purchase_rights")
export class PurchaseRight {
	@PrimaryGeneratedColumn()
	id!: number;

	@Index({ unique: true })
	@Column({ type: "text" })
	externalId!: string;

	@Index()
	@Column({ type: "text" })
	itemExternalId!: string;

	@Column({ type: "text" })
	holderPubkey!: string;

	@Column({ type: "integer" })
	minPrice!: number;

	@Column({ type: "text", default: "active" })
	status!: PurchaseRightStatus;

	@CreateDateColumn()
	createdAt!: Date;

	@UpdateDateColumn()
	updatedAt!: Date;
}
