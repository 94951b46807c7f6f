import { Column, Entity, PrimaryColumn, UpdateDateColumn } from "typeorm";

@Entity("accounts")
export class Account {
	/** Owner's public key, hex */
	@PrimaryColumn({ type: "text" })
	address!: string;

	@Column({ type: "integer", default: 0 })
	balance!: number;

	@UpdateDateColumn()
	updatedAt!: Date;
}
