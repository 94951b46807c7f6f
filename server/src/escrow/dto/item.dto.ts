import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import { IsInt, IsString, Length, Min } from "class-validator";
import type { SlotAction, SlotState } from "@challenge-escrow/sdk";
import { ITEM_STATUS, ItemStatus } from "../item.entity";

export class CreateItemInDto {
	@ApiProperty({ example: "Concert ticket, row A seat 1" })
	@IsString()
	@Length(1, 200)
	name!: string;
}

export class ListItemInDto {
	@ApiProperty({ minimum: 1, description: "Price in the smallest unit" })
	@IsInt()
	@Min(1)
	price!: number;
}

export class ReservationDto {
	@ApiProperty()
	itemId!: string;

	@ApiProperty({ description: "Buyer-chosen challenge, hex" })
	challengeHex!: string;

	@ApiProperty({ description: "Key the seller must answer under, hex" })
	buyerPublicKeyHex!: string;

	@ApiProperty()
	buyerAddress!: string;

	@ApiProperty()
	amount!: number;

	@ApiPropertyOptional()
	capabilityId?: string;

	@ApiProperty({ description: "Unix epoch in milliseconds" })
	reservedAt!: number;
}

export class GetItemDto {
	@ApiProperty({ example: "q3f7p9n4z81k6c0b" })
	externalId!: string;

	@ApiProperty()
	name!: string;

	@ApiProperty({ description: "Owner public key" })
	owner!: string;

	@ApiProperty({ enum: ITEM_STATUS })
	status!: ItemStatus;

	@ApiPropertyOptional({ description: "Set while listed" })
	price?: number;

	@ApiProperty({ enum: ["no-slot", "available", "reserved"] })
	slot!: SlotState;

	@ApiProperty({
		isArray: true,
		enum: ["list", "purchase", "settle", "refund", "withdraw", "delist", "take"],
		description: "Protocol actions the slot state admits",
	})
	allowedActions!: SlotAction[];

	@ApiPropertyOptional({ type: ReservationDto })
	reservation?: ReservationDto;

	@ApiProperty({ description: "Unix epoch in milliseconds" })
	createdAt!: number;
}
