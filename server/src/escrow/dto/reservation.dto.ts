import { ApiProperty, ApiPropertyOptional } from "@nestjs/swagger";
import {
	IsInt,
	IsOptional,
	IsString,
	Length,
	Matches,
	Min,
} from "class-validator";

const HEX = /^([0-9a-f]{2})+$/i;

export class PurchaseInDto {
	@ApiProperty({ description: "Fresh random challenge, hex (1 to 64 bytes)" })
	@IsString()
	@Matches(HEX, { message: "challenge must be hex" })
	@Length(2, 128)
	challenge!: string;

	@ApiProperty({
		description: "Public key the item must answer under, hex",
	})
	@IsString()
	@Matches(HEX, { message: "buyerPublicKey must be hex" })
	@Length(64, 130)
	buyerPublicKey!: string;

	@ApiProperty({ minimum: 1, description: "Amount drawn from the balance" })
	@IsInt()
	@Min(1)
	amount!: number;

	@ApiPropertyOptional({ description: "Purchase right to settle through" })
	@IsOptional()
	@IsString()
	capabilityId?: string;
}

export class RespondInDto {
	@ApiProperty({ description: "Signature over sha256(challenge), hex" })
	@IsString()
	@Matches(HEX, { message: "signature must be hex" })
	@Length(2, 144)
	signature!: string;
}

export class CapabilityDispositionDto {
	@ApiProperty({ enum: ["none", "consumed", "returned"] })
	kind!: "none" | "consumed" | "returned";

	@ApiPropertyOptional()
	capabilityId?: string;

	@ApiPropertyOptional()
	recipient?: string;
}

export class RefundDto {
	@ApiProperty()
	recipient!: string;

	@ApiProperty()
	amount!: number;
}

export class ResponseOutDto {
	@ApiProperty({ enum: ["settled", "refunded"] })
	outcome!: "settled" | "refunded";

	@ApiProperty()
	itemId!: string;

	@ApiPropertyOptional({ description: "New owner, when settled" })
	owner?: string;

	@ApiPropertyOptional({ type: RefundDto })
	refund?: RefundDto;

	@ApiProperty({ type: CapabilityDispositionDto })
	capability!: CapabilityDispositionDto;
}

export class RemovalOutDto {
	@ApiProperty()
	itemId!: string;

	@ApiPropertyOptional({ type: RefundDto })
	refund?: RefundDto;

	@ApiProperty({ type: CapabilityDispositionDto })
	capability!: CapabilityDispositionDto;
}

export class EscrowEventDto {
	@ApiProperty()
	eventId!: string;

	@ApiProperty({ enum: ["challenge-issued", "challenge-withdrawn"] })
	type!: "challenge-issued" | "challenge-withdrawn";

	@ApiProperty()
	itemId!: string;

	@ApiProperty()
	buyerAddress!: string;

	@ApiPropertyOptional()
	challengeHex?: string;

	@ApiProperty({ description: "Unix epoch in milliseconds" })
	createdAt!: number;
}
