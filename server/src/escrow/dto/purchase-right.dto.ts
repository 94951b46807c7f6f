import { ApiProperty } from "@nestjs/swagger";
import { IsInt, IsString, Length, Matches, Min } from "class-validator";

const HEX = /^[0-9a-f]+$/i;

export class IssuePurchaseRightInDto {
	@ApiProperty({ description: "Public key of the buyer receiving the right" })
	@IsString()
	@Matches(HEX, { message: "holder must be hex" })
	@Length(64, 64)
	holder!: string;

	@ApiProperty({ minimum: 1 })
	@IsInt()
	@Min(1)
	minPrice!: number;
}

export class PurchaseRightDto {
	@ApiProperty()
	id!: string;

	@ApiProperty()
	itemId!: string;

	@ApiProperty()
	holder!: string;

	@ApiProperty()
	minPrice!: number;
}
