import { ApiProperty } from "@nestjs/swagger";
import { IsInt, Max, Min } from "class-validator";

export class GetAccountDto {
	@ApiProperty({ description: "Account address (the user's public key)" })
	address!: string;

	@ApiProperty({ description: "Spendable balance in the smallest unit" })
	balance!: number;
}

export class FaucetInDto {
	@ApiProperty({ minimum: 1, maximum: 1_000_000, example: 1000 })
	@IsInt()
	@Min(1)
	@Max(1_000_000)
	amount!: number;
}
