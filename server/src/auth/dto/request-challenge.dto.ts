import { IsString, Matches, Length } from "class-validator";
import { ApiProperty } from "@nestjs/swagger";
const HEX = /^[0-9a-f]+$/i;

export class RequestChallengeDto {
	@ApiProperty({ type: "string", description: "x-only public key, hex" })
	@IsString()
	@Matches(HEX, { message: "publicKey must be hex" })
	@Length(64, 64, { message: "publicKey must be 64 (x-only) hex chars" })
	publicKey!: string;
}
