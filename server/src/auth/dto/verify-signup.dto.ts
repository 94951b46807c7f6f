import { ApiProperty } from "@nestjs/swagger";
import { IsString, Length, Matches } from "class-validator";
import { RequestChallengeDto } from "./request-challenge.dto";

const HEX = /^[0-9a-f]+$/i;

export class VerifySignupDto extends RequestChallengeDto {
	@ApiProperty({ description: "BIP-340 signature over hashToSignHex, hex" })
	@IsString()
	@Matches(HEX, { message: "signature must be hex" })
	@Length(128, 128)
	signature!: string;

	@ApiProperty({ example: "V1StGXR8_Z5jdHi6" })
	@IsString()
	challengeId!: string;
}
