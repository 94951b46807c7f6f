import { Body, Controller, Headers, Post } from "@nestjs/common";
import {
	ApiBody,
	ApiCreatedResponse,
	ApiOperation,
	ApiTags,
	ApiUnauthorizedResponse,
} from "@nestjs/swagger";
import { AuthService } from "./auth.service";
import { RequestChallengeDto } from "./dto/request-challenge.dto";
import { VerifySignupDto } from "./dto/verify-signup.dto";

@ApiTags("0 - Auth")
@Controller("api/v1/auth")
export class AuthController {
	constructor(private readonly auth: AuthService) {}

	@Post("signup/challenge")
	@ApiBody({ type: RequestChallengeDto })
	@ApiCreatedResponse({ description: "Challenge to sign with the public key" })
	@ApiOperation({ summary: "Request a signup challenge" })
	challenge(
		@Body() dto: RequestChallengeDto,
		@Headers("origin") origin: string | undefined,
	) {
		return this.auth.createSignupChallenge(dto.publicKey, origin ?? "");
	}

	@Post("signup/verify")
	@ApiBody({ type: VerifySignupDto })
	@ApiCreatedResponse({ description: "Access token for the public key" })
	@ApiUnauthorizedResponse({ description: "Invalid or expired challenge" })
	@ApiOperation({ summary: "Verify a signed signup challenge" })
	verify(
		@Body() dto: VerifySignupDto,
		@Headers("origin") origin: string | undefined,
	) {
		return this.auth.verifySignup(
			dto.publicKey,
			dto.signature,
			dto.challengeId,
			origin ?? "",
		);
	}
}
