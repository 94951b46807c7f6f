import { Body, Controller, Get, Post, UseGuards } from "@nestjs/common";
import {
	ApiBearerAuth,
	ApiBody,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiOkResponse,
	ApiOperation,
	ApiTags,
	ApiUnauthorizedResponse,
} from "@nestjs/swagger";
import { AuthGuard } from "../auth/auth.guard";
import { UserFromJwt } from "../auth/user.decorator";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
} from "../common/dto/envelopes";
import { User } from "../users/user.entity";
import { AccountsService } from "./accounts.service";
import { FaucetInDto, GetAccountDto } from "./dto/account.dto";

@ApiTags("1 - Accounts")
@ApiExtraModels(ApiEnvelopeShellDto, GetAccountDto)
@ApiBearerAuth()
@UseGuards(AuthGuard)
@Controller("api/v1/accounts")
export class AccountsController {
	constructor(private readonly accounts: AccountsService) {}

	@Get("me")
	@ApiOkResponse({
		description: "The caller's account",
		schema: getSchemaPathForDto(GetAccountDto),
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiOperation({ summary: "Get the authenticated user's balance" })
	async me(@UserFromJwt() user: User): Promise<ApiEnvelope<GetAccountDto>> {
		return envelope(await this.accounts.get(user.publicKey));
	}

	@Post("me/faucet")
	@ApiBody({ type: FaucetInDto })
	@ApiCreatedResponse({
		description: "Balance after the credit",
		schema: getSchemaPathForDto(GetAccountDto),
	})
	@ApiForbiddenResponse({ description: "Faucet is disabled" })
	@ApiOperation({ summary: "Credit test funds to the caller" })
	async faucet(
		@UserFromJwt() user: User,
		@Body() dto: FaucetInDto,
	): Promise<ApiEnvelope<GetAccountDto>> {
		return envelope(await this.accounts.faucet(user.publicKey, dto.amount));
	}
}
