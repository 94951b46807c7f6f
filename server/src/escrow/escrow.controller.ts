import {
	Body,
	Controller,
	DefaultValuePipe,
	Delete,
	Get,
	HttpCode,
	HttpStatus,
	Param,
	ParseIntPipe,
	Post,
	Query,
	Sse,
	UseGuards,
} from "@nestjs/common";
import {
	ApiBearerAuth,
	ApiBody,
	ApiConflictResponse,
	ApiCreatedResponse,
	ApiExtraModels,
	ApiForbiddenResponse,
	ApiNotFoundResponse,
	ApiOkResponse,
	ApiOperation,
	ApiParam,
	ApiQuery,
	ApiTags,
	ApiUnauthorizedResponse,
} from "@nestjs/swagger";
import { map, Observable } from "rxjs";
import { AuthGuard } from "../auth/auth.guard";
import { UserFromJwt } from "../auth/user.decorator";
import {
	type ApiEnvelope,
	ApiEnvelopeShellDto,
	envelope,
	getSchemaPathForDto,
	getSchemaPathForListDto,
} from "../common/dto/envelopes";
import {
	ServerSentEventsService,
	SseEvent,
} from "../common/server-sent-events.service";
import { User } from "../users/user.entity";
import { CreateItemInDto, GetItemDto, ListItemInDto, ReservationDto } from "./dto/item.dto";
import {
	IssuePurchaseRightInDto,
	PurchaseRightDto,
} from "./dto/purchase-right.dto";
import {
	EscrowEventDto,
	PurchaseInDto,
	RemovalOutDto,
	RespondInDto,
	ResponseOutDto,
} from "./dto/reservation.dto";
import { EscrowService } from "./escrow.service";

@ApiTags("2 - Items")
@ApiExtraModels(
	ApiEnvelopeShellDto,
	GetItemDto,
	ReservationDto,
	PurchaseRightDto,
	ResponseOutDto,
	RemovalOutDto,
	EscrowEventDto,
)
@Controller("api/v1/items")
export class EscrowController {
	constructor(
		private readonly escrow: EscrowService,
		private readonly sseService: ServerSentEventsService,
	) {}

	@Get("")
	@ApiQuery({
		name: "limit",
		required: false,
		description: "Max items to return (1–100)",
		schema: { type: "integer", minimum: 1, maximum: 100, example: 20 },
	})
	@ApiOkResponse({
		description: "Listed items, newest first",
		schema: getSchemaPathForListDto(GetItemDto),
	})
	@ApiOperation({ summary: "Items currently listed for sale" })
	async listed(
		@Query("limit", new DefaultValuePipe(20), ParseIntPipe) limit: number,
	): Promise<ApiEnvelope<GetItemDto[]>> {
		return envelope(await this.escrow.listed(limit));
	}

	@Sse("sse")
	@ApiOperation({ summary: "Stream of reservation events for all items" })
	sse(): Observable<SseEvent> {
		return this.sseService.itemEvents().pipe(map((event) => ({ data: event })));
	}

	@Post("")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiBody({ type: CreateItemInDto })
	@ApiCreatedResponse({
		description: "Item placed in custody, owned by the caller",
		schema: getSchemaPathForDto(GetItemDto),
	})
	@ApiUnauthorizedResponse({ description: "Missing/invalid JWT" })
	@ApiOperation({ summary: "Place a new item" })
	async create(
		@Body() dto: CreateItemInDto,
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<GetItemDto>> {
		return envelope(await this.escrow.createItem(user.publicKey, dto.name));
	}

	@Get(":externalId")
	@ApiParam({ name: "externalId", description: "Item external id" })
	@ApiOkResponse({
		description: "The item with its slot state",
		schema: getSchemaPathForDto(GetItemDto),
	})
	@ApiNotFoundResponse({ description: "Item not found" })
	@ApiOperation({ summary: "Get one item and its pending reservation" })
	async getOne(
		@Param("externalId") externalId: string,
	): Promise<ApiEnvelope<GetItemDto>> {
		return envelope(await this.escrow.getItem(externalId));
	}

	@Get(":externalId/events")
	@ApiOkResponse({
		description: "Challenge events in order",
		schema: getSchemaPathForListDto(EscrowEventDto),
	})
	@ApiOperation({ summary: "Event log of an item" })
	async events(
		@Param("externalId") externalId: string,
	): Promise<ApiEnvelope<EscrowEventDto[]>> {
		return envelope(await this.escrow.eventsFor(externalId));
	}

	@Sse(":externalId/sse")
	@ApiOperation({ summary: "Stream of reservation events for one item" })
	itemSse(@Param("externalId") externalId: string): Observable<SseEvent> {
		return this.sseService
			.itemEvents(externalId)
			.pipe(map((event) => ({ data: event })));
	}

	@Post(":externalId/listing")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiBody({ type: ListItemInDto })
	@ApiCreatedResponse({
		description: "Item listed",
		schema: getSchemaPathForDto(GetItemDto),
	})
	@ApiForbiddenResponse({ description: "Caller does not own the item" })
	@ApiConflictResponse({ description: "Item is already listed" })
	@ApiOperation({ summary: "List an item for sale" })
	async list(
		@Param("externalId") externalId: string,
		@Body() dto: ListItemInDto,
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<GetItemDto>> {
		return envelope(
			await this.escrow.list(externalId, dto.price, user.publicKey),
		);
	}

	@Delete(":externalId/listing")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOkResponse({
		description: "Listing removed, pending buyer refunded",
		schema: getSchemaPathForDto(RemovalOutDto),
	})
	@ApiForbiddenResponse({ description: "Caller is not the seller" })
	@ApiOperation({ summary: "Delist an item" })
	async delist(
		@Param("externalId") externalId: string,
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<RemovalOutDto>> {
		return envelope(await this.escrow.delist(externalId, user.publicKey));
	}

	@Post(":externalId/take")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@HttpCode(HttpStatus.OK)
	@ApiOkResponse({
		description: "Item handed back, pending buyer refunded",
		schema: getSchemaPathForDto(RemovalOutDto),
	})
	@ApiForbiddenResponse({ description: "Caller is not the seller" })
	@ApiOperation({ summary: "Take an item out of custody" })
	async take(
		@Param("externalId") externalId: string,
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<RemovalOutDto>> {
		return envelope(await this.escrow.take(externalId, user.publicKey));
	}

	@Post(":externalId/rights")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiBody({ type: IssuePurchaseRightInDto })
	@ApiCreatedResponse({
		description: "Right issued to the holder",
		schema: getSchemaPathForDto(PurchaseRightDto),
	})
	@ApiForbiddenResponse({ description: "Caller is not the seller" })
	@ApiOperation({ summary: "Issue an exclusive purchase right" })
	async issueRight(
		@Param("externalId") externalId: string,
		@Body() dto: IssuePurchaseRightInDto,
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<PurchaseRightDto>> {
		return envelope(
			await this.escrow.issueRight(
				externalId,
				dto.holder,
				dto.minPrice,
				user.publicKey,
			),
		);
	}

	@Post(":externalId/reservation")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiBody({ type: PurchaseInDto })
	@ApiCreatedResponse({
		description: "Item reserved, challenge published",
		schema: getSchemaPathForDto(ReservationDto),
	})
	@ApiConflictResponse({ description: "Item is reserved or not listed" })
	@ApiOperation({ summary: "Reserve an item with a challenge" })
	async purchase(
		@Param("externalId") externalId: string,
		@Body() dto: PurchaseInDto,
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<ReservationDto>> {
		return envelope(
			await this.escrow.purchase(externalId, user.publicKey, dto),
		);
	}

	@Post(":externalId/reservation/response")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@HttpCode(HttpStatus.OK)
	@ApiBody({ type: RespondInDto })
	@ApiOkResponse({
		description: "Settled, or refunded on a wrong response",
		schema: getSchemaPathForDto(ResponseOutDto),
	})
	@ApiForbiddenResponse({ description: "Caller is not the seller" })
	@ApiConflictResponse({ description: "Nothing is reserved" })
	@ApiOperation({ summary: "Answer the pending challenge" })
	async respond(
		@Param("externalId") externalId: string,
		@Body() dto: RespondInDto,
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<ResponseOutDto>> {
		return envelope(
			await this.escrow.respond(externalId, user.publicKey, dto.signature),
		);
	}

	@Delete(":externalId/reservation")
	@ApiBearerAuth()
	@UseGuards(AuthGuard)
	@ApiOkResponse({
		description: "Reservation withdrawn, buyer refunded",
		schema: getSchemaPathForDto(RemovalOutDto),
	})
	@ApiForbiddenResponse({ description: "Caller is not the buyer" })
	@ApiOperation({ summary: "Withdraw from a reservation" })
	async withdraw(
		@Param("externalId") externalId: string,
		@UserFromJwt() user: User,
	): Promise<ApiEnvelope<RemovalOutDto>> {
		return envelope(await this.escrow.withdraw(externalId, user.publicKey));
	}
}
