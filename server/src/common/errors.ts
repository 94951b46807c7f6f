import { HttpStatus } from "@nestjs/common";
import type { EscrowErrorCode } from "@challenge-escrow/sdk";

export function toError(err: unknown): Error {
	return err instanceof Error
		? err
		: new Error("Invalid error type", { cause: err });
}

/**
 * HTTP status for every protocol error code.
 */
export const ESCROW_ERROR_STATUS: Record<EscrowErrorCode, HttpStatus> = {
	ITEM_RESERVED: HttpStatus.CONFLICT,
	NOT_BUYER: HttpStatus.FORBIDDEN,
	NOT_SELLER: HttpStatus.FORBIDDEN,
	NOTHING_RESERVED: HttpStatus.CONFLICT,
	DUPLICATE_SLOT: HttpStatus.CONFLICT,
	NO_SLOT: HttpStatus.NOT_FOUND,
	UNKNOWN_ITEM: HttpStatus.NOT_FOUND,
	NOT_LISTED: HttpStatus.CONFLICT,
	ALREADY_LISTED: HttpStatus.CONFLICT,
	INVALID_PRICE: HttpStatus.BAD_REQUEST,
	INVALID_CAPABILITY: HttpStatus.BAD_REQUEST,
	INVALID_PAYMENT: HttpStatus.BAD_REQUEST,
	INVALID_CHALLENGE: HttpStatus.BAD_REQUEST,
	CHALLENGE_REUSED: HttpStatus.CONFLICT,
	INSUFFICIENT_FUNDS: HttpStatus.PAYMENT_REQUIRED,
	// Ledger and state machine invariants; reaching these is a server bug
	UNKNOWN_FUNDS: HttpStatus.INTERNAL_SERVER_ERROR,
	UNKNOWN_STATE: HttpStatus.INTERNAL_SERVER_ERROR,
	ACTION_NOT_ALLOWED: HttpStatus.INTERNAL_SERVER_ERROR,
};
