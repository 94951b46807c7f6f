/**
 * Contract layer types
 *
 * Types for describing slot state machines and the errors raised by the
 * escrow protocol.
 */

/**
 * Generic state definition for a state machine.
 */
export interface StateDefinition<TState extends string, TAction extends string> {
	/** The state name */
	name: TState;
	/** Actions allowed from this state */
	allowedActions: TAction[];
	/** Human-readable description of this state */
	description?: string;
}

/**
 * State transition definition.
 */
export interface StateTransition<
	TState extends string,
	TAction extends string,
> {
	/** Source state(s) for this transition */
	from: TState | TState[];
	/** Action that triggers this transition */
	action: TAction;
	/** Target state after transition */
	to: TState;
}

/**
 * State machine configuration.
 */
export interface StateMachineConfig<
	TState extends string,
	TAction extends string,
> {
	/** State a freshly created machine starts in */
	initialState: TState;
	/** All possible states */
	states: StateDefinition<TState, TAction>[];
	/** All possible transitions */
	transitions: StateTransition<TState, TAction>[];
}

export const ESCROW_ERROR_CODES = [
	// A reservation was attempted on an occupied slot; retry later
	"ITEM_RESERVED",
	// Withdrawal attempted by someone other than the recorded buyer
	"NOT_BUYER",
	// Seller-only operation attempted by someone else
	"NOT_SELLER",
	// Consistency guards
	"NOTHING_RESERVED",
	"DUPLICATE_SLOT",
	"NO_SLOT",
	// Listing ledger
	"UNKNOWN_ITEM",
	"NOT_LISTED",
	"ALREADY_LISTED",
	"INVALID_PRICE",
	"INVALID_CAPABILITY",
	// Input validation
	"INVALID_PAYMENT",
	"INVALID_CHALLENGE",
	"CHALLENGE_REUSED",
	// Payment transfer
	"INSUFFICIENT_FUNDS",
	"UNKNOWN_FUNDS",
	// State machine
	"UNKNOWN_STATE",
	"ACTION_NOT_ALLOWED",
] as const;
export type EscrowErrorCode = (typeof ESCROW_ERROR_CODES)[number];

/**
 * Error thrown by protocol operations and by the collaborators backing them.
 *
 * A failed verification is not an error: `submitResponse` reports it as a
 * refund.
 */
export class EscrowError extends Error {
	constructor(
		message: string,
		public readonly code: EscrowErrorCode,
		public readonly details?: unknown,
	) {
		super(message);
		this.name = "EscrowError";
	}
}

export function isEscrowError(
	err: unknown,
	code?: EscrowErrorCode,
): err is EscrowError {
	return err instanceof EscrowError && (code === undefined || err.code === code);
}
