/**
 * Escrow Module
 *
 * Challenge-response escrow for exclusive, single-unit items.
 */

// Types
export type {
	SlotState,
	SlotAction,
	PurchaseIntent,
	PurchaseRequest,
	Reservation,
	CapabilityDisposition,
	Refund,
	SettledResult,
	RefundedResult,
	ResponseResult,
	WithdrawResult,
	RemovalResult,
	TakeResult,
	ChallengeIssued,
	ChallengeWithdrawn,
	EscrowEvent,
} from "./types.js";

export { CHALLENGE_ISSUED, CHALLENGE_WITHDRAWN } from "./types.js";

// State machine
export {
	SLOT_STATE_MACHINE,
	slotMachine,
	getAllowedActions,
} from "./slot-state-machine.js";

// Main class
export { ChallengeEscrow } from "./challenge-escrow.js";
export type { ChallengeEscrowOptions } from "./challenge-escrow.js";
export { createChallenge } from "./challenge.js";
