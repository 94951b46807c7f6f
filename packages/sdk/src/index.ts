/**
 * Challenge Escrow SDK
 *
 * Reservation and settlement protocol for exclusive, single-unit items sold
 * through a challenge-response handshake.
 *
 * @example
 * ```typescript
 * import {
 *   ChallengeEscrow,
 *   MemoryListingLedger,
 *   MemoryPaymentTransfer,
 *   SchnorrVerifier,
 *   createChallenge,
 * } from "@challenge-escrow/sdk";
 *
 * const payments = new MemoryPaymentTransfer();
 * const ledger = new MemoryListingLedger<Ticket>(payments);
 * const escrow = new ChallengeEscrow({
 *   ledger,
 *   payments,
 *   verifier: new SchnorrVerifier(),
 * });
 *
 * await escrow.list(ticket.id, 100, seller);
 * await escrow.purchase(ticket.id, {
 *   challenge: createChallenge(),
 *   buyerPublicKey: ticketKey,
 *   payment: payments.draw(buyer, 100),
 * });
 * ```
 */

// Contracts - State machines and errors
export {
	// Types
	type StateDefinition,
	type StateTransition,
	type StateMachineConfig,
	type EscrowErrorCode,
	// Classes
	StateMachine,
	EscrowError,
	// Utilities
	ESCROW_ERROR_CODES,
	isEscrowError,
	createState,
	createTransition,
} from "./contracts/index.js";

// Protocol - Collaborator interfaces
export type {
	ItemId,
	Address,
	TransferableItem,
	Payment,
	HeldFunds,
	PurchaseCapability,
	TransferReceipt,
	PurchaseOutcome,
	ListingLedger,
	PaymentTransfer,
	EventNotifier,
	ExclusiveLock,
} from "./protocol/index.js";

// Storage - Slot stores
export {
	type StoredSlot,
	type SlotStore,
	MemorySlotStore,
} from "./storage/index.js";

// Verification - Challenge verifiers
export {
	type Verifier,
	type VerifierScheme,
	challengeDigest,
	SchnorrVerifier,
	EcdsaVerifier,
	VERIFIER_SCHEMES,
	isVerifierScheme,
	createVerifier,
} from "./verification/index.js";

// Memory - Reference collaborators
export {
	MemoryListingLedger,
	MemoryPaymentTransfer,
	MemoryEventLog,
} from "./memory/index.js";

// Utils
export {
	bytesToHex,
	hexToBytes,
	isHex,
	bytesEqual,
	KeyedMutex,
} from "./utils/index.js";

// Modules - Escrow
export {
	type SlotState,
	type SlotAction,
	type PurchaseIntent,
	type PurchaseRequest,
	type Reservation,
	type CapabilityDisposition,
	type Refund,
	type SettledResult,
	type RefundedResult,
	type ResponseResult,
	type WithdrawResult,
	type RemovalResult,
	type TakeResult,
	type ChallengeIssued,
	type ChallengeWithdrawn,
	type EscrowEvent,
	type ChallengeEscrowOptions,
	CHALLENGE_ISSUED,
	CHALLENGE_WITHDRAWN,
	SLOT_STATE_MACHINE,
	slotMachine,
	getAllowedActions,
	ChallengeEscrow,
	createChallenge,
} from "./modules/escrow/index.js";
