/**
 * Contracts module - State machines and protocol errors
 */

// Types
export type {
	StateDefinition,
	StateTransition,
	StateMachineConfig,
	EscrowErrorCode,
} from "./types.js";

export { EscrowError, ESCROW_ERROR_CODES, isEscrowError } from "./types.js";

// State machine
export {
	StateMachine,
	createState,
	createTransition,
} from "./state-machine.js";
