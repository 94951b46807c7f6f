/**
 * Slot State Machine Configuration
 *
 * Defines the lifecycle of a single item's escrow slot.
 */

import {
	StateMachine,
	StateMachineConfig,
	createState,
	createTransition,
} from "../../contracts/index.js";
import { SlotAction, SlotState } from "./types.js";

/**
 * Slot state machine.
 *
 * States:
 * - no-slot: not listed under the protocol
 * - available: listed and purchasable
 * - reserved: a buyer's intent is pending
 *
 * Settlement sells the item, so it leaves no slot behind. A refund or a
 * withdrawal frees the slot for the next buyer.
 */
export const SLOT_STATE_MACHINE: StateMachineConfig<SlotState, SlotAction> = {
	initialState: "no-slot",
	states: [
		createState<SlotState, SlotAction>("no-slot", ["list"], {
			description: "Item not listed under the protocol",
		}),
		createState<SlotState, SlotAction>(
			"available",
			["purchase", "delist", "take"],
			{
				description: "Listed, slot empty, purchasable",
			},
		),
		createState<SlotState, SlotAction>(
			"reserved",
			["settle", "refund", "withdraw", "delist", "take"],
			{
				description: "A purchase intent is waiting for the seller's response",
			},
		),
	],
	transitions: [
		createTransition<SlotState, SlotAction>("no-slot", "list", "available"),
		createTransition<SlotState, SlotAction>("available", "purchase", "reserved"),

		// Seller's response
		createTransition<SlotState, SlotAction>("reserved", "settle", "no-slot"),
		createTransition<SlotState, SlotAction>("reserved", "refund", "available"),

		// Buyer's safety valve
		createTransition<SlotState, SlotAction>("reserved", "withdraw", "available"),

		// Seller-initiated removal, from any listed state
		createTransition<SlotState, SlotAction>(
			["available", "reserved"],
			"delist",
			"no-slot",
		),
		createTransition<SlotState, SlotAction>(
			["available", "reserved"],
			"take",
			"no-slot",
		),
	],
};

/**
 * Create a state machine positioned at a slot's current state.
 */
export function slotMachine(state: SlotState): StateMachine<SlotState, SlotAction> {
	return new StateMachine(SLOT_STATE_MACHINE, state);
}

/**
 * Get the allowed actions for a state.
 */
export function getAllowedActions(state: SlotState): SlotAction[] {
	return slotMachine(state).getAllowedActions();
}
