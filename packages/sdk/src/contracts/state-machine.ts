/**
 * State Machine
 *
 * A small generic state machine used to describe and validate lifecycle
 * transitions.
 */

import {
	EscrowError,
	StateDefinition,
	StateMachineConfig,
	StateTransition,
} from "./types.js";

/**
 * Generic state machine over typed states and actions.
 *
 * @example
 * ```typescript
 * type Door = "open" | "closed";
 * type DoorAction = "open" | "close";
 *
 * const machine = new StateMachine<Door, DoorAction>({
 *   initialState: "closed",
 *   states: [
 *     createState("closed", ["open"]),
 *     createState("open", ["close"]),
 *   ],
 *   transitions: [
 *     createTransition("closed", "open", "open"),
 *     createTransition("open", "close", "closed"),
 *   ],
 * });
 *
 * machine.perform("open");
 * console.log(machine.getState()); // "open"
 * ```
 */
export class StateMachine<TState extends string, TAction extends string> {
	private currentState: TState;
	private readonly stateMap: Map<TState, StateDefinition<TState, TAction>>;
	private readonly transitionMap: Map<string, StateTransition<TState, TAction>>;

	constructor(
		config: StateMachineConfig<TState, TAction>,
		initialState?: TState,
	) {
		this.stateMap = new Map();
		for (const state of config.states) {
			this.stateMap.set(state.name, state);
		}

		this.transitionMap = new Map();
		for (const transition of config.transitions) {
			const froms = Array.isArray(transition.from)
				? transition.from
				: [transition.from];
			for (const from of froms) {
				this.transitionMap.set(`${from}:${transition.action}`, transition);
			}
		}

		const state = initialState ?? config.initialState;
		this.assertKnown(state);
		this.currentState = state;
	}

	getState(): TState {
		return this.currentState;
	}

	/**
	 * Check if an action is allowed from the current state.
	 */
	canPerform(action: TAction): boolean {
		const state = this.stateMap.get(this.currentState);
		return state?.allowedActions.includes(action) ?? false;
	}

	getAllowedActions(): TAction[] {
		const state = this.stateMap.get(this.currentState);
		return state ? [...state.allowedActions] : [];
	}

	/**
	 * Preview what state would result from an action without performing it.
	 */
	previewTransition(action: TAction): TState | undefined {
		return this.transitionMap.get(`${this.currentState}:${action}`)?.to;
	}

	/**
	 * Perform an action, transitioning state if valid.
	 *
	 * @returns The new state after transition
	 * @throws EscrowError with code ACTION_NOT_ALLOWED
	 */
	perform(action: TAction): TState {
		const next = this.canPerform(action)
			? this.previewTransition(action)
			: undefined;
		if (next === undefined) {
			throw new EscrowError(
				`Action "${action}" is not allowed from state "${this.currentState}"`,
				"ACTION_NOT_ALLOWED",
				{
					action,
					currentState: this.currentState,
					allowedActions: this.getAllowedActions(),
				},
			);
		}
		this.currentState = next;
		return next;
	}

	private assertKnown(state: TState): void {
		if (!this.stateMap.has(state)) {
			throw new EscrowError(`Unknown state: ${state}`, "UNKNOWN_STATE", {
				state,
				validStates: Array.from(this.stateMap.keys()),
			});
		}
	}
}

/**
 * Helper to create a state definition.
 */
export function createState<TState extends string, TAction extends string>(
	name: TState,
	allowedActions: TAction[],
	options: { description?: string } = {},
): StateDefinition<TState, TAction> {
	return {
		name,
		allowedActions,
		description: options.description,
	};
}

/**
 * Helper to create a state transition.
 */
export function createTransition<TState extends string, TAction extends string>(
	from: TState | TState[],
	action: TAction,
	to: TState,
): StateTransition<TState, TAction> {
	return { from, action, to };
}
