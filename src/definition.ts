import type { Action } from "./rule.ts";
import type { StateDefinition } from "./state-definition.ts";

/**
 * Observer of dispatches. All callbacks are optional and best-effort: a
 * throwing listener is logged and skipped, it never changes the outcome.
 *
 * `event` is `null` for steps driven by auto-transitions.
 */
export type FSMListener<TState, TEvent, TContext> = {
	onStateEntry?: (state: TState, event: TEvent | null, context: TContext) => void;
	onStateExit?: (state: TState, event: TEvent | null, context: TContext) => void;
	onTransition?: (
		from: TState,
		to: TState,
		event: TEvent | null,
		context: TContext
	) => void;
	onTransitionError?: (
		state: TState,
		event: TEvent,
		context: TContext,
		error: unknown
	) => void;
};

/**
 * Recovers from an error thrown during a dispatch. The returned state is
 * reported as the resulting state of the (failed) dispatch.
 */
export type ErrorHandler<TState, TEvent, TContext> = (
	state: TState,
	event: TEvent,
	context: TContext,
	error: unknown
) => TState;

/**
 * The complete, read-only configuration of a state machine.
 *
 * Usually produced by `createFsmBuilder().build()`; may be written by hand.
 * `FSM` works on a frozen copy with every state definition sealed.
 */
export type FSMDefinition<TState, TEvent, TContext> = {
	readonly initial: TState | null;
	readonly states: ReadonlyMap<TState, StateDefinition<TState, TEvent, TContext>>;
	readonly onAnyEntry: readonly Action<TState, TEvent, TContext>[];
	readonly onAnyExit: readonly Action<TState, TEvent, TContext>[];
	readonly onAnyTransition: readonly Action<TState, TEvent, TContext>[];
	readonly onError: ErrorHandler<TState, TEvent, TContext> | null;
	readonly listeners: readonly FSMListener<TState, TEvent, TContext>[];
};
