import type { ErrorHandler, FSMDefinition, FSMListener } from "./definition.ts";
import { FSM, type FSMOptions } from "./fsm.ts";
import {
	autoTransition,
	ignore,
	internal,
	permit,
	permitReentry,
	type Action,
	type Guard,
} from "./rule.ts";
import { StateDefinition } from "./state-definition.ts";

/**
 * Encapsulates the configuration of one state, so that large workflows can
 * be split into focused pieces.
 *
 * @example
 * ```typescript
 * const paid: StateHandler<S, E, Order> = {
 *   state: "PAID",
 *   configure: (cfg) => cfg.permit("SHIP", "SHIPPED").onEntry(sendReceipt),
 * };
 * builder.use(paid);
 * ```
 */
export type StateHandler<TState, TEvent, TContext> = {
	state: TState;
	configure: (
		configurator: StateConfigurator<TState, TEvent, TContext>
	) => StateConfigurator<TState, TEvent, TContext> | void;
};

/**
 * Fluent configuration of a single state. Obtained from
 * `FSMBuilder.configure(state)`; `and()` returns to the builder.
 *
 * Rules are tried in the order they are declared here, so more specific
 * (guarded) rules must come before more general ones.
 */
export class StateConfigurator<TState, TEvent, TContext> {
	constructor(
		readonly builder: FSMBuilder<TState, TEvent, TContext>,
		readonly definition: StateDefinition<TState, TEvent, TContext>
	) {}

	#add(
		fn: (def: StateDefinition<TState, TEvent, TContext>) => void
	): this {
		this.builder.assertDraft();
		fn(this.definition);
		return this;
	}

	/** Unconditional transition to `target` on `event`. */
	permit(event: TEvent, target: TState): this {
		return this.#add((d) => d.addRule(permit(event, target)));
	}

	/** Transition to `target` on `event` when `guard` holds. */
	permitIf(
		event: TEvent,
		target: TState,
		guard: Guard<TState, TEvent, TContext>
	): this {
		return this.#add((d) => d.addRule(permit(event, target, guard)));
	}

	/** Leaves and re-enters this state on `event` (exit and entry actions run). */
	permitReentry(event: TEvent): this {
		return this.#add((d) => d.addRule(permitReentry(event)));
	}

	permitReentryIf(event: TEvent, guard: Guard<TState, TEvent, TContext>): this {
		return this.#add((d) => d.addRule(permitReentry(event, guard)));
	}

	/** Consumes `event` without any effect; reported as "ignored". */
	ignore(event: TEvent): this {
		return this.#add((d) => d.addRule(ignore(event)));
	}

	ignoreIf(event: TEvent, guard: Guard<TState, TEvent, TContext>): this {
		return this.#add((d) => d.addRule(ignore(event, guard)));
	}

	/** Runs `action` on `event` without leaving the state. */
	internal(event: TEvent, action: Action<TState, TEvent, TContext>): this {
		return this.#add((d) => d.addRule(internal(event, action)));
	}

	internalIf(
		event: TEvent,
		action: Action<TState, TEvent, TContext>,
		guard: Guard<TState, TEvent, TContext>
	): this {
		return this.#add((d) => d.addRule(internal(event, action, guard)));
	}

	onEntry(action: Action<TState, TEvent, TContext>): this {
		return this.#add((d) => d.addEntryAction(action));
	}

	onExit(action: Action<TState, TEvent, TContext>): this {
		return this.#add((d) => d.addExitAction(action));
	}

	/** Marks the state as final: no event is accepted in it. */
	asFinal(): this {
		return this.#add((d) => d.markFinal());
	}

	/** Moves on to `target` as soon as this state is entered. */
	autoTransition(target: TState): this {
		return this.#add((d) => d.addRule(autoTransition(target)));
	}

	autoTransitionIf(target: TState, guard: Guard<TState, TEvent, TContext>): this {
		return this.#add((d) => d.addRule(autoTransition(target, guard)));
	}

	/** Back to the builder. */
	and(): FSMBuilder<TState, TEvent, TContext> {
		return this.builder;
	}
}

/**
 * Mutable, single-use draft of a state machine configuration.
 *
 * `build()` consumes the draft: it seals every state definition into a
 * read-only `FSMDefinition` and any further use of the builder throws.
 */
export class FSMBuilder<TState, TEvent, TContext> {
	#initial: TState | null = null;
	#states = new Map<TState, StateDefinition<TState, TEvent, TContext>>();
	#onAnyEntry: Action<TState, TEvent, TContext>[] = [];
	#onAnyExit: Action<TState, TEvent, TContext>[] = [];
	#onAnyTransition: Action<TState, TEvent, TContext>[] = [];
	#onError: ErrorHandler<TState, TEvent, TContext> | null = null;
	#listeners: FSMListener<TState, TEvent, TContext>[] = [];
	#built = false;

	constructor(public readonly options: FSMOptions = {}) {}

	/** Throws once `build()` has been called. */
	assertDraft(): void {
		if (this.#built) {
			throw new Error("FSM builder has already been built");
		}
	}

	initial(state: TState): this {
		this.assertDraft();
		this.#initial = state;
		return this;
	}

	/**
	 * Starts (or continues) the configuration of `state`. Calling it again for
	 * the same state appends to the existing configuration.
	 */
	configure(state: TState): StateConfigurator<TState, TEvent, TContext> {
		this.assertDraft();
		let def = this.#states.get(state);
		if (!def) {
			def = new StateDefinition<TState, TEvent, TContext>(state);
			this.#states.set(state, def);
		}
		return new StateConfigurator(this, def);
	}

	/** Applies a `StateHandler`. */
	use(handler: StateHandler<TState, TEvent, TContext>): this {
		handler.configure(this.configure(handler.state));
		return this;
	}

	onAnyEntry(action: Action<TState, TEvent, TContext>): this {
		this.assertDraft();
		this.#onAnyEntry.push(action);
		return this;
	}

	onAnyExit(action: Action<TState, TEvent, TContext>): this {
		this.assertDraft();
		this.#onAnyExit.push(action);
		return this;
	}

	onAnyTransition(action: Action<TState, TEvent, TContext>): this {
		this.assertDraft();
		this.#onAnyTransition.push(action);
		return this;
	}

	/** Sets the (single) error handler; a later call replaces an earlier one. */
	onError(handler: ErrorHandler<TState, TEvent, TContext>): this {
		this.assertDraft();
		this.#onError = handler;
		return this;
	}

	addListener(listener: FSMListener<TState, TEvent, TContext>): this {
		this.assertDraft();
		this.#listeners.push(listener);
		return this;
	}

	/** Produces the sealed definition and consumes the draft. */
	toDefinition(): FSMDefinition<TState, TEvent, TContext> {
		this.assertDraft();
		const initial = this.#initial;
		if (initial === null) {
			throw new Error("Initial state must be specified");
		}
		this.#built = true;

		const states = new Map<TState, StateDefinition<TState, TEvent, TContext>>();
		for (const [state, def] of this.#states) states.set(state, def.seal());

		return Object.freeze({
			initial,
			states,
			onAnyEntry: Object.freeze([...this.#onAnyEntry]),
			onAnyExit: Object.freeze([...this.#onAnyExit]),
			onAnyTransition: Object.freeze([...this.#onAnyTransition]),
			onError: this.#onError,
			listeners: Object.freeze([...this.#listeners]),
		});
	}

	/** Produces the FSM and consumes the draft. */
	build(): FSM<TState, TEvent, TContext> {
		return new FSM(this.toDefinition(), this.options);
	}
}

/**
 * Starts a new state machine draft.
 *
 * @template TState - Type of the state values
 * @template TEvent - Type of the event values
 * @template TContext - Type of the caller-owned context
 *
 * @example
 * ```typescript
 * type S = "CREATED" | "PAID" | "SHIPPED" | "DELIVERED";
 * type E = "PAY" | "SHIP" | "DELIVER";
 *
 * const fsm = createFsmBuilder<S, E, Order>()
 *   .initial("CREATED")
 *   .configure("CREATED").permit("PAY", "PAID").and()
 *   .configure("PAID").permit("SHIP", "SHIPPED").and()
 *   .configure("SHIPPED").permit("DELIVER", "DELIVERED").and()
 *   .configure("DELIVERED").asFinal().and()
 *   .build();
 * ```
 */
export function createFsmBuilder<TState, TEvent, TContext = unknown>(
	options: FSMOptions = {}
): FSMBuilder<TState, TEvent, TContext> {
	return new FSMBuilder<TState, TEvent, TContext>(options);
}
