import { createClog } from "@marianmeres/clog";
import type { FSMDefinition, FSMListener } from "./definition.ts";
import {
	createDebugInfo,
	failed,
	formatDebugInfo,
	ResultCache,
	type DebugInfo,
	type DispatchResult,
	type ValidationResult,
} from "./result.ts";
import type { Action, EventRule, TransitionInfo } from "./rule.ts";
import type { StateDefinition } from "./state-definition.ts";
import { toMermaid, toPlantUML, type DiagramOptions } from "./to-diagram.ts";
import { validateDefinition } from "./validate.ts";

/**
 * Logger interface compatible with console and @marianmeres/clog.
 * All methods accept variadic arguments and return a string.
 */
export interface Logger {
	debug: (...args: unknown[]) => string;
	log: (...args: unknown[]) => string;
	warn: (...args: unknown[]) => string;
	error: (...args: unknown[]) => string;
}

/** Default namespaced logger. */
const defaultLogger: Logger = createClog("fsm");

/** Engine options. */
export type FSMOptions = {
	/** Enable debug logging (default: false) */
	debug?: boolean;
	/** Custom logger implementing Logger interface (default: clog "fsm") */
	logger?: Logger;
	/**
	 * Maximum number of auto-transitions chained by a single dispatch
	 * (default: 100). Exceeding it fails the dispatch with an
	 * `AutoTransitionLimitError`, which is what a configuration with an
	 * auto-transition cycle would otherwise run into as a stack overflow.
	 */
	maxAutoTransitions?: number;
};

/** Snapshot of a configuration, for introspection and diagrams. */
export type FSMInfo<TState, TEvent> = {
	initialState: TState | null;
	states: TState[];
	events: TEvent[];
	transitions: TransitionInfo<TState, TEvent>[];
};

/** Thrown (and then handled like any runtime error) by a runaway auto chase. */
export class AutoTransitionLimitError extends Error {
	constructor(
		public readonly state: unknown,
		public readonly limit: number
	) {
		super(
			`Auto-transition limit of ${limit} exceeded ` +
				`while entering state "${String(state)}"`
		);
		this.name = "AutoTransitionLimitError";
	}
}

const DEFAULT_MAX_AUTO_TRANSITIONS = 100;

/** Factory equivalent to `new FSM(definition, options)`. */
export function createFsm<TState, TEvent, TContext = unknown>(
	definition: FSMDefinition<TState, TEvent, TContext>,
	options: FSMOptions = {}
): FSM<TState, TEvent, TContext> {
	return new FSM<TState, TEvent, TContext>(definition, options);
}

/** Extracts a message and a type name from anything thrown. */
function describeError(error: unknown): { name: string; message: string } {
	if (error instanceof Error) {
		return { name: error.name, message: error.message };
	}
	return { name: "NonError", message: String(error) };
}

/**
 * Frozen copy of `definition` owning its own state map. Sealed state
 * definitions are shared, unsealed ones are replaced by sealed copies.
 */
function sealDefinition<TState, TEvent, TContext>(
	definition: FSMDefinition<TState, TEvent, TContext>
): FSMDefinition<TState, TEvent, TContext> {
	const states = new Map<TState, StateDefinition<TState, TEvent, TContext>>();
	for (const [state, def] of definition.states) {
		states.set(state, def.sealed ? def : def.seal());
	}

	return Object.freeze({
		initial: definition.initial,
		states,
		onAnyEntry: Object.freeze([...definition.onAnyEntry]),
		onAnyExit: Object.freeze([...definition.onAnyExit]),
		onAnyTransition: Object.freeze([...definition.onAnyTransition]),
		onError: definition.onError,
		listeners: Object.freeze([...definition.listeners]),
	});
}

/**
 * A synchronous, stateless transition dispatcher.
 *
 * The FSM does not hold a "current" state: every call gets the state, the
 * event and the context from the caller and returns where the caller ends
 * up. The configuration is read-only, so a single instance may be shared
 * freely.
 *
 * **Rule selection:** the rules registered for the event in the current
 * state are tried in declaration order; the first one without a guard or
 * with a guard returning true wins.
 *
 * **Transition protocol** (from → to):
 * 1. `onStateExit` listeners
 * 2. global exit actions, state exit actions (skipped when from === to,
 *    except for reentry rules)
 * 3. global transition actions, `onTransition` listeners
 * 4. global entry actions, state entry actions (same skip rule as 2.)
 * 5. `onStateEntry` listeners
 * 6. the first applicable auto-transition of the target state, if any and
 *    if the target is not final, repeats the protocol
 *
 * Nothing ever throws out of `fire`/`fireWithResult`: failures are reported
 * in the result, optionally after consulting the configured error handler.
 *
 * @template TState - Type of the state values
 * @template TEvent - Type of the event values
 * @template TContext - Type of the caller-owned context
 *
 * @example
 * ```typescript
 * const fsm = createFsmBuilder<"IDLE" | "LOADING", "load" | "done", Ctx>()
 *   .initial("IDLE")
 *   .configure("IDLE").permit("load", "LOADING").and()
 *   .configure("LOADING").permit("done", "IDLE").and()
 *   .build();
 *
 * fsm.fire("IDLE", "load", ctx); // → "LOADING"
 * ```
 */
export class FSM<TState, TEvent, TContext = unknown> {
	/** Logger instance */
	#logger: Logger;

	/** Debug mode flag */
	#debug: boolean;

	#maxAutoTransitions: number;

	#results = new ResultCache<TState, TEvent>();

	/** The configuration in use; every state definition in it is sealed. */
	public readonly definition: FSMDefinition<TState, TEvent, TContext>;

	/**
	 * Creates a new FSM instance.
	 *
	 * The definition is copied and its state definitions sealed, so later
	 * changes to a hand-written definition never reach this instance.
	 *
	 * @param definition - The configuration; never mutated by the FSM
	 * @param options - Logging and safety options
	 */
	constructor(
		definition: FSMDefinition<TState, TEvent, TContext>,
		options: FSMOptions = {}
	) {
		const max = options.maxAutoTransitions ?? DEFAULT_MAX_AUTO_TRANSITIONS;
		if (!Number.isInteger(max) || max < 1) {
			throw new TypeError(
				`maxAutoTransitions must be a positive integer (got ${max})`
			);
		}
		this.#maxAutoTransitions = max;
		this.#debug = options.debug ?? false;
		this.#logger = options.logger ?? defaultLogger;
		this.definition = sealDefinition(definition);
		const initial = String(definition.initial);
		this.#debugLog(`FSM created with initial state "${initial}"`);
	}

	/** Log debug message if debug mode is enabled */
	#debugLog(...args: unknown[]): void {
		if (this.#debug) {
			this.#logger.debug("[FSM]", ...args);
		}
	}

	/**
	 * Returns whether debug mode is enabled.
	 * @returns `true` if debug logging is active, `false` otherwise
	 */
	get debug(): boolean {
		return this.#debug;
	}

	/**
	 * Returns the logger instance used by this FSM.
	 * @returns The Logger instance (default: clog)
	 */
	get logger(): Logger {
		return this.#logger;
	}

	/**
	 * Dispatches `event` against `state` and returns only the resulting state.
	 * Never throws; on failure the returned state is the one reported by the
	 * failed result (usually the unchanged `state`).
	 */
	fire(state: TState, event: TEvent, context: TContext): TState {
		return this.fireWithResult(state, event, context).state;
	}

	/**
	 * Dispatches `event` against `state` and reports the outcome.
	 *
	 * @example
	 * ```typescript
	 * const result = fsm.fireWithResult("CREATED", "SHIP", order);
	 * if (result.outcome === "failed") {
	 *   console.warn(result.reason, result.debug?.context);
	 * }
	 * ```
	 */
	fireWithResult(
		state: TState,
		event: TEvent,
		context: TContext
	): DispatchResult<TState, TEvent> {
		this.#debugLog(`fire("${String(event)}") called in state "${String(state)}"`);
		try {
			const def = this.definition.states.get(state);
			if (!def) return this.#report(this.#unknownState(state, event));
			if (def.isFinal) return this.#report(this.#finalState(state, event));

			const rule = this.#selectRule(def, state, event, context);
			if (!rule) {
				const events = def.events().map(String);
				return this.#report(
					failed(
						state,
						`No transition configured for event '${String(event)}' ` +
							`in state '${String(state)}'`,
						createDebugInfo(
							state,
							event,
							"NO_APPLICABLE_TRANSITION_FOUND",
							`Available events in this state: ${events.join(", ") || "none"}`
						)
					)
				);
			}

			return this.#execute(state, event, context, rule);
		} catch (error) {
			return this.#handleError(state, event, context, error);
		}
	}

	/**
	 * Checks whether `event` would be handled in `state`, without running any
	 * action or listener. Guards are evaluated, so they must be pure.
	 * Never throws: a throwing guard counts as "cannot fire".
	 */
	canFire(state: TState, event: TEvent, context: TContext): boolean {
		const def = this.definition.states.get(state);
		if (!def || def.isFinal) return false;
		try {
			return this.#selectRule(def, state, event, context) !== null;
		} catch (error) {
			const { message } = describeError(error);
			this.#debugLog(`canFire("${String(event)}") guard threw: ${message}`);
			return false;
		}
	}

	/** `true` only for configured states marked final. */
	isFinalState(state: TState): boolean {
		return this.definition.states.get(state)?.isFinal ?? false;
	}

	/**
	 * Snapshot of the configuration. Transitions list state-to-state edges
	 * only: `ignore` and `internal` rules are left out, `reentry` rules show
	 * as self-edges and auto-transitions carry a `null` event.
	 */
	getInfo(): FSMInfo<TState, TEvent> {
		const states: TState[] = [];
		const events = new Set<TEvent>();
		const transitions: TransitionInfo<TState, TEvent>[] = [];
		const seen = new Map<TState, Map<TState, Set<TEvent | null>>>();

		const addEdge = (from: TState, to: TState, event: TEvent | null) => {
			const byTarget = seen.get(from) ?? new Map<TState, Set<TEvent | null>>();
			seen.set(from, byTarget);
			const byEvent = byTarget.get(to) ?? new Set<TEvent | null>();
			byTarget.set(to, byEvent);
			if (byEvent.has(event)) return;
			byEvent.add(event);
			transitions.push({ from, to, event });
		};

		for (const [state, def] of this.definition.states) {
			states.push(state);
			for (const rule of def.rules) {
				switch (rule.kind) {
					case "permit":
						events.add(rule.event);
						addEdge(state, rule.target, rule.event);
						break;
					case "reentry":
						events.add(rule.event);
						addEdge(state, state, rule.event);
						break;
					case "auto":
						addEdge(state, rule.target, null);
						break;
					case "ignore":
					case "internal":
						events.add(rule.event);
						break;
				}
			}
		}

		return {
			initialState: this.definition.initial,
			states,
			events: [...events],
			transitions,
		};
	}

	/** Static validation of the configuration, see `validateDefinition`. */
	validate(): ValidationResult {
		return validateDefinition(this.definition);
	}

	/** Renders the configuration as a Mermaid stateDiagram-v2. */
	toMermaid(options: DiagramOptions<TEvent> = {}): string {
		return toMermaid(this, options);
	}

	/** Renders the configuration as a PlantUML state diagram. */
	toPlantUML(options: DiagramOptions<TEvent> = {}): string {
		return toPlantUML(this, options);
	}

	#unknownState(state: TState, event: TEvent): DispatchResult<TState, TEvent> {
		const available = [...this.definition.states.keys()].map(String);
		return failed(
			state,
			`Unknown state: ${String(state)}`,
			createDebugInfo(
				state,
				event,
				"STATE_NOT_FOUND_IN_CONFIGURATION",
				`Available states: [${available.join(", ")}]`
			)
		);
	}

	#finalState(state: TState, event: TEvent): DispatchResult<TState, TEvent> {
		return failed(
			state,
			`Cannot transition from final state: ${String(state)}`,
			createDebugInfo(
				state,
				event,
				"TRANSITION_ATTEMPTED_FROM_FINAL_STATE",
				"Final states do not allow transitions"
			)
		);
	}

	#report(result: DispatchResult<TState, TEvent>): DispatchResult<TState, TEvent> {
		if (result.debug) this.#debugLog(formatDebugInfo(result.debug));
		return result;
	}

	/** First matching rule in declaration order, or `null`. */
	#selectRule(
		def: StateDefinition<TState, TEvent, TContext>,
		state: TState,
		event: TEvent,
		context: TContext
	): EventRule<TState, TEvent, TContext> | null {
		const transition: TransitionInfo<TState, TEvent> = {
			from: state,
			to: null,
			event,
		};
		for (const rule of def.rulesFor(event)) {
			if (!rule.guard || rule.guard(transition, context)) return rule;
		}
		return null;
	}

	#execute(
		state: TState,
		event: TEvent,
		context: TContext,
		rule: EventRule<TState, TEvent, TContext>
	): DispatchResult<TState, TEvent> {
		switch (rule.kind) {
			case "ignore":
				this.#debugLog(`fire("${String(event)}") ignored`);
				return this.#results.ignored(state, "Event ignored");

			case "internal": {
				this.#debugLog(`fire("${String(event)}") internal (no state change)`);
				const transition = { from: state, to: state, event };
				this.#runActions(this.definition.onAnyTransition, transition, context);
				this.#notify("onTransition", state, event, (l) =>
					l.onTransition?.(state, state, event, context)
				);
				rule.action?.(transition, context);
				return this.#results.success(state);
			}

			case "reentry":
				return this.#results.success(
					this.#transition(state, state, event, context, true, 0)
				);

			case "permit":
				return this.#results.success(
					this.#transition(state, rule.target, event, context, false, 0)
				);
		}
	}

	/**
	 * Runs the state-transition protocol and the auto-transition chase.
	 * Returns the state the chase settles in.
	 */
	#transition(
		from: TState,
		to: TState,
		event: TEvent | null,
		context: TContext,
		reentry: boolean,
		depth: number
	): TState {
		const { states, onAnyEntry, onAnyExit, onAnyTransition } = this.definition;
		const transition: TransitionInfo<TState, TEvent> = { from, to, event };
		const crossing = reentry || from !== to;

		const route = `"${String(from)}" -> "${String(to)}"`;
		this.#debugLog(`transition: ${route}${reentry ? " (reentry)" : ""}`);

		// 1. + 2. exit
		this.#notify("onStateExit", from, event, (l) =>
			l.onStateExit?.(from, event, context)
		);
		if (crossing) {
			this.#runActions(onAnyExit, transition, context);
			this.#runActions(states.get(from)?.exitActions ?? [], transition, context);
		}

		// 3. transition
		this.#runActions(onAnyTransition, transition, context);
		this.#notify("onTransition", from, event, (l) =>
			l.onTransition?.(from, to, event, context)
		);

		// 4. + 5. entry
		if (crossing) {
			this.#runActions(onAnyEntry, transition, context);
			this.#runActions(states.get(to)?.entryActions ?? [], transition, context);
		}
		this.#notify("onStateEntry", to, event, (l) =>
			l.onStateEntry?.(to, event, context)
		);

		// 6. auto-transition chase
		const target = states.get(to);
		if (!target || target.isFinal) return to;

		for (const rule of target.autoTransitionRules()) {
			const auto: TransitionInfo<TState, TEvent> = {
				from: to,
				to: rule.target,
				event: null,
			};
			if (rule.guard && !rule.guard(auto, context)) continue;

			if (depth >= this.#maxAutoTransitions) {
				throw new AutoTransitionLimitError(to, this.#maxAutoTransitions);
			}
			const next = String(rule.target);
			this.#debugLog(`auto-transition: "${String(to)}" -> "${next}"`);
			return this.#transition(to, rule.target, null, context, false, depth + 1);
		}

		return to;
	}

	#runActions(
		actions: readonly Action<TState, TEvent, TContext>[],
		transition: TransitionInfo<TState, TEvent>,
		context: TContext
	): void {
		for (const action of actions) action(transition, context);
	}

	/** Calls every listener, logging (and otherwise ignoring) failures. */
	#notify(
		callback: keyof FSMListener<TState, TEvent, TContext>,
		state: TState,
		event: TEvent | null,
		call: (listener: FSMListener<TState, TEvent, TContext>) => void
	): void {
		this.definition.listeners.forEach((listener, index) => {
			try {
				call(listener);
			} catch (error) {
				const where = `${callback}(state=${String(state)}, event=${String(event)})`;
				this.#logListenerError(
					`[FSM] listener #${index} failed during ${where}: ` +
						describeError(error).message
				);
			}
		});
	}

	/** Logs via the configured logger, falling back to the console if it throws. */
	#logListenerError(message: string): void {
		try {
			this.#logger.error(message);
		} catch (logError) {
			console.error(message, logError);
		}
	}

	#handleError(
		state: TState,
		event: TEvent,
		context: TContext,
		error: unknown
	): DispatchResult<TState, TEvent> {
		const { name, message } = describeError(error);
		this.#debugLog(`fire("${String(event)}") failed: ${message}`);

		this.#notify("onTransitionError", state, event, (l) =>
			l.onTransitionError?.(state, event, context, error)
		);

		const debug: DebugInfo<TState, TEvent> = createDebugInfo(
			state,
			event,
			"EXCEPTION_DURING_TRANSITION",
			`Exception type: ${name}, Message: ${message}`
		);

		const handler = this.definition.onError;
		if (!handler) {
			return failed(state, `Unhandled error: ${message}`, debug);
		}

		try {
			const recovered = handler(state, event, context, error);
			return failed(recovered, `Error handled: ${message}`, debug);
		} catch (handlerError) {
			const inner = describeError(handlerError);
			return failed(
				state,
				`Error in error handler: ${inner.message}`,
				createDebugInfo(
					state,
					event,
					"ERROR_IN_ERROR_HANDLER",
					`Handler exception: ${inner.name} - ${inner.message}`
				)
			);
		}
	}
}
