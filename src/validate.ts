import type { FSMDefinition } from "./definition.ts";
import { validationResult, type ValidationResult } from "./result.ts";
import { ruleEvent } from "./rule.ts";

/**
 * Static analysis of a state machine definition.
 *
 * Only the shape of the graph is inspected: guards are never called and
 * no context is needed. All checks run and their errors accumulate:
 *
 * - the initial state is set and configured, and there is at least one state
 * - final states own no rules
 * - `permit` rules target configured states
 * - no state has two unguarded rules for the same event
 * - every state is reachable from the initial state via `permit` edges
 * - there is no cycle among `permit` edges (only the first one is reported)
 *
 * @example
 * ```typescript
 * const { isValid, errors } = validateDefinition(fsm.definition);
 * if (!isValid) console.error(errors.join("\n"));
 * ```
 */
export function validateDefinition<TState, TEvent, TContext>(
	definition: FSMDefinition<TState, TEvent, TContext>
): ValidationResult {
	const errors: string[] = [];

	validateBasics(definition, errors);
	validateStates(definition, errors);
	validateReachability(definition, errors);
	validateCycles(definition, errors);

	return validationResult(errors);
}

function validateBasics<TState, TEvent, TContext>(
	{ initial, states }: FSMDefinition<TState, TEvent, TContext>,
	errors: string[]
): void {
	if (initial === null) {
		errors.push("Initial state is not specified");
		return;
	}
	if (!states.has(initial)) {
		errors.push(`Initial state '${String(initial)}' is not configured`);
	}
	if (states.size === 0) {
		errors.push("No states are configured");
	}
}

function validateStates<TState, TEvent, TContext>(
	{ states }: FSMDefinition<TState, TEvent, TContext>,
	errors: string[]
): void {
	for (const [state, def] of states) {
		const name = String(state);

		if (def.isFinal && def.rules.length) {
			errors.push(`Final state '${name}' should not have any transitions`);
		}

		for (const rule of def.rules) {
			if (rule.kind === "permit" && !states.has(rule.target)) {
				const target = String(rule.target);
				errors.push(
					`State '${name}' has transition to undefined target state ` +
						`'${target}' for event '${String(rule.event)}'`
				);
			}
		}

		// unconditional auto-transitions share the `null` event
		const seen = new Set<TEvent | null>();
		for (const rule of def.rules) {
			if (rule.guard) continue;
			const event = ruleEvent(rule);
			if (seen.has(event)) {
				errors.push(
					`State '${name}' has multiple unconditional transitions ` +
						`for event '${String(event)}'`
				);
			}
			seen.add(event);
		}
	}
}

/** Collects `permit` targets of a state (guards ignored). */
function permitTargets<TState, TEvent, TContext>(
	definition: FSMDefinition<TState, TEvent, TContext>,
	state: TState
): TState[] {
	const def = definition.states.get(state);
	if (!def) return [];
	return def.rules.flatMap((rule) => (rule.kind === "permit" ? [rule.target] : []));
}

function validateReachability<TState, TEvent, TContext>(
	definition: FSMDefinition<TState, TEvent, TContext>,
	errors: string[]
): void {
	const { initial, states } = definition;
	if (initial === null || !states.size) return;

	// breadth-first
	const reachable = new Set<TState>([initial]);
	const queue: TState[] = [initial];
	for (let i = 0; i < queue.length; i++) {
		for (const target of permitTargets(definition, queue[i])) {
			if (reachable.has(target)) continue;
			reachable.add(target);
			queue.push(target);
		}
	}

	for (const state of states.keys()) {
		if (!reachable.has(state)) {
			errors.push(
				`State '${String(state)}' is not reachable ` +
					`from initial state '${String(initial)}'`
			);
		}
	}
}

function validateCycles<TState, TEvent, TContext>(
	definition: FSMDefinition<TState, TEvent, TContext>,
	errors: string[]
): void {
	if (definition.initial === null) return;

	const visiting = new Set<TState>();
	const visited = new Set<TState>();

	const hasCycle = (state: TState): boolean => {
		if (visiting.has(state)) return true;
		if (visited.has(state)) return false;

		visiting.add(state);
		for (const target of permitTargets(definition, state)) {
			if (hasCycle(target)) return true;
		}
		visiting.delete(state);
		visited.add(state);
		return false;
	};

	for (const state of definition.states.keys()) {
		if (!visited.has(state) && hasCycle(state)) {
			errors.push(
				"Circular dependency detected in state transitions " +
					`starting from state '${String(state)}'`
			);
			// first cycle only
			break;
		}
	}
}

/** Thrown by `assertValid`; `errors` are the validator's messages. */
export class FSMValidationError extends Error {
	constructor(public readonly errors: readonly string[]) {
		super(`Invalid FSM configuration:\n- ${errors.join("\n- ")}`);
		this.name = "FSMValidationError";
	}
}

/**
 * Fail-fast variant of `validate()`, meant for application startup.
 *
 * @throws FSMValidationError listing every defect found
 */
export function assertValid<TState, TEvent, TContext>(
	target:
		| { validate(): ValidationResult }
		| FSMDefinition<TState, TEvent, TContext>
): void {
	const result =
		"validate" in target ? target.validate() : validateDefinition(target);
	if (!result.isValid) {
		throw new FSMValidationError(result.errors);
	}
}
