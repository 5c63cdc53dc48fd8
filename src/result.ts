/** Outcome of a single dispatch. */
export type DispatchOutcome = "transitioned" | "ignored" | "failed";

/** Machine-readable cause attached to failed dispatches. */
export type DebugReason =
	| "STATE_NOT_FOUND_IN_CONFIGURATION"
	| "TRANSITION_ATTEMPTED_FROM_FINAL_STATE"
	| "NO_APPLICABLE_TRANSITION_FOUND"
	| "EXCEPTION_DURING_TRANSITION"
	| "ERROR_IN_ERROR_HANDLER";

export type DebugInfo<TState, TEvent> = {
	readonly state: TState;
	readonly event: TEvent;
	readonly reason: DebugReason;
	readonly timestamp: Date;
	/** Free-form detail, e.g. the events available in the state */
	readonly context: string | null;
};

export type DispatchResult<TState, TEvent> = {
	/** The state the caller ends up in */
	readonly state: TState;
	readonly outcome: DispatchOutcome;
	/** Shortcut for `outcome === "transitioned"` */
	readonly transitioned: boolean;
	readonly reason: string;
	readonly debug: DebugInfo<TState, TEvent> | null;
};

export type ValidationResult = {
	readonly isValid: boolean;
	readonly errors: readonly string[];
};

export const TRANSITION_SUCCESSFUL = "Transition successful";

export function createDebugInfo<TState, TEvent>(
	state: TState,
	event: TEvent,
	reason: DebugReason,
	context: string | null = null
): DebugInfo<TState, TEvent> {
	return Object.freeze({ state, event, reason, timestamp: new Date(), context });
}

/**
 * Renders debug info as a single log line, e.g.
 * `[2025-01-01T00:00:00.000Z] State: A, Event: go, Reason: ..., Context: ...`
 */
export function formatDebugInfo<TState, TEvent>(
	info: DebugInfo<TState, TEvent>
): string {
	let out = `[${info.timestamp.toISOString()}] `;
	out += `State: ${String(info.state)}, Event: ${String(info.event)}`;
	out += `, Reason: ${info.reason}`;
	if (info.context !== null) out += `, Context: ${info.context}`;
	return out;
}

export function transitioned<TState, TEvent = never>(
	state: TState
): DispatchResult<TState, TEvent> {
	const result: DispatchResult<TState, TEvent> = {
		state,
		outcome: "transitioned",
		transitioned: true,
		reason: TRANSITION_SUCCESSFUL,
		debug: null,
	};
	return Object.freeze(result);
}

export function ignored<TState, TEvent = never>(
	state: TState,
	reason: string
): DispatchResult<TState, TEvent> {
	const result: DispatchResult<TState, TEvent> = {
		state,
		outcome: "ignored",
		transitioned: false,
		reason,
		debug: null,
	};
	return Object.freeze(result);
}

export function failed<TState, TEvent>(
	state: TState,
	reason: string,
	debug: DebugInfo<TState, TEvent> | null = null
): DispatchResult<TState, TEvent> {
	const result: DispatchResult<TState, TEvent> = {
		state,
		outcome: "failed",
		transitioned: false,
		reason,
		debug,
	};
	return Object.freeze(result);
}

export function validationResult(errors: readonly string[]): ValidationResult {
	return Object.freeze({
		isValid: errors.length === 0,
		errors: Object.freeze([...errors]),
	});
}

/**
 * Bounded memo of the (frozen) success and ignored results, which carry no
 * per-call data. Once a map holds `capacity` entries, new keys are served
 * fresh values and never inserted.
 */
export class ResultCache<TState, TEvent> {
	static readonly DEFAULT_CAPACITY = 100;

	#success = new Map<TState, DispatchResult<TState, TEvent>>();
	#ignored = new Map<TState, Map<string, DispatchResult<TState, TEvent>>>();
	#ignoredCount = 0;

	constructor(public readonly capacity = ResultCache.DEFAULT_CAPACITY) {}

	/** Number of memoized results, both kinds together. */
	get size(): number {
		return this.#success.size + this.#ignoredCount;
	}

	success(state: TState): DispatchResult<TState, TEvent> {
		const cached = this.#success.get(state);
		if (cached) return cached;

		const result = transitioned<TState, TEvent>(state);
		if (this.#success.size < this.capacity) this.#success.set(state, result);
		return result;
	}

	ignored(state: TState, reason: string): DispatchResult<TState, TEvent> {
		const byReason = this.#ignored.get(state);
		const cached = byReason?.get(reason);
		if (cached) return cached;

		const result = ignored<TState, TEvent>(state, reason);
		if (this.#ignoredCount < this.capacity) {
			if (byReason) byReason.set(reason, result);
			else this.#ignored.set(state, new Map([[reason, result]]));
			this.#ignoredCount++;
		}
		return result;
	}

	clear(): void {
		this.#success.clear();
		this.#ignored.clear();
		this.#ignoredCount = 0;
	}
}
