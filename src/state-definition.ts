import type {
	Action,
	AutoRule,
	EventRule,
	TransitionRule,
} from "./rule.ts";

/** Immutable lookup snapshot, rebuilt as a whole and published at once. */
type RuleIndex<TState, TEvent, TContext> = {
	byEvent: ReadonlyMap<TEvent, readonly EventRule<TState, TEvent, TContext>[]>;
	auto: readonly AutoRule<TState, TEvent, TContext>[];
};

const EMPTY: readonly never[] = Object.freeze([]);

/**
 * Rules, entry/exit actions and the final flag of one state.
 *
 * Rules keep their declaration order, which is also their priority order.
 * The event index is derived lazily and dropped on every `addRule`.
 */
export class StateDefinition<TState, TEvent, TContext> {
	// copy-on-write, so that readers and sealed copies may share the arrays
	#rules: readonly TransitionRule<TState, TEvent, TContext>[] = EMPTY;
	#entryActions: readonly Action<TState, TEvent, TContext>[] = EMPTY;
	#exitActions: readonly Action<TState, TEvent, TContext>[] = EMPTY;
	#isFinal = false;
	#sealed = false;

	/** `null` means "dirty": rebuilt on next read */
	#index: RuleIndex<TState, TEvent, TContext> | null = null;

	constructor(public readonly state: TState) {}

	get isFinal(): boolean {
		return this.#isFinal;
	}

	get sealed(): boolean {
		return this.#sealed;
	}

	/** All rules in declaration order. */
	get rules(): readonly TransitionRule<TState, TEvent, TContext>[] {
		return this.#rules;
	}

	get entryActions(): readonly Action<TState, TEvent, TContext>[] {
		return this.#entryActions;
	}

	get exitActions(): readonly Action<TState, TEvent, TContext>[] {
		return this.#exitActions;
	}

	#assertMutable(): void {
		if (this.#sealed) {
			throw new Error(`State definition "${String(this.state)}" is sealed`);
		}
	}

	addRule(rule: TransitionRule<TState, TEvent, TContext>): this {
		this.#assertMutable();
		this.#rules = Object.freeze([...this.#rules, rule]);
		this.#index = null;
		return this;
	}

	addEntryAction(action: Action<TState, TEvent, TContext>): this {
		this.#assertMutable();
		this.#entryActions = Object.freeze([...this.#entryActions, action]);
		return this;
	}

	addExitAction(action: Action<TState, TEvent, TContext>): this {
		this.#assertMutable();
		this.#exitActions = Object.freeze([...this.#exitActions, action]);
		return this;
	}

	markFinal(isFinal = true): this {
		this.#assertMutable();
		this.#isFinal = isFinal;
		return this;
	}

	/**
	 * Returns a sealed copy of this definition. Mutators of the copy throw, so
	 * later changes to the original never leak into it.
	 */
	seal(): StateDefinition<TState, TEvent, TContext> {
		const copy = new StateDefinition<TState, TEvent, TContext>(this.state);
		copy.#rules = this.#rules;
		copy.#entryActions = this.#entryActions;
		copy.#exitActions = this.#exitActions;
		copy.#isFinal = this.#isFinal;
		copy.#sealed = true;
		return copy;
	}

	/** Rules registered for `event`, in declaration order (empty if none). */
	rulesFor(event: TEvent): readonly EventRule<TState, TEvent, TContext>[] {
		return this.#getIndex().byEvent.get(event) ?? EMPTY;
	}

	/** Auto-transition rules, in declaration order. */
	autoTransitionRules(): readonly AutoRule<TState, TEvent, TContext>[] {
		return this.#getIndex().auto;
	}

	/** Distinct events this state reacts to, in first-declaration order. */
	events(): TEvent[] {
		return [...this.#getIndex().byEvent.keys()];
	}

	#getIndex(): RuleIndex<TState, TEvent, TContext> {
		// Building is idempotent: a rebuild from the same rules yields an equal
		// snapshot, and the snapshot is published with a single assignment.
		return (this.#index ??= this.#buildIndex());
	}

	#buildIndex(): RuleIndex<TState, TEvent, TContext> {
		const byEvent = new Map<TEvent, EventRule<TState, TEvent, TContext>[]>();
		const auto: AutoRule<TState, TEvent, TContext>[] = [];

		for (const rule of this.#rules) {
			if (rule.kind === "auto") {
				auto.push(rule);
				continue;
			}
			const list = byEvent.get(rule.event);
			if (list) list.push(rule);
			else byEvent.set(rule.event, [rule]);
		}

		for (const list of byEvent.values()) Object.freeze(list);

		return { byEvent, auto: Object.freeze(auto) };
	}
}
