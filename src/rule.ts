/**
 * Transition metadata passed to guards and actions.
 *
 * `to` is `null` while a rule is still being selected (its target is not known
 * yet), and `event` is `null` for auto-transitions, which have no trigger.
 */
export type TransitionInfo<TState, TEvent> = {
	from: TState;
	to: TState | null;
	event: TEvent | null;
};

/**
 * Predicate gating a rule.
 *
 * Guards MUST be pure: they may be called speculatively (e.g. by `canFire`)
 * without the transition being committed. Mutate context in actions instead.
 */
export type Guard<TState, TEvent, TContext> = (
	transition: TransitionInfo<TState, TEvent>,
	context: TContext
) => boolean;

/** Side effect run on entry, exit, internal or global hooks. */
export type Action<TState, TEvent, TContext> = (
	transition: TransitionInfo<TState, TEvent>,
	context: TContext
) => void;

/** Ordinary transition to `target`. */
export type PermitRule<TState, TEvent, TContext> = {
	readonly kind: "permit";
	readonly event: TEvent;
	readonly target: TState;
	readonly guard?: Guard<TState, TEvent, TContext>;
};

/** Transition whose target is always the owning state (full exit and entry). */
export type ReentryRule<TState, TEvent, TContext> = {
	readonly kind: "reentry";
	readonly event: TEvent;
	readonly guard?: Guard<TState, TEvent, TContext>;
};

/** Consumes the event, reported as "ignored" rather than "failed". */
export type IgnoreRule<TState, TEvent, TContext> = {
	readonly kind: "ignore";
	readonly event: TEvent;
	readonly guard?: Guard<TState, TEvent, TContext>;
};

/** Runs an action without leaving or entering any state. */
export type InternalRule<TState, TEvent, TContext> = {
	readonly kind: "internal";
	readonly event: TEvent;
	readonly action?: Action<TState, TEvent, TContext>;
	readonly guard?: Guard<TState, TEvent, TContext>;
};

/** Event-less rule, evaluated whenever its owning state is entered. */
export type AutoRule<TState, TEvent, TContext> = {
	readonly kind: "auto";
	readonly target: TState;
	readonly guard?: Guard<TState, TEvent, TContext>;
};

/**
 * One reaction to an event within a state.
 *
 * A closed union: the engine matches on `kind` in exactly one place.
 */
export type TransitionRule<TState, TEvent, TContext> =
	| PermitRule<TState, TEvent, TContext>
	| ReentryRule<TState, TEvent, TContext>
	| IgnoreRule<TState, TEvent, TContext>
	| InternalRule<TState, TEvent, TContext>
	| AutoRule<TState, TEvent, TContext>;

/** Rules which are triggered by a caller-supplied event. */
export type EventRule<TState, TEvent, TContext> = Exclude<
	TransitionRule<TState, TEvent, TContext>,
	AutoRule<TState, TEvent, TContext>
>;

// Factories. The guard is only set when given, so that structural equality
// of rules (in tests, in diagram round trips) is not disturbed by `undefined`.

export function permit<TState, TEvent, TContext>(
	event: TEvent,
	target: TState,
	guard?: Guard<TState, TEvent, TContext>
): PermitRule<TState, TEvent, TContext> {
	const rule: PermitRule<TState, TEvent, TContext> = guard
		? { kind: "permit", event, target, guard }
		: { kind: "permit", event, target };
	return Object.freeze(rule);
}

export function permitReentry<TState, TEvent, TContext>(
	event: TEvent,
	guard?: Guard<TState, TEvent, TContext>
): ReentryRule<TState, TEvent, TContext> {
	const rule: ReentryRule<TState, TEvent, TContext> = guard
		? { kind: "reentry", event, guard }
		: { kind: "reentry", event };
	return Object.freeze(rule);
}

export function ignore<TState, TEvent, TContext>(
	event: TEvent,
	guard?: Guard<TState, TEvent, TContext>
): IgnoreRule<TState, TEvent, TContext> {
	const rule: IgnoreRule<TState, TEvent, TContext> = guard
		? { kind: "ignore", event, guard }
		: { kind: "ignore", event };
	return Object.freeze(rule);
}

export function internal<TState, TEvent, TContext>(
	event: TEvent,
	action?: Action<TState, TEvent, TContext>,
	guard?: Guard<TState, TEvent, TContext>
): InternalRule<TState, TEvent, TContext> {
	const rule: InternalRule<TState, TEvent, TContext> = {
		kind: "internal",
		event,
		...(action ? { action } : {}),
		...(guard ? { guard } : {}),
	};
	return Object.freeze(rule);
}

export function autoTransition<TState, TEvent, TContext>(
	target: TState,
	guard?: Guard<TState, TEvent, TContext>
): AutoRule<TState, TEvent, TContext> {
	const rule: AutoRule<TState, TEvent, TContext> = guard
		? { kind: "auto", target, guard }
		: { kind: "auto", target };
	return Object.freeze(rule);
}

/** Returns the triggering event of a rule, `null` for auto-transitions. */
export function ruleEvent<TState, TEvent, TContext>(
	rule: TransitionRule<TState, TEvent, TContext>
): TEvent | null {
	return rule.kind === "auto" ? null : rule.event;
}
