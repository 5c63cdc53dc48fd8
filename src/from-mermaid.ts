import { createFsmBuilder, type FSMBuilder } from "./builder.ts";
import type { FSMOptions } from "./fsm.ts";
import type { Guard } from "./rule.ts";
import { AUTO_LABEL } from "./to-diagram.ts";

/**
 * Stand-in for guards read from a diagram. Mermaid only tells that an edge
 * is guarded, not how; the placeholder always passes, and keeps the edge
 * conditional for `validate()`.
 */
export const placeholderGuard = (): boolean => true;

/**
 * Parses a Mermaid stateDiagram-v2 notation into an FSM builder draft.
 *
 * The draft can be completed (actions, real guards, listeners) before it is
 * built. This makes diagram-first development possible, and round-trips the
 * output of `toMermaid()`.
 *
 * **Supported lines:**
 * - `[*] --> State` - initial state
 * - `State --> [*]` - final state
 * - `A --> B: event` - transition
 * - `A --> B: (auto)` - auto-transition
 * - `A --> A: event / (action internal)` - internal transition
 * - `[guard N]`, `[guarded]` or `[guard ...]` after the event - guarded
 *   transition (see `placeholderGuard`)
 * - `/ (action)` suffixes are accepted and dropped
 *
 * **Ignored Mermaid features (non-FSM lines):**
 * - YAML frontmatter (`---\ntitle: ...\n---`)
 * - Comments (`%%`) and directives (`%%{...}%%`)
 * - Styling (`classDef`, `class`, `style`)
 * - State descriptions (`state "Description" as StateName`)
 * - Composite states / subgraphs (`state StateName { ... }`)
 * - Notes (`note left of`, `note right of`)
 * - Direction statements (`direction LR`, `direction TB`, etc.)
 * - Any other unrecognized lines
 *
 * **Limitations:**
 * - Cannot recreate actual guard/action functions
 * - Cannot recreate entry/exit actions (not represented in Mermaid)
 * - Self-edges become plain transitions (a reentry looks the same)
 *
 * @throws Error if the diagram is invalid (missing header or initial state)
 *
 * @example
 * ```typescript
 * const fsm = fromMermaid<Ctx>(`
 *   stateDiagram-v2
 *   [*] --> OFF
 *   OFF --> ON: toggle
 *   ON --> OFF: toggle
 * `).build();
 * ```
 */
export function fromMermaid<TContext = unknown>(
	mermaidDiagram: string,
	options: FSMOptions = {}
): FSMBuilder<string, string, TContext> {
	const lines = mermaidDiagram.trim().split("\n");

	// Find the stateDiagram-v2 header, skipping any YAML frontmatter
	const startIndex = lines.findIndex((line) =>
		line.trim().startsWith("stateDiagram-v2")
	);

	if (startIndex === -1) {
		throw new Error('Invalid mermaid diagram: must contain "stateDiagram-v2"');
	}

	const builder = createFsmBuilder<string, string, TContext>(options);
	let hasInitial = false;

	for (const raw of lines.slice(startIndex + 1)) {
		const line = raw.trim();

		if (!line) continue;

		// comments and directives
		if (line.startsWith("%%")) continue;

		if (line.startsWith("direction ")) continue;

		if (/^(classDef|class|style)\s/.test(line)) continue;

		// state "Description" as StateName
		if (/^state\s+["']/.test(line)) continue;

		// composite states
		if (/^state\s+\w+\s*\{/.test(line) || line === "{" || line === "}")
			continue;

		if (/^note\s/.test(line)) continue;

		// [*] --> StateName
		const initialMatch = line.match(/^\[\*\]\s*-->\s*(\w+)$/);
		if (initialMatch) {
			builder.initial(initialMatch[1]);
			hasInitial = true;
			continue;
		}

		// StateName --> [*]
		const finalMatch = line.match(/^(\w+)\s*-->\s*\[\*\]$/);
		if (finalMatch) {
			builder.configure(finalMatch[1]).asFinal();
			continue;
		}

		// StateA --> StateB: label
		const transitionMatch = line.match(/^(\w+)\s*-->\s*(\w+)\s*:\s*(.+)$/);
		if (transitionMatch) {
			const [, from, to, label] = transitionMatch;
			const parsed = parseLabel(label.trim());
			const guard: Guard<string, string, TContext> | undefined =
				parsed.hasGuard ? placeholderGuard : undefined;
			const state = builder.configure(from);

			// make sure the target exists even when it has no outgoing edges
			builder.configure(to);

			if (parsed.event === AUTO_LABEL) {
				if (guard) state.autoTransitionIf(to, guard);
				else state.autoTransition(to);
			} else if (from === to && parsed.isInternalAction) {
				// the action itself cannot be recreated
				if (guard) state.internalIf(parsed.event, () => {}, guard);
				else state.internal(parsed.event, () => {});
			} else if (guard) {
				state.permitIf(parsed.event, to, guard);
			} else {
				state.permit(parsed.event, to);
			}
		}
		// Any other unrecognized lines are silently ignored
	}

	if (!hasInitial) {
		throw new Error(
			"Invalid mermaid diagram: no initial state found ([*] --> State)"
		);
	}

	return builder;
}

/**
 * Parses a transition label into structured information.
 *
 * Supported formats:
 * - "event"
 * - "(auto)"
 * - "event [guard N]"
 * - "event [guarded]"
 * - "event [guard anything here]"
 * - "event / (action)"
 * - "event / (action internal)"
 * - "event [guard ...] / (action)"
 */
function parseLabel(label: string): {
	event: string;
	hasGuard: boolean;
	isInternalAction: boolean;
} {
	let event = label;
	let hasGuard = false;
	let isInternalAction = false;

	// Check for action suffix
	const actionMatch = label.match(/\s*\/\s*\((action(?:\s+internal)?)\)$/);
	if (actionMatch) {
		isInternalAction = actionMatch[1].includes("internal");
		event = label.substring(0, actionMatch.index).trim();
	}

	// Supports: [guarded], [guard], [guard N], [guard anything here]
	const guardMatch = event.match(/\s*\[(guard(?:\s+[^\]]+)?|guarded)\]$/);
	if (guardMatch) {
		hasGuard = true;
		event = event.substring(0, guardMatch.index).trim();
	}

	return { event, hasGuard, isInternalAction };
}
