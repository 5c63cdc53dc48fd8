import type { FSMInfo } from "./fsm.ts";
import type { TransitionInfo } from "./rule.ts";

/** The read-only surface the diagram renderers need. */
export type DiagramSource<TState, TEvent> = {
	getInfo(): FSMInfo<TState, TEvent>;
	isFinalState(state: TState): boolean;
};

export type DiagramOptions<TEvent> = {
	/** Optional diagram title */
	title?: string;
	/** When set, only transitions triggered by this event are drawn */
	event?: TEvent;
};

/** Label used for auto-transition edges, which have no event. */
export const AUTO_LABEL = "(auto)";

const INITIAL_STYLE = "fill:#e1f5fe,stroke:#01579b,stroke-width:2px";
const FINAL_STYLE = "fill:#e8f5e8,stroke:#2e7d32,stroke-width:2px";

function edges<TState, TEvent>(
	info: FSMInfo<TState, TEvent>,
	options: DiagramOptions<TEvent>
): TransitionInfo<TState, TEvent>[] {
	if (options.event === undefined) return info.transitions;
	return info.transitions.filter((t) => t.event === options.event);
}

function eventLabel(event: unknown): string {
	if (event === null) return AUTO_LABEL;
	return String(event).replace(/"/g, "'").replace(/[\r\n]/g, " ");
}

/** Mermaid state ids must be plain identifiers. */
function mermaidId(state: unknown): string {
	const name = String(state).replace(/[\s\-.()[\]]/g, "_");
	return /^[a-zA-Z_]/.test(name) ? name : `State_${name}`;
}

function plantUmlId(state: unknown): string {
	return String(state)
		.replace(/\\/g, "_")
		.replace(/"/g, "'")
		.replace(/[\r\n]/g, "_");
}

/**
 * Generates a Mermaid stateDiagram-v2 notation from the FSM configuration.
 *
 * Initial and final states are marked with `[*]` edges and, when the
 * machine has final states, styled via `classDef`. Auto-transitions are
 * labeled `(auto)`.
 *
 * @example
 * ```typescript
 * console.log(toMermaid(fsm));
 * // stateDiagram-v2
 * //     [*] --> IDLE
 * //     IDLE --> LOADING: load
 * //     LOADING --> IDLE: done
 * ```
 */
export function toMermaid<TState, TEvent>(
	fsm: DiagramSource<TState, TEvent>,
	options: DiagramOptions<TEvent> = {}
): string {
	const info = fsm.getInfo();
	const finals = info.states.filter((s) => fsm.isFinalState(s));
	let mermaid = "";

	if (options.title?.trim()) {
		mermaid += `---\ntitle: ${options.title.trim()}\n---\n`;
	}

	mermaid += "stateDiagram-v2\n";
	if (info.initialState !== null) {
		mermaid += `    [*] --> ${mermaidId(info.initialState)}\n`;
	}

	for (const { from, to, event } of edges(info, options)) {
		const label = eventLabel(event);
		mermaid += `    ${mermaidId(from)} --> ${mermaidId(to)}: ${label}\n`;
	}

	for (const state of finals) {
		mermaid += `    ${mermaidId(state)} --> [*]\n`;
	}

	if (finals.length) {
		mermaid += "\n    %% Styling\n";
		if (info.initialState !== null) {
			mermaid += `    classDef initialState ${INITIAL_STYLE}\n`;
			mermaid += `    class ${mermaidId(info.initialState)} initialState\n`;
		}
		mermaid += `    classDef finalState ${FINAL_STYLE}\n`;
		mermaid += `    class ${finals.map(mermaidId).join(",")} finalState\n`;
	}

	return mermaid;
}

/**
 * Generates a PlantUML state diagram from the FSM configuration.
 *
 * @example
 * ```typescript
 * console.log(toPlantUML(fsm, { title: "Orders" }));
 * ```
 */
export function toPlantUML<TState, TEvent>(
	fsm: DiagramSource<TState, TEvent>,
	options: DiagramOptions<TEvent> = {}
): string {
	const info = fsm.getInfo();
	const finals = info.states.filter((s) => fsm.isFinalState(s));
	let uml = "@startuml\n";

	if (options.title?.trim()) {
		uml += `title ${options.title.trim()}\n`;
	}

	uml += "!theme plain\n";
	uml += "skinparam state {\n";
	uml += "  BackgroundColor<<Final>> LightGreen\n";
	uml += "  BackgroundColor<<Initial>> LightBlue\n";
	uml += "  BorderColor<<Final>> DarkGreen\n";
	uml += "  BorderColor<<Initial>> DarkBlue\n";
	uml += "}\n\n";

	if (info.initialState !== null) {
		uml += `state ${plantUmlId(info.initialState)} <<Initial>>\n`;
	}
	for (const state of finals) {
		uml += `state ${plantUmlId(state)} <<Final>>\n`;
	}
	uml += "\n";

	if (info.initialState !== null) {
		uml += `[*] --> ${plantUmlId(info.initialState)}\n`;
	}
	for (const { from, to, event } of edges(info, options)) {
		const label = eventLabel(event);
		uml += `${plantUmlId(from)} --> ${plantUmlId(to)} : ${label}\n`;
	}
	for (const state of finals) {
		uml += `${plantUmlId(state)} --> [*]\n`;
	}

	uml += "\n@enduml\n";
	return uml;
}
