/**
 * @module
 *
 * A typed, synchronous and stateless finite state machine dispatcher.
 *
 * The machine holds no "current" state: callers pass the state, the event and
 * a context of their own, and get back where they end up. Configurations are
 * built once with a fluent builder, sealed, and then shared freely. Rules
 * cover guarded transitions, reentry, ignored events, internal actions and
 * auto-transitions; a static validator reports configuration defects.
 *
 * @example Basic usage
 * ```typescript
 * import { createFsmBuilder } from "fsm-dispatch";
 *
 * const fsm = createFsmBuilder<"IDLE" | "LOADING", "load" | "done">()
 *   .initial("IDLE")
 *   .configure("IDLE").permit("load", "LOADING").and()
 *   .configure("LOADING").permit("done", "IDLE").and()
 *   .build();
 *
 * fsm.fire("IDLE", "load", null); // → "LOADING"
 * ```
 *
 * @example Mermaid diagram support
 * ```typescript
 * import { fromMermaid } from "fsm-dispatch";
 *
 * const fsm = fromMermaid(`
 *   stateDiagram-v2
 *   [*] --> IDLE
 *   IDLE --> ACTIVE: start
 *   ACTIVE --> IDLE: stop
 * `).build();
 *
 * console.log(fsm.toMermaid());
 * ```
 */

export * from "./rule.ts";
export * from "./result.ts";
export * from "./definition.ts";
export * from "./state-definition.ts";
export * from "./validate.ts";
export * from "./fsm.ts";
export * from "./builder.ts";
export * from "./to-diagram.ts";
export * from "./from-mermaid.ts";
