import { expect, test } from "vitest";
import { autoTransition, ignore, internal, permit } from "../src/rule.ts";
import { StateDefinition } from "../src/state-definition.ts";

test("rules are indexed by event in declaration order", () => {
	const def = new StateDefinition<string, string, unknown>("A")
		.addRule(permit("go", "B"))
		.addRule(ignore("noop"))
		.addRule(autoTransition("C"))
		.addRule(permit("go", "C"));

	expect(def.events()).toEqual(["go", "noop"]);
	expect(def.rulesFor("go")).toEqual([
		{ kind: "permit", event: "go", target: "B" },
		{ kind: "permit", event: "go", target: "C" },
	]);
	expect(def.rulesFor("missing")).toEqual([]);
	expect(def.autoTransitionRules()).toEqual([{ kind: "auto", target: "C" }]);
	expect(def.rules.length).toBe(4);
});

test("index is rebuilt after adding a rule", () => {
	const def = new StateDefinition<string, string, unknown>("A");

	expect(def.rulesFor("x")).toEqual([]);
	expect(def.events()).toEqual([]);

	def.addRule(internal("x"));

	expect(def.rulesFor("x")).toEqual([{ kind: "internal", event: "x" }]);
	expect(def.events()).toEqual(["x"]);
});

test("sealed copy is immutable and detached", () => {
	const entry = () => {};
	const def = new StateDefinition<string, string, unknown>("A")
		.addRule(permit("go", "B"))
		.addEntryAction(entry)
		.markFinal();

	const sealed = def.seal();

	expect(sealed.sealed).toBe(true);
	expect(def.sealed).toBe(false);
	expect(sealed.isFinal).toBe(true);
	expect(sealed.entryActions).toEqual([entry]);
	expect(sealed.exitActions).toEqual([]);
	expect(() => sealed.addRule(permit("stop", "C"))).toThrow(
		'State definition "A" is sealed'
	);
	expect(() => sealed.markFinal(false)).toThrow('State definition "A" is sealed');

	def.addRule(permit("stop", "C"));
	expect(def.rules.length).toBe(2);
	expect(sealed.rules.length).toBe(1);
	expect(sealed.events()).toEqual(["go"]);
});

test("rules and rule lists are frozen", () => {
	const rule = permit("go", "B", () => true);
	const def = new StateDefinition<string, string, unknown>("A").addRule(rule);

	expect(Object.isFrozen(rule)).toBe(true);
	expect(Object.isFrozen(def.rules)).toBe(true);
	expect(Object.isFrozen(def.rulesFor("go"))).toBe(true);
	expect(def.rulesFor("go")[0]).toBe(rule);
});
