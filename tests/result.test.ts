import { expect, test } from "vitest";
import {
	createDebugInfo,
	failed,
	formatDebugInfo,
	ResultCache,
	validationResult,
	type DebugInfo,
} from "../src/result.ts";

test("formatDebugInfo", () => {
	const info: DebugInfo<string, string> = {
		state: "A",
		event: "go",
		reason: "NO_APPLICABLE_TRANSITION_FOUND",
		timestamp: new Date("2025-01-01T00:00:00.000Z"),
		context: null,
	};

	expect(formatDebugInfo(info)).toBe(
		"[2025-01-01T00:00:00.000Z] State: A, Event: go, Reason: NO_APPLICABLE_TRANSITION_FOUND"
	);
	expect(formatDebugInfo({ ...info, context: "Available events in this state: none" })).toBe(
		"[2025-01-01T00:00:00.000Z] State: A, Event: go, Reason: NO_APPLICABLE_TRANSITION_FOUND, Context: Available events in this state: none"
	);
});

test("failed results carry debug info", () => {
	const debug = createDebugInfo("A", "go", "EXCEPTION_DURING_TRANSITION");
	const result = failed("A", "Unhandled error: boom", debug);

	expect(result.outcome).toBe("failed");
	expect(result.transitioned).toBe(false);
	expect(result.debug).toBe(debug);
	expect(debug.context).toBe(null);
	expect(Object.isFrozen(debug)).toBe(true);
});

test("result cache is bounded", () => {
	const cache = new ResultCache<string, string>(2);

	const a = cache.success("A");
	expect(cache.success("A")).toBe(a);
	cache.success("B");
	expect(cache.size).toBe(2);

	// full: served fresh, never stored
	const c = cache.success("C");
	expect(cache.success("C")).not.toBe(c);
	expect(cache.success("C")).toEqual(c);
	expect(cache.size).toBe(2);

	cache.clear();
	expect(cache.size).toBe(0);
	expect(cache.success("A")).not.toBe(a);
});

test("ignored results are keyed by state and reason", () => {
	const cache = new ResultCache<string, string>();

	const x = cache.ignored("A", "Event ignored");
	expect(cache.ignored("A", "Event ignored")).toBe(x);
	expect(cache.ignored("A", "other")).not.toBe(x);
	expect(cache.ignored("A", "other").reason).toBe("other");
	expect(cache.ignored("B", "Event ignored").state).toBe("B");
	expect(cache.size).toBe(3);
	expect(cache.capacity).toBe(ResultCache.DEFAULT_CAPACITY);
});

test("validationResult", () => {
	expect(validationResult([])).toEqual({ isValid: true, errors: [] });
	expect(validationResult(["x"])).toEqual({ isValid: false, errors: ["x"] });
});
