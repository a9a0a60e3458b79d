/**
 * Tests for scenario ordering, baseline comparison and confidence
 */

import { describe, expect, test } from "vitest";
import { DEFAULT_CONFIDENCE_BANDS } from "../../../src/verify/state/config.js";
import { compareValues, normalizeBoolean, toleranceFor } from "../../../src/verify/scenarios/baseline.js";
import { computeConfidence } from "../../../src/verify/scenarios/confidence.js";
import {
	dependencyClosure,
	dependencyLevels,
	resolveOrder,
} from "../../../src/verify/scenarios/order.js";
import { ConfigurationError } from "../../../src/verify/types/errors.js";
import type { Scenario } from "../../../src/verify/types/index.js";
import { ScenarioSchema } from "../../../src/verify/types/schema.js";

function scenario(id: string, depends_on: string[] = []): Scenario {
	return ScenarioSchema.parse({ id, depends_on, steps: [{ name: "noop", cmd: "true" }] });
}

const ids = (list: Scenario[]) => list.map((s) => s.id);

describe("resolveOrder", () => {
	test("dependencies come first, otherwise declaration order", () => {
		const ordered = resolveOrder([
			scenario("report", ["restore"]),
			scenario("restore", ["backup"]),
			scenario("backup"),
			scenario("lint"),
		]);
		expect(ids(ordered)).toEqual(["backup", "restore", "report", "lint"]);
	});

	test("cycles are configuration errors naming the cycle", () => {
		expect(() => resolveOrder([scenario("a", ["b"]), scenario("b", ["a"])])).toThrow(
			"Scenario dependency cycle\n  a → b → a",
		);
	});

	test("unknown dependencies are configuration errors", () => {
		expect(() => resolveOrder([scenario("a", ["ghost"])])).toThrow(ConfigurationError);
	});

	test("dependencyClosure lists transitive prerequisites in order", () => {
		const all = [scenario("c", ["b"]), scenario("b", ["a"]), scenario("a"), scenario("x")];
		expect(dependencyClosure(all, "c")).toEqual(["a", "b"]);
		expect(dependencyClosure(all, "x")).toEqual([]);
	});

	test("dependencyLevels groups independent scenarios", () => {
		const ordered = resolveOrder([
			scenario("a"),
			scenario("b", ["a"]),
			scenario("c", ["a"]),
			scenario("d", ["b", "c"]),
		]);
		expect(dependencyLevels(ordered).map(ids)).toEqual([["a"], ["b", "c"], ["d"]]);
	});
});

describe("compareValues", () => {
	test("empty values", () => {
		expect(compareValues("", "  ")).toBe(true);
		expect(compareValues("", "0")).toBe(false);
		expect(compareValues("0", "")).toBe(false);
	});

	test("exact and numeric comparison", () => {
		expect(compareValues("abc", "abc")).toBe(true);
		expect(compareValues("abc", "abd")).toBe(false);
		expect(compareValues("10", "11")).toBe(false);
		expect(compareValues("10", "10.4", 0.5)).toBe(true);
		expect(compareValues("100", "104", "5%")).toBe(true);
		expect(compareValues("100", "106", "5%")).toBe(false);
	});

	test("boolean spellings are equivalent", () => {
		expect(compareValues("yes", "true")).toBe(true);
		expect(compareValues("on", "Enabled")).toBe(true);
		expect(compareValues("off", "true")).toBe(false);
		expect(normalizeBoolean("DISABLED")).toBe("false");
		expect(normalizeBoolean("maybe")).toBe("maybe");
	});

	test("percentage tolerance is relative to the baseline", () => {
		expect(toleranceFor(200, "10%")).toBe(20);
		expect(toleranceFor(-50, "10%")).toBe(5);
		expect(toleranceFor(200, 3)).toBe(3);
	});
});

describe("computeConfidence", () => {
	const tally = (total: number, passed: number, deep = 0, deepPassed = 0) => ({
		total,
		passed,
		deep,
		deepPassed,
	});

	test("default bands", () => {
		expect(computeConfidence(tally(4, 4, 2, 2), DEFAULT_CONFIDENCE_BANDS)).toBe(100);
		expect(computeConfidence(tally(4, 4), DEFAULT_CONFIDENCE_BANDS)).toBe(90);
		expect(computeConfidence(tally(4, 3, 1, 0), DEFAULT_CONFIDENCE_BANDS)).toBe(75);
		expect(computeConfidence(tally(4, 2), DEFAULT_CONFIDENCE_BANDS)).toBe(50);
		expect(computeConfidence(tally(4, 1), DEFAULT_CONFIDENCE_BANDS)).toBe(0);
		expect(computeConfidence(tally(0, 0), DEFAULT_CONFIDENCE_BANDS)).toBe(0);
	});

	test("custom bands", () => {
		const bands = [
			{ min_ratio: 0.9, score: 95 },
			{ min_ratio: 0, score: 10 },
		];
		expect(computeConfidence(tally(10, 9), bands)).toBe(95);
		expect(computeConfidence(tally(10, 8), bands)).toBe(10);
	});
});
