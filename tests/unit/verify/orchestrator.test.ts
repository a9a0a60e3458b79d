/**
 * Tests for the scenario orchestrator
 */

import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { CheckpointStore } from "../../../src/verify/scenarios/checkpoint.js";
import {
	evaluateStep,
	outputMatches,
	ScenarioOrchestrator,
} from "../../../src/verify/scenarios/orchestrator.js";
import { OrchestrationDependencyUnmetError } from "../../../src/verify/types/errors.js";
import type { CheckResult, FixPattern, Scenario } from "../../../src/verify/types/index.js";
import { ScenarioSchema, StepSchema } from "../../../src/verify/types/schema.js";
import { makeProject, type TestProject } from "./fixtures.js";

function scenario(doc: Record<string, unknown>): Scenario {
	return ScenarioSchema.parse(doc);
}

describe("ScenarioOrchestrator", () => {
	let project: TestProject;
	let checkpoints: CheckpointStore;

	beforeEach(() => {
		project = makeProject(null);
		checkpoints = new CheckpointStore(project.paths);
		vi.spyOn(console, "error").mockImplementation(() => {});
	});

	afterEach(() => {
		vi.restoreAllMocks();
		project.cleanup();
	});

	function orchestrator(scenarios: Scenario[], fixPatterns: FixPattern[] = []) {
		return new ScenarioOrchestrator({
			paths: project.paths,
			config: project.config,
			executor: project.executor,
			checkpoints,
			scenarios,
			fixPatterns,
		});
	}

	test("a passing run attributes items and archives the checkpoint", async () => {
		const report = await orchestrator([
			scenario({
				id: "S1",
				items: ["backup-create"],
				steps: [{ name: "ready", cmd: "echo ready", expect_contains: "ready" }],
			}),
		]).run();

		expect(report.exitCode).toBe(0);
		expect(report.scenarios).toHaveLength(1);
		expect(report.scenarios[0]).toMatchObject({
			id: "S1",
			state: "passed",
			confidence: 100,
			items: ["backup-create"],
		});
		expect(report.archived).toBe(join(project.paths.CHECKPOINT_ARCHIVE_DIR, `${report.runId}.yml`));
		expect(checkpoints.exists()).toBe(false);
		expect(report.runId).toMatch(/^verify-\d{8}-\d{6}$/);
	});

	test("an explicit scenario with an unmet dependency is skipped with exit 2", async () => {
		const report = await orchestrator([
			scenario({ id: "S1", steps: [{ name: "a", cmd: "true" }] }),
			scenario({ id: "S2", depends_on: ["S1"], steps: [{ name: "b", cmd: "true" }] }),
		]).run({ id: "S2" });

		expect(report.exitCode).toBe(2);
		expect(report.order).toEqual(["S2"]);
		expect(report.scenarios[0].state).toBe("skipped");
		expect(report.scenarios[0].error).toBeInstanceOf(OrchestrationDependencyUnmetError);
		expect(report.scenarios[0].reason).toBe("Scenario S2 depends on S1 which has not passed");
	});

	test("captured baselines are compared within tolerance", async () => {
		const report = await orchestrator([
			scenario({
				id: "S1",
				steps: [
					{ name: "count", cmd: "echo 42", capture: "count" },
					{ name: "close", cmd: "echo 43", compare: { baseline: "count", tolerance: 1 } },
					{ name: "exact", cmd: "echo 43", compare: { baseline: "count" } },
					{ name: "uses capture", cmd: "test {count} -eq 42" },
				],
			}),
		]).run();

		const steps = report.scenarios[0].steps;
		expect(steps.map((s) => s.passed)).toEqual([true, true, false, true]);
		expect(steps[2].failures).toEqual(["value 43 differs from baseline count=42 (tolerance 0)"]);
		expect(report.scenarios[0].state).toBe("failed");
		expect(report.exitCode).toBe(1);
	});

	test("a critical failure aborts the remaining steps", async () => {
		const report = await orchestrator([
			scenario({
				id: "S1",
				steps: [
					{ name: "boom", cmd: "exit 4", severity: "critical" },
					{ name: "never", cmd: "true" },
				],
			}),
		]).run();

		expect(report.scenarios[0].steps).toHaveLength(1);
		expect(report.scenarios[0].steps[0].failures).toEqual(["exit 4, expected 0"]);
		expect(report.scenarios[0].state).toBe("failed");
	});

	test("a warning failure keeps the scenario passing at lower confidence", async () => {
		const report = await orchestrator([
			scenario({
				id: "S1",
				steps: [
					{ name: "ok", cmd: "true" },
					{ name: "slow", cmd: "exit 1", severity: "warning" },
				],
			}),
		]).run();

		expect(report.scenarios[0].state).toBe("passed");
		expect(report.scenarios[0].confidence).toBe(50);
		expect(report.exitCode).toBe(0);
	});

	test("setup failure skips the steps but cleanup still runs", async () => {
		const report = await orchestrator([
			scenario({
				id: "S1",
				setup: [{ name: "prepare", cmd: "exit 1" }],
				steps: [{ name: "work", cmd: "touch worked" }],
				cleanup: [{ cmd: "touch cleaned" }],
			}),
		]).run();

		expect(report.scenarios[0]).toMatchObject({
			state: "failed",
			steps: [],
			reason: "resource or setup phase failed",
		});
		expect(existsSync(join(project.root, "worked"))).toBe(false);
		expect(existsSync(join(project.root, "cleaned"))).toBe(true);
	});

	test("a failed gate skips the scenarios after it", async () => {
		const report = await orchestrator([
			scenario({ id: "G", is_gate: true, steps: [{ name: "gate", cmd: "false" }] }),
			scenario({ id: "S", steps: [{ name: "s", cmd: "true" }] }),
		]).run();

		expect(report.scenarios.map((s) => [s.id, s.state])).toEqual([
			["G", "failed"],
			["S", "skipped"],
		]);
		expect(report.scenarios[1].reason).toBe("gate G failed");
	});

	test("resume continues with the scenarios that have not passed", async () => {
		const scenarios = [
			scenario({ id: "S1", steps: [{ name: "log", cmd: "echo run >> s1.log" }] }),
			scenario({ id: "S2", depends_on: ["S1"], steps: [{ name: "marker", cmd: "test -f marker" }] }),
		];

		const first = await orchestrator(scenarios).run();
		expect(first.exitCode).toBe(1);
		expect(checkpoints.exists()).toBe(true);

		writeFileSync(join(project.root, "marker"), "");
		const resumed = await orchestrator(scenarios).run({ resume: true });

		expect(resumed.runId).toBe(first.runId);
		expect(resumed.order).toEqual(["S2"]);
		expect(resumed.scenarios[0].state).toBe("passed");
		expect(resumed.exitCode).toBe(0);
		expect(readFileSync(join(project.root, "s1.log"), "utf-8")).toBe("run\n");
		expect(resumed.archived).not.toBeNull();
	});

	test("a matching fix pattern repairs and retries the step", async () => {
		const report = await orchestrator(
			[
				scenario({
					id: "S1",
					steps: [{ name: "fixture", cmd: 'test -f fixed || { echo "missing fixture"; exit 1; }' }],
				}),
			],
			[{ id: "create-fixture", pattern: "Missing Fixture", fix: ["touch fixed"], severity: "low" }],
		).run({ fix: true });

		expect(report.scenarios[0].state).toBe("passed");
		expect(report.scenarios[0].steps[0].fixedBy).toBe("create-fixture");
	});

	test("fixes are not applied unless enabled", async () => {
		const report = await orchestrator(
			[scenario({ id: "S1", steps: [{ name: "fixture", cmd: "echo missing fixture; exit 1" }] })],
			[{ id: "create-fixture", pattern: "missing fixture", fix: ["touch fixed"], severity: "low" }],
		).run();

		expect(report.scenarios[0].steps[0].fixedBy).toBeNull();
		expect(existsSync(join(project.root, "fixed"))).toBe(false);
	});

	test("resources of a failed scenario are preserved", async () => {
		const report = await orchestrator([
			scenario({
				id: "S1",
				resources: [{ name: "db", create: "true", cleanup: "touch db-cleaned" }],
				steps: [{ name: "fail", cmd: "false" }],
			}),
		]).run();

		expect(report.archived).toBeNull();
		expect(existsSync(join(project.root, "db-cleaned"))).toBe(false);
		expect(checkpoints.load()?.resources).toEqual([
			{ name: "db", scenario: "S1", preserve: true, reason: "scenario S1 failed" },
		]);
	});

	test("resources of a passing scenario are cleaned up", async () => {
		await orchestrator([
			scenario({
				id: "S1",
				resources: [{ name: "db", create: "true", cleanup: "touch db-cleaned" }],
				steps: [{ name: "ok", cmd: "true" }],
			}),
		]).run();

		expect(existsSync(join(project.root, "db-cleaned"))).toBe(true);
	});

	test("a resource name is owned per scenario", async () => {
		const site = (id: string) => ({
			name: "site",
			create: `echo create-${id} >> resources.log`,
			cleanup: `echo cleanup-${id} >> resources.log`,
		});
		const report = await orchestrator([
			scenario({ id: "A", resources: [site("A")], steps: [{ name: "fail", cmd: "false" }] }),
			scenario({ id: "B", resources: [site("B")], steps: [{ name: "ok", cmd: "true" }] }),
		]).run();

		expect(report.scenarios.map((s) => s.state)).toEqual(["failed", "passed"]);
		expect(readFileSync(join(project.root, "resources.log"), "utf-8")).toBe("create-A\ncreate-B\ncleanup-B\n");
		expect(checkpoints.load()?.resources).toEqual([
			{ name: "site", scenario: "A", preserve: true, reason: "scenario A failed" },
		]);
	});

	test("resume reuses the scenario's own preserved resource", async () => {
		const scenarios = [
			scenario({
				id: "A",
				resources: [
					{ name: "site", create: "echo create-A >> resources.log", cleanup: "echo cleanup-A >> resources.log" },
				],
				steps: [{ name: "ok file", cmd: "test -f ok" }],
			}),
		];

		await orchestrator(scenarios).run();
		writeFileSync(join(project.root, "ok"), "");
		const resumed = await orchestrator(scenarios).run({ resume: true });

		expect(resumed.scenarios[0].state).toBe("passed");
		expect(readFileSync(join(project.root, "resources.log"), "utf-8")).toBe("create-A\ncleanup-A\n");
		expect(resumed.archived).not.toBeNull();
		expect(checkpoints.exists()).toBe(false);
	});

	test("parallel scenarios may not share a resource", async () => {
		const site = { name: "site", create: "true", cleanup: "true" };
		await expect(
			orchestrator([
				scenario({ id: "A", resources: [site], steps: [{ name: "a", cmd: "true" }] }),
				scenario({ id: "B", resources: [site], steps: [{ name: "b", cmd: "true" }] }),
			]).run({ concurrency: 2 }),
		).rejects.toThrow("Parallel scenarios share resources\n  resource site is declared by A and B");
	});

	test("dry run lists the plan without running anything", async () => {
		const report = await orchestrator([
			scenario({ id: "S1", steps: [{ name: "touch", cmd: "touch ran" }] }),
		]).run({ dryRun: true });

		expect(report.dryRun).toBe(true);
		expect(report.scenarios.map((s) => s.state)).toEqual(["pending"]);
		expect(existsSync(join(project.root, "ran"))).toBe(false);
		expect(checkpoints.exists()).toBe(false);
	});

	test("parallel runs keep report order and respect dependencies", async () => {
		const report = await orchestrator([
			scenario({ id: "a", steps: [{ name: "a", cmd: "touch a.done" }] }),
			scenario({ id: "b", depends_on: ["a"], steps: [{ name: "b", cmd: "test -f a.done" }] }),
			scenario({ id: "c", depends_on: ["a"], steps: [{ name: "c", cmd: "test -f a.done" }] }),
		]).run({ concurrency: 2 });

		expect(report.scenarios.map((s) => [s.id, s.state])).toEqual([
			["a", "passed"],
			["b", "passed"],
			["c", "passed"],
		]);
	});
});

describe("step evaluation", () => {
	const result = (outputTail: string, exitCode: number | null = 0): CheckResult => ({
		command: "x",
		passed: exitCode === 0,
		exitCode,
		expectedExit: 0,
		timedOut: exitCode === null,
		durationMs: 1,
		outputTail,
	});

	test("outputMatches falls back to a literal for invalid patterns", () => {
		expect(outputMatches("status: ok", "status: (ok|up)")).toBe(true);
		expect(outputMatches("a(b", "a(")).toBe(true);
		expect(outputMatches("ab", "a(")).toBe(false);
	});

	test("every failed expectation is reported", () => {
		const step = StepSchema.parse({
			name: "health",
			cmd: "curl",
			expect_contains: ["healthy"],
			expect_not_contains: "error",
		});
		expect(evaluateStep(step, result("error: down", 7), {})).toEqual([
			"exit 7, expected 0",
			"output missing: healthy",
			"output contains: error",
		]);
		expect(evaluateStep(step, result("(truncated)\nall healthy\n"), {})).toEqual([]);
	});

	test("timeouts and missing baselines", () => {
		const step = StepSchema.parse({ name: "cmp", cmd: "x", compare: { baseline: "before" } });
		expect(evaluateStep(step, result("", null), {})).toEqual([
			"timed out",
			"baseline before was not captured",
		]);
	});
});
