/**
 * Tests for configuration, scenario loading, checkpoints and exit codes
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { hintFor } from "../../../src/verify/ax/error-hints.js";
import {
	addFinding,
	CheckpointStore,
	type FindingFilter,
	generateRunId,
	listFindings,
	newCheckpoint,
	passedIds,
	recordCompletion,
} from "../../../src/verify/scenarios/checkpoint.js";
import { loadFixPatterns, loadScenarios } from "../../../src/verify/scenarios/parser.js";
import {
	DEFAULT_CONFIG,
	getConfigPaths,
	loadConfig,
	mergeConfig,
} from "../../../src/verify/state/config.js";
import { readEvents } from "../../../src/verify/state/events.js";
import { combineExitCodes, ConfigurationError } from "../../../src/verify/types/errors.js";
import { makeProject, type TestProject } from "./fixtures.js";

describe("mergeConfig", () => {
	test("empty document gives the defaults", () => {
		expect(mergeConfig({})).toEqual(DEFAULT_CONFIG);
	});

	test("sections merge key by key and bad values fall back", () => {
		const config = mergeConfig({
			run: { default_depth: "thorough", concurrency: 4 },
			executor: { default_timeout: "soon" },
			human: { prompt_mode: "sometimes", testers: ["alex"] },
			badges: { thresholds: { machine: { bands: [10, 20, 30] } } },
		});
		expect(config.run).toEqual({ default_depth: "thorough", concurrency: 4 });
		expect(config.executor.default_timeout).toBe(300);
		expect(config.human.prompt_mode).toBe("unverified");
		expect(config.human.testers).toEqual(["alex"]);
		expect(config.badges.thresholds.machine).toEqual({ ascending: true, bands: [10, 20, 30] });
		expect(config.badges.thresholds.issues).toEqual(DEFAULT_CONFIG.badges.thresholds.issues);
	});

	test("unknown depth and bad bands keep the defaults", () => {
		const config = mergeConfig({
			run: { default_depth: "extreme" },
			scenarios: { confidence_bands: [{ min_ratio: "all" }] },
		});
		expect(config.run.default_depth).toBe("standard");
		expect(config.scenarios.confidence_bands).toEqual(DEFAULT_CONFIG.scenarios.confidence_bands);
	});
});

describe("project files", () => {
	let project: TestProject;

	beforeEach(() => {
		project = makeProject(null);
		mkdirSync(project.paths.VERIFY_DIR, { recursive: true });
	});

	afterEach(() => {
		vi.restoreAllMocks();
		project.cleanup();
	});

	test("loadConfig reads verify.toml", () => {
		writeFileSync(
			project.paths.CONFIG_FILE,
			'[registry]\npath = "qa/registry.yml"\n\n[human]\nautolog_consent = ["alex"]\n',
		);
		const config = loadConfig(project.paths);
		expect(config.human.autolog_consent).toEqual(["alex"]);
		expect(getConfigPaths(project.paths, config).REGISTRY_FILE).toBe(
			join(project.root, "qa/registry.yml"),
		);
	});

	test("loadConfig warns and falls back on invalid TOML", () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
		writeFileSync(project.paths.CONFIG_FILE, "[registry\n");
		expect(loadConfig(project.paths)).toEqual(DEFAULT_CONFIG);
		expect(warn).toHaveBeenCalledTimes(2);
	});

	test("loadScenarios validates documents and rejects duplicate ids", () => {
		const dir = join(project.root, "scenarios");
		mkdirSync(dir);
		writeFileSync(join(dir, "b.yml"), "id: restore\ndepends_on: [backup]\nsteps:\n  - name: r\n    cmd: 'true'\n");
		writeFileSync(join(dir, "a.yaml"), "id: backup\nsteps:\n  - name: b\n    cmd: 'true'\n    expect_contains: done\n");

		const scenarios = loadScenarios(dir);
		expect(scenarios.map((s) => s.id)).toEqual(["backup", "restore"]);
		expect(scenarios[0].steps[0].expect_contains).toEqual(["done"]);

		writeFileSync(join(dir, "c.yml"), "id: backup\nsteps:\n  - name: c\n    cmd: 'true'\n");
		expect(() => loadScenarios(dir)).toThrow("c.yml: duplicate scenario id backup (also in a.yaml)");
	});

	test("loadScenarios reports schema problems per file", () => {
		const dir = join(project.root, "scenarios");
		mkdirSync(dir);
		writeFileSync(join(dir, "empty.yml"), "id: nothing\nsteps: []\n");
		expect(() => loadScenarios(dir)).toThrow(ConfigurationError);
		expect(loadScenarios(join(project.root, "missing"))).toEqual([]);
	});

	test("loadFixPatterns rejects invalid regular expressions", () => {
		const file = join(project.root, "fixes.yml");
		writeFileSync(file, "patterns:\n  - id: perms\n    pattern: 'permission denied'\n    fix: ['chmod +x run.sh']\n");
		expect(loadFixPatterns(file)).toEqual([
			{ id: "perms", pattern: "permission denied", fix: ["chmod +x run.sh"], severity: "medium" },
		]);

		writeFileSync(file, "patterns:\n  - id: bad\n    pattern: '(unclosed'\n    fix: ['true']\n");
		expect(() => loadFixPatterns(file)).toThrow(ConfigurationError);
		expect(loadFixPatterns(join(project.root, "none.yml"))).toEqual([]);
	});

	test("checkpoints save, reload and archive", () => {
		const store = new CheckpointStore(project.paths);
		const checkpoint = newCheckpoint("verify-20260101-000000");
		recordCompletion(checkpoint, {
			id: "S1",
			status: "failed",
			duration_ms: 5,
			confidence: 0,
			items_verified: 0,
			completed_at: "2026-01-01T00:00:01.000Z",
		});
		recordCompletion(checkpoint, {
			id: "S1",
			status: "passed",
			duration_ms: 5,
			confidence: 90,
			items_verified: 1,
			completed_at: "2026-01-01T00:00:02.000Z",
		});
		store.save(checkpoint);

		const loaded = store.load();
		expect(loaded?.completed).toHaveLength(1);
		expect(loaded && [...passedIds(loaded)]).toEqual(["S1"]);

		const target = store.archive(checkpoint);
		expect(target).toBe(join(project.paths.CHECKPOINT_ARCHIVE_DIR, "verify-20260101-000000.yml"));
		expect(store.exists()).toBe(false);
		expect(readEvents(project.paths).map((e) => e.event)).toEqual(["checkpoint_archived"]);
	});

	test("findings filter by scenario and type in logged order", () => {
		const checkpoint = newCheckpoint("verify-20260101-000000");
		addFinding(checkpoint, { scenario: "S1", step: 0, type: "error", message: "db: exit 1" });
		addFinding(checkpoint, { scenario: "S2", step: 1, type: "warning", message: "slow" });
		addFinding(checkpoint, { scenario: "S1", step: 2, type: "fixed", message: "perms" });

		const messages = (filter: FindingFilter) =>
			listFindings(checkpoint, filter).map((f) => f.message);
		expect(messages({})).toEqual(["db: exit 1", "slow", "perms"]);
		expect(messages({ scenario: "S1" })).toEqual(["db: exit 1", "perms"]);
		expect(messages({ type: "warning" })).toEqual(["slow"]);
		expect(messages({ scenario: "S2", type: "error" })).toEqual([]);
	});

	test("a malformed checkpoint is a configuration error", () => {
		writeFileSync(project.paths.CHECKPOINT_FILE, "run_id: 5\n");
		expect(() => new CheckpointStore(project.paths).load()).toThrow(ConfigurationError);
	});
});

describe("small helpers", () => {
	test("run ids use UTC", () => {
		expect(generateRunId(new Date(Date.UTC(2026, 10, 3, 14, 5, 6)))).toBe("verify-20261103-140506");
	});

	test("exit code precedence is 2 > 1 > 3 > 0", () => {
		expect(combineExitCodes([])).toBe(0);
		expect(combineExitCodes([0, 3])).toBe(3);
		expect(combineExitCodes([3, 1, 0])).toBe(1);
		expect(combineExitCodes([1, 2, 3])).toBe(2);
	});

	test("CLI hints", () => {
		expect(hintFor("error: unknown option '--concurrency'")).toBe("Use --parallel <n>");
		expect(hintFor("error: unknown option '--dryrun'")).toBe("Use --dry-run (with hyphen)");
		expect(hintFor("error: missing argument")).toBeNull();
	});
});
