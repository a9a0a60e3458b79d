/**
 * Scenario Orchestrator
 *
 * Runs dependency-ordered integration scenarios. Per scenario:
 * resources → setup → steps → cleanup. The checkpoint is saved after every
 * scenario; the current-step pointer is informational only.
 */

import type { CheckExecutor } from "../checks/executor.js";
import type { VerifyConfig } from "../state/config.js";
import { logEvent } from "../state/events.js";
import type { VerifyPaths } from "../state/paths.js";
import {
	ConfigurationError,
	EXIT_CODES,
	type ExitCode,
	NotFoundError,
	OrchestrationDependencyUnmetError,
} from "../types/errors.js";
import type {
	Checkpoint,
	CheckContext,
	CheckResult,
	FixPattern,
	PhaseCommand,
	Scenario,
	ScenarioRunState,
	Step,
} from "../types/index.js";
import { canTransitionScenario } from "../types/index.js";
import { runPool } from "../utils/pool.js";
import { compareValues } from "./baseline.js";
import {
	addFinding,
	type CheckpointStore,
	newCheckpoint,
	passedIds,
	preservedResource,
	removeResource,
	recordCompletion,
	setResource,
} from "./checkpoint.js";
import { computeConfidence, type StepTally } from "./confidence.js";
import { applyFix, findFix } from "./fixes.js";
import { dependencyLevels, resolveOrder } from "./order.js";

export interface OrchestratorDeps {
	paths: VerifyPaths;
	config: VerifyConfig;
	executor: CheckExecutor;
	checkpoints: CheckpointStore;
	scenarios: Scenario[];
	fixPatterns: FixPattern[];
}

export interface RunScenariosOptions {
	/** Run only this scenario; its dependencies must already have passed */
	id?: string;
	/** Start at this scenario in topological order */
	from?: string;
	resume?: boolean;
	fix?: boolean;
	concurrency?: number;
	dryRun?: boolean;
}

export interface StepReport {
	index: number;
	name: string;
	passed: boolean;
	failures: string[];
	exitCode: number | null;
	timedOut: boolean;
	/** Fix pattern applied before the retry */
	fixedBy: string | null;
}

export interface ScenarioReport {
	id: string;
	name: string;
	state: ScenarioRunState;
	confidence: number;
	durationMs: number;
	steps: StepReport[];
	/** Items attributed to this scenario when it passed */
	items: string[];
	reason: string | null;
	error: OrchestrationDependencyUnmetError | null;
}

export interface OrchestrationReport {
	runId: string;
	order: string[];
	scenarios: ScenarioReport[];
	archived: string | null;
	dryRun: boolean;
	exitCode: ExitCode;
}

const TRUNCATED_PREFIX = "(truncated)\n";

function outputValue(result: CheckResult): string {
	const tail = result.outputTail.startsWith(TRUNCATED_PREFIX)
		? result.outputTail.slice(TRUNCATED_PREFIX.length)
		: result.outputTail;
	return tail.trim();
}

/** Expectations are regular expressions; invalid ones match literally */
export function outputMatches(output: string, expectation: string): boolean {
	try {
		return new RegExp(expectation).test(output);
	} catch {
		return output.includes(expectation);
	}
}

function isDeep(step: Step): boolean {
	return (
		step.expect_contains.length > 0 ||
		step.expect_not_contains.length > 0 ||
		step.compare !== undefined
	);
}

/** Every reason a step result fails its declared expectations */
export function evaluateStep(
	step: Step,
	result: CheckResult,
	captured: Record<string, string>,
): string[] {
	const failures: string[] = [];
	const output = outputValue(result);

	if (result.timedOut) {
		failures.push("timed out");
	} else if (result.exitCode !== step.expect_exit) {
		failures.push(`exit ${result.exitCode ?? "none"}, expected ${step.expect_exit}`);
	}
	for (const expected of step.expect_contains) {
		if (!outputMatches(output, expected)) failures.push(`output missing: ${expected}`);
	}
	for (const unwanted of step.expect_not_contains) {
		if (outputMatches(output, unwanted)) failures.push(`output contains: ${unwanted}`);
	}
	if (step.compare) {
		const baseline = captured[step.compare.baseline];
		if (baseline === undefined) {
			failures.push(`baseline ${step.compare.baseline} was not captured`);
		} else if (!compareValues(baseline, output, step.compare.tolerance)) {
			failures.push(
				`value ${output} differs from baseline ${step.compare.baseline}=${baseline} (tolerance ${step.compare.tolerance})`,
			);
		}
	}
	return failures;
}

class ScenarioRun {
	state: ScenarioRunState = "pending";

	constructor(readonly scenario: Scenario) {}

	moveTo(next: ScenarioRunState): void {
		if (!canTransitionScenario(this.state, next)) {
			throw new Error(`scenario ${this.scenario.id}: ${this.state} → ${next} is not a valid move`);
		}
		this.state = next;
	}
}

/** Scenarios that may run at the same time must not share a resource name */
export function assertExclusiveResources(levels: Scenario[][]): void {
	const problems: string[] = [];
	for (const level of levels) {
		const owners = new Map<string, string>();
		for (const scenario of level) {
			for (const resource of scenario.resources) {
				const owner = owners.get(resource.name);
				if (owner && owner !== scenario.id) {
					problems.push(`resource ${resource.name} is declared by ${owner} and ${scenario.id}`);
				} else {
					owners.set(resource.name, scenario.id);
				}
			}
		}
	}
	if (problems.length > 0) {
		throw new ConfigurationError("Parallel scenarios share resources", problems);
	}
}

export class ScenarioOrchestrator {
	constructor(private readonly deps: OrchestratorDeps) {}

	/** Scenarios in execution order */
	order(): Scenario[] {
		return resolveOrder(this.deps.scenarios);
	}

	private select(ordered: Scenario[], options: RunScenariosOptions): Scenario[] {
		const find = (id: string): number => {
			const index = ordered.findIndex((s) => s.id === id);
			if (index === -1) throw new NotFoundError("Scenario", id);
			return index;
		};
		if (options.id) return [ordered[find(options.id)]];
		if (options.from) return ordered.slice(find(options.from));
		return ordered;
	}

	/**
	 * `resume`, `id` and `from` continue the current checkpoint; a plain run
	 * archives any previous checkpoint and starts a new one.
	 */
	private openCheckpoint(options: RunScenariosOptions): Checkpoint {
		const { checkpoints } = this.deps;
		const existing = checkpoints.load();
		if (options.resume || options.id || options.from) {
			return existing ?? newCheckpoint();
		}
		if (existing && !options.dryRun) checkpoints.archive(existing);
		return newCheckpoint();
	}

	async run(options: RunScenariosOptions = {}): Promise<OrchestrationReport> {
		const { config, checkpoints } = this.deps;
		const ordered = this.order();
		const checkpoint = this.openCheckpoint(options);

		let selected = this.select(ordered, options);
		if (options.resume) {
			const passed = passedIds(checkpoint);
			selected = selected.filter((s) => !passed.has(s.id));
		}

		if (options.dryRun) {
			return {
				runId: checkpoint.run_id,
				order: selected.map((s) => s.id),
				scenarios: selected.map((s) => this.pendingReport(s)),
				archived: null,
				dryRun: true,
				exitCode: EXIT_CODES.OK,
			};
		}

		const concurrency = options.concurrency ?? config.run.concurrency;
		const fix = options.fix ?? config.scenarios.auto_fix;
		const reports = new Map<string, ScenarioReport>();
		let gateFailed: string | null = null;

		// Sequential runs keep topological order; parallel runs go level by level
		const levels = concurrency > 1 ? dependencyLevels(selected) : selected.map((s) => [s]);
		if (concurrency > 1) assertExclusiveResources(levels);
		for (const level of levels) {
			const levelReports = await runPool(level, concurrency, async (scenario) => {
				if (gateFailed) {
					return this.skippedReport(scenario, `gate ${gateFailed} failed`, null);
				}
				const report = await this.runScenario(scenario, checkpoint, fix, options.id === scenario.id);
				if (scenario.is_gate && report.state === "failed") gateFailed = scenario.id;
				return report;
			});
			for (const report of levelReports) reports.set(report.id, report);
		}

		const scenarioReports = selected.flatMap((s) => {
			const report = reports.get(s.id);
			return report ? [report] : [];
		});

		let archived: string | null = null;
		const allPassed = scenarioReports.every((r) => r.state === "passed");
		const preserved = checkpoint.resources.some((r) => r.preserve);
		if (allPassed && !preserved) {
			archived = checkpoints.archive(checkpoint);
		} else {
			checkpoints.save(checkpoint);
		}

		return {
			runId: checkpoint.run_id,
			order: selected.map((s) => s.id),
			scenarios: scenarioReports,
			archived,
			dryRun: false,
			exitCode: this.exitCodeFor(scenarioReports, options),
		};
	}

	private exitCodeFor(reports: ScenarioReport[], options: RunScenariosOptions): ExitCode {
		if (reports.some((r) => r.state === "failed")) return EXIT_CODES.FAILURES;
		const explicitUnmet = reports.some((r) => r.id === options.id && r.error !== null);
		return explicitUnmet ? EXIT_CODES.CONFIGURATION : EXIT_CODES.OK;
	}

	private pendingReport(scenario: Scenario): ScenarioReport {
		return {
			id: scenario.id,
			name: scenario.name,
			state: "pending",
			confidence: 0,
			durationMs: 0,
			steps: [],
			items: [],
			reason: null,
			error: null,
		};
	}

	private skippedReport(
		scenario: Scenario,
		reason: string,
		error: OrchestrationDependencyUnmetError | null,
	): ScenarioReport {
		logEvent(this.deps.paths, { event: "scenario_skipped", scenario: scenario.id, reason });
		return { ...this.pendingReport(scenario), state: "skipped", reason, error };
	}

	private async runPhase(
		phase: "resource" | "setup" | "cleanup",
		commands: PhaseCommand[],
		scenario: Scenario,
		checkpoint: Checkpoint,
		context: CheckContext,
	): Promise<boolean> {
		let ok = true;
		for (const [index, command] of commands.entries()) {
			const result = await this.deps.executor.run(command, context);
			if (!result.passed) {
				ok = false;
				addFinding(checkpoint, {
					scenario: scenario.id,
					step: index,
					type: phase === "cleanup" ? "warning" : "error",
					message: `${phase} ${command.name ?? command.cmd} failed (exit ${result.exitCode ?? "none"}${result.timedOut ? ", timed out" : ""})`,
				});
				if (phase !== "cleanup") return false;
			}
		}
		return ok;
	}

	private async runStep(
		step: Step,
		index: number,
		scenario: Scenario,
		checkpoint: Checkpoint,
		context: CheckContext,
		captured: Record<string, string>,
		fix: boolean,
	): Promise<StepReport> {
		const { executor, fixPatterns, paths } = this.deps;

		let result = await executor.run(step, { ...context, captured });
		let failures = evaluateStep(step, result, captured);
		let fixedBy: string | null = null;

		if (failures.length > 0 && fix) {
			const pattern = findFix(fixPatterns, result.outputTail);
			if (pattern) {
				const application = await applyFix(pattern, executor, { ...context, captured });
				logEvent(paths, {
					event: "fix_applied",
					scenario: scenario.id,
					step: index,
					pattern: pattern.id,
					applied: application.applied,
				});
				if (application.applied) {
					fixedBy = pattern.id;
					result = await executor.run(step, { ...context, captured });
					failures = evaluateStep(step, result, captured);
				}
				addFinding(checkpoint, {
					scenario: scenario.id,
					step: index,
					type: application.applied && failures.length === 0 ? "fixed" : "error",
					message: `fix ${pattern.id} ${application.applied ? "applied" : "failed"} for step ${step.name}`,
				});
			}
		}

		const passed = failures.length === 0;
		if (passed && step.capture) {
			captured[step.capture] = outputValue(result);
		}
		if (!passed) {
			addFinding(checkpoint, {
				scenario: scenario.id,
				step: index,
				type: step.severity === "warning" ? "warning" : "error",
				message: `${step.name}: ${failures.join("; ")}`,
			});
		}

		return {
			index,
			name: step.name,
			passed,
			failures,
			exitCode: result.exitCode,
			timedOut: result.timedOut,
			fixedBy,
		};
	}

	private async runScenario(
		scenario: Scenario,
		checkpoint: Checkpoint,
		fix: boolean,
		explicit: boolean,
	): Promise<ScenarioReport> {
		const { paths, config, checkpoints, executor } = this.deps;
		const run = new ScenarioRun(scenario);

		const passedSoFar = passedIds(checkpoint);
		const missing = scenario.depends_on.filter((d) => !passedSoFar.has(d));
		if (missing.length > 0) {
			const error = new OrchestrationDependencyUnmetError(scenario.id, missing);
			if (explicit) console.error(`Error: ${error.message}`);
			return this.skippedReport(scenario, error.message, error);
		}

		run.moveTo("running");
		const started = Date.now();
		checkpoint.current = { scenario: scenario.id, step: 0, step_name: null };
		checkpoints.save(checkpoint);

		const context: CheckContext = {
			site: scenario.target,
			root: paths.PROJECT_ROOT,
			run_id: checkpoint.run_id,
		};
		const captured: Record<string, string> = {};

		let ready = true;
		for (const resource of scenario.resources) {
			if (preservedResource(checkpoint, resource.name, scenario.id)) continue;
			if (resource.create) {
				ready = await this.runPhase(
					"resource",
					[{ name: resource.name, cmd: resource.create }],
					scenario,
					checkpoint,
					context,
				);
				if (!ready) break;
			}
			setResource(checkpoint, {
				name: resource.name,
				scenario: scenario.id,
				preserve: false,
				reason: null,
			});
		}
		if (ready) {
			ready = await this.runPhase("setup", scenario.setup, scenario, checkpoint, context);
		}

		const steps: StepReport[] = [];
		let failed = !ready;
		if (ready) {
			for (const [index, step] of scenario.steps.entries()) {
				checkpoint.current = { scenario: scenario.id, step: index, step_name: step.name };
				const report = await this.runStep(step, index, scenario, checkpoint, context, captured, fix);
				steps.push(report);
				if (!report.passed && step.severity !== "warning") failed = true;
				if (!report.passed && step.severity === "critical") break;
			}
		}

		await this.runPhase("cleanup", scenario.cleanup, scenario, checkpoint, context);

		for (const resource of scenario.resources) {
			if (failed && config.scenarios.preserve_on_failure) {
				setResource(checkpoint, {
					name: resource.name,
					scenario: scenario.id,
					preserve: true,
					reason: `scenario ${scenario.id} failed`,
				});
				continue;
			}
			if (resource.cleanup) {
				const result = await executor.run({ cmd: resource.cleanup }, context);
				if (!result.passed) {
					addFinding(checkpoint, {
						scenario: scenario.id,
						step: 0,
						type: "warning",
						message: `cleanup of ${resource.name} failed (exit ${result.exitCode ?? "none"})`,
					});
				}
			}
			removeResource(checkpoint, resource.name, scenario.id);
		}

		const tally: StepTally = {
			total: scenario.steps.length,
			passed: steps.filter((s) => s.passed).length,
			deep: scenario.steps.filter(isDeep).length,
			deepPassed: steps.filter((s) => s.passed && isDeep(scenario.steps[s.index])).length,
		};
		const confidence = computeConfidence(tally, config.scenarios.confidence_bands);
		const durationMs = Date.now() - started;

		run.moveTo(failed ? "failed" : "passed");
		recordCompletion(checkpoint, {
			id: scenario.id,
			status: failed ? "failed" : "passed",
			duration_ms: durationMs,
			confidence,
			items_verified: failed ? 0 : scenario.items.length,
			completed_at: new Date().toISOString(),
		});
		checkpoints.save(checkpoint);

		logEvent(paths, {
			event: "scenario_completed",
			scenario: scenario.id,
			status: run.state,
			confidence,
			duration_ms: durationMs,
		});

		return {
			id: scenario.id,
			name: scenario.name,
			state: run.state,
			confidence,
			durationMs,
			steps,
			items: failed ? [] : scenario.items,
			reason: ready ? null : "resource or setup phase failed",
			error: null,
		};
	}
}
