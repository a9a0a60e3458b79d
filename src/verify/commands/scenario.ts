/**
 * verify scenario - integration scenarios
 *
 * Commands:
 * - scenario run [--id|--from|--resume]   Run scenarios in dependency order
 * - scenario list                         Scenarios in execution order
 * - scenario status [--findings]          Current checkpoint, or its findings
 */

import type { Command } from "commander";
import { formatFindings, formatScenarioReport } from "../report/summary.js";
import { latestRecords, listFindings } from "../scenarios/checkpoint.js";
import type { OrchestrationReport } from "../scenarios/orchestrator.js";
import { EXIT_CODES } from "../types/errors.js";
import type { Checkpoint, Finding } from "../types/index.js";
import { outputError, outputTOON } from "../types/toon.js";
import { createContext, createOrchestrator, failWith, finish, parseCount } from "./context.js";

interface ScenarioStatusOptions {
	findings?: boolean;
	type?: string;
	scenario?: string;
	pretty?: boolean;
}

function isFindingType(value: string): value is Finding["type"] {
	return value === "error" || value === "warning" || value === "fixed";
}

interface ScenarioRunOptions {
	id?: string;
	from?: string;
	resume?: boolean;
	fix?: boolean;
	parallel?: string;
	dryRun?: boolean;
	pretty?: boolean;
}

export function registerScenarioCommands(program: Command): void {
	const scenario = program.command("scenario").description("Integration scenarios");

	scenario
		.command("run")
		.description("Run scenarios in dependency order")
		.option("--id <id>", "Only this scenario (its dependencies must have passed)")
		.option("--from <id>", "Start at this scenario")
		.option("--resume", "Continue the current checkpoint")
		.option("--fix", "Apply matching fix patterns and retry failed steps")
		.option("--parallel <n>", "Independent scenarios run at once")
		.option("--dry-run", "Show what would run")
		.option("--pretty", "Human-readable output")
		.action(async (options: ScenarioRunOptions) => {
			const ctx = createContext();
			let report: OrchestrationReport;
			try {
				report = await createOrchestrator(ctx).run({
					id: options.id,
					from: options.from,
					resume: options.resume,
					fix: options.fix,
					dryRun: options.dryRun,
					...(options.parallel
						? { concurrency: parseCount(options.parallel, "--parallel") }
						: {}),
				});
			} catch (err) {
				failWith(err);
			}

			outputTOON(
				{
					scenario_run: {
						run_id: report.runId,
						dry_run: report.dryRun,
						order: report.order,
						scenarios: report.scenarios.map((s) => ({
							id: s.id,
							state: s.state,
							confidence: s.confidence,
							duration_ms: s.durationMs,
							failed_steps: s.steps.filter((step) => !step.passed).map((step) => step.name),
							items: s.items,
							reason: s.reason,
						})),
						archived: report.archived,
					},
				},
				{
					pretty: options.pretty,
					prettyFn: () => console.log(formatScenarioReport(report)),
					agent_hint: report.scenarios.some((s) => s.state === "failed")
						? "Resources of failed scenarios may be preserved; re-run with --resume after fixing"
						: undefined,
				},
			);
			finish(ctx, [report.exitCode]);
		});

	scenario
		.command("list")
		.description("Scenarios in execution order")
		.option("--pretty", "Human-readable output")
		.action((options: { pretty?: boolean }) => {
			const ctx = createContext();
			let rows: Array<{ id: string; name: string; depends_on: string[]; gate: boolean; steps: number }>;
			try {
				rows = createOrchestrator(ctx)
					.order()
					.map((s) => ({
						id: s.id,
						name: s.name,
						depends_on: s.depends_on,
						gate: s.is_gate,
						steps: s.steps.length,
					}));
			} catch (err) {
				failWith(err);
			}
			outputTOON(
				{ scenarios: rows },
				{
					pretty: options.pretty,
					prettyFn: () => {
						for (const row of rows) {
							const deps = row.depends_on.length > 0 ? ` ← ${row.depends_on.join(", ")}` : "";
							console.log(`${row.id}${row.gate ? " [gate]" : ""} ${row.name} (${row.steps} steps)${deps}`);
						}
					},
				},
			);
		});

	scenario
		.command("status")
		.description("Show the current checkpoint")
		.option("--findings", "List the checkpoint's findings")
		.option("--type <type>", "With --findings: error | warning | fixed")
		.option("--scenario <id>", "With --findings: only this scenario")
		.option("--pretty", "Human-readable output")
		.action((options: ScenarioStatusOptions) => {
			const ctx = createContext();
			let checkpoint: Checkpoint | null;
			try {
				checkpoint = ctx.checkpoints.load();
			} catch (err) {
				failWith(err);
			}
			if (!checkpoint) {
				outputTOON({ checkpoint: null }, { pretty: options.pretty, prettyFn: () => console.log("No active checkpoint") });
				return;
			}
			const cp = checkpoint;

			if (options.findings) {
				const type = options.type;
				if (type !== undefined && !isFindingType(type)) {
					outputError(`Error: unknown finding type "${type}"`, {
						suggestions: ["verify scenario status --findings --type error|warning|fixed"],
						exitCode: EXIT_CODES.CONFIGURATION,
					});
				}
				const findings = listFindings(cp, { scenario: options.scenario, type });
				outputTOON(
					{ findings: { run_id: cp.run_id, count: findings.length, items: findings } },
					{ pretty: options.pretty, prettyFn: () => console.log(formatFindings(findings)) },
				);
				return;
			}

			const records = [...latestRecords(cp).values()];
			outputTOON(
				{
					checkpoint: {
						run_id: cp.run_id,
						started_at: cp.started_at,
						last_updated: cp.last_updated,
						current: cp.current,
						completed: records,
						preserved: cp.resources.filter((r) => r.preserve),
						findings: cp.findings.length,
					},
				},
				{
					pretty: options.pretty,
					prettyFn: () => {
						console.log(`Run ${cp.run_id} (updated ${cp.last_updated})`);
						for (const r of records) {
							console.log(`  ${r.status === "passed" ? "✓" : "✗"} ${r.id} confidence ${r.confidence}%`);
						}
						for (const r of cp.resources.filter((res) => res.preserve)) {
							console.log(`  preserved: ${r.name} (${r.scenario})${r.reason ? ` ${r.reason}` : ""}`);
						}
					},
					agent_hint:
						cp.findings.length > 0
							? "Run `verify scenario status --findings` to read them"
							: undefined,
				},
			);
		});
}
