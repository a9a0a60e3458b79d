/**
 * Run reports: counts, per-item lines and JUnit XML export
 */

import type { FeatureReport, MachineOutcome } from "../checks/machine.js";
import { outcomeExitCode } from "../checks/machine.js";
import type { OrchestrationReport } from "../scenarios/orchestrator.js";
import type { ExitCode } from "../types/errors.js";
import { combineExitCodes } from "../types/errors.js";
import type { Finding } from "../types/index.js";

export interface ItemLine {
	item: string;
	feature: string;
	status: MachineOutcome["status"];
	depth: string;
	exit_code: ExitCode;
	message: string | null;
}

export interface RunSummary {
	passed: number;
	failed: number;
	skipped: number;
	not_automatable: number;
	errors: number;
	items: ItemLine[];
	inconsistencies: string[];
	exit_code: ExitCode;
}

function messageFor(outcome: MachineOutcome): string | null {
	switch (outcome.status) {
		case "verified":
		case "not-automatable":
			return null;
		case "failed": {
			const failing = outcome.results.find((r) => !r.passed);
			if (!failing) return null;
			return failing.timedOut
				? `${failing.command}: timed out`
				: `${failing.command}: exit ${failing.exitCode ?? "none"}, expected ${failing.expectedExit}`;
		}
		default:
			return outcome.error.message;
	}
}

/**
 * Tally machine outcomes. `extraCodes` carries codes from outside the
 * outcomes, such as a restored registry.
 */
export function summarizeMachineRun(
	reports: FeatureReport[],
	inconsistencies: string[] = [],
	extraCodes: ExitCode[] = [],
): RunSummary {
	const items: ItemLine[] = [];
	const summary = { passed: 0, failed: 0, skipped: 0, not_automatable: 0, errors: 0 };

	for (const report of reports) {
		for (const outcome of report.outcomes) {
			switch (outcome.status) {
				case "verified":
					summary.passed++;
					break;
				case "failed":
					summary.failed++;
					break;
				case "skipped":
					summary.skipped++;
					break;
				case "not-automatable":
					summary.not_automatable++;
					break;
				default:
					summary.errors++;
			}
			items.push({
				item: outcome.itemId,
				feature: report.featureId,
				status: outcome.status,
				depth: outcome.depth,
				exit_code: outcomeExitCode(outcome),
				message: messageFor(outcome),
			});
		}
	}

	return {
		...summary,
		items,
		inconsistencies,
		exit_code: combineExitCodes([...items.map((i) => i.exit_code), ...extraCodes]),
	};
}

export function formatRunSummary(summary: RunSummary): string {
	const lines: string[] = [];
	for (const line of summary.items) {
		const mark =
			line.status === "verified" ? "✓" : line.status === "failed" ? "✗" : "-";
		lines.push(`  ${mark} ${line.item} [${line.depth}] ${line.status}${line.message ? `: ${line.message}` : ""}`);
	}
	lines.push("");
	lines.push(
		`${summary.passed} passed, ${summary.failed} failed, ${summary.skipped} skipped, ${summary.not_automatable} not automatable, ${summary.errors} errors`,
	);
	if (summary.inconsistencies.length > 0) {
		lines.push("Inconsistencies:");
		for (const note of summary.inconsistencies) lines.push(`  ! ${note}`);
	}
	return lines.join("\n");
}

export function formatScenarioReport(report: OrchestrationReport): string {
	const lines = [`Run ${report.runId}${report.dryRun ? " (dry run)" : ""}`];
	for (const scenario of report.scenarios) {
		const mark =
			scenario.state === "passed" ? "✓" : scenario.state === "failed" ? "✗" : "-";
		const detail = scenario.state === "passed" || scenario.state === "failed"
			? ` confidence ${scenario.confidence}%`
			: scenario.reason ? ` (${scenario.reason})` : "";
		lines.push(`  ${mark} ${scenario.id} ${scenario.state}${detail}`);
		for (const step of scenario.steps.filter((s) => !s.passed)) {
			lines.push(`      step ${step.index} ${step.name}: ${step.failures.join("; ")}`);
		}
	}
	const count = (state: string) => report.scenarios.filter((s) => s.state === state).length;
	lines.push("");
	lines.push(`${count("passed")} passed, ${count("failed")} failed, ${count("skipped")} skipped`);
	if (report.archived) lines.push(`Checkpoint archived to ${report.archived}`);
	return lines.join("\n");
}

const FINDING_MARKS: Record<Finding["type"], string> = {
	error: "✗",
	warning: "!",
	fixed: "✓",
};

/** One line per finding: mark, scenario, step, message */
export function formatFindings(findings: Finding[]): string {
	if (findings.length === 0) return "No findings";
	return findings
		.map((f) => `  ${FINDING_MARKS[f.type]} ${f.scenario} step ${f.step} [${f.type}] ${f.message}`)
		.join("\n");
}

export function escapeXml(text: string): string {
	return text
		.replace(/&/g, "&amp;")
		.replace(/</g, "&lt;")
		.replace(/>/g, "&gt;")
		.replace(/"/g, "&quot;")
		.replace(/'/g, "&apos;");
}

function seconds(ms: number): string {
	return (ms / 1000).toFixed(3);
}

function testCase(feature: string, outcome: MachineOutcome): string {
	const duration = "results" in outcome
		? outcome.results.reduce((sum, r) => sum + r.durationMs, 0)
		: 0;
	const open = `    <testcase classname="${escapeXml(feature)}" name="${escapeXml(`${outcome.itemId} [${outcome.depth}]`)}" time="${seconds(duration)}"`;
	const message = messageFor(outcome);

	switch (outcome.status) {
		case "verified":
			return `${open}/>`;
		case "failed": {
			const failing = outcome.results.find((r) => !r.passed);
			const body = failing ? escapeXml(failing.outputTail) : "";
			return `${open}>\n      <failure message="${escapeXml(message ?? "failed")}">${body}</failure>\n    </testcase>`;
		}
		case "skipped":
		case "not-automatable":
			return `${open}>\n      <skipped message="${escapeXml(message ?? outcome.status)}"/>\n    </testcase>`;
		default:
			return `${open}>\n      <error type="${outcome.error.kind}" message="${escapeXml(outcome.error.message)}"/>\n    </testcase>`;
	}
}

/** One testsuite per feature, one testcase per item outcome */
export function toJUnitXml(reports: FeatureReport[]): string {
	const suites = reports.map((report) => {
		const { outcomes } = report;
		const failures = outcomes.filter((o) => o.status === "failed").length;
		const skipped = outcomes.filter(
			(o) => o.status === "skipped" || o.status === "not-automatable",
		).length;
		const errors = outcomes.length - failures - skipped - outcomes.filter((o) => o.status === "verified").length;
		const cases = outcomes.map((o) => testCase(report.featureId, o)).join("\n");
		const header = `  <testsuite name="${escapeXml(report.featureId)}" tests="${outcomes.length}" failures="${failures}" errors="${errors}" skipped="${skipped}">`;
		return outcomes.length > 0 ? `${header}\n${cases}\n  </testsuite>` : `${header}\n  </testsuite>`;
	});
	return `<?xml version="1.0" encoding="UTF-8"?>\n<testsuites name="verify">\n${suites.join("\n")}\n</testsuites>\n`;
}
