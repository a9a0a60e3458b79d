/**
 * verify badges / verify stats - coverage numbers and badges
 */

import type { Command } from "commander";
import { latestRecords } from "../scenarios/checkpoint.js";
import { exportBadges, writeBadgesFile } from "../stats/badges.js";
import { recompute, type Statistics } from "../stats/aggregate.js";
import { getConfigPaths } from "../state/config.js";
import { outputTOON } from "../types/toon.js";
import { createContext, failWith, finish, type VerifyContext } from "./context.js";

function currentStatistics(ctx: VerifyContext): Statistics {
	const result = recompute(ctx.store.load(), ctx.tracker.list({}));
	if (!result.success) failWith(result.error, ["verify stats", "Fix the item's automatable class or its checks"]);
	return result.statistics;
}

/** Mean confidence over the latest record of each scenario in the open checkpoint */
function scenarioConfidence(ctx: VerifyContext): number | null {
	const checkpoint = ctx.checkpoints.load();
	if (!checkpoint) return null;
	const records = [...latestRecords(checkpoint).values()];
	if (records.length === 0) return null;
	return records.reduce((sum, r) => sum + r.confidence, 0) / records.length;
}

export function registerBadgesCommand(program: Command): void {
	program
		.command("badges")
		.description("Coverage badges on a four-color scale")
		.option("--extended", "Add per-class ratios, scenario confidence and peaks")
		.option("--write", "Write the badges file")
		.option("--pretty", "Human-readable output")
		.action((options: { extended?: boolean; write?: boolean; pretty?: boolean }) => {
			const ctx = createContext();
			try {
				const statistics = currentStatistics(ctx);
				const badges = exportBadges(
					statistics,
					ctx.config.badges.thresholds,
					options.extended
						? { peaks: ctx.peaks.load(), scenarioConfidence: scenarioConfidence(ctx) }
						: null,
				);

				let written: string | null = null;
				if (options.write) {
					written = getConfigPaths(ctx.paths, ctx.config).BADGES_FILE;
					writeBadgesFile(written, badges);
				}

				outputTOON(
					{ badges, written },
					{
						pretty: options.pretty,
						prettyFn: () => {
							for (const b of badges) console.log(`${b.label}: ${b.value} (${b.color})`);
							if (written) console.log(`\nWrote ${written}`);
						},
					},
				);
				finish(ctx, []);
			} catch (err) {
				failWith(err);
			}
		});
}

export function registerStatsCommand(program: Command): void {
	program
		.command("stats")
		.description("Coverage statistics recomputed from the registry")
		.option("--pretty", "Human-readable output")
		.action((options: { pretty?: boolean }) => {
			const ctx = createContext();
			try {
				const s = currentStatistics(ctx);
				outputTOON(
					{ statistics: s },
					{
						pretty: options.pretty,
						prettyFn: () => {
							console.log(`Items: ${s.total_items}`);
							console.log(`Machine: ${s.machine.numerator}/${s.machine.denominator} (${s.machine.percent}%)`);
							console.log(`Human:   ${s.human.numerator}/${s.human.denominator} (${s.human.percent}%)`);
							console.log(`Full:    ${s.full.numerator}/${s.full.denominator} (${s.full.percent}%)`);
							console.log(`Invalidated: ${s.invalidated}  Open issues: ${s.open_issues}`);
							for (const [cls, c] of Object.entries(s.by_class)) {
								console.log(`  ${cls}: ${c.total} items, ${c.machine_verified} machine, ${c.human_verified} human, ${c.fully_verified} full`);
							}
							if (s.inconsistencies.length > 0) {
								console.log("Inconsistencies:");
								for (const note of s.inconsistencies) console.log(`  ! ${note}`);
							}
						},
						agent_hint:
							s.inconsistencies.length > 0
								? "Inconsistencies are informational; report them to the user"
								: undefined,
					},
				);
				finish(ctx, []);
			} catch (err) {
				failWith(err);
			}
		});
}
