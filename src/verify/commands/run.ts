/**
 * verify run - machine verification sweep
 *
 * Commands:
 * - run                       Every feature at the default depth
 * - run --feature <id>        One feature
 * - run --item <id>           One item
 * - run --affected            Features whose files changed or were never fingerprinted
 */

import { writeFileSync } from "node:fs";
import type { Command } from "commander";
import type { FeatureReport } from "../checks/machine.js";
import { formatRunSummary, summarizeMachineRun, toJUnitXml } from "../report/summary.js";
import { generateRunId } from "../scenarios/checkpoint.js";
import { recompute } from "../stats/aggregate.js";
import { EXIT_CODES, type ExitCode, NotFoundError } from "../types/errors.js";
import type { CheckContext, Depth } from "../types/index.js";
import { findItem, isDepth } from "../types/index.js";
import { outputError, outputTOON } from "../types/toon.js";
import { createContext, failWith, finish, parseCount, type VerifyContext } from "./context.js";

interface RunOptions {
	depth?: string;
	feature?: string;
	item?: string;
	affected?: boolean;
	parallel?: string;
	site?: string;
	junit?: string;
	pretty?: boolean;
}

export function parseDepth(value: string | undefined, fallback: Depth): Depth {
	if (value === undefined) return fallback;
	if (!isDepth(value)) {
		outputError(`Error: unknown depth "${value}"`, {
			suggestions: ["verify run --depth basic|standard|thorough|paranoid"],
			exitCode: EXIT_CODES.CONFIGURATION,
		});
	}
	return value;
}

async function sweep(
	ctx: VerifyContext,
	options: RunOptions,
	depth: Depth,
	context: CheckContext,
): Promise<FeatureReport[]> {
	const concurrency = options.parallel
		? parseCount(options.parallel, "--parallel")
		: ctx.config.run.concurrency;

	if (options.item) {
		const located = findItem(ctx.store.load(), options.item);
		if (!located) throw new NotFoundError("Item", options.item);
		const outcome = await ctx.machine.verifyItem(options.item, depth, context);
		return [{ featureId: located.featureId, outcomes: [outcome] }];
	}
	if (options.feature) {
		return [await ctx.machine.verifyFeature(options.feature, depth, context)];
	}
	if (options.affected) {
		return ctx.machine.verifyAffected(depth, concurrency, context);
	}
	return ctx.machine.verifyAll(depth, concurrency, context);
}

export function registerRunCommand(program: Command): void {
	program
		.command("run")
		.description("Run machine checks and record the results")
		.option("--depth <depth>", "basic | standard | thorough | paranoid")
		.option("--feature <id>", "Only this feature")
		.option("--item <id>", "Only this item")
		.option("--affected", "Only features whose files changed")
		.option("--parallel <n>", "Features verified at once")
		.option("--site <name>", "Value for {site} in check commands")
		.option("--junit <file>", "Also write a JUnit XML report")
		.option("--pretty", "Human-readable output")
		.action(async (options: RunOptions) => {
			const ctx = createContext();
			const depth = parseDepth(options.depth, ctx.config.run.default_depth);
			const context: CheckContext = options.site ? { site: options.site } : {};

			let reports: FeatureReport[];
			try {
				reports = await sweep(ctx, options, depth, context);
			} catch (err) {
				failWith(err);
			}

			const extraCodes: ExitCode[] = [];
			const inconsistencies: string[] = [];
			const stats = recompute(ctx.store.load(), ctx.tracker.list({}));
			if (stats.success) {
				inconsistencies.push(...stats.statistics.inconsistencies);
				ctx.peaks.update(
					{
						machine_coverage: stats.statistics.machine.percent,
						human_coverage: stats.statistics.human.percent,
						full_coverage: stats.statistics.full.percent,
					},
					generateRunId(),
				);
			} else {
				inconsistencies.push(stats.error.message);
				extraCodes.push(stats.error.exitCode);
			}

			const summary = summarizeMachineRun(reports, inconsistencies, extraCodes);
			if (options.junit) {
				writeFileSync(options.junit, toJUnitXml(reports));
			}

			outputTOON(
				{ run: { depth, ...summary } },
				{
					pretty: options.pretty,
					prettyFn: () => console.log(formatRunSummary(summary)),
					agent_hint:
						summary.failed > 0
							? "Failed items carry output in the registry; show the failing lines to the user"
							: undefined,
				},
			);
			finish(ctx, [summary.exit_code]);
		});
}
