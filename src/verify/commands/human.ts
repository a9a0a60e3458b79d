/**
 * Human verification commands
 *
 * - confirm <item>                       Manual confirmation
 * - autolog <command...> --exit-code <n> Mark items whose triggers match a command
 * - prompt <item> [--timeout <s>]        Ask once, opportunistically
 */

import type { Command } from "commander";
import { createTerminalPrompt } from "../human/prompt.js";
import type { AutoLogResult, HumanWriteResult, PromptResult } from "../human/verifier.js";
import { EXIT_CODES, type ExitCode } from "../types/errors.js";
import { outputError, outputTOON } from "../types/toon.js";
import { createContext, failWith, finish, identityOf, parseCount } from "./context.js";

export function registerHumanCommands(program: Command): void {
	program
		.command("confirm <item>")
		.description("Record that you verified an item by hand")
		.option("--pretty", "Human-readable output")
		.action(async (item: string, options: { pretty?: boolean }, command: Command) => {
			const ctx = createContext();
			const identity = identityOf(command);
			let result: HumanWriteResult;
			try {
				result = await ctx.human.logManual(item, identity);
			} catch (err) {
				failWith(err);
			}
			if (!result.success) {
				failWith(result.error, [`verify issues list --item ${item}`]);
			}
			outputTOON(
				{ confirmed: { item, by: identity, at: result.state.verified_at } },
				{ pretty: options.pretty, prettyFn: () => console.log(`✓ ${item} confirmed by ${identity}`) },
			);
			finish(ctx, []);
		});

	program
		.command("autolog <command...>")
		.description("Mark items whose triggers match a command you just ran")
		.requiredOption("--exit-code <n>", "Exit code of the command")
		.option("--pretty", "Human-readable output")
		.action(async (words: string[], options: { exitCode: string; pretty?: boolean }, command: Command) => {
			const ctx = createContext();
			const exitCode = Number.parseInt(options.exitCode, 10);
			if (Number.isNaN(exitCode)) {
				outputError(`Error: --exit-code must be an integer, got "${options.exitCode}"`, {
					exitCode: EXIT_CODES.CONFIGURATION,
				});
			}
			let result: AutoLogResult;
			try {
				result = await ctx.human.autoLog(words.join(" "), identityOf(command), exitCode);
			} catch (err) {
				failWith(err);
			}
			const failures = result.results.flatMap((r) => (r.success ? [] : [r]));
			const codes: ExitCode[] = failures.map((f) => f.error.exitCode);
			outputTOON(
				{
					autolog: {
						status: result.status,
						matched: result.matched,
						logged: result.results.filter((r) => r.success).map((r) => r.itemId),
						refused: failures.map((f) => ({ item: f.itemId, reason: f.error.message })),
					},
				},
				{
					pretty: options.pretty,
					prettyFn: () => {
						console.log(`autolog: ${result.status}`);
						for (const r of result.results) {
							console.log(r.success ? `  ✓ ${r.itemId}` : `  ✗ ${r.itemId}: ${r.error.message}`);
						}
					},
				},
			);
			finish(ctx, codes);
		});

	program
		.command("prompt <item>")
		.description("Ask whether an item worked")
		.option("--timeout <s>", "Seconds to wait for an answer")
		.option("--after <command>", "Command that was just run; prompts only when due", "")
		.option("--pretty", "Human-readable output")
		.action(
			async (item: string, options: { timeout?: string; after: string; pretty?: boolean }, command: Command) => {
				const ctx = createContext();
				const identity = identityOf(command);
				if (options.after && !ctx.human.shouldPrompt(options.after, identity, item)) {
					outputTOON({ prompt: { item, outcome: "not-due" } }, { pretty: options.pretty, prettyFn: () => console.log(`${item}: not due`) });
					return;
				}
				const timeout = options.timeout
					? parseCount(options.timeout, "--timeout")
					: ctx.config.human.prompt_timeout;

				let result: PromptResult;
				try {
					result = await ctx.human.promptOpportunistic(item, identity, timeout, createTerminalPrompt(), options.after);
				} catch (err) {
					failWith(err);
				}
				outputTOON(
					{
						prompt: {
							item,
							outcome: result.outcome,
							issue: result.issue?.id ?? null,
							error: result.error?.message ?? null,
						},
					},
					{
						pretty: options.pretty,
						prettyFn: () => {
							console.log(`${item}: ${result.outcome}`);
							if (result.issue) console.log(`Filed ${result.issue.id}`);
							if (result.error) console.log(result.error.message);
						},
					},
				);
				finish(ctx, result.error ? [result.error.exitCode] : []);
			},
		);
}
