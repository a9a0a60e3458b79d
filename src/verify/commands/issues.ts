/**
 * verify issues - file and triage verification issues
 *
 * Commands:
 * - issues list [--status <s>]
 * - issues show <id>
 * - issues resolve <id> <status> --note <text>
 * - issues submit --item <id> --command <cmd> --exit-code <n> --description <text>
 */

import type { Command } from "commander";
import { EXIT_CODES } from "../types/errors.js";
import { isBlocking, ISSUE_STATUSES, isIssueStatus, type IssueStatus } from "../types/index.js";
import { outputError, outputTOON } from "../types/toon.js";
import { createContext, failWith, finish, identityOf } from "./context.js";

function parseStatus(value: string): IssueStatus {
	if (!isIssueStatus(value)) {
		outputError(`Error: unknown issue status "${value}"`, {
			suggestions: [`Valid statuses: ${ISSUE_STATUSES.join(", ")}`],
			exitCode: EXIT_CODES.CONFIGURATION,
		});
	}
	return value;
}

export function registerIssuesCommands(program: Command): void {
	const issues = program.command("issues").description("Verification issues");

	issues
		.command("list")
		.description("List issues, oldest first")
		.option("--status <status>", "Only issues in this status")
		.option("--item <id>", "Only issues against this item")
		.option("--pretty", "Human-readable output")
		.action((options: { status?: string; item?: string; pretty?: boolean }) => {
			const ctx = createContext();
			const list = ctx.tracker.list({
				...(options.status ? { status: parseStatus(options.status) } : {}),
				...(options.item ? { itemId: options.item } : {}),
			});
			const rows = list.map((i) => ({
				id: i.id,
				status: i.status,
				item: i.item_id,
				blocking: isBlocking(i),
				reporter: i.reporter,
				description: i.description,
			}));
			outputTOON(
				{ issues: rows },
				{
					pretty: options.pretty,
					prettyFn: () => {
						if (rows.length === 0) console.log("No issues");
						for (const r of rows) {
							console.log(`${r.id} [${r.status}${r.blocking ? ", blocking" : ""}] ${r.item}: ${r.description}`);
						}
					},
				},
			);
			finish(ctx, []);
		});

	issues
		.command("show <id>")
		.description("Show one issue with its diagnostics and history")
		.option("--pretty", "Human-readable output")
		.action((id: string, options: { pretty?: boolean }) => {
			const ctx = createContext();
			try {
				const issue = ctx.tracker.show(id);
				outputTOON({ issue }, { pretty: options.pretty });
			} catch (err) {
				failWith(err, ["verify issues list"]);
			}
		});

	issues
		.command("resolve <id> <status>")
		.description("Move an issue to a new status")
		.option("--note <text>", "Remediation note (required for fixed, verified, wontfix, duplicate)")
		.option("--pretty", "Human-readable output")
		.action((id: string, status: string, options: { note?: string; pretty?: boolean }, command: Command) => {
			const ctx = createContext();
			try {
				const issue = ctx.tracker.transition(id, parseStatus(status), options.note ?? null, identityOf(command));
				outputTOON(
					{ issue: { id: issue.id, status: issue.status, resolution: issue.resolution } },
					{
						pretty: options.pretty,
						prettyFn: () => console.log(`${issue.id} → ${issue.status}`),
						agent_hint: isBlocking(issue)
							? undefined
							: `Issue no longer blocks; re-verify with: verify confirm ${issue.item_id}`,
					},
				);
				finish(ctx, []);
			} catch (err) {
				failWith(err);
			}
		});

	issues
		.command("submit")
		.description("File an issue against an item")
		.requiredOption("--item <id>", "Item the issue is about")
		.requiredOption("--description <text>", "What went wrong")
		.option("--command <cmd>", "Command that exposed the problem", "")
		.option("--exit-code <n>", "Exit code of that command")
		.option("--pretty", "Human-readable output")
		.action(
			async (
				options: { item: string; description: string; command: string; exitCode?: string; pretty?: boolean },
				command: Command,
			) => {
				const ctx = createContext();
				const exitCode = options.exitCode === undefined ? null : Number.parseInt(options.exitCode, 10);
				if (exitCode !== null && Number.isNaN(exitCode)) {
					outputError(`Error: --exit-code must be an integer, got "${options.exitCode}"`, {
						exitCode: EXIT_CODES.CONFIGURATION,
					});
				}
				try {
					const issue = await ctx.tracker.create({
						command: options.command,
						exitCode,
						itemId: options.item,
						description: options.description,
						reporter: identityOf(command),
					});
					outputTOON(
						{ issue: { id: issue.id, item: issue.item_id, status: issue.status } },
						{
							pretty: options.pretty,
							prettyFn: () => console.log(`Filed ${issue.id} against ${issue.item_id}`),
						},
					);
					finish(ctx, []);
				} catch (err) {
					failWith(err);
				}
			},
		);
}
