/**
 * Human Verifier
 *
 * Three entry points (manual, auto-logged, opportunistic) share one write
 * path, which refuses while the item has a blocking issue.
 */

import type { IssueTracker } from "../issues/tracker.js";
import type { RegistryStore } from "../registry/store.js";
import { buildTriggerTable, matchTriggers, tokenize } from "../registry/triggers.js";
import type { VerifyConfig } from "../state/config.js";
import { logEvent } from "../state/events.js";
import type { VerifyPaths } from "../state/paths.js";
import { BlockedByIssueError, NotFoundError, type VerifyError } from "../types/errors.js";
import type { HumanChannel, HumanState, Issue } from "../types/index.js";
import { findItem } from "../types/index.js";
import type { PromptPrefsStore } from "./prefs.js";
import type { PromptIO } from "./prompt.js";

export type HumanWriteResult =
	| { success: true; itemId: string; state: HumanState }
	| { success: false; itemId: string; error: VerifyError };

export type AutoLogStatus = "logged" | "no-consent" | "command-failed" | "no-match";

export interface AutoLogResult {
	status: AutoLogStatus;
	matched: string[];
	results: HumanWriteResult[];
}

export type PromptOutcome =
	| "verified"
	| "issue-created"
	| "session-skipped"
	| "permanently-skipped"
	| "timed-out";

export interface PromptResult {
	itemId: string;
	outcome: PromptOutcome;
	issue?: Issue;
	/** Set when the item could not be confirmed (blocked, registry write failed) */
	error?: VerifyError;
}

export interface HumanVerifierDeps {
	paths: VerifyPaths;
	config: VerifyConfig;
	store: RegistryStore;
	tracker: IssueTracker;
	prefs: PromptPrefsStore;
}

export class HumanVerifier {
	/** Items skipped with "s" during this process */
	private readonly sessionSkips = new Set<string>();

	constructor(private readonly deps: HumanVerifierDeps) {}

	private async writeVerified(
		itemId: string,
		identity: string,
		channel: HumanChannel,
	): Promise<HumanWriteResult> {
		const { paths, store, tracker } = this.deps;

		const update = await store.atomicUpdate((draft) => {
			const target = findItem(draft, itemId);
			if (!target) throw new NotFoundError("Item", itemId);
			const blocking = tracker.blockingIssuesFor(itemId);
			if (blocking.length > 0) {
				throw new BlockedByIssueError(
					itemId,
					blocking.map((i) => i.id),
				);
			}
			target.item.human = {
				verified: true,
				verified_at: new Date().toISOString(),
				verified_by: identity,
				channel,
			};
			target.item.invalidated = false;
		});
		if (!update.success) {
			return { success: false, itemId, error: update.error };
		}
		const written = findItem(update.registry, itemId);
		if (!written) {
			return { success: false, itemId, error: new NotFoundError("Item", itemId) };
		}

		logEvent(paths, { event: "human_verified", item: itemId, by: identity, channel });
		return { success: true, itemId, state: written.item.human };
	}

	/** Direct operator confirmation */
	logManual(itemId: string, identity: string): Promise<HumanWriteResult> {
		return this.writeVerified(itemId, identity, "manual");
	}

	/**
	 * Mark every item whose trigger matches a successful command, provided
	 * the identity consented to auto-logging.
	 */
	async autoLog(command: string, identity: string, exitCode: number): Promise<AutoLogResult> {
		if (exitCode !== 0) {
			return { status: "command-failed", matched: [], results: [] };
		}
		if (!this.deps.config.human.autolog_consent.includes(identity)) {
			return { status: "no-consent", matched: [], results: [] };
		}

		const registry = this.deps.store.load();
		const matched = matchTriggers(buildTriggerTable(registry), command);
		if (matched.length === 0) {
			return { status: "no-match", matched, results: [] };
		}

		const results: HumanWriteResult[] = [];
		for (const itemId of matched) {
			results.push(await this.writeVerified(itemId, identity, "auto-logged"));
		}
		return { status: "logged", matched, results };
	}

	/**
	 * Whether an opportunistic prompt is due for `itemId` after `command`:
	 * tester list, prompt mode, read-only commands and skips all apply.
	 */
	shouldPrompt(command: string, identity: string, itemId: string): boolean {
		const { human } = this.deps.config;
		if (human.prompt_mode === "never") return false;
		if (human.testers.length > 0 && !human.testers.includes(identity)) return false;

		const [tool, subcommand] = tokenize(command);
		if (human.skip_commands.some((c) => c === tool || c === subcommand)) return false;

		if (this.sessionSkips.has(itemId)) return false;
		if (this.deps.prefs.isSkipped(identity, itemId)) return false;

		if (human.prompt_mode === "unverified") {
			const located = findItem(this.deps.store.load(), itemId);
			return located !== null && !located.item.human.verified;
		}
		return true;
	}

	/**
	 * Ask whether the item behaved as described.
	 *
	 * y/empty confirms, n files an issue, s skips for this session,
	 * d never asks this identity again. No answer within the timeout is
	 * `timed-out`.
	 */
	async promptOpportunistic(
		itemId: string,
		identity: string,
		timeoutSec: number,
		io: PromptIO,
		command = "",
	): Promise<PromptResult> {
		const { paths, store, tracker, prefs } = this.deps;

		if (prefs.isSkipped(identity, itemId)) {
			return { itemId, outcome: "permanently-skipped" };
		}
		if (this.sessionSkips.has(itemId)) {
			return { itemId, outcome: "session-skipped" };
		}

		const located = findItem(store.load(), itemId);
		if (!located) {
			throw new NotFoundError("Item", itemId);
		}
		const blocking = tracker.blockingIssuesFor(itemId);
		if (blocking.length > 0) {
			return {
				itemId,
				outcome: "session-skipped",
				error: new BlockedByIssueError(
					itemId,
					blocking.map((i) => i.id),
				),
			};
		}

		const timeoutMs = timeoutSec * 1000;
		const answer = await io.ask(
			`Did this work: "${located.item.text}"? [Y/n/s/d] `,
			timeoutMs,
		);
		if (answer === null) {
			return { itemId, outcome: "timed-out" };
		}

		switch (answer.trim().toLowerCase()) {
			case "":
			case "y":
			case "yes": {
				const written = await this.writeVerified(itemId, identity, "opportunistic");
				if (!written.success) {
					return { itemId, outcome: "session-skipped", error: written.error };
				}
				return { itemId, outcome: "verified" };
			}
			case "n":
			case "no": {
				const details = await io.ask("What went wrong? ", timeoutMs);
				const issue = await tracker.create({
					command,
					exitCode: null,
					itemId,
					description: details?.trim() || `Not confirmed by ${identity}: ${located.item.text}`,
					reporter: identity,
					diagnostics: { channel: "opportunistic" },
				});
				logEvent(paths, { event: "human_denied", item: itemId, by: identity, issue: issue.id });
				return { itemId, outcome: "issue-created", issue };
			}
			case "d":
				prefs.addSkip(identity, itemId);
				return { itemId, outcome: "permanently-skipped" };
			default:
				this.sessionSkips.add(itemId);
				return { itemId, outcome: "session-skipped" };
		}
	}
}
