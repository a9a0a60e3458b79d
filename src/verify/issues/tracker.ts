/**
 * Issue Tracker
 *
 * One YAML document per issue under .verify/issues/. The issue files are the
 * source of truth for blocking; the item's `issues` list is a cross-reference.
 */

import { randomBytes } from "node:crypto";
import { existsSync, readdirSync } from "node:fs";
import { join } from "node:path";
import type { RegistryStore } from "../registry/store.js";
import { logEvent } from "../state/events.js";
import type { VerifyPaths } from "../state/paths.js";
import { InvalidTransitionError, NotFoundError } from "../types/errors.js";
import type { Issue, IssueStatus } from "../types/index.js";
import {
	canTransitionIssue,
	findItem,
	isBlocking,
	ISSUE_TRANSITIONS,
	RESOLUTION_STATUSES,
} from "../types/index.js";
import { formatZodIssues, IssueSchema } from "../types/schema.js";
import { readYaml, writeYamlAtomic } from "../utils/yaml.js";
import { collectDiagnostics } from "./diagnostics.js";

export interface CreateIssueInput {
	command: string;
	exitCode: number | null;
	itemId: string;
	description: string;
	reporter: string;
	/** Caller-supplied facts, stored beside the automatic bundle */
	diagnostics?: Record<string, string>;
}

export interface IssueFilter {
	status?: IssueStatus;
	itemId?: string;
	blockingOnly?: boolean;
}

function pad(n: number): string {
	return String(n).padStart(2, "0");
}

/** VRF-YYYYMMDD-HHMMSS-xxxx (UTC) */
export function generateIssueId(now: Date = new Date()): string {
	const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
	const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
	return `VRF-${date}-${time}-${randomBytes(2).toString("hex")}`;
}

export class IssueTracker {
	constructor(
		private readonly paths: VerifyPaths,
		private readonly store: RegistryStore,
	) {}

	private issuePath(id: string): string {
		return join(this.paths.ISSUES_DIR, `${id}.yml`);
	}

	private save(issue: Issue): void {
		writeYamlAtomic(this.issuePath(issue.id), issue);
	}

	/**
	 * File a new open issue against an item and link it from the registry.
	 */
	async create(input: CreateIssueInput): Promise<Issue> {
		const located = findItem(this.store.load(), input.itemId);
		if (!located) {
			throw new NotFoundError("Item", input.itemId);
		}

		const issue: Issue = {
			id: generateIssueId(),
			created: new Date().toISOString(),
			reporter: input.reporter,
			command: input.command,
			exit_code: input.exitCode,
			item_id: input.itemId,
			description: input.description,
			diagnostics: collectDiagnostics(
				this.paths.PROJECT_ROOT,
				located.feature,
				input.diagnostics,
			),
			status: "open",
			history: [],
			resolution: null,
		};
		this.save(issue);

		const linked = await this.store.atomicUpdate((draft) => {
			const target = findItem(draft, input.itemId);
			if (target && !target.item.issues.includes(issue.id)) {
				target.item.issues.push(issue.id);
			}
		});
		if (!linked.success) {
			console.error(
				`Warning: issue ${issue.id} saved but not linked in the registry: ${linked.error.message}`,
			);
		}

		logEvent(this.paths, {
			event: "issue_created",
			issue: issue.id,
			item: issue.item_id,
			reporter: issue.reporter,
		});
		return issue;
	}

	/**
	 * Move an issue along the status graph. Resolution moves need a note.
	 */
	transition(id: string, to: IssueStatus, note: string | null, by: string): Issue {
		const issue = this.show(id);
		const from = issue.status;

		if (!canTransitionIssue(from, to)) {
			const allowed = ISSUE_TRANSITIONS[from];
			throw new InvalidTransitionError(
				`issue ${id}`,
				from,
				to,
				allowed.length > 0 ? `allowed: ${allowed.join(", ")}` : `${from} is final`,
			);
		}
		const trimmed = note?.trim() ?? "";
		if (RESOLUTION_STATUSES.includes(to) && !trimmed) {
			throw new InvalidTransitionError(`issue ${id}`, from, to, "a remediation note is required");
		}

		const at = new Date().toISOString();
		issue.status = to;
		issue.history.push({ from, to, at, by, note: trimmed || null });
		if (RESOLUTION_STATUSES.includes(to)) {
			issue.resolution = { note: trimmed, resolved_at: at, resolved_by: by };
		} else if (to === "reopened") {
			issue.resolution = null;
		}
		this.save(issue);

		logEvent(this.paths, { event: "issue_transitioned", issue: id, from, to, by });
		return issue;
	}

	show(id: string): Issue {
		const path = this.issuePath(id);
		if (!existsSync(path)) {
			throw new NotFoundError("Issue", id);
		}
		const parsed = IssueSchema.safeParse(readYaml(path));
		if (!parsed.success) {
			throw new NotFoundError("Valid issue", `${id} (${formatZodIssues(parsed.error).join("; ")})`);
		}
		return parsed.data;
	}

	/** All readable issues, oldest first. Unreadable files are reported and skipped. */
	list(filter: IssueFilter = {}): Issue[] {
		if (!existsSync(this.paths.ISSUES_DIR)) return [];

		const issues: Issue[] = [];
		const files = readdirSync(this.paths.ISSUES_DIR)
			.filter((f) => f.endsWith(".yml"))
			.sort();
		for (const file of files) {
			try {
				issues.push(this.show(file.replace(/\.yml$/, "")));
			} catch (err) {
				console.warn(
					`Warning: skipping issue ${file}: ${err instanceof Error ? err.message : String(err)}`,
				);
			}
		}

		return issues.filter(
			(issue) =>
				(!filter.status || issue.status === filter.status) &&
				(!filter.itemId || issue.item_id === filter.itemId) &&
				(!filter.blockingOnly || isBlocking(issue)),
		);
	}

	blockingIssuesFor(itemId: string): Issue[] {
		return this.list({ itemId, blockingOnly: true });
	}
}
