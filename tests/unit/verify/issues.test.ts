/**
 * Tests for the issue tracker and its status graph
 */

import { existsSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import { generateIssueId } from "../../../src/verify/issues/tracker.js";
import { InvalidTransitionError, NotFoundError } from "../../../src/verify/types/errors.js";
import { canTransitionIssue, findItem, isBlocking } from "../../../src/verify/types/index.js";
import { makeProject, sampleRegistry, type TestProject } from "./fixtures.js";

describe("generateIssueId", () => {
	test("uses the UTC timestamp and a random suffix", () => {
		const id = generateIssueId(new Date(Date.UTC(2026, 0, 5, 7, 8, 9)));
		expect(id).toMatch(/^VRF-20260105-070809-[0-9a-f]{4}$/);
	});
});

describe("issue status graph", () => {
	test("allowed and refused moves", () => {
		expect(canTransitionIssue("open", "investigating")).toBe(true);
		expect(canTransitionIssue("investigating", "fixed")).toBe(true);
		expect(canTransitionIssue("fixed", "verified")).toBe(true);
		expect(canTransitionIssue("fixed", "reopened")).toBe(true);
		expect(canTransitionIssue("reopened", "investigating")).toBe(true);
		expect(canTransitionIssue("open", "fixed")).toBe(false);
		expect(canTransitionIssue("verified", "reopened")).toBe(false);
	});
});

describe("IssueTracker", () => {
	let project: TestProject;

	beforeEach(() => {
		project = makeProject(sampleRegistry());
	});

	afterEach(() => {
		vi.restoreAllMocks();
		project.cleanup();
	});

	async function fileIssue() {
		return project.tracker.create({
			command: "site backup --full",
			exitCode: 2,
			itemId: "backup-create",
			description: "archive missing the database dump",
			reporter: "tester",
			diagnostics: { site: "staging" },
		});
	}

	test("create writes the issue and links it from the item", async () => {
		writeFileSync(join(project.root, "backup.sh"), "echo hi\n");
		const issue = await fileIssue();

		expect(issue.status).toBe("open");
		expect(issue.exit_code).toBe(2);
		expect(issue.diagnostics.extra).toEqual({ site: "staging" });
		expect(issue.diagnostics.environment.node).toBe(process.version);
		expect(issue.diagnostics.artifacts).toEqual([{ path: "backup.sh", exists: true, size: 8 }]);
		expect(existsSync(join(project.paths.ISSUES_DIR, `${issue.id}.yml`))).toBe(true);
		expect(findItem(project.store.load(), "backup-create")?.item.issues).toEqual([issue.id]);
		expect(project.tracker.show(issue.id)).toEqual(issue);
	});

	test("create refuses unknown items", async () => {
		await expect(
			project.tracker.create({
				command: "x",
				exitCode: null,
				itemId: "ghost",
				description: "",
				reporter: "tester",
			}),
		).rejects.toBeInstanceOf(NotFoundError);
	});

	test("resolution needs a note and records it", async () => {
		const issue = await fileIssue();
		project.tracker.transition(issue.id, "investigating", null, "dev");

		expect(() => project.tracker.transition(issue.id, "fixed", "  ", "dev")).toThrow(
			InvalidTransitionError,
		);

		const fixed = project.tracker.transition(issue.id, "fixed", "dump step restored", "dev");
		expect(fixed.status).toBe("fixed");
		expect(fixed.resolution).toMatchObject({ note: "dump step restored", resolved_by: "dev" });
		expect(fixed.history).toHaveLength(2);
		expect(fixed.history[1]).toMatchObject({ from: "investigating", to: "fixed", by: "dev" });
		expect(isBlocking(fixed)).toBe(false);
	});

	test("reopening clears the resolution and blocks again", async () => {
		const issue = await fileIssue();
		project.tracker.transition(issue.id, "investigating", null, "dev");
		project.tracker.transition(issue.id, "fixed", "patched", "dev");
		const reopened = project.tracker.transition(issue.id, "reopened", null, "qa");

		expect(reopened.resolution).toBeNull();
		expect(isBlocking(reopened)).toBe(true);
		expect(project.tracker.blockingIssuesFor("backup-create").map((i) => i.id)).toEqual([issue.id]);
	});

	test("final statuses cannot move", async () => {
		const issue = await fileIssue();
		project.tracker.transition(issue.id, "wontfix", "by design of the host", "dev");
		expect(() => project.tracker.transition(issue.id, "open", null, "dev")).toThrow(
			`Cannot move issue ${issue.id} from wontfix to open: wontfix is final`,
		);
	});

	test("list filters and skips unreadable files", async () => {
		const warn = vi.spyOn(console, "warn").mockImplementation(() => {});
		const first = await fileIssue();
		const second = await fileIssue();
		project.tracker.transition(second.id, "investigating", null, "dev");
		writeFileSync(join(project.paths.ISSUES_DIR, "VRF-broken.yml"), "id: [");

		expect(project.tracker.list({ status: "open" }).map((i) => i.id)).toEqual([first.id]);
		expect(project.tracker.list({ blockingOnly: true })).toHaveLength(2);
		expect(warn).toHaveBeenCalled();
	});

	test("show of a missing issue", () => {
		expect(() => project.tracker.show("VRF-19700101-000000-0000")).toThrow(NotFoundError);
	});
});
