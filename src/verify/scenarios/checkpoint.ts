/**
 * Scenario checkpoint - the durability boundary for scenario runs
 */

import { existsSync, mkdirSync, renameSync } from "node:fs";
import { join } from "node:path";
import { logEvent } from "../state/events.js";
import type { VerifyPaths } from "../state/paths.js";
import { ConfigurationError } from "../types/errors.js";
import type {
	Checkpoint,
	Finding,
	PreservedResource,
	ScenarioRecord,
} from "../types/index.js";
import { CheckpointSchema, formatZodIssues } from "../types/schema.js";
import { readYaml, writeYamlAtomic } from "../utils/yaml.js";

function pad(n: number): string {
	return String(n).padStart(2, "0");
}

/** verify-YYYYMMDD-HHMMSS (UTC) */
export function generateRunId(now: Date = new Date()): string {
	const date = `${now.getUTCFullYear()}${pad(now.getUTCMonth() + 1)}${pad(now.getUTCDate())}`;
	const time = `${pad(now.getUTCHours())}${pad(now.getUTCMinutes())}${pad(now.getUTCSeconds())}`;
	return `verify-${date}-${time}`;
}

export function newCheckpoint(runId: string = generateRunId()): Checkpoint {
	const now = new Date().toISOString();
	return {
		run_id: runId,
		started_at: now,
		last_updated: now,
		completed: [],
		current: null,
		resources: [],
		findings: [],
	};
}

/** Latest record per scenario id */
export function latestRecords(checkpoint: Checkpoint): Map<string, ScenarioRecord> {
	const records = new Map<string, ScenarioRecord>();
	for (const record of checkpoint.completed) records.set(record.id, record);
	return records;
}

export function passedIds(checkpoint: Checkpoint): Set<string> {
	const passed = new Set<string>();
	for (const [id, record] of latestRecords(checkpoint)) {
		if (record.status === "passed") passed.add(id);
	}
	return passed;
}

export function recordCompletion(checkpoint: Checkpoint, record: ScenarioRecord): void {
	checkpoint.completed = checkpoint.completed.filter((r) => r.id !== record.id);
	checkpoint.completed.push(record);
	checkpoint.current = null;
}

export function addFinding(checkpoint: Checkpoint, finding: Omit<Finding, "at">): void {
	checkpoint.findings.push({ ...finding, at: new Date().toISOString() });
}

export interface FindingFilter {
	scenario?: string;
	type?: Finding["type"];
}

/** Findings in the order they were logged */
export function listFindings(checkpoint: Checkpoint, filter: FindingFilter = {}): Finding[] {
	return checkpoint.findings.filter(
		(f) =>
			(!filter.scenario || f.scenario === filter.scenario) &&
			(!filter.type || f.type === filter.type),
	);
}

/** Resources are owned by one scenario; records match on (name, scenario) */
export function setResource(checkpoint: Checkpoint, resource: PreservedResource): void {
	removeResource(checkpoint, resource.name, resource.scenario);
	checkpoint.resources.push(resource);
}

export function removeResource(checkpoint: Checkpoint, name: string, scenario: string): void {
	checkpoint.resources = checkpoint.resources.filter(
		(r) => r.name !== name || r.scenario !== scenario,
	);
}

export function preservedResource(
	checkpoint: Checkpoint,
	name: string,
	scenario: string,
): PreservedResource | null {
	return (
		checkpoint.resources.find((r) => r.name === name && r.scenario === scenario && r.preserve) ??
		null
	);
}

export class CheckpointStore {
	constructor(private readonly paths: VerifyPaths) {}

	exists(): boolean {
		return existsSync(this.paths.CHECKPOINT_FILE);
	}

	load(): Checkpoint | null {
		if (!this.exists()) return null;
		const parsed = CheckpointSchema.safeParse(readYaml(this.paths.CHECKPOINT_FILE));
		if (!parsed.success) {
			throw new ConfigurationError(
				`Invalid checkpoint ${this.paths.CHECKPOINT_FILE}`,
				formatZodIssues(parsed.error),
			);
		}
		return parsed.data;
	}

	save(checkpoint: Checkpoint): void {
		checkpoint.last_updated = new Date().toISOString();
		writeYamlAtomic(this.paths.CHECKPOINT_FILE, checkpoint);
	}

	/** Move the checkpoint to checkpoints/<run_id>.yml */
	archive(checkpoint: Checkpoint): string {
		mkdirSync(this.paths.CHECKPOINT_ARCHIVE_DIR, { recursive: true });
		const target = join(this.paths.CHECKPOINT_ARCHIVE_DIR, `${checkpoint.run_id}.yml`);
		this.save(checkpoint);
		renameSync(this.paths.CHECKPOINT_FILE, target);
		logEvent(this.paths, { event: "checkpoint_archived", run_id: checkpoint.run_id });
		return target;
	}
}
