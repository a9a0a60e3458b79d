/**
 * Verify type definitions
 *
 * Persisted shapes live in ./schema.ts (zod); this module adds the derived
 * status model, the issue status graph and the depth ladder.
 */

import type {
	Depth,
	Feature,
	Issue,
	IssueStatus,
	Item,
	Registry,
} from "./schema.js";
import { DEPTHS, ISSUE_STATUSES } from "./schema.js";

export type {
	ArtifactCheck,
	Automatability,
	Checkpoint,
	CheckDef,
	Depth,
	DepthChecks,
	Diagnostics,
	Feature,
	FeatureFile,
	FeatureSummary,
	Finding,
	FixPattern,
	HumanChannel,
	HumanState,
	Issue,
	IssueStatus,
	IssueTransition,
	Item,
	MachineCheckState,
	PhaseCommand,
	PreservedResource,
	Registry,
	Resource,
	Scenario,
	ScenarioRecord,
	Step,
	StepSeverity,
	Tolerance,
} from "./schema.js";
export { DEPTHS, ISSUE_STATUSES, SUPPORTED_SCHEMA_VERSIONS } from "./schema.js";

// ============================================
// Depth ladder
// ============================================

export function isDepth(value: string): value is Depth {
	return DEPTHS.some((d) => d === value);
}

/** basic=0 … paranoid=3 */
export function depthRank(depth: Depth): number {
	return DEPTHS.indexOf(depth);
}

/** Deeper of two depths; null counts as below basic */
export function deeperDepth(a: Depth | null, b: Depth | null): Depth | null {
	if (a === null) return b;
	if (b === null) return a;
	return depthRank(a) >= depthRank(b) ? a : b;
}

// ============================================
// Combined item status
// ============================================

export type ItemStatus =
	| "untested"
	| "machine-only"
	| "human-only"
	| "fully-verified"
	| "invalidated";

/**
 * Derive the combined status of an item.
 *
 * Items that cannot legally be machine-verified are fully verified by a
 * human confirmation alone.
 */
export function deriveItemStatus(item: Item): ItemStatus {
	if (item.invalidated) return "invalidated";
	const machineSatisfied =
		item.machine.verified || item.automatable !== "automatable";
	if (item.human.verified && machineSatisfied) return "fully-verified";
	if (item.machine.verified) return "machine-only";
	if (item.human.verified) return "human-only";
	return "untested";
}

/** Item paired with its owning feature id */
export interface LocatedItem {
	featureId: string;
	feature: Feature;
	item: Item;
}

/** Iterate items in registry order (feature map order, then item order) */
export function listItems(registry: Registry): LocatedItem[] {
	const out: LocatedItem[] = [];
	for (const [featureId, feature] of Object.entries(registry.features)) {
		for (const item of feature.items) {
			out.push({ featureId, feature, item });
		}
	}
	return out;
}

export function findItem(
	registry: Registry,
	itemId: string,
): LocatedItem | null {
	return listItems(registry).find((l) => l.item.id === itemId) ?? null;
}

export function countItems(registry: Registry): number {
	let total = 0;
	for (const feature of Object.values(registry.features)) {
		total += feature.items.length;
	}
	return total;
}

export function isAutomatable(item: Item): boolean {
	return item.automatable === "automatable";
}

// ============================================
// Issue status graph
// ============================================

export const ISSUE_TRANSITIONS: Record<IssueStatus, readonly IssueStatus[]> = {
	open: ["investigating", "wontfix", "duplicate"],
	investigating: ["fixed"],
	fixed: ["verified", "reopened"],
	reopened: ["investigating"],
	verified: [],
	wontfix: [],
	duplicate: [],
};

/** Statuses that keep an item blocked from verification */
export const BLOCKING_STATUSES: readonly IssueStatus[] = [
	"open",
	"investigating",
	"reopened",
];

/** Moves that close out work and need a remediation note */
export const RESOLUTION_STATUSES: readonly IssueStatus[] = [
	"fixed",
	"verified",
	"wontfix",
	"duplicate",
];

export function isIssueStatus(value: string): value is IssueStatus {
	return ISSUE_STATUSES.some((s) => s === value);
}

export function canTransitionIssue(from: IssueStatus, to: IssueStatus): boolean {
	return ISSUE_TRANSITIONS[from].includes(to);
}

export function isBlocking(issue: Issue): boolean {
	return BLOCKING_STATUSES.includes(issue.status);
}

// ============================================
// Scenario run state machine
// ============================================

export type ScenarioRunState = "pending" | "running" | "passed" | "failed" | "skipped";

export const SCENARIO_TRANSITIONS: Record<ScenarioRunState, readonly ScenarioRunState[]> = {
	pending: ["running", "skipped"],
	running: ["passed", "failed"],
	passed: [],
	failed: [],
	skipped: [],
};

export function canTransitionScenario(
	from: ScenarioRunState,
	to: ScenarioRunState,
): boolean {
	return SCENARIO_TRANSITIONS[from].includes(to);
}

// ============================================
// Execution results
// ============================================

/** Result of one check execution */
export interface CheckResult {
	command: string;
	passed: boolean;
	exitCode: number | null;
	expectedExit: number;
	timedOut: boolean;
	durationMs: number;
	outputTail: string;
}

/** Placeholder values substituted into check commands */
export interface CheckContext {
	site?: string;
	root?: string;
	depth?: Depth;
	run_id?: string;
	/** Scenario captures, substituted as {name} */
	captured?: Record<string, string>;
}
