/**
 * Machine Verifier
 *
 * Runs an item's checks at one depth and records the outcome. Each depth's
 * check list is authoritative for that depth; a missing list is a
 * configuration gap, never a pass.
 */

import type { IssueTracker } from "../issues/tracker.js";
import {
	detectChanges,
	invalidateItem,
	recordFingerprints,
} from "../registry/fingerprint.js";
import type { RegistryStore } from "../registry/store.js";
import { logEvent } from "../state/events.js";
import type { VerifyPaths } from "../state/paths.js";
import {
	BlockedByIssueError,
	ClassificationConflictError,
	ConfigurationGapError,
	EXIT_CODES,
	ExecutorFault,
	type ExitCode,
	NotFoundError,
	type VerifyError,
} from "../types/errors.js";
import type {
	CheckContext,
	CheckResult,
	Depth,
	MachineCheckState,
} from "../types/index.js";
import { deeperDepth, findItem, isAutomatable } from "../types/index.js";
import { runPool } from "../utils/pool.js";
import type { CheckExecutor } from "./executor.js";

export type MachineOutcome =
	| {
			itemId: string;
			status: "verified" | "failed";
			depth: Depth;
			results: CheckResult[];
			state: MachineCheckState;
	  }
	| {
			itemId: string;
			status: "skipped";
			depth: Depth;
			error: ConfigurationGapError;
	  }
	| {
			/** Non-automatable item without checks at this depth; nothing to do */
			itemId: string;
			status: "not-automatable";
			depth: Depth;
	  }
	| {
			itemId: string;
			status: "conflict" | "blocked";
			depth: Depth;
			results: CheckResult[];
			error: ClassificationConflictError | BlockedByIssueError;
	  }
	| {
			itemId: string;
			status: "error";
			depth: Depth;
			error: VerifyError;
	  };

export interface FeatureReport {
	featureId: string;
	outcomes: MachineOutcome[];
}

export interface MachineVerifierDeps {
	paths: VerifyPaths;
	store: RegistryStore;
	tracker: IssueTracker;
	executor: CheckExecutor;
}

export function outcomeExitCode(outcome: MachineOutcome): ExitCode {
	switch (outcome.status) {
		case "verified":
		case "not-automatable":
			return EXIT_CODES.OK;
		case "failed":
			return EXIT_CODES.FAILURES;
		case "skipped":
		case "conflict":
		case "blocked":
		case "error":
			return outcome.error.exitCode;
	}
}

/** Tail of the first failing check, or of the last check when all passed */
function pickTail(results: CheckResult[]): string {
	const failing = results.find((r) => !r.passed);
	return (failing ?? results[results.length - 1]).outputTail;
}

export class MachineVerifier {
	constructor(private readonly deps: MachineVerifierDeps) {}

	/**
	 * Run every check declared at `depth`, in order and without
	 * short-circuiting, then record the result.
	 */
	async verifyItem(
		itemId: string,
		depth: Depth,
		context: CheckContext = {},
		sweep = false,
	): Promise<MachineOutcome> {
		const { paths, store, tracker, executor } = this.deps;
		const located = findItem(store.load(), itemId);
		if (!located) {
			throw new NotFoundError("Item", itemId);
		}
		const { item } = located;

		const checks = item.checks[depth] ?? [];
		if (checks.length === 0) {
			if (sweep && !isAutomatable(item)) {
				return { itemId, status: "not-automatable", depth };
			}
			return { itemId, status: "skipped", depth, error: new ConfigurationGapError(itemId, depth) };
		}

		const results: CheckResult[] = [];
		try {
			for (const check of checks) {
				results.push(
					await executor.run(check, { root: paths.PROJECT_ROOT, ...context, depth }),
				);
			}
		} catch (err) {
			if (err instanceof ExecutorFault) return { itemId, status: "error", depth, error: err };
			throw err;
		}
		const passed = results.every((r) => r.passed);
		const durationMs = results.reduce((sum, r) => sum + r.durationMs, 0);

		// Classification and blocking issues are read under the registry lock
		const update = await store.atomicUpdate((draft) => {
			const target = findItem(draft, itemId);
			if (!target) throw new NotFoundError("Item", itemId);
			if (passed && !isAutomatable(target.item)) {
				throw new ClassificationConflictError([itemId]);
			}
			if (passed) {
				const blocking = tracker.blockingIssuesFor(itemId);
				if (blocking.length > 0) {
					throw new BlockedByIssueError(
						itemId,
						blocking.map((i) => i.id),
					);
				}
			}
			const previous = target.item.machine;
			target.item.machine = {
				verified: passed,
				depth: passed
					? deeperDepth(previous.verified ? previous.depth : null, depth)
					: null,
				verified_at: passed ? new Date().toISOString() : null,
				duration_ms: durationMs,
				output_tail: pickTail(results),
				depth_exercised: depth,
			};
			if (passed) target.item.invalidated = false;
		});
		if (!update.success) {
			const { error } = update;
			if (error instanceof ClassificationConflictError) {
				console.error(`Error: ${error.message}`);
				return { itemId, status: "conflict", depth, results, error };
			}
			if (error instanceof BlockedByIssueError) {
				return { itemId, status: "blocked", depth, results, error };
			}
			return { itemId, status: "error", depth, error };
		}
		const written = findItem(update.registry, itemId);
		if (!written) {
			return { itemId, status: "error", depth, error: new NotFoundError("Item", itemId) };
		}

		logEvent(paths, {
			event: passed ? "machine_verified" : "machine_failed",
			item: itemId,
			depth,
			duration_ms: durationMs,
		});
		return { itemId, status: passed ? "verified" : "failed", depth, results, state: written.item.machine };
	}

	/**
	 * Verify a feature's items in order, then record its file fingerprints.
	 */
	async verifyFeature(
		featureId: string,
		depth: Depth,
		context: CheckContext = {},
	): Promise<FeatureReport> {
		const { paths, store } = this.deps;
		const feature = store.load().features[featureId];
		if (!feature) {
			throw new NotFoundError("Feature", featureId);
		}

		const outcomes: MachineOutcome[] = [];
		for (const item of feature.items) {
			outcomes.push(await this.verifyItem(item.id, depth, context, true));
		}

		const recorded = await store.atomicUpdate((draft) => {
			const target = draft.features[featureId];
			if (target) recordFingerprints(target, paths.PROJECT_ROOT);
		});
		if (!recorded.success) {
			console.error(`Warning: fingerprints for ${featureId} not recorded: ${recorded.error.message}`);
		}

		return { featureId, outcomes };
	}

	/** Independent features fan out across `concurrency` lanes */
	verifyAll(
		depth: Depth,
		concurrency: number,
		context: CheckContext = {},
		featureIds?: string[],
	): Promise<FeatureReport[]> {
		const ids = featureIds ?? Object.keys(this.deps.store.load().features);
		return runPool(ids, concurrency, (id) => this.verifyFeature(id, depth, context));
	}

	/**
	 * Invalidate items of features whose fingerprints changed.
	 * Returns the affected feature and item ids.
	 */
	async invalidateChanged(): Promise<{ features: string[]; items: string[] }> {
		const { paths, store } = this.deps;
		const { changed } = detectChanges(store.load(), paths.PROJECT_ROOT);
		if (changed.length === 0) return { features: [], items: [] };

		const items: string[] = [];
		const update = await store.atomicUpdate((draft) => {
			for (const featureId of changed) {
				const feature = draft.features[featureId];
				if (!feature) continue;
				for (const item of feature.items) {
					invalidateItem(item);
					items.push(item.id);
				}
				recordFingerprints(feature, paths.PROJECT_ROOT);
			}
		});
		if (!update.success) throw update.error;

		logEvent(paths, { event: "items_invalidated", features: changed, items });
		return { features: changed, items };
	}

	/**
	 * Re-run features whose files changed, were never fingerprinted, or
	 * still hold invalidated items from an earlier `check`.
	 */
	async verifyAffected(
		depth: Depth,
		concurrency: number,
		context: CheckContext = {},
	): Promise<FeatureReport[]> {
		const { paths, store } = this.deps;
		const { unrecorded } = detectChanges(store.load(), paths.PROJECT_ROOT);
		const { features: changed } = await this.invalidateChanged();
		const affected = new Set([...changed, ...unrecorded]);
		for (const [featureId, feature] of Object.entries(store.load().features)) {
			if (feature.items.some((item) => item.invalidated)) affected.add(featureId);
		}
		const ordered = Object.keys(store.load().features).filter((id) => affected.has(id));
		if (ordered.length === 0) return [];
		return this.verifyAll(depth, concurrency, context, ordered);
	}
}
