/**
 * Coverage statistics, derived from items on every call
 *
 * Stored feature summaries are a cache for readers of the registry file;
 * nothing here trusts them.
 */

import type {
	Automatability,
	Feature,
	FeatureSummary,
	Issue,
	ItemStatus,
	Registry,
} from "../types/index.js";
import {
	deriveItemStatus,
	isBlocking,
	listItems,
} from "../types/index.js";
import { ClassificationConflictError } from "../types/errors.js";

export interface Ratio {
	numerator: number;
	denominator: number;
	/** Integer percentage, floored; 0 when the denominator is 0 */
	percent: number;
}

export interface ClassStats {
	total: number;
	machine_verified: number;
	human_verified: number;
	fully_verified: number;
}

export interface Statistics {
	total_items: number;
	by_class: Record<Automatability, ClassStats>;
	by_status: Record<ItemStatus, number>;
	/** Denominator is the automatable items only */
	machine: Ratio;
	human: Ratio;
	full: Ratio;
	invalidated: number;
	open_issues: number;
	inconsistencies: string[];
}

export type RecomputeResult =
	| { success: true; statistics: Statistics }
	| { success: false; error: ClassificationConflictError };

export function ratio(numerator: number, denominator: number): Ratio {
	return {
		numerator,
		denominator,
		percent: denominator === 0 ? 0 : Math.floor((numerator * 100) / denominator),
	};
}

/**
 * Per-feature counts written into the registry on every commit
 */
export function summarizeFeature(feature: Feature): FeatureSummary {
	let machine = 0;
	let human = 0;
	let full = 0;
	let invalidated = 0;
	for (const item of feature.items) {
		if (item.machine.verified) machine++;
		if (item.human.verified) human++;
		const status = deriveItemStatus(item);
		if (status === "fully-verified") full++;
		if (status === "invalidated") invalidated++;
	}
	return {
		total: feature.items.length,
		machine_verified: machine,
		human_verified: human,
		fully_verified: full,
		invalidated,
	};
}

function emptyClassStats(): ClassStats {
	return { total: 0, machine_verified: 0, human_verified: 0, fully_verified: 0 };
}

function sameSummary(a: FeatureSummary, b: FeatureSummary): boolean {
	return (
		a.total === b.total &&
		a.machine_verified === b.machine_verified &&
		a.human_verified === b.human_verified &&
		a.fully_verified === b.fully_verified &&
		a.invalidated === b.invalidated
	);
}

/**
 * Recompute statistics from a registry snapshot.
 *
 * Fails closed when a non-automatable item claims a machine verification.
 * Issues are optional; without them the issue cross-checks are skipped.
 */
export function recompute(registry: Registry, issues?: Issue[]): RecomputeResult {
	const located = listItems(registry);

	const conflicts = located
		.filter(({ item }) => item.automatable !== "automatable" && item.machine.verified)
		.map(({ item }) => item.id);
	if (conflicts.length > 0) {
		return { success: false, error: new ClassificationConflictError(conflicts) };
	}

	const byClass: Record<Automatability, ClassStats> = {
		automatable: emptyClassStats(),
		environment_dependent: emptyClassStats(),
		manual_only: emptyClassStats(),
	};
	const byStatus: Record<ItemStatus, number> = {
		untested: 0,
		"machine-only": 0,
		"human-only": 0,
		"fully-verified": 0,
		invalidated: 0,
	};

	const inconsistencies: string[] = [];
	const blockingByItem = new Map<string, string[]>();
	const knownIssues = new Set<string>();
	for (const issue of issues ?? []) {
		knownIssues.add(issue.id);
		if (isBlocking(issue)) {
			const ids = blockingByItem.get(issue.item_id) ?? [];
			ids.push(issue.id);
			blockingByItem.set(issue.item_id, ids);
		}
	}

	for (const { item } of located) {
		const stats = byClass[item.automatable];
		const status = deriveItemStatus(item);
		stats.total++;
		if (item.machine.verified) stats.machine_verified++;
		if (item.human.verified) stats.human_verified++;
		if (status === "fully-verified") stats.fully_verified++;
		byStatus[status]++;

		if (item.machine.verified && item.machine.depth === null) {
			inconsistencies.push(`${item.id}: machine-verified without a recorded depth`);
		}
		const blocking = blockingByItem.get(item.id);
		if (item.human.verified && blocking) {
			inconsistencies.push(
				`${item.id}: human-verified while blocked by ${blocking.join(", ")}`,
			);
		}
		if (issues) {
			for (const ref of item.issues) {
				if (!knownIssues.has(ref)) {
					inconsistencies.push(`${item.id}: references missing issue ${ref}`);
				}
			}
		}
	}

	for (const [featureId, feature] of Object.entries(registry.features)) {
		if (feature.summary && !sameSummary(feature.summary, summarizeFeature(feature))) {
			inconsistencies.push(`${featureId}: stored summary is stale`);
		}
	}

	const automatable = byClass.automatable;
	const total = located.length;
	const humanVerified = located.filter(({ item }) => item.human.verified).length;

	return {
		success: true,
		statistics: {
			total_items: total,
			by_class: byClass,
			by_status: byStatus,
			machine: ratio(automatable.machine_verified, automatable.total),
			human: ratio(humanVerified, total),
			full: ratio(byStatus["fully-verified"], total),
			invalidated: byStatus.invalidated,
			open_issues: [...blockingByItem.values()].reduce((n, ids) => n + ids.length, 0),
			inconsistencies,
		},
	};
}
