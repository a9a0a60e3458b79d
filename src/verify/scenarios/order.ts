/**
 * Scenario dependency graph
 */

import { ConfigurationError } from "../types/errors.js";
import type { Scenario } from "../types/index.js";

/**
 * Topological order by depth-first visit in declaration order, so the
 * result is deterministic. Unknown dependencies and cycles are
 * configuration errors.
 */
export function resolveOrder(scenarios: Scenario[]): Scenario[] {
	const byId = new Map(scenarios.map((s) => [s.id, s]));
	const unknown: string[] = [];
	for (const scenario of scenarios) {
		for (const dep of scenario.depends_on) {
			if (!byId.has(dep)) unknown.push(`${scenario.id} depends on unknown scenario ${dep}`);
		}
	}
	if (unknown.length > 0) {
		throw new ConfigurationError("Unknown scenario dependencies", unknown);
	}

	const ordered: Scenario[] = [];
	const done = new Set<string>();
	const visiting: string[] = [];

	const visit = (scenario: Scenario): void => {
		if (done.has(scenario.id)) return;
		const cycleStart = visiting.indexOf(scenario.id);
		if (cycleStart !== -1) {
			const cycle = [...visiting.slice(cycleStart), scenario.id].join(" → ");
			throw new ConfigurationError("Scenario dependency cycle", [cycle]);
		}
		visiting.push(scenario.id);
		for (const dep of scenario.depends_on) {
			const target = byId.get(dep);
			if (target) visit(target);
		}
		visiting.pop();
		done.add(scenario.id);
		ordered.push(scenario);
	};

	for (const scenario of scenarios) visit(scenario);
	return ordered;
}

/** Transitive dependencies of `id`, in topological order */
export function dependencyClosure(scenarios: Scenario[], id: string): string[] {
	const byId = new Map(scenarios.map((s) => [s.id, s]));
	const needed = new Set<string>();
	const walk = (current: string): void => {
		for (const dep of byId.get(current)?.depends_on ?? []) {
			if (!needed.has(dep)) {
				needed.add(dep);
				walk(dep);
			}
		}
	};
	walk(id);
	return resolveOrder(scenarios)
		.map((s) => s.id)
		.filter((s) => needed.has(s));
}

/**
 * Group an ordered list into levels whose members have no dependency edge
 * between them; each level may run in parallel.
 */
export function dependencyLevels(ordered: Scenario[]): Scenario[][] {
	const level = new Map<string, number>();
	const levels: Scenario[][] = [];
	for (const scenario of ordered) {
		const depth = scenario.depends_on.reduce(
			(max, dep) => Math.max(max, (level.get(dep) ?? -1) + 1),
			0,
		);
		level.set(scenario.id, depth);
		if (!levels[depth]) levels[depth] = [];
		levels[depth].push(scenario);
	}
	return levels;
}
