/**
 * Badge export on a four-color scale
 */

import { mkdirSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import type { BadgeColor, BadgeThresholds, BadgeType } from "../state/config.js";
import type { Ratio, Statistics } from "./aggregate.js";
import { ratio } from "./aggregate.js";
import type { Peaks } from "./peaks.js";

export interface Badge {
	key: string;
	label: string;
	value: string;
	color: BadgeColor;
	numerator: number;
	denominator: number;
}

export interface ExtendedInputs {
	peaks?: Peaks;
	/** Mean confidence of the latest scenario records, if any */
	scenarioConfidence?: number | null;
}

/**
 * Ascending: bands are lower bounds for orange, yellow, brightgreen.
 * Descending: bands are upper bounds for orange, yellow, brightgreen.
 */
export function colorFor(value: number, thresholds: BadgeThresholds): BadgeColor {
	const [orange, yellow, green] = thresholds.bands;
	if (thresholds.ascending) {
		if (value >= green) return "brightgreen";
		if (value >= yellow) return "yellow";
		if (value >= orange) return "orange";
		return "red";
	}
	if (value <= green) return "brightgreen";
	if (value <= yellow) return "yellow";
	if (value <= orange) return "orange";
	return "red";
}

function percentBadge(
	key: string,
	label: string,
	r: Ratio,
	thresholds: BadgeThresholds,
): Badge {
	return {
		key,
		label,
		value: `${r.percent}%`,
		color: colorFor(r.percent, thresholds),
		numerator: r.numerator,
		denominator: r.denominator,
	};
}

export function exportBadges(
	statistics: Statistics,
	thresholds: Record<BadgeType, BadgeThresholds>,
	extended: ExtendedInputs | null = null,
): Badge[] {
	const badges: Badge[] = [
		percentBadge("machine", "machine verified", statistics.machine, thresholds.machine),
		percentBadge("human", "human verified", statistics.human, thresholds.human),
		percentBadge("full", "fully verified", statistics.full, thresholds.full),
		{
			key: "issues",
			label: "open issues",
			value: String(statistics.open_issues),
			color: colorFor(statistics.open_issues, thresholds.issues),
			numerator: statistics.open_issues,
			denominator: statistics.total_items,
		},
	];

	if (!extended) return badges;

	const env = statistics.by_class.environment_dependent;
	const manual = statistics.by_class.manual_only;
	badges.push(
		percentBadge(
			"environment_dependent",
			"env-dependent verified",
			ratio(env.human_verified, env.total),
			thresholds.human,
		),
		percentBadge(
			"manual_only",
			"manual-only verified",
			ratio(manual.human_verified, manual.total),
			thresholds.human,
		),
	);

	if (extended.scenarioConfidence !== undefined && extended.scenarioConfidence !== null) {
		const confidence = Math.floor(extended.scenarioConfidence);
		badges.push({
			key: "scenario_confidence",
			label: "scenario confidence",
			value: `${confidence}%`,
			color: colorFor(confidence, thresholds.machine),
			numerator: confidence,
			denominator: 100,
		});
	}

	const machinePeak = extended.peaks?.metrics.machine_coverage;
	if (machinePeak) {
		badges.push({
			key: "machine_peak",
			label: "machine peak",
			value: `${statistics.machine.percent}% ▲${machinePeak.peak}%`,
			color: colorFor(statistics.machine.percent, thresholds.machine),
			numerator: statistics.machine.percent,
			denominator: machinePeak.peak,
		});
	}

	return badges;
}

/** Write .badges.json: `{generated_at, badges: {key: {label, message, color}}}` */
export function writeBadgesFile(path: string, badges: Badge[]): void {
	const doc = {
		generated_at: new Date().toISOString(),
		badges: Object.fromEntries(
			badges.map((b) => [b.key, { label: b.label, message: b.value, color: b.color }]),
		),
	};
	mkdirSync(dirname(path), { recursive: true });
	writeFileSync(path, `${JSON.stringify(doc, null, 2)}\n`);
}
