/**
 * Baseline comparison for scenario steps
 */

import type { Tolerance } from "../types/index.js";

const NUMERIC = /^-?\d+(\.\d+)?$/;

/** true/yes/1/on/enabled → "true", false/no/0/off/disabled → "false" */
export function normalizeBoolean(value: string): string {
	switch (value.toLowerCase()) {
		case "true":
		case "yes":
		case "1":
		case "on":
		case "enabled":
			return "true";
		case "false":
		case "no":
		case "0":
		case "off":
		case "disabled":
			return "false";
		default:
			return value;
	}
}

/** Absolute tolerance for a baseline; "N%" is relative to the baseline */
export function toleranceFor(expected: number, tolerance: Tolerance): number {
	if (typeof tolerance === "number") return tolerance;
	const percent = Number.parseFloat(tolerance.slice(0, -1));
	return Math.abs((expected * percent) / 100);
}

/**
 * Compare an observed value with its baseline.
 *
 * Both empty is equal, one empty is not. Then exact string match, numeric
 * difference within tolerance, and finally boolean normalization.
 */
export function compareValues(expected: string, actual: string, tolerance: Tolerance = 0): boolean {
	const e = expected.trim();
	const a = actual.trim();

	if (e === "" && a === "") return true;
	if (e === "" || a === "") return false;
	if (e === a) return true;

	if (NUMERIC.test(e) && NUMERIC.test(a)) {
		const expectedNum = Number.parseFloat(e);
		const diff = Math.abs(expectedNum - Number.parseFloat(a));
		if (diff <= toleranceFor(expectedNum, tolerance)) return true;
	}

	return normalizeBoolean(e) === normalizeBoolean(a);
}
