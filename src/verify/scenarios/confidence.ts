/**
 * Scenario confidence score
 */

import type { ConfidenceBand } from "../state/config.js";

export interface StepTally {
	total: number;
	passed: number;
	/** Steps carrying output or baseline assertions */
	deep: number;
	deepPassed: number;
}

/**
 * First band whose `min_ratio` the pass ratio reaches wins. A band marked
 * `deep` also needs at least one deep assertion, all of them passing.
 */
export function computeConfidence(tally: StepTally, bands: ConfidenceBand[]): number {
	if (tally.total === 0) return 0;
	const passRatio = tally.passed / tally.total;
	const deepOk = tally.deep > 0 && tally.deepPassed === tally.deep;

	for (const band of bands) {
		if (band.deep && !deepOk) continue;
		if (passRatio >= band.min_ratio) return band.score;
	}
	return 0;
}
