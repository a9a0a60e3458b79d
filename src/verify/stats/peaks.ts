/**
 * Peak tracking - best value seen per coverage metric, with a capped
 * history of improvements
 */

import { existsSync } from "node:fs";
import { z } from "zod";
import type { VerifyPaths } from "../state/paths.js";
import { readYaml, writeYamlAtomic } from "../utils/yaml.js";

const MetricPeakSchema = z.object({
	current: z.number(),
	peak: z.number(),
	peak_at: z.string().nullable().default(null),
	peak_run_id: z.string().nullable().default(null),
});

const PeaksSchema = z.object({
	metrics: z.record(z.string(), MetricPeakSchema).default({}),
	history: z
		.array(
			z.object({
				at: z.string(),
				run_id: z.string(),
				changes: z.array(z.string()),
			}),
		)
		.default([]),
	runs_tracked: z.number().int().nonnegative().default(0),
});
export type Peaks = z.infer<typeof PeaksSchema>;

export interface PeakUpdate {
	peaks: Peaks;
	/** "metric: old -> new" for every metric that set a new peak */
	changes: string[];
}

function emptyPeaks(): Peaks {
	return { metrics: {}, history: [], runs_tracked: 0 };
}

export class PeaksStore {
	constructor(
		private readonly paths: VerifyPaths,
		private readonly historyLimit: number,
	) {}

	load(): Peaks {
		if (!existsSync(this.paths.PEAKS_FILE)) return emptyPeaks();
		const parsed = PeaksSchema.safeParse(readYaml(this.paths.PEAKS_FILE));
		if (!parsed.success) {
			console.warn(`Warning: ignoring malformed ${this.paths.PEAKS_FILE}`);
			return emptyPeaks();
		}
		return parsed.data;
	}

	/**
	 * Record current values; a value above the stored peak becomes the peak.
	 * Newest history entries come first.
	 */
	update(values: Record<string, number>, runId: string): PeakUpdate {
		const peaks = this.load();
		const at = new Date().toISOString();
		const changes: string[] = [];

		for (const [metric, value] of Object.entries(values)) {
			const existing = peaks.metrics[metric];
			if (!existing) {
				peaks.metrics[metric] = { current: value, peak: value, peak_at: at, peak_run_id: runId };
				if (value > 0) changes.push(`${metric}: 0 -> ${value}`);
				continue;
			}
			existing.current = value;
			if (value > existing.peak) {
				changes.push(`${metric}: ${existing.peak} -> ${value}`);
				existing.peak = value;
				existing.peak_at = at;
				existing.peak_run_id = runId;
			}
		}

		peaks.runs_tracked++;
		if (changes.length > 0) {
			peaks.history = [{ at, run_id: runId, changes }, ...peaks.history].slice(0, this.historyLimit);
		}
		writeYamlAtomic(this.paths.PEAKS_FILE, peaks);
		return { peaks, changes };
	}
}
