/**
 * Scenario and fix-pattern document loading
 */

import { existsSync } from "node:fs";
import { basename, join } from "node:path";
import { globSync } from "glob";
import { z } from "zod";
import { ConfigurationError } from "../types/errors.js";
import type { FixPattern, Scenario } from "../types/index.js";
import { FixPatternSchema, formatZodIssues, ScenarioSchema } from "../types/schema.js";
import { readYaml } from "../utils/yaml.js";

const FixPatternFileSchema = z.object({
	patterns: z.array(FixPatternSchema).default([]),
});

function readDocument(path: string): unknown {
	try {
		return readYaml(path);
	} catch (err) {
		throw new ConfigurationError(`Cannot parse ${path}`, [
			err instanceof Error ? err.message : String(err),
		]);
	}
}

/**
 * Load every *.yml / *.yaml scenario in `dir`, in file-name order.
 * Invalid documents and duplicate ids are configuration errors.
 */
export function loadScenarios(dir: string): Scenario[] {
	if (!existsSync(dir)) return [];

	const files = globSync("*.{yml,yaml}", { cwd: dir }).sort();
	const scenarios: Scenario[] = [];
	const problems: string[] = [];
	const seen = new Map<string, string>();

	for (const file of files) {
		const parsed = ScenarioSchema.safeParse(readDocument(join(dir, file)));
		if (!parsed.success) {
			problems.push(...formatZodIssues(parsed.error).map((m) => `${file}: ${m}`));
			continue;
		}
		const previous = seen.get(parsed.data.id);
		if (previous) {
			problems.push(`${file}: duplicate scenario id ${parsed.data.id} (also in ${previous})`);
			continue;
		}
		seen.set(parsed.data.id, basename(file));
		scenarios.push(parsed.data);
	}

	if (problems.length > 0) {
		throw new ConfigurationError("Invalid scenario definitions", problems);
	}
	return scenarios;
}

/**
 * Load the fix-pattern table. A missing file is an empty table; a pattern
 * that is not a valid regular expression is a configuration error.
 */
export function loadFixPatterns(path: string): FixPattern[] {
	if (!existsSync(path)) return [];

	const parsed = FixPatternFileSchema.safeParse(readDocument(path));
	if (!parsed.success) {
		throw new ConfigurationError(`Invalid fix patterns in ${path}`, formatZodIssues(parsed.error));
	}

	const problems: string[] = [];
	for (const pattern of parsed.data.patterns) {
		try {
			new RegExp(pattern.pattern, "i");
		} catch (err) {
			problems.push(`${pattern.id}: ${err instanceof Error ? err.message : String(err)}`);
		}
	}
	if (problems.length > 0) {
		throw new ConfigurationError(`Invalid fix patterns in ${path}`, problems);
	}
	return parsed.data.patterns;
}
