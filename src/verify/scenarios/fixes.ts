/**
 * Fix-pattern lookup and application
 */

import type { CheckExecutor } from "../checks/executor.js";
import type { CheckContext, CheckResult, FixPattern } from "../types/index.js";

/** First pattern (table order) whose regex matches the failing output */
export function findFix(patterns: FixPattern[], output: string): FixPattern | null {
	return patterns.find((p) => new RegExp(p.pattern, "i").test(output)) ?? null;
}

export interface FixApplication {
	pattern: FixPattern;
	results: CheckResult[];
	/** Every remediation command exited 0 */
	applied: boolean;
}

/** Run the remediation commands in order, stopping at the first failure */
export async function applyFix(
	pattern: FixPattern,
	executor: CheckExecutor,
	context: CheckContext,
): Promise<FixApplication> {
	const results: CheckResult[] = [];
	for (const cmd of pattern.fix) {
		const result = await executor.run({ cmd }, context);
		results.push(result);
		if (!result.passed) {
			return { pattern, results, applied: false };
		}
	}
	return { pattern, results, applied: true };
}
