/**
 * Shell utilities for safe command execution
 */

import type { CheckContext } from "../types/index.js";

const PLAIN_TOKEN = /^[A-Za-z0-9_@%+=:,./-]+$/;

/**
 * Quote a value for interpolation into a POSIX shell command.
 *
 * Plain tokens pass through unchanged; anything else is single-quoted,
 * with embedded single quotes written as '\''.
 *
 * @example
 * ```ts
 * quoteShellArg("verify-test");  // verify-test
 * quoteShellArg("it's here");    // 'it'\''s here'
 * ```
 */
export function quoteShellArg(value: string): string {
	if (PLAIN_TOKEN.test(value)) return value;
	return `'${value.replace(/'/g, "'\\''")}'`;
}

/**
 * Substitute `{site}`, `{root}`, `{depth}`, `{run_id}` and captured
 * scenario values into a command. Placeholders without a value are left
 * as written.
 */
export function substitutePlaceholders(command: string, context: CheckContext): string {
	const values: Record<string, string | undefined> = {
		...context.captured,
		site: context.site,
		root: context.root,
		depth: context.depth,
		run_id: context.run_id,
	};

	return command.replace(/\{([A-Za-z_][A-Za-z0-9_]*)\}/g, (match, name: string) => {
		const value = values[name];
		return value === undefined ? match : quoteShellArg(value);
	});
}
