/**
 * AX Error Hints - hints for common CLI mistakes
 *
 * When a caller tries a pattern that does not exist, point at the one that
 * does instead of a dead-end error.
 */

import type { Command } from "commander";

// Pattern → Hint mapping
export const ERROR_HINTS: Array<{ pattern: RegExp; hint: string }> = [
	// Flags that should be positional
	{
		pattern: /unknown option.*--item/i,
		hint: "Use positional arg: verify confirm <item> (e.g., verify confirm login-form)",
	},
	{
		pattern: /unknown option.*--scenario/i,
		hint: "Use --id: verify scenario run --id <scenario>",
	},

	// Flags that exist under other names
	{
		pattern: /unknown option.*--concurrency/i,
		hint: "Use --parallel <n>",
	},
	{
		pattern: /unknown option.*--level/i,
		hint: "Use --depth <basic|standard|thorough|paranoid>",
	},
	{
		pattern: /unknown option.*--user/i,
		hint: "Use the global --as <identity> before the command",
	},

	// Common typos
	{
		pattern: /unknown option.*--dryrun/i,
		hint: "Use --dry-run (with hyphen)",
	},
	{
		pattern: /unknown command.*scenarios/i,
		hint: "Use: verify scenario <run|list|status>",
	},
	{
		pattern: /unknown command.*issue\b/i,
		hint: "Use: verify issues <list|show|resolve|submit>",
	},
];

export function hintFor(message: string): string | null {
	return ERROR_HINTS.find(({ pattern }) => pattern.test(message))?.hint ?? null;
}

/**
 * Configure Commander to show helpful hints on errors
 */
export function configureAXErrors(program: Command): void {
	const originalOutputError = program.configureOutput().outputError;

	program.configureOutput({
		outputError: (str: string, write: (s: string) => void) => {
			if (originalOutputError) {
				originalOutputError(str, write);
			} else {
				write(str);
			}

			const hint = hintFor(str);
			if (hint) write(`→ Hint: ${hint}\n`);
		},
	});
}
