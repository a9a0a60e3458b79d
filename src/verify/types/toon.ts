/**
 * TOON output for the TOON-first CLI
 *
 * Agents receive structured data in a ```toon fence; humans pass --pretty.
 */

import { DELIMITERS, encode } from "@toon-format/toon";

/** Encode options for TOON output */
const TOON_OPTS = {
	indent: 2,
	delimiter: DELIMITERS.tab,
	keyFolding: "safe" as const,
};

export interface OutputOptions {
	pretty?: boolean;
	prettyFn?: () => void; // Custom pretty-print function
	agent_hint?: string; // Presentation guidance for agents
}

function formatHint(hint: string): string {
	return `agent_hint: "${hint.replace(/"/g, '\\"')}"`;
}

export function outputTOON(data: unknown, options?: OutputOptions): void {
	if (options?.pretty) {
		if (options.prettyFn) {
			options.prettyFn();
		} else {
			console.log(JSON.stringify(data, null, 2));
		}
		return;
	}
	console.log("```toon");
	console.log(encode(data, TOON_OPTS));
	console.log("```");
	if (options?.agent_hint) {
		console.log(formatHint(options.agent_hint));
	}
}

export interface ErrorOptions {
	/** Guidance for agents on how to recover from this error */
	agent_hint?: string;
	/** Suggested commands to try */
	suggestions?: string[];
	/** Exit code (default: 1) */
	exitCode?: number;
}

/**
 * Print an error with optional suggestions and agent hint, then exit.
 */
export function outputError(message: string, options?: ErrorOptions): never {
	console.error(message);

	if (options?.suggestions?.length) {
		console.error("\nSuggestions:");
		for (const suggestion of options.suggestions) {
			console.error(`  ${suggestion}`);
		}
	}

	if (options?.agent_hint) {
		// stderr, but parseable
		console.error(formatHint(options.agent_hint));
	}

	process.exit(options?.exitCode ?? 1);
}
