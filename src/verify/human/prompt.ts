/**
 * Prompt I/O for opportunistic verification
 */

import { createInterface } from "node:readline/promises";

export interface PromptIO {
	/** Resolve with the answer, or null when `timeoutMs` passes first */
	ask(question: string, timeoutMs: number): Promise<string | null>;
}

/**
 * Terminal prompt on stdin. The question goes to stderr so stdout stays
 * machine-readable.
 */
export function createTerminalPrompt(
	input: NodeJS.ReadableStream = process.stdin,
	output: NodeJS.WritableStream = process.stderr,
): PromptIO {
	return {
		async ask(question, timeoutMs) {
			const rl = createInterface({ input, output });
			const controller = new AbortController();
			const timer = setTimeout(() => controller.abort(), timeoutMs);
			try {
				return await rl.question(question, { signal: controller.signal });
			} catch (err) {
				if (controller.signal.aborted) {
					output.write("\n");
					return null;
				}
				throw err;
			} finally {
				clearTimeout(timer);
				rl.close();
			}
		},
	};
}
