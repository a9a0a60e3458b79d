/**
 * Per-identity "never ask again" list for opportunistic prompts
 */

import { existsSync } from "node:fs";
import { z } from "zod";
import type { VerifyPaths } from "../state/paths.js";
import { readYaml, writeYamlAtomic } from "../utils/yaml.js";

const PromptPrefsSchema = z.object({
	skips: z.record(z.string(), z.array(z.string())).default({}),
});
type PromptPrefs = z.infer<typeof PromptPrefsSchema>;

export class PromptPrefsStore {
	constructor(private readonly paths: VerifyPaths) {}

	private read(): PromptPrefs {
		if (!existsSync(this.paths.PROMPT_PREFS_FILE)) return { skips: {} };
		const parsed = PromptPrefsSchema.safeParse(readYaml(this.paths.PROMPT_PREFS_FILE));
		if (!parsed.success) {
			console.warn(`Warning: ignoring malformed ${this.paths.PROMPT_PREFS_FILE}`);
			return { skips: {} };
		}
		return parsed.data;
	}

	isSkipped(identity: string, itemId: string): boolean {
		return this.read().skips[identity]?.includes(itemId) ?? false;
	}

	addSkip(identity: string, itemId: string): void {
		const prefs = this.read();
		const skips = prefs.skips[identity] ?? [];
		if (!skips.includes(itemId)) skips.push(itemId);
		prefs.skips[identity] = skips;
		writeYamlAtomic(this.paths.PROMPT_PREFS_FILE, prefs);
	}

	skippedBy(identity: string): string[] {
		return this.read().skips[identity] ?? [];
	}
}
