/**
 * verify check - invalidate items whose feature files changed
 */

import type { Command } from "commander";
import { detectChanges } from "../registry/fingerprint.js";
import { outputTOON } from "../types/toon.js";
import { createContext, failWith, finish } from "./context.js";

export function registerCheckCommand(program: Command): void {
	program
		.command("check")
		.description("Invalidate verifications of features whose files changed")
		.option("--pretty", "Human-readable output")
		.action(async (options: { pretty?: boolean }) => {
			const ctx = createContext();
			try {
				const { unrecorded } = detectChanges(ctx.store.load(), ctx.paths.PROJECT_ROOT);
				const invalidated = await ctx.machine.invalidateChanged();
				outputTOON(
					{ check: { changed: invalidated.features, invalidated: invalidated.items, unrecorded } },
					{
						pretty: options.pretty,
						prettyFn: () => {
							if (invalidated.features.length === 0) console.log("No changes");
							for (const f of invalidated.features) console.log(`changed: ${f}`);
							for (const i of invalidated.items) console.log(`  invalidated: ${i}`);
							for (const f of unrecorded) console.log(`never fingerprinted: ${f}`);
						},
						agent_hint:
							invalidated.items.length > 0 ? "Re-verify with: verify run --affected" : undefined,
					},
				);
				finish(ctx, []);
			} catch (err) {
				failWith(err);
			}
		});
}
