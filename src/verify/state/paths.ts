/**
 * Verify path resolution - SINGLE SOURCE OF TRUTH
 *
 * NO IMPORTS from other verify modules allowed to prevent cycles.
 */

import { existsSync } from "node:fs";
import { dirname, isAbsolute, join, resolve } from "node:path";

/** The canonical name of the engine's state directory */
const VERIFY_DIR_NAME = ".verify";

/** Default registry document name at the project root */
const REGISTRY_FILE_NAME = ".verification.yml";

/**
 * Authoritative project root resolver.
 * VERIFY_ROOT env > walk up from cwd: existing .verify/ > .verification.yml > .git/ > cwd
 */
function findProjectRoot(start: string = process.cwd()): string {
	if (process.env.VERIFY_ROOT) {
		return resolve(process.env.VERIFY_ROOT);
	}

	let dir = resolve(start);
	const markers = [VERIFY_DIR_NAME, REGISTRY_FILE_NAME, ".git"];

	for (;;) {
		for (const marker of markers) {
			if (existsSync(join(dir, marker))) {
				return dir;
			}
		}
		const parent = dirname(dir);
		if (parent === dir) break;
		dir = parent;
	}

	return resolve(start);
}

/**
 * Fixed paths under a project root. Paths that configuration can move
 * (registry, scenarios, fix patterns, badges) are resolved in config.ts.
 */
export interface VerifyPaths {
	PROJECT_ROOT: string;
	VERIFY_DIR: string;
	CONFIG_FILE: string;
	EVENTS_FILE: string;
	ISSUES_DIR: string;
	CHECKPOINT_FILE: string;
	CHECKPOINT_ARCHIVE_DIR: string;
	PEAKS_FILE: string;
	PROMPT_PREFS_FILE: string;
}

export function resolvePaths(projectRoot: string = findProjectRoot()): VerifyPaths {
	const verifyDir = join(projectRoot, VERIFY_DIR_NAME);
	return {
		PROJECT_ROOT: projectRoot,
		VERIFY_DIR: verifyDir,
		CONFIG_FILE: join(verifyDir, "verify.toml"),
		EVENTS_FILE: join(verifyDir, "events.jsonl"),
		ISSUES_DIR: join(verifyDir, "issues"),
		CHECKPOINT_FILE: join(verifyDir, "checkpoint.yml"),
		CHECKPOINT_ARCHIVE_DIR: join(verifyDir, "checkpoints"),
		PEAKS_FILE: join(verifyDir, "peaks.yml"),
		PROMPT_PREFS_FILE: join(verifyDir, "prompt-prefs.yml"),
	};
}

/** Resolve a configured path against the project root (absolute paths pass through) */
export function resolveFromRoot(projectRoot: string, path: string): string {
	return isAbsolute(path) ? path : join(projectRoot, path);
}
