/**
 * Diagnostic snapshot attached to every new issue
 */

import { execSync } from "node:child_process";
import { existsSync, statSync } from "node:fs";
import * as os from "node:os";
import { join } from "node:path";
import type { ArtifactCheck, Diagnostics, Feature } from "../types/index.js";

function git(args: string, cwd: string): string | null {
	try {
		return execSync(`git ${args}`, { cwd, encoding: "utf-8", stdio: "pipe" }).trim() || null;
	} catch {
		return null;
	}
}

export function collectEnvironment(projectRoot: string): Record<string, string> {
	const env: Record<string, string> = {
		os: `${os.type()} ${os.release()}`,
		platform: os.platform(),
		arch: os.arch(),
		node: process.version,
		cwd: process.cwd(),
	};

	const branch = git("rev-parse --abbrev-ref HEAD", projectRoot);
	if (branch) env.git_branch = branch;
	const commit = git("rev-parse --short HEAD", projectRoot);
	if (commit) env.git_commit = commit;

	return env;
}

export function checkArtifacts(projectRoot: string, feature: Feature | null): ArtifactCheck[] {
	if (!feature) return [];
	return feature.files.map((file) => {
		const path = join(projectRoot, file.path);
		const exists = existsSync(path);
		return {
			path: file.path,
			exists,
			size: exists ? statSync(path).size : null,
		};
	});
}

/**
 * Fixed bundle (environment facts + the owning feature's file checks) plus
 * whatever facts the reporter supplies.
 */
export function collectDiagnostics(
	projectRoot: string,
	feature: Feature | null,
	extra: Record<string, string> = {},
): Diagnostics {
	return {
		environment: collectEnvironment(projectRoot),
		artifacts: checkArtifacts(projectRoot, feature),
		extra,
	};
}
