/**
 * Shared fixtures for verify unit tests: a throwaway project directory with
 * a registry and the engine services wired to it.
 */

import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { dump } from "js-yaml";
import { CheckExecutor } from "../../../src/verify/checks/executor.js";
import { MachineVerifier } from "../../../src/verify/checks/machine.js";
import { PromptPrefsStore } from "../../../src/verify/human/prefs.js";
import { HumanVerifier } from "../../../src/verify/human/verifier.js";
import { IssueTracker } from "../../../src/verify/issues/tracker.js";
import { RegistryStore } from "../../../src/verify/registry/store.js";
import { DEFAULT_CONFIG, type VerifyConfig } from "../../../src/verify/state/config.js";
import { resolvePaths, type VerifyPaths } from "../../../src/verify/state/paths.js";

export interface TestProject {
	root: string;
	paths: VerifyPaths;
	config: VerifyConfig;
	store: RegistryStore;
	tracker: IssueTracker;
	executor: CheckExecutor;
	machine: MachineVerifier;
	human: HumanVerifier;
	prefs: PromptPrefsStore;
	cleanup: () => void;
}

export function makeProject(
	registry: unknown | null,
	overrides: (config: VerifyConfig) => VerifyConfig = (c) => c,
): TestProject {
	const root = mkdtempSync(join(tmpdir(), "verify-test-"));
	const paths = resolvePaths(root);
	const config = overrides(structuredClone(DEFAULT_CONFIG));
	if (registry !== null) {
		writeFileSync(join(root, ".verification.yml"), dump(registry));
	}
	const store = new RegistryStore(paths, config);
	const tracker = new IssueTracker(paths, store);
	const executor = new CheckExecutor({
		cwd: root,
		defaultTimeout: config.executor.default_timeout,
		tailLines: config.executor.tail_lines,
		tailBytes: config.executor.tail_bytes,
	});
	const prefs = new PromptPrefsStore(paths);
	return {
		root,
		paths,
		config,
		store,
		tracker,
		executor,
		machine: new MachineVerifier({ paths, store, tracker, executor }),
		human: new HumanVerifier({ paths, config, store, tracker, prefs }),
		prefs,
		cleanup: () => rmSync(root, { recursive: true, force: true }),
	};
}

// =============================================================================
// Registry documents
// =============================================================================

/** Three items: one per automatability class */
export function sampleRegistry(): Record<string, unknown> {
	return {
		schema_version: 2,
		features: {
			backup: {
				name: "Backups",
				files: [{ path: "backup.sh" }],
				items: [
					{
						id: "backup-create",
						text: "Creates a backup archive",
						automatable: "automatable",
						checks: {
							basic: [{ cmd: "true" }],
							standard: [{ cmd: "true" }, { cmd: "echo standard-ok" }],
						},
						triggers: ["site backup"],
					},
					{
						id: "backup-restore",
						text: "Restores onto a staging host",
						automatable: "environment_dependent",
						reason: "needs a staging host",
						triggers: ["site restore"],
					},
					{
						id: "backup-email",
						text: "Sends a readable report email",
						automatable: "manual_only",
						reason: "someone has to read it",
					},
				],
			},
		},
	};
}
