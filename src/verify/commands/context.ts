/**
 * Wiring shared by every command: paths, config and the engine services
 */

import type { Command } from "commander";
import { CheckExecutor } from "../checks/executor.js";
import { MachineVerifier } from "../checks/machine.js";
import { PromptPrefsStore } from "../human/prefs.js";
import { HumanVerifier } from "../human/verifier.js";
import { IssueTracker } from "../issues/tracker.js";
import { RegistryStore } from "../registry/store.js";
import { CheckpointStore } from "../scenarios/checkpoint.js";
import { ScenarioOrchestrator } from "../scenarios/orchestrator.js";
import { loadFixPatterns, loadScenarios } from "../scenarios/parser.js";
import { getConfigPaths, loadConfig, type VerifyConfig } from "../state/config.js";
import { resolvePaths, type VerifyPaths } from "../state/paths.js";
import { PeaksStore } from "../stats/peaks.js";
import {
	combineExitCodes,
	EXIT_CODES,
	type ExitCode,
	isVerifyError,
} from "../types/errors.js";
import { outputError } from "../types/toon.js";

export interface VerifyContext {
	paths: VerifyPaths;
	config: VerifyConfig;
	store: RegistryStore;
	tracker: IssueTracker;
	executor: CheckExecutor;
	machine: MachineVerifier;
	human: HumanVerifier;
	prefs: PromptPrefsStore;
	checkpoints: CheckpointStore;
	peaks: PeaksStore;
}

export function createContext(paths: VerifyPaths = resolvePaths()): VerifyContext {
	const config = loadConfig(paths);
	const store = new RegistryStore(paths, config);
	const tracker = new IssueTracker(paths, store);
	const executor = new CheckExecutor({
		cwd: paths.PROJECT_ROOT,
		defaultTimeout: config.executor.default_timeout,
		tailLines: config.executor.tail_lines,
		tailBytes: config.executor.tail_bytes,
	});
	const prefs = new PromptPrefsStore(paths);

	return {
		paths,
		config,
		store,
		tracker,
		executor,
		machine: new MachineVerifier({ paths, store, tracker, executor }),
		human: new HumanVerifier({ paths, config, store, tracker, prefs }),
		prefs,
		checkpoints: new CheckpointStore(paths),
		peaks: new PeaksStore(paths, config.badges.peaks_history),
	};
}

/** Scenarios and fix patterns are read only by the commands that use them */
export function createOrchestrator(ctx: VerifyContext): ScenarioOrchestrator {
	const { SCENARIOS_DIR, FIX_PATTERNS_FILE } = getConfigPaths(ctx.paths, ctx.config);
	return new ScenarioOrchestrator({
		paths: ctx.paths,
		config: ctx.config,
		executor: ctx.executor,
		checkpoints: ctx.checkpoints,
		scenarios: loadScenarios(SCENARIOS_DIR),
		fixPatterns: loadFixPatterns(FIX_PATTERNS_FILE),
	});
}

/** Global --as, falling back to $USER */
export function identityOf(command: Command): string {
	const as: unknown = command.optsWithGlobals().as;
	if (typeof as === "string" && as.length > 0) return as;
	return process.env.USER ?? process.env.USERNAME ?? "unknown";
}

/** Set the process exit code, counting registry restorations as code 3 */
export function finish(ctx: VerifyContext, codes: ExitCode[]): void {
	process.exitCode = combineExitCodes([
		...codes,
		...ctx.store.restorations.map((e) => e.exitCode),
	]);
}

/**
 * Report an engine error with its exit code. Anything else is a bug and
 * propagates.
 */
export function failWith(err: unknown, suggestions?: string[]): never {
	if (isVerifyError(err)) {
		outputError(`Error: ${err.message}`, {
			exitCode: err.exitCode,
			...(suggestions ? { suggestions } : {}),
			agent_hint: `${err.kind}: fix the cause and re-run; exit code ${err.exitCode}`,
		});
	}
	throw err;
}

export function parseCount(value: string, flag: string): number {
	const n = Number.parseInt(value, 10);
	if (!Number.isInteger(n) || n < 1) {
		outputError(`Error: ${flag} must be a positive integer, got "${value}"`, {
			exitCode: EXIT_CODES.CONFIGURATION,
		});
	}
	return n;
}
