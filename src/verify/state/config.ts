/**
 * Verify configuration management
 *
 * Config priority:
 * 1. .verify/verify.toml
 * 2. Default values
 */

import { existsSync, mkdirSync, readFileSync } from "node:fs";
import * as TOML from "@iarna/toml";
import type { Depth } from "../types/index.js";
import { isDepth } from "../types/index.js";
import { resolveFromRoot, type VerifyPaths } from "./paths.js";

export type PromptMode = "unverified" | "all" | "never";
export type BadgeColor = "red" | "orange" | "yellow" | "brightgreen";

/**
 * Band edges for one badge type. `ascending` types get better as the value
 * grows (coverage); descending ones get worse (open issues).
 */
export interface BadgeThresholds {
	ascending: boolean;
	/** [orange, yellow, brightgreen] lower bounds when ascending, upper bounds otherwise */
	bands: [number, number, number];
}

/** One step of the confidence function; first matching band wins */
export interface ConfidenceBand {
	min_ratio: number;
	/** Band applies only when every deep assertion passed */
	deep?: boolean;
	score: number;
}

export interface VerifyConfig {
	version: string;
	registry: {
		path: string;
		max_item_loss: number;
		lock_timeout_ms: number;
	};
	executor: {
		default_timeout: number;
		tail_lines: number;
		tail_bytes: number;
	};
	run: {
		default_depth: Depth;
		concurrency: number;
	};
	human: {
		autolog_consent: string[];
		testers: string[];
		prompt_mode: PromptMode;
		prompt_timeout: number;
		skip_commands: string[];
	};
	scenarios: {
		dir: string;
		fix_patterns: string;
		auto_fix: boolean;
		preserve_on_failure: boolean;
		confidence_bands: ConfidenceBand[];
	};
	badges: {
		file: string;
		peaks_history: number;
		thresholds: Record<BadgeType, BadgeThresholds>;
	};
}

export type BadgeType = "machine" | "human" | "full" | "issues";

export const DEFAULT_CONFIDENCE_BANDS: ConfidenceBand[] = [
	{ min_ratio: 1, deep: true, score: 100 },
	{ min_ratio: 1, score: 90 },
	{ min_ratio: 0.75, score: 75 },
	{ min_ratio: 0.5, score: 50 },
	{ min_ratio: 0, score: 0 },
];

export const DEFAULT_CONFIG: VerifyConfig = {
	version: "1",
	registry: {
		path: ".verification.yml",
		max_item_loss: 0,
		lock_timeout_ms: 5000,
	},
	executor: {
		default_timeout: 300,
		tail_lines: 50,
		tail_bytes: 4096,
	},
	run: {
		default_depth: "standard",
		concurrency: 1,
	},
	human: {
		autolog_consent: [],
		testers: [],
		prompt_mode: "unverified",
		prompt_timeout: 30,
		skip_commands: ["status", "doctor", "help", "verify", "version"],
	},
	scenarios: {
		dir: ".verify/scenarios",
		fix_patterns: ".verify/fix-patterns.yml",
		auto_fix: false,
		preserve_on_failure: true,
		confidence_bands: DEFAULT_CONFIDENCE_BANDS,
	},
	badges: {
		file: ".badges.json",
		peaks_history: 20,
		thresholds: {
			machine: { ascending: true, bands: [30, 50, 80] },
			human: { ascending: true, bands: [10, 25, 60] },
			full: { ascending: true, bands: [10, 25, 60] },
			issues: { ascending: false, bands: [10, 5, 0] },
		},
	},
};

function isPromptMode(value: unknown): value is PromptMode {
	return value === "unverified" || value === "all" || value === "never";
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(parsed: Record<string, unknown>, key: string): Record<string, unknown> {
	const value = parsed[key];
	return isRecord(value) ? value : {};
}

function num(value: unknown, fallback: number): number {
	return typeof value === "number" && Number.isFinite(value) ? value : fallback;
}

function bool(value: unknown, fallback: boolean): boolean {
	return typeof value === "boolean" ? value : fallback;
}

function str(value: unknown, fallback: string): string {
	return typeof value === "string" && value.length > 0 ? value : fallback;
}

function strList(value: unknown, fallback: string[]): string[] {
	return Array.isArray(value) && value.every((v) => typeof v === "string")
		? value
		: fallback;
}

function parseBands(value: unknown): ConfidenceBand[] {
	if (!Array.isArray(value)) return DEFAULT_CONFIDENCE_BANDS;
	const bands: ConfidenceBand[] = [];
	for (const entry of value) {
		if (!isRecord(entry)) return DEFAULT_CONFIDENCE_BANDS;
		if (typeof entry.min_ratio !== "number" || typeof entry.score !== "number") {
			return DEFAULT_CONFIDENCE_BANDS;
		}
		bands.push({
			min_ratio: entry.min_ratio,
			score: entry.score,
			...(typeof entry.deep === "boolean" ? { deep: entry.deep } : {}),
		});
	}
	return bands.length > 0 ? bands : DEFAULT_CONFIDENCE_BANDS;
}

function parseThresholds(
	value: unknown,
	fallback: BadgeThresholds,
): BadgeThresholds {
	if (!isRecord(value)) return fallback;
	const bands = value.bands;
	const validBands =
		Array.isArray(bands) &&
		bands.length === 3 &&
		bands.every((b) => typeof b === "number");
	return {
		ascending: bool(value.ascending, fallback.ascending),
		bands: validBands
			? [Number(bands[0]), Number(bands[1]), Number(bands[2])]
			: fallback.bands,
	};
}

/**
 * Merge a parsed TOML document over the defaults, section by section.
 * Values of the wrong type fall back to the default for that key.
 */
export function mergeConfig(parsed: Record<string, unknown>): VerifyConfig {
	const d = DEFAULT_CONFIG;
	const registry = section(parsed, "registry");
	const executor = section(parsed, "executor");
	const run = section(parsed, "run");
	const human = section(parsed, "human");
	const scenarios = section(parsed, "scenarios");
	const badges = section(parsed, "badges");
	const thresholds = section(badges, "thresholds");

	const depth = run.default_depth;

	return {
		version: str(parsed.version, d.version),
		registry: {
			path: str(registry.path, d.registry.path),
			max_item_loss: Math.max(0, num(registry.max_item_loss, d.registry.max_item_loss)),
			lock_timeout_ms: num(registry.lock_timeout_ms, d.registry.lock_timeout_ms),
		},
		executor: {
			default_timeout: num(executor.default_timeout, d.executor.default_timeout),
			tail_lines: num(executor.tail_lines, d.executor.tail_lines),
			tail_bytes: num(executor.tail_bytes, d.executor.tail_bytes),
		},
		run: {
			default_depth: typeof depth === "string" && isDepth(depth) ? depth : d.run.default_depth,
			concurrency: Math.max(1, Math.floor(num(run.concurrency, d.run.concurrency))),
		},
		human: {
			autolog_consent: strList(human.autolog_consent, d.human.autolog_consent),
			testers: strList(human.testers, d.human.testers),
			prompt_mode: isPromptMode(human.prompt_mode) ? human.prompt_mode : d.human.prompt_mode,
			prompt_timeout: num(human.prompt_timeout, d.human.prompt_timeout),
			skip_commands: strList(human.skip_commands, d.human.skip_commands),
		},
		scenarios: {
			dir: str(scenarios.dir, d.scenarios.dir),
			fix_patterns: str(scenarios.fix_patterns, d.scenarios.fix_patterns),
			auto_fix: bool(scenarios.auto_fix, d.scenarios.auto_fix),
			preserve_on_failure: bool(scenarios.preserve_on_failure, d.scenarios.preserve_on_failure),
			confidence_bands: parseBands(scenarios.confidence_bands),
		},
		badges: {
			file: str(badges.file, d.badges.file),
			peaks_history: Math.max(1, Math.floor(num(badges.peaks_history, d.badges.peaks_history))),
			thresholds: {
				machine: parseThresholds(thresholds.machine, d.badges.thresholds.machine),
				human: parseThresholds(thresholds.human, d.badges.thresholds.human),
				full: parseThresholds(thresholds.full, d.badges.thresholds.full),
				issues: parseThresholds(thresholds.issues, d.badges.thresholds.issues),
			},
		},
	};
}

/**
 * Load config from .verify/verify.toml, falling back to defaults
 */
export function loadConfig(paths: VerifyPaths): VerifyConfig {
	if (existsSync(paths.CONFIG_FILE)) {
		try {
			const content = readFileSync(paths.CONFIG_FILE, "utf-8");
			return mergeConfig(TOML.parse(content));
		} catch (err) {
			console.warn(
				`Warning: Failed to parse ${paths.CONFIG_FILE}: ${err instanceof Error ? err.message : String(err)}`,
			);
			console.warn("Using default configuration.");
		}
	}

	return DEFAULT_CONFIG;
}

/**
 * Ensure .verify/ directory structure exists
 */
export function ensureVerifyDir(paths: VerifyPaths): void {
	for (const dir of [paths.VERIFY_DIR, paths.ISSUES_DIR]) {
		if (!existsSync(dir)) {
			mkdirSync(dir, { recursive: true });
		}
	}
}

/**
 * Get dynamic paths based on config
 */
export function getConfigPaths(
	paths: VerifyPaths,
	config: VerifyConfig,
): {
	REGISTRY_FILE: string;
	SCENARIOS_DIR: string;
	FIX_PATTERNS_FILE: string;
	BADGES_FILE: string;
} {
	const root = paths.PROJECT_ROOT;
	return {
		REGISTRY_FILE: resolveFromRoot(root, config.registry.path),
		SCENARIOS_DIR: resolveFromRoot(root, config.scenarios.dir),
		FIX_PATTERNS_FILE: resolveFromRoot(root, config.scenarios.fix_patterns),
		BADGES_FILE: resolveFromRoot(root, config.badges.file),
	};
}
