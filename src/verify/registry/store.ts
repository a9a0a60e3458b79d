/**
 * Registry Store - single-writer access to .verification.yml
 *
 * Commit path: lock → deep copy → mutate → temp file → re-read and validate
 * → shrink guard → backup → rename. Readers never lock; a rename is atomic,
 * so they see the old document or the new one.
 */

import {
	copyFileSync,
	existsSync,
	readFileSync,
	renameSync,
	unlinkSync,
	writeFileSync,
} from "node:fs";
import { load as parseYaml } from "js-yaml";
import type { VerifyConfig } from "../state/config.js";
import { getConfigPaths } from "../state/config.js";
import { debug, logEvent } from "../state/events.js";
import type { VerifyPaths } from "../state/paths.js";
import { summarizeFeature } from "../stats/aggregate.js";
import {
	ClassificationConflictError,
	ConfigurationError,
	isVerifyError,
	RegistryCorruptionError,
	SchemaVersionError,
	type VerifyError,
} from "../types/errors.js";
import type { Registry } from "../types/index.js";
import { countItems, isAutomatable, listItems, SUPPORTED_SCHEMA_VERSIONS } from "../types/index.js";
import { formatZodIssues, RegistrySchema } from "../types/schema.js";
import { toYaml } from "../utils/yaml.js";
import { acquireLock, releaseLock } from "./lock.js";

export type Mutator = (draft: Registry) => void | Promise<void>;

export type UpdateResult =
	| { success: true; registry: Registry }
	| { success: false; error: VerifyError };

export function emptyRegistry(): Registry {
	return { schema_version: 2, features: {} };
}

function isSupportedVersion(value: unknown): boolean {
	return SUPPORTED_SCHEMA_VERSIONS.some((v) => v === value);
}

/**
 * Parse and validate registry text. Throws SchemaVersionError for an unknown
 * version and RegistryCorruptionError (restored: false) for anything else.
 */
export function parseRegistry(text: string): Registry {
	let raw: unknown;
	try {
		raw = parseYaml(text);
	} catch (err) {
		throw new RegistryCorruptionError(
			`Registry is not valid YAML: ${err instanceof Error ? err.message : String(err)}`,
			"parse",
			false,
		);
	}

	if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
		throw new RegistryCorruptionError("Registry is not a YAML mapping", "parse", false);
	}
	const version = "schema_version" in raw ? raw.schema_version : undefined;
	if (!isSupportedVersion(version)) {
		throw new SchemaVersionError(version);
	}

	const parsed = RegistrySchema.safeParse(raw);
	if (!parsed.success) {
		const details = formatZodIssues(parsed.error);
		throw new RegistryCorruptionError(
			`Registry failed validation (${details.length} problem${details.length === 1 ? "" : "s"})`,
			"schema",
			false,
			details,
		);
	}

	const seen = new Set<string>();
	const duplicates: string[] = [];
	for (const { item } of listItems(parsed.data)) {
		if (seen.has(item.id)) duplicates.push(item.id);
		seen.add(item.id);
	}
	if (duplicates.length > 0) {
		throw new RegistryCorruptionError(
			`Duplicate item ids: ${duplicates.join(", ")}`,
			"duplicate-id",
			false,
			duplicates,
		);
	}

	return parsed.data;
}

export class RegistryStore {
	readonly file: string;
	readonly backupFile: string;
	readonly lockFile: string;
	/** Corruptions repaired from the backup during this process */
	readonly restorations: RegistryCorruptionError[] = [];

	private queue: Promise<unknown> = Promise.resolve();

	constructor(
		private readonly paths: VerifyPaths,
		private readonly config: VerifyConfig,
	) {
		this.file = getConfigPaths(paths, config).REGISTRY_FILE;
		this.backupFile = `${this.file}.bak`;
		this.lockFile = `${this.file}.lock`;
	}

	exists(): boolean {
		return existsSync(this.file);
	}

	/**
	 * Read the last committed registry. A missing file is an empty registry.
	 *
	 * A corrupt file is replaced by a valid backup (recorded in
	 * `restorations`); without one the corruption is fatal.
	 */
	load(): Registry {
		if (!existsSync(this.file)) {
			return emptyRegistry();
		}

		try {
			return parseRegistry(readFileSync(this.file, "utf-8"));
		} catch (err) {
			if (!(err instanceof RegistryCorruptionError)) throw err;
			return this.restoreFromBackup(err);
		}
	}

	private restoreFromBackup(cause: RegistryCorruptionError): Registry {
		if (existsSync(this.backupFile)) {
			let backup: Registry | null = null;
			try {
				backup = parseRegistry(readFileSync(this.backupFile, "utf-8"));
			} catch (err) {
				debug(`backup unusable: ${err instanceof Error ? err.message : String(err)}`);
			}
			if (backup) {
				copyFileSync(this.backupFile, this.file);
				const restored = new RegistryCorruptionError(
					`${cause.message}; restored from ${this.backupFile}`,
					cause.reason,
					true,
					cause.details,
				);
				this.restorations.push(restored);
				logEvent(this.paths, {
					event: "registry_restored",
					reason: cause.reason,
					details: cause.details,
				});
				console.error(`Warning: ${restored.message}`);
				return backup;
			}
		}
		throw new RegistryCorruptionError(
			`${cause.message}; no valid backup to restore`,
			cause.reason,
			false,
			cause.details,
		);
	}

	/**
	 * Apply `mutator` to a copy of the committed registry and commit it.
	 *
	 * Calls are serialized in-process and across processes. A VerifyError
	 * thrown by the mutator, by loading the committed registry or by
	 * validation leaves the committed file untouched and is returned as the
	 * failure. Rejected drafts come back as RegistryCorruptionError with
	 * `restored: true` (the previous snapshot stays in place), or as
	 * ClassificationConflictError when a non-automatable item would be
	 * machine-verified.
	 */
	atomicUpdate(mutator: Mutator): Promise<UpdateResult> {
		const next = this.queue.then(() => this.commit(mutator));
		this.queue = next.catch(() => undefined);
		return next;
	}

	private async commit(mutator: Mutator): Promise<UpdateResult> {
		const lock = await acquireLock(this.lockFile, this.config.registry.lock_timeout_ms);
		if (!lock) {
			return {
				success: false,
				error: new ConfigurationError(
					`Cannot acquire registry lock ${this.lockFile} (held by another process)`,
				),
			};
		}

		try {
			let previous: Registry;
			try {
				previous = this.load();
			} catch (err) {
				if (isVerifyError(err)) return { success: false, error: err };
				throw err;
			}
			const draft = structuredClone(previous);

			try {
				await mutator(draft);
			} catch (err) {
				if (isVerifyError(err)) return { success: false, error: err };
				throw err;
			}

			for (const feature of Object.values(draft.features)) {
				feature.summary = summarizeFeature(feature);
			}

			return this.writeValidated(draft, countItems(previous));
		} finally {
			releaseLock(lock);
		}
	}

	private writeValidated(draft: Registry, previousCount: number): UpdateResult {
		const tmp = `${this.file}.tmp-${process.pid}-${Date.now()}`;
		writeFileSync(tmp, toYaml(draft));

		let committed: Registry;
		try {
			committed = parseRegistry(readFileSync(tmp, "utf-8"));
		} catch (err) {
			unlinkSync(tmp);
			if (err instanceof RegistryCorruptionError) {
				return this.reject(
					new RegistryCorruptionError(
						`Update rejected: ${err.message}`,
						err.reason,
						true,
						err.details,
					),
				);
			}
			if (err instanceof SchemaVersionError) return this.reject(err);
			throw err;
		}

		const conflicts = listItems(committed)
			.filter(({ item }) => item.machine.verified && !isAutomatable(item))
			.map(({ item }) => item.id);
		if (conflicts.length > 0) {
			unlinkSync(tmp);
			return this.reject(new ClassificationConflictError(conflicts));
		}

		const loss = previousCount - countItems(committed);
		if (loss > this.config.registry.max_item_loss) {
			unlinkSync(tmp);
			return this.reject(
				new RegistryCorruptionError(
					`Update would drop ${loss} item(s) (limit ${this.config.registry.max_item_loss}); rejected`,
					"shrink",
					true,
				),
			);
		}

		if (existsSync(this.file)) {
			copyFileSync(this.file, this.backupFile);
		}
		renameSync(tmp, this.file);

		logEvent(this.paths, { event: "registry_committed", items: countItems(committed) });
		return { success: true, registry: committed };
	}

	private reject(error: VerifyError): UpdateResult {
		logEvent(this.paths, {
			event: "registry_rejected",
			kind: error.kind,
			message: error.message,
		});
		return { success: false, error };
	}
}
