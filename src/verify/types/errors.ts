/**
 * Error taxonomy
 *
 * Every engine error carries a `kind` for reporting and the CLI exit code it
 * maps to. Check failures are results, not errors, and never appear here.
 */

export const EXIT_CODES = {
	OK: 0,
	FAILURES: 1,
	CONFIGURATION: 2,
	CORRUPTION_RESTORED: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export type VerifyErrorKind =
	| "configuration-gap"
	| "classification-conflict"
	| "blocked-by-issue"
	| "registry-corruption"
	| "dependency-unmet"
	| "schema-version"
	| "invalid-transition"
	| "not-found"
	| "configuration"
	| "executor-fault";

export abstract class VerifyError extends Error {
	abstract readonly kind: VerifyErrorKind;
	abstract readonly exitCode: ExitCode;
	/** Fatal errors abort the whole run */
	readonly fatal: boolean = false;
}

/** No checks declared at the requested depth */
export class ConfigurationGapError extends VerifyError {
	readonly kind = "configuration-gap";
	readonly exitCode = EXIT_CODES.CONFIGURATION;

	constructor(
		public readonly itemId: string,
		public readonly depth: string,
	) {
		super(`Item ${itemId} has no checks at depth "${depth}"`);
		this.name = "ConfigurationGapError";
	}
}

/** A non-automatable item would end up machine-verified */
export class ClassificationConflictError extends VerifyError {
	readonly kind = "classification-conflict";
	readonly exitCode = EXIT_CODES.CONFIGURATION;

	constructor(public readonly itemIds: string[]) {
		super(
			`Classification conflict: ${itemIds.join(", ")} ${itemIds.length === 1 ? "is" : "are"} not automatable but machine-verified`,
		);
		this.name = "ClassificationConflictError";
	}
}

/** Verification attempted while blocking issues are linked */
export class BlockedByIssueError extends VerifyError {
	readonly kind = "blocked-by-issue";
	readonly exitCode = EXIT_CODES.FAILURES;

	constructor(
		public readonly itemId: string,
		public readonly issueIds: string[],
	) {
		super(`Item ${itemId} is blocked by open issue(s): ${issueIds.join(", ")}`);
		this.name = "BlockedByIssueError";
	}
}

export type CorruptionReason = "parse" | "schema" | "shrink" | "duplicate-id" | "write";

/** Registry validation failed; `restored` says whether the last good copy is in place */
export class RegistryCorruptionError extends VerifyError {
	readonly kind = "registry-corruption";
	readonly exitCode: ExitCode;
	readonly fatal: boolean;

	constructor(
		message: string,
		public readonly reason: CorruptionReason,
		public readonly restored: boolean,
		public readonly details: string[] = [],
	) {
		super(message);
		this.name = "RegistryCorruptionError";
		this.exitCode = restored ? EXIT_CODES.CORRUPTION_RESTORED : EXIT_CODES.CONFIGURATION;
		this.fatal = !restored;
	}
}

/** Scenario prerequisite has not passed in the current checkpoint */
export class OrchestrationDependencyUnmetError extends VerifyError {
	readonly kind = "dependency-unmet";
	readonly exitCode = EXIT_CODES.CONFIGURATION;

	constructor(
		public readonly scenarioId: string,
		public readonly missing: string[],
	) {
		super(`Scenario ${scenarioId} depends on ${missing.join(", ")} which ha${missing.length === 1 ? "s" : "ve"} not passed`);
		this.name = "OrchestrationDependencyUnmetError";
	}
}

/** Registry declares a schema version this engine does not know */
export class SchemaVersionError extends VerifyError {
	readonly kind = "schema-version";
	readonly exitCode = EXIT_CODES.CONFIGURATION;
	readonly fatal = true;

	constructor(public readonly found: unknown) {
		super(`Unsupported registry schema_version: ${JSON.stringify(found ?? null)}`);
		this.name = "SchemaVersionError";
	}
}

export class InvalidTransitionError extends VerifyError {
	readonly kind = "invalid-transition";
	readonly exitCode = EXIT_CODES.CONFIGURATION;

	constructor(
		public readonly subject: string,
		public readonly from: string,
		public readonly to: string,
		reason?: string,
	) {
		super(`Cannot move ${subject} from ${from} to ${to}${reason ? `: ${reason}` : ""}`);
		this.name = "InvalidTransitionError";
	}
}

export class NotFoundError extends VerifyError {
	readonly kind = "not-found";
	readonly exitCode = EXIT_CODES.CONFIGURATION;

	constructor(
		public readonly what: string,
		public readonly id: string,
	) {
		super(`${what} not found: ${id}`);
		this.name = "NotFoundError";
	}
}

/** Malformed configuration, scenario or trigger definitions */
export class ConfigurationError extends VerifyError {
	readonly kind = "configuration";
	readonly exitCode = EXIT_CODES.CONFIGURATION;

	constructor(
		message: string,
		public readonly details: string[] = [],
	) {
		super(details.length > 0 ? `${message}\n  ${details.join("\n  ")}` : message);
		this.name = "ConfigurationError";
	}
}

/** The executor could not start the process at all */
export class ExecutorFault extends VerifyError {
	readonly kind = "executor-fault";
	readonly exitCode = EXIT_CODES.FAILURES;
	readonly fatal = true;

	constructor(
		public readonly command: string,
		cause: Error,
	) {
		super(`Cannot spawn "${command}": ${cause.message}`);
		this.name = "ExecutorFault";
	}
}

export function isVerifyError(err: unknown): err is VerifyError {
	return err instanceof VerifyError;
}

/**
 * Combine exit codes: configuration (2) > failures (1) > restored corruption (3) > ok (0)
 */
export function combineExitCodes(codes: Iterable<ExitCode>): ExitCode {
	const rank: Record<ExitCode, number> = { 0: 0, 3: 1, 1: 2, 2: 3 };
	let worst: ExitCode = EXIT_CODES.OK;
	for (const code of codes) {
		if (rank[code] > rank[worst]) worst = code;
	}
	return worst;
}
