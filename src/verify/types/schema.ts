/**
 * Persisted document schemas
 *
 * Registry, issue, scenario and checkpoint documents are YAML on disk and
 * parsed through these schemas. Defaults fill fields that older or
 * hand-written documents omit.
 */

import { z } from "zod";

export const SUPPORTED_SCHEMA_VERSIONS = [2] as const;

export const DEPTHS = ["basic", "standard", "thorough", "paranoid"] as const;
export const DepthSchema = z.enum(DEPTHS);
export type Depth = z.infer<typeof DepthSchema>;

export const AutomatabilitySchema = z.enum([
	"automatable",
	"environment_dependent",
	"manual_only",
]);
export type Automatability = z.infer<typeof AutomatabilitySchema>;

export const HumanChannelSchema = z.enum(["manual", "auto-logged", "opportunistic"]);
export type HumanChannel = z.infer<typeof HumanChannelSchema>;

// ============================================
// Registry
// ============================================

export const CheckDefSchema = z.object({
	cmd: z.string().min(1),
	expect_exit: z.number().int().default(0),
	timeout: z.number().positive().optional(), // seconds
});
export type CheckDef = z.infer<typeof CheckDefSchema>;

export const DepthChecksSchema = z
	.object({
		basic: z.array(CheckDefSchema).optional(),
		standard: z.array(CheckDefSchema).optional(),
		thorough: z.array(CheckDefSchema).optional(),
		paranoid: z.array(CheckDefSchema).optional(),
	})
	.default({});
export type DepthChecks = z.infer<typeof DepthChecksSchema>;

export const MachineCheckStateSchema = z.object({
	verified: z.boolean().default(false),
	depth: DepthSchema.nullable().default(null),
	verified_at: z.string().nullable().default(null),
	duration_ms: z.number().nonnegative().nullable().default(null),
	output_tail: z.string().nullable().default(null),
	depth_exercised: DepthSchema.nullable().default(null),
});
export type MachineCheckState = z.infer<typeof MachineCheckStateSchema>;

export const HumanStateSchema = z.object({
	verified: z.boolean().default(false),
	verified_at: z.string().nullable().default(null),
	verified_by: z.string().nullable().default(null),
	channel: HumanChannelSchema.nullable().default(null),
});
export type HumanState = z.infer<typeof HumanStateSchema>;

export const ItemSchema = z
	.object({
		id: z.string().min(1),
		text: z.string(),
		automatable: AutomatabilitySchema,
		reason: z.string().optional(),
		checks: DepthChecksSchema,
		triggers: z.array(z.string()).default([]),
		machine: MachineCheckStateSchema.default({}),
		human: HumanStateSchema.default({}),
		issues: z.array(z.string()).default([]),
		invalidated: z.boolean().default(false),
	})
	.superRefine((item, ctx) => {
		if (item.automatable !== "automatable" && !item.reason?.trim()) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `item ${item.id}: ${item.automatable} items need a reason`,
				path: ["reason"],
			});
		}
	});
export type Item = z.infer<typeof ItemSchema>;

export const FeatureFileSchema = z.object({
	path: z.string().min(1),
	lines: z
		.string()
		.regex(/^\d+-\d+$/, "expected a line range like 10-40")
		.optional(),
	hash: z.string().nullable().default(null),
});
export type FeatureFile = z.infer<typeof FeatureFileSchema>;

export const FeatureSummarySchema = z.object({
	total: z.number().int().nonnegative(),
	machine_verified: z.number().int().nonnegative(),
	human_verified: z.number().int().nonnegative(),
	fully_verified: z.number().int().nonnegative(),
	invalidated: z.number().int().nonnegative(),
});
export type FeatureSummary = z.infer<typeof FeatureSummarySchema>;

export const FeatureSchema = z.object({
	name: z.string(),
	description: z.string().optional(),
	files: z.array(FeatureFileSchema).default([]),
	summary: FeatureSummarySchema.optional(),
	items: z.array(ItemSchema).default([]),
});
export type Feature = z.infer<typeof FeatureSchema>;

export const RegistrySchema = z.object({
	schema_version: z.number().int(),
	features: z.record(z.string(), FeatureSchema).default({}),
});
export type Registry = z.infer<typeof RegistrySchema>;

// ============================================
// Issues
// ============================================

export const ISSUE_STATUSES = [
	"open",
	"investigating",
	"fixed",
	"verified",
	"wontfix",
	"duplicate",
	"reopened",
] as const;
export const IssueStatusSchema = z.enum(ISSUE_STATUSES);
export type IssueStatus = z.infer<typeof IssueStatusSchema>;

export const ArtifactCheckSchema = z.object({
	path: z.string(),
	exists: z.boolean(),
	size: z.number().int().nonnegative().nullable(),
});
export type ArtifactCheck = z.infer<typeof ArtifactCheckSchema>;

export const DiagnosticsSchema = z.object({
	environment: z.record(z.string(), z.string()).default({}),
	artifacts: z.array(ArtifactCheckSchema).default([]),
	extra: z.record(z.string(), z.string()).default({}),
});
export type Diagnostics = z.infer<typeof DiagnosticsSchema>;

export const IssueTransitionSchema = z.object({
	from: IssueStatusSchema,
	to: IssueStatusSchema,
	at: z.string(),
	by: z.string(),
	note: z.string().nullable().default(null),
});
export type IssueTransition = z.infer<typeof IssueTransitionSchema>;

export const IssueSchema = z.object({
	id: z.string().min(1),
	created: z.string(),
	reporter: z.string(),
	command: z.string(),
	exit_code: z.number().int().nullable(),
	item_id: z.string().min(1),
	description: z.string(),
	diagnostics: DiagnosticsSchema.default({}),
	status: IssueStatusSchema.default("open"),
	history: z.array(IssueTransitionSchema).default([]),
	resolution: z
		.object({
			note: z.string(),
			resolved_at: z.string(),
			resolved_by: z.string(),
		})
		.nullable()
		.default(null),
});
export type Issue = z.infer<typeof IssueSchema>;

// ============================================
// Scenarios
// ============================================

/** Tolerance is absolute (number) or relative ("5%") */
export const ToleranceSchema = z.union([
	z.number().nonnegative(),
	z.string().regex(/^\d+(\.\d+)?%$/, "expected a percentage like 5%"),
]);
export type Tolerance = z.infer<typeof ToleranceSchema>;

export const StepSeveritySchema = z.enum(["critical", "high", "warning"]);
export type StepSeverity = z.infer<typeof StepSeveritySchema>;

const stringList = z
	.union([z.string(), z.array(z.string())])
	.transform((v) => (typeof v === "string" ? [v] : v));

export const StepSchema = z.object({
	name: z.string().min(1),
	cmd: z.string().min(1),
	expect_exit: z.number().int().default(0),
	timeout: z.number().positive().optional(),
	expect_contains: stringList.default([]),
	expect_not_contains: stringList.default([]),
	capture: z.string().regex(/^[A-Za-z_][A-Za-z0-9_]*$/).optional(),
	compare: z
		.object({
			baseline: z.string().min(1),
			tolerance: ToleranceSchema.default(0),
		})
		.optional(),
	severity: StepSeveritySchema.default("high"),
});
export type Step = z.infer<typeof StepSchema>;

export const PhaseCommandSchema = z.object({
	name: z.string().optional(),
	cmd: z.string().min(1),
	timeout: z.number().positive().optional(),
});
export type PhaseCommand = z.infer<typeof PhaseCommandSchema>;

export const ResourceSchema = z.object({
	name: z.string().min(1),
	create: z.string().optional(),
	cleanup: z.string().optional(),
});
export type Resource = z.infer<typeof ResourceSchema>;

export const ScenarioSchema = z.object({
	id: z.string().min(1),
	name: z.string().default(""),
	description: z.string().default(""),
	depends_on: z.array(z.string()).default([]),
	estimated_duration: z.number().nonnegative().default(0),
	is_gate: z.boolean().default(false),
	items: z.array(z.string()).default([]),
	target: z.string().optional(),
	resources: z.array(ResourceSchema).default([]),
	setup: z.array(PhaseCommandSchema).default([]),
	steps: z.array(StepSchema).min(1),
	cleanup: z.array(PhaseCommandSchema).default([]),
});
export type Scenario = z.infer<typeof ScenarioSchema>;

export const FixPatternSchema = z.object({
	id: z.string().min(1),
	pattern: z.string().min(1),
	fix: z.array(z.string().min(1)).min(1),
	severity: z.enum(["low", "medium", "high", "critical"]).default("medium"),
});
export type FixPattern = z.infer<typeof FixPatternSchema>;

// ============================================
// Checkpoint
// ============================================

export const ScenarioRecordSchema = z.object({
	id: z.string(),
	status: z.enum(["passed", "failed"]),
	duration_ms: z.number().nonnegative(),
	confidence: z.number().min(0).max(100),
	items_verified: z.number().int().nonnegative(),
	completed_at: z.string(),
});
export type ScenarioRecord = z.infer<typeof ScenarioRecordSchema>;

export const FindingSchema = z.object({
	scenario: z.string(),
	step: z.number().int().nonnegative(),
	type: z.enum(["warning", "error", "fixed"]),
	message: z.string(),
	at: z.string(),
});
export type Finding = z.infer<typeof FindingSchema>;

export const PreservedResourceSchema = z.object({
	name: z.string(),
	scenario: z.string(),
	preserve: z.boolean(),
	reason: z.string().nullable().default(null),
});
export type PreservedResource = z.infer<typeof PreservedResourceSchema>;

export const CheckpointSchema = z.object({
	run_id: z.string(),
	started_at: z.string(),
	last_updated: z.string(),
	completed: z.array(ScenarioRecordSchema).default([]),
	current: z
		.object({
			scenario: z.string(),
			step: z.number().int().nonnegative(),
			step_name: z.string().nullable(),
		})
		.nullable()
		.default(null),
	resources: z.array(PreservedResourceSchema).default([]),
	findings: z.array(FindingSchema).default([]),
});
export type Checkpoint = z.infer<typeof CheckpointSchema>;

/**
 * Flatten zod issues into one-line messages ("features.backup.items.0.text: Required")
 */
export function formatZodIssues(error: z.ZodError): string[] {
	return error.issues.map((issue) => {
		const path = issue.path.join(".");
		return path ? `${path}: ${issue.message}` : issue.message;
	});
}
