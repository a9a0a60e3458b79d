/**
 * Event logging for audit trail
 *
 * Append-only JSONL log of registry, issue and scenario events
 */

import { appendFileSync, existsSync, readFileSync } from "node:fs";
import { ensureVerifyDir } from "./config.js";
import type { VerifyPaths } from "./paths.js";

export const VERIFY_EVENT_TYPES = [
	"registry_committed",
	"registry_rejected",
	"registry_restored",
	"machine_verified",
	"machine_failed",
	"human_verified",
	"human_denied",
	"issue_created",
	"issue_transitioned",
	"scenario_completed",
	"scenario_skipped",
	"fix_applied",
	"items_invalidated",
	"checkpoint_archived",
] as const;

export type VerifyEventType = (typeof VERIFY_EVENT_TYPES)[number];

/** Event payload as callers pass it; `ts` is stamped on append */
export type VerifyEventInput = { event: VerifyEventType } & Record<string, unknown>;

export type VerifyEvent = VerifyEventInput & { ts: string };

function isVerifyEvent(value: unknown): value is VerifyEvent {
	if (typeof value !== "object" || value === null) return false;
	if (!("ts" in value) || typeof value.ts !== "string" || !("event" in value)) return false;
	const name = value.event;
	return VERIFY_EVENT_TYPES.some((t) => t === name);
}

/**
 * Append event to log
 */
export function logEvent(
	paths: VerifyPaths,
	event: VerifyEventInput,
): void {
	ensureVerifyDir(paths);

	const fullEvent: VerifyEvent = {
		...event,
		event: event.event,
		ts: new Date().toISOString(),
	};

	appendFileSync(paths.EVENTS_FILE, `${JSON.stringify(fullEvent)}\n`);
	debug(`event ${event.event}`);
}

/**
 * Read recent events (last N). Unparseable lines are skipped.
 */
export function readEvents(paths: VerifyPaths, limit?: number): VerifyEvent[] {
	if (!existsSync(paths.EVENTS_FILE)) {
		return [];
	}

	const content = readFileSync(paths.EVENTS_FILE, "utf-8");
	const events: VerifyEvent[] = [];
	for (const line of content.split("\n")) {
		if (!line.trim()) continue;
		try {
			const parsed: unknown = JSON.parse(line);
			if (isVerifyEvent(parsed)) events.push(parsed);
		} catch {
			debug(`skipping malformed event line: ${line.slice(0, 80)}`);
		}
	}

	return limit ? events.slice(-limit) : events;
}

/**
 * Debug trace on stderr, enabled by VERIFY_DEBUG
 */
export function debug(message: string): void {
	if (process.env.VERIFY_DEBUG) {
		console.error(`[verify] ${message}`);
	}
}
