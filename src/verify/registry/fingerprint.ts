/**
 * Feature file fingerprints
 *
 * A feature's items are invalidated when the content behind any of its
 * referenced files (or line ranges) no longer matches the hash recorded at
 * the last verification.
 */

import { createHash } from "node:crypto";
import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";
import type { Feature, FeatureFile, Item, Registry } from "../types/index.js";

/**
 * sha256 of the file, or of lines `a-b` (1-based, inclusive) when given.
 * Returns null when the file does not exist.
 */
export function fingerprintFile(projectRoot: string, file: FeatureFile): string | null {
	const path = join(projectRoot, file.path);
	if (!existsSync(path)) return null;

	let content = readFileSync(path, "utf-8");
	if (file.lines) {
		const [start, end] = file.lines.split("-").map((n) => Number.parseInt(n, 10));
		content = content
			.split("\n")
			.slice(Math.max(0, start - 1), end)
			.join("\n");
	}
	return createHash("sha256").update(content).digest("hex");
}

export interface FingerprintChanges {
	/** Features with a recorded hash that no longer matches */
	changed: string[];
	/** Features with at least one file never fingerprinted */
	unrecorded: string[];
}

export function detectChanges(registry: Registry, projectRoot: string): FingerprintChanges {
	const changed: string[] = [];
	const unrecorded: string[] = [];

	for (const [featureId, feature] of Object.entries(registry.features)) {
		let isChanged = false;
		let isUnrecorded = false;
		for (const file of feature.files) {
			if (file.hash === null) {
				isUnrecorded = true;
			} else if (fingerprintFile(projectRoot, file) !== file.hash) {
				isChanged = true;
			}
		}
		if (isChanged) changed.push(featureId);
		else if (isUnrecorded) unrecorded.push(featureId);
	}

	return { changed, unrecorded };
}

/** Record current hashes for every file of a feature (mutates the draft) */
export function recordFingerprints(feature: Feature, projectRoot: string): void {
	for (const file of feature.files) {
		file.hash = fingerprintFile(projectRoot, file);
	}
}

/** Drop both verifications and flag the item until it is re-verified */
export function invalidateItem(item: Item): void {
	item.machine.verified = false;
	item.machine.depth = null;
	item.human.verified = false;
	item.invalidated = true;
}
