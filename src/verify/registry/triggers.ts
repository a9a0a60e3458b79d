/**
 * Trigger table: command signatures → item ids
 *
 * A signature is a whitespace-separated token list. It matches a command
 * whose tokens start with the signature's tokens; `*` matches any one token.
 */

import { ConfigurationError } from "../types/errors.js";
import type { Registry } from "../types/index.js";
import { listItems } from "../types/index.js";

export interface TriggerEntry {
	signature: string[];
	itemId: string;
}

export function tokenize(command: string): string[] {
	return command.trim().split(/\s+/).filter(Boolean);
}

/**
 * Build and validate the trigger table. Empty signatures and repeated
 * (signature, item) pairs are configuration errors.
 */
export function buildTriggerTable(registry: Registry): TriggerEntry[] {
	const table: TriggerEntry[] = [];
	const problems: string[] = [];
	const seen = new Set<string>();

	for (const { item } of listItems(registry)) {
		for (const raw of item.triggers) {
			const signature = tokenize(raw);
			if (signature.length === 0) {
				problems.push(`${item.id}: empty trigger signature`);
				continue;
			}
			const key = `${signature.join(" ")}\u0000${item.id}`;
			if (seen.has(key)) {
				problems.push(`${item.id}: duplicate trigger "${signature.join(" ")}"`);
				continue;
			}
			seen.add(key);
			table.push({ signature, itemId: item.id });
		}
	}

	if (problems.length > 0) {
		throw new ConfigurationError("Invalid trigger table", problems);
	}
	return table;
}

export function signatureMatches(signature: string[], commandTokens: string[]): boolean {
	if (signature.length > commandTokens.length) return false;
	return signature.every((token, i) => token === "*" || token === commandTokens[i]);
}

/** Item ids whose triggers match the command, in table order, without repeats */
export function matchTriggers(table: TriggerEntry[], command: string): string[] {
	const tokens = tokenize(command);
	const ids: string[] = [];
	for (const entry of table) {
		if (signatureMatches(entry.signature, tokens) && !ids.includes(entry.itemId)) {
			ids.push(entry.itemId);
		}
	}
	return ids;
}
