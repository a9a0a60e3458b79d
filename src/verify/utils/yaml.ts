/**
 * YAML document helpers shared by the issue, checkpoint and prefs stores
 */

import { mkdirSync, readFileSync, renameSync, writeFileSync } from "node:fs";
import { dirname } from "node:path";
import { dump, load as parseYaml } from "js-yaml";

export function toYaml(data: unknown): string {
	return dump(data, { indent: 2, lineWidth: -1, noRefs: true, skipInvalid: true });
}

export function readYaml(path: string): unknown {
	return parseYaml(readFileSync(path, "utf-8"));
}

/**
 * Write via a sibling temp file and rename, so readers never see a torn file
 */
export function writeYamlAtomic(path: string, data: unknown): void {
	mkdirSync(dirname(path), { recursive: true });
	const tmp = `${path}.tmp-${process.pid}`;
	writeFileSync(tmp, toYaml(data));
	renameSync(tmp, path);
}
