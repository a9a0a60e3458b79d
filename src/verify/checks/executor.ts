/**
 * Check Executor
 *
 * Runs one command through the shell with a hard timeout and keeps only the
 * tail of its combined output. A failing or timed-out command is a result;
 * only a spawn failure throws (ExecutorFault).
 */

import { spawn } from "node:child_process";
import type { CheckContext, CheckResult } from "../types/index.js";
import { ExecutorFault } from "../types/errors.js";
import { debug } from "../state/events.js";
import { substitutePlaceholders } from "../utils/shell.js";

export interface ExecutorOptions {
	cwd: string;
	/** Seconds, used when a check declares none */
	defaultTimeout: number;
	tailLines: number;
	tailBytes: number;
}

/** A uniform check: command, expected exit, optional timeout in seconds */
export interface RunnableCheck {
	cmd: string;
	expect_exit?: number;
	timeout?: number;
}

const TRUNCATED_MARKER = "(truncated)\n";

/**
 * Keep the last `maxLines` lines and at most `maxBytes` bytes of output,
 * prefixed with "(truncated)" when anything was dropped.
 */
export function tailOutput(
	output: string,
	maxLines: number,
	maxBytes: number,
	alreadyTruncated = false,
): string {
	let result = output;
	let truncated = alreadyTruncated;

	const lines = result.split("\n");
	if (lines.length > maxLines) {
		result = lines.slice(-maxLines).join("\n");
		truncated = true;
	}

	const buf = Buffer.from(result, "utf-8");
	if (buf.length > maxBytes) {
		let start = buf.length - maxBytes;
		// Skip UTF-8 continuation bytes so we start on a character boundary
		while (start < buf.length && (buf[start] & 0xc0) === 0x80) start++;
		result = buf.subarray(start).toString("utf-8");
		truncated = true;
	}

	return truncated ? `${TRUNCATED_MARKER}${result}` : result;
}

export class CheckExecutor {
	constructor(private readonly options: ExecutorOptions) {}

	/**
	 * Execute a check after placeholder substitution.
	 *
	 * Timeouts kill the whole process group and report
	 * `{passed: false, exitCode: null, timedOut: true}`.
	 */
	run(check: RunnableCheck, context: CheckContext = {}): Promise<CheckResult> {
		const command = substitutePlaceholders(check.cmd, context);
		const expectedExit = check.expect_exit ?? 0;
		const timeoutSec = check.timeout ?? this.options.defaultTimeout;
		const { tailLines, tailBytes } = this.options;

		return new Promise((resolve, reject) => {
			const started = Date.now();
			let output = "";
			let dropped = false;
			let timedOut = false;
			let settled = false;

			debug(`exec (timeout ${timeoutSec}s): ${command}`);

			const proc = spawn(command, [], {
				shell: true,
				detached: true,
				cwd: this.options.cwd,
				stdio: ["ignore", "pipe", "pipe"],
			});

			// Decoders keep multibyte characters intact across chunk boundaries
			proc.stdout.setEncoding("utf-8");
			proc.stderr.setEncoding("utf-8");

			// Bounded while streaming: never hold more than twice the byte budget
			const collect = (data: string) => {
				output += data;
				if (output.length > tailBytes * 2) {
					output = output.slice(-tailBytes);
					// Drop half of a surrogate pair left at the cut
					if (/^[\uDC00-\uDFFF]/.test(output)) output = output.slice(1);
					dropped = true;
				}
			};
			proc.stdout.on("data", collect);
			proc.stderr.on("data", collect);

			const killTimer = setTimeout(() => {
				timedOut = true;
				killGroup(proc.pid);
			}, timeoutSec * 1000);

			proc.on("error", (err) => {
				clearTimeout(killTimer);
				if (settled) return;
				settled = true;
				reject(new ExecutorFault(command, err));
			});

			proc.on("close", (code) => {
				clearTimeout(killTimer);
				if (settled) return;
				settled = true;

				const exitCode = timedOut ? null : code;
				resolve({
					command,
					passed: !timedOut && exitCode === expectedExit,
					exitCode,
					expectedExit,
					timedOut,
					durationMs: Date.now() - started,
					outputTail: tailOutput(output.replace(/\n$/, ""), tailLines, tailBytes, dropped),
				});
			});
		});
	}
}

function killGroup(pid: number | undefined): void {
	if (pid === undefined) return;
	try {
		process.kill(-pid, "SIGKILL");
	} catch (err) {
		debug(`group kill failed for ${pid}: ${err instanceof Error ? err.message : String(err)}`);
		try {
			process.kill(pid, "SIGKILL");
		} catch {
			// Already exited
		}
	}
}
