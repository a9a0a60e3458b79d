/**
 * Tests for the check executor and shell helpers
 */

import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, test } from "vitest";
import { CheckExecutor, tailOutput } from "../../../src/verify/checks/executor.js";
import { ExecutorFault } from "../../../src/verify/types/errors.js";
import { quoteShellArg, substitutePlaceholders } from "../../../src/verify/utils/shell.js";

describe("CheckExecutor", () => {
	let dir: string;
	let executor: CheckExecutor;

	beforeEach(() => {
		dir = mkdtempSync(join(tmpdir(), "verify-exec-"));
		executor = new CheckExecutor({ cwd: dir, defaultTimeout: 10, tailLines: 50, tailBytes: 4096 });
	});

	afterEach(() => {
		rmSync(dir, { recursive: true, force: true });
	});

	test("a zero exit passes and keeps the output", async () => {
		const result = await executor.run({ cmd: "echo hello" });
		expect(result.passed).toBe(true);
		expect(result.exitCode).toBe(0);
		expect(result.timedOut).toBe(false);
		expect(result.outputTail).toBe("hello");
	});

	test("the declared exit code decides the result", async () => {
		const expected = await executor.run({ cmd: "exit 3", expect_exit: 3 });
		expect(expected.passed).toBe(true);
		expect(expected.exitCode).toBe(3);

		const unexpected = await executor.run({ cmd: "exit 2" });
		expect(unexpected.passed).toBe(false);
		expect(unexpected.exitCode).toBe(2);
		expect(unexpected.expectedExit).toBe(0);
	});

	test("stderr is part of the tail", async () => {
		const result = await executor.run({ cmd: "echo oops 1>&2; exit 1" });
		expect(result.outputTail).toBe("oops");
	});

	test("runs in the configured directory", async () => {
		const result = await executor.run({ cmd: "pwd -P" });
		const real = await executor.run({ cmd: `cd ${quoteShellArg(dir)} && pwd -P` });
		expect(result.outputTail).toBe(real.outputTail);
	});

	test("a timeout kills the command and fails the check", async () => {
		const started = Date.now();
		const result = await executor.run({ cmd: "sleep 5", timeout: 0.3 });
		expect(result).toMatchObject({ passed: false, exitCode: null, timedOut: true });
		expect(Date.now() - started).toBeLessThan(4000);
	});

	test("long output keeps only the tail", async () => {
		const result = await executor.run({ cmd: "seq 1 100" });
		const expected = Array.from({ length: 50 }, (_, i) => String(i + 51)).join("\n");
		expect(result.outputTail).toBe(`(truncated)\n${expected}`);
	});

	test("multibyte output survives chunking and the byte cut", async () => {
		const result = await executor.run({ cmd: "yes € | head -n 100000 | tr -d '\\n'" });
		expect(result.outputTail).toBe(`(truncated)\n${"€".repeat(1365)}`);
	});

	test("placeholders are substituted shell-quoted", async () => {
		const result = await executor.run({ cmd: "echo {site}" }, { site: "it's here" });
		expect(result.command).toBe("echo 'it'\\''s here'");
		expect(result.outputTail).toBe("it's here");
	});

	test("a process that cannot start is an executor fault", async () => {
		const broken = new CheckExecutor({
			cwd: join(dir, "missing"),
			defaultTimeout: 10,
			tailLines: 50,
			tailBytes: 4096,
		});
		await expect(broken.run({ cmd: "true" })).rejects.toBeInstanceOf(ExecutorFault);
	});
});

describe("tailOutput", () => {
	test("short output is untouched", () => {
		expect(tailOutput("a\nb", 5, 100)).toBe("a\nb");
	});

	test("line limit", () => {
		expect(tailOutput("a\nb\nc", 2, 100)).toBe("(truncated)\nb\nc");
	});

	test("byte limit", () => {
		expect(tailOutput("abcdef", 10, 3)).toBe("(truncated)\ndef");
	});

	test("earlier truncation is still reported", () => {
		expect(tailOutput("x", 10, 100, true)).toBe("(truncated)\nx");
	});
});

describe("shell helpers", () => {
	test("quoteShellArg", () => {
		expect(quoteShellArg("staging-1.example.org")).toBe("staging-1.example.org");
		expect(quoteShellArg("two words")).toBe("'two words'");
		expect(quoteShellArg("$(rm -rf /)")).toBe("'$(rm -rf /)'");
		expect(quoteShellArg("")).toBe("''");
	});

	test("substitutePlaceholders keeps unknown placeholders", () => {
		expect(
			substitutePlaceholders("deploy {site} --depth {depth} {unknown}", {
				site: "a b",
				depth: "basic",
			}),
		).toBe("deploy 'a b' --depth basic {unknown}");
	});

	test("captured values fill their own names", () => {
		expect(
			substitutePlaceholders("test {count} -eq 3", { captured: { count: "3" } }),
		).toBe("test 3 -eq 3");
	});
});
