/**
 * Cross-process writer lock (exclusive-create lock file holding the PID)
 */

import { existsSync, readFileSync, unlinkSync, writeFileSync } from "node:fs";
import { setTimeout as sleep } from "node:timers/promises";

function isPidAlive(pid: number): boolean {
	try {
		process.kill(pid, 0);
		return true;
	} catch (err) {
		// EPERM means the process exists but belongs to someone else
		return err instanceof Error && "code" in err && err.code === "EPERM";
	}
}

/**
 * Acquire the lock at `lockPath`.
 * Returns the lock path if acquired, null on timeout.
 */
export async function acquireLock(
	lockPath: string,
	timeoutMs = 5000,
): Promise<string | null> {
	const startTime = Date.now();

	while (Date.now() - startTime < timeoutMs) {
		if (!existsSync(lockPath)) {
			try {
				writeFileSync(lockPath, String(process.pid), { flag: "wx" });
				return lockPath;
			} catch {
				// Another process beat us - retry
			}
		}
		// Check if lock holder is dead
		try {
			const lockerPid = Number.parseInt(
				readFileSync(lockPath, "utf-8").trim(),
				10,
			);
			if (lockerPid && !isPidAlive(lockerPid)) {
				unlinkSync(lockPath);
				continue;
			}
		} catch {
			// Lock vanished or is mid-write - retry
		}
		await sleep(10 + Math.random() * 20);
	}

	return null;
}

/**
 * Release a lock
 */
export function releaseLock(lockPath: string): void {
	try {
		unlinkSync(lockPath);
	} catch {
		// Lock already gone
	}
}
