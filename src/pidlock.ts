import fs from "node:fs";
import path from "node:path";
import { log } from "./utils/logger.js";

const bootLog = log.withScope("boot");

/**
 * PID lock file to prevent multiple bot instances running simultaneously
 */

function isPidRunning(pid: number): boolean {
  try {
    // signal 0 only checks for existence
    process.kill(pid, 0);
    return true;
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    // EPERM: exists, owned by someone else
    return code === "EPERM";
  }
}

export function readLockPid(lockFile: string): number | null {
  if (!fs.existsSync(lockFile)) return null;
  const pid = parseInt(fs.readFileSync(lockFile, "utf8").trim(), 10);
  return Number.isNaN(pid) ? null : pid;
}

export function acquireLock(lockFile: string): boolean {
  const existingPid = readLockPid(lockFile);
  if (existingPid !== null && existingPid !== process.pid && isPidRunning(existingPid)) {
    bootLog.error(`Bot already running (PID ${existingPid}). Exiting.`);
    return false;
  }
  if (existingPid !== null) {
    bootLog.info(`Stale lock file detected (PID ${existingPid}). Overwriting.`);
  }

  fs.mkdirSync(path.dirname(lockFile), { recursive: true });
  fs.writeFileSync(lockFile, process.pid.toString(), "utf8");
  bootLog.info(`PID lock acquired (${process.pid})`);
  return true;
}

export function releaseLock(lockFile: string): void {
  if (readLockPid(lockFile) !== process.pid) return;
  fs.unlinkSync(lockFile);
  bootLog.info("PID lock released");
}

/**
 * Release the lock on normal exit and on SIGINT/SIGTERM.
 * @param onShutdown runs before the process exits on a signal
 */
export function installLockCleanup(lockFile: string, onShutdown?: () => void): void {
  process.on("exit", () => releaseLock(lockFile));

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.on(signal, () => {
      bootLog.info(`Received ${signal}, shutting down...`);
      onShutdown?.();
      releaseLock(lockFile);
      process.exit(0);
    });
  }
}
