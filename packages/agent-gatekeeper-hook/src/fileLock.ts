import path from "node:path";
import fs from "node:fs/promises";
import { randomUUID } from "node:crypto";
import { LockTimeoutError } from "./errors.js";

export const LOCK_RETRY_DELAY_MS = 25;
export const LOCK_METADATA_GRACE_MS = 2000;

type LockMetadata = {
  pid: number;
  acquired_at: string;
};

type FileHandle = Awaited<ReturnType<typeof fs.open>>;

export function errnoCode(err: unknown): string | undefined {
  if (typeof err !== "object" || err === null || !("code" in err)) return undefined;
  return typeof err.code === "string" ? err.code : undefined;
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function parseLockMetadata(raw: string): LockMetadata | null {
  if (!raw.trim()) return null;
  try {
    const parsed: unknown = JSON.parse(raw);
    if (typeof parsed !== "object" || parsed === null) return null;
    const pid = "pid" in parsed ? parsed.pid : undefined;
    const acquiredAt = "acquired_at" in parsed ? parsed.acquired_at : undefined;
    if (typeof pid === "number" && Number.isInteger(pid) && pid > 0 && typeof acquiredAt === "string") {
      return { pid, acquired_at: acquiredAt };
    }
    return null;
  } catch {
    return null;
  }
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM means it exists but belongs to someone else.
    return errnoCode(err) !== "ESRCH";
  }
}

export type LockSnapshot = {
  raw: string;
  ino: number;
  mtimeMs: number;
};

export async function readLockSnapshot(lockFilePath: string): Promise<LockSnapshot | null> {
  try {
    const stat = await fs.stat(lockFilePath);
    const raw = await fs.readFile(lockFilePath, "utf8");
    return { raw, ino: stat.ino, mtimeMs: stat.mtimeMs };
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return null;
    throw err;
  }
}

/**
 * A lock whose owner is dead is stale. So is one without readable metadata once it is older
 * than LOCK_METADATA_GRACE_MS: its owner died between creating and writing it.
 */
export function isStaleLock(snapshot: LockSnapshot, now = Date.now()): boolean {
  const metadata = parseLockMetadata(snapshot.raw);
  if (metadata) return !isProcessAlive(metadata.pid);
  return now - snapshot.mtimeMs > LOCK_METADATA_GRACE_MS;
}

/**
 * Removes the lock judged stale in `observed`. The lock is first renamed aside, which only
 * one contender can do; if what was moved is no longer the file that was judged, another
 * process took the lock in between and it is put back.
 */
export async function removeStaleLock(lockFilePath: string, observed: LockSnapshot): Promise<boolean> {
  const aside = `${lockFilePath}.stale-${process.pid}-${randomUUID()}`;
  try {
    await fs.rename(lockFilePath, aside);
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return true;
    throw err;
  }

  const moved = await readLockSnapshot(aside);
  if (!moved || moved.ino !== observed.ino || moved.raw !== observed.raw) {
    try {
      await fs.link(aside, lockFilePath);
    } catch (err) {
      if (errnoCode(err) !== "EEXIST") throw err;
      console.error(`agent-gatekeeper: could not restore lock ${lockFilePath}; it was taken again`);
    }
    await fs.rm(aside, { force: true });
    return false;
  }

  const metadata = parseLockMetadata(observed.raw);
  const owner = metadata ? `dead pid ${metadata.pid}` : "no owner";
  console.error(`agent-gatekeeper: recovering stale lock ${lockFilePath} held by ${owner}`);
  await fs.rm(aside, { force: true });
  return true;
}

async function recoverStaleLockIfNeeded(lockFilePath: string): Promise<boolean> {
  const observed = await readLockSnapshot(lockFilePath);
  if (!observed) return true;
  if (!isStaleLock(observed)) return false;
  return removeStaleLock(lockFilePath, observed);
}

async function acquire(lockFilePath: string, timeoutMs: number): Promise<FileHandle> {
  await fs.mkdir(path.dirname(lockFilePath), { recursive: true });
  const started = Date.now();

  for (;;) {
    try {
      const handle = await fs.open(lockFilePath, "wx");
      const metadata: LockMetadata = { pid: process.pid, acquired_at: new Date().toISOString() };
      await handle.writeFile(JSON.stringify(metadata), "utf8");
      return handle;
    } catch (err) {
      if (errnoCode(err) !== "EEXIST") throw err;
    }

    if (await recoverStaleLockIfNeeded(lockFilePath)) continue;

    const waited = Date.now() - started;
    if (waited >= timeoutMs) throw new LockTimeoutError(lockFilePath, waited);
    await sleep(Math.min(LOCK_RETRY_DELAY_MS, timeoutMs - waited));
  }
}

async function release(lockFilePath: string, handle: FileHandle): Promise<void> {
  try {
    await handle.close();
  } catch (err) {
    console.error(`agent-gatekeeper: closing lock ${lockFilePath} failed:`, err);
  }
  await fs.rm(lockFilePath, { force: true });
}

/**
 * Runs `operation` while holding an exclusive lock file.
 *
 * The lock is a file created with O_EXCL holding the owner's pid. A stale lock is removed
 * and acquisition retried; otherwise waiting ends with LockTimeoutError.
 */
export async function withFileLock<T>(
  lockFilePath: string,
  timeoutMs: number,
  operation: () => Promise<T>
): Promise<T> {
  const handle = await acquire(lockFilePath, timeoutMs);
  try {
    return await operation();
  } finally {
    await release(lockFilePath, handle);
  }
}
