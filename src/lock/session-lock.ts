/**
 * Cross-process session lock over the cache root.
 */

import { promises as fsp } from "node:fs";
import { randomUUID } from "node:crypto";
import path from "node:path";
import { LockError, errnoCode, errorMessage } from "../utils/errors";
import { sessionLockSchema, type SessionLockData } from "../config/schema";
import type { Logger } from "../utils/logger";

export const SESSION_LOCK_FILE = "session_lock";

/** An unreadable lock file younger than this may still be being written. */
const UNREADABLE_GRACE_MS = 10_000;

/** `process.kill(pid, 0)` probes a process without signalling it. */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return errnoCode(err) === "EPERM";
  }
}

type LockFileState =
  | { kind: "missing" }
  | { kind: "owned"; owner: SessionLockData }
  | { kind: "unreadable"; fresh: boolean };

function parseOwner(raw: string): SessionLockData | null {
  try {
    const parsed = sessionLockSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch (err) {
    if (err instanceof SyntaxError) { return null; }
    throw err;
  }
}

async function inspectLockFile(filePath: string): Promise<LockFileState> {
  try {
    const owner = parseOwner(await fsp.readFile(filePath, "utf-8"));
    if (owner) { return { kind: "owned", owner }; }
    const stats = await fsp.stat(filePath);
    return { kind: "unreadable", fresh: Date.now() - stats.mtime.getTime() < UNREADABLE_GRACE_MS };
  } catch (err) {
    if (errnoCode(err) === "ENOENT") { return { kind: "missing" }; }
    throw err;
  }
}

function isStale(state: LockFileState): boolean {
  if (state.kind === "owned") { return !isProcessAlive(state.owner.pid); }
  return state.kind === "unreadable" && !state.fresh;
}

/** Creates `filePath` with the owner record, or returns false when it already exists. */
async function createExclusive(filePath: string): Promise<boolean> {
  const data: SessionLockData = { pid: process.pid, timestamp: new Date().toISOString() };
  try {
    await fsp.writeFile(filePath, JSON.stringify(data), { encoding: "utf-8", flag: "wx" });
    return true;
  } catch (err) {
    if (errnoCode(err) === "EEXIST") { return false; }
    throw err;
  }
}

const MAX_ATTEMPTS = 4;

/**
 * Exclusive claim on a cache root. Acquisition never waits: a lock held by
 * a live process fails right away with `LockError` (reason "locked").
 *
 * A lock file left behind by a dead process is reclaimed. Reclaimers take
 * `session_lock.reclaim` first and judge the lock file again while they
 * hold it, so a lock another session wrote in between is never removed.
 */
export class SessionLock {
  readonly lockPath: string;
  readonly guardPath: string;
  private held = false;

  constructor(dotRegolithPath: string, private readonly logger?: Logger) {
    this.lockPath = path.join(dotRegolithPath, SESSION_LOCK_FILE);
    this.guardPath = `${this.lockPath}.reclaim`;
  }

  get isHeld() {
    return this.held;
  }

  async acquire(): Promise<void> {
    if (this.held) {
      throw new LockError("acquire", "The session lock is already held by this session.");
    }
    try {
      await fsp.mkdir(path.dirname(this.lockPath), { recursive: true });
    } catch (err) {
      throw new LockError("acquire", `Could not create the cache directory for the session lock: ${path.dirname(this.lockPath)}`, { cause: err });
    }

    try {
      await this.claim();
    } catch (err) {
      if (err instanceof LockError) { throw err; }
      throw new LockError("acquire", `Could not create the session lock file: ${this.lockPath}`, { cause: err });
    }
    this.held = true;
    this.logger?.debug("Session lock acquired", { path: this.lockPath });
  }

  private async claim() {
    for (let attempt = 0; attempt < MAX_ATTEMPTS; attempt++) {
      if (await createExclusive(this.lockPath)) { return; }

      const state = await inspectLockFile(this.lockPath);
      if (state.kind === "missing") { continue; }
      if (!isStale(state)) { throw this.lockedError(state); }
      await this.reclaim();
    }
    throw new LockError("locked", `The session lock keeps being taken by another process: ${this.lockPath}`);
  }

  private lockedError(state: LockFileState) {
    if (state.kind === "owned") {
      return new LockError(
        "locked",
        `Another Regolith process (pid ${state.owner.pid}, since ${state.owner.timestamp}) is using this project.\n` +
          `Lock file: ${this.lockPath}`
      );
    }
    return new LockError("locked", `Another Regolith process is acquiring this project's session lock: ${this.lockPath}`);
  }

  /** Removes the lock file if it is still stale once the reclaim guard is held. */
  private async reclaim() {
    if (!(await createExclusive(this.guardPath))) {
      await this.clearStaleGuard();
      return;
    }
    try {
      const state = await inspectLockFile(this.lockPath);
      if (isStale(state)) {
        this.logger?.warn("Removing stale session lock", {
          path: this.lockPath,
          pid: state.kind === "owned" ? state.owner.pid : undefined,
        });
        await fsp.rm(this.lockPath, { force: true });
      }
    } finally {
      await fsp.rm(this.guardPath, { force: true });
    }
  }

  /**
   * A guard whose owner died mid-reclaim is moved aside under a unique name,
   * so only one session can take it. A guard that turns out to be live was
   * created after the check and is linked back in place.
   */
  private async clearStaleGuard() {
    const state = await inspectLockFile(this.guardPath);
    if (state.kind === "missing") { return; }
    if (!isStale(state)) {
      throw new LockError("locked", `Another Regolith process is taking over this project's session lock: ${this.lockPath}`);
    }

    const moved = `${this.guardPath}.${process.pid}.${randomUUID()}`;
    try {
      await fsp.rename(this.guardPath, moved);
    } catch (err) {
      if (errnoCode(err) === "ENOENT") { return; }
      throw err;
    }
    const taken = await inspectLockFile(moved);
    if (isStale(taken)) {
      this.logger?.warn("Removed stale session lock guard", { path: this.guardPath });
      await fsp.rm(moved, { force: true });
      return;
    }
    try {
      await fsp.link(moved, this.guardPath);
    } catch (err) {
      if (errnoCode(err) !== "EEXIST") { throw err; }
    } finally {
      await fsp.rm(moved, { force: true });
    }
    throw new LockError("locked", `Another Regolith process is taking over this project's session lock: ${this.lockPath}`);
  }

  async release(): Promise<void> {
    if (!this.held) { return; }
    this.held = false;
    try {
      await fsp.unlink(this.lockPath);
      this.logger?.debug("Session lock released", { path: this.lockPath });
    } catch (err) {
      throw new LockError("release", `Could not release the session lock: ${this.lockPath}`, { cause: err });
    }
  }
}

/**
 * Runs `fn` while holding the session lock of `dotRegolithPath` and releases
 * the lock on every exit path. A release failure is reported only when `fn`
 * itself succeeded; otherwise the error of `fn` wins.
 */
export async function withSessionLock<T>(
  dotRegolithPath: string,
  fn: () => Promise<T>,
  logger?: Logger
): Promise<T> {
  const lock = new SessionLock(dotRegolithPath, logger);
  await lock.acquire();
  let result: T;
  try {
    result = await fn();
  } catch (err) {
    try {
      await lock.release();
    } catch (releaseErr) {
      logger?.debug("Session lock release failed after an earlier error", { error: errorMessage(releaseErr) });
    }
    throw err;
  }
  await lock.release();
  return result;
}
