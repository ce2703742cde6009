import { AsyncLocalStorage } from "node:async_hooks";
import { closeSync, openSync, readFileSync, rmSync, writeSync } from "node:fs";
import { dirname, join } from "node:path";
import { setTimeout as sleep } from "node:timers/promises";
import { ensureDir } from "./config.js";
import { LockTimeoutError } from "./errors.js";
import { getLog } from "./logger.js";
import type { RepoIdentity } from "./types.js";

const log = getLog(import.meta);

const DEFAULT_POLL_MS = 200;

/**
 * Lock file name for a repository identity. Each segment is URI-encoded, which never produces
 * "+", so distinct (host, org, name) triples always map to distinct names even when the segments
 * themselves contain the separator characters GitHub allows ("-", "_", ".").
 */
export function lockFileName(identity: RepoIdentity): string {
  const segments = [identity.host, identity.org, identity.name].map((s) => encodeURIComponent(s));
  return `_LOCK_${segments.join("+")}`;
}

export function lockPath(parentDir: string, identity: RepoIdentity): string {
  return join(parentDir, lockFileName(identity));
}

export interface RepoLockOptions {
  pollIntervalMs?: number;
  /** Unbounded when not set. */
  timeoutMs?: number;
}

/** Locks held by the current async call chain. */
const heldLocks = new AsyncLocalStorage<ReadonlySet<RepoLock>>();

/**
 * Exclusive advisory lock on one repository, backed by a file created with O_EXCL. Waiting
 * blocks until the holder releases it. A holder that crashed leaves the file behind; nothing
 * here breaks such a lock.
 *
 * `run` is re-entrant within one async call chain only: code already inside `run` may call
 * `run` again, while a concurrent chain using the same object waits like any other holder.
 * `acquire` and `release` are not re-entrant.
 */
export class RepoLock {
  private held = false;
  private readonly pollIntervalMs: number;
  private readonly timeoutMs: number | undefined;

  constructor(
    readonly path: string,
    options: RepoLockOptions = {},
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_MS;
    this.timeoutMs = options.timeoutMs;
  }

  get isHeld(): boolean {
    return this.held;
  }

  async acquire(): Promise<void> {
    const started = Date.now();
    let announced = false;
    while (!this.tryCreate()) {
      if (this.timeoutMs !== undefined && Date.now() - started >= this.timeoutMs) {
        throw new LockTimeoutError(this.path, this.ownerPid());
      }
      if (!announced) {
        log.info("Waiting for lock %s (held by PID %s)", this.path, this.ownerPid() ?? "unknown");
        announced = true;
      }
      await sleep(this.pollIntervalMs);
    }
    this.held = true;
    log.debug("Locked %s", this.path);
  }

  release(): void {
    if (!this.held) {
      return;
    }
    this.held = false;
    rmSync(this.path, { force: true });
    log.debug("Unlocked %s", this.path);
  }

  async run<T>(fn: () => Promise<T> | T): Promise<T> {
    const outer = heldLocks.getStore();
    if (outer?.has(this)) {
      return fn();
    }

    await this.acquire();
    try {
      const held = new Set(outer);
      held.add(this);
      return await heldLocks.run(held, fn);
    } finally {
      this.release();
    }
  }

  ownerPid(): number | undefined {
    try {
      const pid = Number.parseInt(readFileSync(this.path, "utf-8").trim(), 10);
      return Number.isInteger(pid) ? pid : undefined;
    } catch {
      return undefined;
    }
  }

  private tryCreate(): boolean {
    ensureDir(dirname(this.path));
    let fd: number;
    try {
      fd = openSync(this.path, "wx");
    } catch (err) {
      if (isErrnoException(err) && err.code === "EEXIST") {
        return false;
      }
      throw err;
    }
    try {
      writeSync(fd, `${process.pid}\n`);
    } finally {
      closeSync(fd);
    }
    return true;
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}
