/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Cooperative cross-process lock built on exclusive file creation.
 *
 * The lock file holds the owner's pid, a per-acquisition nonce and the
 * acquisition instant. Waiters poll; a lock older than the stale threshold
 * is treated as abandoned by a crashed owner and broken.
 */

import { promises as fs } from 'node:fs';
import { dirname } from 'node:path';
import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { DebugLogger } from '../debug/index.js';
import { LockTimeoutError } from '../auth/errors.js';
import { hasErrorCode } from '../utils/errors.js';

export const DEFAULT_LOCK_TIMEOUT_MS = 10_000;
export const DEFAULT_LOCK_RETRY_DELAY_MS = 100;
export const DEFAULT_STALE_LOCK_MS = 60_000;

const LockFileSchema = z.object({
  pid: z.number(),
  nonce: z.string(),
  acquired_at: z.number(),
});

type LockFileContent = z.infer<typeof LockFileSchema>;

export interface FileLockOptions {
  /** Give up after waiting this long. */
  timeoutMs?: number;
  /** Give up after this many retries; unbounded when omitted. */
  retryCount?: number;
  /** Pause between attempts. */
  retryDelayMs?: number;
  /** Locks older than this are broken; 0 disables breaking. */
  staleMs?: number;
}

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

const logger = DebugLogger.getLogger('tokenward:file-lock');

/**
 * Exclusive ownership of a lock file for one critical section.
 */
export class LockHandle {
  private _released = false;

  constructor(
    readonly lockPath: string,
    private readonly nonce: string,
    readonly acquiredAt: number,
  ) {}

  get released(): boolean {
    return this._released;
  }

  /**
   * True while the lock file still carries this handle's nonce, i.e. no
   * waiter has broken it as stale.
   */
  async isHeld(): Promise<boolean> {
    if (this._released) {
      return false;
    }
    try {
      const owner = await readLockFile(this.lockPath);
      return owner?.nonce === this.nonce;
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return false;
      }
      throw error;
    }
  }

  /**
   * Removes the lock file if it is still ours. Idempotent.
   */
  async release(): Promise<void> {
    if (this._released) {
      return;
    }
    this._released = true;

    let owner: LockFileContent | null;
    try {
      owner = await readLockFile(this.lockPath);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        logger.warn(() => `[release] ${this.lockPath} already removed`);
        return;
      }
      throw error;
    }

    if (owner !== null && owner.nonce !== this.nonce) {
      const ownerPid = owner.pid;
      logger.warn(
        () =>
          `[release] ${this.lockPath} was broken and re-acquired by pid ${ownerPid}`,
      );
      return;
    }

    try {
      await fs.unlink(this.lockPath);
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        throw error;
      }
    }
  }
}

async function readLockFile(lockPath: string): Promise<LockFileContent | null> {
  const content = await fs.readFile(lockPath, 'utf8');
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch {
    return null;
  }
  const result = LockFileSchema.safeParse(parsed);
  return result.success ? result.data : null;
}

export class FileLock {
  private readonly timeoutMs: number;
  private readonly retryCount: number | undefined;
  private readonly retryDelayMs: number;
  private readonly staleMs: number;

  constructor(
    readonly lockPath: string,
    options: FileLockOptions = {},
  ) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_LOCK_TIMEOUT_MS;
    this.retryCount = options.retryCount;
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_LOCK_RETRY_DELAY_MS;
    this.staleMs = options.staleMs ?? DEFAULT_STALE_LOCK_MS;
  }

  /**
   * Waits for the lock, failing with LockTimeoutError once the timeout or
   * the retry budget runs out.
   */
  async acquire(): Promise<LockHandle> {
    const startTime = Date.now();
    let attempts = 0;

    await fs.mkdir(dirname(this.lockPath), { recursive: true, mode: 0o700 });

    for (;;) {
      attempts++;
      const handle = await this.tryCreate();
      if (handle) {
        logger.debug(
          () => `[acquire] ${this.lockPath} after ${attempts} attempt(s)`,
        );
        return handle;
      }

      if (await this.breakIfStale()) {
        continue;
      }

      const waited = Date.now() - startTime;
      const retriesUsed = attempts - 1;
      if (
        waited >= this.timeoutMs ||
        (this.retryCount !== undefined && retriesUsed >= this.retryCount)
      ) {
        logger.warn(() => `[acquire] timed out on ${this.lockPath}`);
        throw new LockTimeoutError(this.lockPath, waited, attempts);
      }

      await sleep(Math.min(this.retryDelayMs, this.timeoutMs - waited));
    }
  }

  /**
   * Runs `fn` while holding the lock and releases it whatever the outcome.
   */
  async withLock<T>(fn: (handle: LockHandle) => Promise<T>): Promise<T> {
    const handle = await this.acquire();
    let result: T;
    try {
      result = await fn(handle);
    } catch (error) {
      await handle.release().catch((releaseError: unknown) => {
        logger.error(
          () => `[withLock] release of ${this.lockPath} failed`,
          releaseError,
        );
      });
      throw error;
    }
    await handle.release();
    return result;
  }

  private async tryCreate(): Promise<LockHandle | null> {
    const nonce = randomUUID();
    const acquiredAt = Date.now();
    const content: LockFileContent = {
      pid: process.pid,
      nonce,
      acquired_at: acquiredAt,
    };
    try {
      await fs.writeFile(this.lockPath, JSON.stringify(content), {
        flag: 'wx',
        mode: 0o600,
      });
      return new LockHandle(this.lockPath, nonce, acquiredAt);
    } catch (error) {
      if (hasErrorCode(error, 'EEXIST')) {
        return null;
      }
      throw error;
    }
  }

  private async currentOwner(): Promise<LockFileContent | null> {
    try {
      return await readLockFile(this.lockPath);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return null;
      }
      throw error;
    }
  }

  /**
   * Returns true when the existing lock was removed (or vanished) so the
   * caller can retry at once.
   */
  private async breakIfStale(): Promise<boolean> {
    if (this.staleMs <= 0) {
      return false;
    }

    let owner: LockFileContent | null;
    let modifiedAt: number;
    try {
      const stats = await fs.stat(this.lockPath);
      modifiedAt = stats.mtimeMs;
      owner = await readLockFile(this.lockPath);
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return true;
      }
      throw error;
    }

    // An unreadable lock may be mid-write by its creator, so its age is
    // taken from the file itself rather than breaking it outright.
    const lockedAt = owner?.acquired_at ?? modifiedAt;
    const age = Date.now() - lockedAt;
    if (age <= this.staleMs) {
      return false;
    }

    if (owner !== null) {
      const current = await this.currentOwner();
      if (current?.nonce !== owner.nonce) {
        return true;
      }
    }

    const ownerPid = owner?.pid ?? 'unknown';
    logger.warn(
      () =>
        `[breakIfStale] breaking ${this.lockPath} held for ${age}ms by pid ${ownerPid}`,
    );
    try {
      await fs.unlink(this.lockPath);
    } catch (error) {
      if (!hasErrorCode(error, 'ENOENT')) {
        throw error;
      }
    }
    return true;
  }
}
