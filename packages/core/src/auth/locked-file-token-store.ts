/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * TokenSet persisted to a file shared by cooperating processes.
 *
 * Reads take no lock: the file is only ever replaced by an atomic rename, so
 * a reader sees either the previous or the next record. Every
 * read-that-may-write goes through `update`, which holds the advisory lock
 * for the whole acquire → re-read → write → release cycle.
 */

import { promises as fs } from 'node:fs';
import { basename, dirname, extname, join } from 'node:path';
import { FileLock, type FileLockOptions } from '../storage/file-lock.js';
import { DebugLogger } from '../debug/index.js';
import { getErrorMessage, hasErrorCode } from '../utils/errors.js';
import { LockLostError, StoreCorruptError } from './errors.js';
import { createTokenSet } from './token-set.js';
import type { TokenStorage, TokenUpdate } from './token-storage.js';
import {
  TokenFileRecordSchema,
  type TokenFileRecord,
  type TokenSet,
} from './types.js';

export interface LockedFileTokenStoreOptions {
  filePath: string;
  serverUrl: string;
  realmName: string;
  lock?: FileLockOptions;
}

/**
 * `<dir>/<stem>.lock` beside the token file.
 */
export function lockPathFor(filePath: string): string {
  const ext = extname(filePath);
  const stem = ext ? basename(filePath, ext) : basename(filePath);
  return join(dirname(filePath), `${stem}.lock`);
}

export class LockedFileTokenStore implements TokenStorage {
  readonly filePath: string;
  readonly lock: FileLock;
  private readonly serverUrl: string;
  private readonly realmName: string;
  private readonly logger: DebugLogger;

  constructor(options: LockedFileTokenStoreOptions) {
    this.filePath = options.filePath;
    this.serverUrl = options.serverUrl;
    this.realmName = options.realmName;
    this.lock = new FileLock(lockPathFor(options.filePath), options.lock);
    this.logger = DebugLogger.getLogger('tokenward:locked-file-store');
  }

  get label(): string {
    return `file:${this.filePath}`;
  }

  async load(): Promise<TokenSet | null> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return null;
      }
      throw error;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      throw new StoreCorruptError(this.filePath, getErrorMessage(error), {
        cause: error,
      });
    }

    const result = TokenFileRecordSchema.safeParse(parsed);
    if (!result.success) {
      const detail = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new StoreCorruptError(this.filePath, detail, {
        cause: result.error,
      });
    }
    return this.fromRecord(result.data);
  }

  async update<T>(
    mutate: (current: TokenSet | null) => Promise<TokenUpdate<T>>,
  ): Promise<T> {
    return this.lock.withLock(async (handle) => {
      // Another process may have written while we waited for the lock.
      const current = await this.load();
      const { result, next } = await mutate(current);
      if (next) {
        if (!(await handle.isHeld())) {
          this.logger.warn(
            () => `[update] lost ${handle.lockPath}, discarding new tokens`,
          );
          throw new LockLostError(handle.lockPath);
        }
        await this.write(next);
      }
      return result;
    });
  }

  private async write(tokens: TokenSet): Promise<void> {
    await fs.mkdir(dirname(this.filePath), { recursive: true, mode: 0o700 });

    const tempPath = `${this.filePath}.tmp-${process.pid}-${Date.now()}-${Math.random().toString(36).substring(2, 8)}`;
    try {
      await fs.writeFile(
        tempPath,
        JSON.stringify(this.toRecord(tokens), null, 2),
        { mode: 0o600 },
      );
      if (process.platform !== 'win32') {
        await fs.chmod(tempPath, 0o600);
      }
      await fs.rename(tempPath, this.filePath);
    } catch (error) {
      await fs.unlink(tempPath).catch((cleanupError: unknown) => {
        if (!hasErrorCode(cleanupError, 'ENOENT')) {
          this.logger.warn(
            () =>
              `[write] could not remove ${tempPath}: ${getErrorMessage(cleanupError)}`,
          );
        }
      });
      throw error;
    }
    this.logger.debug(() => `[write] ${this.filePath} issued_at=${tokens.issuedAt}`);
  }

  private toRecord(tokens: TokenSet): TokenFileRecord {
    return {
      version: 1,
      server_url: this.serverUrl,
      realm_name: this.realmName,
      issued_at: tokens.issuedAt,
      access_token: tokens.accessToken,
      access_expires_at: tokens.accessExpiresAt,
      refresh_token: tokens.refreshToken,
      refresh_expires_at: tokens.refreshExpiresAt,
    };
  }

  private fromRecord(record: TokenFileRecord): TokenSet {
    if (record.realm_name !== this.realmName) {
      this.logger.warn(
        () =>
          `[load] ${this.filePath} was written for realm ${record.realm_name}, expected ${this.realmName}`,
      );
    }
    return createTokenSet({
      accessToken: record.access_token,
      accessExpiresAt: record.access_expires_at,
      refreshToken: record.refresh_token,
      refreshExpiresAt: record.refresh_expires_at,
      issuedAt: record.issued_at,
    });
  }
}
