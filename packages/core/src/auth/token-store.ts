/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { TokenStorage, TokenUpdate } from './token-storage.js';
import type { TokenSet } from './types.js';

/**
 * In-memory holder of the current TokenSet for a single owner.
 *
 * `get`, `set` and `clear` are synchronous and unsynchronized. `update`
 * calls are queued and run one at a time, so concurrent callers on the
 * event loop see each other's writes instead of refreshing twice. A host
 * that shares one instance between worker threads must still guard it
 * with its own mutex.
 */
export class TokenStore implements TokenStorage {
  readonly label = 'memory';
  private current: TokenSet | null;
  private queue: Promise<void> = Promise.resolve();

  constructor(initial: TokenSet | null = null) {
    this.current = initial;
  }

  get(): TokenSet | null {
    return this.current;
  }

  set(tokens: TokenSet): void {
    this.current = tokens;
  }

  clear(): void {
    this.current = null;
  }

  async load(): Promise<TokenSet | null> {
    return this.current;
  }

  async update<T>(
    mutate: (current: TokenSet | null) => Promise<TokenUpdate<T>>,
  ): Promise<T> {
    const run = this.queue.then(async () => {
      const { result, next } = await mutate(this.current);
      if (next) {
        this.current = next;
      }
      return result;
    });
    // The caller receives `run` and its failure; the queue only needs to
    // know it settled.
    this.queue = run.then(settled, settled);
    return run;
  }
}

function settled(): void {}
