/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { TokenSet } from './types.js';

/**
 * Outcome of a read-modify-write cycle. `next` is written back when present;
 * otherwise the stored set is left untouched.
 */
export interface TokenUpdate<T> {
  result: T;
  next?: TokenSet;
}

/**
 * Storage capability the lifecycle engine is parameterized over.
 */
export interface TokenStorage {
  /** Short human-readable label used in debug output. */
  readonly label: string;

  /**
   * Returns the most recently written set without any synchronization.
   */
  load(): Promise<TokenSet | null>;

  /**
   * Runs `mutate` with exclusive access to the stored set. Implementations
   * shared between processes must re-read the set after acquiring access
   * and release it whatever the outcome.
   */
  update<T>(
    mutate: (current: TokenSet | null) => Promise<TokenUpdate<T>>,
  ): Promise<T>;
}
