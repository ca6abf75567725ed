/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';
import { LockedFileTokenStore } from '../auth/locked-file-token-store.js';
import { TokenLifecycleEngine } from '../auth/token-lifecycle-engine.js';
import { systemClock } from '../auth/token-set.js';
import {
  defaultTokenFilename,
  parseSharedClientConfig,
  type SharedClientConfig,
  type SharedClientConfigInput,
} from '../config/client-config.js';
import {
  BaseTokenClient,
  createGateway,
  type TokenClientDependencies,
} from './base-token-client.js';

/**
 * Token client whose token set lives in a file shared with other
 * processes. Operations suspend while waiting for the file lock and on the
 * gateway call issued while holding it; at most one cooperating process
 * refreshes a given token.
 */
export class SharedTokenClient extends BaseTokenClient {
  readonly config: Readonly<SharedClientConfig>;
  readonly store: LockedFileTokenStore;
  protected readonly engine: TokenLifecycleEngine;

  constructor(
    config: SharedClientConfigInput,
    deps: TokenClientDependencies = {},
  ) {
    super();
    this.config = Object.freeze(parseSharedClientConfig(config));
    const clock = deps.clock ?? systemClock;
    this.store = new LockedFileTokenStore({
      filePath: this.config.tokenFilename
        ? resolve(this.config.tokenFilename)
        : defaultTokenFilename(this.config.realmName),
      serverUrl: this.config.serverUrl,
      realmName: this.config.realmName,
      lock: {
        timeoutMs: this.config.lockTimeoutMs,
        retryCount: this.config.lockRetryCount,
        retryDelayMs: this.config.lockRetryDelayMs,
        staleMs: this.config.staleLockMs,
      },
    });
    this.engine = new TokenLifecycleEngine({
      gateway: createGateway(this.config, deps, clock),
      storage: this.store,
      clock,
      expirySkewMs: this.config.expirySkewMs,
      seed: {
        accessToken: this.config.accessToken,
        refreshToken: this.config.refreshToken,
      },
    });
  }

  get tokenFilename(): string {
    return this.store.filePath;
  }
}
