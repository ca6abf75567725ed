/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { TokenLifecycleEngine } from '../auth/token-lifecycle-engine.js';
import { systemClock } from '../auth/token-set.js';
import { TokenStore } from '../auth/token-store.js';
import {
  parseClientConfig,
  type ClientConfig,
  type ClientConfigInput,
} from '../config/client-config.js';
import {
  BaseTokenClient,
  createGateway,
  type TokenClientDependencies,
} from './base-token-client.js';

export interface ClientDependencies extends TokenClientDependencies {
  store?: TokenStore;
}

/**
 * Token client for a single owner, backed by an in-memory store. It never
 * waits on a lock; its operations only suspend on gateway calls.
 */
export class Client extends BaseTokenClient {
  readonly config: Readonly<ClientConfig>;
  readonly store: TokenStore;
  protected readonly engine: TokenLifecycleEngine;

  constructor(config: ClientConfigInput, deps: ClientDependencies = {}) {
    super();
    this.config = Object.freeze(parseClientConfig(config));
    const clock = deps.clock ?? systemClock;
    this.store = deps.store ?? new TokenStore();
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
}
