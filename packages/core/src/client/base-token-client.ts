/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Dispatcher } from 'undici';
import type { IdentityProviderGateway } from '../auth/identity-provider-gateway.js';
import { KeycloakGateway } from '../auth/keycloak-gateway.js';
import type { TokenLifecycleEngine } from '../auth/token-lifecycle-engine.js';
import type {
  Clock,
  PasswordCredentials,
  TokenLifecycleState,
  TokenSet,
  UserInfo,
} from '../auth/types.js';
import type { ClientConfig } from '../config/client-config.js';

/**
 * Collaborators a client builds from its configuration unless given.
 */
export interface TokenClientDependencies {
  gateway?: IdentityProviderGateway;
  clock?: Clock;
  /** undici dispatcher for the default gateway, e.g. a MockAgent. */
  dispatcher?: Dispatcher;
}

export function createGateway(
  config: ClientConfig,
  deps: TokenClientDependencies,
  clock: Clock,
): IdentityProviderGateway {
  return (
    deps.gateway ??
    new KeycloakGateway({
      serverUrl: config.serverUrl,
      realmName: config.realmName,
      clientId: config.clientId,
      clientSecret: config.clientSecret,
      verify: config.verify,
      requestTimeoutMs: config.requestTimeoutMs,
      dispatcher: deps.dispatcher,
      clock,
    })
  );
}

/**
 * Public token operations; every decision is delegated to the engine.
 */
export abstract class BaseTokenClient {
  protected abstract readonly engine: TokenLifecycleEngine;

  get state(): TokenLifecycleState {
    return this.engine.state;
  }

  initializeTokens(credentials?: PasswordCredentials): Promise<TokenSet> {
    return this.engine.initialize(credentials);
  }

  getAccessToken(): Promise<string> {
    return this.engine.getAccessToken();
  }

  getRefreshToken(): Promise<string> {
    return this.engine.getRefreshToken();
  }

  refreshTokens(): Promise<TokenSet> {
    return this.engine.refreshTokens();
  }

  getUserInfo(): Promise<UserInfo> {
    return this.engine.getUserInfo();
  }

  tokenExchange(audience: string): Promise<TokenSet> {
    return this.engine.tokenExchange(audience);
  }

  getTokenSet(): Promise<TokenSet> {
    return this.engine.getTokenSet();
  }

  getIssuedAt(): Promise<Date> {
    return this.engine.getIssuedAt();
  }

  getAccessTokenExpiry(): Promise<Date | null> {
    return this.engine.getAccessTokenExpiry();
  }

  getRefreshTokenExpiry(): Promise<Date | null> {
    return this.engine.getRefreshTokenExpiry();
  }
}
