/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

export { Client, type ClientDependencies } from './client/client.js';
export { SharedTokenClient } from './client/shared-token-client.js';
export {
  BaseTokenClient,
  type TokenClientDependencies,
} from './client/base-token-client.js';

export {
  TokenLifecycleEngine,
  type SeedTokens,
  type TokenLifecycleEngineOptions,
} from './auth/token-lifecycle-engine.js';
export { TokenStore } from './auth/token-store.js';
export type { TokenStorage, TokenUpdate } from './auth/token-storage.js';
export {
  LockedFileTokenStore,
  lockPathFor,
  type LockedFileTokenStoreOptions,
} from './auth/locked-file-token-store.js';
export type { IdentityProviderGateway } from './auth/identity-provider-gateway.js';
export {
  KeycloakGateway,
  createTlsDispatcher,
  realmEndpoint,
  type KeycloakGatewayOptions,
} from './auth/keycloak-gateway.js';
export {
  DEFAULT_EXPIRY_SKEW_MS,
  createTokenSet,
  isAccessTokenUsable,
  isRefreshTokenUsable,
  isUsable,
  mergeRefreshedTokenSet,
  systemClock,
  tokenSetFromResponse,
} from './auth/token-set.js';
export * from './auth/errors.js';
export * from './auth/types.js';

export {
  FileLock,
  LockHandle,
  type FileLockOptions,
} from './storage/file-lock.js';

export * from './config/client-config.js';
export { DebugLogger, ConfigurationManager } from './debug/index.js';
export type { LogEntry, LogLevel, LogOutput } from './debug/index.js';
