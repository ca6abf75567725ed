/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Token lifecycle state machine shared by both client facades.
 *
 * Decisions are always taken from what the storage holds, never from the
 * engine's own memory, so that a set written by another process is picked
 * up on the next call. `state` only reports the last observed transition.
 *
 *   uninitialized ──initialize──▶ valid ──stale access──▶ refresh_pending
 *        refresh_pending ──ok──▶ valid | ──gateway error──▶ failed
 *        valid ──refresh token unusable──▶ expired (re-initialize)
 */

import { DebugLogger } from '../debug/index.js';
import { getErrorMessage } from '../utils/errors.js';
import {
  LockTimeoutError,
  RefreshTokenExpiredError,
  TokenNotInitializedError,
} from './errors.js';
import type { IdentityProviderGateway } from './identity-provider-gateway.js';
import {
  DEFAULT_EXPIRY_SKEW_MS,
  createTokenSet,
  isAccessTokenUsable,
  isUsable,
  mergeRefreshedTokenSet,
  systemClock,
} from './token-set.js';
import type { TokenStorage, TokenUpdate } from './token-storage.js';
import type {
  Clock,
  PasswordCredentials,
  TokenLifecycleState,
  TokenSet,
  UserInfo,
} from './types.js';

/** Tokens supplied up front, typically by configuration. */
export interface SeedTokens {
  accessToken?: string;
  refreshToken?: string;
}

export interface TokenLifecycleEngineOptions {
  gateway: IdentityProviderGateway;
  storage: TokenStorage;
  clock?: Clock;
  expirySkewMs?: number;
  seed?: SeedTokens;
}

export class TokenLifecycleEngine {
  private readonly gateway: IdentityProviderGateway;
  private readonly storage: TokenStorage;
  private readonly clock: Clock;
  private readonly skewMs: number;
  private readonly seed: SeedTokens;
  private readonly logger: DebugLogger;
  private _state: TokenLifecycleState = 'uninitialized';

  constructor(options: TokenLifecycleEngineOptions) {
    this.gateway = options.gateway;
    this.storage = options.storage;
    this.clock = options.clock ?? systemClock;
    this.skewMs = options.expirySkewMs ?? DEFAULT_EXPIRY_SKEW_MS;
    this.seed = options.seed ?? {};
    this.logger = DebugLogger.getLogger('tokenward:engine');
  }

  get state(): TokenLifecycleState {
    return this._state;
  }

  /**
   * Makes sure a usable token set is stored. In order of preference:
   * a stored set that is still usable or refreshable, the password grant
   * when `credentials` are given, the seed tokens, and finally the
   * client-credentials grant.
   */
  async initialize(credentials?: PasswordCredentials): Promise<TokenSet> {
    return this.transition(() =>
      this.storage.update((current) =>
        this.initializeFrom(current, credentials),
      ),
    );
  }

  /**
   * Returns a usable access token, refreshing first when it is stale.
   */
  async getAccessToken(): Promise<string> {
    const tokens = await this.ensureFresh();
    return tokens.accessToken;
  }

  /**
   * Returns the refresh token of a usable set.
   */
  async getRefreshToken(): Promise<string> {
    const tokens = await this.ensureFresh();
    if (tokens.refreshToken === null) {
      throw new RefreshTokenExpiredError('missing');
    }
    if (!isUsable(tokens.refreshExpiresAt, this.clock(), this.skewMs)) {
      throw new RefreshTokenExpiredError('expired');
    }
    return tokens.refreshToken;
  }

  /**
   * Refreshes unconditionally, unless another writer replaced the stored
   * set between our read and the moment we got exclusive access.
   */
  async refreshTokens(): Promise<TokenSet> {
    const snapshot = await this.storage.load();
    return this.transition(() =>
      this.storage.update(async (current) => {
        if (current === null) {
          throw new TokenNotInitializedError();
        }
        if (snapshot !== null && replacedSince(snapshot, current)) {
          this.logger.debug(
            () => `[refreshTokens] ${this.storage.label} already refreshed`,
          );
          return { result: current };
        }
        const refreshed = await this.refreshFrom(current);
        return { result: refreshed, next: refreshed };
      }),
    );
  }

  /**
   * Exchanges the current access token for a set scoped to `audience`.
   * The primary set and the state are left as they are.
   */
  async tokenExchange(audience: string): Promise<TokenSet> {
    const accessToken = await this.getAccessToken();
    this.logger.debug(() => `[tokenExchange] audience=${audience}`);
    return this.gateway.exchange(accessToken, audience);
  }

  async getUserInfo(): Promise<UserInfo> {
    const accessToken = await this.getAccessToken();
    return this.gateway.userInfo(accessToken);
  }

  /**
   * Current stored set, without refreshing.
   */
  async getTokenSet(): Promise<TokenSet> {
    const tokens = await this.storage.load();
    if (tokens === null) {
      throw new TokenNotInitializedError();
    }
    return tokens;
  }

  async getIssuedAt(): Promise<Date> {
    const tokens = await this.getTokenSet();
    return new Date(tokens.issuedAt);
  }

  async getAccessTokenExpiry(): Promise<Date | null> {
    const tokens = await this.getTokenSet();
    return tokens.accessExpiresAt === null
      ? null
      : new Date(tokens.accessExpiresAt);
  }

  async getRefreshTokenExpiry(): Promise<Date | null> {
    const tokens = await this.getTokenSet();
    return tokens.refreshExpiresAt === null
      ? null
      : new Date(tokens.refreshExpiresAt);
  }

  private async ensureFresh(): Promise<TokenSet> {
    // Fast path: no lock for a set that is still usable.
    const snapshot = await this.storage.load();
    if (snapshot === null) {
      this._state = 'uninitialized';
      throw new TokenNotInitializedError();
    }
    if (this.usableAccess(snapshot)) {
      this._state = 'valid';
      return snapshot;
    }

    return this.transition(() =>
      this.storage.update(async (current) => {
        if (current === null) {
          throw new TokenNotInitializedError();
        }
        if (this.usableAccess(current)) {
          this.logger.debug(
            () => `[ensureFresh] ${this.storage.label} refreshed by another writer`,
          );
          return { result: current };
        }
        const refreshed = await this.refreshFrom(current);
        return { result: refreshed, next: refreshed };
      }),
    );
  }

  private async initializeFrom(
    current: TokenSet | null,
    credentials: PasswordCredentials | undefined,
  ): Promise<TokenUpdate<TokenSet>> {
    if (current !== null) {
      if (this.usableAccess(current)) {
        return { result: current };
      }
      try {
        const refreshed = await this.refreshFrom(current);
        return { result: refreshed, next: refreshed };
      } catch (error) {
        if (!credentials) {
          throw error;
        }
        this.logger.warn(
          () =>
            `[initialize] stored tokens unusable (${getErrorMessage(error)}), authenticating with credentials`,
        );
      }
    }

    if (credentials) {
      const tokens = await this.gateway.authenticate(credentials);
      return { result: tokens, next: tokens };
    }

    const { accessToken, refreshToken } = this.seed;
    if (accessToken && refreshToken) {
      // Seed lifetimes are unknown; refreshing once learns them.
      const seeded = createTokenSet({
        accessToken,
        accessExpiresAt: null,
        refreshToken,
        refreshExpiresAt: null,
        issuedAt: this.clock(),
      });
      const refreshed = await this.refreshFrom(seeded);
      return { result: refreshed, next: refreshed };
    }
    if (accessToken) {
      const seeded = createTokenSet({
        accessToken,
        accessExpiresAt: null,
        refreshToken: null,
        refreshExpiresAt: null,
        issuedAt: this.clock(),
      });
      this.logger.warn(
        () => '[initialize] seeded access token has no known lifetime',
      );
      return { result: seeded, next: seeded };
    }

    const tokens = await this.gateway.authenticate();
    return { result: tokens, next: tokens };
  }

  private async refreshFrom(current: TokenSet): Promise<TokenSet> {
    if (current.refreshToken === null) {
      throw new RefreshTokenExpiredError('missing');
    }
    if (!isUsable(current.refreshExpiresAt, this.clock(), this.skewMs)) {
      throw new RefreshTokenExpiredError('expired');
    }
    if (current.refreshExpiresAt === null) {
      this.logger.warn(
        () => '[refresh] refresh token lifetime unknown, trying it anyway',
      );
    }

    this._state = 'refresh_pending';
    this.logger.debug(() => `[refresh] ${this.storage.label}`);
    const next = await this.gateway.refresh(current.refreshToken);
    return mergeRefreshedTokenSet(current, next);
  }

  private usableAccess(tokens: TokenSet): boolean {
    if (!isAccessTokenUsable(tokens, this.clock(), this.skewMs)) {
      return false;
    }
    if (tokens.accessExpiresAt === null) {
      this.logger.warn(
        () => 'Access token lifetime unknown, assuming it has not expired',
      );
    }
    return true;
  }

  private async transition(
    operation: () => Promise<TokenSet>,
  ): Promise<TokenSet> {
    try {
      const tokens = await operation();
      this._state = 'valid';
      return tokens;
    } catch (error) {
      if (error instanceof RefreshTokenExpiredError) {
        this._state = 'expired';
      } else if (error instanceof TokenNotInitializedError) {
        this._state = 'uninitialized';
      } else if (!(error instanceof LockTimeoutError)) {
        // A lock timeout aborts before anything changed.
        this._state = 'failed';
      }
      throw error;
    }
  }
}

function replacedSince(snapshot: TokenSet, current: TokenSet): boolean {
  return (
    current.accessToken !== snapshot.accessToken ||
    current.issuedAt !== snapshot.issuedAt
  );
}
