/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, it, expect, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import { TokenLifecycleEngine } from './token-lifecycle-engine.js';
import { TokenStore } from './token-store.js';
import { createTokenSet } from './token-set.js';
import type { TokenStorage } from './token-storage.js';
import type { TokenSet } from './types.js';
import {
  GatewayError,
  RefreshTokenExpiredError,
  TokenNotInitializedError,
} from './errors.js';
import {
  createFakeGateway,
  type FakeGateway,
} from '../test-utils/fake-gateway.js';

const SKEW = 30_000;

describe('TokenLifecycleEngine', () => {
  let now: number;
  const clock = () => now;
  let gateway: FakeGateway;

  const tokens = (overrides: Partial<TokenSet> = {}): TokenSet =>
    createTokenSet({
      accessToken: 'seed-access',
      accessExpiresAt: now + 300_000,
      refreshToken: 'seed-refresh',
      refreshExpiresAt: now + 3_600_000,
      issuedAt: now - 1000,
      ...overrides,
    });

  const engineFor = (
    store: TokenStorage,
    seed?: { accessToken?: string; refreshToken?: string },
  ) =>
    new TokenLifecycleEngine({
      gateway,
      storage: store,
      clock,
      expirySkewMs: SKEW,
      seed,
    });

  beforeEach(() => {
    now = 1_700_000_000_000;
    gateway = createFakeGateway({ clock });
  });

  describe('getAccessToken', () => {
    it('returns a usable access token without calling the gateway', async () => {
      const store = new TokenStore(tokens());
      const engine = engineFor(store);

      await expect(engine.getAccessToken()).resolves.toBe('seed-access');
      expect(gateway.refresh).not.toHaveBeenCalled();
      expect(engine.state).toBe('valid');
    });

    it('never calls the gateway while the access token is beyond the skew margin', async () => {
      await fc.assert(
        fc.asyncProperty(
          fc.integer({ min: SKEW + 1, max: 86_400_000 }),
          async (remaining) => {
            const store = new TokenStore(
              tokens({ accessExpiresAt: now + remaining }),
            );
            await engineFor(store).getAccessToken();
            expect(gateway.refresh).not.toHaveBeenCalled();
          },
        ),
      );
    });

    it('refreshes an expired access token exactly once', async () => {
      const store = new TokenStore(
        tokens({
          accessExpiresAt: now - 1000,
          refreshExpiresAt: now + 3_600_000,
        }),
      );
      const engine = engineFor(store);

      await expect(engine.getAccessToken()).resolves.toBe(
        'refreshed-access-1',
      );
      expect(gateway.refresh).toHaveBeenCalledTimes(1);
      expect(gateway.refresh).toHaveBeenCalledWith('seed-refresh');
      expect(store.get()?.refreshExpiresAt).toBe(now + 1_800_000);
      expect(engine.state).toBe('valid');
    });

    it('refreshes an access token that expires inside the skew margin', async () => {
      const store = new TokenStore(tokens({ accessExpiresAt: now + SKEW }));

      await expect(engineFor(store).getAccessToken()).resolves.toBe(
        'refreshed-access-1',
      );
    });

    it('fails with RefreshTokenExpiredError and leaves the store unchanged', async () => {
      const stored = tokens({
        accessExpiresAt: now - 1000,
        refreshExpiresAt: now - 1000,
      });
      const store = new TokenStore(stored);
      const engine = engineFor(store);

      const error = await engine.getAccessToken().catch((e: unknown) => e);

      expect(error).toBeInstanceOf(RefreshTokenExpiredError);
      expect(error).toMatchObject({ reason: 'expired' });
      expect(store.get()).toBe(stored);
      expect(gateway.refresh).not.toHaveBeenCalled();
      expect(engine.state).toBe('expired');
    });

    it('reports a missing refresh token as RefreshTokenExpiredError', async () => {
      const store = new TokenStore(
        tokens({ accessExpiresAt: now - 1000, refreshToken: null }),
      );

      await expect(engineFor(store).getAccessToken()).rejects.toMatchObject({
        code: 'REFRESH_TOKEN_EXPIRED',
        reason: 'missing',
      });
    });

    it('surfaces gateway failures unchanged and enters the failed state', async () => {
      const stored = tokens({ accessExpiresAt: now - 1000 });
      const store = new TokenStore(stored);
      const engine = engineFor(store);
      const failure = new GatewayError('refresh', 'provider unavailable', {
        status: 503,
      });
      gateway.refresh.mockRejectedValueOnce(failure);

      await expect(engine.getAccessToken()).rejects.toBe(failure);
      expect(engine.state).toBe('failed');
      expect(store.get()).toBe(stored);
      expect(gateway.refresh).toHaveBeenCalledTimes(1);
    });

    it('retries only when called again after a failure', async () => {
      const store = new TokenStore(tokens({ accessExpiresAt: now - 1000 }));
      const engine = engineFor(store);
      gateway.refresh.mockRejectedValueOnce(
        new GatewayError('refresh', 'timeout'),
      );

      await expect(engine.getAccessToken()).rejects.toBeInstanceOf(
        GatewayError,
      );
      await expect(engine.getAccessToken()).resolves.toBe(
        'refreshed-access-1',
      );
      expect(engine.state).toBe('valid');
    });

    it('keeps the stored refresh token when the response carries none', async () => {
      const store = new TokenStore(tokens({ accessExpiresAt: now - 1000 }));
      gateway.refresh.mockResolvedValueOnce(
        createTokenSet({
          accessToken: 'rotated-access',
          accessExpiresAt: now + 300_000,
          refreshToken: null,
          refreshExpiresAt: null,
          issuedAt: now,
        }),
      );

      await engineFor(store).getAccessToken();

      expect(store.get()).toEqual({
        accessToken: 'rotated-access',
        accessExpiresAt: now + 300_000,
        refreshToken: 'seed-refresh',
        refreshExpiresAt: now + 3_600_000,
        issuedAt: now,
      });
    });

    it('reuses a set written by another writer while waiting for access', async () => {
      const stale = tokens({ accessExpiresAt: now - 1000 });
      const fresh = tokens({ accessToken: 'other-writer', issuedAt: now });
      const storage: TokenStorage = {
        label: 'racing',
        load: async () => stale,
        update: async (mutate) => (await mutate(fresh)).result,
      };

      await expect(engineFor(storage).getAccessToken()).resolves.toBe(
        'other-writer',
      );
      expect(gateway.refresh).not.toHaveBeenCalled();
    });

    it('fails with TokenNotInitializedError when nothing is stored', async () => {
      const engine = engineFor(new TokenStore());

      await expect(engine.getAccessToken()).rejects.toBeInstanceOf(
        TokenNotInitializedError,
      );
      expect(engine.state).toBe('uninitialized');
    });
  });

  describe('getRefreshToken', () => {
    it('returns the refresh token of a usable set', async () => {
      const engine = engineFor(new TokenStore(tokens()));

      await expect(engine.getRefreshToken()).resolves.toBe('seed-refresh');
      expect(gateway.refresh).not.toHaveBeenCalled();
    });

    it('returns the new refresh token after an implicit refresh', async () => {
      const engine = engineFor(
        new TokenStore(tokens({ accessExpiresAt: now - 1000 })),
      );

      await expect(engine.getRefreshToken()).resolves.toBe(
        'refreshed-refresh-1',
      );
    });

    it('fails when the refresh token has expired', async () => {
      const engine = engineFor(
        new TokenStore(tokens({ refreshExpiresAt: now - 1000 })),
      );

      await expect(engine.getRefreshToken()).rejects.toBeInstanceOf(
        RefreshTokenExpiredError,
      );
    });
  });

  describe('refreshTokens', () => {
    it('refreshes even when the access token is still usable', async () => {
      const store = new TokenStore(tokens());

      const refreshed = await engineFor(store).refreshTokens();

      expect(refreshed.accessToken).toBe('refreshed-access-1');
      expect(store.get()).toBe(refreshed);
      expect(gateway.refresh).toHaveBeenCalledTimes(1);
    });

    it('skips the call when the stored set was replaced since it was read', async () => {
      const snapshot = tokens();
      const replaced = tokens({ accessToken: 'other-writer', issuedAt: now });
      const storage: TokenStorage = {
        label: 'racing',
        load: async () => snapshot,
        update: async (mutate) => (await mutate(replaced)).result,
      };

      await expect(engineFor(storage).refreshTokens()).resolves.toBe(replaced);
      expect(gateway.refresh).not.toHaveBeenCalled();
    });
  });

  describe('initialize', () => {
    it('reuses a stored usable set', async () => {
      const stored = tokens();
      const engine = engineFor(new TokenStore(stored));

      await expect(engine.initialize()).resolves.toBe(stored);
      expect(gateway.authenticate).not.toHaveBeenCalled();
      expect(gateway.refresh).not.toHaveBeenCalled();
      expect(engine.state).toBe('valid');
    });

    it('refreshes a stored set whose access token is stale', async () => {
      const store = new TokenStore(tokens({ accessExpiresAt: now - 1000 }));

      const result = await engineFor(store).initialize();

      expect(result.accessToken).toBe('refreshed-access-1');
      expect(store.get()).toBe(result);
    });

    it('authenticates with credentials when nothing is stored', async () => {
      const store = new TokenStore();
      const credentials = { username: 'alice', password: 'test-password' };

      const result = await engineFor(store).initialize(credentials);

      expect(gateway.authenticate).toHaveBeenCalledWith(credentials);
      expect(result.accessToken).toBe('auth-access-1');
      expect(store.get()).toBe(result);
    });

    it('falls back to credentials when the stored refresh token expired', async () => {
      const store = new TokenStore(
        tokens({ accessExpiresAt: now - 1000, refreshExpiresAt: now - 1000 }),
      );
      const credentials = { username: 'alice', password: 'test-password' };

      const result = await engineFor(store).initialize(credentials);

      expect(result.accessToken).toBe('auth-access-1');
      expect(gateway.refresh).not.toHaveBeenCalled();
    });

    it('refreshes seed tokens once to learn their lifetimes', async () => {
      const store = new TokenStore();
      const engine = engineFor(store, {
        accessToken: 'config-access',
        refreshToken: 'config-refresh',
      });

      const result = await engine.initialize();

      expect(gateway.refresh).toHaveBeenCalledWith('config-refresh');
      expect(result.accessExpiresAt).toBe(now + 300_000);
      expect(store.get()).toBe(result);
    });

    it('stores a lone seed access token with an unknown lifetime', async () => {
      const store = new TokenStore();
      const engine = engineFor(store, { accessToken: 'config-access' });

      await engine.initialize();

      expect(store.get()).toEqual({
        accessToken: 'config-access',
        accessExpiresAt: null,
        refreshToken: null,
        refreshExpiresAt: null,
        issuedAt: now,
      });
      await expect(engine.getAccessToken()).resolves.toBe('config-access');
      await expect(engine.getAccessTokenExpiry()).resolves.toBeNull();
      expect(gateway.authenticate).not.toHaveBeenCalled();
    });

    it('uses the client-credentials grant when nothing else is available', async () => {
      const store = new TokenStore();

      await engineFor(store).initialize();

      expect(gateway.authenticate).toHaveBeenCalledWith();
      expect(store.get()?.accessToken).toBe('auth-access-1');
    });

    it('leaves the store empty when authentication fails', async () => {
      const store = new TokenStore();
      const engine = engineFor(store);
      gateway.authenticate.mockRejectedValueOnce(
        new GatewayError('authenticate', 'invalid_client', { status: 401 }),
      );

      await expect(engine.initialize()).rejects.toMatchObject({
        code: 'GATEWAY',
        status: 401,
      });
      expect(store.get()).toBeNull();
      expect(engine.state).toBe('failed');
    });
  });

  describe('tokenExchange', () => {
    it('returns a separate set and leaves the primary set alone', async () => {
      const stored = tokens();
      const store = new TokenStore(stored);
      const engine = engineFor(store);

      const before = await engine.getAccessToken();
      const exchanged = await engine.tokenExchange('billing-api');
      const after = await engine.getAccessToken();

      expect(exchanged.accessToken).toBe('exchange-billing-api-access-1');
      expect(gateway.exchange).toHaveBeenCalledWith(
        'seed-access',
        'billing-api',
      );
      expect(after).toBe(before);
      expect(store.get()).toBe(stored);
      expect(engine.state).toBe('valid');
    });

    it('does not change state when the exchange fails', async () => {
      const engine = engineFor(new TokenStore(tokens()));
      gateway.exchange.mockRejectedValueOnce(
        new GatewayError('exchange', 'not allowed', { status: 403 }),
      );

      await expect(engine.tokenExchange('billing-api')).rejects.toBeInstanceOf(
        GatewayError,
      );
      expect(engine.state).toBe('valid');
    });
  });

  describe('getUserInfo', () => {
    it('refreshes a stale access token before asking for claims', async () => {
      const engine = engineFor(
        new TokenStore(tokens({ accessExpiresAt: now - 1000 })),
      );

      const info = await engine.getUserInfo();

      expect(gateway.refresh).toHaveBeenCalledTimes(1);
      expect(gateway.userInfo).toHaveBeenCalledWith('refreshed-access-1');
      expect(info).toEqual({
        sub: 'user-1',
        preferred_username: 'tester',
        seen_token: 'refreshed-access-1',
      });
    });
  });

  describe('timestamps', () => {
    it('reports issue and expiry instants of the stored set', async () => {
      const engine = engineFor(new TokenStore(tokens()));

      await expect(engine.getIssuedAt()).resolves.toEqual(new Date(now - 1000));
      await expect(engine.getAccessTokenExpiry()).resolves.toEqual(
        new Date(now + 300_000),
      );
      await expect(engine.getRefreshTokenExpiry()).resolves.toEqual(
        new Date(now + 3_600_000),
      );
    });

    it('fails before initialization', async () => {
      await expect(
        engineFor(new TokenStore()).getIssuedAt(),
      ).rejects.toBeInstanceOf(TokenNotInitializedError);
    });
  });
});
