/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { vi } from 'vitest';
import type { IdentityProviderGateway } from '../auth/identity-provider-gateway.js';
import { createTokenSet } from '../auth/token-set.js';
import type {
  Clock,
  PasswordCredentials,
  TokenSet,
  UserInfo,
} from '../auth/types.js';

export interface FakeGatewayOptions {
  clock: Clock;
  accessLifetimeMs?: number;
  refreshLifetimeMs?: number;
  /** Delay before refresh resolves, to widen race windows. */
  refreshDelayMs?: number;
}

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

/**
 * In-process gateway issuing numbered tokens: `<grant>-access-<n>` and
 * `<grant>-refresh-<n>`, where n counts every issued set.
 */
export function createFakeGateway(options: FakeGatewayOptions) {
  const accessLifetimeMs = options.accessLifetimeMs ?? 300_000;
  const refreshLifetimeMs = options.refreshLifetimeMs ?? 1_800_000;
  let issued = 0;

  const issue = (prefix: string): TokenSet => {
    issued++;
    const now = options.clock();
    return createTokenSet({
      accessToken: `${prefix}-access-${issued}`,
      accessExpiresAt: now + accessLifetimeMs,
      refreshToken: `${prefix}-refresh-${issued}`,
      refreshExpiresAt: now + refreshLifetimeMs,
      issuedAt: now,
    });
  };

  const gateway = {
    authenticate: vi.fn(
      async (_credentials?: PasswordCredentials): Promise<TokenSet> =>
        issue('auth'),
    ),
    refresh: vi.fn(async (_refreshToken: string): Promise<TokenSet> => {
      if (options.refreshDelayMs) {
        await sleep(options.refreshDelayMs);
      }
      return issue('refreshed');
    }),
    exchange: vi.fn(
      async (_accessToken: string, audience: string): Promise<TokenSet> =>
        issue(`exchange-${audience}`),
    ),
    userInfo: vi.fn(
      async (accessToken: string): Promise<UserInfo> => ({
        sub: 'user-1',
        preferred_username: 'tester',
        seen_token: accessToken,
      }),
    ),
  } satisfies IdentityProviderGateway;

  return gateway;
}

export type FakeGateway = ReturnType<typeof createFakeGateway>;
