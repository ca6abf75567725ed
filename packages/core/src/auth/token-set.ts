/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Clock, TokenResponse, TokenSet } from './types.js';

export const DEFAULT_EXPIRY_SKEW_MS = 30_000;

export const systemClock: Clock = () => Date.now();

export function createTokenSet(fields: TokenSet): TokenSet {
  return Object.freeze({
    accessToken: fields.accessToken,
    accessExpiresAt: fields.accessExpiresAt,
    refreshToken: fields.refreshToken,
    refreshExpiresAt: fields.refreshExpiresAt,
    issuedAt: fields.issuedAt,
  });
}

/**
 * A credential is usable while `now < expiresAt - skewMs`. An unknown
 * expiry (`null`) is assumed usable.
 */
export function isUsable(
  expiresAt: number | null,
  now: number,
  skewMs: number,
): boolean {
  return expiresAt === null || now < expiresAt - skewMs;
}

export function isAccessTokenUsable(
  tokens: TokenSet,
  now: number,
  skewMs: number,
): boolean {
  return isUsable(tokens.accessExpiresAt, now, skewMs);
}

export function isRefreshTokenUsable(
  tokens: TokenSet,
  now: number,
  skewMs: number,
): boolean {
  return (
    tokens.refreshToken !== null &&
    isUsable(tokens.refreshExpiresAt, now, skewMs)
  );
}

function lifetimeToInstant(
  issuedAt: number,
  seconds: number | undefined,
): number | null {
  // Keycloak reports refresh_expires_in = 0 for offline tokens.
  if (seconds === undefined || seconds <= 0) {
    return null;
  }
  return issuedAt + seconds * 1000;
}

/**
 * Builds a TokenSet from a token endpoint response received at `issuedAt`.
 */
export function tokenSetFromResponse(
  response: TokenResponse,
  issuedAt: number,
): TokenSet {
  return createTokenSet({
    accessToken: response.access_token,
    accessExpiresAt: lifetimeToInstant(issuedAt, response.expires_in),
    refreshToken: response.refresh_token ?? null,
    refreshExpiresAt: response.refresh_token
      ? lifetimeToInstant(issuedAt, response.refresh_expires_in)
      : null,
    issuedAt,
  });
}

/**
 * Providers may omit the refresh token from a refresh response; the current
 * one then stays in force.
 */
export function mergeRefreshedTokenSet(
  current: TokenSet,
  next: TokenSet,
): TokenSet {
  if (next.refreshToken !== null && next.refreshToken !== '') {
    return next;
  }
  return createTokenSet({
    ...next,
    refreshToken: current.refreshToken,
    refreshExpiresAt: current.refreshExpiresAt,
  });
}
