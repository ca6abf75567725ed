/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';

/**
 * Token endpoint response, as returned by Keycloak for every grant.
 */
export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().optional(),
  refresh_token: z.string().optional(),
  refresh_expires_in: z.number().optional(),
  scope: z.string().nullable().optional(),
  id_token: z.string().optional(),
});

/**
 * OAuth error body (RFC 6749 section 5.2)
 */
export const OAuthErrorResponseSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
});

/**
 * OIDC user-info claims. Only `sub` is guaranteed.
 */
export const UserInfoSchema = z
  .object({
    sub: z.string(),
  })
  .passthrough();

/**
 * On-disk record shared between processes. Instants are epoch milliseconds;
 * `null` expiries mean the provider did not report a lifetime.
 */
export const TokenFileRecordSchema = z.object({
  version: z.literal(1),
  server_url: z.string(),
  realm_name: z.string(),
  issued_at: z.number(),
  access_token: z.string().min(1),
  access_expires_at: z.number().nullable(),
  refresh_token: z.string().nullable(),
  refresh_expires_at: z.number().nullable(),
});

export type TokenResponse = z.infer<typeof TokenResponseSchema>;
export type OAuthErrorResponse = z.infer<typeof OAuthErrorResponseSchema>;
export type UserInfo = z.infer<typeof UserInfoSchema>;
export type TokenFileRecord = z.infer<typeof TokenFileRecordSchema>;

/**
 * An access/refresh token pair and the instants (epoch ms) they stop being
 * valid. Instances are frozen; a refresh always produces a new set.
 */
export interface TokenSet {
  readonly accessToken: string;
  readonly accessExpiresAt: number | null;
  readonly refreshToken: string | null;
  readonly refreshExpiresAt: number | null;
  readonly issuedAt: number;
}

export interface PasswordCredentials {
  username: string;
  password: string;
}

/** Returns the current time in epoch milliseconds. */
export type Clock = () => number;

export type TokenLifecycleState =
  | 'uninitialized'
  | 'valid'
  | 'refresh_pending'
  | 'expired'
  | 'failed';
