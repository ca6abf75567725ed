/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigurationError } from '../auth/errors.js';
import { DEFAULT_REQUEST_TIMEOUT_MS } from '../auth/keycloak-gateway.js';
import { DEFAULT_EXPIRY_SKEW_MS } from '../auth/token-set.js';
import {
  DEFAULT_LOCK_RETRY_DELAY_MS,
  DEFAULT_LOCK_TIMEOUT_MS,
  DEFAULT_STALE_LOCK_MS,
} from '../storage/file-lock.js';

export const TOKEN_DIR = '.tokenward';

/**
 * Connection and seed settings shared by both clients.
 */
export const ClientConfigSchema = z.object({
  serverUrl: z.string().url(),
  realmName: z.string().min(1),
  clientId: z.string().min(1),
  clientSecret: z.string().min(1).optional(),
  accessToken: z.string().min(1).optional(),
  refreshToken: z.string().min(1).optional(),
  /** `true`/`false` toggles TLS verification; a string is a CA bundle path. */
  verify: z.union([z.boolean(), z.string().min(1)]).default(true),
  expirySkewMs: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_EXPIRY_SKEW_MS),
  requestTimeoutMs: z.number().int().positive().optional(),
});

/**
 * Adds the backing file and lock settings of the shared client.
 *
 * A holder keeps the lock for the gateway call it makes, so a staleness
 * threshold that a slow but live refresh can reach would let a waiter
 * break the lock mid-refresh. `staleLockMs` must therefore be 0 or exceed
 * the request timeout plus the lock timeout.
 */
export const SharedClientConfigSchema = ClientConfigSchema.extend({
  tokenFilename: z.string().min(1).optional(),
  lockTimeoutMs: z.number().int().positive().default(DEFAULT_LOCK_TIMEOUT_MS),
  lockRetryCount: z.number().int().nonnegative().optional(),
  lockRetryDelayMs: z
    .number()
    .int()
    .positive()
    .default(DEFAULT_LOCK_RETRY_DELAY_MS),
  staleLockMs: z.number().int().nonnegative().default(DEFAULT_STALE_LOCK_MS),
}).superRefine((config, ctx) => {
  const minimum =
    (config.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS) +
    config.lockTimeoutMs;
  if (config.staleLockMs !== 0 && config.staleLockMs <= minimum) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['staleLockMs'],
      message: `must be 0 or greater than requestTimeoutMs + lockTimeoutMs (${minimum})`,
    });
  }
});

export type ClientConfig = z.infer<typeof ClientConfigSchema>;
export type ClientConfigInput = z.input<typeof ClientConfigSchema>;
export type SharedClientConfig = z.infer<typeof SharedClientConfigSchema>;
export type SharedClientConfigInput = z.input<typeof SharedClientConfigSchema>;

function parseWith<S extends z.ZodTypeAny>(
  schema: S,
  input: unknown,
): z.infer<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
      ),
      { cause: result.error },
    );
  }
  return result.data;
}

export function parseClientConfig(input: unknown): ClientConfig {
  return parseWith(ClientConfigSchema, input);
}

export function parseSharedClientConfig(input: unknown): SharedClientConfig {
  return parseWith(SharedClientConfigSchema, input);
}

/**
 * `./.tokenward/<realm>.tok`, resolved against `cwd`.
 */
export function defaultTokenFilename(
  realmName: string,
  cwd: string = process.cwd(),
): string {
  return resolve(cwd, TOKEN_DIR, `${realmName}.tok`);
}

function parseVerify(value: string | undefined): boolean | string | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const lowered = value.toLowerCase();
  if (lowered === 'true') {
    return true;
  }
  if (lowered === 'false') {
    return false;
  }
  return value;
}

function parseNumber(value: string | undefined): number | undefined {
  return value === undefined || value === '' ? undefined : Number(value);
}

/**
 * Reads TOKENWARD_* variables into a shared-client configuration.
 */
export function sharedClientConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
): SharedClientConfig {
  const input: Record<string, unknown> = {
    serverUrl: env.TOKENWARD_SERVER_URL,
    realmName: env.TOKENWARD_REALM,
    clientId: env.TOKENWARD_CLIENT_ID,
    clientSecret: env.TOKENWARD_CLIENT_SECRET || undefined,
    accessToken: env.TOKENWARD_ACCESS_TOKEN || undefined,
    refreshToken: env.TOKENWARD_REFRESH_TOKEN || undefined,
    verify: parseVerify(env.TOKENWARD_VERIFY),
    expirySkewMs: parseNumber(env.TOKENWARD_EXPIRY_SKEW_MS),
    tokenFilename: env.TOKENWARD_TOKEN_FILE || undefined,
    lockTimeoutMs: parseNumber(env.TOKENWARD_LOCK_TIMEOUT_MS),
    lockRetryCount: parseNumber(env.TOKENWARD_LOCK_RETRY_COUNT),
    lockRetryDelayMs: parseNumber(env.TOKENWARD_LOCK_RETRY_DELAY_MS),
    staleLockMs: parseNumber(env.TOKENWARD_STALE_LOCK_MS),
  };
  return parseSharedClientConfig(input);
}
