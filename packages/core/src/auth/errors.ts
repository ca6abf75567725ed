/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Typed failures surfaced by the token lifecycle. None of them are retried
 * or swallowed internally; callers decide what to do.
 */

export type TokenLifecycleErrorCode =
  | 'GATEWAY'
  | 'REFRESH_TOKEN_EXPIRED'
  | 'LOCK_TIMEOUT'
  | 'LOCK_LOST'
  | 'STORE_CORRUPT'
  | 'NOT_INITIALIZED'
  | 'INVALID_CONFIG';

export type GatewayOperation =
  | 'authenticate'
  | 'refresh'
  | 'exchange'
  | 'userInfo';

export class TokenLifecycleError extends Error {
  readonly code: TokenLifecycleErrorCode;
  readonly remediation: string;

  constructor(
    message: string,
    code: TokenLifecycleErrorCode,
    remediation: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'TokenLifecycleError';
    this.code = code;
    this.remediation = remediation;
  }
}

/**
 * Network or provider failure while talking to the identity provider.
 */
export class GatewayError extends TokenLifecycleError {
  readonly operation: GatewayOperation;
  /** HTTP status, when the provider answered at all. */
  readonly status: number | undefined;
  /** OAuth `error` code returned by the provider. */
  readonly providerError: string | undefined;

  constructor(
    operation: GatewayOperation,
    message: string,
    options: {
      status?: number;
      providerError?: string;
      cause?: unknown;
    } = {},
  ) {
    super(
      message,
      'GATEWAY',
      'Check connectivity and client settings, then retry the call.',
      { cause: options.cause },
    );
    this.name = 'GatewayError';
    this.operation = operation;
    this.status = options.status;
    this.providerError = options.providerError;
  }
}

export class RefreshTokenExpiredError extends TokenLifecycleError {
  readonly reason: 'expired' | 'missing';

  constructor(reason: 'expired' | 'missing') {
    super(
      reason === 'expired'
        ? 'Refresh token has expired'
        : 'No refresh token is available',
      'REFRESH_TOKEN_EXPIRED',
      'Call initializeTokens() with credentials to authenticate again.',
    );
    this.name = 'RefreshTokenExpiredError';
    this.reason = reason;
  }
}

export class LockTimeoutError extends TokenLifecycleError {
  readonly lockPath: string;
  readonly waitedMs: number;
  readonly attempts: number;

  constructor(lockPath: string, waitedMs: number, attempts: number) {
    super(
      `Could not acquire lock ${lockPath} after ${attempts} attempts (${waitedMs}ms)`,
      'LOCK_TIMEOUT',
      'Retry later, or raise lockTimeoutMs if refreshes are slow.',
    );
    this.name = 'LockTimeoutError';
    this.lockPath = lockPath;
    this.waitedMs = waitedMs;
    this.attempts = attempts;
  }
}

/**
 * The lock was broken as stale while its holder was still working; the
 * holder's result is discarded rather than written without the lock.
 */
export class LockLostError extends TokenLifecycleError {
  readonly lockPath: string;

  constructor(lockPath: string) {
    super(
      `Lock ${lockPath} was taken over before the token file could be written`,
      'LOCK_LOST',
      'Raise staleLockMs above the longest expected refresh, then retry.',
    );
    this.name = 'LockLostError';
    this.lockPath = lockPath;
  }
}

export class StoreCorruptError extends TokenLifecycleError {
  readonly filePath: string;

  constructor(filePath: string, detail: string, options?: { cause?: unknown }) {
    super(
      `Token file ${filePath} is corrupt: ${detail}`,
      'STORE_CORRUPT',
      'Inspect or delete the token file, then initialize tokens again.',
      options,
    );
    this.name = 'StoreCorruptError';
    this.filePath = filePath;
  }
}

export class TokenNotInitializedError extends TokenLifecycleError {
  constructor(message = 'No tokens have been initialized') {
    super(
      message,
      'NOT_INITIALIZED',
      'Call initializeTokens() before requesting tokens.',
    );
    this.name = 'TokenNotInitializedError';
  }
}

export class ConfigurationError extends TokenLifecycleError {
  readonly issues: readonly string[];

  constructor(issues: readonly string[], options?: { cause?: unknown }) {
    super(
      `Invalid client configuration: ${issues.join('; ')}`,
      'INVALID_CONFIG',
      'Fix the listed configuration fields.',
      options,
    );
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export function isTokenLifecycleError(
  error: unknown,
): error is TokenLifecycleError {
  return error instanceof TokenLifecycleError;
}
