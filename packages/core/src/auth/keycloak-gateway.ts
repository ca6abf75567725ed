/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { readFileSync } from 'node:fs';
import { Agent, fetch, type Dispatcher, type Response } from 'undici';
import { DebugLogger } from '../debug/index.js';
import { getErrorMessage } from '../utils/errors.js';
import {
  ConfigurationError,
  GatewayError,
  type GatewayOperation,
} from './errors.js';
import type { IdentityProviderGateway } from './identity-provider-gateway.js';
import { systemClock, tokenSetFromResponse } from './token-set.js';
import {
  OAuthErrorResponseSchema,
  TokenResponseSchema,
  UserInfoSchema,
  type Clock,
  type OAuthErrorResponse,
  type PasswordCredentials,
  type TokenSet,
  type UserInfo,
} from './types.js';

export const TOKEN_EXCHANGE_GRANT =
  'urn:ietf:params:oauth:grant-type:token-exchange';
export const ACCESS_TOKEN_TYPE = 'urn:ietf:params:oauth:token-type:access_token';

export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

export interface KeycloakGatewayOptions {
  serverUrl: string;
  realmName: string;
  clientId: string;
  clientSecret?: string;
  /** `false` skips certificate checks; a string is a CA bundle path. */
  verify?: boolean | string;
  /** Overrides the dispatcher derived from `verify`. */
  dispatcher?: Dispatcher;
  requestTimeoutMs?: number;
  clock?: Clock;
}

/**
 * Builds the undici dispatcher matching a `verify` setting; `undefined`
 * means the global dispatcher with default TLS verification.
 */
export function createTlsDispatcher(
  verify: boolean | string,
): Dispatcher | undefined {
  if (verify === true) {
    return undefined;
  }
  if (verify === false) {
    return new Agent({ connect: { rejectUnauthorized: false } });
  }
  let ca: Buffer;
  try {
    ca = readFileSync(verify);
  } catch (error) {
    throw new ConfigurationError(
      [`verify: cannot read CA bundle ${verify}: ${getErrorMessage(error)}`],
      { cause: error },
    );
  }
  return new Agent({ connect: { ca } });
}

export function realmEndpoint(
  serverUrl: string,
  realmName: string,
  endpoint: 'token' | 'userinfo',
): string {
  const base = serverUrl.endsWith('/') ? serverUrl : `${serverUrl}/`;
  return new URL(
    `realms/${encodeURIComponent(realmName)}/protocol/openid-connect/${endpoint}`,
    base,
  ).toString();
}

/**
 * IdentityProviderGateway for a Keycloak realm's OpenID Connect endpoints.
 */
export class KeycloakGateway implements IdentityProviderGateway {
  readonly tokenEndpoint: string;
  readonly userInfoEndpoint: string;
  private readonly clientId: string;
  private readonly clientSecret: string | undefined;
  private readonly dispatcher: Dispatcher | undefined;
  private readonly requestTimeoutMs: number;
  private readonly clock: Clock;
  private readonly logger: DebugLogger;

  constructor(options: KeycloakGatewayOptions) {
    this.tokenEndpoint = realmEndpoint(
      options.serverUrl,
      options.realmName,
      'token',
    );
    this.userInfoEndpoint = realmEndpoint(
      options.serverUrl,
      options.realmName,
      'userinfo',
    );
    this.clientId = options.clientId;
    this.clientSecret = options.clientSecret;
    this.dispatcher =
      options.dispatcher ?? createTlsDispatcher(options.verify ?? true);
    this.requestTimeoutMs =
      options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.clock = options.clock ?? systemClock;
    this.logger = DebugLogger.getLogger('tokenward:keycloak-gateway');
  }

  async authenticate(credentials?: PasswordCredentials): Promise<TokenSet> {
    if (credentials) {
      return this.requestToken('authenticate', {
        grant_type: 'password',
        username: credentials.username,
        password: credentials.password,
        scope: 'openid',
      });
    }
    if (!this.clientSecret) {
      throw new ConfigurationError([
        'clientSecret: required for the client_credentials grant when neither seed tokens nor credentials are given',
      ]);
    }
    return this.requestToken('authenticate', {
      grant_type: 'client_credentials',
      scope: 'openid',
    });
  }

  async refresh(refreshToken: string): Promise<TokenSet> {
    return this.requestToken('refresh', {
      grant_type: 'refresh_token',
      refresh_token: refreshToken,
    });
  }

  async exchange(accessToken: string, audience: string): Promise<TokenSet> {
    return this.requestToken('exchange', {
      grant_type: TOKEN_EXCHANGE_GRANT,
      subject_token: accessToken,
      subject_token_type: ACCESS_TOKEN_TYPE,
      audience,
    });
  }

  async userInfo(accessToken: string): Promise<UserInfo> {
    const response = await this.send('userInfo', this.userInfoEndpoint, {
      method: 'GET',
      headers: {
        accept: 'application/json',
        authorization: `Bearer ${accessToken}`,
      },
    });
    const payload = await this.readJson('userInfo', response);
    const parsed = UserInfoSchema.safeParse(payload);
    if (!parsed.success) {
      throw new GatewayError('userInfo', 'User-info response has no subject', {
        status: response.status,
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  private async requestToken(
    operation: GatewayOperation,
    params: Record<string, string>,
  ): Promise<TokenSet> {
    const body = new URLSearchParams({ client_id: this.clientId, ...params });
    if (this.clientSecret) {
      body.set('client_secret', this.clientSecret);
    }

    this.logger.debug(
      () => `[${operation}] POST ${this.tokenEndpoint} grant=${params.grant_type}`,
    );
    const issuedAt = this.clock();
    const response = await this.send(operation, this.tokenEndpoint, {
      method: 'POST',
      headers: {
        accept: 'application/json',
        'content-type': 'application/x-www-form-urlencoded',
      },
      body: body.toString(),
    });
    const payload = await this.readJson(operation, response);
    const parsed = TokenResponseSchema.safeParse(payload);
    if (!parsed.success) {
      throw new GatewayError(operation, 'Token response is malformed', {
        status: response.status,
        cause: parsed.error,
      });
    }
    return tokenSetFromResponse(parsed.data, issuedAt);
  }

  private async send(
    operation: GatewayOperation,
    url: string,
    init: { method: string; headers: Record<string, string>; body?: string },
  ): Promise<Response> {
    let response: Response;
    try {
      response = await fetch(url, {
        ...init,
        dispatcher: this.dispatcher,
        signal: AbortSignal.timeout(this.requestTimeoutMs),
      });
    } catch (error) {
      throw new GatewayError(
        operation,
        `Request to ${url} failed: ${getErrorMessage(error)}`,
        { cause: error },
      );
    }

    if (!response.ok) {
      const text = await response.text();
      const providerError = parseOAuthError(text);
      const detail =
        providerError?.error_description ??
        providerError?.error ??
        response.statusText;
      this.logger.warn(
        () => `[${operation}] provider answered ${response.status}: ${detail}`,
      );
      throw new GatewayError(
        operation,
        `${operation} rejected with status ${response.status}: ${detail}`,
        { status: response.status, providerError: providerError?.error },
      );
    }
    return response;
  }

  private async readJson(
    operation: GatewayOperation,
    response: Response,
  ): Promise<unknown> {
    try {
      return await response.json();
    } catch (error) {
      throw new GatewayError(operation, 'Response body is not JSON', {
        status: response.status,
        cause: error,
      });
    }
  }
}

function parseOAuthError(text: string): OAuthErrorResponse | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  const result = OAuthErrorResponseSchema.safeParse(parsed);
  return result.success ? result.data : null;
}
