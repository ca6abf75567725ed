/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { PasswordCredentials, TokenSet, UserInfo } from './types.js';

/**
 * Network side of the token lifecycle. Transport and provider failures
 * surface as GatewayError; retry policy, if any, belongs to the
 * implementation.
 */
export interface IdentityProviderGateway {
  /**
   * Obtains a fresh token set: the password grant when credentials are
   * given, the client-credentials grant otherwise.
   */
  authenticate(credentials?: PasswordCredentials): Promise<TokenSet>;

  refresh(refreshToken: string): Promise<TokenSet>;

  /**
   * Exchanges `accessToken` for a token set scoped to `audience`.
   */
  exchange(accessToken: string, audience: string): Promise<TokenSet>;

  userInfo(accessToken: string): Promise<UserInfo>;
}
