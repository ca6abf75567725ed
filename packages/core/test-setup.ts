/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach } from 'vitest';
import { ConfigurationManager } from './src/debug/ConfigurationManager.js';

// Debug output from the host environment must not leak into test runs.
ConfigurationManager.getInstance().loadEnvironmentConfig({});

afterEach(() => {
  ConfigurationManager.getInstance().clearEphemeralConfig();
});
