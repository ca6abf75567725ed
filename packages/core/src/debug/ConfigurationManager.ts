/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { DebugSettings, LogLevel } from './types.js';

const NAMESPACE_PREFIX = 'tokenward';
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'log', 'warn', 'error'];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Process-wide debug settings, merged from defaults, the environment and
 * values set at run time (highest priority last).
 */
export class ConfigurationManager {
  private static instance: ConfigurationManager | undefined;

  private readonly defaultConfig: DebugSettings;
  private envConfig: Partial<DebugSettings> | null = null;
  private ephemeralConfig: Partial<DebugSettings> | null = null;
  private mergedConfig: DebugSettings;
  private listeners: Set<() => void> = new Set();

  static getInstance(): ConfigurationManager {
    if (!ConfigurationManager.instance) {
      ConfigurationManager.instance = new ConfigurationManager();
    }
    return ConfigurationManager.instance;
  }

  private constructor() {
    this.defaultConfig = {
      enabled: false,
      namespaces: [],
      level: 'debug',
      redactPatterns: [
        'access_token',
        'refresh_token',
        'client_secret',
        'password',
        'token',
      ],
    };
    this.mergedConfig = this.defaultConfig;
    this.loadEnvironmentConfig(process.env);
  }

  /**
   * Re-reads DEBUG, TOKENWARD_DEBUG and TOKENWARD_DEBUG_LEVEL.
   */
  loadEnvironmentConfig(env: NodeJS.ProcessEnv): void {
    this.envConfig = null;

    if (env.DEBUG) {
      const namespaces = this.parseDebugEnv(env.DEBUG).filter(
        (ns) => ns.startsWith(NAMESPACE_PREFIX) || ns === '*',
      );
      if (namespaces.length > 0) {
        this.envConfig = { enabled: true, namespaces };
      }
    }

    if (env.TOKENWARD_DEBUG) {
      this.envConfig = {
        enabled: true,
        namespaces: this.parseDebugEnv(env.TOKENWARD_DEBUG),
      };
    }

    const level = env.TOKENWARD_DEBUG_LEVEL;
    if (level && isLogLevel(level)) {
      this.envConfig = { ...this.envConfig, level };
    }
    this.mergeConfigurations();
  }

  setEphemeralConfig(config: Partial<DebugSettings>): void {
    this.ephemeralConfig = {
      ...this.ephemeralConfig,
      ...config,
    };
    this.mergeConfigurations();
  }

  clearEphemeralConfig(): void {
    this.ephemeralConfig = null;
    this.mergeConfigurations();
  }

  getEffectiveConfig(): DebugSettings {
    return this.mergedConfig;
  }

  getRedactPatterns(): string[] {
    return this.mergedConfig.redactPatterns;
  }

  subscribe(listener: () => void): void {
    this.listeners.add(listener);
  }

  unsubscribe(listener: () => void): void {
    this.listeners.delete(listener);
  }

  private mergeConfigurations(): void {
    this.mergedConfig = {
      ...this.defaultConfig,
      ...this.envConfig,
      ...this.ephemeralConfig,
    };
    this.listeners.forEach((listener) => listener());
  }

  private parseDebugEnv(value: string): string[] {
    return value
      .split(',')
      .map((s) => s.trim())
      .filter(Boolean);
  }
}
