/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { ConfigurationManager } from './ConfigurationManager.js';
import { StderrOutput } from './StderrOutput.js';
import type { LogEntry, LogLevel, LogOutput } from './types.js';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  log: 1,
  warn: 2,
  error: 3,
};

type Message = string | (() => string);

export class DebugLogger {
  private static instances: Map<string, DebugLogger> = new Map();

  private readonly _namespace: string;
  private readonly _configManager: ConfigurationManager;
  private readonly _output: LogOutput;
  private _enabled: boolean;
  private readonly boundOnConfigChange: () => void;

  /**
   * Returns the cached logger for a namespace, creating it on first use.
   */
  static getLogger(namespace: string): DebugLogger {
    let logger = DebugLogger.instances.get(namespace);
    if (!logger) {
      logger = new DebugLogger(namespace);
      DebugLogger.instances.set(namespace, logger);
    }
    return logger;
  }

  constructor(namespace: string, output?: LogOutput) {
    this._namespace = namespace;
    this._configManager = ConfigurationManager.getInstance();
    this._output = output ?? new StderrOutput(namespace);
    this._enabled = this.checkEnabled();
    this.boundOnConfigChange = () => this.onConfigChange();
    this._configManager.subscribe(this.boundOnConfigChange);
  }

  get namespace(): string {
    return this._namespace;
  }

  get enabled(): boolean {
    return this._enabled;
  }

  log(messageOrFn: Message, ...args: unknown[]): void {
    this.emit('log', messageOrFn, args);
  }

  debug(messageOrFn: Message, ...args: unknown[]): void {
    this.emit('debug', messageOrFn, args);
  }

  warn(messageOrFn: Message, ...args: unknown[]): void {
    this.emit('warn', messageOrFn, args);
  }

  error(messageOrFn: Message, ...args: unknown[]): void {
    this.emit('error', messageOrFn, args);
  }

  checkEnabled(): boolean {
    const config = this._configManager.getEffectiveConfig();
    if (!config.enabled) {
      return false;
    }
    return config.namespaces.some((pattern) =>
      this.matchesPattern(this._namespace, pattern),
    );
  }

  dispose(): void {
    this._configManager.unsubscribe(this.boundOnConfigChange);
    if (DebugLogger.instances.get(this._namespace) === this) {
      DebugLogger.instances.delete(this._namespace);
    }
  }

  private emit(level: LogLevel, messageOrFn: Message, args: unknown[]): void {
    // Message functions are never evaluated while disabled.
    if (!this._enabled) {
      return;
    }
    const threshold = this._configManager.getEffectiveConfig().level;
    if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
      return;
    }

    let message: string;
    if (typeof messageOrFn === 'function') {
      try {
        message = messageOrFn();
      } catch (_error) {
        message = '[Error evaluating log function]';
      }
    } else {
      message = messageOrFn;
    }

    const entry: LogEntry = {
      timestamp: new Date().toISOString(),
      namespace: this._namespace,
      level,
      message: this.redactSensitive(message),
      args: args.length > 0 ? args : undefined,
      pid: process.pid,
    };
    this._output.write(entry);
  }

  private matchesPattern(namespace: string, pattern: string): boolean {
    if (pattern === namespace) {
      return true;
    }

    if (pattern.includes('*')) {
      const regexPattern = pattern
        .replace(/[.+?^${}()|[\]\\]/g, '\\$&')
        .replace(/\*/g, '.*');
      return new RegExp(`^${regexPattern}$`).test(namespace);
    }

    return false;
  }

  private redactSensitive(message: string): string {
    let result = message;
    for (const pattern of this._configManager.getRedactPatterns()) {
      const regex = new RegExp(`${pattern}["']?[:=]\\s*["']?([^"'\\s,&}]+)`, 'gi');
      result = result.replace(regex, `${pattern}: [REDACTED]`);
    }
    return result;
  }

  private onConfigChange(): void {
    this._enabled = this.checkEnabled();
  }
}
