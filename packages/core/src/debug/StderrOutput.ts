/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import createDebug from 'debug';
import type { Debugger } from 'debug';
import type { LogEntry, LogOutput } from './types.js';

/**
 * Writes entries through a `debug` instance, which prints to stderr.
 * Enablement is decided by the DebugLogger, so the instance is forced on.
 */
export class StderrOutput implements LogOutput {
  private readonly debugInstance: Debugger;

  constructor(namespace: string) {
    this.debugInstance = createDebug(namespace);
    this.debugInstance.enabled = true;
  }

  write(entry: LogEntry): void {
    const prefix = entry.level === 'log' ? '' : `[${entry.level}] `;
    this.debugInstance(`${prefix}${entry.message}`, ...(entry.args ?? []));
  }
}
