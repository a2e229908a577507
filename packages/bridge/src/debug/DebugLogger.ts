/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import createDebug from 'debug';
import type { Debugger } from 'debug';

export type LogLevel = 'debug' | 'log' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  log: 1,
  warn: 2,
  error: 3,
};

export const LOG_NAMESPACE_ROOT = 'analyzer-bridge';

const DEFAULT_REDACT_PATTERNS = ['token', 'password', 'secret', 'apiKey'];

// stdout belongs to the tool channel, so everything goes to stderr.
createDebug.log = (...args: unknown[]) => {
  process.stderr.write(`${args.map((arg) => String(arg)).join(' ')}\n`);
};

export function isLogLevel(value: unknown): value is LogLevel {
  return (
    value === 'debug' || value === 'log' || value === 'warn' || value === 'error'
  );
}

function levelFromEnv(): LogLevel {
  const raw = process.env.ANALYZER_BRIDGE_LOG_LEVEL;
  return isLogLevel(raw) ? raw : 'debug';
}

export class DebugLogger {
  private static instances: Map<string, DebugLogger> = new Map();

  private readonly debugInstance: Debugger;
  private readonly _namespace: string;
  private _level: LogLevel;
  private redactPatterns: readonly string[] = DEFAULT_REDACT_PATTERNS;

  /**
   * Returns the logger for `area`, creating it on first use. Each area maps to
   * the `analyzer-bridge:<area>` debug namespace, so `DEBUG=analyzer-bridge:*`
   * turns all of them on.
   */
  static getLogger(area: string): DebugLogger {
    const namespace = area.startsWith(`${LOG_NAMESPACE_ROOT}:`)
      ? area
      : `${LOG_NAMESPACE_ROOT}:${area}`;
    let logger = DebugLogger.instances.get(namespace);
    if (!logger) {
      logger = new DebugLogger(namespace);
      DebugLogger.instances.set(namespace, logger);
    }
    return logger;
  }

  static resetForTesting(): void {
    DebugLogger.instances.clear();
  }

  constructor(namespace: string) {
    this._namespace = namespace;
    this.debugInstance = createDebug(namespace);
    this._level = levelFromEnv();
  }

  get namespace(): string {
    return this._namespace;
  }

  get enabled(): boolean {
    return this.debugInstance.enabled;
  }

  set enabled(value: boolean) {
    this.debugInstance.enabled = value;
  }

  get level(): LogLevel {
    return this._level;
  }

  set level(value: LogLevel) {
    this._level = value;
  }

  setRedactPatterns(patterns: readonly string[]): void {
    this.redactPatterns = patterns;
  }

  debug(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('debug', messageOrFn, args);
  }

  log(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('log', messageOrFn, args);
  }

  warn(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('warn', messageOrFn, args);
  }

  error(messageOrFn: string | (() => string), ...args: unknown[]): void {
    this.write('error', messageOrFn, args);
  }

  private write(
    level: LogLevel,
    messageOrFn: string | (() => string),
    args: unknown[],
  ): void {
    if (!this.debugInstance.enabled) {
      return;
    }
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this._level]) {
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

    const prefix = level === 'log' ? '' : `[${level.toUpperCase()}] `;
    this.debugInstance(`${prefix}${this.redactSensitive(message)}`, ...args);
  }

  private redactSensitive(message: string): string {
    let result = message;
    for (const pattern of this.redactPatterns) {
      const regex = new RegExp(`${pattern}["']?:\\s*["']?([^"'\\s]+)`, 'gi');
      result = result.replace(regex, `${pattern}: [REDACTED]`);
    }
    return result;
  }
}
