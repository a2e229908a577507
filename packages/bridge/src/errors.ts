/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { JsonRpcId } from './types.js';

export type BridgeErrorKind =
  | 'ProcessSpawnError'
  | 'SessionTerminated'
  | 'MalformedMessage'
  | 'RequestTimeout'
  | 'UnknownCommand'
  | 'InvalidArguments'
  | 'DuplicateCommand'
  | 'AnalyzerReportedError'
  | 'CommandCancelled'
  | 'CommandFailed';

/**
 * Base class for every failure the bridge reports. `kind` is the stable
 * discriminant the channels and callers switch on.
 */
export abstract class BridgeError extends Error {
  abstract readonly kind: BridgeErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ProcessSpawnError extends BridgeError {
  readonly kind = 'ProcessSpawnError';

  constructor(
    readonly command: string,
    detail: string,
    options?: { cause?: unknown },
  ) {
    super(`Failed to start analyzer '${command}': ${detail}`, options);
  }
}

export class SessionTerminated extends BridgeError {
  readonly kind = 'SessionTerminated';

  constructor(readonly reason: string) {
    super(`Analyzer session terminated: ${reason}`);
  }
}

export class MalformedMessage extends BridgeError {
  readonly kind = 'MalformedMessage';

  constructor(
    detail: string,
    readonly requestId?: JsonRpcId,
    options?: { cause?: unknown },
  ) {
    super(`Malformed message from analyzer: ${detail}`, options);
  }
}

export class RequestTimeout extends BridgeError {
  readonly kind = 'RequestTimeout';

  constructor(
    readonly method: string,
    readonly requestId: JsonRpcId,
    readonly timeoutMs: number,
  ) {
    super(`Request '${method}' (id=${String(requestId)}) timed out after ${timeoutMs}ms`);
  }
}

export class UnknownCommand extends BridgeError {
  readonly kind = 'UnknownCommand';

  constructor(readonly command: string) {
    super(`Unknown command: ${command}`);
  }
}

export class InvalidArguments extends BridgeError {
  readonly kind = 'InvalidArguments';

  constructor(
    readonly command: string,
    readonly issues: readonly string[],
  ) {
    super(`Invalid arguments for '${command}': ${issues.join('; ')}`);
  }
}

export class DuplicateCommand extends BridgeError {
  readonly kind = 'DuplicateCommand';

  constructor(readonly command: string) {
    super(`Command '${command}' is already registered`);
  }
}

export class AnalyzerReportedError extends BridgeError {
  readonly kind = 'AnalyzerReportedError';

  constructor(
    message: string,
    readonly code?: number,
    readonly data?: unknown,
  ) {
    super(message);
  }
}

export class CommandCancelled extends BridgeError {
  readonly kind = 'CommandCancelled';

  constructor(readonly command?: string) {
    super(
      command === undefined
        ? 'Command cancelled'
        : `Command '${command}' cancelled`,
    );
  }
}

export class CommandFailed extends BridgeError {
  readonly kind = 'CommandFailed';

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export function isBridgeError(error: unknown): error is BridgeError {
  return error instanceof BridgeError;
}

export function toBridgeError(error: unknown): BridgeError {
  if (error instanceof BridgeError) {
    return error;
  }
  const message = error instanceof Error ? error.message : String(error);
  return new CommandFailed(message, { cause: error });
}

/** One-line rendering used by the tool channels. */
export function describeError(error: BridgeError): string {
  return `${error.kind}: ${error.message}`;
}

export type CommandResult<T> =
  | { ok: true; value: T }
  | { ok: false; error: BridgeError };
