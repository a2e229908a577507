/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';

import {
  CommandCancelled,
  CommandFailed,
  describeError,
  InvalidArguments,
  isBridgeError,
  RequestTimeout,
  toBridgeError,
  UnknownCommand,
} from '../src/errors.js';

describe('BridgeError', () => {
  it('carries a stable kind and the class name', () => {
    const error = new RequestTimeout('textDocument/hover', 7, 250);

    expect(error.kind).toBe('RequestTimeout');
    expect(error.name).toBe('RequestTimeout');
    expect(error.message).toBe("Request 'textDocument/hover' (id=7) timed out after 250ms");
    expect(isBridgeError(error)).toBe(true);
    expect(isBridgeError(new Error('plain'))).toBe(false);
  });

  it('joins argument issues into the message', () => {
    const error = new InvalidArguments('hover', ['line: Required', 'character: Required']);

    expect(describeError(error)).toBe(
      "InvalidArguments: Invalid arguments for 'hover': line: Required; character: Required",
    );
  });

  it('names the cancelled command when known', () => {
    expect(new CommandCancelled().message).toBe('Command cancelled');
    expect(new CommandCancelled('rename_symbol').message).toBe("Command 'rename_symbol' cancelled");
  });
});

describe('toBridgeError', () => {
  it('passes bridge errors through', () => {
    const error = new UnknownCommand('nope');

    expect(toBridgeError(error)).toBe(error);
  });

  it('wraps anything else as CommandFailed', () => {
    const cause = new TypeError('bad input');
    const wrapped = toBridgeError(cause);

    expect(wrapped).toBeInstanceOf(CommandFailed);
    expect(wrapped.message).toBe('bad input');
    expect(wrapped.cause).toBe(cause);
    expect(toBridgeError('text failure').message).toBe('text failure');
  });
});
