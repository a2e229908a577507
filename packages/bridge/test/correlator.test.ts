/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach, describe, expect, it, vi } from 'vitest';

import { AnalyzerReportedError, SessionTerminated } from '../src/errors.js';
import { RequestCorrelator } from '../src/protocol/correlator.js';
import type { OutgoingMessage } from '../src/types.js';

function createCorrelator() {
  const written: OutgoingMessage[] = [];
  const correlator = new RequestCorrelator((message) => {
    written.push(message);
  });
  return { correlator, written };
}

afterEach(() => {
  vi.useRealTimers();
});

describe('RequestCorrelator', () => {
  it('allocates increasing ids starting at 1 and writes each request', () => {
    const { correlator, written } = createCorrelator();

    const first = correlator.send('textDocument/hover', { a: 1 }, { timeoutMs: 1000 });
    const second = correlator.send('textDocument/definition', null, { timeoutMs: 1000 });

    expect([first.id, second.id]).toEqual([1, 2]);
    expect(written).toEqual([
      { jsonrpc: '2.0', id: 1, method: 'textDocument/hover', params: { a: 1 } },
      { jsonrpc: '2.0', id: 2, method: 'textDocument/definition', params: null },
    ]);
    expect(correlator.size).toBe(2);
    correlator.rejectAll(new SessionTerminated('test over'));
    return Promise.allSettled([first.result, second.result]);
  });

  it('resolves the matching slot exactly once', async () => {
    const { correlator } = createCorrelator();
    const pending = correlator.send('m', null, { timeoutMs: 1000 });

    expect(correlator.resolve(pending.id, 'first')).toBe(true);
    expect(correlator.resolve(pending.id, 'second')).toBe(false);

    await expect(pending.result).resolves.toBe('first');
    expect(correlator.size).toBe(0);
  });

  it('ignores results for unknown, string and null ids', () => {
    const { correlator } = createCorrelator();

    expect(correlator.resolve(41, 'x')).toBe(false);
    expect(correlator.resolve('41', 'x')).toBe(false);
    expect(correlator.resolve(null, 'x')).toBe(false);
  });

  it('rejects with the error given', async () => {
    const { correlator } = createCorrelator();
    const pending = correlator.send('m', null, { timeoutMs: 1000 });

    correlator.reject(pending.id, new AnalyzerReportedError('content modified', -32801));

    await expect(pending.result).rejects.toMatchObject({
      kind: 'AnalyzerReportedError',
      message: 'content modified',
      code: -32801,
    });
  });

  it('times out and asks the analyzer to cancel', async () => {
    vi.useFakeTimers();
    const { correlator, written } = createCorrelator();
    const pending = correlator.send('workspace/symbol', {}, { timeoutMs: 250 });
    const outcome = expect(pending.result).rejects.toMatchObject({
      kind: 'RequestTimeout',
      message: "Request 'workspace/symbol' (id=1) timed out after 250ms",
    });

    await vi.advanceTimersByTimeAsync(250);

    await outcome;
    expect(written.at(-1)).toEqual({
      jsonrpc: '2.0',
      method: '$/cancelRequest',
      params: { id: 1 },
    });
    expect(correlator.resolve(1, 'late')).toBe(false);
  });

  it('does not time out once resolved', async () => {
    vi.useFakeTimers();
    const { correlator, written } = createCorrelator();
    const pending = correlator.send('m', null, { timeoutMs: 100 });
    correlator.resolve(pending.id, 1);

    await vi.advanceTimersByTimeAsync(500);

    await expect(pending.result).resolves.toBe(1);
    expect(written).toHaveLength(1);
  });

  it('keeps an aborted request pending until the analyzer answers it', async () => {
    const { correlator, written } = createCorrelator();
    const controller = new AbortController();
    const pending = correlator.send('m', null, {
      timeoutMs: 1000,
      signal: controller.signal,
      command: 'hover',
    });
    let settled = false;
    pending.result.then(
      () => (settled = true),
      () => (settled = true),
    );

    controller.abort();
    await Promise.resolve();

    expect(settled).toBe(false);
    expect(correlator.size).toBe(1);
    expect(written.map((message) => ('method' in message ? message.method : ''))).toEqual([
      'm',
      '$/cancelRequest',
    ]);

    expect(correlator.resolve(pending.id, 'late result')).toBe(true);
    await expect(pending.result).rejects.toMatchObject({
      kind: 'CommandCancelled',
      message: "Command 'hover' cancelled",
    });
    expect(correlator.size).toBe(0);
  });

  it('reports a cancelled request as cancelled when the analyzer rejects it', async () => {
    const { correlator } = createCorrelator();
    const controller = new AbortController();
    const pending = correlator.send('m', null, {
      timeoutMs: 1000,
      signal: controller.signal,
      command: 'hover',
    });

    controller.abort();
    correlator.reject(pending.id, new AnalyzerReportedError('request cancelled', -32800));

    await expect(pending.result).rejects.toMatchObject({ kind: 'CommandCancelled' });
  });

  it('settles a cancelled request at its timeout without a second cancel', async () => {
    vi.useFakeTimers();
    const { correlator, written } = createCorrelator();
    const controller = new AbortController();
    const pending = correlator.send('m', null, {
      timeoutMs: 250,
      signal: controller.signal,
      command: 'hover',
    });
    const outcome = expect(pending.result).rejects.toMatchObject({ kind: 'CommandCancelled' });

    controller.abort();
    await vi.advanceTimersByTimeAsync(250);

    await outcome;
    expect(written).toHaveLength(2);
    expect(correlator.size).toBe(0);
  });

  it('never writes a request whose signal is already aborted', async () => {
    const { correlator, written } = createCorrelator();

    const pending = correlator.send('m', null, {
      timeoutMs: 1000,
      signal: AbortSignal.abort(),
    });

    await expect(pending.result).rejects.toMatchObject({ kind: 'CommandCancelled' });
    expect(written).toEqual([]);
    expect(correlator.size).toBe(0);
  });

  it('rejects every pending slot on rejectAll', async () => {
    const { correlator } = createCorrelator();
    const first = correlator.send('a', null, { timeoutMs: 1000 });
    const second = correlator.send('b', null, { timeoutMs: 1000 });

    correlator.rejectAll(new SessionTerminated('analyzer exited (code=1, signal=null)'));

    const results = await Promise.allSettled([first.result, second.result]);
    expect(results.map((result) => result.status)).toEqual(['rejected', 'rejected']);
    await expect(first.result).rejects.toMatchObject({
      kind: 'SessionTerminated',
      message: 'Analyzer session terminated: analyzer exited (code=1, signal=null)',
    });
    expect(correlator.size).toBe(0);
  });

  it('fails whatever is in flight on rejectPending', async () => {
    const { correlator } = createCorrelator();
    const pending = correlator.send('textDocument/hover', null, { timeoutMs: 1000 });

    const failed = correlator.rejectPending(new AnalyzerReportedError('unreadable reply'));

    expect(failed).toBe(1);
    await expect(pending.result).rejects.toMatchObject({ message: 'unreadable reply' });
    expect(correlator.rejectPending(new AnalyzerReportedError('again'))).toBe(0);
  });

  it('fails the request when the write throws', async () => {
    const correlator = new RequestCorrelator(() => {
      throw new SessionTerminated('analyzer is not running');
    });

    const pending = correlator.send('m', null, { timeoutMs: 1000 });

    await expect(pending.result).rejects.toMatchObject({
      message: 'Analyzer session terminated: analyzer is not running',
    });
    expect(correlator.size).toBe(0);
  });
});
