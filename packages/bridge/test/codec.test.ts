/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { describe, expect, it } from 'vitest';
import * as fc from 'fast-check';

import {
  classifyMessage,
  encodeMessage,
  MessageDecoder,
  salvageId,
  type DecodeResult,
} from '../src/protocol/codec.js';
import { frame } from './fixtures/results.js';

const errorMessages = (results: DecodeResult[]): string[] =>
  results.flatMap((result) => (result.ok ? [] : [result.error.message]));

const messages = (results: DecodeResult[]) =>
  results.flatMap((result) => (result.ok ? [result.message] : []));

describe('encodeMessage', () => {
  it('prefixes the body with its byte length', () => {
    const encoded = encodeMessage({ jsonrpc: '2.0', method: 'exit', params: null });

    expect(encoded.toString('utf8')).toBe(
      'Content-Length: 47\r\n\r\n{"jsonrpc":"2.0","method":"exit","params":null}',
    );
  });

  it('counts multi-byte characters in bytes, not code units', () => {
    const encoded = encodeMessage({ jsonrpc: '2.0', id: 1, result: 'é' });
    const body = '{"jsonrpc":"2.0","id":1,"result":"é"}';

    expect(encoded.toString('utf8')).toBe(`Content-Length: ${Buffer.byteLength(body)}\r\n\r\n${body}`);
    expect(Buffer.byteLength(body)).toBe(body.length + 1);
  });
});

describe('MessageDecoder', () => {
  it('decodes a response, a request and a notification', () => {
    const decoder = new MessageDecoder();
    const input = [
      frame('{"jsonrpc":"2.0","id":1,"result":{"ok":true}}'),
      frame('{"jsonrpc":"2.0","id":"cfg","method":"workspace/configuration","params":{}}'),
      frame('{"jsonrpc":"2.0","method":"window/logMessage","params":{"type":3}}'),
    ].join('');

    expect(messages(decoder.feed(Buffer.from(input)))).toEqual([
      { type: 'response', id: 1, result: { ok: true } },
      { type: 'request', id: 'cfg', method: 'workspace/configuration', params: {} },
      { type: 'notification', method: 'window/logMessage', params: { type: 3 } },
    ]);
    expect(decoder.pendingBytes).toBe(0);
  });

  it('waits for the rest of a frame split across chunks', () => {
    const decoder = new MessageDecoder();
    const bytes = Buffer.from(frame('{"jsonrpc":"2.0","id":7,"result":null}'));

    expect(decoder.feed(bytes.subarray(0, 10))).toEqual([]);
    expect(decoder.feed(bytes.subarray(10, 30))).toEqual([]);
    expect(messages(decoder.feed(bytes.subarray(30)))).toEqual([
      { type: 'response', id: 7, result: null },
    ]);
  });

  it('accepts extra headers and any header name casing', () => {
    const decoder = new MessageDecoder();
    const body = '{"jsonrpc":"2.0","id":3,"result":1}';
    const input = `content-length: ${body.length}\r\nContent-Type: application/vscode-jsonrpc; charset=utf-8\r\n\r\n${body}`;

    expect(messages(decoder.feed(Buffer.from(input)))).toEqual([
      { type: 'response', id: 3, result: 1 },
    ]);
  });

  it('reports a body that is not JSON and keeps the salvaged id', () => {
    const decoder = new MessageDecoder();

    const [result] = decoder.feed(Buffer.from(frame('{"jsonrpc":"2.0","id":12,"result":')));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.requestId).toBe(12);
      expect(result.error.message.startsWith('Malformed message from analyzer: invalid JSON body:')).toBe(
        true,
      );
    }
  });

  it('reports a header block without Content-Length and resumes at the next frame', () => {
    const decoder = new MessageDecoder();
    const input = `Content-Type: text/plain\r\n\r\n${frame('{"jsonrpc":"2.0","id":1,"result":2}')}`;

    const results = decoder.feed(Buffer.from(input));

    expect(errorMessages(results)).toEqual([
      'Malformed message from analyzer: missing Content-Length header',
    ]);
    expect(messages(results)).toEqual([{ type: 'response', id: 1, result: 2 }]);
  });

  it('rejects a non-numeric Content-Length', () => {
    const decoder = new MessageDecoder();

    const results = decoder.feed(Buffer.from('Content-Length: ten\r\n\r\n'));

    expect(errorMessages(results)).toEqual([
      "Malformed message from analyzer: invalid Content-Length 'ten'",
    ]);
  });

  it('skips unframed output before a header', () => {
    const decoder = new MessageDecoder();
    const input = `garbage line\n${frame('{"jsonrpc":"2.0","id":4,"result":true}')}`;

    const results = decoder.feed(Buffer.from(input));

    expect(errorMessages(results)).toEqual([
      'Malformed message from analyzer: discarded 13 bytes of unframed output',
    ]);
    expect(messages(results)).toEqual([{ type: 'response', id: 4, result: true }]);
  });

  it('starts clean after reset', () => {
    const decoder = new MessageDecoder();
    decoder.feed(Buffer.from('Content-Length: 40\r\n\r\n{"partial'));

    decoder.reset();

    expect(decoder.pendingBytes).toBe(0);
    expect(messages(decoder.feed(Buffer.from(frame('{"jsonrpc":"2.0","id":1,"result":0}'))))).toEqual([
      { type: 'response', id: 1, result: 0 },
    ]);
  });

  it('decodes any sequence of encoded messages however the bytes are chunked', () => {
    const message = fc.oneof(
      fc.record({
        jsonrpc: fc.constant<'2.0'>('2.0'),
        id: fc.nat(),
        result: fc.oneof(fc.string(), fc.integer(), fc.constant(null)),
      }),
      fc.record({
        jsonrpc: fc.constant<'2.0'>('2.0'),
        method: fc.string({ minLength: 1 }),
        params: fc.dictionary(fc.string(), fc.string()),
      }),
    );

    fc.assert(
      fc.property(fc.array(message, { maxLength: 5 }), fc.integer({ min: 1, max: 17 }), (sent, size) => {
        const bytes = Buffer.concat(sent.map((item) => encodeMessage(item)));
        const decoder = new MessageDecoder();
        const results: DecodeResult[] = [];
        for (let offset = 0; offset < bytes.length; offset += size) {
          results.push(...decoder.feed(bytes.subarray(offset, offset + size)));
        }
        expect(results.every((result) => result.ok)).toBe(true);
        expect(results).toHaveLength(sent.length);
        expect(decoder.pendingBytes).toBe(0);
      }),
    );
  });
});

describe('classifyMessage', () => {
  it('rejects a wrong protocol version but keeps the id', () => {
    const result = classifyMessage({ jsonrpc: '1.0', id: 5, result: null });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.requestId).toBe(5);
      expect(result.error.message).toBe(
        "Malformed message from analyzer: missing or unsupported 'jsonrpc' version",
      );
    }
  });

  it('rejects a response error without a numeric code', () => {
    const result = classifyMessage({ jsonrpc: '2.0', id: 2, error: { message: 'x' } });

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe(
        'Malformed message from analyzer: response error is missing a numeric code or a message',
      );
    }
  });

  it('keeps error data on response errors', () => {
    expect(
      classifyMessage({ jsonrpc: '2.0', id: 2, error: { code: -32801, message: 'modified', data: 1 } }),
    ).toEqual({
      ok: true,
      message: { type: 'response', id: 2, error: { code: -32801, message: 'modified', data: 1 } },
    });
  });
});

describe('salvageId', () => {
  it('finds numeric and string ids', () => {
    expect(salvageId('{"id": 42, "result": [')).toBe(42);
    expect(salvageId('{"id":"abc","result"')).toBe('abc');
  });

  it('returns undefined when there is no id', () => {
    expect(salvageId('{"method":"x"')).toBeUndefined();
  });
});
