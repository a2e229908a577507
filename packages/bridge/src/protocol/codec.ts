/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * LSP base-protocol framing: an ASCII header block terminated by an empty
 * line, carrying at least `Content-Length`, followed by a UTF-8 JSON body of
 * exactly that many bytes.
 */

import { MalformedMessage } from '../errors.js';
import type {
  IncomingMessage,
  JsonRpcId,
  JsonRpcResponseError,
  OutgoingMessage,
} from '../types.js';

// ─── Constants ───────────────────────────────────────────────────────────────

export const MAX_HEADER_SIZE = 8 * 1024;
export const MAX_FRAME_SIZE = 64 * 1024 * 1024;

const HEADER_DELIMITER = Buffer.from('\r\n\r\n', 'ascii');
const HEADER_PREFIX = 'content-';
const ID_PATTERN = /"id"\s*:\s*(-?\d+|"(?:[^"\\]|\\.)*")/;

export type DecodeResult =
  | { ok: true; message: IncomingMessage }
  | { ok: false; error: MalformedMessage };

// ─── Encoding ────────────────────────────────────────────────────────────────

export function encodeMessage(message: OutgoingMessage): Buffer {
  const body = Buffer.from(JSON.stringify(message), 'utf8');
  const header = Buffer.from(`Content-Length: ${body.length}\r\n\r\n`, 'ascii');
  return Buffer.concat([header, body]);
}

// ─── Decoding helpers ────────────────────────────────────────────────────────

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const isId = (value: unknown): value is JsonRpcId =>
  (typeof value === 'number' && Number.isInteger(value)) ||
  typeof value === 'string';

const malformed = (detail: string, id?: JsonRpcId): DecodeResult => ({
  ok: false,
  error: new MalformedMessage(detail, id),
});

/** Returns the declared body length, or a description of what is wrong. */
function parseContentLength(headerBlock: string): number | string {
  let contentLength: number | undefined;
  for (const line of headerBlock.split('\r\n')) {
    const separator = line.indexOf(':');
    if (separator <= 0) {
      return `invalid header line '${line}'`;
    }
    const name = line.slice(0, separator).trim().toLowerCase();
    const value = line.slice(separator + 1).trim();
    if (name === 'content-length') {
      if (!/^\d+$/.test(value)) {
        return `invalid Content-Length '${value}'`;
      }
      contentLength = Number(value);
    }
  }
  return contentLength ?? 'missing Content-Length header';
}

/** Best-effort recovery of the id from a body that failed to parse. */
export function salvageId(body: string): JsonRpcId | undefined {
  const match = ID_PATTERN.exec(body);
  if (!match) {
    return undefined;
  }
  const raw = match[1];
  if (!raw.startsWith('"')) {
    return Number(raw);
  }
  try {
    const parsed: unknown = JSON.parse(raw);
    return typeof parsed === 'string' ? parsed : undefined;
  } catch {
    return undefined;
  }
}

function parseResponseError(value: unknown): JsonRpcResponseError | undefined {
  if (
    !isRecord(value) ||
    typeof value.code !== 'number' ||
    typeof value.message !== 'string'
  ) {
    return undefined;
  }
  return value.data === undefined
    ? { code: value.code, message: value.message }
    : { code: value.code, message: value.message, data: value.data };
}

export function classifyMessage(value: unknown): DecodeResult {
  if (!isRecord(value)) {
    return malformed('message is not a JSON object');
  }
  const id = isId(value.id) ? value.id : undefined;
  if (value.jsonrpc !== '2.0') {
    return malformed("missing or unsupported 'jsonrpc' version", id);
  }

  if (typeof value.method === 'string') {
    if (value.id === undefined) {
      return {
        ok: true,
        message: { type: 'notification', method: value.method, params: value.params },
      };
    }
    if (id === undefined) {
      return malformed(`request '${value.method}' has an invalid id`);
    }
    return {
      ok: true,
      message: { type: 'request', id, method: value.method, params: value.params },
    };
  }

  if (!('id' in value)) {
    return malformed('message is neither a request, a notification nor a response');
  }
  if (id === undefined && value.id !== null) {
    return malformed('response has an invalid id');
  }
  const responseId = id ?? null;

  if ('error' in value) {
    const error = parseResponseError(value.error);
    if (!error) {
      return malformed('response error is missing a numeric code or a message', id);
    }
    return { ok: true, message: { type: 'response', id: responseId, error } };
  }
  if ('result' in value) {
    return {
      ok: true,
      message: { type: 'response', id: responseId, result: value.result },
    };
  }
  return malformed('response has neither result nor error', id);
}

function decodeBody(body: string): DecodeResult {
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    return {
      ok: false,
      error: new MalformedMessage(`invalid JSON body: ${detail}`, salvageId(body), {
        cause: error,
      }),
    };
  }
  return classifyMessage(parsed);
}

// ─── MessageDecoder Class ────────────────────────────────────────────────────

/**
 * Incremental decoder for the analyzer's stdout. Framing errors never throw:
 * they come back as `MalformedMessage` results and decoding resumes at the
 * next header.
 */
export class MessageDecoder {
  private buffer: Buffer = Buffer.alloc(0);
  private skipBytes = 0;

  feed(chunk: Buffer): DecodeResult[] {
    this.buffer =
      this.buffer.length === 0 ? chunk : Buffer.concat([this.buffer, chunk]);
    const results: DecodeResult[] = [];

    while (this.buffer.length > 0) {
      if (this.skipBytes > 0) {
        const skipped = Math.min(this.skipBytes, this.buffer.length);
        this.buffer = this.buffer.subarray(skipped);
        this.skipBytes -= skipped;
        continue;
      }

      if (!this.alignToHeader(results)) {
        break;
      }

      const headerEnd = this.buffer.indexOf(HEADER_DELIMITER);
      if (headerEnd === -1) {
        if (this.buffer.length > MAX_HEADER_SIZE) {
          results.push(malformed(`header block exceeds ${MAX_HEADER_SIZE} bytes`));
          // Drop the start so the next alignment looks for a later header.
          this.buffer = this.buffer.subarray(HEADER_PREFIX.length);
          continue;
        }
        break;
      }

      const bodyStart = headerEnd + HEADER_DELIMITER.length;
      const contentLength = parseContentLength(
        this.buffer.subarray(0, headerEnd).toString('ascii'),
      );
      if (typeof contentLength === 'string') {
        results.push(malformed(contentLength));
        this.buffer = this.buffer.subarray(bodyStart);
        continue;
      }
      if (contentLength > MAX_FRAME_SIZE) {
        results.push(
          malformed(`frame of ${contentLength} bytes exceeds ${MAX_FRAME_SIZE} bytes`),
        );
        this.buffer = this.buffer.subarray(bodyStart);
        this.skipBytes = contentLength;
        continue;
      }
      if (this.buffer.length < bodyStart + contentLength) {
        break;
      }

      const body = this.buffer.subarray(bodyStart, bodyStart + contentLength);
      this.buffer = this.buffer.subarray(bodyStart + contentLength);
      results.push(decodeBody(body.toString('utf8')));
    }

    return results;
  }

  /** Bytes received but not yet consumed as a complete frame. */
  get pendingBytes(): number {
    return this.buffer.length;
  }

  reset(): void {
    this.buffer = Buffer.alloc(0);
    this.skipBytes = 0;
  }

  /**
   * Moves the buffer to the start of the next header block. Returns false
   * when more input is needed before a header can be recognized.
   */
  private alignToHeader(results: DecodeResult[]): boolean {
    const probe = this.buffer
      .subarray(0, HEADER_PREFIX.length)
      .toString('latin1')
      .toLowerCase();
    if (probe === HEADER_PREFIX) {
      return true;
    }
    if (HEADER_PREFIX.startsWith(probe)) {
      return false;
    }

    const lower = this.buffer.toString('latin1').toLowerCase();
    const next = lower.indexOf(HEADER_PREFIX, 1);
    const keep = next === -1 ? Math.min(this.buffer.length, HEADER_PREFIX.length - 1) : 0;
    const cut = next === -1 ? this.buffer.length - keep : next;
    const discarded = this.buffer.subarray(0, cut).toString('utf8');
    this.buffer = this.buffer.subarray(cut);
    if (discarded.trim().length > 0) {
      results.push(malformed(`discarded ${cut} bytes of unframed output`));
    }
    return next !== -1;
  }
}
