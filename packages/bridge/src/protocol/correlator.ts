/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { DebugLogger } from '../debug/DebugLogger.js';
import {
  CommandCancelled,
  RequestTimeout,
  type BridgeError,
} from '../errors.js';
import type { JsonRpcId, OutgoingMessage } from '../types.js';

export interface SendOptions {
  timeoutMs: number;
  signal?: AbortSignal;
  /** Name of the command the request belongs to, for logs and errors. */
  command?: string;
}

export interface PendingRequest {
  readonly id: number;
  readonly method: string;
  readonly command?: string;
  readonly createdAt: number;
  readonly result: Promise<unknown>;
}

type Slot = {
  method: string;
  command?: string;
  resolve: (value: unknown) => void;
  reject: (error: BridgeError) => void;
  cleanup: () => void;
  /** Set once the caller aborts; the slot then settles with this error. */
  cancelled?: CommandCancelled;
};

/**
 * Owns the id space and the table of in-flight requests. Every slot settles
 * exactly once; whatever arrives for an id that is no longer pending is
 * logged and dropped.
 *
 * An aborted request stays pending until the analyzer answers it (or its
 * timeout fires), so the exchange is over before the caller sees
 * `CommandCancelled`.
 */
export class RequestCorrelator {
  private readonly logger = DebugLogger.getLogger('correlator');
  private readonly pending = new Map<number, Slot>();
  private nextId = 1;

  constructor(private readonly write: (message: OutgoingMessage) => void) {}

  get size(): number {
    return this.pending.size;
  }

  has(id: JsonRpcId): boolean {
    return typeof id === 'number' && this.pending.has(id);
  }

  send(method: string, params: unknown, options: SendOptions): PendingRequest {
    const id = this.nextId++;
    const createdAt = Date.now();
    const { timeoutMs, signal, command } = options;

    const result = new Promise<unknown>((resolve, reject) => {
      let timer: ReturnType<typeof setTimeout> | null = null;

      const onAbort = (): void => {
        const slot = this.pending.get(id);
        if (!slot || slot.cancelled) {
          return;
        }
        slot.cancelled = new CommandCancelled(command);
        this.logger.debug(() => `${method} (id=${id}) cancelled, awaiting reply`);
        this.cancelRemote(id);
      };

      const cleanup = (): void => {
        if (timer !== null) {
          clearTimeout(timer);
          timer = null;
        }
        signal?.removeEventListener('abort', onAbort);
      };

      this.pending.set(id, { method, command, resolve, reject, cleanup });

      if (signal?.aborted) {
        this.reject(id, new CommandCancelled(command));
        return;
      }

      timer = setTimeout(() => {
        timer = null;
        const alreadyCancelled = this.pending.get(id)?.cancelled !== undefined;
        if (this.reject(id, new RequestTimeout(method, id, timeoutMs)) && !alreadyCancelled) {
          this.logger.warn(() => `${method} (id=${id}) timed out after ${timeoutMs}ms`);
          this.cancelRemote(id);
        }
      }, timeoutMs);
      signal?.addEventListener('abort', onAbort, { once: true });

      this.logger.debug(() => `--> ${method} (id=${id})`);
      try {
        this.write({ jsonrpc: '2.0', id, method, params });
      } catch (error) {
        this.pending.delete(id);
        cleanup();
        reject(error);
      }
    });

    return { id, method, command, createdAt, result };
  }

  /** Returns false when `id` matches no pending request. */
  resolve(id: JsonRpcId | null, value: unknown): boolean {
    const slot = this.take(id);
    if (!slot) {
      this.logger.debug(() => `dropping response for unknown id ${String(id)}`);
      return false;
    }
    this.logger.debug(() => `<-- ${slot.method} (id=${String(id)})`);
    if (slot.cancelled) {
      slot.reject(slot.cancelled);
    } else {
      slot.resolve(value);
    }
    return true;
  }

  reject(id: JsonRpcId | null, error: BridgeError): boolean {
    const slot = this.take(id);
    if (!slot) {
      this.logger.debug(
        () => `dropping error for unknown id ${String(id)}: ${error.message}`,
      );
      return false;
    }
    slot.reject(slot.cancelled ?? error);
    return true;
  }

  /** Fails every request still in flight, honouring earlier cancellations. */
  rejectPending(error: BridgeError): number {
    let count = 0;
    for (const id of [...this.pending.keys()]) {
      if (this.reject(id, error)) {
        count += 1;
      }
    }
    return count;
  }

  rejectAll(error: BridgeError): void {
    const slots = [...this.pending.values()];
    this.pending.clear();
    for (const slot of slots) {
      slot.cleanup();
      slot.reject(error);
    }
  }

  private take(id: JsonRpcId | null): Slot | undefined {
    if (typeof id !== 'number') {
      return undefined;
    }
    const slot = this.pending.get(id);
    if (!slot) {
      return undefined;
    }
    this.pending.delete(id);
    slot.cleanup();
    return slot;
  }

  private cancelRemote(id: number): void {
    try {
      this.write({ jsonrpc: '2.0', method: '$/cancelRequest', params: { id } });
    } catch (error) {
      this.logger.warn(
        () => `failed to send $/cancelRequest for id ${id}: ${String(error)}`,
      );
    }
  }
}
