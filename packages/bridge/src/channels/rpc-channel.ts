/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { CancellationToken, type MessageConnection } from 'vscode-jsonrpc/node.js';
import { z } from 'zod';

import { formatIssues } from '../commands/registry.js';
import { DebugLogger } from '../debug/DebugLogger.js';
import { InvalidArguments, toBridgeError, type BridgeErrorKind } from '../errors.js';
import type { Bridge } from '../service/bridge.js';
import type { CommandOutput } from '../types.js';

const ExecuteParamsSchema = z.object({
  command: z.string().min(1),
  args: z.record(z.unknown()).optional(),
});

export type RpcError = { kind: BridgeErrorKind; message: string };

export type ExecuteResponse =
  | { ok: true; output: CommandOutput }
  | { ok: false; error: RpcError };

export type LifecycleResponse = { ok: true } | { ok: false; error: RpcError };

const logger = DebugLogger.getLogger('rpc');

const toRpcError = (error: unknown): RpcError => {
  const bridgeError = toBridgeError(error);
  return { kind: bridgeError.kind, message: bridgeError.message };
};

function abortSignalFor(token: CancellationToken | undefined): AbortSignal {
  const controller = new AbortController();
  if (token?.isCancellationRequested) {
    controller.abort();
  } else {
    token?.onCancellationRequested(() => controller.abort());
  }
  return controller.signal;
}

async function lifecycle(
  name: string,
  operation: () => Promise<void>,
): Promise<LifecycleResponse> {
  try {
    await operation();
    return { ok: true };
  } catch (error) {
    const rpcError = toRpcError(error);
    logger.warn(() => `${name} failed: ${rpcError.message}`);
    return { ok: false, error: rpcError };
  }
}

/**
 * Host-facing JSON-RPC surface. Command failures come back inside the
 * response; `$/cancelRequest` from the host cancels a running command.
 */
export function setupRpcChannel(connection: MessageConnection, bridge: Bridge): void {
  connection.onRequest(
    'bridge/execute',
    async (...received: unknown[]): Promise<ExecuteResponse> => {
      // Without params the connection passes the token first.
      const token = received.find(CancellationToken.is);
      const params = CancellationToken.is(received[0]) ? undefined : received[0];
      const parsed = ExecuteParamsSchema.safeParse(params ?? {});
      if (!parsed.success) {
        const error = new InvalidArguments('bridge/execute', formatIssues(parsed.error));
        return { ok: false, error: toRpcError(error) };
      }
      const { command, args } = parsed.data;
      const result = await bridge.execute(command, args ?? {}, {
        signal: abortSignalFor(token),
      });
      return result.ok
        ? { ok: true, output: result.value }
        : { ok: false, error: toRpcError(result.error) };
    },
  );

  connection.onRequest('bridge/commands', () => bridge.listCommands());

  connection.onRequest('bridge/status', () => bridge.status());

  connection.onRequest('bridge/restart', () =>
    lifecycle('restart', () => bridge.restart()),
  );

  connection.onRequest('bridge/shutdown', () =>
    lifecycle('shutdown', () => bridge.shutdown()),
  );
}
