#!/usr/bin/env node
/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { stderr } from 'node:process';

import {
  createMessageConnection,
  StreamMessageReader,
  StreamMessageWriter,
  type MessageConnection,
} from 'vscode-jsonrpc/node.js';

import { createMcpChannel } from './channels/mcp-channel.js';
import { setupRpcChannel } from './channels/rpc-channel.js';
import { loadBridgeConfig, type BridgeConfig } from './config.js';
import { DebugLogger } from './debug/DebugLogger.js';
import { createBridge } from './service/bridge.js';

const logger = DebugLogger.getLogger('main');

const fatal = (message: string): never => {
  stderr.write(`${message}\n`);
  process.exit(1);
  throw new Error(message);
};

const createRpcConnection = (): MessageConnection =>
  createMessageConnection(
    new StreamMessageReader(process.stdin),
    new StreamMessageWriter(process.stdout),
  );

function loadConfigOrExit(argv: readonly string[]): BridgeConfig {
  try {
    return loadBridgeConfig({ argv });
  } catch (error) {
    return fatal(error instanceof Error ? error.message : String(error));
  }
}

export async function main(argv: readonly string[] = process.argv.slice(2)): Promise<void> {
  const config = loadConfigOrExit(argv);
  const bridge = createBridge(config);

  try {
    await bridge.start();
  } catch (error) {
    fatal(`Failed to start analyzer: ${error instanceof Error ? error.message : String(error)}`);
  }

  let closeChannel: () => Promise<void>;
  if (config.channel === 'rpc') {
    const connection = createRpcConnection();
    setupRpcChannel(connection, bridge);
    connection.listen();
    closeChannel = async () => connection.dispose();
    connection.sendNotification('bridge/ready').catch((error: unknown) => {
      logger.warn(() => `ready notification failed: ${String(error)}`);
    });
  } else {
    const server = await createMcpChannel(bridge, process.stdin, process.stdout);
    closeChannel = () => server.close();
  }
  logger.log(() => `serving ${config.channel} channel for ${config.workspaceRoot}`);

  let shuttingDown = false;
  const shutdown = async (): Promise<void> => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;

    try {
      await bridge.shutdown();
      await closeChannel();
    } catch (error) {
      stderr.write(`Error during shutdown: ${String(error)}\n`);
    }
    process.exit(0);
  };

  process.on('SIGTERM', () => {
    void shutdown();
  });

  process.on('SIGINT', () => {
    void shutdown();
  });

  process.stdin.on('end', () => {
    void shutdown();
  });

  process.on('uncaughtException', (error) => {
    stderr.write(`Uncaught exception in analyzer bridge: ${String(error)}\n`);
    void shutdown();
  });

  process.on('unhandledRejection', (error) => {
    stderr.write(`Unhandled rejection in analyzer bridge: ${String(error)}\n`);
  });
}

const isMainModule = (): boolean => {
  const argvEntry = process.argv[1];
  if (!argvEntry || !import.meta.url.startsWith('file://')) {
    return false;
  }

  try {
    return import.meta.url === new URL(argvEntry, 'file://').href;
  } catch {
    return false;
  }
};

if (isMainModule()) {
  void main().catch((error) => {
    stderr.write(`Fatal error in analyzer bridge: ${String(error)}\n`);
    process.exit(1);
  });
}
