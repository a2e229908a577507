/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Readable, Writable } from 'node:stream';

import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { describeError, type CommandResult } from '../errors.js';
import { CLIENT_VERSION } from '../service/session.js';
import type { Bridge } from '../service/bridge.js';
import type { CommandOutput } from '../types.js';

export const MCP_SERVER_NAME = 'rust-analyzer-bridge';

type TextResult = {
  content: [{ type: 'text'; text: string }];
  isError?: boolean;
};

const toTextResult = (text: string, isError = false): TextResult => ({
  content: [{ type: 'text', text }],
  ...(isError ? { isError: true } : {}),
});

/** Failures are reported inside the tool result, never as protocol errors. */
export function renderCommandResult(result: CommandResult<CommandOutput>): TextResult {
  return result.ok
    ? toTextResult(result.value.text)
    : toTextResult(`Error: ${describeError(result.error)}`, true);
}

/** An MCP server exposing every registered command as a tool. Not connected. */
export function buildMcpServer(bridge: Bridge): McpServer {
  const server = new McpServer({ name: MCP_SERVER_NAME, version: CLIENT_VERSION });

  for (const descriptor of bridge.registry.list()) {
    server.tool(
      descriptor.name,
      descriptor.description,
      descriptor.argsShape,
      async (args, extra) =>
        renderCommandResult(
          await bridge.execute(descriptor.name, args, { signal: extra.signal }),
        ),
    );
  }
  return server;
}

export async function createMcpChannel(
  bridge: Bridge,
  inputStream: Readable,
  outputStream: Writable,
): Promise<McpServer> {
  const server = buildMcpServer(bridge);
  const transport = new StdioServerTransport(inputStream, outputStream);
  await server.connect(transport);
  return server;
}
