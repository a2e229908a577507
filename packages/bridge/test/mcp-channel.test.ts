/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { CallToolResultSchema } from '@modelcontextprotocol/sdk/types.js';
import { afterEach, describe, expect, it } from 'vitest';

import { buildMcpServer, MCP_SERVER_NAME, renderCommandResult } from '../src/channels/mcp-channel.js';
import { UnknownCommand } from '../src/errors.js';
import { createHarness, type Harness } from './fixtures/workspace.js';

let harness: Harness | undefined;
let client: Client | undefined;

async function connect(): Promise<{ client: Client; harness: Harness }> {
  harness = await createHarness((ws) => ({
    requests: {
      'textDocument/definition': () => ({
        uri: ws.uri('src/lib.rs'),
        range: { start: { line: 4, character: 11 }, end: { line: 4, character: 16 } },
      }),
    },
  }));
  const server = buildMcpServer(harness.bridge);
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connect(serverTransport);
  client = new Client({ name: 'test-client', version: '0.0.0' });
  await client.connect(clientTransport);
  return { client, harness };
}

async function callText(target: Client, name: string, args: Record<string, unknown>) {
  const result = CallToolResultSchema.parse(await target.callTool({ name, arguments: args }));
  const [first] = result.content;
  return {
    text: first?.type === 'text' ? first.text : undefined,
    isError: result.isError === true,
  };
}

afterEach(async () => {
  await client?.close();
  client = undefined;
  await harness?.dispose();
  harness = undefined;
});

describe('renderCommandResult', () => {
  it('renders output text and failures as text content', () => {
    expect(renderCommandResult({ ok: true, value: { kind: 'text', text: 'done' } })).toEqual({
      content: [{ type: 'text', text: 'done' }],
    });
    expect(renderCommandResult({ ok: false, error: new UnknownCommand('nope') })).toEqual({
      content: [{ type: 'text', text: 'Error: UnknownCommand: Unknown command: nope' }],
      isError: true,
    });
  });
});

describe('MCP channel', () => {
  it('identifies itself and lists every command as a tool', async () => {
    const { client: mcp } = await connect();

    const { tools } = await mcp.listTools();

    expect(mcp.getServerVersion()?.name).toBe(MCP_SERVER_NAME);
    expect(tools).toHaveLength(24);
    const definition = tools.find((tool) => tool.name === 'find_definition');
    expect(definition?.description).toBe('Find where the symbol at a position is defined');
    expect(Object.keys(definition?.inputSchema.properties ?? {})).toEqual([
      'file_path',
      'line',
      'character',
    ]);
  });

  it('runs a command and returns its text', async () => {
    const { client: mcp } = await connect();

    const result = await callText(mcp, 'find_definition', {
      file_path: 'src/lib.rs',
      line: 0,
      character: 7,
    });

    expect(result).toEqual({ text: 'src/lib.rs:4:11', isError: false });
  });

  it('reports command failures inside the tool result', async () => {
    const { client: mcp, harness: h } = await connect();

    const result = await callText(mcp, 'hover', {
      file_path: 'src/missing.rs',
      line: 0,
      character: 0,
    });

    expect(result).toEqual({
      text: "Error: InvalidArguments: Invalid arguments for 'hover': file_path: file 'src/missing.rs' does not exist",
      isError: true,
    });
    expect(h.spawner.calls).toHaveLength(0);
  });
});
