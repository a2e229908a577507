/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';

import { defineCommand, type CommandDescriptor } from './registry.js';
import {
  FILE_POSITION,
  fileArgs,
  filePositionArgs,
  positionParams,
  textDocument,
} from './common.js';
import {
  formatLocations,
  formatSymbols,
  parseHover,
  parseLocations,
  parseSymbols,
} from './results.js';

const CODE_BLOCK = /```[a-z]*\n([\s\S]*?)```/g;

/** The code blocks of a markdown hover, or its text when it has none. */
export function hoverSignature(markdown: string): string {
  const blocks = [...markdown.matchAll(CODE_BLOCK)].map((match) =>
    match[1].trim(),
  );
  if (blocks.length > 0) {
    return blocks.join('\n');
  }
  return markdown.split('\n---')[0].trim();
}

export const findDefinition = defineCommand({
  name: 'find_definition',
  description: 'Find where the symbol at a position is defined',
  args: filePositionArgs,
  timeout: 'navigation',
  paths: { file_path: 'document' },
  positions: [FILE_POSITION],
  steps: (args) => [
    {
      kind: 'request',
      id: 'definition',
      method: 'textDocument/definition',
      params: () => positionParams(args.file_path, args.line, args.character),
    },
  ],
  extract: (_args, ctx) => {
    const locations = parseLocations(ctx.result('definition'));
    return {
      kind: 'locations',
      locations,
      text: formatLocations(locations, ctx.workspaceRoot, 'No definition found'),
    };
  },
});

export const findReferences = defineCommand({
  name: 'find_references',
  description: 'Find all references to the symbol at a position',
  args: {
    ...filePositionArgs,
    include_declaration: z
      .boolean()
      .default(true)
      .describe('Include the declaration itself'),
  },
  timeout: 'navigation',
  paths: { file_path: 'document' },
  positions: [FILE_POSITION],
  steps: (args) => [
    {
      kind: 'request',
      id: 'references',
      method: 'textDocument/references',
      params: () => ({
        ...positionParams(args.file_path, args.line, args.character),
        context: { includeDeclaration: args.include_declaration },
      }),
    },
  ],
  extract: (_args, ctx) => {
    const locations = parseLocations(ctx.result('references'));
    return {
      kind: 'locations',
      locations,
      text: formatLocations(locations, ctx.workspaceRoot, 'No references found'),
    };
  },
});

export const hover = defineCommand({
  name: 'hover',
  description: 'Show type and documentation for the symbol at a position',
  args: filePositionArgs,
  timeout: 'navigation',
  paths: { file_path: 'document' },
  positions: [FILE_POSITION],
  steps: (args) => [
    {
      kind: 'request',
      id: 'hover',
      method: 'textDocument/hover',
      params: () => positionParams(args.file_path, args.line, args.character),
    },
  ],
  extract: (_args, ctx) => ({
    kind: 'text',
    text: parseHover(ctx.result('hover')) ?? 'No hover information',
  }),
});

export const documentSymbols = defineCommand({
  name: 'document_symbols',
  description: 'List the symbols declared in a file',
  args: fileArgs,
  timeout: 'navigation',
  paths: { file_path: 'document' },
  steps: (args) => [
    {
      kind: 'request',
      id: 'symbols',
      method: 'textDocument/documentSymbol',
      params: () => ({ textDocument: textDocument(args.file_path) }),
    },
  ],
  extract: (args, ctx) => {
    const symbols = parseSymbols(ctx.result('symbols'), args.file_path);
    return {
      kind: 'symbols',
      symbols,
      text: formatSymbols(symbols, ctx.workspaceRoot),
    };
  },
});

export const workspaceSymbols = defineCommand({
  name: 'workspace_symbols',
  description: 'Search symbols across the workspace',
  args: { query: z.string().describe('Symbol name or fragment') },
  timeout: 'navigation',
  steps: (args) => [
    {
      kind: 'request',
      id: 'symbols',
      method: 'workspace/symbol',
      params: () => ({ query: args.query }),
    },
  ],
  extract: (_args, ctx) => {
    const symbols = parseSymbols(ctx.result('symbols'));
    return {
      kind: 'symbols',
      symbols,
      text: formatSymbols(symbols, ctx.workspaceRoot),
    };
  },
});

export const getTypeHierarchy = defineCommand({
  name: 'get_type_hierarchy',
  description:
    'Show the type at a position together with its implementations',
  args: filePositionArgs,
  timeout: 'navigation',
  paths: { file_path: 'document' },
  positions: [FILE_POSITION],
  steps: (args) => [
    {
      kind: 'request',
      id: 'hover',
      method: 'textDocument/hover',
      optional: true,
      params: () => positionParams(args.file_path, args.line, args.character),
    },
    {
      kind: 'request',
      id: 'implementations',
      method: 'textDocument/implementation',
      params: () => positionParams(args.file_path, args.line, args.character),
    },
  ],
  extract: (_args, ctx) => {
    const hoverText = parseHover(ctx.result('hover'));
    const locations = parseLocations(ctx.result('implementations'));
    const lines: string[] = [];
    if (hoverText) {
      lines.push(hoverSignature(hoverText));
    }
    if (locations.length === 0) {
      lines.push('No implementations found');
    } else {
      lines.push('Implementations:');
      lines.push(
        ...formatLocations(locations, ctx.workspaceRoot)
          .split('\n')
          .map((line) => `  ${line}`),
      );
    }
    return { kind: 'locations', locations, text: lines.join('\n') };
  },
});

export const navigationCommands: readonly CommandDescriptor[] = [
  findDefinition,
  findReferences,
  hover,
  documentSymbols,
  workspaceSymbols,
  getTypeHierarchy,
];
