/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// ─── JSON-RPC ────────────────────────────────────────────────────────────────

export type JsonRpcId = number | string;

export type JsonRpcRequest = {
  jsonrpc: '2.0';
  id: JsonRpcId;
  method: string;
  params?: unknown;
};

export type JsonRpcNotification = {
  jsonrpc: '2.0';
  method: string;
  params?: unknown;
};

export type JsonRpcResponseError = {
  code: number;
  message: string;
  data?: unknown;
};

export type JsonRpcResponse = {
  jsonrpc: '2.0';
  id: JsonRpcId | null;
  result?: unknown;
  error?: JsonRpcResponseError;
};

export type OutgoingMessage =
  | JsonRpcRequest
  | JsonRpcNotification
  | JsonRpcResponse;

/** A decoded message from the analyzer, classified by shape. */
export type IncomingMessage =
  | {
      type: 'response';
      id: JsonRpcId | null;
      result?: unknown;
      error?: JsonRpcResponseError;
    }
  | { type: 'request'; id: JsonRpcId; method: string; params?: unknown }
  | { type: 'notification'; method: string; params?: unknown };

export const JsonRpcErrorCodes = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
  RequestCancelled: -32800,
  ContentModified: -32801,
} as const;

// ─── LSP shapes ──────────────────────────────────────────────────────────────

export type Position = { line: number; character: number };
export type Range = { start: Position; end: Position };

export type TextEdit = { range: Range; newText: string };

export type LspDiagnostic = {
  range: Range;
  severity?: number;
  code?: string | number;
  source?: string;
  message: string;
};

// ─── Session ─────────────────────────────────────────────────────────────────

export type SessionStatus = 'not-started' | 'initializing' | 'ready' | 'failed';

export type TimeoutClass = 'navigation' | 'default' | 'project';

// ─── Normalized command output ──────────────────────────────────────────────

export type DiagnosticSeverity = 'error' | 'warning' | 'info' | 'hint';

export interface DiagnosticEntry {
  file: string;
  range: Range;
  severity: DiagnosticSeverity;
  message: string;
  source?: string;
  code?: string;
}

export interface ResolvedLocation {
  file: string;
  range: Range;
}

export interface SymbolEntry {
  name: string;
  kind: string;
  file: string;
  range: Range;
  containerName?: string;
}

export interface FileEdit {
  file: string;
  edits: TextEdit[];
}

export type FileOperation =
  | { kind: 'create'; file: string; overwrite?: boolean }
  | { kind: 'rename'; from: string; to: string }
  | { kind: 'delete'; file: string };

export type CommandOutput =
  | { kind: 'text'; text: string }
  | { kind: 'locations'; locations: ResolvedLocation[]; text: string }
  | { kind: 'symbols'; symbols: SymbolEntry[]; text: string }
  | {
      kind: 'edits';
      changes: FileEdit[];
      fileOperations: FileOperation[];
      references?: ResolvedLocation[];
      text: string;
    }
  | { kind: 'diagnostics'; diagnostics: DiagnosticEntry[]; text: string };
