/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

/**
 * Normalization of raw analyzer results into the bridge's output shapes, plus
 * their text renderings. Positions stay zero-based throughout.
 */

import { parseRange } from '../service/diagnostics.js';
import type {
  FileEdit,
  FileOperation,
  Range,
  ResolvedLocation,
  SymbolEntry,
  TextEdit,
} from '../types.js';
import { fromFileUri, toDisplayPath } from '../util/paths.js';

export const SYMBOL_KIND_NAMES: Readonly<Record<number, string>> = {
  1: 'File', 2: 'Module', 3: 'Namespace', 4: 'Package', 5: 'Class',
  6: 'Method', 7: 'Property', 8: 'Field', 9: 'Constructor', 10: 'Enum',
  11: 'Interface', 12: 'Function', 13: 'Variable', 14: 'Constant',
  15: 'String', 16: 'Number', 17: 'Boolean', 18: 'Array', 19: 'Object',
  20: 'Key', 21: 'Null', 22: 'EnumMember', 23: 'Struct', 24: 'Event',
  25: 'Operator', 26: 'TypeParameter',
};

export const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const getString = (value: unknown, fallback = ''): string =>
  typeof value === 'string' ? value : fallback;

export const symbolKindName = (kind: unknown): string =>
  typeof kind === 'number' ? (SYMBOL_KIND_NAMES[kind] ?? `kind:${kind}`) : 'unknown';

// ─── Locations ───────────────────────────────────────────────────────────────

/** Accepts Location, Location[], LocationLink[] or null. */
export function parseLocations(value: unknown): ResolvedLocation[] {
  const items = Array.isArray(value) ? value : value == null ? [] : [value];
  return items.flatMap((item: unknown): ResolvedLocation[] => {
    if (!isRecord(item)) {
      return [];
    }
    if (typeof item.targetUri === 'string') {
      return [
        {
          file: fromFileUri(item.targetUri),
          range: parseRange(item.targetSelectionRange ?? item.targetRange),
        },
      ];
    }
    if (typeof item.uri === 'string') {
      return [{ file: fromFileUri(item.uri), range: parseRange(item.range) }];
    }
    return [];
  });
}

export function formatLocation(
  location: ResolvedLocation,
  workspaceRoot: string,
): string {
  const { line, character } = location.range.start;
  return `${toDisplayPath(location.file, workspaceRoot)}:${line}:${character}`;
}

export function formatLocations(
  locations: readonly ResolvedLocation[],
  workspaceRoot: string,
  emptyText = 'No results',
): string {
  if (locations.length === 0) {
    return emptyText;
  }
  return locations
    .map((location) => formatLocation(location, workspaceRoot))
    .join('\n');
}

// ─── Symbols ─────────────────────────────────────────────────────────────────

/**
 * Flattens DocumentSymbol trees (children get `containerName` set to their
 * parent) and accepts SymbolInformation / WorkspaceSymbol lists as they are.
 */
export function parseSymbols(value: unknown, fallbackFile = ''): SymbolEntry[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const out: SymbolEntry[] = [];
  const visit = (item: unknown, container: string | undefined): void => {
    if (!isRecord(item) || typeof item.name !== 'string') {
      return;
    }
    const location = isRecord(item.location) ? item.location : undefined;
    const entry: SymbolEntry = {
      name: item.name,
      kind: symbolKindName(item.kind),
      file:
        location && typeof location.uri === 'string'
          ? fromFileUri(location.uri)
          : fallbackFile,
      range: parseRange(location ? location.range : item.range),
    };
    const containerName =
      typeof item.containerName === 'string' ? item.containerName : container;
    if (containerName !== undefined && containerName !== '') {
      entry.containerName = containerName;
    }
    out.push(entry);
    if (Array.isArray(item.children)) {
      for (const child of item.children) {
        visit(child, item.name);
      }
    }
  };
  for (const item of value) {
    visit(item, undefined);
  }
  return out;
}

export function formatSymbols(
  symbols: readonly SymbolEntry[],
  workspaceRoot: string,
): string {
  if (symbols.length === 0) {
    return 'No symbols found';
  }
  return symbols
    .map((symbol) => {
      const { line, character } = symbol.range.start;
      const container = symbol.containerName ? ` in ${symbol.containerName}` : '';
      return `${symbol.name} [${symbol.kind}]${container} ${toDisplayPath(symbol.file, workspaceRoot)}:${line}:${character}`;
    })
    .join('\n');
}

export function rangeContains(range: Range, line: number, character: number): boolean {
  const { start, end } = range;
  if (line < start.line || line > end.line) {
    return false;
  }
  if (line === start.line && character < start.character) {
    return false;
  }
  if (line === end.line && character > end.character) {
    return false;
  }
  return true;
}

// ─── Workspace edits ─────────────────────────────────────────────────────────

function parseTextEdits(value: unknown): TextEdit[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.flatMap((item: unknown): TextEdit[] => {
    if (!isRecord(item) || typeof item.newText !== 'string') {
      return [];
    }
    return [{ range: parseRange(item.range), newText: item.newText }];
  });
}

export interface NormalizedEdit {
  changes: FileEdit[];
  fileOperations: FileOperation[];
}

/** Merges `changes` and `documentChanges` into one per-file edit list. */
export function normalizeWorkspaceEdit(value: unknown): NormalizedEdit {
  const byFile = new Map<string, TextEdit[]>();
  const fileOperations: FileOperation[] = [];
  const add = (uri: string, edits: TextEdit[]): void => {
    const file = fromFileUri(uri);
    const existing = byFile.get(file);
    if (existing) {
      existing.push(...edits);
    } else {
      byFile.set(file, [...edits]);
    }
  };

  if (!isRecord(value)) {
    return { changes: [], fileOperations };
  }

  if (Array.isArray(value.documentChanges)) {
    for (const change of value.documentChanges) {
      if (!isRecord(change)) {
        continue;
      }
      if (isRecord(change.textDocument) && typeof change.textDocument.uri === 'string') {
        add(change.textDocument.uri, parseTextEdits(change.edits));
        continue;
      }
      switch (change.kind) {
        case 'create':
          if (typeof change.uri === 'string') {
            const overwrite =
              isRecord(change.options) && change.options.overwrite === true;
            fileOperations.push({
              kind: 'create',
              file: fromFileUri(change.uri),
              ...(overwrite ? { overwrite } : {}),
            });
          }
          break;
        case 'rename':
          if (typeof change.oldUri === 'string' && typeof change.newUri === 'string') {
            fileOperations.push({
              kind: 'rename',
              from: fromFileUri(change.oldUri),
              to: fromFileUri(change.newUri),
            });
          }
          break;
        case 'delete':
          if (typeof change.uri === 'string') {
            fileOperations.push({ kind: 'delete', file: fromFileUri(change.uri) });
          }
          break;
        default:
          break;
      }
    }
  } else if (isRecord(value.changes)) {
    for (const [uri, edits] of Object.entries(value.changes)) {
      add(uri, parseTextEdits(edits));
    }
  }

  const changes = [...byFile.entries()]
    .map(([file, edits]) => ({ file, edits }))
    .filter((change) => change.edits.length > 0);
  return { changes, fileOperations };
}

export function countEdits(changes: readonly FileEdit[]): number {
  return changes.reduce((total, change) => total + change.edits.length, 0);
}

export function formatEditSummary(
  edit: NormalizedEdit,
  workspaceRoot: string,
  title?: string,
): string {
  const lines: string[] = [];
  if (title) {
    lines.push(title);
  }
  if (edit.changes.length === 0 && edit.fileOperations.length === 0) {
    lines.push('No changes');
    return lines.join('\n');
  }
  for (const operation of edit.fileOperations) {
    switch (operation.kind) {
      case 'create':
        lines.push(`create ${toDisplayPath(operation.file, workspaceRoot)}`);
        break;
      case 'rename':
        lines.push(
          `rename ${toDisplayPath(operation.from, workspaceRoot)} -> ${toDisplayPath(operation.to, workspaceRoot)}`,
        );
        break;
      case 'delete':
        lines.push(`delete ${toDisplayPath(operation.file, workspaceRoot)}`);
        break;
      default:
        break;
    }
  }
  for (const change of edit.changes) {
    const path = toDisplayPath(change.file, workspaceRoot);
    lines.push(`${path}: ${change.edits.length} edit(s)`);
    for (const textEdit of change.edits) {
      const { start, end } = textEdit.range;
      lines.push(
        `  ${start.line}:${start.character}-${end.line}:${end.character} ${JSON.stringify(textEdit.newText)}`,
      );
    }
  }
  return lines.join('\n');
}

// ─── Hover ───────────────────────────────────────────────────────────────────

export function parseHover(value: unknown): string | null {
  if (!isRecord(value)) {
    return null;
  }
  const { contents } = value;
  if (typeof contents === 'string') {
    return contents;
  }
  if (Array.isArray(contents)) {
    const parts = contents.map((item: unknown) =>
      typeof item === 'string' ? item : isRecord(item) ? getString(item.value) : '',
    );
    return parts.filter((part) => part.length > 0).join('\n');
  }
  if (isRecord(contents) && typeof contents.value === 'string') {
    return contents.value;
  }
  return null;
}

// ─── Code actions ────────────────────────────────────────────────────────────

export interface CodeActionLike {
  title: string;
  kind?: string;
  edit?: unknown;
  raw: Record<string, unknown>;
}

/** Code actions only; bare Command entries are dropped. */
export function parseCodeActions(value: unknown): CodeActionLike[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value.flatMap((item: unknown): CodeActionLike[] => {
    if (!isRecord(item) || typeof item.title !== 'string') {
      return [];
    }
    if (typeof item.command === 'string') {
      return [];
    }
    const action: CodeActionLike = { title: item.title, raw: item };
    if (typeof item.kind === 'string') {
      action.kind = item.kind;
    }
    if (item.edit !== undefined) {
      action.edit = item.edit;
    }
    return [action];
  });
}

export function pickCodeAction(
  value: unknown,
  kindPrefix: string,
  title?: RegExp,
): CodeActionLike | undefined {
  const actions = parseCodeActions(value).filter(
    (action) =>
      action.kind === undefined ||
      action.kind === kindPrefix ||
      action.kind.startsWith(`${kindPrefix}.`),
  );
  if (!title) {
    return actions[0];
  }
  return actions.find((action) => title.test(action.title));
}
