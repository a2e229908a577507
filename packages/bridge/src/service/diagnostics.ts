/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { EventEmitter } from 'node:events';

import { DebugLogger } from '../debug/DebugLogger.js';
import { CommandCancelled } from '../errors.js';
import type {
  DiagnosticEntry,
  DiagnosticSeverity,
  LspDiagnostic,
  Position,
  Range,
} from '../types.js';
import { fromFileUri, toDisplayPath } from '../util/paths.js';

const EMPTY_DIAGNOSTICS: readonly LspDiagnostic[] = [];

// ─── Parsing ─────────────────────────────────────────────────────────────────

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const getNumber = (value: unknown, fallback = 0): number =>
  typeof value === 'number' && Number.isFinite(value) ? value : fallback;

export const parsePosition = (value: unknown): Position => {
  if (!isRecord(value)) {
    return { line: 0, character: 0 };
  }
  return {
    line: getNumber(value.line),
    character: getNumber(value.character),
  };
};

export const parseRange = (value: unknown): Range => {
  if (!isRecord(value)) {
    return {
      start: { line: 0, character: 0 },
      end: { line: 0, character: 0 },
    };
  }
  return { start: parsePosition(value.start), end: parsePosition(value.end) };
};

export function parseLspDiagnostic(value: unknown): LspDiagnostic | null {
  if (!isRecord(value) || typeof value.message !== 'string') {
    return null;
  }
  const diagnostic: LspDiagnostic = {
    range: parseRange(value.range),
    message: value.message,
  };
  if (typeof value.severity === 'number') {
    diagnostic.severity = value.severity;
  }
  if (typeof value.code === 'string' || typeof value.code === 'number') {
    diagnostic.code = value.code;
  }
  if (typeof value.source === 'string') {
    diagnostic.source = value.source;
  }
  return diagnostic;
}

// ─── Formatting ──────────────────────────────────────────────────────────────

export function mapSeverity(lspSeverity: number | undefined): DiagnosticSeverity {
  switch (lspSeverity) {
    case 1:
      return 'error';
    case 2:
      return 'warning';
    case 3:
      return 'info';
    case 4:
      return 'hint';
    default:
      return 'error';
  }
}

export function toDiagnosticEntry(
  raw: LspDiagnostic,
  file: string,
): DiagnosticEntry {
  const entry: DiagnosticEntry = {
    file,
    range: raw.range,
    severity: mapSeverity(raw.severity),
    message: raw.message,
  };
  if (raw.source !== undefined) {
    entry.source = raw.source;
  }
  if (raw.code !== undefined) {
    entry.code = String(raw.code);
  }
  return entry;
}

export function deduplicateDiagnostics(
  diagnostics: readonly DiagnosticEntry[],
): DiagnosticEntry[] {
  const uniqueByKey = new Map<string, DiagnosticEntry>();

  for (const diagnostic of diagnostics) {
    const { line, character } = diagnostic.range.start;
    const key = `${diagnostic.file}|${line}|${character}|${diagnostic.message}`;
    if (!uniqueByKey.has(key)) {
      uniqueByKey.set(key, diagnostic);
    }
  }

  return [...uniqueByKey.values()];
}

export function sortDiagnostics(
  diagnostics: readonly DiagnosticEntry[],
): DiagnosticEntry[] {
  return [...diagnostics].sort((a, b) => {
    if (a.file !== b.file) {
      return a.file.localeCompare(b.file);
    }
    if (a.range.start.line !== b.range.start.line) {
      return a.range.start.line - b.range.start.line;
    }
    return a.range.start.character - b.range.start.character;
  });
}

/** `src/lib.rs:3:4 ERROR message (code)`, positions zero-based. */
export function formatDiagnosticLine(
  diagnostic: DiagnosticEntry,
  workspaceRoot: string,
): string {
  const severity = diagnostic.severity.toUpperCase();
  const { line, character } = diagnostic.range.start;
  const codeSuffix =
    diagnostic.code === undefined ? '' : ` (${diagnostic.code})`;
  return `${toDisplayPath(diagnostic.file, workspaceRoot)}:${line}:${character} ${severity} ${diagnostic.message}${codeSuffix}`;
}

export function formatDiagnostics(
  diagnostics: readonly DiagnosticEntry[],
  workspaceRoot: string,
): string {
  if (diagnostics.length === 0) {
    return 'No diagnostics';
  }
  return diagnostics
    .map((diagnostic) => formatDiagnosticLine(diagnostic, workspaceRoot))
    .join('\n');
}

// ─── Cache ───────────────────────────────────────────────────────────────────

/**
 * Latest `textDocument/publishDiagnostics` payload per file. Each
 * notification replaces the file's entry wholesale.
 */
export class DiagnosticsCache {
  private readonly logger = DebugLogger.getLogger('diagnostics');
  private readonly byPath = new Map<string, readonly LspDiagnostic[]>();
  private readonly eventBus = new EventEmitter();

  constructor() {
    this.eventBus.setMaxListeners(0);
  }

  /** Applies a publishDiagnostics payload. Returns the file it was for. */
  update(params: unknown): string | undefined {
    if (!isRecord(params) || typeof params.uri !== 'string') {
      this.logger.warn('ignoring publishDiagnostics without a uri');
      return undefined;
    }
    const path = fromFileUri(params.uri);
    const rawList = Array.isArray(params.diagnostics) ? params.diagnostics : [];
    const diagnostics = rawList.flatMap((item: unknown) => {
      const parsed = parseLspDiagnostic(item);
      return parsed ? [parsed] : [];
    });
    this.byPath.set(path, diagnostics);
    this.logger.debug(() => `${diagnostics.length} diagnostic(s) for ${path}`);
    this.eventBus.emit('update', path);
    return path;
  }

  get(path: string): readonly LspDiagnostic[] {
    return this.byPath.get(path) ?? EMPTY_DIAGNOSTICS;
  }

  entries(path: string): DiagnosticEntry[] {
    return this.get(path).map((raw) => toDiagnosticEntry(raw, path));
  }

  allEntries(): DiagnosticEntry[] {
    return [...this.byPath.entries()].flatMap(([path, list]) =>
      list.map((raw) => toDiagnosticEntry(raw, path)),
    );
  }

  clear(): void {
    this.byPath.clear();
  }

  /**
   * Resolves once no notification has arrived for `quietMs`, or when
   * `timeoutMs` elapses, whichever comes first.
   */
  waitForQuiet(
    quietMs: number,
    timeoutMs: number,
    signal?: AbortSignal,
  ): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let settled = false;
      let quietTimer: ReturnType<typeof setTimeout> | null = null;
      let deadlineTimer: ReturnType<typeof setTimeout> | null = null;

      const cleanup = (): void => {
        if (quietTimer !== null) {
          clearTimeout(quietTimer);
          quietTimer = null;
        }
        if (deadlineTimer !== null) {
          clearTimeout(deadlineTimer);
          deadlineTimer = null;
        }
        this.eventBus.off('update', onUpdate);
        signal?.removeEventListener('abort', onAbort);
      };

      const finish = (): void => {
        if (settled) {
          return;
        }
        settled = true;
        cleanup();
        resolve();
      };

      const onAbort = (): void => {
        if (settled) {
          return;
        }
        settled = true;
        cleanup();
        reject(new CommandCancelled());
      };

      const restartQuietTimer = (): void => {
        if (quietTimer !== null) {
          clearTimeout(quietTimer);
        }
        quietTimer = setTimeout(finish, quietMs);
      };

      const onUpdate = (): void => {
        restartQuietTimer();
      };

      if (signal?.aborted) {
        onAbort();
        return;
      }

      this.eventBus.on('update', onUpdate);
      signal?.addEventListener('abort', onAbort, { once: true });
      deadlineTimer = setTimeout(finish, Math.max(0, timeoutMs));
      restartQuietTimer();
    });
  }
}
