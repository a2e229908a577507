/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';

import { AnalyzerReportedError } from '../errors.js';
import type {
  CommandOutput,
  DiagnosticEntry,
  LspDiagnostic,
  Range,
  TextEdit,
} from '../types.js';
import { toFileUri } from '../util/paths.js';
import { endOfText } from '../util/text.js';
import type { ProtocolStep, StepContext } from './registry.js';
import {
  formatEditSummary,
  normalizeWorkspaceEdit,
  parseCodeActions,
  pickCodeAction,
  type CodeActionLike,
  type NormalizedEdit,
} from './results.js';

// ─── Argument shapes ─────────────────────────────────────────────────────────

export const filePathArg = z
  .string()
  .min(1)
  .describe('Path to the file, absolute or relative to the workspace root');

export const lineArg = z.number().int().nonnegative().describe('Zero-based line');
export const characterArg = z
  .number()
  .int()
  .nonnegative()
  .describe('Zero-based character offset within the line');

export const identifierArg = z
  .string()
  .regex(/^[A-Za-z_][A-Za-z0-9_]*$/, 'must be a valid identifier');

export const filePositionArgs = {
  file_path: filePathArg,
  line: lineArg,
  character: characterArg,
};

export const fileArgs = { file_path: filePathArg };

export const FILE_POSITION = {
  file: 'file_path',
  line: 'line',
  character: 'character',
} as const;

// ─── Params ──────────────────────────────────────────────────────────────────

export const textDocument = (path: string): { uri: string } => ({
  uri: toFileUri(path),
});

export const positionParams = (path: string, line: number, character: number) => ({
  textDocument: textDocument(path),
  position: { line, character },
});

const SEVERITY_NUMBERS: Record<DiagnosticEntry['severity'], number> = {
  error: 1,
  warning: 2,
  info: 3,
  hint: 4,
};

export function toLspDiagnostic(entry: DiagnosticEntry): LspDiagnostic {
  const diagnostic: LspDiagnostic = {
    range: entry.range,
    severity: SEVERITY_NUMBERS[entry.severity],
    message: entry.message,
  };
  if (entry.code !== undefined) {
    diagnostic.code = entry.code;
  }
  if (entry.source !== undefined) {
    diagnostic.source = entry.source;
  }
  return diagnostic;
}

/** Range spanning the whole document text. */
export function wholeDocumentRange(text: string): Range {
  const lines = text.split('\n');
  const lastLine = lines.length - 1;
  return {
    start: { line: 0, character: 0 },
    end: { line: lastLine, character: lines[lastLine].length },
  };
}

export function requireText(ctx: StepContext, path: string): string {
  const text = ctx.documentText(path);
  if (text === undefined) {
    throw new AnalyzerReportedError(`document ${path} is not open`);
  }
  return text;
}

/** Edit that appends `block` to `text`, separated from it by a blank line. */
export function appendEdit(text: string, block: string): TextEdit {
  const end = endOfText(text);
  let separator = '\n\n';
  if (text.trim().length === 0 || text.endsWith('\n\n')) {
    separator = '';
  } else if (text.endsWith('\n')) {
    separator = '\n';
  }
  return {
    range: { start: end, end },
    newText: `${separator}${block.replace(/\s+$/, '')}\n`,
  };
}

// ─── Code-action commands ────────────────────────────────────────────────────

export interface CodeActionRequest {
  file: string;
  range: (ctx: StepContext) => Range;
  /** `context.only` filter sent to the analyzer. */
  only: string[];
  /** Kind the chosen action must have (or be nested under). */
  kindPrefix: string;
  title?: RegExp;
  diagnostics?: (ctx: StepContext) => DiagnosticEntry[];
  /** Fails the command with this message when no suitable action comes back. */
  missing?: string;
  skipIf?: (ctx: StepContext) => boolean;
}

export const ACTIONS_STEP = 'actions';
export const RESOLVED_STEP = 'resolved';

export function chosenAction(
  ctx: StepContext,
  request: CodeActionRequest,
): CodeActionLike | undefined {
  return pickCodeAction(ctx.result(ACTIONS_STEP), request.kindPrefix, request.title);
}

/**
 * `textDocument/codeAction` followed by `codeAction/resolve` when the chosen
 * action arrives without an edit.
 */
export function codeActionSteps(request: CodeActionRequest): ProtocolStep[] {
  return [
    {
      kind: 'request',
      id: ACTIONS_STEP,
      method: 'textDocument/codeAction',
      skipIf: request.skipIf,
      params: (ctx) => ({
        textDocument: textDocument(request.file),
        range: request.range(ctx),
        context: {
          diagnostics: (request.diagnostics?.(ctx) ?? []).map(toLspDiagnostic),
          only: request.only,
        },
      }),
      check: (_result, ctx) =>
        request.missing === undefined || chosenAction(ctx, request)
          ? null
          : request.missing,
    },
    {
      kind: 'request',
      id: RESOLVED_STEP,
      method: 'codeAction/resolve',
      skipIf: (ctx) => {
        if (request.skipIf?.(ctx)) {
          return true;
        }
        const action = chosenAction(ctx, request);
        return action === undefined || action.edit !== undefined;
      },
      params: (ctx) => chosenAction(ctx, request)?.raw ?? null,
    },
  ];
}

/**
 * The edit of the chosen action, taken from the resolve step when it ran.
 * Null when there is no action and the request allows that.
 */
export function actionEdit(
  ctx: StepContext,
  request: CodeActionRequest,
): { title: string; edit: NormalizedEdit } | null {
  const action = chosenAction(ctx, request);
  if (!action) {
    if (request.missing !== undefined) {
      throw new AnalyzerReportedError(request.missing);
    }
    return null;
  }
  const resolved = parseCodeActions([ctx.result(RESOLVED_STEP)])[0];
  const edit = normalizeWorkspaceEdit(resolved?.edit ?? action.edit);
  return { title: action.title, edit };
}

export function editsOutput(
  edit: NormalizedEdit,
  workspaceRoot: string,
  title?: string,
): CommandOutput {
  return {
    kind: 'edits',
    changes: edit.changes,
    fileOperations: edit.fileOperations,
    text: formatEditSummary(edit, workspaceRoot, title),
  };
}
