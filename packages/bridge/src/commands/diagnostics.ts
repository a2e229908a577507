/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import {
  deduplicateDiagnostics,
  formatDiagnostics,
  sortDiagnostics,
} from '../service/diagnostics.js';
import type { DiagnosticEntry } from '../types.js';
import { isInsideWorkspace } from '../util/paths.js';
import {
  defineCommand,
  type CommandDescriptor,
  type StepContext,
} from './registry.js';
import {
  fileArgs,
  filePathArg,
  requireText,
  textDocument,
  toLspDiagnostic,
  wholeDocumentRange,
} from './common.js';
import { parseCodeActions } from './results.js';

/** rustc error codes that are about lifetimes or borrow scopes. */
export const LIFETIME_ERROR_CODES: ReadonlySet<string> = new Set([
  'E0106',
  'E0261',
  'E0262',
  'E0263',
  'E0495',
  'E0499',
  'E0502',
  'E0505',
  'E0506',
  'E0597',
  'E0621',
  'E0623',
  'E0700',
  'E0716',
  'E0759',
]);

export function isLifetimeDiagnostic(diagnostic: DiagnosticEntry): boolean {
  if (diagnostic.code !== undefined && LIFETIME_ERROR_CODES.has(diagnostic.code)) {
    return true;
  }
  return /lifetime|borrowed value does not live long enough/i.test(
    diagnostic.message,
  );
}

export function summarizeDiagnostics(
  diagnostics: readonly DiagnosticEntry[],
): string {
  const count = (severity: DiagnosticEntry['severity']): number =>
    diagnostics.filter((diagnostic) => diagnostic.severity === severity).length;
  return `${count('error')} error(s), ${count('warning')} warning(s)`;
}

const normalize = (entries: readonly DiagnosticEntry[]): DiagnosticEntry[] =>
  sortDiagnostics(deduplicateDiagnostics(entries));

export const getDiagnostics = defineCommand({
  name: 'get_diagnostics',
  description:
    'Return the diagnostics the analyzer last published for a file (empty until a check has run)',
  args: fileArgs,
  timeout: 'navigation',
  paths: { file_path: 'document' },
  steps: () => [],
  extract: (args, ctx) => {
    const diagnostics = normalize(ctx.diagnostics(args.file_path));
    return {
      kind: 'diagnostics',
      diagnostics,
      text: formatDiagnostics(diagnostics, ctx.workspaceRoot),
    };
  },
});

export const validateLifetimes = defineCommand({
  name: 'validate_lifetimes',
  description:
    'Report lifetime and borrow errors in a file together with the fixes the analyzer offers',
  args: fileArgs,
  timeout: 'default',
  paths: { file_path: 'document' },
  steps: (args) => {
    const lifetimeDiagnostics = (ctx: StepContext) =>
      ctx.diagnostics(args.file_path).filter(isLifetimeDiagnostic);
    return [
      {
        kind: 'request',
        id: 'fixes',
        method: 'textDocument/codeAction',
        optional: true,
        skipIf: (ctx) => lifetimeDiagnostics(ctx).length === 0,
        params: (ctx) => ({
          textDocument: textDocument(args.file_path),
          range: wholeDocumentRange(requireText(ctx, args.file_path)),
          context: {
            diagnostics: lifetimeDiagnostics(ctx).map(toLspDiagnostic),
            only: ['quickfix'],
          },
        }),
      },
    ];
  },
  extract: (args, ctx) => {
    const diagnostics = normalize(
      ctx.diagnostics(args.file_path).filter(isLifetimeDiagnostic),
    );
    if (diagnostics.length === 0) {
      return { kind: 'diagnostics', diagnostics, text: 'No lifetime issues found' };
    }
    const lines = [formatDiagnostics(diagnostics, ctx.workspaceRoot)];
    const fixes = parseCodeActions(ctx.result('fixes'));
    if (fixes.length > 0) {
      lines.push('Suggested fixes:');
      lines.push(...fixes.map((fix) => `  - ${fix.title}`));
    }
    return { kind: 'diagnostics', diagnostics, text: lines.join('\n') };
  },
});

export const runCargoCheck = defineCommand({
  name: 'run_cargo_check',
  description:
    'Run the workspace check (cargo check or clippy, as configured) and return its diagnostics',
  args: {
    workspace_path: filePathArg
      .optional()
      .describe('Restrict the reported diagnostics to this directory'),
  },
  timeout: 'project',
  paths: { workspace_path: 'directory' },
  steps: () => [
    {
      kind: 'notification',
      method: 'rust-analyzer/runFlycheck',
      params: () => ({ textDocument: null }),
    },
    { kind: 'settle-diagnostics' },
  ],
  extract: (args, ctx) => {
    const scope = args.workspace_path;
    const diagnostics = normalize(
      ctx
        .allDiagnostics()
        .filter(
          (diagnostic) =>
            scope === undefined || isInsideWorkspace(diagnostic.file, scope),
        ),
    );
    const summary = summarizeDiagnostics(diagnostics);
    const text =
      diagnostics.length === 0
        ? `Check finished: ${summary}`
        : `Check finished: ${summary}\n${formatDiagnostics(diagnostics, ctx.workspaceRoot)}`;
    return { kind: 'diagnostics', diagnostics, text };
  },
});

export const diagnosticCommands: readonly CommandDescriptor[] = [
  getDiagnostics,
  validateLifetimes,
  runCargoCheck,
];
