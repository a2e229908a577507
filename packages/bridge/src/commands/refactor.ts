/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { z } from 'zod';

import { AnalyzerReportedError } from '../errors.js';
import { parseRange } from '../service/diagnostics.js';
import type { FileEdit, Range, TextEdit } from '../types.js';
import { toDisplayPath } from '../util/paths.js';
import {
  offsetToPosition,
  positionToOffset,
  rangesOverlap,
  sliceRange,
  wholeLines,
} from '../util/text.js';
import {
  defineCommand,
  type CommandDescriptor,
  type StepContext,
} from './registry.js';
import {
  actionEdit,
  appendEdit,
  characterArg,
  codeActionSteps,
  editsOutput,
  FILE_POSITION,
  fileArgs,
  filePathArg,
  filePositionArgs,
  identifierArg,
  lineArg,
  positionParams,
  requireText,
  textDocument,
  toLspDiagnostic,
  wholeDocumentRange,
  type CodeActionRequest,
} from './common.js';
import {
  formatLocations,
  isRecord,
  normalizeWorkspaceEdit,
  parseCodeActions,
  parseLocations,
  rangeContains,
  type NormalizedEdit,
} from './results.js';

/** Name rust-analyzer gives a freshly extracted function. */
export const EXTRACTED_FUNCTION_PLACEHOLDER = 'fun_name';

const FUNCTION_KINDS = new Set([6, 12]);

// ─── rename_symbol ───────────────────────────────────────────────────────────

const supportsPrepareRename = (ctx: StepContext): boolean => {
  const provider = ctx.serverCapabilities.renameProvider;
  return isRecord(provider) && provider.prepareProvider === true;
};

export const renameSymbol = defineCommand({
  name: 'rename_symbol',
  description: 'Rename the symbol at a position across the workspace',
  args: { ...filePositionArgs, new_name: identifierArg.describe('New name') },
  timeout: 'default',
  paths: { file_path: 'document' },
  positions: [FILE_POSITION],
  steps: (args) => [
    {
      kind: 'request',
      id: 'prepare',
      method: 'textDocument/prepareRename',
      skipIf: (ctx) => !supportsPrepareRename(ctx),
      params: () => positionParams(args.file_path, args.line, args.character),
      check: (result) =>
        result === null || result === undefined
          ? `No renameable symbol at ${args.line}:${args.character}`
          : null,
    },
    {
      kind: 'request',
      id: 'rename',
      method: 'textDocument/rename',
      params: () => ({
        ...positionParams(args.file_path, args.line, args.character),
        newName: args.new_name,
      }),
      check: (result) =>
        result === null || result === undefined
          ? 'Rename produced no edits'
          : null,
    },
  ],
  extract: (args, ctx) =>
    editsOutput(
      normalizeWorkspaceEdit(ctx.result('rename')),
      ctx.workspaceRoot,
      `Rename to '${args.new_name}'`,
    ),
});

// ─── format_code ─────────────────────────────────────────────────────────────

export const formatCode = defineCommand({
  name: 'format_code',
  description: 'Format a file with rustfmt through the analyzer',
  args: fileArgs,
  timeout: 'default',
  paths: { file_path: 'document' },
  steps: (args) => [
    {
      kind: 'request',
      id: 'formatting',
      method: 'textDocument/formatting',
      params: () => ({
        textDocument: textDocument(args.file_path),
        options: { tabSize: 4, insertSpaces: true },
      }),
    },
  ],
  extract: (args, ctx) => {
    const result = ctx.result('formatting');
    const changes = Array.isArray(result)
      ? normalizeWorkspaceEdit({ changes: { [textDocument(args.file_path).uri]: result } })
          .changes
      : [];
    return editsOutput(
      { changes, fileOperations: [] },
      ctx.workspaceRoot,
      changes.length === 0 ? 'Already formatted' : undefined,
    );
  },
});

// ─── extract_function ────────────────────────────────────────────────────────

const PLACEHOLDER_USE = new RegExp(`\\b${EXTRACTED_FUNCTION_PLACEHOLDER}\\b`);
const PLACEHOLDER_DECLARATION = new RegExp(`\\bfn\\s+${EXTRACTED_FUNCTION_PLACEHOLDER}\\b`);

/**
 * Renames the generated function in one edit's text: its declaration and the
 * call that precedes it, or the first use when the edit is only the call site.
 * Identifiers inside the moved body keep their names.
 */
function renamePlaceholder(text: string, name: string): string {
  const declaration = PLACEHOLDER_DECLARATION.exec(text);
  if (!declaration) {
    return text.replace(PLACEHOLDER_USE, name);
  }
  const head = text.slice(0, declaration.index);
  const tail = text.slice(declaration.index);
  return (
    head.replace(PLACEHOLDER_USE, name) +
    tail.replace(PLACEHOLDER_DECLARATION, (match) => match.replace(PLACEHOLDER_USE, name))
  );
}

/** Replaces the analyzer's placeholder name with `name` in the generated code. */
export function renameExtracted(edit: NormalizedEdit, name: string): NormalizedEdit {
  return {
    fileOperations: edit.fileOperations,
    changes: edit.changes.map((change) => ({
      file: change.file,
      edits: change.edits.map((textEdit) => ({
        range: textEdit.range,
        newText: renamePlaceholder(textEdit.newText, name),
      })),
    })),
  };
}

const extractArgs = {
  file_path: filePathArg,
  start_line: lineArg,
  start_character: characterArg,
  end_line: lineArg,
  end_character: characterArg,
  function_name: identifierArg
    .optional()
    .describe('Name for the new function'),
};

export const extractFunction = defineCommand({
  name: 'extract_function',
  description: 'Extract the selected range into a new function',
  args: extractArgs,
  timeout: 'default',
  paths: { file_path: 'document' },
  positions: [
    { file: 'file_path', line: 'start_line', character: 'start_character' },
    { file: 'file_path', line: 'end_line', character: 'end_character' },
  ],
  validate: (args) =>
    args.start_line > args.end_line ||
    (args.start_line === args.end_line &&
      args.start_character > args.end_character)
      ? ['selection end comes before its start']
      : [],
  steps: (args) => codeActionSteps(extractRequest(args.file_path, selection(args))),
  extract: (args, ctx) => {
    const chosen = actionEdit(ctx, extractRequest(args.file_path, selection(args)));
    if (!chosen) {
      throw new AnalyzerReportedError('Cannot extract the selected code into a function');
    }
    const edit =
      args.function_name === undefined
        ? chosen.edit
        : renameExtracted(chosen.edit, args.function_name);
    return editsOutput(edit, ctx.workspaceRoot, chosen.title);
  },
});

function selection(args: {
  start_line: number;
  start_character: number;
  end_line: number;
  end_character: number;
}): Range {
  return {
    start: { line: args.start_line, character: args.start_character },
    end: { line: args.end_line, character: args.end_character },
  };
}

function extractRequest(file: string, range: Range): CodeActionRequest {
  return {
    file,
    range: () => range,
    only: ['refactor.extract'],
    kindPrefix: 'refactor.extract',
    title: /extract into function/i,
    missing: 'Cannot extract the selected code into a function',
  };
}

// ─── inline_function ─────────────────────────────────────────────────────────

function inlineRequest(file: string, line: number, character: number): CodeActionRequest {
  const position = { line, character };
  return {
    file,
    range: () => ({ start: position, end: position }),
    only: ['refactor.inline'],
    kindPrefix: 'refactor.inline',
    title: /^Inline\b/i,
    missing: `No inline refactoring available at ${line}:${character}`,
  };
}

export const inlineFunction = defineCommand({
  name: 'inline_function',
  description: 'Inline the function call or variable at a position',
  args: filePositionArgs,
  timeout: 'default',
  paths: { file_path: 'document' },
  positions: [FILE_POSITION],
  steps: (args) => codeActionSteps(inlineRequest(args.file_path, args.line, args.character)),
  extract: (args, ctx) => {
    const chosen = actionEdit(ctx, inlineRequest(args.file_path, args.line, args.character));
    if (!chosen) {
      throw new AnalyzerReportedError('No inline refactoring available');
    }
    return editsOutput(chosen.edit, ctx.workspaceRoot, chosen.title);
  },
});

// ─── organize_imports ────────────────────────────────────────────────────────

function organizeRequest(file: string): CodeActionRequest {
  return {
    file,
    range: (ctx) => wholeDocumentRange(requireText(ctx, file)),
    only: ['source.organizeImports'],
    kindPrefix: 'source.organizeImports',
  };
}

export const organizeImports = defineCommand({
  name: 'organize_imports',
  description: 'Sort and merge the use declarations of a file',
  args: fileArgs,
  timeout: 'default',
  paths: { file_path: 'document' },
  steps: (args) => codeActionSteps(organizeRequest(args.file_path)),
  extract: (args, ctx) => {
    const chosen = actionEdit(ctx, organizeRequest(args.file_path));
    if (!chosen) {
      return editsOutput(
        { changes: [], fileOperations: [] },
        ctx.workspaceRoot,
        'Imports are already organized',
      );
    }
    return editsOutput(chosen.edit, ctx.workspaceRoot, chosen.title);
  },
});

// ─── apply_clippy_suggestions ────────────────────────────────────────────────

/**
 * Merges the edits of several quick fixes, dropping any edit that overlaps
 * one already taken for the same file.
 */
export function mergeFixes(edits: readonly NormalizedEdit[]): NormalizedEdit {
  const byFile = new Map<string, TextEdit[]>();
  for (const edit of edits) {
    for (const change of edit.changes) {
      const taken = byFile.get(change.file) ?? [];
      const fresh = change.edits.filter(
        (candidate) => !taken.some((existing) => rangesOverlap(existing.range, candidate.range)),
      );
      byFile.set(change.file, [...taken, ...fresh]);
    }
  }
  const changes: FileEdit[] = [...byFile.entries()].map(([file, fileEdits]) => ({
    file,
    edits: fileEdits,
  }));
  return { changes, fileOperations: [] };
}

export const applyClippySuggestions = defineCommand({
  name: 'apply_clippy_suggestions',
  description:
    'Collect the machine-applicable fixes for the clippy lints last reported in a file',
  args: fileArgs,
  timeout: 'default',
  paths: { file_path: 'document' },
  steps: (args) => {
    const clippy = (ctx: StepContext) =>
      ctx.diagnostics(args.file_path).filter((entry) => entry.source === 'clippy');
    return [
      {
        kind: 'request',
        id: 'fixes',
        method: 'textDocument/codeAction',
        skipIf: (ctx) => clippy(ctx).length === 0,
        params: (ctx) => ({
          textDocument: textDocument(args.file_path),
          range: wholeDocumentRange(requireText(ctx, args.file_path)),
          context: {
            diagnostics: clippy(ctx).map(toLspDiagnostic),
            only: ['quickfix'],
          },
        }),
      },
    ];
  },
  extract: (args, ctx) => {
    const actions = parseCodeActions(ctx.result('fixes')).filter(
      (action) => action.edit !== undefined,
    );
    const preferred = actions.filter((action) => action.raw.isPreferred === true);
    const chosen = preferred.length > 0 ? preferred : actions;
    if (chosen.length === 0) {
      return editsOutput(
        { changes: [], fileOperations: [] },
        ctx.workspaceRoot,
        `No clippy suggestions for ${toDisplayPath(args.file_path, ctx.workspaceRoot)}`,
      );
    }
    const merged = mergeFixes(chosen.map((action) => normalizeWorkspaceEdit(action.edit)));
    return editsOutput(
      merged,
      ctx.workspaceRoot,
      ['Applied suggestions:', ...chosen.map((action) => `  - ${action.title}`)].join('\n'),
    );
  },
});

// ─── change_signature ────────────────────────────────────────────────────────

interface FunctionSymbol {
  name: string;
  range: Range;
  selectionRange: Range;
}

/** Innermost function or method whose range contains the position. */
export function findEnclosingFunction(
  value: unknown,
  line: number,
  character: number,
): FunctionSymbol | undefined {
  let found: FunctionSymbol | undefined;
  const visit = (items: unknown): void => {
    if (!Array.isArray(items)) {
      return;
    }
    for (const item of items) {
      if (!isRecord(item) || typeof item.name !== 'string') {
        continue;
      }
      const range = parseRange(item.range);
      if (!rangeContains(range, line, character)) {
        continue;
      }
      if (typeof item.kind === 'number' && FUNCTION_KINDS.has(item.kind)) {
        found = {
          name: item.name,
          range,
          selectionRange: parseRange(item.selectionRange ?? item.range),
        };
      }
      visit(item.children);
    }
  };
  visit(value);
  return found;
}

/**
 * Range of a function header: from the first non-blank character of the line
 * holding the name up to the last non-blank character before the body.
 */
export function signatureRange(text: string, fn: FunctionSymbol): Range | null {
  const nameOffset = positionToOffset(text, fn.selectionRange.start);
  const lineStart = text.lastIndexOf('\n', nameOffset - 1) + 1;
  const leading = /^\s*/.exec(text.slice(lineStart, nameOffset));
  const start = lineStart + (leading ? leading[0].length : 0);

  const endOffset = positionToOffset(text, fn.range.end);
  let bodyStart = -1;
  for (let index = nameOffset; index < endOffset; index++) {
    const char = text[index];
    if (char === '{' || char === ';') {
      bodyStart = index;
      break;
    }
  }
  if (bodyStart === -1) {
    return null;
  }
  let end = bodyStart;
  while (end > start && /\s/.test(text[end - 1])) {
    end -= 1;
  }
  return { start: offsetToPosition(text, start), end: offsetToPosition(text, end) };
}

export const changeSignature = defineCommand({
  name: 'change_signature',
  description:
    'Replace the signature of the function at a position and list the call sites to update',
  args: {
    ...filePositionArgs,
    new_signature: z
      .string()
      .trim()
      .min(1)
      .describe('Full new header, e.g. "pub fn parse(input: &str) -> Result<Ast>"'),
  },
  timeout: 'default',
  paths: { file_path: 'document' },
  positions: [FILE_POSITION],
  validate: (args) =>
    /\bfn\b/.test(args.new_signature) ? [] : ['new_signature must declare a fn'],
  steps: (args) => {
    const target = (ctx: StepContext) =>
      findEnclosingFunction(ctx.result('symbols'), args.line, args.character);
    return [
      {
        kind: 'request',
        id: 'symbols',
        method: 'textDocument/documentSymbol',
        params: () => ({ textDocument: textDocument(args.file_path) }),
        check: (_result, ctx) =>
          target(ctx) ? null : `No function found at ${args.line}:${args.character}`,
      },
      {
        kind: 'request',
        id: 'references',
        method: 'textDocument/references',
        params: (ctx) => {
          const start = target(ctx)?.selectionRange.start ?? {
            line: args.line,
            character: args.character,
          };
          return {
            ...positionParams(args.file_path, start.line, start.character),
            context: { includeDeclaration: false },
          };
        },
      },
    ];
  },
  extract: (args, ctx) => {
    const fn = findEnclosingFunction(ctx.result('symbols'), args.line, args.character);
    if (!fn) {
      throw new AnalyzerReportedError(`No function found at ${args.line}:${args.character}`);
    }
    const text = requireText(ctx, args.file_path);
    const range = signatureRange(text, fn);
    if (!range) {
      throw new AnalyzerReportedError(`Cannot locate the header of '${fn.name}'`);
    }
    const edit: NormalizedEdit = {
      changes: [
        { file: args.file_path, edits: [{ range, newText: args.new_signature }] },
      ],
      fileOperations: [],
    };
    const references = parseLocations(ctx.result('references'));
    const output = editsOutput(
      edit,
      ctx.workspaceRoot,
      `Change signature of '${fn.name}' (was: ${sliceRange(text, range)})`,
    );
    const callSites =
      references.length === 0
        ? 'No call sites found'
        : `Call sites to update:\n${formatLocations(references, ctx.workspaceRoot)}`;
    return output.kind === 'edits'
      ? { ...output, references, text: `${output.text}\n${callSites}` }
      : output;
  },
});

// ─── move_items ──────────────────────────────────────────────────────────────

interface TopLevelItem {
  name: string;
  range: Range;
}

const IMPL_NAME = /^impl(?:<.*?>)?\s+(?:.+\s+for\s+)?(?:\w+::)*(\w+)/;

/** The type an `impl` symbol name belongs to, such as `Point` for `impl Display for Point`. */
export function implTarget(name: string): string | undefined {
  return IMPL_NAME.exec(name)?.[1];
}

/**
 * Top-level symbols named in `names`, plus the impl blocks of any type among
 * them, in source order.
 */
export function findTopLevelItems(value: unknown, names: readonly string[]): TopLevelItem[] {
  if (!Array.isArray(value)) {
    return [];
  }
  const wanted = new Set(names);
  const found: TopLevelItem[] = [];
  const impls: TopLevelItem[] = [];
  for (const item of value) {
    if (!isRecord(item) || typeof item.name !== 'string') {
      continue;
    }
    // SymbolInformation lists are flat; nested entries carry a container.
    if (typeof item.containerName === 'string' && item.containerName !== '') {
      continue;
    }
    const range = () => parseRange(isRecord(item.location) ? item.location.range : item.range);
    if (wanted.has(item.name)) {
      found.push({ name: item.name, range: range() });
      wanted.delete(item.name);
    } else if (item.name.startsWith('impl')) {
      impls.push({ name: item.name, range: range() });
    }
  }
  const types = new Set(found.map((item) => item.name));
  const companions = impls.filter((item) => {
    const target = implTarget(item.name);
    return target !== undefined && types.has(target);
  });
  return [...found, ...companions].sort((a, b) => a.range.start.line - b.range.start.line);
}

export const moveItems = defineCommand({
  name: 'move_items',
  description:
    'Move top-level items (functions, structs, enums, ...) to another file; impl blocks of a moved type go with it',
  args: {
    source_file: filePathArg,
    target_file: filePathArg.describe('Destination file; created when missing'),
    item_names: z.array(identifierArg).min(1).describe('Names of the items to move'),
  },
  timeout: 'default',
  paths: { source_file: 'document', target_file: 'optional-document' },
  validate: (args) =>
    args.source_file === args.target_file
      ? ['source_file and target_file must differ']
      : [],
  steps: (args) => [
    {
      kind: 'request',
      id: 'symbols',
      method: 'textDocument/documentSymbol',
      params: () => ({ textDocument: textDocument(args.source_file) }),
      check: (result, ctx) => {
        const found = new Set(
          findTopLevelItems(result, args.item_names).map((item) => item.name),
        );
        const missing = args.item_names.filter((name) => !found.has(name));
        return missing.length === 0
          ? null
          : `Items not found in ${toDisplayPath(args.source_file, ctx.workspaceRoot)}: ${missing.join(', ')}`;
      },
    },
  ],
  extract: (args, ctx) => {
    const sourceText = requireText(ctx, args.source_file);
    const items = findTopLevelItems(ctx.result('symbols'), args.item_names);
    const ranges = items.map((item) => wholeLines(sourceText, item.range));
    const moved = ranges
      .map((range) => sliceRange(sourceText, range).replace(/\s+$/, ''))
      .join('\n\n');

    const targetText = ctx.documentText(args.target_file);
    const changes: FileEdit[] = [
      {
        file: args.source_file,
        edits: ranges.map((range) => ({ range, newText: '' })),
      },
      { file: args.target_file, edits: [appendEdit(targetText ?? '', moved)] },
    ];
    const fileOperations: NormalizedEdit['fileOperations'] =
      targetText === undefined ? [{ kind: 'create', file: args.target_file }] : [];

    const output = editsOutput(
      { changes, fileOperations },
      ctx.workspaceRoot,
      `Move ${items.map((item) => item.name).join(', ')} to ${toDisplayPath(args.target_file, ctx.workspaceRoot)}`,
    );
    return output.kind === 'edits'
      ? { ...output, text: `${output.text}\nImports that refer to the moved items are not updated.` }
      : output;
  },
});

export const refactorCommands: readonly CommandDescriptor[] = [
  renameSymbol,
  formatCode,
  extractFunction,
  inlineFunction,
  changeSignature,
  organizeImports,
  applyClippySuggestions,
  moveItems,
];
