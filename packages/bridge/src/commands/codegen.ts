/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import * as path from 'node:path';

import { z } from 'zod';

import { AnalyzerReportedError } from '../errors.js';
import { parseRange } from '../service/diagnostics.js';
import type { FileEdit, Range, TextEdit } from '../types.js';
import { toDisplayPath } from '../util/paths.js';
import {
  defineCommand,
  type CommandDescriptor,
  type FileProbe,
  type ProtocolStep,
  type StepContext,
} from './registry.js';
import {
  appendEdit,
  editsOutput,
  filePathArg,
  identifierArg,
  requireText,
  textDocument,
} from './common.js';
import { isRecord } from './results.js';

const SYMBOL_KIND = {
  module: 2,
  enum: 10,
  function: 12,
  method: 6,
  struct: 23,
} as const;

export interface FoundSymbol {
  name: string;
  kind: number;
  range: Range;
  depth: number;
}

/**
 * Walks a documentSymbol result (nested DocumentSymbols or flat
 * SymbolInformation) and returns the first symbol named `name`.
 */
export function findSymbol(
  value: unknown,
  name: string,
  options: { kinds?: readonly number[]; topLevel?: boolean } = {},
): FoundSymbol | undefined {
  const matches = (item: Record<string, unknown>): boolean =>
    item.name === name &&
    (options.kinds === undefined ||
      (typeof item.kind === 'number' && options.kinds.includes(item.kind)));

  const visit = (items: unknown, depth: number): FoundSymbol | undefined => {
    if (!Array.isArray(items)) {
      return undefined;
    }
    for (const item of items) {
      if (!isRecord(item)) {
        continue;
      }
      const nested =
        depth > 0 ||
        (typeof item.containerName === 'string' && item.containerName !== '');
      if (matches(item) && !(options.topLevel && nested)) {
        return {
          name,
          kind: typeof item.kind === 'number' ? item.kind : 0,
          range: parseRange(isRecord(item.location) ? item.location.range : item.range),
          depth,
        };
      }
      if (!options.topLevel) {
        const child = visit(item.children, depth + 1);
        if (child) {
          return child;
        }
      }
    }
    return undefined;
  };
  return visit(value, 0);
}

/** Edit inserting `block` on the line after `line`, with a blank line before it. */
export function insertAfterLine(text: string, line: number, block: string): TextEdit {
  const lineCount = text.split('\n').length;
  if (line + 1 >= lineCount) {
    return appendEdit(text, block);
  }
  const at = { line: line + 1, character: 0 };
  return { range: { start: at, end: at }, newText: `\n${block.replace(/\s+$/, '')}\n` };
}

function symbolsStep(
  file: string,
  check: (result: unknown, ctx: StepContext) => string | null,
): ProtocolStep {
  return {
    kind: 'request',
    id: 'symbols',
    method: 'textDocument/documentSymbol',
    params: () => ({ textDocument: textDocument(file) }),
    check,
  };
}

const derivesArg = z
  .array(z.string().regex(/^[A-Za-z_][A-Za-z0-9_:]*$/, 'must be a derive path'))
  .default(['Debug', 'Clone'])
  .describe('Traits to derive');

function deriveLine(derives: readonly string[]): string {
  return derives.length > 0 ? `#[derive(${derives.join(', ')})]\n` : '';
}

// ─── generate_struct ─────────────────────────────────────────────────────────

const fieldSchema = z
  .object({
    name: identifierArg,
    type: z.string().trim().min(1),
    public: z.boolean().default(true),
  })
  .strict();

export type StructField = z.infer<typeof fieldSchema>;

export function renderStruct(
  name: string,
  fields: readonly StructField[],
  derives: readonly string[],
): string {
  const header = `${deriveLine(derives)}pub struct ${name}`;
  if (fields.length === 0) {
    return `${header};\n`;
  }
  const body = fields
    .map((field) => `    ${field.public ? 'pub ' : ''}${field.name}: ${field.type},`)
    .join('\n');
  return `${header} {\n${body}\n}\n`;
}

function collisionCheck(name: string) {
  return (result: unknown): string | null =>
    findSymbol(result, name, { topLevel: true })
      ? `'${name}' is already defined in this file`
      : null;
}

export const generateStruct = defineCommand({
  name: 'generate_struct',
  description: 'Append a struct definition with the given fields and derives to a file',
  args: {
    struct_name: identifierArg.describe('Name of the struct'),
    fields: z.array(fieldSchema).describe('Fields as {name, type, public?}'),
    derives: derivesArg,
    file_path: filePathArg,
  },
  timeout: 'default',
  paths: { file_path: 'document' },
  validate: (args) => {
    const names = args.fields.map((field) => field.name);
    const duplicates = names.filter((name, index) => names.indexOf(name) !== index);
    return duplicates.length > 0
      ? [`fields: duplicate field name(s) ${[...new Set(duplicates)].join(', ')}`]
      : [];
  },
  steps: (args) => [symbolsStep(args.file_path, collisionCheck(args.struct_name))],
  extract: (args, ctx) => {
    const text = requireText(ctx, args.file_path);
    const code = renderStruct(args.struct_name, args.fields, args.derives);
    return editsOutput(
      {
        changes: [{ file: args.file_path, edits: [appendEdit(text, code)] }],
        fileOperations: [],
      },
      ctx.workspaceRoot,
      `Generate struct ${args.struct_name}`,
    );
  },
});

// ─── generate_enum ───────────────────────────────────────────────────────────

const variantArg = z
  .string()
  .trim()
  .regex(
    /^[A-Za-z_][A-Za-z0-9_]*(\s*\(.*\)|\s*\{.*\}|\s*=\s*-?\d+)?$/,
    'must be a variant such as Name, Name(T), Name { a: T } or Name = 1',
  );

export function renderEnum(
  name: string,
  variants: readonly string[],
  derives: readonly string[],
): string {
  const body = variants.map((variant) => `    ${variant},`).join('\n');
  return `${deriveLine(derives)}pub enum ${name} {\n${body}\n}\n`;
}

export const generateEnum = defineCommand({
  name: 'generate_enum',
  description: 'Append an enum definition with the given variants and derives to a file',
  args: {
    enum_name: identifierArg.describe('Name of the enum'),
    variants: z.array(variantArg).min(1).describe('Variant declarations'),
    derives: derivesArg,
    file_path: filePathArg,
  },
  timeout: 'default',
  paths: { file_path: 'document' },
  steps: (args) => [symbolsStep(args.file_path, collisionCheck(args.enum_name))],
  extract: (args, ctx) => {
    const text = requireText(ctx, args.file_path);
    const code = renderEnum(args.enum_name, args.variants, args.derives);
    return editsOutput(
      {
        changes: [{ file: args.file_path, edits: [appendEdit(text, code)] }],
        fileOperations: [],
      },
      ctx.workspaceRoot,
      `Generate enum ${args.enum_name}`,
    );
  },
});

// ─── generate_trait_impl ─────────────────────────────────────────────────────

const TYPE_KINDS = [SYMBOL_KIND.struct, SYMBOL_KIND.enum];

export function renderTraitImpl(traitName: string, typeName: string): string {
  return `impl ${traitName} for ${typeName} {}\n`;
}

export const generateTraitImpl = defineCommand({
  name: 'generate_trait_impl',
  description:
    'Insert an empty trait implementation for a struct; the analyzer can then fill in missing members',
  args: {
    trait_name: z
      .string()
      .regex(/^[A-Za-z_][A-Za-z0-9_:<>, ]*$/, 'must be a trait path')
      .describe('Trait to implement, e.g. Display or std::fmt::Debug'),
    struct_name: identifierArg.describe('Struct or enum receiving the impl'),
    file_path: filePathArg,
  },
  timeout: 'default',
  paths: { file_path: 'document' },
  steps: (args) => [
    symbolsStep(args.file_path, (result, ctx) =>
      findSymbol(result, args.struct_name, { kinds: TYPE_KINDS })
        ? null
        : `Struct '${args.struct_name}' not found in ${toDisplayPath(args.file_path, ctx.workspaceRoot)}`,
    ),
  ],
  extract: (args, ctx) => {
    const target = findSymbol(ctx.result('symbols'), args.struct_name, {
      kinds: TYPE_KINDS,
    });
    if (!target) {
      throw new AnalyzerReportedError(`Struct '${args.struct_name}' not found`);
    }
    const text = requireText(ctx, args.file_path);
    const edit = insertAfterLine(
      text,
      target.range.end.line,
      renderTraitImpl(args.trait_name, args.struct_name),
    );
    return editsOutput(
      { changes: [{ file: args.file_path, edits: [edit] }], fileOperations: [] },
      ctx.workspaceRoot,
      `Implement ${args.trait_name} for ${args.struct_name}`,
    );
  },
});

// ─── generate_tests ──────────────────────────────────────────────────────────

const testCaseArg = z
  .string()
  .trim()
  .regex(/^[A-Za-z0-9_ ]+$/, 'must be letters, digits, underscores or spaces')
  .min(1);

export function testFunctionName(target: string, testCase: string): string {
  const suffix = testCase
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
  return `test_${target}_${suffix}`;
}

/** Test functions indented for a `mod tests` body. */
export function renderTestFunctions(target: string, cases: readonly string[]): string {
  const names = cases.length > 0 ? cases : ['works'];
  return names
    .map(
      (testCase) =>
        `    #[test]\n    fn ${testFunctionName(target, testCase)}() {\n        todo!("exercise ${target}");\n    }\n`,
    )
    .join('\n');
}

export function renderTestModule(target: string, cases: readonly string[]): string {
  return `#[cfg(test)]\nmod tests {\n    use super::*;\n\n${renderTestFunctions(target, cases)}}\n`;
}

export const generateTests = defineCommand({
  name: 'generate_tests',
  description: 'Add unit test skeletons for a function to the file\'s tests module',
  args: {
    target_function: identifierArg.describe('Function under test'),
    file_path: filePathArg,
    test_cases: z.array(testCaseArg).default([]).describe('Short names of the cases to cover'),
  },
  timeout: 'default',
  paths: { file_path: 'document' },
  steps: (args) => [
    symbolsStep(args.file_path, (result, ctx) =>
      findSymbol(result, args.target_function, {
        kinds: [SYMBOL_KIND.function, SYMBOL_KIND.method],
      })
        ? null
        : `Function '${args.target_function}' not found in ${toDisplayPath(args.file_path, ctx.workspaceRoot)}`,
    ),
  ],
  extract: (args, ctx) => {
    const text = requireText(ctx, args.file_path);
    const testsModule = findSymbol(ctx.result('symbols'), 'tests', {
      kinds: [SYMBOL_KIND.module],
      topLevel: true,
    });
    let edit: TextEdit;
    if (testsModule && testsModule.range.end.line > testsModule.range.start.line) {
      // Insert before the line holding the module's closing brace.
      const at = { line: testsModule.range.end.line, character: 0 };
      edit = {
        range: { start: at, end: at },
        newText: `\n${renderTestFunctions(args.target_function, args.test_cases)}`,
      };
    } else {
      edit = appendEdit(text, renderTestModule(args.target_function, args.test_cases));
    }
    return editsOutput(
      { changes: [{ file: args.file_path, edits: [edit] }], fileOperations: [] },
      ctx.workspaceRoot,
      `Generate tests for ${args.target_function}`,
    );
  },
});

// ─── create_module ───────────────────────────────────────────────────────────

const ROOT_MODULE_FILES = ['mod.rs', 'lib.rs', 'main.rs'];
const RESERVED_MODULE_NAMES = new Set(['mod', 'lib', 'main', 'self', 'super', 'crate']);

/**
 * File declaring the modules of `directory`: its mod.rs, lib.rs or main.rs,
 * or the sibling `<directory>.rs`.
 */
export function parentModuleFile(directory: string, files: FileProbe): string | undefined {
  const candidates = [
    ...ROOT_MODULE_FILES.map((name) => path.join(directory, name)),
    `${directory}.rs`,
  ];
  return candidates.find((candidate) => files.isFile(candidate));
}

/** Line after which a new `mod` declaration goes, or -1 for the file header. */
function lastModuleDeclarationLine(symbols: unknown): number {
  if (!Array.isArray(symbols)) {
    return -1;
  }
  let last = -1;
  for (const item of symbols) {
    if (!isRecord(item) || item.kind !== SYMBOL_KIND.module || item.name === 'tests') {
      continue;
    }
    const range = parseRange(isRecord(item.location) ? item.location.range : item.range);
    // `mod name;` declarations span one line; inline modules are skipped.
    if (range.start.line === range.end.line) {
      last = Math.max(last, range.end.line);
    }
  }
  return last;
}

/** Number of leading inner doc comment and inner attribute lines. */
function headerLineCount(text: string): number {
  const lines = text.split('\n');
  let count = 0;
  while (count < lines.length && /^\s*(\/\/!|#!\[)/.test(lines[count])) {
    count += 1;
  }
  return count;
}

export const createModule = defineCommand({
  name: 'create_module',
  description: 'Create a module file and declare it in its parent module',
  args: {
    module_name: identifierArg.describe('Name of the new module'),
    module_path: filePathArg.describe(
      'Directory that will hold the module file, e.g. src or src/net',
    ),
    is_public: z.boolean().default(false).describe('Declare the module with pub'),
  },
  timeout: 'default',
  paths: { module_path: 'directory' },
  validate: (args, files) => {
    const issues: string[] = [];
    if (RESERVED_MODULE_NAMES.has(args.module_name)) {
      issues.push(`module_name: '${args.module_name}' is reserved`);
    }
    const file = path.join(args.module_path, `${args.module_name}.rs`);
    const dirModule = path.join(args.module_path, args.module_name, 'mod.rs');
    if (files.isFile(file) || files.isFile(dirModule)) {
      issues.push(`module_name: module '${args.module_name}' already exists`);
    }
    if (!parentModuleFile(args.module_path, files)) {
      issues.push('module_path: no parent module file (mod.rs, lib.rs or main.rs) found');
    }
    return issues;
  },
  documents: (args, files) => {
    const parent = parentModuleFile(args.module_path, files);
    return parent ? [parent] : [];
  },
  steps: (args, files) => {
    const parent = moduleParent(args.module_path, files);
    return [
      symbolsStep(parent, (result) =>
        findSymbol(result, args.module_name, {
          kinds: [SYMBOL_KIND.module],
          topLevel: true,
        })
          ? `Module '${args.module_name}' is already declared`
          : null,
      ),
    ];
  },
  extract: (args, ctx, files) => {
    const parent = moduleParent(args.module_path, files);
    const parentText = requireText(ctx, parent);
    const declaration = `${args.is_public ? 'pub ' : ''}mod ${args.module_name};`;

    const lastDeclaration = lastModuleDeclarationLine(ctx.result('symbols'));
    let edit: TextEdit;
    if (lastDeclaration >= 0) {
      const at = { line: lastDeclaration + 1, character: 0 };
      edit =
        lastDeclaration + 1 < parentText.split('\n').length
          ? { range: { start: at, end: at }, newText: `${declaration}\n` }
          : appendEdit(parentText, declaration);
    } else {
      const at = { line: headerLineCount(parentText), character: 0 };
      edit = { range: { start: at, end: at }, newText: `${declaration}\n` };
    }

    const file = path.join(args.module_path, `${args.module_name}.rs`);
    const changes: FileEdit[] = [{ file: parent, edits: [edit] }];
    return editsOutput(
      { changes, fileOperations: [{ kind: 'create', file }] },
      ctx.workspaceRoot,
      `Create module ${args.module_name} in ${toDisplayPath(parent, ctx.workspaceRoot)}`,
    );
  },
});

function moduleParent(directory: string, files: FileProbe): string {
  const parent = parentModuleFile(directory, files);
  if (parent === undefined) {
    throw new AnalyzerReportedError(`No parent module found for ${directory}`);
  }
  return parent;
}

export const codegenCommands: readonly CommandDescriptor[] = [
  generateStruct,
  generateEnum,
  generateTraitImpl,
  generateTests,
  createModule,
];
