/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { statSync } from 'node:fs';

import { z } from 'zod';

import { DuplicateCommand, InvalidArguments } from '../errors.js';
import type {
  CommandOutput,
  DiagnosticEntry,
  TimeoutClass,
} from '../types.js';
import { resolveWorkspacePath } from '../util/paths.js';

// ─── Steps ───────────────────────────────────────────────────────────────────

/** What a step can see while the command runs. */
export interface StepContext {
  readonly workspaceRoot: string;
  readonly serverCapabilities: Readonly<Record<string, unknown>>;
  /** Result stored by an earlier request step; undefined when it was skipped. */
  result(stepId: string): unknown;
  /** Text last sent to the analyzer for an opened document. */
  documentText(path: string): string | undefined;
  diagnostics(path: string): DiagnosticEntry[];
  allDiagnostics(): DiagnosticEntry[];
}

type StepPredicate = (ctx: StepContext) => boolean;

export type ProtocolStep =
  | {
      kind: 'request';
      /** Key under which the result is stored for later steps. */
      id: string;
      method: string;
      params: (ctx: StepContext) => unknown;
      skipIf?: StepPredicate;
      /** Analyzer errors are recorded as a null result instead of failing. */
      optional?: boolean;
      /** Returns a message to stop the sequence with AnalyzerReportedError. */
      check?: (result: unknown, ctx: StepContext) => string | null;
    }
  | {
      kind: 'notification';
      method: string;
      params: (ctx: StepContext) => unknown;
      skipIf?: StepPredicate;
    }
  | { kind: 'settle-diagnostics'; skipIf?: StepPredicate };

// ─── Command records ─────────────────────────────────────────────────────────

/**
 * - `document`: an existing file, opened before the first step.
 * - `optional-document`: opened when it exists, may be absent.
 * - `directory`: an existing directory.
 */
export type PathRule = 'document' | 'optional-document' | 'directory';

export type Args<S extends z.ZodRawShape> = z.infer<z.ZodObject<S, 'strict'>>;
type ArgKey<S extends z.ZodRawShape> = keyof S & string;

export interface PositionRule<S extends z.ZodRawShape> {
  file: ArgKey<S>;
  line: ArgKey<S>;
  character: ArgKey<S>;
}

/** Synchronous file-system view used while validating arguments. */
export interface FileProbe {
  isFile(path: string): boolean;
  isDirectory(path: string): boolean;
}

export interface CommandSpec<S extends z.ZodRawShape> {
  name: string;
  description: string;
  args: S;
  timeout: TimeoutClass;
  /** Path-valued arguments, resolved against the workspace root and checked. */
  paths?: { readonly [K in ArgKey<S>]?: PathRule };
  positions?: readonly PositionRule<S>[];
  /** Extra argument checks; returns the problems found. */
  validate?: (args: Args<S>, files: FileProbe) => string[];
  /** Documents derived from the arguments that must be open as well. */
  documents?: (args: Args<S>, files: FileProbe, workspaceRoot: string) => string[];
  steps: (args: Args<S>, files: FileProbe) => ProtocolStep[];
  extract: (args: Args<S>, ctx: StepContext, files: FileProbe) => CommandOutput;
}

export interface PreparedCommand {
  readonly command: string;
  readonly timeout: TimeoutClass;
  readonly documents: readonly string[];
  readonly steps: readonly ProtocolStep[];
  extract(ctx: StepContext): CommandOutput;
}

export interface PrepareEnvironment {
  workspaceRoot: string;
  readText: (path: string) => Promise<string>;
  files?: FileProbe;
}

/** A registered command with its argument types erased. */
export interface CommandDescriptor {
  readonly name: string;
  readonly description: string;
  readonly argsShape: z.ZodRawShape;
  readonly timeout: TimeoutClass;
  /**
   * Validates raw arguments and builds the step list. Reads files but never
   * talks to the analyzer. Throws InvalidArguments.
   */
  prepare(rawArgs: unknown, env: PrepareEnvironment): Promise<PreparedCommand>;
}

export const nodeFileProbe: FileProbe = {
  isFile: (path) => {
    try {
      return statSync(path).isFile();
    } catch {
      return false;
    }
  },
  isDirectory: (path) => {
    try {
      return statSync(path).isDirectory();
    } catch {
      return false;
    }
  },
};

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.join('.')}: ${issue.message}`
      : issue.message,
  );
}

function checkPosition(
  text: string,
  line: number,
  character: number,
): string | null {
  const lines = text.split('\n');
  if (line >= lines.length) {
    return `line ${line} is past the end of the file (${lines.length} lines)`;
  }
  const length = lines[line].replace(/\r$/, '').length;
  if (character > length) {
    return `character ${character} is past the end of line ${line} (${length} characters)`;
  }
  return null;
}

/** Wraps a typed command record into an erased descriptor. */
export function defineCommand<S extends z.ZodRawShape>(
  spec: CommandSpec<S>,
): CommandDescriptor {
  const schema = z.object(spec.args).strict();

  return {
    name: spec.name,
    description: spec.description,
    argsShape: spec.args,
    timeout: spec.timeout,

    async prepare(rawArgs, env) {
      const files = env.files ?? nodeFileProbe;
      const invalid = (issues: string[]) =>
        new InvalidArguments(spec.name, issues);

      const parsed = schema.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        throw invalid(formatIssues(parsed.error));
      }
      const raw = isRecord(rawArgs) ? rawArgs : {};

      const issues: string[] = [];
      const resolvedPaths: Record<string, string> = {};
      const documents: string[] = [];
      const rules: Partial<Record<string, PathRule>> = spec.paths ?? {};

      for (const [field, rule] of Object.entries(rules)) {
        const value = raw[field];
        if (rule === undefined || typeof value !== 'string') {
          continue;
        }
        const absolute = resolveWorkspacePath(value, env.workspaceRoot);
        if (absolute === null) {
          issues.push(`${field}: '${value}' is outside the workspace`);
          continue;
        }
        resolvedPaths[field] = absolute;
        switch (rule) {
          case 'document':
            if (files.isFile(absolute)) {
              documents.push(absolute);
            } else {
              issues.push(`${field}: file '${value}' does not exist`);
            }
            break;
          case 'optional-document':
            if (files.isFile(absolute)) {
              documents.push(absolute);
            }
            break;
          case 'directory':
            if (!files.isDirectory(absolute)) {
              issues.push(`${field}: directory '${value}' does not exist`);
            }
            break;
          default:
            break;
        }
      }
      if (issues.length > 0) {
        throw invalid(issues);
      }

      const args = schema.parse({ ...raw, ...resolvedPaths });

      for (const rule of spec.positions ?? []) {
        const path = resolvedPaths[rule.file];
        const line = raw[rule.line];
        const character = raw[rule.character];
        if (
          path === undefined ||
          typeof line !== 'number' ||
          typeof character !== 'number'
        ) {
          continue;
        }
        const problem = checkPosition(await env.readText(path), line, character);
        if (problem) {
          issues.push(`${rule.line}/${rule.character}: ${problem}`);
        }
      }
      issues.push(...(spec.validate?.(args, files) ?? []));
      if (issues.length > 0) {
        throw invalid(issues);
      }

      for (const derived of spec.documents?.(args, files, env.workspaceRoot) ?? []) {
        if (!documents.includes(derived)) {
          documents.push(derived);
        }
      }

      return {
        command: spec.name,
        timeout: spec.timeout,
        documents,
        steps: spec.steps(args, files),
        extract: (ctx) => spec.extract(args, ctx, files),
      };
    },
  };
}

// ─── Registry ────────────────────────────────────────────────────────────────

export class CommandRegistry {
  private readonly commands = new Map<string, CommandDescriptor>();

  register(descriptor: CommandDescriptor): void {
    if (this.commands.has(descriptor.name)) {
      throw new DuplicateCommand(descriptor.name);
    }
    this.commands.set(descriptor.name, Object.freeze(descriptor));
  }

  registerAll(descriptors: readonly CommandDescriptor[]): void {
    for (const descriptor of descriptors) {
      this.register(descriptor);
    }
  }

  get(name: string): CommandDescriptor | undefined {
    return this.commands.get(name);
  }

  has(name: string): boolean {
    return this.commands.has(name);
  }

  list(): CommandDescriptor[] {
    return [...this.commands.values()].sort((a, b) =>
      a.name.localeCompare(b.name),
    );
  }
}
