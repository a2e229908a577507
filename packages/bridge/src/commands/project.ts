/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { readFileSync } from 'node:fs';
import * as path from 'node:path';

import * as toml from '@iarna/toml';
import { z } from 'zod';

import { CommandFailed } from '../errors.js';
import { toDisplayPath } from '../util/paths.js';
import { defineCommand, type CommandDescriptor } from './registry.js';
import { filePathArg, requireText } from './common.js';
import { isRecord, parseSymbols } from './results.js';

// ─── Cargo manifests ─────────────────────────────────────────────────────────

const DependencySpecSchema = z.union([
  z.string(),
  z
    .object({
      version: z.string().optional(),
      path: z.string().optional(),
      git: z.string().optional(),
      branch: z.string().optional(),
      features: z.array(z.string()).optional(),
      optional: z.boolean().optional(),
      workspace: z.boolean().optional(),
    })
    .passthrough(),
]);

const DependencyTableSchema = z.record(DependencySpecSchema);

const ManifestSchema = z
  .object({
    package: z
      .object({
        name: z.string(),
        version: z.union([z.string(), z.object({ workspace: z.boolean() })]).optional(),
        edition: z.union([z.string(), z.object({ workspace: z.boolean() })]).optional(),
        'rust-version': z.string().optional(),
      })
      .passthrough()
      .optional(),
    workspace: z
      .object({
        members: z.array(z.string()).optional(),
        dependencies: DependencyTableSchema.optional(),
      })
      .passthrough()
      .optional(),
    dependencies: DependencyTableSchema.optional(),
    'dev-dependencies': DependencyTableSchema.optional(),
    'build-dependencies': DependencyTableSchema.optional(),
    features: z.record(z.array(z.string())).optional(),
  })
  .passthrough();

export type CargoManifest = z.infer<typeof ManifestSchema>;
export type DependencySpec = z.infer<typeof DependencySpecSchema>;

/** Parses Cargo.toml text; syntax and shape problems become CommandFailed. */
export function parseManifest(text: string, file: string): CargoManifest {
  let parsed: unknown;
  try {
    parsed = toml.parse(text);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new CommandFailed(`Invalid TOML in ${file}: ${detail}`, { cause: error });
  }
  const result = ManifestSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new CommandFailed(`Unexpected manifest layout in ${file}: ${issues}`);
  }
  return result.data;
}

export function describeDependency(name: string, spec: DependencySpec): string {
  if (typeof spec === 'string') {
    return `${name} ${spec}`;
  }
  const parts = [name];
  if (spec.version !== undefined) {
    parts.push(spec.version);
  } else if (spec.workspace === true) {
    parts.push('(workspace)');
  }
  if (spec.path !== undefined) {
    parts.push(`path ${spec.path}`);
  }
  if (spec.git !== undefined) {
    parts.push(spec.branch ? `git ${spec.git}#${spec.branch}` : `git ${spec.git}`);
  }
  if (spec.features && spec.features.length > 0) {
    parts.push(`[${spec.features.join(', ')}]`);
  }
  if (spec.optional === true) {
    parts.push('(optional)');
  }
  return parts.join(' ');
}

/** Every dependency name declared anywhere in the manifest. */
export function declaredDependencies(manifest: CargoManifest): Set<string> {
  return new Set([
    ...Object.keys(manifest.dependencies ?? {}),
    ...Object.keys(manifest['dev-dependencies'] ?? {}),
    ...Object.keys(manifest['build-dependencies'] ?? {}),
    ...Object.keys(manifest.workspace?.dependencies ?? {}),
  ]);
}

const inherited = (value: string | { workspace: boolean } | undefined): string | undefined =>
  typeof value === 'string' ? value : value ? 'workspace' : undefined;

function dependencySection(
  title: string,
  table: Record<string, DependencySpec> | undefined,
): string[] {
  const entries = Object.entries(table ?? {}).sort(([a], [b]) => a.localeCompare(b));
  if (entries.length === 0) {
    return [`${title}: none`];
  }
  return [
    `${title} (${entries.length}):`,
    ...entries.map(([name, spec]) => `  ${describeDependency(name, spec)}`),
  ];
}

export function formatManifest(manifest: CargoManifest, resolvedCrates?: number): string {
  const lines: string[] = [];
  const pkg = manifest.package;
  if (pkg) {
    const version = inherited(pkg.version);
    const edition = inherited(pkg.edition);
    lines.push(
      `Package: ${pkg.name}${version ? ` ${version}` : ''}${edition ? ` (edition ${edition})` : ''}`,
    );
    if (pkg['rust-version']) {
      lines.push(`Minimum Rust version: ${pkg['rust-version']}`);
    }
  } else {
    lines.push('Virtual manifest (no [package])');
  }
  const members = manifest.workspace?.members;
  if (members && members.length > 0) {
    lines.push(`Workspace members: ${members.join(', ')}`);
  }
  const features = Object.keys(manifest.features ?? {});
  if (features.length > 0) {
    lines.push(`Features: ${features.join(', ')}`);
  }
  lines.push(...dependencySection('Dependencies', manifest.dependencies));
  lines.push(...dependencySection('Dev-dependencies', manifest['dev-dependencies']));
  lines.push(...dependencySection('Build-dependencies', manifest['build-dependencies']));
  if (manifest.workspace?.dependencies) {
    lines.push(
      ...dependencySection('Workspace dependencies', manifest.workspace.dependencies),
    );
  }
  if (resolvedCrates !== undefined) {
    lines.push(`Resolved crates: ${resolvedCrates}`);
  }
  return lines.join('\n');
}

/** Number of crates in a `rust-analyzer/fetchDependencyList` result. */
function resolvedCrateCount(value: unknown): number | undefined {
  return isRecord(value) && Array.isArray(value.crates) ? value.crates.length : undefined;
}

export const analyzeManifest = defineCommand({
  name: 'analyze_manifest',
  description:
    'Summarize a Cargo.toml: package, features and declared dependencies',
  args: {
    manifest_path: filePathArg.describe('Path to Cargo.toml'),
  },
  timeout: 'project',
  paths: { manifest_path: 'document' },
  validate: (args) =>
    path.extname(args.manifest_path) === '.toml'
      ? []
      : ['manifest_path: must point at a .toml file'],
  steps: () => [
    {
      kind: 'request',
      id: 'crates',
      method: 'rust-analyzer/fetchDependencyList',
      optional: true,
      params: () => ({}),
    },
  ],
  extract: (args, ctx) => {
    const display = toDisplayPath(args.manifest_path, ctx.workspaceRoot);
    const manifest = parseManifest(requireText(ctx, args.manifest_path), display);
    return {
      kind: 'text',
      text: formatManifest(manifest, resolvedCrateCount(ctx.result('crates'))),
    };
  },
});

// ─── Dependency suggestions ──────────────────────────────────────────────────

const CrateSuggestionSchema = z.object({
  name: z.string(),
  description: z.string(),
  keywords: z.array(z.string()),
});

export type CrateSuggestion = z.infer<typeof CrateSuggestionSchema>;

const SUGGESTIONS_FILE = new URL('../../data/crate-suggestions.json', import.meta.url);

let crateTable: CrateSuggestion[] | undefined;

export function loadCrateSuggestions(): CrateSuggestion[] {
  if (!crateTable) {
    crateTable = z
      .array(CrateSuggestionSchema)
      .parse(JSON.parse(readFileSync(SUGGESTIONS_FILE, 'utf8')));
  }
  return crateTable;
}

/**
 * Ranks crates against the words of `query`: a keyword hit scores 3, a hit
 * in the crate name 2 and one in the description 1.
 */
export function rankSuggestions(
  table: readonly CrateSuggestion[],
  query: string,
): CrateSuggestion[] {
  const words = query
    .toLowerCase()
    .split(/[^a-z0-9_-]+/)
    .filter((word) => word.length > 0);
  const scored = table.map((crate) => {
    const description = crate.description.toLowerCase();
    const score = words.reduce((total, word) => {
      let points = 0;
      if (crate.keywords.includes(word)) {
        points += 3;
      }
      if (crate.name.includes(word)) {
        points += 2;
      }
      if (description.includes(word)) {
        points += 1;
      }
      return total + points;
    }, 0);
    return { crate, score };
  });
  return scored
    .filter((entry) => entry.score > 0)
    .sort((a, b) => b.score - a.score || a.crate.name.localeCompare(b.crate.name))
    .map((entry) => entry.crate);
}

const manifestFor = (directory: string): string => path.join(directory, 'Cargo.toml');

export const suggestDependencies = defineCommand({
  name: 'suggest_dependencies',
  description:
    'Suggest well-known crates for a need, leaving out those the manifest already declares',
  args: {
    query: z.string().trim().min(1).describe('What the dependency should do, e.g. "http client"'),
    workspace_path: filePathArg
      .optional()
      .describe('Directory holding the Cargo.toml to compare against'),
    limit: z.number().int().positive().max(20).default(5),
  },
  timeout: 'project',
  paths: { workspace_path: 'directory' },
  documents: (args, files, workspaceRoot) => {
    const manifest = manifestFor(args.workspace_path ?? workspaceRoot);
    return files.isFile(manifest) ? [manifest] : [];
  },
  steps: (args) => [
    {
      kind: 'request',
      id: 'symbols',
      method: 'workspace/symbol',
      optional: true,
      params: () => ({ query: args.query }),
    },
  ],
  extract: (args, ctx) => {
    const manifestPath = manifestFor(args.workspace_path ?? ctx.workspaceRoot);
    const manifestText = ctx.documentText(manifestPath);
    const declared =
      manifestText === undefined
        ? new Set<string>()
        : declaredDependencies(
            parseManifest(manifestText, toDisplayPath(manifestPath, ctx.workspaceRoot)),
          );

    const ranked = rankSuggestions(loadCrateSuggestions(), args.query);
    const fresh = ranked.filter((crate) => !declared.has(crate.name)).slice(0, args.limit);
    const alreadyDeclared = ranked
      .filter((crate) => declared.has(crate.name))
      .map((crate) => crate.name);

    const lines =
      fresh.length === 0
        ? [`No crate suggestions for '${args.query}'`]
        : [
            `Suggestions for '${args.query}':`,
            ...fresh.map((crate) => `  ${crate.name}: ${crate.description}`),
          ];
    if (alreadyDeclared.length > 0) {
      lines.push(`Already declared: ${alreadyDeclared.join(', ')}`);
    }
    const symbols = ctx.result('symbols');
    if (Array.isArray(symbols)) {
      lines.push(
        `Workspace symbols matching '${args.query}': ${parseSymbols(symbols).length}`,
      );
    }
    return { kind: 'text', text: lines.join('\n') };
  },
});

export const projectCommands: readonly CommandDescriptor[] = [
  analyzeManifest,
  suggestDependencies,
];
