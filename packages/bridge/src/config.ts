/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { existsSync, readFileSync } from 'node:fs';
import { join, resolve } from 'node:path';

import yargs from 'yargs/yargs';
import { z } from 'zod';

export const CONFIG_FILE_NAME = '.analyzer-bridge.json';
export const CONFIG_ENV_VAR = 'ANALYZER_BRIDGE_CONFIG';

const positiveMs = (fallback: number) =>
  z.number().int().positive().default(fallback);

export const TimeoutsSchema = z
  .object({
    navigation: positiveMs(10_000),
    default: positiveMs(30_000),
    project: positiveMs(120_000),
    initialize: positiveMs(60_000),
    shutdownGrace: positiveMs(3_000),
    diagnosticsQuiet: positiveMs(750),
  })
  .strict();

export const AnalyzerSchema = z
  .object({
    command: z.string().min(1).default('rust-analyzer'),
    args: z.array(z.string()).default([]),
    env: z.record(z.string()).default({}),
    /** Sent as initializationOptions and returned for `workspace/configuration`. */
    settings: z.record(z.unknown()).default({}),
  })
  .strict();

export const BridgeConfigSchema = z
  .object({
    workspaceRoot: z.string().min(1),
    channel: z.enum(['mcp', 'rpc']).default('mcp'),
    analyzer: AnalyzerSchema.default({}),
    timeouts: TimeoutsSchema.default({}),
    /** Consecutive malformed messages tolerated before a forced restart; 0 disables. */
    maxMalformedMessages: z.number().int().nonnegative().default(3),
  })
  .strict();

export type BridgeConfig = z.infer<typeof BridgeConfigSchema>;
export type BridgeConfigInput = z.input<typeof BridgeConfigSchema>;
export type ChannelKind = BridgeConfig['channel'];

export class ConfigLoadError extends Error {
  readonly source?: string;

  constructor(message: string, source?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigLoadError';
    this.source = source;
  }
}

type ConfigLayer = Record<string, unknown>;

const isRecord = (value: unknown): value is ConfigLayer =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/** Later layers win; nested objects merge, arrays and scalars replace. */
export function mergeLayers(...layers: readonly ConfigLayer[]): ConfigLayer {
  const merged: ConfigLayer = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      const current = merged[key];
      merged[key] =
        isRecord(current) && isRecord(value) ? mergeLayers(current, value) : value;
    }
  }
  return merged;
}

function parseJsonLayer(text: string, source: string): ConfigLayer {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigLoadError(
      `Invalid JSON in ${source}: ${error instanceof Error ? error.message : String(error)}`,
      source,
      { cause: error },
    );
  }
  if (!isRecord(parsed)) {
    throw new ConfigLoadError(`${source} must contain a JSON object`, source);
  }
  return parsed;
}

function readConfigFile(path: string): ConfigLayer {
  let text: string;
  try {
    text = readFileSync(path, 'utf8');
  } catch (error) {
    throw new ConfigLoadError(`Cannot read config file ${path}`, path, {
      cause: error,
    });
  }
  return parseJsonLayer(text, path);
}

export interface CliArgs {
  workspace?: string;
  config?: string;
  command?: string;
  arg?: string[];
  channel?: ChannelKind;
}

export function parseArguments(argv: readonly string[]): CliArgs {
  const result = yargs([...argv])
    .scriptName('analyzer-bridge')
    .usage('$0 [options]', 'Serve rust-analyzer commands over MCP or JSON-RPC')
    .option('workspace', {
      alias: 'w',
      type: 'string',
      description: 'Workspace root (defaults to the current directory)',
    })
    .option('config', {
      alias: 'c',
      type: 'string',
      description: `JSON config file (defaults to <workspace>/${CONFIG_FILE_NAME})`,
    })
    .option('command', {
      type: 'string',
      description: 'Analyzer executable',
    })
    .option('arg', {
      type: 'string',
      array: true,
      description: 'Argument passed to the analyzer (repeatable)',
    })
    .option('channel', {
      type: 'string',
      choices: ['mcp', 'rpc'] as const,
      description: 'Tool channel served on stdio',
    })
    .strict()
    .exitProcess(false)
    .fail((message, error) => {
      throw new ConfigLoadError(error?.message ?? message, 'argv', {
        cause: error,
      });
    })
    .parseSync();

  const args: CliArgs = {};
  if (result.workspace !== undefined) args.workspace = result.workspace;
  if (result.config !== undefined) args.config = result.config;
  if (result.command !== undefined) args.command = result.command;
  if (result.arg !== undefined) args.arg = result.arg;
  if (result.channel !== undefined) args.channel = result.channel;
  return args;
}

function flagsLayer(args: CliArgs, cwd: string): ConfigLayer {
  const analyzer: ConfigLayer = {};
  if (args.command !== undefined) analyzer.command = args.command;
  if (args.arg !== undefined) analyzer.args = args.arg;

  const layer: ConfigLayer = {};
  if (args.workspace !== undefined) layer.workspaceRoot = resolve(cwd, args.workspace);
  if (args.channel !== undefined) layer.channel = args.channel;
  if (Object.keys(analyzer).length > 0) layer.analyzer = analyzer;
  return layer;
}

export interface LoadConfigOptions {
  argv: readonly string[];
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}

/**
 * Defaults, then the config file, then `ANALYZER_BRIDGE_CONFIG`, then
 * command-line flags.
 */
export function loadBridgeConfig(options: LoadConfigOptions): BridgeConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const args = parseArguments(options.argv);

  const envText = env[CONFIG_ENV_VAR];
  const envLayer =
    envText === undefined || envText.trim() === ''
      ? {}
      : parseJsonLayer(envText, CONFIG_ENV_VAR);

  const workspaceGuess = resolve(
    cwd,
    args.workspace ??
      (typeof envLayer.workspaceRoot === 'string' ? envLayer.workspaceRoot : '.'),
  );
  let fileLayer: ConfigLayer = {};
  if (args.config !== undefined) {
    fileLayer = readConfigFile(resolve(cwd, args.config));
  } else {
    const defaultPath = join(workspaceGuess, CONFIG_FILE_NAME);
    if (existsSync(defaultPath)) {
      fileLayer = readConfigFile(defaultPath);
    }
  }

  const merged = mergeLayers(
    { workspaceRoot: workspaceGuess },
    fileLayer,
    envLayer,
    flagsLayer(args, cwd),
  );
  if (typeof merged.workspaceRoot === 'string') {
    merged.workspaceRoot = resolve(cwd, merged.workspaceRoot);
  }

  const parsed = BridgeConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new ConfigLoadError(`Invalid configuration: ${issues}`);
  }
  return parsed.data;
}

/** Fully-defaulted config for a workspace; used by tests and embedders. */
export function createBridgeConfig(input: BridgeConfigInput): BridgeConfig {
  return BridgeConfigSchema.parse(input);
}
