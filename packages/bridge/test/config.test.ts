/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';

import {
  CONFIG_ENV_VAR,
  CONFIG_FILE_NAME,
  ConfigLoadError,
  createBridgeConfig,
  loadBridgeConfig,
  mergeLayers,
} from '../src/config.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'analyzer-bridge-config-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('loadBridgeConfig', () => {
  it('uses the current directory and built-in defaults', () => {
    const config = loadBridgeConfig({ argv: [], env: {}, cwd: dir });

    expect(config).toEqual({
      workspaceRoot: dir,
      channel: 'mcp',
      analyzer: { command: 'rust-analyzer', args: [], env: {}, settings: {} },
      timeouts: {
        navigation: 10_000,
        default: 30_000,
        project: 120_000,
        initialize: 60_000,
        shutdownGrace: 3_000,
        diagnosticsQuiet: 750,
      },
      maxMalformedMessages: 3,
    });
  });

  it('layers the workspace file, the environment and flags in that order', async () => {
    await writeFile(
      join(dir, CONFIG_FILE_NAME),
      JSON.stringify({
        channel: 'rpc',
        timeouts: { navigation: 5000 },
        analyzer: { command: 'ra-file', settings: { checkOnSave: false } },
      }),
    );

    const config = loadBridgeConfig({
      argv: ['--command', 'ra-flag', '--arg', 'verbose'],
      env: {
        [CONFIG_ENV_VAR]: JSON.stringify({
          timeouts: { default: 20_000 },
          analyzer: { command: 'ra-env' },
        }),
      },
      cwd: dir,
    });

    expect(config.channel).toBe('rpc');
    expect(config.timeouts).toMatchObject({ navigation: 5000, default: 20_000, project: 120_000 });
    expect(config.analyzer).toEqual({
      command: 'ra-flag',
      args: ['verbose'],
      env: {},
      settings: { checkOnSave: false },
    });
  });

  it('resolves --workspace against the current directory', async () => {
    const config = loadBridgeConfig({ argv: ['--workspace', 'crates/demo'], env: {}, cwd: dir });

    expect(config.workspaceRoot).toBe(join(dir, 'crates', 'demo'));
  });

  it('reads an explicit --config file', async () => {
    const file = join(dir, 'bridge.json');
    await writeFile(file, JSON.stringify({ maxMalformedMessages: 0 }));

    const config = loadBridgeConfig({ argv: ['--config', 'bridge.json'], env: {}, cwd: dir });

    expect(config.maxMalformedMessages).toBe(0);
  });

  it('reports invalid JSON in the environment variable', () => {
    expect(() =>
      loadBridgeConfig({ argv: [], env: { [CONFIG_ENV_VAR]: '{nope' }, cwd: dir }),
    ).toThrow(/^Invalid JSON in ANALYZER_BRIDGE_CONFIG: /);
  });

  it('reports values the schema refuses', async () => {
    await writeFile(join(dir, CONFIG_FILE_NAME), JSON.stringify({ timeouts: { navigation: -1 } }));

    expect(() => loadBridgeConfig({ argv: [], env: {}, cwd: dir })).toThrow(
      'Invalid configuration: timeouts.navigation: Number must be greater than 0',
    );
  });

  it('refuses a config file that is not an object', async () => {
    const file = join(dir, 'list.json');
    await writeFile(file, '[1, 2]');

    expect(() => loadBridgeConfig({ argv: ['--config', file], env: {}, cwd: dir })).toThrow(
      `${file} must contain a JSON object`,
    );
  });

  it('keeps the read failure as the cause of a missing config file', () => {
    const file = join(dir, 'missing.json');
    let thrown: unknown;
    try {
      loadBridgeConfig({ argv: ['--config', 'missing.json'], env: {}, cwd: dir });
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(ConfigLoadError);
    expect(thrown).toMatchObject({
      message: `Cannot read config file ${file}`,
      source: file,
      cause: { code: 'ENOENT' },
    });
  });

  it('turns unknown flags into ConfigLoadError', () => {
    expect(() => loadBridgeConfig({ argv: ['--bogus'], env: {}, cwd: dir })).toThrow(
      ConfigLoadError,
    );
  });

  it('rejects an unknown channel', () => {
    expect(() => loadBridgeConfig({ argv: ['--channel', 'http'], env: {}, cwd: dir })).toThrow(
      ConfigLoadError,
    );
  });
});

describe('mergeLayers', () => {
  it('merges nested objects and replaces arrays and scalars', () => {
    expect(
      mergeLayers(
        { analyzer: { command: 'a', args: ['x'] }, channel: 'mcp' },
        { analyzer: { args: ['y'] }, channel: 'rpc' },
      ),
    ).toEqual({ analyzer: { command: 'a', args: ['y'] }, channel: 'rpc' });
  });
});

describe('createBridgeConfig', () => {
  it('fills in every default', () => {
    const config = createBridgeConfig({ workspaceRoot: '/ws' });

    expect(config.analyzer.command).toBe('rust-analyzer');
    expect(config.timeouts.diagnosticsQuiet).toBe(750);
  });
});
