/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

import { createBridge, type Bridge } from '../../src/service/bridge.js';
import { createBridgeConfig, type BridgeConfigInput } from '../../src/config.js';
import { toFileUri } from '../../src/util/paths.js';
import { createFakeSpawner, type FakeAnalyzerOptions, type FakeSpawner } from './fake-analyzer.js';

export const LIB_RS = [
  'pub fn add(a: i32, b: i32) -> i32 {',
  '    a + b',
  '}',
  '',
  'pub struct Point {',
  '    pub x: i32,',
  '}',
  '',
].join('\n');

export const CARGO_TOML = [
  '[package]',
  'name = "demo"',
  'version = "0.1.0"',
  'edition = "2021"',
  '',
  '[dependencies]',
  'serde = "1"',
  '',
].join('\n');

export interface TestWorkspace {
  root: string;
  path(relative: string): string;
  uri(relative: string): string;
  write(relative: string, text: string): Promise<void>;
  dispose(): Promise<void>;
}

/** A throwaway crate on disk: Cargo.toml and src/lib.rs unless `files` says otherwise. */
export async function createWorkspace(
  files: Record<string, string> = { 'Cargo.toml': CARGO_TOML, 'src/lib.rs': LIB_RS },
): Promise<TestWorkspace> {
  const root = await mkdtemp(join(tmpdir(), 'analyzer-bridge-'));
  const workspace: TestWorkspace = {
    root,
    path: (relative) => join(root, relative),
    uri: (relative) => toFileUri(join(root, relative)),
    write: async (relative, text) => {
      const target = join(root, relative);
      await mkdir(dirname(target), { recursive: true });
      await writeFile(target, text, 'utf8');
    },
    dispose: () => rm(root, { recursive: true, force: true }),
  };
  for (const [relative, text] of Object.entries(files)) {
    await workspace.write(relative, text);
  }
  return workspace;
}

export const FAST_TIMEOUTS = {
  navigation: 500,
  default: 500,
  project: 500,
  initialize: 500,
  shutdownGrace: 50,
  diagnosticsQuiet: 20,
};

export interface Harness {
  workspace: TestWorkspace;
  spawner: FakeSpawner;
  bridge: Bridge;
  dispose(): Promise<void>;
}

/** A bridge over an in-process fake analyzer, rooted in a fresh workspace. */
export async function createHarness(
  options: FakeAnalyzerOptions | ((workspace: TestWorkspace) => FakeAnalyzerOptions) = {},
  config: Partial<BridgeConfigInput> = {},
  files?: Record<string, string>,
): Promise<Harness> {
  const workspace = await createWorkspace(files);
  const spawner = createFakeSpawner(
    typeof options === 'function' ? options(workspace) : options,
  );
  const bridge = createBridge(
    createBridgeConfig({
      timeouts: FAST_TIMEOUTS,
      ...config,
      workspaceRoot: workspace.root,
    }),
    { spawn: spawner.spawn },
  );
  return {
    workspace,
    spawner,
    bridge,
    dispose: async () => {
      await bridge.shutdown();
      await workspace.dispose();
    },
  };
}
