/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { afterEach, describe, expect, it } from 'vitest';

import { hoverSignature } from '../src/commands/navigation.js';
import { FakeResponseError, type FakeAnalyzerOptions } from './fixtures/fake-analyzer.js';
import { outputOf, textOf } from './fixtures/results.js';
import { createHarness, type Harness, type TestWorkspace } from './fixtures/workspace.js';

const range = (sl: number, sc: number, el: number, ec: number) => ({
  start: { line: sl, character: sc },
  end: { line: el, character: ec },
});

const AT_POINT = { file_path: 'src/lib.rs', line: 4, character: 11 };

let harness: Harness | undefined;

async function setup(
  requests: (workspace: TestWorkspace) => FakeAnalyzerOptions['requests'],
): Promise<Harness> {
  harness = await createHarness((workspace) => ({ requests: requests(workspace) }));
  return harness;
}

afterEach(async () => {
  await harness?.dispose();
  harness = undefined;
});

describe('hoverSignature', () => {
  it('keeps only the code blocks of a markdown hover', () => {
    expect(
      hoverSignature('```rust\ndemo\n```\n\n```rust\npub struct Point\n```\n---\nA point.'),
    ).toBe('demo\npub struct Point');
  });

  it('falls back to the text before the first rule', () => {
    expect(hoverSignature('Adds two numbers.\n---\nMore detail')).toBe('Adds two numbers.');
  });
});

describe('find_references', () => {
  it('passes the declaration flag and lists every location', async () => {
    const { bridge, spawner, workspace } = await setup((ws) => ({
      'textDocument/references': () => [
        { uri: ws.uri('src/lib.rs'), range: range(0, 7, 0, 10) },
        { uri: ws.uri('src/main.rs'), range: range(3, 12, 3, 15) },
      ],
    }));

    const text = textOf(
      await bridge.execute('find_references', {
        file_path: 'src/lib.rs',
        line: 0,
        character: 7,
        include_declaration: false,
      }),
    );

    expect(text).toBe('src/lib.rs:0:7\nsrc/main.rs:3:12');
    expect(spawner.current.paramsFor('textDocument/references')).toEqual([
      {
        textDocument: { uri: workspace.uri('src/lib.rs') },
        position: { line: 0, character: 7 },
        context: { includeDeclaration: false },
      },
    ]);
  });

  it('says so when there are none', async () => {
    const { bridge } = await setup(() => ({}));

    expect(
      textOf(
        await bridge.execute('find_references', { file_path: 'src/lib.rs', line: 0, character: 7 }),
      ),
    ).toBe('No references found');
  });
});

describe('hover', () => {
  it('returns the hover markdown', async () => {
    const { bridge } = await setup(() => ({
      'textDocument/hover': () => ({
        contents: { kind: 'markdown', value: '```rust\npub fn add(a: i32, b: i32) -> i32\n```' },
      }),
    }));

    expect(
      textOf(await bridge.execute('hover', { file_path: 'src/lib.rs', line: 0, character: 7 })),
    ).toBe('```rust\npub fn add(a: i32, b: i32) -> i32\n```');
  });

  it('says so when there is nothing to show', async () => {
    const { bridge } = await setup(() => ({}));

    expect(
      textOf(await bridge.execute('hover', { file_path: 'src/lib.rs', line: 3, character: 0 })),
    ).toBe('No hover information');
  });
});

describe('symbols', () => {
  it('lists the symbols of a document', async () => {
    const { bridge, workspace } = await setup(() => ({
      'textDocument/documentSymbol': () => [
        { name: 'add', kind: 12, range: range(0, 0, 2, 1) },
        {
          name: 'Point',
          kind: 23,
          range: range(4, 0, 6, 1),
          children: [{ name: 'x', kind: 8, range: range(5, 4, 5, 14) }],
        },
      ],
    }));

    const output = outputOf(await bridge.execute('document_symbols', { file_path: 'src/lib.rs' }));

    expect(output.text).toBe(
      'add [Function] src/lib.rs:0:0\nPoint [Struct] src/lib.rs:4:0\nx [Field] in Point src/lib.rs:5:4',
    );
    expect(output.kind === 'symbols' ? output.symbols[2] : undefined).toEqual({
      name: 'x',
      kind: 'Field',
      file: workspace.path('src/lib.rs'),
      range: range(5, 4, 5, 14),
      containerName: 'Point',
    });
  });

  it('searches the workspace without opening documents', async () => {
    const { bridge, spawner } = await setup((ws) => ({
      'workspace/symbol': () => [
        { name: 'Point', kind: 23, location: { uri: ws.uri('src/lib.rs'), range: range(4, 11, 4, 16) } },
      ],
    }));

    const text = textOf(await bridge.execute('workspace_symbols', { query: 'Poi' }));

    expect(text).toBe('Point [Struct] src/lib.rs:4:11');
    expect(spawner.current.methods).toEqual(['initialize', 'initialized', 'workspace/symbol']);
    expect(spawner.current.paramsFor('workspace/symbol')).toEqual([{ query: 'Poi' }]);
  });
});

describe('get_type_hierarchy', () => {
  it('combines the hover signature with the implementations', async () => {
    const { bridge } = await setup((ws) => ({
      'textDocument/hover': () => ({
        contents: { kind: 'markdown', value: '```rust\ndemo\n```\n\n```rust\npub struct Point\n```' },
      }),
      'textDocument/implementation': () => [
        { uri: ws.uri('src/lib.rs'), range: range(8, 0, 10, 1) },
      ],
    }));

    expect(textOf(await bridge.execute('get_type_hierarchy', AT_POINT))).toBe(
      'demo\npub struct Point\nImplementations:\n  src/lib.rs:8:0',
    );
  });

  it('tolerates a failing hover', async () => {
    const { bridge } = await setup(() => ({
      'textDocument/hover': () => {
        throw new FakeResponseError(-32801, 'content modified');
      },
    }));

    expect(textOf(await bridge.execute('get_type_hierarchy', AT_POINT))).toBe(
      'No implementations found',
    );
  });
});
