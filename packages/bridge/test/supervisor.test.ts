/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { EventEmitter } from 'node:events';
import { tmpdir } from 'node:os';
import { PassThrough } from 'node:stream';

import { describe, expect, it } from 'vitest';

import {
  ProcessSupervisor,
  type ChildProcessLike,
  type TerminationInfo,
} from '../src/service/supervisor.js';
import { FakeAnalyzer } from './fixtures/fake-analyzer.js';
import { delay } from './fixtures/results.js';

/** Ignores stdin closing; only leaves when killed. */
class StubbornProcess extends EventEmitter implements ChildProcessLike {
  readonly stdin = new PassThrough();
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  exitCode: number | null = null;
  readonly signals: NodeJS.Signals[] = [];

  constructor() {
    super();
    setImmediate(() => this.emit('spawn'));
  }

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.signals.push(signal);
    setImmediate(() => this.emit('exit', null, signal));
    return true;
  }
}

function supervise(child: ChildProcessLike, cwd = tmpdir()) {
  const terminations: TerminationInfo[] = [];
  const supervisor = new ProcessSupervisor({
    command: 'rust-analyzer',
    args: [],
    cwd,
    spawn: () => child,
  });
  supervisor.onTerminated((info) => terminations.push(info));
  return { supervisor, terminations };
}

describe('ProcessSupervisor', () => {
  it('refuses a working directory that does not exist', async () => {
    let spawned = false;
    const supervisor = new ProcessSupervisor({
      command: 'rust-analyzer',
      args: [],
      cwd: '/definitely/not/here',
      spawn: () => {
        spawned = true;
        return new FakeAnalyzer();
      },
    });

    await expect(supervisor.start()).rejects.toMatchObject({
      kind: 'ProcessSpawnError',
      message:
        "Failed to start analyzer 'rust-analyzer': working directory '/definitely/not/here' does not exist",
    });
    expect(spawned).toBe(false);
  });

  it('reports a spawn that fails synchronously', async () => {
    const supervisor = new ProcessSupervisor({
      command: 'rust-analyzer',
      args: [],
      cwd: tmpdir(),
      spawn: () => {
        throw new Error('spawn EACCES');
      },
    });

    await expect(supervisor.start()).rejects.toMatchObject({
      kind: 'ProcessSpawnError',
      message: "Failed to start analyzer 'rust-analyzer': spawn EACCES",
    });
  });

  it('reports a spawn that fails with an error event', async () => {
    const { supervisor } = supervise(
      new FakeAnalyzer({ spawnError: new Error('spawn rust-analyzer ENOENT') }),
    );

    await expect(supervisor.start()).rejects.toMatchObject({
      message: "Failed to start analyzer 'rust-analyzer': spawn rust-analyzer ENOENT",
    });
    expect(supervisor.running).toBe(false);
  });

  it('forwards output and writes input', async () => {
    const child = new FakeAnalyzer();
    const { supervisor } = supervise(child);
    const chunks: string[] = [];
    const written: string[] = [];
    supervisor.onOutput((chunk) => chunks.push(chunk.toString('utf8')));
    child.stdin.on('data', (chunk: Buffer) => written.push(chunk.toString('utf8')));

    await supervisor.start();
    child.stdout.write('hello');
    supervisor.write(Buffer.from('ping'));
    await delay(5);

    expect(supervisor.running).toBe(true);
    expect(supervisor.pid).toBe(4242);
    expect(chunks).toEqual(['hello']);
    expect(written).toEqual(['ping']);
  });

  it('reports an unexpected exit once', async () => {
    const child = new FakeAnalyzer();
    const { supervisor, terminations } = supervise(child);
    await supervisor.start();

    child.exit(101, null);
    await delay(5);

    expect(terminations).toEqual([
      {
        expected: false,
        code: 101,
        signal: null,
        reason: 'analyzer exited (code=101, signal=null)',
      },
    ]);
    expect(supervisor.running).toBe(false);
    expect(() => supervisor.write(Buffer.from('x'))).toThrow(
      'Analyzer session terminated: analyzer is not running',
    );
  });

  it('lets the process leave when stdin closes', async () => {
    const child = new FakeAnalyzer();
    const { supervisor, terminations } = supervise(child);
    await supervisor.start();

    await supervisor.stop(1000);

    expect(child.killedWith).toBeNull();
    expect(terminations.map((info) => info.expected)).toEqual([true]);
    expect(supervisor.running).toBe(false);
  });

  it('kills a process that outlives the grace period', async () => {
    const child = new StubbornProcess();
    const { supervisor, terminations } = supervise(child);
    await supervisor.start();

    await supervisor.stop(20);

    expect(child.signals).toEqual(['SIGKILL']);
    expect(terminations).toEqual([
      {
        expected: true,
        code: null,
        signal: 'SIGKILL',
        reason: 'analyzer exited (code=null, signal=SIGKILL)',
      },
    ]);
  });

  it('does nothing when stopped before starting', async () => {
    const { supervisor, terminations } = supervise(new FakeAnalyzer());

    await supervisor.stop(10);

    expect(terminations).toEqual([]);
  });
});
