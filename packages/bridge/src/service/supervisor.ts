/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { spawn } from 'node:child_process';
import type { EventEmitter } from 'node:events';
import { statSync } from 'node:fs';
import type { Readable, Writable } from 'node:stream';

import { DebugLogger } from '../debug/DebugLogger.js';
import { ProcessSpawnError, SessionTerminated } from '../errors.js';

/** The slice of `ChildProcess` the supervisor relies on. */
export interface ChildProcessLike extends EventEmitter {
  readonly stdin: Writable;
  readonly stdout: Readable;
  readonly stderr: Readable;
  readonly exitCode: number | null;
  readonly pid?: number;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: { cwd: string; env: NodeJS.ProcessEnv },
) => ChildProcessLike;

export interface SupervisorOptions {
  command: string;
  args: readonly string[];
  cwd: string;
  env?: NodeJS.ProcessEnv;
  spawn?: SpawnFunction;
}

export interface TerminationInfo {
  /** True when the exit followed a call to `stop()`. */
  expected: boolean;
  code: number | null;
  signal: NodeJS.Signals | null;
  reason: string;
}

export const spawnWithPipes: SpawnFunction = (command, args, options) =>
  spawn(command, [...args], {
    cwd: options.cwd,
    env: options.env,
    stdio: ['pipe', 'pipe', 'pipe'],
  });

const isDirectory = (path: string): boolean => {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
};

export class ProcessSupervisor {
  private readonly logger = DebugLogger.getLogger('supervisor');
  private readonly analyzerLogger = DebugLogger.getLogger('analyzer');
  private readonly spawnFn: SpawnFunction;
  private readonly outputListeners = new Set<(chunk: Buffer) => void>();
  private readonly terminationListeners = new Set<
    (info: TerminationInfo) => void
  >();
  private child: ChildProcessLike | null = null;
  private stopping = false;

  constructor(private readonly options: SupervisorOptions) {
    this.spawnFn = options.spawn ?? spawnWithPipes;
  }

  get running(): boolean {
    return this.child !== null;
  }

  get pid(): number | undefined {
    return this.child?.pid;
  }

  onOutput(listener: (chunk: Buffer) => void): () => void {
    this.outputListeners.add(listener);
    return () => this.outputListeners.delete(listener);
  }

  onTerminated(listener: (info: TerminationInfo) => void): () => void {
    this.terminationListeners.add(listener);
    return () => this.terminationListeners.delete(listener);
  }

  async start(): Promise<void> {
    if (this.child) {
      return;
    }
    const { command, args, cwd } = this.options;
    if (!isDirectory(cwd)) {
      throw new ProcessSpawnError(
        command,
        `working directory '${cwd}' does not exist`,
      );
    }

    let child: ChildProcessLike;
    try {
      child = this.spawnFn(command, args, {
        cwd,
        env: this.options.env ?? process.env,
      });
    } catch (error) {
      throw new ProcessSpawnError(
        command,
        error instanceof Error ? error.message : String(error),
        { cause: error },
      );
    }

    await new Promise<void>((resolve, reject) => {
      const onSpawn = (): void => {
        child.off('error', onError);
        resolve();
      };
      const onError = (error: Error): void => {
        child.off('spawn', onSpawn);
        reject(new ProcessSpawnError(command, error.message, { cause: error }));
      };
      child.once('spawn', onSpawn);
      child.once('error', onError);
    });

    this.stopping = false;
    this.child = child;
    this.attach(child);
    this.logger.log(
      () => `started '${command} ${args.join(' ')}' (pid=${String(child.pid)})`,
    );
  }

  write(data: Buffer): void {
    const child = this.child;
    if (!child || child.stdin.destroyed || !child.stdin.writable) {
      throw new SessionTerminated('analyzer is not running');
    }
    child.stdin.write(data);
  }

  /**
   * Closes stdin and waits up to `graceMs` for the process to leave on its
   * own, then sends SIGKILL. The protocol-level shutdown/exit exchange is the
   * session's job and happens before this.
   */
  async stop(graceMs: number): Promise<void> {
    const child = this.child;
    if (!child) {
      return;
    }
    this.stopping = true;
    if (child.exitCode !== null) {
      this.child = null;
      return;
    }

    const exited = new Promise<void>((resolve) => {
      child.once('exit', () => resolve());
    });
    if (!child.stdin.destroyed) {
      child.stdin.end();
    }

    let timer: ReturnType<typeof setTimeout> | null = null;
    const forced = new Promise<'forced'>((resolve) => {
      timer = setTimeout(() => resolve('forced'), graceMs);
    });
    const outcome = await Promise.race([exited, forced]);
    if (timer !== null) {
      clearTimeout(timer);
    }

    if (outcome === 'forced') {
      this.logger.warn(
        () => `analyzer did not exit within ${graceMs}ms, sending SIGKILL`,
      );
      child.kill('SIGKILL');
      let killTimer: ReturnType<typeof setTimeout> | null = null;
      await Promise.race([
        exited,
        new Promise<void>((resolve) => {
          killTimer = setTimeout(resolve, graceMs);
        }),
      ]);
      if (killTimer !== null) {
        clearTimeout(killTimer);
      }
    }
    if (this.child === child) {
      this.child = null;
    }
  }

  private attach(child: ChildProcessLike): void {
    let reported = false;
    const report = (
      code: number | null,
      signal: NodeJS.Signals | null,
      reason: string,
    ): void => {
      if (reported) {
        return;
      }
      reported = true;
      if (this.child === child) {
        this.child = null;
      }
      const info: TerminationInfo = {
        expected: this.stopping,
        code,
        signal,
        reason,
      };
      if (info.expected) {
        this.logger.debug(() => `analyzer stopped: ${reason}`);
      } else {
        this.logger.error(() => `analyzer terminated: ${reason}`);
      }
      for (const listener of this.terminationListeners) {
        listener(info);
      }
    };

    child.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      report(
        code,
        signal,
        `analyzer exited (code=${String(code)}, signal=${String(signal)})`,
      );
    });
    child.on('error', (error: Error) => {
      this.logger.error(() => `analyzer process error: ${error.message}`);
    });

    child.stdout.on('data', (chunk: Buffer | string) => {
      const bytes = typeof chunk === 'string' ? Buffer.from(chunk, 'utf8') : chunk;
      for (const listener of this.outputListeners) {
        listener(bytes);
      }
    });
    child.stdout.on('close', () => {
      report(child.exitCode, null, 'analyzer closed its output stream');
    });

    child.stdin.on('error', (error: Error) => {
      this.logger.warn(() => `analyzer stdin write failed: ${error.message}`);
    });

    let partialLine = '';
    child.stderr.on('data', (chunk: Buffer | string) => {
      const lines = (partialLine + chunk.toString()).split(/\r?\n/);
      partialLine = lines.pop() ?? '';
      for (const line of lines) {
        if (line.length > 0) {
          this.analyzerLogger.debug(() => line);
        }
      }
    });
  }
}
