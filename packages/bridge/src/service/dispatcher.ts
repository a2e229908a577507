/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type {
  CommandRegistry,
  PreparedCommand,
  ProtocolStep,
  StepContext,
} from '../commands/registry.js';
import type { BridgeConfig } from '../config.js';
import { DebugLogger } from '../debug/DebugLogger.js';
import {
  AnalyzerReportedError,
  CommandCancelled,
  SessionTerminated,
  toBridgeError,
  UnknownCommand,
  type CommandResult,
} from '../errors.js';
import type { CommandOutput, DiagnosticEntry } from '../types.js';
import type { AnalyzerSession } from './session.js';
import { SessionLock } from './session-lock.js';

export interface ExecuteOptions {
  signal?: AbortSignal;
}

/** Step view over the session for one running command. */
class ExecutionContext implements StepContext {
  private readonly results = new Map<string, unknown>();

  constructor(private readonly session: AnalyzerSession) {}

  get workspaceRoot(): string {
    return this.session.workspaceRoot;
  }

  get serverCapabilities(): Readonly<Record<string, unknown>> {
    return this.session.serverCapabilities;
  }

  record(stepId: string, value: unknown): void {
    this.results.set(stepId, value);
  }

  result(stepId: string): unknown {
    return this.results.get(stepId);
  }

  documentText(path: string): string | undefined {
    return this.session.documents.get(path)?.text;
  }

  diagnostics(path: string): DiagnosticEntry[] {
    return this.session.diagnosticsFor(path);
  }

  allDiagnostics(): DiagnosticEntry[] {
    return this.session.diagnostics.allEntries();
  }
}

function throwIfAborted(signal: AbortSignal | undefined, command: string): void {
  if (signal?.aborted) {
    throw new CommandCancelled(command);
  }
}

/**
 * Runs named commands against one analyzer session, one at a time and in
 * arrival order. `execute` reports every failure through its result.
 */
export class CommandDispatcher {
  private readonly logger = DebugLogger.getLogger('dispatcher');
  private readonly lock = new SessionLock();

  constructor(
    private readonly registry: CommandRegistry,
    private readonly session: AnalyzerSession,
    private readonly config: BridgeConfig,
  ) {}

  /** Commands queued behind the one currently running. */
  get queued(): number {
    return this.lock.waiting;
  }

  get busy(): boolean {
    return this.lock.locked;
  }

  async execute(
    name: string,
    args: unknown,
    options: ExecuteOptions = {},
  ): Promise<CommandResult<CommandOutput>> {
    const descriptor = this.registry.get(name);
    if (!descriptor) {
      this.logger.debug(() => `rejecting unknown command ${name}`);
      return { ok: false, error: new UnknownCommand(name) };
    }

    // Requested before the first await: commands run in submission order.
    const { signal } = options;
    const acquired = this.lock.acquire(signal, name);
    let release: (() => void) | undefined;
    try {
      release = await acquired;
      const prepared = await descriptor.prepare(args, {
        workspaceRoot: this.config.workspaceRoot,
        readText: (path) => this.session.documents.read(path),
      });
      const started = Date.now();
      const value = await this.run(prepared, signal);
      this.logger.debug(() => `${name} finished in ${Date.now() - started}ms`);
      return { ok: true, value };
    } catch (error) {
      const bridgeError = toBridgeError(error);
      this.logger.debug(() => `${name} failed: ${bridgeError.kind}: ${bridgeError.message}`);
      return { ok: false, error: bridgeError };
    } finally {
      release?.();
    }
  }

  /**
   * Runs `task` while holding the session lock, so lifecycle operations
   * never interleave with a command.
   */
  async exclusive<T>(task: () => Promise<T>): Promise<T> {
    return this.lock.runExclusive(task);
  }

  private async run(
    prepared: PreparedCommand,
    signal: AbortSignal | undefined,
  ): Promise<CommandOutput> {
    const { command } = prepared;
    if (this.session.needsRestart) {
      this.logger.warn(`restarting analyzer before ${command}`);
      await this.session.restart();
    }
    if (this.session.status === 'failed') {
      throw new SessionTerminated(this.session.terminationReason ?? 'analyzer failed');
    }
    await this.session.ensureInitialized();
    for (const document of prepared.documents) {
      throwIfAborted(signal, command);
      await this.session.ensureOpen(document);
    }

    const ctx = new ExecutionContext(this.session);
    const timeoutMs = this.config.timeouts[prepared.timeout];
    for (const step of prepared.steps) {
      throwIfAborted(signal, command);
      await this.runStep(step, ctx, { command, timeoutMs, signal });
    }
    throwIfAborted(signal, command);
    return prepared.extract(ctx);
  }

  private async runStep(
    step: ProtocolStep,
    ctx: ExecutionContext,
    options: { command: string; timeoutMs: number; signal?: AbortSignal },
  ): Promise<void> {
    if (step.skipIf?.(ctx)) {
      this.logger.debug(() => `${options.command}: skipped ${describeStep(step)}`);
      return;
    }
    switch (step.kind) {
      case 'notification':
        this.session.notify(step.method, step.params(ctx));
        return;
      case 'settle-diagnostics':
        await this.session.diagnostics.waitForQuiet(
          this.config.timeouts.diagnosticsQuiet,
          options.timeoutMs,
          options.signal,
        );
        return;
      case 'request': {
        let result: unknown;
        try {
          result = await this.session.request(step.method, step.params(ctx), options);
        } catch (error) {
          if (!step.optional || !(error instanceof AnalyzerReportedError)) {
            throw error;
          }
          this.logger.debug(
            () => `${options.command}: optional ${step.method} failed: ${error.message}`,
          );
          result = null;
        }
        ctx.record(step.id, result);
        const problem = step.check?.(result, ctx);
        if (problem) {
          throw new AnalyzerReportedError(problem);
        }
        return;
      }
      default:
        return;
    }
  }
}

function describeStep(step: ProtocolStep): string {
  return step.kind === 'settle-diagnostics' ? 'diagnostics settle' : step.method;
}
