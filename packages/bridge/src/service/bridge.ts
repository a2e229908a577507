/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { builtinCommands } from '../commands/index.js';
import {
  CommandRegistry,
  type CommandDescriptor,
} from '../commands/registry.js';
import type { BridgeConfig } from '../config.js';
import { DebugLogger } from '../debug/DebugLogger.js';
import type { CommandResult } from '../errors.js';
import type { CommandOutput, SessionStatus } from '../types.js';
import { CommandDispatcher, type ExecuteOptions } from './dispatcher.js';
import type { ReadFileFunction } from './documents.js';
import { AnalyzerSession } from './session.js';
import type { SpawnFunction } from './supervisor.js';

export interface BridgeOptions {
  spawn?: SpawnFunction;
  readFile?: ReadFileFunction;
  /** Replaces the built-in command set. */
  commands?: readonly CommandDescriptor[];
}

export interface BridgeStatus {
  status: SessionStatus;
  workspaceRoot: string;
  running: boolean;
  starts: number;
  pendingRequests: number;
  queuedCommands: number;
  openDocuments: number;
  terminationReason: string | null;
}

export interface CommandInfo {
  name: string;
  description: string;
}

/**
 * The whole core behind the channels: one session, one registry, one
 * dispatcher.
 */
export class Bridge {
  private readonly logger = DebugLogger.getLogger('bridge');

  constructor(
    readonly config: BridgeConfig,
    readonly registry: CommandRegistry,
    readonly session: AnalyzerSession,
    private readonly dispatcher: CommandDispatcher,
  ) {}

  /** Spawns the analyzer ahead of the first command. Throws ProcessSpawnError. */
  async start(): Promise<void> {
    await this.session.start();
    this.logger.log(
      () => `analyzer started for ${this.config.workspaceRoot} (${this.config.analyzer.command})`,
    );
  }

  execute(
    name: string,
    args: unknown,
    options?: ExecuteOptions,
  ): Promise<CommandResult<CommandOutput>> {
    return this.dispatcher.execute(name, args, options);
  }

  listCommands(): CommandInfo[] {
    return this.registry
      .list()
      .map(({ name, description }) => ({ name, description }));
  }

  status(): BridgeStatus {
    return {
      status: this.session.status,
      workspaceRoot: this.session.workspaceRoot,
      running: this.session.running,
      starts: this.session.startCount,
      pendingRequests: this.session.pendingRequests,
      queuedCommands: this.dispatcher.queued,
      openDocuments: this.session.documents.size,
      terminationReason: this.session.terminationReason,
    };
  }

  /** Restarts the analyzer once the running command, if any, is done. */
  restart(): Promise<void> {
    return this.dispatcher.exclusive(() => this.session.restart());
  }

  shutdown(): Promise<void> {
    return this.dispatcher.exclusive(() => this.session.stop());
  }
}

/** Builds a bridge with the built-in commands. Throws DuplicateCommand. */
export function createBridge(
  config: BridgeConfig,
  options: BridgeOptions = {},
): Bridge {
  const registry = new CommandRegistry();
  registry.registerAll(options.commands ?? builtinCommands);
  const session = new AnalyzerSession({
    config,
    spawn: options.spawn,
    readFile: options.readFile,
  });
  const dispatcher = new CommandDispatcher(registry, session, config);
  return new Bridge(config, registry, session, dispatcher);
}
