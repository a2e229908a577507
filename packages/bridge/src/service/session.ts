/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { basename } from 'node:path';

import type { BridgeConfig } from '../config.js';
import { DebugLogger } from '../debug/DebugLogger.js';
import {
  AnalyzerReportedError,
  SessionTerminated,
  toBridgeError,
  type MalformedMessage,
} from '../errors.js';
import { encodeMessage, MessageDecoder } from '../protocol/codec.js';
import { RequestCorrelator, type SendOptions } from '../protocol/correlator.js';
import {
  JsonRpcErrorCodes,
  type DiagnosticEntry,
  type IncomingMessage,
  type JsonRpcId,
  type OutgoingMessage,
  type SessionStatus,
} from '../types.js';
import { toFileUri } from '../util/paths.js';
import { DiagnosticsCache } from './diagnostics.js';
import {
  DocumentStore,
  type DocumentHandle,
  type ReadFileFunction,
} from './documents.js';
import {
  ProcessSupervisor,
  type SpawnFunction,
  type TerminationInfo,
} from './supervisor.js';

export const CLIENT_NAME = 'analyzer-bridge';
export const CLIENT_VERSION = '0.1.0';

const CODE_ACTION_KINDS = [
  '',
  'quickfix',
  'refactor',
  'refactor.extract',
  'refactor.inline',
  'refactor.rewrite',
  'source',
  'source.organizeImports',
];

export interface SessionOptions {
  config: BridgeConfig;
  spawn?: SpawnFunction;
  readFile?: ReadFileFunction;
}

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

/**
 * One live relationship with an analyzer process: lifecycle, handshake,
 * document sync, diagnostics, and the answers to requests the analyzer sends
 * us. Callers serialize access through the dispatcher's lock.
 */
export class AnalyzerSession {
  private readonly logger = DebugLogger.getLogger('session');
  private readonly analyzerLogger = DebugLogger.getLogger('analyzer');
  private readonly supervisor: ProcessSupervisor;
  private readonly decoder = new MessageDecoder();
  private readonly correlator: RequestCorrelator;
  readonly documents: DocumentStore;
  readonly diagnostics = new DiagnosticsCache();

  private _status: SessionStatus = 'not-started';
  private initializing: Promise<void> | null = null;
  private _serverCapabilities: Record<string, unknown> = {};
  private _terminationReason: string | null = null;
  private consecutiveMalformed = 0;
  private restartRequested = false;
  private _startCount = 0;

  constructor(private readonly options: SessionOptions) {
    const { config } = options;
    this.supervisor = new ProcessSupervisor({
      command: config.analyzer.command,
      args: config.analyzer.args,
      cwd: config.workspaceRoot,
      env: { ...process.env, ...config.analyzer.env },
      spawn: options.spawn,
    });
    this.correlator = new RequestCorrelator((message) =>
      this.writeMessage(message),
    );
    this.documents = new DocumentStore(
      (method, params) => this.notify(method, params),
      options.readFile,
    );
    this.supervisor.onOutput((chunk) => this.handleOutput(chunk));
    this.supervisor.onTerminated((info) => this.handleTermination(info));
  }

  get status(): SessionStatus {
    return this._status;
  }

  get workspaceRoot(): string {
    return this.options.config.workspaceRoot;
  }

  get serverCapabilities(): Readonly<Record<string, unknown>> {
    return this._serverCapabilities;
  }

  get terminationReason(): string | null {
    return this._terminationReason;
  }

  /** True once the malformed-message threshold has been crossed. */
  get needsRestart(): boolean {
    return this.restartRequested;
  }

  get pendingRequests(): number {
    return this.correlator.size;
  }

  /** Number of times an analyzer process has been spawned. */
  get startCount(): number {
    return this._startCount;
  }

  get running(): boolean {
    return this.supervisor.running;
  }

  /** Spawns the analyzer. The handshake happens in `ensureInitialized`. */
  async start(): Promise<void> {
    if (this.supervisor.running) {
      return;
    }
    this.decoder.reset();
    await this.supervisor.start();
    this._startCount += 1;
    this._status = 'not-started';
    this._terminationReason = null;
    this.consecutiveMalformed = 0;
  }

  /**
   * Performs `initialize` + `initialized` once per process. Concurrent
   * callers share the in-flight handshake.
   */
  ensureInitialized(): Promise<void> {
    if (this._status === 'ready') {
      return Promise.resolve();
    }
    if (this._status === 'failed') {
      return Promise.reject(
        new SessionTerminated(this._terminationReason ?? 'analyzer failed'),
      );
    }
    if (!this.initializing) {
      this.initializing = this.handshake().finally(() => {
        this.initializing = null;
      });
    }
    return this.initializing;
  }

  async ensureOpen(path: string): Promise<DocumentHandle> {
    this.assertReady();
    return this.documents.ensureOpen(path);
  }

  diagnosticsFor(path: string): DiagnosticEntry[] {
    return this.diagnostics.entries(path);
  }

  request(
    method: string,
    params: unknown,
    options: SendOptions,
  ): Promise<unknown> {
    this.assertReady();
    return this.correlator.send(method, params, options).result;
  }

  notify(method: string, params: unknown): void {
    this.writeMessage({ jsonrpc: '2.0', method, params });
  }

  /**
   * `shutdown` request and `exit` notification, then waits for the process
   * (SIGKILL after the grace period).
   */
  async stop(): Promise<void> {
    const graceMs = this.options.config.timeouts.shutdownGrace;
    if (this.supervisor.running && this._status === 'ready') {
      try {
        await this.correlator.send('shutdown', null, { timeoutMs: graceMs })
          .result;
        this.notify('exit', null);
      } catch (error) {
        this.logger.warn(
          () => `graceful shutdown failed: ${toBridgeError(error).message}`,
        );
      }
    }
    await this.supervisor.stop(graceMs);
    this.resetState();
    this._status = 'not-started';
  }

  async restart(): Promise<void> {
    this.logger.log('restarting analyzer session');
    await this.stop();
    this.restartRequested = false;
    this._terminationReason = null;
    await this.start();
    await this.ensureInitialized();
  }

  // ─── Handshake ─────────────────────────────────────────────────────────────

  private async handshake(): Promise<void> {
    await this.start();
    this._status = 'initializing';
    const { config } = this.options;
    const rootUri = toFileUri(config.workspaceRoot);

    try {
      const result = await this.correlator.send(
        'initialize',
        {
          processId: process.pid,
          clientInfo: { name: CLIENT_NAME, version: CLIENT_VERSION },
          rootUri,
          rootPath: config.workspaceRoot,
          workspaceFolders: [
            { uri: rootUri, name: basename(config.workspaceRoot) },
          ],
          initializationOptions: config.analyzer.settings,
          capabilities: {
            workspace: {
              configuration: true,
              applyEdit: false,
              workspaceEdit: {
                documentChanges: true,
                resourceOperations: ['create', 'rename', 'delete'],
              },
              symbol: { dynamicRegistration: false },
            },
            textDocument: {
              synchronization: { dynamicRegistration: false, didSave: false },
              publishDiagnostics: { relatedInformation: false },
              definition: { linkSupport: true },
              implementation: { linkSupport: true },
              references: {},
              hover: { contentFormat: ['markdown', 'plaintext'] },
              documentSymbol: { hierarchicalDocumentSymbolSupport: true },
              rename: { prepareSupport: true },
              formatting: {},
              codeAction: {
                codeActionLiteralSupport: {
                  codeActionKind: { valueSet: CODE_ACTION_KINDS },
                },
                resolveSupport: { properties: ['edit'] },
                dataSupport: true,
              },
            },
            window: { workDoneProgress: true },
            experimental: { serverStatusNotification: true },
          },
        },
        { timeoutMs: config.timeouts.initialize, command: 'initialize' },
      ).result;

      if (!isRecord(result)) {
        throw new AnalyzerReportedError('initialize returned no result object');
      }
      this._serverCapabilities = isRecord(result.capabilities)
        ? result.capabilities
        : {};
      this.notify('initialized', {});
      this._status = 'ready';
      this.logger.log(() => `analyzer initialized for ${config.workspaceRoot}`);
    } catch (error) {
      const bridgeError = toBridgeError(error);
      if (this._status === 'initializing') {
        this._status = 'failed';
        this._terminationReason = `initialize failed: ${bridgeError.message}`;
      }
      throw bridgeError;
    }
  }

  // ─── Incoming traffic ──────────────────────────────────────────────────────

  private handleOutput(chunk: Buffer): void {
    if (this.restartRequested) {
      return;
    }
    for (const decoded of this.decoder.feed(chunk)) {
      if (decoded.ok) {
        this.consecutiveMalformed = 0;
        this.dispatch(decoded.message);
      } else {
        this.handleMalformed(decoded.error);
      }
    }
  }

  private handleMalformed(error: MalformedMessage): void {
    this.logger.warn(() => error.message);
    if (error.requestId !== undefined) {
      this.correlator.reject(error.requestId, error);
    } else {
      // Execution is single-flight, so whatever is pending is the exchange
      // the unreadable frame belonged to.
      const failed = this.correlator.rejectPending(error);
      this.logger.debug(() => `failed ${failed} pending request(s) on an unreadable frame`);
    }

    this.consecutiveMalformed += 1;
    const limit = this.options.config.maxMalformedMessages;
    if (limit > 0 && this.consecutiveMalformed > limit) {
      const reason = `${this.consecutiveMalformed} consecutive malformed messages`;
      this.logger.error(() => `${reason}, restart scheduled`);
      this.restartRequested = true;
      this._status = 'failed';
      this._terminationReason = reason;
      this.correlator.rejectAll(new SessionTerminated(reason));
    }
  }

  private dispatch(message: IncomingMessage): void {
    switch (message.type) {
      case 'response':
        if (message.error) {
          this.correlator.reject(
            message.id,
            new AnalyzerReportedError(
              message.error.message,
              message.error.code,
              message.error.data,
            ),
          );
        } else {
          this.correlator.resolve(message.id, message.result);
        }
        return;
      case 'request':
        this.answerServerRequest(message.id, message.method, message.params);
        return;
      case 'notification':
        this.handleNotification(message.method, message.params);
        return;
      default:
        return;
    }
  }

  private answerServerRequest(
    id: JsonRpcId,
    method: string,
    params: unknown,
  ): void {
    let reply: OutgoingMessage;
    switch (method) {
      case 'workspace/configuration': {
        const items =
          isRecord(params) && Array.isArray(params.items) ? params.items : [];
        reply = {
          jsonrpc: '2.0',
          id,
          result: items.map(() => this.options.config.analyzer.settings),
        };
        break;
      }
      case 'client/registerCapability':
      case 'client/unregisterCapability':
      case 'window/workDoneProgress/create':
      case 'window/showMessageRequest':
        reply = { jsonrpc: '2.0', id, result: null };
        break;
      case 'workspace/applyEdit':
        reply = {
          jsonrpc: '2.0',
          id,
          result: {
            applied: false,
            failureReason: 'edits are returned to the caller, not applied',
          },
        };
        break;
      default:
        this.logger.debug(() => `unsupported server request ${method}`);
        reply = {
          jsonrpc: '2.0',
          id,
          error: {
            code: JsonRpcErrorCodes.MethodNotFound,
            message: `Unhandled method ${method}`,
          },
        };
    }

    try {
      this.writeMessage(reply);
    } catch (error) {
      this.logger.warn(
        () => `could not answer ${method}: ${toBridgeError(error).message}`,
      );
    }
  }

  private handleNotification(method: string, params: unknown): void {
    switch (method) {
      case 'textDocument/publishDiagnostics':
        this.diagnostics.update(params);
        return;
      case 'window/logMessage':
      case 'window/showMessage':
        if (isRecord(params) && typeof params.message === 'string') {
          const text = params.message;
          if (params.type === 1) {
            this.analyzerLogger.error(() => text);
          } else if (params.type === 2) {
            this.analyzerLogger.warn(() => text);
          } else {
            this.analyzerLogger.debug(() => text);
          }
        }
        return;
      default:
        this.logger.debug(() => `notification ${method}`);
    }
  }

  private handleTermination(info: TerminationInfo): void {
    this.resetState();
    if (info.expected) {
      this.correlator.rejectAll(new SessionTerminated('analyzer stopped'));
      return;
    }
    this._status = 'failed';
    this._terminationReason = info.reason;
    this.correlator.rejectAll(new SessionTerminated(info.reason));
  }

  // ─── Helpers ───────────────────────────────────────────────────────────────

  private resetState(): void {
    this.decoder.reset();
    this.documents.reset();
    this.diagnostics.clear();
    this._serverCapabilities = {};
    this.consecutiveMalformed = 0;
  }

  private assertReady(): void {
    if (this._status !== 'ready') {
      throw new SessionTerminated(
        this._terminationReason ?? `session is ${this._status}`,
      );
    }
  }

  private writeMessage(message: OutgoingMessage): void {
    this.supervisor.write(encodeMessage(message));
  }
}
