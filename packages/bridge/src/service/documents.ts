/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { createHash } from 'node:crypto';
import { readFile } from 'node:fs/promises';

import { DebugLogger } from '../debug/DebugLogger.js';
import { toFileUri } from '../util/paths.js';
import { getLanguageId } from './language-map.js';

export interface DocumentHandle {
  readonly path: string;
  readonly uri: string;
  readonly languageId: string;
  version: number;
  hash: string;
  text: string;
  open: boolean;
}

export type NotifyFunction = (method: string, params: unknown) => void;
export type ReadFileFunction = (path: string) => Promise<string>;

const readUtf8: ReadFileFunction = (path) => readFile(path, 'utf8');

export function contentHash(text: string): string {
  return createHash('sha256').update(text, 'utf8').digest('hex');
}

/**
 * The analyzer's view of each file the bridge has touched. Keyed by absolute
 * path; synchronized with full-text `didOpen`/`didChange` notifications.
 */
export class DocumentStore {
  private readonly logger = DebugLogger.getLogger('documents');
  private readonly documents = new Map<string, DocumentHandle>();

  constructor(
    private readonly notify: NotifyFunction,
    private readonly readText: ReadFileFunction = readUtf8,
  ) {}

  get size(): number {
    return this.documents.size;
  }

  get(path: string): DocumentHandle | undefined {
    return this.documents.get(path);
  }

  /** Reads the file without telling the analyzer about it. */
  read(path: string): Promise<string> {
    return this.readText(path);
  }

  /**
   * Sends `didOpen` on first use and `didChange` with the next version when
   * the on-disk content hash differs from the one last sent. Otherwise sends
   * nothing.
   */
  async ensureOpen(path: string): Promise<DocumentHandle> {
    const text = await this.readText(path);
    const hash = contentHash(text);
    const existing = this.documents.get(path);

    if (!existing || !existing.open) {
      const handle: DocumentHandle = {
        path,
        uri: toFileUri(path),
        languageId: getLanguageId(path),
        version: 1,
        hash,
        text,
        open: true,
      };
      this.documents.set(path, handle);
      this.notify('textDocument/didOpen', {
        textDocument: {
          uri: handle.uri,
          languageId: handle.languageId,
          version: handle.version,
          text,
        },
      });
      this.logger.debug(() => `opened ${path}`);
      return handle;
    }

    if (existing.hash === hash) {
      return existing;
    }

    existing.version += 1;
    existing.hash = hash;
    existing.text = text;
    this.notify('textDocument/didChange', {
      textDocument: { uri: existing.uri, version: existing.version },
      contentChanges: [{ text }],
    });
    this.logger.debug(() => `changed ${path} (version ${existing.version})`);
    return existing;
  }

  /** Forgets every document; used when the analyzer process goes away. */
  reset(): void {
    this.documents.clear();
  }
}
