/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { basename, extname } from 'node:path';

const extensionToLanguageId: ReadonlyMap<string, string> = new Map<
  string,
  string
>([
  ['.rs', 'rust'],
  ['.toml', 'toml'],
  ['.md', 'markdown'],
  ['.json', 'json'],
]);

const fileNameToLanguageId: ReadonlyMap<string, string> = new Map<
  string,
  string
>([['Cargo.lock', 'toml']]);

export function getLanguageId(filePath: string): string {
  return (
    fileNameToLanguageId.get(basename(filePath)) ??
    extensionToLanguageId.get(extname(filePath).toLowerCase()) ??
    'plaintext'
  );
}
