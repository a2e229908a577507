/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import { isAbsolute, relative, resolve, sep } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';

export function toFileUri(filePath: string): string {
  if (filePath.startsWith('file://')) {
    return filePath;
  }
  return pathToFileURL(filePath).toString();
}

export function fromFileUri(fileUriOrPath: string): string {
  if (fileUriOrPath.startsWith('file://')) {
    return fileURLToPath(fileUriOrPath);
  }
  return fileUriOrPath;
}

export function isInsideWorkspace(filePath: string, workspaceRoot: string): boolean {
  const rel = relative(resolve(workspaceRoot), resolve(filePath));
  return rel === '' || (!rel.startsWith(`..${sep}`) && rel !== '..' && !isAbsolute(rel));
}

/**
 * Resolves `input` (absolute, or relative to the workspace root) to an
 * absolute path. Returns null when it points outside the workspace.
 */
export function resolveWorkspacePath(
  input: string,
  workspaceRoot: string,
): string | null {
  const absolute = resolve(workspaceRoot, fromFileUri(input));
  return isInsideWorkspace(absolute, workspaceRoot) ? absolute : null;
}

/** Workspace-relative path with forward slashes, or the absolute path when outside. */
export function toDisplayPath(filePath: string, workspaceRoot: string): string {
  const absolute = resolve(fromFileUri(filePath));
  if (!isInsideWorkspace(absolute, workspaceRoot)) {
    return absolute.split(sep).join('/');
  }
  const rel = relative(resolve(workspaceRoot), absolute);
  return rel === '' ? '.' : rel.split(sep).join('/');
}
