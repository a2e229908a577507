/**
 * @license
 * Copyright 2025 Vybestack LLC
 * SPDX-License-Identifier: Apache-2.0
 */

import type { Position, Range } from '../types.js';

/** Offset of `position` in `text`; characters count UTF-16 code units like LSP. */
export function positionToOffset(text: string, position: Position): number {
  let offset = 0;
  for (let line = 0; line < position.line; line++) {
    const newline = text.indexOf('\n', offset);
    if (newline === -1) {
      return text.length;
    }
    offset = newline + 1;
  }
  const lineEnd = text.indexOf('\n', offset);
  const lineLength = (lineEnd === -1 ? text.length : lineEnd) - offset;
  return offset + Math.min(position.character, lineLength);
}

export function offsetToPosition(text: string, offset: number): Position {
  const clamped = Math.max(0, Math.min(offset, text.length));
  let line = 0;
  let lineStart = 0;
  for (let index = text.indexOf('\n'); index !== -1 && index < clamped; index = text.indexOf('\n', index + 1)) {
    line += 1;
    lineStart = index + 1;
  }
  return { line, character: clamped - lineStart };
}

export function sliceRange(text: string, range: Range): string {
  return text.slice(positionToOffset(text, range.start), positionToOffset(text, range.end));
}

/** Position just past the last character of `text`. */
export function endOfText(text: string): Position {
  return offsetToPosition(text, text.length);
}

/** Widens `range` to cover its lines completely, including the final newline. */
export function wholeLines(text: string, range: Range): Range {
  const lineCount = text.split('\n').length;
  const end =
    range.end.line + 1 < lineCount
      ? { line: range.end.line + 1, character: 0 }
      : endOfText(text);
  return { start: { line: range.start.line, character: 0 }, end };
}

export function rangesOverlap(a: Range, b: Range): boolean {
  const before = (x: Position, y: Position): boolean =>
    x.line < y.line || (x.line === y.line && x.character <= y.character);
  return !(before(a.end, b.start) || before(b.end, a.start));
}
