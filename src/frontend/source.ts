import type { SourcePosition, SourceSpan } from './ast.js';

/**
 * Source text + precomputed line-start offsets, used to convert offsets into line/column spans.
 */
export interface SourceFile {
  path: string;
  text: string;
  /**
   * 0-based offsets for the start of each line. The first entry is always 0.
   */
  lineStarts: number[];
}

/**
 * Anything that covers a half-open offset range: tokens and syntax nodes.
 */
export interface OffsetRange {
  start: number;
  end: number;
}

export function makeSourceFile(path: string, text: string): SourceFile {
  const lineStarts = [0];
  for (let i = 0; i < text.length; i++) {
    if (text[i] === '\n') {
      lineStarts.push(i + 1);
    }
  }
  return { path, text, lineStarts };
}

/**
 * Convert a 0-based offset in `file.text` into a 1-based line/column position.
 */
export function posAtOffset(file: SourceFile, offset: number): SourcePosition {
  const clamped = Math.max(0, Math.min(offset, file.text.length));
  let lo = 0;
  let hi = file.lineStarts.length - 1;
  while (lo < hi) {
    const mid = Math.floor((lo + hi + 1) / 2);
    const midStart = file.lineStarts[mid] ?? 0;
    if (midStart <= clamped) {
      lo = mid;
    } else {
      hi = mid - 1;
    }
  }
  const lineStart = file.lineStarts[lo] ?? 0;
  return { line: lo + 1, column: clamped - lineStart + 1, offset: clamped };
}

/**
 * Construct a {@link SourceSpan} for the half-open offset range `[startOffset, endOffset)`.
 */
export function span(file: SourceFile, startOffset: number, endOffset: number): SourceSpan {
  return {
    file: file.path,
    start: posAtOffset(file, startOffset),
    end: posAtOffset(file, endOffset),
  };
}

export function spanOf(file: SourceFile, range: OffsetRange): SourceSpan {
  return span(file, range.start, range.end);
}

/**
 * Shift a span produced for a unit parsed on its own to its place in the whole file.
 */
export function rebaseSpan(s: SourceSpan, lineDelta: number, offsetDelta: number): SourceSpan {
  if (lineDelta === 0 && offsetDelta === 0) return s;
  return {
    file: s.file,
    start: { line: s.start.line + lineDelta, column: s.start.column, offset: s.start.offset + offsetDelta },
    end: { line: s.end.line + lineDelta, column: s.end.column, offset: s.end.offset + offsetDelta },
  };
}
