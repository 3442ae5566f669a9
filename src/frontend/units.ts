import type { Diagnostic } from '../diagnostics/types.js';
import type { ProgramNode } from './ast.js';
import { buildProgram } from './ast.js';
import { parseSource } from './parser.js';
import type { SyntaxNode } from './syntax.js';

/**
 * A slice of a source file that parses and generates on its own: a function, a subroutine,
 * or a run of top-level statements between them.
 */
export interface SourceUnit {
  /** Position of the unit in the file. */
  index: number;
  text: string;
  /** 0-based line of the unit's first character in the whole file. */
  lineOffset: number;
  /** 0-based offset of the unit's first character in the whole file. */
  startOffset: number;
}

const BLOCK_START = /^[ \t]*(function|subroutine)(?![A-Za-z0-9_])/;
const BLOCK_END = /^[ \t]*(endfun|endsub)(?![A-Za-z0-9_])/;

/**
 * Track block-comment depth across one line. Returns the depth at the end of the line.
 */
function scanLine(line: string, depth: number): number {
  let d = depth;
  let i = 0;
  while (i < line.length) {
    const ch = line[i];
    const next = line[i + 1];
    if (d > 0) {
      if (ch === '/' && next === '*') {
        d++;
        i += 2;
      } else if (ch === '*' && next === '/') {
        d--;
        i += 2;
      } else {
        i++;
      }
      continue;
    }
    if (ch === '/' && next === '/') return d;
    if (ch === '/' && next === '*') {
      d++;
      i += 2;
      continue;
    }
    if (ch === '"') {
      i++;
      while (i < line.length && line[i] !== '"') i += line[i] === '\\' ? 2 : 1;
      i++;
      continue;
    }
    i++;
  }
  return d;
}

/**
 * Split source text into units at top-level `function`/`subroutine` and `endfun`/`endsub` lines,
 * without tokenizing the whole file.
 *
 * Concatenating the unit texts reproduces `text` exactly.
 */
export function splitUnits(text: string): SourceUnit[] {
  const lines = text.match(/[^\n]*\n|[^\n]+$/g) ?? [];
  const units: SourceUnit[] = [];
  let current = '';
  let currentLine = 0;
  let currentOffset = 0;
  let offset = 0;
  let depth = 0;
  let continued = false;

  const flush = (lineIndex: number) => {
    if (current.length > 0) {
      units.push({
        index: units.length,
        text: current,
        lineOffset: currentLine,
        startOffset: currentOffset,
      });
    }
    current = '';
    currentLine = lineIndex;
    currentOffset = offset;
  };

  lines.forEach((line, lineIndex) => {
    const atStatementStart = depth === 0 && !continued;
    if (atStatementStart && BLOCK_START.test(line)) flush(lineIndex);
    current += line;
    offset += line.length;
    depth = scanLine(line.replace(/\r?\n$/, ''), depth);
    continued = /\\\r?\n$/.test(line);
    if (atStatementStart && BLOCK_END.test(line)) flush(lineIndex + 1);
  });
  flush(lines.length);
  return units;
}

/**
 * A unit parsed on its own. Spans and diagnostics are relative to the unit text.
 */
export interface ParsedUnit {
  root: SyntaxNode;
  program: ProgramNode;
  diagnostics: Diagnostic[];
}

export function parseUnit(path: string, text: string): ParsedUnit {
  const diagnostics: Diagnostic[] = [];
  const { file, root } = parseSource(path, text, diagnostics);
  const program = buildProgram(file, root, diagnostics);
  return { root, program, diagnostics };
}
