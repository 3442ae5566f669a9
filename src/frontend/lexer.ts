import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { errorAt } from '../diagnostics/report.js';
import type { SourceFile } from './source.js';
import { span } from './source.js';
import type { Token, TokenKind } from './tokens.js';
import { KEYWORDS, PUNCTUATION } from './tokens.js';

const IDENT_START = /[A-Za-z_]/;
const IDENT_CONT = /[A-Za-z0-9_]/;
const INLINE_SPACE = /[ \t\f\v]/;
const NUMBER_BODY =
  /^(?:0[xX][0-9A-Fa-f_]*|0[oO][0-7_]*|0[bB][01_]*|[0-9][0-9_]*(?:\.[0-9][0-9_]*)?)[A-Za-z0-9_]*/;

/** Fractional digits carried by a real literal (`1.5` is stored as 1500). */
export const REAL_SCALE = 1000;
const REAL_DIGITS = 3;

/**
 * Parse an integer literal (`42`, `0x2a`, `0o52`, `0b101010`, `1_000`) into an i32.
 *
 * Decimal literals must fit 0..2^31-1; prefixed literals may use the full 32 bits and wrap.
 */
export function parseIntLiteral(text: string): number | undefined {
  const t = text.replace(/_/g, '');
  let value: number;
  if (/^0[xX][0-9A-Fa-f]+$/.test(t)) {
    value = Number.parseInt(t.slice(2), 16);
  } else if (/^0[oO][0-7]+$/.test(t)) {
    value = Number.parseInt(t.slice(2), 8);
  } else if (/^0[bB][01]+$/.test(t)) {
    value = Number.parseInt(t.slice(2), 2);
  } else if (/^[0-9]+$/.test(t)) {
    value = Number.parseInt(t, 10);
    return value <= 0x7fffffff ? value : undefined;
  } else {
    return undefined;
  }
  return value <= 0xffffffff ? value | 0 : undefined;
}

/**
 * Parse a real literal (`1.25`) into its fixed-point representation (`1250`).
 */
export function parseRealLiteral(text: string): number | undefined {
  const m = /^([0-9]+)\.([0-9]+)$/.exec(text.replace(/_/g, ''));
  if (!m) return undefined;
  const whole = m[1] ?? '';
  const frac = m[2] ?? '';
  if (frac.length > REAL_DIGITS) return undefined;
  const raw = Number.parseInt(whole, 10) * REAL_SCALE + Number.parseInt(frac.padEnd(REAL_DIGITS, '0'), 10);
  return raw <= 0x7fffffff ? raw : undefined;
}

const ESCAPES_IN: ReadonlyMap<string, string> = new Map([
  ['\\', '\\'],
  ['"', '"'],
  ['n', '\n'],
  ['r', '\r'],
  ['t', '\t'],
]);

const ESCAPES_OUT: ReadonlyMap<string, string> = new Map([
  ['\\', '\\\\'],
  ['"', '\\"'],
  ['\n', '\\n'],
  ['\r', '\\r'],
  ['\t', '\\t'],
]);

/**
 * Decode the body of a string literal token. Returns `undefined` for an unknown escape.
 *
 * Escapes: `\\`, `\"`, `\n`, `\r`, `\t` and `\xHH`.
 */
export function unescapeString(tokenText: string): string | undefined {
  const body = tokenText.endsWith('"') && tokenText.length >= 2 ? tokenText.slice(1, -1) : tokenText.slice(1);
  let out = '';
  for (let i = 0; i < body.length; i++) {
    const ch = body[i];
    if (ch !== '\\') {
      out += ch;
      continue;
    }
    const next = body[i + 1] ?? '';
    const simple = ESCAPES_IN.get(next);
    if (simple !== undefined) {
      out += simple;
      i++;
      continue;
    }
    const hex = body.slice(i + 2, i + 4);
    if (next !== 'x' || !/^[0-9a-fA-F]{2}$/.test(hex)) return undefined;
    out += String.fromCharCode(Number.parseInt(hex, 16));
    i += 3;
  }
  return out;
}

/**
 * Spell a string as a literal that `unescapeString` reads back. Control characters other than
 * newline, carriage return and tab become `\xHH`.
 */
export function escapeString(value: string): string {
  // eslint-disable-next-line no-control-regex
  const body = value.replace(/[\\"\x00-\x1f\x7f]/g, (ch) => {
    return ESCAPES_OUT.get(ch) ?? `\\x${ch.charCodeAt(0).toString(16).padStart(2, '0')}`;
  });
  return `"${body}"`;
}

/**
 * Convert source text into a complete token sequence, trivia included, ending with `eof`.
 *
 * The lexer never fails: malformed input becomes `error` tokens (or, for an unterminated
 * block comment, a comment running to end of file) with a diagnostic.
 */
export function lex(file: SourceFile, diagnostics: Diagnostic[]): Token[] {
  const text = file.text;
  const tokens: Token[] = [];
  let i = 0;

  const push = (kind: TokenKind, start: number, end: number) => {
    tokens.push({ kind, text: text.slice(start, end), start, end });
  };
  const report = (id: DiagnosticId, start: number, end: number, message: string) => {
    errorAt(diagnostics, id, span(file, start, end), message);
  };

  while (i < text.length) {
    const start = i;
    const ch = text[i] ?? '';
    const next = text[i + 1] ?? '';

    if (ch === '\n' || (ch === '\r' && next === '\n')) {
      i += ch === '\r' ? 2 : 1;
      push('newline', start, i);
      continue;
    }
    if (INLINE_SPACE.test(ch) || ch === '\r') {
      while (i < text.length && (INLINE_SPACE.test(text[i] ?? '') || (text[i] === '\r' && text[i + 1] !== '\n'))) {
        i++;
      }
      push('whitespace', start, i);
      continue;
    }
    if (ch === '/' && next === '/') {
      while (i < text.length && text[i] !== '\n' && !(text[i] === '\r' && text[i + 1] === '\n')) i++;
      push('comment', start, i);
      continue;
    }
    if (ch === '/' && next === '*') {
      let depth = 0;
      while (i < text.length) {
        if (text[i] === '/' && text[i + 1] === '*') {
          depth++;
          i += 2;
        } else if (text[i] === '*' && text[i + 1] === '/') {
          depth--;
          i += 2;
          if (depth === 0) break;
        } else {
          i++;
        }
      }
      if (depth !== 0) {
        report(
          DiagnosticIds.UnterminatedComment,
          start,
          start + 2,
          'Missing trailing `*/` to terminate the block comment.',
        );
      }
      push('comment', start, i);
      continue;
    }
    if (ch === '\\') {
      if (next === '\n' || (next === '\r' && text[i + 2] === '\n')) {
        i += next === '\r' ? 3 : 2;
        push('continuation', start, i);
        continue;
      }
      i++;
      report(DiagnosticIds.InvalidCharacter, start, i, 'Stray `\\`: a line continuation must end the line.');
      push('error', start, i);
      continue;
    }
    if (ch === '"') {
      i++;
      let closed = false;
      while (i < text.length && text[i] !== '\n' && !(text[i] === '\r' && text[i + 1] === '\n')) {
        if (text[i] === '\\' && i + 1 < text.length && text[i + 1] !== '\n') {
          i += 2;
          continue;
        }
        if (text[i] === '"') {
          i++;
          closed = true;
          break;
        }
        i++;
      }
      if (!closed) {
        report(
          DiagnosticIds.UnterminatedString,
          start,
          i,
          'Missing trailing `"` to terminate the string literal.',
        );
        push('error', start, i);
        continue;
      }
      const tokenText = text.slice(start, i);
      if (unescapeString(tokenText) === undefined) {
        report(
          DiagnosticIds.InvalidEscape,
          start,
          i,
          'Invalid escape sequence in string literal (allowed: `\\\\`, `\\"`, `\\n`, `\\r`, `\\t`, `\\xHH`).',
        );
      }
      push('string', start, i);
      continue;
    }
    if (/[0-9]/.test(ch)) {
      const m = NUMBER_BODY.exec(text.slice(i));
      const literal = m?.[0] ?? ch;
      i += literal.length;
      const isReal = literal.includes('.');
      const ok = isReal ? parseRealLiteral(literal) !== undefined : parseIntLiteral(literal) !== undefined;
      if (!ok) {
        report(
          DiagnosticIds.InvalidNumber,
          start,
          i,
          isReal
            ? `Invalid real literal \`${literal}\` (at most ${REAL_DIGITS} fractional digits, magnitude below 2147483.648).`
            : `Invalid integer literal \`${literal}\`.`,
        );
        push('error', start, i);
        continue;
      }
      push(isReal ? 'real' : 'int', start, i);
      continue;
    }
    if (IDENT_START.test(ch)) {
      while (i < text.length && IDENT_CONT.test(text[i] ?? '')) i++;
      push(KEYWORDS.has(text.slice(start, i)) ? 'keyword' : 'ident', start, i);
      continue;
    }
    if (ch === '$') {
      i++;
      while (i < text.length && IDENT_CONT.test(text[i] ?? '')) i++;
      if (i === start + 1) {
        report(DiagnosticIds.InvalidCharacter, start, i, 'Expected a register name after `$`.');
        push('error', start, i);
        continue;
      }
      push('register', start, i);
      continue;
    }
    const punct = PUNCTUATION.find((p) => text.startsWith(p, i));
    if (punct !== undefined) {
      i += punct.length;
      push('punct', start, i);
      continue;
    }

    const cp = text.codePointAt(i) ?? 0;
    i += cp > 0xffff ? 2 : 1;
    report(DiagnosticIds.InvalidCharacter, start, i, `Invalid character \`${text.slice(start, i)}\`.`);
    push('error', start, i);
  }

  tokens.push({ kind: 'eof', text: '', start: text.length, end: text.length });
  return tokens;
}
