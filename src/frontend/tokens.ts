/**
 * Token categories produced by the lexer.
 *
 * `whitespace`, `comment` and `continuation` are trivia: the parser keeps them in the tree
 * but never matches on them. `newline` is significant (it ends statements).
 */
export type TokenKind =
  | 'ident'
  | 'keyword'
  | 'register'
  | 'int'
  | 'real'
  | 'string'
  | 'punct'
  | 'newline'
  | 'whitespace'
  | 'comment'
  | 'continuation'
  | 'error'
  | 'eof';

export interface Token {
  readonly kind: TokenKind;
  /** Exact source text of the token. */
  readonly text: string;
  /** 0-based start offset (inclusive). */
  readonly start: number;
  /** 0-based end offset (exclusive). */
  readonly end: number;
}

export const KEYWORDS = new Set(['function', 'subroutine', 'endfun', 'endsub', 'def', 'mod']);

/**
 * Punctuation, longest first so the lexer can match greedily.
 */
export const PUNCTUATION = [
  '=>',
  '==',
  '!=',
  '<=',
  '<<',
  '>=',
  '>>',
  '&&',
  '||',
  '.*',
  './',
  ',',
  '(',
  ')',
  '{',
  '}',
  '[',
  ']',
  ':',
  '=',
  '<',
  '>',
  '+',
  '-',
  '*',
  '/',
  '%',
  '&',
  '|',
  '^',
  '~',
  '!',
] as const;

export type Punctuation = (typeof PUNCTUATION)[number];

export function isTrivia(token: Token): boolean {
  return token.kind === 'whitespace' || token.kind === 'comment' || token.kind === 'continuation';
}

export function isPunct(token: Token, text: Punctuation): boolean {
  return token.kind === 'punct' && token.text === text;
}

export function isKeyword(token: Token, text: string): boolean {
  return token.kind === 'keyword' && token.text === text;
}
