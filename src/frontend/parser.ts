import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { errorAt } from '../diagnostics/report.js';
import { lex } from './lexer.js';
import type { SourceFile } from './source.js';
import { makeSourceFile, span } from './source.js';
import type { SyntaxElement, SyntaxKind, SyntaxNode } from './syntax.js';
import { isNode } from './syntax.js';
import type { Punctuation, Token } from './tokens.js';
import { isKeyword, isPunct, isTrivia } from './tokens.js';

/**
 * Bare operand names that attach to the instruction as flags when they trail the operand list.
 */
export const FLAG_NAMES: ReadonlySet<string> = new Set(['nowait', 'interruptable']);

/**
 * Binding power of each binary operator (higher binds tighter). All are left-associative.
 */
export const BINARY_BINDING_POWER: ReadonlyMap<string, number> = new Map([
  ['||', 3],
  ['&&', 4],
  ['==', 5],
  ['!=', 5],
  ['<', 5],
  ['<=', 5],
  ['>', 5],
  ['>=', 5],
  ['|', 6],
  ['^', 7],
  ['&', 8],
  ['<<', 9],
  ['>>', 9],
  ['+', 10],
  ['-', 10],
  ['*', 11],
  ['/', 11],
  ['%', 11],
  ['mod', 11],
  ['.*', 11],
  ['./', 11],
]);

export const PREFIX_BINDING_POWER = 12;

const PREFIX_OPERATORS: readonly Punctuation[] = ['-', '~', '!'];
const CLOSERS: readonly Punctuation[] = [',', ')', ']', '}', '=>'];

export interface ParseResult {
  file: SourceFile;
  root: SyntaxNode;
  tokens: Token[];
}

interface Frame {
  kind: SyntaxKind;
  children: SyntaxElement[];
}

class Parser {
  private pos = 0;
  private readonly stack: Frame[] = [];
  /** Open bracket depth; newlines are trivia while it is non-zero. */
  private nesting = 0;
  private lineReported = false;

  constructor(
    private readonly file: SourceFile,
    private readonly tokens: readonly Token[],
    private readonly diagnostics: Diagnostic[],
  ) {}

  parseSourceFile(): SyntaxNode {
    this.stack.push({ kind: 'SourceFile', children: [] });
    while (this.current().kind !== 'eof') this.parseLine();
    this.flushTrivia();
    const eof = this.tokens[this.pos];
    if (eof) this.top().children.push(eof);
    const frame = this.stack.pop();
    return this.makeNode(frame ?? { kind: 'SourceFile', children: [] });
  }

  // ---------------------------------------------------------------------------
  // token cursor

  private skippable(token: Token): boolean {
    return isTrivia(token) || (this.nesting > 0 && token.kind === 'newline');
  }

  private nthIndex(n: number): number {
    let i = this.pos;
    let seen = 0;
    for (;;) {
      const t = this.tokens[i];
      if (t === undefined) return this.tokens.length - 1;
      if (t.kind === 'eof') return i;
      if (!this.skippable(t)) {
        if (seen === n) return i;
        seen++;
      }
      i++;
    }
  }

  private nth(n: number): Token {
    const t = this.tokens[this.nthIndex(n)];
    return t ?? { kind: 'eof', text: '', start: this.file.text.length, end: this.file.text.length };
  }

  private current(): Token {
    return this.nth(0);
  }

  private atEol(): boolean {
    const k = this.current().kind;
    return k === 'newline' || k === 'eof';
  }

  private atPunct(p: Punctuation): boolean {
    return isPunct(this.current(), p);
  }

  private top(): Frame {
    const frame = this.stack[this.stack.length - 1];
    if (!frame) throw new Error('Parser stack underflow.');
    return frame;
  }

  private flushTrivia(): void {
    const frame = this.top();
    for (;;) {
      const t = this.tokens[this.pos];
      if (t === undefined || !this.skippable(t)) return;
      frame.children.push(t);
      this.pos++;
    }
  }

  private bump(): Token {
    this.flushTrivia();
    const t = this.tokens[this.pos];
    if (t === undefined || t.kind === 'eof') return this.current();
    this.top().children.push(t);
    this.pos++;
    if (t.kind === 'newline') this.lineReported = false;
    return t;
  }

  // ---------------------------------------------------------------------------
  // tree building

  private start(kind: SyntaxKind): void {
    this.flushTrivia();
    this.stack.push({ kind, children: [] });
  }

  /**
   * Wrap the most recently finished sibling node into a new node of `kind`.
   */
  private precede(kind: SyntaxKind): void {
    const lhs = this.top().children.pop();
    this.stack.push({ kind, children: lhs ? [lhs] : [] });
  }

  private finish(): SyntaxNode {
    const frame = this.stack.pop();
    if (!frame) throw new Error('Parser stack underflow.');
    const node = this.makeNode(frame);
    this.top().children.push(node);
    return node;
  }

  private makeNode(frame: Frame): SyntaxNode {
    const first = frame.children[0];
    const last = frame.children[frame.children.length - 1];
    const here = this.tokens[this.pos]?.start ?? this.file.text.length;
    const start = first ? first.start : here;
    const end = last ? last.end : start;
    return { kind: frame.kind, start, end, children: frame.children };
  }

  // ---------------------------------------------------------------------------
  // diagnostics and recovery

  private error(message: string, id: DiagnosticId = DiagnosticIds.ParseError): void {
    const t = this.current();
    if (t.kind === 'error' || this.lineReported) return;
    this.lineReported = true;
    const end = t.kind === 'newline' ? t.start : t.end;
    errorAt(this.diagnostics, id, span(this.file, t.start, end), message);
  }

  private expectPunct(p: Punctuation, message: string): boolean {
    if (this.atPunct(p)) {
      this.bump();
      return true;
    }
    this.error(message);
    return false;
  }

  private recoverToEol(): void {
    if (this.atEol()) return;
    this.start('ErrorNode');
    while (!this.atEol()) this.bump();
    this.finish();
  }

  private endOfLine(): void {
    if (!this.atEol()) {
      this.error(`Unexpected \`${this.current().text}\`: expected end of line.`);
      this.recoverToEol();
    }
    if (this.current().kind === 'newline') this.bump();
  }

  // ---------------------------------------------------------------------------
  // statements

  private parseLine(): void {
    const t = this.current();
    if (t.kind === 'newline') {
      this.bump();
      return;
    }
    if (isKeyword(t, 'function')) {
      if (this.parseBlock('FunctionDef', 'endfun')) this.endOfLine();
      return;
    }
    if (isKeyword(t, 'subroutine')) {
      if (this.parseBlock('SubroutineDef', 'endsub')) this.endOfLine();
      return;
    }
    if (isKeyword(t, 'def')) {
      this.parseAliasDef();
    } else if (isKeyword(t, 'endfun') || isKeyword(t, 'endsub')) {
      this.error(`Unexpected \`${t.text}\` outside of a function or subroutine.`);
      this.recoverToEol();
    } else {
      this.parseStatement();
    }
    this.endOfLine();
  }

  private parseStatement(): void {
    const t = this.current();
    if (t.kind === 'ident' && isPunct(this.nth(1), ':')) {
      this.start('Label');
      this.bump();
      this.bump();
      this.finish();
      if (!this.atEol()) this.parseStatement();
      return;
    }
    if (t.kind === 'ident' || isKeyword(t, 'mod')) {
      this.parseInstruction();
      return;
    }
    this.error(`Unexpected \`${t.text}\`: expected an instruction or a label.`);
    this.recoverToEol();
  }

  /**
   * Parse a function or subroutine. Returns false when the block was closed by end of input
   * or by the start of another block rather than by a terminator.
   */
  private parseBlock(kind: 'FunctionDef' | 'SubroutineDef', terminator: 'endfun' | 'endsub'): boolean {
    this.start(kind);
    const keyword = this.bump();
    if (this.current().kind === 'ident') {
      this.bump();
    } else {
      this.error(`Expected a name after \`${keyword.text}\`.`);
    }
    if (this.atPunct('(')) this.parseParamList();
    if (this.atPunct('[')) this.parsePreserveList();
    this.endOfLine();

    let closed = false;
    for (;;) {
      const t = this.current();
      if (t.kind === 'eof' || isKeyword(t, 'function') || isKeyword(t, 'subroutine')) {
        errorAt(
          this.diagnostics,
          DiagnosticIds.MissingTerminator,
          span(this.file, keyword.start, keyword.end),
          `Missing \`${terminator}\` to close this ${keyword.text}.`,
        );
        break;
      }
      if (isKeyword(t, 'endfun') || isKeyword(t, 'endsub')) {
        if (t.text !== terminator) {
          this.error(`Expected \`${terminator}\`, found \`${t.text}\`.`);
        }
        this.bump();
        closed = true;
        break;
      }
      if (isKeyword(t, 'def')) {
        this.error('`def` is only allowed at top level.');
        this.recoverToEol();
        this.endOfLine();
        continue;
      }
      if (t.kind === 'newline') {
        this.bump();
        continue;
      }
      this.parseStatement();
      this.endOfLine();
    }
    this.finish();
    return closed;
  }

  private parseParamList(): void {
    this.start('ParamList');
    this.bump();
    this.nesting++;
    while (!this.atPunct(')') && this.current().kind !== 'eof') {
      if (this.current().kind === 'register') {
        this.bump();
      } else {
        this.error('Expected a `$name` parameter.');
        this.errorElement();
      }
      if (!this.atPunct(',')) break;
      this.bump();
    }
    this.expectPunct(')', 'Expected `)` to close the parameter list.');
    this.nesting--;
    this.finish();
  }

  private parsePreserveList(): void {
    this.start('PreserveList');
    this.bump();
    this.nesting++;
    while (!this.atPunct(']') && this.current().kind !== 'eof') {
      this.start('PreserveRange');
      if (this.current().kind === 'register') {
        this.bump();
        if (this.atPunct('-')) {
          this.bump();
          if (this.current().kind === 'register') {
            this.bump();
          } else {
            this.error('Expected a register to end the preserved range.');
          }
        }
      } else {
        this.error('Expected a register in the preserve list.');
        this.errorElement();
      }
      this.finish();
      if (!this.atPunct(',')) break;
      this.bump();
    }
    this.expectPunct(']', 'Expected `]` to close the preserve list.');
    this.nesting--;
    this.finish();
  }

  private parseAliasDef(): void {
    this.start('AliasDef');
    this.bump();
    const t = this.current();
    if (t.kind === 'ident' || t.kind === 'register') {
      this.bump();
    } else {
      this.error('Expected a name or `$name` after `def`.');
    }
    if (this.expectPunct('=', 'Expected `=` in definition.')) this.parseExpr(0);
    this.finish();
  }

  private parseInstruction(): void {
    this.start('Instruction');
    this.bump();
    this.start('ArgumentList');
    if (!this.atEol()) {
      for (;;) {
        this.parseArgument();
        if (!this.atPunct(',')) break;
        this.bump();
      }
    }
    this.finish();
    this.finish();
  }

  private parseArgument(): void {
    const t = this.current();
    const after = this.nth(1);
    if (
      t.kind === 'ident' &&
      FLAG_NAMES.has(t.text) &&
      (isPunct(after, ',') || after.kind === 'newline' || after.kind === 'eof')
    ) {
      this.start('Flag');
      this.bump();
      this.finish();
      return;
    }
    this.parseExpr(0);
  }

  // ---------------------------------------------------------------------------
  // expressions

  private binaryOperator(t: Token): string | undefined {
    if (t.kind === 'punct' && BINARY_BINDING_POWER.has(t.text)) return t.text;
    if (isKeyword(t, 'mod')) return 'mod';
    return undefined;
  }

  private parseExpr(minBp: number): void {
    this.parseUnary();
    for (;;) {
      const op = this.binaryOperator(this.current());
      if (op === undefined) return;
      const bp = BINARY_BINDING_POWER.get(op) ?? 0;
      if (bp < minBp) return;
      this.precede('BinaryExpr');
      this.bump();
      this.parseExpr(bp + 1);
      this.finish();
    }
  }

  private parseUnary(): void {
    const t = this.current();
    if (t.kind === 'punct' && PREFIX_OPERATORS.some((p) => isPunct(t, p))) {
      this.start('PrefixExpr');
      this.bump();
      this.parseExpr(PREFIX_BINDING_POWER);
      this.finish();
      return;
    }
    this.parsePrimary();
  }

  private parseCall(): void {
    this.start('CallExpr');
    this.bump();
    this.parseDelimited('(', ')', () => this.parseExpr(0));
    this.finish();
  }

  private parsePrimary(): void {
    const t = this.current();
    // `mod(a, b)` is the raw-term intrinsic; a bare `mod` is the infix operator.
    if (isKeyword(t, 'mod') && isPunct(this.nth(1), '(')) {
      this.parseCall();
      return;
    }
    switch (t.kind) {
      case 'int':
      case 'real':
      case 'string':
        this.start('LiteralExpr');
        this.bump();
        this.finish();
        return;
      case 'register':
        this.start('RegisterExpr');
        this.bump();
        this.finish();
        return;
      case 'ident':
        if (isPunct(this.nth(1), '(')) {
          this.parseCall();
          return;
        }
        this.start('NameExpr');
        this.bump();
        this.finish();
        return;
      default:
        break;
    }
    if (isPunct(t, '(')) {
      this.start('ParenExpr');
      this.bump();
      this.nesting++;
      this.parseExpr(0);
      this.expectPunct(')', 'Expected `)` to close the parenthesized expression.');
      this.nesting--;
      this.finish();
      return;
    }
    if (isPunct(t, '[')) {
      this.start('ArrayExpr');
      this.parseDelimited('[', ']', () => this.parseExpr(0));
      this.finish();
      return;
    }
    if (isPunct(t, '{')) {
      this.start('JumpTableBlock');
      this.parseDelimited('{', '}', () => this.parseJumpTableCase());
      this.finish();
      return;
    }
    this.error(
      t.kind === 'newline' || t.kind === 'eof'
        ? 'Expected an expression.'
        : `Unexpected \`${t.text}\`: expected an expression.`,
    );
    this.errorElement();
  }

  /**
   * `open item (',' item)* ','? close`, with newlines allowed inside.
   */
  private parseDelimited(open: Punctuation, close: Punctuation, item: () => void): void {
    this.bump();
    this.nesting++;
    while (!this.atPunct(close) && this.current().kind !== 'eof') {
      item();
      if (!this.atPunct(',')) break;
      this.bump();
    }
    this.expectPunct(close, `Expected \`${close}\` to match \`${open}\`.`);
    this.nesting--;
  }

  private parseJumpTableCase(): void {
    this.start('JumpTableCase');
    this.parseExpr(0);
    if (this.expectPunct('=>', 'Expected `=>` after the jump table key.')) this.parseExpr(0);
    this.finish();
  }

  /**
   * Wrap one offending token in an `ErrorNode`, or leave an empty one at a list boundary.
   */
  private errorElement(): void {
    this.start('ErrorNode');
    const t = this.current();
    const boundary =
      t.kind === 'newline' || t.kind === 'eof' || CLOSERS.some((p) => isPunct(t, p));
    if (!boundary) this.bump();
    this.finish();
  }
}

/**
 * Lex and parse `text` into a lossless concrete syntax tree.
 *
 * Never throws on malformed input: problems become diagnostics and `ErrorNode`s.
 */
export function parseSource(path: string, text: string, diagnostics: Diagnostic[]): ParseResult {
  const file = makeSourceFile(path, text);
  const tokens = lex(file, diagnostics);
  const root = new Parser(file, tokens, diagnostics).parseSourceFile();
  return { file, root, tokens };
}

/**
 * Count `ErrorNode`s in a tree (useful for recovery checks).
 */
export function countErrorNodes(node: SyntaxNode): number {
  let n = node.kind === 'ErrorNode' ? 1 : 0;
  for (const child of node.children) {
    if (isNode(child)) n += countErrorNodes(child);
  }
  return n;
}
