import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { errorAt, labelAt } from '../diagnostics/report.js';
import { parseIntLiteral, parseRealLiteral, unescapeString } from './lexer.js';
import type { SourceFile } from './source.js';
import { span, spanOf } from './source.js';
import type { SyntaxNode } from './syntax.js';
import { childNode, childNodes, isExprKind, significantTokens } from './syntax.js';
import type { Token } from './tokens.js';

/**
 * 1-based line/column position in a source file, with the 0-based offset it came from.
 */
export interface SourcePosition {
  line: number;
  column: number;
  offset: number;
}

/**
 * Half-open source range `[start, end)`.
 */
export interface SourceSpan {
  file: string;
  start: SourcePosition;
  end: SourcePosition;
}

export type BinaryOperator =
  | '||'
  | '&&'
  | '=='
  | '!='
  | '<'
  | '<='
  | '>'
  | '>='
  | '|'
  | '^'
  | '&'
  | '<<'
  | '>>'
  | '+'
  | '-'
  | '*'
  | '/'
  | 'mod'
  | '.*'
  | './';

export type PrefixOperator = '-' | '~' | '!';

const BINARY_OPERATORS: readonly BinaryOperator[] = [
  '||',
  '&&',
  '==',
  '!=',
  '<',
  '<=',
  '>',
  '>=',
  '|',
  '^',
  '&',
  '<<',
  '>>',
  '+',
  '-',
  '*',
  '/',
  'mod',
  '.*',
  './',
];

const PREFIX_OPERATORS: readonly PrefixOperator[] = ['-', '~', '!'];

/**
 * Typed view of an expression.
 *
 * `Missing` stands in for an expression the parser could not build; lowering treats it as an
 * already-reported error.
 */
export type ExprNode =
  | { kind: 'Int'; span: SourceSpan; value: number }
  | { kind: 'Real'; span: SourceSpan; raw: number }
  | { kind: 'String'; span: SourceSpan; value: string }
  | { kind: 'Name'; span: SourceSpan; name: string }
  | { kind: 'Register'; span: SourceSpan; name: string }
  | { kind: 'Binary'; span: SourceSpan; op: BinaryOperator; left: ExprNode; right: ExprNode }
  | { kind: 'Unary'; span: SourceSpan; op: PrefixOperator; operand: ExprNode }
  | { kind: 'Call'; span: SourceSpan; callee: string; calleeSpan: SourceSpan; args: ExprNode[] }
  | { kind: 'Array'; span: SourceSpan; elements: ExprNode[] }
  | { kind: 'JumpTable'; span: SourceSpan; cases: JumpTableCaseNode[] }
  | { kind: 'Missing'; span: SourceSpan };

export interface JumpTableCaseNode {
  span: SourceSpan;
  key: ExprNode;
  target: ExprNode;
}

export interface FlagNode {
  kind: 'Flag';
  span: SourceSpan;
  name: string;
}

export interface LabelNode {
  kind: 'Label';
  span: SourceSpan;
  name: string;
}

export interface InstructionNode {
  kind: 'Instruction';
  span: SourceSpan;
  mnemonic: string;
  mnemonicSpan: SourceSpan;
  /** Positional operands, in source order. */
  args: ExprNode[];
  flags: FlagNode[];
}

export type StatementNode = LabelNode | InstructionNode;

/**
 * A `$name` written in a header (parameter or preserved register).
 */
export interface RegisterRefNode {
  name: string;
  span: SourceSpan;
}

export interface PreserveRangeNode {
  span: SourceSpan;
  first: RegisterRefNode;
  /** Present for `$v2-$v5` ranges. */
  last?: RegisterRefNode;
}

export interface FunctionNode {
  kind: 'Function';
  span: SourceSpan;
  name: string;
  nameSpan: SourceSpan;
  params: RegisterRefNode[];
  preserves: PreserveRangeNode[];
  body: StatementNode[];
}

export interface SubroutineNode {
  kind: 'Subroutine';
  span: SourceSpan;
  name: string;
  nameSpan: SourceSpan;
  /** Always empty for a well-formed subroutine; kept so the resolver can report them. */
  params: RegisterRefNode[];
  preserves: PreserveRangeNode[];
  body: StatementNode[];
}

/**
 * `def NAME = expr` (value alias) or `def $name = $v3` (register alias).
 */
export interface AliasDefNode {
  kind: 'AliasDef';
  span: SourceSpan;
  name: string;
  nameSpan: SourceSpan;
  register: boolean;
  value: ExprNode;
}

export type ItemNode = FunctionNode | SubroutineNode | AliasDefNode | StatementNode;

export interface ProgramNode {
  kind: 'Program';
  span: SourceSpan;
  file: string;
  items: ItemNode[];
}

function tokenSpan(file: SourceFile, t: Token): SourceSpan {
  return span(file, t.start, t.end);
}

function exprChildren(node: SyntaxNode): SyntaxNode[] {
  return childNodes(node).filter((c) => isExprKind(c.kind) || c.kind === 'ErrorNode');
}

function asBinaryOperator(text: string): BinaryOperator | undefined {
  if (text === '%') return 'mod';
  return BINARY_OPERATORS.find((op) => op === text);
}

function asPrefixOperator(text: string): PrefixOperator | undefined {
  return PREFIX_OPERATORS.find((op) => op === text);
}

class AstBuilder {
  constructor(
    private readonly file: SourceFile,
    private readonly diagnostics: Diagnostic[],
  ) {}

  program(root: SyntaxNode): ProgramNode {
    const items: ItemNode[] = [];
    for (const child of childNodes(root)) {
      switch (child.kind) {
        case 'FunctionDef':
        case 'SubroutineDef':
          items.push(this.block(child));
          break;
        case 'AliasDef':
          items.push(this.aliasDef(child));
          break;
        case 'Label':
        case 'Instruction': {
          const stmt = this.statement(child);
          if (stmt) items.push(stmt);
          break;
        }
        default:
          break;
      }
    }
    return { kind: 'Program', span: spanOf(this.file, root), file: this.file.path, items };
  }

  private missing(at: number): ExprNode {
    return { kind: 'Missing', span: span(this.file, at, at) };
  }

  private block(node: SyntaxNode): FunctionNode | SubroutineNode {
    const tokens = significantTokens(node);
    const keyword = tokens[0];
    const nameToken = tokens[1]?.kind === 'ident' ? tokens[1] : undefined;
    const nameSpan = nameToken
      ? tokenSpan(this.file, nameToken)
      : span(this.file, node.start, keyword?.end ?? node.start);

    const paramList = childNode(node, 'ParamList');
    const params: RegisterRefNode[] = paramList
      ? significantTokens(paramList)
          .filter((t) => t.kind === 'register')
          .map((t) => ({ name: t.text.slice(1), span: tokenSpan(this.file, t) }))
      : [];

    const preserveList = childNode(node, 'PreserveList');
    const preserves: PreserveRangeNode[] = [];
    for (const range of preserveList ? childNodes(preserveList, 'PreserveRange') : []) {
      const regs = significantTokens(range).filter((t) => t.kind === 'register');
      const [first, last] = regs;
      if (!first) continue;
      preserves.push({
        span: spanOf(this.file, range),
        first: { name: first.text.slice(1), span: tokenSpan(this.file, first) },
        ...(last ? { last: { name: last.text.slice(1), span: tokenSpan(this.file, last) } } : {}),
      });
    }

    const body: StatementNode[] = [];
    for (const child of childNodes(node)) {
      if (child.kind !== 'Label' && child.kind !== 'Instruction') continue;
      const stmt = this.statement(child);
      if (stmt) body.push(stmt);
    }

    const common = {
      span: spanOf(this.file, node),
      name: nameToken?.text ?? '',
      nameSpan,
      params,
      preserves,
      body,
    };
    return node.kind === 'FunctionDef'
      ? { kind: 'Function', ...common }
      : { kind: 'Subroutine', ...common };
  }

  private aliasDef(node: SyntaxNode): AliasDefNode {
    const tokens = significantTokens(node);
    const nameToken = tokens.find((t) => t.kind === 'ident' || t.kind === 'register');
    const valueNode = exprChildren(node)[0];
    return {
      kind: 'AliasDef',
      span: spanOf(this.file, node),
      name: nameToken ? (nameToken.kind === 'register' ? nameToken.text.slice(1) : nameToken.text) : '',
      nameSpan: nameToken ? tokenSpan(this.file, nameToken) : spanOf(this.file, node),
      register: nameToken?.kind === 'register',
      value: valueNode ? this.expr(valueNode) : this.missing(node.end),
    };
  }

  private statement(node: SyntaxNode): StatementNode | undefined {
    const tokens = significantTokens(node);
    const head = tokens[0];
    if (!head) return undefined;
    if (node.kind === 'Label') {
      return { kind: 'Label', span: spanOf(this.file, node), name: head.text };
    }

    const args: ExprNode[] = [];
    const flags: FlagNode[] = [];
    let misplacedReported = false;
    const argList = childNode(node, 'ArgumentList');
    for (const child of argList ? childNodes(argList) : []) {
      if (child.kind === 'Flag') {
        const flagToken = significantTokens(child)[0];
        if (!flagToken) continue;
        const flag: FlagNode = { kind: 'Flag', span: spanOf(this.file, child), name: flagToken.text };
        const previous = flags.find((f) => f.name === flag.name);
        if (previous) {
          errorAt(
            this.diagnostics,
            DiagnosticIds.ParseError,
            flag.span,
            `Flag \`${flag.name}\` given more than once.`,
            [labelAt(previous.span, 'first given here')],
          );
          continue;
        }
        flags.push(flag);
        continue;
      }
      if (!isExprKind(child.kind) && child.kind !== 'ErrorNode') continue;
      const arg = this.expr(child);
      const lastFlag = flags[flags.length - 1];
      if (lastFlag && !misplacedReported) {
        misplacedReported = true;
        errorAt(
          this.diagnostics,
          DiagnosticIds.ParseError,
          lastFlag.span,
          `Flag \`${lastFlag.name}\` must follow the positional operands.`,
        );
      }
      args.push(arg);
    }

    return {
      kind: 'Instruction',
      span: spanOf(this.file, node),
      mnemonic: head.text,
      mnemonicSpan: tokenSpan(this.file, head),
      args,
      flags,
    };
  }

  expr(node: SyntaxNode): ExprNode {
    const s = spanOf(this.file, node);
    const tokens = significantTokens(node);
    const operands = exprChildren(node);
    switch (node.kind) {
      case 'LiteralExpr': {
        const t = tokens[0];
        if (!t) return { kind: 'Missing', span: s };
        if (t.kind === 'int') return { kind: 'Int', span: s, value: parseIntLiteral(t.text) ?? 0 };
        if (t.kind === 'real') return { kind: 'Real', span: s, raw: parseRealLiteral(t.text) ?? 0 };
        return { kind: 'String', span: s, value: unescapeString(t.text) ?? t.text.slice(1, -1) };
      }
      case 'RegisterExpr':
        return { kind: 'Register', span: s, name: (tokens[0]?.text ?? '$').slice(1) };
      case 'NameExpr':
        return { kind: 'Name', span: s, name: tokens[0]?.text ?? '' };
      case 'BinaryExpr': {
        const op = tokens.map((t) => asBinaryOperator(t.text)).find((o) => o !== undefined);
        const [left, right] = operands;
        if (!op || !left) return { kind: 'Missing', span: s };
        return {
          kind: 'Binary',
          span: s,
          op,
          left: this.expr(left),
          right: right ? this.expr(right) : this.missing(node.end),
        };
      }
      case 'PrefixExpr': {
        const op = asPrefixOperator(tokens[0]?.text ?? '');
        const operand = operands[0];
        if (!op) return { kind: 'Missing', span: s };
        return {
          kind: 'Unary',
          span: s,
          op,
          operand: operand ? this.expr(operand) : this.missing(node.end),
        };
      }
      case 'ParenExpr': {
        const inner = operands[0];
        return inner ? this.expr(inner) : this.missing(node.end);
      }
      case 'CallExpr': {
        const callee = tokens[0];
        return {
          kind: 'Call',
          span: s,
          callee: callee?.text ?? '',
          calleeSpan: callee ? tokenSpan(this.file, callee) : s,
          args: operands.map((o) => this.expr(o)),
        };
      }
      case 'ArrayExpr':
        return { kind: 'Array', span: s, elements: operands.map((o) => this.expr(o)) };
      case 'JumpTableBlock':
        return {
          kind: 'JumpTable',
          span: s,
          cases: childNodes(node, 'JumpTableCase').map((c) => {
            const [key, target] = exprChildren(c);
            return {
              span: spanOf(this.file, c),
              key: key ? this.expr(key) : this.missing(c.start),
              target: target ? this.expr(target) : this.missing(c.end),
            };
          }),
        };
      default:
        return { kind: 'Missing', span: s };
    }
  }
}

/**
 * Build the typed program view from a lossless tree.
 *
 * Reports operand-shape problems the grammar cannot express (misplaced or repeated flags).
 */
export function buildProgram(
  file: SourceFile,
  root: SyntaxNode,
  diagnostics: Diagnostic[],
): ProgramNode {
  return new AstBuilder(file, diagnostics).program(root);
}

/**
 * Typed view of a single expression node (used by tests and tooling).
 */
export function exprFromSyntax(file: SourceFile, node: SyntaxNode): ExprNode {
  return new AstBuilder(file, []).expr(node);
}

/**
 * Every statement of a program in source order, flattening function and subroutine bodies.
 */
export function* statementsOf(program: ProgramNode): Generator<StatementNode> {
  for (const item of program.items) {
    if (item.kind === 'Function' || item.kind === 'Subroutine') {
      yield* item.body;
    } else if (item.kind !== 'AliasDef') {
      yield item;
    }
  }
}
