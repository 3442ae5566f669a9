import type { Diagnostic, DiagnosticId } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { errorAt } from '../diagnostics/report.js';
import type { BinaryOperator, ExprNode, SourceSpan } from '../frontend/ast.js';
import { REAL_SCALE } from '../frontend/lexer.js';
import type { ExprTerm, TermOp } from '../isa/ir.js';
import { TERM_ARITY } from '../isa/opcodes.js';

/**
 * Value kinds of expressions. `real` values are fixed point with three decimals.
 */
export type ValueKind = 'int' | 'real';

export interface ConstValue {
  kind: ValueKind;
  value: number;
}

/**
 * Lowered expression. `term` nodes list their arguments in source order; `select` is
 * `[cond, ifTrue, ifFalse]`.
 */
export type ExprTree =
  | { node: 'const'; kind: ValueKind; value: number }
  | { node: 'reg'; kind: 'int'; reg: number }
  | { node: 'term'; kind: ValueKind; op: TermOp; args: ExprTree[] };

/**
 * Name lookups an expression needs. Implementations report unknown names themselves and
 * return `undefined`.
 */
export interface ExprScope {
  readonly diagnostics: Diagnostic[];
  register(name: string, span: SourceSpan): number | undefined;
  value(name: string, span: SourceSpan): ConstValue | undefined;
}

const I32_MIN = -0x80000000;
const I32_MAX = 0x7fffffff;

/** Built-in functions: never folded, never promoted. */
const BUILTINS: ReadonlyMap<string, TermOp> = new Map<string, TermOp>([
  ['abs', 'abs'],
  ['min', 'min'],
  ['max', 'max'],
  ['sin', 'sin'],
  ['cos', 'cos'],
  ['tan', 'tan'],
  ['select', 'select'],
]);

/** Raw-term intrinsics: one term each, arguments pushed as written. */
export const INTRINSICS: ReadonlySet<TermOp> = new Set<TermOp>([
  'add',
  'sub',
  'mul',
  'div',
  'mod',
  'shl',
  'shr',
  'band',
  'bor',
  'bxor',
  'neg',
  'bnot',
  'eq',
  'ne',
  'ge',
  'gt',
  'le',
  'lt',
  'zero',
  'nonzero',
  'land',
  'lor',
  'mulr',
  'divr',
]);

function intrinsicOp(name: string): TermOp | undefined {
  for (const op of INTRINSICS) if (op === name) return op;
  return undefined;
}

const COMPARISONS: ReadonlyMap<BinaryOperator, TermOp> = new Map<BinaryOperator, TermOp>([
  ['==', 'eq'],
  ['!=', 'ne'],
  ['<', 'lt'],
  ['<=', 'le'],
  ['>', 'gt'],
  ['>=', 'ge'],
]);

const BITWISE: ReadonlyMap<BinaryOperator, TermOp> = new Map<BinaryOperator, TermOp>([
  ['&', 'band'],
  ['|', 'bor'],
  ['^', 'bxor'],
  ['<<', 'shl'],
  ['>>', 'shr'],
]);

function constTree(kind: ValueKind, value: number): ExprTree {
  return { node: 'const', kind, value };
}

function term(op: TermOp, kind: ValueKind, args: ExprTree[]): ExprTree {
  return { node: 'term', kind, op, args };
}

function truth(b: boolean): number {
  return b ? -1 : 0;
}

/**
 * Integer folding of one binary term with VM (i32) semantics. The divisor is non-zero.
 */
function foldInt(op: TermOp, a: number, b: number): number | undefined {
  switch (op) {
    case 'add':
      return (a + b) | 0;
    case 'sub':
      return (a - b) | 0;
    case 'mul':
      return Math.imul(a, b);
    case 'div':
      return Math.trunc(a / b) | 0;
    case 'mod':
      return (a % b) | 0;
    case 'shl':
      return a << (b & 31);
    case 'shr':
      return a >> (b & 31);
    case 'band':
      return a & b;
    case 'bor':
      return a | b;
    case 'bxor':
      return a ^ b;
    case 'eq':
      return truth(a === b);
    case 'ne':
      return truth(a !== b);
    case 'lt':
      return truth(a < b);
    case 'le':
      return truth(a <= b);
    case 'gt':
      return truth(a > b);
    case 'ge':
      return truth(a >= b);
    case 'land':
      return truth(a !== 0 && b !== 0);
    case 'lor':
      return truth(a !== 0 || b !== 0);
    default:
      return undefined;
  }
}

/**
 * Lowers typed expressions into trees, folding constants and promoting mixed kinds.
 */
class Lowerer {
  constructor(private readonly scope: ExprScope) {}

  private error(id: DiagnosticId, span: SourceSpan, message: string): undefined {
    errorAt(this.scope.diagnostics, id, span, message);
    return undefined;
  }

  private inI32(value: number | bigint, span: SourceSpan): number | undefined {
    if (value < I32_MIN || value > I32_MAX) {
      return this.error(DiagnosticIds.ConstOverflow, span, 'Constant expression overflows 32 bits.');
    }
    return Number(value);
  }

  /**
   * Convert an int operand to real: constants are scaled now, others at run time.
   */
  private promote(tree: ExprTree, span: SourceSpan): ExprTree | undefined {
    if (tree.kind === 'real') return tree;
    if (tree.node === 'const') {
      const value = this.inI32(tree.value * REAL_SCALE, span);
      return value === undefined ? undefined : constTree('real', value);
    }
    return term('mul', 'real', [tree, constTree('int', REAL_SCALE)]);
  }

  lower(expr: ExprNode): ExprTree | undefined {
    switch (expr.kind) {
      case 'Int':
        return constTree('int', expr.value);
      case 'Real':
        return constTree('real', expr.raw);
      case 'Register': {
        const reg = this.scope.register(expr.name, expr.span);
        return reg === undefined ? undefined : { node: 'reg', kind: 'int', reg };
      }
      case 'Name': {
        const value = this.scope.value(expr.name, expr.span);
        return value === undefined ? undefined : constTree(value.kind, value.value);
      }
      case 'Unary':
        return this.unary(expr.op, expr.operand, expr.span);
      case 'Binary':
        return this.binary(expr.op, expr.left, expr.right, expr.span);
      case 'Call':
        return this.call(expr.callee, expr.calleeSpan, expr.args, expr.span);
      case 'String':
        return this.error(DiagnosticIds.TypeMismatch, expr.span, 'A string is not a numeric value.');
      case 'Array':
      case 'JumpTable':
        return this.error(DiagnosticIds.TypeMismatch, expr.span, 'Expected a numeric expression.');
      case 'Missing':
        return undefined;
    }
  }

  private unary(op: '-' | '~' | '!', operandExpr: ExprNode, span: SourceSpan): ExprTree | undefined {
    const operand = this.lower(operandExpr);
    if (!operand) return undefined;
    switch (op) {
      case '-':
        return operand.node === 'const'
          ? constTree(operand.kind, -operand.value | 0)
          : term('neg', operand.kind, [operand]);
      case '~':
        if (operand.kind !== 'int') {
          return this.error(DiagnosticIds.TypeMismatch, span, '`~` takes an int operand.');
        }
        return operand.node === 'const'
          ? constTree('int', ~operand.value)
          : term('bnot', 'int', [operand]);
      case '!':
        return operand.node === 'const'
          ? constTree('int', truth(operand.value === 0))
          : term('zero', 'int', [operand]);
    }
  }

  private binary(
    op: BinaryOperator,
    leftExpr: ExprNode,
    rightExpr: ExprNode,
    span: SourceSpan,
  ): ExprTree | undefined {
    const l = this.lower(leftExpr);
    const r = this.lower(rightExpr);
    if (!l || !r) return undefined;

    if (op === '&&' || op === '||') {
      return this.combine(op === '&&' ? 'land' : 'lor', 'int', l, r, span);
    }

    const bitwise = BITWISE.get(op);
    if (bitwise) {
      if (l.kind !== 'int' || r.kind !== 'int') {
        return this.error(DiagnosticIds.TypeMismatch, span, `\`${op}\` takes int operands.`);
      }
      return this.combine(bitwise, 'int', l, r, span);
    }

    if (op === '.*' || op === './') {
      if (l.kind !== r.kind) {
        return this.error(
          DiagnosticIds.TypeMismatch,
          span,
          `\`${op}\` needs operands of the same kind (got ${l.kind} and ${r.kind}).`,
        );
      }
      const real = l.kind === 'real';
      const termOp: TermOp = op === '.*' ? (real ? 'mulr' : 'mul') : real ? 'divr' : 'div';
      return this.combine(termOp, l.kind, l, r, span);
    }

    if (op === '*' && l.kind === 'int' && r.kind === 'int') {
      return this.combine('mul', 'int', l, r, span);
    }

    // Everything else promotes a mixed pair to real.
    let a = l;
    let b = r;
    if (op === '/' || a.kind !== b.kind) {
      const pa = this.promote(a, span);
      const pb = this.promote(b, span);
      if (!pa || !pb) return undefined;
      a = pa;
      b = pb;
    }
    const comparison = COMPARISONS.get(op);
    if (comparison) return this.combine(comparison, 'int', a, b, span);
    switch (op) {
      case '+':
        return this.combine('add', a.kind, a, b, span);
      case '-':
        return this.combine('sub', a.kind, a, b, span);
      case 'mod':
        return this.combine('mod', a.kind, a, b, span);
      case '*':
        return this.combine('mulr', 'real', a, b, span);
      case '/':
        return this.combine('divr', 'real', a, b, span);
      default:
        return undefined;
    }
  }

  /**
   * Build a binary term, folding when both sides are constant.
   */
  private combine(
    op: TermOp,
    kind: ValueKind,
    a: ExprTree,
    b: ExprTree,
    span: SourceSpan,
  ): ExprTree | undefined {
    if (b.node === 'const' && b.value === 0) {
      if (op === 'div' || op === 'divr') {
        return this.error(DiagnosticIds.DivideByZero, span, 'Division by zero.');
      }
      if (op === 'mod') return this.error(DiagnosticIds.ModuloByZero, span, 'Modulo by zero.');
    }
    if (a.node !== 'const' || b.node !== 'const') return term(op, kind, [a, b]);

    if (op === 'mulr') {
      const value = this.inI32((BigInt(a.value) * BigInt(b.value)) / BigInt(REAL_SCALE), span);
      return value === undefined ? undefined : constTree('real', value);
    }
    if (op === 'divr') {
      const value = this.inI32((BigInt(a.value) * BigInt(REAL_SCALE)) / BigInt(b.value), span);
      return value === undefined ? undefined : constTree('real', value);
    }
    const folded = foldInt(op, a.value, b.value);
    return folded === undefined ? term(op, kind, [a, b]) : constTree(kind, folded);
  }

  private call(
    callee: string,
    calleeSpan: SourceSpan,
    argExprs: ExprNode[],
    span: SourceSpan,
  ): ExprTree | undefined {
    const op = BUILTINS.get(callee) ?? intrinsicOp(callee);
    if (!op) {
      return this.error(DiagnosticIds.UndefinedSymbol, calleeSpan, `Unknown function \`${callee}\`.`);
    }
    const arity = TERM_ARITY[op];
    if (argExprs.length !== arity) {
      return this.error(
        DiagnosticIds.ArityMismatch,
        span,
        `\`${callee}\` takes ${arity} argument${arity === 1 ? '' : 's'}, got ${argExprs.length}.`,
      );
    }
    const args: ExprTree[] = [];
    let failed = false;
    for (const argExpr of argExprs) {
      const arg = this.lower(argExpr);
      if (arg) args.push(arg);
      else failed = true;
    }
    if (failed) return undefined;
    return term(op, callKind(op, args), args);
  }
}

/**
 * Result kind of a call to a built-in or intrinsic.
 */
export function callKind(op: TermOp, args: readonly { kind: ValueKind }[]): ValueKind {
  switch (op) {
    case 'mulr':
    case 'divr':
    case 'sin':
    case 'cos':
    case 'tan':
      return 'real';
    case 'abs':
    case 'min':
    case 'max':
      return args[0]?.kind ?? 'int';
    case 'select':
      return args[1]?.kind ?? 'int';
    default:
      return 'int';
  }
}

export function lowerExpression(expr: ExprNode, scope: ExprScope): ExprTree | undefined {
  return new Lowerer(scope).lower(expr);
}

/**
 * Fold `expr` to a constant, reporting when it is not one.
 */
export function lowerConst(expr: ExprNode, scope: ExprScope): ConstValue | undefined {
  const tree = lowerExpression(expr, scope);
  if (!tree) return undefined;
  if (tree.node !== 'const') {
    errorAt(scope.diagnostics, DiagnosticIds.TypeMismatch, expr.span, 'Expected a constant expression.');
    return undefined;
  }
  return { kind: tree.kind, value: tree.value };
}

/**
 * Flatten a tree into `exp` terms (postfix order).
 */
export function toTerms(tree: ExprTree): ExprTerm[] {
  const out: ExprTerm[] = [];
  const visit = (t: ExprTree): void => {
    if (t.node === 'const') {
      out.push({ op: 'push', value: { kind: 'const', value: t.value } });
      return;
    }
    if (t.node === 'reg') {
      out.push({ op: 'push', value: { kind: 'reg', reg: t.reg } });
      return;
    }
    // select pops the condition first
    const args = t.op === 'select' ? [...t.args].reverse() : t.args;
    for (const arg of args) visit(arg);
    out.push({ op: t.op });
  };
  visit(tree);
  return out;
}
