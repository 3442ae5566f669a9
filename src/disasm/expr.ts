import type { ExprTerm, NumberOperand, TermOp } from '../isa/ir.js';
import { TERM_ARITY } from '../isa/opcodes.js';
import { registerName } from '../isa/operands.js';
import { BINARY_BINDING_POWER, PREFIX_BINDING_POWER } from '../frontend/parser.js';
import type { ValueKind } from '../semantics/expr.js';
import { callKind } from '../semantics/expr.js';

const ATOM = 100;

/**
 * A printed subexpression with the kind the assembler will give it back.
 */
interface Rendered {
  text: string;
  prec: number;
  kind: ValueKind;
  /** Set for pushed constants, the only subexpressions the assembler folds. */
  constValue?: number;
}

const INT_INFIX: Partial<Record<TermOp, string>> = {
  band: '&',
  bor: '|',
  bxor: '^',
  shl: '<<',
  shr: '>>',
  mul: '*',
  div: './',
};

const COMPARISON_INFIX: Partial<Record<TermOp, string>> = {
  eq: '==',
  ne: '!=',
  ge: '>=',
  gt: '>',
  le: '<=',
  lt: '<',
};

export function printNumber(op: NumberOperand): string {
  return op.kind === 'reg' ? registerName(op.reg) : String(op.value);
}

/**
 * The infix operator that lowers back to exactly this term, if there is one.
 */
function infix(op: TermOp, a: Rendered, b: Rendered): { symbol: string; kind: ValueKind } | undefined {
  if (a.constValue !== undefined && b.constValue !== undefined) return undefined;
  const rightZero = b.constValue === 0;
  const same = a.kind === b.kind;
  const bothInt = a.kind === 'int' && b.kind === 'int';
  const bothReal = a.kind === 'real' && b.kind === 'real';
  switch (op) {
    case 'add':
      return same ? { symbol: '+', kind: a.kind } : undefined;
    case 'sub':
      return same ? { symbol: '-', kind: a.kind } : undefined;
    case 'mod':
      return same && !rightZero ? { symbol: 'mod', kind: a.kind } : undefined;
    case 'mulr':
      return bothReal ? { symbol: '*', kind: 'real' } : undefined;
    case 'divr':
      return bothReal && !rightZero ? { symbol: '/', kind: 'real' } : undefined;
    case 'div':
      return bothInt && !rightZero ? { symbol: './', kind: 'int' } : undefined;
    case 'land':
      return { symbol: '&&', kind: 'int' };
    case 'lor':
      return { symbol: '||', kind: 'int' };
    default: {
      const intSymbol = INT_INFIX[op];
      if (intSymbol) return bothInt ? { symbol: intSymbol, kind: 'int' } : undefined;
      const comparison = COMPARISON_INFIX[op];
      if (comparison) return same ? { symbol: comparison, kind: 'int' } : undefined;
      return undefined;
    }
  }
}

function prefix(op: TermOp, a: Rendered): { symbol: string; kind: ValueKind } | undefined {
  if (a.constValue !== undefined) return undefined;
  switch (op) {
    case 'neg':
      return { symbol: '-', kind: a.kind };
    case 'bnot':
      return a.kind === 'int' ? { symbol: '~', kind: 'int' } : undefined;
    case 'zero':
      return { symbol: '!', kind: 'int' };
    default:
      return undefined;
  }
}

function wrap(r: Rendered, needsParens: boolean): string {
  return needsParens ? `(${r.text})` : r.text;
}

function render(op: TermOp, args: Rendered[]): Rendered {
  const [a, b] = args;
  if (a && b && args.length === 2) {
    const form = infix(op, a, b);
    if (form) {
      const bp = BINARY_BINDING_POWER.get(form.symbol) ?? ATOM;
      return {
        text: `${wrap(a, a.prec < bp)} ${form.symbol} ${wrap(b, b.prec <= bp)}`,
        prec: bp,
        kind: form.kind,
      };
    }
  }
  if (a && args.length === 1) {
    const form = prefix(op, a);
    if (form) {
      return {
        text: `${form.symbol}${wrap(a, a.prec < PREFIX_BINDING_POWER)}`,
        prec: PREFIX_BINDING_POWER,
        kind: form.kind,
      };
    }
  }
  return { text: `${op}(${args.map((x) => x.text).join(', ')})`, prec: ATOM, kind: callKind(op, args) };
}

/**
 * Print `exp` terms as source that assembles back to the same terms.
 *
 * Infix and prefix forms are used only where lowering them cannot fold, promote or reject;
 * everything else prints as a built-in or a raw-term intrinsic. The terms must be a valid
 * single-result stack program.
 */
export function printTerms(terms: readonly ExprTerm[]): string {
  const stack: Rendered[] = [];
  for (const t of terms) {
    if (t.op === 'push') {
      const text = printNumber(t.value);
      stack.push(
        t.value.kind === 'const'
          ? { text, prec: t.value.value < 0 ? PREFIX_BINDING_POWER : ATOM, kind: 'int', constValue: t.value.value }
          : { text, prec: ATOM, kind: 'int' },
      );
      continue;
    }
    const popped = stack.splice(stack.length - TERM_ARITY[t.op]);
    // select pops its condition first: the last pushed value is the first argument
    const args = t.op === 'select' ? popped.reverse() : popped;
    stack.push(render(t.op, args));
  }
  return stack[stack.length - 1]?.text ?? '0';
}
