import { escapeString } from '../frontend/lexer.js';
import { commandByName, flagOperands } from '../isa/commands.js';
import type { CodeTarget, CommandOperandValue, Instruction } from '../isa/ir.js';
import { CommandFlags } from '../isa/ir.js';
import { registerName } from '../isa/operands.js';
import { printNumber, printTerms } from './expr.js';

/**
 * Spelling of a code target: a label name, or a hex literal for addresses without one.
 */
export type TargetNamer = (target: CodeTarget) => string;

export const INDENT = '    ';

const CONDITION_SYMBOLS = {
  eq: '==',
  ne: '!=',
  ge: '>=',
  gt: '>',
  le: '<=',
  lt: '<',
  andNotZero: '&',
} as const;

function list(items: readonly string[]): string {
  return `[${items.join(', ')}]`;
}

function printCommandOperand(v: CommandOperandValue): string {
  switch (v.kind) {
    case 'u8':
    case 'u16':
    case 'msgid':
      return String(v.value);
    case 'bool':
      return v.value ? '1' : '0';
    case 'reg':
      return registerName(v.reg);
    case 'num':
      return printNumber(v.value);
    case 'str':
      return escapeString(v.value);
    case 'strs':
      return list(v.value.map(escapeString));
    case 'mask':
      return list(v.values.map((x) => (x ? printNumber(x) : '_')));
    case 'nums':
      return list(v.values.map(printNumber));
  }
}

function operands(mnemonic: string, parts: readonly string[]): string {
  return parts.length === 0 ? mnemonic : `${mnemonic} ${parts.join(', ')}`;
}

/**
 * Canonical source text of one instruction (without indentation).
 */
export function printInstruction(ins: Instruction, name: TargetNamer): string {
  switch (ins.op) {
    case 'uo':
      return operands(ins.type, [registerName(ins.dest), ...(ins.source ? [printNumber(ins.source)] : [])]);
    case 'bo':
      return operands(ins.type, [
        registerName(ins.dest),
        ...(ins.left ? [printNumber(ins.left)] : []),
        printNumber(ins.right),
      ]);
    case 'exp':
      return operands('exp', [registerName(ins.dest), printTerms(ins.terms)]);
    case 'gt':
      return operands('gt', [
        registerName(ins.dest),
        printNumber(ins.index),
        list(ins.table.map(printNumber)),
      ]);
    case 'jc': {
      const left = printNumber(ins.left);
      const right = printNumber(ins.right);
      const test =
        ins.cond === 'bitSet' ? `bitset(${left}, ${right})` : `${left} ${CONDITION_SYMBOLS[ins.cond]} ${right}`;
      const cond = !ins.negated ? test : ins.cond === 'bitSet' ? `!${test}` : `!(${test})`;
      return operands('jc', [cond, name(ins.target)]);
    }
    case 'j':
    case 'gosub':
      return operands(ins.op, [name(ins.target)]);
    case 'retsub':
    case 'return':
      return ins.op;
    case 'jt': {
      const cases = ins.targets.map((t, i) => `${i} => ${name(t)}`);
      return operands('jt', [printNumber(ins.index), cases.length ? `{ ${cases.join(', ')} }` : '{}']);
    }
    case 'rnd':
      return operands('rnd', [registerName(ins.dest), printNumber(ins.min), printNumber(ins.max)]);
    case 'push':
      return operands('push', ins.values.map(printNumber));
    case 'pop':
      return operands('pop', ins.dests.map(registerName));
    case 'call':
      return operands('call', [name(ins.target), ...ins.args.map(printNumber)]);
    case 'command': {
      const parts = ins.operands.map(printCommandOperand);
      const def = commandByName(ins.name);
      for (const flag of def ? flagOperands(def) : []) {
        if (ins.flags & CommandFlags[flag.flag]) parts.push(flag.flag);
      }
      return operands(ins.name.toUpperCase(), parts);
    }
  }
}
