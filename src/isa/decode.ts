import { ByteReader, DecodeFailure } from './bytes.js';
import type { CommandDef } from './commands.js';
import { commandByOpcode } from './commands.js';
import { termStackError } from './encode.js';
import type {
  CodeTarget,
  CommandOperandValue,
  ExprTerm,
  Instruction,
  NumberOperand,
} from './ir.js';
import { CommandFlags } from './ir.js';
import {
  BINARY_OP_BY_CODE,
  EXPLICIT_OPERAND_BIT,
  EXPRESSION_END,
  JUMP_CONDITION_BY_CODE,
  NEGATED_CONDITION_BIT,
  Opcode,
  TERM_BY_CODE,
  TERM_PUSH,
  UNARY_OP_BY_CODE,
} from './opcodes.js';
import {
  decodeBitmask,
  decodeBool,
  decodeNumberList,
  decodeNumberSpec,
  decodeRegister,
  decodeString,
  decodeStringArray,
} from './operands.js';

function hex2(value: number): string {
  return `0x${value.toString(16).padStart(2, '0')}`;
}

function address(r: ByteReader): CodeTarget {
  return { kind: 'address', address: r.u32() };
}

function decodeTerms(r: ByteReader, start: number): ExprTerm[] {
  const terms: ExprTerm[] = [];
  for (;;) {
    const at = r.pos;
    const code = r.u8();
    if (code === EXPRESSION_END) break;
    if (code === TERM_PUSH) {
      terms.push({ op: 'push', value: decodeNumberSpec(r) });
      continue;
    }
    const op = TERM_BY_CODE.get(code);
    if (!op) throw new DecodeFailure(`Unknown expression term ${hex2(code)}.`, at);
    terms.push({ op });
  }
  const problem = termStackError(terms);
  if (problem) throw new DecodeFailure(problem, start);
  return terms;
}

function decodePadded(r: ByteReader): NumberOperand {
  const start = r.pos;
  const value = decodeNumberSpec(r);
  while (r.pos - start < 4) {
    const at = r.pos;
    if (r.u8() !== 0) throw new DecodeFailure('Table entry padding must be zero.', at, true);
  }
  return value;
}

function decodeCommand(r: ByteReader, def: CommandDef): Instruction {
  const operands: CommandOperandValue[] = [];
  let flags = 0;
  for (const operand of def.operands) {
    if (operand.kind === 'flag') {
      const at = r.pos;
      const b = r.u8();
      if (b === operand.whenSet) flags |= CommandFlags[operand.flag];
      else if (b !== operand.whenClear) {
        throw new DecodeFailure(`${def.name}: unexpected ${operand.name} byte ${b}.`, at, true);
      }
      continue;
    }
    switch (operand.kind) {
      case 'u8':
        operands.push({ kind: 'u8', value: r.u8() });
        break;
      case 'u16':
        operands.push({ kind: 'u16', value: r.u16() });
        break;
      case 'bool':
        operands.push({ kind: 'bool', value: decodeBool(r) });
        break;
      case 'reg':
        operands.push({ kind: 'reg', reg: decodeRegister(r) });
        break;
      case 'num':
        operands.push({ kind: 'num', value: decodeNumberSpec(r) });
        break;
      case 'msgid':
        operands.push({ kind: 'msgid', value: r.u24() });
        break;
      case 'str':
        operands.push({ kind: 'str', value: decodeString(r) });
        break;
      case 'strs':
        operands.push({ kind: 'strs', value: decodeStringArray(r) });
        break;
      case 'mask':
        operands.push({ kind: 'mask', values: decodeBitmask(r) });
        break;
      case 'nums':
        operands.push({ kind: 'nums', values: decodeNumberList(r) });
        break;
    }
  }
  return { op: 'command', name: def.name, operands, flags };
}

/**
 * Decode the instruction at the reader's position. Code targets come back as absolute addresses.
 *
 * Throws {@link DecodeFailure} for unknown opcodes, truncated input and encodings the
 * assembler never produces.
 */
export function decodeInstruction(r: ByteReader): Instruction {
  const start = r.pos;
  const opcode = r.u8();
  switch (opcode) {
    case Opcode.uo: {
      const typeAt = r.pos;
      const t = r.u8();
      const type = UNARY_OP_BY_CODE.get(t & ~EXPLICIT_OPERAND_BIT);
      if (!type) throw new DecodeFailure(`Unknown unary operation ${hex2(t)}.`, typeAt);
      const dest = decodeRegister(r);
      if (t & EXPLICIT_OPERAND_BIT) return { op: 'uo', type, dest, source: decodeNumberSpec(r) };
      return { op: 'uo', type, dest };
    }
    case Opcode.bo: {
      const typeAt = r.pos;
      const t = r.u8();
      const type = BINARY_OP_BY_CODE.get(t & ~EXPLICIT_OPERAND_BIT);
      if (!type) throw new DecodeFailure(`Unknown binary operation ${hex2(t)}.`, typeAt);
      const dest = decodeRegister(r);
      if (t & EXPLICIT_OPERAND_BIT) {
        const left = decodeNumberSpec(r);
        return { op: 'bo', type, dest, left, right: decodeNumberSpec(r) };
      }
      return { op: 'bo', type, dest, right: decodeNumberSpec(r) };
    }
    case Opcode.exp: {
      const dest = decodeRegister(r);
      return { op: 'exp', dest, terms: decodeTerms(r, start) };
    }
    case Opcode.gt: {
      const dest = decodeRegister(r);
      const index = decodeNumberSpec(r);
      const count = r.u16();
      const table: NumberOperand[] = [];
      for (let i = 0; i < count; i++) table.push(decodePadded(r));
      return { op: 'gt', dest, index, table };
    }
    case Opcode.jc: {
      const condAt = r.pos;
      const c = r.u8();
      const cond = JUMP_CONDITION_BY_CODE.get(c & ~NEGATED_CONDITION_BIT);
      if (!cond) throw new DecodeFailure(`Unknown jump condition ${hex2(c)}.`, condAt);
      const left = decodeNumberSpec(r);
      const right = decodeNumberSpec(r);
      const negated = (c & NEGATED_CONDITION_BIT) !== 0;
      return { op: 'jc', cond, negated, left, right, target: address(r) };
    }
    case Opcode.j:
      return { op: 'j', target: address(r) };
    case Opcode.gosub:
      return { op: 'gosub', target: address(r) };
    case Opcode.retsub:
      return { op: 'retsub' };
    case Opcode.return:
      return { op: 'return' };
    case Opcode.jt: {
      const index = decodeNumberSpec(r);
      const count = r.u16();
      const targets: CodeTarget[] = [];
      for (let i = 0; i < count; i++) targets.push(address(r));
      return { op: 'jt', index, targets };
    }
    case Opcode.rnd: {
      const dest = decodeRegister(r);
      const min = decodeNumberSpec(r);
      return { op: 'rnd', dest, min, max: decodeNumberSpec(r) };
    }
    case Opcode.push:
      return { op: 'push', values: decodeNumberList(r) };
    case Opcode.pop: {
      const count = r.u8();
      const dests: number[] = [];
      for (let i = 0; i < count; i++) dests.push(decodeRegister(r));
      return { op: 'pop', dests };
    }
    case Opcode.call: {
      const target = address(r);
      return { op: 'call', target, args: decodeNumberList(r) };
    }
    default: {
      const def = commandByOpcode(opcode);
      if (!def) throw new DecodeFailure(`Unknown opcode ${hex2(opcode)}.`, start);
      return decodeCommand(r, def);
    }
  }
}

/**
 * Code targets of an instruction, in operand order.
 */
export function instructionTargets(ins: Instruction): CodeTarget[] {
  switch (ins.op) {
    case 'jc':
    case 'j':
    case 'gosub':
    case 'call':
      return [ins.target];
    case 'jt':
      return ins.targets;
    default:
      return [];
  }
}
