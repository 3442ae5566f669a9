import { ByteWriter, EncodeFailure } from './bytes.js';
import type { CommandDef } from './commands.js';
import { commandByName } from './commands.js';
import type {
  CodeTarget,
  CommandOperandValue,
  ExprTerm,
  Instruction,
  NumberOperand,
} from './ir.js';
import { CommandFlags } from './ir.js';
import {
  BINARY_OP_CODES,
  EXPLICIT_OPERAND_BIT,
  EXPRESSION_END,
  JUMP_CONDITION_CODES,
  NEGATED_CONDITION_BIT,
  Opcode,
  TERM_ARITY,
  TERM_CODES,
  TERM_PUSH,
  UNARY_OP_CODES,
} from './opcodes.js';
import {
  encodeBitmask,
  encodeBool,
  encodeNumberList,
  encodeNumberSpec,
  encodeRegister,
  encodeString,
  encodeStringArray,
} from './operands.js';

/**
 * Supplies the u32 written for a code target. `offset` is where it lands in the writer.
 */
export type TargetSink = (target: CodeTarget, offset: number) => number;

const absoluteTargets: TargetSink = (target) => {
  if (target.kind === 'address') return target.address;
  throw new EncodeFailure(`Unresolved code target \`${target.name}\`.`);
};

/**
 * Why an `exp` term list does not leave exactly one value on the stack, if it does not.
 */
export function termStackError(terms: readonly ExprTerm[]): string | undefined {
  let depth = 0;
  for (const [i, term] of terms.entries()) {
    depth += term.op === 'push' ? 1 : 1 - TERM_ARITY[term.op];
    if (depth < 1) return `Expression underflows the stack at term ${i}.`;
  }
  if (depth !== 1) return `Expression leaves ${depth} values on the stack instead of one.`;
  return undefined;
}

function encodeCommand(
  w: ByteWriter,
  def: CommandDef,
  operands: readonly CommandOperandValue[],
  flags: number,
): void {
  w.u8(def.opcode);
  let next = 0;
  for (const operand of def.operands) {
    if (operand.kind === 'flag') {
      w.u8(flags & CommandFlags[operand.flag] ? operand.whenSet : operand.whenClear);
      continue;
    }
    const value = operands[next++];
    if (!value || value.kind !== operand.kind) {
      throw new EncodeFailure(`${def.name}: operand \`${operand.name}\` must be ${operand.kind}.`);
    }
    switch (value.kind) {
      case 'u8':
        w.u8(value.value);
        break;
      case 'u16':
        w.u16(value.value);
        break;
      case 'bool':
        encodeBool(w, value.value);
        break;
      case 'reg':
        encodeRegister(w, value.reg);
        break;
      case 'num':
        encodeNumberSpec(w, value.value);
        break;
      case 'msgid':
        w.u24(value.value);
        break;
      case 'str':
        encodeString(w, value.value);
        break;
      case 'strs':
        encodeStringArray(w, value.value);
        break;
      case 'mask':
        encodeBitmask(w, value.values);
        break;
      case 'nums':
        encodeNumberList(w, value.values);
        break;
    }
  }
  if (next !== operands.length) {
    throw new EncodeFailure(`${def.name}: too many operands.`);
  }
}

function encodePadded(w: ByteWriter, value: NumberOperand): void {
  const start = w.length;
  encodeNumberSpec(w, value);
  while (w.length - start < 4) w.u8(0);
}

/**
 * Append the binary encoding of one instruction.
 *
 * Throws {@link EncodeFailure} when an operand does not fit its encoding.
 */
export function encodeInstruction(
  w: ByteWriter,
  ins: Instruction,
  target: TargetSink = absoluteTargets,
): void {
  const writeTarget = (t: CodeTarget) => w.u32(target(t, w.length));
  switch (ins.op) {
    case 'uo':
      w.u8(Opcode.uo);
      w.u8(UNARY_OP_CODES[ins.type] | (ins.source ? EXPLICIT_OPERAND_BIT : 0));
      encodeRegister(w, ins.dest);
      if (ins.source) encodeNumberSpec(w, ins.source);
      return;
    case 'bo':
      w.u8(Opcode.bo);
      w.u8(BINARY_OP_CODES[ins.type] | (ins.left ? EXPLICIT_OPERAND_BIT : 0));
      encodeRegister(w, ins.dest);
      if (ins.left) encodeNumberSpec(w, ins.left);
      encodeNumberSpec(w, ins.right);
      return;
    case 'exp': {
      const problem = termStackError(ins.terms);
      if (problem) throw new EncodeFailure(problem);
      w.u8(Opcode.exp);
      encodeRegister(w, ins.dest);
      for (const term of ins.terms) {
        if (term.op === 'push') {
          w.u8(TERM_PUSH);
          encodeNumberSpec(w, term.value);
        } else {
          w.u8(TERM_CODES[term.op]);
        }
      }
      w.u8(EXPRESSION_END);
      return;
    }
    case 'gt':
      w.u8(Opcode.gt);
      encodeRegister(w, ins.dest);
      encodeNumberSpec(w, ins.index);
      w.u16(ins.table.length);
      for (const v of ins.table) encodePadded(w, v);
      return;
    case 'jc':
      w.u8(Opcode.jc);
      w.u8(JUMP_CONDITION_CODES[ins.cond] | (ins.negated ? NEGATED_CONDITION_BIT : 0));
      encodeNumberSpec(w, ins.left);
      encodeNumberSpec(w, ins.right);
      writeTarget(ins.target);
      return;
    case 'j':
    case 'gosub':
      w.u8(Opcode[ins.op]);
      writeTarget(ins.target);
      return;
    case 'retsub':
    case 'return':
      w.u8(Opcode[ins.op]);
      return;
    case 'jt':
      w.u8(Opcode.jt);
      encodeNumberSpec(w, ins.index);
      w.u16(ins.targets.length);
      for (const t of ins.targets) writeTarget(t);
      return;
    case 'rnd':
      w.u8(Opcode.rnd);
      encodeRegister(w, ins.dest);
      encodeNumberSpec(w, ins.min);
      encodeNumberSpec(w, ins.max);
      return;
    case 'push':
      w.u8(Opcode.push);
      encodeNumberList(w, ins.values);
      return;
    case 'pop':
      w.u8(Opcode.pop);
      if (ins.dests.length > 0xff) throw new EncodeFailure('pop takes at most 255 registers.');
      w.u8(ins.dests.length);
      for (const reg of ins.dests) encodeRegister(w, reg);
      return;
    case 'call':
      w.u8(Opcode.call);
      writeTarget(ins.target);
      encodeNumberList(w, ins.args);
      return;
    case 'command': {
      const def = commandByName(ins.name);
      if (!def) throw new EncodeFailure(`Unknown command \`${ins.name}\`.`);
      encodeCommand(w, def, ins.operands, ins.flags);
      return;
    }
  }
}

/**
 * Encode a whole instruction list with absolute targets.
 */
export function encodeInstructions(instructions: readonly Instruction[]): Uint8Array {
  const w = new ByteWriter();
  for (const ins of instructions) encodeInstruction(w, ins);
  return w.toUint8Array();
}

