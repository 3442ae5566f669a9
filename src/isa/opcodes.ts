import type { BinaryOpType, JumpConditionType, TermOp, UnaryOpType } from './ir.js';

/**
 * Opcode bytes of the built-in instructions. Commands use the bytes in `commands.json`.
 */
export const Opcode = {
  uo: 0x40,
  bo: 0x41,
  exp: 0x42,
  gt: 0x44,
  jc: 0x46,
  j: 0x47,
  gosub: 0x48,
  retsub: 0x49,
  jt: 0x4a,
  rnd: 0x4c,
  push: 0x4d,
  pop: 0x4e,
  call: 0x4f,
  return: 0x50,
} as const;

export type InstructionOp = keyof typeof Opcode;

/** Type byte bit selecting an explicit source (`uo`) or left operand (`bo`). */
export const EXPLICIT_OPERAND_BIT = 0x80;
/** Condition byte bit inverting a `jc` condition. */
export const NEGATED_CONDITION_BIT = 0x80;
/** Terminates the term list of `exp`. */
export const EXPRESSION_END = 0xff;

export const UNARY_OP_CODES: Readonly<Record<UnaryOpType, number>> = {
  zero: 0x00,
  not16: 0x01,
  neg: 0x02,
  abs: 0x03,
};

export const BINARY_OP_CODES: Readonly<Record<BinaryOpType, number>> = {
  mov: 0x00,
  bzero: 0x01,
  add: 0x02,
  sub: 0x03,
  mul: 0x04,
  div: 0x05,
  mod: 0x06,
  and: 0x07,
  or: 0x08,
  xor: 0x09,
  shl: 0x0a,
  shr: 0x0b,
  mulr: 0x0c,
  divr: 0x0d,
  atan2: 0x0e,
  setbit: 0x0f,
  clrbit: 0x10,
  ctz: 0x11,
};

export const JUMP_CONDITION_CODES: Readonly<Record<JumpConditionType, number>> = {
  eq: 0x00,
  ne: 0x01,
  ge: 0x02,
  gt: 0x03,
  le: 0x04,
  lt: 0x05,
  andNotZero: 0x06,
  bitSet: 0x07,
};

/** `exp` term code for `push`; followed by a NumberSpec. */
export const TERM_PUSH = 0x00;

export const TERM_CODES: Readonly<Record<TermOp, number>> = {
  add: 0x01,
  sub: 0x02,
  mul: 0x03,
  div: 0x04,
  mod: 0x05,
  shl: 0x06,
  shr: 0x07,
  band: 0x08,
  bor: 0x09,
  bxor: 0x0a,
  neg: 0x0b,
  bnot: 0x0c,
  abs: 0x0d,
  eq: 0x0e,
  ne: 0x0f,
  ge: 0x10,
  gt: 0x11,
  le: 0x12,
  lt: 0x13,
  zero: 0x14,
  nonzero: 0x15,
  land: 0x16,
  lor: 0x17,
  select: 0x18,
  mulr: 0x19,
  divr: 0x1a,
  sin: 0x1b,
  cos: 0x1c,
  tan: 0x1d,
  min: 0x1e,
  max: 0x1f,
};

/** Values each term pops from the stack. */
export const TERM_ARITY: Readonly<Record<TermOp, number>> = {
  add: 2,
  sub: 2,
  mul: 2,
  div: 2,
  mod: 2,
  shl: 2,
  shr: 2,
  band: 2,
  bor: 2,
  bxor: 2,
  neg: 1,
  bnot: 1,
  abs: 1,
  eq: 2,
  ne: 2,
  ge: 2,
  gt: 2,
  le: 2,
  lt: 2,
  zero: 1,
  nonzero: 1,
  land: 2,
  lor: 2,
  select: 3,
  mulr: 2,
  divr: 2,
  sin: 1,
  cos: 1,
  tan: 1,
  min: 2,
  max: 2,
};

function invert<K extends string>(
  table: Readonly<Record<K, number>>,
  isKey: (name: string) => name is K,
): ReadonlyMap<number, K> {
  const out = new Map<number, K>();
  for (const name of Object.keys(table)) {
    if (isKey(name)) out.set(table[name], name);
  }
  return out;
}

export function isUnaryOpType(name: string): name is UnaryOpType {
  return Object.hasOwn(UNARY_OP_CODES, name);
}

export function isBinaryOpType(name: string): name is BinaryOpType {
  return Object.hasOwn(BINARY_OP_CODES, name);
}

export function isJumpConditionType(name: string): name is JumpConditionType {
  return Object.hasOwn(JUMP_CONDITION_CODES, name);
}

export function isTermOp(name: string): name is TermOp {
  return Object.hasOwn(TERM_CODES, name);
}

export const UNARY_OP_BY_CODE = invert(UNARY_OP_CODES, isUnaryOpType);
export const BINARY_OP_BY_CODE = invert(BINARY_OP_CODES, isBinaryOpType);
export const JUMP_CONDITION_BY_CODE = invert(JUMP_CONDITION_CODES, isJumpConditionType);
export const TERM_BY_CODE = invert(TERM_CODES, isTermOp);
