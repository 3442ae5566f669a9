import type { SourceSpan } from '../frontend/ast.js';

/**
 * A NumberSpec operand: an immediate constant or a register read.
 */
export type NumberOperand = { kind: 'const'; value: number } | { kind: 'reg'; reg: number };

/**
 * A code address operand. `symbol` is a relocation placeholder until layout.
 */
export type CodeTarget = { kind: 'symbol'; name: string } | { kind: 'address'; address: number };

export type UnaryOpType = 'zero' | 'not16' | 'neg' | 'abs';

export type BinaryOpType =
  | 'mov'
  | 'bzero'
  | 'add'
  | 'sub'
  | 'mul'
  | 'div'
  | 'mod'
  | 'and'
  | 'or'
  | 'xor'
  | 'shl'
  | 'shr'
  | 'mulr'
  | 'divr'
  | 'atan2'
  | 'setbit'
  | 'clrbit'
  | 'ctz';

export type JumpConditionType =
  | 'eq'
  | 'ne'
  | 'ge'
  | 'gt'
  | 'le'
  | 'lt'
  | 'andNotZero'
  | 'bitSet';

/**
 * Stack-machine operations of an `exp` expression (everything but `push`).
 */
export type TermOp =
  | 'add'
  | 'sub'
  | 'mul'
  | 'div'
  | 'mod'
  | 'shl'
  | 'shr'
  | 'band'
  | 'bor'
  | 'bxor'
  | 'neg'
  | 'bnot'
  | 'abs'
  | 'eq'
  | 'ne'
  | 'ge'
  | 'gt'
  | 'le'
  | 'lt'
  | 'zero'
  | 'nonzero'
  | 'land'
  | 'lor'
  | 'select'
  | 'mulr'
  | 'divr'
  | 'sin'
  | 'cos'
  | 'tan'
  | 'min'
  | 'max';

export type ExprTerm = { op: 'push'; value: NumberOperand } | { op: TermOp };

/**
 * Command flags, as a bit set.
 */
export const CommandFlags = {
  nowait: 1,
  interruptable: 2,
} as const;

export type CommandFlagName = keyof typeof CommandFlags;

export type CommandOperandValue =
  | { kind: 'u8'; value: number }
  | { kind: 'u16'; value: number }
  | { kind: 'bool'; value: boolean }
  | { kind: 'reg'; reg: number }
  | { kind: 'num'; value: NumberOperand }
  | { kind: 'msgid'; value: number }
  | { kind: 'str'; value: string }
  | { kind: 'strs'; value: string[] }
  | { kind: 'mask'; values: (NumberOperand | undefined)[] }
  | { kind: 'nums'; values: NumberOperand[] };

/**
 * One VM instruction. Registers are raw u16 encodings (`$vN` = N, `$aN` = 0x1000 + N).
 */
export type Instruction =
  | { op: 'uo'; type: UnaryOpType; dest: number; source?: NumberOperand }
  | { op: 'bo'; type: BinaryOpType; dest: number; left?: NumberOperand; right: NumberOperand }
  | { op: 'exp'; dest: number; terms: ExprTerm[] }
  | { op: 'gt'; dest: number; index: NumberOperand; table: NumberOperand[] }
  | {
      op: 'jc';
      cond: JumpConditionType;
      negated: boolean;
      left: NumberOperand;
      right: NumberOperand;
      target: CodeTarget;
    }
  | { op: 'j'; target: CodeTarget }
  | { op: 'gosub'; target: CodeTarget }
  | { op: 'retsub' }
  | { op: 'jt'; index: NumberOperand; targets: CodeTarget[] }
  | { op: 'rnd'; dest: number; min: NumberOperand; max: NumberOperand }
  | { op: 'push'; values: NumberOperand[] }
  | { op: 'pop'; dests: number[] }
  | { op: 'call'; target: CodeTarget; args: NumberOperand[] }
  | { op: 'return' }
  | { op: 'command'; name: string; operands: CommandOperandValue[]; flags: number };

/**
 * An instruction placed in a unit, with where it came from.
 */
export interface PlacedInstruction {
  /** Byte offset within the unit (generation) or absolute address (disassembly). */
  offset: number;
  size: number;
  instruction: Instruction;
  span?: SourceSpan;
}

export function constOperand(value: number): NumberOperand {
  return { kind: 'const', value };
}

export function regOperand(reg: number): NumberOperand {
  return { kind: 'reg', reg };
}

export function sameOperand(a: NumberOperand, b: NumberOperand): boolean {
  return a.kind === 'const'
    ? b.kind === 'const' && a.value === b.value
    : b.kind === 'reg' && a.reg === b.reg;
}
