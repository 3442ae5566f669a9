import { readFileSync } from 'node:fs';

import type { CommandFlagName } from './ir.js';
import { CommandFlags } from './ir.js';

export type CommandOperandKind =
  | 'u8'
  | 'u16'
  | 'bool'
  | 'reg'
  | 'num'
  | 'msgid'
  | 'str'
  | 'strs'
  | 'mask'
  | 'nums';

const OPERAND_KINDS: readonly CommandOperandKind[] = [
  'u8',
  'u16',
  'bool',
  'reg',
  'num',
  'msgid',
  'str',
  'strs',
  'mask',
  'nums',
];

export interface ValueOperandDef {
  name: string;
  kind: CommandOperandKind;
}

/**
 * A byte written from a source flag rather than a positional operand.
 */
export interface FlagOperandDef {
  name: string;
  kind: 'flag';
  flag: CommandFlagName;
  whenSet: number;
  whenClear: number;
}

export type CommandOperandDef = ValueOperandDef | FlagOperandDef;

export interface CommandDef {
  name: string;
  opcode: number;
  /** Operands in encoding order. */
  operands: CommandOperandDef[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isFlagName(value: unknown): value is CommandFlagName {
  return typeof value === 'string' && Object.hasOwn(CommandFlags, value);
}

function parseOperand(raw: unknown, where: string): CommandOperandDef {
  if (!isRecord(raw) || typeof raw.name !== 'string') {
    throw new Error(`Command table: malformed operand in ${where}.`);
  }
  const { name, kind } = raw;
  if (kind === 'flag') {
    const { flag, whenSet, whenClear } = raw;
    if (!isFlagName(flag) || typeof whenSet !== 'number' || typeof whenClear !== 'number') {
      throw new Error(`Command table: malformed flag operand ${where}.${name}.`);
    }
    return { name, kind, flag, whenSet, whenClear };
  }
  const valueKind = OPERAND_KINDS.find((k) => k === kind);
  if (!valueKind) throw new Error(`Command table: unknown operand kind in ${where}.${name}.`);
  return { name, kind: valueKind };
}

/**
 * Validate the raw command table.
 */
export function parseCommandTable(raw: unknown): CommandDef[] {
  if (!isRecord(raw) || !Array.isArray(raw.commands)) {
    throw new Error('Command table: expected a `commands` array.');
  }
  const seenNames = new Set<string>();
  const seenOpcodes = new Set<number>();
  return raw.commands.map((entry: unknown, i: number): CommandDef => {
    if (!isRecord(entry) || typeof entry.name !== 'string' || typeof entry.opcode !== 'number') {
      throw new Error(`Command table: malformed entry #${i}.`);
    }
    const { name, opcode, operands } = entry;
    if (!Array.isArray(operands)) throw new Error(`Command table: ${name} has no operand list.`);
    if (seenNames.has(name) || seenOpcodes.has(opcode)) {
      throw new Error(`Command table: ${name} (0x${opcode.toString(16)}) is defined twice.`);
    }
    seenNames.add(name);
    seenOpcodes.add(opcode);
    return { name, opcode, operands: operands.map((o: unknown) => parseOperand(o, name)) };
  });
}

const table: unknown = JSON.parse(readFileSync(new URL('./commands.json', import.meta.url), 'utf8'));

export const COMMANDS: readonly CommandDef[] = parseCommandTable(table);

const byName = new Map(COMMANDS.map((c) => [c.name, c]));
const byOpcode = new Map(COMMANDS.map((c) => [c.opcode, c]));

export function commandByName(name: string): CommandDef | undefined {
  return byName.get(name.toUpperCase());
}

export function commandByOpcode(opcode: number): CommandDef | undefined {
  return byOpcode.get(opcode);
}

/**
 * Operands written in source, in order (flag bytes excluded).
 */
export function positionalOperands(def: CommandDef): ValueOperandDef[] {
  return def.operands.filter((o): o is ValueOperandDef => o.kind !== 'flag');
}

export function flagOperands(def: CommandDef): FlagOperandDef[] {
  return def.operands.filter((o): o is FlagOperandDef => o.kind === 'flag');
}
