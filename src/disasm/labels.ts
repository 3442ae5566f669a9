import type { SymbolEntry } from '../formats/types.js';
import { FLAG_NAMES } from '../frontend/parser.js';
import { KEYWORDS } from '../frontend/tokens.js';
import { instructionTargets } from '../isa/decode.js';
import type { CodeTarget, PlacedInstruction } from '../isa/ir.js';
import type { TargetNamer } from './printer.js';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*$/;
const SYNTHETIC = /^L_[0-9A-F]{8}$/;

function hex8(value: number): string {
  return (value >>> 0).toString(16).toUpperCase().padStart(8, '0');
}

function usableName(name: string): boolean {
  return IDENTIFIER.test(name) && !SYNTHETIC.test(name) && !KEYWORDS.has(name) && !FLAG_NAMES.has(name);
}

export function syntheticLabel(address: number): string {
  return `L_${hex8(address)}`;
}

/**
 * Labels for every jump, call and table target that lands on an instruction boundary.
 *
 * A caller-given name is used when it reads back as a label reference and is not used for
 * another address; otherwise the label is `L_XXXXXXXX` (absolute address in hex).
 */
export function assignLabels(
  instructions: readonly PlacedInstruction[],
  symbols: readonly SymbolEntry[] = [],
): Map<number, string> {
  const boundaries = new Set(instructions.map((i) => i.offset));
  const given = new Map<number, string>();
  const taken = new Set<string>();
  for (const s of symbols) {
    if (s.kind === 'constant' || given.has(s.address)) continue;
    if (!usableName(s.name) || taken.has(s.name)) continue;
    given.set(s.address, s.name);
    taken.add(s.name);
  }

  const labels = new Map<number, string>();
  for (const ins of instructions) {
    for (const t of instructionTargets(ins.instruction)) {
      if (t.kind !== 'address' || !boundaries.has(t.address) || labels.has(t.address)) continue;
      labels.set(t.address, given.get(t.address) ?? syntheticLabel(t.address));
    }
  }
  // Named entry points are kept even when nothing in the block jumps to them.
  for (const [address, name] of given) {
    if (boundaries.has(address) && !labels.has(address)) labels.set(address, name);
  }
  return labels;
}

/**
 * Target spelling for the printer: label names, else `0x` hex literals.
 */
export function targetNamer(labels: ReadonlyMap<number, string>): TargetNamer {
  return (target: CodeTarget) => {
    if (target.kind === 'symbol') return target.name;
    return labels.get(target.address) ?? `0x${hex8(target.address)}`;
  };
}
