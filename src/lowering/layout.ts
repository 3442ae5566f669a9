import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { errorAt } from '../diagnostics/report.js';
import type { AssembledBlock, SymbolEntry } from '../formats/types.js';
import { patchU32 } from '../isa/bytes.js';
import type { CodeTarget, PlacedInstruction } from '../isa/ir.js';
import type { UnitCode } from './emit.js';

const ADDRESS_LIMIT = 0x1_0000_0000;

function resolveTargets(ins: PlacedInstruction, addresses: ReadonlyMap<string, number>): PlacedInstruction {
  const fix = (t: CodeTarget): CodeTarget =>
    t.kind === 'symbol' ? { kind: 'address', address: addresses.get(t.name) ?? 0 } : t;
  const i = ins.instruction;
  switch (i.op) {
    case 'jc':
    case 'j':
    case 'gosub':
    case 'call':
      return { ...ins, instruction: { ...i, target: fix(i.target) } };
    case 'jt':
      return { ...ins, instruction: { ...i, targets: i.targets.map(fix) } };
    default:
      return ins;
  }
}

/**
 * Fix-up pass: place units in order from `baseAddress`, assign label addresses and patch
 * every relocation.
 *
 * Unit spans must already be in whole-file coordinates. When a name is labelled twice the
 * first label wins (the duplicate was reported during collection).
 */
export function layoutUnits(
  units: readonly UnitCode[],
  baseAddress: number,
  file: string,
  diagnostics: Diagnostic[],
): AssembledBlock {
  const unitAddresses: number[] = [];
  const addresses = new Map<string, number>();
  const symbols: SymbolEntry[] = [];
  let size = 0;

  for (const unit of units) {
    const address = baseAddress + size;
    unitAddresses.push(address);
    for (const label of unit.labels) {
      if (addresses.has(label.name)) continue;
      addresses.set(label.name, address + label.offset);
      symbols.push({ kind: label.kind, name: label.name, address: address + label.offset });
    }
    size += unit.bytes.length;
  }

  if (baseAddress + size > ADDRESS_LIMIT) {
    diagnostics.push({
      id: DiagnosticIds.OperandOverflow,
      severity: 'error',
      message: `Code block of ${size} bytes at 0x${baseAddress.toString(16)} runs past the 32-bit address space.`,
      file,
    });
  }

  const bytes = new Uint8Array(size);
  const instructions: PlacedInstruction[] = [];
  units.forEach((unit, i) => {
    const address = unitAddresses[i] ?? baseAddress;
    const start = address - baseAddress;
    bytes.set(unit.bytes, start);
    for (const reloc of unit.relocations) {
      const target = addresses.get(reloc.symbol);
      if (target === undefined) {
        errorAt(diagnostics, DiagnosticIds.UnresolvedRelocation, reloc.span, `No address for \`${reloc.symbol}\`.`);
        continue;
      }
      patchU32(bytes, start + reloc.offset, target >>> 0);
    }
    for (const ins of unit.instructions) {
      instructions.push(resolveTargets({ ...ins, offset: address + ins.offset }, addresses));
    }
  });

  return { baseAddress, bytes, symbols, instructions };
}
