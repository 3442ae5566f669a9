import { assignLabels, targetNamer } from '../disasm/labels.js';
import { printInstruction } from '../disasm/printer.js';
import type { AssembledBlock, ListingArtifact, SymbolEntry, WriteListingOptions } from './types.js';

const BYTES_PER_LINE = 8;

function toHexByte(n: number): string {
  return (n & 0xff).toString(16).toUpperCase().padStart(2, '0');
}

function toHexAddress(n: number): string {
  return (n >>> 0).toString(16).toUpperCase().padStart(8, '0');
}

function formatSymbol(s: SymbolEntry): string {
  if (s.kind === 'constant') return `constant ${s.name} = ${s.value} (${s.valueKind})`;
  return `${s.kind} ${s.name} = 0x${toHexAddress(s.address)}`;
}

function sortSymbols(a: SymbolEntry, b: SymbolEntry): number {
  const aClass = a.kind === 'constant' ? 1 : 0;
  const bClass = b.kind === 'constant' ? 1 : 0;
  if (aClass !== bClass) return aClass - bClass;
  const aAddr = a.kind === 'constant' ? 0 : a.address;
  const bAddr = b.kind === 'constant' ? 0 : b.address;
  if (aAddr !== bAddr) return aAddr - bAddr;
  return a.name.toLowerCase().localeCompare(b.name.toLowerCase());
}

/**
 * Create a deterministic `.lst` listing: one line per instruction with its address, its bytes
 * and the source line it came from (canonical text when no source is given), followed by the
 * symbol table.
 */
export function writeListing(block: AssembledBlock, opts?: WriteListingOptions): ListingArtifact {
  const sourceLines = opts?.sourceText?.split(/\r?\n/);
  const name = targetNamer(assignLabels(block.instructions, block.symbols));

  const labelsAt = new Map<number, string[]>();
  for (const s of [...block.symbols].sort(sortSymbols)) {
    if (s.kind === 'constant') continue;
    const names = labelsAt.get(s.address) ?? [];
    names.push(s.name);
    labelsAt.set(s.address, names);
  }

  const lines: string[] = [];
  lines.push('// scenasm listing');
  lines.push(`// base: 0x${toHexAddress(block.baseAddress)} size: ${block.bytes.length} bytes`);
  lines.push('');

  const hexWidth = BYTES_PER_LINE * 3 - 1;
  for (const placed of block.instructions) {
    for (const label of labelsAt.get(placed.offset) ?? []) lines.push(`${label}:`);
    const start = placed.offset - block.baseAddress;
    const bytes = Array.from(block.bytes.subarray(start, start + placed.size), toHexByte);
    const source = placed.span
      ? (sourceLines?.[placed.span.start.line - 1]?.trim() ?? printInstruction(placed.instruction, name))
      : printInstruction(placed.instruction, name);
    for (let i = 0; i < bytes.length; i += BYTES_PER_LINE) {
      const hex = bytes.slice(i, i + BYTES_PER_LINE).join(' ');
      const text = i === 0 ? `  ${source}` : '';
      lines.push(`${toHexAddress(placed.offset + i)}  ${hex.padEnd(hexWidth, ' ')}${text}`.trimEnd());
    }
  }

  lines.push('');
  lines.push('// symbols:');
  for (const s of [...block.symbols].sort(sortSymbols)) {
    lines.push(`// ${formatSymbol(s)}`);
  }

  return { kind: 'lst', text: lines.join('\n') + '\n' };
}
