import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import type { SymbolEntry } from '../formats/types.js';
import { ByteReader, DecodeFailure } from '../isa/bytes.js';
import { decodeInstruction } from '../isa/decode.js';
import type { PlacedInstruction } from '../isa/ir.js';
import { assignLabels, targetNamer } from './labels.js';
import { INDENT, printInstruction } from './printer.js';

export interface DisassembleOptions {
  /** Address of the first byte; targets are absolute. Defaults to 0. */
  baseAddress?: number;
  /** Names for code addresses, typically the `symbols` list of a `.sym.json`. */
  symbols?: readonly SymbolEntry[];
  /** Name used in diagnostics. */
  file?: string;
}

export interface DisassembleResult {
  text: string;
  /** Decoded instructions with absolute addresses in `offset`. */
  instructions: PlacedInstruction[];
  diagnostics: Diagnostic[];
}

function hexAddress(address: number): string {
  return `0x${(address >>> 0).toString(16).padStart(8, '0')}`;
}

/**
 * Decode a code block and print it as canonical source.
 *
 * Decoding is a linear sweep that stops at the first byte sequence it cannot decode; the
 * instructions before it are still printed.
 */
export function disassemble(bytes: Uint8Array, options: DisassembleOptions = {}): DisassembleResult {
  const baseAddress = options.baseAddress ?? 0;
  const file = options.file ?? '<binary>';
  const diagnostics: Diagnostic[] = [];
  const instructions: PlacedInstruction[] = [];

  const reader = new ByteReader(bytes);
  while (!reader.atEnd()) {
    const start = reader.pos;
    try {
      const instruction = decodeInstruction(reader);
      instructions.push({ offset: baseAddress + start, size: reader.pos - start, instruction });
    } catch (err) {
      if (!(err instanceof DecodeFailure)) throw err;
      diagnostics.push({
        id: err.nonCanonical ? DiagnosticIds.NonCanonicalEncoding : DiagnosticIds.DecodeError,
        severity: 'error',
        message: `${hexAddress(baseAddress + err.offset)}: ${err.message}`,
        file,
      });
      break;
    }
  }

  const labels = assignLabels(instructions, options.symbols);
  const name = targetNamer(labels);
  const lines: string[] = [];
  for (const placed of instructions) {
    const label = labels.get(placed.offset);
    if (label !== undefined) lines.push(`${label}:`);
    lines.push(INDENT + printInstruction(placed.instruction, name));
  }

  const text = lines.map((line) => `${line}\n`).join('');
  return { text, instructions, diagnostics };
}
