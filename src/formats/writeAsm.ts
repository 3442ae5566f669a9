import { disassemble } from '../disasm/disassemble.js';
import type { AsmArtifact, AssembledBlock } from './types.js';

function toHexAddress(n: number): string {
  return (n >>> 0).toString(16).toUpperCase().padStart(8, '0');
}

/**
 * Create a `.asm` artifact: the canonical disassembly of the emitted block.
 *
 * Labels keep the source names from `block.symbols`. The text reassembles to the same bytes
 * when assembled at the same base address.
 */
export function writeAsm(block: AssembledBlock): AsmArtifact {
  const { text } = disassemble(block.bytes, { baseAddress: block.baseAddress, symbols: block.symbols });
  const header = [
    '// scenasm canonical source',
    `// base: 0x${toHexAddress(block.baseAddress)} size: ${block.bytes.length}`,
    '',
  ];
  return { kind: 'asm', text: `${header.join('\n')}\n${text}` };
}
