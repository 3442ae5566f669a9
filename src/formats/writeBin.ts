import type { AssembledBlock, BinArtifact } from './types.js';

/**
 * Create a flat binary artifact: the code block exactly as the VM loads it at `baseAddress`.
 */
export function writeBin(block: AssembledBlock): BinArtifact {
  return { kind: 'bin', bytes: block.bytes.slice() };
}
