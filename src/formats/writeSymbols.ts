import { isAbsolute, relative, resolve } from 'node:path';

import type { AssembledBlock, SymbolEntry, SymbolsArtifact, WriteSymbolsOptions } from './types.js';

function normalizeSymbolPath(file: string, rootDir?: string): string {
  const withSlashes = file.replace(/\\/g, '/');
  if (!rootDir) return withSlashes;
  const absFile = resolve(file);
  const absRoot = resolve(rootDir);
  const rel = relative(absRoot, absFile);
  if (!rel || rel.startsWith('..') || isAbsolute(rel)) {
    return absFile.replace(/\\/g, '/');
  }
  return rel.replace(/\\/g, '/');
}

function compareSymbols(a: SymbolEntry, b: SymbolEntry): number {
  const aClass = a.kind === 'constant' ? 1 : 0;
  const bClass = b.kind === 'constant' ? 1 : 0;
  if (aClass !== bClass) return aClass - bClass;

  const aAddress = a.kind === 'constant' ? 0 : a.address;
  const bAddress = b.kind === 'constant' ? 0 : b.address;
  if (aAddress !== bAddress) return aAddress - bAddress;

  const nameCmp = a.name.toLowerCase().localeCompare(b.name.toLowerCase());
  if (nameCmp !== 0) return nameCmp;

  const kindCmp = a.kind.localeCompare(b.kind);
  if (kindCmp !== 0) return kindCmp;

  return (a.line ?? 0) - (b.line ?? 0);
}

/**
 * Create the `.sym.json` symbol map. Its `symbols` list is accepted back by the
 * disassembler as a label source.
 */
export function writeSymbols(block: AssembledBlock, opts?: WriteSymbolsOptions): SymbolsArtifact {
  const symbols = block.symbols
    .map((s) => ({
      ...s,
      ...(s.file !== undefined ? { file: normalizeSymbolPath(s.file, opts?.rootDir) } : {}),
    }))
    .sort(compareSymbols);

  return {
    kind: 'sym',
    json: {
      format: 'scenasm-symbols',
      version: 1,
      baseAddress: block.baseAddress,
      size: block.bytes.length,
      symbols,
    },
  };
}
