import type { PlacedInstruction } from '../isa/ir.js';

export type SymbolEntry =
  | {
      kind: 'constant';
      name: string;
      /** Fixed point when `valueKind` is `real`. */
      value: number;
      valueKind: 'int' | 'real';
      file?: string;
      line?: number;
    }
  | {
      kind: 'label' | 'function' | 'subroutine';
      name: string;
      address: number;
      file?: string;
      line?: number;
    };

/**
 * Output of layout: code bytes placed at `baseAddress`, with the instructions (absolute
 * `offset`, address order) and symbols they came from.
 */
export interface AssembledBlock {
  baseAddress: number;
  bytes: Uint8Array;
  symbols: SymbolEntry[];
  instructions: PlacedInstruction[];
}

export interface WriteListingOptions {
  /** Text the block was assembled from; listing lines quote it instead of canonical text. */
  sourceText?: string;
}

export interface WriteSymbolsOptions {
  /** Symbol `file` paths are written relative to this directory. */
  rootDir?: string;
}

export type SymbolsJson = {
  format: 'scenasm-symbols';
  version: 1;
  baseAddress: number;
  size: number;
  symbols: SymbolEntry[];
};

export type BinArtifact = { kind: 'bin'; path?: string; bytes: Uint8Array };
export type ListingArtifact = { kind: 'lst'; path?: string; text: string };
export type AsmArtifact = { kind: 'asm'; path?: string; text: string };
export type SymbolsArtifact = { kind: 'sym'; path?: string; json: SymbolsJson };

export type Artifact = BinArtifact | ListingArtifact | AsmArtifact | SymbolsArtifact;

/**
 * Writers the pipeline calls per requested artifact. Only `.bin` is mandatory.
 */
export interface FormatWriters {
  writeBin(block: AssembledBlock): BinArtifact;
  writeListing?(block: AssembledBlock, opts?: WriteListingOptions): ListingArtifact;
  writeAsm?(block: AssembledBlock): AsmArtifact;
  writeSymbols?(block: AssembledBlock, opts?: WriteSymbolsOptions): SymbolsArtifact;
}
