import type { Diagnostic } from './diagnostics/types.js';
import type { Artifact, FormatWriters } from './formats/types.js';
import type { UnitCache } from './incremental/cache.js';

/**
 * Options that influence compilation behavior and which artifacts are produced.
 */
export interface CompilerOptions {
  /** Address the block is loaded at; code addresses are absolute. Defaults to 0. */
  baseAddress?: number;
  /** Emit the flat code block (`.bin`). Defaults to true. */
  emitBin?: boolean;
  /** Emit listing (`.lst`). Defaults to true. */
  emitListing?: boolean;
  /** Emit the canonical disassembly of the emitted block (`.asm`). Defaults to true. */
  emitAsm?: boolean;
  /** Emit the symbol map (`.sym.json`). Defaults to true. */
  emitSymbols?: boolean;
}

/**
 * Options for turning a code block back into source.
 */
export interface DecompileOptions {
  /** Address the block was loaded at. Defaults to 0. */
  baseAddress?: number;
  /** A `.sym.json` written by the assembler; its code symbols name the labels. */
  symbolsFile?: string;
}

/**
 * Result of a compilation run: diagnostics plus any produced artifacts.
 */
export interface CompileResult {
  diagnostics: Diagnostic[];
  artifacts: Artifact[];
}

/**
 * Dependency injection surface for the compiler pipeline.
 *
 * Callers provide concrete format writers so the core pipeline can be pure/in-memory, and
 * optionally a cache shared between runs for incremental recompilation.
 */
export interface PipelineDeps {
  formats: FormatWriters;
  cache?: UnitCache;
}

/**
 * Top-level compile function signature used by the pipeline contract.
 */
export type CompileFn = (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
) => Promise<CompileResult>;

export type DecompileFn = (binFile: string, options: DecompileOptions) => Promise<CompileResult>;
