import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

import type { Diagnostic } from './diagnostics/types.js';
import { DiagnosticIds } from './diagnostics/types.js';
import { hasErrors, rebaseDiagnostics } from './diagnostics/report.js';
import { disassemble } from './disasm/disassemble.js';
import type { Artifact, AssembledBlock, SymbolEntry } from './formats/types.js';
import { parseUnit, splitUnits } from './frontend/units.js';
import type { UnitCache } from './incremental/cache.js';
import type { UnitCode } from './lowering/emit.js';
import { emitUnit, rebaseUnitCode } from './lowering/emit.js';
import { layoutUnits } from './lowering/layout.js';
import type {
  CompileFn,
  CompilerOptions,
  CompileResult,
  DecompileFn,
  DecompileOptions,
  PipelineDeps,
} from './pipeline.js';
import type { ResolvedGlobals } from './semantics/resolve.js';
import { resolveGlobals } from './semantics/resolve.js';
import { collectScope } from './semantics/scope.js';

export interface AssembleResult {
  /** The laid-out block; partial when `diagnostics` has errors. */
  block: AssembledBlock;
  /** Code symbols and evaluated value aliases, with their declaring line. */
  symbols: SymbolEntry[];
  diagnostics: Diagnostic[];
}

function withDefaults(options: CompilerOptions): Required<Omit<CompilerOptions, 'baseAddress'>> {
  return {
    emitBin: options.emitBin ?? true,
    emitListing: options.emitListing ?? true,
    emitAsm: options.emitAsm ?? true,
    emitSymbols: options.emitSymbols ?? true,
  };
}

function symbolTable(block: AssembledBlock, globals: ResolvedGlobals, file: string): SymbolEntry[] {
  const lineOf = (name: string): number | undefined => globals.scope.symbols.get(name)?.span.start.line;
  const out: SymbolEntry[] = [];
  for (const s of block.symbols) {
    const line = lineOf(s.name);
    out.push({ ...s, file, ...(line !== undefined ? { line } : {}) });
  }
  for (const [name, value] of globals.values) {
    if (!value) continue;
    const line = lineOf(name);
    out.push({
      kind: 'constant',
      name,
      value: value.value,
      valueKind: value.kind,
      file,
      ...(line !== undefined ? { line } : {}),
    });
  }
  return out;
}

/**
 * Assemble one source text into a code block.
 *
 * The text is split into units (functions, subroutines and the top-level runs between them);
 * with a `cache`, units whose text and referenced globals are unchanged are not parsed or
 * generated again.
 */
export function assembleSource(
  path: string,
  text: string,
  options: Pick<CompilerOptions, 'baseAddress'> = {},
  cache?: UnitCache,
): AssembleResult {
  const diagnostics: Diagnostic[] = [];
  const units = splitUnits(text);

  const parsed = units.map((unit) => {
    const result = cache ? cache.parse(path, unit.text) : parseUnit(path, unit.text);
    diagnostics.push(...rebaseDiagnostics(result.diagnostics, unit.lineOffset));
    return { unit, result };
  });

  const scope = collectScope(
    parsed.map(({ unit, result }) => ({
      program: result.program,
      lineOffset: unit.lineOffset,
      startOffset: unit.startOffset,
    })),
    diagnostics,
  );
  const globals = resolveGlobals(scope, diagnostics);

  const codes: UnitCode[] = parsed.map(({ unit, result }) => {
    const code = cache ? cache.generate(path, unit.text, result, globals) : emitUnit(result.program, globals);
    const placed = rebaseUnitCode(code, unit.lineOffset, unit.startOffset);
    diagnostics.push(...placed.diagnostics);
    return placed;
  });

  const laidOut = layoutUnits(codes, options.baseAddress ?? 0, path, diagnostics);
  const symbols = symbolTable(laidOut, globals, path);
  return { block: { ...laidOut, symbols }, symbols, diagnostics };
}

function internalError(file: string, stage: string, err: unknown): Diagnostic {
  return {
    id: DiagnosticIds.InternalError,
    severity: 'error',
    message: `Internal error during ${stage}: ${err instanceof Error ? err.message : String(err)}`,
    file,
  };
}

/**
 * Compile a scenario source file.
 *
 * Produces artifacts in-memory via `deps.formats` (no filesystem writes). Artifacts are only
 * produced when no error diagnostic was recorded.
 */
export const compile: CompileFn = async (
  entryFile: string,
  options: CompilerOptions,
  deps: PipelineDeps,
): Promise<CompileResult> => {
  const entryPath = resolve(entryFile);
  const diagnostics: Diagnostic[] = [];

  let sourceText: string;
  try {
    sourceText = await readFile(entryPath, 'utf8');
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.IoReadFailed,
      severity: 'error',
      message: `Failed to read entry file: ${String(err)}`,
      file: entryPath,
    });
    return { diagnostics, artifacts: [] };
  }

  let block: AssembledBlock;
  try {
    const result = assembleSource(entryPath, sourceText, options, deps.cache);
    diagnostics.push(...result.diagnostics);
    block = result.block;
  } catch (err) {
    diagnostics.push(internalError(entryPath, 'assembly', err));
    return { diagnostics, artifacts: [] };
  }
  if (hasErrors(diagnostics)) return { diagnostics, artifacts: [] };

  const emit = withDefaults(options);
  const artifacts: Artifact[] = [];
  const missingWriter = (what: string, ext: string) =>
    diagnostics.push({
      id: DiagnosticIds.Unknown,
      severity: 'warning',
      message: `${what}=true but no writer is configured; skipping ${ext} artifact.`,
      file: entryPath,
    });

  if (emit.emitBin) artifacts.push(deps.formats.writeBin(block));
  if (emit.emitListing) {
    if (deps.formats.writeListing) {
      artifacts.push(deps.formats.writeListing(block, { sourceText }));
    } else {
      missingWriter('emitListing', '.lst');
    }
  }
  if (emit.emitAsm) {
    if (deps.formats.writeAsm) artifacts.push(deps.formats.writeAsm(block));
    else missingWriter('emitAsm', '.asm');
  }
  if (emit.emitSymbols) {
    if (deps.formats.writeSymbols) {
      artifacts.push(deps.formats.writeSymbols(block, { rootDir: dirname(entryPath) }));
    } else {
      missingWriter('emitSymbols', '.sym.json');
    }
  }

  return { diagnostics, artifacts };
};

function isSymbolEntry(value: unknown): value is SymbolEntry {
  if (typeof value !== 'object' || value === null) return false;
  if (!('name' in value) || typeof value.name !== 'string' || !('kind' in value)) return false;
  switch (value.kind) {
    case 'constant':
      return (
        'value' in value &&
        typeof value.value === 'number' &&
        'valueKind' in value &&
        (value.valueKind === 'int' || value.valueKind === 'real')
      );
    case 'label':
    case 'function':
    case 'subroutine':
      return 'address' in value && typeof value.address === 'number';
    default:
      return false;
  }
}

function parseSymbolsJson(text: string): SymbolEntry[] | undefined {
  const json: unknown = JSON.parse(text);
  if (typeof json !== 'object' || json === null) return undefined;
  if (!('format' in json) || json.format !== 'scenasm-symbols') return undefined;
  if (!('symbols' in json) || !Array.isArray(json.symbols)) return undefined;
  return json.symbols.filter(isSymbolEntry);
}

/**
 * Disassemble a code block file into canonical source (`.asm` artifact).
 */
export const decompile: DecompileFn = async (
  binFile: string,
  options: DecompileOptions,
): Promise<CompileResult> => {
  const binPath = resolve(binFile);
  const diagnostics: Diagnostic[] = [];

  let bytes: Uint8Array;
  let symbols: SymbolEntry[] | undefined;
  try {
    bytes = new Uint8Array(await readFile(binPath));
  } catch (err) {
    diagnostics.push({
      id: DiagnosticIds.IoReadFailed,
      severity: 'error',
      message: `Failed to read code block: ${String(err)}`,
      file: binPath,
    });
    return { diagnostics, artifacts: [] };
  }
  if (options.symbolsFile !== undefined) {
    const symbolsPath = resolve(options.symbolsFile);
    try {
      symbols = parseSymbolsJson(await readFile(symbolsPath, 'utf8'));
    } catch (err) {
      diagnostics.push({
        id: DiagnosticIds.IoReadFailed,
        severity: 'error',
        message: `Failed to read symbol map: ${String(err)}`,
        file: symbolsPath,
      });
      return { diagnostics, artifacts: [] };
    }
    if (!symbols) {
      diagnostics.push({
        id: DiagnosticIds.IoReadFailed,
        severity: 'error',
        message: 'Not a scenasm symbol map.',
        file: symbolsPath,
      });
      return { diagnostics, artifacts: [] };
    }
  }

  const result = disassemble(bytes, {
    baseAddress: options.baseAddress ?? 0,
    file: binPath,
    ...(symbols ? { symbols } : {}),
  });
  diagnostics.push(...result.diagnostics);
  if (hasErrors(diagnostics)) return { diagnostics, artifacts: [] };
  return { diagnostics, artifacts: [{ kind: 'asm', text: result.text }] };
};
