export { assembleSource, compile, decompile } from './compile.js';
export type { AssembleResult } from './compile.js';
export type {
  CompileFn,
  CompileResult,
  CompilerOptions,
  DecompileFn,
  DecompileOptions,
  PipelineDeps,
} from './pipeline.js';

export type { Diagnostic, DiagnosticId, DiagnosticSeverity, DiagnosticLabel } from './diagnostics/types.js';
export { DiagnosticIds } from './diagnostics/types.js';
export { compareDiagnostics, formatDiagnostic, groupBySeverity, hasErrors } from './diagnostics/report.js';

export { disassemble } from './disasm/disassemble.js';
export type { DisassembleOptions, DisassembleResult } from './disasm/disassemble.js';

export { defaultFormatWriters } from './formats/index.js';
export type * from './formats/types.js';

export { lex } from './frontend/lexer.js';
export { parseSource } from './frontend/parser.js';
export type { ParseResult } from './frontend/parser.js';
export { printTree } from './frontend/syntax.js';
export type { SyntaxElement, SyntaxKind, SyntaxNode } from './frontend/syntax.js';
export { splitUnits } from './frontend/units.js';

export { UnitCache } from './incremental/cache.js';
export type { CacheStats } from './incremental/cache.js';

export { decodeInstruction } from './isa/decode.js';
export { encodeInstructions } from './isa/encode.js';
export type { Instruction, PlacedInstruction } from './isa/ir.js';
