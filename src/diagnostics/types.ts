/**
 * Severity level for a diagnostic.
 */
export type DiagnosticSeverity = 'error' | 'warning' | 'info';

/**
 * A secondary location attached to a diagnostic (e.g. "first declared here").
 */
export interface DiagnosticLabel {
  message: string;
  file: string;
  line: number;
  column: number;
}

/**
 * An assembler/disassembler diagnostic with an optional source location.
 *
 * Diagnostics must have stable IDs so downstream tooling can rely on them.
 */
export interface Diagnostic {
  /** Stable diagnostic identifier (e.g., `SCN301`). */
  id: DiagnosticId;
  severity: DiagnosticSeverity;
  message: string;
  file: string;
  /** 1-based line number, when known. */
  line?: number;
  /** 1-based column number, when known. */
  column?: number;
  /** 1-based end line of the primary span, when known. */
  endLine?: number;
  /** 1-based end column of the primary span (exclusive), when known. */
  endColumn?: number;
  /** Secondary spans. */
  related?: DiagnosticLabel[];
}

/**
 * Known diagnostic IDs.
 *
 * Ranges: 0xx driver, 1xx lexical, 2xx syntax, 3xx semantic, 4xx generation, 5xx decoding.
 */
export const DiagnosticIds = {
  /**
   * Unknown/unclassified diagnostic.
   *
   * Use a more specific ID when possible; this remains for forward compatibility.
   */
  Unknown: 'SCN000',

  /** Failed to read an input file from disk. */
  IoReadFailed: 'SCN001',

  /** Unexpected exception inside a stage. */
  InternalError: 'SCN002',

  /** Character that cannot start any token. */
  InvalidCharacter: 'SCN100',

  /** Block comment without a matching `*\/`. */
  UnterminatedComment: 'SCN101',

  /** String literal without a closing quote. */
  UnterminatedString: 'SCN102',

  /** Malformed or out-of-range number literal. */
  InvalidNumber: 'SCN103',

  /** Unknown escape sequence in a string literal. */
  InvalidEscape: 'SCN104',

  /** Generic syntax error (unexpected token). */
  ParseError: 'SCN200',

  /** A block is missing its `endfun`/`endsub`. */
  MissingTerminator: 'SCN201',

  /** Same name declared twice in one scope. */
  DuplicateSymbol: 'SCN300',

  /** Reference to a name that is not declared. */
  UndefinedSymbol: 'SCN301',

  /** Wrong number of arguments or parameters. */
  ArityMismatch: 'SCN302',

  /** Operand or expression of the wrong kind. */
  TypeMismatch: 'SCN303',

  /** Divide by a constant zero. */
  DivideByZero: 'SCN304',

  /** Modulo by a constant zero. */
  ModuloByZero: 'SCN305',

  /** Parameter alias bound to a preserved register. */
  AliasPreserveConflict: 'SCN306',

  /** Register alias chain loops back on itself. */
  AliasCycle: 'SCN307',

  /** Arithmetic overflow while folding a constant expression. */
  ConstOverflow: 'SCN308',

  /** Instruction that cannot be encoded (unknown mnemonic, bad operand shape). */
  EncodeError: 'SCN400',

  /** Immediate, register index, list length or address out of range for its encoding. */
  OperandOverflow: 'SCN401',

  /** Two jump-table cases with the same key. */
  DuplicateJumpTableCase: 'SCN402',

  /** Jump-table key that leaves a hole or is negative. */
  JumpTableKeyError: 'SCN403',

  /** Relocation against a symbol with no address. */
  UnresolvedRelocation: 'SCN404',

  /** Binary input that does not decode as an instruction stream. */
  DecodeError: 'SCN500',

  /** Binary input using an encoding the assembler never produces. */
  NonCanonicalEncoding: 'SCN501',
} as const;

/**
 * Union type of all defined diagnostic IDs.
 */
export type DiagnosticId = (typeof DiagnosticIds)[keyof typeof DiagnosticIds];
