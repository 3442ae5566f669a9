import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { errorAt, rebaseDiagnostics } from '../diagnostics/report.js';
import type { SourceSpan } from '../frontend/ast.js';
import { parseRegisterName } from '../isa/operands.js';
import type { ConstValue, ExprScope } from './expr.js';
import { lowerConst } from './expr.js';
import type { GlobalScope, GlobalSymbol, RegisterAliasDecl } from './scope.js';

/**
 * Global scope with every alias evaluated. An entry mapped to `undefined` failed to
 * evaluate and has already been reported.
 */
export interface ResolvedGlobals {
  scope: GlobalScope;
  values: Map<string, ConstValue | undefined>;
  registers: Map<string, number | undefined>;
}

class AliasEvaluator {
  readonly values = new Map<string, ConstValue | undefined>();
  readonly registers = new Map<string, number | undefined>();
  private readonly pendingValues = new Set<string>();
  private readonly pendingRegisters = new Set<string>();

  constructor(
    private readonly scope: GlobalScope,
    private readonly diagnostics: Diagnostic[],
  ) {}

  value(symbol: GlobalSymbol & { kind: 'value' }): ConstValue | undefined {
    if (this.values.has(symbol.name)) return this.values.get(symbol.name);
    this.pendingValues.add(symbol.name);

    const local: Diagnostic[] = [];
    const exprScope: ExprScope = {
      diagnostics: local,
      register: (name, span) => {
        errorAt(local, DiagnosticIds.TypeMismatch, span, `A value alias cannot read register \`$${name}\`.`);
        return undefined;
      },
      value: (name, span) => {
        const target = this.scope.symbols.get(name);
        if (!target) {
          errorAt(local, DiagnosticIds.UndefinedSymbol, span, `Undefined name \`${name}\`.`);
          return undefined;
        }
        if (target.kind !== 'value') {
          errorAt(local, DiagnosticIds.TypeMismatch, span, `\`${name}\` is a ${target.kind}, not a value.`);
          return undefined;
        }
        if (this.pendingValues.has(name)) {
          errorAt(local, DiagnosticIds.AliasCycle, span, `Value alias \`${name}\` refers to itself.`);
          return undefined;
        }
        return this.value(target);
      },
    };
    const result = lowerConst(symbol.expr, exprScope);
    this.diagnostics.push(...rebaseDiagnostics(local, symbol.lineOffset));
    this.pendingValues.delete(symbol.name);
    this.values.set(symbol.name, result);
    return result;
  }

  register(decl: RegisterAliasDecl): number | undefined {
    if (this.registers.has(decl.name)) return this.registers.get(decl.name);
    this.pendingRegisters.add(decl.name);
    const local: Diagnostic[] = [];
    let result: number | undefined;
    const expr = decl.expr;
    if (expr.kind === 'Register') {
      const next = this.scope.registerAliases.get(expr.name);
      if (next && this.pendingRegisters.has(next.name)) {
        errorAt(local, DiagnosticIds.AliasCycle, expr.span, `Register alias \`$${next.name}\` refers to itself.`);
      } else if (next) {
        result = this.register(next);
      } else {
        result = parseRegisterName(expr.name);
        if (result === undefined) {
          errorAt(local, DiagnosticIds.UndefinedSymbol, expr.span, `Unknown register \`$${expr.name}\`.`);
        }
      }
    } else if (expr.kind !== 'Missing') {
      errorAt(local, DiagnosticIds.TypeMismatch, expr.span, 'A register alias must name a register.');
    }
    this.diagnostics.push(...rebaseDiagnostics(local, decl.lineOffset));
    this.pendingRegisters.delete(decl.name);
    this.registers.set(decl.name, result);
    return result;
  }
}

/**
 * Evaluate every value alias and register alias of the global scope.
 */
export function resolveGlobals(scope: GlobalScope, diagnostics: Diagnostic[]): ResolvedGlobals {
  const evaluator = new AliasEvaluator(scope, diagnostics);
  for (const symbol of scope.symbols.values()) {
    if (symbol.kind === 'value') evaluator.value(symbol);
  }
  for (const decl of scope.registerAliases.values()) evaluator.register(decl);
  return { scope, values: evaluator.values, registers: evaluator.registers };
}

/**
 * What a unit depends on when it references `ref` (a global name, or `$name` for a
 * register alias). Generated code can be reused while every identity is unchanged.
 */
export function globalIdentity(globals: ResolvedGlobals, ref: string): string {
  if (ref.startsWith('$')) {
    const name = ref.slice(1);
    if (!globals.scope.registerAliases.has(name)) return 'undefined';
    return `reg:${globals.registers.get(name) ?? 'error'}`;
  }
  const symbol = globals.scope.symbols.get(ref);
  if (!symbol) return 'undefined';
  switch (symbol.kind) {
    case 'function':
      return `function/${symbol.arity}`;
    case 'value': {
      const v = globals.values.get(ref);
      return v ? `value/${v.kind}/${v.value}` : 'value/error';
    }
    default:
      return symbol.kind;
  }
}

export function fingerprint(globals: ResolvedGlobals, refs: Iterable<string>): string {
  return [...refs]
    .sort()
    .map((ref) => `${ref}=${globalIdentity(globals, ref)}`)
    .join('\n');
}

/**
 * Linking for one unit: classifies names and registers, recording which globals the unit
 * depends on.
 */
export class UnitResolver implements ExprScope {
  readonly refs = new Set<string>();
  private params: ReadonlyMap<string, number> = new Map();

  constructor(
    private readonly globals: ResolvedGlobals,
    readonly diagnostics: Diagnostic[],
  ) {}

  /** Bind function-local register aliases; an empty map leaves function scope. */
  setParams(params: ReadonlyMap<string, number>): void {
    this.params = params;
  }

  /**
   * Function-local aliases, then global register aliases, then built-in `$vN`/`$aN`.
   */
  register(name: string, span: SourceSpan): number | undefined {
    const local = this.params.get(name);
    if (local !== undefined) return local;
    if (this.globals.scope.registerAliases.has(name)) {
      this.refs.add(`$${name}`);
      return this.globals.registers.get(name);
    }
    const builtin = parseRegisterName(name);
    if (builtin !== undefined) return builtin;
    this.refs.add(`$${name}`);
    errorAt(this.diagnostics, DiagnosticIds.UndefinedSymbol, span, `Unknown register \`$${name}\`.`);
    return undefined;
  }

  value(name: string, span: SourceSpan): ConstValue | undefined {
    this.refs.add(name);
    const symbol = this.globals.scope.symbols.get(name);
    if (!symbol) {
      errorAt(this.diagnostics, DiagnosticIds.UndefinedSymbol, span, `Undefined name \`${name}\`.`);
      return undefined;
    }
    if (symbol.kind !== 'value') {
      errorAt(this.diagnostics, DiagnosticIds.TypeMismatch, span, `\`${name}\` is a ${symbol.kind}, not a value.`);
      return undefined;
    }
    return this.globals.values.get(name);
  }

  /**
   * A label, function or subroutine referenced as a code target.
   */
  codeSymbol(name: string, span: SourceSpan): GlobalSymbol | undefined {
    this.refs.add(name);
    const symbol = this.globals.scope.symbols.get(name);
    if (!symbol) {
      errorAt(this.diagnostics, DiagnosticIds.UndefinedSymbol, span, `Undefined label \`${name}\`.`);
      return undefined;
    }
    if (symbol.kind === 'value') {
      errorAt(this.diagnostics, DiagnosticIds.TypeMismatch, span, `\`${name}\` is a value alias, not a code address.`);
      return undefined;
    }
    return symbol;
  }
}
