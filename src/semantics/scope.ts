import type { Diagnostic } from '../diagnostics/types.js';
import { DiagnosticIds } from '../diagnostics/types.js';
import { errorAt, labelAt } from '../diagnostics/report.js';
import type { ExprNode, ProgramNode, SourceSpan } from '../frontend/ast.js';
import { rebaseSpan } from '../frontend/source.js';
import { parseRegisterName } from '../isa/operands.js';

/**
 * A program parsed from one unit, with where the unit sits in the whole file.
 */
export interface UnitProgram {
  program: ProgramNode;
  /** 0-based line of the unit's first character. */
  lineOffset: number;
  /** 0-based offset of the unit's first character. */
  startOffset: number;
}

interface SymbolBase {
  name: string;
  /** Declaration span, in whole-file coordinates. */
  span: SourceSpan;
  /** Index of the declaring unit. */
  unit: number;
}

export type GlobalSymbol =
  | (SymbolBase & { kind: 'label' })
  | (SymbolBase & { kind: 'function'; arity: number })
  | (SymbolBase & { kind: 'subroutine' })
  | (SymbolBase & { kind: 'value'; expr: ExprNode; lineOffset: number });

export type SymbolKind = GlobalSymbol['kind'];

/**
 * `def $name = …`. The expression keeps unit-relative spans; `lineOffset` rebases them.
 */
export interface RegisterAliasDecl extends SymbolBase {
  expr: ExprNode;
  lineOffset: number;
}

/**
 * Global scope: labels, functions, subroutines and value aliases share `symbols`;
 * register aliases live in their own namespace.
 */
export interface GlobalScope {
  symbols: Map<string, GlobalSymbol>;
  registerAliases: Map<string, RegisterAliasDecl>;
}

export function isCodeSymbol(symbol: GlobalSymbol): boolean {
  return symbol.kind !== 'value';
}

function describe(kind: SymbolKind): string {
  return kind === 'value' ? 'value alias' : kind;
}

/**
 * Collection pass: register every global declaration of every unit.
 *
 * Duplicates keep the first declaration and report the later one with a secondary span.
 */
export function collectScope(units: readonly UnitProgram[], diagnostics: Diagnostic[]): GlobalScope {
  const scope: GlobalScope = { symbols: new Map(), registerAliases: new Map() };

  const declare = (symbol: GlobalSymbol): void => {
    if (symbol.name === '') return;
    const first = scope.symbols.get(symbol.name);
    if (first) {
      errorAt(
        diagnostics,
        DiagnosticIds.DuplicateSymbol,
        symbol.span,
        `Duplicate ${describe(symbol.kind)} \`${symbol.name}\`.`,
        [labelAt(first.span, `first declared here as a ${describe(first.kind)}`)],
      );
      return;
    }
    scope.symbols.set(symbol.name, symbol);
  };

  units.forEach(({ program, lineOffset, startOffset }, unit) => {
    const at = (s: SourceSpan) => rebaseSpan(s, lineOffset, startOffset);

    for (const item of program.items) {
      switch (item.kind) {
        case 'Function':
        case 'Subroutine':
          declare(
            item.kind === 'Function'
              ? { kind: 'function', name: item.name, span: at(item.nameSpan), unit, arity: item.params.length }
              : { kind: 'subroutine', name: item.name, span: at(item.nameSpan), unit },
          );
          for (const stmt of item.body) {
            if (stmt.kind === 'Label') declare({ kind: 'label', name: stmt.name, span: at(stmt.span), unit });
          }
          break;
        case 'Label':
          declare({ kind: 'label', name: item.name, span: at(item.span), unit });
          break;
        case 'AliasDef': {
          if (!item.register) {
            declare({
              kind: 'value',
              name: item.name,
              span: at(item.nameSpan),
              unit,
              expr: item.value,
              lineOffset,
            });
            break;
          }
          if (item.name === '') break;
          if (parseRegisterName(item.name) !== undefined) {
            errorAt(
              diagnostics,
              DiagnosticIds.DuplicateSymbol,
              at(item.nameSpan),
              `\`$${item.name}\` is a built-in register and cannot be redefined.`,
            );
            break;
          }
          const first = scope.registerAliases.get(item.name);
          if (first) {
            errorAt(
              diagnostics,
              DiagnosticIds.DuplicateSymbol,
              at(item.nameSpan),
              `Duplicate register alias \`$${item.name}\`.`,
              [labelAt(first.span, 'first declared here')],
            );
            break;
          }
          scope.registerAliases.set(item.name, {
            name: item.name,
            span: at(item.nameSpan),
            unit,
            expr: item.value,
            lineOffset,
          });
          break;
        }
        default:
          break;
      }
    }
  });

  return scope;
}
