import type { SourceSpan } from '../frontend/ast.js';
import type {
  Diagnostic,
  DiagnosticId,
  DiagnosticLabel,
  DiagnosticSeverity,
} from './types.js';

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}

/**
 * Build a located diagnostic from a source span.
 */
export function diagnosticAt(
  id: DiagnosticId,
  severity: DiagnosticSeverity,
  span: SourceSpan,
  message: string,
  related?: DiagnosticLabel[],
): Diagnostic {
  return {
    id,
    severity,
    message,
    file: span.file,
    line: span.start.line,
    column: span.start.column,
    endLine: span.end.line,
    endColumn: span.end.column,
    ...(related && related.length > 0 ? { related } : {}),
  };
}

export function errorAt(
  diagnostics: Diagnostic[],
  id: DiagnosticId,
  span: SourceSpan,
  message: string,
  related?: DiagnosticLabel[],
): void {
  diagnostics.push(diagnosticAt(id, 'error', span, message, related));
}

export function warnAt(
  diagnostics: Diagnostic[],
  id: DiagnosticId,
  span: SourceSpan,
  message: string,
  related?: DiagnosticLabel[],
): void {
  diagnostics.push(diagnosticAt(id, 'warning', span, message, related));
}

export function labelAt(span: SourceSpan, message: string): DiagnosticLabel {
  return { message, file: span.file, line: span.start.line, column: span.start.column };
}

/**
 * Shift every line number of `diagnostics` by `lineDelta`.
 *
 * Cached per-unit diagnostics are recorded relative to the unit's first line.
 */
export function rebaseDiagnostics(
  diagnostics: readonly Diagnostic[],
  lineDelta: number,
): Diagnostic[] {
  if (lineDelta === 0) return [...diagnostics];
  return diagnostics.map((d) => ({
    ...d,
    ...(d.line !== undefined ? { line: d.line + lineDelta } : {}),
    ...(d.endLine !== undefined ? { endLine: d.endLine + lineDelta } : {}),
    ...(d.related
      ? { related: d.related.map((r) => ({ ...r, line: r.line + lineDelta })) }
      : {}),
  }));
}

/**
 * Severity -> diagnostics, each list in input order.
 */
export function groupBySeverity(
  diagnostics: readonly Diagnostic[],
): Record<DiagnosticSeverity, Diagnostic[]> {
  const out: Record<DiagnosticSeverity, Diagnostic[]> = { error: [], warning: [], info: [] };
  for (const d of diagnostics) out[d.severity].push(d);
  return out;
}

function severityRank(severity: DiagnosticSeverity): number {
  if (severity === 'error') return 0;
  if (severity === 'warning') return 1;
  return 2;
}

// Unlocated diagnostics sort after located ones.
function compareOptional(a: number | undefined, b: number | undefined): number {
  if (a === undefined) return b === undefined ? 0 : 1;
  if (b === undefined) return -1;
  return a - b;
}

/**
 * Deterministic ordering: file, line, column, severity, id, message.
 */
export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  const fileCmp = a.file.replace(/\\/g, '/').localeCompare(b.file.replace(/\\/g, '/'));
  if (fileCmp !== 0) return fileCmp;

  const lineCmp = compareOptional(a.line, b.line);
  if (lineCmp !== 0) return lineCmp;

  const colCmp = compareOptional(a.column, b.column);
  if (colCmp !== 0) return colCmp;

  const sevCmp = severityRank(a.severity) - severityRank(b.severity);
  if (sevCmp !== 0) return sevCmp;

  const idCmp = a.id.localeCompare(b.id);
  if (idCmp !== 0) return idCmp;

  return a.message.localeCompare(b.message);
}

/**
 * Render one diagnostic as `file:line:col: severity: [ID] message`, followed by
 * one indented `note:` line per secondary span.
 */
export function formatDiagnostic(d: Diagnostic): string {
  const loc =
    d.line !== undefined && d.column !== undefined ? `${d.file}:${d.line}:${d.column}` : d.file;
  const lines = [`${loc}: ${d.severity}: [${d.id}] ${d.message}`];
  for (const r of d.related ?? []) {
    lines.push(`  ${r.file}:${r.line}:${r.column}: note: ${r.message}`);
  }
  return lines.join('\n');
}
