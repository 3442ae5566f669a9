import type { Token } from './tokens.js';
import { isTrivia } from './tokens.js';

/**
 * Concrete syntax node kinds.
 *
 * Expression kinds end in `Expr`; everything else is a statement or list container.
 */
export type SyntaxKind =
  | 'SourceFile'
  | 'FunctionDef'
  | 'SubroutineDef'
  | 'AliasDef'
  | 'ParamList'
  | 'PreserveList'
  | 'PreserveRange'
  | 'Label'
  | 'Instruction'
  | 'ArgumentList'
  | 'Flag'
  | 'LiteralExpr'
  | 'NameExpr'
  | 'RegisterExpr'
  | 'BinaryExpr'
  | 'PrefixExpr'
  | 'ParenExpr'
  | 'CallExpr'
  | 'ArrayExpr'
  | 'JumpTableBlock'
  | 'JumpTableCase'
  | 'ErrorNode';

/**
 * A node of the lossless tree. Children keep every token of the input, trivia included.
 */
export interface SyntaxNode {
  readonly kind: SyntaxKind;
  /** 0-based start offset (inclusive). */
  readonly start: number;
  /** 0-based end offset (exclusive). */
  readonly end: number;
  readonly children: readonly SyntaxElement[];
}

export type SyntaxElement = SyntaxNode | Token;

export function isNode(element: SyntaxElement): element is SyntaxNode {
  return 'children' in element;
}

export function isExprKind(kind: SyntaxKind): boolean {
  return kind.endsWith('Expr') || kind === 'JumpTableBlock';
}

/**
 * Reconstruct the exact source text covered by `element`.
 */
export function printTree(element: SyntaxElement): string {
  if (!isNode(element)) return element.text;
  let out = '';
  for (const child of element.children) out += printTree(child);
  return out;
}

/**
 * All tokens under `element`, in source order.
 */
export function* tokensOf(element: SyntaxElement): Generator<Token> {
  if (!isNode(element)) {
    yield element;
    return;
  }
  for (const child of element.children) yield* tokensOf(child);
}

export function childNodes(node: SyntaxNode, kind?: SyntaxKind): SyntaxNode[] {
  return node.children.filter(
    (c): c is SyntaxNode => isNode(c) && (kind === undefined || c.kind === kind),
  );
}

export function childNode(node: SyntaxNode, kind: SyntaxKind): SyntaxNode | undefined {
  return childNodes(node, kind)[0];
}

/**
 * Direct child tokens that are not trivia or newlines.
 */
export function significantTokens(node: SyntaxNode): Token[] {
  return node.children.filter(
    (c): c is Token => !isNode(c) && !isTrivia(c) && c.kind !== 'newline' && c.kind !== 'eof',
  );
}

/**
 * Depth-first pre-order walk over nodes.
 */
export function walkNodes(node: SyntaxNode, visit: (n: SyntaxNode) => void): void {
  visit(node);
  for (const child of node.children) {
    if (isNode(child)) walkNodes(child, visit);
  }
}
