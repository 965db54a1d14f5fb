/**
 * Helpers for reading node-sql-parser ASTs without trusting their shape.
 *
 * The parser's node layout differs between grammars and releases (an
 * identifier may be a bare string, `{ value }` or `{ expr: { value } }`),
 * so every accessor narrows from unknown.
 */

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Name of an identifier node, or null when the node is not one. */
export function identifierName(node: unknown): string | null {
  if (typeof node === 'string') return node;
  if (!isRecord(node)) return null;
  if (typeof node.value === 'string') return node.value;
  if ('expr' in node) return identifierName(node.expr);
  return null;
}

/** Name of a function or aggregate call node. */
export function functionName(node: Record<string, unknown>): string | null {
  const name = node.name;
  if (typeof name === 'string') return name;
  if (isRecord(name) && Array.isArray(name.name)) {
    const parts = name.name.map(identifierName).filter((p): p is string => p !== null);
    return parts.length > 0 ? parts.join('.') : null;
  }
  return identifierName(name);
}

/** Depth-first visit of every object node under root, root included. */
export function walkAst(root: unknown, visitor: (node: Record<string, unknown>) => void): void {
  if (Array.isArray(root)) {
    for (const item of root) walkAst(item, visitor);
    return;
  }
  if (!isRecord(root)) return;

  visitor(root);
  for (const value of Object.values(root)) {
    walkAst(value, visitor);
  }
}

/** Normalise a value that may be a single node or a list of nodes. */
export function asList(value: unknown): unknown[] {
  if (value === null || value === undefined) return [];
  return Array.isArray(value) ? value : [value];
}
