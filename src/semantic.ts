import type { IntegerLiteral, Node } from "./ast.js";

export const I32_MAX = 2147483647;

export class SemanticError extends Error {
  constructor(message: string, readonly node: IntegerLiteral) {
    super(message);
    this.name = "SemanticError";
  }
}

/** Value of a literal that has passed `check`; throws SemanticError otherwise. */
export function literalValue(n: IntegerLiteral): number {
  const digits = n.tok.lex.replace(/^0+(?=\d)/, "");
  // compare as text so a very long run never goes through a lossy double
  const fits = digits.length < 10 || (digits.length === 10 && digits <= String(I32_MAX));
  if (!fits) {
    throw new SemanticError(`[SEMANTIC] integer literal '${n.tok.lex}' out of range at column ${n.tok.col}`, n);
  }
  return Number(digits);
}

/**
 * Pre-order, leftmost-first: the first literal that does not fit in an i32
 * aborts the walk. Produces nothing on success.
 */
export function check(root: Node): void {
  const todo: Node[] = [root];
  for (let n = todo.pop(); n !== undefined; n = todo.pop()) {
    if (n.k === "IntegerLiteral") { literalValue(n); continue; }
    // right child first, so the left one comes off the stack first
    for (let i = n.kids.length - 1; i >= 0; i--) todo.push(n.kids[i]);
  }
}
