import { type Tok, showTok } from "./tokens.js";

/* Closed node set; every pass narrows on `k`. */

export type IntegerLiteral = { readonly k: "IntegerLiteral"; readonly tok: Tok; readonly kids: readonly [] };
export type Add      = { readonly k: "Add";      readonly tok: Tok; readonly kids: readonly [Expr, Expr] };
export type Multiply = { readonly k: "Multiply"; readonly tok: Tok; readonly kids: readonly [Expr, Expr] };
export type Power    = { readonly k: "Power";    readonly tok: Tok; readonly kids: readonly [Expr, Expr] };

export type Binary = Add | Multiply | Power;
export type Expr = Binary | IntegerLiteral;

export type Program = { readonly k: "Program"; readonly tok: Tok; readonly kids: readonly [Expr] };

export type Node = Program | Expr;

/* -------- construction (bottom-up, frozen) -------- */

export function program(tok: Tok, body: Expr): Program {
  return Object.freeze({ k: "Program", tok, kids: Object.freeze([body] as const) });
}

export function binary(k: Binary["k"], tok: Tok, l: Expr, r: Expr): Binary {
  const kids = Object.freeze([l, r] as const);
  switch (k) {
    case "Add":      return Object.freeze({ k, tok, kids });
    case "Multiply": return Object.freeze({ k, tok, kids });
    case "Power":    return Object.freeze({ k, tok, kids });
  }
}

export function literal(tok: Tok): IntegerLiteral {
  if (!/^[0-9]+$/.test(tok.lex)) throw new TypeError(`IntegerLiteral needs a digit run, got ${showTok(tok)}`);
  return Object.freeze({ k: "IntegerLiteral", tok, kids: Object.freeze([] as const) });
}

/* -------- reading -------- */

export function child(n: Node, i: number): Node {
  const kids: readonly Node[] = n.kids;
  const c = kids[i];
  if (c === undefined) throw new RangeError(`${n.k} has no child ${i} (arity ${kids.length})`);
  return c;
}

/** Pre-order, one line per node, children two spaces deeper. */
export function dumpTree(root: Node): string {
  let out = "";
  const todo: [Node, string][] = [[root, ""]];
  for (let f = todo.pop(); f !== undefined; f = todo.pop()) {
    const [n, indent] = f;
    out += `${indent}${n.k} ${showTok(n.tok)}\n`;
    const kids: readonly Node[] = n.kids;
    for (let i = kids.length - 1; i >= 0; i--) todo.push([kids[i], indent + "  "]);
  }
  return out;
}
