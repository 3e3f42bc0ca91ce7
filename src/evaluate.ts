import type { Binary, Node } from "./ast.js";
import { literalValue } from "./semantic.js";

/** Integer power with i32 wrap-around, the same `pow` the generated module imports. */
export function ipow(base: number, exp: number): number {
  base |= 0; exp |= 0;
  if (exp < 0) {
    if (base === 1) return 1;
    if (base === -1) return exp & 1 ? -1 : 1;
    return 0;
  }
  let acc = 1;
  while (exp > 0) {
    if (exp & 1) acc = Math.imul(acc, base);
    base = Math.imul(base, base);
    exp >>>= 1;
  }
  return acc;
}

function combine(k: Binary["k"], a: number, b: number): number {
  switch (k) {
    case "Add":      return (a + b) | 0;
    case "Multiply": return Math.imul(a, b);
    case "Power":    return ipow(a, b);
  }
}

/** Direct evaluation of the tree with i32 semantics, post-order over an explicit stack. */
export function evaluate(root: Node): number {
  const vals: number[] = [];
  const take = () => {
    const v = vals.pop();
    if (v === undefined) throw new Error("[EVAL] value stack underflow");
    return v;
  };
  const todo: { n: Node; done: boolean }[] = [{ n: root, done: false }];
  for (let f = todo.pop(); f !== undefined; f = todo.pop()) {
    const { n, done } = f;
    if (n.k === "Program") { todo.push({ n: n.kids[0], done: false }); continue; }
    if (n.k === "IntegerLiteral") { vals.push(literalValue(n)); continue; }
    if (!done) {
      todo.push({ n, done: true }, { n: n.kids[1], done: false }, { n: n.kids[0], done: false });
      continue;
    }
    const b = take(), a = take();
    vals.push(combine(n.k, a, b));
  }
  return take();
}
