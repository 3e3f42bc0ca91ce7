import type { Binary, Expr, Program } from "./ast.js";

export const HEADER =
  "(module\n" +
  '  (import "math" "pow" (func $pow (param i32 i32) (result i32)))\n' +
  "  (func\n" +
  '    (export "start")\n' +
  "    (result i32)\n";

export const FOOTER =
  "  )\n" +
  ")\n";

const INDENT = "    ";

const OPCODE: Record<Binary["k"], string> = {
  Add: "i32.add",
  Multiply: "i32.mul",
  Power: "call $pow",
};

/**
 * Post-order: operands first, then the combining instruction. `^` is always
 * a call to the imported pow, even between two literals.
 */
export function emitInstructions(e: Expr): string[] {
  const out: string[] = [];
  // a binary node is visited twice: first to queue its operands, then (done) for its opcode
  const todo: { n: Expr; done: boolean }[] = [{ n: e, done: false }];
  for (let f = todo.pop(); f !== undefined; f = todo.pop()) {
    const { n, done } = f;
    if (n.k === "IntegerLiteral") { out.push(`i32.const ${n.tok.lex}`); continue; }
    if (done) { out.push(OPCODE[n.k]); continue; }
    todo.push({ n, done: true }, { n: n.kids[1], done: false }, { n: n.kids[0], done: false });
  }
  return out;
}

/** Expects a tree that already passed `check`. */
export function emitWat(p: Program): string {
  const body = emitInstructions(p.kids[0]).map(ins => INDENT + ins + "\n").join("");
  return HEADER + body + FOOTER;
}
