import { Lexer } from "./lexer.js";
import { Parser } from "./parser.js";
import { check } from "./semantic.js";
import { emitWat } from "./codegen.js";
import { evaluate } from "./evaluate.js";
import type { Program } from "./ast.js";

/** text → AST. Throws SyntaxError. */
export function parseSource(source: string): Program {
  const toks = new Lexer(source).lex();
  return new Parser(toks).parse();
}

/**
 * text → WAT module text. Scan, parse, check, emit; each stage runs to
 * completion before the next, and the first error aborts the whole attempt.
 */
export function compileSource(source: string): string {
  const ast = parseSource(source);
  check(ast);
  return emitWat(ast);
}

export function evaluateSource(source: string): number {
  const ast = parseSource(source);
  check(ast);
  return evaluate(ast);
}
