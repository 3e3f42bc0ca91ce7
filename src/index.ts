// Barrel
export { Lexer } from "./lexer.js";
export { Parser } from "./parser.js";
export { check, literalValue, SemanticError, I32_MAX } from "./semantic.js";
export { emitWat, emitInstructions } from "./codegen.js";
export { evaluate, ipow } from "./evaluate.js";
export { Machine, MachineError, decodeWat, runWat, defaultImports } from "./machine.js";
export type { Imports, Instr } from "./machine.js";
export { parseSource, compileSource, evaluateSource } from "./compile.js";
export * from "./tokens.js";
export * from "./ast.js";
