#!/usr/bin/env node
import * as fs from "fs";
import * as readline from "readline";
import { pathToFileURL } from "url";
import { parseSource } from "./compile.js";
import { dumpTree } from "./ast.js";
import { check, SemanticError } from "./semantic.js";
import { emitWat } from "./codegen.js";
import { evaluate } from "./evaluate.js";
import { runWat } from "./machine.js";

export type CliIO = {
  out(line: string): void;
  err(line: string): void;
  readLine(prompt: string): Promise<string>;
  writeFile(path: string, text: string): void;
};

const USAGE = `usage: exprwat [--out <file>] [--stdout] [--ast] [--eval] [--run] [expression...]

Compiles an expression over integers, + * ^ and parentheses into a
WebAssembly text module. Without an expression, reads one line from stdin.

  --out <file>  where to write the module (default output.wat)
  --stdout      print the module instead of writing it
  --ast         print the syntax tree
  --eval        print the value computed directly from the tree
  --run         run the generated module and print its result`;

/* --- console-backed IO --- */
const consoleIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line),
  readLine: async prompt => {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    try {
      return await new Promise<string>(resolve => {
        rl.once("close", () => resolve("")); // stdin ended before a line
        rl.question(prompt, resolve);
      });
    } finally {
      rl.close();
    }
  },
  writeFile: (path, text) => fs.writeFileSync(path, text, "utf8"),
};

/* --- argv --- */
const FLAGS = new Set(["--stdout", "--ast", "--eval", "--run", "--help"]);

function parseArgs(args: string[]) {
  const flags = new Set<string>();
  const words: string[] = [];
  let out = "output.wat";
  for (let i = 0; i < args.length; i++) {
    const a = args[i];
    if (a === "--out") {
      const v = args[++i];
      if (v === undefined) throw new TypeError("--out needs a file name");
      out = v;
    } else if (a.startsWith("--")) {
      if (!FLAGS.has(a)) throw new TypeError(`unknown option ${a}`);
      flags.add(a);
    }
    else words.push(a);
  }
  return { flags, words, out };
}

export async function main(args: string[], io: CliIO = consoleIO): Promise<number> {
  let opts: ReturnType<typeof parseArgs>;
  try { opts = parseArgs(args); }
  catch (e) { io.err(e instanceof Error ? e.message : String(e)); io.err(USAGE); return 2; }

  const { flags, words, out } = opts;
  if (flags.has("--help")) { io.out(USAGE); return 0; }

  try {
    const line = words.length > 0 ? words.join(" ") : await io.readLine("> ");
    const ast = parseSource(line);
    if (flags.has("--ast")) io.out(dumpTree(ast).trimEnd());
    check(ast);
    const wat = emitWat(ast);
    if (flags.has("--eval")) io.out(String(evaluate(ast)));
    if (flags.has("--run")) io.out(String(runWat(wat)));
    if (flags.has("--stdout")) io.out(wat.trimEnd());
    else io.writeFile(out, wat);
    return 0;
  } catch (e) {
    if (e instanceof SemanticError) { io.out("Bad semantics!"); io.err(e.message); return 1; }
    if (e instanceof SyntaxError) { io.out("Bad syntax!"); io.err(e.message); return 1; }
    io.out("Compilation failed!");
    io.err(e instanceof Error ? e.message : String(e));
    return 1;
  }
}

/* --- start --- */
const entry = process.argv[1];
if (entry !== undefined && import.meta.url === pathToFileURL(entry).href) {
  process.exitCode = await main(process.argv.slice(2));
}
