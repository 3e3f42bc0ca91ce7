import { FOOTER, HEADER } from "./codegen.js";
import { ipow } from "./evaluate.js";

export class MachineError extends Error {
  constructor(message: string) {
    super(`[RUN] ${message}`);
    this.name = "MachineError";
  }
}

/* Host functions the module may import, keyed "module.name" */
export type Imports = Record<string, (...args: number[]) => number>;

export const defaultImports: Imports = { "math.pow": ipow };

export type Instr =
  | { op: "const"; v: number }
  | { op: "add" }
  | { op: "mul" }
  | { op: "call"; fn: string };

/* ---------------- Machine: one i32 value stack ---------------- */
export class Machine {
  private stack: number[] = [];

  constructor(private imports: Imports = defaultImports) {}

  run(code: Instr[]): number {
    this.stack = [];
    for (const ins of code) this.exec(ins);
    if (this.stack.length !== 1) throw new MachineError(`expected 1 result on the stack, found ${this.stack.length}`);
    return this.pop();
  }

  private exec(ins: Instr): void {
    switch (ins.op) {
      case "const": this.stack.push(ins.v | 0); return;
      case "add": { const b = this.pop(), a = this.pop(); this.stack.push((a + b) | 0); return; }
      case "mul": { const b = this.pop(), a = this.pop(); this.stack.push(Math.imul(a, b)); return; }
      case "call": {
        // $pow is the only function the module header declares
        if (ins.fn !== "$pow") throw new MachineError(`unknown function '${ins.fn}'`);
        const f = this.imports["math.pow"];
        if (!f) throw new MachineError("missing import math.pow");
        const b = this.pop(), a = this.pop();
        this.stack.push(f(a, b) | 0);
        return;
      }
    }
  }

  private pop(): number {
    const v = this.stack.pop();
    if (v === undefined) throw new MachineError("stack underflow");
    return v;
  }
}

/** Splits an emitted module into its instruction list, checking the framing. */
export function decodeWat(text: string): Instr[] {
  if (!text.startsWith(HEADER)) throw new MachineError("module header does not match");
  if (!text.endsWith(FOOTER)) throw new MachineError("module footer does not match");
  const body = text.slice(HEADER.length, text.length - FOOTER.length);
  if (body === "") return [];
  return body.replace(/\n$/, "").split("\n").map((line, idx) => decodeLine(line, idx + 1));
}

function decodeLine(line: string, n: number): Instr {
  const src = line.trim();
  if (src === "i32.add") return { op: "add" };
  if (src === "i32.mul") return { op: "mul" };
  let m = /^i32\.const (\d+)$/.exec(src);
  if (m) return { op: "const", v: Number(m[1]) };
  m = /^call (\$\w+)$/.exec(src);
  if (m) return { op: "call", fn: m[1] };
  throw new MachineError(`unknown instruction '${src}' on body line ${n}`);
}

export function runWat(text: string, imports: Imports = defaultImports): number {
  return new Machine(imports).run(decodeWat(text));
}
