import { describe, expect, it } from "vitest";
import { binary, child, dumpTree, literal, program } from "../src/ast.js";
import { T, type Tok } from "../src/tokens.js";

const tok = (t: T, lex: string, col = 1): Tok => ({ t, lex, col });

describe("ast", () => {
  const one = literal(tok(T.Int, "1", 1));
  const two = literal(tok(T.Int, "2", 3));
  const sum = binary("Add", tok(T.Plus, "+", 2), one, two);
  const root = program(tok(T.EOF, "", 4), sum);

  it("keeps children in order", () => {
    expect(child(root, 0)).toBe(sum);
    expect(child(sum, 0)).toBe(one);
    expect(child(sum, 1)).toBe(two);
    expect(one.kids).toEqual([]);
  });

  it("refuses positions outside the arity", () => {
    expect(() => child(root, 1)).toThrow("Program has no child 1 (arity 1)");
    expect(() => child(one, 0)).toThrow(RangeError);
  });

  it("freezes nodes once built", () => {
    expect(Object.isFrozen(root)).toBe(true);
    expect(Object.isFrozen(sum.kids)).toBe(true);
  });

  it("only accepts digit runs as literals", () => {
    expect(() => literal(tok(T.Int, ""))).toThrow(TypeError);
    expect(() => literal(tok(T.Unrecognized, "x"))).toThrow('IntegerLiteral needs a digit run, got [UNRECOGNIZED, "x"]');
  });

  it("dumps the tree pre-order with indentation", () => {
    const pow = binary("Power", tok(T.Pow, "^"), one, two);
    const prod = binary("Multiply", tok(T.Times, "*"), pow, two);
    expect(dumpTree(prod)).toBe(
      'Multiply [TIMES, "*"]\n' +
      '  Power [POW, "^"]\n' +
      '    IntegerLiteral [INT, "1"]\n' +
      '    IntegerLiteral [INT, "2"]\n' +
      '  IntegerLiteral [INT, "2"]\n',
    );
  });
});
