import { describe, expect, it } from "vitest";
import { Lexer } from "../src/lexer.js";
import { T, showTok } from "../src/tokens.js";

const kinds = (src: string) => new Lexer(src).lex().map(t => t.t);

describe("lexer", () => {
  it("scans integers, operators and parentheses", () => {
    const toks = new Lexer("12 + 3").lex();
    expect(toks).toEqual([
      { t: T.Int, lex: "12", col: 1 },
      { t: T.Plus, lex: "+", col: 4 },
      { t: T.Int, lex: "3", col: 6 },
      { t: T.EOF, lex: "", col: 7 },
    ]);
  });

  it("covers every operator", () => {
    expect(kinds("(1*2)^3")).toEqual([T.LParen, T.Int, T.Times, T.Int, T.RParen, T.Pow, T.Int, T.EOF]);
  });

  it("ends empty input with a single EOF", () => {
    expect(new Lexer("").lex()).toEqual([{ t: T.EOF, lex: "", col: 1 }]);
  });

  it("skips every kind of whitespace", () => {
    expect(kinds(" 1\n+\t2\r ")).toEqual([T.Int, T.Plus, T.Int, T.EOF]);
  });

  it("takes a maximal digit run without range checks", () => {
    const toks = new Lexer("99999999999999999999").lex();
    expect(toks).toHaveLength(2);
    expect(toks[0].lex).toBe("99999999999999999999");
  });

  it("turns unknown characters into tokens instead of throwing", () => {
    expect(new Lexer("@").lex()).toEqual([
      { t: T.Unrecognized, lex: "@", col: 1 },
      { t: T.EOF, lex: "", col: 2 },
    ]);
    expect(kinds("a1-")).toEqual([T.Unrecognized, T.Int, T.Unrecognized, T.EOF]);
  });

  it("keeps a surrogate pair together", () => {
    const toks = new Lexer("😀").lex();
    expect(toks.map(t => t.lex)).toEqual(["😀", ""]);
    expect(toks[1].col).toBe(3);
  });

  it("gives the same tokens on every call", () => {
    const lexer = new Lexer("1+2");
    expect(lexer.lex()).toEqual(lexer.lex());
  });

  it("renders tokens for diagnostics", () => {
    const [int, end] = new Lexer("7 ").lex();
    expect(showTok(int)).toBe('[INT, "7"]');
    expect(showTok(end)).toBe('[END, ""]');
  });
});
