import { T, type Tok, isDigit, isSpace } from "./tokens.js";

const single = new Map<string, T>([
  ["+", T.Plus],
  ["*", T.Times],
  ["^", T.Pow],
  ["(", T.LParen],
  [")", T.RParen],
]);

/**
 * Single left-to-right pass. Never throws: a character it cannot place
 * becomes an Unrecognized token and the parser decides what to do with it.
 */
export class Lexer {
  private i = 0;
  constructor(private src: string) {}

  lex(): Tok[] {
    this.i = 0;
    const out: Tok[] = [];
    while (!this.eof()) {
      const col = this.i + 1;
      const c = this.advance();

      if (isDigit(c)) { out.push(this.number(c, col)); continue; }
      const t = single.get(c);
      if (t !== undefined) { out.push(tok(t, c, col)); continue; }
      if (isSpace(c)) continue;
      out.push(tok(T.Unrecognized, c, col));
    }
    out.push(tok(T.EOF, "", this.i + 1));
    return out;
  }

  private eof() { return this.i >= this.src.length; }
  private peek() { return this.src[this.i] ?? "\0"; }

  // whole code point, so an astral character is one Unrecognized token
  private advance() {
    const cp = this.src.codePointAt(this.i) ?? 0;
    const ch = String.fromCodePoint(cp);
    this.i += ch.length;
    return ch;
  }

  private number(first: string, col: number): Tok {
    let s = first;
    while (isDigit(this.peek())) s += this.advance();
    return tok(T.Int, s, col);
  }
}

const tok = (t: T, lex: string, col: number): Tok => Object.freeze({ t, lex, col });
