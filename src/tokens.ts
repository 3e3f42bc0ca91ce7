/* Tokens + character-class helpers */

export enum T {
  // Atoms
  Int,

  // Operators
  Plus, Times, Pow,

  // Punctuation
  LParen, RParen,

  // Anything the lexer does not know; the parser rejects it
  Unrecognized,

  // Terminator
  EOF,
}

export type Tok = { readonly t: T; readonly lex: string; readonly col: number };

const names: Record<T, string> = {
  [T.Int]: "INT",
  [T.Plus]: "PLUS",
  [T.Times]: "TIMES",
  [T.Pow]: "POW",
  [T.LParen]: "OPEN_PAREN",
  [T.RParen]: "CLOSE_PAREN",
  [T.Unrecognized]: "UNRECOGNIZED",
  [T.EOF]: "END",
};

export const tokenName = (t: T) => names[t];
export const showTok = (tok: Tok) => `[${tokenName(tok.t)}, ${JSON.stringify(tok.lex)}]`;

export const isDigit = (ch: string) => ch >= "0" && ch <= "9";
export const isSpace = (ch: string) => /^\s$/u.test(ch);
