import { T, type Tok, tokenName, showTok } from "./tokens.js";
import { type Expr, type Program, binary, literal, program } from "./ast.js";

/*
 * LL(1) recursive descent, one method per rule:
 *
 *   Program ::= Expr END
 *   Expr    ::= Term ('+' Term)*
 *   Term    ::= Power ('*' Power)*
 *   Power   ::= Factor ('^' Power)?
 *   Factor  ::= INT | '(' Expr ')'
 */
export class Parser {
  private i = 0;
  constructor(private toks: readonly Tok[]) {
    const last = toks[toks.length - 1];
    if (last === undefined || last.t !== T.EOF) throw new TypeError("Token sequence must end with EOF");
  }

  parse(): Program {
    const body = this.expr();
    const end = this.expect(T.EOF);
    return program(end, body);
  }

  /* -------- rules -------- */

  // left fold: 1+2+3 → (1+2)+3
  private expr(): Expr {
    let e = this.term();
    while (this.current() === T.Plus) {
      const op = this.expect(T.Plus);
      e = binary("Add", op, e, this.term());
    }
    return e;
  }

  private term(): Expr {
    let e = this.power();
    while (this.current() === T.Times) {
      const op = this.expect(T.Times);
      e = binary("Multiply", op, e, this.power());
    }
    return e;
  }

  // right-recursive: 2^3^2 → 2^(3^2)
  private power(): Expr {
    const base = this.factor();
    if (this.current() !== T.Pow) return base;
    const op = this.expect(T.Pow);
    return binary("Power", op, base, this.power());
  }

  private factor(): Expr {
    switch (this.current()) {
      case T.Int:
        return literal(this.expect(T.Int));
      case T.LParen: {
        this.expect(T.LParen);
        const e = this.expr();
        this.expect(T.RParen);
        return e;
      }
      default:
        throw this.err("an integer or '('");
    }
  }

  /* -------- cursor -------- */

  current(): T { return this.peek().t; }

  expect(t: T): Tok {
    if (this.current() === t) return this.advance();
    throw this.err(tokenName(t));
  }

  private peek(): Tok {
    // the cursor parks on EOF
    return this.toks[Math.min(this.i, this.toks.length - 1)];
  }

  private advance(): Tok {
    const tok = this.peek();
    if (tok.t !== T.EOF) this.i++;
    return tok;
  }

  private err(what: string) {
    const p = this.peek();
    return new SyntaxError(`[PARSE] expected ${what}, found ${showTok(p)} at column ${p.col}`);
  }
}
