import type { Span } from "./error.js";

export interface Token {
  text: string;
  span: Span;
}

/** Split a cron expression into whitespace-separated field tokens. */
export function tokenize(input: string): Token[] {
  const lexer = new Lexer(input);
  return lexer.tokenize();
}

class Lexer {
  private input: string;
  private pos: number;

  constructor(input: string) {
    this.input = input;
    this.pos = 0;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    while (true) {
      this.skipWhitespace();
      if (this.pos >= this.input.length) break;

      const start = this.pos;
      while (
        this.pos < this.input.length &&
        !isWhitespace(this.input[this.pos])
      ) {
        this.pos++;
      }
      tokens.push({
        text: this.input.slice(start, this.pos),
        span: { start, end: this.pos },
      });
    }
    return tokens;
  }

  private skipWhitespace(): void {
    while (this.pos < this.input.length && isWhitespace(this.input[this.pos])) {
      this.pos++;
    }
  }
}

function isWhitespace(ch: string): boolean {
  return /\s/.test(ch);
}
