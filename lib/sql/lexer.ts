import type { Token, TokenType } from "./types";

const PUNCTUATION: Record<string, TokenType> = {
  "*": "STAR",
  ",": "COMMA",
  "(": "LPAREN",
  ")": "RPAREN",
  ";": "SEMICOLON",
};

export class Lexer {
  private input: string;
  private position: number = 0;
  private tokens: Token[] = [];

  constructor(input: string) {
    this.input = input.trim();
  }

  tokenize(): Token[] {
    while (this.position < this.input.length) {
      this.skipWhitespace();

      if (this.position >= this.input.length) break;

      const char = this.input[this.position];
      const punctuation = PUNCTUATION[char];

      if (punctuation) {
        this.push(punctuation, this.position, this.position + 1);
      } else if (this.isOperatorChar(char)) {
        this.tokenizeOperator();
      } else if (char === "'" || char === '"') {
        this.tokenizeString(char);
      } else if (this.isWordChar(char)) {
        this.tokenizeWord();
      } else {
        // Anything else is only ever part of a literal; keep it so the
        // parser can slice raw text around it
        this.push("SYMBOL", this.position, this.position + 1);
      }
    }

    this.tokens.push({
      type: "EOF",
      value: "",
      position: this.position,
      end: this.position,
    });
    return this.tokens;
  }

  private push(type: TokenType, start: number, end: number): void {
    this.tokens.push({
      type,
      value: this.input.slice(start, end),
      position: start,
      end,
    });
    this.position = end;
  }

  private skipWhitespace(): void {
    while (this.position < this.input.length && /\s/.test(this.input[this.position])) {
      this.position++;
    }
  }

  private isOperatorChar(char: string): boolean {
    return /[=!<>]/.test(char);
  }

  private isWordChar(char: string): boolean {
    return /[A-Za-z0-9_]/.test(char);
  }

  private tokenizeOperator(): void {
    let end = this.position;
    while (end < this.input.length && this.isOperatorChar(this.input[end])) {
      end++;
    }
    this.push("OPERATOR", this.position, end);
  }

  // String tokens keep their quotes: values are stored as written.
  // A quote inside a word (O'Brien) or without a partner is plain literal text.
  private tokenizeString(quote: string): void {
    const start = this.position;
    const close = this.input.indexOf(quote, start + 1);
    const inWord = start > 0 && this.isWordChar(this.input[start - 1]);

    if (close === -1 || inWord) {
      this.push("SYMBOL", start, start + 1);
      return;
    }

    this.push("STRING", start, close + 1);
  }

  private tokenizeWord(): void {
    let end = this.position;
    while (end < this.input.length && this.isWordChar(this.input[end])) {
      end++;
    }
    this.push("WORD", this.position, end);
  }
}
