import { ParseError } from "./errors";
import { Lexer } from "./lexer";
import { compilePredicate } from "./predicate";
import type {
  Token,
  TokenType,
  Statement,
  SelectStatement,
  InsertStatement,
  UpdateStatement,
  DeleteStatement,
  Predicate,
} from "./types";

const NO_MATCH = "Query did not match any known SQL operation";

/**
 * Parse one statement. Surrounding whitespace is ignored.
 */
export function parse(sql: string): Statement {
  const source = sql.trim();
  const tokens = new Lexer(source).tokenize();
  return new Parser(tokens, source).parse();
}

export class Parser {
  private tokens: Token[];
  private source: string;
  private current: number = 0;

  constructor(tokens: Token[], source: string) {
    this.tokens = tokens;
    this.source = source;
  }

  parse(): Statement {
    const firstToken = this.tokens[0];
    if (firstToken.type !== "WORD") {
      throw new ParseError(NO_MATCH);
    }

    switch (firstToken.value.toUpperCase()) {
      case "SELECT":
        return this.parseSelect();
      case "INSERT":
        return this.parseInsert();
      case "UPDATE":
        return this.parseUpdate();
      case "DELETE":
        return this.parseDelete();
      default:
        throw new ParseError(NO_MATCH);
    }
  }

  private parseSelect(): SelectStatement {
    this.consumeKeyword("SELECT");

    const columns = this.parseColumns();

    this.consumeKeyword("FROM");
    const table = this.consume("WORD").value;

    let where: Predicate | undefined;
    if (this.checkKeyword("WHERE")) {
      this.advance();
      where = this.parseWhere(this.whereEnd());
    }

    let orderBy: string | undefined;
    if (this.checkKeyword("ORDER")) {
      this.advance();
      this.consumeKeyword("BY");
      orderBy = this.consume("WORD").value;
    }

    this.finish();

    return { type: "SELECT", columns, table, where, orderBy };
  }

  private parseColumns(): string[] {
    if (this.match("STAR")) {
      return ["*"];
    }
    return this.parseIdentifierList();
  }

  private parseInsert(): InsertStatement {
    this.consumeKeyword("INSERT");
    this.consumeKeyword("INTO");
    const table = this.consume("WORD").value;

    this.consume("LPAREN");
    const columns = this.parseIdentifierList();
    this.consume("RPAREN");

    this.consumeKeyword("VALUES");
    const open = this.consume("LPAREN");

    // The value list runs to the statement's last ")"
    const close = this.statementEnd() - 1;
    if (close < this.current || this.tokens[close].type !== "RPAREN") {
      throw new ParseError(
        `Expected ')' to close VALUES opened at position ${open.position}`,
      );
    }

    const values = this.splitOnCommas(this.current, close).map((range) => {
      if (range.start === range.end) {
        throw new ParseError(`Empty value in VALUES list of '${table}'`);
      }
      return this.rawText(range.start, range.end);
    });

    this.current = close + 1;
    this.finish();

    return { type: "INSERT", table, columns, values };
  }

  private parseUpdate(): UpdateStatement {
    this.consumeKeyword("UPDATE");
    const table = this.consume("WORD").value;
    this.consumeKeyword("SET");

    const end = this.statementEnd();
    const whereIndex = this.findKeyword("WHERE", this.current, end);
    const assignmentsEnd = whereIndex ?? end;

    if (assignmentsEnd === this.current) {
      throw new ParseError(`Expected assignments after SET for '${table}'`);
    }

    const assignments = new Map<string, string>();
    for (const range of this.splitOnCommas(this.current, assignmentsEnd)) {
      if (range.start === range.end) {
        throw new ParseError(`Empty assignment in UPDATE of '${table}'`);
      }
      const [column, value] = this.parseAssignment(this.rawText(range.start, range.end));
      assignments.set(column, value);
    }
    this.current = assignmentsEnd;

    let where: Predicate | undefined;
    if (whereIndex !== undefined) {
      this.advance();
      where = this.parseWhere(end);
    }

    this.finish();

    return { type: "UPDATE", table, assignments, where };
  }

  // One split on "=": a value that itself contains "=" is not supported
  private parseAssignment(text: string): [string, string] {
    const parts = text.split("=");
    if (parts.length !== 2) {
      throw new ParseError(`Assignment must contain exactly one '=': ${text}`);
    }

    const column = parts[0].trim();
    const value = parts[1].trim();
    if (!/^[A-Za-z0-9_]+$/.test(column)) {
      throw new ParseError(`Invalid column name in assignment: ${text}`);
    }
    if (value === "") {
      throw new ParseError(`Missing value in assignment: ${text}`);
    }
    return [column, value];
  }

  private parseDelete(): DeleteStatement {
    this.consumeKeyword("DELETE");
    this.consumeKeyword("FROM");
    const table = this.consume("WORD").value;

    let where: Predicate | undefined;
    if (this.checkKeyword("WHERE")) {
      this.advance();
      where = this.parseWhere(this.statementEnd());
    }

    this.finish();

    return { type: "DELETE", table, where };
  }

  /**
   * Compile the WHERE clause spanning tokens [current, end)
   */
  private parseWhere(end: number): Predicate {
    if (end <= this.current) {
      throw new ParseError(
        `Expected condition after WHERE at position ${this.peek().position}`,
      );
    }
    const text = this.rawText(this.current, end);
    this.current = end;
    return compilePredicate(text);
  }

  /**
   * End of a SELECT's WHERE clause: before a trailing `ORDER BY <column>`
   * if there is one, otherwise before the trailing semicolon
   */
  private whereEnd(): number {
    const end = this.statementEnd();
    const order = end - 3;
    if (
      order > this.current &&
      this.isKeyword(this.tokens[order], "ORDER") &&
      this.isKeyword(this.tokens[order + 1], "BY") &&
      this.tokens[order + 2].type === "WORD"
    ) {
      return order;
    }
    return end;
  }

  /**
   * Index of the EOF token, or of a single semicolon right before it
   */
  private statementEnd(): number {
    const eof = this.tokens.length - 1;
    if (eof > this.current && this.tokens[eof - 1].type === "SEMICOLON") {
      return eof - 1;
    }
    return eof;
  }

  private parseIdentifierList(): string[] {
    const identifiers: string[] = [];
    do {
      identifiers.push(this.consume("WORD").value);
    } while (this.match("COMMA"));
    return identifiers;
  }

  private splitOnCommas(start: number, end: number): Array<{ start: number; end: number }> {
    const ranges: Array<{ start: number; end: number }> = [];
    let segmentStart = start;
    for (let i = start; i < end; i++) {
      if (this.tokens[i].type === "COMMA") {
        ranges.push({ start: segmentStart, end: i });
        segmentStart = i + 1;
      }
    }
    ranges.push({ start: segmentStart, end });
    return ranges;
  }

  private findKeyword(keyword: string, start: number, end: number): number | undefined {
    for (let i = start; i < end; i++) {
      if (this.isKeyword(this.tokens[i], keyword)) return i;
    }
    return undefined;
  }

  /**
   * Source text covered by tokens [start, end), as written
   */
  private rawText(start: number, end: number): string {
    return this.source
      .slice(this.tokens[start].position, this.tokens[end - 1].end)
      .trim();
  }

  private finish(): void {
    this.match("SEMICOLON");
    if (!this.isAtEnd()) {
      const token = this.peek();
      throw new ParseError(`Unexpected '${token.value}' at position ${token.position}`);
    }
  }

  private isKeyword(token: Token, keyword: string): boolean {
    return token.type === "WORD" && token.value.toUpperCase() === keyword;
  }

  private checkKeyword(keyword: string): boolean {
    return this.isKeyword(this.peek(), keyword);
  }

  private consumeKeyword(keyword: string): Token {
    if (this.checkKeyword(keyword)) return this.advance();

    const token = this.peek();
    throw new ParseError(
      `Expected ${keyword} but got ${token.type} '${token.value}' at position ${token.position}`,
    );
  }

  private check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  private match(type: TokenType): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  private consume(type: TokenType): Token {
    if (this.check(type)) return this.advance();

    const token = this.peek();
    throw new ParseError(
      `Expected ${type} but got ${token.type} '${token.value}' at position ${token.position}`,
    );
  }

  private advance(): Token {
    if (!this.isAtEnd()) this.current++;
    return this.previous();
  }

  private isAtEnd(): boolean {
    return this.peek().type === "EOF";
  }

  private peek(): Token {
    return this.tokens[this.current];
  }

  private previous(): Token {
    return this.tokens[this.current - 1];
  }
}
