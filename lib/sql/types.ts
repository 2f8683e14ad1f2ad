// SQL statement types

export type Operator = "=" | "!=" | "<" | "<=" | ">" | ">=";

/**
 * A single WHERE comparison. `literal` is kept exactly as written,
 * including any quote characters.
 */
export type Predicate = {
  column: string;
  operator: Operator;
  literal: string;
  text: string; // Clause as written after WHERE
};

export type Row = Record<string, string>;

export type SelectStatement = {
  type: "SELECT";
  columns: string[]; // ["*"] selects every column
  table: string;
  where?: Predicate;
  orderBy?: string;
};

export type InsertStatement = {
  type: "INSERT";
  table: string;
  columns: string[];
  values: string[];
};

export type UpdateStatement = {
  type: "UPDATE";
  table: string;
  assignments: Map<string, string>;
  where?: Predicate;
};

export type DeleteStatement = {
  type: "DELETE";
  table: string;
  where?: Predicate;
};

export type Statement =
  | SelectStatement
  | InsertStatement
  | UpdateStatement
  | DeleteStatement;

export type TokenType =
  | "WORD"
  | "STRING"
  | "STAR"
  | "COMMA"
  | "LPAREN"
  | "RPAREN"
  | "SEMICOLON"
  | "OPERATOR"
  | "SYMBOL"
  | "EOF";

export type Token = {
  type: TokenType;
  value: string;
  position: number;
  end: number;
};
