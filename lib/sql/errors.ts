/**
 * Errors raised while parsing or executing a statement.
 * All of them extend SQLError so callers can catch the whole family at once.
 */

export class SQLError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SQLError";
  }
}

export class ParseError extends SQLError {
  constructor(message: string) {
    super(message);
    this.name = "ParseError";
  }
}

export class PredicateError extends SQLError {
  constructor(message: string) {
    super(message);
    this.name = "PredicateError";
  }
}

export class UnsupportedOperatorError extends PredicateError {
  readonly operator: string;

  constructor(operator: string) {
    super(`Unsupported operator in WHERE condition: ${operator}`);
    this.name = "UnsupportedOperatorError";
    this.operator = operator;
  }
}

export class TableExistsError extends SQLError {
  readonly table: string;

  constructor(table: string) {
    super(`Table '${table}' already exists`);
    this.name = "TableExistsError";
    this.table = table;
  }
}

export class TableNotFoundError extends SQLError {
  readonly table: string;

  constructor(table: string) {
    super(`Table '${table}' does not exist`);
    this.name = "TableNotFoundError";
    this.table = table;
  }
}

export class ColumnValueMismatchError extends SQLError {
  readonly columns: number;
  readonly values: number;

  constructor(columns: number, values: number) {
    super(`Column count ${columns} does not match value count ${values}`);
    this.name = "ColumnValueMismatchError";
    this.columns = columns;
    this.values = values;
  }
}

export class RowKeyError extends SQLError {
  readonly column: string;

  constructor(column: string) {
    super(`Column '${column}' not found in row`);
    this.name = "RowKeyError";
    this.column = column;
  }
}

export type EngineError =
  | ParseError
  | PredicateError
  | TableNotFoundError
  | ColumnValueMismatchError
  | RowKeyError;
