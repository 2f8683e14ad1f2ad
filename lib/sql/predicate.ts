import { PredicateError, RowKeyError, UnsupportedOperatorError } from "./errors";
import type { Operator, Predicate, Row } from "./types";

// Two-character operators come first so "<=" is never read as "<"
export const OPERATORS: readonly Operator[] = ["!=", "<=", ">=", "=", "<", ">"];

function isOperator(token: string): token is Operator {
  return (OPERATORS as readonly string[]).includes(token);
}

/**
 * Compile a WHERE clause of the form `<column> <operator> <literal>`.
 *
 * The operator token is the longest run of `= ! < >` after the column, so
 * `a <> 1` and `a == 1` fail with UnsupportedOperatorError instead of being
 * read as `<` or `=` followed by a stray character.
 */
export function compilePredicate(clause: string): Predicate {
  const text = clause.trim();
  let position = 0;

  while (position < text.length && /[A-Za-z0-9_]/.test(text[position])) {
    position++;
  }
  if (position === 0) {
    throw new PredicateError(`Unsupported WHERE condition: ${text}`);
  }
  const column = text.slice(0, position);

  while (position < text.length && /\s/.test(text[position])) {
    position++;
  }

  const operatorStart = position;
  while (position < text.length && /[=!<>]/.test(text[position])) {
    position++;
  }
  const token = text.slice(operatorStart, position);
  if (token === "") {
    throw new PredicateError(`Unsupported WHERE condition: ${text}`);
  }
  if (!isOperator(token)) {
    throw new UnsupportedOperatorError(token);
  }

  const literal = text.slice(position).trim();
  if (literal === "") {
    throw new PredicateError(`Missing value in WHERE condition: ${text}`);
  }

  return { column, operator: token, literal, text };
}

/**
 * Read a column from a row, failing when the row has no such key
 */
export function columnValue(row: Row, column: string): string {
  if (!Object.prototype.hasOwnProperty.call(row, column)) {
    throw new RowKeyError(column);
  }
  return row[column];
}

/**
 * Test a row against a predicate. Values are compared as text:
 * "9" < "10" is false.
 */
export function evaluatePredicate(predicate: Predicate, row: Row): boolean {
  const value = columnValue(row, predicate.column);
  const literal = predicate.literal;

  switch (predicate.operator) {
    case "=":
      return value === literal;
    case "!=":
      return value !== literal;
    case "<":
      return value < literal;
    case "<=":
      return value <= literal;
    case ">":
      return value > literal;
    case ">=":
      return value >= literal;
    default: {
      const unreachable: never = predicate.operator;
      throw new UnsupportedOperatorError(String(unreachable));
    }
  }
}
