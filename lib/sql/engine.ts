/**
 * SQL execution engine - runs parsed statements against a DatabaseContext
 */

import type { DatabaseContext } from "./database";
import { ColumnValueMismatchError, TableNotFoundError } from "./errors";
import { DEFAULT_OPTIONS, type EngineOptions } from "./options";
import { parse } from "./parser";
import { columnValue, evaluatePredicate } from "./predicate";
import type {
  Statement,
  SelectStatement,
  InsertStatement,
  UpdateStatement,
  DeleteStatement,
  Row,
} from "./types";

/**
 * Parse and execute a statement against a database context
 *
 * @param ctx - Table store the statement reads and mutates
 * @param sql - Statement text
 * @param options - Execution options (defaults to DEFAULT_OPTIONS)
 * @returns Result rows for SELECT, undefined for everything else
 *
 * @example
 * executeSQL(ctx, "SELECT name FROM users WHERE age > 30 ORDER BY name");
 */
export function executeSQL(
  ctx: DatabaseContext,
  sql: string,
  options: EngineOptions = DEFAULT_OPTIONS,
): Row[] | undefined {
  const statement = parse(sql);
  return executeStatement(ctx, statement, options);
}

/**
 * Execute a parsed statement
 */
export function executeStatement(
  ctx: DatabaseContext,
  statement: Statement,
  options: EngineOptions = DEFAULT_OPTIONS,
): Row[] | undefined {
  switch (statement.type) {
    case "SELECT":
      return executeSelect(ctx, statement, options);
    case "INSERT":
      executeInsert(ctx, statement, options);
      return undefined;
    case "UPDATE":
      executeUpdate(ctx, statement, options);
      return undefined;
    case "DELETE":
      executeDelete(ctx, statement, options);
      return undefined;
    default: {
      const unhandled: never = statement;
      throw new Error(`Unsupported statement: ${JSON.stringify(unhandled)}`);
    }
  }
}

/**
 * Look up a table for reading or rewriting. With emptyTableIsMissing set,
 * a table without rows is reported exactly like one that was never created.
 */
function requireRows(ctx: DatabaseContext, table: string, options: EngineOptions): Row[] {
  const rows = ctx.getTable(table);
  if (rows === undefined || (options.emptyTableIsMissing && rows.length === 0)) {
    throw new TableNotFoundError(table);
  }
  return rows;
}

function executeSelect(
  ctx: DatabaseContext,
  statement: SelectStatement,
  options: EngineOptions,
): Row[] {
  const rows = requireRows(ctx, statement.table, options);
  const where = statement.where;

  let results = where ? rows.filter((row) => evaluatePredicate(where, row)) : rows.slice();

  if (statement.orderBy) {
    results = applyOrderBy(results, statement.orderBy);
  }

  const projected = isStar(statement.columns)
    ? results.map(copyRow)
    : projectColumns(results, statement.columns);

  log(options, `SELECT ${statement.table}: ${projected.length} of ${rows.length} rows`);
  return projected;
}

function executeInsert(
  ctx: DatabaseContext,
  statement: InsertStatement,
  options: EngineOptions,
): void {
  const rows = ctx.getTable(statement.table);
  if (rows === undefined) {
    throw new TableNotFoundError(statement.table);
  }

  const { columns, values } = statement;
  if (columns.length !== values.length) {
    throw new ColumnValueMismatchError(columns.length, values.length);
  }

  const row = createRow();
  columns.forEach((column, i) => {
    setColumn(row, column, values[i]);
  });
  rows.push(row);

  log(options, `INSERT ${statement.table}: ${rows.length} rows`);
}

// Rows are updated one at a time: if the predicate fails on a row midway,
// the rows before it keep their new values
function executeUpdate(
  ctx: DatabaseContext,
  statement: UpdateStatement,
  options: EngineOptions,
): void {
  const rows = requireRows(ctx, statement.table, options);
  let updated = 0;

  for (const row of rows) {
    if (statement.where && !evaluatePredicate(statement.where, row)) {
      continue;
    }
    for (const [column, value] of statement.assignments) {
      setColumn(row, column, value);
    }
    updated++;
  }

  log(options, `UPDATE ${statement.table}: ${updated} of ${rows.length} rows`);
}

function executeDelete(
  ctx: DatabaseContext,
  statement: DeleteStatement,
  options: EngineOptions,
): void {
  const rows = requireRows(ctx, statement.table, options);
  const where = statement.where;

  // Without WHERE nothing survives
  const keep = where ? rows.filter((row) => !evaluatePredicate(where, row)) : [];
  ctx.setTable(statement.table, keep);

  log(options, `DELETE ${statement.table}: ${rows.length - keep.length} of ${rows.length} rows`);
}

// Rows have no prototype and every write defines an own key, so any
// identifier (`__proto__` included) is stored like any other column
function createRow(): Row {
  return Object.create(null);
}

function setColumn(row: Row, column: string, value: string): void {
  Object.defineProperty(row, column, {
    value,
    writable: true,
    enumerable: true,
    configurable: true,
  });
}

function copyRow(row: Row): Row {
  const copy = createRow();
  for (const column of Object.keys(row)) {
    setColumn(copy, column, row[column]);
  }
  return copy;
}

function isStar(columns: string[]): boolean {
  return columns.length === 1 && columns[0] === "*";
}

/**
 * Stable ascending sort on the column's text
 */
function applyOrderBy(results: Row[], column: string): Row[] {
  const keyed = results.map((row) => ({ row, key: columnValue(row, column) }));

  keyed.sort((a, b) => {
    if (a.key < b.key) return -1;
    if (a.key > b.key) return 1;
    return 0;
  });

  return keyed.map(({ row }) => row);
}

/**
 * Project columns from results, in the requested order
 */
function projectColumns(results: Row[], columns: string[]): Row[] {
  return results.map((row) => {
    const projected = createRow();
    for (const column of columns) {
      setColumn(projected, column, columnValue(row, column));
    }
    return projected;
  });
}

function log(options: EngineOptions, message: string): void {
  if (options.verbose) {
    console.log(`[SQL] ${message}`);
  }
}
