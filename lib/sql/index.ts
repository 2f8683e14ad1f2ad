import type { DatabaseContext, SchemaInfo } from "./database";
import { executeSQL, executeStatement } from "./engine";
import { MemoryDatabaseContext } from "./memory";
import { resolveOptions, type EngineOptions } from "./options";
import type { Row, Statement } from "./types";

/**
 * In-process database holding its tables in memory.
 * Not safe for interleaved use from concurrent callers; serialise access
 * to one instance if it is shared.
 *
 * @example
 * const db = new Database();
 * db.createTable("users", ["id", "name", "age"]);
 * db.execute("INSERT INTO users (id, name, age) VALUES (1, 'Alice', 30)");
 * const rows = db.execute("SELECT name FROM users WHERE age > 18 ORDER BY name");
 *
 * @example
 * // Empty tables are still tables, and every statement is logged
 * const db = new Database({ emptyTableIsMissing: false, verbose: true });
 */
export class Database {
  readonly options: EngineOptions;

  constructor(
    options: Partial<EngineOptions> = {},
    private readonly ctx: DatabaseContext = new MemoryDatabaseContext(),
  ) {
    this.options = resolveOptions(options);
  }

  /**
   * @throws TableExistsError if the table was already created
   */
  createTable(name: string, columns: string[]): void {
    this.ctx.createTable(name, columns);
  }

  /**
   * Parse and run one statement
   * @returns Result rows for SELECT, undefined otherwise
   */
  execute(sql: string): Row[] | undefined {
    return executeSQL(this.ctx, sql, this.options);
  }

  executeStatement(statement: Statement): Row[] | undefined {
    return executeStatement(this.ctx, statement, this.options);
  }

  getSchema(): SchemaInfo {
    return this.ctx.getSchema();
  }
}

export { parse } from "./parser";
export { compilePredicate, evaluatePredicate, OPERATORS } from "./predicate";
export { executeSQL, executeStatement } from "./engine";
export { MemoryDatabaseContext } from "./memory";
export {
  SQLError,
  ParseError,
  PredicateError,
  UnsupportedOperatorError,
  TableExistsError,
  TableNotFoundError,
  ColumnValueMismatchError,
  RowKeyError,
} from "./errors";
export type { EngineError } from "./errors";
export { DEFAULT_OPTIONS, STANDARD_OPTIONS, DEBUG_OPTIONS } from "./options";
export type { EngineOptions } from "./options";
export type { DatabaseContext, SchemaInfo, TableInfo } from "./database";
export type {
  Statement,
  SelectStatement,
  InsertStatement,
  UpdateStatement,
  DeleteStatement,
  Predicate,
  Operator,
  Row,
} from "./types";
