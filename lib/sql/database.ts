/**
 * Table store interface for the SQL engine.
 * The engine only talks to tables through this interface.
 */

import type { Row } from "./types";

/**
 * Schema information extracted from the store
 */
export interface SchemaInfo {
  tables: Record<string, TableInfo>;
}

export interface TableInfo {
  /** Columns declared when the table was created. Never enforced */
  columns: string[];
  rowCount: number;
}

/**
 * Main database context interface
 */
export interface DatabaseContext {
  /**
   * Create an empty table
   * @throws TableExistsError if the name is taken
   */
  createTable(name: string, columns: string[]): void;

  /**
   * The live row sequence of a table, or undefined when it was never created.
   * Rows mutated through the returned array stay mutated.
   */
  getTable(name: string): Row[] | undefined;

  /** Replace every row of an existing table */
  setTable(name: string, rows: Row[]): void;

  /**
   * Get schema information for all tables
   */
  getSchema(): SchemaInfo;
}
