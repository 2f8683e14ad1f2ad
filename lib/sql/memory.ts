/**
 * In-memory implementation of DatabaseContext. Data lives as long as the instance.
 */

import type { DatabaseContext, SchemaInfo, TableInfo } from "./database";
import { TableExistsError, TableNotFoundError } from "./errors";
import type { Row } from "./types";

type StoredTable = {
  columns: string[];
  rows: Row[];
};

export class MemoryDatabaseContext implements DatabaseContext {
  private tables = new Map<string, StoredTable>();

  createTable(name: string, columns: string[]): void {
    if (this.tables.has(name)) {
      throw new TableExistsError(name);
    }
    this.tables.set(name, { columns: [...columns], rows: [] });
  }

  getTable(name: string): Row[] | undefined {
    return this.tables.get(name)?.rows;
  }

  setTable(name: string, rows: Row[]): void {
    const table = this.tables.get(name);
    if (!table) {
      throw new TableNotFoundError(name);
    }
    table.rows = rows;
  }

  getSchema(): SchemaInfo {
    const tables: Record<string, TableInfo> = {};

    for (const [name, table] of this.tables) {
      tables[name] = { columns: [...table.columns], rowCount: table.rows.length };
    }

    return { tables };
  }
}
