/**
 * Configuration for statement execution
 */

export interface EngineOptions {
  /**
   * Treat a table that exists but holds no rows as missing for
   * SELECT, UPDATE and DELETE. INSERT only checks that the table exists.
   * Default: true
   */
  emptyTableIsMissing: boolean;

  /**
   * Log one line per executed statement with the rows it touched
   * Default: false
   */
  verbose: boolean;
}

/**
 * Default options - matches the engine's historical lookup behaviour
 */
export const DEFAULT_OPTIONS: EngineOptions = {
  emptyTableIsMissing: true,
  verbose: false,
};

/**
 * Standard options - an empty table is still a table
 */
export const STANDARD_OPTIONS: EngineOptions = {
  emptyTableIsMissing: false,
  verbose: false,
};

/**
 * Debug options - default behaviour plus statement logging
 */
export const DEBUG_OPTIONS: EngineOptions = {
  emptyTableIsMissing: true,
  verbose: true,
};

export function resolveOptions(options: Partial<EngineOptions> = {}): EngineOptions {
  return { ...DEFAULT_OPTIONS, ...options };
}
