/**
 * Connection contract shared by the SQL client and everything that builds
 * queries on top of it (row mappers, where clauses).
 */

/**
 * Declared type of a column or a bound parameter. Drives both input
 * coercion and the SQL literal a value is written as.
 */
export enum SqlDataType {
  /** Short, bounded string (VARCHAR) */
  String = "string",
  Integer = "integer",
  Float = "float",
  /** Long text; markup is preserved */
  Text = "text",
  /** Date and time, stored as GMT */
  Timestamp = "timestamp",
  Bool = "bool",
  /** Binary data (BYTEA) */
  Data = "data",
}

/**
 * Single character marking a positional parameter in SQL text
 */
export const TOKEN_CHARACTER = "?";

/**
 * Values a parameter holds once coerced for its SqlDataType
 */
export type SqlValue = string | number | boolean | Date | Buffer | null;

/**
 * A pending positional parameter
 */
export interface SqlParameter {
  type: SqlDataType;
  value: SqlValue;
}

/**
 * A result row: column name to driver-native value
 */
export type SqlRow = Record<string, unknown>;

/**
 * Session on a single database connection.
 *
 * Parameters accumulate through addParameter() and are consumed, left to
 * right, by the `?` tokens of the next query(). The session is sequential:
 * await each call before issuing the next.
 */
export interface DataConnection {
  /** Connect using the stored credentials. No-op when already open. */
  open(): Promise<void>;

  /** Release the handle and any open cursor. Safe when not connected. */
  close(): Promise<void>;

  hasConnection(): boolean;

  /** Drop pending parameters and detach any open cursor. */
  newQuery(): void;

  addParameter(type: SqlDataType, value: unknown): void;

  /**
   * Execute SQL, substituting `?` tokens with the pending parameters
   * unless `skipParameters` is set. Resolves to all result rows; empty
   * for statements that return none.
   */
  query(sql: string, skipParameters?: boolean): Promise<SqlRow[]>;

  /** Like query(), but leaves a cursor open for nextRow(). */
  beginQuery(sql: string, skipParameters?: boolean): Promise<void>;

  /** Next row of the open cursor, or null once exhausted. */
  nextRow(): Promise<SqlRow | null>;

  /** Call a stored procedure with the pending parameters as arguments. */
  procedure(name: string): Promise<SqlRow[]>;

  /** Like procedure(), but serves the rows through nextRow(). */
  beginProcedure(name: string): Promise<void>;

  /** Last auto-generated identity value of this session. */
  lastId(): Promise<number>;

  /** Rows returned or affected by the previous statement. */
  getAffectedRowCount(): number;

  /** Driver escaping for SQL built outside the parameter system. */
  escapeVariable(value: string): string;

  /** Quote a table or column name for this dialect. */
  quoteIdentifier(name: string): string;
}
