/**
 * Error kinds raised by the library.
 *
 * Every failure surfaces to the immediate caller; nothing is retried or
 * swallowed here. Validation findings are not errors (see ValidationError).
 */

/**
 * Malformed caller input: missing credentials, bad keys, bad clause shapes.
 */
export class ArgumentError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArgumentError";
  }
}

/**
 * An operation needs state that has not been established yet
 * (no table name, no open connection, no initial validation pass).
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

/**
 * A value's runtime type disagrees with the column's declared SqlDataType.
 */
export class TypeMismatchError extends Error {
  readonly columnKey: string;

  constructor(columnKey: string, message: string) {
    super(`${columnKey}: ${message}`);
    this.name = "TypeMismatchError";
    this.columnKey = columnKey;
  }
}

/**
 * A column was read by a name the row mapper does not declare.
 */
export class ColumnLookupError extends Error {
  readonly columnKey: string;

  constructor(columnKey: string) {
    super(`Column does not exist: ${columnKey}`);
    this.name = "ColumnLookupError";
    this.columnKey = columnKey;
  }
}

/**
 * Driver-reported failure. Carries the SQL text that was sent and the
 * driver's error code (SQLSTATE for PostgreSQL).
 */
export class SqlExecutionError extends Error {
  readonly query: string;
  readonly code: string | null;

  constructor(message: string, query: string = "", code: string | null = null) {
    super(message);
    this.name = "SqlExecutionError";
    this.query = query;
    this.code = code;
  }

  toString(): string {
    return `${this.message} (${this.query || "???"})`;
  }
}

/**
 * Placeholder tokens and pending parameters did not pair up one to one.
 */
export class ParameterCountError extends Error {
  readonly query: string;
  readonly expected: number;
  readonly supplied: number;

  constructor(message: string, query: string, expected: number, supplied: number) {
    super(message);
    this.name = "ParameterCountError";
    this.query = query;
    this.expected = expected;
    this.supplied = supplied;
  }
}
