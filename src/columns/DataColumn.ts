/**
 * Data Columns
 *
 * A column holds one typed value for a row mapper together with the
 * constraints the mapper validates it against. Setting a value of the
 * wrong runtime type raises TypeMismatchError; only timestamp columns
 * coerce their input.
 */

import { asDateTime } from "../core/DataHelper";
import { TypeMismatchError } from "../core/errors";
import { SqlDataType } from "../db/DataConnection";

/**
 * Validation constraints of a column
 */
export interface ColumnOptions {
  /** Value may not be null */
  notNull?: boolean;
  /** Value must be set: non-empty for strings, after the epoch for timestamps */
  isRequired?: boolean;
  /** Minimum length of string and binary values (0 = none) */
  minLength?: number;
  /** Maximum length of string and binary values (0 = none) */
  maxLength?: number;
  /** Minimum of numeric values, or Unix seconds for timestamps */
  minRange?: number;
  /** Maximum of numeric values, or Unix seconds for timestamps (0 = none) */
  maxRange?: number;
}

/**
 * Base column: name, declared type, constraints and the current value
 */
export abstract class DataColumn<T = unknown> {
  readonly name: string;
  readonly dataType: SqlDataType;
  readonly options: Readonly<Required<ColumnOptions>>;
  protected value: T | null = null;

  protected constructor(
    dataType: SqlDataType,
    name: string,
    value: T | null,
    options: ColumnOptions
  ) {
    this.dataType = dataType;
    this.name = name;
    this.options = {
      notNull: options.notNull ?? false,
      isRequired: options.isRequired ?? false,
      minLength: options.minLength ?? 0,
      maxLength: options.maxLength ?? 0,
      minRange: options.minRange ?? 0,
      maxRange: options.maxRange ?? 0,
    };
    if (value !== null) {
      this.setValue(value);
    }
  }

  /**
   * Replace the value, enforcing the column's type
   *
   * @throws TypeMismatchError
   */
  abstract setValue(value: unknown): void;

  getValue(): T | null {
    return this.value;
  }

  protected mismatch(expected: string): TypeMismatchError {
    return new TypeMismatchError(this.name, `Value is not ${expected}`);
  }
}

// ============================================================================
// STRING-LIKE COLUMNS
// ============================================================================

abstract class StringColumnBase extends DataColumn<string> {
  setValue(value: unknown): void {
    if (value !== null && typeof value !== "string") {
      throw this.mismatch("a string");
    }
    this.value = typeof value === "string" ? value : null;
  }
}

/**
 * Bounded string (VARCHAR)
 */
export class StringColumn extends StringColumnBase {
  constructor(name: string, value: string | null = null, options: ColumnOptions = {}) {
    super(SqlDataType.String, name, value, options);
  }
}

/**
 * Long text (TEXT)
 */
export class TextColumn extends StringColumnBase {
  constructor(name: string, value: string | null = null, options: ColumnOptions = {}) {
    super(SqlDataType.Text, name, value, options);
  }
}

/**
 * Binary data (BYTEA)
 */
export class BinaryColumn extends DataColumn<Buffer> {
  constructor(name: string, value: Buffer | null = null, options: ColumnOptions = {}) {
    super(SqlDataType.Data, name, value, options);
  }

  setValue(value: unknown): void {
    if (value !== null && !Buffer.isBuffer(value)) {
      throw this.mismatch("binary data");
    }
    this.value = Buffer.isBuffer(value) ? value : null;
  }
}

// ============================================================================
// SCALAR COLUMNS
// ============================================================================

export class IntegerColumn extends DataColumn<number> {
  constructor(name: string, value: number | null = null, options: ColumnOptions = {}) {
    super(SqlDataType.Integer, name, value, options);
  }

  setValue(value: unknown): void {
    if (value === null) {
      this.value = null;
      return;
    }
    if (typeof value !== "number" || !Number.isInteger(value)) {
      throw this.mismatch("an integer");
    }
    this.value = value;
  }
}

export class FloatColumn extends DataColumn<number> {
  constructor(name: string, value: number | null = null, options: ColumnOptions = {}) {
    super(SqlDataType.Float, name, value, options);
  }

  setValue(value: unknown): void {
    if (value === null) {
      this.value = null;
      return;
    }
    if (typeof value !== "number" || !Number.isFinite(value)) {
      throw this.mismatch("a float");
    }
    this.value = value;
  }
}

export class BoolColumn extends DataColumn<boolean> {
  constructor(name: string, value: boolean | null = null, options: ColumnOptions = {}) {
    super(SqlDataType.Bool, name, value, options);
  }

  setValue(value: unknown): void {
    if (value !== null && typeof value !== "boolean") {
      throw this.mismatch("a boolean");
    }
    this.value = typeof value === "boolean" ? value : null;
  }
}

/**
 * Date and time (TIMESTAMP). Any input is coerced with asDateTime, so
 * null becomes the epoch.
 */
export class TimestampColumn extends DataColumn<Date> {
  constructor(name: string, value: Date | null = null, options: ColumnOptions = {}) {
    super(SqlDataType.Timestamp, name, value, options);
  }

  setValue(value: unknown): void {
    this.value = asDateTime(value);
  }
}
