/**
 * Row Mapper
 *
 * Maps one table row onto a fixed, ordered set of typed columns. An entity
 * holds a RowMapper (rather than inheriting from it) and uses it to:
 * - read and write column values through typed setters and getters
 * - bind column values as query parameters
 * - load values from a result row
 * - validate values against the column constraints
 * - build and run INSERT / UPDATE / SELECT / DELETE statements
 *
 * A column named "Id" (any case) is the identity column: it is never
 * written by INSERT/UPDATE and never validated.
 */

import { DataColumn } from "../columns/DataColumn";
import { asBool, asDateTime, asFloat, asInt, asString, asStringSafe } from "../core/DataHelper";
import {
  ArgumentError,
  ColumnLookupError,
  ConfigurationError,
  TypeMismatchError,
} from "../core/errors";
import {
  DataConnection,
  SqlDataType,
  SqlRow,
  TOKEN_CHARACTER,
} from "../db/DataConnection";
import { ValidationError, ValidationErrorCode } from "./ValidationError";
import { quoteIdentifier } from "./ValueFormatter";
import { groupWhereClauses, OrderClause, WhereCriteria } from "./WhereClause";

/**
 * Name of the identity (auto-increment) column
 */
export const IDENTITY_COLUMN = "Id";

function isIdentity(name: string): boolean {
  return name.toLowerCase() === IDENTITY_COLUMN.toLowerCase();
}

function toBinary(value: unknown): Buffer | string | null {
  if (value === null || value === undefined) {
    return null;
  }
  if (Buffer.isBuffer(value) || typeof value === "string") {
    return value;
  }
  return asString(value);
}

/**
 * Capabilities an entity exposes to be mapped
 */
export interface DataEntity {
  tableName(): string | null;
  columns(): DataColumn[];
  /** Object-specific cross-field checks, run after column validation */
  localValidation?(mapper: RowMapper): void;
}

export interface RowMapperOptions {
  tableName?: string | null;
  columns?: DataColumn[];
  localValidation?: (mapper: RowMapper) => void;
}

export interface InsertOptions {
  /** Overrides the mapper's table */
  tableName?: string | null;
  /** Columns left out of the statement */
  skipKeys?: readonly string[] | null;
}

export interface UpdateOptions extends InsertOptions {
  /** Column whose current value selects the row; none updates every row */
  whereColumn?: string | null;
}

export interface SelectOptions {
  where?: WhereCriteria | null;
  orderBy?: readonly OrderClause[] | null;
  tableName?: string | null;
  /** When set, selects the declared columns minus these instead of `*` */
  skipKeys?: readonly string[] | null;
}

export interface DeleteOptions {
  where?: WhereCriteria | null;
  tableName?: string | null;
}

export class RowMapper {
  private tableName: string | null;
  private readonly columnList: DataColumn[] = [];
  private readonly localValidation: ((mapper: RowMapper) => void) | null;
  private validationErrors: ValidationError[] | null = null;

  constructor(options: RowMapperOptions = {}) {
    this.tableName = options.tableName ?? null;
    this.localValidation = options.localValidation ?? null;
    this.addColumns(...(options.columns ?? []));
  }

  /**
   * Build a mapper from an entity's table name, columns and local
   * validation hook
   */
  static forEntity(entity: DataEntity): RowMapper {
    return new RowMapper({
      tableName: entity.tableName(),
      columns: entity.columns(),
      localValidation: entity.localValidation
        ? (mapper) => entity.localValidation?.(mapper)
        : undefined,
    });
  }

  // ==========================================================================
  // COLUMNS
  // ==========================================================================

  /**
   * Append columns; declaration order is the order used in generated SQL
   */
  addColumns(...columns: DataColumn[]): void {
    this.columnList.push(...columns);
  }

  getColumns(): readonly DataColumn[] {
    return this.columnList;
  }

  getTableName(): string | null {
    return this.tableName;
  }

  setTableName(name: string | null): void {
    this.tableName = name;
  }

  /**
   * Every declared column name, identity included
   */
  getAllColumnNames(quoted: boolean = true): string[] {
    return this.columnNames(null, false, quoted ? quoteIdentifier : null);
  }

  private findColumn(key: string | null | undefined): DataColumn | undefined {
    if (!key) {
      return undefined;
    }
    return this.columnList.find((column) => column.name === key);
  }

  private columnNames(
    skipKeys: readonly string[] | null,
    skipIdentity: boolean,
    quote: ((name: string) => string) | null
  ): string[] {
    return this.columnList
      .filter(
        (column) =>
          !(skipIdentity && isIdentity(column.name)) &&
          !(skipKeys && skipKeys.includes(column.name))
      )
      .map((column) => (quote ? quote(column.name) : column.name));
  }

  // ==========================================================================
  // SETTERS - unknown keys are ignored
  // ==========================================================================

  /**
   * Set a String or Text column through asStringSafe
   *
   * @param stripMarkup - Remove `<...>` markup from the value
   * @param allowNull - Keep null instead of storing ""
   */
  setColumnString(
    key: string,
    value: unknown,
    stripMarkup: boolean = true,
    allowNull: boolean = false
  ): void {
    this.findColumn(key)?.setValue(
      allowNull && value == null ? null : asStringSafe(value, stripMarkup)
    );
  }

  setColumnInteger(key: string, value: unknown, allowNull: boolean = false): void {
    this.findColumn(key)?.setValue(allowNull && value == null ? null : asInt(value));
  }

  setColumnFloat(key: string, value: unknown, allowNull: boolean = false): void {
    this.findColumn(key)?.setValue(allowNull && value == null ? null : asFloat(value));
  }

  setColumnBoolean(key: string, value: unknown, allowNull: boolean = false): void {
    this.findColumn(key)?.setValue(allowNull && value == null ? null : asBool(value));
  }

  /**
   * Set a Timestamp column; ignored for columns of any other type
   */
  setColumnDateTime(key: string, value: unknown, allowNull: boolean = false): void {
    const column = this.findColumn(key);
    if (!column || column.dataType !== SqlDataType.Timestamp) {
      return;
    }
    column.setValue(allowNull && value == null ? null : value);
  }

  /**
   * Set a Data column; strings are stored as UTF-8. Ignored for columns of
   * any other type.
   */
  setColumnData(
    key: string,
    value: Buffer | string | null,
    allowNull: boolean = false
  ): void {
    const column = this.findColumn(key);
    if (!column || column.dataType !== SqlDataType.Data) {
      return;
    }
    if (value === null) {
      column.setValue(allowNull ? null : Buffer.alloc(0));
      return;
    }
    column.setValue(typeof value === "string" ? Buffer.from(value, "utf8") : value);
  }

  // ==========================================================================
  // GETTERS - unknown keys throw ColumnLookupError
  // ==========================================================================

  /**
   * Read a column value; null is replaced with the type's zero value
   * unless `allowNull` is set
   */
  private getColumnValue(key: string, allowNull: boolean): unknown {
    const column = this.findColumn(key);
    if (!column) {
      throw new ColumnLookupError(key);
    }

    const value = column.getValue();
    if (value !== null || allowNull) {
      return value;
    }

    switch (column.dataType) {
      case SqlDataType.String:
      case SqlDataType.Text:
        return "";
      case SqlDataType.Data:
        return Buffer.alloc(0);
      case SqlDataType.Integer:
      case SqlDataType.Float:
        return 0;
      case SqlDataType.Bool:
        return false;
      case SqlDataType.Timestamp:
        return asDateTime(null);
    }
  }

  getColumnString(key: string): string;
  getColumnString(key: string, allowNull: boolean): string | null;
  getColumnString(key: string, allowNull: boolean = false): string | null {
    const value = this.getColumnValue(key, allowNull);
    if (value === null) {
      return null;
    }
    if (typeof value !== "string") {
      throw new TypeMismatchError(key, "Column does not contain string data");
    }
    return value;
  }

  getColumnInteger(key: string): number;
  getColumnInteger(key: string, allowNull: boolean): number | null;
  getColumnInteger(key: string, allowNull: boolean = false): number | null {
    const value = this.getColumnValue(key, allowNull);
    if (value === null) {
      return null;
    }
    if (typeof value !== "number" || !Number.isInteger(value)) {
      throw new TypeMismatchError(key, "Column is not an integer");
    }
    return value;
  }

  getColumnFloat(key: string): number;
  getColumnFloat(key: string, allowNull: boolean): number | null;
  getColumnFloat(key: string, allowNull: boolean = false): number | null {
    const value = this.getColumnValue(key, allowNull);
    if (value === null) {
      return null;
    }
    if (typeof value !== "number") {
      throw new TypeMismatchError(key, "Column is not a float");
    }
    return value;
  }

  getColumnBool(key: string): boolean;
  getColumnBool(key: string, allowNull: boolean): boolean | null;
  getColumnBool(key: string, allowNull: boolean = false): boolean | null {
    const value = this.getColumnValue(key, allowNull);
    if (value === null) {
      return null;
    }
    if (typeof value !== "boolean") {
      throw new TypeMismatchError(key, "Column is not a boolean");
    }
    return value;
  }

  getColumnDateTime(key: string): Date;
  getColumnDateTime(key: string, allowNull: boolean): Date | null;
  getColumnDateTime(key: string, allowNull: boolean = false): Date | null {
    const value = this.getColumnValue(key, allowNull);
    if (value === null) {
      return null;
    }
    if (!(value instanceof Date)) {
      throw new TypeMismatchError(key, "Column is not a timestamp");
    }
    return value;
  }

  getColumnData(key: string): Buffer;
  getColumnData(key: string, allowNull: boolean): Buffer | null;
  getColumnData(key: string, allowNull: boolean = false): Buffer | null {
    const value = this.getColumnValue(key, allowNull);
    if (value === null) {
      return null;
    }
    if (!Buffer.isBuffer(value)) {
      throw new TypeMismatchError(key, "Column does not contain binary data");
    }
    return value;
  }

  // ==========================================================================
  // PARAMETERS & ROWS
  // ==========================================================================

  /**
   * Bind column values as parameters on the connection, in declaration
   * order. The identity column is never bound.
   *
   * @param keys - Columns to skip, or with `includeMode` the only columns to bind
   * @returns Number of parameters bound
   */
  addColumnsToParameters(
    db: DataConnection,
    keys: readonly string[] | null = null,
    includeMode: boolean = false
  ): number {
    let bound = 0;
    for (const column of this.columnList) {
      if (isIdentity(column.name)) {
        continue;
      }
      if (keys && keys.includes(column.name) !== includeMode) {
        continue;
      }
      db.addParameter(column.dataType, column.getValue());
      bound++;
    }
    return bound;
  }

  /**
   * Copy values from a result row into the columns of the same name,
   * through the typed setters. Columns missing from the row are left
   * alone; null values are kept as null.
   *
   * @returns false when the row is missing or empty
   */
  loadColumnValues(row: SqlRow | null | undefined): boolean {
    if (!row || Object.keys(row).length === 0) {
      return false;
    }

    for (const column of this.columnList) {
      if (!Object.prototype.hasOwnProperty.call(row, column.name)) {
        continue;
      }
      const value = row[column.name];

      switch (column.dataType) {
        case SqlDataType.String:
        case SqlDataType.Text:
          this.setColumnString(column.name, value, false, true);
          break;
        case SqlDataType.Integer:
          this.setColumnInteger(column.name, value, true);
          break;
        case SqlDataType.Float:
          this.setColumnFloat(column.name, value, true);
          break;
        case SqlDataType.Bool:
          this.setColumnBoolean(column.name, value, true);
          break;
        case SqlDataType.Timestamp:
          this.setColumnDateTime(column.name, value, true);
          break;
        case SqlDataType.Data:
          this.setColumnData(column.name, toBinary(value), true);
          break;
      }
    }

    return true;
  }

  // ==========================================================================
  // VALIDATION
  // ==========================================================================

  /**
   * Check every declared column (except the identity column) against its
   * constraints, then run the local validation hook.
   *
   * @param columnFilter - Only validate these columns
   * @param stopOnFirstError - End the column pass at the first failing
   * check; the local hook still runs
   * @returns true when any error was found
   * @throws ConfigurationError when no columns are declared
   */
  doValidation(
    columnFilter: readonly string[] | null = null,
    stopOnFirstError: boolean = false
  ): boolean {
    if (this.columnList.length === 0) {
      throw new ConfigurationError("No columns to validate");
    }
    this.validationErrors = [];

    for (const column of this.columnList) {
      if (isIdentity(column.name)) continue;
      if (columnFilter && !columnFilter.includes(column.name)) continue;

      const codes = this.checkColumn(column);
      for (const code of stopOnFirstError ? codes.slice(0, 1) : codes) {
        this.addValidationError(column.name, code);
      }
      if (stopOnFirstError && codes.length > 0) {
        break;
      }
    }

    this.localValidation?.(this);

    return this.hasValidationErrors();
  }

  hasValidationErrors(): boolean {
    return (this.validationErrors?.length ?? 0) > 0;
  }

  /**
   * Errors found by the last doValidation() call
   */
  getValidationErrors(): readonly ValidationError[] {
    return this.validationErrors ?? [];
  }

  /**
   * Record an object-specific error, typically from the local validation
   * hook
   *
   * @throws ConfigurationError before the first doValidation() call
   */
  addCustomValidationError(column: string, message: string): void {
    this.addValidationError(column, ValidationErrorCode.CustomError, message);
  }

  private addValidationError(
    column: string,
    code: ValidationErrorCode,
    message: string | null = null
  ): void {
    if (this.validationErrors === null) {
      throw new ConfigurationError("Initial validation not performed first");
    }
    this.validationErrors.push(new ValidationError(column, code, message));
  }

  /**
   * Failing checks of one column, in the order they are tested
   */
  private checkColumn(column: DataColumn): ValidationErrorCode[] {
    const value = column.getValue();
    const { options, dataType } = column;

    if (options.notNull && value === null) {
      return [ValidationErrorCode.ValueCannotBeNull];
    }

    const codes: ValidationErrorCode[] = [];

    if (options.isRequired) {
      const notSet =
        dataType === SqlDataType.String || dataType === SqlDataType.Text
          ? typeof value !== "string" || value.length === 0
          : dataType === SqlDataType.Timestamp
          ? asDateTime(value).getTime() === 0
          : false;
      if (notSet) {
        codes.push(ValidationErrorCode.ValueIsNotSet);
      }
    }

    switch (dataType) {
      case SqlDataType.String:
      case SqlDataType.Text:
      case SqlDataType.Data: {
        const length =
          typeof value === "string" || Buffer.isBuffer(value) ? value.length : 0;
        if (options.maxLength > 0 && length > options.maxLength) {
          codes.push(ValidationErrorCode.ValueLengthTooLong);
        }
        if (options.minLength > 0 && length < options.minLength && length !== 0) {
          codes.push(ValidationErrorCode.ValueLengthTooShort);
        }
        break;
      }
      case SqlDataType.Integer:
      case SqlDataType.Float:
        if (typeof value === "number") {
          codes.push(...this.checkRange(column, value));
        }
        break;
      case SqlDataType.Timestamp:
        if (value instanceof Date) {
          codes.push(...this.checkRange(column, Math.floor(value.getTime() / 1000)));
        }
        break;
      case SqlDataType.Bool:
        break;
    }

    return codes;
  }

  private checkRange(column: DataColumn, value: number): ValidationErrorCode[] {
    const { minRange, maxRange } = column.options;
    if (minRange === 0 && maxRange === 0) {
      return [];
    }

    const codes: ValidationErrorCode[] = [];
    if (maxRange !== 0 && value > maxRange) {
      codes.push(ValidationErrorCode.ValueRangeTooHigh);
    }
    if (value < minRange) {
      codes.push(ValidationErrorCode.ValueRangeTooLow);
    }
    return codes;
  }

  // ==========================================================================
  // QUERIES
  // ==========================================================================

  /**
   * INSERT the current column values (identity column excluded)
   *
   * @example
   * // columns Id, Name, Age on table "widgets"
   * await mapper.queryInsertInto(db);
   * // insert into "widgets" ("Name","Age") values (?,?)  bound to (Name, Age)
   */
  async queryInsertInto(db: DataConnection, options: InsertOptions = {}): Promise<SqlRow[]> {
    const tableName = this.requireTableName(options.tableName);
    const skipKeys = options.skipKeys ?? null;

    db.newQuery();
    const count = this.addColumnsToParameters(db, skipKeys);
    const columns = this.columnNames(skipKeys, true, (name) => db.quoteIdentifier(name));
    const tokens = new Array<string>(count).fill(TOKEN_CHARACTER);

    return db.query(
      `insert into ${db.quoteIdentifier(tableName)} (${columns.join(",")}) values (${tokens.join(",")})`
    );
  }

  /**
   * UPDATE every non-identity column. With `whereColumn`, only the row
   * matching that column's current value is updated.
   */
  async queryUpdate(db: DataConnection, options: UpdateOptions = {}): Promise<SqlRow[]> {
    const tableName = this.requireTableName(options.tableName);
    const skipKeys = options.skipKeys ?? null;

    db.newQuery();
    this.addColumnsToParameters(db, skipKeys);
    const sets = this.columnNames(skipKeys, true, (name) => db.quoteIdentifier(name)).map(
      (name) => `${name}=${TOKEN_CHARACTER}`
    );

    let sql = `update ${db.quoteIdentifier(tableName)} set ${sets.join(",")}`;

    if (options.whereColumn) {
      const where = this.findColumn(options.whereColumn);
      if (!where) {
        throw new ColumnLookupError(options.whereColumn);
      }
      db.addParameter(where.dataType, where.getValue());
      sql += ` where ${db.quoteIdentifier(where.name)}=${TOKEN_CHARACTER}`;
    }

    return db.query(sql);
  }

  /**
   * SELECT from the table with optional filter and ordering
   */
  async querySelect(db: DataConnection, options: SelectOptions = {}): Promise<SqlRow[]> {
    const tableName = this.requireTableName(options.tableName);

    db.newQuery();
    const columns = options.skipKeys
      ? this.columnNames(options.skipKeys, false, (name) => db.quoteIdentifier(name)).join(",")
      : "*";

    let sql = `select ${columns} from ${db.quoteIdentifier(tableName)}`;
    sql += this.buildWhereClause(db, options.where ?? null, tableName);

    const orders = (options.orderBy ?? []).map(
      (order) => `${db.quoteIdentifier(order.column)} ${order.ascending ? "ASC" : "DESC"}`
    );
    if (orders.length > 0) {
      sql += ` order by ${orders.join(", ")}`;
    }

    return db.query(sql);
  }

  /**
   * DELETE from the table. Without a filter every row is deleted.
   */
  async queryDelete(db: DataConnection, options: DeleteOptions = {}): Promise<SqlRow[]> {
    const tableName = this.requireTableName(options.tableName);

    db.newQuery();
    const where = this.buildWhereClause(db, options.where ?? null, tableName);

    return db.query(`delete from ${db.quoteIdentifier(tableName)}${where}`);
  }

  private requireTableName(override: string | null | undefined): string {
    const tableName = override || this.tableName;
    if (!tableName) {
      throw new ConfigurationError("Table name not set");
    }
    return tableName;
  }

  /**
   * Build ` where ...` and bind its values, in token order
   */
  private buildWhereClause(
    db: DataConnection,
    criteria: WhereCriteria | null,
    tableName: string
  ): string {
    if (!criteria) {
      return "";
    }
    if (criteria.clauses.length === 0) {
      throw new ArgumentError("Where clause has no conditions");
    }

    const fragments = groupWhereClauses(criteria.clauses).map((group) => {
      const column = this.findColumn(group.column);
      if (!column && tableName === this.tableName) {
        throw new ArgumentError(`Invalid where key: ${group.column}`);
      }
      // columns of other tables are compared as strings
      const type = column ? column.dataType : SqlDataType.String;
      const name = db.quoteIdentifier(group.column);

      const parts = group.values.map((value) => {
        if (value === null || value === undefined) {
          return `${name} is NULL`;
        }
        db.addParameter(type, value);
        return `${name}=${TOKEN_CHARACTER}`;
      });

      return parts.length > 1
        ? `(${parts.join(` ${criteria.grouping} `)})`
        : parts[0];
    });

    return fragments.length > 0 ? ` where ${fragments.join(" and ")}` : "";
  }
}
