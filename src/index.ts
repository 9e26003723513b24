/**
 * Typed SQL mapper
 *
 * Main entry point for the library.
 * Exports all public APIs for value coercion and database access.
 */

// Coercion & formatting
export {
  asString,
  asStringSafe,
  asInt,
  asFloat,
  asBool,
  asDateTime,
  hasDateTime,
} from "./core/DataHelper";
export {
  doubleToString,
  integerToString,
  currencyToString,
  priceToInteger,
} from "./core/Format";
export {
  ArgumentError,
  ConfigurationError,
  TypeMismatchError,
  ColumnLookupError,
  SqlExecutionError,
  ParameterCountError,
} from "./core/errors";

// Database connection
export {
  DataConnection,
  SqlDataType,
  SqlParameter,
  SqlRow,
  SqlValue,
  TOKEN_CHARACTER,
} from "./db/DataConnection";
export { SqlClient, coerceParameter, gmtTypeParsers } from "./db/SqlClient";

// Columns & row mapping
export {
  DataColumn,
  ColumnOptions,
  StringColumn,
  TextColumn,
  BinaryColumn,
  IntegerColumn,
  FloatColumn,
  BoolColumn,
  TimestampColumn,
} from "./columns/DataColumn";
export {
  RowMapper,
  RowMapperOptions,
  DataEntity,
  InsertOptions,
  UpdateOptions,
  SelectOptions,
  DeleteOptions,
  IDENTITY_COLUMN,
} from "./query/RowMapper";
export { ValidationError, ValidationErrorCode } from "./query/ValidationError";
export {
  WhereClause,
  WhereCriteria,
  WhereGrouping,
  OrderClause,
  whereFromMap,
  whereFromPairs,
  orderFromMap,
  WHERE_COMPARISON_KEY,
  WHERE_AND,
  WHERE_OR,
} from "./query/WhereClause";
export {
  formatValue,
  substituteParameters,
  quoteIdentifier,
  SENTINEL_CHARACTER,
} from "./query/ValueFormatter";

// Configuration
export {
  dbConfig,
  loadDbConfig,
  loadDbConfigFromSettings,
  SqlCredentials,
} from "./config/db.config";
export { ConfigurationSettings, SettingsSection } from "./config/ConfigurationSettings";
