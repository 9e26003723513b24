/**
 * SQL literal formatting and positional parameter substitution.
 *
 * Values are written straight into the SQL text as literals. String-like
 * values have every `?` swapped for SENTINEL_CHARACTER before escaping so
 * a later token scan never mistakes them for placeholders; the sentinel is
 * turned back into `?` once every token has been replaced. Data containing
 * the sentinel byte itself is therefore not supported.
 */

import { ConfigurationError, ParameterCountError } from "../core/errors";
import {
  SqlDataType,
  SqlParameter,
  SqlValue,
  TOKEN_CHARACTER,
} from "../db/DataConnection";

/**
 * Stand-in for `?` inside escaped values (ASCII SUB, 0x1A)
 */
export const SENTINEL_CHARACTER = "\x1A";

/**
 * Driver escape: turns raw text into a complete quoted string literal
 */
export type LiteralEscaper = (value: string) => string;

/**
 * A formatted literal, and whether it carries sentinel characters that
 * must be restored after substitution
 */
export interface FormattedValue {
  literal: string;
  hasSentinel: boolean;
}

/**
 * Double-quote an identifier, doubling embedded quotes
 */
export function quoteIdentifier(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

function pad(value: number): string {
  return value.toString().padStart(2, "0");
}

/**
 * Format a Date as `YYYY-MM-DD HH:MM:SS` in GMT
 */
export function formatTimestamp(value: Date): string {
  return (
    `${value.getUTCFullYear()}-${pad(value.getUTCMonth() + 1)}-${pad(value.getUTCDate())} ` +
    `${pad(value.getUTCHours())}:${pad(value.getUTCMinutes())}:${pad(value.getUTCSeconds())}`
  );
}

function formatText(text: string, escape: LiteralEscaper): FormattedValue {
  const hasSentinel = text.includes(TOKEN_CHARACTER);
  const guarded = hasSentinel
    ? text.split(TOKEN_CHARACTER).join(SENTINEL_CHARACTER)
    : text;
  return { literal: escape(guarded), hasSentinel };
}

/**
 * Fixed notation with 6 decimals. toFixed switches to exponent notation
 * from 1e21, where every double is already integral.
 */
function formatFloat(value: number): string {
  if (Math.abs(value) < 1e21) {
    return value.toFixed(6);
  }
  return `${BigInt(value).toString()}.000000`;
}

function describe(value: SqlValue): string {
  if (value instanceof Date) return "Date";
  if (Buffer.isBuffer(value)) return "Buffer";
  return typeof value;
}

/**
 * Format one coerced value as a SQL literal for its declared type.
 *
 * @throws ConfigurationError for an unknown type, or a value whose runtime
 * type cannot be written as that type
 */
export function formatValue(
  type: SqlDataType,
  value: SqlValue,
  escape: LiteralEscaper
): FormattedValue {
  const plain = (literal: string): FormattedValue => ({
    literal,
    hasSentinel: false,
  });

  if (value === null) {
    if (!Object.values(SqlDataType).includes(type)) {
      throw new ConfigurationError(`Unknown data type in parameter: ${type}`);
    }
    return plain("NULL");
  }

  switch (type) {
    case SqlDataType.String:
    case SqlDataType.Text:
    case SqlDataType.Data:
      if (Buffer.isBuffer(value)) {
        return plain(escape(`\\x${value.toString("hex")}`));
      }
      if (typeof value === "string") {
        return formatText(value, escape);
      }
      break;

    case SqlDataType.Integer:
      if (typeof value === "number") {
        return plain(Number.isFinite(value) ? BigInt(Math.trunc(value)).toString() : "0");
      }
      break;

    case SqlDataType.Float:
      if (typeof value === "number") {
        return plain(Number.isFinite(value) ? formatFloat(value) : "0.000000");
      }
      break;

    case SqlDataType.Bool:
      if (typeof value === "boolean") {
        return plain(value ? "'1'" : "'0'");
      }
      break;

    case SqlDataType.Timestamp:
      if (value instanceof Date) {
        const time = value.getTime();
        if (time === 0 || Number.isNaN(time)) {
          return plain("NULL");
        }
        return plain(`'${formatTimestamp(value)}'`);
      }
      break;

    default: {
      const unknownType: never = type;
      throw new ConfigurationError(`Unknown data type in parameter: ${String(unknownType)}`);
    }
  }

  throw new ConfigurationError(
    `Cannot format ${describe(value)} value as ${type}`
  );
}

/**
 * Replace every sentinel with the token character again
 */
export function restoreSentinels(sql: string): string {
  return sql.split(SENTINEL_CHARACTER).join(TOKEN_CHARACTER);
}

/**
 * Substitute `?` tokens in `sql`, left to right, with the formatted
 * parameters.
 *
 * @throws ParameterCountError when a token has no parameter left, or
 * parameters remain after the last token
 *
 * @example
 * substituteParameters(
 *   "select * from users where name=? and age=?",
 *   [{ type: SqlDataType.String, value: "foo" }, { type: SqlDataType.Integer, value: 42 }],
 *   escape
 * );
 * // select * from users where name='foo' and age=42
 */
export function substituteParameters(
  sql: string,
  params: readonly SqlParameter[],
  escape: LiteralEscaper
): string {
  let output = "";
  let cursor = 0;
  let consumed = 0;
  let hasSentinel = false;

  for (;;) {
    const tokenPosition = sql.indexOf(TOKEN_CHARACTER, cursor);
    if (tokenPosition === -1) break;

    if (consumed === params.length) {
      throw new ParameterCountError(
        `Missing parameter for token ${consumed + 1} (only ${params.length} supplied)`,
        sql,
        consumed + 1,
        params.length
      );
    }

    const param = params[consumed];
    const formatted = formatValue(param.type, param.value, escape);
    output += sql.slice(cursor, tokenPosition) + formatted.literal;
    hasSentinel = hasSentinel || formatted.hasSentinel;

    cursor = tokenPosition + TOKEN_CHARACTER.length;
    consumed++;
  }

  if (consumed !== params.length) {
    throw new ParameterCountError(
      `Too many parameters passed to query (expecting ${consumed}, got ${params.length})`,
      sql,
      consumed,
      params.length
    );
  }

  output += sql.slice(cursor);
  return hasSentinel ? restoreSentinels(output) : output;
}

/**
 * Format parameters as a comma-separated argument list, for procedure calls
 */
export function formatArgumentList(
  params: readonly SqlParameter[],
  escape: LiteralEscaper
): string {
  let hasSentinel = false;
  const parts = params.map((param) => {
    const formatted = formatValue(param.type, param.value, escape);
    hasSentinel = hasSentinel || formatted.hasSentinel;
    return formatted.literal;
  });
  const list = parts.join(", ");
  return hasSentinel ? restoreSentinels(list) : list;
}
