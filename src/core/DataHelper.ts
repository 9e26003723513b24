/**
 * Type coercion helpers.
 *
 * Each `asX` turns a loosely typed input (request field, driver value,
 * config entry) into a guaranteed primitive. Primitive inputs never throw;
 * only composite values that cannot be represented raise ArgumentError.
 */

import { ArgumentError } from "./errors";
import { doubleToString, integerToString } from "./Format";

/**
 * Strings accepted as `true` by asBool (compared trimmed and lowercased)
 */
const TRUTHY_STRINGS = new Set(["1", "true", "on", "yes"]);

/**
 * Numeric literal as accepted by asDateTime when deciding whether a string
 * is a Unix timestamp
 */
const NUMERIC_STRING = /^\s*[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?\s*$/;

/**
 * Date/time literal without a zone designator ("2024-05-01 13:45:00")
 */
const ZONELESS_DATE_TIME =
  /^(\d{4}-\d{2}-\d{2})(?:[ T](\d{2}:\d{2})(:\d{2}(?:\.\d+)?)?)?$/;

const MARKUP_TAG = /<[^>]*>/g;

/**
 * Parse the longest numeric prefix of a string, 0 when there is none
 */
function parseNumericPrefix(value: string): number {
  const parsed = Number.parseFloat(value.trim());
  return Number.isFinite(parsed) ? parsed : 0;
}

const zoneFormats = new Map<string, Intl.DateTimeFormat | null>();

/**
 * Wall-clock formatter for an IANA zone, null when the zone is unknown
 */
function zoneFormat(timezone: string): Intl.DateTimeFormat | null {
  const cached = zoneFormats.get(timezone);
  if (cached !== undefined) {
    return cached;
  }

  let format: Intl.DateTimeFormat | null;
  try {
    format = new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      hourCycle: "h23",
      year: "numeric",
      month: "2-digit",
      day: "2-digit",
      hour: "2-digit",
      minute: "2-digit",
      second: "2-digit",
    });
  } catch (error) {
    if (!(error instanceof RangeError)) {
      throw error;
    }
    format = null;
  }
  zoneFormats.set(timezone, format);
  return format;
}

/**
 * Offset of `timezone` from GMT at `instant`, in milliseconds. Accepts
 * "GMT", "UTC", "Z", fixed offsets ("+02:00") and IANA names
 * ("Europe/London"); anything else is read as GMT.
 */
function zoneOffset(timezone: string, instant: number): number {
  const trimmed = timezone.trim();
  const normalized = trimmed.toUpperCase();
  if (normalized === "" || normalized === "GMT" || normalized === "UTC" || normalized === "Z") {
    return 0;
  }

  const fixed = /^([+-])(\d{2}):?(\d{2})$/.exec(normalized);
  if (fixed) {
    const minutes = Number(fixed[2]) * 60 + Number(fixed[3]);
    return (fixed[1] === "-" ? -minutes : minutes) * 60000;
  }

  const format = zoneFormat(trimmed);
  if (!format) {
    return 0;
  }

  const parts = format.formatToParts(new Date(instant));
  const field = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find((part) => part.type === type)?.value ?? 0);
  const wallClock = Date.UTC(
    field("year"),
    field("month") - 1,
    field("day"),
    field("hour"),
    field("minute"),
    field("second")
  );
  return wallClock - Math.floor(instant / 1000) * 1000;
}

/**
 * Instant of a wall-clock time (given as if it were GMT) in `timezone`
 */
function wallClockToInstant(wallClock: number, timezone: string): number {
  const guess = wallClock - zoneOffset(timezone, wallClock);
  const offset = zoneOffset(timezone, guess);
  return wallClock - offset;
}

function epoch(): Date {
  return new Date(0);
}

/**
 * Date at `time` milliseconds, or the epoch outside the Date range
 */
function toDate(time: number): Date {
  const date = new Date(time);
  return Number.isNaN(date.getTime()) ? epoch() : date;
}

/**
 * Format any value as a string.
 *
 * null becomes "", integers are thousands-grouped, other numbers get 4
 * decimals, booleans become "True"/"False" and objects go through their
 * own toString.
 */
export function asString(value: unknown): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value === "string") {
    return value;
  }
  if (typeof value === "number") {
    return Number.isInteger(value)
      ? integerToString(value)
      : doubleToString(value);
  }
  if (typeof value === "bigint") {
    return integerToString(value);
  }
  if (typeof value === "boolean") {
    return value ? "True" : "False";
  }
  if (typeof value === "object") {
    if (
      Array.isArray(value) ||
      typeof value.toString !== "function" ||
      value.toString === Object.prototype.toString
    ) {
      throw new ArgumentError("Cannot convert object to string");
    }
    return value.toString().trim();
  }
  if (typeof value === "symbol") {
    return value.toString();
  }
  throw new ArgumentError(`Cannot convert ${typeof value} to string`);
}

/**
 * Like asString, but string input is trimmed and, unless told otherwise,
 * has any `<...>` markup removed.
 */
export function asStringSafe(value: unknown, stripMarkup: boolean = true): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (typeof value !== "string") {
    return asString(value);
  }
  return (stripMarkup ? value.replace(MARKUP_TAG, "") : value).trim();
}

/**
 * Coerce to a float; null and non-numeric strings give 0
 */
export function asFloat(value: unknown): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : 0;
  }
  if (value === null || value === undefined) {
    return 0;
  }
  if (typeof value === "string") {
    return parseNumericPrefix(value);
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  if (typeof value === "bigint") {
    return Number(value);
  }
  throw new ArgumentError("Cannot convert object to float");
}

/**
 * Coerce to an integer, truncating toward zero
 */
export function asInt(value: unknown): number {
  if (typeof value === "bigint") {
    return Number(value);
  }
  if (typeof value === "object" && value !== null) {
    throw new ArgumentError("Cannot convert object to integer");
  }
  return Math.trunc(asFloat(value));
}

/**
 * Coerce to a boolean. Strings are true only for "1", "true", "on" and
 * "yes" in any case; everything else, garbage included, is false.
 */
export function asBool(value: unknown): boolean {
  if (typeof value === "boolean") {
    return value;
  }
  if (value === null || value === undefined) {
    return false;
  }
  if (typeof value === "string") {
    return TRUTHY_STRINGS.has(value.trim().toLowerCase());
  }
  if (typeof value === "number") {
    return value !== 0 && !Number.isNaN(value);
  }
  if (typeof value === "bigint") {
    return value !== BigInt(0);
  }
  return true;
}

/**
 * Coerce to a Date. Never throws for the value: anything that cannot be
 * read gives the Unix epoch.
 *
 * Numbers and numeric strings are Unix timestamps in seconds. A date/time
 * string without a zone designator is read in `timezone`: "GMT", "UTC",
 * an offset such as "+02:00", or an IANA name such as "Europe/London".
 * An unknown zone is read as GMT.
 *
 * @example
 * asDateTime("2024-05-01 13:45:00").toISOString(); // "2024-05-01T13:45:00.000Z"
 * asDateTime(86400).toISOString();                 // "1970-01-02T00:00:00.000Z"
 */
export function asDateTime(value: unknown, timezone: string = "GMT"): Date {
  if (value instanceof Date) {
    return toDate(value.getTime());
  }
  if (value === null || value === undefined || value === "") {
    return epoch();
  }
  if (typeof value === "number" || typeof value === "bigint") {
    return toDate(Math.trunc(Number(value)) * 1000);
  }
  if (typeof value !== "string") {
    return epoch();
  }
  if (NUMERIC_STRING.test(value)) {
    return toDate(Math.trunc(Number(value.trim())) * 1000);
  }

  const trimmed = value.trim();
  const zoneless = ZONELESS_DATE_TIME.exec(trimmed);
  if (!zoneless) {
    return toDate(Date.parse(trimmed));
  }

  const wallClock = Date.parse(
    `${zoneless[1]}T${zoneless[2] ?? "00:00"}${zoneless[3] ?? ":00"}Z`
  );
  if (Number.isNaN(wallClock)) {
    return epoch();
  }
  return toDate(wallClockToInstant(wallClock, timezone));
}

/**
 * True when the value is a Date whose instant is after the epoch
 */
export function hasDateTime(value: unknown): boolean {
  return value instanceof Date && value.getTime() > 0;
}
