/**
 * Number formatting used when values are turned into display strings.
 *
 * All output is en-US: comma thousands separator, period decimal point.
 */

const integerFormat = new Intl.NumberFormat("en-US", {
  maximumFractionDigits: 0,
});

const doubleFormat = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 4,
  maximumFractionDigits: 4,
});

const currencyFormat = new Intl.NumberFormat("en-US", {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Format a floating point number with 4 decimals ("1,234.5000")
 */
export function doubleToString(value: number): string {
  return doubleFormat.format(value);
}

/**
 * Format an integer with thousands grouping ("1,234,567")
 */
export function integerToString(value: number | bigint): string {
  return integerFormat.format(value);
}

/**
 * Format a money amount behind its currency symbol ("$ 19.99")
 */
export function currencyToString(amount: number, currency: string): string {
  return `${currency} ${currencyFormat.format(amount)}`;
}

/**
 * Convert a price to whole minor units ("19.99" => 1999).
 *
 * The amount is rounded to 2 decimals before scaling, so binary float
 * error (19.99 * 100 = 1998.9999...) never truncates a unit away.
 */
export function priceToInteger(price: string | number): number {
  const parsed =
    typeof price === "number" ? price : Number.parseFloat(price.trim());
  if (!Number.isFinite(parsed)) {
    return 0;
  }
  return Math.round(Number(parsed.toFixed(2)) * 100);
}
