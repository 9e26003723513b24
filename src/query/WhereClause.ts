/**
 * Where and Order clauses
 *
 * The row mapper takes filters in one canonical shape: an ordered list of
 * column/value clauses plus the word that joins several values of the same
 * column. Distinct columns are always joined with `and`.
 *
 *   { grouping: "or", clauses: [Colour=Red, Colour=Blue, Size=null] }
 *   => ("Colour"=? or "Colour"=?) and "Size" is NULL
 *
 * Mixing `and` and `or` in one filter is not supported.
 */

import { ArgumentError } from "../core/errors";

export type WhereGrouping = "and" | "or";

export interface WhereClause {
  column: string;
  /** null compares with `is NULL` instead of binding a parameter */
  value: unknown;
}

export interface WhereCriteria {
  clauses: WhereClause[];
  grouping: WhereGrouping;
}

export interface OrderClause {
  column: string;
  ascending: boolean;
}

/**
 * Control key of the map form selecting the grouping word
 */
export const WHERE_COMPARISON_KEY = "!where";
export const WHERE_AND = "!and";
export const WHERE_OR = "!or";

/**
 * Clauses of one column, in first-seen column order
 */
export interface WhereGroup {
  column: string;
  values: unknown[];
}

/**
 * Build criteria from a keyed map. Array values expand into one clause per
 * element and may not be empty; the control key picks the grouping
 * (default `or`).
 *
 * @example
 * whereFromMap({ [WHERE_COMPARISON_KEY]: WHERE_AND, Colour: ["Red", "Blue"] });
 */
export function whereFromMap(map: Record<string, unknown>): WhereCriteria {
  let grouping: WhereGrouping = "or";
  const clauses: WhereClause[] = [];

  for (const [column, value] of Object.entries(map)) {
    if (column === WHERE_COMPARISON_KEY) {
      grouping = parseGrouping(value);
      continue;
    }
    if (Array.isArray(value)) {
      if (value.length === 0) {
        throw new ArgumentError(`No values given for where key ${column}`);
      }
      for (const element of value) {
        clauses.push({ column, value: element });
      }
    } else {
      clauses.push({ column, value });
    }
  }

  return { clauses, grouping };
}

/**
 * Build criteria from alternating column/value entries, where the same
 * column may repeat: `["Colour", "Red", "Colour", "Blue"]`
 */
export function whereFromPairs(
  pairs: readonly unknown[],
  grouping: WhereGrouping = "or"
): WhereCriteria {
  const clauses: WhereClause[] = [];

  for (let i = 0; i < pairs.length; i += 2) {
    const column = pairs[i];
    if (typeof column !== "string") {
      throw new ArgumentError(`Where key at position ${i} is not a string`);
    }
    if (i + 1 >= pairs.length) {
      throw new ArgumentError(`Missing value for key ${column}`);
    }
    clauses.push({ column, value: pairs[i + 1] });
  }

  return { clauses, grouping };
}

/**
 * Build order clauses from a column => ascending map
 */
export function orderFromMap(map: Record<string, boolean>): OrderClause[] {
  return Object.entries(map).map(([column, ascending]) => ({
    column,
    ascending,
  }));
}

/**
 * Group clauses by column, keeping the order columns first appear in
 */
export function groupWhereClauses(clauses: readonly WhereClause[]): WhereGroup[] {
  const groups = new Map<string, WhereGroup>();
  for (const clause of clauses) {
    const group = groups.get(clause.column);
    if (group) {
      group.values.push(clause.value);
    } else {
      groups.set(clause.column, { column: clause.column, values: [clause.value] });
    }
  }
  return [...groups.values()];
}

function parseGrouping(value: unknown): WhereGrouping {
  switch (value) {
    case WHERE_AND:
      return "and";
    case WHERE_OR:
      return "or";
    default:
      throw new ArgumentError("Unsupported where clause comparison");
  }
}
