import { and, asc, desc, eq, type SQL } from "drizzle-orm";
import type { PgColumn } from "drizzle-orm/pg-core";

export const DEFAULT_SKIP = 0;
export const DEFAULT_LIMIT = 10;
export const MAX_LIMIT = 50;

/**
 * One list request against one entity: equality filters over its declared
 * columns, ordering by one field with `id` as tie-break, offset pagination.
 */
export interface ListQuery<F, K extends string> {
  filter: F;
  orderBy: K;
  reverse: boolean;
  skip: number;
  limit: number;
}

export function listQuery<F, K extends string>(
  filter: F,
  orderBy: K,
  options: Partial<Pick<ListQuery<F, K>, "reverse" | "skip" | "limit">> = {}
): ListQuery<F, K> {
  return {
    filter,
    orderBy,
    reverse: options.reverse ?? false,
    skip: options.skip ?? DEFAULT_SKIP,
    limit: options.limit ?? DEFAULT_LIMIT,
  };
}

export type ColumnMap = Record<string, PgColumn>;

// ============================================================================
// SQL translation
// ============================================================================

/** Conjunction of `column = value`; keys without a declared column are ignored. */
export function buildWhere(columns: ColumnMap, filter: Record<string, unknown>): SQL | undefined {
  const conditions: SQL[] = [];
  for (const [key, value] of Object.entries(filter)) {
    const column = columns[key];
    if (value === undefined || !column) continue;
    conditions.push(eq(column, value));
  }
  return conditions.length > 0 ? and(...conditions) : undefined;
}

export function buildOrderBy(
  columns: ColumnMap,
  idColumn: PgColumn,
  orderBy: string,
  reverse: boolean
): SQL[] {
  const direction = reverse ? desc : asc;
  const column = columns[orderBy] ?? idColumn;
  return [direction(column), direction(idColumn)];
}

// ============================================================================
// In-memory evaluator (same contract as the SQL translation)
// ============================================================================

// Nulls sort after everything else ascending, matching Postgres
function compareValues(a: unknown, b: unknown): number {
  if (a === b) return 0;
  if (a === null || a === undefined) return 1;
  if (b === null || b === undefined) return -1;
  if (a instanceof Date && b instanceof Date) return a.getTime() - b.getTime();
  if (typeof a === "number" && typeof b === "number") return a - b;
  if (typeof a === "boolean" && typeof b === "boolean") return Number(a) - Number(b);
  const left = String(a);
  const right = String(b);
  return left < right ? -1 : left > right ? 1 : 0;
}

function matches(row: Record<string, unknown>, filter: Record<string, unknown>): boolean {
  return Object.entries(filter).every(
    ([key, value]) => value === undefined || !(key in row) || row[key] === value
  );
}

export function applyQuery<R extends Record<string, unknown> & { id: number }>(
  rows: readonly R[],
  query: ListQuery<Record<string, unknown>, string>
): R[] {
  const sign = query.reverse ? -1 : 1;
  return rows
    .filter((row) => matches(row, query.filter))
    .sort(
      (a, b) =>
        sign * (compareValues(a[query.orderBy], b[query.orderBy]) || compareValues(a.id, b.id))
    )
    .slice(query.skip, query.skip + query.limit);
}
