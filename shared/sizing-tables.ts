/**
 * Breakpoint tables used to size equipment to capacity.
 *
 * Every table is ordered ascending by breakpoint. Resolution is a ceiling
 * lookup: the first entry whose breakpoint is >= the query. A query above the
 * last breakpoint clamps to the last (largest-capacity) entry, so equipment is
 * never rated below demand.
 */

export interface SizingEntry<T> {
  readonly breakpoint: number;
  readonly value: T;
}

export type SizingTable<T> = readonly SizingEntry<T>[];

export class SizingTableError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "SizingTableError";
  }
}

export function createSizingTable<T>(entries: readonly (readonly [number, T])[]): SizingTable<T> {
  const table: SizingEntry<T>[] = [];
  for (const [breakpoint, value] of entries) {
    if (!Number.isFinite(breakpoint)) {
      throw new SizingTableError(`Sizing table breakpoint ${breakpoint} is not finite`);
    }
    const previous = table[table.length - 1];
    if (previous && breakpoint < previous.breakpoint) {
      throw new SizingTableError(
        `Sizing table breakpoints must ascend: ${breakpoint} follows ${previous.breakpoint}`,
      );
    }
    table.push(Object.freeze({ breakpoint, value }));
  }
  return Object.freeze(table);
}

/** Returns undefined only for an empty table. */
export function ceilingLookup<T>(table: SizingTable<T>, query: number): SizingEntry<T> | undefined {
  if (table.length === 0) return undefined;
  if (Number.isNaN(query)) {
    throw new SizingTableError("Cannot look up a NaN value in a sizing table");
  }

  let lo = 0;
  let hi = table.length - 1;
  if (query > table[hi].breakpoint) return table[hi];

  while (lo < hi) {
    const mid = (lo + hi) >> 1;
    if (table[mid].breakpoint >= query) {
      hi = mid;
    } else {
      lo = mid + 1;
    }
  }
  return table[lo];
}

export function maxEntry<T>(table: SizingTable<T>): SizingEntry<T> | undefined {
  return table[table.length - 1];
}
