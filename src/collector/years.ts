import { UNKNOWN_DATE, type Row } from "../shared/record.js";

export type YearBounds = { min: number; max: number };

export type YearCount = { year: number; count: number };

const isDated = (row: Row) => row.date !== UNKNOWN_DATE;

/** Rows dated within [from-01-01, to-12-31]. Undated rows never match. */
export const filterByYearRange = <T extends Row>(rows: readonly T[], from: number, to: number): T[] => {
  if (!Number.isInteger(from) || !Number.isInteger(to)) {
    throw new RangeError(`Year range must be whole years, got ${from}-${to}`);
  }
  if (from > to) {
    throw new RangeError(`Year range starts after it ends: ${from}-${to}`);
  }
  const lo = `${String(from).padStart(4, "0")}-01-01`;
  const hi = `${String(to).padStart(4, "0")}-12-31`;
  return rows.filter((row) => isDated(row) && row.date >= lo && row.date <= hi);
};

export const yearBounds = (rows: readonly Row[]): YearBounds | undefined => {
  let bounds: YearBounds | undefined;
  for (const row of rows) {
    if (!isDated(row)) continue;
    const year = Number(row.date.slice(0, 4));
    if (!bounds) {
      bounds = { min: year, max: year };
    } else if (year < bounds.min) {
      bounds.min = year;
    } else if (year > bounds.max) {
      bounds.max = year;
    }
  }
  return bounds;
};

export const yearHistogram = (rows: readonly Row[]): YearCount[] => {
  const counts = new Map<number, number>();
  for (const row of rows) {
    if (row.year === undefined) continue;
    counts.set(row.year, (counts.get(row.year) ?? 0) + 1);
  }
  return [...counts.entries()].sort(([a], [b]) => a - b).map(([year, count]) => ({ year, count }));
};
