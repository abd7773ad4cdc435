import type { Monitor } from "./monitor";

export type SeriesName = "susceptible" | "incubating" | "sick";
export const SERIES: readonly SeriesName[] = ["susceptible", "incubating", "sick"];

export type LongRow = { what: SeriesName; day: number; count: number };

/** One row per (series, day), grouped by series, for plotting tools. */
export function toLongFormat(monitor: Monitor, series: readonly SeriesName[] = SERIES): LongRow[] {
  const rows: LongRow[] = [];
  for (const what of series) {
    const counts = monitor[what];
    monitor.day.forEach((day, i) => rows.push({ what, day, count: counts[i] }));
  }
  return rows;
}

export function toCSV(rows: readonly LongRow[]): string {
  const lines = ["what,day,count", ...rows.map((r) => `${r.what},${r.day},${r.count}`)];
  return lines.join("\n") + "\n";
}
