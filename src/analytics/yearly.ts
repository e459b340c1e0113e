import type { IncidentRecord, YearlyRegionRow } from "../shared/types.js";
import { compareText, countBy } from "./group.js";

/**
 * Count incidents per (year, region), one frame per year.
 *
 * Frames are zero-filled: every observed year lists every region observed
 * anywhere in the rows, so consecutive frames share the same categories.
 * Ordered by year, then region.
 */
export function computeYearlyByRegion(rows: readonly IncidentRecord[]): YearlyRegionRow[] {
  const counts = new Map<string, number>();
  for (const { key, value } of countBy(rows, (r) => [r.year, r.region] as const)) {
    counts.set(JSON.stringify(key), value);
  }

  const years = [...new Set(rows.map((r) => r.year))].sort((a, b) => a - b);
  const regions = [...new Set(rows.map((r) => r.region))].sort(compareText);

  const frames: YearlyRegionRow[] = [];
  for (const year of years) {
    for (const region of regions) {
      frames.push({
        year,
        region,
        incident_count: counts.get(JSON.stringify([year, region])) ?? 0,
      });
    }
  }
  return frames;
}
