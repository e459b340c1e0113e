import type { GeographicCountRow, IncidentRecord } from "../shared/types.js";
import { compareText, countBy } from "./group.js";

/**
 * Count incidents per country, most incidents first; equal counts are
 * ordered by country name.
 */
export function computeGeographicCount(rows: readonly IncidentRecord[]): GeographicCountRow[] {
  return countBy(rows, (r) => [r.country] as const)
    .map(({ key: [country], value }) => ({ country, count: value }))
    .sort((a, b) => b.count - a.count || compareText(a.country, b.country));
}
