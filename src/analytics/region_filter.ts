import type { IncidentRecord } from "../shared/types.js";

/**
 * Narrow rows to a single region. A missing or empty selection means
 * "no filter" and returns the input as-is; an unknown region yields [].
 */
export function filterByRegion(
  rows: readonly IncidentRecord[],
  region?: string | null
): readonly IncidentRecord[] {
  if (!region) return rows;
  return rows.filter((r) => r.region === region);
}
