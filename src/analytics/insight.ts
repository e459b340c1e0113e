import type { GeographicCountRow } from "../shared/types.js";
import { compareText } from "./group.js";

/**
 * Country with the most incidents. Ties go to the alphabetically first
 * country, whatever order the aggregate arrives in. Null when empty.
 */
export function extractTopCountry(geo: readonly GeographicCountRow[]): string | null {
  let top: GeographicCountRow | null = null;
  for (const row of geo) {
    if (
      top === null ||
      row.count > top.count ||
      (row.count === top.count && compareText(row.country, top.country) < 0)
    ) {
      top = row;
    }
  }
  return top ? top.country : null;
}

/** Narration line for the dashboard header; null suppresses it. */
export function formatTopCountryInsight(country: string | null): string | null {
  if (country === null) return null;
  return `${country} currently ranks highest in reported incidents.`;
}
