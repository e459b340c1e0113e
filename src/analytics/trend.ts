import type { IncidentRecord, MonthlyTrendPoint } from "../shared/types.js";
import { compareText, groupAndFold } from "./group.js";

/** First day of the incident's month, as YYYY-MM-01. */
export function monthKey(date: Date): string {
  const year = String(date.getUTCFullYear()).padStart(4, "0");
  const month = String(date.getUTCMonth() + 1).padStart(2, "0");
  return `${year}-${month}-01`;
}

/**
 * Build the monthly time series: incident count and casualty sum per
 * calendar month, in chronological order. Months with no incidents are
 * not emitted.
 */
export function computeMonthlyTrend(rows: readonly IncidentRecord[]): MonthlyTrendPoint[] {
  return groupAndFold(
    rows,
    (r) => [monthKey(r.date)] as const,
    () => ({ incident_count: 0, casualty_sum: 0 }),
    (acc, r) => ({
      incident_count: acc.incident_count + 1,
      casualty_sum: acc.casualty_sum + r.total_casualties,
    })
  )
    .map(({ key: [month], value }) => ({ month, ...value }))
    .sort((a, b) => compareText(a.month, b.month));
}
