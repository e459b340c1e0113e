/**
 * View pipeline.
 *
 * One call per region selection: filter the snapshot, then derive every
 * view from the filtered rows. Each branch reads the same rows and builds
 * its own output; nothing is cached between calls, so casualty buckets
 * always reflect the current selection.
 */

import type { IncidentTable, ViewBundle } from "../shared/types.js";
import { computeActorProfile } from "./actors.js";
import { assignCasualtyRanges, computeCasualtyDistribution } from "./casualty_bins.js";
import { computeGeographicCount } from "./geography.js";
import { extractTopCountry, formatTopCountryInsight } from "./insight.js";
import { filterByRegion } from "./region_filter.js";
import { computeAttackTaxonomy } from "./taxonomy.js";
import { computeMonthlyTrend } from "./trend.js";
import { computeYearlyByRegion } from "./yearly.js";

export function computeViews(table: IncidentTable, region?: string | null): ViewBundle {
  const rows = filterByRegion(table.rows, region);

  const { buckets, records } = assignCasualtyRanges(rows);
  const geographic_count = computeGeographicCount(rows);
  const top_country_insight = extractTopCountry(geographic_count);

  return {
    region: region ? region : null,
    row_count: rows.length,
    casualty_buckets: buckets,
    casualty_distribution: computeCasualtyDistribution(records, buckets),
    attack_taxonomy: computeAttackTaxonomy(rows),
    geographic_count,
    monthly_trend: computeMonthlyTrend(rows),
    yearly_by_region: computeYearlyByRegion(rows),
    actor_profile: computeActorProfile(rows),
    top_country_insight,
    narration: formatTopCountryInsight(top_country_insight),
  };
}
