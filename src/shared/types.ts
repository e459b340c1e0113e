/** Region assigned to rows whose source value is blank */
export const UNKNOWN_REGION = "Unknown";

/** One security incident, as validated at load time. Never mutated after load. */
export interface IncidentRecord {
  id: string;
  date: Date;
  year: number;
  country: string;
  region: string;
  means_of_attack?: string;
  attack_context?: string;
  actor_type: string;
  total_casualties: number;
  total_affected: number;
}

/** An incident labelled with its casualty bucket */
export interface BucketedRecord extends IncidentRecord {
  casualty_range: string;
}

/** The loaded dataset snapshot shared (read-only) by every pipeline run */
export interface IncidentTable {
  readonly rows: readonly IncidentRecord[];
  readonly fileName: string;
  readonly sha256: string;
}

/** A labelled casualty interval: (low, high], the first one also includes low */
export interface CasualtyBucket {
  low: number;
  high: number;
  label: string;
}

// ── Aggregate rows ──────────────────────────────────────────────────

export interface CasualtyDistributionRow {
  casualty_range: string;
  region: string;
  count: number;
}

export interface AttackTaxonomyRow {
  means_of_attack: string;
  attack_context: string;
  count: number;
}

export interface GeographicCountRow {
  country: string;
  count: number;
}

export interface MonthlyTrendPoint {
  month: string; // YYYY-MM-01
  incident_count: number;
  casualty_sum: number;
}

export interface YearlyRegionRow {
  year: number;
  region: string;
  incident_count: number;
}

export interface ActorProfileRow {
  actor_type: string;
  incident_count: number;
  total_affected: number;
}

/** Everything the rendering layer needs for one region selection */
export interface ViewBundle {
  region: string | null;
  row_count: number;
  casualty_buckets: CasualtyBucket[];
  casualty_distribution: CasualtyDistributionRow[];
  attack_taxonomy: AttackTaxonomyRow[];
  geographic_count: GeographicCountRow[];
  monthly_trend: MonthlyTrendPoint[];
  yearly_by_region: YearlyRegionRow[];
  actor_profile: ActorProfileRow[];
  top_country_insight: string | null;
  narration: string | null;
}
