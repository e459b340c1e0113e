import type {
  BucketedRecord,
  CasualtyBucket,
  CasualtyDistributionRow,
  IncidentRecord,
} from "../shared/types.js";
import { compareText, countBy } from "./group.js";
import { hasCasualties } from "./predicates.js";

/** Fixed ascending boundary ladder; truncated to the observed maximum. */
export const CASUALTY_BOUNDARIES = [0, 1, 5, 10, 20, 50, 100, 200, 500, 1000] as const;

/** One label per boundary pair, plus the open-ended top bucket. */
export const CASUALTY_LABELS = [
  "1",
  "2–5",
  "6–10",
  "11–20",
  "21–50",
  "51–100",
  "101–200",
  "201–500",
  "501–1000",
  "1000+",
] as const;

/**
 * Compute casualty buckets for the given values.
 *
 * Boundaries are the ladder entries ≤ max; when the last kept boundary is
 * still below max, max + 1 closes the range. Each adjacent pair becomes a
 * bucket, labelled in ladder order. Non-positive values are ignored; with
 * no positive values there are no buckets.
 */
export function computeCasualtyBuckets(values: readonly number[]): CasualtyBucket[] {
  const positive = values.filter((v) => v > 0);
  if (positive.length === 0) return [];

  const maxCas = positive.reduce((max, v) => (v > max ? v : max), 0);
  const boundaries: number[] = CASUALTY_BOUNDARIES.filter((b) => b <= maxCas);
  if (boundaries[boundaries.length - 1] < maxCas) {
    boundaries.push(maxCas + 1);
  }

  const buckets: CasualtyBucket[] = [];
  for (let i = 0; i < boundaries.length - 1; i++) {
    buckets.push({
      low: boundaries[i],
      high: boundaries[i + 1],
      label: CASUALTY_LABELS[i],
    });
  }
  return buckets;
}

/**
 * Find the bucket a value falls into: (low, high], with the first
 * bucket also closed on the left.
 */
export function findBucket(
  value: number,
  buckets: readonly CasualtyBucket[]
): CasualtyBucket | undefined {
  return buckets.find(
    (b, i) => (value > b.low || (i === 0 && value === b.low)) && value <= b.high
  );
}

/**
 * Label every row with at least one casualty. Zero-casualty rows are
 * dropped, as is any row that lands outside every bucket.
 */
export function assignCasualtyRanges(rows: readonly IncidentRecord[]): {
  buckets: CasualtyBucket[];
  records: BucketedRecord[];
} {
  const withCasualties = rows.filter(hasCasualties);
  const buckets = computeCasualtyBuckets(withCasualties.map((r) => r.total_casualties));

  const records: BucketedRecord[] = [];
  for (const row of withCasualties) {
    const bucket = findBucket(row.total_casualties, buckets);
    if (bucket) {
      records.push({ ...row, casualty_range: bucket.label });
    }
  }
  return { buckets, records };
}

/**
 * Count bucketed rows per (casualty_range, region), ordered by bucket
 * then region. Empty when no row has casualties.
 */
export function computeCasualtyDistribution(
  records: readonly BucketedRecord[],
  buckets: readonly CasualtyBucket[]
): CasualtyDistributionRow[] {
  const order = new Map<string, number>(buckets.map((b, i) => [b.label, i]));
  return countBy(records, (r) => [r.casualty_range, r.region] as const)
    .map(({ key: [casualty_range, region], value }) => ({
      casualty_range,
      region,
      count: value,
    }))
    .sort(
      (a, b) =>
        (order.get(a.casualty_range) ?? 0) - (order.get(b.casualty_range) ?? 0) ||
        compareText(a.region, b.region)
    );
}
