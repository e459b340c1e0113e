import type { IncidentRecord, IncidentTable } from "../shared/types.js";

/**
 * Build the read-only snapshot every pipeline run receives.
 * Rows are copied and frozen; the caller's array is left untouched.
 */
export function createIncidentTable(
  records: readonly IncidentRecord[],
  source: { fileName: string; sha256: string }
): IncidentTable {
  const rows = Object.freeze(records.map((r) => Object.freeze({ ...r })));
  return Object.freeze({ rows, fileName: source.fileName, sha256: source.sha256 });
}

/** Distinct region values, sorted, for populating a region selector. */
export function listRegions(table: IncidentTable): string[] {
  return [...new Set(table.rows.map((r) => r.region))].sort();
}
