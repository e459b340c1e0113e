/**
 * Inclusion predicates, one per aggregate that excludes rows.
 *
 * Aggregates that use every filtered row (geographic count, monthly trend,
 * yearly-by-region, actor profile) have no predicate here.
 */

import type { IncidentRecord } from "../shared/types.js";

export type TaxonomyRecord = IncidentRecord & {
  means_of_attack: string;
  attack_context: string;
};

/** Casualty distribution: only rows with at least one casualty are bucketed. */
export function hasCasualties(row: IncidentRecord): boolean {
  return row.total_casualties > 0;
}

/** Attack taxonomy: both categorical fields must be present. */
export function hasAttackTaxonomy(row: IncidentRecord): row is TaxonomyRecord {
  return row.means_of_attack !== undefined && row.attack_context !== undefined;
}
