import type { AttackTaxonomyRow, IncidentRecord } from "../shared/types.js";
import { compareText, countBy } from "./group.js";
import { hasAttackTaxonomy } from "./predicates.js";

/**
 * Count incidents per (means_of_attack, attack_context). Rows missing
 * either field are left out.
 */
export function computeAttackTaxonomy(rows: readonly IncidentRecord[]): AttackTaxonomyRow[] {
  return countBy(rows.filter(hasAttackTaxonomy), (r) => [r.means_of_attack, r.attack_context] as const)
    .map(({ key: [means_of_attack, attack_context], value }) => ({
      means_of_attack,
      attack_context,
      count: value,
    }))
    .sort(
      (a, b) =>
        compareText(a.means_of_attack, b.means_of_attack) ||
        compareText(a.attack_context, b.attack_context)
    );
}
