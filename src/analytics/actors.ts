import type { ActorProfileRow, IncidentRecord } from "../shared/types.js";
import { compareText, groupAndFold } from "./group.js";

/**
 * Per actor type: incident volume and total people affected.
 */
export function computeActorProfile(rows: readonly IncidentRecord[]): ActorProfileRow[] {
  return groupAndFold(
    rows,
    (r) => [r.actor_type] as const,
    () => ({ incident_count: 0, total_affected: 0 }),
    (acc, r) => ({
      incident_count: acc.incident_count + 1,
      total_affected: acc.total_affected + r.total_affected,
    })
  )
    .map(({ key: [actor_type], value }) => ({ actor_type, ...value }))
    .sort((a, b) => compareText(a.actor_type, b.actor_type));
}
