/**
 * Column Name Synonym Dictionary
 *
 * Maps the header spellings seen in incident exports to canonical field
 * names. Headers are normalised before lookup, so "Means of attack" and
 * "means_of_attack" resolve the same way.
 */

/** Synonyms grouped by canonical column name. */
export const COLUMN_SYNONYMS: Record<string, string[]> = {
  id: ["incident_id", "incident_number", "incident_no", "incident_ref"],
  date: ["incident_date", "event_date", "date_of_incident", "occurrence_date"],

  // ── Geography ──────────────────────────────────────────────────────
  country: ["country_name", "nation"],
  region: ["geographic_region", "territory", "area"],

  // ── Attack taxonomy ────────────────────────────────────────────────
  means_of_attack: ["attack_means", "attack_method", "weapon"],
  attack_context: ["context", "context_of_attack"],
  actor_type: ["actor", "perpetrator_type", "attacker_type"],

  // ── Counts ─────────────────────────────────────────────────────────
  total_casualties: ["casualties", "total_casualty"],
  total_affected: ["affected", "people_affected"],
};

/** Normalize a column name for comparison: lowercase, non-alphanumerics to "_". */
export function normalizeHeader(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]/g, "_")
    .replace(/_+/g, "_")
    .replace(/^_|_$/g, "");
}

/**
 * Build a reverse lookup: normalised alternative name → canonical name.
 */
export function buildReverseSynonymMap(): Map<string, string> {
  const reverseMap = new Map<string, string>();
  for (const [canonical, synonyms] of Object.entries(COLUMN_SYNONYMS)) {
    reverseMap.set(canonical, canonical);
    for (const synonym of synonyms) {
      reverseMap.set(normalizeHeader(synonym), canonical);
    }
  }
  return reverseMap;
}

/**
 * Rename a raw row's keys to canonical names. Unknown columns are dropped;
 * when two headers map to the same field the first non-empty value wins.
 */
export function mapRowColumns(
  raw: Record<string, unknown>,
  reverseMap: Map<string, string> = buildReverseSynonymMap()
): Record<string, unknown> {
  const mapped: Record<string, unknown> = {};
  for (const [header, value] of Object.entries(raw)) {
    const canonical = reverseMap.get(normalizeHeader(header));
    if (!canonical) continue;
    const existing = mapped[canonical];
    if (existing === undefined || existing === "") {
      mapped[canonical] = value;
    }
  }
  return mapped;
}
