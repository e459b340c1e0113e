import { createIncidentTable } from "../src/incidents/table.js";
import type { IncidentRecord, IncidentTable } from "../src/shared/types.js";

type IncidentOverrides = Partial<Omit<IncidentRecord, "date" | "year">> & { date?: string };

let seq = 0;

/** Build a validated-looking incident; date is YYYY-MM-DD. */
export function incident(overrides: IncidentOverrides = {}): IncidentRecord {
  const { date = "2023-01-15", ...rest } = overrides;
  const [y, m, d] = date.split("-").map(Number);
  const parsed = new Date(Date.UTC(y, m - 1, d));
  seq++;
  return {
    id: `INC-${seq}`,
    country: "Italy",
    region: "Europe",
    actor_type: "Unknown",
    total_casualties: 0,
    total_affected: 0,
    ...rest,
    date: parsed,
    year: parsed.getUTCFullYear(),
  };
}

export function tableOf(rows: IncidentRecord[]): IncidentTable {
  return createIncidentTable(rows, { fileName: "test.csv", sha256: "test-sha" });
}
