import { describe, it, expect } from "vitest";
import { IncidentRecordSchema } from "../src/incidents/schema.js";
import { mapRowColumns, normalizeHeader } from "../src/incidents/columns.js";
import {
  IncidentLoadError,
  loadIncidentTable,
  loadIncidentTableFromFile,
} from "../src/incidents/load.js";
import { listRegions } from "../src/incidents/table.js";
import { computeViews } from "../src/analytics/views.js";
import { sha256 } from "../src/shared/hash.js";

const HEADER =
  "Incident ID,date,Country,Region,Means of attack,Attack context,Actor type,total_casualties,Total affected";

function csv(...lines: string[]): Buffer {
  return Buffer.from([HEADER, ...lines].join("\n"));
}

describe("Column mapping", () => {
  it("normalises headers", () => {
    expect(normalizeHeader("Means of attack")).toBe("means_of_attack");
    expect(normalizeHeader(" Incident ID ")).toBe("incident_id");
  });

  it("maps export headers to canonical fields and drops unknown ones", () => {
    expect(
      mapRowColumns({ "Incident ID": "X-1", "Actor type": "Criminal", Notes: "ignored" })
    ).toEqual({ id: "X-1", actor_type: "Criminal" });
  });
});

describe("Schema Validation — Incidents", () => {
  const base = {
    id: "X-1",
    date: "2023-05-17",
    country: "Italy",
    region: "Europe",
    actor_type: "Unknown",
    total_casualties: "3",
    total_affected: "4",
  };

  it("coerces counts and derives the year", () => {
    const result = IncidentRecordSchema.safeParse(base);
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.total_casualties).toBe(3);
      expect(result.data.total_affected).toBe(4);
      expect(result.data.date.toISOString()).toBe("2023-05-17T00:00:00.000Z");
      expect(result.data.year).toBe(2023);
    }
  });

  it("ignores a trailing time part", () => {
    const result = IncidentRecordSchema.safeParse({ ...base, date: "2023-05-17 14:30:00" });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.date.toISOString()).toBe("2023-05-17T00:00:00.000Z");
    }
  });

  it("substitutes Unknown for a blank region", () => {
    const result = IncidentRecordSchema.safeParse({ ...base, region: "" });
    expect(result.success && result.data.region).toBe("Unknown");
    const missing = IncidentRecordSchema.safeParse({ ...base, region: undefined });
    expect(missing.success && missing.data.region).toBe("Unknown");
  });

  it("leaves blank optional categories absent", () => {
    const result = IncidentRecordSchema.safeParse({ ...base, means_of_attack: "", attack_context: "Raid" });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data).not.toHaveProperty("means_of_attack");
      expect(result.data.attack_context).toBe("Raid");
    }
  });

  it("rejects negative or fractional counts", () => {
    expect(IncidentRecordSchema.safeParse({ ...base, total_casualties: "-1" }).success).toBe(false);
    expect(IncidentRecordSchema.safeParse({ ...base, total_affected: "2.5" }).success).toBe(false);
  });

  it("keeps two-digit years as written", () => {
    const result = IncidentRecordSchema.safeParse({ ...base, date: "0050-03-01" });
    expect(result.success).toBe(true);
    if (result.success) {
      expect(result.data.year).toBe(50);
      expect(result.data.date.toISOString()).toBe("0050-03-01T00:00:00.000Z");
    }
  });

  it("rejects unparseable and impossible dates", () => {
    expect(IncidentRecordSchema.safeParse({ ...base, date: "17/05/2023" }).success).toBe(false);
    expect(IncidentRecordSchema.safeParse({ ...base, date: "2023-02-30" }).success).toBe(false);
  });

  it("requires country and actor_type", () => {
    const { country: _country, ...noCountry } = base;
    expect(IncidentRecordSchema.safeParse(noCountry).success).toBe(false);
    expect(IncidentRecordSchema.safeParse({ ...base, actor_type: " " }).success).toBe(false);
  });
});

describe("loadIncidentTable", () => {
  it("loads a CSV export with its human-readable headers", () => {
    const buffer = csv("X-1,2023-05-17,Italy,,Shooting,Ambush,Unknown,3,4");
    const table = loadIncidentTable(buffer, "incidents.csv");

    expect(table.fileName).toBe("incidents.csv");
    expect(table.sha256).toBe(sha256(buffer));
    expect(table.rows).toHaveLength(1);
    expect(table.rows[0]).toEqual({
      id: "X-1",
      date: new Date(Date.UTC(2023, 4, 17)),
      year: 2023,
      country: "Italy",
      region: "Unknown",
      means_of_attack: "Shooting",
      attack_context: "Ambush",
      actor_type: "Unknown",
      total_casualties: 3,
      total_affected: 4,
    });
  });

  it("loads a JSON array of rows", () => {
    const buffer = Buffer.from(
      JSON.stringify([
        {
          id: "J-1",
          date: "2021-12-31",
          country: "Chad",
          region: "Sahel",
          actor_type: "Unknown",
          total_casualties: 0,
          total_affected: 1,
        },
      ])
    );
    const table = loadIncidentTable(buffer, "incidents.json");
    expect(table.rows.map((r) => [r.id, r.year, r.region])).toEqual([["J-1", 2021, "Sahel"]]);
  });

  it("treats null optional fields in JSON as absent", () => {
    const buffer = Buffer.from(
      JSON.stringify([
        {
          id: "J-2",
          date: "2022-07-04",
          country: "Chad",
          region: null,
          means_of_attack: null,
          attack_context: "Raid",
          actor_type: "Unknown",
          total_casualties: 1,
          total_affected: 1,
        },
      ])
    );
    const table = loadIncidentTable(buffer, "nulls.json");
    expect(table.rows).toHaveLength(1);
    expect(table.rows[0].region).toBe("Unknown");
    expect(table.rows[0]).not.toHaveProperty("means_of_attack");
    expect(table.rows[0].attack_context).toBe("Raid");
    expect(computeViews(table).attack_taxonomy).toEqual([]);
  });

  it("fails the whole load when any row is invalid", () => {
    const buffer = csv(
      "X-1,2023-05-17,Italy,Europe,,,Unknown,3,4",
      "X-2,2023-05-18,Italy,Europe,,,Unknown,-1,4"
    );
    let caught: unknown;
    try {
      loadIncidentTable(buffer, "bad.csv");
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(IncidentLoadError);
    if (caught instanceof IncidentLoadError) {
      expect(caught.message).toBe("bad.csv: 1 of 2 rows failed validation");
      expect(caught.errors).toHaveLength(1);
      expect(caught.errors[0].index).toBe(1);
      expect(caught.errors[0].issues[0]).toMatch(/^total_casualties: /);
    }
  });

  it("rejects JSON that is not an array of rows", () => {
    expect(() => loadIncidentTable(Buffer.from('{"id":"J-1"}'), "one.json")).toThrow(
      "one.json: expected a JSON array of row objects"
    );
  });

  it("reports a missing file as a load error", () => {
    expect(() => loadIncidentTableFromFile("data/does-not-exist.csv")).toThrow(IncidentLoadError);
  });
});

describe("Sample dataset", () => {
  const table = loadIncidentTableFromFile("data/sample_incidents.csv");

  it("loads every row", () => {
    expect(table.fileName).toBe("sample_incidents.csv");
    expect(table.rows).toHaveLength(12);
  });

  it("lists regions sorted, including the Unknown fill", () => {
    expect(listRegions(table)).toEqual(["East Africa", "Middle East", "Sahel", "Unknown"]);
  });

  it("breaks the three-way tie for top country alphabetically", () => {
    const views = computeViews(table);
    expect(views.geographic_count.slice(0, 3)).toEqual([
      { country: "Kenya", count: 3 },
      { country: "Mali", count: 3 },
      { country: "Syria", count: 3 },
    ]);
    expect(views.top_country_insight).toBe("Kenya");
  });

  it("excludes rows missing a taxonomy field", () => {
    const views = computeViews(table);
    const total = views.attack_taxonomy.reduce((s, r) => s + r.count, 0);
    expect(total).toBe(10);
  });
});
