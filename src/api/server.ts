import "dotenv/config";
import path from "path";
import type { Server } from "http";
import { fileURLToPath } from "url";
import express from "express";
import { computeViews } from "../analytics/views.js";
import { listRegions } from "../incidents/table.js";
import { loadIncidentTableFromFile } from "../incidents/load.js";
import { etagFor } from "../shared/hash.js";
import { parseConfig, type AppConfig } from "../shared/config.js";
import type { IncidentTable } from "../shared/types.js";

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Build the JSON API around one loaded snapshot. The table is passed in
 * and only ever read.
 */
export function createApp(table: IncidentTable) {
  const app = express();

  // ── GET /v1/health ──────────────────────────────────────────────
  app.get("/v1/health", (_req, res) => {
    res.json({ status: "ok", rows: table.rows.length, sha256: table.sha256 });
  });

  // ── GET /v1/regions ─────────────────────────────────────────────
  app.get("/v1/regions", (_req, res) => {
    res.json({ regions: listRegions(table) });
  });

  // ── GET /v1/views?region=R ──────────────────────────────────────
  app.get("/v1/views", (req, res) => {
    try {
      const { region: rawRegion } = req.query;
      if (rawRegion !== undefined && typeof rawRegion !== "string") {
        return res.status(400).json({ error: "region must be a single value" });
      }
      const region = rawRegion ?? null;
      const bundle = computeViews(table, region);

      // express answers 304 itself when If-None-Match matches this tag
      res.setHeader("ETag", etagFor(bundle));
      res.json(bundle);
    } catch (err) {
      res.status(500).json({ error: errorMessage(err) });
    }
  });

  return app;
}

/** Load the snapshot once, then serve it until the process exits. */
export function startServer(config: AppConfig): Server {
  const table = loadIncidentTableFromFile(config.incidentsPath);
  console.log(
    `[load] ${table.fileName}: ${table.rows.length} incidents (sha256 ${table.sha256.slice(0, 12)})`
  );

  const app = createApp(table);
  return app.listen(config.port, () => {
    console.log(`[api] Risk map views running on port ${config.port}`);
  });
}

// Start if run directly
if (
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))
) {
  try {
    startServer(parseConfig(process.env));
  } catch (err) {
    console.error(`[api] ${errorMessage(err)}`);
    process.exit(1);
  }
}
