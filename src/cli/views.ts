#!/usr/bin/env tsx
/**
 * CLI: views
 *
 * Usage: npm run views -- [--data <file>] [--region <name>] [--out <file>]
 *
 * Loads an incident export, computes every view for the selected region
 * (all regions when omitted) and prints the bundle as JSON, or writes it
 * to --out.
 */

import "dotenv/config";
import { mkdirSync, writeFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { computeViews } from "../analytics/views.js";
import { IncidentLoadError, loadIncidentTableFromFile } from "../incidents/load.js";
import { parseConfig } from "../shared/config.js";

export interface ViewsCliArgs {
  data?: string;
  region?: string;
  out?: string;
}

export function parseArgs(args: string[]): ViewsCliArgs {
  const parsed: ViewsCliArgs = {};
  for (let i = 0; i < args.length; i++) {
    if (args[i] === "--data" && i + 1 < args.length) {
      parsed.data = args[i + 1];
      i++;
    } else if (args[i] === "--region" && i + 1 < args.length) {
      parsed.region = args[i + 1];
      i++;
    } else if (args[i] === "--out" && i + 1 < args.length) {
      parsed.out = args[i + 1];
      i++;
    } else {
      throw new Error(`Unknown argument: ${args[i]}`);
    }
  }
  return parsed;
}

function main(): number {
  let args: ViewsCliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    console.error("Usage: npm run views -- [--data <file>] [--region <name>] [--out <file>]");
    return 1;
  }

  try {
    const config = parseConfig(process.env, { incidentsPath: args.data });
    const table = loadIncidentTableFromFile(config.incidentsPath);
    const bundle = computeViews(table, args.region);
    const json = JSON.stringify(bundle, null, 2);

    if (args.out) {
      const outPath = path.resolve(args.out);
      mkdirSync(path.dirname(outPath), { recursive: true });
      writeFileSync(outPath, json + "\n");
      console.log(`[views] ${bundle.row_count} incidents → ${outPath}`);
    } else {
      console.log(json);
    }
    return 0;
  } catch (err) {
    if (err instanceof IncidentLoadError) {
      console.error(`[load] ${err.message}`);
      for (const rowError of err.errors) {
        console.error(`  row ${rowError.index + 1}: ${rowError.issues.join("; ")}`);
      }
    } else {
      console.error(`[views] ${err instanceof Error ? err.message : String(err)}`);
    }
    return 1;
  }
}

// ── CLI entry point ──────────────────────────────────────────────────
if (
  process.argv[1] &&
  path.resolve(process.argv[1]) === path.resolve(fileURLToPath(import.meta.url))
) {
  process.exit(main());
}
