import { readFileSync } from "fs";
import path from "path";
import { parse } from "csv-parse/sync";
import { sha256 } from "../shared/hash.js";
import type { IncidentTable } from "../shared/types.js";
import { buildReverseSynonymMap, mapRowColumns } from "./columns.js";
import { IncidentRecordSchema, validateRecords, type RowError } from "./schema.js";
import { createIncidentTable } from "./table.js";

/** Raised when the source table cannot be turned into a valid snapshot. */
export class IncidentLoadError extends Error {
  constructor(
    message: string,
    readonly fileName: string,
    readonly errors: RowError[] = []
  ) {
    super(message);
    this.name = "IncidentLoadError";
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function isPlainRow(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function parseRawRows(content: string, fileName: string): Record<string, unknown>[] {
  if (fileName.endsWith(".json")) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      throw new IncidentLoadError(`${fileName}: ${errorMessage(err)}`, fileName);
    }
    if (!Array.isArray(parsed) || !parsed.every(isPlainRow)) {
      throw new IncidentLoadError(`${fileName}: expected a JSON array of row objects`, fileName);
    }
    return parsed;
  }

  try {
    const rows: unknown[] = parse(content, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      bom: true,
    });
    return rows.filter(isPlainRow);
  } catch (err) {
    throw new IncidentLoadError(`${fileName}: ${errorMessage(err)}`, fileName);
  }
}

/**
 * Parse, map and validate an incident export (CSV, or JSON array).
 * Any invalid row fails the whole load: the pipeline only ever sees
 * a fully validated table.
 */
export function loadIncidentTable(fileBuffer: Buffer, fileName: string): IncidentTable {
  const fingerprint = sha256(fileBuffer);
  const rawRows = parseRawRows(fileBuffer.toString("utf-8"), fileName);

  const reverseMap = buildReverseSynonymMap();
  const mapped = rawRows.map((row) => mapRowColumns(row, reverseMap));
  const { valid, errors } = validateRecords(mapped, IncidentRecordSchema);

  if (errors.length > 0) {
    throw new IncidentLoadError(
      `${fileName}: ${errors.length} of ${rawRows.length} rows failed validation`,
      fileName,
      errors
    );
  }

  return createIncidentTable(valid, { fileName, sha256: fingerprint });
}

/** Read a file from disk and load it. */
export function loadIncidentTableFromFile(filePath: string): IncidentTable {
  const resolved = path.resolve(filePath);
  let buffer: Buffer;
  try {
    buffer = readFileSync(resolved);
  } catch (err) {
    throw new IncidentLoadError(
      `Cannot read ${resolved}: ${errorMessage(err)}`,
      path.basename(resolved)
    );
  }
  return loadIncidentTable(buffer, path.basename(resolved));
}
