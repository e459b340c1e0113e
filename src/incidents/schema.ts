import { z } from "zod";
import { UNKNOWN_REGION, type IncidentRecord } from "../shared/types.js";

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})(?:[T ][0-9:.]+Z?)?$/;

/** null and blank strings count as missing. */
const blankToUndefined = (v: unknown) =>
  v == null || (typeof v === "string" && v.trim() === "") ? undefined : v;

const requiredText = z.preprocess(
  (v) => (typeof v === "number" ? String(v) : v),
  z.string().trim().min(1)
);

const optionalText = z.preprocess(blankToUndefined, z.string().trim().min(1).optional());

const count = z.preprocess(
  (v) => (typeof v === "string" && v.trim() !== "" ? Number(v) : v),
  z.number().int().nonnegative()
);

/** Calendar date (optional time part ignored) → UTC midnight. */
const incidentDate = z
  .string()
  .trim()
  .regex(DATE_PATTERN, "Expected YYYY-MM-DD")
  .transform((value, ctx) => {
    const [, y, m, d] = DATE_PATTERN.exec(value) ?? [];
    // years 0–99 stay as written
    const date = new Date(0);
    date.setUTCFullYear(Number(y), Number(m) - 1, Number(d));
    if (
      date.getUTCFullYear() !== Number(y) ||
      date.getUTCMonth() !== Number(m) - 1 ||
      date.getUTCDate() !== Number(d)
    ) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Invalid calendar date: ${value}` });
      return z.NEVER;
    }
    return date;
  });

// ── Canonical Incident Record ──────────────────────────────────────
export const IncidentRecordSchema = z
  .object({
    id: requiredText,
    date: incidentDate,
    country: requiredText,
    region: z.preprocess(
      (v) => blankToUndefined(v) ?? UNKNOWN_REGION,
      z.string().trim().min(1)
    ),
    means_of_attack: optionalText,
    attack_context: optionalText,
    actor_type: requiredText,
    total_casualties: count,
    total_affected: count,
  })
  .transform((row): IncidentRecord => {
    const record: IncidentRecord = {
      id: row.id,
      date: row.date,
      year: row.date.getUTCFullYear(),
      country: row.country,
      region: row.region,
      actor_type: row.actor_type,
      total_casualties: row.total_casualties,
      total_affected: row.total_affected,
    };
    if (row.means_of_attack !== undefined) record.means_of_attack = row.means_of_attack;
    if (row.attack_context !== undefined) record.attack_context = row.attack_context;
    return record;
  });

export interface RowError {
  index: number;
  issues: string[];
}

/**
 * Validate an array of records against a schema.
 * Returns validated records and errors.
 */
export function validateRecords<T>(
  records: unknown[],
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): { valid: T[]; errors: RowError[] } {
  const valid: T[] = [];
  const errors: RowError[] = [];

  for (let i = 0; i < records.length; i++) {
    const result = schema.safeParse(records[i]);
    if (result.success) {
      valid.push(result.data);
    } else {
      errors.push({
        index: i,
        issues: result.error.issues.map(
          (issue) => `${issue.path.join(".")}: ${issue.message}`
        ),
      });
    }
  }

  return { valid, errors };
}
