/**
 * Runtime configuration.
 *
 * Values come from the environment (optionally via a .env file loaded by
 * the entry points) and may be overridden by CLI flags.
 */

import { z } from "zod";

export const DEFAULT_INCIDENTS_PATH = "data/sample_incidents.csv";

const ConfigSchema = z.object({
  PORT: z.preprocess(
    (v) => (typeof v === "string" && v.trim() !== "" ? Number(v) : undefined),
    z.number().int().min(0).max(65535).default(3000)
  ),
  INCIDENTS_PATH: z.preprocess(
    (v) => (typeof v === "string" && v.trim() !== "" ? v.trim() : undefined),
    z.string().default(DEFAULT_INCIDENTS_PATH)
  ),
});

export interface AppConfig {
  port: number;
  incidentsPath: string;
}

/**
 * Parse configuration from an environment map.
 * CLI overrides take priority over environment variables.
 * Throws when a value is present but invalid (e.g. PORT=abc).
 */
export function parseConfig(
  env: Record<string, string | undefined>,
  overrides: Partial<AppConfig> = {}
): AppConfig {
  const result = ConfigSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`
    );
    throw new Error(`Invalid configuration: ${issues.join("; ")}`);
  }

  return {
    port: overrides.port ?? result.data.PORT,
    incidentsPath: overrides.incidentsPath ?? result.data.INCIDENTS_PATH,
  };
}
