import path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod";

/**
 * Environment configuration for ephemeris runs.
 *
 * Callers that want a .env file loaded import "dotenv/config" first.
 */

const __dirname = path.dirname(fileURLToPath(import.meta.url));

export const DEFAULT_EPHE_PATH = path.resolve(__dirname, "../ephemeris/ephe");

const numberFromEnv = (fallback: number) =>
  z
    .string()
    .trim()
    .optional()
    .transform((raw, ctx) => {
      if (raw === undefined || raw === "") return fallback;
      const value = Number(raw);
      if (!Number.isFinite(value)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `not a number: "${raw}"` });
        return z.NEVER;
      }
      return value;
    });

const EnvSchema = z.object({
  EPHE_PATH: z.string().trim().min(1).optional(),
  EPHEMERIS_BACKEND: z.enum(["swiss", "moshier"]).default("swiss"),
  EPHEMERIS_OUTPUT_DIR: z.string().trim().min(1).default("output"),
  EPHEMERIS_TZ_OFFSET: numberFromEnv(7),
  EPHEMERIS_ORB: numberFromEnv(1),
  EPHEMERIS_STEP_MINUTES: numberFromEnv(15),
  EPHEMERIS_RETROGRADE_METHOD: z.enum(["speed", "probe"]).default("speed"),
});

export interface EphemerisConfig {
  ephePath: string;
  backend: "swiss" | "moshier";
  outputDir: string;
  timezoneOffset: number;
  orb: number;
  stepMinutes: number;
  retrogradeMethod: "speed" | "probe";
}

export function loadConfig(
  env: Record<string, string | undefined> = process.env
): EphemerisConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new Error(`Invalid ephemeris configuration: ${issues}`);
  }

  const e = parsed.data;
  return {
    ephePath: e.EPHE_PATH ? path.resolve(e.EPHE_PATH) : DEFAULT_EPHE_PATH,
    backend: e.EPHEMERIS_BACKEND,
    outputDir: e.EPHEMERIS_OUTPUT_DIR,
    timezoneOffset: e.EPHEMERIS_TZ_OFFSET,
    orb: e.EPHEMERIS_ORB,
    stepMinutes: e.EPHEMERIS_STEP_MINUTES,
    retrogradeMethod: e.EPHEMERIS_RETROGRADE_METHOD,
  };
}
