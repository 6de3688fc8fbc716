import { z } from "zod";
import { PLANET_ORDER, SIGN_NAMES } from "../planets.js";

/**
 * Zod schemas for run parameters and event records.
 *
 * Event records are flat so they serialize to CSV columns as-is; the leading
 * `datetime` is the local instant string (YYYY-MM-DD HH:MM:SS).
 */

const PlanetIdSchema = z.enum(PLANET_ORDER);
const SignNameSchema = z.enum(SIGN_NAMES);

const LocalDateTimeSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2} \d{2}:\d{2}:\d{2}$/);

const DegreeStringSchema = z.string().regex(/^\d{1,2}°\d{2}'\d{2}"$/);

export const AspectTypeSchema = z.enum([
  "Conjunction",
  "Sextile",
  "Square",
  "Trine",
  "Opposition",
]);

export const AspectEventSchema = z
  .object({
    datetime: LocalDateTimeSchema,
    event: z.literal("Aspect"),
    type: AspectTypeSchema,
    planet1: PlanetIdSchema,
    planet1_sign: SignNameSchema,
    planet1_degree: DegreeStringSchema,
    planet2: PlanetIdSchema,
    planet2_sign: SignNameSchema,
    planet2_degree: DegreeStringSchema,
    exact_angle: z.number(),
    difference: z.number().min(0).max(180),
    orb_residual: z.number().min(0),
  })
  .refine(
    (val) =>
      PLANET_ORDER.indexOf(val.planet1) < PLANET_ORDER.indexOf(val.planet2),
    { message: "planet1 must precede planet2", path: ["planet2"] }
  )
  .refine(
    (val) =>
      !(
        (val.planet1 === "Rahu" && val.planet2 === "Ketu") ||
        (val.planet1 === "Ketu" && val.planet2 === "Rahu")
      ),
    { message: "Rahu-Ketu pair is structural", path: ["planet2"] }
  );

export const IngressEventSchema = z
  .object({
    datetime: LocalDateTimeSchema,
    event: z.literal("Ingress"),
    planet: PlanetIdSchema,
    from_sign: SignNameSchema,
    to_sign: SignNameSchema,
    degree: DegreeStringSchema,
    longitude: z.number().min(0).lt(360),
  })
  .refine((val) => val.from_sign !== val.to_sign, {
    message: "from_sign and to_sign must differ",
    path: ["to_sign"],
  });

export const MonthlyRunParamsSchema = z.object({
  year: z.number().int().min(100).max(9999),
  month: z.number().int().min(1).max(12),
  timezoneOffset: z.number().min(-14).max(14),
  stepMinutes: z
    .number()
    .int()
    .positive()
    .refine((v) => 1440 % v === 0, {
      message: "stepMinutes must divide a day (1440 minutes) evenly",
    })
    .default(15),
  orb: z.number().min(0).max(60).default(1.0),
  retrogradeMethod: z.enum(["speed", "probe"]).default("speed"),
});

export type AspectType = z.infer<typeof AspectTypeSchema>;
export type AspectEvent = z.infer<typeof AspectEventSchema>;
export type IngressEvent = z.infer<typeof IngressEventSchema>;
export type MonthlyRunParamsInput = z.input<typeof MonthlyRunParamsSchema>;
export type MonthlyRunParams = z.output<typeof MonthlyRunParamsSchema>;

/** Detector output before the driver stamps the instant. */
export type AspectMatch = Omit<AspectEvent, "datetime">;
export type IngressMatch = Omit<IngressEvent, "datetime">;

/**
 * One row of the snapshot table: date/time columns then
 * `{Planet}_{Field}` columns for every planet present.
 */
export type SnapshotRow = Record<string, string | number | boolean>;
