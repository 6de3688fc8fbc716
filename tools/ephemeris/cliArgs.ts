import type { EphemerisConfig } from "../../lib/config.js";

/**
 * Flags override the environment; year and month default to the current UTC month.
 */
export interface CliArgs {
  year: number;
  month: number;
  timezoneOffset: number;
  orb: number;
  stepMinutes: number;
  outDir: string;
  backend: EphemerisConfig["backend"];
  retrogradeMethod: EphemerisConfig["retrogradeMethod"];
  daily: boolean;
}

function parseNumberFlag(flag: string, raw: string | undefined): number {
  const value = Number(raw);
  if (raw === undefined || raw.trim() === "" || !Number.isFinite(value)) {
    throw new Error(`${flag} requires a numeric value`);
  }
  return value;
}

export function parseArgs(
  argv: string[],
  config: EphemerisConfig,
  now: Date = new Date()
): CliArgs {
  const args: CliArgs = {
    year: now.getUTCFullYear(),
    month: now.getUTCMonth() + 1,
    timezoneOffset: config.timezoneOffset,
    orb: config.orb,
    stepMinutes: config.stepMinutes,
    outDir: config.outputDir,
    backend: config.backend,
    retrogradeMethod: config.retrogradeMethod,
    daily: true,
  };

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    const next = argv[i + 1];
    switch (arg) {
      case "--year":
        args.year = parseNumberFlag(arg, next);
        i++;
        break;
      case "--month":
        args.month = parseNumberFlag(arg, next);
        i++;
        break;
      case "--offset":
        args.timezoneOffset = parseNumberFlag(arg, next);
        i++;
        break;
      case "--orb":
        args.orb = parseNumberFlag(arg, next);
        i++;
        break;
      case "--step":
        args.stepMinutes = parseNumberFlag(arg, next);
        i++;
        break;
      case "--out":
        if (!next) throw new Error("--out requires a directory");
        args.outDir = next;
        i++;
        break;
      case "--backend":
        if (next !== "swiss" && next !== "moshier") {
          throw new Error("--backend must be swiss or moshier");
        }
        args.backend = next;
        i++;
        break;
      case "--retrograde":
        if (next !== "speed" && next !== "probe") {
          throw new Error("--retrograde must be speed or probe");
        }
        args.retrogradeMethod = next;
        i++;
        break;
      case "--no-daily":
        args.daily = false;
        break;
      default:
        throw new Error(`Unknown argument: ${arg}`);
    }
  }

  return args;
}
