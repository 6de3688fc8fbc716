/**
 * Structured logging for ephemeris runs.
 *
 * One JSON object per line on stdout.
 */

export type EphemerisLogEvent =
  | "month.started"
  | "month.day_completed"
  | "month.completed"
  | "planet.calc_failed"
  | "export.written"
  | "export.skipped_empty"
  | "export.day_failed";

export type EphemerisLogData = {
  event: EphemerisLogEvent;
  year?: number;
  month?: number;
  day?: number;
  planet?: string;
  julian_day?: number;
  path?: string;
  records?: number;
  error_message?: string;
  [key: string]: unknown;
};

export function ephemerisLog(data: EphemerisLogData): void {
  const logEntry = {
    timestamp: new Date().toISOString(),
    ...data,
  };

  console.log(JSON.stringify(logEntry));
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export const ephemerisLogHelpers = {
  monthStarted(params: {
    year: number;
    month: number;
    timezone_offset: number;
    step_minutes: number;
  }): void {
    ephemerisLog({ event: "month.started", ...params });
  },

  dayCompleted(params: {
    year: number;
    month: number;
    day: number;
    days_in_month: number;
    progress_pct: number;
  }): void {
    ephemerisLog({ event: "month.day_completed", ...params });
  },

  monthCompleted(params: {
    year: number;
    month: number;
    records: number;
    aspects: number;
    ingresses: number;
  }): void {
    ephemerisLog({ event: "month.completed", ...params });
  },

  planetCalcFailed(params: {
    planet: string;
    julian_day: number;
    error: unknown;
  }): void {
    ephemerisLog({
      event: "planet.calc_failed",
      planet: params.planet,
      julian_day: params.julian_day,
      error_message: errorMessage(params.error),
    });
  },

  exportWritten(params: { path: string; records: number }): void {
    ephemerisLog({ event: "export.written", ...params });
  },

  exportSkippedEmpty(params: { path: string }): void {
    ephemerisLog({ event: "export.skipped_empty", path: params.path });
  },

  exportDayFailed(params: { date: string; error: unknown }): void {
    ephemerisLog({
      event: "export.day_failed",
      date: params.date,
      error_message: errorMessage(params.error),
    });
  },
};
