/**
 * Error model for the ephemeris pipeline.
 *
 * Config errors abort a run; calc errors only drop one planet from one snapshot.
 */

export class EphemerisConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "EphemerisConfigError";
  }
}

export class EphemerisCalcError extends Error {
  constructor(
    public planet: string,
    public julianDay: number,
    message: string
  ) {
    super(`${planet} @ JD ${julianDay}: ${message}`);
    this.name = "EphemerisCalcError";
  }
}

export class InvalidRunParamsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvalidRunParamsError";
  }
}
