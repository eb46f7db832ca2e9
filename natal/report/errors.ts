/**
 * Errors raised while turning chart or birth input into a report. The chart
 * geometry core never throws; it reports insufficient data as null or an
 * empty list.
 */

export class InvalidChartError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid natal chart: ${issues.join("; ")}`);
    this.name = "InvalidChartError";
  }
}

export class InvalidBirthInputError extends Error {
  constructor(public issues: string[]) {
    super(`Invalid birth input: ${issues.join("; ")}`);
    this.name = "InvalidBirthInputError";
  }
}

export class PositionProviderError extends Error {
  constructor(public birthDatetime: string, cause: unknown) {
    super(
      `Position provider failed for ${birthDatetime}: ${
        cause instanceof Error ? cause.message : String(cause)
      }`,
      { cause }
    );
    this.name = "PositionProviderError";
  }
}
