import type { ResponseAnomaly } from "./types.js";

/**
 * Base class for fatal run errors. The CLI maps these to a console message and
 * the carried exit code; nothing below the entry point catches them.
 */
export class BreachReportError extends Error {
  readonly exitCode: number;

  constructor(message: string, exitCode: number = 1) {
    super(message);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

/** Input file missing or unreadable. Raised before any network activity. */
export class InputError extends BreachReportError {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(`Cannot access input file: ${path}`);
    this.path = path;
    if (cause !== undefined) {
      this.cause = cause;
    }
  }
}

/** The input file contained no extractable addresses. */
export class ExtractionError extends BreachReportError {
  readonly path: string;

  constructor(path: string) {
    super(`No valid emails found in ${path}`);
    this.path = path;
  }
}

/**
 * Too many unexpected HTTP statuses in one run. Results collected so far are
 * discarded along with this error.
 */
export class RateLimitSuspectedError extends BreachReportError {
  readonly failures: number;
  readonly anomalies: ResponseAnomaly[];

  constructor(anomalies: ResponseAnomaly[]) {
    const last = anomalies[anomalies.length - 1];
    const status = last?.status ?? "no response";
    super(`Possible rate limiting encountered (${anomalies.length} unexpected responses, last: ${status})`);
    this.failures = anomalies.length;
    this.anomalies = anomalies;
  }
}
