/**
 * Why a telemetry poll produced nothing usable.
 */
export type UnavailableReason = "missing" | "timeout" | "exit" | "malformed" | "aborted";

/**
 * Whole-poll telemetry failure. Recoverable: the loop retries on the next tick.
 */
export class TelemetryUnavailable extends Error {
  public readonly reason: UnavailableReason;
  public readonly detail: string;

  /**
   * Create a telemetry failure.
   * @param reason - Failure category.
   * @param detail - Human readable detail.
   */
  public constructor(reason: UnavailableReason, detail: string) {
    super(`telemetry unavailable (${reason}): ${detail}`);
    this.name = "TelemetryUnavailable";
    this.reason = reason;
    this.detail = detail;
  }
}

/**
 * A single field that could not be parsed. Collected, never thrown.
 */
export class FieldParseError extends Error {
  public readonly field: string;
  public readonly gpuIndex: number;
  public readonly raw: string;

  /**
   * Create a field parse error.
   * @param field - Query field name.
   * @param gpuIndex - GPU the field belongs to.
   * @param raw - Raw text that failed to parse.
   */
  public constructor(field: string, gpuIndex: number, raw: string) {
    super(`cannot parse ${field} for GPU ${gpuIndex}: ${JSON.stringify(raw)}`);
    this.name = "FieldParseError";
    this.field = field;
    this.gpuIndex = gpuIndex;
    this.raw = raw;
  }
}

/**
 * No telemetry could be read before the first frame. Fatal.
 */
export class StartupFailure extends Error {
  /**
   * Create a startup failure.
   * @param detail - Human readable detail.
   * @param options - Underlying error, when there is one.
   */
  public constructor(detail: string, options?: { cause?: unknown }) {
    super(detail, options);
    this.name = "StartupFailure";
  }
}

/**
 * The output stream cannot be used as a direct-addressing display. Fatal.
 */
export class DisplaySurfaceError extends Error {
  /**
   * Create a display surface error.
   * @param detail - What the terminal lacks.
   */
  public constructor(detail: string) {
    super(detail);
    this.name = "DisplaySurfaceError";
  }
}

/**
 * Check whether a value is a TelemetryUnavailable instance.
 * @param value - Unknown error value.
 * @returns True if value is TelemetryUnavailable.
 */
export const isTelemetryUnavailable = (value: unknown): value is TelemetryUnavailable =>
  value instanceof TelemetryUnavailable;

/**
 * Safely extract error message from unknown error type.
 * @param error - Unknown error value.
 * @returns Error message string.
 */
export const safeErrorMessage = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  return String(error);
};
