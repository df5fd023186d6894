/**
 * Raised when a community is missing something an operation needs. The
 * message is meant to be shown to whoever asked for the operation.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly code: "MISSING_SOURCE_HANDLE" | "MISSING_REPORT_CHANNEL" | "INVALID_TIMEZONE" | "INVALID_SCHEDULE"
  ) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
