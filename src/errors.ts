/**
 * Error types shared by the host and provider plugins.
 */

/** Text for log lines and error wrappers, whatever was thrown. */
export function formatErrorMessage(err: unknown): string {
  if (err instanceof Error) return err.message || err.name || "Error";
  switch (typeof err) {
    case "string":
      return err;
    case "number":
    case "boolean":
    case "bigint":
      return String(err);
    default:
      try {
        return JSON.stringify(err) ?? String(err);
      } catch {
        return Object.prototype.toString.call(err);
      }
  }
}

/** Thrown by an analyzer when its base inventory cannot be listed. */
export class AnalyzerError extends Error {
  constructor(
    public readonly analyzer: string,
    message: string,
    public readonly cause?: unknown,
  ) {
    super(cause === undefined ? message : `${message}: ${formatErrorMessage(cause)}`);
    this.name = "AnalyzerError";
  }
}

export class UnknownProviderError extends Error {
  constructor(public readonly provider: string) {
    super(`Unsupported cloud provider: ${provider}`);
    this.name = "UnknownProviderError";
  }
}

export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly errors: string[],
  ) {
    super(errors.length > 0 ? `${message}\n${errors.map((e) => `  - ${e}`).join("\n")}` : message);
    this.name = "ConfigValidationError";
  }
}
