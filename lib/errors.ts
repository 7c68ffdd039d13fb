/**
 * Raised before any network call when a required credential is missing or
 * still holds a template value. `remediation` is shown to the user as-is.
 */
export class ConfigurationError extends Error {
  readonly remediation: string;

  constructor(message: string, remediation: string) {
    super(message);
    this.name = "ConfigurationError";
    this.remediation = remediation;
  }
}

/** Bad user input: empty keyword/URL list, malformed URL, bad payload. */
export class ValidationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = "ValidationError";
    this.issues = issues.length > 0 ? issues : [message];
  }
}

export function isConfigurationError(err: unknown): err is ConfigurationError {
  return err instanceof ConfigurationError;
}

export function isValidationError(err: unknown): err is ValidationError {
  return err instanceof ValidationError;
}
