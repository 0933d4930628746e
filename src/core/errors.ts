// ---------------------------------------------------------------------------
// Error hierarchy for the campus cache library.
// ---------------------------------------------------------------------------

/**
 * Root of all campus cache errors.
 *
 * Loader failures are never wrapped in one of these; they reach the caller
 * as thrown.
 */
export class CacheError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "CacheError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** A configuration value is missing or invalid. */
export class ConfigurationError extends CacheError {
  public readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = [], options?: ErrorOptions) {
    super(message, options);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}
