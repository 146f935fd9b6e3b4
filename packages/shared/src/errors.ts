// ---------------------------------------------------------------------------
// @spatial-text/shared: Errors
// ---------------------------------------------------------------------------

/** Raised at construction when options fail validation. */
export class ConfigurationError extends Error {
  constructor(
    public readonly component: string,
    public readonly issues: readonly string[],
  ) {
    super(`Invalid ${component} configuration: ${issues.join('; ')}`);
    this.name = 'ConfigurationError';
  }
}
