/** Error code attached to every configuration failure. */
export const ERROR_CONFIGURATION = "E-KG-CONFIG" as const;

/** Single problem found while validating the sampler configuration. */
export interface ConfigurationIssue {
  /** Dotted path of the offending setting (`maxVerticesPerLanguage`, `startIds.fr`). */
  readonly path: string;
  readonly message: string;
}

/**
 * Raised when the sampler cannot start because its configuration is unusable
 * (empty language list, non-positive budget, unreadable file, ...). This is the
 * only error that aborts a whole sampling run.
 */
export class ConfigurationError extends Error {
  public readonly code = ERROR_CONFIGURATION;
  public readonly issues: readonly ConfigurationIssue[];

  constructor(message: string, issues: readonly ConfigurationIssue[] = [], options?: ErrorOptions) {
    const detail = issues.map((issue) => `${issue.path || "<root>"}: ${issue.message}`).join("; ");
    super(detail ? `${message} (${detail})` : message, options);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}
