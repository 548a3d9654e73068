/**
 * Raised when a claim record (or a decision input) is structurally unusable:
 * unknown claim type, required keys absent, values of the wrong type.
 * Fatal for that one claim only.
 */
export class SchemaError extends Error {
  readonly statusCode = 422;
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(message);
    this.name = 'SchemaError';
    this.issues = issues;
  }
}

/**
 * Raised when an engine is built with out-of-range thresholds. Never caught
 * inside the pipeline.
 */
export class ConfigurationError extends Error {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}
