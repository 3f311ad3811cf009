// src/lib/errors.ts

/** Exit code for invocation problems: bad flags, missing or invalid config. */
export const INVOCATION_ERROR_EXIT_CODE = 2;

/**
 * A configuration or invocation problem detected before any probing starts.
 * `issues` lists every individual problem so they can be reported at once.
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}
