/**
 * Error classes for conditions that indicate a programming or configuration
 * mistake. Data conditions (a URL without identifiers, a failed fetch, a
 * validation source that is down) are modelled as result values instead.
 */

export class IdentifierError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** Raised when a caller passes an identifier type outside "doi" | "pmid" | "pmc". */
export class InvalidIdentifierTypeError extends IdentifierError {
  readonly received: unknown;

  constructor(received: unknown) {
    super(`Invalid identifier type: ${JSON.stringify(received) ?? String(received)}`);
    this.received = received;
  }
}

/** Raised by loadConfig() when environment values fail validation. */
export class ConfigError extends IdentifierError {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join("; ")}`);
    this.issues = issues;
  }
}

/** Raised when a reasoning provider is requested explicitly but cannot be built. */
export class ReasonerConfigError extends IdentifierError {}

/** Render an unknown thrown value as a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
