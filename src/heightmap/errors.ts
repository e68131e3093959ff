/**
 * Raised for malformed input: seeds, sizes, stage lists, zoom factors,
 * iteration counts, heightmap text, or a stochastic rule run without a
 * RandomStream. Never retried.
 */
export class ConfigurationError extends Error {
  readonly summary: string;
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.summary = message;
    this.issues = issues;
  }
}

/** A rule precondition was broken inside a pass. Indicates a bug, not bad input. */
export class InvariantError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvariantError';
  }
}
