/** Population state is corrupted; never retried. */
export class InvariantViolation extends Error {
  constructor(message: string) {
    super(message);
    this.name = "InvariantViolation";
  }
}

/** A scenario file failed schema validation. */
export class ConfigError extends Error {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`Invalid scenario ${source}:\n  ${issues.join("\n  ")}`);
    this.name = "ConfigError";
    this.issues = issues;
  }
}
