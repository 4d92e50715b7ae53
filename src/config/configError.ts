/**
 * ConfigError — startup configuration is missing or invalid
 */

export class ConfigError extends Error {
  public readonly problems: readonly string[];

  constructor(problems: string[]) {
    super(`Invalid configuration:\n  - ${problems.join("\n  - ")}`);
    this.name = "ConfigError";
    this.problems = problems;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, ConfigError);
    }
  }
}
