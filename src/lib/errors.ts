/**
 * A required input is missing: API key, config file, input directory or
 * input files. The CLI prints the message and exits with status 1.
 */
export class PrerequisiteError extends Error {
  readonly hints: string[];

  constructor(message: string, hints: string[] = []) {
    super(message);
    this.name = "PrerequisiteError";
    this.hints = hints;
  }
}

/** The generator config exists but cannot be used as-is. */
export class ConfigError extends PrerequisiteError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/** Bad command-line arguments. The CLI prints usage and exits with status 2. */
export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error;
}
