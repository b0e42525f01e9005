/* src/common/errors.ts
 * Tool-level error classes. Each carries the process exit code the CLI reports.
 * Script failures are not thrown; they travel as DetectionResults.
 */

/** Stable exit codes. */
export const EXIT = {
  success: 0,
  stata: 1,
  syntax: 2,
  file: 3,
  memory: 4,
  internal: 5,
  statistical: 6,
  environment: 10,
} as const;

export type ExitClass = keyof typeof EXIT;

export class ReproError extends Error {
  public readonly exitCode: number;

  constructor(message: string, exitCode: number, options?: ErrorOptions) {
    super(message, options);
    this.name = new.target.name;
    this.exitCode = exitCode;
  }
}

/** A file the operation needs is missing or unreadable. */
export class FileError extends ReproError {
  constructor(
    message: string,
    public readonly path: string,
    options?: ErrorOptions,
  ) {
    super(message, EXIT.file, options);
  }
}

/** Interpreter missing, unusable environment. */
export class EnvironmentError extends ReproError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, EXIT.environment, options);
  }
}

/** Manifest or user config is invalid. */
export class ConfigError extends EnvironmentError {
  constructor(
    message: string,
    public readonly configPath: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

/** The tool itself failed (cache, lockfile, package source). */
export class InternalError extends ReproError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, EXIT.internal, options);
  }
}

export class LockfileError extends InternalError {}

export class SourceUnavailableError extends InternalError {
  constructor(
    message: string,
    public readonly url: string,
    options?: ErrorOptions,
  ) {
    super(message, options);
  }
}

export class IntegrityError extends InternalError {
  constructor(
    public readonly pkg: string,
    public readonly expected: string,
    public readonly actual: string,
  ) {
    super(
      `checksum mismatch for ${pkg}: expected ${expected}, got ${actual}`,
    );
  }
}

/** Exit code for any thrown value: ReproError carries its own, others are internal. */
export const exitCodeOf = (e: unknown): number =>
  e instanceof ReproError ? e.exitCode : EXIT.internal;
