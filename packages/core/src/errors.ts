import type { z } from 'zod';
import type { FailureKind, TaskOutcome } from './types.js';

export type ErrorKind = FailureKind | 'ConfigurationError';

/**
 * Base class for every error raised by the engine
 */
export abstract class PackagerError extends Error {
  abstract readonly kind: ErrorKind;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidPathError extends PackagerError {
  readonly kind = 'InvalidPathError';

  constructor(public readonly declaredPath: string, reason: string) {
    super(`Invalid path ${JSON.stringify(declaredPath)}: ${reason}`);
  }
}

export class SourceNotFoundError extends PackagerError {
  readonly kind = 'SourceNotFoundError';

  constructor(public readonly path: string) {
    super(`Source not found: ${path}`);
  }
}

export class TargetNotFoundError extends PackagerError {
  readonly kind = 'TargetNotFoundError';

  constructor(public readonly path: string, reason = 'does not exist') {
    super(`Target ${path} ${reason}`);
  }
}

export class EncodingError extends PackagerError {
  readonly kind = 'EncodingError';

  constructor(public readonly path: string, encoding: string) {
    super(`File ${path} is not valid ${encoding}`);
  }
}

export class PatternError extends PackagerError {
  readonly kind = 'PatternError';

  constructor(public readonly pattern: string, reason: string) {
    super(`Invalid pattern ${JSON.stringify(pattern)}: ${reason}`);
  }
}

export class IoError extends PackagerError {
  readonly kind = 'IoError';

  constructor(public readonly path: string, cause: unknown) {
    super(`${path}: ${describeError(cause)}`);
  }
}

/**
 * Raised when an external command cannot be spawned or exits unsuccessfully.
 * `exitCode` is null when the process was killed or never started.
 */
export class ProcessError extends PackagerError {
  readonly kind = 'ProcessError';

  constructor(
    public readonly command: string,
    public readonly exitCode: number | null,
    reason: string
  ) {
    super(`Command '${command}' ${reason}`);
  }
}

/**
 * Custom error for configuration document failures
 */
export class ConfigurationError extends PackagerError {
  readonly kind = 'ConfigurationError';

  constructor(
    message: string,
    public errors?: z.ZodError
  ) {
    super(message);
  }

  getDetails(): string {
    if (!this.errors) return this.message;

    return this.errors.errors
      .map((err) => `${err.path.join('.')}: ${err.message}`)
      .join('\n');
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}

/**
 * Turn anything thrown inside an executor into a failure outcome.
 * Errors that are not engine errors are reported as I/O failures.
 */
export function toFailure(error: unknown, path: string): TaskOutcome {
  if (error instanceof ProcessError && error.exitCode !== null) {
    return { status: 'failure', kind: error.kind, detail: error.message, exitCode: error.exitCode };
  }
  if (error instanceof PackagerError && error.kind !== 'ConfigurationError') {
    return { status: 'failure', kind: error.kind, detail: error.message };
  }

  return { status: 'failure', kind: 'IoError', detail: new IoError(path, error).message };
}
