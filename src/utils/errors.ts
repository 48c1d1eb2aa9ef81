/**
 * Error types and codes for confweave.
 * Every error raised by the library extends ConfweaveError.
 */

/**
 * Base error class for all confweave errors.
 */
export class ConfweaveError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ConfweaveError';
    Error.captureStackTrace(this, this.constructor);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      details: this.details,
    };
  }
}

/**
 * Errors in the tool's own configuration file (.confweave.yaml).
 */
export class ConfigError extends ConfweaveError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'ConfigError';
  }
}

/**
 * System errors outside include resolution (unreadable input, bad format names).
 */
export class SystemError extends ConfweaveError {
  constructor(code: string, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
    this.name = 'SystemError';
  }
}

/**
 * Failure while loading a structured document and its includes.
 * Catch this to handle every merge-mode failure at once.
 */
export class IncludeLoadError extends ConfweaveError {
  constructor(
    code: string,
    message: string,
    public readonly path: string,
    details?: Record<string, unknown>
  ) {
    super(code, message, { ...details, path });
    this.name = 'IncludeLoadError';
  }
}

/**
 * The file being loaded could not be read.
 */
export class IncludeIoError extends IncludeLoadError {
  constructor(path: string, cause: unknown) {
    super(
      ErrorCodes.READ_ERROR,
      `I/O error: ${path}: ${describeCause(cause)}`,
      path,
      { originalError: describeCause(cause) }
    );
    this.name = 'IncludeIoError';
  }
}

/**
 * The file content is not a valid structured document.
 */
export class IncludeParseError extends IncludeLoadError {
  constructor(path: string, cause: unknown) {
    super(
      ErrorCodes.PARSE_ERROR,
      `Parse error: ${path}: ${describeCause(cause)}`,
      path,
      { originalError: describeCause(cause) }
    );
    this.name = 'IncludeParseError';
  }
}

/**
 * A file includes itself, directly or through a chain of includes.
 * `path` is the canonical path of the file that closed the cycle.
 */
export class CyclicIncludeError extends IncludeLoadError {
  constructor(path: string, public readonly chain: string[] = []) {
    super(ErrorCodes.CYCLIC_INCLUDE, `cyclic include: ${path}`, path, { chain });
    this.name = 'CyclicIncludeError';
  }
}

export const ErrorCodes = {
  // Include resolution (L001-L003)
  READ_ERROR: 'L001',
  PARSE_ERROR: 'L002',
  CYCLIC_INCLUDE: 'L003',

  // Configuration
  CONFIG_LOAD_ERROR: 'C001',

  // System
  UNKNOWN_FORMAT: 'S001',
  SERIALIZE_ERROR: 'S002',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
