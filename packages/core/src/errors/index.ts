/**
 * Custom Error Classes
 */

/**
 * Base error class for all vidshrink errors
 */
export class VidshrinkError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'VidshrinkError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid configuration or arguments
 */
export class ValidationError extends VidshrinkError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * Filesystem operation failure (mkdir, copy, stat, readdir)
 */
export class FilesystemError extends VidshrinkError {
  constructor(
    operation: string,
    path: string,
    cause: unknown
  ) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(
      `${operation} failed for ${path}: ${reason}`,
      'FILESYSTEM_ERROR',
      { operation, path },
      { cause }
    );
    this.name = 'FilesystemError';
  }
}

/**
 * Media probe produced output that could not be interpreted
 */
export class ProbeError extends VidshrinkError {
  constructor(probe: string, path: string, message: string) {
    super(
      `${probe} could not inspect ${path}: ${message}`,
      'PROBE_ERROR',
      { probe, path }
    );
    this.name = 'ProbeError';
  }
}
