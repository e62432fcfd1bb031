export class TubePulseError extends Error {
  constructor(public readonly message: string, public readonly code = 'INTERNAL_ERROR', public readonly details?: unknown) {
    super(message);
    this.name = 'TubePulseError';
  }
}

export class NotFoundError extends TubePulseError {
  constructor(message = 'Resource not found', details?: unknown) {
    super(message, 'NOT_FOUND', details);
    this.name = 'NotFoundError';
  }
}

export class ValidationError extends TubePulseError {
  constructor(message = 'Validation failed', details?: unknown) {
    super(message, 'VALIDATION_ERROR', details);
    this.name = 'ValidationError';
  }
}

export class RateLimitError extends TubePulseError {
  constructor(message = 'Rate limit exceeded', details?: unknown) {
    super(message, 'RATE_LIMIT', details);
    this.name = 'RateLimitError';
  }
}

/**
 * A read or write against MongoDB or the key-value tier failed.
 */
export class StorageError extends TubePulseError {
  constructor(message = 'Storage operation failed', details?: unknown) {
    super(message, 'STORAGE_ERROR', details);
    this.name = 'StorageError';
  }
}

/**
 * The statistics API could not be reached, timed out, refused the call or
 * answered with something unusable.
 */
export class UpstreamUnavailableError extends TubePulseError {
  constructor(message = 'Upstream unavailable', details?: unknown) {
    super(message, 'UPSTREAM_UNAVAILABLE', details);
    this.name = 'UpstreamUnavailableError';
  }
}

/**
 * Wrap any thrown value as a StorageError, preserving an existing one.
 */
export function toStorageError(error: unknown, message: string, details?: Record<string, unknown>): StorageError {
  if (error instanceof StorageError) {
    return error;
  }
  return new StorageError(message, {
    ...details,
    cause: error instanceof Error ? error.message : String(error)
  });
}
