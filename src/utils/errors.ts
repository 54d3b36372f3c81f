export class SleepDiaryError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'SleepDiaryError';
    this.code = code;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Malformed or order-violating input. Always surfaced to the caller, never
 * auto-corrected.
 */
export class ValidationError extends SleepDiaryError {
  public readonly issues: string[];

  constructor(message: string, issues: string[] = [message], options?: ErrorOptions) {
    super(message, 'VALIDATION_ERROR', options);
    this.name = 'ValidationError';
    this.issues = issues;
  }
}

export class NotFoundError extends SleepDiaryError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'NOT_FOUND', options);
    this.name = 'NotFoundError';
  }
}

/** The stored diary could not be read back as a consistent entries+history pair. */
export class CorruptStoreError extends SleepDiaryError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CORRUPT_STORE', options);
    this.name = 'CorruptStoreError';
  }
}

/** A save point failed; the in-memory diary is still the source of truth. */
export class PersistenceError extends SleepDiaryError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'PERSISTENCE_ERROR', options);
    this.name = 'PersistenceError';
  }
}

export class ConfigError extends SleepDiaryError {
  constructor(message: string, options?: ErrorOptions) {
    super(message, 'CONFIG_ERROR', options);
    this.name = 'ConfigError';
  }
}
