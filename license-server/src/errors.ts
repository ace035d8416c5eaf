/**
 * Hard failures. Expected business outcomes (not found, expired, over
 * capacity, ...) are returned as tagged results instead; see `types.ts`.
 */

export type ErrorContext = Record<string, unknown>;

export class LicenseServerError extends Error {
  readonly code: string;
  readonly context: ErrorContext;
  readonly retryable: boolean = false;

  constructor(message: string, code: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
    this.context = context;
  }

  toJSON(): { error: string; message: string } {
    return { error: this.code, message: this.message };
  }
}

/** Storage timed out, was busy, or failed mid-transaction. Safe to retry. */
export class TransientStorageError extends LicenseServerError {
  override readonly retryable = true;

  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, 'service_unavailable', context, options);
  }
}

export class KeyGenerationError extends LicenseServerError {
  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, 'key_generation_failed', context, options);
  }
}

export class SecretProvisioningError extends LicenseServerError {
  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, 'secret_provisioning_failed', context, options);
  }
}

export class ConfigurationError extends LicenseServerError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'invalid_configuration', context);
  }
}

/** Rejected administrative input (negative capacity, grace before expiry, ...). */
export class ValidationError extends LicenseServerError {
  constructor(message: string, context: ErrorContext = {}) {
    super(message, 'invalid_input', context);
  }
}

const TRANSIENT_SQLITE_CODES = new Set(['SQLITE_BUSY', 'SQLITE_LOCKED', 'SQLITE_IOERR', 'SQLITE_PROTOCOL']);

function sqliteCode(err: unknown): string | null {
  if (err instanceof Error && 'code' in err && typeof err.code === 'string' && err.code.startsWith('SQLITE_')) {
    return err.code;
  }
  return null;
}

export function isTransientStorageError(err: unknown): err is TransientStorageError {
  return err instanceof TransientStorageError;
}

/**
 * Maps driver errors that are worth retrying onto TransientStorageError.
 * Everything else passes through unchanged.
 */
export function classifyStorageError(err: unknown, operation: string): unknown {
  if (err instanceof LicenseServerError) return err;

  const code = sqliteCode(err);
  if (code && [...TRANSIENT_SQLITE_CODES].some((c) => code === c || code.startsWith(`${c}_`))) {
    return new TransientStorageError(`Storage unavailable during ${operation}`, { operation, code }, { cause: err });
  }
  return err;
}
