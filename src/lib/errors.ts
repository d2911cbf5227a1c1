/**
 * Error classes shared by the watcher, the upload client and the pipeline.
 *
 * Only ConfigError and ProcessFatalError are allowed to reach main(); every
 * other class is caught by the worker handling the file and turned into a
 * terminal state.
 */

export class AppError extends Error {
  readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigError extends AppError {
  readonly variable?: string;

  constructor(message: string, variable?: string) {
    super(message, 'CONFIG_ERROR');
    this.variable = variable;
  }
}

/** A watch root or the network is temporarily unavailable */
export class TransientIOError extends AppError {
  readonly path?: string;

  constructor(message: string, path?: string, cause?: unknown) {
    super(message, 'TRANSIENT_IO', { cause });
    this.path = path;
  }
}

/** Oversized, zero-byte or vanished file */
export class ValidationRejection extends AppError {
  constructor(message: string) {
    super(message, 'VALIDATION_REJECTION');
  }
}

export class RetryExhaustedError extends AppError {
  readonly attempts: number;

  constructor(message: string, attempts: number) {
    super(message, 'RETRY_EXHAUSTED');
    this.attempts = attempts;
  }
}

export class FatalRequestError extends AppError {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message, 'FATAL_REQUEST');
    this.statusCode = statusCode;
  }
}

export class ArchiveMoveError extends AppError {
  readonly source: string;
  readonly destination: string | null;

  constructor(message: string, source: string, destination: string | null, cause?: unknown) {
    super(message, 'ARCHIVE_MOVE_FAILURE', { cause });
    this.source = source;
    this.destination = destination;
  }
}

/** No watch directory could be observed at startup */
export class ProcessFatalError extends AppError {
  constructor(message: string) {
    super(message, 'PROCESS_FATAL');
  }
}

/**
 * Narrow an unknown thrown value to a Node system error carrying `code`.
 * Errors raised by core modules may come from another realm (test VMs), so
 * the shape is checked instead of `instanceof Error`.
 */
export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null &&
    'code' in error && typeof error.code === 'string' &&
    'message' in error && typeof error.message === 'string';
}

export function hasErrorCode(error: unknown, ...codes: string[]): boolean {
  return isErrnoException(error) && error.code !== undefined && codes.includes(error.code);
}

export function errorMessage(error: unknown): string {
  if (typeof error === 'object' && error !== null && 'message' in error && typeof error.message === 'string') {
    return error.message;
  }
  return String(error);
}
