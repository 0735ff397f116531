/**
 * Domain errors
 *
 * Every error a route can surface to a client. The error handler middleware
 * turns `statusCode` and `message` into the HTTP response; nothing else about
 * the error leaves the process.
 */

export class AppError extends Error {
  readonly statusCode: number;
  readonly code: string;

  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }
}

export class ValidationError extends AppError {
  constructor(message: string) {
    super(message, 400, "VALIDATION_ERROR");
  }
}

export class InvalidContentTypeError extends AppError {
  constructor(message = "Only audio files are allowed") {
    super(message, 400, "INVALID_CONTENT_TYPE");
  }
}

export class InvalidIdError extends AppError {
  constructor(message = "Invalid track id") {
    super(message, 400, "INVALID_ID");
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Not found") {
    super(message, 404, "NOT_FOUND");
  }
}

export class PayloadTooLargeError extends AppError {
  constructor(message: string) {
    super(message, 413, "PAYLOAD_TOO_LARGE");
  }
}

export class StorageWriteError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500, "STORAGE_WRITE_FAILED");
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export class PersistenceError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 500, "PERSISTENCE_FAILED");
    if (options?.cause !== undefined) this.cause = options.cause;
  }
}

export class StoreUnavailableError extends AppError {
  constructor(message = "Database not available") {
    super(message, 500, "STORE_UNAVAILABLE");
  }
}
