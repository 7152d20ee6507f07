/**
 * Errors that cross the request boundary carry their HTTP status.
 * `expose` decides whether the message may be sent to the client;
 * otherwise the error handler answers with a generic message and logs the detail.
 */
export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly expose: boolean;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class ValidationError extends AppError {
  readonly statusCode = 400;
  readonly expose = true;
}

export class NotFoundError extends AppError {
  readonly statusCode = 404;
  readonly expose = true;

  constructor(message = "Short URL not found") {
    super(message);
  }
}

export class AllocationExhaustedError extends AppError {
  readonly statusCode = 500;
  readonly expose = true;

  constructor(readonly attempts: number) {
    super("Failed to generate unique short code");
  }
}

export class StorageError extends AppError {
  readonly statusCode = 500;
  readonly expose = false;
}

// Raised by stores on a unique violation; the allocator retries on it.
export class DuplicateCodeError extends Error {
  constructor(readonly code: string) {
    super(`short code already exists: ${code}`);
    this.name = "DuplicateCodeError";
  }
}

export const GENERIC_ERROR_MESSAGE = "Internal server error";
