/**
 * HTTP status codes produced by the management API.
 */
export type ApiStatusCode = 400 | 404 | 409 | 500;

/**
 * Base class for API errors
 */
export class ApiError extends Error {
  constructor(message: string, public readonly statusCode: ApiStatusCode) {
    super(message);
    this.name = 'ApiError';
  }
}

/**
 * 400 Bad Request - Malformed query string or path parameter
 */
export class ValidationError extends ApiError {
  constructor(message: string) {
    super(message, 400);
    this.name = 'ValidationError';
  }
}

/**
 * 404 Not Found - Job record or queue not found
 */
export class NotFoundError extends ApiError {
  constructor(resource: string) {
    super(`${resource} not found`, 404);
    this.name = 'NotFoundError';
  }
}

/**
 * 409 Conflict - The job record is in a status that forbids the operation
 */
export class ConflictError extends ApiError {
  constructor(message: string) {
    super(message, 409);
    this.name = 'ConflictError';
  }
}
