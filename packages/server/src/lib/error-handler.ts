import type { Context } from 'hono';
import { ApiError } from './errors.js';
import { createLogger } from './logger.js';

const logger = createLogger('error-handler');

/**
 * Error response format
 */
interface ErrorResponse {
  error: string;
}

/**
 * Format error response based on error type
 */
function handleError(c: Context, error: unknown): Response {
  if (error instanceof ApiError) {
    // Log API errors at warn level (expected errors)
    logger.warn(
      { method: c.req.method, path: c.req.path, status: error.statusCode, message: error.message },
      'API error'
    );
    const body: ErrorResponse = {
      error: error.message,
    };
    return c.json(body, error.statusCode);
  }

  // Log unexpected errors at error level
  logger.error(
    { method: c.req.method, path: c.req.path, err: error },
    'Unexpected error'
  );

  // Return generic error for non-API errors
  const message = error instanceof Error ? error.message : 'Unknown error';
  return c.json({ error: message } satisfies ErrorResponse, 500);
}

/**
 * Hono's onError handler.
 * Used with app.onError()
 */
export function onApiError(error: Error, c: Context): Response {
  return handleError(c, error);
}
