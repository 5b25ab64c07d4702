/**
 * Error Handler
 *
 * Centralized error handling for the expense API. Maps errors thrown by
 * route handlers and services to HTTP status codes and the
 * `{ ok: false, error: { type, message } }` response shape.
 *
 * - BusinessRuleError → 400 business_rule (message verbatim)
 * - NotFoundError → 404 not_found
 * - ZodError → 400 invalid_request with field issues
 * - HTTPException → its own status
 * - anything else → 500 internal_error
 */

import type { Context } from 'hono';
import { HTTPException } from 'hono/http-exception';
import type { ContentfulStatusCode } from 'hono/utils/http-status';
import type { Logger } from 'pino';
import { ZodError } from 'zod';
import { BusinessRuleError, NotFoundError } from '../core/errors.js';
import { getLogger } from '../logging.js';
import type { AppEnv } from '../types/app-env.js';

export interface ErrorResponse {
  ok: false;
  error: {
    type: string;
    message: string;
    details?: unknown;
  };
}

/**
 * Maps error types to HTTP status codes
 */
export function getStatusCodeForError(error: unknown): ContentfulStatusCode {
  if (error instanceof HTTPException) {
    return error.status;
  }
  if (error instanceof BusinessRuleError || error instanceof ZodError) {
    return 400;
  }
  if (error instanceof NotFoundError) {
    return 404;
  }
  return 500;
}

function typeForHttpStatus(status: number): string {
  switch (status) {
    case 401:
      return 'unauthorized';
    case 403:
      return 'forbidden';
    case 404:
      return 'not_found';
    default:
      return status >= 500 ? 'internal_error' : 'invalid_request';
  }
}

/**
 * Formats errors into the generic error response
 */
export function formatError(error: unknown, options: { exposeInternal: boolean }): ErrorResponse {
  if (error instanceof BusinessRuleError) {
    return { ok: false, error: { type: 'business_rule', message: error.message } };
  }

  if (error instanceof NotFoundError) {
    return { ok: false, error: { type: 'not_found', message: error.message } };
  }

  if (error instanceof ZodError) {
    return {
      ok: false,
      error: {
        type: 'invalid_request',
        message: 'Request validation failed',
        details: error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      },
    };
  }

  if (error instanceof HTTPException) {
    return {
      ok: false,
      error: { type: typeForHttpStatus(error.status), message: error.message },
    };
  }

  return {
    ok: false,
    error: {
      type: 'internal_error',
      message:
        options.exposeInternal && error instanceof Error
          ? error.message
          : 'An internal error occurred',
    },
  };
}

/**
 * Error handler factory
 *
 * Usage:
 * ```typescript
 * const app = new Hono();
 * app.onError(createErrorHandler());
 * ```
 *
 * @param options.exposeInternal - Include messages of unexpected errors (default: NODE_ENV !== 'production')
 * @param options.logger - Logger for unexpected errors (default: the application logger)
 */
export function createErrorHandler(options?: {
  exposeInternal?: boolean;
  logger?: Logger;
}): (err: Error, c: Context<AppEnv>) => Response {
  const exposeInternal = options?.exposeInternal ?? process.env['NODE_ENV'] !== 'production';

  return (err, c) => {
    const statusCode = getStatusCodeForError(err);

    if (statusCode >= 500) {
      (options?.logger ?? getLogger()).error(
        { err, requestId: c.get('requestId'), path: c.req.path },
        'Unhandled error'
      );
    }

    return c.json(formatError(err, { exposeInternal }), statusCode);
  };
}
