/**
 * Access log: one line per request with method, path, status, latency,
 * the request id and, once authenticated, the caller.
 */

import type { MiddlewareHandler } from 'hono';
import type { Logger } from 'pino';
import type { AppEnv } from '../types/app-env.js';

export function requestLoggerMiddleware(logger: Logger): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const start = performance.now();
    await next();
    const latencyMs = Math.round(performance.now() - start);

    const { method, path } = c.req;
    const status = c.res.status;
    const fields = {
      requestId: c.get('requestId'),
      userId: c.get('auth')?.userId,
      method,
      path,
      status,
      latencyMs,
      logger: 'http',
    };
    const message = `${method} ${path} ${status} ${latencyMs}ms`;

    if (status >= 500) {
      logger.error(fields, message);
    } else {
      logger.info(fields, message);
    }
  };
}
