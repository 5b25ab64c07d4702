/**
 * Request correlation id.
 *
 * Reuses an upstream X-Request-Id when it looks sane, otherwise mints a
 * UUID. The id is echoed on the response and stored as `requestId` on the
 * context for logging.
 */

import { randomUUID } from 'crypto';
import type { MiddlewareHandler } from 'hono';
import type { AppEnv } from '../types/app-env.js';

const MAX_REQUEST_ID_LENGTH = 128;
const REQUEST_ID_PATTERN = /^[\w.:-]+$/;

export function requestIdMiddleware(): MiddlewareHandler<AppEnv> {
  return async (c, next) => {
    const incoming = c.req.header('X-Request-Id')?.trim();
    const requestId =
      incoming && incoming.length <= MAX_REQUEST_ID_LENGTH && REQUEST_ID_PATTERN.test(incoming)
        ? incoming
        : randomUUID();

    c.set('requestId', requestId);
    c.header('X-Request-Id', requestId);
    await next();
  };
}
