/**
 * Liveness + Readiness Probe Routes
 *
 * GET /health  process is up
 * GET /ready   checks storage backend connectivity
 */

import { Hono } from 'hono';
import type { WorkflowStorage } from '../storage/storage-interface.js';
import type { AppEnv } from '../types/app-env.js';

/**
 * Creates a Hono router with liveness and readiness probe endpoints.
 */
export function createProbeRouter(storage: WorkflowStorage): Hono<AppEnv> {
  const router = new Hono<AppEnv>();

  router.get('/health', (c) => c.json({ ok: true }));

  /**
   * GET /ready  Readiness probe
   * Checks storage backend connectivity via healthCheck().
   */
  router.get('/ready', async (c) => {
    try {
      const result = await storage.healthCheck();
      if (result.ok) {
        return c.json({ ok: true, latencyMs: result.latencyMs }, 200);
      }
      return c.json({ ok: false, latencyMs: result.latencyMs }, 503);
    } catch {
      return c.json({ ok: false, latencyMs: 0 }, 503);
    }
  });

  return router;
}
