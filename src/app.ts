/**
 * Expense workflow HTTP application.
 *
 * Wires storage, identity directory, domain event dispatcher and services
 * into a Hono app with the standard middleware pipeline.
 */

import { Hono } from 'hono';
import { bodyLimit } from 'hono/body-limit';
import { secureHeaders } from 'hono/secure-headers';
import type { Logger } from 'pino';
import { createAuthMiddleware, type AuthConfig } from './auth/middleware.js';
import { AnalyticsService } from './core/analytics-service.js';
import { BudgetService } from './core/budget-service.js';
import { CategoryService } from './core/category-service.js';
import { DomainEventDispatcher } from './core/event-dispatcher.js';
import type { ExpensePolicy } from './core/expense-policy.js';
import { ExpenseService } from './core/expense-service.js';
import { StorageIdentityDirectory, type IdentityDirectory } from './core/identity-directory.js';
import { createChildLogger } from './logging.js';
import { attachMetricsListeners, getMetricsContentType, getMetricsText } from './metrics.js';
import { createErrorHandler } from './middleware/error-handler.js';
import { requestIdMiddleware } from './middleware/request-id.js';
import { requestLoggerMiddleware } from './middleware/request-logger.js';
import { createAnalyticsRouter } from './routes/analytics.js';
import { createBudgetRouter } from './routes/budgets.js';
import { createCategoryRouter } from './routes/categories.js';
import { createExpenseRouter } from './routes/expenses.js';
import { createProbeRouter } from './routes/probes.js';
import type { WorkflowStorage } from './storage/storage-interface.js';
import type { AppEnv } from './types/app-env.js';

export interface ExpenseAppOptions {
  storage: WorkflowStorage;
  policy?: ExpensePolicy;
  /** Defaults to disabled (header identity) */
  auth?: AuthConfig;
  clock?: () => Date;
  logger?: Logger;
  /** Defaults to the storage-backed directory */
  identities?: IdentityDirectory;
  /** Receives committed domain events; metrics listeners are attached to it */
  dispatcher?: DomainEventDispatcher;
  /** Include messages of unexpected errors in 500 responses */
  exposeInternalErrors?: boolean;
}

export interface ExpenseServices {
  expenses: ExpenseService;
  budgets: BudgetService;
  categories: CategoryService;
  analytics: AnalyticsService;
}

export function createExpenseServices(options: ExpenseAppOptions): ExpenseServices {
  const { storage, policy, clock } = options;
  const identities = options.identities ?? new StorageIdentityDirectory(storage.users);
  const dispatcher = options.dispatcher ?? new DomainEventDispatcher();
  attachMetricsListeners(dispatcher);

  return {
    expenses: new ExpenseService(storage, identities, dispatcher, { policy, clock }),
    budgets: new BudgetService(storage, { clock }),
    categories: new CategoryService(storage, { clock }),
    analytics: new AnalyticsService(storage, { clock }),
  };
}

/**
 * Creates the Hono app.
 *
 * Routes:
 * - /health, /ready, /metrics: unauthenticated
 * - /api/expenses, /api/budgets, /api/analytics, /api/categories: authenticated
 */
export function createExpenseApp(options: ExpenseAppOptions): Hono<AppEnv> {
  const logger = options.logger ?? createChildLogger({ component: 'http' });
  const services = createExpenseServices(options);
  const app = new Hono<AppEnv>();

  // Request ID + structured logging
  app.use('*', requestIdMiddleware());
  app.use('*', requestLoggerMiddleware(logger));

  // Security headers
  app.use('*', secureHeaders());

  // Body size limit (1MB)
  app.use('*', bodyLimit({ maxSize: 1024 * 1024 }));

  app.onError(createErrorHandler({ exposeInternal: options.exposeInternalErrors, logger }));
  app.notFound((c) =>
    c.json({ ok: false, error: { type: 'not_found', message: `No route for ${c.req.method} ${c.req.path}` } }, 404)
  );

  app.route('/', createProbeRouter(options.storage));
  app.get('/metrics', async (c) => {
    const text = await getMetricsText();
    return c.text(text, 200, { 'Content-Type': getMetricsContentType() });
  });

  app.use('/api/*', createAuthMiddleware(options.auth ?? { enabled: false }));
  app.route('/api/expenses', createExpenseRouter(services.expenses));
  app.route('/api/budgets', createBudgetRouter(services.budgets));
  app.route('/api/analytics', createAnalyticsRouter(services.analytics, services.categories));
  app.route('/api/categories', createCategoryRouter(services.categories));

  return app;
}
