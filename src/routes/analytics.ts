/**
 * Analytics HTTP routes.
 *
 * GET /my-expenses                       Caller's spending summary
 * GET /categories                        Active categories
 * GET /status-distribution               Caller's expenses by status
 * GET /approval-rates?monthsBack=6       Caller's monthly approval rates
 * GET /manager/status-distribution       All users (analytics:read_all)
 * GET /manager/approval-rates            All users (analytics:read_all)
 */

import { Hono } from "hono";
import type { AnalyticsService } from "../core/analytics-service.js";
import type { CategoryService } from "../core/category-service.js";
import type { AppEnv } from "../types/app-env.js";
import { requireActor, requirePermission } from "../auth/middleware.js";
import { approvalRatesQuery, dateRangeQuery } from "./request-schemas.js";

export function createAnalyticsRouter(
  analytics: AnalyticsService,
  categories: CategoryService
): Hono<AppEnv> {
  const app = new Hono<AppEnv>();

  app.get("/my-expenses", requirePermission("analytics:read"), async (c) => {
    const actor = requireActor(c);
    const range = dateRangeQuery.parse(c.req.query());
    return c.json(await analytics.getExpenseAnalytics(actor.userId, range));
  });

  app.get("/categories", requirePermission("analytics:read"), async (c) => {
    return c.json(await categories.listCategories());
  });

  app.get("/status-distribution", requirePermission("analytics:read"), async (c) => {
    const actor = requireActor(c);
    const range = dateRangeQuery.parse(c.req.query());
    return c.json(await analytics.getStatusDistribution(actor.userId, range));
  });

  app.get("/approval-rates", requirePermission("analytics:read"), async (c) => {
    const actor = requireActor(c);
    const { monthsBack } = approvalRatesQuery.parse(c.req.query());
    return c.json(await analytics.getApprovalRates(actor.userId, monthsBack));
  });

  app.get("/manager/status-distribution", requirePermission("analytics:read_all"), async (c) => {
    const range = dateRangeQuery.parse(c.req.query());
    return c.json(await analytics.getStatusDistribution(null, range));
  });

  app.get("/manager/approval-rates", requirePermission("analytics:read_all"), async (c) => {
    const { monthsBack } = approvalRatesQuery.parse(c.req.query());
    return c.json(await analytics.getApprovalRates(null, monthsBack));
  });

  return app;
}
