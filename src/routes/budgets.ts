/**
 * Budget Routes
 *
 * - GET    /                   Caller's budgets plus global ones (?activeOnly=true)
 * - GET    /status             Utilization of the caller's active budgets
 * - POST   /                   Create a budget
 * - PUT    /:id                Update a budget
 * - POST   /:id/activate       Activate
 * - POST   /:id/deactivate     Deactivate
 * - DELETE /:id                Delete
 */

import { Hono } from "hono";
import type { BudgetService } from "../core/budget-service.js";
import type { AppEnv } from "../types/app-env.js";
import { BudgetId } from "../types/branded.js";
import { requireActor, requirePermission } from "../auth/middleware.js";
import {
  budgetListQuery,
  createBudgetBody,
  parseJsonBody,
  updateBudgetBody,
} from "./request-schemas.js";

export function createBudgetRouter(service: BudgetService): Hono<AppEnv> {
  const router = new Hono<AppEnv>();

  router.get("/", requirePermission("expense:read"), async (c) => {
    const actor = requireActor(c);
    const { activeOnly } = budgetListQuery.parse(c.req.query());
    return c.json(await service.listBudgets(actor.userId, { activeOnly }));
  });

  router.get("/status", requirePermission("expense:read"), async (c) => {
    const actor = requireActor(c);
    return c.json(await service.getBudgetStatus(actor.userId));
  });

  router.post("/", requirePermission("budget:write"), async (c) => {
    const actor = requireActor(c);
    const body = await parseJsonBody(c, createBudgetBody);

    const budgetId = await service.createBudget(actor, body);
    return c.json({ ok: true, budgetId }, 201);
  });

  router.put("/:id", requirePermission("budget:write"), async (c) => {
    const actor = requireActor(c);
    const body = await parseJsonBody(c, updateBudgetBody);
    const budgetId = BudgetId(c.req.param("id"));

    await service.updateBudget(budgetId, actor, body);
    return c.json({ ok: true, budgetId });
  });

  router.post("/:id/activate", requirePermission("budget:write"), async (c) => {
    const budgetId = BudgetId(c.req.param("id"));
    await service.activateBudget(budgetId, requireActor(c));
    return c.json({ ok: true, budgetId, isActive: true });
  });

  router.post("/:id/deactivate", requirePermission("budget:write"), async (c) => {
    const budgetId = BudgetId(c.req.param("id"));
    await service.deactivateBudget(budgetId, requireActor(c));
    return c.json({ ok: true, budgetId, isActive: false });
  });

  router.delete("/:id", requirePermission("budget:write"), async (c) => {
    const budgetId = BudgetId(c.req.param("id"));
    await service.deleteBudget(budgetId, requireActor(c));
    return c.json({ ok: true, budgetId });
  });

  return router;
}
