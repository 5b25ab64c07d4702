/**
 * Expense Routes
 *
 * Endpoints:
 * - POST   /                        Create a draft
 * - GET    /                        Caller's expenses (filter, sort, page)
 * - GET    /pending                 Submitted expenses awaiting a decision
 * - GET    /:id                     One expense
 * - PUT    /:id                     Update a draft
 * - DELETE /:id                     Delete a draft
 * - POST   /:id/submit|approve|reject
 * - POST   /:id/attachments         Add attachment URL
 * - DELETE /:id/attachments         Remove attachment URL
 * - GET    /:id/audit-history
 * - GET    /:id/comments, POST /:id/comments
 */

import { Hono } from "hono";
import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import type { ExpenseService } from "../core/expense-service.js";
import type { AppEnv } from "../types/app-env.js";
import { ExpenseId } from "../types/branded.js";
import { getAuthContext, requireActor, requirePermission } from "../auth/middleware.js";
import { hasPermission } from "../auth/rbac.js";
import {
  attachmentBody,
  commentBody,
  createExpenseBody,
  expenseListQuery,
  parseJsonBody,
  rejectExpenseBody,
  updateExpenseBody,
} from "./request-schemas.js";

/**
 * Creates a Hono router with expense endpoints. Mount under /api/expenses.
 */
export function createExpenseRouter(service: ExpenseService): Hono<AppEnv> {
  const router = new Hono<AppEnv>();

  /**
   * Loads the expense and checks the caller may see it: its creator, or
   * anyone with expense:read_all.
   */
  async function loadVisible(c: Context<AppEnv>) {
    const actor = requireActor(c);
    const expense = await service.getExpense(ExpenseId(c.req.param("id") ?? ""));
    if (expense.creatorId !== actor.userId && !hasPermission(actor.role, "expense:read_all")) {
      throw new HTTPException(403, { message: "Not allowed to access this expense" });
    }
    return expense;
  }

  /** Attachments are managed by the creator only */
  async function loadOwned(c: Context<AppEnv>) {
    const actor = requireActor(c);
    const expense = await service.getExpense(ExpenseId(c.req.param("id") ?? ""));
    if (expense.creatorId !== actor.userId) {
      throw new HTTPException(403, { message: "Only the creator can change attachments" });
    }
    return expense;
  }

  router.post("/", requirePermission("expense:write"), async (c) => {
    const actor = requireActor(c);
    const body = await parseJsonBody(c, createExpenseBody);

    const expenseId = await service.createExpense({
      creatorId: actor.userId,
      creatorRole: actor.role,
      ...body,
    });
    return c.json({ ok: true, expenseId, status: "draft" }, 201);
  });

  router.get("/", requirePermission("expense:read"), async (c) => {
    const actor = requireActor(c);
    const query = expenseListQuery.parse(c.req.query());
    return c.json(await service.listExpenses(actor.userId, query));
  });

  router.get("/pending", requirePermission("expense:approve"), async (c) => {
    const { status: _status, ...query } = expenseListQuery.parse(c.req.query());
    return c.json(await service.listPendingExpenses(query));
  });

  router.get("/:id", requirePermission("expense:read"), async (c) => {
    return c.json(await loadVisible(c));
  });

  router.put("/:id", requirePermission("expense:write"), async (c) => {
    const actor = requireActor(c);
    const body = await parseJsonBody(c, updateExpenseBody);
    const expenseId = ExpenseId(c.req.param("id"));

    await service.updateExpense(expenseId, actor.userId, body);
    return c.json({ ok: true, expenseId });
  });

  router.delete("/:id", requirePermission("expense:write"), async (c) => {
    const actor = requireActor(c);
    const expenseId = ExpenseId(c.req.param("id"));

    await service.deleteExpense(expenseId, actor.userId);
    return c.json({ ok: true, expenseId });
  });

  router.post("/:id/submit", requirePermission("expense:write"), async (c) => {
    const actor = requireActor(c);
    const expenseId = ExpenseId(c.req.param("id"));

    await service.submitExpense(expenseId, actor.userId);
    return c.json({ ok: true, expenseId, status: "submitted" });
  });

  router.post("/:id/approve", requirePermission("expense:approve"), async (c) => {
    const actor = requireActor(c);
    const expenseId = ExpenseId(c.req.param("id"));

    await service.approveExpense(expenseId, actor.userId, actor.role);
    return c.json({ ok: true, expenseId, status: "approved" });
  });

  router.post("/:id/reject", requirePermission("expense:approve"), async (c) => {
    const actor = requireActor(c);
    const { reason } = await parseJsonBody(c, rejectExpenseBody);
    const expenseId = ExpenseId(c.req.param("id"));

    await service.rejectExpense(expenseId, actor.userId, actor.role, reason);
    return c.json({ ok: true, expenseId, status: "rejected" });
  });

  router.post("/:id/attachments", requirePermission("expense:write"), async (c) => {
    const { url } = await parseJsonBody(c, attachmentBody);
    const expense = await loadOwned(c);

    await service.addAttachment(expense.id, url);
    return c.json({ ok: true, expenseId: expense.id });
  });

  router.delete("/:id/attachments", requirePermission("expense:write"), async (c) => {
    const { url } = await parseJsonBody(c, attachmentBody);
    const expense = await loadOwned(c);

    await service.removeAttachment(expense.id, url);
    return c.json({ ok: true, expenseId: expense.id });
  });

  router.get("/:id/audit-history", requirePermission("expense:read"), async (c) => {
    const expense = await loadVisible(c);
    return c.json(await service.getAuditHistory(expense.id));
  });

  router.get("/:id/comments", requirePermission("expense:read"), async (c) => {
    const expense = await loadVisible(c);
    return c.json(await service.listComments(expense.id));
  });

  router.post("/:id/comments", requirePermission("expense:read"), async (c) => {
    const actor = requireActor(c);
    const { text } = await parseJsonBody(c, commentBody);
    const expense = await loadVisible(c);

    const comment = await service.addComment(
      expense.id,
      actor.userId,
      text,
      getAuthContext(c)?.name
    );
    return c.json({ ok: true, comment }, 201);
  });

  return router;
}
