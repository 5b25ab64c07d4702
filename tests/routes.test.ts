/**
 * HTTP API tests through app.request() with header identity.
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { Hono } from "hono";
import { createExpenseApp } from "../src/app.js";
import { MemoryStorage } from "../src/storage/memory-storage.js";
import type { UserId } from "../src/types/branded.js";
import type { AppEnv } from "../src/types/app-env.js";
import type { UserRole } from "../src/types/expense-contract.js";
import {
  ADMIN,
  EMPLOYEE,
  EMPLOYEE_2,
  MANAGER,
  TRAVEL,
  seedCategories,
  seedUsers,
  steppingClock,
} from "./fixtures.js";

interface Caller {
  id: UserId;
  role: UserRole;
}

const employee: Caller = { id: EMPLOYEE, role: "employee" };
const otherEmployee: Caller = { id: EMPLOYEE_2, role: "employee" };
const manager: Caller = { id: MANAGER, role: "manager" };
const admin: Caller = { id: ADMIN, role: "admin" };

const DINNER = {
  title: "Client dinner",
  description: "Dinner with the Acme team",
  amount: 80,
  expenseDate: "2024-06-10T00:00:00.000Z",
};

describe("Expense API", () => {
  let app: Hono<AppEnv>;

  function call(method: string, path: string, caller: Caller | null, body?: unknown) {
    const headers: Record<string, string> = { "Content-Type": "application/json" };
    if (caller) {
      headers["X-User-Id"] = caller.id;
      headers["X-User-Role"] = caller.role;
    }
    return app.request(path, {
      method,
      headers,
      body: body === undefined ? undefined : JSON.stringify(body),
    });
  }

  async function createExpense(caller: Caller, body: object = DINNER): Promise<string> {
    const res = await call("POST", "/api/expenses", caller, body);
    expect(res.status).toBe(201);
    const json = await res.json();
    return json.expenseId;
  }

  beforeEach(async () => {
    const storage = new MemoryStorage();
    await seedUsers(storage);
    await seedCategories(storage);
    app = createExpenseApp({ storage, clock: steppingClock(), exposeInternalErrors: false });
  });

  // ===========================================================================
  // § Probes and infrastructure
  // ===========================================================================

  describe("probes", () => {
    it("GET /health", async () => {
      const res = await app.request("/health");
      expect(res.status).toBe(200);
      expect(await res.json()).toEqual({ ok: true });
    });

    it("GET /ready checks storage", async () => {
      const res = await app.request("/ready");
      expect(res.status).toBe(200);
      expect((await res.json()).ok).toBe(true);
    });

    it("GET /metrics serves Prometheus text", async () => {
      const res = await app.request("/metrics");
      expect(res.status).toBe(200);
      expect(await res.text()).toContain("# TYPE expense_transitions_total counter");
    });

    it("echoes X-Request-Id", async () => {
      const res = await app.request("/health", { headers: { "X-Request-Id": "req-42" } });
      expect(res.headers.get("X-Request-Id")).toBe("req-42");
    });

    it("unknown routes return not_found", async () => {
      const res = await app.request("/nope");
      expect(res.status).toBe(404);
      expect(await res.json()).toEqual({
        ok: false,
        error: { type: "not_found", message: "No route for GET /nope" },
      });
    });
  });

  // ===========================================================================
  // § Authentication
  // ===========================================================================

  describe("header identity", () => {
    it("requires X-User-Id", async () => {
      const res = await call("GET", "/api/expenses", null);
      expect(res.status).toBe(401);
      expect(await res.json()).toEqual({
        ok: false,
        error: { type: "unauthorized", message: "Missing X-User-Id header" },
      });
    });

    it("rejects unknown roles", async () => {
      const res = await app.request("/api/expenses", {
        headers: { "X-User-Id": "someone", "X-User-Role": "ceo" },
      });
      expect(res.status).toBe(401);
      expect((await res.json()).error.message).toBe("Unknown role: ceo");
    });

    it("defaults the role to employee", async () => {
      const res = await app.request("/api/expenses/pending", {
        headers: { "X-User-Id": EMPLOYEE },
      });
      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({
        ok: false,
        error: { type: "forbidden", message: "Missing permission: expense:approve" },
      });
    });
  });

  // ===========================================================================
  // § Expense workflow
  // ===========================================================================

  describe("expense workflow", () => {
    it("create, attach, submit, approve, then edits are refused", async () => {
      const create = await call("POST", "/api/expenses", employee, { ...DINNER, amount: 150 });
      expect(create.status).toBe(201);
      const created = await create.json();
      expect(created.ok).toBe(true);
      expect(created.status).toBe("draft");
      const id: string = created.expenseId;

      const early = await call("POST", `/api/expenses/${id}/submit`, employee);
      expect(early.status).toBe(400);
      expect(await early.json()).toEqual({
        ok: false,
        error: {
          type: "business_rule",
          message: "Expenses over $100 require a receipt attachment.",
        },
      });

      const attach = await call("POST", `/api/expenses/${id}/attachments`, employee, {
        url: "url1",
      });
      expect(attach.status).toBe(200);

      const submit = await call("POST", `/api/expenses/${id}/submit`, employee);
      expect(await submit.json()).toEqual({ ok: true, expenseId: id, status: "submitted" });

      const selfApprove = await call("POST", `/api/expenses/${id}/approve`, employee);
      expect(selfApprove.status).toBe(403);

      const pending = await call("GET", "/api/expenses/pending", manager);
      const page = await pending.json();
      expect(page.totalCount).toBe(1);
      expect(page.items[0].id).toBe(id);
      expect(page.items[0].creatorName).toBe("Erin Employee");

      const approve = await call("POST", `/api/expenses/${id}/approve`, manager);
      expect(await approve.json()).toEqual({ ok: true, expenseId: id, status: "approved" });

      const edit = await call("PUT", `/api/expenses/${id}`, employee, DINNER);
      expect(edit.status).toBe(400);
      expect((await edit.json()).error.message).toBe("Only draft requests can be edited.");

      const history = await call("GET", `/api/expenses/${id}/audit-history`, employee);
      const entries: Array<{ action: string }> = await history.json();
      expect(entries.map((e) => e.action)).toEqual([
        "Created",
        "AttachmentAdded",
        "Submitted",
        "Approved",
      ]);
    });

    it("rejection requires a reason", async () => {
      const id = await createExpense(employee);
      await call("POST", `/api/expenses/${id}/submit`, employee);

      const blank = await call("POST", `/api/expenses/${id}/reject`, manager, { reason: " " });
      expect((await blank.json()).error.message).toBe("Rejection reason is required.");

      const reject = await call("POST", `/api/expenses/${id}/reject`, manager, {
        reason: "Duplicate",
      });
      expect(await reject.json()).toEqual({ ok: true, expenseId: id, status: "rejected" });

      const view = await (await call("GET", `/api/expenses/${id}`, employee)).json();
      expect(view.rejectionReason).toBe("Duplicate");
    });

    it("managers cannot approve their own expenses", async () => {
      const id = await createExpense(manager);
      await call("POST", `/api/expenses/${id}/submit`, manager);

      const res = await call("POST", `/api/expenses/${id}/approve`, manager);
      expect(res.status).toBe(400);
      expect((await res.json()).error.message).toBe(
        "Managers cannot approve their own expenses. Only admins can approve manager expenses."
      );

      const adminApproval = await call("POST", `/api/expenses/${id}/approve`, admin);
      expect(adminApproval.status).toBe(200);
    });

    it("deletes drafts", async () => {
      const id = await createExpense(employee);
      const res = await call("DELETE", `/api/expenses/${id}`, employee);
      expect(await res.json()).toEqual({ ok: true, expenseId: id });

      const gone = await call("GET", `/api/expenses/${id}`, employee);
      expect(gone.status).toBe(404);
      expect(await gone.json()).toEqual({
        ok: false,
        error: { type: "not_found", message: `Expense not found: ${id}` },
      });
    });

    it("removes attachments", async () => {
      const id = await createExpense(employee);
      await call("POST", `/api/expenses/${id}/attachments`, employee, { url: "u1" });
      const res = await call("DELETE", `/api/expenses/${id}/attachments`, employee, { url: "u1" });
      expect(res.status).toBe(200);

      const view = await (await call("GET", `/api/expenses/${id}`, employee)).json();
      expect(view.attachmentUrls).toEqual([]);
    });
  });

  // ===========================================================================
  // § Access control
  // ===========================================================================

  describe("access control", () => {
    it("hides other users' expenses from employees", async () => {
      const id = await createExpense(employee);

      const res = await call("GET", `/api/expenses/${id}`, otherEmployee);
      expect(res.status).toBe(403);
      expect(await res.json()).toEqual({
        ok: false,
        error: { type: "forbidden", message: "Not allowed to access this expense" },
      });

      const asManager = await call("GET", `/api/expenses/${id}`, manager);
      expect(asManager.status).toBe(200);
      expect((await asManager.json()).creatorName).toBe("Erin Employee");
    });

    it("only the creator changes attachments", async () => {
      const id = await createExpense(employee);
      const res = await call("POST", `/api/expenses/${id}/attachments`, manager, { url: "x" });
      expect(res.status).toBe(403);
      expect((await res.json()).error.message).toBe("Only the creator can change attachments");
    });

    it("lists only the caller's expenses", async () => {
      await createExpense(employee);
      await createExpense(employee, { ...DINNER, title: "Second" });
      await createExpense(otherEmployee);

      const res = await call("GET", "/api/expenses?pageSize=1&sortBy=amount", employee);
      const page = await res.json();
      expect(page.totalCount).toBe(2);
      expect(page.items).toHaveLength(1);
      expect(page.totalPages).toBe(2);
    });
  });

  // ===========================================================================
  // § Request validation
  // ===========================================================================

  describe("validation", () => {
    it("reports schema failures with field details", async () => {
      const res = await call("POST", "/api/expenses", employee, { ...DINNER, amount: "12" });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        ok: false,
        error: {
          type: "invalid_request",
          message: "Request validation failed",
          details: [{ path: "amount", message: "Expected number, received string" }],
        },
      });
    });

    it("rejects amounts with more than two decimals", async () => {
      const res = await call("POST", "/api/expenses", employee, { ...DINNER, amount: 10.555 });
      expect((await res.json()).error.details).toEqual([
        { path: "amount", message: "Amount must have at most two decimal places" },
      ]);
    });

    it("rejects malformed JSON", async () => {
      const res = await app.request("/api/expenses", {
        method: "POST",
        headers: { "Content-Type": "application/json", "X-User-Id": EMPLOYEE },
        body: "{not json",
      });
      expect(res.status).toBe(400);
      expect(await res.json()).toEqual({
        ok: false,
        error: { type: "invalid_request", message: "Request body must be valid JSON" },
      });
    });

    it("rejects an unknown status filter", async () => {
      const res = await call("GET", "/api/expenses?status=paid", employee);
      expect(res.status).toBe(400);
      expect((await res.json()).error.type).toBe("invalid_request");
    });

    it("surfaces domain rules verbatim", async () => {
      const res = await call("POST", "/api/expenses", employee, {
        ...DINNER,
        expenseDate: "2030-01-01T00:00:00.000Z",
      });
      expect(await res.json()).toEqual({
        ok: false,
        error: { type: "business_rule", message: "Expense date cannot be in the future." },
      });
    });
  });

  // ===========================================================================
  // § Comments
  // ===========================================================================

  describe("comments", () => {
    it("managers comment and the creator reads them", async () => {
      const id = await createExpense(employee);

      const post = await call("POST", `/api/expenses/${id}/comments`, manager, {
        text: "Which client?",
      });
      expect(post.status).toBe(201);
      const { comment } = await post.json();
      expect(comment.userName).toBe("Morgan Manager");

      const list = await call("GET", `/api/expenses/${id}/comments`, employee);
      const comments: Array<{ text: string }> = await list.json();
      expect(comments.map((c) => c.text)).toEqual(["Which client?"]);
    });
  });

  // ===========================================================================
  // § Budgets
  // ===========================================================================

  describe("budgets", () => {
    const JUNE = {
      name: "June",
      amount: 500,
      startDate: "2024-06-01T00:00:00.000Z",
      endDate: "2024-06-30T00:00:00.000Z",
    };

    it("creates a budget and reports its status", async () => {
      const create = await call("POST", "/api/budgets", employee, JUNE);
      expect(create.status).toBe(201);
      const { budgetId } = await create.json();

      const id = await createExpense(employee, { ...DINNER, amount: 100 });
      await call("POST", `/api/expenses/${id}/submit`, employee);
      await call("POST", `/api/expenses/${id}/approve`, manager);

      const status = await (await call("GET", "/api/budgets/status", employee)).json();
      expect(status).toHaveLength(1);
      expect(status[0]).toMatchObject({
        budgetId,
        spentAmount: 100,
        remainingAmount: 400,
        percentageUsed: 20,
        isOverBudget: false,
      });
    });

    it("only admins create global budgets", async () => {
      const res = await call("POST", "/api/budgets", employee, { ...JUNE, global: true });
      expect(res.status).toBe(400);
      expect((await res.json()).error.message).toBe("Only admins can create global budgets.");

      const asAdmin = await call("POST", "/api/budgets", admin, { ...JUNE, global: true });
      expect(asAdmin.status).toBe(201);

      const list = await (await call("GET", "/api/budgets", employee)).json();
      expect(list).toHaveLength(1);
      expect(list[0].userId).toBeNull();
    });

    it("deactivates and deletes", async () => {
      const { budgetId } = await (await call("POST", "/api/budgets", employee, JUNE)).json();

      const off = await call("POST", `/api/budgets/${budgetId}/deactivate`, employee);
      expect(await off.json()).toEqual({ ok: true, budgetId, isActive: false });
      expect(await (await call("GET", "/api/budgets?activeOnly=true", employee)).json()).toEqual(
        []
      );

      const stranger = await call("DELETE", `/api/budgets/${budgetId}`, otherEmployee);
      expect((await stranger.json()).error.message).toBe("You can only manage your own budgets.");

      const del = await call("DELETE", `/api/budgets/${budgetId}`, employee);
      expect(del.status).toBe(200);
    });
  });

  // ===========================================================================
  // § Categories and analytics
  // ===========================================================================

  describe("categories", () => {
    it("lists active categories", async () => {
      const res = await call("GET", "/api/categories", employee);
      const categories: Array<{ name: string }> = await res.json();
      expect(categories).toHaveLength(6);
      expect(categories[0]?.name).toBe("Meals & Entertainment");
    });

    it("category management needs category:write", async () => {
      const denied = await call("POST", "/api/categories", manager, { name: "Parking" });
      expect(denied.status).toBe(403);

      const created = await call("POST", "/api/categories", admin, { name: "Parking" });
      expect(created.status).toBe(201);
      expect((await created.json()).category.name).toBe("Parking");

      const off = await call("POST", `/api/categories/${TRAVEL}/deactivate`, admin);
      expect(await off.json()).toEqual({ ok: true, categoryId: TRAVEL, isActive: false });

      const all = await (await call("GET", "/api/categories?includeInactive=true", admin)).json();
      expect(all).toHaveLength(7);
    });
  });

  describe("analytics", () => {
    it("summarizes the caller's expenses", async () => {
      await createExpense(employee, { ...DINNER, categoryId: TRAVEL });
      await createExpense(employee, { ...DINNER, amount: 20 });

      const res = await call("GET", "/api/analytics/my-expenses", employee);
      const summary = await res.json();
      expect(summary.totalCount).toBe(2);
      expect(summary.totalExpenses).toBe(100);
      expect(summary.categoryBreakdown.map((c: { categoryName: string }) => c.categoryName)).toEqual([
        "Travel",
        "Uncategorized",
      ]);
    });

    it("manager views need analytics:read_all", async () => {
      const denied = await call("GET", "/api/analytics/manager/status-distribution", employee);
      expect(denied.status).toBe(403);

      await createExpense(employee);
      await createExpense(otherEmployee);
      const res = await call("GET", "/api/analytics/manager/status-distribution", manager);
      expect(await res.json()).toEqual([
        { status: "draft", count: 2, totalAmount: 160, percentage: 100 },
      ]);
    });

    it("approval rates honor monthsBack", async () => {
      const res = await call("GET", "/api/analytics/approval-rates?monthsBack=2", employee);
      const rates: Array<{ period: string }> = await res.json();
      expect(rates.map((r) => r.period)).toEqual(["2024-05", "2024-06"]);
    });
  });
});
