/**
 * ExpenseService orchestration tests
 *
 * Runs the workflow against MemoryStorage: persistence of entity and audit
 * record in one unit of work, domain event dispatch, identity lookups.
 */

import { describe, it, expect, beforeEach, vi } from "vitest";
import { BusinessRuleError, NotFoundError } from "../src/core/errors.js";
import { DEFAULT_EXPENSE_POLICY } from "../src/core/expense-policy.js";
import { ExpenseService } from "../src/core/expense-service.js";
import { StorageIdentityDirectory } from "../src/core/identity-directory.js";
import { MemoryStorage } from "../src/storage/memory-storage.js";
import { StagedUnitOfWork, type UnitOfWork } from "../src/storage/storage-interface.js";
import { CategoryId, ExpenseId, UserId } from "../src/types/branded.js";
import type { ExpenseRequestRecord } from "../src/types/expense-contract.js";
import {
  ADMIN,
  EMPLOYEE,
  EMPLOYEE_2,
  MANAGER,
  MANAGER_2,
  RECEIPT_URL,
  TRAVEL,
  createExpenseHarness,
  expenseInput,
  type ExpenseHarness,
} from "./fixtures.js";

const MISSING_CATEGORY = CategoryId("99999999-9999-9999-9999-999999999999");

/** MemoryStorage whose next unit of work fails on commit */
class FailingStorage extends MemoryStorage {
  failNextCommit = false;

  override unitOfWork(): UnitOfWork {
    if (this.failNextCommit) {
      this.failNextCommit = false;
      return new StagedUnitOfWork(async () => {
        throw new Error("disk full");
      });
    }
    return super.unitOfWork();
  }
}

async function submittedExpense(h: ExpenseHarness, amount = 80): Promise<ExpenseId> {
  const id = await h.service.createExpense(expenseInput({ amount }));
  if (amount > 100) {
    await h.service.addAttachment(id, RECEIPT_URL);
  }
  await h.service.submitExpense(id, EMPLOYEE);
  return id;
}

describe("ExpenseService", () => {
  let h: ExpenseHarness;

  beforeEach(async () => {
    h = await createExpenseHarness();
  });

  // ===========================================================================
  // § Creation
  // ===========================================================================

  describe("createExpense", () => {
    it("persists a draft with a Created audit record", async () => {
      const id = await h.service.createExpense(expenseInput({ categoryId: TRAVEL }));

      const view = await h.service.getExpense(id);
      expect(view.status).toBe("draft");
      expect(view.categoryId).toBe(TRAVEL);
      expect(view.creatorName).toBe("Erin Employee");

      const history = await h.service.getAuditHistory(id);
      expect(history.map((entry) => entry.action)).toEqual(["Created"]);
      expect(history[0]?.userId).toBe(EMPLOYEE);
      expect(history[0]?.newStatus).toBe("draft");
    });

    it("rejects an unknown category", async () => {
      await expect(
        h.service.createExpense(expenseInput({ categoryId: MISSING_CATEGORY }))
      ).rejects.toThrow(`Category not found: ${MISSING_CATEGORY}`);
    });

    it("propagates business rule failures without persisting", async () => {
      await expect(h.service.createExpense(expenseInput({ amount: -1 }))).rejects.toThrow(
        "Amount must be greater than zero."
      );
      const page = await h.service.listExpenses(EMPLOYEE);
      expect(page.totalCount).toBe(0);
    });
  });

  // ===========================================================================
  // § Full lifecycle
  // ===========================================================================

  describe("lifecycle", () => {
    it("receipt rule, attachment, submission, admin approval, then locked", async () => {
      const id = await h.service.createExpense(expenseInput({ amount: 150 }));

      await expect(h.service.submitExpense(id, EMPLOYEE)).rejects.toThrow(
        "Expenses over $100 require a receipt attachment."
      );

      await h.service.addAttachment(id, "url1");
      await h.service.submitExpense(id, EMPLOYEE);
      await h.service.approveExpense(id, ADMIN, "admin");

      await expect(
        h.service.updateExpense(id, EMPLOYEE, {
          title: "Client dinner",
          description: "Dinner with the Acme team",
          amount: 10,
        })
      ).rejects.toThrow("Only draft requests can be edited.");

      const view = await h.service.getExpense(id);
      expect(view.status).toBe("approved");
      expect(view.processedBy).toBe(ADMIN);
      expect(view.attachmentUrls).toEqual(["url1"]);

      const history = await h.service.getAuditHistory(id);
      expect(history.map((entry) => [entry.action, entry.userId, entry.details])).toEqual([
        ["Created", EMPLOYEE, "Expense request created"],
        ["AttachmentAdded", EMPLOYEE, "Added attachment: url1"],
        ["Submitted", EMPLOYEE, "Submitted for approval"],
        ["Approved", ADMIN, "Approved by admin"],
      ]);

      expect(h.events.map((event) => event.type)).toEqual([
        "expense.submitted",
        "expense.approved",
      ]);
    });

    it("rejection stores the reason and blocks resubmission", async () => {
      const id = await submittedExpense(h);
      await h.service.rejectExpense(id, MANAGER, "manager", "Missing itinerary");

      const view = await h.service.getExpense(id);
      expect(view.status).toBe("rejected");
      expect(view.rejectionReason).toBe("Missing itinerary");

      await expect(h.service.submitExpense(id, EMPLOYEE)).rejects.toThrow(
        "Rejected requests cannot be resubmitted."
      );

      const history = await h.service.getAuditHistory(id);
      expect(history[history.length - 1]?.details).toBe("Rejected by manager: Missing itinerary");
      expect(h.events[h.events.length - 1]).toMatchObject({
        type: "expense.rejected",
        expenseId: id,
        rejectedBy: MANAGER,
        reason: "Missing itinerary",
      });
    });

    it("update records the changed fields", async () => {
      const id = await h.service.createExpense(expenseInput());
      await h.service.updateExpense(id, EMPLOYEE, {
        title: "Team dinner",
        description: "Dinner with the Acme team",
        amount: 95.5,
      });

      const history = await h.service.getAuditHistory(id);
      expect(history[1]?.action).toBe("Updated");
      expect(history[1]?.details).toBe("Updated: Title='Team dinner', Amount=$95.50");
    });

    it("writes exactly one audit record per successful mutation", async () => {
      const id = await h.service.createExpense(expenseInput());
      await h.service.addAttachment(id, "a");
      await h.service.removeAttachment(id, "a");
      await expect(h.service.removeAttachment(id, "a")).rejects.toThrow(BusinessRuleError);
      await h.service.submitExpense(id, EMPLOYEE);
      await expect(h.service.approveExpense(id, EMPLOYEE_2, "employee")).rejects.toThrow(
        "Only managers or admins can approve requests."
      );
      await h.service.approveExpense(id, MANAGER, "manager");

      const history = await h.service.getAuditHistory(id);
      expect(history.map((entry) => entry.action)).toEqual([
        "Created",
        "AttachmentAdded",
        "AttachmentRemoved",
        "Submitted",
        "Approved",
      ]);
    });
  });

  // ===========================================================================
  // § Approval authorization
  // ===========================================================================

  describe("approveExpense", () => {
    it("a manager may not approve above the ceiling", async () => {
      const id = await submittedExpense(h, 1500);
      await expect(h.service.approveExpense(id, MANAGER, "manager")).rejects.toThrow(
        "Expenses over $1000 require admin approval."
      );
      expect((await h.service.getExpense(id)).status).toBe("submitted");
    });

    it("uses the configured approval ceiling", async () => {
      const service = new ExpenseService(
        h.storage,
        new StorageIdentityDirectory(h.storage.users),
        h.dispatcher,
        { policy: { ...DEFAULT_EXPENSE_POLICY, approvalCeiling: 500 } }
      );
      const id = await submittedExpense(h, 600);
      await expect(service.approveExpense(id, MANAGER, "manager")).rejects.toThrow(
        "Expenses over $500 require admin approval."
      );
    });

    it("resolves the creator role of legacy requests from the directory", async () => {
      const legacy: ExpenseRequestRecord = {
        id: ExpenseId("legacy-1"),
        creatorId: MANAGER_2,
        creatorRole: null,
        categoryId: null,
        title: "Old request",
        description: "",
        amount: 50,
        expenseDate: "2024-06-01T00:00:00.000Z",
        status: "submitted",
        createdAt: "2024-06-01T00:00:00.000Z",
        updatedAt: null,
        submittedAt: "2024-06-01T00:00:00.000Z",
        processedAt: null,
        processedBy: null,
        rejectionReason: null,
        attachmentUrls: [],
      };
      const uow = h.storage.unitOfWork();
      uow.saveExpense(legacy);
      await uow.commit();

      await expect(h.service.approveExpense(legacy.id, MANAGER, "manager")).rejects.toThrow(
        "Managers cannot approve other managers' expenses. Only admins can approve manager expenses."
      );

      await h.service.approveExpense(legacy.id, ADMIN, "admin");
      const stored = await h.storage.expenses.get(legacy.id);
      expect(stored?.status).toBe("approved");
      expect(stored?.creatorRole).toBe("manager");
    });

    describe("legacy creator that no longer resolves", () => {
      async function saveOrphan(status: "draft" | "submitted"): Promise<ExpenseId> {
        const id = ExpenseId(`legacy-${status}`);
        const uow = h.storage.unitOfWork();
        uow.saveExpense({
          id,
          creatorId: UserId("ghost"),
          creatorRole: null,
          categoryId: null,
          title: "Orphan",
          description: "",
          amount: 20,
          expenseDate: "2024-06-01T00:00:00.000Z",
          status,
          createdAt: "2024-06-01T00:00:00.000Z",
          updatedAt: null,
          submittedAt: status === "submitted" ? "2024-06-01T00:00:00.000Z" : null,
          processedAt: null,
          processedBy: null,
          rejectionReason: null,
          attachmentUrls: [],
        });
        await uow.commit();
        return id;
      }

      it("employees still get the approver rule", async () => {
        const id = await saveOrphan("submitted");
        await expect(h.service.approveExpense(id, EMPLOYEE, "employee")).rejects.toThrow(
          "Only managers or admins can approve requests."
        );
      });

      it("managers still get the status rule on drafts", async () => {
        const id = await saveOrphan("draft");
        await expect(h.service.approveExpense(id, MANAGER, "manager")).rejects.toThrow(
          "Only submitted requests can be approved."
        );
      });

      it("admins approve without the creator role", async () => {
        const id = await saveOrphan("submitted");
        await h.service.approveExpense(id, ADMIN, "admin");

        const stored = await h.storage.expenses.get(id);
        expect(stored?.status).toBe("approved");
        expect(stored?.creatorRole).toBeNull();
      });

      it("managers cannot pass the peer check", async () => {
        const id = await saveOrphan("submitted");
        const attempt = h.service.approveExpense(id, MANAGER, "manager");
        await expect(attempt).rejects.toBeInstanceOf(NotFoundError);
        await expect(h.service.approveExpense(id, MANAGER, "manager")).rejects.toThrow(
          "User not found: ghost"
        );
      });
    });

    it("throws NotFoundError for an unknown expense", async () => {
      await expect(
        h.service.approveExpense(ExpenseId("nope"), ADMIN, "admin")
      ).rejects.toThrow("Expense not found: nope");
    });
  });

  // ===========================================================================
  // § Atomicity
  // ===========================================================================

  describe("atomic commit", () => {
    it("leaves entity, audit trail and events untouched when the commit fails", async () => {
      const storage = new FailingStorage();
      const harness = await createExpenseHarness(storage);
      const id = await harness.service.createExpense(expenseInput());

      storage.failNextCommit = true;
      await expect(harness.service.submitExpense(id, EMPLOYEE)).rejects.toThrow("disk full");

      expect((await harness.service.getExpense(id)).status).toBe("draft");
      expect((await harness.service.getAuditHistory(id)).map((e) => e.action)).toEqual([
        "Created",
      ]);
      expect(harness.events).toEqual([]);

      await harness.service.submitExpense(id, EMPLOYEE);
      expect((await harness.service.getExpense(id)).status).toBe("submitted");
    });
  });

  // ===========================================================================
  // § Deletion
  // ===========================================================================

  describe("deleteExpense", () => {
    it("removes a draft and keeps its audit history", async () => {
      const id = await h.service.createExpense(expenseInput());
      await h.service.deleteExpense(id, EMPLOYEE);

      await expect(h.service.getExpense(id)).rejects.toBeInstanceOf(NotFoundError);
      const history = await h.service.getAuditHistory(id);
      expect(history.map((entry) => entry.action)).toEqual(["Created", "Deleted"]);
      expect(history[1]?.previousStatus).toBe("draft");
      expect(history[1]?.newStatus).toBeNull();
    });

    it("approved requests cannot be deleted", async () => {
      const id = await submittedExpense(h);
      await h.service.approveExpense(id, MANAGER, "manager");
      await expect(h.service.deleteExpense(id, EMPLOYEE)).rejects.toThrow(
        "Approved requests cannot be modified."
      );
    });

    it("submitted requests cannot be deleted", async () => {
      const id = await submittedExpense(h);
      await expect(h.service.deleteExpense(id, EMPLOYEE)).rejects.toThrow(
        "Only draft requests can be deleted."
      );
    });

    it("only the creator can delete", async () => {
      const id = await h.service.createExpense(expenseInput());
      await expect(h.service.deleteExpense(id, EMPLOYEE_2)).rejects.toThrow(
        "Only the creator can delete this request."
      );
    });
  });

  // ===========================================================================
  // § Comments
  // ===========================================================================

  describe("comments", () => {
    it("stores comments with the author's display name, oldest first", async () => {
      const id = await h.service.createExpense(expenseInput());
      await h.service.addComment(id, MANAGER, "Which client?");
      await h.service.addComment(id, EMPLOYEE, "Acme");

      const comments = await h.service.listComments(id);
      expect(comments.map((c) => [c.userName, c.text])).toEqual([
        ["Morgan Manager", "Which client?"],
        ["Erin Employee", "Acme"],
      ]);
    });

    it("falls back to the user id for unknown authors", async () => {
      const id = await h.service.createExpense(expenseInput());
      const comment = await h.service.addComment(id, UserId("visitor-9"), "Hello");
      expect(comment.userName).toBe("visitor-9");
    });

    it("prefers the supplied name over the user id for unknown authors", async () => {
      const id = await h.service.createExpense(expenseInput());
      const comment = await h.service.addComment(id, UserId("visitor-9"), "Hello", "Vera Visitor");
      expect(comment.userName).toBe("Vera Visitor");

      const known = await h.service.addComment(id, MANAGER, "Hi", "Token Name");
      expect(known.userName).toBe("Morgan Manager");
    });

    it("does not write audit records", async () => {
      const id = await h.service.createExpense(expenseInput());
      await h.service.addComment(id, MANAGER, "Noted");
      expect(await h.service.getAuditHistory(id)).toHaveLength(1);
    });

    it("rejects empty text and unknown expenses", async () => {
      const id = await h.service.createExpense(expenseInput());
      await expect(h.service.addComment(id, MANAGER, "  ")).rejects.toThrow(
        "Comment text cannot be empty."
      );
      await expect(h.service.listComments(ExpenseId("nope"))).rejects.toBeInstanceOf(
        NotFoundError
      );
    });
  });

  // ===========================================================================
  // § Queries
  // ===========================================================================

  describe("listing", () => {
    it("lists only the caller's expenses with creator names", async () => {
      await h.service.createExpense(expenseInput({ title: "Mine" }));
      await h.service.createExpense(expenseInput({ creatorId: EMPLOYEE_2, title: "Theirs" }));

      const page = await h.service.listExpenses(EMPLOYEE);
      expect(page.totalCount).toBe(1);
      expect(page.items[0]?.title).toBe("Mine");
      expect(page.items[0]?.creatorName).toBe("Erin Employee");
    });

    it("pending list holds submitted expenses, oldest submission first", async () => {
      const first = await submittedExpense(h);
      const second = await submittedExpense(h);
      await h.service.createExpense(expenseInput({ title: "Still a draft" }));

      const page = await h.service.listPendingExpenses();
      expect(page.items.map((item) => item.id)).toEqual([first, second]);

      const newest = await h.service.listPendingExpenses({ sortDir: "desc" });
      expect(newest.items.map((item) => item.id)).toEqual([second, first]);
    });
  });

  // ===========================================================================
  // § Event dispatch
  // ===========================================================================

  describe("event dispatch", () => {
    it("a failing listener does not fail the operation", async () => {
      const failing = vi.fn(async () => {
        throw new Error("listener down");
      });
      h.dispatcher.addListener(failing);

      const id = await submittedExpense(h);
      expect(failing).toHaveBeenCalledTimes(1);
      expect((await h.service.getExpense(id)).status).toBe("submitted");
      expect(h.events).toHaveLength(1);
    });
  });
});
