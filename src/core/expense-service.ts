/**
 * ExpenseService - orchestration of the expense approval workflow.
 *
 * Every mutation follows the same path: load the entity, run the mutator,
 * build the matching audit record, commit entity and audit record in one
 * unit of work, then dispatch the domain event the mutator returned.
 */

import type { Logger } from "pino";
import type {
  AuditAction,
  AuditLogRecord,
  ExpenseCommentRecord,
  ExpenseDomainEvent,
  ExpenseRequestRecord,
  ExpenseView,
  PagedResult,
  UserRole,
} from "../types/expense-contract.js";
import type { CategoryId, ExpenseId, UserId } from "../types/branded.js";
import type { WorkflowStorage } from "../storage/storage-interface.js";
import { createChildLogger } from "../logging.js";
import { businessRuleViolationsTotal, transitionsTotal } from "../metrics.js";
import { AuditLog } from "./audit-log.js";
import { BusinessRuleError, NotFoundError } from "./errors.js";
import type { EventDispatcher } from "./event-dispatcher.js";
import { ExpenseRequest } from "./expense-request.js";
import { createExpenseComment } from "./expense-comment.js";
import { DEFAULT_EXPENSE_POLICY, type ExpensePolicy } from "./expense-policy.js";
import { normalizeExpenseQuery, type ExpenseQuery } from "./expense-query.js";
import type { IdentityDirectory } from "./identity-directory.js";

export interface CreateExpenseCommand {
  creatorId: UserId;
  creatorRole: UserRole;
  title: string;
  description: string;
  amount: number;
  expenseDate: string;
  categoryId?: CategoryId | null;
}

export interface UpdateExpenseCommand {
  title: string;
  description: string;
  amount: number;
  categoryId?: CategoryId | null;
}

export interface ServiceOptions {
  policy?: ExpensePolicy;
  clock?: () => Date;
  logger?: Logger;
}

export class ExpenseService {
  private readonly policy: ExpensePolicy;
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(
    private storage: WorkflowStorage,
    private identities: IdentityDirectory,
    private events: EventDispatcher,
    options: ServiceOptions = {}
  ) {
    this.policy = options.policy ?? DEFAULT_EXPENSE_POLICY;
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createChildLogger({ component: "expense-service" });
  }

  // ===========================================================================
  // § Mutations
  // ===========================================================================

  async createExpense(command: CreateExpenseCommand): Promise<ExpenseId> {
    return this.run("createExpense", async () => {
      if (command.categoryId) {
        await this.requireCategory(command.categoryId);
      }
      const now = this.clock();
      const expense = ExpenseRequest.create(command, this.policy, now);

      await this.commit(
        expense.toRecord(),
        AuditLog.forCreation(expense.id, command.creatorId, now)
      );
      return expense.id;
    });
  }

  async updateExpense(
    id: ExpenseId,
    userId: UserId,
    command: UpdateExpenseCommand
  ): Promise<void> {
    await this.run("updateExpense", async () => {
      const expense = await this.load(id);
      if (command.categoryId) {
        await this.requireCategory(command.categoryId);
      }
      const now = this.clock();
      const changes = expense.update(userId, command, now);

      await this.commit(
        expense.toRecord(),
        AuditLog.forUpdate(id, userId, changes, now)
      );
    });
  }

  async submitExpense(id: ExpenseId, userId: UserId): Promise<void> {
    await this.run("submitExpense", async () => {
      const expense = await this.load(id);
      expense.ensureNotRejected();
      const now = this.clock();
      const event = expense.submit(userId, this.policy, now);

      await this.commit(
        expense.toRecord(),
        AuditLog.forSubmission(id, userId, now),
        event
      );
    });
  }

  async approveExpense(
    id: ExpenseId,
    actingUserId: UserId,
    actingRole: UserRole
  ): Promise<void> {
    await this.run("approveExpense", async () => {
      const expense = await this.load(id);
      if (expense.creatorRole === null) {
        const role = await this.identities.roleOf(expense.creatorId);
        if (role !== null) {
          expense.assignCreatorRole(role);
        } else if (
          // Only the manager peer check reads the creator role
          actingRole === "manager" &&
          expense.status === "submitted" &&
          expense.creatorId !== actingUserId
        ) {
          throw new NotFoundError("User", expense.creatorId);
        }
      }
      const now = this.clock();
      const event = expense.approve(actingUserId, actingRole, this.policy, now);

      await this.commit(
        expense.toRecord(),
        AuditLog.forApproval(id, actingUserId, actingRole, now),
        event
      );
    });
  }

  async rejectExpense(
    id: ExpenseId,
    actingUserId: UserId,
    actingRole: UserRole,
    reason: string
  ): Promise<void> {
    await this.run("rejectExpense", async () => {
      const expense = await this.load(id);
      const now = this.clock();
      const event = expense.reject(actingUserId, actingRole, reason, now);

      await this.commit(
        expense.toRecord(),
        AuditLog.forRejection(id, actingUserId, actingRole, reason, now),
        event
      );
    });
  }

  /** Attachment changes are recorded against the creator. */
  async addAttachment(id: ExpenseId, url: string): Promise<void> {
    await this.run("addAttachment", async () => {
      const expense = await this.load(id);
      const now = this.clock();
      expense.addAttachment(url, now);

      await this.commit(
        expense.toRecord(),
        AuditLog.forAttachmentAdded(id, expense.creatorId, url, now)
      );
    });
  }

  async removeAttachment(id: ExpenseId, url: string): Promise<void> {
    await this.run("removeAttachment", async () => {
      const expense = await this.load(id);
      const now = this.clock();
      expense.removeAttachment(url, now);

      await this.commit(
        expense.toRecord(),
        AuditLog.forAttachmentRemoved(id, expense.creatorId, url, now)
      );
    });
  }

  /** Removes a draft. Its audit history, including the deletion, is kept. */
  async deleteExpense(id: ExpenseId, userId: UserId): Promise<void> {
    await this.run("deleteExpense", async () => {
      const expense = await this.load(id);
      expense.ensureNotApproved();
      expense.ensureDeletable(userId);
      const audit = AuditLog.forDeletion(id, userId, this.clock());

      const uow = this.storage.unitOfWork();
      uow.deleteExpense(id);
      uow.appendAuditLog(audit);
      await uow.commit();
      this.recordTransition(audit);
    });
  }

  /**
   * @param fallbackName - display name used when the user has no profile,
   *   such as the `name` claim of a token
   */
  async addComment(
    expenseId: ExpenseId,
    userId: UserId,
    text: string,
    fallbackName?: string
  ): Promise<ExpenseCommentRecord> {
    return this.run("addComment", async () => {
      await this.load(expenseId);
      const userName = (await this.identities.displayNameOf(userId)) ?? fallbackName ?? userId;
      const comment = createExpenseComment(expenseId, userId, userName, text, this.clock());

      const uow = this.storage.unitOfWork();
      uow.appendComment(comment);
      await uow.commit();
      return comment;
    });
  }

  // ===========================================================================
  // § Reads
  // ===========================================================================

  async getExpense(id: ExpenseId): Promise<ExpenseView> {
    const record = await this.storage.expenses.get(id);
    if (!record) {
      throw new NotFoundError("Expense", id);
    }
    const creatorName = await this.identities.displayNameOf(record.creatorId);
    return { ...record, creatorName };
  }

  /** Expenses created by the user, filtered, sorted and paginated. */
  async listExpenses(
    userId: UserId,
    query: ExpenseQuery = {}
  ): Promise<PagedResult<ExpenseView>> {
    const { filter, sort, page } = normalizeExpenseQuery(query, { creatorId: userId });
    const result = await this.storage.expenses.query(filter, sort, page);
    return { ...result, items: await this.enrich(result.items) };
  }

  /** Submitted expenses awaiting a decision, oldest submission first by default. */
  async listPendingExpenses(
    query: Omit<ExpenseQuery, "status"> = {}
  ): Promise<PagedResult<ExpenseView>> {
    const normalized = normalizeExpenseQuery({
      ...query,
      sortBy: query.sortBy ?? "submittedAt",
      sortDir: query.sortDir ?? "asc",
      status: "submitted",
    });
    const result = await this.storage.expenses.query(
      normalized.filter,
      normalized.sort,
      normalized.page
    );
    return { ...result, items: await this.enrich(result.items) };
  }

  /** Audit records of the expense, oldest first. Available after deletion. */
  async getAuditHistory(id: ExpenseId): Promise<AuditLogRecord[]> {
    return this.storage.auditLogs.listForExpense(id);
  }

  async listComments(expenseId: ExpenseId): Promise<ExpenseCommentRecord[]> {
    await this.load(expenseId);
    return this.storage.comments.listForExpense(expenseId);
  }

  // ===========================================================================
  // § Helpers
  // ===========================================================================

  private async load(id: ExpenseId): Promise<ExpenseRequest> {
    const record = await this.storage.expenses.get(id);
    if (!record) {
      throw new NotFoundError("Expense", id);
    }
    return ExpenseRequest.rehydrate(record);
  }

  private async requireCategory(id: CategoryId): Promise<void> {
    const category = await this.storage.categories.get(id);
    if (!category) {
      throw new NotFoundError("Category", id);
    }
  }

  private async commit(
    expense: ExpenseRequestRecord,
    audit: AuditLogRecord,
    event?: ExpenseDomainEvent
  ): Promise<void> {
    const uow = this.storage.unitOfWork();
    uow.saveExpense(expense);
    uow.appendAuditLog(audit);
    await uow.commit();

    this.recordTransition(audit);
    if (event) {
      await this.events.dispatch(event);
    }
  }

  private recordTransition(audit: AuditLogRecord): void {
    transitionsTotal.inc({ action: audit.action });
    this.logger.info(
      { expenseId: audit.expenseId, action: audit.action, userId: audit.userId },
      auditMessage(audit.action)
    );
  }

  private async enrich(records: ExpenseRequestRecord[]): Promise<ExpenseView[]> {
    const names = new Map<UserId, string | null>();
    for (const record of records) {
      if (!names.has(record.creatorId)) {
        names.set(record.creatorId, await this.identities.displayNameOf(record.creatorId));
      }
    }
    return records.map((record) => ({
      ...record,
      creatorName: names.get(record.creatorId) ?? null,
    }));
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      if (err instanceof BusinessRuleError) {
        businessRuleViolationsTotal.inc({ operation });
        this.logger.debug({ operation, rule: err.message }, "Business rule violated");
      }
      throw err;
    }
  }
}

function auditMessage(action: AuditAction): string {
  switch (action) {
    case "Created":
      return "Expense created";
    case "Updated":
      return "Expense updated";
    case "Submitted":
      return "Expense submitted";
    case "Approved":
      return "Expense approved";
    case "Rejected":
      return "Expense rejected";
    case "AttachmentAdded":
      return "Attachment added";
    case "AttachmentRemoved":
      return "Attachment removed";
    case "Deleted":
      return "Expense deleted";
  }
}
