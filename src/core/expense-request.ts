/**
 * ExpenseRequest - the expense approval state machine.
 *
 * Every workflow and authorization rule lives on the entity so the same
 * guarantees hold for every caller (HTTP routes, scripts, tests). Mutators
 * validate all preconditions before touching any field, so a failed call
 * leaves the entity unchanged. Transitions return their domain event
 * instead of buffering it on the entity.
 */

import { randomUUID } from "crypto";
import type {
  ExpenseApprovedEvent,
  ExpenseRejectedEvent,
  ExpenseRequestRecord,
  ExpenseStatus,
  ExpenseSubmittedEvent,
  UserRole,
} from "../types/expense-contract.js";
import { ExpenseId, type CategoryId, type UserId } from "../types/branded.js";
import { BusinessRuleError } from "./errors.js";
import { DEFAULT_EXPENSE_POLICY, type ExpensePolicy } from "./expense-policy.js";
import { assertValidTransition } from "./state-machine.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface CreateExpenseParams {
  creatorId: UserId;
  creatorRole: UserRole;
  title: string;
  description: string;
  amount: number;
  expenseDate: string;
  categoryId?: CategoryId | null;
}

export interface UpdateExpenseParams {
  title: string;
  description: string;
  amount: number;
  categoryId?: CategoryId | null;
}

/** New values of the fields an update actually changed */
export interface ExpenseChanges {
  title?: string;
  description?: string;
  amount?: number;
  categoryId?: CategoryId | null;
}

function requireTitle(title: string): void {
  if (title.trim().length === 0) {
    throw new BusinessRuleError("Title cannot be empty.");
  }
}

function requirePositiveAmount(amount: number): void {
  if (!Number.isFinite(amount) || amount <= 0) {
    throw new BusinessRuleError("Amount must be greater than zero.");
  }
}

function isApprover(role: UserRole): boolean {
  return role === "manager" || role === "admin";
}

export class ExpenseRequest {
  private constructor(private readonly state: ExpenseRequestRecord) {}

  /**
   * Create a new request in draft. The only entry point that enforces the
   * creation rules.
   */
  static create(
    params: CreateExpenseParams,
    policy: ExpensePolicy = DEFAULT_EXPENSE_POLICY,
    now: Date = new Date()
  ): ExpenseRequest {
    requireTitle(params.title);
    requirePositiveAmount(params.amount);

    const expenseTime = Date.parse(params.expenseDate);
    if (Number.isNaN(expenseTime)) {
      throw new BusinessRuleError("Expense date is invalid.");
    }
    if (expenseTime > now.getTime()) {
      throw new BusinessRuleError("Expense date cannot be in the future.");
    }
    if (
      policy.lookbackDays > 0 &&
      expenseTime < now.getTime() - policy.lookbackDays * DAY_MS
    ) {
      throw new BusinessRuleError(
        `Expense date cannot be older than ${policy.lookbackDays} days.`
      );
    }

    return new ExpenseRequest({
      id: ExpenseId(randomUUID()),
      creatorId: params.creatorId,
      creatorRole: params.creatorRole,
      categoryId: params.categoryId ?? null,
      title: params.title,
      description: params.description,
      amount: params.amount,
      expenseDate: new Date(expenseTime).toISOString(),
      status: "draft",
      createdAt: now.toISOString(),
      updatedAt: null,
      submittedAt: null,
      processedAt: null,
      processedBy: null,
      rejectionReason: null,
      attachmentUrls: [],
    });
  }

  /**
   * Rebuild an entity from persisted fields. Used by storage adapters only;
   * creation rules are not re-run.
   */
  static rehydrate(record: ExpenseRequestRecord): ExpenseRequest {
    return new ExpenseRequest({
      ...record,
      attachmentUrls: [...record.attachmentUrls],
    });
  }

  get id(): ExpenseId {
    return this.state.id;
  }

  get creatorId(): UserId {
    return this.state.creatorId;
  }

  get creatorRole(): UserRole | null {
    return this.state.creatorRole;
  }

  get status(): ExpenseStatus {
    return this.state.status;
  }

  get amount(): number {
    return this.state.amount;
  }

  get attachmentUrls(): readonly string[] {
    return this.state.attachmentUrls;
  }

  get rejectionReason(): string | null {
    return this.state.rejectionReason;
  }

  toRecord(): ExpenseRequestRecord {
    return { ...this.state, attachmentUrls: [...this.state.attachmentUrls] };
  }

  /**
   * Fill in the creator role of a request persisted before roles were
   * tracked. Orchestration calls this at most once, before an approval check.
   */
  assignCreatorRole(role: UserRole): void {
    if (this.state.creatorRole !== null) {
      throw new BusinessRuleError("Creator role has already been assigned.");
    }
    this.state.creatorRole = role;
  }

  update(
    userId: UserId,
    params: UpdateExpenseParams,
    now: Date = new Date()
  ): ExpenseChanges {
    if (this.state.status !== "draft") {
      throw new BusinessRuleError("Only draft requests can be edited.");
    }
    if (userId !== this.state.creatorId) {
      throw new BusinessRuleError("Only the creator can edit this request.");
    }
    requireTitle(params.title);
    requirePositiveAmount(params.amount);

    const categoryId = params.categoryId ?? null;
    const changes: ExpenseChanges = {};
    if (params.title !== this.state.title) changes.title = params.title;
    if (params.description !== this.state.description) {
      changes.description = params.description;
    }
    if (params.amount !== this.state.amount) changes.amount = params.amount;
    if (categoryId !== this.state.categoryId) changes.categoryId = categoryId;

    this.state.title = params.title;
    this.state.description = params.description;
    this.state.amount = params.amount;
    this.state.categoryId = categoryId;
    this.state.updatedAt = now.toISOString();

    return changes;
  }

  submit(
    userId: UserId,
    policy: ExpensePolicy = DEFAULT_EXPENSE_POLICY,
    now: Date = new Date()
  ): ExpenseSubmittedEvent {
    if (this.state.status !== "draft") {
      throw new BusinessRuleError("Only drafts can be submitted.");
    }
    if (userId !== this.state.creatorId) {
      throw new BusinessRuleError("Only the creator can submit this request.");
    }
    if (
      this.state.amount > policy.receiptThreshold &&
      this.state.attachmentUrls.length === 0
    ) {
      throw new BusinessRuleError(
        `Expenses over $${policy.receiptThreshold} require a receipt attachment.`
      );
    }

    assertValidTransition(this.state.status, "submitted");
    const ts = now.toISOString();
    this.state.status = "submitted";
    this.state.submittedAt = ts;
    this.state.updatedAt = ts;

    return {
      type: "expense.submitted",
      expenseId: this.state.id,
      submittedBy: userId,
      amount: this.state.amount,
      occurredAt: ts,
    };
  }

  addAttachment(url: string, now: Date = new Date()): void {
    if (this.state.status !== "draft") {
      throw new BusinessRuleError("Only draft requests can have attachments added.");
    }
    if (url.trim().length === 0) {
      throw new BusinessRuleError("Attachment URL cannot be empty.");
    }

    this.state.attachmentUrls.push(url);
    this.state.updatedAt = now.toISOString();
  }

  removeAttachment(url: string, now: Date = new Date()): void {
    if (this.state.status !== "draft") {
      throw new BusinessRuleError("Only draft requests can have attachments removed.");
    }
    const index = this.state.attachmentUrls.indexOf(url);
    if (index === -1) {
      throw new BusinessRuleError("Attachment not found on this request.");
    }

    this.state.attachmentUrls.splice(index, 1);
    this.state.updatedAt = now.toISOString();
  }

  /**
   * Guards run in a fixed order (role, status, self, peer, ceiling); each
   * raises its own message.
   */
  approve(
    actingUserId: UserId,
    actingRole: UserRole,
    policy: ExpensePolicy = DEFAULT_EXPENSE_POLICY,
    now: Date = new Date()
  ): ExpenseApprovedEvent {
    if (!isApprover(actingRole)) {
      throw new BusinessRuleError("Only managers or admins can approve requests.");
    }
    if (this.state.status !== "submitted") {
      throw new BusinessRuleError("Only submitted requests can be approved.");
    }
    if (actingRole === "manager" && actingUserId === this.state.creatorId) {
      throw new BusinessRuleError(
        "Managers cannot approve their own expenses. Only admins can approve manager expenses."
      );
    }
    if (actingRole === "manager" && this.state.creatorRole === "manager") {
      throw new BusinessRuleError(
        "Managers cannot approve other managers' expenses. Only admins can approve manager expenses."
      );
    }
    if (this.state.amount > policy.approvalCeiling && actingRole !== "admin") {
      throw new BusinessRuleError(
        `Expenses over $${policy.approvalCeiling} require admin approval.`
      );
    }

    assertValidTransition(this.state.status, "approved");
    const ts = now.toISOString();
    this.state.status = "approved";
    this.state.processedAt = ts;
    this.state.processedBy = actingUserId;
    this.state.updatedAt = ts;

    return {
      type: "expense.approved",
      expenseId: this.state.id,
      approvedBy: actingUserId,
      amount: this.state.amount,
      occurredAt: ts,
    };
  }

  reject(
    actingUserId: UserId,
    actingRole: UserRole,
    reason: string,
    now: Date = new Date()
  ): ExpenseRejectedEvent {
    if (!isApprover(actingRole)) {
      throw new BusinessRuleError("Only managers or admins can reject requests.");
    }
    if (this.state.status !== "submitted") {
      throw new BusinessRuleError("Only submitted requests can be rejected.");
    }
    if (reason.trim().length === 0) {
      throw new BusinessRuleError("Rejection reason is required.");
    }

    assertValidTransition(this.state.status, "rejected");
    const ts = now.toISOString();
    this.state.status = "rejected";
    this.state.processedAt = ts;
    this.state.processedBy = actingUserId;
    this.state.rejectionReason = reason;
    this.state.updatedAt = ts;

    return {
      type: "expense.rejected",
      expenseId: this.state.id,
      rejectedBy: actingUserId,
      reason,
      occurredAt: ts,
    };
  }

  ensureNotApproved(): void {
    if (this.state.status === "approved") {
      throw new BusinessRuleError("Approved requests cannot be modified.");
    }
  }

  ensureNotRejected(): void {
    if (this.state.status === "rejected") {
      throw new BusinessRuleError("Rejected requests cannot be resubmitted.");
    }
  }

  /** Deletion is allowed for the creator while the request is a draft. */
  ensureDeletable(userId: UserId): void {
    if (this.state.status !== "draft") {
      throw new BusinessRuleError("Only draft requests can be deleted.");
    }
    if (userId !== this.state.creatorId) {
      throw new BusinessRuleError("Only the creator can delete this request.");
    }
  }
}
