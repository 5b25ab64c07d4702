/**
 * AuditLog factory.
 *
 * One constructor per action kind; each fixes the (previousStatus,
 * newStatus, details) triple of the transition it documents. Records are
 * frozen and never amended.
 */

import { randomUUID } from "crypto";
import type {
  AuditAction,
  AuditLogRecord,
  ExpenseStatus,
  UserRole,
} from "../types/expense-contract.js";
import { AuditLogId, type ExpenseId, type UserId } from "../types/branded.js";
import type { ExpenseChanges } from "./expense-request.js";
import { formatAmount } from "./money.js";

function createAuditLog(
  expenseId: ExpenseId,
  userId: UserId,
  action: AuditAction,
  previousStatus: ExpenseStatus | null,
  newStatus: ExpenseStatus | null,
  details: string | null,
  now: Date
): AuditLogRecord {
  return Object.freeze({
    id: AuditLogId(randomUUID()),
    expenseId,
    userId,
    action,
    previousStatus,
    newStatus,
    details,
    timestamp: now.toISOString(),
  });
}

/**
 * Render the changed fields of an update, e.g.
 * `Updated: Title='Taxi', Amount=$42.50`.
 */
export function describeChanges(changes: ExpenseChanges): string {
  const parts: string[] = [];
  if (changes.title !== undefined) parts.push(`Title='${changes.title}'`);
  if (changes.description !== undefined) {
    parts.push(`Description='${changes.description}'`);
  }
  if (changes.amount !== undefined) {
    parts.push(`Amount=$${formatAmount(changes.amount)}`);
  }
  if (changes.categoryId !== undefined) {
    parts.push(`Category=${changes.categoryId ?? "none"}`);
  }
  return parts.length > 0 ? `Updated: ${parts.join(", ")}` : "No changes";
}

export const AuditLog = {
  forCreation(expenseId: ExpenseId, userId: UserId, now = new Date()): AuditLogRecord {
    return createAuditLog(
      expenseId, userId, "Created", null, "draft", "Expense request created", now
    );
  },

  forUpdate(
    expenseId: ExpenseId,
    userId: UserId,
    changes: ExpenseChanges,
    now = new Date()
  ): AuditLogRecord {
    return createAuditLog(
      expenseId, userId, "Updated", null, null, describeChanges(changes), now
    );
  },

  forSubmission(expenseId: ExpenseId, userId: UserId, now = new Date()): AuditLogRecord {
    return createAuditLog(
      expenseId, userId, "Submitted", "draft", "submitted", "Submitted for approval", now
    );
  },

  forApproval(
    expenseId: ExpenseId,
    userId: UserId,
    role: UserRole,
    now = new Date()
  ): AuditLogRecord {
    return createAuditLog(
      expenseId, userId, "Approved", "submitted", "approved", `Approved by ${role}`, now
    );
  },

  forRejection(
    expenseId: ExpenseId,
    userId: UserId,
    role: UserRole,
    reason: string,
    now = new Date()
  ): AuditLogRecord {
    return createAuditLog(
      expenseId, userId, "Rejected", "submitted", "rejected", `Rejected by ${role}: ${reason}`, now
    );
  },

  forAttachmentAdded(
    expenseId: ExpenseId,
    userId: UserId,
    url: string,
    now = new Date()
  ): AuditLogRecord {
    return createAuditLog(
      expenseId, userId, "AttachmentAdded", null, null, `Added attachment: ${url}`, now
    );
  },

  forAttachmentRemoved(
    expenseId: ExpenseId,
    userId: UserId,
    url: string,
    now = new Date()
  ): AuditLogRecord {
    return createAuditLog(
      expenseId, userId, "AttachmentRemoved", null, null, `Removed attachment: ${url}`, now
    );
  },

  forDeletion(expenseId: ExpenseId, userId: UserId, now = new Date()): AuditLogRecord {
    return createAuditLog(
      expenseId, userId, "Deleted", "draft", null, "Draft expense request deleted", now
    );
  },
};
