import { randomUUID } from "crypto";
import type { ExpenseCommentRecord } from "../types/expense-contract.js";
import { CommentId, type ExpenseId, type UserId } from "../types/branded.js";
import { BusinessRuleError } from "./errors.js";

/**
 * Build an immutable comment on an expense request.
 */
export function createExpenseComment(
  expenseId: ExpenseId,
  userId: UserId,
  userName: string,
  text: string,
  now: Date = new Date()
): ExpenseCommentRecord {
  if (text.trim().length === 0) {
    throw new BusinessRuleError("Comment text cannot be empty.");
  }
  return Object.freeze({
    id: CommentId(randomUUID()),
    expenseId,
    userId,
    userName,
    text,
    createdAt: now.toISOString(),
  });
}
