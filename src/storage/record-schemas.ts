/**
 * Zod schemas for persisted records. Storage adapters parse every row
 * they read back through these, so a corrupt or outdated row fails loudly
 * instead of leaking into the domain.
 */

import { z } from "zod";
import type {
  AuditLogRecord,
  BudgetRecord,
  ExpenseCategoryRecord,
  ExpenseCommentRecord,
  ExpenseRequestRecord,
  UserProfile,
} from "../types/expense-contract.js";
import {
  AuditLogId,
  BudgetId,
  CategoryId,
  CommentId,
  ExpenseId,
  UserId,
} from "../types/branded.js";

export const expenseStatusSchema = z.enum(["draft", "submitted", "approved", "rejected"]);
export const userRoleSchema = z.enum(["employee", "manager", "admin"]);

const expenseIdSchema = z.string().transform((v) => ExpenseId(v));
const userIdSchema = z.string().transform((v) => UserId(v));
const categoryIdSchema = z.string().transform((v) => CategoryId(v));

export const expenseRecordSchema = z.object({
  id: expenseIdSchema,
  creatorId: userIdSchema,
  creatorRole: userRoleSchema.nullable(),
  categoryId: categoryIdSchema.nullable(),
  title: z.string(),
  description: z.string(),
  amount: z.number(),
  expenseDate: z.string(),
  status: expenseStatusSchema,
  createdAt: z.string(),
  updatedAt: z.string().nullable(),
  submittedAt: z.string().nullable(),
  processedAt: z.string().nullable(),
  processedBy: userIdSchema.nullable(),
  rejectionReason: z.string().nullable(),
  attachmentUrls: z.array(z.string()),
}) satisfies z.ZodType<ExpenseRequestRecord, z.ZodTypeDef, unknown>;

export const auditLogRecordSchema = z.object({
  id: z.string().transform((v) => AuditLogId(v)),
  expenseId: expenseIdSchema,
  userId: userIdSchema,
  action: z.enum([
    "Created",
    "Updated",
    "Submitted",
    "Approved",
    "Rejected",
    "AttachmentAdded",
    "AttachmentRemoved",
    "Deleted",
  ]),
  previousStatus: expenseStatusSchema.nullable(),
  newStatus: expenseStatusSchema.nullable(),
  details: z.string().nullable(),
  timestamp: z.string(),
}) satisfies z.ZodType<AuditLogRecord, z.ZodTypeDef, unknown>;

export const budgetRecordSchema = z.object({
  id: z.string().transform((v) => BudgetId(v)),
  name: z.string(),
  description: z.string().nullable(),
  amount: z.number(),
  startDate: z.string(),
  endDate: z.string(),
  userId: userIdSchema.nullable(),
  categoryId: categoryIdSchema.nullable(),
  isActive: z.boolean(),
  createdAt: z.string(),
  updatedAt: z.string().nullable(),
}) satisfies z.ZodType<BudgetRecord, z.ZodTypeDef, unknown>;

export const categoryRecordSchema = z.object({
  id: categoryIdSchema,
  name: z.string(),
  description: z.string(),
  icon: z.string(),
  color: z.string(),
  isActive: z.boolean(),
  createdAt: z.string(),
}) satisfies z.ZodType<ExpenseCategoryRecord, z.ZodTypeDef, unknown>;

export const commentRecordSchema = z.object({
  id: z.string().transform((v) => CommentId(v)),
  expenseId: expenseIdSchema,
  userId: userIdSchema,
  userName: z.string(),
  text: z.string(),
  createdAt: z.string(),
}) satisfies z.ZodType<ExpenseCommentRecord, z.ZodTypeDef, unknown>;

export const userProfileSchema = z.object({
  id: userIdSchema,
  email: z.string(),
  fullName: z.string(),
  role: userRoleSchema,
  createdAt: z.string(),
}) satisfies z.ZodType<UserProfile, z.ZodTypeDef, unknown>;

/** Parse a JSON column through a record schema. */
export function parseRecord<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  json: string
): T {
  const raw: unknown = JSON.parse(json);
  return schema.parse(raw);
}
