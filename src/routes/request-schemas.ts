/**
 * Zod schemas for request bodies and query strings.
 *
 * Only shape and format are checked here. Business rules (non-empty
 * title, positive amount, date windows) stay in the domain so their
 * messages reach the client unchanged.
 */

import type { Context } from "hono";
import { HTTPException } from "hono/http-exception";
import { z } from "zod";
import { CategoryId } from "../types/branded.js";
import { EXPENSE_SORT_KEYS } from "../core/expense-query.js";
import { isCurrencyAmount } from "../core/money.js";
import { expenseStatusSchema } from "../storage/record-schemas.js";

const dateString = z
  .string()
  .refine((v) => !Number.isNaN(Date.parse(v)), { message: "Invalid date" });

const amount = z
  .number()
  .refine(isCurrencyAmount, { message: "Amount must have at most two decimal places" });

const categoryId = z
  .string()
  .min(1)
  .transform((v) => CategoryId(v))
  .nullable()
  .optional();

export const createExpenseBody = z.object({
  title: z.string(),
  description: z.string().default(""),
  amount,
  expenseDate: dateString,
  categoryId,
});

export const updateExpenseBody = z.object({
  title: z.string(),
  description: z.string().default(""),
  amount,
  categoryId,
});

export const rejectExpenseBody = z.object({
  reason: z.string(),
});

export const attachmentBody = z.object({
  url: z.string(),
});

export const commentBody = z.object({
  text: z.string(),
});

export const expenseListQuery = z.object({
  search: z.string().optional(),
  status: expenseStatusSchema.optional(),
  fromDate: dateString.optional(),
  toDate: dateString.optional(),
  minAmount: z.coerce.number().nonnegative().optional(),
  maxAmount: z.coerce.number().nonnegative().optional(),
  sortBy: z.enum(EXPENSE_SORT_KEYS).optional(),
  sortDir: z.enum(["asc", "desc"]).optional(),
  page: z.coerce.number().int().min(1).optional(),
  pageSize: z.coerce.number().int().min(1).optional(),
});

const budgetFields = {
  name: z.string(),
  amount,
  startDate: dateString,
  endDate: dateString,
  description: z.string().nullable().optional(),
};

export const createBudgetBody = z.object({
  ...budgetFields,
  categoryId,
  global: z.boolean().optional(),
});

export const updateBudgetBody = z.object(budgetFields);

export const budgetListQuery = z.object({
  activeOnly: z
    .enum(["true", "false"])
    .optional()
    .transform((v) => v === "true"),
});

export const dateRangeQuery = z.object({
  startDate: dateString.optional(),
  endDate: dateString.optional(),
});

export const approvalRatesQuery = z.object({
  monthsBack: z.coerce.number().int().optional(),
});

export const createCategoryBody = z.object({
  name: z.string(),
  description: z.string().optional(),
  icon: z.string().optional(),
  color: z.string().optional(),
});

/**
 * Read and parse a JSON body.
 *
 * @throws HTTPException 400 when the body is not JSON
 * @throws ZodError when the body does not match the schema
 */
export async function parseJsonBody<T extends z.ZodTypeAny>(
  c: Context,
  schema: T
): Promise<z.output<T>> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new HTTPException(400, { message: "Request body must be valid JSON" });
  }
  return schema.parse(body);
}
