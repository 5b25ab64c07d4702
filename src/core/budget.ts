/**
 * Budget - date-ranged spending allocation, optionally scoped to one user
 * and/or one category. Utilization is never stored on the entity; it is
 * computed per request by computeBudgetStatus.
 */

import { randomUUID } from "crypto";
import type {
  BudgetRecord,
  BudgetStatus,
  ExpenseCategoryRecord,
  ExpenseRequestRecord,
} from "../types/expense-contract.js";
import { BudgetId, type CategoryId, type UserId } from "../types/branded.js";
import { BusinessRuleError } from "./errors.js";
import { roundTo2, subtractAmounts, sumAmounts } from "./money.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface BudgetParams {
  name: string;
  amount: number;
  startDate: string;
  endDate: string;
  description?: string | null;
}

export interface CreateBudgetParams extends BudgetParams {
  userId?: UserId | null;
  categoryId?: CategoryId | null;
}

function validateBudget(params: BudgetParams): { start: number; end: number } {
  if (params.name.trim().length === 0) {
    throw new BusinessRuleError("Budget name cannot be empty.");
  }
  if (!Number.isFinite(params.amount) || params.amount <= 0) {
    throw new BusinessRuleError("Budget amount must be greater than zero.");
  }
  const start = Date.parse(params.startDate);
  const end = Date.parse(params.endDate);
  if (Number.isNaN(start) || Number.isNaN(end)) {
    throw new BusinessRuleError("Budget dates are invalid.");
  }
  if (start >= end) {
    throw new BusinessRuleError("Start date must be before end date.");
  }
  return { start, end };
}

export class Budget {
  private constructor(private readonly state: BudgetRecord) {}

  static create(params: CreateBudgetParams, now: Date = new Date()): Budget {
    const { start, end } = validateBudget(params);
    return new Budget({
      id: BudgetId(randomUUID()),
      name: params.name,
      description: params.description ?? null,
      amount: params.amount,
      startDate: new Date(start).toISOString(),
      endDate: new Date(end).toISOString(),
      userId: params.userId ?? null,
      categoryId: params.categoryId ?? null,
      isActive: true,
      createdAt: now.toISOString(),
      updatedAt: null,
    });
  }

  static rehydrate(record: BudgetRecord): Budget {
    return new Budget({ ...record });
  }

  get id(): BudgetId {
    return this.state.id;
  }

  get userId(): UserId | null {
    return this.state.userId;
  }

  toRecord(): BudgetRecord {
    return { ...this.state };
  }

  update(params: BudgetParams, now: Date = new Date()): void {
    const { start, end } = validateBudget(params);
    this.state.name = params.name;
    this.state.description = params.description ?? null;
    this.state.amount = params.amount;
    this.state.startDate = new Date(start).toISOString();
    this.state.endDate = new Date(end).toISOString();
    this.state.updatedAt = now.toISOString();
  }

  activate(now: Date = new Date()): void {
    this.state.isActive = true;
    this.state.updatedAt = now.toISOString();
  }

  deactivate(now: Date = new Date()): void {
    this.state.isActive = false;
    this.state.updatedAt = now.toISOString();
  }

  /** Active flag set and `now` within [startDate, endDate]. */
  isCurrentlyActive(now: Date = new Date()): boolean {
    return isBudgetInEffect(this.state, now);
  }
}

export function isBudgetInEffect(budget: BudgetRecord, now: Date): boolean {
  const t = now.getTime();
  return (
    budget.isActive &&
    t >= Date.parse(budget.startDate) &&
    t <= Date.parse(budget.endDate)
  );
}

/**
 * True when an approved expense counts against the budget: same user (or
 * any user for a global budget), same category when the budget has one, and
 * expense date inside the budget period.
 */
export function expenseCountsAgainstBudget(
  budget: BudgetRecord,
  expense: ExpenseRequestRecord
): boolean {
  if (expense.status !== "approved") return false;
  if (budget.userId !== null && expense.creatorId !== budget.userId) return false;
  if (budget.categoryId !== null && expense.categoryId !== budget.categoryId) {
    return false;
  }
  const t = Date.parse(expense.expenseDate);
  return t >= Date.parse(budget.startDate) && t <= Date.parse(budget.endDate);
}

export function computeBudgetStatus(
  budget: BudgetRecord,
  expenses: readonly ExpenseRequestRecord[],
  now: Date,
  category?: ExpenseCategoryRecord | null
): BudgetStatus {
  const spentAmount = sumAmounts(
    expenses
      .filter((expense) => expenseCountsAgainstBudget(budget, expense))
      .map((expense) => expense.amount)
  );
  const percentageUsed =
    budget.amount > 0 ? roundTo2((spentAmount / budget.amount) * 100) : 0;
  const daysRemaining = Math.trunc(
    (Date.parse(budget.endDate) - now.getTime()) / DAY_MS
  );

  return {
    budgetId: budget.id,
    budgetName: budget.name,
    description: budget.description,
    budgetAmount: budget.amount,
    spentAmount,
    remainingAmount: subtractAmounts(budget.amount, spentAmount),
    percentageUsed,
    categoryName: category?.name ?? null,
    categoryIcon: category?.icon ?? null,
    startDate: budget.startDate,
    endDate: budget.endDate,
    daysRemaining: Math.max(0, daysRemaining),
    isOverBudget: spentAmount > budget.amount,
    isActive: isBudgetInEffect(budget, now),
  };
}
