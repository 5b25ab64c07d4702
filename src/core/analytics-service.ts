/**
 * AnalyticsService - spending summaries over expense requests.
 *
 * `userId = null` aggregates over every user (manager views). Date ranges
 * apply to expenseDate and are inclusive; approval rates are bucketed by
 * the UTC month of submittedAt.
 */

import type {
  ApprovalRateData,
  CategorySpending,
  ExpenseAnalytics,
  ExpenseCategoryRecord,
  ExpenseRequestRecord,
  MonthlyTrend,
  StatusDistribution,
} from "../types/expense-contract.js";
import { EXPENSE_STATUSES } from "../types/expense-contract.js";
import type { CategoryId, UserId } from "../types/branded.js";
import type { WorkflowStorage } from "../storage/storage-interface.js";
import { BusinessRuleError } from "./errors.js";
import { roundTo2, sumAmounts } from "./money.js";

const MONTH_NAMES = [
  "January", "February", "March", "April", "May", "June",
  "July", "August", "September", "October", "November", "December",
] as const;

export const DEFAULT_MONTHS_BACK = 6;
export const MAX_MONTHS_BACK = 24;

const UNCATEGORIZED = {
  categoryName: "Uncategorized",
  categoryIcon: "📋",
  categoryColor: "#6b7280",
};

export interface DateRange {
  startDate?: string;
  endDate?: string;
}

function percentage(part: number, whole: number): number {
  return whole > 0 ? roundTo2((part / whole) * 100) : 0;
}

function periodKey(year: number, month: number): string {
  return `${year}-${String(month).padStart(2, "0")}`;
}

function toIso(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const t = Date.parse(value);
  if (Number.isNaN(t)) {
    throw new BusinessRuleError("Analytics date range is invalid.");
  }
  return new Date(t).toISOString();
}

export class AnalyticsService {
  private readonly clock: () => Date;

  constructor(
    private storage: WorkflowStorage,
    options: { clock?: () => Date } = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  async getExpenseAnalytics(userId: UserId | null, range: DateRange = {}): Promise<ExpenseAnalytics> {
    const expenses = await this.findInRange(userId, range);
    const byStatus = (status: ExpenseRequestRecord["status"]) =>
      expenses.filter((e) => e.status === status);

    const approved = byStatus("approved");
    const pending = byStatus("submitted");
    const totalExpenses = sumAmounts(expenses.map((e) => e.amount));

    return {
      totalExpenses,
      approvedAmount: sumAmounts(approved.map((e) => e.amount)),
      pendingAmount: sumAmounts(pending.map((e) => e.amount)),
      totalCount: expenses.length,
      approvedCount: approved.length,
      pendingCount: pending.length,
      rejectedCount: byStatus("rejected").length,
      averageExpense: expenses.length > 0 ? roundTo2(totalExpenses / expenses.length) : 0,
      categoryBreakdown: await this.categoryBreakdown(expenses),
      monthlyTrends: monthlyTrends(expenses),
    };
  }

  /** One entry per status that occurs, in lifecycle order */
  async getStatusDistribution(userId: UserId | null, range: DateRange = {}): Promise<StatusDistribution[]> {
    const expenses = await this.findInRange(userId, range);
    const distribution: StatusDistribution[] = [];

    for (const status of EXPENSE_STATUSES) {
      const matching = expenses.filter((e) => e.status === status);
      if (matching.length === 0) continue;
      distribution.push({
        status,
        count: matching.length,
        totalAmount: sumAmounts(matching.map((e) => e.amount)),
        percentage: percentage(matching.length, expenses.length),
      });
    }
    return distribution;
  }

  /**
   * Approval and rejection rates for the last `monthsBack` calendar months,
   * current month included, oldest first. `monthsBack` is clamped to [1, 24].
   */
  async getApprovalRates(userId: UserId | null, monthsBack = DEFAULT_MONTHS_BACK): Promise<ApprovalRateData[]> {
    const months = Math.min(
      MAX_MONTHS_BACK,
      Math.max(1, Number.isFinite(monthsBack) ? Math.trunc(monthsBack) : DEFAULT_MONTHS_BACK)
    );
    const now = this.clock();
    const expenses = await this.storage.expenses.findAll(
      userId === null ? {} : { creatorId: userId }
    );

    const buckets = new Map<string, ExpenseRequestRecord[]>();
    for (const expense of expenses) {
      if (expense.submittedAt === null) continue;
      const submitted = new Date(expense.submittedAt);
      const key = periodKey(submitted.getUTCFullYear(), submitted.getUTCMonth() + 1);
      const bucket = buckets.get(key) ?? [];
      bucket.push(expense);
      buckets.set(key, bucket);
    }

    const rates: ApprovalRateData[] = [];
    for (let offset = months - 1; offset >= 0; offset--) {
      const start = new Date(Date.UTC(now.getUTCFullYear(), now.getUTCMonth() - offset, 1));
      const period = periodKey(start.getUTCFullYear(), start.getUTCMonth() + 1);
      const bucket = buckets.get(period) ?? [];
      const approved = bucket.filter((e) => e.status === "approved").length;
      const rejected = bucket.filter((e) => e.status === "rejected").length;

      rates.push({
        period,
        totalSubmitted: bucket.length,
        approved,
        rejected,
        approvalRate: percentage(approved, bucket.length),
        rejectionRate: percentage(rejected, bucket.length),
      });
    }
    return rates;
  }

  private async findInRange(userId: UserId | null, range: DateRange): Promise<ExpenseRequestRecord[]> {
    return this.storage.expenses.findAll({
      creatorId: userId ?? undefined,
      fromDate: toIso(range.startDate),
      toDate: toIso(range.endDate),
    });
  }

  /** Spending per category, largest total first */
  private async categoryBreakdown(expenses: ExpenseRequestRecord[]): Promise<CategorySpending[]> {
    const groups = new Map<CategoryId | null, ExpenseRequestRecord[]>();
    for (const expense of expenses) {
      const group = groups.get(expense.categoryId) ?? [];
      group.push(expense);
      groups.set(expense.categoryId, group);
    }

    const categories = new Map<CategoryId, ExpenseCategoryRecord>(
      (await this.storage.categories.list()).map((c) => [c.id, c])
    );

    const breakdown: CategorySpending[] = [];
    for (const [categoryId, group] of groups) {
      const category = categoryId === null ? undefined : categories.get(categoryId);
      breakdown.push({
        categoryId,
        ...(category
          ? {
              categoryName: category.name,
              categoryIcon: category.icon,
              categoryColor: category.color,
            }
          : UNCATEGORIZED),
        totalAmount: sumAmounts(group.map((e) => e.amount)),
        count: group.length,
      });
    }

    return breakdown.sort(
      (a, b) => b.totalAmount - a.totalAmount || a.categoryName.localeCompare(b.categoryName)
    );
  }
}

/** Totals per UTC calendar month of expenseDate, chronological */
function monthlyTrends(expenses: ExpenseRequestRecord[]): MonthlyTrend[] {
  const groups = new Map<string, { year: number; month: number; amounts: number[] }>();
  for (const expense of expenses) {
    const date = new Date(expense.expenseDate);
    const year = date.getUTCFullYear();
    const month = date.getUTCMonth() + 1;
    const key = periodKey(year, month);
    const group = groups.get(key) ?? { year, month, amounts: [] };
    group.amounts.push(expense.amount);
    groups.set(key, group);
  }

  return Array.from(groups.entries())
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, group]) => ({
      year: group.year,
      month: group.month,
      monthName: MONTH_NAMES[group.month - 1] ?? "",
      totalAmount: sumAmounts(group.amounts),
      count: group.amounts.length,
    }));
}
