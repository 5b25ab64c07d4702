/**
 * Expense query semantics: filter, sort and paginate.
 *
 * normalizeExpenseQuery turns caller input into a storage-level filter,
 * sort and page. The in-memory storage evaluates them with
 * matchesExpenseFilter / compareExpenses; the SQLite storage translates the
 * same objects to SQL.
 */

import type {
  ExpenseRequestRecord,
  ExpenseStatus,
  PagedResult,
} from "../types/expense-contract.js";
import type { CategoryId, UserId } from "../types/branded.js";

export const EXPENSE_SORT_KEYS = [
  "amount",
  "expenseDate",
  "submittedAt",
  "createdAt",
] as const;

export type ExpenseSortKey = (typeof EXPENSE_SORT_KEYS)[number];
export type SortDirection = "asc" | "desc";

export const DEFAULT_PAGE_SIZE = 12;
export const MAX_PAGE_SIZE = 100;

/** Caller-facing query, as accepted by ExpenseService list operations */
export interface ExpenseQuery {
  search?: string;
  status?: ExpenseStatus;
  fromDate?: string;
  toDate?: string;
  minAmount?: number;
  maxAmount?: number;
  sortBy?: ExpenseSortKey;
  sortDir?: SortDirection;
  page?: number;
  pageSize?: number;
}

export interface ExpenseFilter {
  creatorId?: UserId;
  status?: ExpenseStatus;
  categoryId?: CategoryId;
  /** Case-insensitive substring over title and description */
  search?: string;
  /** Inclusive lower bound on expenseDate (ISO) */
  fromDate?: string;
  /** Inclusive upper bound on expenseDate (ISO) */
  toDate?: string;
  minAmount?: number;
  maxAmount?: number;
}

export interface ExpenseSort {
  by: ExpenseSortKey;
  dir: SortDirection;
}

export interface PageRequest {
  page: number;
  pageSize: number;
}

export interface NormalizedExpenseQuery {
  filter: ExpenseFilter;
  sort: ExpenseSort;
  page: PageRequest;
}

function toIsoOrUndefined(value: string | undefined): string | undefined {
  if (value === undefined) return undefined;
  const t = Date.parse(value);
  return Number.isNaN(t) ? undefined : new Date(t).toISOString();
}

export function clampPageSize(pageSize: number | undefined): number {
  if (pageSize === undefined || !Number.isFinite(pageSize)) {
    return DEFAULT_PAGE_SIZE;
  }
  return Math.min(MAX_PAGE_SIZE, Math.max(1, Math.trunc(pageSize)));
}

export function normalizeExpenseQuery(
  query: ExpenseQuery = {},
  scope: Pick<ExpenseFilter, "creatorId"> = {}
): NormalizedExpenseQuery {
  const search = query.search?.trim();
  const filter: ExpenseFilter = {
    ...scope,
    status: query.status,
    search: search ? search : undefined,
    fromDate: toIsoOrUndefined(query.fromDate),
    toDate: toIsoOrUndefined(query.toDate),
    minAmount: query.minAmount,
    maxAmount: query.maxAmount,
  };

  const page =
    query.page !== undefined && Number.isFinite(query.page)
      ? Math.max(1, Math.trunc(query.page))
      : 1;

  return {
    filter,
    sort: { by: query.sortBy ?? "createdAt", dir: query.sortDir ?? "desc" },
    page: { page, pageSize: clampPageSize(query.pageSize) },
  };
}

/** Lowercased title and description, the text `search` matches against */
export function searchTextOf(expense: Pick<ExpenseRequestRecord, "title" | "description">): string {
  return `${expense.title} ${expense.description}`.toLowerCase();
}

export function matchesExpenseFilter(
  expense: ExpenseRequestRecord,
  filter: ExpenseFilter
): boolean {
  if (filter.creatorId !== undefined && expense.creatorId !== filter.creatorId) {
    return false;
  }
  if (filter.status !== undefined && expense.status !== filter.status) {
    return false;
  }
  if (filter.categoryId !== undefined && expense.categoryId !== filter.categoryId) {
    return false;
  }
  if (filter.search !== undefined) {
    if (!searchTextOf(expense).includes(filter.search.toLowerCase())) return false;
  }
  if (filter.fromDate !== undefined && expense.expenseDate < filter.fromDate) {
    return false;
  }
  if (filter.toDate !== undefined && expense.expenseDate > filter.toDate) {
    return false;
  }
  if (filter.minAmount !== undefined && expense.amount < filter.minAmount) {
    return false;
  }
  if (filter.maxAmount !== undefined && expense.amount > filter.maxAmount) {
    return false;
  }
  return true;
}

/**
 * Comparator for the given sort. Unset timestamps sort last in either
 * direction; ties fall back to id ascending so pages are stable.
 */
export function compareExpenses(
  sort: ExpenseSort
): (a: ExpenseRequestRecord, b: ExpenseRequestRecord) => number {
  const sign = sort.dir === "asc" ? 1 : -1;
  return (a, b) => {
    const av = a[sort.by];
    const bv = b[sort.by];
    if (av === null && bv !== null) return 1;
    if (av !== null && bv === null) return -1;
    if (av !== null && bv !== null && av !== bv) {
      return (av < bv ? -1 : 1) * sign;
    }
    return a.id < b.id ? -1 : a.id > b.id ? 1 : 0;
  };
}

export function paginate<T>(
  items: readonly T[],
  totalCount: number,
  page: PageRequest
): PagedResult<T> {
  return {
    items: [...items],
    totalCount,
    page: page.page,
    pageSize: page.pageSize,
    totalPages: Math.ceil(totalCount / page.pageSize),
  };
}
