/**
 * WorkflowStorage: Unified pluggable storage interface.
 *
 * Repositories expose reads; every write goes through a UnitOfWork whose
 * commit applies all staged changes atomically (an expense mutation and
 * its audit record land together or not at all).
 *
 * Implementations:
 * - MemoryStorage: In-memory for dev/testing
 * - SqliteStorage: SQLite for single-node production (via better-sqlite3)
 */

import type {
  AuditLogRecord,
  BudgetRecord,
  ExpenseCategoryRecord,
  ExpenseCommentRecord,
  ExpenseRequestRecord,
  PagedResult,
  UserProfile,
} from "../types/expense-contract.js";
import type {
  BudgetId,
  CategoryId,
  ExpenseId,
  UserId,
} from "../types/branded.js";
import type {
  ExpenseFilter,
  ExpenseSort,
  PageRequest,
} from "../core/expense-query.js";

// =============================================================================
// § Repositories (read side)
// =============================================================================

export interface ExpenseRepository {
  get(id: ExpenseId): Promise<ExpenseRequestRecord | null>;
  /** Filtered, sorted page of expenses */
  query(
    filter: ExpenseFilter,
    sort: ExpenseSort,
    page: PageRequest
  ): Promise<PagedResult<ExpenseRequestRecord>>;
  /** Every expense matching the filter, unordered; for aggregation */
  findAll(filter: ExpenseFilter): Promise<ExpenseRequestRecord[]>;
}

export interface AuditLogRepository {
  /** Audit history of one expense, oldest first */
  listForExpense(expenseId: ExpenseId): Promise<AuditLogRecord[]>;
}

export interface BudgetFilter {
  userId?: UserId;
  /** Include global budgets (userId = null) alongside the user's own */
  includeGlobal?: boolean;
  activeOnly?: boolean;
}

export interface BudgetRepository {
  get(id: BudgetId): Promise<BudgetRecord | null>;
  /** Newest first */
  list(filter: BudgetFilter): Promise<BudgetRecord[]>;
}

export interface CategoryRepository {
  get(id: CategoryId): Promise<ExpenseCategoryRecord | null>;
  /** Ordered by name */
  list(options?: { activeOnly?: boolean }): Promise<ExpenseCategoryRecord[]>;
}

export interface CommentRepository {
  /** Oldest first */
  listForExpense(expenseId: ExpenseId): Promise<ExpenseCommentRecord[]>;
}

export interface UserRepository {
  get(id: UserId): Promise<UserProfile | null>;
  list(): Promise<UserProfile[]>;
}

// =============================================================================
// § Unit of Work (write side)
// =============================================================================

export interface UnitOfWork {
  saveExpense(expense: ExpenseRequestRecord): void;
  deleteExpense(id: ExpenseId): void;
  appendAuditLog(entry: AuditLogRecord): void;
  saveBudget(budget: BudgetRecord): void;
  deleteBudget(id: BudgetId): void;
  saveCategory(category: ExpenseCategoryRecord): void;
  appendComment(comment: ExpenseCommentRecord): void;
  saveUser(user: UserProfile): void;
  /** Apply every staged change atomically. A unit of work commits once. */
  commit(): Promise<void>;
}

// =============================================================================
// § Unified Storage Interface
// =============================================================================

export interface WorkflowStorage {
  expenses: ExpenseRepository;
  auditLogs: AuditLogRepository;
  budgets: BudgetRepository;
  categories: CategoryRepository;
  comments: CommentRepository;
  users: UserRepository;
  unitOfWork(): UnitOfWork;
  initialize(): Promise<void>;
  close(): Promise<void>;
  healthCheck(): Promise<{ ok: boolean; latencyMs: number }>;
}

// =============================================================================
// § Staged Changes
// =============================================================================

export type StagedChange =
  | { kind: "saveExpense"; record: ExpenseRequestRecord }
  | { kind: "deleteExpense"; id: ExpenseId }
  | { kind: "appendAuditLog"; record: AuditLogRecord }
  | { kind: "saveBudget"; record: BudgetRecord }
  | { kind: "deleteBudget"; id: BudgetId }
  | { kind: "saveCategory"; record: ExpenseCategoryRecord }
  | { kind: "appendComment"; record: ExpenseCommentRecord }
  | { kind: "saveUser"; record: UserProfile };

/**
 * Collects changes in order and hands them to `apply` on commit. Storage
 * adapters supply an `apply` that runs the whole batch atomically.
 */
export class StagedUnitOfWork implements UnitOfWork {
  private changes: StagedChange[] = [];
  private committed = false;

  constructor(private readonly apply: (changes: readonly StagedChange[]) => Promise<void>) {}

  saveExpense(record: ExpenseRequestRecord): void {
    this.stage({ kind: "saveExpense", record: structuredClone(record) });
  }

  deleteExpense(id: ExpenseId): void {
    this.stage({ kind: "deleteExpense", id });
  }

  appendAuditLog(record: AuditLogRecord): void {
    this.stage({ kind: "appendAuditLog", record });
  }

  saveBudget(record: BudgetRecord): void {
    this.stage({ kind: "saveBudget", record: { ...record } });
  }

  deleteBudget(id: BudgetId): void {
    this.stage({ kind: "deleteBudget", id });
  }

  saveCategory(record: ExpenseCategoryRecord): void {
    this.stage({ kind: "saveCategory", record: { ...record } });
  }

  appendComment(record: ExpenseCommentRecord): void {
    this.stage({ kind: "appendComment", record });
  }

  saveUser(record: UserProfile): void {
    this.stage({ kind: "saveUser", record: { ...record } });
  }

  async commit(): Promise<void> {
    if (this.committed) {
      throw new Error("Unit of work has already been committed");
    }
    this.committed = true;
    await this.apply(this.changes);
    this.changes = [];
  }

  private stage(change: StagedChange): void {
    if (this.committed) {
      throw new Error("Unit of work has already been committed");
    }
    this.changes.push(change);
  }
}
