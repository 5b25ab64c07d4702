/**
 * MemoryStorage: In-memory implementation of WorkflowStorage.
 * Used in development and tests. Reads return copies so callers never
 * share state with the store.
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
import {
  ExpenseId,
  type BudgetId,
  type CategoryId,
  type UserId,
} from "../types/branded.js";
import {
  compareExpenses,
  matchesExpenseFilter,
  paginate,
  type ExpenseFilter,
  type ExpenseSort,
  type PageRequest,
} from "../core/expense-query.js";
import {
  StagedUnitOfWork,
  type AuditLogRepository,
  type BudgetFilter,
  type BudgetRepository,
  type CategoryRepository,
  type CommentRepository,
  type ExpenseRepository,
  type StagedChange,
  type UnitOfWork,
  type UserRepository,
  type WorkflowStorage,
} from "./storage-interface.js";

// =============================================================================
// § In-Memory Tables
// =============================================================================

class MemoryTables {
  expenses = new Map<ExpenseId, ExpenseRequestRecord>();
  auditLogs: AuditLogRecord[] = [];
  budgets = new Map<BudgetId, BudgetRecord>();
  categories = new Map<CategoryId, ExpenseCategoryRecord>();
  comments: ExpenseCommentRecord[] = [];
  users = new Map<UserId, UserProfile>();

  apply(change: StagedChange): void {
    switch (change.kind) {
      case "saveExpense":
        this.expenses.set(change.record.id, change.record);
        break;
      case "deleteExpense":
        this.expenses.delete(change.id);
        break;
      case "appendAuditLog":
        this.auditLogs.push(change.record);
        break;
      case "saveBudget":
        this.budgets.set(change.record.id, change.record);
        break;
      case "deleteBudget":
        this.budgets.delete(change.id);
        break;
      case "saveCategory":
        this.categories.set(change.record.id, change.record);
        break;
      case "appendComment":
        this.comments.push(change.record);
        break;
      case "saveUser":
        this.users.set(change.record.id, change.record);
        break;
    }
  }
}

// =============================================================================
// § Repositories
// =============================================================================

class InMemoryExpenseRepository implements ExpenseRepository {
  constructor(private tables: MemoryTables) {}

  async get(id: ExpenseId): Promise<ExpenseRequestRecord | null> {
    const record = this.tables.expenses.get(id);
    return record ? structuredClone(record) : null;
  }

  async query(
    filter: ExpenseFilter,
    sort: ExpenseSort,
    page: PageRequest
  ): Promise<PagedResult<ExpenseRequestRecord>> {
    const matching = Array.from(this.tables.expenses.values())
      .filter((e) => matchesExpenseFilter(e, filter))
      .sort(compareExpenses(sort));

    const offset = (page.page - 1) * page.pageSize;
    const items = matching
      .slice(offset, offset + page.pageSize)
      .map((e) => structuredClone(e));

    return paginate(items, matching.length, page);
  }

  async findAll(filter: ExpenseFilter): Promise<ExpenseRequestRecord[]> {
    return Array.from(this.tables.expenses.values())
      .filter((e) => matchesExpenseFilter(e, filter))
      .map((e) => structuredClone(e));
  }
}

class InMemoryAuditLogRepository implements AuditLogRepository {
  constructor(private tables: MemoryTables) {}

  async listForExpense(expenseId: ExpenseId): Promise<AuditLogRecord[]> {
    // Appended in commit order, which is timestamp order
    return this.tables.auditLogs.filter((entry) => entry.expenseId === expenseId);
  }
}

class InMemoryBudgetRepository implements BudgetRepository {
  constructor(private tables: MemoryTables) {}

  async get(id: BudgetId): Promise<BudgetRecord | null> {
    const record = this.tables.budgets.get(id);
    return record ? { ...record } : null;
  }

  async list(filter: BudgetFilter): Promise<BudgetRecord[]> {
    return Array.from(this.tables.budgets.values())
      .filter((b) => {
        if (filter.userId !== undefined) {
          const owned = b.userId === filter.userId;
          const global = filter.includeGlobal === true && b.userId === null;
          if (!owned && !global) return false;
        }
        return !filter.activeOnly || b.isActive;
      })
      .sort((a, b) => (a.createdAt < b.createdAt ? 1 : a.createdAt > b.createdAt ? -1 : 0))
      .map((b) => ({ ...b }));
  }
}

class InMemoryCategoryRepository implements CategoryRepository {
  constructor(private tables: MemoryTables) {}

  async get(id: CategoryId): Promise<ExpenseCategoryRecord | null> {
    const record = this.tables.categories.get(id);
    return record ? { ...record } : null;
  }

  async list(options?: { activeOnly?: boolean }): Promise<ExpenseCategoryRecord[]> {
    return Array.from(this.tables.categories.values())
      .filter((c) => !options?.activeOnly || c.isActive)
      .sort((a, b) => a.name.localeCompare(b.name))
      .map((c) => ({ ...c }));
  }
}

class InMemoryCommentRepository implements CommentRepository {
  constructor(private tables: MemoryTables) {}

  async listForExpense(expenseId: ExpenseId): Promise<ExpenseCommentRecord[]> {
    return this.tables.comments.filter((c) => c.expenseId === expenseId);
  }
}

class InMemoryUserRepository implements UserRepository {
  constructor(private tables: MemoryTables) {}

  async get(id: UserId): Promise<UserProfile | null> {
    const record = this.tables.users.get(id);
    return record ? { ...record } : null;
  }

  async list(): Promise<UserProfile[]> {
    return Array.from(this.tables.users.values()).map((u) => ({ ...u }));
  }
}

// =============================================================================
// § MemoryStorage: Unified In-Memory Storage
// =============================================================================

export class MemoryStorage implements WorkflowStorage {
  expenses: ExpenseRepository;
  auditLogs: AuditLogRepository;
  budgets: BudgetRepository;
  categories: CategoryRepository;
  comments: CommentRepository;
  users: UserRepository;
  private tables = new MemoryTables();

  constructor() {
    this.expenses = new InMemoryExpenseRepository(this.tables);
    this.auditLogs = new InMemoryAuditLogRepository(this.tables);
    this.budgets = new InMemoryBudgetRepository(this.tables);
    this.categories = new InMemoryCategoryRepository(this.tables);
    this.comments = new InMemoryCommentRepository(this.tables);
    this.users = new InMemoryUserRepository(this.tables);
  }

  unitOfWork(): UnitOfWork {
    // Map and array writes cannot fail part-way, so applying in order is atomic
    return new StagedUnitOfWork(async (changes) => {
      for (const change of changes) {
        this.tables.apply(change);
      }
    });
  }

  async initialize(): Promise<void> {
    // No-op for in-memory storage
  }

  async close(): Promise<void> {
    // No-op for in-memory storage
  }

  async healthCheck(): Promise<{ ok: boolean; latencyMs: number }> {
    const start = Date.now();
    await this.expenses.get(ExpenseId("__health_check__"));
    return { ok: true, latencyMs: Date.now() - start };
  }
}
