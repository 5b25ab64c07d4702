/**
 * SqliteStorage: SQLite-based implementation of WorkflowStorage.
 *
 * Uses better-sqlite3 for synchronous, fast SQLite access. A unit of work
 * commits inside one SQLite transaction.
 *
 * Tables keep the columns that are filtered or sorted on, plus the full
 * record as JSON in `data`:
 * - expenses, budgets, categories, users: keyed by id
 * - audit_logs, comments: append-only, ordered by an autoincrement seq
 */

import BetterSqlite3 from "better-sqlite3";
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
import {
  paginate,
  searchTextOf,
  type ExpenseFilter,
  type ExpenseSort,
  type ExpenseSortKey,
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
import {
  auditLogRecordSchema,
  budgetRecordSchema,
  categoryRecordSchema,
  commentRecordSchema,
  expenseRecordSchema,
  parseRecord,
  userProfileSchema,
} from "./record-schemas.js";

type Database = BetterSqlite3.Database;

interface DataRow {
  data: string;
}

interface CountRow {
  count: number;
}

interface AuditLogRow {
  id: string;
  expenseId: string;
  userId: string;
  action: string;
  previousStatus: string | null;
  newStatus: string | null;
  details: string | null;
  timestamp: string;
}

const SCHEMA_SQL = `
  CREATE TABLE IF NOT EXISTS expenses (
    id TEXT PRIMARY KEY,
    creatorId TEXT NOT NULL,
    status TEXT NOT NULL,
    categoryId TEXT,
    title TEXT NOT NULL,
    description TEXT NOT NULL,
    searchText TEXT NOT NULL,
    amount REAL NOT NULL,
    expenseDate TEXT NOT NULL,
    createdAt TEXT NOT NULL,
    submittedAt TEXT,
    data TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_expenses_creatorId ON expenses(creatorId);
  CREATE INDEX IF NOT EXISTS idx_expenses_status ON expenses(status);
  CREATE INDEX IF NOT EXISTS idx_expenses_expenseDate ON expenses(expenseDate);

  CREATE TABLE IF NOT EXISTS audit_logs (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    id TEXT NOT NULL UNIQUE,
    expenseId TEXT NOT NULL,
    userId TEXT NOT NULL,
    action TEXT NOT NULL,
    previousStatus TEXT,
    newStatus TEXT,
    details TEXT,
    timestamp TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_audit_logs_expenseId ON audit_logs(expenseId);

  CREATE TABLE IF NOT EXISTS budgets (
    id TEXT PRIMARY KEY,
    userId TEXT,
    isActive INTEGER NOT NULL,
    createdAt TEXT NOT NULL,
    data TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_budgets_userId ON budgets(userId);

  CREATE TABLE IF NOT EXISTS categories (
    id TEXT PRIMARY KEY,
    name TEXT NOT NULL,
    isActive INTEGER NOT NULL,
    data TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS comments (
    seq INTEGER PRIMARY KEY AUTOINCREMENT,
    id TEXT NOT NULL UNIQUE,
    expenseId TEXT NOT NULL,
    createdAt TEXT NOT NULL,
    data TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_comments_expenseId ON comments(expenseId);

  CREATE TABLE IF NOT EXISTS users (
    id TEXT PRIMARY KEY,
    email TEXT NOT NULL,
    data TEXT NOT NULL
  );
`;

const SORT_COLUMNS: Record<ExpenseSortKey, string> = {
  amount: "amount",
  expenseDate: "expenseDate",
  submittedAt: "submittedAt",
  createdAt: "createdAt",
};

// =============================================================================
// § SQLite Repositories
// =============================================================================

function buildExpenseWhere(filter: ExpenseFilter): { sql: string; params: unknown[] } {
  const clauses: string[] = [];
  const params: unknown[] = [];

  if (filter.creatorId !== undefined) {
    clauses.push("creatorId = ?");
    params.push(filter.creatorId);
  }
  if (filter.status !== undefined) {
    clauses.push("status = ?");
    params.push(filter.status);
  }
  if (filter.categoryId !== undefined) {
    clauses.push("categoryId = ?");
    params.push(filter.categoryId);
  }
  if (filter.search !== undefined) {
    // Folded in JS at write time; SQLite lower() only folds ASCII
    clauses.push("instr(searchText, ?) > 0");
    params.push(filter.search.toLowerCase());
  }
  if (filter.fromDate !== undefined) {
    clauses.push("expenseDate >= ?");
    params.push(filter.fromDate);
  }
  if (filter.toDate !== undefined) {
    clauses.push("expenseDate <= ?");
    params.push(filter.toDate);
  }
  if (filter.minAmount !== undefined) {
    clauses.push("amount >= ?");
    params.push(filter.minAmount);
  }
  if (filter.maxAmount !== undefined) {
    clauses.push("amount <= ?");
    params.push(filter.maxAmount);
  }

  return {
    sql: clauses.length > 0 ? "WHERE " + clauses.join(" AND ") : "",
    params,
  };
}

class SqliteExpenseRepository implements ExpenseRepository {
  constructor(private db: Database) {}

  async get(id: ExpenseId): Promise<ExpenseRequestRecord | null> {
    const row = this.db
      .prepare<[string], DataRow>("SELECT data FROM expenses WHERE id = ?")
      .get(id);
    return row ? parseRecord(expenseRecordSchema, row.data) : null;
  }

  async query(
    filter: ExpenseFilter,
    sort: ExpenseSort,
    page: PageRequest
  ): Promise<PagedResult<ExpenseRequestRecord>> {
    const where = buildExpenseWhere(filter);

    const countRow = this.db
      .prepare<unknown[], CountRow>(`SELECT COUNT(*) as count FROM expenses ${where.sql}`)
      .get(...where.params);
    const totalCount = countRow?.count ?? 0;

    const column = SORT_COLUMNS[sort.by];
    const dir = sort.dir === "asc" ? "ASC" : "DESC";
    const offset = (page.page - 1) * page.pageSize;

    const rows = this.db
      .prepare<unknown[], DataRow>(
        `SELECT data FROM expenses ${where.sql}
         ORDER BY ${column} IS NULL, ${column} ${dir}, id ASC
         LIMIT ? OFFSET ?`
      )
      .all(...where.params, page.pageSize, offset);

    return paginate(
      rows.map((row) => parseRecord(expenseRecordSchema, row.data)),
      totalCount,
      page
    );
  }

  async findAll(filter: ExpenseFilter): Promise<ExpenseRequestRecord[]> {
    const where = buildExpenseWhere(filter);
    return this.db
      .prepare<unknown[], DataRow>(`SELECT data FROM expenses ${where.sql}`)
      .all(...where.params)
      .map((row) => parseRecord(expenseRecordSchema, row.data));
  }
}

class SqliteAuditLogRepository implements AuditLogRepository {
  constructor(private db: Database) {}

  async listForExpense(expenseId: ExpenseId): Promise<AuditLogRecord[]> {
    return this.db
      .prepare<[string], AuditLogRow>(
        `SELECT id, expenseId, userId, action, previousStatus, newStatus, details, timestamp
         FROM audit_logs WHERE expenseId = ? ORDER BY seq ASC`
      )
      .all(expenseId)
      .map((row) => Object.freeze(auditLogRecordSchema.parse(row)));
  }
}

class SqliteBudgetRepository implements BudgetRepository {
  constructor(private db: Database) {}

  async get(id: BudgetId): Promise<BudgetRecord | null> {
    const row = this.db
      .prepare<[string], DataRow>("SELECT data FROM budgets WHERE id = ?")
      .get(id);
    return row ? parseRecord(budgetRecordSchema, row.data) : null;
  }

  async list(filter: BudgetFilter): Promise<BudgetRecord[]> {
    const clauses: string[] = [];
    const params: unknown[] = [];

    if (filter.userId !== undefined) {
      clauses.push(filter.includeGlobal ? "(userId = ? OR userId IS NULL)" : "userId = ?");
      params.push(filter.userId);
    }
    if (filter.activeOnly) {
      clauses.push("isActive = 1");
    }

    const where = clauses.length > 0 ? "WHERE " + clauses.join(" AND ") : "";
    return this.db
      .prepare<unknown[], DataRow>(
        `SELECT data FROM budgets ${where} ORDER BY createdAt DESC`
      )
      .all(...params)
      .map((row) => parseRecord(budgetRecordSchema, row.data));
  }
}

class SqliteCategoryRepository implements CategoryRepository {
  constructor(private db: Database) {}

  async get(id: CategoryId): Promise<ExpenseCategoryRecord | null> {
    const row = this.db
      .prepare<[string], DataRow>("SELECT data FROM categories WHERE id = ?")
      .get(id);
    return row ? parseRecord(categoryRecordSchema, row.data) : null;
  }

  async list(options?: { activeOnly?: boolean }): Promise<ExpenseCategoryRecord[]> {
    const where = options?.activeOnly ? "WHERE isActive = 1" : "";
    return this.db
      .prepare<[], DataRow>(`SELECT data FROM categories ${where} ORDER BY name ASC`)
      .all()
      .map((row) => parseRecord(categoryRecordSchema, row.data));
  }
}

class SqliteCommentRepository implements CommentRepository {
  constructor(private db: Database) {}

  async listForExpense(expenseId: ExpenseId): Promise<ExpenseCommentRecord[]> {
    return this.db
      .prepare<[string], DataRow>(
        "SELECT data FROM comments WHERE expenseId = ? ORDER BY seq ASC"
      )
      .all(expenseId)
      .map((row) => Object.freeze(parseRecord(commentRecordSchema, row.data)));
  }
}

class SqliteUserRepository implements UserRepository {
  constructor(private db: Database) {}

  async get(id: UserId): Promise<UserProfile | null> {
    const row = this.db
      .prepare<[string], DataRow>("SELECT data FROM users WHERE id = ?")
      .get(id);
    return row ? parseRecord(userProfileSchema, row.data) : null;
  }

  async list(): Promise<UserProfile[]> {
    return this.db
      .prepare<[], DataRow>("SELECT data FROM users ORDER BY email ASC")
      .all()
      .map((row) => parseRecord(userProfileSchema, row.data));
  }
}

// =============================================================================
// § Change Application
// =============================================================================

function applyChange(db: Database, change: StagedChange): void {
  switch (change.kind) {
    case "saveExpense": {
      const e = change.record;
      db.prepare(
        `INSERT OR REPLACE INTO expenses
           (id, creatorId, status, categoryId, title, description, searchText, amount, expenseDate, createdAt, submittedAt, data)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?, ?)`
      ).run(
        e.id,
        e.creatorId,
        e.status,
        e.categoryId,
        e.title,
        e.description,
        searchTextOf(e),
        e.amount,
        e.expenseDate,
        e.createdAt,
        e.submittedAt,
        JSON.stringify(e)
      );
      break;
    }
    case "deleteExpense":
      db.prepare("DELETE FROM expenses WHERE id = ?").run(change.id);
      break;
    case "appendAuditLog": {
      const a = change.record;
      db.prepare(
        `INSERT INTO audit_logs (id, expenseId, userId, action, previousStatus, newStatus, details, timestamp)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
      ).run(a.id, a.expenseId, a.userId, a.action, a.previousStatus, a.newStatus, a.details, a.timestamp);
      break;
    }
    case "saveBudget": {
      const b = change.record;
      db.prepare(
        `INSERT OR REPLACE INTO budgets (id, userId, isActive, createdAt, data)
         VALUES (?, ?, ?, ?, ?)`
      ).run(b.id, b.userId, b.isActive ? 1 : 0, b.createdAt, JSON.stringify(b));
      break;
    }
    case "deleteBudget":
      db.prepare("DELETE FROM budgets WHERE id = ?").run(change.id);
      break;
    case "saveCategory": {
      const c = change.record;
      db.prepare(
        `INSERT OR REPLACE INTO categories (id, name, isActive, data) VALUES (?, ?, ?, ?)`
      ).run(c.id, c.name, c.isActive ? 1 : 0, JSON.stringify(c));
      break;
    }
    case "appendComment": {
      const c = change.record;
      db.prepare(
        `INSERT INTO comments (id, expenseId, createdAt, data) VALUES (?, ?, ?, ?)`
      ).run(c.id, c.expenseId, c.createdAt, JSON.stringify(c));
      break;
    }
    case "saveUser": {
      const u = change.record;
      db.prepare(
        `INSERT OR REPLACE INTO users (id, email, data) VALUES (?, ?, ?)`
      ).run(u.id, u.email, JSON.stringify(u));
      break;
    }
  }
}

// =============================================================================
// § SqliteStorage: Unified SQLite Storage
// =============================================================================

export interface SqliteStorageOptions {
  /** Path to SQLite database file (or :memory: for in-memory) */
  dbPath: string;
}

export class SqliteStorage implements WorkflowStorage {
  private db: Database | null = null;
  private dbPath: string;
  private repositories: {
    expenses: SqliteExpenseRepository;
    auditLogs: SqliteAuditLogRepository;
    budgets: SqliteBudgetRepository;
    categories: SqliteCategoryRepository;
    comments: SqliteCommentRepository;
    users: SqliteUserRepository;
  } | null = null;

  constructor(options: SqliteStorageOptions) {
    this.dbPath = options.dbPath;
  }

  get expenses(): ExpenseRepository {
    return this.requireRepositories().expenses;
  }

  get auditLogs(): AuditLogRepository {
    return this.requireRepositories().auditLogs;
  }

  get budgets(): BudgetRepository {
    return this.requireRepositories().budgets;
  }

  get categories(): CategoryRepository {
    return this.requireRepositories().categories;
  }

  get comments(): CommentRepository {
    return this.requireRepositories().comments;
  }

  get users(): UserRepository {
    return this.requireRepositories().users;
  }

  async initialize(): Promise<void> {
    const db = new BetterSqlite3(this.dbPath);
    db.pragma("journal_mode = WAL");
    db.exec(SCHEMA_SQL);

    this.db = db;
    this.repositories = {
      expenses: new SqliteExpenseRepository(db),
      auditLogs: new SqliteAuditLogRepository(db),
      budgets: new SqliteBudgetRepository(db),
      categories: new SqliteCategoryRepository(db),
      comments: new SqliteCommentRepository(db),
      users: new SqliteUserRepository(db),
    };
  }

  unitOfWork(): UnitOfWork {
    const db = this.requireDb();
    const applyAll = db.transaction((changes: readonly StagedChange[]) => {
      for (const change of changes) {
        applyChange(db, change);
      }
    });
    return new StagedUnitOfWork(async (changes) => {
      applyAll(changes);
    });
  }

  async close(): Promise<void> {
    if (this.db) {
      this.db.close();
      this.db = null;
      this.repositories = null;
    }
  }

  async healthCheck(): Promise<{ ok: boolean; latencyMs: number }> {
    const start = Date.now();
    if (!this.db) {
      return { ok: false, latencyMs: Date.now() - start };
    }
    try {
      this.db.prepare("SELECT 1").get();
      return { ok: true, latencyMs: Date.now() - start };
    } catch {
      return { ok: false, latencyMs: Date.now() - start };
    }
  }

  private requireDb(): Database {
    if (!this.db) {
      throw new Error("SqliteStorage is not initialized; call initialize() first");
    }
    return this.db;
  }

  private requireRepositories(): NonNullable<SqliteStorage["repositories"]> {
    if (!this.repositories) {
      throw new Error("SqliteStorage is not initialized; call initialize() first");
    }
    return this.repositories;
  }
}
