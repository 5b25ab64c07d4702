/**
 * Expense Workflow
 * Expense approval state machine, audit trail, budgets and HTTP API
 */

// =============================================================================
// Domain
// =============================================================================

export { ExpenseRequest } from './core/expense-request.js';
export type {
  CreateExpenseParams,
  UpdateExpenseParams,
  ExpenseChanges,
} from './core/expense-request.js';
export { AuditLog, describeChanges } from './core/audit-log.js';
export {
  Budget,
  computeBudgetStatus,
  expenseCountsAgainstBudget,
  isBudgetInEffect,
} from './core/budget.js';
export type { BudgetParams, CreateBudgetParams } from './core/budget.js';
export { ExpenseCategory, DEFAULT_CATEGORIES } from './core/expense-category.js';
export { createExpenseComment } from './core/expense-comment.js';
export { DEFAULT_EXPENSE_POLICY } from './core/expense-policy.js';
export type { ExpensePolicy } from './core/expense-policy.js';
export {
  VALID_TRANSITIONS,
  InvalidStateTransitionError,
  assertValidTransition,
  isTerminalStatus,
} from './core/state-machine.js';
export { BusinessRuleError, NotFoundError } from './core/errors.js';
export type { EntityName } from './core/errors.js';

// =============================================================================
// Services
// =============================================================================

export { ExpenseService } from './core/expense-service.js';
export type {
  CreateExpenseCommand,
  UpdateExpenseCommand,
  ServiceOptions,
} from './core/expense-service.js';
export { BudgetService } from './core/budget-service.js';
export type { CreateBudgetCommand } from './core/budget-service.js';
export { CategoryService } from './core/category-service.js';
export { AnalyticsService } from './core/analytics-service.js';
export type { DateRange } from './core/analytics-service.js';
export { DomainEventDispatcher } from './core/event-dispatcher.js';
export type { EventDispatcher, DomainEventListener } from './core/event-dispatcher.js';
export { StorageIdentityDirectory } from './core/identity-directory.js';
export type { IdentityDirectory } from './core/identity-directory.js';
export type { ExpenseQuery, ExpenseFilter, ExpenseSort } from './core/expense-query.js';

// =============================================================================
// Storage
// =============================================================================

export type { WorkflowStorage, UnitOfWork } from './storage/storage-interface.js';
export { MemoryStorage } from './storage/memory-storage.js';
export { SqliteStorage } from './storage/sqlite-storage.js';
export type { SqliteStorageOptions } from './storage/sqlite-storage.js';
export { seedDemoData, DEMO_USERS } from './storage/seed.js';

// =============================================================================
// HTTP
// =============================================================================

export { createExpenseApp, createExpenseServices } from './app.js';
export type { ExpenseAppOptions, ExpenseServices } from './app.js';
export { createAuthConfig } from './auth/config.js';
export type { AuthConfig, AuthContext } from './auth/middleware.js';
export { TokenVerifier } from './auth/token-verifier.js';
export { loadConfig } from './config.js';
export type { AppConfig } from './config.js';
export { createLogger, getLogger, setLogger } from './logging.js';

// =============================================================================
// Types
// =============================================================================

export * from './types/expense-contract.js';
export * from './types/branded.js';
