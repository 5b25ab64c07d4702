/**
 * Expense Workflow Contract - TypeScript Type Definitions
 *
 * Persisted record shapes, domain events and read models shared by the
 * core services, the storage adapters and the HTTP routes.
 */

import type {
  AuditLogId,
  BudgetId,
  CategoryId,
  CommentId,
  ExpenseId,
  UserId,
} from "./branded.js";

/**
 * Expense lifecycle states (type union)
 */
export type ExpenseStatus = "draft" | "submitted" | "approved" | "rejected";

/**
 * ExpenseStatus runtime constants for enum-like access.
 */
export const ExpenseStatus = {
  DRAFT: "draft",
  SUBMITTED: "submitted",
  APPROVED: "approved",
  REJECTED: "rejected",
} as const;

export const EXPENSE_STATUSES: readonly ExpenseStatus[] = [
  ExpenseStatus.DRAFT,
  ExpenseStatus.SUBMITTED,
  ExpenseStatus.APPROVED,
  ExpenseStatus.REJECTED,
];

/**
 * Domain roles. Captured on the expense at creation time and supplied by
 * the caller for approval decisions.
 */
export type UserRole = "employee" | "manager" | "admin";

export const UserRole = {
  EMPLOYEE: "employee",
  MANAGER: "manager",
  ADMIN: "admin",
} as const;

export const USER_ROLES: readonly UserRole[] = [
  UserRole.EMPLOYEE,
  UserRole.MANAGER,
  UserRole.ADMIN,
];

export function isUserRole(value: string): value is UserRole {
  return USER_ROLES.some((role) => role === value);
}

/**
 * The authenticated caller of a service operation.
 */
export interface Actor {
  userId: UserId;
  role: UserRole;
}

// =============================================================================
// § Persisted Records
// =============================================================================

export interface ExpenseRequestRecord {
  id: ExpenseId;
  creatorId: UserId;
  /** null only for requests persisted before creator roles were tracked */
  creatorRole: UserRole | null;
  categoryId: CategoryId | null;
  title: string;
  description: string;
  amount: number;
  expenseDate: string;
  status: ExpenseStatus;
  createdAt: string;
  updatedAt: string | null;
  submittedAt: string | null;
  processedAt: string | null;
  processedBy: UserId | null;
  rejectionReason: string | null;
  attachmentUrls: string[];
}

export type AuditAction =
  | "Created"
  | "Updated"
  | "Submitted"
  | "Approved"
  | "Rejected"
  | "AttachmentAdded"
  | "AttachmentRemoved"
  | "Deleted";

export interface AuditLogRecord {
  readonly id: AuditLogId;
  readonly expenseId: ExpenseId;
  readonly userId: UserId;
  readonly action: AuditAction;
  readonly previousStatus: ExpenseStatus | null;
  readonly newStatus: ExpenseStatus | null;
  readonly details: string | null;
  readonly timestamp: string;
}

export interface BudgetRecord {
  id: BudgetId;
  name: string;
  description: string | null;
  amount: number;
  startDate: string;
  endDate: string;
  /** null = applies to all users */
  userId: UserId | null;
  /** null = applies to all categories */
  categoryId: CategoryId | null;
  isActive: boolean;
  createdAt: string;
  updatedAt: string | null;
}

export interface ExpenseCategoryRecord {
  id: CategoryId;
  name: string;
  description: string;
  icon: string;
  color: string;
  isActive: boolean;
  createdAt: string;
}

export interface ExpenseCommentRecord {
  readonly id: CommentId;
  readonly expenseId: ExpenseId;
  readonly userId: UserId;
  readonly userName: string;
  readonly text: string;
  readonly createdAt: string;
}

export interface UserProfile {
  id: UserId;
  email: string;
  fullName: string;
  role: UserRole;
  createdAt: string;
}

// =============================================================================
// § Domain Events
// =============================================================================

export interface ExpenseSubmittedEvent {
  type: "expense.submitted";
  expenseId: ExpenseId;
  submittedBy: UserId;
  amount: number;
  occurredAt: string;
}

export interface ExpenseApprovedEvent {
  type: "expense.approved";
  expenseId: ExpenseId;
  approvedBy: UserId;
  amount: number;
  occurredAt: string;
}

export interface ExpenseRejectedEvent {
  type: "expense.rejected";
  expenseId: ExpenseId;
  rejectedBy: UserId;
  reason: string;
  occurredAt: string;
}

export type ExpenseDomainEvent =
  | ExpenseSubmittedEvent
  | ExpenseApprovedEvent
  | ExpenseRejectedEvent;

// =============================================================================
// § Read Models
// =============================================================================

/**
 * Expense as returned by read paths, enriched with the creator's display name.
 */
export interface ExpenseView extends ExpenseRequestRecord {
  creatorName: string | null;
}

export interface PagedResult<T> {
  items: T[];
  totalCount: number;
  page: number;
  pageSize: number;
  totalPages: number;
}

export interface BudgetStatus {
  budgetId: BudgetId;
  budgetName: string;
  description: string | null;
  budgetAmount: number;
  spentAmount: number;
  remainingAmount: number;
  percentageUsed: number;
  categoryName: string | null;
  categoryIcon: string | null;
  startDate: string;
  endDate: string;
  daysRemaining: number;
  isOverBudget: boolean;
  isActive: boolean;
}

export interface CategorySpending {
  categoryId: CategoryId | null;
  categoryName: string;
  categoryIcon: string;
  categoryColor: string;
  totalAmount: number;
  count: number;
}

export interface MonthlyTrend {
  year: number;
  month: number;
  monthName: string;
  totalAmount: number;
  count: number;
}

export interface ExpenseAnalytics {
  totalExpenses: number;
  approvedAmount: number;
  pendingAmount: number;
  totalCount: number;
  approvedCount: number;
  pendingCount: number;
  rejectedCount: number;
  averageExpense: number;
  categoryBreakdown: CategorySpending[];
  monthlyTrends: MonthlyTrend[];
}

export interface StatusDistribution {
  status: ExpenseStatus;
  count: number;
  totalAmount: number;
  percentage: number;
}

export interface ApprovalRateData {
  period: string;
  totalSubmitted: number;
  approved: number;
  rejected: number;
  approvalRate: number;
  rejectionRate: number;
}
