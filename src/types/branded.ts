/**
 * Branded Types for Domain IDs
 *
 * Nominal id types that prevent accidental mixing of different ids at
 * compile time. Each branded type is still a string at runtime.
 */

// =============================================================================
// § Brand Symbols (unique per type)
// =============================================================================

export declare const ExpenseIdBrand: unique symbol;
export declare const AuditLogIdBrand: unique symbol;
export declare const BudgetIdBrand: unique symbol;
export declare const CategoryIdBrand: unique symbol;
export declare const CommentIdBrand: unique symbol;
export declare const UserIdBrand: unique symbol;

// =============================================================================
// § Branded Types
// =============================================================================

export type ExpenseId = string & { readonly __brand: typeof ExpenseIdBrand };
export type AuditLogId = string & { readonly __brand: typeof AuditLogIdBrand };
export type BudgetId = string & { readonly __brand: typeof BudgetIdBrand };
export type CategoryId = string & { readonly __brand: typeof CategoryIdBrand };
export type CommentId = string & { readonly __brand: typeof CommentIdBrand };
export type UserId = string & { readonly __brand: typeof UserIdBrand };

// =============================================================================
// § Constructor Functions
// =============================================================================

export function ExpenseId(value: string): ExpenseId {
  return value as ExpenseId;
}

export function AuditLogId(value: string): AuditLogId {
  return value as AuditLogId;
}

export function BudgetId(value: string): BudgetId {
  return value as BudgetId;
}

export function CategoryId(value: string): CategoryId {
  return value as CategoryId;
}

export function CommentId(value: string): CommentId {
  return value as CommentId;
}

export function UserId(value: string): UserId {
  return value as UserId;
}
