/**
 * Role-Based Access Control (RBAC)
 *
 * Defines roles and their permissions:
 * - employee: Own expenses, own budgets, own analytics
 * - manager: + approve/reject, read all expenses, team analytics
 * - admin: + category management
 */

import { USER_ROLES, type UserRole } from "../types/expense-contract.js";

// =============================================================================
// § Types
// =============================================================================

export type Role = UserRole;

export type Permission =
  | "expense:read"
  | "expense:write"
  | "expense:approve"
  | "expense:read_all"
  | "budget:write"
  | "analytics:read"
  | "analytics:read_all"
  | "category:write";

// =============================================================================
// § Permission Matrix
// =============================================================================

const EMPLOYEE_PERMISSIONS: Permission[] = [
  "expense:read",
  "expense:write",
  "budget:write",
  "analytics:read",
];

const MANAGER_PERMISSIONS: Permission[] = [
  ...EMPLOYEE_PERMISSIONS,
  "expense:approve",
  "expense:read_all",
  "analytics:read_all",
];

const ROLE_PERMISSIONS: Record<Role, Permission[]> = {
  employee: EMPLOYEE_PERMISSIONS,
  manager: MANAGER_PERMISSIONS,
  admin: [...MANAGER_PERMISSIONS, "category:write"],
};

// =============================================================================
// § RBAC Functions
// =============================================================================

/**
 * Check if a role has a specific permission.
 */
export function hasPermission(role: Role, permission: Permission): boolean {
  return ROLE_PERMISSIONS[role].includes(permission);
}

/**
 * Get all permissions for a role.
 */
export function getPermissions(role: Role): Permission[] {
  return [...ROLE_PERMISSIONS[role]];
}

/**
 * Get all defined roles.
 */
export function getRoles(): Role[] {
  return [...USER_ROLES];
}
