/**
 * State Machine - Expense status transition validation
 *
 * Defines valid status transitions for the expense lifecycle
 * and provides a guard function to enforce them.
 */

import type { ExpenseStatus } from "../types/expense-contract.js";

/**
 * Error thrown when an invalid state transition is attempted.
 *
 * Entity mutators check their own preconditions first and raise a
 * BusinessRuleError; reaching this error means a mutator skipped a guard.
 */
export class InvalidStateTransitionError extends Error {
  public readonly from: ExpenseStatus;
  public readonly to: ExpenseStatus;

  constructor(from: ExpenseStatus, to: ExpenseStatus) {
    super(`Invalid state transition: '${from}' → '${to}'`);
    this.name = "InvalidStateTransitionError";
    this.from = from;
    this.to = to;
  }
}

/**
 * Valid status transitions for the expense lifecycle.
 *
 *   draft ──► submitted ──► approved
 *                  │
 *                  └──────► rejected
 *
 * Terminal states: approved, rejected
 */
export const VALID_TRANSITIONS: ReadonlyMap<
  ExpenseStatus,
  ReadonlySet<ExpenseStatus>
> = new Map([
  ["draft", new Set<ExpenseStatus>(["submitted"])],
  ["submitted", new Set<ExpenseStatus>(["approved", "rejected"])],
  ["approved", new Set<ExpenseStatus>()],
  ["rejected", new Set<ExpenseStatus>()],
]);

export function isTerminalStatus(status: ExpenseStatus): boolean {
  return (VALID_TRANSITIONS.get(status)?.size ?? 0) === 0;
}

/**
 * Assert that a state transition is valid.
 *
 * @throws {InvalidStateTransitionError} If the transition is not allowed
 */
export function assertValidTransition(
  from: ExpenseStatus,
  to: ExpenseStatus
): void {
  const validTargets = VALID_TRANSITIONS.get(from);
  if (!validTargets || !validTargets.has(to)) {
    throw new InvalidStateTransitionError(from, to);
  }
}
