/**
 * Tunable business-rule thresholds for expense requests.
 */
export interface ExpensePolicy {
  /** Amount above which at least one attachment is required to submit */
  receiptThreshold: number;
  /** Amount above which only an admin may approve */
  approvalCeiling: number;
  /** Maximum age of an expense date at creation, in days (0 disables) */
  lookbackDays: number;
}

export const DEFAULT_EXPENSE_POLICY: Readonly<ExpensePolicy> = Object.freeze({
  receiptThreshold: 100,
  approvalCeiling: 1000,
  lookbackDays: 90,
});
