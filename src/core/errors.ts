/**
 * Shared error classes for the expense workflow core.
 */

/**
 * A business rule was violated. The message names the rule and is part of
 * the contract: callers and the HTTP layer surface it verbatim.
 */
export class BusinessRuleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "BusinessRuleError";
  }
}

export type EntityName = "Expense" | "Budget" | "Category" | "User";

export class NotFoundError extends Error {
  public readonly entity: EntityName;
  public readonly identifier: string;

  constructor(entity: EntityName, identifier: string) {
    super(`${entity} not found: ${identifier}`);
    this.name = "NotFoundError";
    this.entity = entity;
    this.identifier = identifier;
  }
}
