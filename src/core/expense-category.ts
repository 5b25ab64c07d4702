/**
 * ExpenseCategory - reference entity used to classify expenses and budgets.
 * Deactivating a category leaves existing references untouched.
 */

import { randomUUID } from "crypto";
import type { ExpenseCategoryRecord } from "../types/expense-contract.js";
import { CategoryId } from "../types/branded.js";
import { BusinessRuleError } from "./errors.js";

export interface CreateCategoryParams {
  name: string;
  description?: string;
  icon?: string;
  color?: string;
  /** Fixed id, used for the seeded defaults */
  id?: CategoryId;
}

export class ExpenseCategory {
  private constructor(private readonly state: ExpenseCategoryRecord) {}

  static create(params: CreateCategoryParams, now: Date = new Date()): ExpenseCategory {
    if (params.name.trim().length === 0) {
      throw new BusinessRuleError("Category name cannot be empty.");
    }
    return new ExpenseCategory({
      id: params.id ?? CategoryId(randomUUID()),
      name: params.name,
      description: params.description ?? "",
      icon: params.icon ?? "",
      color: params.color ?? "",
      isActive: true,
      createdAt: now.toISOString(),
    });
  }

  static rehydrate(record: ExpenseCategoryRecord): ExpenseCategory {
    return new ExpenseCategory({ ...record });
  }

  get id(): CategoryId {
    return this.state.id;
  }

  toRecord(): ExpenseCategoryRecord {
    return { ...this.state };
  }

  activate(): void {
    this.state.isActive = true;
  }

  deactivate(): void {
    this.state.isActive = false;
  }
}

export const DEFAULT_CATEGORIES: readonly CreateCategoryParams[] = [
  {
    id: CategoryId("11111111-1111-1111-1111-111111111111"),
    name: "Travel",
    description: "Business travel expenses including flights, hotels, car rentals",
    icon: "✈️",
    color: "#3b82f6",
  },
  {
    id: CategoryId("22222222-2222-2222-2222-222222222222"),
    name: "Meals & Entertainment",
    description: "Client meals, team lunches, and entertainment expenses",
    icon: "🍽️",
    color: "#f59e0b",
  },
  {
    id: CategoryId("33333333-3333-3333-3333-333333333333"),
    name: "Office Supplies",
    description: "Stationery, furniture, and general office equipment",
    icon: "📎",
    color: "#10b981",
  },
  {
    id: CategoryId("44444444-4444-4444-4444-444444444444"),
    name: "Software & Subscriptions",
    description: "Software licenses, SaaS subscriptions, cloud services",
    icon: "💻",
    color: "#8b5cf6",
  },
  {
    id: CategoryId("55555555-5555-5555-5555-555555555555"),
    name: "Training & Education",
    description: "Professional development, courses, certifications, conferences",
    icon: "📚",
    color: "#ec4899",
  },
  {
    id: CategoryId("66666666-6666-6666-6666-666666666666"),
    name: "Other",
    description: "Miscellaneous expenses not covered by other categories",
    icon: "📋",
    color: "#6b7280",
  },
];
