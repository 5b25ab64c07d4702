/**
 * BudgetService - budget management and per-user budget status.
 *
 * Personal budgets are managed by their owner; global budgets (no user)
 * by admins. Admins may manage any budget.
 */

import type { Logger } from "pino";
import type {
  Actor,
  BudgetRecord,
  BudgetStatus,
  ExpenseCategoryRecord,
} from "../types/expense-contract.js";
import type { BudgetId, CategoryId, UserId } from "../types/branded.js";
import type { WorkflowStorage } from "../storage/storage-interface.js";
import { createChildLogger } from "../logging.js";
import { Budget, computeBudgetStatus, type BudgetParams } from "./budget.js";
import { BusinessRuleError, NotFoundError } from "./errors.js";

export interface CreateBudgetCommand extends BudgetParams {
  categoryId?: CategoryId | null;
  /** Applies to every user; admins only */
  global?: boolean;
}

export interface BudgetServiceOptions {
  clock?: () => Date;
  logger?: Logger;
}

export class BudgetService {
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(
    private storage: WorkflowStorage,
    options: BudgetServiceOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createChildLogger({ component: "budget-service" });
  }

  async createBudget(actor: Actor, command: CreateBudgetCommand): Promise<BudgetId> {
    if (command.global && actor.role !== "admin") {
      throw new BusinessRuleError("Only admins can create global budgets.");
    }
    if (command.categoryId) {
      const category = await this.storage.categories.get(command.categoryId);
      if (!category) {
        throw new NotFoundError("Category", command.categoryId);
      }
    }

    const budget = Budget.create(
      {
        ...command,
        userId: command.global ? null : actor.userId,
        categoryId: command.categoryId ?? null,
      },
      this.clock()
    );
    await this.save(budget);
    this.logger.info({ budgetId: budget.id, userId: actor.userId }, "Budget created");
    return budget.id;
  }

  async updateBudget(id: BudgetId, actor: Actor, params: BudgetParams): Promise<void> {
    const budget = await this.loadOwned(id, actor);
    budget.update(params, this.clock());
    await this.save(budget);
  }

  async activateBudget(id: BudgetId, actor: Actor): Promise<void> {
    const budget = await this.loadOwned(id, actor);
    budget.activate(this.clock());
    await this.save(budget);
  }

  async deactivateBudget(id: BudgetId, actor: Actor): Promise<void> {
    const budget = await this.loadOwned(id, actor);
    budget.deactivate(this.clock());
    await this.save(budget);
  }

  async deleteBudget(id: BudgetId, actor: Actor): Promise<void> {
    await this.loadOwned(id, actor);
    const uow = this.storage.unitOfWork();
    uow.deleteBudget(id);
    await uow.commit();
    this.logger.info({ budgetId: id, userId: actor.userId }, "Budget deleted");
  }

  /** The user's own budgets and the global ones, newest first. */
  async listBudgets(userId: UserId, options: { activeOnly?: boolean } = {}): Promise<BudgetRecord[]> {
    return this.storage.budgets.list({
      userId,
      includeGlobal: true,
      activeOnly: options.activeOnly,
    });
  }

  /**
   * Utilization of every active budget that applies to the user, most
   * used first.
   */
  async getBudgetStatus(userId: UserId): Promise<BudgetStatus[]> {
    const now = this.clock();
    const budgets = await this.storage.budgets.list({
      userId,
      includeGlobal: true,
      activeOnly: true,
    });
    const categories = new Map<CategoryId, ExpenseCategoryRecord | null>();

    const statuses: BudgetStatus[] = [];
    for (const budget of budgets) {
      const expenses = await this.storage.expenses.findAll({
        status: "approved",
        creatorId: budget.userId ?? undefined,
        categoryId: budget.categoryId ?? undefined,
        fromDate: budget.startDate,
        toDate: budget.endDate,
      });

      let category: ExpenseCategoryRecord | null = null;
      if (budget.categoryId !== null) {
        if (!categories.has(budget.categoryId)) {
          categories.set(budget.categoryId, await this.storage.categories.get(budget.categoryId));
        }
        category = categories.get(budget.categoryId) ?? null;
      }

      statuses.push(computeBudgetStatus(budget, expenses, now, category));
    }

    return statuses.sort((a, b) => b.percentageUsed - a.percentageUsed);
  }

  private async loadOwned(id: BudgetId, actor: Actor): Promise<Budget> {
    const record = await this.storage.budgets.get(id);
    if (!record) {
      throw new NotFoundError("Budget", id);
    }
    if (actor.role !== "admin") {
      if (record.userId === null) {
        throw new BusinessRuleError("Only admins can manage global budgets.");
      }
      if (record.userId !== actor.userId) {
        throw new BusinessRuleError("You can only manage your own budgets.");
      }
    }
    return Budget.rehydrate(record);
  }

  private async save(budget: Budget): Promise<void> {
    const uow = this.storage.unitOfWork();
    uow.saveBudget(budget.toRecord());
    await uow.commit();
  }
}
