/**
 * CategoryService - expense category catalogue.
 */

import type { Logger } from "pino";
import type { ExpenseCategoryRecord } from "../types/expense-contract.js";
import type { CategoryId } from "../types/branded.js";
import type { WorkflowStorage } from "../storage/storage-interface.js";
import { createChildLogger } from "../logging.js";
import { NotFoundError } from "./errors.js";
import {
  DEFAULT_CATEGORIES,
  ExpenseCategory,
  type CreateCategoryParams,
} from "./expense-category.js";

export interface CategoryServiceOptions {
  clock?: () => Date;
  logger?: Logger;
}

export class CategoryService {
  private readonly clock: () => Date;
  private readonly logger: Logger;

  constructor(
    private storage: WorkflowStorage,
    options: CategoryServiceOptions = {}
  ) {
    this.clock = options.clock ?? (() => new Date());
    this.logger = options.logger ?? createChildLogger({ component: "category-service" });
  }

  /** Ordered by name; active categories only unless asked otherwise */
  async listCategories(options: { includeInactive?: boolean } = {}): Promise<ExpenseCategoryRecord[]> {
    return this.storage.categories.list({ activeOnly: !options.includeInactive });
  }

  async createCategory(params: Omit<CreateCategoryParams, "id">): Promise<ExpenseCategoryRecord> {
    const category = ExpenseCategory.create(params, this.clock());
    await this.save(category);
    this.logger.info({ categoryId: category.id }, "Category created");
    return category.toRecord();
  }

  async activateCategory(id: CategoryId): Promise<void> {
    const category = await this.load(id);
    category.activate();
    await this.save(category);
  }

  async deactivateCategory(id: CategoryId): Promise<void> {
    const category = await this.load(id);
    category.deactivate();
    await this.save(category);
  }

  /**
   * Insert the default categories that are missing. Returns how many were
   * added.
   */
  async seedDefaults(): Promise<number> {
    const now = this.clock();
    const uow = this.storage.unitOfWork();
    let added = 0;
    for (const params of DEFAULT_CATEGORIES) {
      if (params.id && (await this.storage.categories.get(params.id))) {
        continue;
      }
      uow.saveCategory(ExpenseCategory.create(params, now).toRecord());
      added++;
    }
    await uow.commit();
    if (added > 0) {
      this.logger.info({ added }, "Default categories seeded");
    }
    return added;
  }

  private async load(id: CategoryId): Promise<ExpenseCategory> {
    const record = await this.storage.categories.get(id);
    if (!record) {
      throw new NotFoundError("Category", id);
    }
    return ExpenseCategory.rehydrate(record);
  }

  private async save(category: ExpenseCategory): Promise<void> {
    const uow = this.storage.unitOfWork();
    uow.saveCategory(category.toRecord());
    await uow.commit();
  }
}
