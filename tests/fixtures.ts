/**
 * Shared fixtures for service, storage and route tests.
 */

import { CategoryService } from "../src/core/category-service.js";
import { DomainEventDispatcher } from "../src/core/event-dispatcher.js";
import { ExpenseService, type CreateExpenseCommand } from "../src/core/expense-service.js";
import { StorageIdentityDirectory } from "../src/core/identity-directory.js";
import { MemoryStorage } from "../src/storage/memory-storage.js";
import type { WorkflowStorage } from "../src/storage/storage-interface.js";
import { CategoryId, ExpenseId, UserId } from "../src/types/branded.js";
import type {
  ExpenseDomainEvent,
  ExpenseRequestRecord,
  UserProfile,
  UserRole,
} from "../src/types/expense-contract.js";

export const NOW = new Date("2024-06-15T12:00:00.000Z");

export const EMPLOYEE = UserId("employee-1");
export const EMPLOYEE_2 = UserId("employee-2");
export const MANAGER = UserId("manager-1");
export const MANAGER_2 = UserId("manager-2");
export const ADMIN = UserId("admin-1");

export const TRAVEL = CategoryId("11111111-1111-1111-1111-111111111111");
export const MEALS = CategoryId("22222222-2222-2222-2222-222222222222");

const PROFILES: Array<[UserId, string, UserRole]> = [
  [EMPLOYEE, "Erin Employee", "employee"],
  [EMPLOYEE_2, "Eli Employee", "employee"],
  [MANAGER, "Morgan Manager", "manager"],
  [MANAGER_2, "Max Manager", "manager"],
  [ADMIN, "Alex Admin", "admin"],
];

export const users: UserProfile[] = PROFILES.map(([id, fullName, role]) => ({
  id,
  email: `${id}@example.com`,
  fullName,
  role,
  createdAt: NOW.toISOString(),
}));

/** Clock that advances one second per reading, starting at NOW */
export function steppingClock(start: Date = NOW): () => Date {
  let t = start.getTime();
  return () => {
    const current = new Date(t);
    t += 1000;
    return current;
  };
}

export async function seedUsers(storage: WorkflowStorage): Promise<void> {
  const uow = storage.unitOfWork();
  for (const user of users) {
    uow.saveUser(user);
  }
  await uow.commit();
}

export async function seedCategories(storage: WorkflowStorage): Promise<void> {
  await new CategoryService(storage, { clock: () => NOW }).seedDefaults();
}

export interface ExpenseHarness {
  storage: MemoryStorage;
  service: ExpenseService;
  dispatcher: DomainEventDispatcher;
  events: ExpenseDomainEvent[];
}

export async function createExpenseHarness(
  storage: MemoryStorage = new MemoryStorage()
): Promise<ExpenseHarness> {
  await seedUsers(storage);
  await seedCategories(storage);

  const events: ExpenseDomainEvent[] = [];
  const dispatcher = new DomainEventDispatcher();
  dispatcher.addListener(async (event) => {
    events.push(event);
  });

  const service = new ExpenseService(
    storage,
    new StorageIdentityDirectory(storage.users),
    dispatcher,
    { clock: steppingClock() }
  );
  return { storage, service, dispatcher, events };
}

export const RECEIPT_URL = "https://files.example.com/receipt-1.pdf";

export function expenseInput(
  overrides: Partial<CreateExpenseCommand> = {}
): CreateExpenseCommand {
  return {
    creatorId: EMPLOYEE,
    creatorRole: "employee",
    title: "Client dinner",
    description: "Dinner with the Acme team",
    amount: 80,
    expenseDate: "2024-06-10T00:00:00.000Z",
    ...overrides,
  };
}

let recordSeq = 0;

/** A persisted expense record, bypassing the entity rules */
export function expenseRecord(
  overrides: Partial<ExpenseRequestRecord> = {}
): ExpenseRequestRecord {
  recordSeq++;
  return {
    id: ExpenseId(`expense-${String(recordSeq).padStart(4, "0")}`),
    creatorId: EMPLOYEE,
    creatorRole: "employee",
    categoryId: null,
    title: `Expense ${recordSeq}`,
    description: "",
    amount: 10,
    expenseDate: "2024-06-10T00:00:00.000Z",
    status: "draft",
    createdAt: "2024-06-10T08:00:00.000Z",
    updatedAt: null,
    submittedAt: null,
    processedAt: null,
    processedBy: null,
    rejectionReason: null,
    attachmentUrls: [],
    ...overrides,
  };
}

export async function saveExpenses(
  storage: WorkflowStorage,
  records: ExpenseRequestRecord[]
): Promise<void> {
  const uow = storage.unitOfWork();
  for (const record of records) {
    uow.saveExpense(record);
  }
  await uow.commit();
}
