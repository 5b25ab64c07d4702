/**
 * Demo data for development: one user per role and the default
 * expense categories.
 */

import type { UserProfile } from '../types/expense-contract.js';
import { UserId } from '../types/branded.js';
import type { CategoryService } from '../core/category-service.js';
import type { WorkflowStorage } from './storage-interface.js';

export const DEMO_USERS: readonly Omit<UserProfile, 'createdAt'>[] = [
  {
    id: UserId('00000000-0000-4000-8000-000000000001'),
    email: 'employee@example.com',
    fullName: 'Test Employee',
    role: 'employee',
  },
  {
    id: UserId('00000000-0000-4000-8000-000000000002'),
    email: 'manager@example.com',
    fullName: 'Test Manager',
    role: 'manager',
  },
  {
    id: UserId('00000000-0000-4000-8000-000000000003'),
    email: 'admin@example.com',
    fullName: 'Test Admin',
    role: 'admin',
  },
];

/**
 * Insert missing demo users and default categories. Existing rows are
 * left untouched, so seeding is safe to repeat.
 *
 * @returns the number of users and categories added
 */
export async function seedDemoData(
  storage: WorkflowStorage,
  categories: CategoryService,
  now: Date = new Date()
): Promise<{ users: number; categories: number }> {
  const uow = storage.unitOfWork();
  let users = 0;
  for (const user of DEMO_USERS) {
    if (await storage.users.get(user.id)) continue;
    uow.saveUser({ ...user, createdAt: now.toISOString() });
    users++;
  }
  await uow.commit();

  return { users, categories: await categories.seedDefaults() };
}
