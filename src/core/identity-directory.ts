/**
 * IdentityDirectory: resolves roles and display names for user ids.
 */

import type { UserRole } from "../types/expense-contract.js";
import type { UserId } from "../types/branded.js";
import type { UserRepository } from "../storage/storage-interface.js";

export interface IdentityDirectory {
  /** Role of the user, or null when the user is unknown */
  roleOf(userId: UserId): Promise<UserRole | null>;
  /** Full name of the user, or null when the user is unknown */
  displayNameOf(userId: UserId): Promise<string | null>;
}

/**
 * Directory backed by the users table of a WorkflowStorage.
 */
export class StorageIdentityDirectory implements IdentityDirectory {
  constructor(private users: UserRepository) {}

  async roleOf(userId: UserId): Promise<UserRole | null> {
    const user = await this.users.get(userId);
    return user?.role ?? null;
  }

  async displayNameOf(userId: UserId): Promise<string | null> {
    const user = await this.users.get(userId);
    return user?.fullName ?? null;
  }
}
