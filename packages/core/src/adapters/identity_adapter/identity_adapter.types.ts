import type { UserRecord, UserRole, StaffMemberRecord, AdminTier } from '../../record_types';
import type { EntityStore } from '../../entity_store';
import type { Logger } from '../../logger';
import type { Clock } from '../../utils/date_utils';
import type { UserProfile } from '../../record_factories';

/**
 * IdentityAdapter Interface - users, admin roles and the staff directory
 */
export interface IIdentityAdapter {
  // Users
  ensureUser(profile: UserProfile): Promise<UserRecord>;
  getUser(userId: string): Promise<UserRecord | null>;
  listUsers(query?: { role?: UserRole }): Promise<UserRecord[]>;

  // Admin roles
  ensureBootstrapAdmins(adminIds: string[]): Promise<UserRecord[]>;
  setAdmin(userId: string, makeAdmin: boolean): Promise<UserRecord>;
  isAdmin(userId: string): Promise<boolean>;

  // Staff directory
  importStaff(rows: unknown): Promise<StaffMemberRecord[]>;
  getStaff(assigneeId: string): Promise<StaffMemberRecord | null>;
  listStaff(): Promise<StaffMemberRecord[]>;
}

/**
 * IdentityAdapter Dependencies - Facade + Dependency Injection Pattern
 */
export interface IdentityAdapterDependencies {
  entityStore: EntityStore;
  clock?: Clock;
  logger?: Logger;
}

export type AdminEntry = {
  adminId: string;
  tier: AdminTier;
};

/**
 * Classifies admins into tiers. Every admin has exactly one tier;
 * a user who is not an admin has none.
 */
export interface AdminTierResolver {
  tierOf(adminId: string): Promise<AdminTier | null>;
  /** Every current admin with its tier, ordered by id */
  listAdmins(): Promise<AdminEntry[]>;
}
