import type { UserRecord, UserRole, StaffMemberRecord } from '../../record_types';
import type { EntityStore } from '../../entity_store';
import type { Logger } from '../../logger';
import type { IIdentityAdapter, IdentityAdapterDependencies } from './identity_adapter.types';
import type { UserProfile } from '../../record_factories';

import { assertExternalId, createUserRecord, createStaffMemberRecord } from '../../record_factories';
import { assertStaffImportRows } from '../../validation';
import { ConflictError, RecordNotFoundError } from '../../errors';
import { createLogger } from '../../logger';
import { systemClock } from '../../utils/date_utils';
import type { Clock } from '../../utils/date_utils';

type ProfileFields = Pick<UserRecord, 'username' | 'firstName' | 'lastName'>;

function changedProfileFields(user: UserRecord, profile: UserProfile): Partial<ProfileFields> {
  const patch: Partial<ProfileFields> = {};
  if (profile.username !== undefined && profile.username !== user.username) {
    patch.username = profile.username;
  }
  if (profile.firstName !== undefined && profile.firstName !== user.firstName) {
    patch.firstName = profile.firstName;
  }
  if (profile.lastName !== undefined && profile.lastName !== user.lastName) {
    patch.lastName = profile.lastName;
  }
  return patch;
}

/**
 * IdentityAdapter - users, roles and the staff directory.
 *
 * Users are created lazily the first time they interact. Admins are
 * either configured bootstrap ids or promoted explicitly; tier is left
 * to the AdminTierResolver.
 */
export class IdentityAdapter implements IIdentityAdapter {
  private entityStore: EntityStore;
  private clock: Clock;
  private logger: Logger;

  constructor(dependencies: IdentityAdapterDependencies) {
    this.entityStore = dependencies.entityStore;
    this.clock = dependencies.clock ?? systemClock;
    this.logger = dependencies.logger ?? createLogger('[Identity] ');
  }

  /**
   * Get-or-create. Profile fields that changed are refreshed; role is kept.
   */
  async ensureUser(profile: UserProfile): Promise<UserRecord> {
    assertExternalId('UserRecord', 'id', profile.id);
    const existing = await this.entityStore.getUser(profile.id);
    if (existing) {
      const patch = changedProfileFields(existing, profile);
      if (Object.keys(patch).length === 0) {
        return existing;
      }
      return this.entityStore.updateUser(existing.id, patch);
    }

    return this.insertUser(profile, 'user');
  }

  async getUser(userId: string): Promise<UserRecord | null> {
    return this.entityStore.getUser(userId);
  }

  async listUsers(query: { role?: UserRole } = {}): Promise<UserRecord[]> {
    return this.entityStore.findUsers(query);
  }

  async ensureBootstrapAdmins(adminIds: string[]): Promise<UserRecord[]> {
    const admins: UserRecord[] = [];
    for (const adminId of adminIds) {
      assertExternalId('UserRecord', 'id', adminId);
      const existing = await this.entityStore.getUser(adminId);
      if (!existing) {
        admins.push(await this.insertUser({ id: adminId }, 'admin'));
        this.logger.info(`bootstrap admin ${adminId} created`);
      } else if (existing.role !== 'admin') {
        admins.push(await this.entityStore.updateUser(adminId, { role: 'admin' }));
        this.logger.info(`bootstrap admin ${adminId} promoted`);
      } else {
        admins.push(existing);
      }
    }
    return admins;
  }

  /**
   * Grants or revokes the admin role. Granting to an unknown id creates the user.
   */
  async setAdmin(userId: string, makeAdmin: boolean): Promise<UserRecord> {
    assertExternalId('UserRecord', 'id', userId);
    const role: UserRole = makeAdmin ? 'admin' : 'user';
    const existing = await this.entityStore.getUser(userId);

    if (!existing) {
      if (!makeAdmin) {
        throw new RecordNotFoundError('User', userId);
      }
      return this.insertUser({ id: userId }, 'admin');
    }

    if (existing.role === role) {
      return existing;
    }
    return this.entityStore.updateUser(userId, { role });
  }

  async isAdmin(userId: string): Promise<boolean> {
    const user = await this.entityStore.getUser(userId);
    return user?.role === 'admin';
  }

  /**
   * Validates staff rows and upserts them by assignee id.
   */
  async importStaff(rows: unknown): Promise<StaffMemberRecord[]> {
    assertStaffImportRows(rows);

    const members = rows.map(row => createStaffMemberRecord(row));
    const stored: StaffMemberRecord[] = [];
    for (const member of members) {
      stored.push(await this.entityStore.upsertStaff(member));
    }

    this.logger.info(`imported ${stored.length} staff rows`);
    return stored;
  }

  async getStaff(assigneeId: string): Promise<StaffMemberRecord | null> {
    return this.entityStore.findStaff(assigneeId);
  }

  async listStaff(): Promise<StaffMemberRecord[]> {
    return this.entityStore.listStaff();
  }

  private async insertUser(profile: UserProfile, role: UserRole): Promise<UserRecord> {
    const record = createUserRecord(profile, role, this.clock());
    try {
      return await this.entityStore.insertUser(record);
    } catch (error) {
      // created concurrently by another caller
      if (error instanceof ConflictError) {
        const current = await this.entityStore.getUser(profile.id);
        if (current) return current;
      }
      throw error;
    }
  }
}
