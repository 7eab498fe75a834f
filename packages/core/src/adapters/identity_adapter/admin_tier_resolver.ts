import type { AdminTier } from '../../record_types';
import type { EntityStore } from '../../entity_store';
import type { AdminEntry, AdminTierResolver } from './identity_adapter.types';

import { isValidExternalId } from '../../utils/id_generator';

/**
 * Source of the configured main-tier admin ids, read on every call so a
 * config change takes effect without a restart.
 */
export type MainAdminIdsProvider = () => Promise<string[]>;

export type ConfigAdminTierResolverDependencies = {
  entityStore: EntityStore;
  mainAdminIds: MainAdminIdsProvider;
};

/**
 * Admins are users with role `admin`. Those listed in the configured main
 * admin ids are `main`; the rest are `regular`. Tier is never stored on
 * the user record.
 */
export class ConfigAdminTierResolver implements AdminTierResolver {
  private entityStore: EntityStore;
  private mainAdminIds: MainAdminIdsProvider;

  constructor(dependencies: ConfigAdminTierResolverDependencies) {
    this.entityStore = dependencies.entityStore;
    this.mainAdminIds = dependencies.mainAdminIds;
  }

  async tierOf(adminId: string): Promise<AdminTier | null> {
    // no user can hold an id outside the external id alphabet
    if (!isValidExternalId(adminId)) {
      return null;
    }
    const user = await this.entityStore.getUser(adminId);
    if (!user || user.role !== 'admin') {
      return null;
    }
    const mainIds = await this.mainAdminIds();
    return mainIds.includes(adminId) ? 'main' : 'regular';
  }

  async listAdmins(): Promise<AdminEntry[]> {
    const admins = await this.entityStore.findUsers({ role: 'admin' });
    const mainIds = await this.mainAdminIds();
    return admins.map(admin => ({
      adminId: admin.id,
      tier: mainIds.includes(admin.id) ? 'main' : 'regular',
    }));
  }
}

/**
 * Provider for a fixed set of main admin ids.
 */
export function staticMainAdminIds(ids: string[]): MainAdminIdsProvider {
  const snapshot = [...ids];
  return async () => snapshot;
}
