export { IdentityAdapter } from './identity_adapter';
export { ConfigAdminTierResolver, staticMainAdminIds } from './admin_tier_resolver';
export type { MainAdminIdsProvider, ConfigAdminTierResolverDependencies } from './admin_tier_resolver';
export type {
  IIdentityAdapter,
  IdentityAdapterDependencies,
  AdminTierResolver,
  AdminEntry,
} from './identity_adapter.types';
