import { IdentityAdapter } from './identity_adapter';
import { ConfigAdminTierResolver, staticMainAdminIds } from './admin_tier_resolver';
import { EntityStore } from '../../entity_store';
import { createMemoryRecordStores } from '../../record_store/memory';
import { createFsRecordStores } from '../../record_store/fs';
import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { DetailedValidationError, RecordNotFoundError } from '../../errors';

describe('IdentityAdapter', () => {
  const now = new Date('2025-03-01T10:00:00.000Z');
  let entityStore: EntityStore;
  let adapter: IdentityAdapter;

  beforeEach(() => {
    entityStore = new EntityStore(createMemoryRecordStores());
    adapter = new IdentityAdapter({ entityStore, clock: () => now });
  });

  describe('ensureUser', () => {
    it('should create an unknown user with role user', async () => {
      const user = await adapter.ensureUser({ id: '100', username: 'ivan' });

      expect(user).toEqual({
        id: '100',
        role: 'user',
        username: 'ivan',
        createdAt: '2025-03-01T10:00:00.000Z',
      });
    });

    it('should refresh changed profile fields and keep the role', async () => {
      await adapter.setAdmin('100', true);

      const user = await adapter.ensureUser({ id: '100', firstName: 'Ivan' });

      expect(user.role).toBe('admin');
      expect(user.firstName).toBe('Ivan');
    });

    it('should reject ids outside the allowed alphabet', async () => {
      await expect(adapter.ensureUser({ id: 'bad id' })).rejects.toThrow(DetailedValidationError);
    });
  });

  describe('admin roles', () => {
    it('should create missing bootstrap admins and promote existing users', async () => {
      await adapter.ensureUser({ id: '1' });

      const admins = await adapter.ensureBootstrapAdmins(['1', '2']);

      expect(admins.map(a => [a.id, a.role])).toEqual([['1', 'admin'], ['2', 'admin']]);
      expect(await adapter.isAdmin('1')).toBe(true);
    });

    it('should demote an admin', async () => {
      await adapter.setAdmin('5', true);

      const user = await adapter.setAdmin('5', false);

      expect(user.role).toBe('user');
      expect(await adapter.isAdmin('5')).toBe(false);
    });

    it('should fail to demote an unknown user', async () => {
      await expect(adapter.setAdmin('404', false)).rejects.toThrow(RecordNotFoundError);
    });

    it('should reject unsafe ids before touching the store', async () => {
      await expect(adapter.setAdmin('a/b', true)).rejects.toThrow(DetailedValidationError);
      await expect(adapter.ensureBootstrapAdmins(['x..y'])).rejects.toThrow(DetailedValidationError);
      expect(await entityStore.findUsers()).toEqual([]);
    });
  });

  describe('staff directory', () => {
    it('should upsert rows by assignee', async () => {
      await adapter.importStaff([{ assignee: '100', post: 'Engineer', fio: 'Ivanov I.' }]);
      await adapter.importStaff([{ assignee: '100', post: 'Lead' }]);

      expect(await adapter.getStaff('100')).toEqual({
        id: 'staff-100',
        assigneeId: '100',
        post: 'Lead',
        fio: null,
      });
    });

    it('should reject malformed rows without writing', async () => {
      await expect(adapter.importStaff([{ assignee: '100' }, { post: 'x' }]))
        .rejects.toThrow(DetailedValidationError);
      expect(await adapter.listStaff()).toEqual([]);
    });
  });
});

describe('ConfigAdminTierResolver', () => {
  let entityStore: EntityStore;
  let identity: IdentityAdapter;

  beforeEach(() => {
    entityStore = new EntityStore(createMemoryRecordStores());
    identity = new IdentityAdapter({ entityStore });
  });

  it('should classify configured admins as main and the rest as regular', async () => {
    await identity.ensureBootstrapAdmins(['a1', 'a2', 'm1']);
    await identity.ensureUser({ id: 'u1' });
    const resolver = new ConfigAdminTierResolver({
      entityStore,
      mainAdminIds: staticMainAdminIds(['m1', 'u1']),
    });

    expect(await resolver.tierOf('m1')).toBe('main');
    expect(await resolver.tierOf('a1')).toBe('regular');
    expect(await resolver.tierOf('u1')).toBeNull();
    expect(await resolver.tierOf('nobody')).toBeNull();
    expect(await resolver.listAdmins()).toEqual([
      { adminId: 'a1', tier: 'regular' },
      { adminId: 'a2', tier: 'regular' },
      { adminId: 'm1', tier: 'main' },
    ]);
  });

  it('should read main admin ids on every call', async () => {
    await identity.ensureBootstrapAdmins(['a1']);
    let mainIds: string[] = [];
    const resolver = new ConfigAdminTierResolver({ entityStore, mainAdminIds: async () => mainIds });

    expect(await resolver.tierOf('a1')).toBe('regular');
    mainIds = ['a1'];
    expect(await resolver.tierOf('a1')).toBe('main');
  });

  describe('over the filesystem store', () => {
    let tempDir: string;

    beforeEach(async () => {
      tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'tier-resolver-test-'));
    });

    afterEach(async () => {
      await fs.rm(tempDir, { recursive: true, force: true });
    });

    it('should give no tier to ids that cannot name a user file', async () => {
      const fsStore = new EntityStore(createFsRecordStores(tempDir));
      await new IdentityAdapter({ entityStore: fsStore }).ensureBootstrapAdmins(['a1']);
      const resolver = new ConfigAdminTierResolver({ entityStore: fsStore, mainAdminIds: staticMainAdminIds([]) });

      expect(await resolver.tierOf('a1')).toBe('regular');
      expect(await resolver.tierOf('a/b')).toBeNull();
      expect(await resolver.tierOf('..')).toBeNull();
    });
  });
});
