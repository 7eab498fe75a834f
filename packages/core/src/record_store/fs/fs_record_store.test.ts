import * as fs from 'fs/promises';
import * as path from 'path';
import * as os from 'os';
import { FsRecordStore, createFsRecordStores, isNotFound } from './fs_record_store';

interface TestRecord {
  id: string;
  name: string;
  data?: { nested: string };
}

describe('FsRecordStore', () => {
  let store: FsRecordStore<TestRecord>;
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'fs-store-test-'));
    store = new FsRecordStore<TestRecord>({ basePath: tempDir });
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  describe('Core Store Operations', () => {
    it('should return stored record when ID exists', async () => {
      const record: TestRecord = { id: 'test-1', name: 'Test Record' };
      await store.put('test-1', record);

      expect(await store.get('test-1')).toEqual(record);
    });

    it('should return null when ID does not exist', async () => {
      expect(await store.get('non-existent')).toBeNull();
    });

    it('should overwrite existing value', async () => {
      await store.put('test-1', { id: 'test-1', name: 'Original' });
      await store.put('test-1', { id: 'test-1', name: 'Updated' });

      expect(await store.get('test-1')).toEqual({ id: 'test-1', name: 'Updated' });
    });

    it('should persist every entry passed to putMany', async () => {
      await store.putMany([
        { id: 'a', value: { id: 'a', name: 'A' } },
        { id: 'b', value: { id: 'b', name: 'B' } },
      ]);

      expect((await store.list()).sort()).toEqual(['a', 'b']);
    });

    it('should delete existing record', async () => {
      await store.put('test-1', { id: 'test-1', name: 'Test Record' });

      await store.delete('test-1');

      expect(await store.exists('test-1')).toBe(false);
    });

    it('should complete without error for non-existing ID', async () => {
      await expect(store.delete('non-existent')).resolves.toBeUndefined();
    });

    it('should return empty array when the directory is missing', async () => {
      const missing = new FsRecordStore<TestRecord>({ basePath: path.join(tempDir, 'nope') });

      expect(await missing.list()).toEqual([]);
    });
  });

  describe('Filesystem Behavior', () => {
    it('should create directory if missing', async () => {
      const nestedDir = path.join(tempDir, 'nested', 'deep');
      const nestedStore = new FsRecordStore<TestRecord>({ basePath: nestedDir });

      await nestedStore.put('test-1', { id: 'test-1', name: 'Test' });

      const exists = await fs.access(nestedDir).then(() => true).catch(() => false);
      expect(exists).toBe(true);
    });

    it('should write file at basePath/id.json and leave no temp file', async () => {
      const record: TestRecord = { id: 'test-1', name: 'Test Record' };

      await store.put('test-1', record);

      const content = await fs.readFile(path.join(tempDir, 'test-1.json'), 'utf-8');
      expect(JSON.parse(content)).toEqual(record);
      expect(await fs.readdir(tempDir)).toEqual(['test-1.json']);
    });

    it('should throw on invalid JSON', async () => {
      await fs.writeFile(path.join(tempDir, 'test-1.json'), 'not valid json {{{', 'utf-8');

      await expect(store.get('test-1')).rejects.toThrow();
    });

    it('should derive IDs from json files only', async () => {
      await fs.writeFile(path.join(tempDir, 'record-1.json'), '{}', 'utf-8');
      await fs.writeFile(path.join(tempDir, 'record-2.json'), '{}', 'utf-8');
      await fs.writeFile(path.join(tempDir, 'not-json.txt'), 'text', 'utf-8');

      const ids = await store.list();

      expect(ids.sort()).toEqual(['record-1', 'record-2']);
    });

    it('should not create directory when createIfMissing is false', async () => {
      const noCreateStore = new FsRecordStore<TestRecord>({
        basePath: path.join(tempDir, 'no-create', 'deep'),
        createIfMissing: false,
      });

      await expect(
        noCreateStore.put('test-1', { id: 'test-1', name: 'Test' })
      ).rejects.toThrow();
    });

    it('should support custom extension', async () => {
      const customStore = new FsRecordStore<TestRecord>({
        basePath: tempDir,
        extension: '.data',
      });

      await customStore.put('test-1', { id: 'test-1', name: 'Test' });

      expect(await customStore.list()).toEqual(['test-1']);
      const exists = await fs.access(path.join(tempDir, 'test-1.data')).then(() => true).catch(() => false);
      expect(exists).toBe(true);
    });
  });

  describe('Security', () => {
    it('should reject IDs with path traversal (..)', async () => {
      await expect(store.get('../etc/passwd')).rejects.toThrow(/cannot contain/);
      await expect(store.put('../etc/passwd', { id: 'x', name: 'x' })).rejects.toThrow(/cannot contain/);
      await expect(store.delete('../etc/passwd')).rejects.toThrow(/cannot contain/);
    });

    it('should reject IDs with slashes', async () => {
      await expect(store.get('foo/bar')).rejects.toThrow(/cannot contain/);
      await expect(store.get('foo\\bar')).rejects.toThrow(/cannot contain/);
    });

    it('should allow IDs with single dot', async () => {
      await store.put('list.a', { id: 'list.a', name: 'A' });

      expect(await store.get('list.a')).toEqual({ id: 'list.a', name: 'A' });
    });
  });

  describe('isNotFound', () => {
    it('should match ENOENT by code alone, whatever the error prototype', () => {
      expect(isNotFound({ code: 'ENOENT', message: 'gone' })).toBe(true);
      expect(isNotFound(Object.assign(new Error('gone'), { code: 'ENOENT' }))).toBe(true);
      expect(isNotFound({ code: 'EACCES' })).toBe(false);
      expect(isNotFound('ENOENT')).toBe(false);
      expect(isNotFound(null)).toBe(false);
    });
  });

  describe('createFsRecordStores', () => {
    it('should place each collection in its own directory', async () => {
      const stores = createFsRecordStores(tempDir);

      await stores.users.put('42', { id: '42', role: 'user', createdAt: '2025-01-01T00:00:00.000Z' });

      const content = await fs.readFile(path.join(tempDir, 'users', '42.json'), 'utf-8');
      expect(JSON.parse(content)).toEqual({ id: '42', role: 'user', createdAt: '2025-01-01T00:00:00.000Z' });
    });
  });
});
