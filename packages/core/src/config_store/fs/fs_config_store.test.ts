import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FsConfigStore, REMEDY_DIR } from './fs_config_store';
import { DetailedValidationError } from '../../errors';

describe('FsConfigStore', () => {
  let tempDir: string;
  let store: FsConfigStore;

  beforeEach(() => {
    tempDir = fs.realpathSync(fs.mkdtempSync(path.join(os.tmpdir(), 'fs-config-store-')));
    store = new FsConfigStore(tempDir);
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  describe('loadConfig / saveConfig', () => {
    it('should return null when config.json does not exist', async () => {
      expect(await store.loadConfig()).toBeNull();
    });

    it('should round-trip a saved config', async () => {
      await store.saveConfig({ projectName: 'demo', mainAdminIds: ['1'] });

      expect(await store.loadConfig()).toEqual({ projectName: 'demo', mainAdminIds: ['1'] });
      expect(fs.existsSync(path.join(tempDir, REMEDY_DIR, 'config.json'))).toBe(true);
    });

    it('should throw on malformed JSON', async () => {
      fs.mkdirSync(path.join(tempDir, REMEDY_DIR));
      fs.writeFileSync(path.join(tempDir, REMEDY_DIR, 'config.json'), '{ nope');

      await expect(store.loadConfig()).rejects.toThrow(SyntaxError);
    });

    it('should throw DetailedValidationError when the schema fails', async () => {
      fs.mkdirSync(path.join(tempDir, REMEDY_DIR));
      fs.writeFileSync(path.join(tempDir, REMEDY_DIR, 'config.json'), JSON.stringify({ mainAdminIds: [] }));

      await expect(store.loadConfig()).rejects.toThrow(DetailedValidationError);
    });
  });

  describe('project root detection', () => {
    it('should find the nearest ancestor holding .remedy', () => {
      fs.mkdirSync(path.join(tempDir, REMEDY_DIR));
      const nested = path.join(tempDir, 'a', 'b');
      fs.mkdirSync(nested, { recursive: true });

      expect(FsConfigStore.findRemedyRoot(nested)).toBe(tempDir);
      expect(FsConfigStore.getRemedyPath(nested)).toBe(path.join(tempDir, REMEDY_DIR));
    });

    it('should return null outside a project', () => {
      expect(FsConfigStore.findRemedyRoot(tempDir)).toBeNull();
      expect(() => FsConfigStore.getRemedyPath(tempDir)).toThrow('remedy init');
    });
  });
});
