import * as fs from 'fs/promises';
import * as path from 'path';
import type { RecordStore } from '../record_store';
import type { RecordStores } from '../record_store.types';

/**
 * Serializer for FsRecordStore - allows custom serialization
 */
export interface Serializer {
  stringify: (value: unknown) => string;
  parse: <T>(text: string) => T;
}

/**
 * Options for FsRecordStore
 */
export interface FsRecordStoreOptions {
  /** Base directory for files */
  basePath: string;

  /** File extension (default: ".json") */
  extension?: string;

  /** Custom serializer (default: JSON with indent 2) */
  serializer?: Serializer;

  /** Create directory if it doesn't exist (default: true) */
  createIfMissing?: boolean;
}

const DEFAULT_SERIALIZER: Serializer = {
  stringify: (value) => JSON.stringify(value, null, 2),
  parse: (text) => JSON.parse(text),
};

// fs errors may come from another realm (jest), so only `code` is checked
export function isNotFound(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Validates that an ID does not contain path traversal.
 * Blocks: `..`, `/`, `\`
 * Allows: single `.` (e.g., "list.a")
 */
function validateId(id: string): void {
  if (!id || typeof id !== 'string') {
    throw new Error('ID must be a non-empty string');
  }
  if (id.includes('..') || /[\/\\]/.test(id)) {
    throw new Error(`Invalid ID: "${id}". IDs cannot contain /, \\, or ..`);
  }
}

/**
 * FsRecordStore<T> - Filesystem implementation of RecordStore<T>
 *
 * Persists records as JSON files on disk, one file per record.
 *
 * @example
 * const store = new FsRecordStore<ProblemRecord>({
 *   basePath: '.remedy/problems',
 * });
 *
 * await store.put('1700000000000-list-a-problem-1', problem);
 */
export class FsRecordStore<T> implements RecordStore<T> {
  private readonly basePath: string;
  private readonly extension: string;
  private readonly serializer: Serializer;
  private readonly createIfMissing: boolean;

  constructor(options: FsRecordStoreOptions) {
    this.basePath = options.basePath;
    this.extension = options.extension ?? '.json';
    this.serializer = options.serializer ?? DEFAULT_SERIALIZER;
    this.createIfMissing = options.createIfMissing ?? true;
  }

  private getFilePath(id: string): string {
    validateId(id);
    return path.join(this.basePath, `${id}${this.extension}`);
  }

  async get(id: string): Promise<T | null> {
    const filePath = this.getFilePath(id);
    try {
      const content = await fs.readFile(filePath, 'utf-8');
      return this.serializer.parse<T>(content);
    } catch (error) {
      if (isNotFound(error)) {
        return null;
      }
      throw error;
    }
  }

  async put(id: string, value: T): Promise<void> {
    const filePath = this.getFilePath(id);
    if (this.createIfMissing) {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
    }
    const content = this.serializer.stringify(value);
    // atomic replace via rename
    const tmpPath = `${filePath}.tmp`;
    await fs.writeFile(tmpPath, content, 'utf-8');
    await fs.rename(tmpPath, filePath);
  }

  async putMany(entries: Array<{ id: string; value: T }>): Promise<void> {
    for (const { id, value } of entries) {
      await this.put(id, value);
    }
  }

  async delete(id: string): Promise<void> {
    const filePath = this.getFilePath(id);
    try {
      await fs.unlink(filePath);
    } catch (error) {
      if (!isNotFound(error)) {
        throw error;
      }
    }
  }

  async list(): Promise<string[]> {
    try {
      const files = await fs.readdir(this.basePath);
      return files
        .filter((f) => f.endsWith(this.extension))
        .map((f) => f.slice(0, -this.extension.length));
    } catch (error) {
      if (isNotFound(error)) {
        return [];
      }
      throw error;
    }
  }

  async exists(id: string): Promise<boolean> {
    const filePath = this.getFilePath(id);
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }
}

/**
 * Builds one FsRecordStore per collection under `<root>/<collection>/`.
 */
export function createFsRecordStores(root: string): RecordStores {
  const at = (collection: string) => ({ basePath: path.join(root, collection) });
  return {
    users: new FsRecordStore(at('users')),
    lists: new FsRecordStore(at('lists')),
    problems: new FsRecordStore(at('problems')),
    reports: new FsRecordStore(at('reports')),
    reviews: new FsRecordStore(at('reviews')),
    media: new FsRecordStore(at('media')),
    acts: new FsRecordStore(at('acts')),
    staff: new FsRecordStore(at('staff')),
  };
}
