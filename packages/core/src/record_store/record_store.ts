/**
 * RecordStore<V> - Generic interface for record persistence
 *
 * Abstracts CRUD operations without assuming storage backend.
 * Each implementation decides how to persist (fs, memory).
 *
 * @typeParam V - Value type (the record being stored)
 */
export interface RecordStore<V> {
  /**
   * Gets a record by ID
   * @returns The record or null if it doesn't exist
   */
  get(id: string): Promise<V | null>;

  /**
   * Persists a record, replacing any previous value under the same ID
   */
  put(id: string, value: V): Promise<void>;

  /**
   * Persists multiple records in a single operation.
   */
  putMany(entries: Array<{ id: string; value: V }>): Promise<void>;

  /**
   * Deletes a record. Deleting a missing ID is not an error.
   */
  delete(id: string): Promise<void>;

  /**
   * Lists all record IDs
   */
  list(): Promise<string[]>;

  exists(id: string): Promise<boolean>;
}
