/**
 * Types for the user Record Store.
 *
 * The store owns a single `users` table in a local database file.
 * Records are append-only: there is no update or delete.
 */

import type { UserRecord, StoredUserRecord } from '../types/UserRecord.js';

/**
 * UserStore interface.
 *
 * `insert` and `fetchAll` fail with `StorageClosedError` unless the
 * store has been opened and not closed since.
 */
export interface UserStore {
  /**
   * Open the backing database. Idempotent.
   */
  open(): Promise<void>;

  /**
   * Append a record and return its assigned id.
   */
  insert(record: UserRecord): Promise<number>;

  /**
   * Snapshot of every stored record, in storage order.
   */
  fetchAll(): Promise<StoredUserRecord[]>;

  /**
   * Release the connection.
   */
  close(): Promise<void>;

  /** Whether the store currently holds an open connection */
  readonly isOpen: boolean;

  /** Location of the database file */
  readonly path: string;
}

/**
 * Configuration for UserStore.
 */
export interface UserStoreConfig {
  /** Database file path (default: 'data/users.db') */
  databasePath?: string;
}
