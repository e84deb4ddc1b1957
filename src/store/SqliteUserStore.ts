/**
 * SqliteUserStore — UserStore backed by a single SQLite file.
 *
 * The schema is created only when the file is first created, tracked
 * through SQLite's `user_version` pragma. better-sqlite3 is synchronous
 * and serialises access itself; methods are async to match UserStore.
 */

import Database from 'better-sqlite3';
import { mkdirSync } from 'node:fs';
import { dirname, resolve } from 'node:path';
import type { UserStore, UserStoreConfig } from './types.js';
import type { UserRecord, StoredUserRecord } from '../types/UserRecord.js';
import { StorageClosedError, StorageUnavailableError } from './errors.js';
import { fromRow, toRow } from '../types/UserRecord.js';

/**
 * Default configuration.
 */
const DEFAULT_CONFIG: Required<UserStoreConfig> = {
  databasePath: 'data/users.db',
};

/**
 * Schema version written on first creation.
 */
const SCHEMA_VERSION = 1;

const CREATE_USERS_TABLE = `
  CREATE TABLE users (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    name TEXT NOT NULL,
    email TEXT NOT NULL,
    birthDate TEXT NOT NULL,
    address TEXT NOT NULL,
    password TEXT NOT NULL
  )
`;

const INSERT_USER = `
  INSERT INTO users (name, email, birthDate, address, password)
  VALUES (@name, @email, @birthDate, @address, @password)
`;

const SELECT_USERS = 'SELECT id, name, email, birthDate, address, password FROM users';

export class SqliteUserStore implements UserStore {
  private readonly config: Required<UserStoreConfig>;
  private db: Database.Database | null = null;

  constructor(config: UserStoreConfig = {}) {
    this.config = { ...DEFAULT_CONFIG, ...config };
  }

  get isOpen(): boolean {
    return this.db !== null;
  }

  get path(): string {
    return this.config.databasePath;
  }

  async open(): Promise<void> {
    if (this.db) {
      return;
    }

    const filePath = this.config.databasePath;
    let db: Database.Database | undefined;
    try {
      if (filePath !== ':memory:') {
        mkdirSync(dirname(resolve(filePath)), { recursive: true });
      }
      db = new Database(filePath);
      this.createSchema(db);
    } catch (err) {
      db?.close();
      throw new StorageUnavailableError(filePath, err);
    }

    this.db = db;
  }

  /**
   * Define the table on a freshly created database only.
   */
  private createSchema(db: Database.Database): void {
    const version = db.pragma('user_version', { simple: true });
    if (version !== 0) {
      return;
    }

    db.transaction(() => {
      db.exec(CREATE_USERS_TABLE);
      db.pragma(`user_version = ${SCHEMA_VERSION}`);
    })();
  }

  private connection(operation: string): Database.Database {
    if (!this.db) {
      throw new StorageClosedError(operation);
    }
    return this.db;
  }

  async insert(record: UserRecord): Promise<number> {
    const db = this.connection('insert');
    const result = db.prepare(INSERT_USER).run(toRow(record));
    return Number(result.lastInsertRowid);
  }

  async fetchAll(): Promise<StoredUserRecord[]> {
    const db = this.connection('fetchAll');
    const rows: unknown[] = db.prepare(SELECT_USERS).all();
    return rows.map(fromRow);
  }

  async close(): Promise<void> {
    if (!this.db) {
      return;
    }
    const db = this.db;
    this.db = null;
    db.close();
  }
}

/**
 * Create a new SqliteUserStore instance. The store is not opened.
 */
export function createUserStore(config: UserStoreConfig = {}): SqliteUserStore {
  return new SqliteUserStore(config);
}
