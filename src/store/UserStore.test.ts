/**
 * Tests for the SQLite user store.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdir, rm, writeFile, stat } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';
import Database from 'better-sqlite3';

import { createUserStore, SqliteUserStore } from './SqliteUserStore.js';
import { StorageClosedError, StorageUnavailableError } from './errors.js';
import type { UserRecord } from '../types/UserRecord.js';

const ana: UserRecord = {
  name: 'Ana Lopez',
  email: 'ana@example.com',
  birthDate: '1990-05-12',
  address: 'Calle 1, City',
  password: 'secret1',
};

function user(name: string): UserRecord {
  return { ...ana, name, email: `${name.toLowerCase()}@example.com` };
}

describe('SqliteUserStore', () => {
  let testDir: string;
  let dbPath: string;
  let store: SqliteUserStore;

  beforeEach(async () => {
    testDir = join(tmpdir(), `user-store-test-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
    dbPath = join(testDir, 'users.db');
    store = createUserStore({ databasePath: dbPath });
  });

  afterEach(async () => {
    await store.close();
    await rm(testDir, { recursive: true, force: true });
  });

  describe('open', () => {
    it('creates the database file and users table', async () => {
      await store.open();

      expect(store.isOpen).toBe(true);
      const info = await stat(dbPath);
      expect(info.isFile()).toBe(true);
      expect(await store.fetchAll()).toEqual([]);
    });

    it('creates missing parent directories', async () => {
      const nested = createUserStore({ databasePath: join(testDir, 'a', 'b', 'users.db') });
      await nested.open();

      expect(await nested.fetchAll()).toEqual([]);
      await nested.close();
    });

    it('is idempotent', async () => {
      await store.open();
      await store.insert(ana);
      await store.open();

      const records = await store.fetchAll();
      expect(records).toHaveLength(1);
      expect(records[0]?.name).toBe('Ana Lopez');
    });

    it('keeps existing rows when reopening an existing file', async () => {
      await store.open();
      await store.insert(ana);
      await store.close();

      const reopened = createUserStore({ databasePath: dbPath });
      await reopened.open();
      const records = await reopened.fetchAll();
      await reopened.close();

      expect(records).toHaveLength(1);
      expect(records[0]?.email).toBe('ana@example.com');
    });

    it('stamps the schema version on first creation', async () => {
      await store.open();
      await store.close();

      const raw = new Database(dbPath);
      const version = raw.pragma('user_version', { simple: true });
      raw.close();

      expect(version).toBe(1);
    });

    it('fails with StorageUnavailable when the location is not a directory', async () => {
      const blocker = join(testDir, 'not-a-dir');
      await writeFile(blocker, 'x');
      const broken = createUserStore({ databasePath: join(blocker, 'users.db') });

      await expect(broken.open()).rejects.toBeInstanceOf(StorageUnavailableError);
      expect(broken.isOpen).toBe(false);
    });

    it('defaults to data/users.db', () => {
      expect(new SqliteUserStore().path).toBe('data/users.db');
    });
  });

  describe('insert and fetchAll', () => {
    beforeEach(async () => {
      await store.open();
    });

    it('returns the inserted record with an assigned id', async () => {
      const id = await store.insert(ana);
      const records = await store.fetchAll();

      expect(records).toEqual([{ id, ...ana }]);
      expect(id).toBeGreaterThan(0);
    });

    it('assigns distinct ids', async () => {
      const first = await store.insert(user('Bea'));
      const second = await store.insert(user('Carl'));

      expect(second).not.toBe(first);
    });

    it('allows duplicate name and email', async () => {
      await store.insert(ana);
      await store.insert(ana);

      const records = await store.fetchAll();
      expect(records).toHaveLength(2);
      expect(records[0]?.id).not.toBe(records[1]?.id);
    });

    it('lists records in insertion order', async () => {
      await store.insert(user('Alpha'));
      await store.insert(user('Bravo'));
      await store.insert(user('Charlie'));

      const names = (await store.fetchAll()).map(r => r.name);
      expect(names).toEqual(['Alpha', 'Bravo', 'Charlie']);
    });

    it('returns a snapshot unaffected by later writes', async () => {
      await store.insert(user('Alpha'));
      const snapshot = await store.fetchAll();
      await store.insert(user('Bravo'));

      expect(snapshot).toHaveLength(1);
      expect(await store.fetchAll()).toHaveLength(2);
    });

    it('ignores an id on the input record', async () => {
      const id = await store.insert({ ...ana, id: 999 });
      expect(id).toBe(1);
    });
  });

  describe('close', () => {
    it('rejects insert after close without writing', async () => {
      await store.open();
      await store.insert(ana);
      await store.close();

      await expect(store.insert(user('Late'))).rejects.toBeInstanceOf(StorageClosedError);

      await store.open();
      expect(await store.fetchAll()).toHaveLength(1);
    });

    it('rejects fetchAll after close', async () => {
      await store.open();
      await store.close();

      await expect(store.fetchAll()).rejects.toBeInstanceOf(StorageClosedError);
    });

    it('rejects operations on a store that was never opened', async () => {
      await expect(store.insert(ana)).rejects.toThrow('Cannot insert: store is closed');
    });

    it('is a no-op when already closed', async () => {
      await store.close();
      expect(store.isOpen).toBe(false);
    });
  });
});
