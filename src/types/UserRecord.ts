/**
 * UserRecord — the single persisted entity.
 *
 * `id` is assigned by the store on insert. A record without an `id` has
 * never been persisted; once assigned, the id never changes.
 */

/**
 * The five user-entered fields, in form order.
 */
export const USER_FIELDS = ['name', 'email', 'birthDate', 'address', 'password'] as const;

export type UserField = (typeof USER_FIELDS)[number];

/**
 * Raw form values. Every field is a string (possibly empty).
 */
export type UserFormValues = Record<UserField, string>;

/**
 * A user record as stored in the `users` table.
 */
export interface UserRecord extends UserFormValues {
  /** Store-assigned identity; absent before insert */
  id?: number;
}

/**
 * A record that has been persisted.
 */
export type StoredUserRecord = UserRecord & { id: number };

/**
 * The columns shown in the listing table. The password is never listed.
 */
export interface UserListRow {
  id: number;
  name: string;
  email: string;
  birthDate: string;
}

/**
 * Row shape written to the `users` table (no id; SQLite assigns it).
 */
export type UserInsertRow = UserFormValues;

/**
 * Create empty form values.
 */
export function emptyFormValues(): UserFormValues {
  return {
    name: '',
    email: '',
    birthDate: '',
    address: '',
    password: '',
  };
}

/**
 * Build an unsaved record from form values. Any `id` is dropped.
 */
export function createUserRecord(values: UserFormValues): UserRecord {
  return {
    name: values.name,
    email: values.email,
    birthDate: values.birthDate,
    address: values.address,
    password: values.password,
  };
}

/**
 * Convert a record to its insert row.
 */
export function toRow(record: UserRecord): UserInsertRow {
  return {
    name: record.name,
    email: record.email,
    birthDate: record.birthDate,
    address: record.address,
    password: record.password,
  };
}

function isObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Convert a `users` row back to a record.
 *
 * @throws Error if a column is missing or has the wrong type
 */
export function fromRow(row: unknown): StoredUserRecord {
  if (!isObject(row)) {
    throw new Error('users row must be an object');
  }

  const id = row['id'];
  if (typeof id !== 'number' || !Number.isInteger(id)) {
    throw new Error(`users row has invalid id: ${String(id)}`);
  }

  const values = emptyFormValues();
  for (const field of USER_FIELDS) {
    const value = row[field];
    if (typeof value !== 'string') {
      throw new Error(`users row ${id} has invalid ${field}`);
    }
    values[field] = value;
  }

  return { id, ...values };
}

/**
 * Project a stored record onto the listing columns.
 */
export function toListRow(record: StoredUserRecord): UserListRow {
  return {
    id: record.id,
    name: record.name,
    email: record.email,
    birthDate: record.birthDate,
  };
}
