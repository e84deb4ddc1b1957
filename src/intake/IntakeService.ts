/**
 * IntakeService — validate, persist, refresh.
 *
 * Stateless over an injected UserStore and UserProvider. Validation
 * failures are returned as data; storage and provider errors propagate
 * as their typed errors for the caller to surface.
 */

import type { UserStore } from '../store/types.js';
import type { StoredUserRecord, UserFormValues } from '../types/UserRecord.js';
import { createUserRecord } from '../types/UserRecord.js';
import type { UserProvider } from './RandomUserProvider.js';
import { validateUserForm, type FieldErrors } from './validators.js';

/**
 * Outcome of a submission.
 */
export type SubmitResult =
  | {
      success: true;
      /** Id assigned to the new record */
      id: number;
      /** Listing re-fetched after the insert */
      records: StoredUserRecord[];
    }
  | {
      success: false;
      fieldErrors: FieldErrors;
    };

export class IntakeService {
  constructor(
    private readonly store: UserStore,
    private readonly provider: UserProvider
  ) {}

  /**
   * Validate the values and, when all fields pass, insert a record and
   * re-fetch the listing. No store call is made on validation failure.
   */
  async submit(values: UserFormValues): Promise<SubmitResult> {
    const fieldErrors = validateUserForm(values);
    if (fieldErrors.size > 0) {
      return { success: false, fieldErrors };
    }

    const id = await this.store.insert(createUserRecord(values));
    const records = await this.store.fetchAll();

    return { success: true, id, records };
  }

  /**
   * Every stored record.
   */
  listRecords(): Promise<StoredUserRecord[]> {
    return this.store.fetchAll();
  }

  /**
   * Values from the external provider. Nothing is persisted.
   */
  prefill(): Promise<UserFormValues> {
    return this.provider.fetchUser();
  }
}

export function createIntakeService(store: UserStore, provider: UserProvider): IntakeService {
  return new IntakeService(store, provider);
}
