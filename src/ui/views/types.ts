/**
 * Types for the intake form view.
 *
 * Plain data — no framework-specific code.
 */

import type { StoredUserRecord, UserField, UserFormValues, UserListRow } from '../../types/UserRecord.js';
import type { PaginationInfo } from '../../intake/pagination.js';

/**
 * User-visible notification for store and provider outcomes.
 */
export interface Notification {
  kind: 'success' | 'error';
  message: string;
}

/**
 * State for the intake form view.
 */
export interface IntakeViewState {
  /** Current field values */
  values: UserFormValues;
  /** Inline error per invalid field */
  errors: Map<UserField, string>;
  /** Full listing, re-fetched after every insert */
  records: StoredUserRecord[];
  /** Rows on the current page */
  rows: UserListRow[];
  /** Pagination info for the listing */
  pagination: PaginationInfo;
  /** Whether a submission is in flight */
  isSaving: boolean;
  /** Whether a provider fetch is in flight */
  isFetching: boolean;
  /** Whether the listing is loading */
  isLoading: boolean;
  /** Last store or provider outcome */
  notification?: Notification;
}

/**
 * Action result (for submit and prefill).
 */
export interface ActionResult {
  /** Whether action succeeded */
  success: boolean;
  /** Id of the created record (submit only) */
  id?: number;
  /** Error message if any */
  error?: string;
}
