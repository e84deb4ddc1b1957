/**
 * IntakeFormController — Controller for the intake form screen.
 *
 * Holds field values, inline errors and the paged listing as plain
 * state. Framework-agnostic: a renderer subscribes and draws the state.
 */

import type { IntakeService } from '../../intake/IntakeService.js';
import type { StoredUserRecord, UserField } from '../../types/UserRecord.js';
import { emptyFormValues, toListRow } from '../../types/UserRecord.js';
import { paginate, DEFAULT_PAGE_SIZE } from '../../intake/pagination.js';
import {
  formatLocalDate,
  isSelectableBirthDate,
  sanitizeNameInput,
} from '../../intake/validators.js';
import type { ActionResult, IntakeViewState, Notification } from './types.js';

export const REGISTERED_MESSAGE = 'User registered successfully';

/**
 * Configuration for IntakeFormController.
 */
export interface IntakeFormControllerConfig {
  /** Workflow used for submit, listing and prefill */
  service: IntakeService;
  /** Rows per listing page (default: 5) */
  pageSize?: number;
  /** Clock for the birth date picker (default: current time) */
  now?: () => Date;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export class IntakeFormController {
  private readonly service: IntakeService;
  private readonly pageSize: number;
  private readonly now: () => Date;
  private state: IntakeViewState;
  private stateListeners: Array<(state: IntakeViewState) => void> = [];

  constructor(config: IntakeFormControllerConfig) {
    this.service = config.service;
    this.pageSize = config.pageSize ?? DEFAULT_PAGE_SIZE;
    this.now = config.now ?? (() => new Date());
    this.state = this.createInitialState();
  }

  private createInitialState(): IntakeViewState {
    const { items, pagination } = paginate([], 1, this.pageSize);
    return {
      values: emptyFormValues(),
      errors: new Map(),
      records: [],
      rows: items,
      pagination,
      isSaving: false,
      isFetching: false,
      isLoading: false,
    };
  }

  /**
   * Get current state.
   */
  getState(): IntakeViewState {
    return this.state;
  }

  /**
   * Subscribe to state changes.
   */
  subscribe(listener: (state: IntakeViewState) => void): () => void {
    this.stateListeners.push(listener);
    return () => {
      this.stateListeners = this.stateListeners.filter(l => l !== listener);
    };
  }

  private setState(partial: Partial<IntakeViewState>): void {
    this.state = { ...this.state, ...partial };
    for (const listener of this.stateListeners) {
      listener(this.state);
    }
  }

  private notify(notification: Notification): void {
    this.setState({ notification });
  }

  /**
   * Drop the last outcome before a new action starts. Listeners are
   * told by the setState that follows.
   */
  private clearNotification(): void {
    if (this.state.notification === undefined) {
      return;
    }
    const next = { ...this.state };
    delete next.notification;
    this.state = next;
  }

  /**
   * Recompute the visible page from the given records.
   */
  private listingState(records: StoredUserRecord[], page: number): Partial<IntakeViewState> {
    const { items, pagination } = paginate(records.map(toListRow), page, this.pageSize);
    return { records, rows: items, pagination };
  }

  /**
   * Set a field value. The name field only accepts letters and spaces.
   */
  setFieldValue(field: UserField, value: string): void {
    const next = field === 'name' ? sanitizeNameInput(value) : value;
    this.setState({
      values: { ...this.state.values, [field]: next },
    });
  }

  /**
   * Apply a date chosen in the picker. Dates outside
   * [1900-01-01, today] are rejected and leave the field unchanged.
   */
  selectBirthDate(date: Date): boolean {
    if (!isSelectableBirthDate(date, this.now())) {
      return false;
    }
    this.setFieldValue('birthDate', formatLocalDate(date));
    return true;
  }

  /**
   * Load the full listing from the store.
   */
  async load(): Promise<void> {
    this.setState({ isLoading: true });

    try {
      const records = await this.service.listRecords();
      this.setState({
        ...this.listingState(records, this.state.pagination.page),
        isLoading: false,
      });
    } catch (err) {
      this.setState({ isLoading: false });
      this.notify({ kind: 'error', message: `Could not load users: ${errorMessage(err)}` });
    }
  }

  /**
   * Show another page of the already loaded listing.
   */
  setPage(page: number): void {
    this.setState(this.listingState(this.state.records, page));
  }

  nextPage(): void {
    if (this.state.pagination.hasNext) {
      this.setPage(this.state.pagination.page + 1);
    }
  }

  previousPage(): void {
    if (this.state.pagination.hasPrevious) {
      this.setPage(this.state.pagination.page - 1);
    }
  }

  /**
   * Validate and persist the current values, then refresh the listing.
   */
  async submit(): Promise<ActionResult> {
    this.clearNotification();
    this.setState({ isSaving: true });

    try {
      const result = await this.service.submit(this.state.values);

      if (!result.success) {
        this.setState({ errors: result.fieldErrors, isSaving: false });
        return { success: false, error: 'Validation failed' };
      }

      this.setState({
        ...this.listingState(result.records, this.state.pagination.page),
        errors: new Map(),
        isSaving: false,
      });
      this.notify({ kind: 'success', message: REGISTERED_MESSAGE });
      return { success: true, id: result.id };
    } catch (err) {
      const message = `Could not register user: ${errorMessage(err)}`;
      this.setState({ isSaving: false });
      this.notify({ kind: 'error', message });
      return { success: false, error: message };
    }
  }

  /**
   * Replace all field values with a user from the provider. On failure
   * the current values are left untouched.
   */
  async prefill(): Promise<ActionResult> {
    this.clearNotification();
    this.setState({ isFetching: true });

    try {
      const values = await this.service.prefill();
      this.setState({ values, errors: new Map(), isFetching: false });
      return { success: true };
    } catch (err) {
      const message = `Could not fetch user from provider: ${errorMessage(err)}`;
      this.setState({ isFetching: false });
      this.notify({ kind: 'error', message });
      return { success: false, error: message };
    }
  }
}

/**
 * Create a new IntakeFormController.
 */
export function createIntakeFormController(config: IntakeFormControllerConfig): IntakeFormController {
  return new IntakeFormController(config);
}
