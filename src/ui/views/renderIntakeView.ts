/**
 * Text rendering of the intake view state.
 */

import type { UserField } from '../../types/UserRecord.js';
import { USER_FIELDS } from '../../types/UserRecord.js';
import type { IntakeViewState } from './types.js';

export const FIELD_LABELS: Record<UserField, string> = {
  name: 'Name',
  email: 'Email',
  birthDate: 'Birth date',
  address: 'Address',
  password: 'Password',
};

export const EMPTY_LISTING = 'No users registered';

export function renderForm(state: IntakeViewState): string[] {
  const lines = ['User Registration'];

  for (const field of USER_FIELDS) {
    const value = state.values[field];
    const shown = field === 'password' ? '*'.repeat(value.length) : value;
    lines.push(`${FIELD_LABELS[field]}: ${shown}`);

    const error = state.errors.get(field);
    if (error) {
      lines.push(`  ! ${error}`);
    }
  }

  lines.push('[Register] [Fetch from provider]');
  return lines;
}

export function renderListing(state: IntakeViewState): string[] {
  const { pagination, rows } = state;
  if (pagination.totalItems === 0) {
    return [EMPTY_LISTING];
  }

  const lines = [
    `Users (page ${pagination.page} of ${pagination.totalPages}, ${pagination.totalItems} total)`,
    'Name | Email | Birth date',
  ];
  for (const row of rows) {
    lines.push(`${row.name} | ${row.email} | ${row.birthDate}`);
  }
  return lines;
}

/**
 * Render the notification, form and current listing page.
 */
export function renderIntakeView(state: IntakeViewState): string {
  const lines: string[] = [];

  if (state.notification) {
    lines.push(`[${state.notification.kind}] ${state.notification.message}`, '');
  }
  lines.push(...renderForm(state), '', ...renderListing(state));

  return lines.join('\n');
}
