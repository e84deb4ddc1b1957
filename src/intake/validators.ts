/**
 * Field validators for the intake form.
 *
 * Each validator returns an error message or null. The form validator
 * runs every field independently so all failing fields are reported
 * together.
 */

import type { UserField, UserFormValues } from '../types/UserRecord.js';
import { USER_FIELDS } from '../types/UserRecord.js';

export type FieldValidator = (value: string) => string | null;

/**
 * Per-field error messages keyed by field.
 */
export type FieldErrors = Map<UserField, string>;

const NAME_PATTERN = /^[a-zA-Z\s]+$/;
const NAME_DISALLOWED = /[^a-zA-Z\s]/g;

export const MIN_NAME_LENGTH = 3;
export const MIN_PASSWORD_LENGTH = 6;

/**
 * Earliest selectable birth date.
 */
export const MIN_BIRTH_DATE = '1900-01-01';

export const validateName: FieldValidator = (value) => {
  if (value.length === 0) {
    return 'Name is required';
  }
  if (value.length < MIN_NAME_LENGTH) {
    return `Name must be at least ${MIN_NAME_LENGTH} characters`;
  }
  if (!NAME_PATTERN.test(value)) {
    return 'Name may only contain letters and spaces';
  }
  return null;
};

export const validateEmail: FieldValidator = (value) => {
  if (value.length === 0 || !value.includes('@')) {
    return 'Email is required and must be valid';
  }
  return null;
};

// Range is enforced when picking; submission only checks presence.
export const validateBirthDate: FieldValidator = (value) => {
  if (value.length === 0) {
    return 'Birth date is required';
  }
  return null;
};

export const validateAddress: FieldValidator = (value) => {
  if (value.length === 0) {
    return 'Address is required';
  }
  return null;
};

export const validatePassword: FieldValidator = (value) => {
  if (value.length < MIN_PASSWORD_LENGTH) {
    return `Password is required and must be at least ${MIN_PASSWORD_LENGTH} characters`;
  }
  return null;
};

export const FIELD_VALIDATORS: Record<UserField, FieldValidator> = {
  name: validateName,
  email: validateEmail,
  birthDate: validateBirthDate,
  address: validateAddress,
  password: validatePassword,
};

/**
 * Validate every field of the form.
 *
 * @returns Map of field -> message; empty when the form is valid
 */
export function validateUserForm(values: UserFormValues): FieldErrors {
  const errors: FieldErrors = new Map();

  for (const field of USER_FIELDS) {
    const message = FIELD_VALIDATORS[field](values[field]);
    if (message !== null) {
      errors.set(field, message);
    }
  }

  return errors;
}

/**
 * Drop every character the name field does not accept.
 */
export function sanitizeNameInput(value: string): string {
  return value.replace(NAME_DISALLOWED, '');
}

/**
 * Format a date as `yyyy-MM-dd` using its UTC calendar day.
 */
export function formatIsoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * Format a date as `yyyy-MM-dd` using its local calendar day, as a
 * date picker hands it over.
 */
export function formatLocalDate(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Whether the date picker would offer this local day: [1900-01-01, today].
 */
export function isSelectableBirthDate(date: Date, today: Date = new Date()): boolean {
  if (Number.isNaN(date.getTime())) {
    return false;
  }
  const day = formatLocalDate(date);
  return day >= MIN_BIRTH_DATE && day <= formatLocalDate(today);
}

/**
 * Convert errors to a plain object for JSON responses.
 */
export function fieldErrorsToObject(errors: FieldErrors): Partial<Record<UserField, string>> {
  const result: Partial<Record<UserField, string>> = {};
  for (const [field, message] of errors) {
    result[field] = message;
  }
  return result;
}
