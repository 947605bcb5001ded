/**
 * Common validation functions for service inputs
 *
 * Every failure raises ValidationError carrying the offending field, so the
 * HTTP layer can answer 400 with a field list.
 */

import { ValidationError } from '../repositories/errors.js';

const PHONE_PATTERN = /^\+?1?\d{9,15}$/;
const EMAIL_PATTERN = /^[^\s@]+@[^\s@]+\.[^\s@]+$/;

function fail(field: string, message: string, value?: unknown): never {
  throw new ValidationError(message, [{ field, message, value }]);
}

export function validateRequiredString(value: unknown, fieldName: string): asserts value is string {
  if (typeof value !== 'string' || value.trim() === '') {
    fail(fieldName, `${fieldName} is required`, value);
  }
}

export function validateTextLength(value: string | undefined, fieldName: string, maxLength: number): void {
  if (value !== undefined && value.length > maxLength) {
    fail(fieldName, `${fieldName} must be at most ${String(maxLength)} characters`, value.length);
  }
}

export function validateRange(value: number | undefined, fieldName: string, min: number, max: number): void {
  if (value === undefined) {
    return;
  }
  if (!Number.isFinite(value) || value < min || value > max) {
    fail(fieldName, `${fieldName} must be between ${String(min)} and ${String(max)}`, value);
  }
}

export function validateNonNegative(value: number | undefined, fieldName: string): void {
  if (value !== undefined && (!Number.isFinite(value) || value < 0)) {
    fail(fieldName, `${fieldName} must be zero or greater`, value);
  }
}

export function validateEnum<T extends string>(value: unknown, fieldName: string, allowed: readonly T[]): asserts value is T {
  if (!allowed.some((item) => item === value)) {
    fail(fieldName, `${fieldName} must be one of: ${allowed.join(', ')}`, value);
  }
}

export function validatePhone(phone: string | undefined): void {
  if (phone !== undefined && phone !== '' && !PHONE_PATTERN.test(phone)) {
    fail('phone', "Phone number must be entered in the format: '+999999999'. Up to 15 digits allowed.", phone);
  }
}

export function validateEmail(email: unknown, fieldName = 'email'): asserts email is string {
  if (typeof email !== 'string' || !EMAIL_PATTERN.test(email)) {
    fail(fieldName, 'Enter a valid email address.', email);
  }
}

/**
 * @throws ValidationError unless min <= max
 */
export function validateMinMax(min: number, max: number, message: string, fieldName: string): void {
  if (min > max) {
    throw new ValidationError(message, [{ field: fieldName, message }]);
  }
}

export function validateDateString(value: string | undefined, fieldName: string): void {
  if (value !== undefined && Number.isNaN(Date.parse(value))) {
    fail(fieldName, `${fieldName} must be a valid date`, value);
  }
}
