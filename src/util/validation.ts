/**
 * Validation Utilities
 * 
 * Functions for validating external inputs (query strings, configuration)
 * to prevent invalid data from propagating through the system.
 */

import { ValidationError } from '../errors/index.js';

export { ValidationError };

/**
 * Parses an optional positive integer parameter
 * 
 * @param value - Raw value (query-string entry or env string); empty means absent
 * @param field - Parameter name reported in the error
 * @param fallback - Value used when the parameter is absent
 * @param max - Largest accepted value
 * @throws ValidationError if the value is not an integer in [1, max]
 */
export function parsePositiveInt(value: unknown, field: string, fallback: number, max: number): number {
  if (value === undefined || value === '') return fallback;
  if (typeof value !== 'string' || !/^\d+$/.test(value.trim())) {
    throw new ValidationError(`${field} must be a positive integer`, field);
  }
  const n = Number(value.trim());
  if (n < 1 || n > max) {
    throw new ValidationError(`${field} must be between 1 and ${max}`, field);
  }
  return n;
}

/**
 * Reads a required, non-empty text parameter
 * 
 * @returns The trimmed value
 * @throws ValidationError if missing, repeated or blank
 */
export function requireText(value: unknown, field: string): string {
  if (typeof value !== 'string' || value.trim() === '') {
    throw new ValidationError(`${field} is required`, field);
  }
  return value.trim();
}

/**
 * Validates a URL string
 * 
 * @param url - URL to validate
 * @returns True if valid URL, false otherwise
 */
export function isValidUrl(url: string): boolean {
  try {
    new URL(url);
    return true;
  } catch {
    return false;
  }
}

/**
 * Checks a configured count or duration
 * 
 * @throws ValidationError unless the value is a finite number >= min
 */
export function assertNumberAtLeast(value: number, field: string, min: number): void {
  if (!Number.isFinite(value) || value < min) {
    throw new ValidationError(`${field} must be a number >= ${min}, got ${value}`, field);
  }
}
