import type { Request } from 'express';
import { ValidationError } from '../../utils/errors.js';

/**
 * Read a single string query parameter; repeated or nested values are ignored.
 */
export function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Parse a non-negative integer from a path or query value.
 *
 * @throws ValidationError when present but not a non-negative integer
 */
export function parseNonNegativeInt(value: string | undefined, name: string, fallback: number): number {
  if (value === undefined || value === '') return fallback;
  if (!/^\d+$/.test(value)) {
    throw new ValidationError(`${name} must be a non-negative integer`, 'INVALID_QUERY');
  }
  return Number(value);
}
