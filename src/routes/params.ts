/**
 * Query and body parsing helpers shared by the API routers
 */

import { Response } from 'express';
import { ValidationError, errorMessage, statusCodeOf } from '../errors';
import { createLogger } from '../logger';
import { isRecord } from '../registry/manifest';

const log = createLogger('http');

export interface IntegerRange {
  min: number;
  max: number;
  fallback: number;
}

/**
 * Answer `{ error }` with the status the error carries
 */
export function sendError(res: Response, error: unknown): void {
  const status = statusCodeOf(error);
  if (status >= 500) {
    log.error({ err: error, status }, 'Request failed');
  }
  res.status(status).json({ error: errorMessage(error) });
}

export function integerParam(value: unknown, name: string, range: IntegerRange): number {
  if (value === undefined || value === '') return range.fallback;

  const parsed = typeof value === 'string' && /^-?\d+$/.test(value.trim()) ? Number(value) : NaN;
  if (!Number.isInteger(parsed) || parsed < range.min || parsed > range.max) {
    throw new ValidationError(`${name} must be an integer between ${range.min} and ${range.max}.`);
  }
  return parsed;
}

export function booleanParam(value: unknown, name: string, fallback: boolean): boolean {
  if (value === undefined || value === '') return fallback;
  if (typeof value === 'boolean') return value;

  const normalized = typeof value === 'string' ? value.trim().toLowerCase() : '';
  if (['true', '1', 'yes'].includes(normalized)) return true;
  if (['false', '0', 'no'].includes(normalized)) return false;
  throw new ValidationError(`${name} must be a boolean.`);
}

export function optionalString(value: unknown, name: string): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') {
    throw new ValidationError(`${name} must be a string.`);
  }
  return value;
}

export function stringList(value: unknown, name: string): string[] {
  if (value === undefined || value === null) return [];
  if (!Array.isArray(value) || !value.every((entry) => typeof entry === 'string')) {
    throw new ValidationError(`${name} must be a list of strings.`);
  }
  return value.map(String);
}

/**
 * JSON body as a record; anything else is an empty submission
 */
export function jsonBody(body: unknown): Record<string, unknown> {
  return isRecord(body) ? body : {};
}
