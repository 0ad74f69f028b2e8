import { isIsoDate } from '../expansion/dates.js';
import type { ValueType } from './types.js';

export type FormattedValue = { ok: true; value: string } | { ok: false; reason: string };

const INTEGER_PATTERN = /^[+-]?\d+$/;
const NUMBER_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Converts a configuration value to the text written into the template.
 */
export function formatValue(value: unknown, type: ValueType): FormattedValue {
  switch (type) {
    case 'boolean':
      if (typeof value === 'boolean') {
        return { ok: true, value: String(value) };
      }
      if (value === 'true' || value === 'false') {
        return { ok: true, value };
      }
      return { ok: false, reason: `expected true or false, got ${describeValue(value)}` };

    case 'integer':
      if (typeof value === 'number' && Number.isInteger(value)) {
        return { ok: true, value: String(value) };
      }
      if (typeof value === 'string' && INTEGER_PATTERN.test(value.trim())) {
        return { ok: true, value: value.trim() };
      }
      return { ok: false, reason: `expected an integer, got ${describeValue(value)}` };

    case 'number':
      if (typeof value === 'number' && Number.isFinite(value)) {
        return { ok: true, value: String(value) };
      }
      if (typeof value === 'string' && NUMBER_PATTERN.test(value.trim())) {
        return { ok: true, value: value.trim() };
      }
      return { ok: false, reason: `expected a number, got ${describeValue(value)}` };

    case 'date':
      if (value instanceof Date && !Number.isNaN(value.getTime())) {
        return { ok: true, value: value.toISOString().slice(0, 10) };
      }
      if (typeof value === 'string' && isIsoDate(value.trim())) {
        return { ok: true, value: value.trim() };
      }
      return { ok: false, reason: `expected a date (YYYY-MM-DD), got ${describeValue(value)}` };

    case 'string':
      if (typeof value === 'string') {
        return { ok: true, value };
      }
      if (typeof value === 'number' || typeof value === 'boolean') {
        return { ok: true, value: String(value) };
      }
      return { ok: false, reason: `expected text, got ${describeValue(value)}` };
  }
}

export function describeValue(value: unknown): string {
  if (value === null || value === undefined) {
    return 'an empty value';
  }
  if (Array.isArray(value)) {
    return 'a list';
  }
  if (typeof value === 'object' && !(value instanceof Date)) {
    return 'a mapping';
  }
  return JSON.stringify(value instanceof Date ? value.toISOString() : value);
}
