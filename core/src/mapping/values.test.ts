import { describe, expect, it } from 'vitest';
import { describeValue, formatValue } from './values.js';

describe('formatValue', () => {
  it('writes booleans as true/false', () => {
    expect(formatValue(true, 'boolean')).toEqual({ ok: true, value: 'true' });
    expect(formatValue('false', 'boolean')).toEqual({ ok: true, value: 'false' });
    expect(formatValue(1, 'boolean')).toEqual({ ok: false, reason: 'expected true or false, got 1' });
  });

  it('accepts whole numbers for integer fields', () => {
    expect(formatValue(200, 'integer')).toEqual({ ok: true, value: '200' });
    expect(formatValue(' -7 ', 'integer')).toEqual({ ok: true, value: '-7' });
    expect(formatValue(1.5, 'integer').ok).toBe(false);
  });

  it('writes numbers the way they were given', () => {
    expect(formatValue(1.1, 'number')).toEqual({ ok: true, value: '1.1' });
    expect(formatValue(0.5, 'number')).toEqual({ ok: true, value: '0.5' });
    expect(formatValue('1.10', 'number')).toEqual({ ok: true, value: '1.10' });
    expect(formatValue(Number.NaN, 'number').ok).toBe(false);
  });

  it('accepts calendar dates only', () => {
    expect(formatValue('2020-04-17', 'date')).toEqual({ ok: true, value: '2020-04-17' });
    expect(formatValue(new Date(Date.UTC(2025, 3, 18)), 'date')).toEqual({ ok: true, value: '2025-04-18' });
    expect(formatValue('2021-02-30', 'date').ok).toBe(false);
    expect(formatValue('17.04.2020', 'date').ok).toBe(false);
  });

  it('writes scalars as text for string fields', () => {
    expect(formatValue('EURUSD', 'string')).toEqual({ ok: true, value: 'EURUSD' });
    expect(formatValue(15, 'string')).toEqual({ ok: true, value: '15' });
  });

  it('rejects empty values, lists and mappings for every type', () => {
    expect(formatValue(null, 'string')).toEqual({ ok: false, reason: 'expected text, got an empty value' });
    expect(formatValue([1], 'integer')).toEqual({ ok: false, reason: 'expected an integer, got a list' });
    expect(formatValue({ a: 1 }, 'number')).toEqual({ ok: false, reason: 'expected a number, got a mapping' });
  });
});

describe('describeValue', () => {
  it('quotes strings', () => {
    expect(describeValue('rolling')).toBe('"rolling"');
  });
});
