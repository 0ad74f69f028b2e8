import { describe, expect, it } from 'vitest';
import { createConfigDocument } from '../config/config-document.js';
import { ValidationErrorCode } from '../errors/index.js';
import { parseIsoDate, type CalendarDate } from './dates.js';
import {
  computeRollingRanges,
  ENABLE_ONLY_DIRECTIVE,
  expandDirective,
  isDirectiveKey,
  OOS_BLOCKS_DIRECTIVE,
  parseRollingDirective,
  type DirectiveContext,
} from './directives.js';

function date(text: string): CalendarDate {
  const parsed = parseIsoDate(text);
  if (!parsed) {
    throw new Error(`Bad test date ${text}`);
  }
  return parsed;
}

function contextFor(
  values: Record<string, unknown>,
  template: { values?: Record<string, string>; blocks?: string[]; mappedBlocks?: number } = {},
): DirectiveContext {
  return {
    document: createConfigDocument(values),
    currentValue: (key) => template.values?.[key],
    enumerate: () => template.blocks ?? [],
    isMapped: (key) => {
      const block = /^out_of_sample\.block_(\d+)\./.exec(key);
      return !block || template.mappedBlocks === undefined || Number(block[1]) <= template.mappedBlocks;
    },
  };
}

// =============================================================================
// Rolling out-of-sample ranges
// =============================================================================

describe('parseRollingDirective', () => {
  it('reads months and count', () => {
    expect(parseRollingDirective('rolling_3m_10')).toEqual({ months: 3, count: 10 });
    expect(parseRollingDirective('rolling_12m_1')).toEqual({ months: 12, count: 1 });
  });

  it.each(['rolling_0m_4', 'rolling_3m_0', 'rolling_3m', 'anchored_3m_10', 10])('rejects %j', (value) => {
    expect(parseRollingDirective(value)).toBeUndefined();
  });
});

describe('computeRollingRanges', () => {
  it('ends the last block on the end of the data range', () => {
    const ranges = computeRollingRanges(date('2020-04-17'), date('2025-04-18'), { months: 3, count: 10 });

    expect(ranges).toHaveLength(10);
    expect(ranges[0]).toEqual({ from: '2022-10-19', to: '2023-01-18' });
    expect(ranges[1]).toEqual({ from: '2023-01-19', to: '2023-04-18' });
    expect(ranges[9]).toEqual({ from: '2025-01-19', to: '2025-04-18' });
  });

  it('produces contiguous blocks', () => {
    const ranges = computeRollingRanges(date('2020-04-17'), date('2025-04-18'), { months: 3, count: 10 });

    for (let index = 1; index < ranges.length; index += 1) {
      expect(ranges[index].from > ranges[index - 1].to).toBe(true);
    }
  });

  it('measures month-end boundaries from the end date', () => {
    const ranges = computeRollingRanges(date('2023-01-01'), date('2024-08-31'), { months: 6, count: 2 });

    expect(ranges).toEqual([
      { from: '2023-09-01', to: '2024-02-29' },
      { from: '2024-03-01', to: '2024-08-31' },
    ]);
  });

  it('accepts a range that fits exactly', () => {
    const ranges = computeRollingRanges(date('2024-10-19'), date('2025-04-18'), { months: 3, count: 2 });

    expect(ranges).toEqual([
      { from: '2024-10-19', to: '2025-01-18' },
      { from: '2025-01-19', to: '2025-04-18' },
    ]);
  });

  it('fails when the range is one day short', () => {
    expect(() => computeRollingRanges(date('2024-10-20'), date('2025-04-18'), { months: 3, count: 2 })).toThrow(
      'rolling_3m_2 needs 6 months before 2025-04-18, but the range starts on 2024-10-20.',
    );
  });

  it('fails when the data range is too short', () => {
    expect(() => computeRollingRanges(date('2024-01-01'), date('2025-04-18'), { months: 3, count: 10 })).toThrow(
      'rolling_3m_10 needs 30 months before 2025-04-18, but the range starts on 2024-01-01.',
    );
  });
});

describe('data_setup.oos_blocks', () => {
  it('expands into the block count and one date pair per block', () => {
    const context = contextFor({
      data_setup: { date_from: '2020-04-17', date_to: '2025-04-18' },
    });

    const writes = expandDirective(OOS_BLOCKS_DIRECTIVE, 'rolling_3m_10', context);

    expect(writes).toHaveLength(21);
    expect(writes[0]).toEqual({ key: 'out_of_sample.count', value: 10 });
    expect(writes.slice(1, 3)).toEqual([
      { key: 'out_of_sample.block_1.date_from', value: '2022-10-19' },
      { key: 'out_of_sample.block_1.date_to', value: '2023-01-18' },
    ]);
    expect(writes.slice(-2)).toEqual([
      { key: 'out_of_sample.block_10.date_from', value: '2025-01-19' },
      { key: 'out_of_sample.block_10.date_to', value: '2025-04-18' },
    ]);
  });

  it('is deterministic', () => {
    const context = contextFor({ data_setup: { date_from: '2020-04-17', date_to: '2025-04-18' } });

    expect(expandDirective(OOS_BLOCKS_DIRECTIVE, 'rolling_3m_10', context)).toEqual(
      expandDirective(OOS_BLOCKS_DIRECTIVE, 'rolling_3m_10', context),
    );
  });

  it('falls back to the dates already in the template', () => {
    const context = contextFor(
      { data_setup: { date_to: '2025-04-18' } },
      { values: { 'data_setup.date_from': '2024-10-19', 'data_setup.date_to': '2000-01-01' } },
    );

    expect(expandDirective(OOS_BLOCKS_DIRECTIVE, 'rolling_3m_2', context).slice(1)).toEqual([
      { key: 'out_of_sample.block_1.date_from', value: '2024-10-19' },
      { key: 'out_of_sample.block_1.date_to', value: '2025-01-18' },
      { key: 'out_of_sample.block_2.date_from', value: '2025-01-19' },
      { key: 'out_of_sample.block_2.date_to', value: '2025-04-18' },
    ]);
  });

  it('fails without a base range', () => {
    expect(() => expandDirective(OOS_BLOCKS_DIRECTIVE, 'rolling_3m_2', contextFor({}))).toThrow(
      expect.objectContaining({ code: ValidationErrorCode.MISSING_BASE_RANGE }),
    );
  });

  it('rejects an unusable configured date', () => {
    const context = contextFor({ data_setup: { date_from: '17.04.2020', date_to: '2025-04-18' } });

    expect(() => expandDirective(OOS_BLOCKS_DIRECTIVE, 'rolling_3m_2', context)).toThrow(
      'data_setup.date_from: expected a date (YYYY-MM-DD), got "17.04.2020".',
    );
  });

  it('rejects an unknown directive value', () => {
    expect(() => expandDirective(OOS_BLOCKS_DIRECTIVE, 'rolling_3m', contextFor({}))).toThrow(
      expect.objectContaining({ code: ValidationErrorCode.UNKNOWN_DIRECTIVE }),
    );
  });

  it('rejects more blocks than the key-path map declares', () => {
    const context = contextFor(
      { data_setup: { date_from: '2015-01-01', date_to: '2025-04-18' } },
      { mappedBlocks: 24 },
    );

    expect(() => expandDirective(OOS_BLOCKS_DIRECTIVE, 'rolling_1m_30', context)).toThrow(
      'data_setup.oos_blocks: "rolling_1m_30" needs 30 out-of-sample blocks, but the key-path map declares 24.',
    );
    expect(expandDirective(OOS_BLOCKS_DIRECTIVE, 'rolling_1m_24', context)).toHaveLength(49);
  });

  it('reports a short data range with the directive key', () => {
    const context = contextFor({ data_setup: { date_from: '2024-01-01', date_to: '2025-04-18' } });

    expect(() => expandDirective(OOS_BLOCKS_DIRECTIVE, 'rolling_3m_10', context)).toThrow(
      expect.objectContaining({
        code: ValidationErrorCode.INSUFFICIENT_RANGE,
        location: expect.objectContaining({ key: OOS_BLOCKS_DIRECTIVE }),
      }),
    );
  });
});

// =============================================================================
// Building blocks
// =============================================================================

describe('blocks.enable_only', () => {
  it('enables listed blocks and disables the rest', () => {
    const context = contextFor({}, { blocks: ['ADXCrossDown', 'RSIAbove', 'BollingerBands'] });

    expect(expandDirective(ENABLE_ONLY_DIRECTIVE, ['RSIAbove', 'StochCross'], context)).toEqual([
      { key: 'blocks.ADXCrossDown', value: false },
      { key: 'blocks.RSIAbove', value: true },
      { key: 'blocks.BollingerBands', value: false },
      { key: 'blocks.StochCross', value: true },
    ]);
  });

  it('rejects anything but a list of names', () => {
    expect(() => expandDirective(ENABLE_ONLY_DIRECTIVE, 'RSIAbove', contextFor({}))).toThrow(
      expect.objectContaining({ code: ValidationErrorCode.INVALID_VALUE }),
    );
    expect(() => expandDirective(ENABLE_ONLY_DIRECTIVE, ['RSIAbove', ''], contextFor({}))).toThrow(
      expect.objectContaining({ code: ValidationErrorCode.INVALID_VALUE }),
    );
  });
});

describe('isDirectiveKey', () => {
  it('knows the directive keys only', () => {
    expect(isDirectiveKey('data_setup.oos_blocks')).toBe(true);
    expect(isDirectiveKey('blocks.enable_only')).toBe(true);
    expect(isDirectiveKey('data_setup.spread')).toBe(false);
  });
});
