/**
 * Derived-block directives: compact configuration values that expand into
 * several concrete key/value writes before anything touches the template.
 */

import {
  createValidationError,
  ValidationErrorCode,
} from '../errors/index.js';
import type { ConfigDocument } from '../config/config-document.js';
import { describeValue, formatValue } from '../mapping/values.js';
import {
  addDays,
  addMonths,
  compareDates,
  formatIsoDate,
  parseIsoDate,
  type CalendarDate,
} from './dates.js';

export interface ExpandedWrite {
  key: string;
  value: unknown;
}

export interface DirectiveContext {
  document: ConfigDocument;
  /** Current template value of a mapped key, when its location exists */
  currentValue(key: string): string | undefined;
  /** Field names of a wildcard section present in the template */
  enumerate(section: string): string[];
  /** Whether the key-path map resolves `key` */
  isMapped(key: string): boolean;
}

export interface DirectiveDefinition {
  key: string;
  /** Value shape shown by `keys:list` */
  grammar: string;
  description: string;
  expand(value: unknown, context: DirectiveContext): ExpandedWrite[];
}

export const OOS_BLOCKS_DIRECTIVE = 'data_setup.oos_blocks';
export const ENABLE_ONLY_DIRECTIVE = 'blocks.enable_only';

const BASE_FROM_KEY = 'data_setup.date_from';
const BASE_TO_KEY = 'data_setup.date_to';
const OOS_COUNT_KEY = 'out_of_sample.count';
const BLOCK_SECTION = 'blocks';
const ROLLING_PATTERN = /^rolling_(\d+)m_(\d+)$/;

// =============================================================================
// Rolling out-of-sample ranges
// =============================================================================

export interface RollingDirective {
  months: number;
  count: number;
}

export interface DateRange {
  from: string;
  to: string;
}

export function parseRollingDirective(value: unknown): RollingDirective | undefined {
  if (typeof value !== 'string') {
    return undefined;
  }
  const match = ROLLING_PATTERN.exec(value.trim());
  if (!match) {
    return undefined;
  }
  const months = Number(match[1]);
  const count = Number(match[2]);
  if (months < 1 || count < 1) {
    return undefined;
  }
  return { months, count };
}

/**
 * Splits the tail of [dateFrom, dateTo] into `count` consecutive ranges of
 * `months` calendar months, the last one ending on dateTo. Each boundary is
 * measured from dateTo, so month-end clamping never accumulates.
 */
export function computeRollingRanges(
  dateFrom: CalendarDate,
  dateTo: CalendarDate,
  directive: RollingDirective,
): DateRange[] {
  const { months, count } = directive;
  const boundaries: CalendarDate[] = [];
  for (let step = count; step >= 0; step -= 1) {
    boundaries.push(addMonths(dateTo, -step * months));
  }

  const [first] = boundaries;
  if (!first || compareDates(addDays(first, 1), dateFrom) < 0) {
    throw createValidationError(
      ValidationErrorCode.INSUFFICIENT_RANGE,
      `rolling_${months}m_${count} needs ${months * count} months before ${formatIsoDate(dateTo)}, ` +
        `but the range starts on ${formatIsoDate(dateFrom)}.`,
      {
        key: OOS_BLOCKS_DIRECTIVE,
        context: `${formatIsoDate(dateFrom)}..${formatIsoDate(dateTo)}`,
        suggestion: 'Move data_setup.date_from earlier, or use fewer or shorter blocks.',
      },
    );
  }

  const ranges: DateRange[] = [];
  for (let index = 1; index < boundaries.length; index += 1) {
    const previous = boundaries[index - 1];
    const current = boundaries[index];
    if (previous && current) {
      ranges.push({ from: formatIsoDate(addDays(previous, 1)), to: formatIsoDate(current) });
    }
  }
  return ranges;
}

function mappedBlockCount(wanted: number, context: DirectiveContext): number {
  let count = 0;
  while (
    count < wanted &&
    context.isMapped(`out_of_sample.block_${count + 1}.date_from`) &&
    context.isMapped(`out_of_sample.block_${count + 1}.date_to`)
  ) {
    count += 1;
  }
  return count;
}

function readBaseDate(key: string, context: DirectiveContext): CalendarDate {
  if (context.document.has(key)) {
    const raw = context.document.get(key);
    const formatted = formatValue(raw, 'date');
    const parsed = formatted.ok ? parseIsoDate(formatted.value) : undefined;
    if (!parsed) {
      throw createValidationError(ValidationErrorCode.INVALID_VALUE, `${key}: expected a date (YYYY-MM-DD), got ${describeValue(raw)}.`, {
        filePath: context.document.filePath,
        key,
      });
    }
    return parsed;
  }

  const current = context.currentValue(key);
  const parsed = current === undefined ? undefined : parseIsoDate(current.trim());
  if (!parsed) {
    throw createValidationError(
      ValidationErrorCode.MISSING_BASE_RANGE,
      `${OOS_BLOCKS_DIRECTIVE} needs ${key}, which is neither configured nor set in the template.`,
      {
        filePath: context.document.filePath,
        key: OOS_BLOCKS_DIRECTIVE,
        context: current === undefined ? undefined : `template value "${current}"`,
        suggestion: `Set ${key} in the configuration.`,
      },
    );
  }
  return parsed;
}

const rollingOutOfSample: DirectiveDefinition = {
  key: OOS_BLOCKS_DIRECTIVE,
  grammar: 'rolling_<months>m_<count>',
  description: 'Splits the end of the data range into <count> out-of-sample blocks of <months> months.',
  expand(value, context) {
    const directive = parseRollingDirective(value);
    if (!directive) {
      throw createValidationError(
        ValidationErrorCode.UNKNOWN_DIRECTIVE,
        `Unknown ${OOS_BLOCKS_DIRECTIVE} directive ${describeValue(value)}.`,
        {
          filePath: context.document.filePath,
          key: OOS_BLOCKS_DIRECTIVE,
          suggestion: 'Use rolling_<months>m_<count>, e.g. rolling_3m_10.',
        },
      );
    }

    const mapped = mappedBlockCount(directive.count, context);
    if (mapped < directive.count) {
      throw createValidationError(
        ValidationErrorCode.INVALID_VALUE,
        `${OOS_BLOCKS_DIRECTIVE}: ${describeValue(value)} needs ${directive.count} out-of-sample blocks, ` +
          `but the key-path map declares ${mapped}.`,
        {
          filePath: context.document.filePath,
          key: OOS_BLOCKS_DIRECTIVE,
          suggestion: `Use at most ${mapped} blocks, or raise the out_of_sample repeat range in the key-path map.`,
        },
      );
    }

    const dateFrom = readBaseDate(BASE_FROM_KEY, context);
    const dateTo = readBaseDate(BASE_TO_KEY, context);
    const ranges = computeRollingRanges(dateFrom, dateTo, directive);

    const writes: ExpandedWrite[] = [{ key: OOS_COUNT_KEY, value: directive.count }];
    ranges.forEach((range, index) => {
      writes.push({ key: `out_of_sample.block_${index + 1}.date_from`, value: range.from });
      writes.push({ key: `out_of_sample.block_${index + 1}.date_to`, value: range.to });
    });
    return writes;
  },
};

// =============================================================================
// Building blocks
// =============================================================================

const enableOnlyBlocks: DirectiveDefinition = {
  key: ENABLE_ONLY_DIRECTIVE,
  grammar: '[<block>, ...]',
  description: 'Enables the listed building blocks and disables every other block in the template.',
  expand(value, context) {
    if (!Array.isArray(value) || !value.every((name) => typeof name === 'string' && name.trim().length > 0)) {
      throw createValidationError(
        ValidationErrorCode.INVALID_VALUE,
        `${ENABLE_ONLY_DIRECTIVE}: expected a list of block names, got ${describeValue(value)}.`,
        { filePath: context.document.filePath, key: ENABLE_ONLY_DIRECTIVE },
      );
    }
    const wanted = [...new Set(value.map((name) => String(name).trim()))];
    const present = context.enumerate(BLOCK_SECTION);

    const writes: ExpandedWrite[] = present.map((name) => ({
      key: `${BLOCK_SECTION}.${name}`,
      value: wanted.includes(name),
    }));
    for (const name of wanted) {
      if (!present.includes(name)) {
        writes.push({ key: `${BLOCK_SECTION}.${name}`, value: true });
      }
    }
    return writes;
  },
};

// =============================================================================
// Registry
// =============================================================================

export const DIRECTIVES: readonly DirectiveDefinition[] = Object.freeze([rollingOutOfSample, enableOnlyBlocks]);

export function findDirective(key: string): DirectiveDefinition | undefined {
  return DIRECTIVES.find((directive) => directive.key === key);
}

export function isDirectiveKey(key: string): boolean {
  return findDirective(key) !== undefined;
}

export function expandDirective(key: string, value: unknown, context: DirectiveContext): ExpandedWrite[] {
  const directive = findDirective(key);
  if (!directive) {
    throw createValidationError(ValidationErrorCode.UNKNOWN_DIRECTIVE, `"${key}" is not a directive.`, {
      filePath: context.document.filePath,
      key,
    });
  }
  return directive.expand(value, context);
}
