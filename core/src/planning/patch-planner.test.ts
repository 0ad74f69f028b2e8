import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { beforeAll, describe, expect, it, vi } from 'vitest';
import { parseConfigDocument } from '../config/config-document.js';
import { RuntimeErrorCode, ValidationErrorCode, WarningCode } from '../errors/index.js';
import { loadKeyPathMap, parseKeyPathMap } from '../mapping/key-path-map.js';
import type { KeyPathMap } from '../mapping/types.js';
import { parseTemplate } from '../template/parser.js';
import { serializeTemplate } from '../template/serializer.js';
import { TEST_FIXTURES_ROOT } from '../testing/catalog-paths.js';
import { countActions, hasChanges, planPatch } from './patch-planner.js';

const STRATEGY_FIXTURE = readFileSync(resolve(TEST_FIXTURES_ROOT, 'strategy.xml'), 'utf8');

const SMALL_MAP = parseKeyPathMap(`
sections:
  - section: options
    path: Root/Options/{field}
    fields:
      Alpha: integer
  - section: flags
    path: Root/Flags/Flag[@name='{field}']
    target: '@on'
    fields:
      '*': boolean
`);

let keyMap: KeyPathMap;

beforeAll(async () => {
  keyMap = await loadKeyPathMap();
});

function plan(configText: string, templateText = STRATEGY_FIXTURE, map: KeyPathMap = keyMap) {
  return planPatch({
    document: parseTemplate(templateText),
    config: parseConfigDocument(configText),
    keyMap: map,
  });
}

describe('planPatch', () => {
  it('classifies each write against the template', () => {
    const result = plan(`
build_mode:
  PopulationSize: 100
  Islands: 4
data_setup:
  swap_long: -1.5
`);

    expect(result.writes.map((write) => [write.key, write.action, write.currentValue, write.value])).toEqual([
      ['build_mode.PopulationSize', 'unchanged', '100', '100'],
      ['build_mode.Islands', 'update', '2', '4'],
      ['data_setup.swap_long', 'create', undefined, '-1.5'],
    ]);
    expect(countActions(result.writes, 'update')).toBe(1);
    expect(hasChanges(result)).toBe(true);
  });

  it('warns about locations that will be created', () => {
    const result = plan('data_setup:\n  swap_long: -1.5\n');

    expect(result.warnings).toEqual([
      {
        code: WarningCode.LOCATION_WILL_BE_CREATED,
        message: 'Strategy/BacktestSettings/SwapLong/text() will be created.',
        severity: 'warning',
        location: { key: 'data_setup.swap_long' },
        suggestion: undefined,
      },
    ]);
  });

  it('adds companion writes after their key', () => {
    const result = plan('ranking:\n  filters:\n    NetProfit_IS: 0\n');

    expect(result.writes.map((write) => [write.key, write.companion, write.value, write.action])).toEqual([
      ['ranking.filters.NetProfit_IS', false, '0', 'update'],
      ['ranking.filters.NetProfit_IS', true, 'true', 'update'],
    ]);
  });

  it('records which directive produced a write', () => {
    const result = plan('blocks:\n  enable_only: [RSIAbove]\n');

    expect(result.writes.map((write) => [write.key, write.value, write.action])).toEqual([
      ['blocks.ADXCrossDown', 'false', 'unchanged'],
      ['blocks.RSIAbove', 'true', 'unchanged'],
      ['blocks.BollingerBands', 'false', 'update'],
    ]);
    expect(result.writes[0].origin).toEqual({ kind: 'directive', directive: 'blocks.enable_only' });
  });

  it('reports no changes when every value is in place', () => {
    const result = plan('build_mode:\n  Islands: 2\nblocks:\n  RSIAbove: true\n');

    expect(hasChanges(result)).toBe(false);
    expect(result.warnings).toEqual([]);
  });

  it('merges writes of the same value to one location', () => {
    const result = plan('ranking:\n  filters:\n    NetProfit_IS: 0\nconditions:\n  NetProfit_IS: 0\n');

    expect(result.writes).toHaveLength(2);
  });

  it('rejects a rolling count beyond the mapped out-of-sample blocks', () => {
    expect(() =>
      plan('data_setup:\n  date_from: 2015-01-01\n  date_to: 2025-04-18\n  oos_blocks: rolling_1m_30\n'),
    ).toThrow(
      expect.objectContaining({
        code: ValidationErrorCode.INVALID_VALUE,
        message: 'data_setup.oos_blocks: "rolling_1m_30" needs 30 out-of-sample blocks, but the key-path map declares 24.',
      }),
    );
  });

  it('rejects two keys writing different values to one location', () => {
    expect(() => plan('ranking:\n  filters:\n    NetProfit_IS: 0\nconditions:\n  NetProfit_IS: 5\n')).toThrow(
      expect.objectContaining({ code: ValidationErrorCode.CONFLICTING_WRITES, location: expect.objectContaining({ key: 'conditions.NetProfit_IS' }) }),
    );
  });

  it('names both sides of a conflict with a directive', () => {
    expect(() => plan('blocks:\n  ADXCrossDown: true\n  enable_only: [RSIAbove]\n')).toThrow(
      '"blocks.ADXCrossDown" (blocks.enable_only) writes "false" to ' +
        "Strategy/Blocks/Block[@key='ADXCrossDown']/@use, which \"blocks.ADXCrossDown\" (configuration) sets to \"true\".",
    );
  });

  it('rejects a path that selects several elements', () => {
    const template = '<Root><Flags><Flag name="A"/><Flag name="A"/></Flags></Root>';

    expect(() => plan('flags:\n  A: true\n', template, SMALL_MAP)).toThrow('"flags.A" points at 2 elements of the template.');
  });

  it('rejects a template with a different root', () => {
    expect(() => plan('options:\n  Alpha: 1\n', '<Other/>', SMALL_MAP)).toThrow(
      '"options.Alpha" does not start at the template root <Other>.',
    );
  });

  it('refuses to replace the text of an element with children', () => {
    const template = '<Root><Options><Alpha><Nested/></Alpha></Options></Root>';

    expect(() => plan('options:\n  Alpha: 1\n', template, SMALL_MAP)).toThrow(
      expect.objectContaining({ code: RuntimeErrorCode.TEXT_TARGET_HAS_CHILDREN }),
    );
  });

  it('reports stages in order and stops before expansion on invalid keys', () => {
    const onStage = vi.fn();
    const input = {
      document: parseTemplate(STRATEGY_FIXTURE),
      keyMap,
      onStage,
    };

    planPatch({ ...input, config: parseConfigDocument('build_mode:\n  Islands: 4\n') });
    expect(onStage.mock.calls).toEqual([['validated'], ['expanded']]);

    onStage.mockClear();
    expect(() => planPatch({ ...input, config: parseConfigDocument('NotARealKey: 1\n') })).toThrow(
      'Unknown configuration key "NotARealKey".',
    );
    expect(onStage).not.toHaveBeenCalled();
  });

  it('leaves the template untouched', () => {
    const document = parseTemplate(STRATEGY_FIXTURE);
    planPatch({ document, config: parseConfigDocument('data_setup:\n  oos_blocks: rolling_3m_10\n'), keyMap });

    expect(serializeTemplate(document)).toBe(STRATEGY_FIXTURE);
  });
});
