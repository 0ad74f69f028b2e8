import { describe, expect, it } from 'vitest';
import { countDiffLines, reportDiff } from './diff-reporter.js';

describe('reportDiff', () => {
  it('is empty for identical snapshots', () => {
    expect(reportDiff('<R/>\n', '<R/>\n')).toBe('');
  });

  it('writes a unified diff with a/ and b/ headers', () => {
    expect(reportDiff('a\nb\nc\n', 'a\nB\nc\n')).toBe(
      ['--- a/template.xml', '+++ b/template.xml', '@@ -1,3 +1,3 @@', ' a', '-b', '+B', ' c', ''].join('\n'),
    );
  });

  it('names the output file on the +++ line', () => {
    const diff = reportDiff('a\n', 'a\nb\n', { fileName: 'strategy.xml', newFileName: 'strategy_2025-01-01T10-00.xml' });

    expect(diff).toBe(
      [
        '--- a/strategy.xml',
        '+++ b/strategy_2025-01-01T10-00.xml',
        '@@ -1,1 +1,2 @@',
        ' a',
        '+b',
        '',
      ].join('\n'),
    );
  });

  it('limits context around each change', () => {
    const before = ['1', '2', '3', '4', '5', '6', '7', ''].join('\n');
    const after = ['1', '2', '3', 'four', '5', '6', '7', ''].join('\n');

    expect(reportDiff(before, after, { context: 1 })).toBe(
      ['--- a/template.xml', '+++ b/template.xml', '@@ -3,3 +3,3 @@', ' 3', '-4', '+four', ' 5', ''].join('\n'),
    );
  });
});

describe('countDiffLines', () => {
  it('counts added and removed lines without the headers', () => {
    expect(countDiffLines(reportDiff('a\nb\nc\n', 'a\nB\nc\nd\n'))).toEqual({ added: 2, removed: 1 });
  });
});
