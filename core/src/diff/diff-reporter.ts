import { structuredPatch } from 'diff';

export interface DiffOptions {
  /** Name shown on the `---` line; defaults to "template.xml" */
  fileName?: string;
  /** Name shown on the `+++` line; defaults to fileName */
  newFileName?: string;
  /** Lines of context around each change */
  context?: number;
}

const DEFAULT_FILE_NAME = 'template.xml';
const DEFAULT_CONTEXT = 3;

function formatRange(start: number, lines: number): string {
  // An empty range is anchored on the line before it
  const anchor = lines === 0 ? start - 1 : start;
  return `${anchor},${lines}`;
}

/**
 * Unified diff between two serialized snapshots. Identical snapshots give
 * the empty string.
 */
export function reportDiff(before: string, after: string, options: DiffOptions = {}): string {
  if (before === after) {
    return '';
  }
  const fileName = options.fileName ?? DEFAULT_FILE_NAME;
  const newFileName = options.newFileName ?? fileName;
  const patch = structuredPatch(`a/${fileName}`, `b/${newFileName}`, before, after, '', '', {
    context: options.context ?? DEFAULT_CONTEXT,
  });
  if (patch.hunks.length === 0) {
    return '';
  }

  const lines = [`--- ${patch.oldFileName}`, `+++ ${patch.newFileName}`];
  for (const hunk of patch.hunks) {
    lines.push(`@@ -${formatRange(hunk.oldStart, hunk.oldLines)} +${formatRange(hunk.newStart, hunk.newLines)} @@`);
    lines.push(...hunk.lines);
  }
  return `${lines.join('\n')}\n`;
}

export interface DiffStats {
  added: number;
  removed: number;
}

/**
 * Counts changed lines of a unified diff, ignoring the file headers.
 */
export function countDiffLines(diff: string): DiffStats {
  let added = 0;
  let removed = 0;
  for (const line of diff.split('\n')) {
    if (line.startsWith('+++') || line.startsWith('---')) {
      continue;
    }
    if (line.startsWith('+')) {
      added += 1;
    } else if (line.startsWith('-')) {
      removed += 1;
    }
  }
  return { added, removed };
}
