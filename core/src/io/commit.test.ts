import { mkdir, mkdtemp, readdir, readFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { RuntimeErrorCode } from '../errors/index.js';
import { commitPatchOutputs } from './commit.js';

describe('commitPatchOutputs', () => {
  let tempRoot = '';

  beforeEach(async () => {
    tempRoot = await mkdtemp(join(tmpdir(), 'stratpatch-commit-'));
  });

  afterEach(async () => {
    await rm(tempRoot, { recursive: true, force: true });
  });

  it('writes the output and its diff, creating the directory', async () => {
    const outputPath = join(tempRoot, 'out', 'strategy.xml');
    const diffPath = join(tempRoot, 'out', 'strategy.diff');

    const committed = await commitPatchOutputs({ outputPath, outputText: '<R/>\n', diffPath, diffText: '' });

    expect(committed).toEqual({ outputPath, diffPath });
    expect(await readFile(outputPath, 'utf8')).toBe('<R/>\n');
    expect(await readFile(diffPath, 'utf8')).toBe('');
    expect((await readdir(join(tempRoot, 'out'))).sort()).toEqual(['strategy.diff', 'strategy.xml']);
  });

  it('leaves no temporary files behind when a rename fails', async () => {
    const outputPath = join(tempRoot, 'strategy.xml');
    const diffPath = join(tempRoot, 'strategy.diff');
    // A directory cannot be replaced by a file
    await mkdir(outputPath);

    await expect(
      commitPatchOutputs({ outputPath, outputText: '<R/>\n', diffPath, diffText: 'diff' }),
    ).rejects.toMatchObject({ code: RuntimeErrorCode.IO_ERROR, message: `Cannot write "${outputPath}".` });
    expect(await readdir(tempRoot)).toEqual(['strategy.xml']);
  });
});
