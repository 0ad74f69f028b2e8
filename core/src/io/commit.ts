import { mkdir, rename, rm, writeFile } from 'node:fs/promises';
import { basename, dirname, join, resolve } from 'node:path';
import { createRuntimeError, RuntimeErrorCode } from '../errors/index.js';
import { noopLogger, type Logger } from '../logger.js';

export interface CommitPatchInput {
  outputPath: string;
  outputText: string;
  diffPath: string;
  diffText: string;
  logger?: Logger;
}

export interface CommittedPatch {
  outputPath: string;
  diffPath: string;
}

function temporaryPath(target: string): string {
  return join(dirname(target), `.${basename(target)}.${process.pid}.tmp`);
}

/**
 * Writes the patched template and its diff.
 *
 * Both files are written to temporaries beside their targets first and
 * renamed only once both writes succeeded. The output is renamed before the
 * diff, so an output file without its diff marks an interrupted run.
 */
export async function commitPatchOutputs(input: CommitPatchInput): Promise<CommittedPatch> {
  const logger = input.logger ?? noopLogger;
  const outputPath = resolve(input.outputPath);
  const diffPath = resolve(input.diffPath);
  const outputTemp = temporaryPath(outputPath);
  const diffTemp = temporaryPath(diffPath);

  const step = async (target: string, action: () => Promise<void>) => {
    try {
      await action();
    } catch (error) {
      await Promise.all([rm(outputTemp, { force: true }), rm(diffTemp, { force: true })]);
      throw createRuntimeError(RuntimeErrorCode.IO_ERROR, `Cannot write "${target}".`, {
        filePath: target,
        cause: error,
      });
    }
  };

  await step(outputPath, async () => {
    await mkdir(dirname(outputPath), { recursive: true });
    await mkdir(dirname(diffPath), { recursive: true });
  });
  await step(outputPath, () => writeFile(outputTemp, input.outputText, 'utf8'));
  await step(diffPath, () => writeFile(diffTemp, input.diffText, 'utf8'));
  await step(outputPath, () => rename(outputTemp, outputPath));
  logger.debug(`Wrote ${outputPath}`);
  await step(diffPath, () => rename(diffTemp, diffPath));
  logger.debug(`Wrote ${diffPath}`);

  return { outputPath, diffPath };
}
