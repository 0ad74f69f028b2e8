import { basename } from 'node:path';
import {
  commitPatchOutputs,
  loadConfigDocument,
  loadKeyPathMap,
  noopLogger,
  parseTemplate,
  patchTemplate,
  readTemplateFile,
  validationFailure,
  verifyPlan,
  type Logger,
  type PatchPlan,
  type ValidationResult,
} from '@stratpatch/core';
import { defaultOutputPath, diffPathFor } from '../lib/output-paths.js';

export interface PatchCommandOptions {
  templatePath: string;
  configPath: string;
  /** Explicit output file; defaults to a timestamped name under outputDir */
  outputPath?: string;
  outputDir: string;
  keyMapPath?: string;
  dryRun: boolean;
  /** Verify the written output (or the in-memory result in a dry run) */
  validate: boolean;
  logger?: Logger;
  now?: Date;
}

export interface PatchCommandResult {
  dryRun: boolean;
  templatePath: string;
  /** Where the output goes; nothing is written there in a dry run */
  outputPath: string;
  diffPath: string;
  plan: PatchPlan;
  diff: string;
  verification?: ValidationResult;
}

export async function runPatch(options: PatchCommandOptions): Promise<PatchCommandResult> {
  const logger = options.logger ?? noopLogger;
  const template = await readTemplateFile(options.templatePath);
  if (template.encoding !== 'utf-8') {
    logger.info(`Template decoded from ${template.encoding}; the output is written as UTF-8.`);
  }
  const config = await loadConfigDocument(options.configPath);
  const keyMap = await loadKeyPathMap(options.keyMapPath);
  logger.debug(`Key-path map: ${keyMap.source ?? '(inline)'}`);

  const outputPath = options.outputPath ?? defaultOutputPath(template.path, options.outputDir, options.now ?? new Date());
  const diffPath = diffPathFor(outputPath);

  const result = patchTemplate({
    templateText: template.text,
    config,
    keyMap,
    templatePath: template.path,
    outputName: basename(outputPath),
    logger,
  });

  if (options.dryRun) {
    const verification = options.validate ? verifyPlan(result.document, result.plan) : undefined;
    if (verification && !verification.valid) {
      throw validationFailure(verification);
    }
    return {
      dryRun: true,
      templatePath: template.path,
      outputPath,
      diffPath,
      plan: result.plan,
      diff: result.diff,
      verification,
    };
  }

  const committed = await commitPatchOutputs({
    outputPath,
    outputText: result.afterText,
    diffPath,
    diffText: result.diff,
    logger,
  });

  let verification: ValidationResult | undefined;
  if (options.validate) {
    // Read back what landed on disk, not the in-memory tree
    const written = await readTemplateFile(committed.outputPath);
    const reparsed = parseTemplate(written.text, { filePath: committed.outputPath });
    verification = verifyPlan(reparsed, result.plan, committed.outputPath);
    if (!verification.valid) {
      throw validationFailure(verification, committed.outputPath);
    }
  }

  return {
    dryRun: false,
    templatePath: template.path,
    outputPath: committed.outputPath,
    diffPath: committed.diffPath,
    plan: result.plan,
    diff: result.diff,
    verification,
  };
}
