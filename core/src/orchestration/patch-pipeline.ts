import type { ConfigDocument } from '../config/config-document.js';
import { reportDiff } from '../diff/diff-reporter.js';
import { noopLogger, type Logger } from '../logger.js';
import type { KeyPathMap } from '../mapping/types.js';
import { planPatch, type PatchPlan } from '../planning/patch-planner.js';
import { parseTemplate } from '../template/parser.js';
import { serializeTemplate } from '../template/serializer.js';
import type { TemplateDocument } from '../template/types.js';
import { applyPlan, type UpsertReport } from '../upsert/upsert-engine.js';

export type PipelineStage = 'loaded' | 'validated' | 'expanded' | 'mutated' | 'serialized';

export const PIPELINE_STAGES: readonly PipelineStage[] = ['loaded', 'validated', 'expanded', 'mutated', 'serialized'];

export interface PatchTemplateInput {
  /** Normalized template text */
  templateText: string;
  config: ConfigDocument;
  keyMap: KeyPathMap;
  /** Template location, used for error locations and diff headers */
  templatePath?: string;
  /** Name on the `+++` line of the diff */
  outputName?: string;
  logger?: Logger;
  onStage?: (stage: PipelineStage) => void;
}

export interface PatchResult {
  /** Template as the serializer writes it unpatched */
  beforeText: string;
  afterText: string;
  plan: PatchPlan;
  report: UpsertReport;
  /** Unified diff from beforeText to afterText; empty when nothing changed */
  diff: string;
  /** Patched tree */
  document: TemplateDocument;
}

function baseName(path: string): string {
  const parts = path.split(/[\\/]/);
  return parts[parts.length - 1] ?? path;
}

/**
 * Runs loaded -> validated -> expanded -> mutated -> serialized. Each stage
 * only starts once the previous one succeeded; nothing is written to disk.
 *
 * The diff compares against the unpatched template as serialized, so
 * normalization the serializer applies never shows up as a change.
 */
export function patchTemplate(input: PatchTemplateInput): PatchResult {
  const logger = input.logger ?? noopLogger;
  const stage = (name: PipelineStage) => {
    logger.debug(`Stage ${name} complete.`);
    input.onStage?.(name);
  };

  const document = parseTemplate(input.templateText, { filePath: input.templatePath });
  const beforeText = serializeTemplate(document);
  stage('loaded');

  const plan = planPatch({
    document,
    config: input.config,
    keyMap: input.keyMap,
    logger,
    onStage: stage,
  });

  const report = applyPlan(document, plan, { logger });
  stage('mutated');

  const afterText = serializeTemplate(document);
  stage('serialized');

  const fileName = input.templatePath ? baseName(input.templatePath) : undefined;
  const diff = reportDiff(beforeText, afterText, {
    fileName,
    newFileName: input.outputName ?? fileName,
  });

  return { beforeText, afterText, plan, report, diff, document };
}
