import {
  buildValidationResult,
  createErrorIssue,
  RuntimeErrorCode,
  type ValidationIssue,
  type ValidationResult,
} from '../errors/index.js';
import type { PatchPlan } from '../planning/patch-planner.js';
import type { TemplateDocument } from '../template/types.js';
import { locate, readValue } from './locate.js';

/**
 * Re-reads every planned location and reports values that are not in place.
 * Used on the in-memory result and on the output file read back from disk.
 */
export function verifyPlan(document: TemplateDocument, plan: PatchPlan, filePath?: string): ValidationResult {
  const issues: ValidationIssue[] = [];
  for (const write of plan.writes) {
    const located = locate(document.root, write.location);
    const actual = located.kind === 'found' ? readValue(located.element, write.location.target) : undefined;
    if (actual !== write.value) {
      issues.push(
        createErrorIssue(
          RuntimeErrorCode.VERIFICATION_FAILED,
          `${write.key}: expected "${write.value}", found ${actual === undefined ? 'nothing' : `"${actual}"`}.`,
          { filePath, key: write.key, context: write.locationId },
        ),
      );
    }
  }
  return buildValidationResult(issues);
}
