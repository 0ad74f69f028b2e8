/**
 * Configuration Validator
 *
 * Checks a configuration document against a key-path map before anything
 * is expanded or written:
 * - every leaf key is a directive or resolves to a template location
 * - every value matches the type of its location
 *
 * Unknown keys are errors. Nothing is ignored silently.
 */

import {
  buildValidationResult,
  createErrorIssue,
  validationFailure,
  ValidationErrorCode,
  type ValidationIssue,
  type ValidationResult,
} from '../errors/index.js';
import type { ConfigDocument } from '../config/config-document.js';
import { isDirectiveKey } from '../expansion/directives.js';
import type { KeyPathEntry, KeyPathMap } from '../mapping/types.js';
import { formatValue } from '../mapping/values.js';

// =============================================================================
// Types
// =============================================================================

/**
 * A key/value pair checked against the map.
 */
export type CheckedWrite =
  | { ok: true; entry: KeyPathEntry; value: string }
  | { ok: false; issue: ValidationIssue };

export interface ValidateConfigurationOptions {
  /** Treat keys as directives; defaults to the built-in directive registry */
  isDirective?: (key: string) => boolean;
}

// =============================================================================
// Checks
// =============================================================================

function suggestKeys(key: string, map: KeyPathMap): string | undefined {
  const section = key.includes('.') ? key.slice(0, key.lastIndexOf('.')) : key;
  const siblings = map
    .entries()
    .filter((entry) => entry.section === section)
    .map((entry) => entry.field);
  if (siblings.length > 0) {
    const shown = siblings.slice(0, 6).join(', ');
    return `Known fields of "${section}": ${shown}${siblings.length > 6 ? ', ...' : ''}.`;
  }
  return 'Run "stratpatch keys:list" to see every supported key.';
}

/**
 * Resolves one key and formats its value for the template.
 */
export function checkWrite(key: string, value: unknown, map: KeyPathMap, filePath?: string): CheckedWrite {
  const entry = map.resolve(key);
  if (!entry) {
    return {
      ok: false,
      issue: createErrorIssue(
        ValidationErrorCode.MISSING_KEY,
        `Unknown configuration key "${key}".`,
        { filePath, key },
        suggestKeys(key, map),
      ),
    };
  }
  const formatted = formatValue(value, entry.valueType);
  if (!formatted.ok) {
    return {
      ok: false,
      issue: createErrorIssue(ValidationErrorCode.INVALID_VALUE, `${key}: ${formatted.reason}.`, { filePath, key }),
    };
  }
  return { ok: true, entry, value: formatted.value };
}

// =============================================================================
// Main Validation
// =============================================================================

/**
 * Validates every leaf of a configuration document. Directive values are
 * checked when they are expanded.
 */
export function validateConfiguration(
  document: ConfigDocument,
  map: KeyPathMap,
  options: ValidateConfigurationOptions = {},
): ValidationResult {
  const isDirective = options.isDirective ?? isDirectiveKey;
  const issues: ValidationIssue[] = [];

  for (const { key, value } of document.entries) {
    if (isDirective(key)) {
      continue;
    }
    const checked = checkWrite(key, value, map, document.filePath);
    if (!checked.ok) {
      issues.push(checked.issue);
    }
  }

  return buildValidationResult(issues);
}

/**
 * Throws the first validation error; the rest stay on `error.issues`.
 */
export function assertValidConfiguration(
  document: ConfigDocument,
  map: KeyPathMap,
  options: ValidateConfigurationOptions = {},
): void {
  const result = validateConfiguration(document, map, options);
  if (!result.valid) {
    throw validationFailure(result, document.filePath);
  }
}
