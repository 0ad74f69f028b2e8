/**
 * Error creation helpers for the stratpatch error system.
 *
 * Provides factory functions for creating structured errors with
 * consistent formatting across all error categories.
 */

import {
  PatchError,
  type ErrorLocation,
  type ErrorSeverity,
  type ValidationIssue,
  type ValidationResult,
} from './types.js';
import { getErrorCategory, getErrorSeverity } from './codes.js';

/**
 * Options for creating a PatchError.
 */
export interface CreateErrorOptions {
  /** Error code (e.g., 'P001', 'V003') */
  code: string;
  message: string;
  location?: ErrorLocation;
  suggestion?: string;
  issues?: ValidationIssue[];
  /** Original error that caused this error */
  cause?: unknown;
}

/**
 * Creates a PatchError with the given options.
 *
 * The category and severity are inferred from the error code.
 */
export function createPatchError(options: CreateErrorOptions): PatchError {
  return new PatchError({
    ...options,
    category: getErrorCategory(options.code),
    severity: getErrorSeverity(options.code),
  });
}

/**
 * Creates a parser error (P-code).
 */
export function createParserError(
  code: string,
  message: string,
  options: {
    filePath?: string;
    context?: string;
    suggestion?: string;
    cause?: unknown;
  } = {},
): PatchError {
  return createPatchError({
    code,
    message,
    location: {
      filePath: options.filePath,
      context: options.context,
    },
    suggestion: options.suggestion,
    cause: options.cause,
  });
}

/**
 * Creates a validation error (V-code).
 */
export function createValidationError(
  code: string,
  message: string,
  options: {
    filePath?: string;
    key?: string;
    context?: string;
    suggestion?: string;
    issues?: ValidationIssue[];
  } = {},
): PatchError {
  return createPatchError({
    code,
    message,
    location: {
      filePath: options.filePath,
      key: options.key,
      context: options.context,
    },
    suggestion: options.suggestion,
    issues: options.issues,
  });
}

/**
 * Creates a runtime error (R-code).
 */
export function createRuntimeError(
  code: string,
  message: string,
  options: {
    filePath?: string;
    key?: string;
    context?: string;
    suggestion?: string;
    cause?: unknown;
  } = {},
): PatchError {
  return createPatchError({
    code,
    message,
    location: {
      filePath: options.filePath,
      key: options.key,
      context: options.context,
    },
    suggestion: options.suggestion,
    cause: options.cause,
  });
}

// =============================================================================
// Validation Issues
// =============================================================================

export function createValidationIssue(
  code: string,
  message: string,
  severity: ErrorSeverity,
  location: ErrorLocation,
  suggestion?: string,
): ValidationIssue {
  return {
    code,
    message,
    severity,
    location,
    suggestion,
  };
}

export function createErrorIssue(
  code: string,
  message: string,
  location: ErrorLocation,
  suggestion?: string,
): ValidationIssue {
  return createValidationIssue(code, message, 'error', location, suggestion);
}

export function createWarningIssue(
  code: string,
  message: string,
  location: ErrorLocation,
  suggestion?: string,
): ValidationIssue {
  return createValidationIssue(code, message, 'warning', location, suggestion);
}

/**
 * Builds a ValidationResult from a list of issues.
 */
export function buildValidationResult(issues: ValidationIssue[]): ValidationResult {
  const errors = issues.filter((i) => i.severity === 'error');
  const warnings = issues.filter((i) => i.severity === 'warning');

  return {
    valid: errors.length === 0,
    issues,
    errors,
    warnings,
  };
}

/**
 * Converts the first error of a failed validation into a thrown PatchError.
 * The remaining issues stay reachable through `error.issues`.
 */
export function validationFailure(result: ValidationResult, filePath?: string): PatchError {
  const [first] = result.errors;
  if (!first) {
    throw new Error('Cannot build a validation failure from a result without errors.');
  }
  const extra = result.errors.length - 1;
  const message = extra > 0 ? `${first.message} (and ${extra} more error${extra === 1 ? '' : 's'})` : first.message;
  return createValidationError(first.code, message, {
    filePath: filePath ?? first.location.filePath,
    key: first.location.key,
    context: first.location.context,
    suggestion: first.suggestion,
    issues: result.errors,
  });
}

// =============================================================================
// Error Formatting
// =============================================================================

function formatLocation(location: ErrorLocation | undefined, parts: string[]): void {
  if (!location) {
    return;
  }
  if (location.filePath) {
    parts.push(`  File: ${location.filePath}`);
  }
  if (location.key) {
    parts.push(`  Key: ${location.key}`);
  }
  if (location.context) {
    parts.push(`  Context: ${location.context}`);
  }
}

/**
 * Formats a PatchError for display.
 */
export function formatError(error: PatchError): string {
  const parts: string[] = [];

  parts.push(`[${error.code}] ${error.message}`);
  formatLocation(error.location, parts);

  if (error.suggestion) {
    parts.push(`  Suggestion: ${error.suggestion}`);
  }

  return parts.join('\n');
}

/**
 * Formats a ValidationIssue for display.
 */
export function formatValidationIssue(issue: ValidationIssue): string {
  const prefix = issue.severity === 'error' ? 'ERROR' : 'WARNING';
  const parts: string[] = [];

  parts.push(`${prefix} [${issue.code}]: ${issue.message}`);
  formatLocation(issue.location, parts);
  if (issue.suggestion) {
    parts.push(`  Suggestion: ${issue.suggestion}`);
  }

  return parts.join('\n');
}
