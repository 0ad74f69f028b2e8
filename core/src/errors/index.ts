/**
 * stratpatch error system
 *
 * - P (Parser): parsing errors
 * - V (Validation): configuration validation errors
 * - R (Runtime): I/O and mutation errors
 * - W (Warnings): soft warnings
 */

// Types
export type {
  ErrorCategory,
  ErrorLocation,
  ErrorSeverity,
  ValidationIssue,
  ValidationResult,
} from './types.js';
export { PatchError, isPatchError } from './types.js';

// Error Codes
export {
  ParserErrorCode,
  ValidationErrorCode,
  RuntimeErrorCode,
  WarningCode,
  ERROR_CODE_CATEGORIES,
  getErrorCategory,
  getErrorSeverity,
} from './codes.js';
export type {
  ParserErrorCodeValue,
  ValidationErrorCodeValue,
  RuntimeErrorCodeValue,
  WarningCodeValue,
  ErrorCode,
} from './codes.js';

// Helpers
export type { CreateErrorOptions } from './helpers.js';
export {
  createPatchError,
  createParserError,
  createValidationError,
  createRuntimeError,
  createValidationIssue,
  createErrorIssue,
  createWarningIssue,
  buildValidationResult,
  validationFailure,
  formatError,
  formatValidationIssue,
} from './helpers.js';
