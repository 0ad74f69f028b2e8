/**
 * Unified error code constants for stratpatch.
 *
 * Code format: {Category}{Number}
 * - P: Parser errors (P001-P099)
 * - V: Validation errors (V001-V099)
 * - R: Runtime errors (R001-R099)
 * - W: Warnings (W001-W099)
 */

// =============================================================================
// Parser Error Codes (P001-P099)
// =============================================================================

export const ParserErrorCode = {
  // P001-P009: Documents
  INVALID_TEMPLATE_XML: 'P001',
  INVALID_CONFIG_YAML: 'P002',
  INVALID_KEY_MAP: 'P003',
  INVALID_PATH_EXPRESSION: 'P004',
  DUPLICATE_CONFIG_KEY: 'P005',
} as const;

export type ParserErrorCodeValue = (typeof ParserErrorCode)[keyof typeof ParserErrorCode];

// =============================================================================
// Validation Error Codes (V001-V099)
// =============================================================================

export const ValidationErrorCode = {
  // V001-V009: Configuration keys and values
  MISSING_KEY: 'V001',
  UNKNOWN_DIRECTIVE: 'V002',
  INSUFFICIENT_RANGE: 'V003',
  INVALID_VALUE: 'V004',
  CONFLICTING_WRITES: 'V005',
  MISSING_BASE_RANGE: 'V006',
  AMBIGUOUS_LOCATION: 'V007',
} as const;

export type ValidationErrorCodeValue = (typeof ValidationErrorCode)[keyof typeof ValidationErrorCode];

// =============================================================================
// Runtime Error Codes (R001-R099)
// =============================================================================

export const RuntimeErrorCode = {
  IO_ERROR: 'R001',
  TEXT_TARGET_HAS_CHILDREN: 'R002',
  VERIFICATION_FAILED: 'R003',
} as const;

export type RuntimeErrorCodeValue = (typeof RuntimeErrorCode)[keyof typeof RuntimeErrorCode];

// =============================================================================
// Warning Codes (W001-W099)
// =============================================================================

export const WarningCode = {
  LOCATION_WILL_BE_CREATED: 'W001',
} as const;

export type WarningCodeValue = (typeof WarningCode)[keyof typeof WarningCode];

// =============================================================================
// Combined Types
// =============================================================================

/**
 * All error codes in the system.
 */
export type ErrorCode =
  | ParserErrorCodeValue
  | ValidationErrorCodeValue
  | RuntimeErrorCodeValue
  | WarningCodeValue;

/**
 * Maps error code prefixes to their categories.
 */
export const ERROR_CODE_CATEGORIES = {
  P: 'parser',
  V: 'validation',
  R: 'runtime',
  W: 'validation', // Warnings come from validation
} as const;

/**
 * Gets the category for an error code.
 */
export function getErrorCategory(code: string): 'parser' | 'validation' | 'runtime' {
  switch (code.charAt(0)) {
    case 'P':
      return ERROR_CODE_CATEGORIES.P;
    case 'V':
      return ERROR_CODE_CATEGORIES.V;
    case 'W':
      return ERROR_CODE_CATEGORIES.W;
    default:
      return ERROR_CODE_CATEGORIES.R;
  }
}

/**
 * Gets the severity for an error code.
 */
export function getErrorSeverity(code: string): 'error' | 'warning' {
  return code.startsWith('W') ? 'warning' : 'error';
}
