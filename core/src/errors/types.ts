/**
 * Shared error types for the stratpatch error system.
 *
 * - P (Parser): template, configuration and key-map parsing errors
 * - V (Validation): configuration validation errors
 * - R (Runtime): I/O and mutation errors
 * - W (Warnings): soft warnings reported with planned changes
 */

/**
 * Error categories.
 */
export type ErrorCategory = 'parser' | 'validation' | 'runtime';

/**
 * Severity level for issues.
 */
export type ErrorSeverity = 'error' | 'warning';

/**
 * Location information for an error.
 */
export interface ErrorLocation {
  /** File path (absolute) where the error occurred */
  filePath?: string;
  /** Configuration key the error belongs to (e.g., "build_mode.Islands") */
  key?: string;
  /** Element context (e.g., "path Strategy/BuildMode", "line 3") */
  context?: string;
}

/**
 * A single validation issue (error or warning).
 */
export interface ValidationIssue {
  /** Unique code for programmatic handling (e.g., "V001", "W001") */
  code: string;
  /** Human-readable message */
  message: string;
  severity: ErrorSeverity;
  location: ErrorLocation;
  /** Suggested fix (optional) */
  suggestion?: string;
}

/**
 * Result of validating a configuration document.
 */
export interface ValidationResult {
  /** True if there are no hard errors (warnings are allowed) */
  valid: boolean;
  issues: ValidationIssue[];
  errors: ValidationIssue[];
  warnings: ValidationIssue[];
}

/**
 * Base error for every failure raised by stratpatch.
 *
 * Carries a code for routing and display, plus enough location
 * information to fix the configuration without reading engine code.
 */
export class PatchError extends Error {
  /** Unique error code (e.g., 'P001', 'V003', 'R001') */
  readonly code: string;
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly location?: ErrorLocation;
  readonly suggestion?: string;
  /** All issues when the error summarises a failed validation */
  readonly issues?: ValidationIssue[];

  constructor(options: {
    code: string;
    message: string;
    category: ErrorCategory;
    severity: ErrorSeverity;
    location?: ErrorLocation;
    suggestion?: string;
    issues?: ValidationIssue[];
    cause?: unknown;
  }) {
    super(options.message, { cause: options.cause });
    this.name = 'PatchError';
    this.code = options.code;
    this.category = options.category;
    this.severity = options.severity;
    this.location = options.location;
    this.suggestion = options.suggestion;
    this.issues = options.issues;
  }
}

/**
 * Type guard to check if an error is a PatchError.
 */
export function isPatchError(error: unknown): error is PatchError {
  return error instanceof PatchError;
}
