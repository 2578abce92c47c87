/**
 * Error types for the omc-bridge core.
 *
 * Row- and field-level defects never reach these classes: they are absorbed by
 * the normalizer and the transformer. Everything here aborts a pass or a
 * verification and is surfaced to the caller.
 */

/**
 * Base class for all omc-bridge errors.
 */
export class OmcBridgeError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = this.constructor.name;
  }
}

/**
 * The input source could not be read (missing file, permissions, I/O failure).
 */
export class InputReadError extends OmcBridgeError {
  constructor(public readonly inputPath: string, cause?: unknown) {
    super(`Cannot read input ${inputPath}: ${describeCause(cause)}`, 'INPUT_READ_ERROR');
  }
}

/**
 * The input was readable but is not a usable task export.
 */
export class InputStructureError extends OmcBridgeError {
  constructor(public readonly inputPath: string, details: string) {
    super(`Malformed input ${inputPath}: ${details}`, 'INPUT_STRUCTURE_ERROR');
  }
}

/**
 * The output destination could not be written. No partial output is left behind.
 */
export class OutputWriteError extends OmcBridgeError {
  constructor(public readonly outputPath: string, cause?: unknown) {
    super(`Cannot write output ${outputPath}: ${describeCause(cause)}`, 'OUTPUT_WRITE_ERROR');
  }
}

/**
 * Configuration file exists but cannot be used.
 */
export class ConfigurationError extends OmcBridgeError {
  constructor(message: string) {
    super(message, 'CONFIGURATION_ERROR');
  }
}

/**
 * Error for detailed AJV validation failures with multiple field errors.
 */
export class DetailedValidationError extends OmcBridgeError {
  constructor(
    subject: string,
    public readonly errors: ValidationIssue[]
  ) {
    const errorSummary = errors
      .map(err => `${err.field}: ${err.message}`)
      .join(', ');

    super(`${subject} validation failed: ${errorSummary}`, 'DETAILED_VALIDATION_ERROR');
  }
}

export type VerificationFailureReason = 'NETWORK_ERROR' | 'HTTP_ERROR' | 'MALFORMED_REPORT';

/**
 * The external checking service could not be reached or answered with
 * something that is not a report. Never invalidates the produced document.
 */
export class VerificationError extends OmcBridgeError {
  constructor(message: string, public readonly reason: VerificationFailureReason) {
    super(`Verification failed (${reason}): ${message}`, 'VERIFICATION_ERROR');
  }
}

export type ValidationIssue = {
  field: string;
  message: string;
  value: unknown;
};

/**
 * Standard validation result shared by the ajv-backed validators.
 */
export interface ValidationResult {
  isValid: boolean;
  errors: ValidationIssue[];
}

/**
 * Structural check: errors raised by Node internals are not always instances
 * of this realm's Error (Jest runs tests in a separate context).
 */
export function isErrorLike(value: unknown): value is { message: string; name?: unknown } {
  return typeof value === 'object' && value !== null && 'message' in value && typeof value.message === 'string';
}

export function describeCause(cause: unknown): string {
  if (isErrorLike(cause)) {
    return cause.message;
  }
  return cause === undefined ? 'unknown error' : String(cause);
}

/**
 * System error code such as ENOENT, when the value carries one.
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
