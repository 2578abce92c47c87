export {
  OmcBridgeError,
  InputReadError,
  InputStructureError,
  OutputWriteError,
  ConfigurationError,
  DetailedValidationError,
  VerificationError,
  isErrorLike,
  describeCause,
  getErrorCode,
} from './errors';
export type { VerificationFailureReason, ValidationIssue, ValidationResult } from './errors';
