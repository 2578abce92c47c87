import type { VerificationReport } from '../verification/verification.types';
import { SchemaValidationCache } from '../schemas/schema_cache';
import { VerificationReportSchema } from '../schemas';
import type { ValidationResult } from '../errors';
import { formatAjvErrors } from './config_validator';

export function isVerificationReport(data: unknown): data is VerificationReport {
  const validateSchema = SchemaValidationCache.getValidatorFromSchema<VerificationReport>(VerificationReportSchema);
  return validateSchema(data);
}

export function validateVerificationReportDetailed(data: unknown): ValidationResult {
  const validateSchema = SchemaValidationCache.getValidatorFromSchema<VerificationReport>(VerificationReportSchema);
  const isValid = validateSchema(data);

  return {
    isValid,
    errors: isValid ? [] : formatAjvErrors(validateSchema.errors)
  };
}
