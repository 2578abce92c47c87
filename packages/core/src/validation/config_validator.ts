import type { ErrorObject } from 'ajv';
import type { ConverterConfig } from '../config_manager/config_manager.types';
import { SchemaValidationCache } from '../schemas/schema_cache';
import { ConverterConfigSchema } from '../schemas';
import type { ValidationIssue, ValidationResult } from '../errors';

export function formatAjvErrors(errors: ErrorObject[] | null | undefined): ValidationIssue[] {
  return (errors ?? []).map((error: ErrorObject) => ({
    field: error.instancePath.replace(/^\//, '') || String(error.params['missingProperty'] ?? 'root'),
    message: error.message ?? 'Unknown validation error',
    value: error.data
  }));
}

/**
 * Type guard to check if data is a valid ConverterConfig.
 */
export function isConverterConfig(data: unknown): data is ConverterConfig {
  const validateSchema = SchemaValidationCache.getValidatorFromSchema<ConverterConfig>(ConverterConfigSchema);
  return validateSchema(data);
}

/**
 * Validates a configuration object and returns the detailed result.
 */
export function validateConverterConfigDetailed(data: unknown): ValidationResult {
  const validateSchema = SchemaValidationCache.getValidatorFromSchema<ConverterConfig>(ConverterConfigSchema);
  const isValid = validateSchema(data);

  return {
    isValid,
    errors: isValid ? [] : formatAjvErrors(validateSchema.errors)
  };
}
