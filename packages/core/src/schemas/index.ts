export { SchemaValidationCache } from './schema_cache';
export { ConverterConfigSchema } from './converter_config_schema';
export { VerificationReportSchema } from './verification_report_schema';
