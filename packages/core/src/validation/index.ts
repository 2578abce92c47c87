export { isConverterConfig, validateConverterConfigDetailed, formatAjvErrors } from './config_validator';
export { isVerificationReport, validateVerificationReportDetailed } from './verification_report_validator';
