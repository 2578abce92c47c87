export {
  ConfigManager,
  DEFAULT_PROGRESS_INTERVAL,
  DEFAULT_VERIFICATION_TIMEOUT_MS,
  DEFAULT_VERIFICATION_FIELD_NAME
} from './config_manager';
export type {
  IConfigManager,
  ConverterConfig,
  ConversionOptions,
  ConfigOverrides,
  VerificationSettings,
  ResolvedVerificationSettings
} from './config_manager.types';
