/**
 * ConfigManager Types
 */
import type { OriginalRecordPolicy } from '../entity_types';
import type { LogLevel } from '../logger';

export type VerificationSettings = {
  /** Endpoint of the OMC checking service (absolute URI). */
  endpoint: string;
  timeoutMs?: number;
  /** Multipart field carrying the document (default: 'file'). */
  fieldName?: string;
};

/**
 * Converter configuration as stored in omc-bridge.config.yml.
 * Every key is optional; ConfigManager fills in defaults.
 */
export type ConverterConfig = {
  identifierScope?: string;
  originalRecordPolicy?: OriginalRecordPolicy;
  progressInterval?: number;
  logLevel?: LogLevel;
  verification?: VerificationSettings;
};

/**
 * Options for one conversion pass after defaults and overrides are applied.
 */
export type ConversionOptions = {
  identifierScope: string;
  originalRecordPolicy: OriginalRecordPolicy;
  progressInterval: number;
};

export type ResolvedVerificationSettings = Required<VerificationSettings>;

/**
 * Values taken from the command line; they win over the file.
 */
export type ConfigOverrides = {
  identifierScope?: string;
  originalRecordPolicy?: OriginalRecordPolicy;
  endpoint?: string;
};

export interface IConfigManager {
  loadConfig(): Promise<ConverterConfig>;
  getConversionOptions(overrides?: ConfigOverrides): Promise<ConversionOptions>;
  getVerificationSettings(overrides?: ConfigOverrides): Promise<ResolvedVerificationSettings | null>;
  getLogLevel(): Promise<LogLevel | undefined>;
}
