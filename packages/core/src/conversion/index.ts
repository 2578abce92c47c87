export { ConversionModule } from './conversion_module';
export type {
  ConversionModuleDependencies,
  ConversionRequest,
  ConversionResult,
  IConversionModule,
} from './conversion_module.types';
