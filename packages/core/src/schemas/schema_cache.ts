import Ajv from 'ajv';
import type { SchemaObject, ValidateFunction } from 'ajv';
import addFormats from 'ajv-formats';

/**
 * Singleton cache for schema validators to avoid repeated AJV compilation.
 * Schemas are keyed by their `$id`.
 */
export class SchemaValidationCache {
  private static ajv: Ajv | null = null;

  private static getAjv(): Ajv {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true, verbose: true });
      addFormats(this.ajv);
    }
    return this.ajv;
  }

  /**
   * Gets or creates a cached validator for a schema object.
   * @param schema Schema carrying a `$id`
   * @returns Compiled AJV validator function, typed as a guard for T
   */
  static getValidatorFromSchema<T>(schema: SchemaObject & { $id: string }): ValidateFunction<T> {
    const ajv = this.getAjv();
    const cached = ajv.getSchema<T>(schema.$id);
    if (cached) {
      return cached;
    }

    return ajv.compile<T>(schema);
  }

  /**
   * Clears the cache (useful for testing or schema updates).
   */
  static clearCache(): void {
    this.ajv = null;
  }
}
