import Ajv from 'ajv';
import type { SchemaObject, ValidateFunction } from 'ajv';

/**
 * Singleton cache for schema validators to avoid repeated AJV compilation.
 */
export class SchemaValidationCache {
  private static schemaValidators = new Map<string, ValidateFunction>();
  private static ajv: Ajv | null = null;

  /**
   * Gets or creates a cached validator for a schema object.
   * @param schema The schema object (already parsed)
   * @returns Compiled AJV validator function
   */
  static getValidatorFromSchema(schema: SchemaObject): ValidateFunction {
    // Create a stable key from the schema object
    const schemaKey = JSON.stringify(schema);

    const cached = this.schemaValidators.get(schemaKey);
    if (cached) {
      return cached;
    }

    const validator = this.getAjv().compile(schema);
    this.schemaValidators.set(schemaKey, validator);
    return validator;
  }

  private static getAjv(): Ajv {
    if (!this.ajv) {
      this.ajv = new Ajv({ allErrors: true, verbose: true });
    }
    return this.ajv;
  }
}
