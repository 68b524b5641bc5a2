import { Ajv } from 'ajv';
import type { ErrorObject, SchemaObject, ValidateFunction } from 'ajv';

/**
 * JSON Schema Validator
 *
 * Validates pipeline settings, rule items returned by the reasoning call
 * and rule files supplied by the caller
 */

const ajv = new Ajv({
  allErrors: true,
  verbose: true,
  strict: false, // Allow additional properties
});

/**
 * Validation Result
 */
export interface ValidationResult<T> {
  valid: boolean;
  errors?: ErrorObject[];
  data?: T;
}

/**
 * Typed validator compiled once from a JSON schema
 */
export class SchemaValidator<T> {
  private readonly validateFn: ValidateFunction<T>;

  constructor(
    readonly schemaId: string,
    schema: SchemaObject
  ) {
    this.validateFn = ajv.compile<T>(schema);
  }

  /**
   * Narrow unknown data to T
   */
  is(data: unknown): data is T {
    return this.validateFn(data);
  }

  validate(data: unknown): ValidationResult<T> {
    if (this.validateFn(data)) {
      return { valid: true, data };
    }
    return {
      valid: false,
      errors: this.validateFn.errors ?? undefined,
    };
  }
}

/**
 * Format validation errors as readable lines
 * @param errors AJV error objects
 */
export function formatErrors(errors?: ErrorObject[]): string[] {
  if (!errors || errors.length === 0) {
    return [];
  }

  return errors.map((error) => {
    const path = error.instancePath || 'root';
    const message = error.message || 'validation failed';
    const params = JSON.stringify(error.params);
    return `${path}: ${message} ${params}`;
  });
}
