import AjvModule from 'ajv';
import type { ErrorObject, ValidateFunction } from 'ajv';
import { ConfigurationError } from './errors.js';

/**
 * JSON Schema Validator
 *
 * Validates configuration structures (capability tables, classification
 * thresholds, stage descriptors) when they are loaded or constructed.
 */

const Ajv = AjvModule.default;

const ajv = new Ajv({
  allErrors: true,
  verbose: true,
  strict: false, // Stage descriptors may carry function-valued properties
});

/**
 * Validation Result
 */
export interface ValidationResult {
  valid: boolean;
  errors?: ErrorObject[];
}

/**
 * Validator class for JSON schema validation
 */
export class SchemaValidator {
  private validators: Map<string, ValidateFunction> = new Map();

  /**
   * Compile and cache a schema validator
   * @param schemaId Unique identifier for the schema
   * @param schema JSON schema object
   */
  compileSchema(schemaId: string, schema: object): ValidateFunction {
    const cached = this.validators.get(schemaId);
    if (cached) {
      return cached;
    }

    const compiled = ajv.compile(schema);
    this.validators.set(schemaId, compiled);
    return compiled;
  }

  /**
   * Validate data against a compiled schema
   * @param schemaId Schema identifier (must be compiled first)
   */
  validate(schemaId: string, data: unknown): ValidationResult {
    const compiled = this.validators.get(schemaId);

    if (!compiled) {
      throw new Error(
        `Schema '${schemaId}' not found. Call compileSchema() first.`
      );
    }

    const valid = compiled(data);

    return {
      valid,
      errors: compiled.errors || undefined,
    };
  }

  /**
   * Compile (once) and validate, throwing ConfigurationError on failure
   *
   * @param schemaId Schema identifier used for caching
   * @param schema JSON schema object
   * @param data Candidate configuration
   * @param label Human-readable name used in the error message
   */
  assertValid(schemaId: string, schema: object, data: unknown, label: string): void {
    this.compileSchema(schemaId, schema);
    const result = this.validate(schemaId, data);

    if (!result.valid) {
      throw new ConfigurationError(
        `Invalid ${label}:\n${this.formatErrors(result.errors)}`,
        result.errors
      );
    }
  }

  /**
   * Format validation errors as a readable string
   * @param errors AJV error objects
   */
  formatErrors(errors?: ErrorObject[]): string {
    if (!errors || errors.length === 0) {
      return 'No errors';
    }

    return errors
      .map((error) => {
        const path = error.instancePath || 'root';
        const message = error.message || 'validation failed';
        const params = JSON.stringify(error.params);
        return `  • ${path}: ${message} ${params}`;
      })
      .join('\n');
  }
}

/**
 * Global validator instance
 */
export const validator = new SchemaValidator();
