import Ajv = require('ajv');
import * as fs from 'fs';
import * as path from 'path';
import { Logger } from '../utils/logger';

/**
 * Result of schema validation
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Validates plain data (parsed YAML or JSON) against JSON schemas
 * shipped in the package's `schemas/` directory
 */
export class SchemaValidator {
  private ajv: Ajv.Ajv;
  private schemaCache: Map<string, Ajv.ValidateFunction>;
  private logger: Logger;
  private schemaDir: string;

  constructor(schemaDir?: string) {
    this.ajv = new Ajv({
      allErrors: true  // Collect all errors, not just first
    });
    this.schemaCache = new Map();
    this.logger = Logger.getInstance();
    this.schemaDir = schemaDir || path.join(__dirname, '..', '..', 'schemas');
  }

  /**
   * Load and compile a JSON schema
   * @param schemaPath Path to the JSON schema file
   * @returns Compiled validation function
   */
  private loadSchema(schemaPath: string): Ajv.ValidateFunction {
    const cached = this.schemaCache.get(schemaPath);
    if (cached) {
      return cached;
    }

    try {
      const schema: unknown = JSON.parse(fs.readFileSync(schemaPath, 'utf8'));
      if (typeof schema !== 'object' || schema === null) {
        throw new Error(`Schema is not an object: ${schemaPath}`);
      }
      const validate = this.ajv.compile(schema);
      this.schemaCache.set(schemaPath, validate);
      this.logger.debug(`Loaded schema: ${schemaPath}`);
      return validate;
    } catch (error) {
      this.logger.error(`Failed to load schema ${schemaPath}:`, error instanceof Error ? error : undefined);
      throw error;
    }
  }

  /**
   * Validate data against a JSON schema
   * @param data Data to validate
   * @param schemaPath Path to the JSON schema file
   */
  validate(data: unknown, schemaPath: string): ValidationResult {
    const validate = this.loadSchema(schemaPath);
    const valid = validate(data) === true;
    return {
      valid,
      errors: !valid && validate.errors ? this.formatErrors(validate.errors) : []
    };
  }

  /**
   * Validate a parsed release configuration file
   */
  validateReleaseConfig(data: unknown): ValidationResult {
    return this.validate(data, path.join(this.schemaDir, 'release-config.schema.json'));
  }

  /**
   * Format AJV errors into user-friendly messages
   */
  private formatErrors(errors: Ajv.ErrorObject[]): string[] {
    return errors.map(error => {
      const dataPath = error.dataPath || '(root)';
      const message = error.message || 'validation failed';
      const params = error.params;

      switch (error.keyword) {
        case 'required':
          return 'missingProperty' in params
            ? `Missing required field: ${params.missingProperty}`
            : `${dataPath}: ${message}`;
        case 'pattern':
          return 'pattern' in params
            ? `${dataPath}: ${message} (expected pattern: ${params.pattern})`
            : `${dataPath}: ${message}`;
        case 'enum':
          return 'allowedValues' in params && Array.isArray(params.allowedValues)
            ? `${dataPath}: ${message} (allowed values: ${params.allowedValues.join(', ')})`
            : `${dataPath}: ${message}`;
        case 'type':
          return 'type' in params ? `${dataPath}: must be ${params.type}` : `${dataPath}: ${message}`;
        case 'additionalProperties':
          return 'additionalProperty' in params
            ? `${dataPath}: has unexpected property '${params.additionalProperty}'`
            : `${dataPath}: ${message}`;
        default:
          return `${dataPath}: ${message}`;
      }
    });
  }

  /**
   * Clear the schema cache (useful for testing)
   */
  clearCache(): void {
    this.schemaCache.clear();
  }
}
