/**
 * JSON Schema validation utilities using Ajv.
 *
 * Schemas live in the top-level `schemas/` directory, which sits two levels
 * above this module both in `src/lib` and in the compiled `dist/lib`.
 */

import AjvDefault from 'ajv';
import type { ValidateFunction, ErrorObject } from 'ajv';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

/** File name of the effective configuration schema */
export const EFFECTIVE_CONFIG_SCHEMA = 'effective-config.schema.json';

/**
 * Result of schema validation.
 */
export interface ValidationResult<T> {
  /** Whether the data is valid */
  valid: boolean;
  /** Typed data if valid, null otherwise */
  data: T | null;
  /** Validation error messages if invalid */
  errors: string[];
}

/**
 * Returns the filesystem path of a bundled schema file.
 */
export function schemaPath(fileName: string): string {
  return fileURLToPath(new URL(`../../schemas/${fileName}`, import.meta.url));
}

/**
 * Loads and parses a JSON schema file.
 *
 * @throws Error if the schema file cannot be read or parsed
 */
export async function loadSchema(path: string): Promise<object> {
  try {
    const content = await readFile(path, 'utf-8');
    const parsed: unknown = JSON.parse(content);
    if (typeof parsed !== 'object' || parsed === null) {
      throw new Error('schema is not a JSON object');
    }
    return parsed;
  } catch (error) {
    throw new Error(
      `Failed to load schema from ${path}: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

function formatErrors(errors: ErrorObject[] | null | undefined): string[] {
  if (!errors) {
    return [];
  }
  return errors.map((error) => {
    const path = error.instancePath || error.schemaPath || '';
    const message = error.message || 'Validation error';
    return `${path ? `${path}: ` : ''}${message}`;
  });
}

/**
 * Validates data against a JSON schema using Ajv.
 */
export function validateWithSchema<T>(data: unknown, schema: object): ValidationResult<T> {
  // Type assertion needed due to NodeNext module resolution
  const Ajv = AjvDefault as unknown as new (options?: {
    strict?: boolean;
    allErrors?: boolean;
    allowUnionTypes?: boolean;
  }) => {
    compile: <S>(schema: object) => ValidateFunction<S>;
  };

  const ajv = new Ajv({ strict: true, allErrors: true, allowUnionTypes: true });
  const validate = ajv.compile<T>(schema);

  if (validate(data)) {
    return { valid: true, data, errors: [] };
  }

  return { valid: false, data: null, errors: formatErrors(validate.errors) };
}
