/**
 * Schema Validator
 *
 * AJV/JSON Schema validation for the user-editable documents in the state
 * directory: config.json, guardrails.json and tech-registry.json. Machine
 * written state (task graph, progress, deferred list) is validated with the
 * zod schemas in store/validation-schemas.ts instead.
 */

import AjvModule from 'ajv';
import addFormatsModule from 'ajv-formats';
import type { ValidateFunction, ErrorObject, SchemaObject } from 'ajv';
import { readFileSync, existsSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { TasklaneError } from '../errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import type { TasklaneConfig } from '../../types/config.js';
import type { GuardrailConfig, TechRegistry } from '../../types/scope.js';

// ajv and ajv-formats are CommonJS; under ESM the default import is module.exports.
const Ajv = AjvModule.default;
const addFormats = addFormatsModule.default;

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

/**
 * Individual validation error
 */
export interface ValidationError {
  path: string;
  message: string;
  keyword: string;
  params: Record<string, unknown>;
}

/** Document types with a JSON Schema under schemas/. */
export interface SchemaDocuments {
  config: Partial<TasklaneConfig>;
  guardrails: GuardrailConfig;
  'tech-registry': TechRegistry;
}

export type SchemaType = keyof SchemaDocuments;

const schemaCache: { [K in SchemaType]?: ValidateFunction<SchemaDocuments[K]> } = {};

let ajvInstance: InstanceType<typeof Ajv> | null = null;

function getAjv(): InstanceType<typeof Ajv> {
  if (!ajvInstance) {
    ajvInstance = new Ajv({
      allErrors: true,
      strict: false,
      validateFormats: true,
    });
    addFormats(ajvInstance);
  }
  return ajvInstance;
}

/**
 * Resolve path to a schema file.
 * Looks in TASKLANE_SCHEMAS_DIR, then the package's schemas/ directory
 * (three levels up from both src/core/validation and dist/core/validation).
 */
function resolveSchemaPath(schemaType: SchemaType): string | null {
  const filename = `${schemaType}.schema.json`;
  const here = dirname(fileURLToPath(import.meta.url));
  const candidates = [
    ...(process.env['TASKLANE_SCHEMAS_DIR'] ? [join(process.env['TASKLANE_SCHEMAS_DIR'], filename)] : []),
    join(here, '..', '..', '..', 'schemas', filename),
  ];

  for (const p of candidates) {
    if (existsSync(p)) {
      return p;
    }
  }

  return null;
}

function getValidator<K extends SchemaType>(schemaType: K): ValidateFunction<SchemaDocuments[K]> {
  const cached = schemaCache[schemaType];
  if (cached) {
    return cached;
  }

  const schemaPath = resolveSchemaPath(schemaType);
  if (!schemaPath) {
    throw new TasklaneError(
      ExitCode.FILE_ERROR,
      `Schema '${schemaType}' not found. Ensure the schemas/ directory is accessible.`,
    );
  }

  const schema: SchemaObject = JSON.parse(readFileSync(schemaPath, 'utf-8'));
  if (typeof schema !== 'object' || schema === null) {
    throw new TasklaneError(ExitCode.FILE_ERROR, `Schema '${schemaType}' is not a JSON object`);
  }
  const validate = getAjv().compile<SchemaDocuments[K]>(schema);
  schemaCache[schemaType] = validate;
  return validate;
}

function toValidationErrors(errors: ErrorObject[] | null | undefined): ValidationError[] {
  return (errors ?? []).map((err) => ({
    path: err.instancePath || '/',
    message: err.message ?? 'Validation failed',
    keyword: err.keyword,
    params: { ...err.params },
  }));
}

/**
 * Validate data against a tasklane schema.
 */
export function validateSchema(schemaType: SchemaType, data: unknown): ValidationResult {
  const validate = getValidator(schemaType);
  if (validate(data)) {
    return { valid: true, errors: [] };
  }
  return { valid: false, errors: toValidationErrors(validate.errors) };
}

/**
 * Validate a document and return it typed, or throw with every schema error listed.
 *
 * @param source - File the document came from, used in the error message
 */
export function parseDocument<K extends SchemaType>(
  schemaType: K,
  data: unknown,
  source: string,
  code: ExitCode = ExitCode.VALIDATION_ERROR,
): SchemaDocuments[K] {
  const validate = getValidator(schemaType);
  if (validate(data)) {
    return data;
  }
  const errors = toValidationErrors(validate.errors);
  throw new TasklaneError(
    code,
    `Invalid ${schemaType} document ${source}: ${errors.map((e) => `${e.path} ${e.message}`).join('; ')}`,
    { details: { source, errors } },
  );
}
