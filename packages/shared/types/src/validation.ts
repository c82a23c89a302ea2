/**
 * Runtime validation using TypeBox schemas
 */

import { TypeCompiler, type TypeCheck } from '@sinclair/typebox/compiler';
import type { ValueError } from '@sinclair/typebox/value';
import type { TSchema, Static } from '@sinclair/typebox';
import { ProviderCompletionSchema, type ProviderCompletionType } from './schemas.js';

// ============================================================================
// Validation Error Types
// ============================================================================

/**
 * Validation error with detailed information
 */
export interface ValidationError {
  /** Field path that failed validation */
  path: string;
  /** Expected type or value */
  expected: string;
  /** Actual value received */
  received: unknown;
  /** Human-readable error message */
  message: string;
}

/**
 * Result of a validation operation
 */
export type ValidationResult<T> =
  | { success: true; data: T; errors?: undefined }
  | { success: false; data?: undefined; errors: ValidationError[] };

// ============================================================================
// Compiled Validators
// ============================================================================

/**
 * Cache for compiled type checkers
 * TypeBox compilers are expensive to create, so we cache them
 */
const compilerCache = new Map<TSchema, TypeCheck<TSchema>>();

function getCompiler<T extends TSchema>(schema: T): TypeCheck<T> {
  const cached = compilerCache.get(schema);
  if (cached) {
    return cached as TypeCheck<T>;
  }
  const compiler = TypeCompiler.Compile(schema);
  compilerCache.set(schema, compiler);
  return compiler;
}

// ============================================================================
// Core Validation Functions
// ============================================================================

/**
 * Get a descriptive type name from a TypeBox schema
 */
function getSchemaTypeName(schema: TSchema): string {
  if (typeof schema.$id === 'string') return schema.$id;
  if (typeof schema.type === 'string') return schema.type;
  if (Array.isArray(schema.anyOf)) return 'union';
  if (schema.const !== undefined) return `literal(${JSON.stringify(schema.const)})`;
  return 'unknown';
}

function convertError(error: ValueError): ValidationError {
  return {
    path: error.path,
    expected: getSchemaTypeName(error.schema),
    received: error.value,
    message: error.message,
  };
}

/**
 * Validate data against a TypeBox schema
 */
export function validate<T extends TSchema>(schema: T, data: unknown): ValidationResult<Static<T>> {
  const compiler = getCompiler(schema);

  if (compiler.Check(data)) {
    return { success: true, data };
  }

  return {
    success: false,
    errors: [...compiler.Errors(data)].map(convertError),
  };
}

/**
 * Flatten validation errors into `path: message` lines
 */
export function formatValidationErrors(errors: ValidationError[]): string[] {
  return errors.map((error) => `${error.path || '/'}: ${error.message}`);
}

// ============================================================================
// Pre-compiled Validators
// ============================================================================

/**
 * Validate a parsed provider reply
 */
export function validateProviderCompletion(data: unknown): ValidationResult<ProviderCompletionType> {
  return validate(ProviderCompletionSchema, data);
}

