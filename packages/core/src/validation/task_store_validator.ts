import type { ErrorObject } from 'ajv';
import type { TaskStoreDocument } from '../record_types';
import { SchemaValidationCache, Schemas } from '../record_schemas';
import type { ValidationIssue } from './errors';

/**
 * Result of validating a parsed task file. The typed document is only
 * present when validation passed.
 */
export type TaskStoreValidationResult =
  | { isValid: true; document: TaskStoreDocument; errors: ValidationIssue[] }
  | { isValid: false; errors: ValidationIssue[] };

function formatAjvErrors(ajvErrors: ErrorObject[] | null | undefined): ValidationIssue[] {
  return (ajvErrors ?? []).map((error: ErrorObject) => ({
    field: error.instancePath.replace(/^\//, '') || String(error.params['missingProperty'] ?? 'root'),
    message: error.message ?? 'Unknown validation error',
    value: error.data
  }));
}

/**
 * Validates a parsed task file in a single schema pass.
 */
export function validateTaskStoreDocumentDetailed(data: unknown): TaskStoreValidationResult {
  const validateSchema = SchemaValidationCache.getValidatorFromSchema(Schemas.TaskStoreDocument);
  const isTaskStoreDocument = (value: unknown): value is TaskStoreDocument => validateSchema(value);

  if (isTaskStoreDocument(data)) {
    return { isValid: true, document: data, errors: [] };
  }

  return { isValid: false, errors: formatAjvErrors(validateSchema.errors) };
}
