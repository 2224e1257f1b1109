export { validateTaskStoreDocumentDetailed } from './task_store_validator';
export type { TaskStoreValidationResult } from './task_store_validator';

export { TaskCheckError, TaskStoreLoadError } from './errors';
export type { ValidationIssue } from './errors';
