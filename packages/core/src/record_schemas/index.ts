import { TaskStoreDocumentSchema } from './task_store_schema';

export { SchemaValidationCache } from './schema_cache';

export const Schemas = {
  TaskStoreDocument: TaskStoreDocumentSchema
} as const;
