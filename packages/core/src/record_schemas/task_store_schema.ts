import type { SchemaObject } from 'ajv';

/**
 * JSON Schema for the task file.
 *
 * Only the container is checked: a `tasks` array of objects that each carry
 * an `id`. Field values are not typed.
 */
export const TaskStoreDocumentSchema = {
  type: 'object',
  required: ['tasks'],
  properties: {
    tasks: {
      type: 'array',
      items: {
        type: 'object',
        required: ['id']
      }
    }
  }
} satisfies SchemaObject;
