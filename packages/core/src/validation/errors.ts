/**
 * Error types for the task checker core.
 * These errors are thrown while reading and validating the task file.
 */

/**
 * A single field-level failure reported by schema validation.
 */
export type ValidationIssue = {
  field: string;
  message: string;
  value: unknown;
};

/**
 * Base error carrying a stable machine-readable code.
 */
export class TaskCheckError extends Error {
  constructor(message: string, public readonly code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

/**
 * Fatal failure to produce a task list: the file is missing or unreadable,
 * is not JSON, or does not have the task file shape.
 */
export class TaskStoreLoadError extends TaskCheckError {
  public readonly filePath: string;
  public readonly details: ValidationIssue[];

  constructor(
    filePath: string,
    reason: string,
    options: { cause?: unknown; details?: ValidationIssue[] } = {}
  ) {
    super(`Failed to load task store ${filePath}: ${reason}`, 'TASK_STORE_LOAD_ERROR', { cause: options.cause });
    this.filePath = filePath;
    this.details = options.details ?? [];
  }
}
