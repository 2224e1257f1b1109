/**
 * FsTaskStore - Filesystem implementation of TaskStore
 *
 * Reads the task file fresh on every call and never writes it back.
 */

import { promises as fs } from 'fs';
import type { TaskStore } from '../task_store';
import type { TaskRecord } from '../../record_types';
import { validateTaskStoreDocumentDetailed } from '../../validation/task_store_validator';
import { TaskStoreLoadError } from '../../validation/errors';
import { createLogger } from '../../logger';
import type { Logger } from '../../logger';

const defaultLogger = createLogger('[FsTaskStore] ');

/**
 * Filesystem-based TaskStore implementation.
 *
 * A missing file, invalid JSON or a wrong shape throws TaskStoreLoadError.
 *
 * @example
 * ```typescript
 * const store = new FsTaskStore(resolveTaskStorePath());
 * const tasks = await store.loadTasks();
 * ```
 */
export class FsTaskStore implements TaskStore {
  constructor(
    private readonly filePath: string,
    private readonly logger: Logger = defaultLogger
  ) { }

  getFilePath(): string {
    return this.filePath;
  }

  async loadTasks(): Promise<TaskRecord[]> {
    this.logger.debug(`Reading ${this.filePath}`);

    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TaskStoreLoadError(this.filePath, `cannot read file (${reason})`, { cause: error });
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TaskStoreLoadError(this.filePath, `invalid JSON (${reason})`, { cause: error });
    }

    const result = validateTaskStoreDocumentDetailed(data);
    if (!result.isValid) {
      const summary = result.errors.map(err => `${err.field}: ${err.message}`).join(', ');
      throw new TaskStoreLoadError(this.filePath, `invalid task file (${summary})`, { details: result.errors });
    }

    const { tasks } = result.document;
    this.warnOnDuplicateIds(tasks);
    this.logger.debug(`Loaded ${tasks.length} tasks`);
    return tasks;
  }

  /**
   * Ids are not required to be unique; lookups take the first match.
   */
  private warnOnDuplicateIds(tasks: TaskRecord[]): void {
    const seen = new Set<unknown>();
    for (const task of tasks) {
      if (seen.has(task.id)) {
        this.logger.warn(`Duplicate task id ${String(task.id)} in ${this.filePath}; lookups use the first`);
      }
      seen.add(task.id);
    }
  }
}
