/**
 * TaskStore Interface
 *
 * Read-only access to the ordered task list. Enables backend-agnostic
 * loading (filesystem for the executables, memory for tests).
 */

import type { TaskRecord } from '../record_types';

/**
 * Implementations:
 * - FsTaskStore: reads a JSON task file on every call
 * - MemoryTaskStore: in-memory list for tests
 *
 * @example
 * ```typescript
 * const store = new FsTaskStore('/path/to/project-tasks.json');
 * const tasks = await store.loadTasks();
 * ```
 */
export interface TaskStore {
  /**
   * Load every task in file order.
   *
   * @throws TaskStoreLoadError if the backing data cannot be read or has the wrong shape
   */
  loadTasks(): Promise<TaskRecord[]>;
}
