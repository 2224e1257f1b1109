/**
 * MemoryTaskStore - In-memory implementation of TaskStore
 *
 * Useful for testing the executables without filesystem access.
 */

import type { TaskStore } from '../task_store';
import type { TaskRecord } from '../../record_types';

/**
 * In-memory TaskStore implementation for tests.
 *
 * @example
 * ```typescript
 * const store = new MemoryTaskStore();
 * store.setTasks([{ id: 1, title: 'A', passes: true }]);
 * const tasks = await store.loadTasks();
 * ```
 */
export class MemoryTaskStore implements TaskStore {
  private tasks: TaskRecord[];
  private loadCount = 0;

  constructor(tasks: TaskRecord[] = []) {
    this.tasks = [...tasks];
  }

  /**
   * Returns a copy of the stored list.
   */
  async loadTasks(): Promise<TaskRecord[]> {
    this.loadCount++;
    return [...this.tasks];
  }

  setTasks(tasks: TaskRecord[]): void {
    this.tasks = [...tasks];
  }

  /**
   * Number of loadTasks() calls, for asserting a store was never read.
   */
  getLoadCount(): number {
    return this.loadCount;
  }

  clear(): void {
    this.tasks = [];
    this.loadCount = 0;
  }
}
