/**
 * TaskStore - task list access abstraction
 *
 * IMPORTANT: This module only exports the interface.
 * For implementations, use:
 * - @taskcheck/core/fs for FsTaskStore
 * - @taskcheck/core/memory for MemoryTaskStore
 */

export type { TaskStore } from './task_store';
