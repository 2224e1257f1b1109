/**
 * Filesystem-dependent implementations
 *
 * This module exports all implementations that require filesystem access.
 * Use @taskcheck/core/memory for in-memory alternatives.
 */

// TaskStore
export { FsTaskStore } from './task_store/fs';
