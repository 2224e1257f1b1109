/**
 * In-memory implementations (no filesystem required)
 *
 * This module exports all implementations that work without filesystem access.
 * Suitable for testing.
 */

// TaskStore
export { MemoryTaskStore } from './task_store/memory';
