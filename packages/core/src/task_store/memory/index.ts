export { MemoryTaskStore } from './memory_task_store';
