export { DEFAULT_TASK_STORE_FILE, resolveTaskStorePath } from './task_store_config';
