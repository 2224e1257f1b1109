export { FsTaskStore } from './fs_task_store';
