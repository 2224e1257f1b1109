export type {
  TaskRecord,
  TaskStoreDocument,
  TaskDetail,
  TaskStoreSummary
} from './task_record.types';
