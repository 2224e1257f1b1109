export {
  isPassing,
  renderField,
  summarizeTasks,
  findTaskById,
  toTaskDetail,
  parseTaskId,
  formatSummary,
  formatRemainingTasks,
  formatNextTaskId,
  formatTaskDetail
} from './task_summary';

export type { TaskIdArgument } from './task_summary.types';
