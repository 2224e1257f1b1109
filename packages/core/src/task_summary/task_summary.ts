import type { TaskDetail, TaskRecord, TaskStoreSummary } from '../record_types';
import type { TaskIdArgument } from './task_summary.types';

const TASK_ID_PATTERN = /^[+-]?\d+$/;

/**
 * A task passes when its `passes` field is truthy.
 */
export function isPassing(task: TaskRecord): boolean {
  return Boolean(task.passes);
}

/**
 * Display form of a field: strings as-is, absent or null as empty text,
 * any other JSON value in its JSON notation.
 */
export function renderField(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (value === undefined || value === null) {
    return '';
  }
  return JSON.stringify(value);
}

/**
 * Counts passing and remaining tasks. `nextTask` is the first remaining
 * task in file order, or null when every task passes.
 */
export function summarizeTasks(tasks: readonly TaskRecord[]): TaskStoreSummary {
  const passing = tasks.filter(isPassing);
  const remaining = tasks.filter(task => !isPassing(task));

  return {
    total: tasks.length,
    passing: passing.length,
    remaining: remaining.length,
    nextTask: remaining[0] ?? null,
    remainingTasks: remaining
  };
}

/**
 * First task with the given id, in file order.
 */
export function findTaskById(tasks: readonly TaskRecord[], id: number): TaskRecord | null {
  return tasks.find(task => task.id === id) ?? null;
}

export function toTaskDetail(task: TaskRecord): TaskDetail {
  return {
    id: task.id,
    title: renderField(task.title),
    passes: isPassing(task),
    description: renderField(task.description),
    acceptanceCriteria: renderField(task.acceptanceCriteria)
  };
}

export function parseTaskId(raw?: string): TaskIdArgument {
  if (raw === undefined) {
    return { kind: 'missing' };
  }

  const trimmed = raw.trim();
  if (!TASK_ID_PATTERN.test(trimmed)) {
    return { kind: 'invalid', raw };
  }

  const id = Number(trimmed);
  if (!Number.isSafeInteger(id)) {
    return { kind: 'invalid', raw };
  }

  // Number('-0') is -0
  return { kind: 'id', id: id === 0 ? 0 : id };
}

export function formatSummary(summary: TaskStoreSummary): string[] {
  const lines = [
    `Total: ${summary.total}`,
    `Passing: ${summary.passing}`,
    `Remaining: ${summary.remaining}`,
    ''
  ];

  if (summary.nextTask) {
    lines.push(
      'Next not-passing task:',
      `  ID: ${renderField(summary.nextTask.id)}`,
      `  Title: ${renderField(summary.nextTask.title)}`
    );
  } else {
    lines.push('All tasks are passing!');
  }

  return lines;
}

/**
 * Every remaining task as `  #<id>  <title>`, ids right-aligned to two columns.
 */
export function formatRemainingTasks(summary: TaskStoreSummary): string[] {
  return [
    '',
    'Remaining (passes=false):',
    ...summary.remainingTasks.map(task =>
      `  #${renderField(task.id).padStart(2)}  ${renderField(task.title)}`
    )
  ];
}

/**
 * The next remaining id alone, or an empty line when every task passes.
 */
export function formatNextTaskId(summary: TaskStoreSummary): string {
  return summary.nextTask ? renderField(summary.nextTask.id) : '';
}

export function formatTaskDetail(detail: TaskDetail): string[] {
  return [
    `# ${renderField(detail.id)}: ${detail.title}`,
    `passes: ${detail.passes}`,
    '',
    'Description:',
    detail.description,
    '',
    'Acceptance criteria (Gherkin):',
    detail.acceptanceCriteria
  ];
}
