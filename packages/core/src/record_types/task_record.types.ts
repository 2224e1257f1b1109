/**
 * Task record types shared by the reader and both executables.
 *
 * Fields are read best-effort: only `id` must be present, and every field
 * keeps whatever JSON value the file holds. A truthy `passes` means passing;
 * the display helpers in task_summary turn the text fields into strings.
 */

/**
 * A single unit of work in the task file.
 */
export type TaskRecord = {
  /** Lookup key; `show-task` matches it against an integer */
  id: unknown;
  title?: unknown;
  description?: unknown;
  /** Gherkin-style text, stored and displayed verbatim */
  acceptanceCriteria?: unknown;
  passes?: unknown;
  [key: string]: unknown;
};

/**
 * Shape of the task file on disk: `{ "tasks": [...] }`.
 */
export type TaskStoreDocument = {
  tasks: TaskRecord[];
  [key: string]: unknown;
};

/**
 * A TaskRecord with every display default applied.
 */
export type TaskDetail = {
  id: unknown;
  title: string;
  passes: boolean;
  description: string;
  acceptanceCriteria: string;
};

/**
 * Completion counts over a task list, plus the tasks still failing.
 */
export type TaskStoreSummary = {
  total: number;
  passing: number;
  remaining: number;
  nextTask: TaskRecord | null;
  remainingTasks: TaskRecord[];
};
