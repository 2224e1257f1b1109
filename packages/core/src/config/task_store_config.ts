import * as path from 'path';

/**
 * File name of the task store, looked up in the working directory.
 */
export const DEFAULT_TASK_STORE_FILE = 'project-tasks.json';

/**
 * Resolves the task file to an absolute path.
 *
 * @param file - Explicit path; relative paths are resolved against `cwd`
 * @param cwd - Base directory (default: process.cwd())
 */
export function resolveTaskStorePath(file: string = DEFAULT_TASK_STORE_FILE, cwd: string = process.cwd()): string {
  return path.resolve(cwd, file);
}
