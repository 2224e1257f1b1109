import { Command } from 'commander';
import { Config, TaskSummary } from '@taskcheck/core';
import { BaseCommand } from '../../base/base-command';
import type { TaskStoreCommandOptions } from '../../types';

export interface ShowCommandOptions extends TaskStoreCommandOptions { }

export const SHOW_TASK_USAGE = 'Usage: show-task <task_id>';

/**
 * show-task: prints every field of one task, looked up by numeric id.
 */
export class ShowCommand extends BaseCommand<ShowCommandOptions> {

  register(program: Command): void {
    program
      .description('Show the full detail of one task')
      .argument('[taskId]', 'Numeric id of the task')
      .allowExcessArguments(true)
      .option('-f, --file <path>', 'Task file to read', Config.DEFAULT_TASK_STORE_FILE)
      .option('--json', 'Output in JSON format')
      .option('-v, --verbose', 'Also show the underlying cause on failure')
      .action(async (taskId: string | undefined, options: ShowCommandOptions) => {
        await this.execute(taskId, options);
      });
  }

  async execute(rawTaskId: string | undefined, options: ShowCommandOptions): Promise<void> {
    const taskId = TaskSummary.parseTaskId(rawTaskId);
    if (taskId.kind !== 'id') {
      // The store is never read without a usable id
      return this.exitWithMessage(SHOW_TASK_USAGE, options);
    }

    try {
      const tasks = await this.dependencyService.getTaskStore(options.file).loadTasks();
      const task = TaskSummary.findTaskById(tasks, taskId.id);

      if (!task) {
        return this.exitWithMessage(`Task ${taskId.id} not found`, options);
      }

      const detail = TaskSummary.toTaskDetail(task);
      this.handleSuccess(detail, TaskSummary.formatTaskDetail(detail), options);
    } catch (error) {
      this.handleError(
        error instanceof Error ? error.message : String(error),
        options,
        error instanceof Error ? error : undefined
      );
    }
  }
}
