import { Command } from 'commander';
import { Config, TaskSummary } from '@taskcheck/core';
import { BaseCommand } from '../../base/base-command';
import type { TaskStoreCommandOptions } from '../../types';

export interface CheckCommandOptions extends TaskStoreCommandOptions {
  list?: boolean;
  nextId?: boolean;
}

/**
 * check-tasks: counts passing and remaining tasks and names the next one to work on.
 */
export class CheckCommand extends BaseCommand<CheckCommandOptions> {

  register(program: Command): void {
    program
      .description('Summarize task completion and show the next not-passing task')
      .option('-f, --file <path>', 'Task file to read', Config.DEFAULT_TASK_STORE_FILE)
      .option('-l, --list', 'List every remaining task after the summary')
      .option('-n, --next-id', 'Print only the next not-passing task id (empty line when all pass)')
      .option('--json', 'Output in JSON format')
      .option('-v, --verbose', 'Also show the underlying cause on failure')
      .action(async (options: CheckCommandOptions) => {
        await this.execute(options);
      });
  }

  async execute(options: CheckCommandOptions): Promise<void> {
    try {
      const tasks = await this.dependencyService.getTaskStore(options.file).loadTasks();
      const summary = TaskSummary.summarizeTasks(tasks);

      if (options.nextId) {
        this.handleSuccess(
          { nextId: summary.nextTask ? summary.nextTask.id : null },
          [TaskSummary.formatNextTaskId(summary)],
          options
        );
        return;
      }

      const lines = TaskSummary.formatSummary(summary);
      if (options.list) {
        lines.push(...TaskSummary.formatRemainingTasks(summary));
      }
      this.handleSuccess(summary, lines, options);
    } catch (error) {
      this.handleError(
        error instanceof Error ? error.message : String(error),
        options,
        error instanceof Error ? error : undefined
      );
    }
  }
}
