export { createCheckTasksProgram, createShowTaskProgram, runProgram } from './programs';
export { CheckCommand } from './commands/check/check-command';
export type { CheckCommandOptions } from './commands/check/check-command';
export { ShowCommand, SHOW_TASK_USAGE } from './commands/show/show-command';
export type { ShowCommandOptions } from './commands/show/show-command';
export { DependencyInjectionService } from './services/dependency-injection';
export type { BaseCommandOptions, TaskStoreCommandOptions } from './types';
