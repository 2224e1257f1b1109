/**
 * Common command option interfaces for the task checker CLI
 */

import type { BaseCommandOptions } from '../interfaces/command';

export type { BaseCommandOptions };

/**
 * Options for commands that read the task file
 */
export interface TaskStoreCommandOptions extends BaseCommandOptions {
  file?: string;
}
