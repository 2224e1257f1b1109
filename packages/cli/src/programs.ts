import { Command } from 'commander';
import { CheckCommand } from './commands/check/check-command';
import { ShowCommand } from './commands/show/show-command';

const VERSION = '1.0.0';

/**
 * Builds the `check-tasks` program
 */
export function createCheckTasksProgram(): Command {
  const program = new Command();

  program
    .name('check-tasks')
    .version(VERSION);

  new CheckCommand().register(program);
  return program;
}

/**
 * Builds the `show-task` program
 */
export function createShowTaskProgram(): Command {
  const program = new Command();

  program
    .name('show-task')
    .version(VERSION);

  new ShowCommand().register(program);
  return program;
}

/**
 * Parses process.argv and runs the program; unexpected errors end the process with status 1
 */
export async function runProgram(program: Command, argv: string[] = process.argv): Promise<void> {
  try {
    await program.parseAsync(argv);
  } catch (error) {
    console.error("❌ Fatal error:", error);
    process.exit(1);
  }
}
