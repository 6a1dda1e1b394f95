import { Command, CommanderError } from 'commander';
import { createAnalyzeCommand } from './analyze.js';
import { createValidateCommand } from './validate.js';
import { createExportCommand } from './export.js';
import { createBuildCommand } from './build.js';
import logger from '../../logger.js';

export const CLI_NAME = 'task-graph';
export const CLI_VERSION = '1.0.0';

interface GlobalOptions {
  verbose?: boolean;
  quiet?: boolean;
}

/**
 * Main CLI program. Parse errors and failed actions reject from
 * `parseAsync` instead of exiting the process.
 */
export function createTaskGraphCLI(): Command {
  const program = new Command();

  program
    .name(CLI_NAME)
    .description('Build, validate, analyze and export task dependency graphs')
    .version(CLI_VERSION)
    .configureOutput({
      writeOut: (str) => process.stdout.write(str),
      writeErr: (str) => process.stderr.write(str),
      outputError: (str, write) => {
        logger.error({ cliError: str }, 'CLI command error');
        write(str);
      }
    });

  // Add global options
  program
    .option('-v, --verbose', 'Enable verbose logging')
    .option('-q, --quiet', 'Suppress non-error logging');

  program.exitOverride();

  program.hook('preAction', (thisCommand, actionCommand) => {
    const opts: GlobalOptions = thisCommand.opts();

    if (opts.verbose) {
      logger.level = 'debug';
    } else if (opts.quiet) {
      logger.level = 'error';
    }

    logger.debug({ command: actionCommand.name(), options: actionCommand.opts() }, 'Executing CLI command');
  });

  // Subcommands added this way do not inherit exitOverride or output settings on their own
  for (const command of [createAnalyzeCommand(), createValidateCommand(), createExportCommand(), createBuildCommand()]) {
    program.addCommand(command.copyInheritedSettings(program));
  }

  return program;
}

/**
 * Parse and execute CLI commands, returning the process exit code
 */
export async function executeTaskGraphCLI(args: string[] = process.argv): Promise<number> {
  const program = createTaskGraphCLI();

  try {
    await program.parseAsync(args);
    return 0;
  } catch (error) {
    if (error instanceof CommanderError) {
      // Help and version output end in a CommanderError with exit code 0
      if (error.exitCode !== 0) {
        logger.error({ code: error.code }, 'CLI command failed');
      }
      return error.exitCode;
    }

    logger.error({ err: error }, 'CLI execution failed');
    console.error(`Error: ${error instanceof Error ? error.message : 'An unexpected error occurred'}`);
    return 1;
  }
}
