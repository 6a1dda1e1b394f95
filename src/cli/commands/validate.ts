import { Command } from 'commander';
import chalk from 'chalk';
import { CLIUtils } from '../utils.js';
import { ValidationError } from '../../utils/errors.js';
import logger from '../../logger.js';

export function createValidateCommand(): Command {
  return new Command('validate')
    .description('Check a serialized task graph for cycles and inconsistent links')
    .argument('<file>', 'Path to a graph JSON snapshot')
    .action(async (file: string) => {
      logger.info({ file }, 'Validating graph via CLI');

      const graph = await CLIUtils.loadGraph(file);
      const result = graph.validate();

      if (result.isValid) {
        CLIUtils.success(`Graph ${graph.id} is valid (${graph.nodeCount} nodes, ${graph.edgeCount} edges)`);
        return;
      }

      console.error(chalk.red(`Graph ${graph.id} has ${result.errors.length} problem(s):`));
      for (const error of result.errors) {
        console.error(`  - ${error}`);
      }
      throw new ValidationError(`Graph ${graph.id} failed validation`, undefined, { errors: result.errors });
    });
}
