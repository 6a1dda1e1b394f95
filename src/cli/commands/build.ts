import { Command, Option } from 'commander';
import { GraphBuilder, parseTaskList, parseWorkflow } from '../../services/graph-builder.js';
import type { TaskGraph } from '../../core/task-graph.js';
import { FileUtils } from '../../utils/file-utils.js';
import { CLIUtils } from '../utils.js';
import logger from '../../logger.js';

export const BUILD_MODES = ['tasks', 'workflow', 'sequential'] as const;

interface BuildOptions {
  mode: typeof BUILD_MODES[number];
  graphId?: string;
  output?: string;
}

function buildGraph(builder: GraphBuilder, input: unknown, options: BuildOptions): TaskGraph {
  switch (options.mode) {
    case 'tasks':
      return builder.fromTaskList(parseTaskList(input), { graphId: options.graphId });
    case 'workflow':
      return builder.fromWorkflow(parseWorkflow(input), options.graphId);
    case 'sequential':
      return builder.fromSequential(parseWorkflow(input), options.graphId);
  }
}

export function createBuildCommand(): Command {
  return new Command('build')
    .description('Build a task graph snapshot from a task list or workflow')
    .argument('<file>', 'Path to a JSON array of tasks or workflow steps')
    .addOption(new Option('--mode <mode>', 'How the input is interpreted').choices(BUILD_MODES).default('tasks'))
    .option('--graph-id <id>', 'Id of the built graph')
    .option('-o, --output <path>', 'Write the snapshot to a file instead of stdout')
    .action(async (file: string, options: BuildOptions) => {
      logger.info({ file, mode: options.mode }, 'Building graph via CLI');

      const input = await FileUtils.readJsonFile(file);
      const graph = buildGraph(new GraphBuilder(), input, options);
      const snapshot = graph.toJsonString();

      if (options.output) {
        await FileUtils.writeTextFile(options.output, snapshot);
        CLIUtils.success(`Built ${graph.id} (${graph.nodeCount} nodes, ${graph.edgeCount} edges) -> ${options.output}`);
        return;
      }

      console.log(snapshot);
    });
}
