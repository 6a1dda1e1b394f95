import { Command, Option } from 'commander';
import { GraphExporter } from '../../services/graph-exporter.js';
import { CLIUtils } from '../utils.js';
import logger from '../../logger.js';

export const CLI_EXPORT_FORMATS = ['json', 'yaml', 'dot', 'markdown'] as const;

interface ExportOptions {
  format: typeof CLI_EXPORT_FORMATS[number];
  output?: string;
  withAnalysis?: boolean;
}

export function createExportCommand(): Command {
  return new Command('export')
    .description('Render a serialized task graph as JSON, YAML, DOT or Markdown')
    .argument('<file>', 'Path to a graph JSON snapshot')
    .addOption(new Option('--format <format>', 'Export format').choices(CLI_EXPORT_FORMATS).default('json'))
    .option('-o, --output <path>', 'Write to a file instead of stdout')
    .option('--with-analysis', 'Include the analysis report (ignored for dot)')
    .action(async (file: string, options: ExportOptions) => {
      logger.info({ file, format: options.format, output: options.output }, 'Exporting graph via CLI');

      const graph = await CLIUtils.loadGraph(file);
      const exporter = new GraphExporter(graph);
      const includeAnalysis = options.withAnalysis === true;

      if (options.output) {
        await exporter.saveToFile(options.output, options.format, includeAnalysis);
        CLIUtils.success(`Exported ${graph.id} to ${options.output}`);
        return;
      }

      console.log(exporter.export(options.format, includeAnalysis));
    });
}
