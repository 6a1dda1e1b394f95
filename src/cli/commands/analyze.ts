import { Command, Option } from 'commander';
import { GraphAnalyzer } from '../../core/graph-analyzer.js';
import type { AnalysisReport } from '../../types/graph.js';
import { CLIUtils, OUTPUT_FORMATS, type OutputFormat } from '../utils.js';
import logger from '../../logger.js';

interface AnalyzeOptions {
  format: OutputFormat;
}

/**
 * Human-readable summary of an analysis report
 */
export function renderAnalysisTable(report: AnalysisReport): string {
  const summary = CLIUtils.formatObjectAsTable([
    ['Graph', report.graphId],
    ['Nodes', report.stats.nodeCount],
    ['Edges', report.stats.edgeCount],
    ['Acyclic', report.stats.isAcyclic],
    ['Health', `${report.health.healthScore} (${report.health.status})`],
    ['Parallelization index', report.parallelizationIndex.toFixed(2)],
    ['Redundancy score', report.redundancyScore.toFixed(2)],
    ['Critical path', report.criticalNodes.length > 0 ? report.criticalNodes.join(' -> ') : '-'],
    ['Critical duration', `${report.costs.criticalPathDuration}s`],
    ['Sequential duration', `${report.costs.totalDurationSequential}s`]
  ]);

  const sections = [summary];

  if (report.health.issues.length > 0) {
    sections.push(['Issues:', ...report.health.issues.map(issue => `- ${issue}`)].join('\n'));
  }

  if (report.bottlenecks.length > 0) {
    sections.push(
      ['Bottlenecks:', CLIUtils.formatArrayAsTable(report.bottlenecks.map(bottleneck => ({
        node: bottleneck.nodeId,
        type: bottleneck.type,
        fanIn: bottleneck.fanIn,
        fanOut: bottleneck.fanOut,
        score: bottleneck.bottleneckScore
      })))].join('\n')
    );
  }

  return sections.join('\n\n');
}

export function createAnalyzeCommand(): Command {
  return new Command('analyze')
    .description('Analyze a serialized task graph')
    .argument('<file>', 'Path to a graph JSON snapshot')
    .addOption(new Option('--format <format>', 'Output format').choices(OUTPUT_FORMATS).default('table'))
    .action(async (file: string, options: AnalyzeOptions) => {
      logger.info({ file, format: options.format }, 'Analyzing graph via CLI');

      const graph = await CLIUtils.loadGraph(file);
      const report = new GraphAnalyzer(graph).getAnalysisReport();

      console.log(options.format === 'table' ? renderAnalysisTable(report) : CLIUtils.formatOutput(report, options.format));
    });
}
