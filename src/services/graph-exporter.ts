import yaml from 'js-yaml';
import type { TaskGraph } from '../core/task-graph.js';
import { GraphAnalyzer } from '../core/graph-analyzer.js';
import type { SerializedGraph } from '../core/graph-schema.js';
import type { AnalysisReport, EdgeType, NodeStatus } from '../types/graph.js';
import { FileUtils } from '../utils/file-utils.js';
import { ValidationError } from '../utils/errors.js';
import logger from '../logger.js';

export const EXPORT_FORMATS = ['json', 'yaml', 'yml', 'dot', 'markdown', 'md'] as const;
export type ExportFormat = typeof EXPORT_FORMATS[number];

export type GraphDocument = SerializedGraph & { analysis?: AnalysisReport };

const STATUS_COLORS: Record<NodeStatus, string> = {
  pending: 'lightgray',
  ready: 'lightblue',
  running: 'yellow',
  completed: 'lightgreen',
  failed: 'red',
  cancelled: 'orange',
  blocked: 'pink'
};

const EDGE_STYLES: Record<EdgeType, string> = {
  dependency: 'solid',
  constraint: 'dashed',
  data_flow: 'dotted',
  conditional: 'dashed',
  weak: 'dotted'
};

export function isExportFormat(format: string): format is ExportFormat {
  return EXPORT_FORMATS.some(candidate => candidate === format);
}

function escapeDot(value: string): string {
  return value.replace(/\\/g, '\\\\').replace(/"/g, '\\"');
}

function escapeTableCell(value: string): string {
  return value.replace(/\|/g, '\\|');
}

/**
 * Renders a task graph, optionally with its analysis report, as JSON, YAML,
 * GraphViz DOT or Markdown.
 */
export class GraphExporter {
  private analyzer: GraphAnalyzer | null = null;

  constructor(private readonly graph: TaskGraph) {}

  exportJson(includeAnalysis: boolean = false): string {
    return JSON.stringify(this.buildDocument(includeAnalysis), null, 2);
  }

  exportYaml(includeAnalysis: boolean = false): string {
    return yaml.dump(this.buildDocument(includeAnalysis), {
      indent: 2,
      lineWidth: 120,
      noRefs: true
    });
  }

  /**
   * Nodes are filled by status; critical-path nodes are drawn bold
   */
  exportDot(includeLabels: boolean = true): string {
    if (this.graph.isAcyclic()) {
      this.graph.calculateCriticalPath();
    }

    const lines = [
      'digraph TaskGraph {',
      `  label="${escapeDot(this.graph.id)}";`,
      '  rankdir=TB;',
      '  node [shape=box];',
      ''
    ];

    for (const node of this.graph.getAllNodes()) {
      let label = escapeDot(node.name);
      if (includeLabels) {
        label += `\\n[${escapeDot(node.nodeType)}]\\nPri: ${node.priority}\\n${node.costModel.duration}s`;
      }
      const style = node.onCriticalPath ? 'filled,bold' : 'filled';
      lines.push(`  "${escapeDot(node.id)}" [label="${label}", fillcolor=${STATUS_COLORS[node.status]}, style="${style}"];`);
    }

    lines.push('');

    for (const edge of this.graph.getEdges()) {
      const attributes = [`style=${EDGE_STYLES[edge.edgeType]}`];
      if (edge.weight !== 1) {
        attributes.push(`label="${edge.weight}"`);
      }
      lines.push(`  "${escapeDot(edge.sourceId)}" -> "${escapeDot(edge.targetId)}" [${attributes.join(', ')}];`);
    }

    lines.push('}');
    return lines.join('\n');
  }

  exportMarkdown(includeAnalysis: boolean = false): string {
    const stats = this.graph.getStats();
    const lines = [
      `# Task Graph: ${this.graph.id}`,
      '',
      '## Statistics',
      `- **Nodes**: ${stats.nodeCount}`,
      `- **Edges**: ${stats.edgeCount}`,
      `- **Root Nodes**: ${stats.rootCount}`,
      `- **Leaf Nodes**: ${stats.leafCount}`,
      `- **Is Acyclic**: ${stats.isAcyclic}`,
      '',
      '## Nodes',
      '',
      '| Node ID | Name | Type | Priority | Status | Duration |',
      '|---------|------|------|----------|--------|----------|'
    ];

    for (const node of this.graph.getAllNodes()) {
      lines.push(
        `| ${escapeTableCell(node.id)} | ${escapeTableCell(node.name)} | ${escapeTableCell(node.nodeType)} | ` +
        `${node.priority} | ${node.status} | ${node.costModel.duration}s |`
      );
    }

    lines.push('', '## Edges', '', '| Source | Target | Type | Weight |', '|--------|--------|------|--------|');
    for (const edge of this.graph.getEdges()) {
      lines.push(`| ${escapeTableCell(edge.sourceId)} | ${escapeTableCell(edge.targetId)} | ${edge.edgeType} | ${edge.weight} |`);
    }

    lines.push('', '## Critical Path');
    if (stats.isAcyclic) {
      const { path, totalDuration } = this.graph.calculateCriticalPath();
      lines.push(`**Duration**: ${totalDuration.toFixed(2)}s`, '', '```', path.join(' -> '), '```');
    } else {
      lines.push('Not available: graph contains cycles');
    }
    lines.push('');

    if (includeAnalysis) {
      const report = this.getAnalyzer().getAnalysisReport();
      const { health, costs } = report;

      lines.push('## Analysis', '', `### Health: ${health.status.toUpperCase()} (${health.healthScore.toFixed(1)}/100)`);
      if (health.issues.length > 0) {
        lines.push('**Issues:**');
        for (const issue of health.issues) {
          lines.push(`- ${issue}`);
        }
      }

      lines.push(
        '',
        '### Resource Costs',
        `- **Sequential Duration**: ${costs.totalDurationSequential.toFixed(2)}s`,
        `- **Critical Path Duration**: ${costs.criticalPathDuration.toFixed(2)}s`,
        `- **Total Cost**: $${costs.totalCost.toFixed(2)}`,
        `- **Efficiency Ratio**: ${(costs.efficiencyRatio * 100).toFixed(2)}%`,
        ''
      );

      if (report.bottlenecks.length > 0) {
        lines.push('### Bottlenecks');
        for (const bottleneck of report.bottlenecks.slice(0, 3)) {
          lines.push(
            `- **${bottleneck.nodeName}**: ${bottleneck.type} (fan-in: ${bottleneck.fanIn}, fan-out: ${bottleneck.fanOut})`
          );
        }
        lines.push('');
      }
    }

    return lines.join('\n');
  }

  /**
   * Render in any supported format. DOT ignores `includeAnalysis`.
   */
  export(format: string, includeAnalysis: boolean = false): string {
    const normalized = format.toLowerCase();
    if (!isExportFormat(normalized)) {
      throw new ValidationError(`Unsupported format: ${format}. Supported: ${EXPORT_FORMATS.join(', ')}`, undefined, {
        format
      });
    }

    switch (normalized) {
      case 'json':
        return this.exportJson(includeAnalysis);
      case 'yaml':
      case 'yml':
        return this.exportYaml(includeAnalysis);
      case 'dot':
        return this.exportDot();
      case 'markdown':
      case 'md':
        return this.exportMarkdown(includeAnalysis);
    }
  }

  async saveToFile(filePath: string, format: string = 'json', includeAnalysis: boolean = false): Promise<void> {
    const content = this.export(format, includeAnalysis);
    await FileUtils.writeTextFile(filePath, content);
    logger.info({ graphId: this.graph.id, filePath, format }, 'Exported task graph');
  }

  private buildDocument(includeAnalysis: boolean): GraphDocument {
    const document: GraphDocument = this.graph.toDict();
    if (includeAnalysis) {
      document.analysis = this.getAnalyzer().getAnalysisReport();
    }
    return document;
  }

  private getAnalyzer(): GraphAnalyzer {
    if (!this.analyzer) {
      this.analyzer = new GraphAnalyzer(this.graph);
    }
    return this.analyzer;
  }
}

/**
 * Factory function to create a graph exporter instance
 */
export function createGraphExporter(graph: TaskGraph): GraphExporter {
  return new GraphExporter(graph);
}
