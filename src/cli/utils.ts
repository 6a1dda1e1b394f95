import chalk from 'chalk';
import fs from 'fs-extra';
import yaml from 'js-yaml';
import { fileURLToPath } from 'url';
import { TaskGraph } from '../core/task-graph.js';
import { FileUtils } from '../utils/file-utils.js';
import logger from '../logger.js';

export const OUTPUT_FORMATS = ['table', 'json', 'yaml'] as const;
export type OutputFormat = typeof OUTPUT_FORMATS[number];

export type TableRow = Record<string, string | number | boolean | null | undefined>;

/**
 * CLI utilities for common operations
 */
export class CLIUtils {
  /**
   * Format structured data for console display. `table` expects a row list
   * or a flat key/value object.
   */
  static formatOutput(data: object, format: OutputFormat = 'table'): string {
    switch (format) {
      case 'json':
        return JSON.stringify(data, null, 2);

      case 'yaml':
        return yaml.dump(data, { indent: 2, lineWidth: 120, noRefs: true }).trimEnd();

      case 'table':
      default:
        return Array.isArray(data)
          ? this.formatArrayAsTable(data)
          : this.formatObjectAsTable(Object.entries(data));
    }
  }

  /**
   * Format rows as an aligned table; columns come from the first row
   */
  static formatArrayAsTable(rows: TableRow[]): string {
    if (rows.length === 0) {
      return 'No items found.';
    }

    const headers = Object.keys(rows[0]);
    const cell = (row: TableRow, header: string): string => String(row[header] ?? '');
    const widths = headers.map(header =>
      rows.reduce((width, row) => Math.max(width, cell(row, header).length), header.length)
    );

    const headerRow = headers.map((header, i) => header.padEnd(widths[i])).join(' | ');
    const separator = widths.map(width => '-'.repeat(width)).join('-|-');
    const dataRows = rows.map(row => headers.map((header, i) => cell(row, header).padEnd(widths[i])).join(' | '));

    return [headerRow, separator, ...dataRows].join('\n');
  }

  static formatObjectAsTable(entries: Array<[string, unknown]>): string {
    if (entries.length === 0) {
      return '';
    }
    const keyWidth = entries.reduce((width, [key]) => Math.max(width, key.length), 0);
    return entries.map(([key, value]) => `${key.padEnd(keyWidth)} : ${String(value)}`).join('\n');
  }

  /**
   * Read a serialized graph snapshot from disk
   */
  static async loadGraph(filePath: string): Promise<TaskGraph> {
    const data = await FileUtils.readJsonFile(filePath);
    const graph = TaskGraph.fromDict(data);
    logger.debug({ filePath, graphId: graph.id }, 'Loaded graph for CLI');
    return graph;
  }

  /**
   * Whether the script Node was started with is the module at `moduleUrl`.
   * Both sides are resolved through symlinks, so the `bin` link npm installs
   * matches the compiled file it points at.
   */
  static isEntryPoint(scriptPath: string | undefined, moduleUrl: string): boolean {
    if (!scriptPath) {
      return false;
    }
    try {
      return fs.realpathSync(scriptPath) === fs.realpathSync(fileURLToPath(moduleUrl));
    } catch (error) {
      logger.debug({ err: error, scriptPath }, 'Could not resolve CLI entry point');
      return false;
    }
  }

  static success(message: string): void {
    console.log(chalk.green(`✓ ${message}`));
  }

  static warning(message: string): void {
    console.warn(chalk.yellow(`⚠ ${message}`));
  }

  static info(message: string): void {
    console.log(chalk.blue(`ℹ ${message}`));
  }

  static heading(message: string): void {
    console.log(chalk.bold(message));
  }
}
