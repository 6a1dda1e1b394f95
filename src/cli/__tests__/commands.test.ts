/**
 * Task graph CLI tests
 * Runs each command against snapshot files in a temporary directory
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { executeTaskGraphCLI } from '../commands/index.js';
import { GraphBuilder } from '../../services/graph-builder.js';
import { TaskGraph } from '../../core/task-graph.js';

vi.mock('../../logger.js', () => ({
  default: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}));

const TASKS = [
  { id: 'a', name: 'Extract' },
  { id: 'b', name: 'Transform' },
  { id: 'c', name: 'Load' }
];

describe('task-graph CLI', () => {
  let tempDir: string;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;
  let snapshotPath: string;

  const run = (...args: string[]): Promise<number> => executeTaskGraphCLI(['node', 'task-graph', ...args]);
  const logged = (): string => logSpy.mock.calls.map(call => String(call[0])).join('\n');
  const errored = (): string => errorSpy.mock.calls.map(call => String(call[0])).join('\n');

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'task-graph-cli-'));
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
    vi.spyOn(process.stderr, 'write').mockImplementation(() => true);

    snapshotPath = path.join(tempDir, 'etl.json');
    const graph = new GraphBuilder().fromTaskList(TASKS, { graphId: 'etl' });
    await fs.writeFile(snapshotPath, graph.toJsonString());
  });

  afterEach(async () => {
    await fs.remove(tempDir);
  });

  describe('build', () => {
    it('should print a snapshot built from a task list', async () => {
      const input = path.join(tempDir, 'tasks.json');
      await fs.writeJson(input, TASKS);

      expect(await run('build', input, '--graph-id', 'nightly')).toBe(0);

      const graph = TaskGraph.fromDict(JSON.parse(logged()));
      expect(graph.id).toBe('nightly');
      expect(graph.topologicalSort()).toEqual(['a', 'b', 'c']);
    });

    it('should write a workflow graph to a file', async () => {
      const input = path.join(tempDir, 'workflow.json');
      const output = path.join(tempDir, 'out', 'workflow-graph.json');
      await fs.writeJson(input, [{ task: 'load_data' }, { task: 'transform_data' }]);

      expect(await run('build', input, '--mode', 'workflow', '-o', output)).toBe(0);

      const graph = TaskGraph.fromDict(await fs.readJson(output));
      expect(graph.id).toBe('workflow');
      expect(graph.hasEdge('load_data_0', 'transform_data_1')).toBe(true);
      expect(logged()).toContain(`Built workflow (2 nodes, 1 edges) -> ${output}`);
    });

    it('should fail on input that is not a task list', async () => {
      const input = path.join(tempDir, 'bad.json');
      await fs.writeJson(input, { tasks: [] });

      expect(await run('build', input)).toBe(1);
      expect(errored()).toBe('Error: Invalid task list');
    });
  });

  describe('validate', () => {
    it('should confirm a valid graph', async () => {
      expect(await run('validate', snapshotPath)).toBe(0);
      expect(logged()).toContain('Graph etl is valid (3 nodes, 2 edges)');
    });

    it('should list problems and fail for a cyclic snapshot', async () => {
      const cyclicPath = path.join(tempDir, 'loop.json');
      await fs.writeJson(cyclicPath, {
        graph_id: 'loop',
        nodes: { x: { id: 'x', name: 'X' }, y: { id: 'y', name: 'Y' } },
        edges: [
          { source_id: 'x', target_id: 'y' },
          { source_id: 'y', target_id: 'x' }
        ]
      });

      expect(await run('validate', cyclicPath)).toBe(1);

      const lines = errorSpy.mock.calls.map(call => String(call[0]));
      expect(lines).toContain('  - Graph contains cycles');
      expect(lines).toContain('Error: Graph loop failed validation');
    });
  });

  describe('analyze', () => {
    it('should print a summary table by default', async () => {
      expect(await run('analyze', snapshotPath)).toBe(0);

      const lines = logged().split('\n');
      expect(lines).toContain(`${'Graph'.padEnd(21)} : etl`);
      expect(lines).toContain(`${'Health'.padEnd(21)} : 100 (healthy)`);
      expect(lines).toContain(`${'Critical path'.padEnd(21)} : a -> b -> c`);
      expect(lines).toContain(`${'Critical duration'.padEnd(21)} : 3s`);
    });

    it('should print the full report as JSON', async () => {
      expect(await run('analyze', snapshotPath, '--format', 'json')).toBe(0);

      const report = JSON.parse(logged());
      expect(report.graphId).toBe('etl');
      expect(report.criticalNodes).toEqual(['a', 'b', 'c']);
      expect(report.redundancyScore).toBe(0.5);
    });

    it('should reject an unknown output format', async () => {
      expect(await run('analyze', snapshotPath, '--format', 'xml')).toBe(1);
      expect(logSpy).not.toHaveBeenCalled();
    });
  });

  describe('export', () => {
    it('should print DOT to stdout', async () => {
      expect(await run('export', snapshotPath, '--format', 'dot')).toBe(0);

      const lines = logged().split('\n');
      expect(lines[0]).toBe('digraph TaskGraph {');
      expect(lines).toContain('  "a" -> "b" [style=solid];');
    });

    it('should save Markdown with analysis to a file', async () => {
      const output = path.join(tempDir, 'report.md');

      expect(await run('export', snapshotPath, '--format', 'markdown', '--with-analysis', '-o', output)).toBe(0);

      const content = await fs.readFile(output, 'utf-8');
      expect(content.split('\n')).toContain('### Health: HEALTHY (100.0/100)');
      expect(logged()).toContain(`Exported etl to ${output}`);
    });
  });

  describe('errors', () => {
    it('should report a missing file', async () => {
      const missing = path.join(tempDir, 'missing.json');

      expect(await run('analyze', missing)).toBe(1);
      expect(errored()).toBe(`Error: File not found: ${missing}`);
    });

    it('should report an unreadable snapshot', async () => {
      const broken = path.join(tempDir, 'broken.json');
      await fs.writeFile(broken, '{ nope');

      expect(await run('validate', broken)).toBe(1);
      expect(errored()).toBe(`Error: Invalid JSON in ${broken}`);
    });

    it('should exit cleanly for --version', async () => {
      expect(await run('--version')).toBe(0);
    });

    it('should fail for an unknown command', async () => {
      expect(await run('explode')).toBe(1);
    });
  });
});
