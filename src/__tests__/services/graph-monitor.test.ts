import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { EventEmitter } from 'events';
import { GraphMonitor, createGraphMonitor, MONITOR_EVENTS, SOURCE_EVENTS } from '../../services/graph-monitor.js';
import type { NodeEventPayload } from '../../services/graph-monitor.js';
import { TaskGraph } from '../../core/task-graph.js';
import { TaskNode } from '../../core/task-node.js';
import { TaskEdge } from '../../core/task-edge.js';
import logger from '../../logger.js';

vi.mock('../../logger.js', () => ({
  default: {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn()
  }
}));

function chainGraph(): TaskGraph {
  const graph = new TaskGraph({ id: 'etl' });
  graph.addNode(new TaskNode({ id: 'A', name: 'Extract' }));
  graph.addNode(new TaskNode({ id: 'B', name: 'Transform' }));
  graph.addNode(new TaskNode({ id: 'C', name: 'Load' }));
  graph.addEdge(new TaskEdge({ sourceId: 'A', targetId: 'B' }));
  graph.addEdge(new TaskEdge({ sourceId: 'B', targetId: 'C' }));
  return graph;
}

describe('GraphMonitor', () => {
  let graph: TaskGraph;
  let monitor: GraphMonitor;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-06-01T12:00:00.000Z'));
    graph = chainGraph();
    monitor = createGraphMonitor(graph);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  describe('status updates', () => {
    it('should mark nodes and emit graph-level events', () => {
      const started: NodeEventPayload[] = [];
      const completed: NodeEventPayload[] = [];
      monitor.on(MONITOR_EVENTS.nodeStarted, (payload: NodeEventPayload) => started.push(payload));
      monitor.on(MONITOR_EVENTS.nodeCompleted, (payload: NodeEventPayload) => completed.push(payload));

      monitor.onNodeStart('A');
      monitor.onNodeComplete('A', 2.5);

      expect(started).toEqual([{ graphId: 'etl', nodeId: 'A', nodeName: 'Extract' }]);
      expect(completed).toEqual([{ graphId: 'etl', nodeId: 'A', nodeName: 'Extract', duration: 2.5 }]);
      expect(graph.getNode('A').status).toBe('completed');
      expect(graph.getNode('A').actualDuration).toBe(2.5);
    });

    it('should record failures with their message', () => {
      const failed = vi.fn();
      monitor.on(MONITOR_EVENTS.nodeFailed, failed);

      monitor.onNodeStart('B');
      monitor.onNodeFail('B', 'out of memory');

      expect(failed).toHaveBeenCalledWith({ graphId: 'etl', nodeId: 'B', nodeName: 'Transform', error: 'out of memory' });
      expect(graph.getNode('B').errorMessage).toBe('out of memory');
      expect(monitor.getEvents().map(event => event.event)).toEqual(['started', 'failed']);
    });

    it('should change status directly without touching counters', () => {
      const changed = vi.fn();
      monitor.on(MONITOR_EVENTS.nodeStatusChanged, changed);

      monitor.updateNodeStatus('C', 'blocked');

      expect(changed).toHaveBeenCalledWith({
        graphId: 'etl',
        nodeId: 'C',
        nodeName: 'Load',
        fromStatus: 'pending',
        toStatus: 'blocked'
      });
      expect(graph.getNode('C').status).toBe('blocked');
      expect(monitor.getLiveStats().pending).toBe(3);
    });

    it('should ignore events for unknown nodes', () => {
      const listener = vi.fn();
      monitor.on(MONITOR_EVENTS.nodeStarted, listener);

      monitor.onNodeStart('missing');
      monitor.onNodeComplete('missing');
      monitor.onNodeFail('missing', 'boom');
      monitor.updateNodeStatus('missing', 'ready');

      expect(listener).not.toHaveBeenCalled();
      expect(monitor.getEvents()).toEqual([]);
      expect(vi.mocked(logger.warn)).toHaveBeenCalledTimes(4);
    });

    it('should timestamp recorded events', () => {
      monitor.onNodeStart('A');

      expect(monitor.getEvents()).toEqual([{ nodeId: 'A', event: 'started', timestamp: '2024-06-01T12:00:00.000Z' }]);
    });

    it('should hand out copies of recorded events', () => {
      monitor.onNodeStart('A');
      const [event] = monitor.getEvents();
      event.nodeId = 'changed';

      expect(monitor.getEvents()[0].nodeId).toBe('A');
    });
  });

  describe('live stats', () => {
    it('should count nodes by execution state', () => {
      monitor.onNodeStart('A');
      monitor.onNodeComplete('A', 2.5);
      monitor.onNodeStart('B');
      monitor.onNodeFail('B', 'boom');
      monitor.onNodeStart('C');

      const stats = monitor.getLiveStats();

      expect(stats).toEqual({
        graphId: 'etl',
        totalNodes: 3,
        completed: 1,
        failed: 1,
        running: 1,
        pending: 0,
        totalDuration: 2.5,
        progressPercent: 100 / 3
      });
    });

    it('should move a retried node out of the failed set', () => {
      monitor.onNodeFail('A', 'flaky');
      monitor.onNodeStart('A');
      monitor.onNodeComplete('A');

      const stats = monitor.getLiveStats();
      expect(stats.failed).toBe(0);
      expect(stats.completed).toBe(1);
      expect(stats.running).toBe(0);
      expect(stats.totalDuration).toBe(0);
    });

    it('should move a restarted node back to running', () => {
      monitor.onNodeStart('A');
      monitor.onNodeFail('A', 'flaky');
      monitor.onNodeStart('A');

      expect(graph.getNode('A').status).toBe('running');
      expect(monitor.getLiveStats()).toMatchObject({ completed: 0, failed: 0, running: 1, pending: 2 });

      monitor.onNodeComplete('A', 1);
      monitor.onNodeStart('A');

      expect(monitor.getLiveStats()).toMatchObject({ completed: 0, failed: 0, running: 1, pending: 2 });
    });

    it('should stop counting nodes removed from the graph', () => {
      monitor.onNodeStart('A');
      monitor.onNodeComplete('A', 1);
      monitor.onNodeStart('C');
      graph.removeNode('A');
      graph.removeNode('C');

      expect(monitor.getLiveStats()).toMatchObject({ totalNodes: 1, completed: 0, running: 0, pending: 1 });
      expect(monitor.getProgress()).toBe(0);
    });

    it('should ignore events for a node after it is removed', () => {
      graph.removeNode('B');
      monitor.onNodeStart('B');

      expect(monitor.getLiveStats()).toMatchObject({ totalNodes: 2, running: 0, pending: 2 });
      expect(monitor.getEvents()).toEqual([]);
    });

    it('should not double count repeated completions', () => {
      monitor.onNodeComplete('A', 1);
      monitor.onNodeComplete('A', 1);

      expect(monitor.getLiveStats().completed).toBe(1);
      expect(monitor.getLiveStats().pending).toBe(2);
    });

    it('should report zero progress for an empty graph', () => {
      expect(new GraphMonitor(new TaskGraph()).getProgress()).toBe(0);
    });
  });

  describe('event source', () => {
    let source: EventEmitter;

    beforeEach(() => {
      source = new EventEmitter();
      monitor.attachToEventSource(source);
    });

    it('should apply task events from the source', () => {
      source.emit(SOURCE_EVENTS.started, { taskId: 'A' });
      source.emit(SOURCE_EVENTS.completed, { taskId: 'A', duration: 3 });
      source.emit(SOURCE_EVENTS.failed, { taskId: 'B' });

      expect(graph.getNode('A').status).toBe('completed');
      expect(graph.getNode('B').status).toBe('failed');
      expect(graph.getNode('B').errorMessage).toBe('Unknown error');
      expect(monitor.getLiveStats().totalDuration).toBe(3);
    });

    it('should drop malformed payloads', () => {
      source.emit(SOURCE_EVENTS.started, { id: 'A' });
      source.emit(SOURCE_EVENTS.completed, { taskId: 'A', duration: -1 });

      expect(graph.getNode('A').status).toBe('pending');
      expect(monitor.getEvents()).toEqual([]);
    });

    it('should stop listening once detached', () => {
      monitor.detachFromEventSource();
      source.emit(SOURCE_EVENTS.started, { taskId: 'A' });

      expect(graph.getNode('A').status).toBe('pending');
      expect(source.listenerCount(SOURCE_EVENTS.started)).toBe(0);
    });

    it('should leave the previous source when attaching to a new one', () => {
      const next = new EventEmitter();
      monitor.attachToEventSource(next);

      source.emit(SOURCE_EVENTS.started, { taskId: 'A' });
      next.emit(SOURCE_EVENTS.started, { taskId: 'B' });

      expect(graph.getNode('A').status).toBe('pending');
      expect(graph.getNode('B').status).toBe('running');
    });
  });

  describe('execution timing', () => {
    it('should return null before monitoring starts', () => {
      expect(monitor.getExecutionTime()).toBeNull();
    });

    it('should measure until monitoring stops', () => {
      monitor.startMonitoring();
      vi.setSystemTime(new Date('2024-06-01T12:00:04.000Z'));
      expect(monitor.getExecutionTime()).toBe(4);

      monitor.stopMonitoring();
      vi.setSystemTime(new Date('2024-06-01T12:00:30.000Z'));
      expect(monitor.getExecutionTime()).toBe(4);
    });

    it('should clear counters when monitoring restarts', () => {
      monitor.onNodeComplete('A', 1);
      monitor.startMonitoring();

      expect(monitor.getLiveStats().completed).toBe(0);
      expect(monitor.getEvents()).toEqual([]);
    });

    it('should forget everything on reset', () => {
      monitor.startMonitoring();
      monitor.onNodeStart('A');
      monitor.reset();

      expect(monitor.getExecutionTime()).toBeNull();
      expect(monitor.getLiveStats().running).toBe(0);
    });
  });

  describe('reports', () => {
    it('should combine structural health with execution progress', () => {
      monitor.onNodeComplete('A');
      monitor.onNodeFail('B', 'boom');

      expect(monitor.getHealthReport()).toEqual({
        graphId: 'etl',
        healthScore: 100,
        status: 'healthy',
        issues: [],
        executionProgress: 100 / 3,
        nodesFailed: 1,
        timestamp: '2024-06-01T12:00:00.000Z'
      });
    });

    it('should gather meta metrics', () => {
      const metrics = monitor.getMetaMetrics();

      expect(metrics.graphId).toBe('etl');
      expect(metrics.quality?.nodeCount).toBe(3);
      expect(metrics.costs.totalDurationSequential).toBe(3);
      expect(metrics.liveStats.pending).toBe(3);
      expect(metrics.health.status).toBe('healthy');
      expect(metrics.parallelizationIndex).toBeCloseTo(1 / 3, 10);
    });
  });
});
