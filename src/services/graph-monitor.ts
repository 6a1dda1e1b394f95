/**
 * Graph Monitor
 *
 * Follows task execution on a graph: status updates arrive either as direct
 * calls or from an external event source, are applied to the matching nodes
 * and re-emitted as graph-level events.
 */

import { EventEmitter } from 'events';
import { z } from 'zod';
import type { TaskGraph } from '../core/task-graph.js';
import { GraphAnalyzer } from '../core/graph-analyzer.js';
import type { CostSummary, GraphQuality, HealthStatus, NodeStatus } from '../types/graph.js';
import logger from '../logger.js';

/**
 * Events consumed from an attached source
 */
export const SOURCE_EVENTS = {
  started: 'task.started',
  completed: 'task.completed',
  failed: 'task.failed'
} as const;

/**
 * Events emitted by the monitor
 */
export const MONITOR_EVENTS = {
  nodeStarted: 'node_started',
  nodeCompleted: 'node_completed',
  nodeFailed: 'node_failed',
  nodeStatusChanged: 'node_status_changed'
} as const;

export const taskEventPayloadSchema = z.object({
  taskId: z.string().min(1),
  duration: z.number().nonnegative().optional(),
  error: z.string().optional()
});

export type TaskEventPayload = z.infer<typeof taskEventPayloadSchema>;

export interface MonitorEvent {
  nodeId: string;
  event: 'started' | 'completed' | 'failed' | 'status_changed';
  timestamp: string;
  duration?: number;
  error?: string;
  fromStatus?: NodeStatus;
  toStatus?: NodeStatus;
}

export interface NodeEventPayload {
  graphId: string;
  nodeId: string;
  nodeName: string;
  duration?: number;
  error?: string;
  fromStatus?: NodeStatus;
  toStatus?: NodeStatus;
}

export interface LiveStats {
  graphId: string;
  totalNodes: number;
  completed: number;
  failed: number;
  running: number;
  pending: number;
  /** Seconds */
  totalDuration: number;
  progressPercent: number;
}

export interface MonitorHealthReport {
  graphId: string;
  healthScore: number;
  status: HealthStatus;
  issues: string[];
  executionProgress: number;
  nodesFailed: number;
  timestamp: string;
}

export interface MetaMetrics {
  graphId: string;
  quality: GraphQuality | null;
  costs: CostSummary;
  liveStats: LiveStats;
  health: MonitorHealthReport;
  parallelizationIndex: number;
}

type SourceHandlers = Record<keyof typeof SOURCE_EVENTS, (payload: unknown) => void>;

/**
 * Live execution monitor for a task graph
 */
export class GraphMonitor extends EventEmitter {
  private readonly analyzer: GraphAnalyzer;
  private eventSource: EventEmitter | null = null;
  private sourceHandlers: SourceHandlers | null = null;

  private executionStartTime: Date | null = null;
  private executionEndTime: Date | null = null;
  private nodeEvents: MonitorEvent[] = [];

  private runningNodes = new Set<string>();
  private completedNodes = new Set<string>();
  private failedNodes = new Set<string>();
  private totalDuration = 0;

  constructor(private readonly graph: TaskGraph) {
    super();
    this.analyzer = new GraphAnalyzer(graph);
  }

  // ===== EVENT SOURCE =====

  /**
   * Subscribe to task.started, task.completed and task.failed on an emitter.
   * Payloads are `{ taskId, duration?, error? }`; malformed ones are dropped.
   */
  attachToEventSource(source: EventEmitter): void {
    if (this.eventSource) {
      this.detachFromEventSource();
    }

    const handlers: SourceHandlers = {
      started: payload => {
        const event = this.parseSourcePayload(SOURCE_EVENTS.started, payload);
        if (event) this.onNodeStart(event.taskId);
      },
      completed: payload => {
        const event = this.parseSourcePayload(SOURCE_EVENTS.completed, payload);
        if (event) this.onNodeComplete(event.taskId, event.duration);
      },
      failed: payload => {
        const event = this.parseSourcePayload(SOURCE_EVENTS.failed, payload);
        if (event) this.onNodeFail(event.taskId, event.error ?? 'Unknown error');
      }
    };

    source.on(SOURCE_EVENTS.started, handlers.started);
    source.on(SOURCE_EVENTS.completed, handlers.completed);
    source.on(SOURCE_EVENTS.failed, handlers.failed);

    this.eventSource = source;
    this.sourceHandlers = handlers;
    logger.info({ graphId: this.graph.id }, 'Graph monitor attached to event source');
  }

  detachFromEventSource(): void {
    if (!this.eventSource || !this.sourceHandlers) {
      return;
    }

    this.eventSource.off(SOURCE_EVENTS.started, this.sourceHandlers.started);
    this.eventSource.off(SOURCE_EVENTS.completed, this.sourceHandlers.completed);
    this.eventSource.off(SOURCE_EVENTS.failed, this.sourceHandlers.failed);

    this.eventSource = null;
    this.sourceHandlers = null;
    logger.info({ graphId: this.graph.id }, 'Graph monitor detached from event source');
  }

  // ===== NODE STATUS UPDATES =====

  onNodeStart(nodeId: string): void {
    if (!this.graph.hasNode(nodeId)) {
      logger.warn({ graphId: this.graph.id, nodeId }, 'Ignoring start event for unknown node');
      return;
    }

    const node = this.graph.getNode(nodeId);
    node.markRunning();
    this.completedNodes.delete(nodeId);
    this.failedNodes.delete(nodeId);
    this.runningNodes.add(nodeId);

    this.recordEvent({ nodeId, event: 'started' });
    this.emitNodeEvent(MONITOR_EVENTS.nodeStarted, { nodeId, nodeName: node.name });
    logger.info({ graphId: this.graph.id, nodeId }, 'Node started');
  }

  /**
   * @param duration seconds
   */
  onNodeComplete(nodeId: string, duration?: number): void {
    if (!this.graph.hasNode(nodeId)) {
      logger.warn({ graphId: this.graph.id, nodeId }, 'Ignoring completion event for unknown node');
      return;
    }

    const node = this.graph.getNode(nodeId);
    node.markCompleted(duration);
    this.runningNodes.delete(nodeId);
    this.failedNodes.delete(nodeId);
    this.completedNodes.add(nodeId);
    if (duration !== undefined) {
      this.totalDuration += duration;
    }

    this.recordEvent({ nodeId, event: 'completed', duration });
    this.emitNodeEvent(MONITOR_EVENTS.nodeCompleted, { nodeId, nodeName: node.name, duration });
    logger.info({ graphId: this.graph.id, nodeId, duration }, 'Node completed');
  }

  onNodeFail(nodeId: string, errorMessage: string): void {
    if (!this.graph.hasNode(nodeId)) {
      logger.warn({ graphId: this.graph.id, nodeId }, 'Ignoring failure event for unknown node');
      return;
    }

    const node = this.graph.getNode(nodeId);
    node.markFailed(errorMessage);
    this.runningNodes.delete(nodeId);
    this.completedNodes.delete(nodeId);
    this.failedNodes.add(nodeId);

    this.recordEvent({ nodeId, event: 'failed', error: errorMessage });
    this.emitNodeEvent(MONITOR_EVENTS.nodeFailed, { nodeId, nodeName: node.name, error: errorMessage });
    logger.error({ graphId: this.graph.id, nodeId, error: errorMessage }, 'Node failed');
  }

  /**
   * Set a status directly, without touching timestamps or live counters
   */
  updateNodeStatus(nodeId: string, status: NodeStatus): void {
    if (!this.graph.hasNode(nodeId)) {
      logger.warn({ graphId: this.graph.id, nodeId }, 'Ignoring status update for unknown node');
      return;
    }

    const node = this.graph.getNode(nodeId);
    const fromStatus = node.status;
    node.status = status;

    this.recordEvent({ nodeId, event: 'status_changed', fromStatus, toStatus: status });
    this.emitNodeEvent(MONITOR_EVENTS.nodeStatusChanged, { nodeId, nodeName: node.name, fromStatus, toStatus: status });
    logger.info({ graphId: this.graph.id, nodeId, fromStatus, toStatus: status }, 'Node status updated');
  }

  // ===== LIVE METRICS =====

  getLiveStats(): LiveStats {
    this.forgetRemovedNodes();
    const totalNodes = this.graph.nodeCount;
    const completed = this.completedNodes.size;
    const failed = this.failedNodes.size;
    const running = this.runningNodes.size;

    return {
      graphId: this.graph.id,
      totalNodes,
      completed,
      failed,
      running,
      pending: Math.max(totalNodes - completed - failed - running, 0),
      totalDuration: this.totalDuration,
      progressPercent: this.getProgress()
    };
  }

  /**
   * Completed share of all nodes, 0-100
   */
  getProgress(): number {
    this.forgetRemovedNodes();
    const total = this.graph.nodeCount;
    return total > 0 ? (this.completedNodes.size / total) * 100 : 0;
  }

  /**
   * Seconds since startMonitoring(), up to stopMonitoring() if it was called
   */
  getExecutionTime(): number | null {
    if (!this.executionStartTime) {
      return null;
    }
    const end = this.executionEndTime ?? new Date();
    return (end.getTime() - this.executionStartTime.getTime()) / 1000;
  }

  getHealthReport(): MonitorHealthReport {
    const health = this.analyzer.calculateGraphHealth();
    const liveStats = this.getLiveStats();

    return {
      graphId: this.graph.id,
      healthScore: health.healthScore,
      status: health.status,
      issues: health.issues,
      executionProgress: liveStats.progressPercent,
      nodesFailed: liveStats.failed,
      timestamp: new Date().toISOString()
    };
  }

  getMetaMetrics(): MetaMetrics {
    return {
      graphId: this.graph.id,
      quality: this.analyzer.checkGraphQuality(),
      costs: this.analyzer.calculateTotalCost(),
      liveStats: this.getLiveStats(),
      health: this.getHealthReport(),
      parallelizationIndex: this.analyzer.calculateParallelizationIndex()
    };
  }

  getEvents(): MonitorEvent[] {
    return this.nodeEvents.map(event => ({ ...event }));
  }

  // ===== EXECUTION CONTROL =====

  startMonitoring(): void {
    this.resetCounters();
    this.executionStartTime = new Date();
    this.executionEndTime = null;
    logger.info({ graphId: this.graph.id }, 'Started monitoring graph');
  }

  stopMonitoring(): void {
    this.executionEndTime = new Date();
    logger.info({ graphId: this.graph.id, executionTime: this.getExecutionTime() }, 'Stopped monitoring graph');
  }

  reset(): void {
    this.resetCounters();
    this.executionStartTime = null;
    this.executionEndTime = null;
    logger.info({ graphId: this.graph.id }, 'Monitor state reset');
  }

  private resetCounters(): void {
    this.nodeEvents = [];
    this.runningNodes.clear();
    this.completedNodes.clear();
    this.failedNodes.clear();
    this.totalDuration = 0;
  }

  /**
   * Nodes removed from the graph after an event no longer count
   */
  private forgetRemovedNodes(): void {
    for (const tracked of [this.runningNodes, this.completedNodes, this.failedNodes]) {
      for (const nodeId of tracked) {
        if (!this.graph.hasNode(nodeId)) {
          tracked.delete(nodeId);
        }
      }
    }
  }

  private recordEvent(event: Omit<MonitorEvent, 'timestamp'>): void {
    this.nodeEvents.push({ ...event, timestamp: new Date().toISOString() });
  }

  private emitNodeEvent(eventName: string, payload: Omit<NodeEventPayload, 'graphId'>): void {
    this.emit(eventName, { graphId: this.graph.id, ...payload });
  }

  private parseSourcePayload(eventName: string, payload: unknown): TaskEventPayload | null {
    const result = taskEventPayloadSchema.safeParse(payload);
    if (!result.success) {
      logger.warn({ graphId: this.graph.id, eventName, issues: result.error.issues }, 'Ignoring malformed task event');
      return null;
    }
    return result.data;
  }
}

/**
 * Factory function to create a graph monitor instance
 */
export function createGraphMonitor(graph: TaskGraph): GraphMonitor {
  return new GraphMonitor(graph);
}
