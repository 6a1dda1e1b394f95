import type { CostModelData, Metadata, NodeStatus } from '../types/graph.js';
import type { SerializedCostModel, SerializedNode } from './graph-schema.js';

/**
 * Weight of one second of duration when blending time and money into a single cost
 */
export const DURATION_COST_FACTOR = 0.01;

/**
 * Resource estimate for a task
 */
export class CostModel implements CostModelData {
  duration: number;
  monetaryCost: number;
  cpuUnits: number;
  memory: number;
  ioOps: number;
  bandwidth: number;

  constructor(data: Partial<CostModelData> = {}) {
    this.duration = data.duration ?? 1.0;
    this.monetaryCost = data.monetaryCost ?? 0;
    this.cpuUnits = data.cpuUnits ?? 1.0;
    this.memory = data.memory ?? 128;
    this.ioOps = data.ioOps ?? 0;
    this.bandwidth = data.bandwidth ?? 0;
  }

  /**
   * Single comparable scalar: money plus duration scaled by DURATION_COST_FACTOR
   */
  totalCost(): number {
    return this.monetaryCost + this.duration * DURATION_COST_FACTOR;
  }

  clone(): CostModel {
    return new CostModel(this);
  }

  toDict(): SerializedCostModel {
    return {
      duration: this.duration,
      monetary_cost: this.monetaryCost,
      cpu_units: this.cpuUnits,
      memory: this.memory,
      io_ops: this.ioOps,
      bandwidth: this.bandwidth
    };
  }

  static fromDict(data: SerializedCostModel): CostModel {
    return new CostModel({
      duration: data.duration,
      monetaryCost: data.monetary_cost,
      cpuUnits: data.cpu_units,
      memory: data.memory,
      ioOps: data.io_ops,
      bandwidth: data.bandwidth
    });
  }
}

export interface TaskNodeOptions {
  id: string;
  name: string;
  nodeType?: string;
  /** Caller-defined range; higher is more important */
  priority?: number;
  costModel?: CostModel | Partial<CostModelData>;
  metadata?: Metadata;
}

const TERMINAL_STATUSES: ReadonlySet<NodeStatus> = new Set<NodeStatus>(['completed', 'failed', 'cancelled']);

/**
 * A single task in the graph.
 *
 * `dependencies` and `dependents` mirror the edges touching this node. They
 * are maintained by TaskGraph only; a node never edits them on its own.
 */
export class TaskNode {
  readonly id: string;
  name: string;
  nodeType: string;
  priority: number;
  status: NodeStatus = 'pending';
  costModel: CostModel;
  metadata: Metadata;

  startTime: Date | null = null;
  endTime: Date | null = null;
  /** Seconds */
  actualDuration: number | null = null;
  errorMessage: string | null = null;

  // Derived by TaskGraph / GraphAnalyzer
  level: number | null = null;
  onCriticalPath = false;
  influenceScore = 0;
  parallelizationFactor = 1;

  private readonly incoming = new Set<string>();
  private readonly outgoing = new Set<string>();

  constructor(options: TaskNodeOptions) {
    this.id = options.id;
    this.name = options.name;
    this.nodeType = options.nodeType ?? 'generic';
    this.priority = options.priority ?? 5;
    this.costModel = options.costModel instanceof CostModel
      ? options.costModel
      : new CostModel(options.costModel);
    this.metadata = { ...(options.metadata || {}) };
  }

  /** Ids of nodes this node depends on (incoming edges) */
  get dependencies(): ReadonlySet<string> {
    return this.incoming;
  }

  /** Ids of nodes depending on this node (outgoing edges) */
  get dependents(): ReadonlySet<string> {
    return this.outgoing;
  }

  /** @internal */
  linkDependency(nodeId: string): void {
    this.incoming.add(nodeId);
  }

  /** @internal */
  unlinkDependency(nodeId: string): void {
    this.incoming.delete(nodeId);
  }

  /** @internal */
  linkDependent(nodeId: string): void {
    this.outgoing.add(nodeId);
  }

  /** @internal */
  unlinkDependent(nodeId: string): void {
    this.outgoing.delete(nodeId);
  }

  /** @internal */
  clearLinks(): void {
    this.incoming.clear();
    this.outgoing.clear();
  }

  hasLinks(): boolean {
    return this.incoming.size > 0 || this.outgoing.size > 0;
  }

  markReady(): void {
    this.status = 'ready';
  }

  markRunning(): void {
    this.status = 'running';
    this.startTime = new Date();
  }

  /**
   * @param actualDuration seconds; derived from the start time when omitted
   */
  markCompleted(actualDuration?: number): void {
    this.status = 'completed';
    this.endTime = new Date();
    if (actualDuration !== undefined) {
      this.actualDuration = actualDuration;
    } else if (this.startTime) {
      this.actualDuration = this.elapsedSeconds(this.startTime, this.endTime);
    }
  }

  markFailed(errorMessage: string): void {
    this.status = 'failed';
    this.endTime = new Date();
    this.errorMessage = errorMessage;
    if (this.startTime) {
      this.actualDuration = this.elapsedSeconds(this.startTime, this.endTime);
    }
  }

  markCancelled(): void {
    this.status = 'cancelled';
  }

  markBlocked(): void {
    this.status = 'blocked';
  }

  isTerminal(): boolean {
    return TERMINAL_STATUSES.has(this.status);
  }

  canExecute(): boolean {
    return this.status === 'ready';
  }

  getMetadata(key: string, defaultValue?: unknown): unknown {
    return key in this.metadata ? this.metadata[key] : defaultValue;
  }

  setMetadata(key: string, value: unknown): void {
    this.metadata[key] = value;
  }

  updateMetadata(updates: Metadata): void {
    Object.assign(this.metadata, updates);
  }

  toDict(): SerializedNode {
    return {
      id: this.id,
      name: this.name,
      node_type: this.nodeType,
      priority: this.priority,
      status: this.status,
      cost_model: this.costModel.toDict(),
      metadata: { ...this.metadata },
      dependencies: Array.from(this.incoming).sort(),
      dependents: Array.from(this.outgoing).sort(),
      level: this.level,
      on_critical_path: this.onCriticalPath,
      influence_score: this.influenceScore,
      parallelization_factor: this.parallelizationFactor,
      start_time: this.startTime ? this.startTime.toISOString() : null,
      end_time: this.endTime ? this.endTime.toISOString() : null,
      actual_duration: this.actualDuration,
      error_message: this.errorMessage
    };
  }

  /**
   * Rebuild a node from its wire form. Neighbor lists are not restored here:
   * TaskGraph.fromDict derives them from the edge list.
   */
  static fromDict(data: SerializedNode): TaskNode {
    const node = new TaskNode({
      id: data.id,
      name: data.name,
      nodeType: data.node_type,
      priority: data.priority,
      costModel: CostModel.fromDict(data.cost_model),
      metadata: data.metadata
    });

    node.status = data.status;
    node.level = data.level;
    node.onCriticalPath = data.on_critical_path;
    node.influenceScore = data.influence_score;
    node.parallelizationFactor = data.parallelization_factor;
    node.startTime = data.start_time ? new Date(data.start_time) : null;
    node.endTime = data.end_time ? new Date(data.end_time) : null;
    node.actualDuration = data.actual_duration;
    node.errorMessage = data.error_message;

    return node;
  }

  toString(): string {
    return `${this.name} [${this.id}]`;
  }

  private elapsedSeconds(start: Date, end: Date): number {
    return (end.getTime() - start.getTime()) / 1000;
  }
}
