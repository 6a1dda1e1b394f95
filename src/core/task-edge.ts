import { CYCLE_SIGNIFICANT_EDGE_TYPES, type EdgeType, type Metadata } from '../types/graph.js';
import type { SerializedEdge } from './graph-schema.js';

export interface TaskEdgeOptions {
  sourceId: string;
  targetId: string;
  edgeType?: EdgeType;
  weight?: number;
  constraints?: Metadata;
  metadata?: Metadata;
}

/**
 * Directed relationship between two task nodes: source must precede target
 * for dependency and constraint edges.
 */
export class TaskEdge {
  readonly sourceId: string;
  readonly targetId: string;
  readonly edgeType: EdgeType;
  weight: number;
  constraints: Metadata;
  metadata: Metadata;

  constructor(options: TaskEdgeOptions) {
    this.sourceId = options.sourceId;
    this.targetId = options.targetId;
    this.edgeType = options.edgeType ?? 'dependency';
    this.weight = options.weight ?? 1.0;
    this.constraints = { ...(options.constraints || {}) };
    this.metadata = { ...(options.metadata || {}) };
  }

  isDependency(): boolean {
    return this.edgeType === 'dependency';
  }

  isConstraint(): boolean {
    return this.edgeType === 'constraint';
  }

  isConditional(): boolean {
    return this.edgeType === 'conditional';
  }

  isWeak(): boolean {
    return this.edgeType === 'weak';
  }

  /**
   * Dependency and constraint edges gate execution order
   */
  isCycleSignificant(): boolean {
    return CYCLE_SIGNIFICANT_EDGE_TYPES.has(this.edgeType);
  }

  getConstraint(key: string, defaultValue?: unknown): unknown {
    return key in this.constraints ? this.constraints[key] : defaultValue;
  }

  setConstraint(key: string, value: unknown): void {
    this.constraints[key] = value;
  }

  hasTimingConstraint(): boolean {
    return 'max_delay' in this.constraints || 'min_delay' in this.constraints;
  }

  toDict(): SerializedEdge {
    return {
      source_id: this.sourceId,
      target_id: this.targetId,
      edge_type: this.edgeType,
      weight: this.weight,
      constraints: { ...this.constraints },
      metadata: { ...this.metadata }
    };
  }

  static fromDict(data: SerializedEdge): TaskEdge {
    return new TaskEdge({
      sourceId: data.source_id,
      targetId: data.target_id,
      edgeType: data.edge_type,
      weight: data.weight,
      constraints: data.constraints,
      metadata: data.metadata
    });
  }

  toString(): string {
    return `${this.sourceId} -> ${this.targetId}`;
  }
}
