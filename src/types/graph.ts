/**
 * Core type definitions for task graphs and their analysis results
 */

/**
 * Execution status of a task node
 */
export const NODE_STATUSES = ['pending', 'ready', 'running', 'completed', 'failed', 'cancelled', 'blocked'] as const;
export type NodeStatus = typeof NODE_STATUSES[number];

/**
 * Relationship carried by an edge. Only 'dependency' and 'constraint'
 * gate execution order.
 */
export const EDGE_TYPES = ['dependency', 'constraint', 'data_flow', 'conditional', 'weak'] as const;
export type EdgeType = typeof EDGE_TYPES[number];

export const CYCLE_SIGNIFICANT_EDGE_TYPES: ReadonlySet<EdgeType> = new Set<EdgeType>(['dependency', 'constraint']);

/**
 * Free-form key/value bag attached to graphs, nodes and edges
 */
export type Metadata = Record<string, unknown>;

/**
 * Estimated resource usage of a single task
 */
export interface CostModelData {
  /** Estimated execution time in seconds */
  duration: number;

  /** Estimated monetary cost */
  monetaryCost: number;

  /** CPU units required */
  cpuUnits: number;

  /** Memory in MB */
  memory: number;

  /** Estimated I/O operations */
  ioOps: number;

  /** Network bandwidth in Mbps */
  bandwidth: number;
}

/**
 * Result of the critical path method
 */
export interface CriticalPathResult {
  path: string[];
  totalDuration: number;
}

/**
 * Result of a structural validation pass
 */
export interface GraphValidationResult {
  isValid: boolean;
  errors: string[];
}

/**
 * Summary counts for a graph
 */
export interface GraphStats {
  graphId: string;
  nodeCount: number;
  edgeCount: number;
  rootCount: number;
  leafCount: number;
  isAcyclic: boolean;
  statusCounts: Record<NodeStatus, number>;
}

/**
 * A node whose fan-in or fan-out reached the bottleneck threshold
 */
export interface Bottleneck {
  nodeId: string;
  nodeName: string;
  fanIn: number;
  fanOut: number;
  bottleneckScore: number;
  type: 'convergence' | 'divergence';
}

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

/**
 * Composite health score with the issues that lowered it
 */
export interface GraphHealth {
  healthScore: number;
  status: HealthStatus;
  issues: string[];
  parallelizationIndex: number;
  cycleCount: number;
  bottleneckCount: number;
  isolatedCount: number;
}

/**
 * Fan statistics and balance of a non-empty graph
 */
export interface GraphQuality {
  nodeCount: number;
  edgeCount: number;
  avgFanIn: number;
  avgFanOut: number;
  maxFanIn: number;
  maxFanOut: number;
  rootCount: number;
  leafCount: number;
  isBalanced: boolean;
  density: number;
}

/**
 * Aggregated resource costs
 */
export interface CostSummary {
  totalDurationSequential: number;
  criticalPathDuration: number;
  totalCost: number;
  totalCpuUnits: number;
  totalMemory: number;
  totalIoOperations: number;
  efficiencyRatio: number;
}

export interface ResourceHotspot {
  nodeId: string;
  nodeName: string;
  duration: number;
  cost: number;
  cpuUnits: number;
  memory: number;
  totalCost: number;
}

export interface InfluentialNode {
  nodeId: string;
  score: number;
}

/**
 * Everything the analyzer knows about a graph, in one structure
 */
export interface AnalysisReport {
  graphId: string;
  stats: GraphStats;
  health: GraphHealth;
  quality: GraphQuality | null;
  costs: CostSummary;
  bottlenecks: Bottleneck[];
  criticalNodes: string[];
  influentialNodes: InfluentialNode[];
  resourceHotspots: ResourceHotspot[];
  parallelStages: Record<number, string[]>;
  parallelizationIndex: number;
  redundancyScore: number;
  cycles: string[][];
}
