import type { TaskGraph } from './task-graph.js';
import type {
  AnalysisReport,
  Bottleneck,
  CostSummary,
  GraphHealth,
  GraphQuality,
  HealthStatus,
  InfluentialNode,
  ResourceHotspot
} from '../types/graph.js';
import { loadGraphEngineConfig, type GraphEngineConfig } from '../utils/config-loader.js';
import logger from '../logger.js';

export type AnalyzerConfig = Omit<GraphEngineConfig, 'cyclePolicy'>;

interface CacheEntry<T> {
  version: number;
  key: string;
  value: T;
}

interface TraversalFrame {
  nodeId: string;
  neighbors: Iterator<string>;
}

/**
 * Largest value, or 0 for none. No argument spread: node counts are unbounded.
 */
function maxOf(values: Iterable<number>): number {
  let max = 0;
  let seen = false;
  for (const value of values) {
    if (!seen || value > max) {
      max = value;
      seen = true;
    }
  }
  return max;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/**
 * Read-only analyses over a TaskGraph.
 *
 * Expensive results are memoized together with the graph version they were
 * computed for, so a mutated graph is never answered from a stale entry.
 * Results that depend on a topological order (levels, stages, critical path)
 * come back empty on a cyclic graph instead of throwing.
 */
export class GraphAnalyzer {
  private readonly config: AnalyzerConfig;
  private cyclesCache: CacheEntry<string[][]> | null = null;
  private influenceCache: CacheEntry<Record<string, number>> | null = null;

  constructor(
    private readonly graph: TaskGraph,
    config: Partial<AnalyzerConfig> = {}
  ) {
    this.config = loadGraphEngineConfig(process.env, config);
  }

  // ===== CYCLE ANALYSIS =====

  /**
   * Every back edge found by a depth-first search yields one cycle: the stack
   * slice from the repeated node, closed by the repeated node.
   */
  findAllCycles(): string[][] {
    if (this.isFresh(this.cyclesCache, 'cycles')) {
      return this.cyclesCache.value.map(cycle => [...cycle]);
    }

    const cycles: string[][] = [];
    const visited = new Set<string>();
    const stack: string[] = [];
    const stackPosition = new Map<string, number>();

    for (const startId of this.graph.getNodeIds()) {
      if (visited.has(startId)) continue;

      visited.add(startId);
      stackPosition.set(startId, stack.length);
      stack.push(startId);
      const frames: TraversalFrame[] = [{ nodeId: startId, neighbors: this.graph.getSuccessors(startId).values() }];

      while (frames.length > 0) {
        const frame = frames[frames.length - 1];
        const next = frame.neighbors.next();

        if (next.done) {
          frames.pop();
          stack.pop();
          stackPosition.delete(frame.nodeId);
          continue;
        }

        const neighbor = next.value;
        const position = stackPosition.get(neighbor);
        if (position !== undefined) {
          cycles.push([...stack.slice(position), neighbor]);
        } else if (!visited.has(neighbor)) {
          visited.add(neighbor);
          stackPosition.set(neighbor, stack.length);
          stack.push(neighbor);
          frames.push({ nodeId: neighbor, neighbors: this.graph.getSuccessors(neighbor).values() });
        }
      }
    }

    this.cyclesCache = { version: this.graph.version, key: 'cycles', value: cycles };
    logger.info({ graphId: this.graph.id, cycleCount: cycles.length }, 'Cycle analysis complete');
    return cycles.map(cycle => [...cycle]);
  }

  findCycleNodes(): Set<string> {
    const members = new Set<string>();
    for (const cycle of this.findAllCycles()) {
      for (const nodeId of cycle) {
        members.add(nodeId);
      }
    }
    return members;
  }

  // ===== BOTTLENECKS & CRITICALITY =====

  findBottlenecks(threshold: number = this.config.bottleneckThreshold): Bottleneck[] {
    const bottlenecks: Bottleneck[] = [];

    for (const node of this.graph.getAllNodes()) {
      const fanIn = node.dependencies.size;
      const fanOut = node.dependents.size;

      if (fanIn >= threshold || fanOut >= threshold) {
        bottlenecks.push({
          nodeId: node.id,
          nodeName: node.name,
          fanIn,
          fanOut,
          bottleneckScore: fanIn + fanOut,
          type: fanIn >= threshold ? 'convergence' : 'divergence'
        });
      }
    }

    bottlenecks.sort((a, b) => b.bottleneckScore - a.bottleneckScore);
    logger.info({ graphId: this.graph.id, threshold, count: bottlenecks.length }, 'Bottleneck analysis complete');
    return bottlenecks;
  }

  findCriticalNodes(): string[] {
    if (!this.graph.isAcyclic()) {
      logger.debug({ graphId: this.graph.id }, 'Skipping critical path on cyclic graph');
      return [];
    }
    return this.graph.calculateCriticalPath().path;
  }

  /**
   * 0.4 for lying on the critical path, plus up to 0.3 each for dependent
   * count and total cost relative to the graph maximum. Capped at 1.
   */
  calculateNodeCriticality(): Record<string, number> {
    const nodes = this.graph.getAllNodes();
    const criticality: Record<string, number> = {};
    if (nodes.length === 0) {
      return criticality;
    }

    const criticalNodes = new Set(this.findCriticalNodes());
    const maxDependents = maxOf(nodes.map(node => node.dependents.size)) || 1;
    const maxCost = maxOf(nodes.map(node => node.costModel.totalCost())) || 1;

    for (const node of nodes) {
      let score = criticalNodes.has(node.id) ? 0.4 : 0;
      score += 0.3 * (node.dependents.size / maxDependents);
      score += 0.3 * (node.costModel.totalCost() / maxCost);
      criticality[node.id] = Math.min(score, 1);
    }

    return criticality;
  }

  // ===== INFLUENCE =====

  /**
   * PageRank over incoming edges, so a node that many tasks feed into ranks
   * high. Scores are normalized to a maximum of 1 and written to each node.
   */
  calculateInfluenceScores(
    iterations: number = this.config.pageRankIterations,
    damping: number = this.config.pageRankDamping
  ): Record<string, number> {
    const cacheKey = `${iterations}:${damping}`;
    if (this.isFresh(this.influenceCache, cacheKey)) {
      return { ...this.influenceCache.value };
    }

    const nodeIds = this.graph.getNodeIds();
    const n = nodeIds.length;
    if (n === 0) {
      return {};
    }

    let scores = new Map<string, number>(nodeIds.map(nodeId => [nodeId, 1 / n]));

    for (let i = 0; i < iterations; i++) {
      const nextScores = new Map<string, number>();
      for (const nodeId of nodeIds) {
        let rankSum = 0;
        for (const source of this.graph.getPredecessors(nodeId)) {
          const outDegree = this.graph.getSuccessors(source).length;
          if (outDegree > 0) {
            rankSum += (scores.get(source) ?? 0) / outDegree;
          }
        }
        nextScores.set(nodeId, (1 - damping) / n + damping * rankSum);
      }
      scores = nextScores;
    }

    const maxScore = maxOf(scores.values());
    const normalized: Record<string, number> = {};
    for (const [nodeId, score] of scores) {
      const value = maxScore > 0 ? score / maxScore : score;
      normalized[nodeId] = value;
      this.graph.getNode(nodeId).influenceScore = value;
    }

    this.influenceCache = { version: this.graph.version, key: cacheKey, value: normalized };
    logger.info({ graphId: this.graph.id, iterations, damping }, 'Calculated influence scores');
    return { ...normalized };
  }

  findMostInfluentialNodes(topN: number = 5): InfluentialNode[] {
    return Object.entries(this.calculateInfluenceScores())
      .map(([nodeId, score]) => ({ nodeId, score }))
      .sort((a, b) => b.score - a.score)
      .slice(0, topN);
  }

  // ===== PARALLELIZATION =====

  /**
   * Average stage width relative to node count, in [0, 1]. A single stage
   * holding every node scores 1; a chain of n nodes scores 1/n.
   */
  calculateParallelizationIndex(): number {
    const nodeCount = this.graph.nodeCount;
    if (nodeCount === 0 || !this.graph.isAcyclic()) {
      return 0;
    }

    const levels = this.graph.calculateNodeLevels();
    const levelCount = maxOf(levels.values()) + 1;
    const averageWidth = nodeCount / levelCount;

    return Math.min(averageWidth / nodeCount, 1);
  }

  findParallelStages(): Record<number, string[]> {
    const stages: Record<number, string[]> = {};
    if (!this.graph.isAcyclic()) {
      return stages;
    }

    for (const [nodeId, level] of this.graph.calculateNodeLevels()) {
      (stages[level] ??= []).push(nodeId);
    }

    logger.info({ graphId: this.graph.id, stageCount: Object.keys(stages).length }, 'Found parallel stages');
    return stages;
  }

  /**
   * Share of the graph that can run alongside each node
   */
  calculateParallelizationFactors(): Record<string, number> {
    const factors: Record<string, number> = {};
    const nodeCount = this.graph.nodeCount;

    for (const nodeIds of Object.values(this.findParallelStages())) {
      const factor = nodeCount > 1 ? (nodeIds.length - 1) / nodeCount : 0;
      for (const nodeId of nodeIds) {
        factors[nodeId] = factor;
        this.graph.getNode(nodeId).parallelizationFactor = factor;
      }
    }

    return factors;
  }

  // ===== HEALTH & QUALITY =====

  calculateGraphHealth(): GraphHealth {
    let healthScore = 100;
    const issues: string[] = [];

    const cycles = this.findAllCycles();
    if (cycles.length > 0) {
      healthScore -= 50;
      issues.push(`Contains ${cycles.length} cycles`);
    }

    const bottlenecks = this.findBottlenecks(this.config.healthBottleneckThreshold);
    if (bottlenecks.length > 0) {
      healthScore -= Math.min(bottlenecks.length * 10, 30);
      issues.push(`Contains ${bottlenecks.length} bottlenecks`);
    }

    const parallelizationIndex = this.calculateParallelizationIndex();
    if (this.graph.nodeCount > 0 && parallelizationIndex < 0.3) {
      healthScore -= 10;
      issues.push('Low parallelization potential');
    }

    const isolated = this.graph.getAllNodes().filter(node => !node.hasLinks());
    if (isolated.length > 1) {
      healthScore -= Math.min(isolated.length * 5, 20);
      issues.push(`Contains ${isolated.length} isolated nodes`);
    }

    healthScore = Math.max(healthScore, 0);
    let status: HealthStatus = 'unhealthy';
    if (healthScore >= 80) {
      status = 'healthy';
    } else if (healthScore >= 50) {
      status = 'degraded';
    }

    return {
      healthScore,
      status,
      issues,
      parallelizationIndex,
      cycleCount: cycles.length,
      bottleneckCount: bottlenecks.length,
      isolatedCount: isolated.length
    };
  }

  /**
   * Fan statistics; null for an empty graph
   */
  checkGraphQuality(): GraphQuality | null {
    const nodes = this.graph.getAllNodes();
    if (nodes.length === 0) {
      return null;
    }

    const fanIns = nodes.map(node => node.dependencies.size);
    const fanOuts = nodes.map(node => node.dependents.size);
    const sum = (values: number[]): number => values.reduce((total, value) => total + value, 0);

    const nodeCount = nodes.length;
    const edgeCount = this.graph.edgeCount;
    const rootCount = this.graph.getRootNodes().length;
    const leafCount = this.graph.getLeafNodes().length;

    return {
      nodeCount,
      edgeCount,
      avgFanIn: round(sum(fanIns) / nodeCount, 2),
      avgFanOut: round(sum(fanOuts) / nodeCount, 2),
      maxFanIn: maxOf(fanIns),
      maxFanOut: maxOf(fanOuts),
      rootCount,
      leafCount,
      isBalanced: Math.abs(rootCount - leafCount) <= 2,
      density: nodeCount > 1 ? round(edgeCount / (nodeCount * (nodeCount - 1)), 3) : 0
    };
  }

  // ===== RESOURCES =====

  calculateTotalCost(): CostSummary {
    let totalDuration = 0;
    let totalCost = 0;
    let totalCpu = 0;
    let totalMemory = 0;
    let totalIo = 0;

    for (const node of this.graph.getAllNodes()) {
      const cost = node.costModel;
      totalDuration += cost.duration;
      totalCost += cost.monetaryCost;
      totalCpu += cost.cpuUnits;
      totalMemory += cost.memory;
      totalIo += cost.ioOps;
    }

    const criticalDuration = this.graph.isAcyclic() ? this.graph.calculateCriticalPath().totalDuration : 0;

    return {
      totalDurationSequential: round(totalDuration, 2),
      criticalPathDuration: round(criticalDuration, 2),
      totalCost: round(totalCost, 2),
      totalCpuUnits: round(totalCpu, 2),
      totalMemory: round(totalMemory, 2),
      totalIoOperations: totalIo,
      efficiencyRatio: totalDuration > 0 ? round(criticalDuration / totalDuration, 2) : 0
    };
  }

  findResourceHotspots(topN: number = 5): ResourceHotspot[] {
    return this.graph
      .getAllNodes()
      .map(node => ({
        nodeId: node.id,
        nodeName: node.name,
        duration: node.costModel.duration,
        cost: node.costModel.monetaryCost,
        cpuUnits: node.costModel.cpuUnits,
        memory: node.costModel.memory,
        totalCost: node.costModel.totalCost()
      }))
      .sort((a, b) => b.totalCost - a.totalCost)
      .slice(0, topN);
  }

  // ===== REDUNDANCY =====

  /**
   * Root-to-leaf simple paths relative to 2 x roots x leaves, capped at 1.
   * Higher means more alternative routes through the graph.
   */
  calculateRedundancyScore(): number {
    if (this.graph.nodeCount < 2) {
      return 0;
    }

    const roots = this.graph.getRootNodes().map(node => node.id);
    const leaves = this.graph.getLeafNodes().map(node => node.id);
    if (roots.length === 0 || leaves.length === 0) {
      return 0;
    }

    const totalPaths = this.graph.isAcyclic()
      ? this.countPathsAcyclic(roots)
      : this.countPathsBudgeted(roots);

    return Math.min(totalPaths / (roots.length * leaves.length * 2), 1);
  }

  // ===== REPORT =====

  getAnalysisReport(): AnalysisReport {
    logger.info({ graphId: this.graph.id }, 'Generating analysis report');

    return {
      graphId: this.graph.id,
      stats: this.graph.getStats(),
      health: this.calculateGraphHealth(),
      quality: this.checkGraphQuality(),
      costs: this.calculateTotalCost(),
      bottlenecks: this.findBottlenecks(),
      criticalNodes: this.findCriticalNodes(),
      influentialNodes: this.findMostInfluentialNodes(),
      resourceHotspots: this.findResourceHotspots(),
      parallelStages: this.findParallelStages(),
      parallelizationIndex: this.calculateParallelizationIndex(),
      redundancyScore: this.calculateRedundancyScore(),
      cycles: this.findAllCycles()
    };
  }

  clearCache(): void {
    this.cyclesCache = null;
    this.influenceCache = null;
  }

  // ===== INTERNALS =====

  private isFresh<T>(entry: CacheEntry<T> | null, key: string): entry is CacheEntry<T> {
    return entry !== null && entry.version === this.graph.version && entry.key === key;
  }

  /**
   * Paths from a node to any leaf, counted once per node in reverse
   * topological order
   */
  private countPathsAcyclic(roots: string[]): number {
    const pathsToLeaf = new Map<string, number>();
    const order = this.graph.topologicalSort();

    for (let i = order.length - 1; i >= 0; i--) {
      const successors = this.graph.getSuccessors(order[i]);
      const count = successors.length === 0
        ? 1
        : successors.reduce((total, successor) => total + (pathsToLeaf.get(successor) ?? 0), 0);
      pathsToLeaf.set(order[i], count);
    }

    return roots.reduce((total, rootId) => total + (pathsToLeaf.get(rootId) ?? 0), 0);
  }

  /**
   * Simple-path enumeration for graphs that contain cycles. Stops once the
   * step budget is spent and returns the paths counted so far.
   */
  private countPathsBudgeted(roots: string[]): number {
    const budget = this.config.redundancyPathBudget;
    let steps = 0;
    let total = 0;

    for (const rootId of roots) {
      if (this.graph.getSuccessors(rootId).length === 0) {
        total += 1;
        continue;
      }

      const onPath = new Set<string>([rootId]);
      const frames: TraversalFrame[] = [{ nodeId: rootId, neighbors: this.graph.getSuccessors(rootId).values() }];

      while (frames.length > 0) {
        if (++steps > budget) {
          logger.warn(
            { graphId: this.graph.id, budget, pathsCounted: total },
            'Redundancy path budget exhausted; score is a lower bound'
          );
          return total;
        }

        const frame = frames[frames.length - 1];
        const next = frame.neighbors.next();
        if (next.done) {
          frames.pop();
          onPath.delete(frame.nodeId);
          continue;
        }

        const neighbor = next.value;
        if (onPath.has(neighbor)) continue;

        const successors = this.graph.getSuccessors(neighbor);
        if (successors.length === 0) {
          total += 1;
        } else {
          onPath.add(neighbor);
          frames.push({ nodeId: neighbor, neighbors: successors.values() });
        }
      }
    }

    return total;
  }
}

/**
 * Factory function to create a graph analyzer instance
 */
export function createGraphAnalyzer(graph: TaskGraph, config: Partial<AnalyzerConfig> = {}): GraphAnalyzer {
  return new GraphAnalyzer(graph, config);
}
