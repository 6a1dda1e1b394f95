import { TaskNode } from './task-node.js';
import { TaskEdge } from './task-edge.js';
import { serializedGraphSchema, type SerializedGraph } from './graph-schema.js';
import type {
  CriticalPathResult,
  GraphStats,
  GraphValidationResult,
  Metadata,
  NodeStatus
} from '../types/graph.js';
import { loadGraphEngineConfig, type CyclePolicy } from '../utils/config-loader.js';
import {
  CycleError,
  DuplicateNodeError,
  NotFoundError,
  SelfLoopError,
  ValidationError
} from '../utils/errors.js';
import logger from '../logger.js';

export interface TaskGraphOptions {
  id?: string;
  metadata?: Metadata;
  /**
   * 'all' rejects any edge that closes a cycle. 'significant-only' only
   * checks dependency and constraint insertions, so cycles made purely of
   * weak, data-flow or conditional edges are accepted.
   */
  cyclePolicy?: CyclePolicy;
}

interface DfsFrame {
  nodeId: string;
  neighbors: Iterator<string>;
}

/**
 * Directed acyclic task graph.
 *
 * Nodes and edges live in a node map, an ordered edge list and two adjacency
 * indices (successors and predecessors). Every mutation keeps all of them and
 * the nodes' neighbor sets in step, and a failed mutation leaves them exactly
 * as they were. Topological order and critical path are cached per version.
 */
export class TaskGraph {
  readonly id: string;
  metadata: Metadata;
  readonly cyclePolicy: CyclePolicy;

  private nodes = new Map<string, TaskNode>();
  private edges: TaskEdge[] = [];
  private adjacencyList = new Map<string, Set<string>>();
  private reverseIndex = new Map<string, Set<string>>();

  private mutationVersion = 0;
  private topologicalOrder: string[] | null = null;
  private criticalPath: CriticalPathResult | null = null;

  constructor(options: TaskGraphOptions = {}) {
    this.id = options.id ?? 'default';
    this.metadata = { ...(options.metadata || {}) };
    this.cyclePolicy = options.cyclePolicy ?? loadGraphEngineConfig().cyclePolicy;
    logger.debug({ graphId: this.id, cyclePolicy: this.cyclePolicy }, 'Initializing task graph');
  }

  /**
   * Incremented on every successful structural mutation
   */
  get version(): number {
    return this.mutationVersion;
  }

  get nodeCount(): number {
    return this.nodes.size;
  }

  get edgeCount(): number {
    return this.edges.length;
  }

  // ===== NODE OPERATIONS =====

  addNode(node: TaskNode): void {
    if (this.nodes.has(node.id)) {
      throw new DuplicateNodeError(node.id, { graphId: this.id });
    }
    if (node.hasLinks()) {
      throw new ValidationError(`Node ${node.id} is already linked to other nodes`, undefined, {
        graphId: this.id,
        nodeId: node.id
      });
    }

    this.nodes.set(node.id, node);
    this.adjacencyList.set(node.id, new Set());
    this.reverseIndex.set(node.id, new Set());

    this.markDirty();
    logger.debug({ graphId: this.id, nodeId: node.id, name: node.name }, 'Added node to task graph');
  }

  /**
   * Remove a node together with every edge touching it
   */
  removeNode(nodeId: string): void {
    const node = this.nodes.get(nodeId);
    if (!node) {
      throw new NotFoundError(`Node ${nodeId} not found in graph`, { graphId: this.id, nodeId });
    }

    const edgesBefore = this.edges.length;
    this.edges = this.edges.filter(edge => edge.sourceId !== nodeId && edge.targetId !== nodeId);

    for (const successor of this.adjacencyList.get(nodeId) ?? []) {
      this.reverseIndex.get(successor)?.delete(nodeId);
      this.nodes.get(successor)?.unlinkDependency(nodeId);
    }
    for (const predecessor of this.reverseIndex.get(nodeId) ?? []) {
      this.adjacencyList.get(predecessor)?.delete(nodeId);
      this.nodes.get(predecessor)?.unlinkDependent(nodeId);
    }

    this.adjacencyList.delete(nodeId);
    this.reverseIndex.delete(nodeId);
    this.nodes.delete(nodeId);
    node.clearLinks();

    this.markDirty();
    logger.debug(
      { graphId: this.id, nodeId, removedEdges: edgesBefore - this.edges.length },
      'Removed node from task graph'
    );
  }

  getNode(nodeId: string): TaskNode {
    const node = this.nodes.get(nodeId);
    if (!node) {
      throw new NotFoundError(`Node ${nodeId} not found`, { graphId: this.id, nodeId });
    }
    return node;
  }

  hasNode(nodeId: string): boolean {
    return this.nodes.has(nodeId);
  }

  getAllNodes(): TaskNode[] {
    return Array.from(this.nodes.values());
  }

  getNodeIds(): string[] {
    return Array.from(this.nodes.keys());
  }

  // ===== EDGE OPERATIONS =====

  /**
   * Insert an edge. The edge is committed first, then checked; a detected
   * cycle (or any failure during the check) restores every touched structure.
   */
  addEdge(edge: TaskEdge): void {
    const source = this.nodes.get(edge.sourceId);
    if (!source) {
      throw new NotFoundError(`Source node ${edge.sourceId} not found`, { graphId: this.id, nodeId: edge.sourceId });
    }
    const target = this.nodes.get(edge.targetId);
    if (!target) {
      throw new NotFoundError(`Target node ${edge.targetId} not found`, { graphId: this.id, nodeId: edge.targetId });
    }
    if (edge.sourceId === edge.targetId) {
      throw new SelfLoopError(edge.sourceId, { graphId: this.id });
    }

    const successors = this.successorSet(edge.sourceId);
    const predecessors = this.predecessorSet(edge.targetId);
    // A parallel edge between the same pair leaves the indices untouched
    const linkExisted = successors.has(edge.targetId);

    this.edges.push(edge);
    successors.add(edge.targetId);
    predecessors.add(edge.sourceId);
    source.linkDependent(edge.targetId);
    target.linkDependency(edge.sourceId);

    let cycleDetected: boolean;
    try {
      cycleDetected = this.requiresCycleCheck(edge) && this.hasCycle();
    } catch (error) {
      this.rollbackEdge(edge, source, target, linkExisted);
      throw error;
    }

    if (cycleDetected) {
      this.rollbackEdge(edge, source, target, linkExisted);
      logger.warn(
        { graphId: this.id, sourceId: edge.sourceId, targetId: edge.targetId, edgeType: edge.edgeType },
        'Rejected edge: would create cycle'
      );
      throw new CycleError(edge.sourceId, edge.targetId, { graphId: this.id, edgeType: edge.edgeType });
    }

    this.markDirty();
    logger.debug(
      { graphId: this.id, sourceId: edge.sourceId, targetId: edge.targetId, edgeType: edge.edgeType },
      'Added edge to task graph'
    );
  }

  /**
   * Remove every edge from source to target
   */
  removeEdge(sourceId: string, targetId: string): void {
    const remaining = this.edges.filter(edge => !(edge.sourceId === sourceId && edge.targetId === targetId));
    if (remaining.length === this.edges.length) {
      throw new NotFoundError(`Edge ${sourceId} -> ${targetId} not found`, { graphId: this.id, sourceId, targetId });
    }

    const removed = this.edges.length - remaining.length;
    this.edges = remaining;
    this.adjacencyList.get(sourceId)?.delete(targetId);
    this.reverseIndex.get(targetId)?.delete(sourceId);
    this.nodes.get(sourceId)?.unlinkDependent(targetId);
    this.nodes.get(targetId)?.unlinkDependency(sourceId);

    this.markDirty();
    logger.debug({ graphId: this.id, sourceId, targetId, removed }, 'Removed edge from task graph');
  }

  getEdges(): TaskEdge[] {
    return [...this.edges];
  }

  getEdgesFrom(nodeId: string): TaskEdge[] {
    return this.edges.filter(edge => edge.sourceId === nodeId);
  }

  getEdgesTo(nodeId: string): TaskEdge[] {
    return this.edges.filter(edge => edge.targetId === nodeId);
  }

  hasEdge(sourceId: string, targetId: string): boolean {
    return this.edges.some(edge => edge.sourceId === sourceId && edge.targetId === targetId);
  }

  getSuccessors(nodeId: string): string[] {
    return Array.from(this.adjacencyList.get(nodeId) ?? []);
  }

  getPredecessors(nodeId: string): string[] {
    return Array.from(this.reverseIndex.get(nodeId) ?? []);
  }

  /** Entry points: nodes without dependencies */
  getRootNodes(): TaskNode[] {
    return this.getAllNodes().filter(node => node.dependencies.size === 0);
  }

  /** Exit points: nodes without dependents */
  getLeafNodes(): TaskNode[] {
    return this.getAllNodes().filter(node => node.dependents.size === 0);
  }

  // ===== GRAPH ANALYSIS =====

  /**
   * Depth-first search over the full adjacency, whatever the edge types
   */
  hasCycle(): boolean {
    const visited = new Set<string>();
    const onStack = new Set<string>();

    for (const startId of this.nodes.keys()) {
      if (visited.has(startId)) continue;

      visited.add(startId);
      onStack.add(startId);
      const stack: DfsFrame[] = [{ nodeId: startId, neighbors: this.successorSet(startId).values() }];

      while (stack.length > 0) {
        const frame = stack[stack.length - 1];
        const next = frame.neighbors.next();

        if (next.done) {
          onStack.delete(frame.nodeId);
          stack.pop();
          continue;
        }

        const neighbor = next.value;
        if (onStack.has(neighbor)) {
          return true;
        }
        if (!visited.has(neighbor)) {
          visited.add(neighbor);
          onStack.add(neighbor);
          stack.push({ nodeId: neighbor, neighbors: this.successorSet(neighbor).values() });
        }
      }
    }

    return false;
  }

  isAcyclic(): boolean {
    return !this.hasCycle();
  }

  /**
   * Kahn's algorithm. Nodes with equal standing keep insertion order.
   */
  topologicalSort(): string[] {
    if (this.topologicalOrder) {
      return [...this.topologicalOrder];
    }

    const inDegree = new Map<string, number>();
    const order: string[] = [];

    for (const nodeId of this.nodes.keys()) {
      const degree = this.reverseIndex.get(nodeId)?.size ?? 0;
      inDegree.set(nodeId, degree);
      if (degree === 0) {
        order.push(nodeId);
      }
    }

    // `order` doubles as the queue; head marks the next node to dequeue
    for (let head = 0; head < order.length; head++) {
      for (const neighbor of this.successorSet(order[head])) {
        const remaining = (inDegree.get(neighbor) ?? 0) - 1;
        inDegree.set(neighbor, remaining);
        if (remaining === 0) {
          order.push(neighbor);
        }
      }
    }

    if (order.length !== this.nodes.size) {
      logger.warn(
        { graphId: this.id, expected: this.nodes.size, actual: order.length },
        'Topological sort incomplete - graph contains cycles'
      );
      throw new ValidationError('Graph contains cycle, cannot perform topological sort', undefined, {
        graphId: this.id,
        sortedCount: order.length,
        nodeCount: this.nodes.size
      });
    }

    this.topologicalOrder = order;
    return [...order];
  }

  /**
   * Level 0 for nodes without incoming edges, otherwise one more than the
   * deepest predecessor. Written onto each node's `level`.
   */
  calculateNodeLevels(): Map<string, number> {
    const levels = new Map<string, number>();

    for (const nodeId of this.topologicalSort()) {
      let level = 0;
      for (const dependency of this.predecessorSet(nodeId)) {
        level = Math.max(level, (levels.get(dependency) ?? 0) + 1);
      }
      levels.set(nodeId, level);
      this.getNode(nodeId).level = level;
    }

    return levels;
  }

  /**
   * Critical path method: longest duration-weighted path through the graph.
   * Ties between predecessors, and between candidate end nodes, go to the
   * lowest node id.
   */
  calculateCriticalPath(): CriticalPathResult {
    if (this.criticalPath) {
      return { path: [...this.criticalPath.path], totalDuration: this.criticalPath.totalDuration };
    }

    const order = this.topologicalSort();
    const earliestStart = new Map<string, number>();
    const predecessor = new Map<string, string | null>();

    for (const nodeId of order) {
      let start = 0;
      let bestPredecessor: string | null = null;

      for (const dependency of this.predecessorSet(nodeId)) {
        const finish = (earliestStart.get(dependency) ?? 0) + this.durationOf(dependency);
        if (
          bestPredecessor === null ||
          finish > start ||
          (finish === start && dependency < bestPredecessor)
        ) {
          start = finish;
          bestPredecessor = dependency;
        }
      }

      earliestStart.set(nodeId, start);
      predecessor.set(nodeId, bestPredecessor);
    }

    let endNode: string | null = null;
    let maxFinish = 0;
    for (const nodeId of order) {
      const finish = (earliestStart.get(nodeId) ?? 0) + this.durationOf(nodeId);
      if (endNode === null || finish > maxFinish || (finish === maxFinish && nodeId < endNode)) {
        endNode = nodeId;
        maxFinish = finish;
      }
    }

    const path: string[] = [];
    let current = endNode;
    while (current !== null) {
      path.push(current);
      current = predecessor.get(current) ?? null;
    }
    path.reverse();

    const onPath = new Set(path);
    for (const node of this.nodes.values()) {
      node.onCriticalPath = onPath.has(node.id);
    }

    this.criticalPath = { path, totalDuration: maxFinish };
    logger.debug({ graphId: this.id, length: path.length, totalDuration: maxFinish }, 'Calculated critical path');
    return { path: [...path], totalDuration: maxFinish };
  }

  // ===== VALIDATION =====

  validate(): GraphValidationResult {
    const errors: string[] = [];

    if (this.hasCycle()) {
      errors.push('Graph contains cycles');
    }

    for (const edge of this.edges) {
      const source = this.nodes.get(edge.sourceId);
      const target = this.nodes.get(edge.targetId);
      if (!source) {
        errors.push(`Edge references non-existent source node: ${edge.sourceId}`);
      }
      if (!target) {
        errors.push(`Edge references non-existent target node: ${edge.targetId}`);
      }
      if (source && !source.dependents.has(edge.targetId)) {
        errors.push(`Edge ${edge.sourceId} -> ${edge.targetId} missing from dependents of ${edge.sourceId}`);
      }
      if (target && !target.dependencies.has(edge.sourceId)) {
        errors.push(`Edge ${edge.sourceId} -> ${edge.targetId} missing from dependencies of ${edge.targetId}`);
      }
    }

    for (const node of this.nodes.values()) {
      for (const dependencyId of node.dependencies) {
        if (!this.nodes.has(dependencyId)) {
          errors.push(`Node ${node.id} references non-existent dependency: ${dependencyId}`);
        } else if (!this.hasEdge(dependencyId, node.id)) {
          errors.push(`Node ${node.id} lists dependency ${dependencyId} without a matching edge`);
        }
      }
      for (const dependentId of node.dependents) {
        if (!this.nodes.has(dependentId)) {
          errors.push(`Node ${node.id} references non-existent dependent: ${dependentId}`);
        } else if (!this.hasEdge(node.id, dependentId)) {
          errors.push(`Node ${node.id} lists dependent ${dependentId} without a matching edge`);
        }
      }
    }

    return { isValid: errors.length === 0, errors };
  }

  getStats(): GraphStats {
    const statusCounts: Record<NodeStatus, number> = {
      pending: 0,
      ready: 0,
      running: 0,
      completed: 0,
      failed: 0,
      cancelled: 0,
      blocked: 0
    };
    for (const node of this.nodes.values()) {
      statusCounts[node.status] += 1;
    }

    return {
      graphId: this.id,
      nodeCount: this.nodes.size,
      edgeCount: this.edges.length,
      rootCount: this.getRootNodes().length,
      leafCount: this.getLeafNodes().length,
      isAcyclic: this.isAcyclic(),
      statusCounts
    };
  }

  // ===== SERIALIZATION =====

  toDict(): SerializedGraph {
    const nodes: SerializedGraph['nodes'] = {};
    for (const [nodeId, node] of this.nodes) {
      nodes[nodeId] = node.toDict();
    }

    return {
      graph_id: this.id,
      metadata: { ...this.metadata },
      nodes,
      edges: this.edges.map(edge => edge.toDict()),
      node_count: this.nodes.size,
      edge_count: this.edges.length
    };
  }

  toJsonString(): string {
    return JSON.stringify(this.toDict(), null, 2);
  }

  /**
   * Rebuild a graph from its wire form. Neighbor sets are derived from the
   * edge list. Edges are not cycle-checked, so a stored cyclic graph loads
   * and shows up in validate() and the analyzer.
   */
  static fromDict(data: unknown, options: Pick<TaskGraphOptions, 'cyclePolicy'> = {}): TaskGraph {
    const parsed = serializedGraphSchema.safeParse(data);
    if (!parsed.success) {
      throw new ValidationError('Invalid task graph snapshot', parsed.error.issues);
    }

    const snapshot = parsed.data;
    const graph = new TaskGraph({
      id: snapshot.graph_id,
      metadata: snapshot.metadata,
      cyclePolicy: options.cyclePolicy
    });

    for (const [key, nodeData] of Object.entries(snapshot.nodes)) {
      if (key !== nodeData.id) {
        throw new ValidationError(`Node key ${key} does not match node id ${nodeData.id}`, undefined, { graphId: graph.id });
      }
      const node = TaskNode.fromDict(nodeData);
      graph.nodes.set(node.id, node);
      graph.adjacencyList.set(node.id, new Set());
      graph.reverseIndex.set(node.id, new Set());
    }

    for (const edgeData of snapshot.edges) {
      const edge = TaskEdge.fromDict(edgeData);
      const source = graph.nodes.get(edge.sourceId);
      const target = graph.nodes.get(edge.targetId);
      if (!source || !target) {
        throw new ValidationError(`Edge ${edge.sourceId} -> ${edge.targetId} references a missing node`, undefined, {
          graphId: graph.id
        });
      }
      if (edge.sourceId === edge.targetId) {
        throw new ValidationError(`Edge ${edge.sourceId} -> ${edge.targetId} is a self-loop`, undefined, {
          graphId: graph.id
        });
      }

      graph.edges.push(edge);
      graph.successorSet(edge.sourceId).add(edge.targetId);
      graph.predecessorSet(edge.targetId).add(edge.sourceId);
      source.linkDependent(edge.targetId);
      target.linkDependency(edge.sourceId);
    }

    graph.markDirty();
    if (graph.hasCycle()) {
      logger.warn({ graphId: graph.id }, 'Loaded task graph snapshot contains cycles');
    }
    logger.debug({ graphId: graph.id, nodes: graph.nodeCount, edges: graph.edgeCount }, 'Loaded task graph snapshot');
    return graph;
  }

  toString(): string {
    return `TaskGraph[${this.id}]: ${this.nodes.size} nodes, ${this.edges.length} edges`;
  }

  // ===== INTERNALS =====

  private requiresCycleCheck(edge: TaskEdge): boolean {
    return this.cyclePolicy === 'all' || edge.isCycleSignificant();
  }

  private rollbackEdge(edge: TaskEdge, source: TaskNode, target: TaskNode, linkExisted: boolean): void {
    const index = this.edges.lastIndexOf(edge);
    if (index !== -1) {
      this.edges.splice(index, 1);
    }
    if (!linkExisted) {
      this.successorSet(edge.sourceId).delete(edge.targetId);
      this.predecessorSet(edge.targetId).delete(edge.sourceId);
      source.unlinkDependent(edge.targetId);
      target.unlinkDependency(edge.sourceId);
    }
  }

  private successorSet(nodeId: string): Set<string> {
    let successors = this.adjacencyList.get(nodeId);
    if (!successors) {
      successors = new Set();
      this.adjacencyList.set(nodeId, successors);
    }
    return successors;
  }

  private predecessorSet(nodeId: string): Set<string> {
    let predecessors = this.reverseIndex.get(nodeId);
    if (!predecessors) {
      predecessors = new Set();
      this.reverseIndex.set(nodeId, predecessors);
    }
    return predecessors;
  }

  private durationOf(nodeId: string): number {
    return this.nodes.get(nodeId)?.costModel.duration ?? 0;
  }

  private markDirty(): void {
    this.mutationVersion++;
    this.topologicalOrder = null;
    this.criticalPath = null;
  }
}

/**
 * Factory function to create a new task graph instance
 */
export function createTaskGraph(options: TaskGraphOptions = {}): TaskGraph {
  return new TaskGraph(options);
}
