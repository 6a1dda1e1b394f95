import { describe, it, expect, afterEach, vi } from 'vitest';
import { TaskNode, CostModel } from '../../core/task-node.js';
import { TaskEdge } from '../../core/task-edge.js';
import { serializedNodeSchema, serializedEdgeSchema } from '../../core/graph-schema.js';

describe('CostModel', () => {
  it('should apply defaults for omitted fields', () => {
    const model = new CostModel();

    expect(model.toDict()).toEqual({
      duration: 1,
      monetary_cost: 0,
      cpu_units: 1,
      memory: 128,
      io_ops: 0,
      bandwidth: 0
    });
  });

  it('should blend money and duration into total cost', () => {
    const model = new CostModel({ duration: 10, monetaryCost: 2.5 });

    expect(model.totalCost()).toBeCloseTo(2.6, 10);
  });

  it('should clone into an independent instance', () => {
    const model = new CostModel({ duration: 4 });
    const copy = model.clone();
    copy.duration = 8;

    expect(model.duration).toBe(4);
    expect(copy).not.toBe(model);
  });

  it('should read back its wire form', () => {
    const model = CostModel.fromDict({
      duration: 3,
      monetary_cost: 1.5,
      cpu_units: 2,
      memory: 512,
      io_ops: 40,
      bandwidth: 10
    });

    expect(model.duration).toBe(3);
    expect(model.monetaryCost).toBe(1.5);
    expect(model.ioOps).toBe(40);
  });
});

describe('TaskNode', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should start pending with default type and priority', () => {
    const node = new TaskNode({ id: 'a', name: 'Fetch' });

    expect(node.status).toBe('pending');
    expect(node.nodeType).toBe('generic');
    expect(node.priority).toBe(5);
    expect(node.dependencies.size).toBe(0);
    expect(node.dependents.size).toBe(0);
    expect(node.hasLinks()).toBe(false);
  });

  it('should accept a plain cost model object', () => {
    const node = new TaskNode({ id: 'a', name: 'Fetch', costModel: { duration: 7 } });

    expect(node.costModel).toBeInstanceOf(CostModel);
    expect(node.costModel.duration).toBe(7);
    expect(node.costModel.memory).toBe(128);
  });

  it('should derive actual duration from start time on completion', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-01T10:00:00.000Z'));
    const node = new TaskNode({ id: 'a', name: 'Fetch' });

    node.markRunning();
    vi.setSystemTime(new Date('2024-03-01T10:00:05.000Z'));
    node.markCompleted();

    expect(node.status).toBe('completed');
    expect(node.actualDuration).toBe(5);
    expect(node.endTime?.toISOString()).toBe('2024-03-01T10:00:05.000Z');
  });

  it('should prefer an explicit duration on completion', () => {
    const node = new TaskNode({ id: 'a', name: 'Fetch' });
    node.markRunning();
    node.markCompleted(12.5);

    expect(node.actualDuration).toBe(12.5);
  });

  it('should record message and duration on failure', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-01T10:00:00.000Z'));
    const node = new TaskNode({ id: 'a', name: 'Fetch' });

    node.markRunning();
    vi.setSystemTime(new Date('2024-03-01T10:00:02.000Z'));
    node.markFailed('timeout');

    expect(node.status).toBe('failed');
    expect(node.errorMessage).toBe('timeout');
    expect(node.actualDuration).toBe(2);
  });

  it('should classify terminal and executable statuses', () => {
    const node = new TaskNode({ id: 'a', name: 'Fetch' });
    expect(node.isTerminal()).toBe(false);
    expect(node.canExecute()).toBe(false);

    node.markReady();
    expect(node.canExecute()).toBe(true);

    node.markBlocked();
    expect(node.canExecute()).toBe(false);
    expect(node.isTerminal()).toBe(false);

    node.markCancelled();
    expect(node.isTerminal()).toBe(true);
  });

  it('should manage metadata', () => {
    const node = new TaskNode({ id: 'a', name: 'Fetch', metadata: { owner: 'team-a' } });

    node.setMetadata('retries', 2);
    node.updateMetadata({ owner: 'team-b', region: 'eu' });

    expect(node.getMetadata('owner')).toBe('team-b');
    expect(node.getMetadata('retries')).toBe(2);
    expect(node.getMetadata('missing', 'fallback')).toBe('fallback');
    expect(node.metadata).toEqual({ owner: 'team-b', retries: 2, region: 'eu' });
  });

  it('should serialize with sorted neighbor lists and ISO timestamps', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2024-03-01T10:00:00.000Z'));
    const node = new TaskNode({ id: 'b', name: 'Transform', nodeType: 'transformation', priority: 3 });
    node.linkDependency('z');
    node.linkDependency('a');
    node.linkDependent('c');
    node.markRunning();

    const data = node.toDict();

    expect(data.dependencies).toEqual(['a', 'z']);
    expect(data.dependents).toEqual(['c']);
    expect(data.start_time).toBe('2024-03-01T10:00:00.000Z');
    expect(data.end_time).toBeNull();
    expect(data.node_type).toBe('transformation');
    expect(serializedNodeSchema.safeParse(data).success).toBe(true);
  });

  it('should restore fields but not links from its wire form', () => {
    const data = serializedNodeSchema.parse({
      id: 'b',
      name: 'Transform',
      status: 'failed',
      error_message: 'disk full',
      dependencies: ['a'],
      start_time: '2024-03-01T10:00:00.000Z'
    });

    const node = TaskNode.fromDict(data);

    expect(node.status).toBe('failed');
    expect(node.errorMessage).toBe('disk full');
    expect(node.startTime?.toISOString()).toBe('2024-03-01T10:00:00.000Z');
    expect(node.dependencies.size).toBe(0);
  });
});

describe('TaskEdge', () => {
  it('should default to a dependency edge of weight 1', () => {
    const edge = new TaskEdge({ sourceId: 'a', targetId: 'b' });

    expect(edge.edgeType).toBe('dependency');
    expect(edge.weight).toBe(1);
    expect(edge.isDependency()).toBe(true);
    expect(edge.isCycleSignificant()).toBe(true);
    expect(edge.toString()).toBe('a -> b');
  });

  it('should treat only dependency and constraint edges as cycle-significant', () => {
    const significance = (['dependency', 'constraint', 'data_flow', 'conditional', 'weak'] as const).map(
      edgeType => new TaskEdge({ sourceId: 'a', targetId: 'b', edgeType }).isCycleSignificant()
    );

    expect(significance).toEqual([true, true, false, false, false]);
  });

  it('should expose type predicates', () => {
    expect(new TaskEdge({ sourceId: 'a', targetId: 'b', edgeType: 'constraint' }).isConstraint()).toBe(true);
    expect(new TaskEdge({ sourceId: 'a', targetId: 'b', edgeType: 'conditional' }).isConditional()).toBe(true);
    expect(new TaskEdge({ sourceId: 'a', targetId: 'b', edgeType: 'weak' }).isWeak()).toBe(true);
  });

  it('should detect timing constraints', () => {
    const edge = new TaskEdge({ sourceId: 'a', targetId: 'b' });
    expect(edge.hasTimingConstraint()).toBe(false);

    edge.setConstraint('max_delay', 30);

    expect(edge.hasTimingConstraint()).toBe(true);
    expect(edge.getConstraint('max_delay')).toBe(30);
    expect(edge.getConstraint('min_delay', 0)).toBe(0);
  });

  it('should round-trip its wire form', () => {
    const edge = new TaskEdge({
      sourceId: 'a',
      targetId: 'b',
      edgeType: 'data_flow',
      weight: 2.5,
      constraints: { min_delay: 1 },
      metadata: { channel: 'queue' }
    });

    const restored = TaskEdge.fromDict(serializedEdgeSchema.parse(edge.toDict()));

    expect(restored.toDict()).toEqual({
      source_id: 'a',
      target_id: 'b',
      edge_type: 'data_flow',
      weight: 2.5,
      constraints: { min_delay: 1 },
      metadata: { channel: 'queue' }
    });
  });
});
