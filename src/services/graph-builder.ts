import { z } from 'zod';
import { TaskGraph, type TaskGraphOptions } from '../core/task-graph.js';
import { TaskNode, CostModel } from '../core/task-node.js';
import { TaskEdge } from '../core/task-edge.js';
import type { CostModelData, NodeStatus } from '../types/graph.js';
import { CycleError, ValidationError } from '../utils/errors.js';
import logger from '../logger.js';

/**
 * Lifecycle states used by upstream task queues
 */
export const EXTERNAL_TASK_STATUSES = ['queued', 'running', 'done', 'error', 'cancelled'] as const;
export type ExternalTaskStatus = typeof EXTERNAL_TASK_STATUSES[number];

export const EXTERNAL_STATUS_MAP: Record<ExternalTaskStatus, NodeStatus> = {
  queued: 'pending',
  running: 'running',
  done: 'completed',
  error: 'failed',
  cancelled: 'cancelled'
};

export const taskInputSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  taskType: z.string().default('generic'),
  priority: z.number().int().default(5),
  status: z.enum(EXTERNAL_TASK_STATUSES).default('queued'),
  context: z.record(z.unknown()).default({}),
  startedAt: z.string().datetime().optional(),
  completedAt: z.string().datetime().optional()
});

export const workflowStepSchema = z.object({
  task: z.string().min(1).optional(),
  priority: z.number().int().default(5),
  metadata: z.record(z.unknown()).default({})
});

export const taskListSchema = z.array(taskInputSchema);
export const workflowSchema = z.array(workflowStepSchema);

export type TaskInput = z.input<typeof taskInputSchema>;
export type WorkflowStep = z.input<typeof workflowStepSchema>;
type ParsedTask = z.infer<typeof taskInputSchema>;
type ParsedWorkflowStep = z.infer<typeof workflowStepSchema>;

export interface TaskListOptions {
  graphId?: string;
  /** Chain tasks in list order */
  detectDependencies?: boolean;
}

export interface GraphBuilderOptions {
  cyclePolicy?: TaskGraphOptions['cyclePolicy'];
}

/**
 * Default cost estimates per task type
 */
const DEFAULT_COST_MODELS: Record<string, Partial<CostModelData>> = {
  data_fetch: { duration: 2.0, cpuUnits: 1.0, memory: 256, ioOps: 100 },
  computation: { duration: 5.0, cpuUnits: 4.0, memory: 512, ioOps: 10 },
  aggregation: { duration: 1.0, cpuUnits: 1.0, memory: 128, ioOps: 20 },
  visualization: { duration: 3.0, cpuUnits: 2.0, memory: 256, ioOps: 50 },
  data_io: { duration: 2.5, cpuUnits: 1.0, memory: 256, ioOps: 200 },
  transformation: { duration: 4.0, cpuUnits: 2.0, memory: 512, ioOps: 50 },
  validation: { duration: 2.0, cpuUnits: 1.0, memory: 128, ioOps: 30 },
  model_io: { duration: 10.0, cpuUnits: 2.0, memory: 1024, ioOps: 500 },
  preprocessing: { duration: 3.0, cpuUnits: 2.0, memory: 512, ioOps: 20 },
  inference: { duration: 15.0, cpuUnits: 8.0, memory: 2048, ioOps: 10 },
  postprocessing: { duration: 2.0, cpuUnits: 1.0, memory: 256, ioOps: 20 },
  pipeline: { duration: 20.0, cpuUnits: 4.0, memory: 1024, ioOps: 100 },
  generic: { duration: 1.0, cpuUnits: 1.0, memory: 128, ioOps: 10 }
};

/**
 * Task name -> names of tasks it depends on
 */
const DEFAULT_DEPENDENCY_PATTERNS: Record<string, string[]> = {
  compute_sentiment: ['fetch_data'],
  aggregate_results: ['compute_sentiment'],
  generate_plot: ['aggregate_results'],
  transform_data: ['load_data'],
  validate_data: ['transform_data'],
  save_data: ['validate_data'],
  preprocess_input: ['load_model'],
  run_inference: ['preprocess_input', 'load_model'],
  postprocess_output: ['run_inference']
};

function parseInput<T extends z.ZodTypeAny>(schema: T, input: unknown, label: string): z.infer<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(`Invalid ${label}`, result.error.issues);
  }
  return result.data;
}

/**
 * Validate an untyped task list, e.g. one read from a file
 */
export function parseTaskList(input: unknown): ParsedTask[] {
  return parseInput(taskListSchema, input, 'task list');
}

/**
 * Validate untyped workflow steps
 */
export function parseWorkflow(input: unknown): ParsedWorkflowStep[] {
  return parseInput(workflowSchema, input, 'workflow');
}

/**
 * Turns task lists and declared workflows into task graphs, attaching cost
 * estimates by task type and dependency edges by task name.
 */
export class GraphBuilder {
  private costModels = new Map<string, CostModel>();
  private dependencyPatterns = new Map<string, string[]>();
  private readonly cyclePolicy: TaskGraphOptions['cyclePolicy'];

  constructor(options: GraphBuilderOptions = {}) {
    this.cyclePolicy = options.cyclePolicy;
    for (const [taskType, model] of Object.entries(DEFAULT_COST_MODELS)) {
      this.costModels.set(taskType, new CostModel(model));
    }
    for (const [taskName, dependencies] of Object.entries(DEFAULT_DEPENDENCY_PATTERNS)) {
      this.dependencyPatterns.set(taskName, [...dependencies]);
    }
  }

  /**
   * Single-node graph for one task
   */
  fromTask(task: TaskInput, graphId: string = 'task_graph'): TaskGraph {
    const parsed = parseInput(taskInputSchema, task, 'task');
    const graph = this.createGraph(graphId, { source: 'task', originalTaskId: parsed.id });

    graph.addNode(this.nodeFromTask(parsed));

    logger.info({ graphId, taskId: parsed.id }, 'Built task graph from task');
    return graph;
  }

  /**
   * One node per task; with `detectDependencies` each task depends on the one before it
   */
  fromTaskList(tasks: TaskInput[], options: TaskListOptions = {}): TaskGraph {
    const { graphId = 'task_pipeline', detectDependencies = true } = options;
    const parsed = parseTaskList(tasks);
    const graph = this.createGraph(graphId, { source: 'task_list', taskCount: parsed.length });

    for (const task of parsed) {
      graph.addNode(this.nodeFromTask(task));
    }

    if (detectDependencies) {
      for (let i = 0; i < parsed.length - 1; i++) {
        graph.addEdge(new TaskEdge({ sourceId: parsed[i].id, targetId: parsed[i + 1].id }));
      }
    }

    logger.info({ graphId, nodes: graph.nodeCount, edges: graph.edgeCount }, 'Built task graph from task list');
    return graph;
  }

  /**
   * Node ids are `<task>_<index>`. A step depends on every earlier step whose
   * task name its dependency pattern lists.
   */
  fromWorkflow(steps: WorkflowStep[], graphId: string = 'workflow'): TaskGraph {
    const parsed = parseWorkflow(steps);
    const graph = this.createGraph(graphId, { source: 'workflow', taskCount: parsed.length });
    const names = parsed.map((step, index) => step.task ?? `task_${index}`);
    const nodeIds = this.addWorkflowNodes(graph, parsed, names);

    for (let index = 0; index < parsed.length; index++) {
      const dependencies = this.dependencyPatterns.get(names[index]);
      if (!dependencies) continue;

      for (const dependencyName of dependencies) {
        for (let previous = 0; previous < index; previous++) {
          if (names[previous] !== dependencyName) continue;

          try {
            graph.addEdge(new TaskEdge({ sourceId: nodeIds[previous], targetId: nodeIds[index] }));
          } catch (error) {
            if (!(error instanceof CycleError)) {
              throw error;
            }
            logger.warn({ graphId, sourceId: nodeIds[previous], targetId: nodeIds[index] }, 'Skipping edge (cycle detected)');
          }
        }
      }
    }

    logger.info({ graphId, nodes: graph.nodeCount, edges: graph.edgeCount }, 'Built task graph from workflow');
    return graph;
  }

  /**
   * Linear chain in step order
   */
  fromSequential(steps: WorkflowStep[], graphId: string = 'sequential_workflow'): TaskGraph {
    const parsed = parseWorkflow(steps);
    const graph = this.createGraph(graphId, { source: 'workflow', mode: 'sequential' });
    const names = parsed.map((step, index) => step.task ?? `task_${index}`);
    const nodeIds = this.addWorkflowNodes(graph, parsed, names);

    for (let i = 0; i < nodeIds.length - 1; i++) {
      graph.addEdge(new TaskEdge({ sourceId: nodeIds[i], targetId: nodeIds[i + 1] }));
    }

    logger.info({ graphId, nodes: graph.nodeCount }, 'Built sequential task graph');
    return graph;
  }

  /**
   * Copy several graphs side by side into one. Node ids are prefixed with
   * their source graph id so equal ids from different graphs stay apart.
   */
  mergeGraphs(graphs: TaskGraph[], mergedGraphId: string = 'merged_graph'): TaskGraph {
    const merged = this.createGraph(mergedGraphId, {
      source: 'merged',
      sourceGraphs: graphs.map(graph => graph.id)
    });

    for (const graph of graphs) {
      for (const node of graph.getAllNodes()) {
        const copy = new TaskNode({
          id: `${graph.id}_${node.id}`,
          name: node.name,
          nodeType: node.nodeType,
          priority: node.priority,
          costModel: node.costModel.clone(),
          metadata: { ...node.metadata, source_graph: graph.id }
        });
        copy.status = node.status;
        merged.addNode(copy);
      }
    }

    for (const graph of graphs) {
      for (const edge of graph.getEdges()) {
        merged.addEdge(new TaskEdge({
          sourceId: `${graph.id}_${edge.sourceId}`,
          targetId: `${graph.id}_${edge.targetId}`,
          edgeType: edge.edgeType,
          weight: edge.weight,
          constraints: edge.constraints,
          metadata: edge.metadata
        }));
      }
    }

    logger.info({ graphId: mergedGraphId, sourceCount: graphs.length, nodes: merged.nodeCount }, 'Merged task graphs');
    return merged;
  }

  addCostModel(taskType: string, costModel: CostModel | Partial<CostModelData>): void {
    this.costModels.set(taskType, costModel instanceof CostModel ? costModel.clone() : new CostModel(costModel));
    logger.info({ taskType }, 'Registered cost model');
  }

  addDependencyPattern(taskName: string, dependencies: string[]): void {
    this.dependencyPatterns.set(taskName, [...dependencies]);
    logger.info({ taskName, dependencies }, 'Registered dependency pattern');
  }

  /**
   * Fresh copy of the cost model for a task type, or the generic model
   */
  getCostModel(taskType: string): CostModel {
    const model = this.costModels.get(taskType) ?? this.costModels.get('generic') ?? new CostModel();
    return model.clone();
  }

  getDependencyPattern(taskName: string): string[] {
    return [...(this.dependencyPatterns.get(taskName) ?? [])];
  }

  private createGraph(graphId: string, metadata: Record<string, unknown>): TaskGraph {
    return new TaskGraph({ id: graphId, metadata, cyclePolicy: this.cyclePolicy });
  }

  private nodeFromTask(task: ParsedTask): TaskNode {
    const node = new TaskNode({
      id: task.id,
      name: task.name,
      nodeType: task.taskType,
      priority: task.priority,
      costModel: this.getCostModel(task.taskType),
      metadata: { context: task.context }
    });

    node.status = EXTERNAL_STATUS_MAP[task.status];
    node.startTime = task.startedAt ? new Date(task.startedAt) : null;
    node.endTime = task.completedAt ? new Date(task.completedAt) : null;
    return node;
  }

  private addWorkflowNodes(graph: TaskGraph, steps: ParsedWorkflowStep[], names: string[]): string[] {
    return steps.map((step, index) => {
      const taskType = typeof step.metadata.task_type === 'string' ? step.metadata.task_type : 'generic';
      const nodeId = `${names[index]}_${index}`;

      graph.addNode(new TaskNode({
        id: nodeId,
        name: names[index],
        nodeType: taskType,
        priority: step.priority,
        costModel: this.getCostModel(taskType),
        metadata: step.metadata
      }));

      return nodeId;
    });
  }
}

/**
 * Factory function to create a graph builder instance
 */
export function createGraphBuilder(options: GraphBuilderOptions = {}): GraphBuilder {
  return new GraphBuilder(options);
}
