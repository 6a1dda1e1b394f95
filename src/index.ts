/**
 * Task graph engine public API
 */

export { TaskNode, CostModel, DURATION_COST_FACTOR } from './core/task-node.js';
export type { TaskNodeOptions } from './core/task-node.js';
export { TaskEdge } from './core/task-edge.js';
export type { TaskEdgeOptions } from './core/task-edge.js';
export { TaskGraph, createTaskGraph } from './core/task-graph.js';
export type { TaskGraphOptions } from './core/task-graph.js';
export { GraphAnalyzer, createGraphAnalyzer } from './core/graph-analyzer.js';
export type { AnalyzerConfig } from './core/graph-analyzer.js';
export {
  serializedGraphSchema,
  serializedNodeSchema,
  serializedEdgeSchema,
  costModelSchema
} from './core/graph-schema.js';
export type {
  SerializedGraph,
  SerializedGraphInput,
  SerializedNode,
  SerializedNodeInput,
  SerializedEdge,
  SerializedEdgeInput,
  SerializedCostModel
} from './core/graph-schema.js';

export {
  GraphBuilder,
  createGraphBuilder,
  parseTaskList,
  parseWorkflow,
  EXTERNAL_STATUS_MAP
} from './services/graph-builder.js';
export type { TaskInput, WorkflowStep, TaskListOptions, GraphBuilderOptions } from './services/graph-builder.js';
export { GraphExporter, createGraphExporter, EXPORT_FORMATS } from './services/graph-exporter.js';
export type { ExportFormat, GraphDocument } from './services/graph-exporter.js';
export { GraphMonitor, createGraphMonitor, SOURCE_EVENTS, MONITOR_EVENTS } from './services/graph-monitor.js';
export type {
  LiveStats,
  MetaMetrics,
  MonitorEvent,
  MonitorHealthReport,
  NodeEventPayload,
  TaskEventPayload
} from './services/graph-monitor.js';

export * from './types/graph.js';
export {
  AppError,
  ConfigurationError,
  CycleError,
  DuplicateNodeError,
  NotFoundError,
  ParsingError,
  SelfLoopError,
  ValidationError
} from './utils/errors.js';
export type { ErrorContext } from './utils/errors.js';
export {
  loadGraphEngineConfig,
  getEnvironmentVariableDocumentation,
  DEFAULT_GRAPH_ENGINE_CONFIG,
  ENVIRONMENT_VARIABLES,
  CYCLE_POLICIES
} from './utils/config-loader.js';
export type { GraphEngineConfig, CyclePolicy } from './utils/config-loader.js';
