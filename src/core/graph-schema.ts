/**
 * Wire format for serialized task graphs.
 *
 * Keys are snake_case so snapshots stay readable by tools that consumed the
 * format before this engine existed. Optional fields fall back to the same
 * defaults the constructors use.
 */

import { z } from 'zod';
import { EDGE_TYPES, NODE_STATUSES } from '../types/graph.js';

const metadataSchema = z.record(z.unknown());

export const costModelSchema = z.object({
  duration: z.number().nonnegative().default(1.0),
  monetary_cost: z.number().nonnegative().default(0),
  cpu_units: z.number().nonnegative().default(1.0),
  memory: z.number().nonnegative().default(128),
  io_ops: z.number().int().nonnegative().default(0),
  bandwidth: z.number().nonnegative().default(0)
});

export const serializedNodeSchema = z.object({
  id: z.string().min(1),
  name: z.string(),
  node_type: z.string().default('generic'),
  priority: z.number().int().default(5),
  status: z.enum(NODE_STATUSES).default('pending'),
  cost_model: costModelSchema.default({}),
  metadata: metadataSchema.default({}),
  dependencies: z.array(z.string()).default([]),
  dependents: z.array(z.string()).default([]),
  level: z.number().int().nullable().default(null),
  on_critical_path: z.boolean().default(false),
  influence_score: z.number().default(0),
  parallelization_factor: z.number().default(1),
  start_time: z.string().datetime().nullable().default(null),
  end_time: z.string().datetime().nullable().default(null),
  actual_duration: z.number().nullable().default(null),
  error_message: z.string().nullable().default(null)
});

export const serializedEdgeSchema = z.object({
  source_id: z.string().min(1),
  target_id: z.string().min(1),
  edge_type: z.enum(EDGE_TYPES).default('dependency'),
  weight: z.number().default(1.0),
  constraints: metadataSchema.default({}),
  metadata: metadataSchema.default({})
});

export const serializedGraphSchema = z.object({
  graph_id: z.string().default('default'),
  metadata: metadataSchema.default({}),
  nodes: z.record(serializedNodeSchema).default({}),
  edges: z.array(serializedEdgeSchema).default([]),
  node_count: z.number().int().nonnegative().optional(),
  edge_count: z.number().int().nonnegative().optional()
});

export type SerializedCostModel = z.infer<typeof costModelSchema>;
export type SerializedNode = z.infer<typeof serializedNodeSchema>;
export type SerializedEdge = z.infer<typeof serializedEdgeSchema>;
export type SerializedGraph = z.infer<typeof serializedGraphSchema>;

/** Input shapes accept omitted defaults */
export type SerializedNodeInput = z.input<typeof serializedNodeSchema>;
export type SerializedEdgeInput = z.input<typeof serializedEdgeSchema>;
export type SerializedGraphInput = z.input<typeof serializedGraphSchema>;
