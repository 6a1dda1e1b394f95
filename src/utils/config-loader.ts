/**
 * Configuration defaults and environment variable mappings for the graph engine
 */

import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import logger from '../logger.js';

/**
 * Which edge insertions trigger a cycle check
 */
export const CYCLE_POLICIES = ['all', 'significant-only'] as const;
export type CyclePolicy = typeof CYCLE_POLICIES[number];

/**
 * Tunables consumed by TaskGraph and GraphAnalyzer
 */
export interface GraphEngineConfig {
  cyclePolicy: CyclePolicy;
  bottleneckThreshold: number;
  healthBottleneckThreshold: number;
  pageRankIterations: number;
  pageRankDamping: number;
  redundancyPathBudget: number;
}

/**
 * Environment variable configuration mapping
 */
export interface EnvironmentVariableConfig {
  key: string;
  field: keyof GraphEngineConfig;
  description: string;
}

export const ENVIRONMENT_VARIABLES: EnvironmentVariableConfig[] = [
  {
    key: 'TASK_GRAPH_CYCLE_POLICY',
    field: 'cyclePolicy',
    description: 'Edge insertions that are cycle-checked (all | significant-only)'
  },
  {
    key: 'TASK_GRAPH_BOTTLENECK_THRESHOLD',
    field: 'bottleneckThreshold',
    description: 'Default fan-in/fan-out threshold for bottleneck detection'
  },
  {
    key: 'TASK_GRAPH_HEALTH_BOTTLENECK_THRESHOLD',
    field: 'healthBottleneckThreshold',
    description: 'Fan-in/fan-out threshold used by the health score'
  },
  {
    key: 'TASK_GRAPH_PAGERANK_ITERATIONS',
    field: 'pageRankIterations',
    description: 'Power iterations for influence scoring'
  },
  {
    key: 'TASK_GRAPH_PAGERANK_DAMPING',
    field: 'pageRankDamping',
    description: 'Damping factor for influence scoring'
  },
  {
    key: 'TASK_GRAPH_REDUNDANCY_PATH_BUDGET',
    field: 'redundancyPathBudget',
    description: 'Maximum DFS steps when counting paths on a cyclic graph'
  }
];

export const DEFAULT_GRAPH_ENGINE_CONFIG: GraphEngineConfig = {
  cyclePolicy: 'all',
  bottleneckThreshold: 3,
  healthBottleneckThreshold: 5,
  pageRankIterations: 20,
  pageRankDamping: 0.85,
  redundancyPathBudget: 100_000
};

export const graphEngineConfigSchema = z.object({
  cyclePolicy: z.enum(CYCLE_POLICIES),
  bottleneckThreshold: z.coerce.number().int().min(1),
  healthBottleneckThreshold: z.coerce.number().int().min(1),
  pageRankIterations: z.coerce.number().int().min(1).max(1000),
  pageRankDamping: z.coerce.number().min(0).max(1),
  redundancyPathBudget: z.coerce.number().int().min(1)
});

/**
 * Build the engine configuration from environment variables.
 * Unset or empty variables fall back to the defaults.
 */
export function loadGraphEngineConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<GraphEngineConfig> = {}
): GraphEngineConfig {
  const raw: Record<string, unknown> = { ...DEFAULT_GRAPH_ENGINE_CONFIG };

  for (const variable of ENVIRONMENT_VARIABLES) {
    const value = env[variable.key];
    if (value !== undefined && value.trim() !== '') {
      raw[variable.field] = value.trim();
    }
  }

  const result = graphEngineConfigSchema.safeParse({ ...raw, ...overrides });
  if (!result.success) {
    const problems = result.error.issues.map(issue => {
      const field = String(issue.path[0]);
      const variable = ENVIRONMENT_VARIABLES.find(v => v.field === field);
      return `${variable ? variable.key : field}: ${issue.message}`;
    });
    throw new ConfigurationError(`Invalid task graph configuration: ${problems.join('; ')}`, {
      issues: result.error.issues
    });
  }

  logger.debug({ config: result.data }, 'Loaded task graph configuration');
  return result.data;
}

/**
 * Human readable documentation of every supported variable
 */
export function getEnvironmentVariableDocumentation(): Record<string, string> {
  const docs: Record<string, string> = {};
  for (const variable of ENVIRONMENT_VARIABLES) {
    docs[variable.key] = `${variable.description} (default: ${DEFAULT_GRAPH_ENGINE_CONFIG[variable.field]})`;
  }
  return docs;
}
