import * as fs from 'node:fs/promises';
import path from 'node:path';

export interface ExecutionConfig {
  /** Default deadline per step in ms; 0 disables it. */
  stepTimeoutMs: number;
  /** Deadline for a whole run in ms; 0 disables it. */
  workflowTimeoutMs: number;
  /** Batch size for Parallel workflows; 0 launches every step at once. */
  maxConcurrentSteps: number;
}

export interface EventsConfig {
  publishStepEvents: boolean;
  publishStatusEvents: boolean;
}

export interface HistoryConfig {
  /** Finished runs kept for `observeWorkflow`. */
  maxCompletedRuns: number;
}

export interface OrchestratorConfig {
  execution: ExecutionConfig;
  events: EventsConfig;
  history: HistoryConfig;
}

export interface OrchestratorConfigOverrides {
  execution?: Partial<ExecutionConfig>;
  events?: Partial<EventsConfig>;
  history?: Partial<HistoryConfig>;
}

export const DEFAULT_CONFIG: OrchestratorConfig = {
  execution: {
    stepTimeoutMs: 0,
    workflowTimeoutMs: 0,
    maxConcurrentSteps: 0,
  },
  events: {
    publishStepEvents: true,
    publishStatusEvents: true,
  },
  history: {
    maxCompletedRuns: 50,
  },
};

const ENV_OVERRIDES: ReadonlyArray<[string, keyof ExecutionConfig]> = [
  ['ORCHESTRATOR_STEP_TIMEOUT_MS', 'stepTimeoutMs'],
  ['ORCHESTRATOR_WORKFLOW_TIMEOUT_MS', 'workflowTimeoutMs'],
  ['ORCHESTRATOR_MAX_CONCURRENT_STEPS', 'maxConcurrentSteps'],
];

export function getConfigPath(overridePath?: string): string {
  if (overridePath) return path.resolve(overridePath);
  const fromEnv = process.env.ORCHESTRATOR_CONFIG_PATH?.trim();
  if (fromEnv) return path.resolve(fromEnv);
  return path.resolve('orchestrator.json');
}

/**
 * Load the orchestrator config: JSON file merged over defaults, then
 * environment overrides. A missing file yields the defaults.
 */
export async function readConfig(overridePath?: string): Promise<OrchestratorConfig> {
  const targetPath = getConfigPath(overridePath);
  let loaded: unknown = {};

  try {
    const rawData = await fs.readFile(targetPath, 'utf-8');
    loaded = JSON.parse(rawData);
  } catch (error) {
    const fsError = error as NodeJS.ErrnoException;
    if (fsError.code !== 'ENOENT') {
      throw new Error(`Failed to parse config file at ${targetPath}: ${fsError.message}`);
    }
  }

  return applyEnvOverrides(mergeWithDefaults(loaded));
}

function asRecord(value: unknown): Record<string, unknown> | undefined {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
    ? Object.fromEntries(Object.entries(value))
    : undefined;
}

function nonNegativeInt(value: unknown, fallback: number): number {
  const parsed = typeof value === 'string' ? Number(value.trim()) : value;
  if (typeof parsed !== 'number' || !Number.isFinite(parsed) || parsed < 0) {
    return fallback;
  }
  return Math.floor(parsed);
}

function bool(value: unknown, fallback: boolean): boolean {
  return typeof value === 'boolean' ? value : fallback;
}

/** Merge a partial or untrusted config object over `DEFAULT_CONFIG`; invalid fields fall back. */
export function mergeWithDefaults(loaded: unknown): OrchestratorConfig {
  const root = asRecord(loaded) ?? {};
  const execution = asRecord(root.execution) ?? {};
  const events = asRecord(root.events) ?? {};
  const history = asRecord(root.history) ?? {};
  const defaults = DEFAULT_CONFIG;

  return {
    execution: {
      stepTimeoutMs: nonNegativeInt(execution.stepTimeoutMs, defaults.execution.stepTimeoutMs),
      workflowTimeoutMs: nonNegativeInt(
        execution.workflowTimeoutMs,
        defaults.execution.workflowTimeoutMs,
      ),
      maxConcurrentSteps: nonNegativeInt(
        execution.maxConcurrentSteps,
        defaults.execution.maxConcurrentSteps,
      ),
    },
    events: {
      publishStepEvents: bool(events.publishStepEvents, defaults.events.publishStepEvents),
      publishStatusEvents: bool(events.publishStatusEvents, defaults.events.publishStatusEvents),
    },
    history: {
      maxCompletedRuns: nonNegativeInt(history.maxCompletedRuns, defaults.history.maxCompletedRuns),
    },
  };
}

export function applyEnvOverrides(
  config: OrchestratorConfig,
  env: NodeJS.ProcessEnv = process.env,
): OrchestratorConfig {
  const execution = { ...config.execution };
  for (const [envName, field] of ENV_OVERRIDES) {
    const raw = env[envName];
    if (raw !== undefined && raw.trim() !== '') {
      execution[field] = nonNegativeInt(raw, execution[field]);
    }
  }
  return { ...config, execution };
}

/** Resolve programmatic overrides (e.g. from a constructor) against a base config. */
export function resolveConfig(
  overrides: OrchestratorConfigOverrides = {},
  base: OrchestratorConfig = DEFAULT_CONFIG,
): OrchestratorConfig {
  return mergeWithDefaults({
    execution: { ...base.execution, ...overrides.execution },
    events: { ...base.events, ...overrides.events },
    history: { ...base.history, ...overrides.history },
  });
}
