import type { ActionResult, AgentType } from './agent.js';

export const WORKFLOW_TYPES = ['Sequential', 'Parallel', 'Conditional', 'Hierarchical'] as const;

export type WorkflowType = (typeof WORKFLOW_TYPES)[number];

export function isWorkflowType(value: string): value is WorkflowType {
  return WORKFLOW_TYPES.some((type) => type === value);
}

/**
 * What a Sequential workflow does after a step fails. `StopWorkflow` stops at
 * the first critical failure; `IgnoreErrors` always runs the remaining steps.
 */
export const ERROR_HANDLING_MODES = ['StopWorkflow', 'IgnoreErrors'] as const;

export type ErrorHandlingMode = (typeof ERROR_HANDLING_MODES)[number];

export interface WorkflowStep {
  /** Unique within a workflow; used as dependency key and result key. */
  name: string;
  requiredAgentType: AgentType;
  /** Becomes the environment state the agent reasons over. */
  parameters?: Record<string, unknown>;
  /** Names of steps that must complete before this one. */
  dependencies?: string[];
  /** Conditional workflows only, e.g. `fetch.Success == true`. */
  condition?: string;
  /** Per-step deadline; overrides `execution.stepTimeoutMs`. */
  timeoutMs?: number;
  /** Action types the chosen agent must support; filters candidates before scoring. */
  requiredCapabilities?: string[];
  /** Let later steps run after this one fails. */
  continueOnFailure?: boolean;
  /** A failed critical step stops a `StopWorkflow` run. Defaults to `!continueOnFailure`. */
  critical?: boolean;
}

export interface WorkflowDefinition {
  name: string;
  type: WorkflowType;
  /** Order matters for Sequential and Conditional; Hierarchical derives topology from dependencies. */
  steps: WorkflowStep[];
  /** Defaults to `StopWorkflow`. */
  errorHandling?: ErrorHandlingMode;
}

/** Parsed form of a step condition: a dependency result field compared with a literal. */
export interface StepCondition {
  kind: 'comparison';
  dependency: string;
  field: 'success';
  operator: '==' | '!=';
  expected: boolean;
}

/** Aggregate of a hierarchical step and the subtree executed beneath it. */
export interface HierarchyOutcome {
  stepResult: ActionResult;
  childResults: Record<string, HierarchyOutcome>;
  /** False when the step or anything beneath it failed or was refused. */
  success: boolean;
}

export type StepOutcome = ActionResult | HierarchyOutcome;

export function isHierarchyOutcome(outcome: StepOutcome): outcome is HierarchyOutcome {
  return 'stepResult' in outcome && 'childResults' in outcome;
}

export type WorkflowRunState = 'running' | 'completed' | 'failed' | 'cancelled' | 'timed_out';

export type StepState = 'pending' | 'running' | 'completed' | 'failed' | 'skipped';

export interface StepStatus {
  state: StepState;
  agentId?: string;
  startedAt?: string;
  completedAt?: string;
  error?: string;
}

export interface WorkflowRunSnapshot {
  runId: string;
  workflowName: string;
  type: WorkflowType;
  state: WorkflowRunState;
  startedAt: string;
  completedAt?: string;
  totalSteps: number;
  completedSteps: number;
  failedSteps: number;
  skippedSteps: number;
  steps: Record<string, StepStatus>;
}

export interface WorkflowResult {
  runId: string;
  workflowName: string;
  state: WorkflowRunState;
  /** True iff no error was recorded anywhere in the run. */
  success: boolean;
  results: Record<string, StepOutcome>;
  /** One entry per failed step, each naming the step. */
  errors: string[];
  durationMs: number;
}

export interface ExecuteWorkflowOptions {
  /** Caller-supplied id, useful for cancelling through the orchestrator. */
  runId?: string;
  signal?: AbortSignal;
}
