import type {
  ActionResult,
  Agent,
  AgentAction,
  EnvironmentState,
} from '../types/agent.js';
import type { WorkflowStep } from '../types/workflow.js';
import { WORKFLOW_TOPICS, type EventBus, type StepCompletedEvent } from '../types/events.js';
import type { MetricsCollector } from '../types/metrics.js';
import type { SafetyValidator } from '../types/safety.js';
import { errorMessage, OperationCancelledError } from '../types/orchestration.js';
import { withDeadline } from '../utils/deadline.js';
import { logThought } from '../utils/logger.js';

export const DEPENDENCY_KEY_PREFIX = 'dep_';

type StepPhase = 'decision' | 'validation' | 'execution';

const PHASE_LABELS: Record<StepPhase, string> = {
  decision: 'Action decision failed',
  validation: 'Action validation failed',
  execution: 'Action execution failed',
};

export interface StepExecutionContext {
  runId: string;
  workflowName: string;
  /** Results of steps that already ran; dependencies are injected from here. */
  outputs: ReadonlyMap<string, ActionResult>;
  /** Normalized dependency names; defaults to `step.dependencies`. */
  dependencies?: readonly string[];
  signal?: AbortSignal;
  /** 0 or undefined disables the deadline. */
  timeoutMs?: number;
}

export interface StepExecutorDeps {
  eventBus?: EventBus;
  safetyValidator?: SafetyValidator;
  metrics?: MetricsCollector;
  publishStepEvents?: boolean;
}

/**
 * Build the state an agent reasons over: a shallow copy of the step
 * parameters plus `dep_<name>` entries for every dependency that has a result.
 */
export function buildEnvironmentState(
  step: WorkflowStep,
  outputs: ReadonlyMap<string, ActionResult>,
  dependencies: readonly string[] = step.dependencies ?? [],
): EnvironmentState {
  const properties: Record<string, unknown> = { ...(step.parameters ?? {}) };
  for (const dependency of dependencies) {
    const output = outputs.get(dependency);
    if (output) {
      properties[`${DEPENDENCY_KEY_PREFIX}${dependency}`] = output;
    }
  }
  return { properties, capturedAt: new Date().toISOString() };
}

function throwIfAborted(signal: AbortSignal, label: string): void {
  if (signal.aborted) {
    throw new OperationCancelledError(label);
  }
}

export function failedResult(message: string, data: Record<string, unknown> = {}): ActionResult {
  return { success: false, message, data };
}

/**
 * Runs one workflow step against an already-selected agent.
 *
 * Every failure between decision and execution is converted into a failed
 * `ActionResult`; this method does not reject. The completion event is
 * published only when an action actually ran, and publish failures are
 * logged without touching the result.
 */
export class StepExecutor {
  readonly #eventBus?: EventBus;
  readonly #safetyValidator?: SafetyValidator;
  readonly #metrics?: MetricsCollector;
  readonly #publishStepEvents: boolean;

  constructor(deps: StepExecutorDeps = {}) {
    this.#eventBus = deps.eventBus;
    this.#safetyValidator = deps.safetyValidator;
    this.#metrics = deps.metrics;
    this.#publishStepEvents = deps.publishStepEvents ?? true;
  }

  async executeStep(
    agent: Agent,
    step: WorkflowStep,
    context: StepExecutionContext,
  ): Promise<ActionResult> {
    const state = buildEnvironmentState(step, context.outputs, context.dependencies);
    const stopTimer = this.#metrics?.startTimer(`workflow.${context.workflowName}.step.${step.name}`);
    const startedAt = Date.now();
    const progress: { phase: StepPhase; action: AgentAction | null } = {
      phase: 'decision',
      action: null,
    };
    let result: ActionResult;

    try {
      result = await withDeadline(
        async (signal) => {
          const decided = await agent.decideAction(state, signal);
          progress.action = decided;
          throwIfAborted(signal, step.name);

          if (this.#safetyValidator) {
            progress.phase = 'validation';
            const verdict = await this.#safetyValidator.validateAction(decided);
            if (!verdict.allowed) {
              const detail = verdict.violations.length > 0
                ? `${verdict.message} (${verdict.violations.join('; ')})`
                : verdict.message;
              return failedResult(
                `Action '${decided.actionType}' rejected by safety validator: ${detail}`,
                { violations: verdict.violations },
              );
            }
            throwIfAborted(signal, step.name);
          }

          progress.phase = 'execution';
          return agent.execute(decided, signal);
        },
        { timeoutMs: context.timeoutMs, signal: context.signal, label: step.name },
      );
    } catch (error) {
      result = failedResult(`${PHASE_LABELS[progress.phase]}: ${errorMessage(error)}`);
    }

    const durationMs = Date.now() - startedAt;
    stopTimer?.();
    if (!result.success) {
      this.#metrics?.recordMetric(`workflow.${context.workflowName}.step.${step.name}.failure`, 1);
    }
    result = { ...result, durationMs: result.durationMs ?? durationMs };

    const executedAction = progress.phase === 'execution' ? progress.action : null;
    if (executedAction) {
      await this.#learn(agent, state, executedAction, result);
      await this.#publishCompletion(agent, step, context, executedAction, result);
    }

    return result;
  }

  async #learn(
    agent: Agent,
    state: EnvironmentState,
    action: AgentAction,
    result: ActionResult,
  ): Promise<void> {
    if (!agent.learn) {
      return;
    }
    try {
      await agent.learn(state, action, result);
    } catch (error) {
      await logThought(
        `[StepExecutor] Agent '${agent.id}' failed to learn from '${action.actionType}': ${errorMessage(error)}`,
      );
    }
  }

  async #publishCompletion(
    agent: Agent,
    step: WorkflowStep,
    context: StepExecutionContext,
    action: AgentAction,
    result: ActionResult,
  ): Promise<void> {
    if (!this.#eventBus || !this.#publishStepEvents) {
      return;
    }

    const event: StepCompletedEvent = {
      runId: context.runId,
      workflowName: context.workflowName,
      stepName: step.name,
      agentId: agent.id,
      action,
      result,
      completedAt: new Date().toISOString(),
    };
    const eventBus = this.#eventBus;

    try {
      await withDeadline(() => eventBus.publish(WORKFLOW_TOPICS.stepCompleted, event), {
        signal: context.signal,
        label: `${step.name}:publish`,
      });
    } catch (error) {
      await logThought(
        `[StepExecutor] Failed to publish completion of step '${step.name}': ${errorMessage(error)}`,
      );
    }
  }
}
