import { randomUUID } from 'node:crypto';
import type { ActionResult, Agent } from '../types/agent.js';
import { WORKFLOW_TOPICS, type EventBus } from '../types/events.js';
import type { MetricsCollector } from '../types/metrics.js';
import { errorMessage, OrchestrationConfigError } from '../types/orchestration.js';
import type {
  ExecuteWorkflowOptions,
  HierarchyOutcome,
  StepOutcome,
  StepState,
  StepStatus,
  WorkflowDefinition,
  WorkflowResult,
  WorkflowRunSnapshot,
  WorkflowRunState,
} from '../types/workflow.js';
import { DEFAULT_CONFIG, type OrchestratorConfig } from '../config/orchestrator-config.js';
import { logThought } from '../utils/logger.js';
import type { AgentRegistry } from './agent-registry.js';
import { describeStep, filterCandidates, type AgentSelector } from './agent-selector.js';
import { evaluateCondition, formatCondition } from './condition-parser.js';
import type { StepExecutor } from './step-executor.js';
import { compileWorkflow, type CompiledStep, type CompiledWorkflow } from './workflow-definition.js';

type RunInterruption =
  | { kind: 'cancelled'; reason: string }
  | { kind: 'timed_out'; timeoutMs: number };

interface WorkflowRun {
  runId: string;
  compiled: CompiledWorkflow;
  controller: AbortController;
  startedAt: number;
  state: WorkflowRunState;
  completedAt?: string;
  steps: Map<string, StepStatus>;
  results: Record<string, StepOutcome>;
  errors: string[];
  interruption: RunInterruption | null;
}

export interface WorkflowEngineDeps {
  registry: AgentRegistry;
  selector: AgentSelector;
  stepExecutor: StepExecutor;
  eventBus?: EventBus;
  metrics?: MetricsCollector;
}

function describeAbortReason(reason: unknown): string {
  if (reason === undefined) {
    return 'aborted by caller';
  }
  return errorMessage(reason);
}

/**
 * Drives a compiled workflow through its type's execution strategy.
 *
 * Configuration errors reject before a run is registered; everything after
 * that is captured in the returned `WorkflowResult`.
 */
export class WorkflowEngine {
  readonly #registry: AgentRegistry;
  readonly #selector: AgentSelector;
  readonly #stepExecutor: StepExecutor;
  readonly #eventBus?: EventBus;
  readonly #metrics?: MetricsCollector;
  readonly #config: OrchestratorConfig;
  readonly #running: Map<string, WorkflowRun> = new Map();
  readonly #completed: Map<string, WorkflowRunSnapshot> = new Map();

  constructor(deps: WorkflowEngineDeps, config: OrchestratorConfig = DEFAULT_CONFIG) {
    this.#registry = deps.registry;
    this.#selector = deps.selector;
    this.#stepExecutor = deps.stepExecutor;
    this.#eventBus = deps.eventBus;
    this.#metrics = deps.metrics;
    this.#config = config;
  }

  observe(runId: string): WorkflowRunSnapshot | undefined {
    const run = this.#running.get(runId);
    return run ? this.#snapshot(run) : this.#completed.get(runId);
  }

  listRunning(): WorkflowRunSnapshot[] {
    return [...this.#running.values()].map((run) => this.#snapshot(run));
  }

  cancel(runId: string, reason = 'Cancelled by caller.'): boolean {
    const run = this.#running.get(runId);
    if (!run || run.interruption) {
      return false;
    }

    this.#interrupt(run, { kind: 'cancelled', reason });
    return true;
  }

  async execute(
    definition: WorkflowDefinition,
    options: ExecuteWorkflowOptions = {},
  ): Promise<WorkflowResult> {
    const compiled = compileWorkflow(definition);
    const runId = options.runId ?? randomUUID();
    if (this.#running.has(runId)) {
      throw new OrchestrationConfigError(
        'duplicate_run',
        `[Orchestration] Run id '${runId}' is already executing.`,
      );
    }

    const run: WorkflowRun = {
      runId,
      compiled,
      controller: new AbortController(),
      startedAt: Date.now(),
      state: 'running',
      steps: new Map(
        compiled.steps.map((node): [string, StepStatus] => [node.step.name, { state: 'pending' }]),
      ),
      results: {},
      errors: [],
      interruption: null,
    };
    this.#completed.delete(runId);
    this.#running.set(runId, run);

    const { name, type } = definition;
    const stopTimer = this.#metrics?.startTimer(`workflow.${name}`);
    const cleanups: Array<() => void> = [];

    const outerSignal = options.signal;
    if (outerSignal) {
      const onAbort = (): void =>
        this.#interrupt(run, { kind: 'cancelled', reason: describeAbortReason(outerSignal.reason) });
      if (outerSignal.aborted) {
        onAbort();
      } else {
        outerSignal.addEventListener('abort', onAbort, { once: true });
        cleanups.push(() => outerSignal.removeEventListener('abort', onAbort));
      }
    }

    const workflowTimeoutMs = this.#config.execution.workflowTimeoutMs;
    if (workflowTimeoutMs > 0) {
      const timeoutHandle = setTimeout(
        () => this.#interrupt(run, { kind: 'timed_out', timeoutMs: workflowTimeoutMs }),
        workflowTimeoutMs,
      );
      cleanups.push(() => clearTimeout(timeoutHandle));
    }

    await logThought(
      `[WorkflowEngine] Starting ${type} workflow '${name}' (run ${runId}, ${compiled.steps.length} step(s)).`,
    );
    await this.#publishStatus(run);

    try {
      switch (type) {
        case 'Sequential':
          await this.#runSequential(run);
          break;
        case 'Parallel':
          await this.#runParallel(run);
          break;
        case 'Conditional':
          await this.#runConditional(run);
          break;
        case 'Hierarchical':
          await this.#runHierarchical(run);
          break;
        default: {
          const unreachable: never = type;
          throw new Error(`Unhandled workflow type '${String(unreachable)}'`);
        }
      }
    } catch (error) {
      run.errors.push(`Workflow execution error: ${errorMessage(error)}`);
    } finally {
      for (const cleanup of cleanups) {
        cleanup();
      }
    }

    const interruption = run.interruption;
    if (interruption?.kind === 'cancelled') {
      run.errors.push(`Workflow '${name}' cancelled: ${interruption.reason}`);
    } else if (interruption?.kind === 'timed_out') {
      run.errors.push(`Workflow '${name}' timed out after ${interruption.timeoutMs}ms`);
    }

    const success = run.errors.length === 0;
    run.state = interruption ? interruption.kind : success ? 'completed' : 'failed';
    run.completedAt = new Date().toISOString();
    const durationMs = Date.now() - run.startedAt;

    stopTimer?.();
    this.#metrics?.recordMetric(`workflow.${name}.success`, success ? 1 : 0);
    this.#retire(run);

    await logThought(
      `[WorkflowEngine] Workflow '${name}' (run ${runId}) finished as ${run.state} in ${durationMs}ms with ${run.errors.length} error(s).`,
    );
    await this.#publishStatus(run);

    return {
      runId,
      workflowName: name,
      state: run.state,
      success,
      results: run.results,
      errors: run.errors,
      durationMs,
    };
  }

  async #runSequential(run: WorkflowRun): Promise<void> {
    const outputs = new Map<string, ActionResult>();

    for (const node of run.compiled.steps) {
      if (run.controller.signal.aborted) break;

      const result = await this.#runStep(run, node, outputs, true);
      if (result) {
        run.results[node.step.name] = result;
      }
      if (!result?.success && this.#stopsAfterFailure(run, node)) {
        break;
      }
    }
  }

  #stopsAfterFailure(run: WorkflowRun, node: CompiledStep): boolean {
    if (run.compiled.definition.errorHandling === 'IgnoreErrors') {
      return false;
    }
    // `critical` defaults to the opposite of `continueOnFailure`.
    return !node.step.continueOnFailure || node.step.critical === true;
  }

  async #runParallel(run: WorkflowRun): Promise<void> {
    const { steps, definition } = run.compiled;
    const withDependencies = steps.filter((node) => node.dependencies.length > 0);
    if (withDependencies.length > 0) {
      await logThought(
        `[WorkflowEngine] Parallel workflow '${definition.name}' ignores declared dependencies of: ${withDependencies.map((node) => node.step.name).join(', ')}.`,
      );
    }

    const batchSize = this.#config.execution.maxConcurrentSteps || steps.length;
    for (const batch of this.#chunkSteps(steps, batchSize)) {
      if (run.controller.signal.aborted) break;

      const outcomes = await Promise.allSettled(
        batch.map((node) => this.#runStep(run, node, new Map(), false)),
      );
      batch.forEach((node, index) => {
        const outcome = outcomes[index];
        if (outcome?.status === 'fulfilled' && outcome.value) {
          run.results[node.step.name] = outcome.value;
        } else if (outcome?.status === 'rejected') {
          this.#recordRefusal(run, node, `Error in step '${node.step.name}': ${errorMessage(outcome.reason)}`);
        }
      });
    }
  }

  async #runConditional(run: WorkflowRun): Promise<void> {
    const outputs = new Map<string, ActionResult>();

    for (const node of run.compiled.steps) {
      if (run.controller.signal.aborted) break;

      const skipReason = this.#conditionalSkipReason(node, outputs);
      if (skipReason) {
        await this.#skipStep(run, node, skipReason);
        continue;
      }

      const result = await this.#runStep(run, node, outputs, false);
      if (result) {
        run.results[node.step.name] = result;
      }
    }
  }

  #conditionalSkipReason(node: CompiledStep, outputs: ReadonlyMap<string, ActionResult>): string | null {
    const missing = node.dependencies.find((dependency) => !outputs.has(dependency));
    if (missing) {
      return `dependency '${missing}' has no result`;
    }

    if (!node.condition) {
      return null;
    }

    const verdict = evaluateCondition(node.condition, outputs);
    if (verdict === null) {
      return `condition '${formatCondition(node.condition)}' references '${node.condition.dependency}', which has no result`;
    }
    return verdict ? null : `condition '${formatCondition(node.condition)}' is false`;
  }

  async #runHierarchical(run: WorkflowRun): Promise<void> {
    const outputs = new Map<string, ActionResult>();
    const visited = new Set<number>();

    for (const rootIndex of run.compiled.roots) {
      if (run.controller.signal.aborted) break;

      const outcome = await this.#runSubtree(run, rootIndex, outputs, visited);
      const root = run.compiled.steps[rootIndex];
      if (outcome && root) {
        run.results[root.step.name] = outcome;
      }
    }
  }

  /**
   * Run a step, then every child whose parents have all been visited, depth
   * first in declaration order. Returns null when the step itself produced no
   * result.
   */
  async #runSubtree(
    run: WorkflowRun,
    index: number,
    outputs: Map<string, ActionResult>,
    visited: Set<number>,
  ): Promise<HierarchyOutcome | null> {
    const node = run.compiled.steps[index];
    if (!node || run.controller.signal.aborted) {
      return null;
    }
    visited.add(index);

    const stepResult = await this.#runStep(run, node, outputs, true);
    if (!stepResult) {
      return null;
    }

    const childResults: Record<string, HierarchyOutcome> = {};
    let success = stepResult.success;

    for (const childIndex of node.children) {
      const child = run.compiled.steps[childIndex];
      if (!child || visited.has(childIndex)) continue;
      if (!child.parents.every((parent) => visited.has(parent))) continue;
      if (run.controller.signal.aborted) break;

      const childOutcome = await this.#runSubtree(run, childIndex, outputs, visited);
      if (childOutcome) {
        childResults[child.step.name] = childOutcome;
      }
      success = success && childOutcome !== null && childOutcome.success;
    }

    return { stepResult, childResults, success };
  }

  /**
   * Select an agent for one step and execute it. Returns null when the step
   * was refused (dependency policy or no eligible agent); the refusal is
   * recorded as an error.
   */
  async #runStep(
    run: WorkflowRun,
    node: CompiledStep,
    outputs: Map<string, ActionResult>,
    requireDependencies: boolean,
  ): Promise<ActionResult | null> {
    const { step } = node;
    const workflowName = run.compiled.definition.name;

    if (requireDependencies) {
      const refusal = this.#unsatisfiedDependency(node, outputs);
      if (refusal) {
        this.#recordRefusal(run, node, `Dependency not satisfied for step '${step.name}': ${refusal}`);
        return null;
      }
    }

    const agent = this.#selectAgent(run, node);
    if (!agent) {
      return null;
    }
    this.#setStepState(run, node, 'running', { agentId: agent.id, startedAt: new Date().toISOString() });
    await logThought(
      `[WorkflowEngine] Step '${step.name}' of '${workflowName}' assigned to agent '${agent.name}' (${agent.id}).`,
    );

    const result = await this.#stepExecutor.executeStep(agent, step, {
      runId: run.runId,
      workflowName,
      outputs,
      dependencies: node.dependencies,
      signal: run.controller.signal,
      timeoutMs: step.timeoutMs ?? this.#config.execution.stepTimeoutMs,
    });
    outputs.set(step.name, result);

    const completedAt = new Date().toISOString();
    if (result.success) {
      this.#setStepState(run, node, 'completed', { completedAt });
    } else {
      const error = `Error in step '${step.name}': ${result.message}`;
      run.errors.push(error);
      this.#setStepState(run, node, 'failed', { completedAt, error });
    }

    await logThought(
      `[WorkflowEngine] Step '${step.name}' of '${workflowName}' ${result.success ? 'succeeded' : 'failed'}: ${result.message}`,
    );
    return result;
  }

  /** Returns null after recording the refusal when no agent can take the step. */
  #selectAgent(run: WorkflowRun, node: CompiledStep): Agent | null {
    const { step } = node;
    try {
      const ofType = this.#registry.agentsOfType(step.requiredAgentType);
      if (ofType.length === 0) {
        this.#recordRefusal(
          run,
          node,
          `Error in step '${step.name}': no agent of type '${step.requiredAgentType}' is registered`,
        );
        return null;
      }

      const required = step.requiredCapabilities ?? [];
      const candidates = filterCandidates(ofType, { requiredCapabilities: required });
      if (candidates.length === 0) {
        this.#recordRefusal(
          run,
          node,
          `Error in step '${step.name}': no agent of type '${step.requiredAgentType}' supports ${required.join(', ')}`,
        );
        return null;
      }

      return this.#selector.selectBestAgent(describeStep(step), candidates);
    } catch (error) {
      this.#recordRefusal(run, node, `Error in step '${step.name}': ${errorMessage(error)}`);
      return null;
    }
  }

  #unsatisfiedDependency(node: CompiledStep, outputs: ReadonlyMap<string, ActionResult>): string | null {
    for (const dependency of node.dependencies) {
      const output = outputs.get(dependency);
      if (!output) {
        return `'${dependency}' has no result`;
      }
      if (!output.success) {
        return `'${dependency}' failed`;
      }
    }
    return null;
  }

  #recordRefusal(run: WorkflowRun, node: CompiledStep, error: string): void {
    run.errors.push(error);
    this.#setStepState(run, node, 'failed', { completedAt: new Date().toISOString(), error });
    void logThought(`[WorkflowEngine] ${error}`);
  }

  async #skipStep(run: WorkflowRun, node: CompiledStep, reason: string): Promise<void> {
    this.#setStepState(run, node, 'skipped', { completedAt: new Date().toISOString() });
    await logThought(
      `[WorkflowEngine] Skipping step '${node.step.name}' of '${run.compiled.definition.name}': ${reason}.`,
    );
  }

  #setStepState(
    run: WorkflowRun,
    node: CompiledStep,
    state: StepState,
    details: Omit<StepStatus, 'state'> = {},
  ): void {
    const current: StepStatus = run.steps.get(node.step.name) ?? { state: 'pending' };
    run.steps.set(node.step.name, { ...current, ...details, state });
  }

  #interrupt(run: WorkflowRun, interruption: RunInterruption): void {
    if (run.interruption || run.state !== 'running') {
      return;
    }

    run.interruption = interruption;
    run.controller.abort();
    const detail =
      interruption.kind === 'cancelled'
        ? `cancelled: ${interruption.reason}`
        : `timed out after ${interruption.timeoutMs}ms`;
    void logThought(
      `[WorkflowEngine] Run ${run.runId} of '${run.compiled.definition.name}' ${detail}`,
    );
  }

  #retire(run: WorkflowRun): void {
    this.#running.delete(run.runId);

    const limit = this.#config.history.maxCompletedRuns;
    if (limit === 0) {
      return;
    }
    this.#completed.set(run.runId, this.#snapshot(run));
    while (this.#completed.size > limit) {
      const oldest = this.#completed.keys().next();
      if (oldest.done) break;
      this.#completed.delete(oldest.value);
    }
  }

  async #publishStatus(run: WorkflowRun): Promise<void> {
    if (!this.#eventBus || !this.#config.events.publishStatusEvents) {
      return;
    }

    try {
      await this.#eventBus.publish(WORKFLOW_TOPICS.statusUpdated, this.#snapshot(run));
    } catch (error) {
      await logThought(
        `[WorkflowEngine] Failed to publish status of run ${run.runId}: ${errorMessage(error)}`,
      );
    }
  }

  #snapshot(run: WorkflowRun): WorkflowRunSnapshot {
    const steps: Record<string, StepStatus> = {};
    let completedSteps = 0;
    let failedSteps = 0;
    let skippedSteps = 0;

    for (const [name, status] of run.steps) {
      steps[name] = { ...status };
      if (status.state === 'completed') completedSteps += 1;
      if (status.state === 'failed') failedSteps += 1;
      if (status.state === 'skipped') skippedSteps += 1;
    }

    return {
      runId: run.runId,
      workflowName: run.compiled.definition.name,
      type: run.compiled.definition.type,
      state: run.state,
      startedAt: new Date(run.startedAt).toISOString(),
      completedAt: run.completedAt,
      totalSteps: run.steps.size,
      completedSteps,
      failedSteps,
      skippedSteps,
      steps,
    };
  }

  #chunkSteps(steps: CompiledStep[], size: number): CompiledStep[][] {
    const chunks: CompiledStep[][] = [];
    for (let index = 0; index < steps.length; index += size) {
      chunks.push(steps.slice(index, index + size));
    }
    return chunks;
  }
}
