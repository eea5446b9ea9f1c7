import type { Agent, AgentRequirements } from '../types/agent.js';
import type { EventBus } from '../types/events.js';
import type { MetricsCollector } from '../types/metrics.js';
import { NoCandidateError } from '../types/orchestration.js';
import type { SafetyValidator } from '../types/safety.js';
import type {
  ExecuteWorkflowOptions,
  WorkflowDefinition,
  WorkflowResult,
  WorkflowRunSnapshot,
} from '../types/workflow.js';
import {
  applyEnvOverrides,
  DEFAULT_CONFIG,
  resolveConfig,
  type OrchestratorConfig,
  type OrchestratorConfigOverrides,
} from '../config/orchestrator-config.js';
import { logThought } from '../utils/logger.js';
import { AgentRegistry } from './agent-registry.js';
import { AgentSelector, filterCandidates } from './agent-selector.js';
import { StepExecutor } from './step-executor.js';
import type { TaskClassifier } from './task-classifier.js';
import { WorkflowEngine } from './workflow-engine.js';

export interface OrchestratorDeps {
  registry?: AgentRegistry;
  /** Ignored when `selector` is supplied. */
  classifier?: TaskClassifier;
  selector?: AgentSelector;
  eventBus?: EventBus;
  safetyValidator?: SafetyValidator;
  metrics?: MetricsCollector;
}

/**
 * Public entry point: owns the registry and wires selector, step executor and
 * workflow engine together.
 *
 * `config` overrides are applied over the defaults and the `ORCHESTRATOR_*`
 * environment variables. To include the JSON config file, pass
 * `await readConfig()`.
 *
 * Usage:
 * ```ts
 * const orchestrator = new Orchestrator({ eventBus: new InMemoryEventBus() });
 * orchestrator.registerAgent(weatherAgent);
 * const result = await orchestrator.executeWorkflow(definition);
 * ```
 */
export class Orchestrator {
  readonly #registry: AgentRegistry;
  readonly #selector: AgentSelector;
  readonly #engine: WorkflowEngine;
  readonly #metrics?: MetricsCollector;
  readonly #config: OrchestratorConfig;

  constructor(deps: OrchestratorDeps = {}, config: OrchestratorConfigOverrides = {}) {
    this.#config = resolveConfig(config, applyEnvOverrides(DEFAULT_CONFIG));
    this.#registry = deps.registry ?? new AgentRegistry();
    this.#selector = deps.selector ?? new AgentSelector(deps.classifier);
    this.#metrics = deps.metrics;

    const stepExecutor = new StepExecutor({
      eventBus: deps.eventBus,
      safetyValidator: deps.safetyValidator,
      metrics: deps.metrics,
      publishStepEvents: this.#config.events.publishStepEvents,
    });
    this.#engine = new WorkflowEngine(
      {
        registry: this.#registry,
        selector: this.#selector,
        stepExecutor,
        eventBus: deps.eventBus,
        metrics: deps.metrics,
      },
      this.#config,
    );
  }

  get registry(): AgentRegistry {
    return this.#registry;
  }

  get config(): OrchestratorConfig {
    return this.#config;
  }

  registerAgent(agent: Agent): void {
    this.#registry.register(agent);
    this.#metrics?.recordMetric('orchestrator.registered_agents_count', this.#registry.size);
  }

  unregisterAgent(agentId: string): boolean {
    const removed = this.#registry.unregister(agentId);
    if (removed) {
      this.#metrics?.recordMetric('orchestrator.registered_agents_count', this.#registry.size);
    }
    return removed;
  }

  /**
   * Pick the best registered agent for free-form task text. Candidates are
   * narrowed to `requirements.agentType`, or else the classifier's preferred
   * agent type, and then filtered by the remaining requirements.
   */
  assignTask(task: string, requirements?: AgentRequirements): Agent {
    const profile = this.#selector.classify(task);
    const agentType = requirements?.agentType ?? profile.preferredAgentType;
    const pool = agentType ? this.#registry.agentsOfType(agentType) : this.#registry.list();

    if (pool.length === 0) {
      throw new NoCandidateError(
        task,
        agentType ? `no agent of type '${agentType}' is registered` : 'no agents are registered',
      );
    }

    const candidates = requirements ? filterCandidates(pool, requirements) : pool;
    if (candidates.length === 0) {
      throw new NoCandidateError(task, 'no registered agent meets the requirements');
    }

    const agent = this.#selector.selectBestAgent(task, candidates);
    this.#metrics?.recordMetric('orchestrator.task_assignments_count', 1);
    void logThought(`[Orchestrator] Assigned task '${task}' to agent '${agent.name}' (${agent.id}).`);
    return agent;
  }

  executeWorkflow(
    definition: WorkflowDefinition,
    options: ExecuteWorkflowOptions = {},
  ): Promise<WorkflowResult> {
    return this.#engine.execute(definition, options);
  }

  cancelWorkflow(runId: string, reason?: string): boolean {
    return this.#engine.cancel(runId, reason);
  }

  observeWorkflow(runId: string): WorkflowRunSnapshot | undefined {
    return this.#engine.observe(runId);
  }

  listRunningWorkflows(): WorkflowRunSnapshot[] {
    return this.#engine.listRunning();
  }
}
