export const AGENT_TYPES = [
  'Reactive',
  'Deliberative',
  'Hybrid',
  'Learning',
  'UtilityBased',
  'BDI',
] as const;

/** Decision-making style of an agent; workflow steps match agents on it. */
export type AgentType = (typeof AGENT_TYPES)[number];

export function isAgentType(value: string): value is AgentType {
  return AGENT_TYPES.some((type) => type === value);
}

/** Declared capabilities used by the selector to score an agent. */
export interface AgentCapabilities {
  supportedActionTypes: string[];
  /** Skill name to level in [0, 1]. */
  skillLevels: Record<string, number>;
  /** Current load in [0, 1]; lower means more available. */
  loadFactor: number;
  /** Historical success score in [0, 1]. */
  historicalPerformance: number;
}

/** Candidate filter applied before scoring. */
export interface AgentRequirements {
  /** Replaces the classifier's preferred agent type when set. */
  agentType?: AgentType;
  /** Action types the agent must list in `supportedActionTypes`, all of them. */
  requiredCapabilities?: string[];
  /** Lower bound on the mean of the agent's skill levels. */
  minimumSkillLevel?: number;
  maxLoadFactor?: number;
}

/** Snapshot of the world an agent reasons over when deciding an action. */
export interface EnvironmentState {
  properties: Record<string, unknown>;
  capturedAt: string;
}

export interface AgentAction {
  actionType: string;
  parameters: Record<string, unknown>;
  priority?: number;
  estimatedCost?: number;
}

export interface ActionResult {
  success: boolean;
  message: string;
  data: Record<string, unknown>;
  durationMs?: number;
}

/**
 * Autonomous agent contract consumed by the orchestrator.
 *
 * Agents are created and initialized by the caller; the orchestrator only keeps
 * a reference while the agent is registered. Calls into one agent may overlap
 * when concurrent steps select the same instance.
 */
export interface Agent {
  readonly id: string;
  readonly name: string;
  readonly type: AgentType;
  /** Read on every selection, so implementations may update load and performance. */
  readonly capabilities: AgentCapabilities;
  decideAction(state: EnvironmentState, signal?: AbortSignal): Promise<AgentAction>;
  execute(action: AgentAction, signal?: AbortSignal): Promise<ActionResult>;
  /** Optional feedback hook invoked after an action has executed. */
  learn?(state: EnvironmentState, action: AgentAction, result: ActionResult): Promise<void>;
}
