import type { Agent, AgentRequirements } from '../types/agent.js';
import type { WorkflowStep } from '../types/workflow.js';
import { NoCandidateError } from '../types/orchestration.js';
import { KeywordTaskClassifier, type TaskClassifier, type TaskProfile } from './task-classifier.js';

export const SCORE_WEIGHTS = {
  actionTypeMatch: 10,
  skillLevel: 5,
  loadFactor: 2,
  historicalPerformance: 3,
} as const;

export interface AgentScore {
  agent: Agent;
  score: number;
}

/** Task text used to classify a workflow step: its name plus every string parameter. */
export function describeStep(step: WorkflowStep): string {
  const textParameters = Object.values(step.parameters ?? {}).filter(
    (value): value is string => typeof value === 'string',
  );
  return [step.name, ...textParameters].join(' ');
}

function meanSkillLevel(agent: Agent): number {
  const levels = Object.values(agent.capabilities.skillLevels);
  return levels.length === 0 ? 0 : levels.reduce((sum, level) => sum + level, 0) / levels.length;
}

/**
 * Keep the agents that meet every stated requirement. `agentType` is not
 * checked here; callers pick the type pool first.
 */
export function filterCandidates(
  candidates: readonly Agent[],
  requirements: AgentRequirements = {},
): Agent[] {
  const required = requirements.requiredCapabilities ?? [];
  const { minimumSkillLevel = 0, maxLoadFactor = 1 } = requirements;

  return candidates.filter((agent) => {
    const { supportedActionTypes, loadFactor } = agent.capabilities;
    if (!required.every((capability) => supportedActionTypes.includes(capability))) {
      return false;
    }
    if (minimumSkillLevel > 0 && !(meanSkillLevel(agent) >= minimumSkillLevel)) {
      return false;
    }
    return maxLoadFactor >= 1 || loadFactor <= maxLoadFactor;
  });
}

/** NaN and infinite scores rank below every finite score. */
function comparable(score: number): number {
  return Number.isFinite(score) ? score : Number.NEGATIVE_INFINITY;
}

/**
 * Scores candidates against a task and picks the best one.
 *
 * Ties at the top score resolve to the earliest candidate in the supplied
 * order, so selection over a registry snapshot is deterministic.
 */
export class AgentSelector {
  readonly #classifier: TaskClassifier;

  constructor(classifier: TaskClassifier = new KeywordTaskClassifier()) {
    this.#classifier = classifier;
  }

  classify(task: string): TaskProfile {
    return this.#classifier.classify(task);
  }

  scoreAgent(agent: Agent, profile: TaskProfile): number {
    const { supportedActionTypes, skillLevels, loadFactor, historicalPerformance } =
      agent.capabilities;

    const supported = new Set(supportedActionTypes);
    const matchedActionTypes = profile.requiredActionTypes.filter((type) => supported.has(type));
    const skillLevel = skillLevels[profile.relevantSkill] ?? 0;

    return (
      matchedActionTypes.length * SCORE_WEIGHTS.actionTypeMatch +
      skillLevel * SCORE_WEIGHTS.skillLevel -
      loadFactor * SCORE_WEIGHTS.loadFactor +
      historicalPerformance * SCORE_WEIGHTS.historicalPerformance
    );
  }

  /** Candidates with their scores, best first; equal scores keep input order. */
  rank(task: string, candidates: readonly Agent[]): AgentScore[] {
    const profile = this.#classifier.classify(task);
    return candidates
      .map((agent) => ({ agent, score: comparable(this.scoreAgent(agent, profile)) }))
      .sort((a, b) => (a.score === b.score ? 0 : b.score > a.score ? 1 : -1));
  }

  selectBestAgent(task: string, candidates: readonly Agent[]): Agent {
    const profile = this.#classifier.classify(task);
    let best: AgentScore | null = null;

    for (const agent of candidates) {
      const score = comparable(this.scoreAgent(agent, profile));
      if (best === null || score > best.score) {
        best = { agent, score };
      }
    }

    if (best === null) {
      throw new NoCandidateError(task);
    }
    return best.agent;
  }
}
