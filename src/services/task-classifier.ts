import type { AgentType } from '../types/agent.js';

/** What a task needs from an agent, as far as scoring is concerned. */
export interface TaskProfile {
  requiredActionTypes: string[];
  relevantSkill: string;
  /** Narrows `assignTask` candidates to one agent type when set. */
  preferredAgentType?: AgentType;
}

export interface TaskClassifier {
  classify(task: string): TaskProfile;
}

export interface KeywordRule {
  keyword: string;
  actionType: string;
  skill: string;
}

export const DEFAULT_SKILL = 'general';

export const DEFAULT_KEYWORD_RULES: readonly KeywordRule[] = [
  { keyword: 'weather', actionType: 'WeatherQuery', skill: 'weather_analysis' },
  { keyword: 'plan', actionType: 'Planning', skill: 'planning' },
  { keyword: 'urgent', actionType: 'ReactiveResponse', skill: 'quick_response' },
];

/**
 * Case-insensitive substring classifier. Every matching rule contributes its
 * action type; the first matching rule supplies the relevant skill.
 */
export class KeywordTaskClassifier implements TaskClassifier {
  readonly #rules: readonly KeywordRule[];

  constructor(rules: readonly KeywordRule[] = DEFAULT_KEYWORD_RULES) {
    this.#rules = rules;
  }

  classify(task: string): TaskProfile {
    const text = task.toLowerCase();
    const matches = this.#rules.filter((rule) => text.includes(rule.keyword.toLowerCase()));

    return {
      requiredActionTypes: [...new Set(matches.map((rule) => rule.actionType))],
      relevantSkill: matches[0]?.skill ?? DEFAULT_SKILL,
    };
  }
}
