import { describe, expect, it } from 'vitest';
import {
  AgentSelector,
  describeStep,
  filterCandidates,
  SCORE_WEIGHTS,
} from '../../src/services/agent-selector.js';
import { KeywordTaskClassifier, type TaskClassifier } from '../../src/services/task-classifier.js';
import { NoCandidateError } from '../../src/types/orchestration.js';
import { ScriptedAgent } from '../harness/scripted-agent.js';

describe('KeywordTaskClassifier', () => {
  it('collects every matching action type and takes the skill from the first rule', () => {
    const classifier = new KeywordTaskClassifier();

    expect(classifier.classify('URGENT: plan around the Weather')).toEqual({
      requiredActionTypes: ['WeatherQuery', 'Planning', 'ReactiveResponse'],
      relevantSkill: 'weather_analysis',
    });
  });

  it('falls back to the general skill when nothing matches', () => {
    expect(new KeywordTaskClassifier().classify('say hello')).toEqual({
      requiredActionTypes: [],
      relevantSkill: 'general',
    });
  });

  it('accepts custom rules', () => {
    const classifier = new KeywordTaskClassifier([
      { keyword: 'invoice', actionType: 'Billing', skill: 'accounting' },
    ]);

    expect(classifier.classify('Send the INVOICE')).toEqual({
      requiredActionTypes: ['Billing'],
      relevantSkill: 'accounting',
    });
  });
});

describe('AgentSelector', () => {
  it('combines action-type matches, skill, load and history with fixed weights', () => {
    const selector = new AgentSelector();
    const agent = new ScriptedAgent({
      id: 'multi',
      type: 'Hybrid',
      capabilities: {
        supportedActionTypes: ['WeatherQuery', 'Planning'],
        skillLevels: { weather_analysis: 0.5 },
        loadFactor: 0.5,
        historicalPerformance: 1,
      },
    });

    const score = selector.scoreAgent(agent, selector.classify('weather plan'));

    expect(SCORE_WEIGHTS).toEqual({
      actionTypeMatch: 10,
      skillLevel: 5,
      loadFactor: 2,
      historicalPerformance: 3,
    });
    expect(score).toBe(24.5);
  });

  it('prefers the agent whose skill matches the task', () => {
    const selector = new AgentSelector();
    const weather = new ScriptedAgent({
      id: 'weather',
      type: 'Reactive',
      capabilities: { skillLevels: { weather_analysis: 0.9 }, loadFactor: 0.1, historicalPerformance: 0.8 },
    });
    const planner = new ScriptedAgent({
      id: 'planner',
      type: 'Reactive',
      capabilities: { skillLevels: { planning: 0.9 }, loadFactor: 0.3, historicalPerformance: 0.8 },
    });

    expect(selector.selectBestAgent("What's the weather?", [planner, weather])).toBe(weather);
    expect(selector.selectBestAgent('plan my trip', [weather, planner])).toBe(planner);
  });

  it('resolves ties to the earliest candidate on every call', () => {
    const selector = new AgentSelector();
    const first = new ScriptedAgent({ id: 'first', type: 'Reactive' });
    const second = new ScriptedAgent({ id: 'second', type: 'Reactive' });

    const picks = Array.from({ length: 5 }, () => selector.selectBestAgent('anything', [first, second]));

    expect(picks.every((agent) => agent === first)).toBe(true);
  });

  it('throws NoCandidateError for an empty candidate list', () => {
    const selector = new AgentSelector();

    expect(() => selector.selectBestAgent('forecast', [])).toThrow(NoCandidateError);
    expect(() => selector.selectBestAgent('forecast', [])).toThrow(
      "Cannot select an agent for 'forecast': no candidate agents were supplied.",
    );
  });

  it('ranks candidates best first and keeps input order on ties', () => {
    const selector = new AgentSelector();
    const idle = new ScriptedAgent({ id: 'idle', type: 'Reactive', capabilities: { loadFactor: 0 } });
    const busy = new ScriptedAgent({ id: 'busy', type: 'Reactive', capabilities: { loadFactor: 1 } });
    const alsoIdle = new ScriptedAgent({ id: 'also-idle', type: 'Reactive' });

    const ranked = selector.rank('task', [busy, idle, alsoIdle]);

    expect(ranked.map((entry) => [entry.agent.id, entry.score])).toEqual([
      ['idle', 0],
      ['also-idle', 0],
      ['busy', -2],
    ]);
  });

  it('ranks agents with a non-finite score below every finite score', () => {
    const selector = new AgentSelector();
    const broken = new ScriptedAgent({ id: 'broken', type: 'Reactive', capabilities: { loadFactor: Number.NaN } });
    const busy = new ScriptedAgent({ id: 'busy', type: 'Reactive', capabilities: { loadFactor: 1 } });

    expect(selector.selectBestAgent('task', [broken, busy])).toBe(busy);
    expect(selector.rank('task', [broken, busy]).map((entry) => [entry.agent.id, entry.score])).toEqual([
      ['busy', -2],
      ['broken', Number.NEGATIVE_INFINITY],
    ]);
  });

  it('uses an injected classifier', () => {
    const classifier: TaskClassifier = {
      classify: () => ({ requiredActionTypes: ['Translate'], relevantSkill: 'languages' }),
    };
    const selector = new AgentSelector(classifier);
    const generalist = new ScriptedAgent({ id: 'generalist', type: 'Learning' });
    const translator = new ScriptedAgent({
      id: 'translator',
      type: 'Learning',
      capabilities: { supportedActionTypes: ['Translate'] },
    });

    expect(selector.selectBestAgent('anything at all', [generalist, translator])).toBe(translator);
  });
});

describe('describeStep', () => {
  it('joins the step name with its string parameters', () => {
    expect(
      describeStep({
        name: 'step1',
        requiredAgentType: 'Reactive',
        parameters: { input: "What's the weather?", retries: 3, region: 'north' },
      }),
    ).toBe("step1 What's the weather? north");
  });
});

describe('filterCandidates', () => {
  const forecaster = new ScriptedAgent({
    id: 'forecaster',
    type: 'Reactive',
    capabilities: {
      supportedActionTypes: ['WeatherQuery', 'Alert'],
      skillLevels: { weather_analysis: 0.75, quick_response: 0.25 },
      loadFactor: 0.6,
    },
  });
  const responder = new ScriptedAgent({
    id: 'responder',
    type: 'Reactive',
    capabilities: {
      supportedActionTypes: ['Alert'],
      skillLevels: { quick_response: 0.25 },
      loadFactor: 0.2,
    },
  });
  const agents = [forecaster, responder];

  it('keeps every agent when no requirement is given', () => {
    expect(filterCandidates(agents)).toEqual(agents);
  });

  it('requires every listed capability', () => {
    expect(filterCandidates(agents, { requiredCapabilities: ['Alert'] })).toEqual(agents);
    expect(filterCandidates(agents, { requiredCapabilities: ['Alert', 'WeatherQuery'] })).toEqual([forecaster]);
  });

  it('compares the mean skill level against the minimum', () => {
    expect(filterCandidates(agents, { minimumSkillLevel: 0.5 })).toEqual([forecaster]);
    expect(filterCandidates(agents, { minimumSkillLevel: 0.51 })).toEqual([]);
  });

  it('drops agents above the maximum load factor', () => {
    expect(filterCandidates(agents, { maxLoadFactor: 0.5 })).toEqual([responder]);
  });
});
