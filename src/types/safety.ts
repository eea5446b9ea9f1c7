import type { AgentAction } from './agent.js';

export interface SafetyVerdict {
  allowed: boolean;
  message: string;
  violations: string[];
}

/** Consulted before an agent's chosen action is executed. */
export interface SafetyValidator {
  validateAction(action: AgentAction): Promise<SafetyVerdict>;
}

/** A single named constraint evaluated by a rule-based validator. */
export interface Guardrail {
  name: string;
  validate(action: AgentAction): SafetyVerdict | Promise<SafetyVerdict>;
}
