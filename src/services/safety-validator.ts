import type { AgentAction } from '../types/agent.js';
import type { Guardrail, SafetyValidator, SafetyVerdict } from '../types/safety.js';
import { errorMessage } from '../types/orchestration.js';

export function allowVerdict(message = 'Validation passed'): SafetyVerdict {
  return { allowed: true, message, violations: [] };
}

export function denyVerdict(message: string, violations: string[] = [message]): SafetyVerdict {
  return { allowed: false, message, violations };
}

/**
 * Validator built from restricted action types and guardrails.
 *
 * Checks run in a fixed order: type restrictions first, then every guardrail
 * in registration order. All violations are collected; a guardrail that throws
 * counts as a violation.
 */
export class RuleBasedSafetyValidator implements SafetyValidator {
  readonly #restrictedActionTypes: Set<string> = new Set();
  readonly #guardrails: Guardrail[] = [];

  restrictActionType(actionType: string): void {
    this.#restrictedActionTypes.add(actionType);
  }

  addGuardrail(guardrail: Guardrail): void {
    this.#guardrails.push(guardrail);
  }

  async validateAction(action: AgentAction): Promise<SafetyVerdict> {
    const violations: string[] = [];

    if (this.#restrictedActionTypes.has(action.actionType)) {
      violations.push(`Action type '${action.actionType}' is restricted`);
    }

    for (const guardrail of this.#guardrails) {
      try {
        const verdict = await guardrail.validate(action);
        if (!verdict.allowed) {
          violations.push(...verdict.violations.map((violation) => `${guardrail.name}: ${violation}`));
        }
      } catch (error) {
        violations.push(`${guardrail.name}: guardrail error: ${errorMessage(error)}`);
      }
    }

    return violations.length === 0
      ? allowVerdict()
      : denyVerdict(`${violations.length} safety violation(s) found`, violations);
  }
}
