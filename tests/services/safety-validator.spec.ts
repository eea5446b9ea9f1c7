import { describe, expect, it } from 'vitest';
import {
  allowVerdict,
  denyVerdict,
  RuleBasedSafetyValidator,
} from '../../src/services/safety-validator.js';
import type { AgentAction } from '../../src/types/agent.js';

const deleteAll: AgentAction = { actionType: 'DeleteRecords', parameters: { scope: 'all' }, estimatedCost: 40 };

describe('RuleBasedSafetyValidator', () => {
  it('allows actions when no rule objects', async () => {
    const validator = new RuleBasedSafetyValidator();

    await expect(validator.validateAction(deleteAll)).resolves.toEqual({
      allowed: true,
      message: 'Validation passed',
      violations: [],
    });
  });

  it('collects violations from restrictions and guardrails in order', async () => {
    const validator = new RuleBasedSafetyValidator();
    validator.restrictActionType('DeleteRecords');
    validator.addGuardrail({
      name: 'budget',
      validate: (action) =>
        (action.estimatedCost ?? 0) > 10 ? denyVerdict('too expensive') : allowVerdict(),
    });
    validator.addGuardrail({ name: 'always-fine', validate: () => allowVerdict() });
    validator.addGuardrail({
      name: 'scope',
      validate: async () => {
        throw new Error('scope service offline');
      },
    });

    await expect(validator.validateAction(deleteAll)).resolves.toEqual({
      allowed: false,
      message: '3 safety violation(s) found',
      violations: [
        "Action type 'DeleteRecords' is restricted",
        'budget: too expensive',
        'scope: guardrail error: scope service offline',
      ],
    });
  });
});
