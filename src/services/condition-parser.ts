import type { ActionResult } from '../types/agent.js';
import type { StepCondition } from '../types/workflow.js';
import { OrchestrationConfigError } from '../types/orchestration.js';

const OPERATORS = ['==', '!='] as const;

/**
 * Parse `<step>.Success == <true|false>` (or `!=`) into a comparison node.
 * Field and literal are case-insensitive; the step name is taken verbatim.
 */
export function parseCondition(expression: string): StepCondition {
  const source = expression.trim();
  const operator = OPERATORS.find((candidate) => source.includes(candidate));
  if (!operator) {
    throw invalid(expression, 'expected an == or != comparison');
  }

  const [left, right, ...rest] = source.split(operator).map((part) => part.trim());
  if (left === undefined || right === undefined || rest.length > 0) {
    throw invalid(expression, 'expected exactly one comparison');
  }

  const separator = left.lastIndexOf('.');
  if (separator <= 0) {
    throw invalid(expression, "left side must look like '<step>.Success'");
  }

  const dependency = left.slice(0, separator).trim();
  const field = left.slice(separator + 1).trim().toLowerCase();
  if (field !== 'success') {
    throw invalid(expression, `unsupported field '${left.slice(separator + 1).trim()}'`);
  }

  const literal = right.toLowerCase();
  if (literal !== 'true' && literal !== 'false') {
    throw invalid(expression, `right side must be true or false, got '${right}'`);
  }

  return {
    kind: 'comparison',
    dependency,
    field: 'success',
    operator,
    expected: literal === 'true',
  };
}

/**
 * Evaluate a parsed condition against the results gathered so far.
 * Returns `null` when the referenced step has no result yet.
 */
export function evaluateCondition(
  condition: StepCondition,
  results: ReadonlyMap<string, ActionResult>,
): boolean | null {
  const result = results.get(condition.dependency);
  if (!result) {
    return null;
  }

  const matches = result.success === condition.expected;
  return condition.operator === '==' ? matches : !matches;
}

export function formatCondition(condition: StepCondition): string {
  return `${condition.dependency}.Success ${condition.operator} ${condition.expected}`;
}

function invalid(expression: string, reason: string): OrchestrationConfigError {
  return new OrchestrationConfigError(
    'invalid_condition',
    `[Orchestration] Invalid condition '${expression}': ${reason}.`,
  );
}
