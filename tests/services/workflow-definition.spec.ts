import { describe, expect, it } from 'vitest';
import {
  compileWorkflow,
  parseWorkflowDefinition,
} from '../../src/services/workflow-definition.js';
import { OrchestrationConfigError } from '../../src/types/orchestration.js';
import type { WorkflowDefinition } from '../../src/types/workflow.js';
import { step } from '../harness/scripted-agent.js';

function captureError(run: () => unknown): OrchestrationConfigError {
  try {
    run();
  } catch (error) {
    if (error instanceof OrchestrationConfigError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected an OrchestrationConfigError');
}

describe('parseWorkflowDefinition', () => {
  it('fills defaults for optional step fields', () => {
    const definition = parseWorkflowDefinition({
      name: 'trip',
      type: 'Sequential',
      steps: [{ name: ' step1 ', requiredAgentType: 'Reactive' }],
    });

    expect(definition).toEqual({
      name: 'trip',
      type: 'Sequential',
      steps: [{ name: 'step1', requiredAgentType: 'Reactive', parameters: {}, dependencies: [] }],
    });
  });

  it('keeps error handling and agent requirement fields', () => {
    const definition = parseWorkflowDefinition({
      name: 'alerts',
      type: 'Sequential',
      errorHandling: 'IgnoreErrors',
      steps: [
        {
          name: 'notify',
          requiredAgentType: 'Reactive',
          requiredCapabilities: [' Alert '],
          continueOnFailure: true,
          critical: false,
        },
      ],
    });

    expect(definition).toEqual({
      name: 'alerts',
      type: 'Sequential',
      errorHandling: 'IgnoreErrors',
      steps: [
        {
          name: 'notify',
          requiredAgentType: 'Reactive',
          parameters: {},
          dependencies: [],
          requiredCapabilities: ['Alert'],
          continueOnFailure: true,
          critical: false,
        },
      ],
    });
  });

  it('rejects an unknown error handling mode', () => {
    const error = captureError(() =>
      parseWorkflowDefinition({ name: 'w', type: 'Sequential', errorHandling: 'Retry', steps: [] }),
    );

    expect(error.code).toBe('invalid_definition');
    expect(error.hints).toHaveLength(1);
    expect(error.hints[0]).toMatch(/^errorHandling: /);
  });

  it('reports every schema issue as a hint', () => {
    const error = captureError(() =>
      parseWorkflowDefinition({
        name: 'broken',
        type: 'Sequential',
        steps: [{ name: '', requiredAgentType: 'Robot', timeoutMs: -1 }],
      }),
    );

    expect(error.code).toBe('invalid_definition');
    expect(error.hints).toHaveLength(3);
    expect(error.hints[0]).toBe('steps.0.name: step name must be a non-empty string');
    expect(error.hints[1]?.startsWith('steps.0.requiredAgentType: ')).toBe(true);
    expect(error.hints[2]?.startsWith('steps.0.timeoutMs: ')).toBe(true);
  });

  it('rejects an unknown workflow type', () => {
    const error = captureError(() =>
      parseWorkflowDefinition({ name: 'odd', type: 'Looping', steps: [] }),
    );

    expect(error.code).toBe('unknown_workflow_type');
    expect(error.message).toBe(
      "[Orchestration] Unknown workflow type 'Looping' for workflow 'odd'. Expected one of: Sequential, Parallel, Conditional, Hierarchical.",
    );
  });
});

describe('compileWorkflow', () => {
  it('links parents and children and lists roots in declaration order', () => {
    const compiled = compileWorkflow({
      name: 'tree',
      type: 'Hierarchical',
      steps: [
        step('B', 'Reactive', { dependencies: ['A'] }),
        step('A', 'Reactive'),
        step('C', 'Reactive', { dependencies: ['A', 'B', 'A'] }),
        step('D', 'Reactive'),
      ],
    });

    expect(compiled.roots.map((index) => compiled.steps[index]?.step.name)).toEqual(['A', 'D']);
    expect(compiled.steps[2]?.dependencies).toEqual(['A', 'B']);
    expect(compiled.steps[1]?.children).toEqual([0, 2]);
    expect(compiled.steps[2]?.parents).toEqual([1, 0]);
    expect(compiled.topologicalOrder.map((index) => compiled.steps[index]?.step.name)).toEqual([
      'A',
      'D',
      'B',
      'C',
    ]);
  });

  it('parses conditions once', () => {
    const compiled = compileWorkflow({
      name: 'branch',
      type: 'Conditional',
      steps: [step('fetch', 'Reactive'), step('report', 'Reactive', { condition: 'fetch.Success == true' })],
    });

    expect(compiled.steps[1]?.condition).toEqual({
      kind: 'comparison',
      dependency: 'fetch',
      field: 'success',
      operator: '==',
      expected: true,
    });
  });

  it.each<[string, WorkflowDefinition, string, string]>([
    [
      'duplicate step names',
      { name: 'w', type: 'Sequential', steps: [step('a', 'Reactive'), step('a', 'BDI')] },
      'duplicate_step',
      "[Orchestration] Duplicate step name 'a' in workflow 'w'.",
    ],
    [
      'missing dependencies',
      { name: 'w', type: 'Parallel', steps: [step('a', 'Reactive', { dependencies: ['ghost'] })] },
      'missing_dependency',
      "[Orchestration] Step 'a' depends on missing step 'ghost'.",
    ],
    [
      'conditions on missing steps',
      { name: 'w', type: 'Conditional', steps: [step('a', 'Reactive', { condition: 'ghost.Success == true' })] },
      'missing_dependency',
      "[Orchestration] Condition of step 'a' references missing step 'ghost'.",
    ],
    [
      'self dependencies',
      { name: 'w', type: 'Hierarchical', steps: [step('a', 'Reactive', { dependencies: ['a'] })] },
      'dependency_cycle',
      "[Orchestration] Step 'a' cannot depend on itself.",
    ],
    [
      'cycles',
      {
        name: 'w',
        type: 'Sequential',
        steps: [
          step('a', 'Reactive'),
          step('b', 'Reactive', { dependencies: ['c'] }),
          step('c', 'Reactive', { dependencies: ['b'] }),
        ],
      },
      'dependency_cycle',
      "[Orchestration] Workflow 'w' contains a dependency cycle among: b, c.",
    ],
    [
      'blank step names',
      { name: 'w', type: 'Sequential', steps: [step('  ', 'Reactive')] },
      'invalid_definition',
      "[Orchestration] Step #1 of workflow 'w' has an empty name.",
    ],
  ])('rejects %s', (_label, definition, code, message) => {
    const error = captureError(() => compileWorkflow(definition));

    expect(error.code).toBe(code);
    expect(error.message).toBe(message);
  });
});
