import { z } from 'zod';
import { AGENT_TYPES } from '../types/agent.js';
import {
  ERROR_HANDLING_MODES,
  isWorkflowType,
  WORKFLOW_TYPES,
  type StepCondition,
  type WorkflowDefinition,
  type WorkflowStep,
} from '../types/workflow.js';
import { OrchestrationConfigError } from '../types/orchestration.js';
import { parseCondition } from './condition-parser.js';

const workflowStepSchema = z.object({
  name: z.string().trim().min(1, 'step name must be a non-empty string'),
  requiredAgentType: z.enum(AGENT_TYPES),
  parameters: z.record(z.unknown()).default({}),
  dependencies: z.array(z.string().trim().min(1)).default([]),
  condition: z.string().trim().min(1).optional(),
  timeoutMs: z.number().int().nonnegative().optional(),
  requiredCapabilities: z.array(z.string().trim().min(1)).optional(),
  continueOnFailure: z.boolean().optional(),
  critical: z.boolean().optional(),
});

const workflowDefinitionSchema = z.object({
  name: z.string(),
  type: z.string(),
  steps: z.array(workflowStepSchema),
  errorHandling: z.enum(ERROR_HANDLING_MODES).optional(),
});

/**
 * Validate untrusted input (e.g. parsed JSON) and return a typed definition.
 * Structural checks on the step graph happen later in `compileWorkflow`.
 */
export function parseWorkflowDefinition(input: unknown): WorkflowDefinition {
  const parsed = workflowDefinitionSchema.safeParse(input);
  if (!parsed.success) {
    const hints = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
    throw new OrchestrationConfigError(
      'invalid_definition',
      `[Orchestration] Workflow definition is invalid: ${hints.join('; ')}`,
      hints,
    );
  }

  const { name, type, steps, errorHandling } = parsed.data;
  if (!isWorkflowType(type)) {
    throw unknownType(name, type);
  }

  return errorHandling ? { name, type, steps, errorHandling } : { name, type, steps };
}

/** A step in the compiled arena, linked to parents and children by index. */
export interface CompiledStep {
  index: number;
  step: WorkflowStep;
  dependencies: string[];
  condition: StepCondition | null;
  parents: number[];
  children: number[];
}

export interface CompiledWorkflow {
  definition: WorkflowDefinition;
  steps: CompiledStep[];
  indexByName: Map<string, number>;
  /** Steps without dependencies, in declaration order. */
  roots: number[];
  topologicalOrder: number[];
}

/**
 * Validate a definition and build its dependency arena.
 *
 * Throws `OrchestrationConfigError` for an unknown type, duplicate or empty
 * step names, dependencies or condition references to missing steps,
 * unparsable conditions and dependency cycles.
 */
export function compileWorkflow(definition: WorkflowDefinition): CompiledWorkflow {
  const type: string = definition.type;
  if (!isWorkflowType(type)) {
    throw unknownType(definition.name, type);
  }

  const indexByName = new Map<string, number>();
  const steps: CompiledStep[] = definition.steps.map((step, index) => {
    const name = step.name.trim();
    if (!name) {
      throw new OrchestrationConfigError(
        'invalid_definition',
        `[Orchestration] Step #${index + 1} of workflow '${definition.name}' has an empty name.`,
      );
    }
    if (indexByName.has(name)) {
      throw new OrchestrationConfigError(
        'duplicate_step',
        `[Orchestration] Duplicate step name '${name}' in workflow '${definition.name}'.`,
      );
    }
    indexByName.set(name, index);

    const dependencies = [
      ...new Set((step.dependencies ?? []).map((dep) => dep.trim()).filter(Boolean)),
    ];

    return {
      index,
      step: { ...step, name, dependencies },
      dependencies,
      condition: step.condition ? parseCondition(step.condition) : null,
      parents: [],
      children: [],
    };
  });

  for (const node of steps) {
    for (const dep of node.dependencies) {
      if (dep === node.step.name) {
        throw new OrchestrationConfigError(
          'dependency_cycle',
          `[Orchestration] Step '${dep}' cannot depend on itself.`,
        );
      }
      const parentIndex = indexByName.get(dep);
      if (parentIndex === undefined) {
        throw new OrchestrationConfigError(
          'missing_dependency',
          `[Orchestration] Step '${node.step.name}' depends on missing step '${dep}'.`,
        );
      }
      node.parents.push(parentIndex);
      steps[parentIndex]?.children.push(node.index);
    }

    if (node.condition && !indexByName.has(node.condition.dependency)) {
      throw new OrchestrationConfigError(
        'missing_dependency',
        `[Orchestration] Condition of step '${node.step.name}' references missing step '${node.condition.dependency}'.`,
      );
    }
  }

  const topologicalOrder = topologicalSort(steps);
  if (topologicalOrder.length !== steps.length) {
    const ordered = new Set(topologicalOrder);
    const cyclic = steps.filter((node) => !ordered.has(node.index)).map((node) => node.step.name);
    throw new OrchestrationConfigError(
      'dependency_cycle',
      `[Orchestration] Workflow '${definition.name}' contains a dependency cycle among: ${cyclic.join(', ')}.`,
      cyclic,
    );
  }

  return {
    definition,
    steps,
    indexByName,
    roots: steps.filter((node) => node.parents.length === 0).map((node) => node.index),
    topologicalOrder,
  };
}

function topologicalSort(steps: CompiledStep[]): number[] {
  const inDegree = steps.map((node) => node.parents.length);
  const queue = steps.filter((node) => node.parents.length === 0).map((node) => node.index);
  const ordered: number[] = [];

  while (queue.length > 0) {
    const index = queue.shift();
    if (index === undefined) {
      continue;
    }
    ordered.push(index);

    for (const child of steps[index]?.children ?? []) {
      const next = (inDegree[child] ?? 0) - 1;
      inDegree[child] = next;
      if (next === 0) {
        queue.push(child);
      }
    }
  }

  return ordered;
}

function unknownType(workflowName: string, type: string): OrchestrationConfigError {
  return new OrchestrationConfigError(
    'unknown_workflow_type',
    `[Orchestration] Unknown workflow type '${type}' for workflow '${workflowName}'. Expected one of: ${WORKFLOW_TYPES.join(', ')}.`,
  );
}
