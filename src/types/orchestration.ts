export type OrchestrationConfigErrorCode =
  | 'invalid_definition'
  | 'unknown_workflow_type'
  | 'duplicate_step'
  | 'missing_dependency'
  | 'dependency_cycle'
  | 'invalid_condition'
  | 'duplicate_run';

/** Structurally invalid workflow definition; raised before any step runs. */
export class OrchestrationConfigError extends Error {
  readonly code: OrchestrationConfigErrorCode;
  readonly hints: string[];

  constructor(code: OrchestrationConfigErrorCode, message: string, hints: string[] = []) {
    super(message);
    this.name = 'OrchestrationConfigError';
    this.code = code;
    this.hints = hints;
  }
}

export class NoCandidateError extends Error {
  readonly task: string;

  constructor(task: string, detail = 'no candidate agents were supplied') {
    super(`Cannot select an agent for '${task}': ${detail}.`);
    this.name = 'NoCandidateError';
    this.task = task;
  }
}

/** Raised by agent implementations when they cannot decide on an action. */
export class DecisionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DecisionError';
  }
}

/** Raised by agent implementations when an action cannot be carried out. */
export class ExecutionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ExecutionError';
  }
}

export class StepTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(label: string, timeoutMs: number) {
    super(`'${label}' timed out after ${timeoutMs}ms`);
    this.name = 'StepTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class OperationCancelledError extends Error {
  constructor(label: string) {
    super(`'${label}' was cancelled`);
    this.name = 'OperationCancelledError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
