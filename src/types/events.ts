import type { ActionResult, AgentAction } from './agent.js';
import type { WorkflowRunSnapshot } from './workflow.js';

export const WORKFLOW_TOPICS = {
  stepCompleted: 'workflow.step.completed',
  statusUpdated: 'workflow.status.updated',
} as const;

export type WorkflowTopic = (typeof WORKFLOW_TOPICS)[keyof typeof WORKFLOW_TOPICS];

export interface StepCompletedEvent {
  runId: string;
  workflowName: string;
  stepName: string;
  agentId: string;
  action: AgentAction;
  result: ActionResult;
  completedAt: string;
}

export type WorkflowStatusEvent = WorkflowRunSnapshot;

/**
 * Best-effort publish/subscribe channel. The orchestrator logs publish
 * failures and never lets them change a step's outcome.
 */
export interface EventBus {
  publish(topic: string, payload: unknown): Promise<void>;
}

/** Callback signature for event bus subscribers. */
export type EventListener = (payload: unknown, topic: string) => void | Promise<void>;
