export * from './types/agent.js';
export * from './types/workflow.js';
export * from './types/events.js';
export * from './types/metrics.js';
export * from './types/safety.js';
export * from './types/orchestration.js';

export * from './config/orchestrator-config.js';

export { AgentRegistry } from './services/agent-registry.js';
export * from './services/task-classifier.js';
export * from './services/agent-selector.js';
export * from './services/condition-parser.js';
export * from './services/workflow-definition.js';
export * from './services/step-executor.js';
export * from './services/workflow-engine.js';
export * from './services/orchestrator.js';
export { InMemoryEventBus } from './services/event-bus.js';
export * from './services/metrics-collector.js';
export * from './services/safety-validator.js';

export { withDeadline, type DeadlineOptions } from './utils/deadline.js';
export { logThought, scrubSensitiveText } from './utils/logger.js';
