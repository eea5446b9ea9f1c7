import type { Agent, AgentType } from '../types/agent.js';
import { logThought } from '../utils/logger.js';

/**
 * Catalog of the agents available to an orchestrator.
 *
 * Each orchestrator owns (or is injected with) its own registry, so several
 * independent orchestrators can live in one process. Reads return copied
 * arrays: a caller iterating a snapshot never sees a registration that
 * happens while it awaits.
 *
 * Usage:
 * ```ts
 * const registry = new AgentRegistry();
 * registry.register(weatherAgent);
 * const reactive = registry.agentsOfType('Reactive');
 * ```
 */
export class AgentRegistry {
  readonly #agents: Map<string, Agent> = new Map();

  /**
   * Register an agent. Re-registering an id replaces the stored agent but keeps
   * its original position, which is the selector's tie-break order.
   */
  register(agent: Agent): void {
    const replaced = this.#agents.has(agent.id);
    this.#agents.set(agent.id, agent);

    void logThought(
      `[AgentRegistry] ${replaced ? 'Replaced' : 'Registered'} agent '${agent.name}' (${agent.id}, type: ${agent.type}).`,
    );
  }

  /** Unregister an agent by id. Unknown ids are logged and reported as `false`. */
  unregister(agentId: string): boolean {
    const removed = this.#agents.delete(agentId);
    if (removed) {
      void logThought(`[AgentRegistry] Unregistered agent '${agentId}'.`);
    } else {
      void logThought(`[AgentRegistry] Ignored unregister for unknown agent '${agentId}'.`);
    }
    return removed;
  }

  get(agentId: string): Agent | undefined {
    return this.#agents.get(agentId);
  }

  has(agentId: string): boolean {
    return this.#agents.has(agentId);
  }

  /** Agents of the given type, in registration order. */
  agentsOfType(type: AgentType): Agent[] {
    return this.list().filter((agent) => agent.type === type);
  }

  list(): Agent[] {
    return [...this.#agents.values()];
  }

  get size(): number {
    return this.#agents.size;
  }
}
