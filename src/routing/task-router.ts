/**
 * TaskRouter - capability-based selection of the agent that handles a task.
 *
 * Selection order:
 * 1. Routing rule for the task type: first listed id that is a capable local
 *    handle, or a directory record whose capabilities cover the task.
 * 2. First capable local handle.
 * 3. Directory discovery: for each required capability in order, the first
 *    record advertising it. Only that one capability is checked.
 *
 * Selection failure raises NoSuitableAgentError. Failures while invoking the
 * selected agent are returned as text.
 *
 * @module routing/task-router
 */

import type { AgentDirectory } from '../directory/agent-directory.js';
import type { DelegationClient } from '../a2a/delegation-client.js';
import type { DeliveryResult } from '../a2a/types.js';
import type { AgentHandle, AgentStatusSnapshot, AgentTaskResult } from '../types/agent.js';
import type { TaskDescriptor } from '../types/task.js';
import { createLogger } from '../utils/logger.js';
import { NoSuitableAgentError } from '../utils/errors.js';
import { logError } from '../utils/error-handler.js';

/**
 * Agent chosen for a task.
 */
export interface AgentSelection {
  agentId: string;
  /** Hosted in this process (true) or reached through delegation */
  local: boolean;
  /** Which selection step produced the match */
  via: 'rule' | 'local' | 'discovery';
}

/**
 * Status entry for an agent whose status query failed.
 */
export interface AgentStatusError {
  status: 'error';
  error: string;
}

export type AgentStatusEntry = AgentStatusSnapshot | AgentStatusError;

export interface TaskRouterConfig {
  /** Client used to delegate to remote agents; its directory is used for discovery */
  client: DelegationClient;
}

function hasCapabilities(advertised: readonly string[], required: readonly string[]): boolean {
  return required.every((capability) => advertised.includes(capability));
}

function describeAgentResult(result: AgentTaskResult): string {
  return result.success ? result.result : `failed: ${result.error}`;
}

function describeDelivery(result: DeliveryResult): string {
  if (result.response === undefined) {
    return result.status;
  }
  const response = typeof result.response === 'string'
    ? result.response
    : JSON.stringify(result.response);
  return `${result.status}: ${response}`;
}

export class TaskRouter {
  private readonly agents = new Map<string, AgentHandle>();
  private readonly routingRules = new Map<string, string[]>();
  private readonly client: DelegationClient;
  private readonly directory: AgentDirectory;
  private readonly logger = createLogger('TaskRouter');

  constructor(config: TaskRouterConfig) {
    this.client = config.client;
    this.directory = config.client.directory;
  }

  /**
   * Select an agent for the task and invoke it.
   *
   * @returns Result text prefixed with the handling agent id, or an error text
   *   if the selected agent failed
   * @throws NoSuitableAgentError if no agent can be selected
   */
  async route(task: TaskDescriptor): Promise<string> {
    const selection = this.selectAgent(task);
    if (!selection) {
      this.logger.warn(
        { taskType: task.type, requiredCapabilities: task.requiredCapabilities },
        'No suitable agent found'
      );
      throw new NoSuitableAgentError(task.type);
    }

    this.logger.info({ taskType: task.type, ...selection }, 'Agent selected');

    try {
      return await this.invoke(selection, task);
    } catch (error) {
      logError(error, { agentId: selection.agentId, taskType: task.type }, this.logger);
      const cause = error instanceof Error ? error.message : String(error);
      return `Error executing task with agent ${selection.agentId}: ${cause}`;
    }
  }

  /**
   * Run selection without invoking anything.
   */
  selectAgent(task: TaskDescriptor): AgentSelection | undefined {
    const required = task.requiredCapabilities;

    const preferred = this.routingRules.get(task.type);
    if (preferred) {
      for (const agentId of preferred) {
        const handle = this.agents.get(agentId);
        if (handle) {
          if (this.isCapable(agentId, handle, required)) {
            return { agentId, local: true, via: 'rule' };
          }
          continue;
        }

        const record = this.directory.get(agentId);
        if (record && hasCapabilities(record.capabilities, required)) {
          return { agentId, local: false, via: 'rule' };
        }
      }
    }

    for (const [agentId, handle] of this.agents) {
      if (this.isCapable(agentId, handle, required)) {
        return { agentId, local: true, via: 'local' };
      }
    }

    for (const capability of required) {
      const [discovered] = this.directory.findByCapability(capability);
      if (discovered) {
        return {
          agentId: discovered.id,
          local: this.agents.has(discovered.id),
          via: 'discovery',
        };
      }
    }

    return undefined;
  }

  private async invoke(selection: AgentSelection, task: TaskDescriptor): Promise<string> {
    const handle = this.agents.get(selection.agentId);
    if (handle) {
      const result = await handle.processTask(task);
      return `Task completed by ${selection.agentId}: ${describeAgentResult(result)}`;
    }

    const result = await this.client.delegateTask(selection.agentId, task);
    return `Task delegated to ${selection.agentId}: ${describeDelivery(result)}`;
  }

  /**
   * Add or replace a local handle.
   *
   * The handle's capabilities are read first; a handle that cannot report
   * them is not registered.
   */
  registerAgent(agentId: string, handle: AgentHandle): void {
    const capabilities = [...handle.getCapabilities()];
    this.agents.set(agentId, handle);
    this.logger.info({ agentId, capabilities }, 'Registered agent');
  }

  /**
   * Remove a local handle. Unknown ids are ignored.
   */
  unregisterAgent(agentId: string): void {
    if (this.agents.delete(agentId)) {
      this.logger.info({ agentId }, 'Unregistered agent');
    }
  }

  hasAgent(agentId: string): boolean {
    return this.agents.has(agentId);
  }

  addRoutingRule(taskType: string, agentIds: string[]): void {
    this.routingRules.set(taskType, [...agentIds]);
    this.logger.info({ taskType, agentIds }, 'Added routing rule');
  }

  removeRoutingRule(taskType: string): void {
    if (this.routingRules.delete(taskType)) {
      this.logger.info({ taskType }, 'Removed routing rule');
    }
  }

  getRoutingRules(): Record<string, string[]> {
    return Object.fromEntries(
      Array.from(this.routingRules, ([taskType, agentIds]) => [taskType, [...agentIds]])
    );
  }

  /**
   * Status of every local handle. A handle whose status query throws is
   * reported as an error entry.
   */
  status(): Record<string, AgentStatusEntry> {
    const statuses: Record<string, AgentStatusEntry> = {};
    for (const [agentId, handle] of this.agents) {
      try {
        statuses[agentId] = handle.getStatus();
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        this.logger.warn({ agentId, err: error }, 'Agent status query failed');
        statuses[agentId] = { status: 'error', error: message };
      }
    }
    return statuses;
  }

  /**
   * Advertised capabilities per local handle. A handle whose query throws
   * is listed with none.
   */
  capabilities(): Record<string, string[]> {
    const capabilities: Record<string, string[]> = {};
    for (const [agentId, handle] of this.agents) {
      capabilities[agentId] = [...(this.readCapabilities(agentId, handle) ?? [])];
    }
    return capabilities;
  }

  /**
   * A handle whose capability query throws never matches.
   */
  private isCapable(agentId: string, handle: AgentHandle, required: readonly string[]): boolean {
    const advertised = this.readCapabilities(agentId, handle);
    return advertised !== undefined && hasCapabilities(advertised, required);
  }

  private readCapabilities(agentId: string, handle: AgentHandle): readonly string[] | undefined {
    try {
      return handle.getCapabilities();
    } catch (error) {
      this.logger.warn({ agentId, err: error }, 'Agent capability query failed');
      return undefined;
    }
  }
}
