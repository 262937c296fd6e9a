/**
 * BaseAgent - Abstract base class for locally hosted agents.
 *
 * Provides common functionality:
 * - Directory registration and shutdown
 * - Status tracking, broadcast to subscribers on every change
 * - Key/value memory
 * - Delegation and tool helpers
 *
 * Uses Template Method pattern: `processTask` handles status and error
 * wrapping, subclasses implement `handleTask`.
 *
 * @module agents/base-agent
 */

import type { Logger } from 'pino';
import type { DelegationClient } from '../a2a/delegation-client.js';
import type { DeliveryResult } from '../a2a/types.js';
import type { LlmConfig, LlmMessage, LlmProvider } from '../llm/types.js';
import type { ToolManager } from '../tools/tool-manager.js';
import type { ToolExecutionResult } from '../tools/types.js';
import type { AgentHandle, AgentState, AgentStatusSnapshot, AgentTaskResult } from '../types/agent.js';
import type { TaskDescriptor } from '../types/task.js';
import { createLogger } from '../utils/logger.js';
import { InvalidToolInvocationError } from '../utils/errors.js';

export const AGENT_VERSION = '1.0.0';

/**
 * Collaborators every agent needs.
 */
export interface BaseAgentConfig {
  agentId: string;
  llm: LlmProvider;
  /** This agent's own delegation identity */
  client: DelegationClient;
  /** Executor for the agent's tools; `useTool` fails without one */
  toolManager?: ToolManager;
  /** Defaults applied to every model call */
  llmConfig?: LlmConfig;
  /** Clock, replaceable in tests */
  now?: () => Date;
}

/**
 * Outcome of delegating to another agent. Never raised.
 */
export type DelegationOutcome =
  | { success: true; result: DeliveryResult }
  | { success: false; error: string };

export abstract class BaseAgent implements AgentHandle {
  readonly agentId: string;

  protected abstract readonly capabilities: readonly string[];
  protected abstract readonly tools: readonly string[];

  protected readonly llm: LlmProvider;
  protected readonly client: DelegationClient;
  protected readonly toolManager?: ToolManager;
  protected readonly llmConfig: LlmConfig;
  protected readonly now: () => Date;
  protected readonly logger: Logger;

  private status: AgentState = 'idle';
  private readonly memory = new Map<string, unknown>();

  constructor(config: BaseAgentConfig) {
    this.agentId = config.agentId;
    this.llm = config.llm;
    this.client = config.client;
    this.toolManager = config.toolManager;
    this.llmConfig = config.llmConfig ?? {};
    this.now = config.now ?? (() => new Date());
    this.logger = createLogger(this.getAgentName(), { agentId: config.agentId });
  }

  /**
   * Get the agent name for logging and the directory record.
   */
  protected abstract getAgentName(): string;

  /**
   * Produce the result text for a task. Throwing marks the agent `error`.
   */
  protected abstract handleTask(task: TaskDescriptor): Promise<string>;

  async processTask(task: TaskDescriptor): Promise<AgentTaskResult> {
    await this.setStatus('processing');

    try {
      const result = await this.handleTask(task);
      await this.setStatus('idle');
      return { success: true, result, agent: this.agentId };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error({ err: error, taskType: task.type }, 'Task processing failed');
      await this.setStatus('error');
      return { success: false, error: message, agent: this.agentId };
    }
  }

  /**
   * Register this agent's record in the shared directory.
   */
  async initialize(): Promise<void> {
    this.client.directory.register({
      id: this.agentId,
      name: this.getAgentName(),
      description: `Agent specialized in ${this.capabilities.join(', ')}`,
      capabilities: [...this.capabilities],
      endpoints: { local: this.agentId },
      authentication: { type: 'api_key' },
      metadata: { version: AGENT_VERSION, tools: [...this.tools] },
    });
    this.logger.info({ capabilities: this.capabilities }, 'Agent initialized');
  }

  /**
   * Announce shutdown, leave the directory and forget memory.
   */
  async shutdown(): Promise<void> {
    await this.setStatus('shutting_down');
    this.client.directory.unregister(this.agentId);
    this.clearMemory();
    this.logger.info('Agent shut down');
  }

  getStatus(): AgentStatusSnapshot {
    return {
      agentId: this.agentId,
      status: this.status,
      capabilities: [...this.capabilities],
      tools: [...this.tools],
      memoryKeys: [...this.memory.keys()],
    };
  }

  getCapabilities(): readonly string[] {
    return [...this.capabilities];
  }

  getTools(): readonly string[] {
    return [...this.tools];
  }

  /**
   * Record the new status and broadcast it to subscribers.
   */
  async setStatus(status: AgentState): Promise<void> {
    this.status = status;
    await this.client.broadcastStatus({ agentId: this.agentId, status });
  }

  updateMemory(key: string, value: unknown): void {
    this.memory.set(key, value);
  }

  getMemory(key: string): unknown {
    return this.memory.get(key);
  }

  clearMemory(): void {
    this.memory.clear();
  }

  async delegateToOtherAgent(targetId: string, task: TaskDescriptor): Promise<DelegationOutcome> {
    try {
      const result = await this.client.delegateTask(targetId, task);
      return { success: true, result };
    } catch (error) {
      this.logger.warn({ targetId, err: error }, 'Delegation failed');
      return { success: false, error: error instanceof Error ? error.message : String(error) };
    }
  }

  /**
   * Delegate the same task to each agent in turn.
   */
  async collaborateWithAgents(
    agentIds: string[],
    task: TaskDescriptor
  ): Promise<Record<string, DelegationOutcome>> {
    const results: Record<string, DelegationOutcome> = {};
    for (const agentId of agentIds) {
      results[agentId] = await this.delegateToOtherAgent(agentId, task);
    }
    return results;
  }

  /**
   * Run one of this agent's tools.
   *
   * @throws InvalidToolInvocationError if no tool manager is attached, the
   *   tool is not listed for this agent, or the arguments are invalid
   */
  async useTool(name: string, args: Record<string, unknown>): Promise<ToolExecutionResult> {
    if (!this.tools.includes(name)) {
      throw new InvalidToolInvocationError(name, `not available to agent ${this.agentId}`);
    }
    if (!this.toolManager) {
      throw new InvalidToolInvocationError(name, 'no tool manager attached');
    }
    return this.toolManager.execute(name, args);
  }

  /**
   * Whether `useTool(name)` can reach a registered tool.
   */
  protected canUseTool(name: string): boolean {
    return this.tools.includes(name) && (this.toolManager?.hasTool(name) ?? false);
  }

  /**
   * Single-prompt model call with the agent's defaults.
   */
  protected generate(prompt: string, config: LlmConfig = {}): Promise<string> {
    const messages: LlmMessage[] = [{ role: 'user', content: prompt }];
    return this.llm.generate(messages, { ...this.llmConfig, ...config });
  }
}
