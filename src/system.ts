/**
 * AgentMesh - assembles directory, transport, router, agents and sessions
 * from a configuration.
 *
 * @example
 * ```typescript
 * const { config } = loadConfig();
 * const mesh = createAgentMesh(config);
 * await mesh.start();
 * const reply = await mesh.sessions.process('user-1', 'Plan a product launch');
 * await mesh.stop();
 * ```
 *
 * @module system
 */

import type { AgentMeshConfig, AgentKind } from './config/types.js';
import { SYSTEM_AGENT_ID } from './config/constants.js';
import { AgentDirectory } from './directory/agent-directory.js';
import { DelegationClient, type DelegationClientOptions } from './a2a/delegation-client.js';
import { LocalTransport } from './transport/local-transport.js';
import { TaskRouter } from './routing/task-router.js';
import { SessionManager } from './session/session-manager.js';
import { LlmProviderFactory } from './llm/factory.js';
import type { LlmProvider } from './llm/types.js';
import { ToolManager } from './tools/tool-manager.js';
import { createBuiltinTools } from './tools/builtin.js';
import type { BaseAgent, BaseAgentConfig } from './agents/base-agent.js';
import { ResearchAgent } from './agents/research-agent.js';
import { PlanningAgent } from './agents/planning-agent.js';
import { createLogger } from './utils/logger.js';

const logger = createLogger('AgentMesh');

const AGENT_CLASSES: Record<AgentKind, new (config: BaseAgentConfig) => BaseAgent> = {
  research: ResearchAgent,
  planning: PlanningAgent,
};

export interface AgentMeshOptions {
  /** Provider shared by every agent; resolved from `llm.provider` when omitted */
  llm?: LlmProvider;
  /** Factory used to resolve `llm.provider` */
  providerFactory?: LlmProviderFactory;
  /** Tool manager shared by every agent; the built-in tools when omitted */
  toolManager?: ToolManager;
  /** Clock, replaceable in tests */
  now?: () => Date;
}

export class AgentMesh {
  readonly config: AgentMeshConfig;
  readonly directory = new AgentDirectory();
  readonly transport = new LocalTransport();
  readonly client: DelegationClient;
  readonly router: TaskRouter;
  readonly sessions: SessionManager;
  readonly toolManager: ToolManager;

  private readonly agents = new Map<string, BaseAgent>();
  private readonly clients = new Map<string, DelegationClient>();
  private cleanupTimer: NodeJS.Timeout | undefined;
  private running = false;

  constructor(config: AgentMeshConfig, options: AgentMeshOptions = {}) {
    this.config = config;

    const clientOptions: DelegationClientOptions = {
      inboxCapacity: config.delivery.inboxCapacity,
      receiveTimeoutMs: config.delivery.receiveTimeoutMs,
      maxRetries: config.delivery.maxRetries,
      retryDelayMs: config.delivery.retryDelayMs,
      deliveryTimeoutMs: config.delivery.deliveryTimeoutMs,
    };

    this.client = this.createClient(SYSTEM_AGENT_ID, clientOptions);
    this.router = new TaskRouter({ client: this.client });
    this.sessions = new SessionManager(this.router, {
      historyWindow: config.session.historyWindow,
      now: options.now,
    });
    this.toolManager = options.toolManager ?? AgentMesh.createDefaultToolManager();

    for (const record of config.directory) {
      this.directory.register(record);
    }

    const enabled = config.agents.filter((definition) => definition.enabled);
    if (enabled.length > 0) {
      const llm = options.llm ?? this.resolveProvider(options.providerFactory);
      for (const definition of enabled) {
        const AgentClass = AGENT_CLASSES[definition.kind];
        const agent = new AgentClass({
          agentId: definition.id,
          llm,
          client: this.createClient(definition.id, clientOptions),
          toolManager: this.toolManager,
          now: options.now,
        });
        this.agents.set(definition.id, agent);
        this.router.registerAgent(definition.id, agent);
      }
    }

    for (const [taskType, agentIds] of Object.entries(config.routing)) {
      this.router.addRoutingRule(taskType, agentIds);
    }
  }

  /**
   * Attach every client to the transport, register every agent in the
   * directory and begin the periodic cleanup of inactive sessions.
   */
  async start(): Promise<void> {
    if (this.running) {
      return;
    }

    for (const [agentId, client] of this.clients) {
      this.transport.attach(agentId, (envelope) => client.handleInbound(envelope));
    }
    await this.transport.start();
    for (const agent of this.agents.values()) {
      await agent.initialize();
    }

    const intervalMinutes = this.config.session.cleanupIntervalMinutes;
    if (intervalMinutes > 0) {
      const thresholdMs = this.config.session.inactiveHours * 60 * 60 * 1000;
      this.cleanupTimer = setInterval(() => {
        const removed = this.sessions.cleanupInactive(thresholdMs);
        if (removed.length > 0) {
          logger.info({ count: removed.length }, 'Removed inactive sessions');
        }
      }, intervalMinutes * 60 * 1000);
      this.cleanupTimer.unref();
    }

    this.running = true;
    logger.info({ agents: this.listAgentIds() }, 'AgentMesh started');
  }

  /**
   * Stop the cleanup timer, shut every agent down and stop the transport,
   * which detaches every client.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      return;
    }

    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = undefined;
    }

    for (const agent of this.agents.values()) {
      await agent.shutdown();
    }
    await this.transport.stop();

    this.running = false;
    logger.info('AgentMesh stopped');
  }

  isRunning(): boolean {
    return this.running;
  }

  getAgent(agentId: string): BaseAgent | undefined {
    return this.agents.get(agentId);
  }

  getClient(agentId: string): DelegationClient | undefined {
    return this.clients.get(agentId);
  }

  listAgentIds(): string[] {
    return Array.from(this.agents.keys());
  }

  private createClient(agentId: string, options: DelegationClientOptions): DelegationClient {
    const client = new DelegationClient(agentId, this.directory, this.transport, options);
    this.clients.set(agentId, client);
    return client;
  }

  private resolveProvider(factory?: LlmProviderFactory): LlmProvider {
    const providerFactory = factory ?? new LlmProviderFactory({
      apiKey: this.config.llm.apiKey,
      apiBaseUrl: this.config.llm.apiBaseUrl,
      model: this.config.llm.model,
    });
    return providerFactory.getProvider(this.config.llm.provider);
  }

  private static createDefaultToolManager(): ToolManager {
    const toolManager = new ToolManager();
    for (const tool of createBuiltinTools()) {
      toolManager.registerTool(tool);
    }
    return toolManager;
  }
}

/**
 * Build an AgentMesh from a parsed configuration.
 *
 * @throws ConfigurationError if `llm.provider` names no registered provider
 */
export function createAgentMesh(config: AgentMeshConfig, options: AgentMeshOptions = {}): AgentMesh {
  return new AgentMesh(config, options);
}
