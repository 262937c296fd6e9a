/**
 * Configuration schema for agentmesh.
 *
 * The structure of agentmesh.config.yaml. Every section is optional in the
 * file; parsing fills in the defaults below.
 */

import { z } from 'zod';
import { AgentRecordSchema } from '../directory/types.js';
import { DEFAULT_AGENTS, DEFAULT_ROUTING } from './constants.js';

/**
 * Logging section.
 */
export const LoggingConfigSchema = z.object({
  level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  /** Pretty print to the console outside production */
  pretty: z.boolean().default(true),
  /** Log file path; file logging is off when unset */
  file: z.string().min(1).optional(),
  /** Rotate the log file with pino-roll */
  rotate: z.boolean().default(false),
});

/**
 * LLM provider section.
 */
export const LlmConfigSchema = z.object({
  provider: z.string().min(1).default('claude'),
  /** Model identifier; unset means the provider default */
  model: z.string().min(1).optional(),
  /** Falls back to ANTHROPIC_API_KEY */
  apiKey: z.string().min(1).optional(),
  apiBaseUrl: z.string().url().optional(),
});

/**
 * Session section.
 */
export const SessionConfigSchema = z.object({
  /** History entries attached to each task */
  historyWindow: z.number().int().positive().default(5),
  /** Sessions idle this long are removed by the periodic cleanup */
  inactiveHours: z.number().positive().default(24),
  /** 0 disables the periodic cleanup */
  cleanupIntervalMinutes: z.number().min(0).default(60),
});

/**
 * Delivery section.
 */
export const DeliveryConfigSchema = z.object({
  maxRetries: z.number().int().min(0).default(0),
  retryDelayMs: z.number().int().min(0).default(500),
  inboxCapacity: z.number().int().positive().default(1000),
  receiveTimeoutMs: z.number().int().min(0).default(1000),
  /** Deadline for one delivery attempt; 0 disables it */
  deliveryTimeoutMs: z.number().int().min(0).default(0),
});

export const AgentKindSchema = z.enum(['research', 'planning']);

/**
 * A locally hosted agent to create at startup.
 */
export const AgentDefinitionSchema = z.object({
  id: z.string().min(1),
  kind: AgentKindSchema,
  enabled: z.boolean().default(true),
});

/**
 * Complete configuration file schema.
 */
export const AgentMeshConfigSchema = z
  .object({
    logging: LoggingConfigSchema.default({}),
    llm: LlmConfigSchema.default({}),
    session: SessionConfigSchema.default({}),
    delivery: DeliveryConfigSchema.default({}),
    agents: z.array(AgentDefinitionSchema).default(() => DEFAULT_AGENTS.map((agent) => ({ ...agent }))),
    /** Task type → ordered preferred agent ids */
    routing: z.record(z.array(z.string().min(1))).default(() =>
      Object.fromEntries(Object.entries(DEFAULT_ROUTING).map(([type, ids]): [string, string[]] => [type, [...ids]]))
    ),
    /** Agents hosted in other processes, pre-registered in the directory */
    directory: z.array(AgentRecordSchema).default([]),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.agents.forEach((agent, index) => {
      if (seen.has(agent.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['agents', index, 'id'],
          message: `Duplicate agent id ${agent.id}`,
        });
      }
      seen.add(agent.id);
    });
  });

export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;
export type LlmConfigSection = z.infer<typeof LlmConfigSchema>;
export type SessionConfig = z.infer<typeof SessionConfigSchema>;
export type DeliveryConfig = z.infer<typeof DeliveryConfigSchema>;
export type AgentKind = z.infer<typeof AgentKindSchema>;
export type AgentDefinition = z.infer<typeof AgentDefinitionSchema>;

/**
 * Parsed configuration with every default applied.
 */
export type AgentMeshConfig = z.infer<typeof AgentMeshConfigSchema>;

/**
 * Configuration as written in the file.
 */
export type AgentMeshConfigInput = z.input<typeof AgentMeshConfigSchema>;

/**
 * Configuration file metadata.
 */
export interface ConfigFileInfo {
  /** Path to the config file */
  path: string;
  /** Whether the file exists */
  exists: boolean;
}

/**
 * Loaded configuration with its origin.
 */
export interface LoadedConfig {
  config: AgentMeshConfig;
  /** Absolute path of the file, unset when defaults were used */
  source?: string;
}
