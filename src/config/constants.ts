/**
 * Application-wide constants.
 */

/**
 * Configuration file names to search for, in priority order.
 */
export const CONFIG_FILE_NAMES = [
  'agentmesh.config.yaml',
  'agentmesh.config.yml',
] as const;

/**
 * Environment variable naming an explicit configuration file.
 */
export const CONFIG_PATH_ENV = 'AGENTMESH_CONFIG';

/**
 * Agents created when the configuration names none.
 */
export const DEFAULT_AGENTS = [
  { id: 'research-001', kind: 'research' },
  { id: 'planning-001', kind: 'planning' },
] as const;

/**
 * Routing rules used when the configuration names none.
 */
export const DEFAULT_ROUTING = {
  research: ['research-001'],
  analysis: ['research-001'],
  planning: ['planning-001'],
} as const;

/**
 * Identity of the client that routes on behalf of the system.
 */
export const SYSTEM_AGENT_ID = 'system';

/**
 * CLI defaults
 */
export const CLI = {
  /** User id for CLI sessions */
  DEFAULT_USER_ID: 'cli-user',
  /** History entries shown by /history */
  HISTORY_LIMIT: 10,
} as const;
