/**
 * Configuration file loader for agentmesh.
 *
 * This module handles finding, reading and validating YAML configuration files.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import * as yaml from 'js-yaml';
import { createLogger } from '../utils/logger.js';
import { ConfigurationError } from '../utils/errors.js';
import { CONFIG_FILE_NAMES } from './constants.js';
import { AgentMeshConfigSchema, type AgentMeshConfig, type ConfigFileInfo } from './types.js';

const logger = createLogger('ConfigLoader');

/**
 * Search paths for configuration files: the working directory, then home.
 */
export function getSearchPaths(env: NodeJS.ProcessEnv = process.env): string[] {
  return [process.cwd(), env.HOME ?? ''].filter(Boolean);
}

/**
 * Find the configuration file in the search paths.
 *
 * @returns ConfigFileInfo with path and existence status
 */
export function findConfigFile(searchPaths: string[] = getSearchPaths()): ConfigFileInfo {
  for (const searchPath of searchPaths) {
    for (const fileName of CONFIG_FILE_NAMES) {
      const filePath = resolve(searchPath, fileName);
      if (existsSync(filePath)) {
        logger.debug({ filePath }, 'Found configuration file');
        return { path: filePath, exists: true };
      }
    }
  }

  logger.debug('No configuration file found, using defaults');
  return { path: '', exists: false };
}

/**
 * Read and parse a YAML file without validating it.
 *
 * @throws ConfigurationError if the file cannot be read or is not valid YAML
 */
export function readConfigFile(filePath: string): unknown {
  try {
    return yaml.load(readFileSync(filePath, 'utf-8'));
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error({ path: filePath, error: errorMessage }, 'Failed to read configuration file');
    throw new ConfigurationError(`Failed to read configuration file ${filePath}: ${errorMessage}`);
  }
}

/**
 * Validate raw configuration and apply defaults.
 *
 * An empty document counts as an empty configuration.
 *
 * @param raw - Parsed YAML document
 * @param source - File the document came from, for error messages
 * @throws ConfigurationError listing every invalid field
 *
 * @example
 * ```typescript
 * const config = parseConfig({ session: { historyWindow: 10 } });
 * config.delivery.inboxCapacity; // 1000
 * ```
 */
export function parseConfig(raw: unknown, source?: string): AgentMeshConfig {
  const document = raw ?? {};
  const origin = source ?? 'configuration';

  if (typeof document !== 'object' || Array.isArray(document)) {
    throw new ConfigurationError(`Invalid ${origin}: expected a mapping at the top level`);
  }

  const parsed = AgentMeshConfigSchema.safeParse(document);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
    }));
    logger.error({ source, issues }, 'Configuration validation failed');
    throw new ConfigurationError(`Invalid ${origin}`, issues);
  }

  return parsed.data;
}

/**
 * Read, parse and validate one configuration file.
 */
export function loadConfigFile(filePath: string): AgentMeshConfig {
  const config = parseConfig(readConfigFile(filePath), filePath);
  logger.info({ path: filePath }, 'Configuration file loaded successfully');
  return config;
}
