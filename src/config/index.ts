/**
 * Configuration management for agentmesh.
 *
 * Configuration comes from agentmesh.config.yaml, found through
 * AGENTMESH_CONFIG, the working directory or the home directory, in that
 * order. Without a file every default applies.
 */
import { existsSync } from 'fs';
import { basename, dirname, resolve } from 'path';
import { ConfigurationError } from '../utils/errors.js';
import type { LoggerConfig } from '../utils/logger.js';
import { CONFIG_PATH_ENV } from './constants.js';
import { findConfigFile, getSearchPaths, loadConfigFile, parseConfig } from './loader.js';
import type { AgentMeshConfig, LoadedConfig, LoggingConfig } from './types.js';

// Export constants and types
export * from './constants.js';
export * from './types.js';
export * from './loader.js';

export interface LoadConfigOptions {
  /** Explicit file; takes precedence over AGENTMESH_CONFIG */
  path?: string;
  /** Environment consulted for AGENTMESH_CONFIG, HOME and ANTHROPIC_API_KEY */
  env?: NodeJS.ProcessEnv;
  /** Directories searched when no explicit file is named */
  searchPaths?: string[];
}

/**
 * Fill in settings that fall back to the environment.
 */
function applyEnvironment(config: AgentMeshConfig, env: NodeJS.ProcessEnv): AgentMeshConfig {
  if (config.llm.apiKey || !env.ANTHROPIC_API_KEY) {
    return config;
  }
  return { ...config, llm: { ...config.llm, apiKey: env.ANTHROPIC_API_KEY } };
}

/**
 * Configuration with every default applied.
 */
export function getDefaultConfig(): AgentMeshConfig {
  return parseConfig({});
}

/**
 * Locate, read and validate the configuration.
 *
 * @throws ConfigurationError if an explicitly named file is missing or any file is invalid
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
  const env = options.env ?? process.env;
  const explicitPath = options.path ?? env[CONFIG_PATH_ENV];

  if (explicitPath) {
    const filePath = resolve(explicitPath);
    if (!existsSync(filePath)) {
      throw new ConfigurationError(`Configuration file not found: ${filePath}`);
    }
    return { config: applyEnvironment(loadConfigFile(filePath), env), source: filePath };
  }

  const fileInfo = findConfigFile(options.searchPaths ?? getSearchPaths(env));
  if (!fileInfo.exists) {
    return { config: applyEnvironment(getDefaultConfig(), env) };
  }

  return { config: applyEnvironment(loadConfigFile(fileInfo.path), env), source: fileInfo.path };
}

/**
 * Logger settings for a logging section.
 *
 * The configured level is left out when LOG_LEVEL is set, so the
 * environment keeps the last word.
 */
export function toLoggerConfig(logging: LoggingConfig, env: NodeJS.ProcessEnv = process.env): LoggerConfig {
  return {
    level: env.LOG_LEVEL ? undefined : logging.level,
    prettyPrint: logging.pretty,
    fileLogging: logging.file !== undefined,
    logDir: logging.file ? dirname(logging.file) : undefined,
    fileName: logging.file ? basename(logging.file) : undefined,
    rotate: logging.rotate,
  };
}
