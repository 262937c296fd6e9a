/**
 * Logger Factory Module
 *
 * Centralized logging on Pino:
 * - Development (pretty print) vs Production (JSON) environments
 * - Optional file rotation with pino-roll
 * - Child loggers bound to a component `context`
 * - Sensitive data redaction
 *
 * Under NODE_ENV=test the root logger is plain JSON at level `silent`
 * unless LOG_LEVEL says otherwise, so test runs stay quiet.
 *
 * @module utils/logger
 */

import pino, { type Logger, type Level, type LevelWithSilent, type LoggerOptions } from 'pino';
import path from 'path';
import fs from 'fs';

/**
 * Log levels supported by Pino
 */
export type LogLevel = Level;

/**
 * Logger configuration interface
 */
export interface LoggerConfig {
  /** Log level (default: 'info' in production, 'debug' in development) */
  level?: LogLevel;
  /** Enable pretty print (default: true outside production) */
  prettyPrint?: boolean;
  /** Log to file (default: false) */
  fileLogging?: boolean;
  /** Log directory (default: './logs') */
  logDir?: string;
  /** Log file name inside logDir (default: 'agentmesh.log') */
  fileName?: string;
  /** Rotate the log file with pino-roll (default: true) */
  rotate?: boolean;
  /** Fields to redact from logs */
  redact?: string[];
  /** Additional metadata to include in all logs */
  metadata?: Record<string, unknown>;
}

/**
 * Sensitive field patterns that should be redacted
 */
const SENSITIVE_FIELDS = [
  'apiKey',
  'token',
  'password',
  'secret',
  'authorization',
  'credential',
];

const VALID_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal'];

let rootLogger: Logger | null = null;
/** False while the root is the implicit default built by getRootLogger */
let configured = false;

function isDevelopment(): boolean {
  return process.env.NODE_ENV !== 'production';
}

function isTest(): boolean {
  return process.env.NODE_ENV === 'test';
}

function isLogLevel(value: string): value is LogLevel {
  return (VALID_LEVELS as readonly string[]).includes(value);
}

/**
 * Get log level from environment or default
 */
function getDefaultLogLevel(): LevelWithSilent {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();

  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }

  if (isTest()) {
    return 'silent';
  }

  return isDevelopment() ? 'debug' : 'info';
}

function getDevelopmentConfig(prettyPrint: boolean): LoggerOptions {
  const options: LoggerOptions = {
    level: getDefaultLogLevel(),
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
  };

  if (prettyPrint && !isTest()) {
    options.transport = {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        singleLine: false,
        messageFormat: '[{context}] {msg}',
      },
    };
  }

  return options;
}

function getProductionConfig(): LoggerOptions {
  return {
    level: getDefaultLogLevel(),
    formatters: {
      level: (label) => {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    serializers: {
      err: pino.stdSerializers.err,
      error: pino.stdSerializers.err,
    },
  };
}

function getBaseConfig(prettyPrint = true): LoggerOptions {
  return isDevelopment() ? getDevelopmentConfig(prettyPrint) : getProductionConfig();
}

/**
 * Setup file logging, rotated or appended to a single file.
 *
 * pino-roll is imported lazily so it is only loaded when rotation is on.
 */
async function setupFileLogging(
  logDir: string,
  fileName: string,
  rotate: boolean
): Promise<pino.DestinationStream> {
  const logsPath = path.resolve(process.cwd(), logDir);

  if (!fs.existsSync(logsPath)) {
    fs.mkdirSync(logsPath, { recursive: true });
  }

  if (!rotate) {
    return pino.destination({ dest: path.join(logsPath, fileName), sync: false });
  }

  const { default: pinoRoll } = await import('pino-roll');

  return pinoRoll({
    file: path.join(logsPath, fileName),
    size: '10m',
    limit: { count: 30 },
  });
}

function createRedaction(fields: string[] = SENSITIVE_FIELDS): LoggerOptions['redact'] {
  return {
    paths: fields.flatMap((field) => [field, `*.${field}`]),
    censor: '[REDACTED]',
  };
}

/**
 * Initialize the root logger.
 *
 * Replaces the implicit default root built by getRootLogger; child loggers
 * created before this call keep writing through that default.
 *
 * @example
 * ```typescript
 * const logger = await initLogger({ level: 'info', fileLogging: true });
 * logger.info('agentmesh started');
 * ```
 */
export async function initLogger(config: LoggerConfig = {}): Promise<Logger> {
  if (rootLogger && configured) {
    return rootLogger;
  }
  configured = true;

  const logDir = config.logDir ?? process.env.LOG_DIR ?? './logs';
  const fileLogging = (config.fileLogging ?? false) && !isTest();

  let options: LoggerOptions = getBaseConfig(config.prettyPrint ?? true);

  if (config.level) {
    options.level = config.level;
  }

  if (!isDevelopment() || config.redact) {
    options = { ...options, redact: createRedaction(config.redact) };
  }

  if (config.metadata) {
    options.base = { ...options.base, ...config.metadata };
  }

  if (fileLogging) {
    // A destination stream and a worker transport cannot be combined
    const { transport: _transport, ...streamOptions } = options;
    try {
      const stream = await setupFileLogging(logDir, config.fileName ?? 'agentmesh.log', config.rotate ?? true);
      rootLogger = pino(streamOptions, stream);
      return rootLogger;
    } catch (error) {
      console.warn('Failed to setup file logging, falling back to stdout:', error);
    }
  }

  rootLogger = options.transport ? pino(options) : pino(options, process.stdout);

  return rootLogger;
}

/**
 * Create a child logger bound to a component context.
 *
 * @param context - Component name (e.g., 'TaskRouter', 'DelegationClient:research-001')
 * @param metadata - Additional fields for every entry
 *
 * @example
 * ```typescript
 * class TaskRouter {
 *   private logger = createLogger('TaskRouter');
 * }
 * ```
 */
export function createLogger(
  context: string,
  metadata?: Record<string, unknown>
): Logger {
  return getRootLogger().child({
    context,
    ...metadata,
  });
}

/**
 * Get the root logger, creating a stdout logger if none was initialized.
 */
export function getRootLogger(): Logger {
  if (!rootLogger) {
    const options = getBaseConfig();
    rootLogger = options.transport ? pino(options) : pino(options, process.stdout);
  }
  return rootLogger;
}

/**
 * Drop the root logger so the next call builds a fresh one.
 */
export function resetLogger(): void {
  rootLogger = null;
  configured = false;
}

/**
 * Update the log level at runtime
 */
export function setLogLevel(level: LogLevel): void {
  if (rootLogger) {
    rootLogger.level = level;
  }
}

/**
 * Check if a log level is enabled
 */
export function isLevelEnabled(level: LogLevel): boolean {
  return getRootLogger().isLevelEnabled(level);
}

/**
 * Flush any pending log entries.
 */
export function flushLogger(): Promise<void> {
  if (!rootLogger) {
    return Promise.resolve();
  }
  const logger = rootLogger;
  return new Promise((resolve) => {
    logger.flush(() => resolve());
  });
}
