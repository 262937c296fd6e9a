/**
 * Error Handling Module
 *
 * Classification, enrichment and logging of errors at the outer boundaries
 * (router invocation boundary, CLI):
 * - Error categorization
 * - Retry/transient detection
 * - User-facing messages
 * - Standardized error logging with Pino
 *
 * @module utils/error-handler
 */

import type { Logger } from 'pino';
import { createLogger } from './logger.js';
import {
  AgentMeshError,
  ConfigurationError,
  DelegationFailedError,
  InvalidToolInvocationError,
  NoSuitableAgentError,
  ProviderError,
  TargetNotFoundError,
  TimeoutError,
  isRetryable,
} from './errors.js';

/**
 * Error categories for classification and handling
 */
export enum ErrorCategory {
  /** Missing or invalid configuration */
  CONFIGURATION = 'CONFIGURATION',
  /** Connection failures below the delivery layer */
  NETWORK = 'NETWORK',
  /** Envelope delivery to another agent failed */
  DELIVERY = 'DELIVERY',
  /** No agent could be selected */
  ROUTING = 'ROUTING',
  /** Invalid input or tool arguments */
  VALIDATION = 'VALIDATION',
  TIMEOUT = 'TIMEOUT',
  /** LLM provider failures */
  PROVIDER = 'PROVIDER',
  UNKNOWN = 'UNKNOWN',
}

/**
 * Error severity levels
 */
export enum ErrorSeverity {
  /** Process should exit */
  FATAL = 'fatal',
  /** Operation failed but the system continues */
  ERROR = 'error',
  /** Operation degraded */
  WARN = 'warn',
}

/**
 * Standard error context interface
 */
export interface ErrorContext {
  category?: ErrorCategory;
  retryable?: boolean;
  userMessage?: string;
  [key: string]: unknown;
}

/**
 * Error enriched with classification metadata.
 */
export class AppError extends Error {
  readonly category: ErrorCategory;
  readonly severity: ErrorSeverity;
  readonly retryable: boolean;
  readonly userMessage?: string;
  readonly errorId: string;
  readonly context?: Record<string, unknown>;
  readonly originalError?: Error;

  constructor(
    message: string,
    category: ErrorCategory = ErrorCategory.UNKNOWN,
    severity: ErrorSeverity = ErrorSeverity.ERROR,
    options: {
      retryable?: boolean;
      userMessage?: string;
      context?: Record<string, unknown>;
      cause?: Error;
    } = {}
  ) {
    super(message, options.cause ? { cause: options.cause } : undefined);
    this.name = 'AppError';
    this.category = category;
    this.severity = severity;
    this.retryable = options.retryable ?? false;
    this.userMessage = options.userMessage;
    this.context = options.context;
    this.originalError = options.cause;
    this.errorId = `err_${Date.now()}_${Math.random().toString(36).substring(2, 9)}`;
  }

  toJSON(): Record<string, unknown> {
    return {
      errorId: this.errorId,
      name: this.name,
      message: this.message,
      category: this.category,
      severity: this.severity,
      retryable: this.retryable,
      userMessage: this.userMessage,
      context: this.context,
      originalError: this.originalError
        ? { name: this.originalError.name, message: this.originalError.message }
        : undefined,
    };
  }
}

let errorLogger: Logger | undefined;

function getErrorHandlerLogger(): Logger {
  if (!errorLogger) {
    errorLogger = createLogger('ErrorHandler');
  }
  return errorLogger;
}

/**
 * Classify an error based on its type and message
 */
export function classifyError(error: unknown): ErrorCategory {
  if (error instanceof AppError) {
    return error.category;
  }
  if (error instanceof ConfigurationError) {
    return ErrorCategory.CONFIGURATION;
  }
  if (error instanceof DelegationFailedError || error instanceof TargetNotFoundError) {
    return ErrorCategory.DELIVERY;
  }
  if (error instanceof NoSuitableAgentError) {
    return ErrorCategory.ROUTING;
  }
  if (error instanceof InvalidToolInvocationError) {
    return ErrorCategory.VALIDATION;
  }
  if (error instanceof TimeoutError) {
    return ErrorCategory.TIMEOUT;
  }
  if (error instanceof ProviderError) {
    return ErrorCategory.PROVIDER;
  }
  if (error instanceof AgentMeshError || !(error instanceof Error)) {
    return ErrorCategory.UNKNOWN;
  }

  const message = error.message.toLowerCase();

  if (
    message.includes('econnrefused') ||
    message.includes('econnreset') ||
    message.includes('enotfound') ||
    message.includes('network')
  ) {
    return ErrorCategory.NETWORK;
  }

  if (message.includes('timeout') || message.includes('timed out')) {
    return ErrorCategory.TIMEOUT;
  }

  if (message.includes('invalid') || message.includes('required') || message.includes('missing')) {
    return ErrorCategory.VALIDATION;
  }

  return ErrorCategory.UNKNOWN;
}

/**
 * Determine the severity level for an error
 */
export function getSeverity(error: unknown): ErrorSeverity {
  if (error instanceof AppError) {
    return error.severity;
  }

  switch (classifyError(error)) {
    case ErrorCategory.CONFIGURATION:
      return ErrorSeverity.FATAL;
    case ErrorCategory.ROUTING:
    case ErrorCategory.DELIVERY:
      return ErrorSeverity.WARN;
    default:
      return ErrorSeverity.ERROR;
  }
}

/**
 * Create a user-facing message for an error
 */
export function createUserMessage(error: unknown): string {
  if (error instanceof AppError) {
    return error.userMessage ?? error.message;
  }

  if (!(error instanceof Error)) {
    return 'An unknown error occurred';
  }

  switch (classifyError(error)) {
    case ErrorCategory.CONFIGURATION:
      return 'Configuration error. Please check agentmesh.config.yaml.';
    case ErrorCategory.NETWORK:
    case ErrorCategory.DELIVERY:
      return 'Could not reach the agent. Please try again.';
    case ErrorCategory.ROUTING:
      return error.message;
    case ErrorCategory.VALIDATION:
      return 'Invalid input. Please check your request and try again.';
    case ErrorCategory.TIMEOUT:
      return 'Operation timed out. Please try again.';
    case ErrorCategory.PROVIDER:
      return 'The language model is unavailable. Please try again later.';
    default:
      return 'An unexpected error occurred. Please try again.';
  }
}

/**
 * Wrap an error in an AppError carrying its classification.
 */
export function enrichError(error: unknown, context: ErrorContext = {}): AppError {
  if (error instanceof AppError) {
    return new AppError(error.message, error.category, error.severity, {
      retryable: error.retryable,
      userMessage: error.userMessage,
      context: { ...error.context, ...context },
      cause: error.originalError ?? error,
    });
  }

  const errorObj = error instanceof Error ? error : new Error(String(error));
  const { category, retryable, userMessage, ...rest } = context;

  return new AppError(
    errorObj.message,
    category ?? classifyError(errorObj),
    getSeverity(errorObj),
    {
      retryable: retryable ?? isRetryable(errorObj),
      userMessage: userMessage ?? createUserMessage(errorObj),
      context: rest,
      cause: errorObj,
    }
  );
}

/**
 * Log an error with full context
 */
export function logError(error: unknown, context: ErrorContext = {}, customLogger?: Logger): AppError {
  const logger = customLogger ?? getErrorHandlerLogger();
  const enriched = enrichError(error, context);

  const logData: Record<string, unknown> = {
    err: error instanceof Error ? error : undefined,
    errorId: enriched.errorId,
    category: enriched.category,
    retryable: enriched.retryable,
    ...context,
  };

  switch (enriched.severity) {
    case ErrorSeverity.FATAL:
      logger.fatal(logData, enriched.message);
      break;
    case ErrorSeverity.ERROR:
      logger.error(logData, enriched.message);
      break;
    case ErrorSeverity.WARN:
      logger.warn(logData, enriched.message);
      break;
  }

  return enriched;
}

/**
 * Handle an error with logging and optional user notification
 */
export function handleError(
  error: unknown,
  context: ErrorContext = {},
  options: {
    log?: boolean;
    throwOnError?: boolean;
    userNotifier?: (message: string) => void;
    customLogger?: Logger;
  } = {}
): AppError {
  const { log = true, throwOnError = false, userNotifier, customLogger } = options;

  const enriched = log ? logError(error, context, customLogger) : enrichError(error, context);

  if (userNotifier) {
    userNotifier(enriched.userMessage ?? enriched.message);
  }

  if (throwOnError) {
    throw enriched;
  }

  return enriched;
}
