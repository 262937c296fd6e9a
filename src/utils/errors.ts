/**
 * Error types for agentmesh.
 *
 * Selection failures (NoSuitableAgentError, TargetNotFoundError) propagate to
 * callers. Invocation failures are converted to text at the router boundary.
 *
 * @module utils/errors
 */

/**
 * Machine-readable error codes.
 */
export type AgentMeshErrorCode =
  | 'TARGET_NOT_FOUND'
  | 'DELEGATION_FAILED'
  | 'NO_SUITABLE_AGENT'
  | 'UNKNOWN_ENVELOPE_KIND'
  | 'INVALID_TOOL_INVOCATION'
  | 'SESSION_NOT_FOUND'
  | 'PROVIDER_ERROR'
  | 'TIMEOUT'
  | 'CONFIGURATION';

/**
 * Base class for every error raised by agentmesh.
 */
export class AgentMeshError extends Error {
  readonly code: AgentMeshErrorCode;

  constructor(message: string, code: AgentMeshErrorCode, options: { cause?: unknown } = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'AgentMeshError';
    this.code = code;
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      cause: this.cause instanceof Error ? this.cause.message : undefined,
      stack: this.stack,
    };
  }
}

/**
 * Delegation target is not present in the agent directory.
 */
export class TargetNotFoundError extends AgentMeshError {
  readonly targetId: string;

  constructor(targetId: string) {
    super(`Agent ${targetId} not found in registry`, 'TARGET_NOT_FOUND');
    this.name = 'TargetNotFoundError';
    this.targetId = targetId;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), targetId: this.targetId };
  }
}

/**
 * Delivery of an envelope to a resolved target failed.
 */
export class DelegationFailedError extends AgentMeshError {
  readonly targetId: string;

  constructor(targetId: string, cause: unknown) {
    super(
      `Failed to delegate to ${targetId}: ${cause instanceof Error ? cause.message : String(cause)}`,
      'DELEGATION_FAILED',
      { cause }
    );
    this.name = 'DelegationFailedError';
    this.targetId = targetId;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), targetId: this.targetId };
  }
}

/**
 * Routing found neither a local nor a discoverable agent for a task.
 */
export class NoSuitableAgentError extends AgentMeshError {
  readonly taskType: string;

  constructor(taskType: string) {
    super(`No suitable agent found for task type: ${taskType}`, 'NO_SUITABLE_AGENT');
    this.name = 'NoSuitableAgentError';
    this.taskType = taskType;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), taskType: this.taskType };
  }
}

/**
 * Inbound envelope carried a kind this client does not handle.
 */
export class UnknownEnvelopeKindError extends AgentMeshError {
  readonly kind: string;

  constructor(kind: string) {
    super(`Unknown message type: ${kind}`, 'UNKNOWN_ENVELOPE_KIND');
    this.name = 'UnknownEnvelopeKindError';
    this.kind = kind;
  }
}

/**
 * Tool lookup or argument validation failed.
 */
export class InvalidToolInvocationError extends AgentMeshError {
  readonly toolName: string;
  readonly reason: string;

  constructor(toolName: string, reason: string) {
    super(`Invalid invocation of tool ${toolName}: ${reason}`, 'INVALID_TOOL_INVOCATION');
    this.name = 'InvalidToolInvocationError';
    this.toolName = toolName;
    this.reason = reason;
  }
}

export class SessionNotFoundError extends AgentMeshError {
  readonly userId: string;

  constructor(userId: string) {
    super(`No conversation session for user ${userId}`, 'SESSION_NOT_FOUND');
    this.name = 'SessionNotFoundError';
    this.userId = userId;
  }
}

/**
 * LLM provider call failed or returned no usable result.
 */
export class ProviderError extends AgentMeshError {
  readonly provider: string;

  constructor(provider: string, message: string, cause?: unknown) {
    super(`${provider}: ${message}`, 'PROVIDER_ERROR', { cause });
    this.name = 'ProviderError';
    this.provider = provider;
  }
}

/**
 * Operation did not complete within its deadline.
 */
export class TimeoutError extends AgentMeshError {
  readonly timeoutMs: number;
  readonly operation?: string;

  constructor(message: string, timeoutMs: number, operation?: string) {
    super(message, 'TIMEOUT');
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
    this.operation = operation;
  }

  /**
   * Human-readable duration: `500ms`, `1.5s`, `2.0m`.
   */
  getTimeoutDuration(): string {
    if (this.timeoutMs < 1000) {
      return `${this.timeoutMs}ms`;
    }
    if (this.timeoutMs < 60000) {
      return `${(this.timeoutMs / 1000).toFixed(1)}s`;
    }
    return `${(this.timeoutMs / 60000).toFixed(1)}m`;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      timeoutMs: this.timeoutMs,
      timeoutDuration: this.getTimeoutDuration(),
      operation: this.operation,
    };
  }
}

/**
 * A single configuration problem.
 */
export interface ConfigIssue {
  /** Dotted path of the offending field (e.g., 'session.historyWindow') */
  field: string;
  message: string;
}

export class ConfigurationError extends AgentMeshError {
  readonly issues: ConfigIssue[];

  constructor(message: string, issues: ConfigIssue[] = []) {
    const details = issues.map((issue) => `  - ${issue.field}: ${issue.message}`).join('\n');
    super(details ? `${message}\n${details}` : message, 'CONFIGURATION');
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

const RETRYABLE_PATTERNS = [
  'timeout',
  'timed out',
  'network',
  'econnreset',
  'econnrefused',
  'etimedout',
  'connection refused',
  'rate limit',
  'temporarily unavailable',
  'service unavailable',
];

/**
 * Check whether an error is worth retrying.
 *
 * Timeouts are always retryable; agentmesh errors other than timeouts and
 * delegation failures never are. Anything else is judged by its message.
 */
export function isRetryable(error: unknown): boolean {
  if (error instanceof TimeoutError) {
    return true;
  }

  if (error instanceof DelegationFailedError) {
    return isRetryable(error.cause);
  }

  if (error instanceof AgentMeshError) {
    return false;
  }

  if (!(error instanceof Error)) {
    return false;
  }

  const message = error.message.toLowerCase();
  return RETRYABLE_PATTERNS.some((pattern) => message.includes(pattern));
}

/**
 * Format any thrown value as a one-line message.
 */
export function formatError(error: unknown): string {
  if (error instanceof AgentMeshError) {
    return `[${error.code}] ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
