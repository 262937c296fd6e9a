/**
 * ToolManager - registry and executor for agent tools.
 *
 * `execute` separates caller mistakes from tool failures: an unknown tool or
 * arguments failing the tool's schema raise InvalidToolInvocationError,
 * while an error thrown by the tool itself becomes an error result.
 *
 * @module tools/tool-manager
 */

import { createLogger } from '../utils/logger.js';
import { InvalidToolInvocationError } from '../utils/errors.js';
import type { ToolDefinition } from '../llm/types.js';
import type {
  ManagedTool,
  ToolExecutionResult,
  ToolInvocation,
  ToolValidationResult,
} from './types.js';

export class ToolManager {
  private readonly tools = new Map<string, ManagedTool>();
  private readonly logger = createLogger('ToolManager');

  registerTool(tool: ManagedTool): void {
    this.tools.set(tool.definition.name, tool);
    this.logger.debug({ tool: tool.definition.name }, 'Registered tool');
  }

  unregisterTool(name: string): boolean {
    const removed = this.tools.delete(name);
    if (removed) {
      this.logger.debug({ tool: name }, 'Unregistered tool');
    }
    return removed;
  }

  listTools(): string[] {
    return [...this.tools.keys()];
  }

  hasTool(name: string): boolean {
    return this.tools.has(name);
  }

  getDefinition(name: string): ToolDefinition | undefined {
    return this.tools.get(name)?.definition;
  }

  /**
   * Definitions for the named tools, or all tools. Unknown names are skipped.
   */
  getDefinitions(names?: readonly string[]): ToolDefinition[] {
    const selected = names ?? this.listTools();
    const definitions: ToolDefinition[] = [];
    for (const name of selected) {
      const tool = this.tools.get(name);
      if (tool) {
        definitions.push(tool.definition);
      }
    }
    return definitions;
  }

  getMetadata(name: string): Record<string, unknown> | undefined {
    const tool = this.tools.get(name);
    return tool ? { ...tool.metadata } : undefined;
  }

  /**
   * Check a call without running it.
   */
  validateToolCall(name: string, args: unknown): ToolValidationResult {
    const tool = this.tools.get(name);
    if (!tool) {
      return { valid: false, error: `Tool ${name} not found` };
    }
    return tool.validate(args);
  }

  /**
   * Run a tool.
   *
   * @throws InvalidToolInvocationError for an unknown tool or invalid arguments
   */
  async execute(name: string, args: unknown = {}): Promise<ToolExecutionResult> {
    const tool = this.tools.get(name);
    if (!tool) {
      throw new InvalidToolInvocationError(name, 'tool not found');
    }

    const validation = tool.validate(args);
    if (!validation.valid) {
      throw new InvalidToolInvocationError(name, validation.error);
    }

    try {
      const result = await tool.run(args);
      this.logger.debug({ tool: name }, 'Tool executed');
      return { success: true, result, tool: name };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn({ tool: name, err: error }, 'Tool execution failed');
      return { success: false, error: message, tool: name };
    }
  }

  /**
   * Run several calls concurrently. Every call yields a result; invalid
   * invocations become error results.
   */
  async executeMany(calls: ToolInvocation[]): Promise<ToolExecutionResult[]> {
    const outcomes = await Promise.allSettled(
      calls.map((call) => this.execute(call.name, call.arguments ?? {}))
    );

    return outcomes.map((outcome, index): ToolExecutionResult => {
      if (outcome.status === 'fulfilled') {
        return outcome.value;
      }
      const reason = outcome.reason;
      return {
        success: false,
        error: reason instanceof Error ? reason.message : String(reason),
        tool: calls[index].name,
      };
    });
  }
}
