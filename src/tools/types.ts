/**
 * Tool types.
 *
 * A tool is declared with a zod object schema and a typed handler;
 * `defineTool` erases the argument type so tools of any shape share one
 * registry.
 */

import type { z } from 'zod';
import type { ToolDefinition } from '../llm/types.js';

export interface ToolSpec<Schema extends z.AnyZodObject, Result> {
  name: string;
  description: string;
  parameters: Schema;
  execute(args: z.infer<Schema>): Promise<Result> | Result;
  metadata?: Record<string, unknown>;
}

/**
 * Registry entry for a tool.
 */
export interface ManagedTool {
  readonly definition: ToolDefinition;
  readonly metadata: Record<string, unknown>;
  validate(args: unknown): ToolValidationResult;
  /**
   * Parse and run.
   *
   * @throws z.ZodError for invalid arguments, or whatever the handler throws
   */
  run(args: unknown): Promise<unknown>;
}

export type ToolExecutionResult =
  | { success: true; result: unknown; tool: string }
  | { success: false; error: string; tool: string };

export type ToolValidationResult = { valid: true } | { valid: false; error: string };

export interface ToolInvocation {
  name: string;
  arguments?: Record<string, unknown>;
}

export function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export function defineTool<Schema extends z.AnyZodObject, Result>(spec: ToolSpec<Schema, Result>): ManagedTool {
  const schema = spec.parameters;

  return {
    definition: {
      name: spec.name,
      description: spec.description,
      parameters: schema.shape,
    },
    metadata: { ...spec.metadata },
    validate(args) {
      const parsed = schema.safeParse(args);
      return parsed.success ? { valid: true } : { valid: false, error: describeIssues(parsed.error) };
    },
    async run(args) {
      const parsed = schema.safeParse(args);
      if (!parsed.success) {
        throw parsed.error;
      }
      return spec.execute(parsed.data);
    },
  };
}
