/**
 * BaseTool - Abstract base class for tool implementations
 */

import type { ITool } from './interfaces/ITool.js';
import type { ToolContext, ToolDefinition, ToolResult, ToolValidation } from './types.js';
import { toJsonSchema } from './schema.js';

export abstract class BaseTool implements ITool {
  constructor(public readonly definition: ToolDefinition) {}

  abstract execute(args: Record<string, unknown>, context: ToolContext): Promise<ToolResult>;

  validate(args: Record<string, unknown>): ToolValidation {
    const parsed = this.definition.parameters.safeParse(args);
    if (!parsed.success) {
      return {
        success: false,
        error: parsed.error.errors
          .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; '),
      };
    }
    return { success: true, data: parsed.data };
  }

  getSchema(): Record<string, unknown> {
    return {
      name: this.definition.name,
      description: this.definition.description,
      parameters: toJsonSchema(this.definition.parameters),
    };
  }

  protected success(output: unknown, metadata?: Record<string, unknown>): ToolResult {
    return { success: true, output, ...(metadata ? { metadata } : {}) };
  }

  protected error(error: string, metadata?: Record<string, unknown>): ToolResult {
    return { success: false, error, ...(metadata ? { metadata } : {}) };
  }
}
