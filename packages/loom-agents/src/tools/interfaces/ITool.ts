/**
 * ITool - Interface for tool implementations
 */

import type { ToolContext, ToolDefinition, ToolResult, ToolValidation } from '../types.js';

export interface ITool {
  readonly definition: ToolDefinition;

  /**
   * Execute the tool with already-validated arguments
   */
  execute(args: Record<string, unknown>, context: ToolContext): Promise<ToolResult>;

  validate(args: Record<string, unknown>): ToolValidation;

  /**
   * JSON schema handed to the model service
   */
  getSchema(): Record<string, unknown>;
}
