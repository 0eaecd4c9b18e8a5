/**
 * Tool system types
 */

import type { z } from 'zod';

/**
 * Tool execution result
 */
export interface ToolResult {
  success: boolean;
  output?: unknown;
  error?: string;
  metadata?: {
    executionTime?: number;
    [key: string]: unknown;
  };
}

/**
 * Tool execution context
 */
export interface ToolContext {
  threadId?: string;
  agentName?: string;
  toolCallId?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Where a tool comes from
 */
export type ToolSource = 'built-in' | 'custom' | 'agent';

export interface ToolMetadata {
  source: ToolSource;
  version?: string;
  tags?: string[];
  enabled: boolean;
}

export type ToolParameterSchema = z.AnyZodObject;

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: ToolParameterSchema;
  metadata: ToolMetadata;
}

export type ToolValidation =
  | { success: true; data: Record<string, unknown> }
  | { success: false; error: string };
