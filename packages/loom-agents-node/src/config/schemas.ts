/**
 * Configuration schemas with Zod validation
 */

import { z } from 'zod';

export const ProviderTagSchema = z.enum([
  'openai',
  'anthropic',
  'gemini',
  'deepseek',
  'ollama',
  'lmstudio',
  'generic',
]);

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

export const ContextConfigSchema = z.object({
  provider: ProviderTagSchema.default('generic'),
  maxTokens: z.number().int().positive().default(12_000),
  maxMessages: z.number().int().positive().default(40),
  strategy: z
    .enum(['drop-oldest-fifo', 'sliding-window', 'priority-based', 'summarize-old-messages'])
    .default('sliding-window'),
  // Only read by summarize-old-messages
  summaryTargetTokens: z.number().int().positive().default(256),
});

export const AgentsConfigSchema = z.object({
  maxHandoffDepth: z.number().int().positive().default(4),
  conflictResolution: z
    .enum(['highest-priority', 'newest-version', 'first-registered', 'fail-on-conflict'])
    .default('highest-priority'),
  trimStrategy: z.enum(['keep-latest', 'keep-system-and-latest']).default('keep-system-and-latest'),
});

export const ToolsConfigSchema = z.object({
  maxIterations: z.number().int().positive().default(8),
});

export const LoggingConfigSchema = z.object({
  level: LogLevelSchema.default('info'),
  dir: z.string().min(1).default('.agentloom/logs'),
  console: z.boolean().default(true),
  file: z.boolean().default(false),
});

/**
 * Database file; an in-memory database is used when absent
 */
export const StorageConfigSchema = z.object({
  path: z.string().min(1).optional(),
});

export const RuntimeConfigSchema = z.object({
  context: ContextConfigSchema.default({}),
  agents: AgentsConfigSchema.default({}),
  tools: ToolsConfigSchema.default({}),
  logging: LoggingConfigSchema.default({}),
  storage: StorageConfigSchema.default({}),
});

/**
 * One layer of the hierarchy (a config file, the environment, overrides).
 * Fields left out keep the value of the layer below.
 */
export const ConfigLayerSchema = z
  .object({
    context: ContextConfigSchema.partial(),
    agents: AgentsConfigSchema.partial(),
    tools: ToolsConfigSchema.partial(),
    logging: LoggingConfigSchema.partial(),
    storage: StorageConfigSchema.partial(),
  })
  .partial();

export type RuntimeConfig = z.infer<typeof RuntimeConfigSchema>;
export type ConfigLayer = z.infer<typeof ConfigLayerSchema>;
export type ContextConfig = z.infer<typeof ContextConfigSchema>;
export type AgentsConfig = z.infer<typeof AgentsConfigSchema>;
export type LoggingConfig = z.infer<typeof LoggingConfigSchema>;

export function formatIssues(error: z.ZodError): string {
  return error.errors
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}
