/**
 * ToolRegistry - tools the model may call, keyed by name
 */

import type { ITool } from './interfaces/ITool.js';
import type { ToolContext, ToolResult } from './types.js';
import { ToolRegistrationError } from './errors.js';
import { toJsonSchema } from './schema.js';
import { AtomicRef } from '../shared/utils/AtomicRef.js';
import { errorMessage } from '../shared/utils/errors.js';
import type { ILogger } from '../shared/logging/ILogger.js';
import { noopLogger } from '../shared/logging/ILogger.js';
import type { LLMTool } from '../llm/ILLMService.js';

export interface ToolRegistryOptions {
  logger?: ILogger;
}

type ToolTable = ReadonlyMap<string, ITool>;

export class ToolRegistry {
  private readonly tools = new AtomicRef<ToolTable>(new Map());
  private readonly logger: ILogger;

  constructor(options: ToolRegistryOptions = {}) {
    this.logger = options.logger ?? noopLogger;
  }

  /**
   * @throws ToolRegistrationError when the name is taken
   */
  register(tool: ITool): void {
    const { name } = tool.definition;
    this.tools.update((current) => {
      if (current.has(name)) {
        throw new ToolRegistrationError(name);
      }
      return new Map(current).set(name, tool);
    });
    this.logger.debug('Tool registered', { tool: name, enabled: tool.definition.metadata.enabled });
  }

  unregister(name: string): boolean {
    return this.tools.modify((current) => {
      if (!current.has(name)) {
        return [false, current] as const;
      }
      const next = new Map(current);
      next.delete(name);
      return [true, next] as const;
    });
  }

  get(name: string): ITool | undefined {
    return this.tools.get().get(name);
  }

  has(name: string): boolean {
    return this.tools.get().has(name);
  }

  list(): ITool[] {
    return [...this.tools.get().values()];
  }

  listEnabled(): ITool[] {
    return this.list().filter((tool) => tool.definition.metadata.enabled);
  }

  /**
   * Schemas for the model service (enabled tools unless names are given)
   */
  getSchemas(toolNames?: readonly string[]): Record<string, unknown>[] {
    return this.select(toolNames).map((tool) => tool.getSchema());
  }

  /**
   * Tool descriptions in the shape the model service takes
   */
  getLLMTools(toolNames?: readonly string[]): LLMTool[] {
    return this.select(toolNames).map((tool) => ({
      name: tool.definition.name,
      description: tool.definition.description,
      parameters: toJsonSchema(tool.definition.parameters),
    }));
  }

  /**
   * Execute a tool by name. Failures come back as an unsuccessful result, never as a throw.
   */
  async execute(
    toolName: string,
    args: Record<string, unknown>,
    context: ToolContext = {}
  ): Promise<ToolResult> {
    const tool = this.get(toolName);
    if (!tool) {
      return { success: false, error: `Tool '${toolName}' not found` };
    }
    if (!tool.definition.metadata.enabled) {
      return { success: false, error: `Tool '${toolName}' is disabled` };
    }

    const validation = tool.validate(args);
    if (!validation.success) {
      return { success: false, error: `Invalid arguments: ${validation.error}` };
    }

    const startTime = Date.now();
    try {
      const result = await tool.execute(validation.data, context);
      return {
        ...result,
        metadata: { ...result.metadata, executionTime: Date.now() - startTime },
      };
    } catch (error) {
      this.logger.warn('Tool execution failed', {
        tool: toolName,
        threadId: context.threadId,
        error: errorMessage(error),
      });
      return { success: false, error: errorMessage(error) };
    }
  }

  private select(toolNames?: readonly string[]): ITool[] {
    if (!toolNames) {
      return this.listEnabled();
    }
    const table = this.tools.get();
    return toolNames.flatMap((name) => {
      const tool = table.get(name);
      return tool ? [tool] : [];
    });
  }
}
