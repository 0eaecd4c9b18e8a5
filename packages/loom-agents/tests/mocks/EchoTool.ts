/**
 * EchoTool - returns its input, for testing
 */

import { z } from 'zod';
import { BaseTool } from '../../src/tools/BaseTool.js';
import type { ToolContext, ToolResult } from '../../src/tools/types.js';

export class EchoTool extends BaseTool {
  readonly contexts: ToolContext[] = [];

  constructor(options: { name?: string; enabled?: boolean } = {}) {
    super({
      name: options.name ?? 'echo',
      description: 'Echo the given value back',
      parameters: z.object({
        value: z.string().describe('Value to echo'),
      }),
      metadata: {
        source: 'custom',
        enabled: options.enabled ?? true,
      },
    });
  }

  async execute(args: Record<string, unknown>, context: ToolContext): Promise<ToolResult> {
    this.contexts.push(context);
    return this.success(args['value']);
  }
}

/**
 * Tool whose execution always throws
 */
export class FailingTool extends BaseTool {
  constructor(private readonly reason = 'boom') {
    super({
      name: 'explode',
      description: 'Always fails',
      parameters: z.object({}),
      metadata: { source: 'custom', enabled: true },
    });
  }

  async execute(): Promise<ToolResult> {
    throw new Error(this.reason);
  }
}
