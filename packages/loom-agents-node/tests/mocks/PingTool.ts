/**
 * PingTool - answers "pong", for testing
 */

import { z } from 'zod';
import { BaseTool, type ToolResult } from '@agentloom/agents';

export class PingTool extends BaseTool {
  calls = 0;

  constructor() {
    super({
      name: 'ping',
      description: 'Reply with pong',
      parameters: z.object({}),
      metadata: { source: 'custom', enabled: true },
    });
  }

  async execute(): Promise<ToolResult> {
    this.calls++;
    return this.success('pong');
  }
}
