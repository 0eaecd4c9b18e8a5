/**
 * ToolConversationManager - drives a tool-calling conversation to completion
 *
 * Each iteration sends the rendered thread to the model service. Requested
 * tools run in order through the registry and their results are appended as
 * tool messages before the next iteration.
 */

import type { Message, ProviderTag, ToolCall, ToolCallResponse } from '../types/index.js';
import type { ConversationThread } from '../conversation/types.js';
import {
  appendToThread,
  createConversationMessage,
  setThreadState,
} from '../conversation/ConversationThread.js';
import { defaultTokenCounter, type ITokenCounter } from '../context/TokenCounter.js';
import type { ToolRegistry } from '../tools/ToolRegistry.js';
import type { ILogger } from '../shared/logging/ILogger.js';
import { noopLogger } from '../shared/logging/ILogger.js';
import type { ILLMService } from './ILLMService.js';
import { InvalidRequestError, MaxIterationsExceededError, ToolError } from './errors.js';

export interface ToolConversationOptions {
  prompt: string;
  thread: ConversationThread;
  llm: ILLMService;
  toolRegistry: ToolRegistry;
  /** Names of the tools offered to the model; every enabled tool when omitted */
  tools?: readonly string[];
  maxIterations: number;
}

export interface ToolConversationResult {
  thread: ConversationThread;
  response: ToolCallResponse;
  iterations: number;
}

export interface ToolConversationManagerOptions {
  logger?: ILogger;
  provider?: ProviderTag;
  counter?: ITokenCounter;
  clock?: () => Date;
}

/**
 * Plain-text transcript sent to the model: `[role] content` blocks
 */
export function renderHistory(messages: readonly Message[]): string {
  return messages.map((message) => `[${message.role}] ${message.content}`).join('\n\n');
}

function renderToolOutput(output: unknown): string {
  if (typeof output === 'string') {
    return output;
  }
  return output === undefined ? '' : JSON.stringify(output);
}

export class ToolConversationManager {
  private readonly logger: ILogger;
  private readonly provider: ProviderTag;
  private readonly counter: ITokenCounter;
  private readonly clock: () => Date;

  constructor(options: ToolConversationManagerOptions = {}) {
    this.logger = options.logger ?? noopLogger;
    this.provider = options.provider ?? 'generic';
    this.counter = options.counter ?? defaultTokenCounter;
    this.clock = options.clock ?? (() => new Date());
  }

  async run(options: ToolConversationOptions): Promise<ToolConversationResult> {
    const { llm, toolRegistry, maxIterations } = options;
    if (!Number.isInteger(maxIterations) || maxIterations < 1) {
      throw new InvalidRequestError(`maxIterations must be a positive integer, got ${maxIterations}`);
    }

    const offered = toolRegistry.getLLMTools(options.tools);
    const allowed = new Set(offered.map((tool) => tool.name));

    let thread = this.append(options.thread, { role: 'user', content: options.prompt }, 'in-progress');

    for (let iteration = 1; iteration <= maxIterations; iteration++) {
      const response = await llm.executeWithTools(renderHistory(thread.messages), offered);
      thread = this.append(
        thread,
        { role: 'assistant', content: response.content ?? '' },
        thread.state,
        { finishReason: response.finishReason }
      );

      if (response.toolCalls.length === 0) {
        if (response.finishReason !== 'stop') {
          this.logger.warn('Tool conversation ended without a normal stop', {
            threadId: thread.id,
            finishReason: response.finishReason,
          });
        }
        this.logger.debug('Tool conversation completed', {
          threadId: thread.id,
          iterations: iteration,
        });
        return {
          thread: setThreadState(thread, 'completed', this.clock()),
          response,
          iterations: iteration,
        };
      }

      thread = setThreadState(thread, 'waiting-for-tool', this.clock());
      for (const call of response.toolCalls) {
        thread = await this.runTool(thread, call, toolRegistry, allowed);
      }
      thread = setThreadState(thread, 'in-progress', this.clock());
    }

    this.logger.warn('Tool conversation hit iteration limit', {
      threadId: thread.id,
      maxIterations,
    });
    throw new MaxIterationsExceededError(
      maxIterations,
      setThreadState(thread, 'failed', this.clock())
    );
  }

  private async runTool(
    thread: ConversationThread,
    call: ToolCall,
    toolRegistry: ToolRegistry,
    allowed: ReadonlySet<string>
  ): Promise<ConversationThread> {
    const fail = (message: string): ToolError =>
      new ToolError(message, call.name, setThreadState(thread, 'failed', this.clock()));

    if (!allowed.has(call.name)) {
      this.logger.error('Model requested an unavailable tool', { tool: call.name });
      throw fail(`Unknown tool: ${call.name}`);
    }

    this.logger.debug('Executing tool', { tool: call.name, toolCallId: call.id });
    const result = await toolRegistry.execute(call.name, call.arguments, {
      threadId: thread.id,
      toolCallId: call.id,
    });

    if (!result.success) {
      this.logger.error('Tool execution failed', { tool: call.name, error: result.error });
      throw fail(`Tool ${call.name} failed: ${result.error ?? 'unknown error'}`);
    }

    return this.append(thread, {
      role: 'tool',
      content: renderToolOutput(result.output),
      toolCallId: call.id,
      toolName: call.name,
    });
  }

  private append(
    thread: ConversationThread,
    message: Message,
    state: ConversationThread['state'] = thread.state,
    metadata: Record<string, string> = {}
  ): ConversationThread {
    const stored = createConversationMessage(message, {
      timestamp: this.clock(),
      provider: this.provider,
      counter: this.counter,
      metadata,
    });
    return appendToThread(thread, stored, state);
  }
}
