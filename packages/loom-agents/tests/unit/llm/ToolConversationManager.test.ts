/**
 * Tests for ToolConversationManager
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  ToolConversationManager,
  renderHistory,
} from '../../../src/llm/ToolConversationManager.js';
import {
  InvalidRequestError,
  MaxIterationsExceededError,
  ToolError,
} from '../../../src/llm/errors.js';
import { ToolRegistry } from '../../../src/tools/ToolRegistry.js';
import { createThread } from '../../../src/conversation/ConversationThread.js';
import type { ToolCallResponse } from '../../../src/types/index.js';
import { MockLLMService } from '../../mocks/MockLLMService.js';
import { EchoTool, FailingTool } from '../../mocks/EchoTool.js';
import { RecordingLogger } from '../../mocks/RecordingLogger.js';

const needsTool = (name = 'echo', args: Record<string, unknown> = { value: 'ok' }): ToolCallResponse => ({
  content: 'need tool',
  toolCalls: [{ id: 't1', name, arguments: args }],
  finishReason: 'tool_calls',
});

const finalAnswer: ToolCallResponse = { content: 'final', toolCalls: [], finishReason: 'stop' };

describe('ToolConversationManager', () => {
  let llm: MockLLMService;
  let registry: ToolRegistry;
  let manager: ToolConversationManager;

  beforeEach(() => {
    llm = new MockLLMService();
    registry = new ToolRegistry();
    registry.register(new EchoTool());
    manager = new ToolConversationManager({ clock: () => new Date(1000) });
  });

  it('should run requested tools and finish on a plain answer', async () => {
    llm.queueToolResponses(needsTool(), finalAnswer);

    const result = await manager.run({
      prompt: 'do stuff',
      thread: createThread('thread-1', new Date(0)),
      llm,
      toolRegistry: registry,
      maxIterations: 4,
    });

    expect(result.response.content).toBe('final');
    expect(result.iterations).toBe(2);
    expect(result.thread.state).toBe('completed');
    expect(result.thread.messages.map((m) => m.role)).toEqual([
      'user',
      'assistant',
      'tool',
      'assistant',
    ]);
    expect(result.thread.messages[2]).toMatchObject({
      content: 'ok',
      toolCallId: 't1',
      toolName: 'echo',
    });
  });

  it('should complete on a truncated answer and log the finish reason', async () => {
    const logger = new RecordingLogger();
    const logged = new ToolConversationManager({ logger, clock: () => new Date(1000) });
    llm.queueToolResponses({ content: 'partial', toolCalls: [], finishReason: 'length' });

    const result = await logged.run({
      prompt: 'do stuff',
      thread: createThread('thread-1', new Date(0)),
      llm,
      toolRegistry: registry,
      maxIterations: 4,
    });

    expect(result.thread.state).toBe('completed');
    expect(logger.at('warn')).toEqual([
      {
        level: 'warn',
        message: 'Tool conversation ended without a normal stop',
        meta: { threadId: 'thread-1', finishReason: 'length' },
      },
    ]);
  });

  it('should not warn on a normal stop', async () => {
    const logger = new RecordingLogger();
    const logged = new ToolConversationManager({ logger, clock: () => new Date(1000) });
    llm.queueToolResponses(finalAnswer);

    await logged.run({
      prompt: 'do stuff',
      thread: createThread('thread-1', new Date(0)),
      llm,
      toolRegistry: registry,
      maxIterations: 4,
    });

    expect(logger.at('warn')).toEqual([]);
  });

  it('should send the rendered history on each iteration', async () => {
    llm.queueToolResponses(needsTool(), finalAnswer);

    await manager.run({
      prompt: 'do stuff',
      thread: createThread('thread-1'),
      llm,
      toolRegistry: registry,
      maxIterations: 4,
    });

    expect(llm.toolPrompts.map((call) => call.prompt)).toEqual([
      '[user] do stuff',
      '[user] do stuff\n\n[assistant] need tool\n\n[tool] ok',
    ]);
    expect(llm.toolPrompts[0]?.tools.map((tool) => tool.name)).toEqual(['echo']);
  });

  it('should fail with the failed thread when a tool errors', async () => {
    registry.register(new FailingTool('boom'));
    llm.queueToolResponses(needsTool('explode', {}));

    const error = await manager
      .run({
        prompt: 'do stuff',
        thread: createThread('thread-1'),
        llm,
        toolRegistry: registry,
        maxIterations: 4,
      })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ToolError);
    if (error instanceof ToolError) {
      expect(error.message).toBe('Tool explode failed: boom');
      expect(error.toolName).toBe('explode');
      expect(error.thread?.state).toBe('failed');
      expect(error.thread?.messages).toHaveLength(2);
    }
  });

  it('should reject tools that were not offered', async () => {
    llm.queueToolResponses(needsTool());

    const error = await manager
      .run({
        prompt: 'do stuff',
        thread: createThread('thread-1'),
        llm,
        toolRegistry: registry,
        tools: [],
        maxIterations: 4,
      })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ToolError);
    expect(error instanceof ToolError && error.message).toBe('Unknown tool: echo');
  });

  it('should stop after maxIterations', async () => {
    llm.queueToolResponses(needsTool(), needsTool(), needsTool());

    const error = await manager
      .run({
        prompt: 'loop',
        thread: createThread('thread-1'),
        llm,
        toolRegistry: registry,
        maxIterations: 2,
      })
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MaxIterationsExceededError);
    if (error instanceof MaxIterationsExceededError) {
      expect(error.thread.state).toBe('failed');
      expect(error.thread.messages).toHaveLength(5);
    }
    expect(llm.toolPrompts).toHaveLength(2);
  });

  it('should reject a non-positive iteration limit', async () => {
    await expect(
      manager.run({
        prompt: 'x',
        thread: createThread('thread-1'),
        llm,
        toolRegistry: registry,
        maxIterations: 0,
      })
    ).rejects.toBeInstanceOf(InvalidRequestError);
  });
});

describe('renderHistory', () => {
  it('should render role-tagged blocks', () => {
    expect(
      renderHistory([
        { role: 'system', content: 'rules' },
        { role: 'user', content: 'hi' },
      ])
    ).toBe('[system] rules\n\n[user] hi');
  });
});
