/**
 * Tests for AgentCoordinator
 */

import { describe, it, expect } from 'vitest';
import { AgentCoordinator } from '../../../src/agents/AgentCoordinator.js';
import { AgentContext } from '../../../src/agents/AgentContext.js';
import { createAgentResult } from '../../../src/agents/types.js';
import {
  AgentExecutionError,
  AgentNotFoundError,
  AgentValidationError,
  HandoffDepthExceededError,
} from '../../../src/agents/errors.js';
import { createMessage } from '../../../src/types/index.js';
import { StubAgent, handingOff } from '../../mocks/StubAgent.js';

describe('AgentCoordinator', () => {
  const coordinator = new AgentCoordinator();
  const context = AgentContext.empty('thread-1');

  describe('executeWithHandoff', () => {
    it('should return the result of an agent that does not hand off', async () => {
      const solo = new StubAgent({ name: 'solo' });

      const result = await coordinator.executeWithHandoff('task', solo, context, [solo]);

      expect(result.agent).toBe('solo');
      expect(result.content).toBe('solo handled');
    });

    it('should follow a handoff chain within the depth limit', async () => {
      const a = handingOff('a', 'b');
      const b = handingOff('b', 'c');
      const c = handingOff('c', 'd');
      const d = new StubAgent({ name: 'd' });

      const result = await coordinator.executeWithHandoff('task', a, context, [a, b, c, d], 4);

      expect(result.agent).toBe('d');
      expect([a, b, c, d].map((agent) => agent.calls.length)).toEqual([1, 1, 1, 1]);
    });

    it('should fail when the chain is deeper than the limit', async () => {
      const a = handingOff('a', 'b');
      const b = handingOff('b', 'c');
      const c = handingOff('c', 'd');
      const d = new StubAgent({ name: 'd' });

      const error = await coordinator
        .executeWithHandoff('task', a, context, [a, b, c, d], 2)
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(HandoffDepthExceededError);
      expect(error).toBeInstanceOf(AgentValidationError);
      expect(c.calls).toHaveLength(0);
    });

    it('should reject a non-positive depth before invoking anything', async () => {
      const a = new StubAgent({ name: 'a' });

      await expect(coordinator.executeWithHandoff('task', a, context, [a], 0)).rejects.toBeInstanceOf(
        AgentValidationError
      );
      expect(a.calls).toHaveLength(0);
    });

    it('should fail when the handoff target is unknown', async () => {
      const a = handingOff('a', 'ghost');

      await expect(coordinator.executeWithHandoff('task', a, context, [a])).rejects.toBeInstanceOf(
        AgentNotFoundError
      );
    });

    it('should pass the handoff, state patch and a forked context to the target', async () => {
      const a = new StubAgent({ name: 'a' }, () =>
        createAgentResult('a', 'partial', {
          handoff: { targetAgent: 'b', reason: 'needs review', payload: { file: 'main.ts' } },
          statePatch: { reviewed: false },
        })
      );
      const b = new StubAgent({ name: 'b' });

      await coordinator.executeWithHandoff('task', a, context, [a, b]);

      const call = b.calls[0];
      expect(call?.input).toBe(
        'task\n\nHandoff from a to b\nReason: needs review\nPayload: {"file":"main.ts"}\n\nContinue based on this handoff context.\n'
      );
      expect(call?.context.threadId).toBe('thread-1/handoff-1');
      expect(call?.context.parentThreadId).toBe('thread-1');
      expect(call?.context.getState('reviewed')).toBe(false);
    });

    it('should trim the context before each call', async () => {
      const a = new StubAgent({ name: 'a' });
      const crowded = new AgentContext({
        threadId: 'thread-1',
        history: [createMessage('user', 'one'), createMessage('user', 'two')],
        constraints: { maxContextMessages: 1 },
      });

      await coordinator.executeWithHandoff('task', a, crowded, [a]);

      expect(a.calls[0]?.context.history.map((m) => m.content)).toEqual(['two']);
    });

    it('should wrap unexpected agent failures', async () => {
      const broken = new StubAgent({ name: 'broken' }, () => {
        throw new Error('model offline');
      });

      const error = await coordinator
        .executeWithHandoff('task', broken, context, [broken])
        .catch((e: unknown) => e);

      expect(error).toBeInstanceOf(AgentExecutionError);
      if (error instanceof AgentExecutionError) {
        expect(error.agent).toBe('broken');
        expect(error.message).toBe('model offline');
      }
    });
  });

  describe('executeParallel', () => {
    it('should aggregate every result by default', async () => {
      const a = new StubAgent({ name: 'a' }, () =>
        createAgentResult('a', 'alpha', { metadata: { source: 'a', shared: 'a' } })
      );
      const b = new StubAgent({ name: 'b' }, () =>
        createAgentResult('b', 'beta', { metadata: { shared: 'b' } })
      );

      const result = await coordinator.executeParallel('task', context, [a, b]);

      expect(result.agent).toBe('parallel-coordinator');
      expect(result.content).toBe('[a] alpha\n[b] beta');
      expect(result.metadata).toEqual({ source: 'a', shared: 'b', agents_executed: '2' });
    });

    it('should fail when any agent fails', async () => {
      const ok = new StubAgent({ name: 'ok' });
      const broken = new StubAgent({ name: 'broken' }, () => {
        throw new Error('nope');
      });

      await expect(coordinator.executeParallel('task', context, [ok, broken])).rejects.toBeInstanceOf(
        AgentExecutionError
      );
    });

    it('should use a custom aggregation', async () => {
      const a = new StubAgent({ name: 'a' });
      const b = new StubAgent({ name: 'b' });

      const result = await coordinator.executeParallel('task', context, [a, b], (results) =>
        createAgentResult('joined', results.map((r) => r.agent).join('+'))
      );

      expect(result.content).toBe('a+b');
    });

    it('should return an empty aggregate for no agents', async () => {
      const result = await coordinator.executeParallel('task', context, []);

      expect(result.content).toBe('');
      expect(result.metadata).toEqual({ agents_executed: '0' });
    });
  });
});
