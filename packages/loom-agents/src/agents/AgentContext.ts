/**
 * AgentContext - the per-call view an agent works from
 *
 * Immutable: every change returns a new context.
 */

import type { JsonValue, Message, ProviderTag } from '../types/index.js';
import type { ITool } from '../tools/interfaces/ITool.js';
import type { ConversationMessage } from '../conversation/types.js';
import { createConversationMessage } from '../conversation/ConversationThread.js';
import { applyWindow, type ContextTrimmingStrategy } from '../context/ContextWindow.js';
import { defaultTokenCounter, type ITokenCounter } from '../context/TokenCounter.js';

export interface AgentConstraints {
  readonly maxContextMessages: number;
  readonly maxEstimatedTokens: number;
  readonly allowedTools: ReadonlySet<string>;
  readonly enforceAllowedTools: boolean;
}

export const DEFAULT_AGENT_CONSTRAINTS: AgentConstraints = {
  maxContextMessages: 40,
  maxEstimatedTokens: 12_000,
  allowedTools: new Set(),
  enforceAllowedTools: false,
};

/**
 * keep-latest drops from the head; keep-system-and-latest holds on to system messages
 */
export type ContextTrimStrategy = 'keep-latest' | 'keep-system-and-latest';

const WINDOW_STRATEGY: Record<ContextTrimStrategy, ContextTrimmingStrategy> = {
  'keep-latest': { type: 'drop-oldest-fifo' },
  'keep-system-and-latest': { type: 'sliding-window' },
};

export interface AgentContextInit {
  threadId: string;
  parentThreadId?: string;
  history?: readonly Message[];
  availableTools?: readonly ITool[];
  constraints?: Partial<AgentConstraints>;
  state?: Readonly<Record<string, JsonValue>>;
  provider?: ProviderTag;
  counter?: ITokenCounter;
}

export class AgentContext {
  readonly threadId: string;
  readonly parentThreadId?: string;
  readonly history: readonly Message[];
  readonly availableTools: readonly ITool[];
  readonly constraints: AgentConstraints;
  readonly state: Readonly<Record<string, JsonValue>>;
  readonly provider: ProviderTag;
  private readonly counter: ITokenCounter;

  constructor(init: AgentContextInit) {
    this.threadId = init.threadId;
    if (init.parentThreadId !== undefined) {
      this.parentThreadId = init.parentThreadId;
    }
    this.history = init.history ?? [];
    this.availableTools = init.availableTools ?? [];
    this.constraints = { ...DEFAULT_AGENT_CONSTRAINTS, ...init.constraints };
    this.state = init.state ?? {};
    this.provider = init.provider ?? 'generic';
    this.counter = init.counter ?? defaultTokenCounter;
  }

  static empty(threadId: string): AgentContext {
    return new AgentContext({ threadId });
  }

  addMessage(message: Message): AgentContext {
    return this.with({ history: [...this.history, message] });
  }

  addMessages(messages: Iterable<Message>): AgentContext {
    return this.with({ history: [...this.history, ...messages] });
  }

  putState(key: string, value: JsonValue): AgentContext {
    return this.with({ state: { ...this.state, [key]: value } });
  }

  getState(key: string): JsonValue | undefined {
    return Object.prototype.hasOwnProperty.call(this.state, key) ? this.state[key] : undefined;
  }

  applyStatePatch(patch: Readonly<Record<string, JsonValue>>): AgentContext {
    return Object.keys(patch).length === 0 ? this : this.with({ state: { ...this.state, ...patch } });
  }

  estimatedTokens(): number {
    return this.history.reduce(
      (total, message) => total + this.counter.countMessage(this.provider, message),
      0
    );
  }

  /**
   * Bound history to maxContextMessages, then to maxEstimatedTokens
   */
  trim(strategy: ContextTrimStrategy = 'keep-system-and-latest'): AgentContext {
    const wrapped = this.history.map((message, index) =>
      createConversationMessage(message, {
        id: `ctx-${index}`,
        timestamp: new Date(0),
        provider: this.provider,
        counter: this.counter,
      })
    );
    const originals = new Map<ConversationMessage, Message>(
      wrapped.map((message, index) => [message, this.history[index] ?? message])
    );

    const window = applyWindow(
      wrapped,
      this.provider,
      {
        maxTokens: this.constraints.maxEstimatedTokens,
        maxMessages: this.constraints.maxContextMessages,
      },
      WINDOW_STRATEGY[strategy],
      this.counter
    );

    if (!window.trimmed) {
      return this;
    }
    return this.with({
      history: window.messages.map((message) => originals.get(message) ?? message),
    });
  }

  /**
   * A new conversational branch; this context becomes its parent
   */
  fork(newThreadId: string): AgentContext {
    return this.with({ threadId: newThreadId, parentThreadId: this.threadId });
  }

  /**
   * Tools the agent may use: all of them unless the allowlist is enforced
   */
  filteredTools(): ITool[] {
    const { allowedTools, enforceAllowedTools } = this.constraints;
    if (!enforceAllowedTools || allowedTools.size === 0) {
      return [...this.availableTools];
    }
    return this.availableTools.filter((tool) => allowedTools.has(tool.definition.name));
  }

  private with(changes: Partial<AgentContextInit>): AgentContext {
    return new AgentContext({
      threadId: this.threadId,
      ...(this.parentThreadId !== undefined ? { parentThreadId: this.parentThreadId } : {}),
      history: this.history,
      availableTools: this.availableTools,
      constraints: this.constraints,
      state: this.state,
      provider: this.provider,
      counter: this.counter,
      ...changes,
    });
  }
}
