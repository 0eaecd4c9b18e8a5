/**
 * Context window management
 *
 * Trims a message sequence to a message-count and token budget. The count cap
 * runs first, then the token cap. Output always keeps chronological order.
 */

import type { ProviderTag } from '../types/index.js';
import type { ConversationMessage } from '../conversation/types.js';
import { createConversationMessage } from '../conversation/ConversationThread.js';
import { defaultTokenCounter, type ITokenCounter } from './TokenCounter.js';

export type ContextTrimmingStrategy =
  | { type: 'drop-oldest-fifo' }
  | { type: 'sliding-window' }
  | { type: 'priority-based' }
  | { type: 'summarize-old-messages'; summaryTargetTokens: number };

export interface ContextLimits {
  maxTokens: number;
  maxMessages?: number;
}

export interface ContextWindow {
  messages: ConversationMessage[];
  totalTokens: number;
  trimmed: boolean;
}

type CostFn = (message: ConversationMessage) => number;

export function applyWindow(
  messages: readonly ConversationMessage[],
  provider: ProviderTag,
  limits: ContextLimits,
  strategy: ContextTrimmingStrategy,
  counter: ITokenCounter = defaultTokenCounter
): ContextWindow {
  const tokenCost: CostFn = (message) =>
    message.tokens > 0 ? message.tokens : counter.countMessage(provider, message);

  const byCount =
    limits.maxMessages === undefined
      ? [...messages]
      : capByCount(messages, Math.max(1, Math.floor(limits.maxMessages)), strategy);

  const budget = Math.max(1, Math.floor(limits.maxTokens));
  const windowed =
    strategy.type === 'summarize-old-messages'
      ? summarizeOld(byCount, budget, strategy.summaryTargetTokens, tokenCost, provider, counter)
      : selectByStrategy(byCount, budget, strategy, tokenCost);

  return {
    messages: windowed,
    totalTokens: sumCost(windowed, tokenCost),
    trimmed: !sameSequence(messages, windowed),
  };
}

function capByCount(
  messages: readonly ConversationMessage[],
  maxMessages: number,
  strategy: ContextTrimmingStrategy
): ConversationMessage[] {
  if (messages.length <= maxMessages) {
    return [...messages];
  }
  const unit: CostFn = () => 1;
  if (strategy.type === 'sliding-window' || strategy.type === 'priority-based') {
    return selectByStrategy(messages, maxMessages, strategy, unit);
  }
  return messages.slice(-maxMessages);
}

function selectByStrategy(
  messages: readonly ConversationMessage[],
  budget: number,
  strategy: ContextTrimmingStrategy,
  cost: CostFn
): ConversationMessage[] {
  if (sumCost(messages, cost) <= budget) {
    return [...messages];
  }

  switch (strategy.type) {
    case 'sliding-window':
      return keepPreferred(messages, budget, cost, (m) => m.role === 'system');
    case 'priority-based':
      return keepPreferred(messages, budget, cost, (m) => m.important);
    default:
      return withFallback(messages, consumeReverse(messages, budget, cost));
  }
}

/**
 * Newest-first greedy fill: every message that still fits is kept
 */
function consumeReverse(
  messages: readonly ConversationMessage[],
  budget: number,
  cost: CostFn
): ConversationMessage[] {
  const kept: ConversationMessage[] = [];
  let used = 0;
  for (const message of [...messages].reverse()) {
    const messageCost = cost(message);
    if (used + messageCost <= budget) {
      kept.unshift(message);
      used += messageCost;
    }
  }
  return kept;
}

/**
 * Preferred messages are kept first; the rest of the budget goes to the
 * newest remaining messages
 */
function keepPreferred(
  messages: readonly ConversationMessage[],
  budget: number,
  cost: CostFn,
  isPreferred: (message: ConversationMessage) => boolean
): ConversationMessage[] {
  const preferred = messages.filter(isPreferred);
  const preferredCost = sumCost(preferred, cost);

  if (preferredCost > budget) {
    // Keep the newest preferred messages that fit; with none fitting, fill from everything
    const keptPreferred = consumeReverse(preferred, budget, cost);
    return withFallback(
      messages,
      keptPreferred.length > 0 ? keptPreferred : consumeReverse(messages, budget, cost)
    );
  }

  const others = messages.filter((message) => !isPreferred(message));
  const keptOthers = new Set(consumeReverse(others, budget - preferredCost, cost));
  return withFallback(
    messages,
    messages.filter((message) => isPreferred(message) || keptOthers.has(message))
  );
}

function summarizeOld(
  messages: readonly ConversationMessage[],
  budget: number,
  summaryTargetTokens: number,
  cost: CostFn,
  provider: ProviderTag,
  counter: ITokenCounter
): ConversationMessage[] {
  if (messages.length === 0 || sumCost(messages, cost) <= budget) {
    return [...messages];
  }

  const summaryBudget = Math.min(Math.max(1, Math.floor(summaryTargetTokens)), budget);
  const recentBudget = budget - summaryBudget;

  // Newest contiguous run that fits beside the summary
  let used = 0;
  let start = messages.length;
  for (const message of [...messages].reverse()) {
    const messageCost = cost(message);
    if (used + messageCost > recentBudget) {
      break;
    }
    used += messageCost;
    start--;
  }

  const older = messages.slice(0, start);
  const recent = messages.slice(start);
  return [buildSummary(older, summaryBudget, provider, counter), ...recent];
}

function buildSummary(
  older: readonly ConversationMessage[],
  targetTokens: number,
  provider: ProviderTag,
  counter: ITokenCounter
): ConversationMessage {
  const header = `Summary of ${older.length} earlier message${older.length === 1 ? '' : 's'}:`;
  const body = older.map((message) => `${message.role}: ${message.content}`).join('\n');

  let content = `${header}\n${body}`;
  while (content.length > 0 && counter.countText(provider, content) > targetTokens) {
    content = content.slice(0, Math.floor(content.length * 0.8));
  }

  const first = older[0];
  const last = older[older.length - 1];
  return createConversationMessage(
    { role: 'system', content },
    {
      id: `summary-${first?.id ?? 'none'}-${last?.id ?? 'none'}`,
      timestamp: last?.timestamp ?? new Date(),
      tokens: Math.max(1, Math.min(targetTokens, counter.countText(provider, content))),
      metadata: { summary: 'true', summarizedCount: String(older.length) },
      important: true,
    }
  );
}

/**
 * When no single message fits, the newest message is kept alone
 */
function withFallback(
  messages: readonly ConversationMessage[],
  kept: ConversationMessage[]
): ConversationMessage[] {
  const newest = messages[messages.length - 1];
  return kept.length > 0 || newest === undefined ? kept : [newest];
}

function sumCost(messages: readonly ConversationMessage[], cost: CostFn): number {
  return messages.reduce((sum, message) => sum + cost(message), 0);
}

function sameSequence(
  a: readonly ConversationMessage[],
  b: readonly ConversationMessage[]
): boolean {
  return a.length === b.length && a.every((message, index) => message === b[index]);
}
