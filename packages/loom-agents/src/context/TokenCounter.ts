/**
 * Provider-aware token estimates
 *
 * Character-ratio heuristics only; no tokenizer is loaded.
 */

import type { Message, ProviderTag } from '../types/index.js';

export interface ITokenCounter {
  countText(provider: ProviderTag, text: string): number;
  countMessage(provider: ProviderTag, message: Pick<Message, 'role' | 'content'>): number;
}

/**
 * Average characters per token observed for each provider family
 */
export const CHARS_PER_TOKEN: Readonly<Record<ProviderTag, number>> = {
  openai: 4,
  anthropic: 3.5,
  gemini: 4,
  deepseek: 3.8,
  ollama: 3.6,
  lmstudio: 3.6,
  generic: 4,
};

// Role marker and separators added by chat formats
export const MESSAGE_OVERHEAD_TOKENS = 4;

export class DefaultTokenCounter implements ITokenCounter {
  constructor(private readonly ratios: Readonly<Record<ProviderTag, number>> = CHARS_PER_TOKEN) {}

  countText(provider: ProviderTag, text: string): number {
    if (text.length === 0) {
      return 0;
    }
    return Math.ceil(text.length / this.ratios[provider]);
  }

  countMessage(provider: ProviderTag, message: Pick<Message, 'role' | 'content'>): number {
    return this.countText(provider, message.content) + MESSAGE_OVERHEAD_TOKENS;
  }
}

export const defaultTokenCounter: ITokenCounter = new DefaultTokenCounter();
