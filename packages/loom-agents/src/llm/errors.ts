/**
 * Model service and tool loop failures
 */

import { LoomError } from '../shared/utils/errors.js';
import type { ConversationThread } from '../conversation/types.js';

export type LLMErrorKind =
  | 'Provider'
  | 'Authentication'
  | 'InvalidRequest'
  | 'Timeout'
  | 'Parse'
  | 'RateLimit'
  | 'Config'
  | 'Tool'
  | 'MaxIterationsExceeded';

export abstract class LLMError extends LoomError {
  abstract override readonly kind: LLMErrorKind;
}

export class ProviderError extends LLMError {
  readonly kind = 'Provider' as const;

  constructor(
    message: string,
    public readonly provider?: string
  ) {
    super(message);
    this.name = 'ProviderError';
  }
}

export class AuthenticationError extends LLMError {
  readonly kind = 'Authentication' as const;

  constructor(message: string) {
    super(message);
    this.name = 'AuthenticationError';
  }
}

export class InvalidRequestError extends LLMError {
  readonly kind = 'InvalidRequest' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}

export class TimeoutError extends LLMError {
  readonly kind = 'Timeout' as const;

  constructor(
    message: string,
    public readonly timeoutMs?: number
  ) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export class ParseError extends LLMError {
  readonly kind = 'Parse' as const;

  constructor(
    message: string,
    public readonly raw?: string
  ) {
    super(message);
    this.name = 'ParseError';
  }
}

export class RateLimitError extends LLMError {
  readonly kind = 'RateLimit' as const;

  constructor(
    message: string,
    public readonly retryAfter?: number
  ) {
    super(message);
    this.name = 'RateLimitError';
  }
}

export class ConfigError extends LLMError {
  readonly kind = 'Config' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

/**
 * A tool failed or was unknown; `thread` is the conversation as it stood, marked failed
 */
export class ToolError extends LLMError {
  readonly kind = 'Tool' as const;

  constructor(
    message: string,
    public readonly toolName?: string,
    public readonly thread?: ConversationThread
  ) {
    super(message);
    this.name = 'ToolError';
  }
}

export class MaxIterationsExceededError extends LLMError {
  readonly kind = 'MaxIterationsExceeded' as const;

  constructor(
    public readonly maxIterations: number,
    public readonly thread: ConversationThread
  ) {
    super(`Tool conversation exceeded ${maxIterations} iterations`);
    this.name = 'MaxIterationsExceededError';
  }
}
