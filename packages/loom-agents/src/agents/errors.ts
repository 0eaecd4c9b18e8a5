/**
 * Agent runtime failures
 */

import { LoomError } from '../shared/utils/errors.js';

export abstract class AgentError extends LoomError {
  abstract override readonly kind: 'Validation' | 'Execution' | 'Routing' | 'NotFound' | 'Conflict';
}

export class AgentValidationError extends AgentError {
  readonly kind = 'Validation' as const;

  constructor(message: string) {
    super(message);
    this.name = 'AgentValidationError';
  }
}

export class HandoffDepthExceededError extends AgentValidationError {
  constructor(
    public readonly maxDepth: number,
    public readonly chain: readonly string[]
  ) {
    super(`Handoff depth exceeded limit: ${maxDepth} (${chain.join(' -> ')})`);
    this.name = 'HandoffDepthExceededError';
  }
}

export class AgentExecutionError extends AgentError {
  readonly kind = 'Execution' as const;

  constructor(
    public readonly agent: string,
    message: string
  ) {
    super(message);
    this.name = 'AgentExecutionError';
  }
}

export class RoutingError extends AgentError {
  readonly kind = 'Routing' as const;

  constructor(public readonly capability: string) {
    super(`No agent available for capability: ${capability}`);
    this.name = 'RoutingError';
  }
}

export class AgentNotFoundError extends AgentError {
  readonly kind = 'NotFound' as const;

  constructor(public readonly agent: string) {
    super(`Agent not found: ${agent}`);
    this.name = 'AgentNotFoundError';
  }
}

export class RoutingConflictError extends AgentError {
  readonly kind = 'Conflict' as const;

  constructor(
    public readonly capability: string,
    public readonly contenders: readonly string[]
  ) {
    super(`Multiple agents claim capability '${capability}': ${contenders.join(', ')}`);
    this.name = 'RoutingConflictError';
  }
}
