/**
 * Memory failures
 *
 * NotFound is recoverable by the persistent variant (fall through to the
 * store); InvalidInput is a caller mistake and is never retried.
 */

import { LoomError } from '../shared/utils/errors.js';

export abstract class MemoryError extends LoomError {
  abstract override readonly kind: 'NotFound' | 'PersistenceFailed' | 'InvalidInput';
}

export class ThreadNotFoundError extends MemoryError {
  readonly kind = 'NotFound' as const;

  constructor(public readonly threadId: string) {
    super(`Thread not found: ${threadId}`);
    this.name = 'ThreadNotFoundError';
  }
}

export class PersistenceFailedError extends MemoryError {
  readonly kind = 'PersistenceFailed' as const;

  constructor(message: string) {
    super(message);
    this.name = 'PersistenceFailedError';
  }
}

export class InvalidMemoryInputError extends MemoryError {
  readonly kind = 'InvalidInput' as const;

  constructor(message: string) {
    super(message);
    this.name = 'InvalidMemoryInputError';
  }
}
