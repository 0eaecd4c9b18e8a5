/**
 * Base error class
 *
 * Every failure raised by the runtime extends LoomError and carries a
 * string-literal `kind` so callers can switch on it without instanceof chains.
 */

export abstract class LoomError extends Error {
  abstract readonly kind: string;

  constructor(message: string) {
    super(message);
    this.name = 'LoomError';
  }
}

export class ConfigurationError extends LoomError {
  readonly kind = 'Configuration' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * Extract a readable message from an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
