import { LoomError } from '../shared/utils/errors.js';

export class ToolRegistrationError extends LoomError {
  readonly kind = 'ToolRegistration' as const;

  constructor(public readonly toolName: string) {
    super(`Tool '${toolName}' is already registered`);
    this.name = 'ToolRegistrationError';
  }
}
