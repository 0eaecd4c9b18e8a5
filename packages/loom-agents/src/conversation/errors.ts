import { LoomError } from '../shared/utils/errors.js';

export class ThreadImportError extends LoomError {
  readonly kind = 'ThreadImport' as const;

  constructor(message: string) {
    super(message);
    this.name = 'ThreadImportError';
  }
}
