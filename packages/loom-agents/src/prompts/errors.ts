import { LoomError } from '../shared/utils/errors.js';

export abstract class PromptError extends LoomError {
  abstract override readonly kind:
    | 'PromptValidation'
    | 'DuplicatePrompt'
    | 'PromptNotFound'
    | 'EmptyVariantList';
}

export class PromptValidationError extends PromptError {
  readonly kind = 'PromptValidation' as const;

  constructor(message: string) {
    super(message);
    this.name = 'PromptValidationError';
  }
}

export class DuplicatePromptError extends PromptError {
  readonly kind = 'DuplicatePrompt' as const;

  constructor(
    public readonly promptName: string,
    public readonly version: number
  ) {
    super(`Template ${promptName} version ${version} already exists`);
    this.name = 'DuplicatePromptError';
  }
}

export class PromptNotFoundError extends PromptError {
  readonly kind = 'PromptNotFound' as const;

  constructor(
    public readonly promptName: string,
    public readonly version?: number
  ) {
    super(
      version === undefined
        ? `Template not found: ${promptName}`
        : `Template not found: ${promptName}@${version}`
    );
    this.name = 'PromptNotFoundError';
  }
}

export class EmptyVariantListError extends PromptError {
  readonly kind = 'EmptyVariantList' as const;

  constructor(public readonly experiment: string) {
    super(`Variant list cannot be empty for experiment ${experiment}`);
    this.name = 'EmptyVariantListError';
  }
}
