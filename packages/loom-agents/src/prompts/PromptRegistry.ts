/**
 * PromptRegistry - versioned prompt templates
 *
 * Each name maps to its versions in ascending order. Resolution without an
 * explicit version picks the highest active version, then the highest overall.
 */

import { AtomicRef } from '../shared/utils/AtomicRef.js';
import {
  PromptTemplateInputSchema,
  type PromptTemplate,
  type PromptTemplateInput,
  type PromptTemplateRef,
  type PromptVariables,
} from './types.js';
import {
  DuplicatePromptError,
  EmptyVariantListError,
  PromptNotFoundError,
  PromptValidationError,
} from './errors.js';

export interface IPromptRegistry {
  register(template: PromptTemplateInput): Promise<PromptTemplate>;
  resolve(ref: PromptTemplateRef): Promise<PromptTemplate>;
  render(ref: PromptTemplateRef, variables: PromptVariables): Promise<string>;
  compose(refs: readonly PromptTemplateRef[], variables: PromptVariables): Promise<string>;
  rollback(name: string, toVersion: number): Promise<void>;
  chooseVariant(experiment: string, variantNames: readonly string[], key: string): PromptTemplateRef;
  list(name?: string): Promise<PromptTemplate[]>;
}

type VersionTable = ReadonlyMap<string, readonly PromptTemplate[]>;

/**
 * Literal {{key}} substitution; placeholders without a value stay as they are
 */
export function renderTemplate(template: string, variables: PromptVariables): string {
  return Object.entries(variables).reduce(
    (text, [key, value]) => text.split(`{{${key}}}`).join(value),
    template
  );
}

/**
 * 31-multiplier hash over UTF-16 code units, wrapped to 32 bits
 */
export function stringHash(value: string): number {
  let hash = 0;
  for (let i = 0; i < value.length; i++) {
    hash = (Math.imul(31, hash) + value.charCodeAt(i)) | 0;
  }
  return hash;
}

export class InMemoryPromptRegistry implements IPromptRegistry {
  private readonly state = new AtomicRef<VersionTable>(new Map());

  async register(input: PromptTemplateInput): Promise<PromptTemplate> {
    const parsed = PromptTemplateInputSchema.safeParse(input);
    if (!parsed.success) {
      throw new PromptValidationError(
        parsed.error.errors.map((issue) => issue.message).join('; ')
      );
    }

    const { description, createdAt, ...fields } = parsed.data;
    const template: PromptTemplate = {
      ...fields,
      ...(description !== undefined ? { description } : {}),
      createdAt: createdAt ?? new Date(),
    };

    this.state.update((current) => {
      const versions = current.get(template.name) ?? [];
      if (versions.some((existing) => existing.version === template.version)) {
        throw new DuplicatePromptError(template.name, template.version);
      }
      const next = [...versions, template].sort((a, b) => a.version - b.version);
      return new Map(current).set(template.name, next);
    });

    return template;
  }

  async resolve(ref: PromptTemplateRef): Promise<PromptTemplate> {
    const versions = this.state.get().get(ref.name) ?? [];

    const resolved =
      ref.version !== undefined
        ? versions.find((template) => template.version === ref.version)
        : (versions.filter((template) => template.active).at(-1) ?? versions.at(-1));

    if (!resolved) {
      throw new PromptNotFoundError(ref.name, ref.version);
    }
    return resolved;
  }

  async render(ref: PromptTemplateRef, variables: PromptVariables): Promise<string> {
    const template = await this.resolve(ref);
    return renderTemplate(template.template, variables);
  }

  async compose(refs: readonly PromptTemplateRef[], variables: PromptVariables): Promise<string> {
    const parts: string[] = [];
    for (const ref of refs) {
      parts.push(await this.render(ref, variables));
    }
    return parts.join('\n\n');
  }

  /**
   * Make the target version the only active one
   */
  async rollback(name: string, toVersion: number): Promise<void> {
    this.state.update((current) => {
      const versions = current.get(name);
      if (!versions) {
        throw new PromptNotFoundError(name);
      }
      if (!versions.some((template) => template.version === toVersion)) {
        throw new PromptNotFoundError(name, toVersion);
      }
      const next = versions.map((template) => ({
        ...template,
        active: template.version === toVersion,
      }));
      return new Map(current).set(name, next);
    });
  }

  /**
   * Deterministic bucketing: the same (experiment, key) always lands on the same variant
   */
  chooseVariant(
    experiment: string,
    variantNames: readonly string[],
    key: string
  ): PromptTemplateRef {
    if (variantNames.length === 0) {
      throw new EmptyVariantListError(experiment);
    }
    const index = Math.abs(stringHash(`${experiment}:${key}`)) % variantNames.length;
    const name = variantNames[index];
    if (name === undefined) {
      throw new EmptyVariantListError(experiment);
    }
    return { name };
  }

  async list(name?: string): Promise<PromptTemplate[]> {
    const table = this.state.get();
    if (name !== undefined) {
      return [...(table.get(name) ?? [])];
    }
    return Array.from(table.values())
      .flat()
      .sort((a, b) => (a.name === b.name ? a.version - b.version : a.name < b.name ? -1 : 1));
  }
}
