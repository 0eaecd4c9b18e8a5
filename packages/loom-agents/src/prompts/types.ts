/**
 * Prompt template types
 */

import { z } from 'zod';

export interface PromptTemplate {
  readonly name: string;
  readonly version: number;
  /** Body with {{variable}} placeholders */
  readonly template: string;
  readonly description?: string;
  readonly tags: readonly string[];
  readonly createdAt: Date;
  readonly active: boolean;
}

export interface PromptTemplateRef {
  readonly name: string;
  readonly version?: number;
}

export type PromptVariables = Readonly<Record<string, string>>;

export const PromptTemplateInputSchema = z.object({
  name: z.string().refine((name) => name.trim().length > 0, 'Template name must be non-empty'),
  version: z.number().int('Template version must be an integer'),
  template: z.string(),
  description: z.string().optional(),
  tags: z.array(z.string()).default([]),
  createdAt: z.date().optional(),
  active: z.boolean().default(true),
});

export type PromptTemplateInput = z.input<typeof PromptTemplateInputSchema>;
