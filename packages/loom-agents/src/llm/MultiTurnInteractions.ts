/**
 * Multi-turn helpers built on the model service
 */

import type { ZodType } from 'zod';
import type { ILLMService } from './ILLMService.js';
import { InvalidRequestError, ParseError } from './errors.js';
import { errorMessage } from '../shared/utils/errors.js';

export type ParseOutcome<T> = { success: true; value: T } | { success: false; error: string };

export type ResponseParser<T> = (content: string) => ParseOutcome<T>;

/**
 * Parser that reads the response as JSON and validates it against a schema
 */
export function jsonParser<T>(schema: ZodType<T>): ResponseParser<T> {
  return (content) => {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      return { success: false, error: `Invalid JSON: ${errorMessage(error)}` };
    }
    const parsed = schema.safeParse(raw);
    return parsed.success
      ? { success: true, value: parsed.data }
      : { success: false, error: parsed.error.errors.map((issue) => issue.message).join('; ') };
  };
}

export function clarificationPrompt(initialPrompt: string, content: string, error: string): string {
  return [
    initialPrompt,
    `Your previous response could not be used:\n${content}`,
    `Problem: ${error}`,
    'Please answer again, fixing the problem.',
  ].join('\n\n');
}

/**
 * Ask, and re-ask with the parse problem spelled out, until the answer parses
 * @throws ParseError after maxAttempts unparseable answers
 */
export async function executeWithClarification<T>(
  initialPrompt: string,
  llm: ILLMService,
  parse: ResponseParser<T>,
  maxAttempts = 3
): Promise<T> {
  if (!Number.isInteger(maxAttempts) || maxAttempts < 1) {
    throw new InvalidRequestError(`maxAttempts must be a positive integer, got ${maxAttempts}`);
  }

  let prompt = initialPrompt;
  let lastError = '';
  let lastContent = '';

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    const response = await llm.execute(prompt);
    const outcome = parse(response.content);
    if (outcome.success) {
      return outcome.value;
    }
    lastError = outcome.error;
    lastContent = response.content;
    prompt = clarificationPrompt(initialPrompt, response.content, outcome.error);
  }

  throw new ParseError(
    `Could not parse response after ${maxAttempts} attempts: ${lastError}`,
    lastContent
  );
}
