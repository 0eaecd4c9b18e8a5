/**
 * Model service abstraction
 * Concrete provider adapters live outside the core and implement this interface
 */

import type { ZodType } from 'zod';
import type { LLMChunk, LLMResponse, Message, ToolCallResponse } from '../types/index.js';

export interface LLMTool {
  name: string;
  description: string;
  parameters: Record<string, unknown>; // JSON Schema
}

export interface ILLMService {
  execute(prompt: string): Promise<LLMResponse>;

  executeWithHistory(messages: readonly Message[]): Promise<LLMResponse>;

  executeStream(prompt: string): AsyncIterable<LLMChunk>;

  /**
   * Single tool-aware completion; the caller runs any requested tools
   */
  executeWithTools(prompt: string, tools: readonly LLMTool[]): Promise<ToolCallResponse>;

  /**
   * Completion parsed and validated against a schema
   * @throws ParseError when the output does not match
   */
  executeStructured<T>(prompt: string, schema: ZodType<T>): Promise<T>;

  isAvailable(): Promise<boolean>;
}
