/**
 * Core type definitions for agentloom
 */

// JSON values carried in handoff payloads and agent state
export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

// Message types
export type MessageRole = 'system' | 'user' | 'assistant' | 'tool';

export interface Message {
  readonly role: MessageRole;
  readonly content: string;
  readonly toolCallId?: string;
  readonly toolName?: string;
}

export interface ToolCall {
  id: string;
  name: string;
  arguments: Record<string, unknown>;
}

// Model service response types
export type FinishReason = 'stop' | 'tool_calls' | 'length' | 'error';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
}

export interface LLMResponse {
  content: string;
  usage?: TokenUsage;
  model?: string;
  metadata?: Record<string, string>;
}

export interface LLMChunk {
  content: string;
  done: boolean;
  finishReason?: FinishReason;
}

export interface ToolCallResponse {
  content?: string;
  toolCalls: ToolCall[];
  finishReason: FinishReason;
}

/**
 * Provider tag used for token estimates
 */
export type ProviderTag =
  | 'openai'
  | 'anthropic'
  | 'gemini'
  | 'deepseek'
  | 'ollama'
  | 'lmstudio'
  | 'generic';

export const createMessage = (
  role: MessageRole,
  content: string,
  tool?: { toolCallId?: string; toolName?: string }
): Message => ({ role, content, ...tool });
